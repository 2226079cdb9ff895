#!/usr/bin/env node
import { main } from './cli'

// First Ctrl+C stops dispatching new devices, a second one kills the process
const controller = new AbortController()
process.once('SIGINT', () => controller.abort())

main(process.argv, { signal: controller.signal })
  .then(code => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('Unexpected error:', err)
    process.exitCode = 1
  })
