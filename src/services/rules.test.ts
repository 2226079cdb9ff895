import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { DEFAULT_CONCURRENCY, defaultRules, loadRules, parseRules, resolveFleetConfig } from './rules'
import type { LogFn } from './types'

describe('parseRules', () => {
  it('defaults to no performance settings and no file logging', () => {
    expect(defaultRules().performance).toEqual({})
    expect(defaultRules().logging).toBeNull()
    expect(parseRules(null).logging).toBeNull()
  })

  it('fills logging defaults', () => {
    const rules = parseRules({ logging: { enabled: true, level: 'DEBUG' } })
    expect(rules.logging).toEqual({
      enabled: true,
      level: 'DEBUG',
      file: 'data/logs.txt',
      max_size_mb: 10,
      backup_count: 5,
      console: true,
    })
  })

  it('keeps unrelated sections', () => {
    const rules = parseRules({ evpn_checks: { expected_status: 'Accepted' } })
    expect(rules['evpn_checks']).toEqual({ expected_status: 'Accepted' })
  })

  it('rejects a non-positive concurrency', () => {
    expect(() => parseRules({ performance: { max_concurrent_devices: 0 } }))
      .toThrow(/^Invalid rules: performance\.max_concurrent_devices: /)
  })
})

describe('loadRules', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'evpn-rules-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('reads performance and logging sections', () => {
    const file = path.join(dir, 'rules.yaml')
    writeFileSync(file, [
      'performance:',
      '  max_concurrent_devices: 4',
      '  connection_timeout: 15',
      'logging:',
      '  enabled: true',
      '  file: logs/audit-{timestamp}.log',
    ].join('\n'))
    const log = vi.fn<LogFn>()

    const rules = loadRules(file, log)

    expect(rules.performance).toEqual({ max_concurrent_devices: 4, connection_timeout: 15 })
    expect(rules.logging?.file).toBe('logs/audit-{timestamp}.log')
    expect(log).toHaveBeenCalledWith('info', `Loaded rules from ${file}`)
  })

  it('falls back to defaults when the file is invalid', () => {
    const file = path.join(dir, 'rules.yaml')
    writeFileSync(file, 'performance:\n  max_concurrent_devices: many\n')
    const log = vi.fn<LogFn>()

    expect(loadRules(file, log)).toEqual(defaultRules())
    expect(log.mock.calls[0][0]).toBe('error')
    expect(log.mock.calls[0][1]).toMatch(new RegExp(`^Failed to load rules from ${file}: Invalid rules: `))
  })
})

describe('resolveFleetConfig', () => {
  const rules = parseRules({ performance: { max_concurrent_devices: 4, connection_timeout: 15 } })

  it('lets the command line override concurrency', () => {
    expect(resolveFleetConfig(rules, { fixMode: true, maxConcurrent: 2 }))
      .toEqual({ concurrencyLimit: 2, connectionTimeoutSeconds: 15, fixMode: true })
  })

  it('uses the rules when there is no override', () => {
    expect(resolveFleetConfig(rules, { fixMode: false }))
      .toEqual({ concurrencyLimit: 4, connectionTimeoutSeconds: 15, fixMode: false })
  })

  it('falls back to the default concurrency', () => {
    expect(resolveFleetConfig(defaultRules(), { fixMode: false }))
      .toEqual({ concurrencyLimit: DEFAULT_CONCURRENCY, connectionTimeoutSeconds: null, fixMode: false })
  })
})
