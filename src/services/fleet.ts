import { nanoid } from 'nanoid'
import { AbortedError, limitConcurrency } from './concurrency'
import { junosNetconfDriver, type Driver } from './drivers'
import { loadInventory } from './inventory'
import type { Logger } from './logger'
import { aggregateFleetReport, type FleetReport } from './report'
import { resolveFleetConfig, type Rules } from './rules'
import { errorMessage, type DeviceDescriptor, type DeviceResult, type FleetConfig, type LogLevel } from './types'
import { runDeviceWorkflow, unconnectedResult } from './workflow'

export interface FleetProgress {
  completed: number
  total: number
}

export interface FleetCallbacks {
  onDeviceResult?: (result: DeviceResult, progress: FleetProgress) => void
}

export interface FleetRunSummary {
  runId: string
  results: DeviceResult[]  // results[i] belongs to devices[i]
  durationSeconds: number
  aborted: boolean
}

export interface FleetCoordinatorOptions {
  logger: Logger
  driver?: Driver
  callbacks?: FleetCallbacks
}

export class FleetCoordinator {
  private config: FleetConfig
  private logger: Logger
  private driver: Driver
  private callbacks: FleetCallbacks
  private abortController: AbortController = new AbortController()

  constructor(config: FleetConfig, options: FleetCoordinatorOptions) {
    if (!Number.isInteger(config.concurrencyLimit) || config.concurrencyLimit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer (got ${config.concurrencyLimit})`)
    }
    this.config = config
    this.logger = options.logger
    this.driver = options.driver ?? junosNetconfDriver
    this.callbacks = options.callbacks ?? {}
  }

  // Stop dispatching; devices already in flight run to completion
  abort() {
    if (this.aborted) return
    this.abortController.abort()
    this.log('warn', 'Run aborted - no further devices will be dispatched')
  }

  get aborted(): boolean {
    return this.abortController.signal.aborted
  }

  isAborted() {
    return this.aborted
  }

  private log(level: LogLevel, message: string) {
    this.logger.log(level, message)
  }

  async run(devices: readonly DeviceDescriptor[]): Promise<FleetRunSummary> {
    const runId = nanoid(10)
    const startTime = Date.now()

    if (devices.length === 0) {
      this.log('warn', 'No devices to process')
      return { runId, results: [], durationSeconds: 0, aborted: this.aborted }
    }

    const { concurrencyLimit, fixMode, connectionTimeoutSeconds } = this.config
    this.log('info', `Run ${runId}: processing ${devices.length} devices (fix mode: ${fixMode}, max concurrent: ${concurrencyLimit})`)

    let completed = 0
    const tasks = devices.map(device => async () => {
      const result = await runDeviceWorkflow(device, {
        driver: this.driver,
        fixMode,
        connectionTimeoutSeconds,
        log: this.logger.child(device.displayName).fn,
      })
      completed++
      try {
        this.callbacks.onDeviceResult?.(result, { completed, total: devices.length })
      } catch (err) {
        this.log('warn', `${device.host}: Result callback failed: ${errorMessage(err)}`)
      }
      return result
    })

    const settled = await limitConcurrency(tasks, concurrencyLimit, this.abortController.signal)

    // Individual failures never stop the run - each becomes that device's own result
    const results = settled.map((outcome, index): DeviceResult => {
      const device = devices[index]
      if (outcome.status === 'fulfilled') return outcome.value
      if (outcome.reason instanceof AbortedError) {
        return unconnectedResult(device, 'Run aborted before dispatch', true)
      }
      const message = errorMessage(outcome.reason)
      this.log('error', `${device.host}: Device workflow failed: ${message}`)
      return unconnectedResult(device, message)
    })

    const durationSeconds = (Date.now() - startTime) / 1000
    const connected = results.filter(r => r.connected).length
    this.log('success', `Run ${runId} complete: ${connected}/${devices.length} devices reachable in ${durationSeconds.toFixed(1)}s`)

    return { runId, results, durationSeconds, aborted: this.aborted }
  }
}

export interface FleetAuditOptions {
  hostsFile: string
  rules: Rules
  fixMode: boolean
  maxConcurrent?: number
  logger: Logger
  driver?: Driver
  callbacks?: FleetCallbacks
  signal?: AbortSignal
}

export interface FleetAuditResult {
  summary: FleetRunSummary
  report: FleetReport | null  // null when no devices were loaded
}

// Load the inventory, run every device and aggregate the report
export async function runFleetAudit(options: FleetAuditOptions): Promise<FleetAuditResult> {
  const { logger } = options
  const config = resolveFleetConfig(options.rules, {
    fixMode: options.fixMode,
    maxConcurrent: options.maxConcurrent,
  })

  const devices = loadInventory(options.hostsFile, logger.fn)
  const coordinator = new FleetCoordinator(config, {
    logger,
    driver: options.driver,
    callbacks: options.callbacks,
  })

  const onAbort = () => coordinator.abort()
  if (options.signal?.aborted) coordinator.abort()
  options.signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const summary = await coordinator.run(devices)
    const report = devices.length > 0 ? aggregateFleetReport(summary.results, config.fixMode) : null
    return { summary, report }
  } finally {
    options.signal?.removeEventListener('abort', onAbort)
  }
}
