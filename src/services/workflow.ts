import { emptyStatusCounts } from './classifier'
import type { Driver } from './drivers'
import { DeviceSession } from './session'
import { errorMessage, type DeviceDescriptor, type DeviceResult, type LogFn, type RouteStatusCounts } from './types'

export type WorkflowState =
  | 'init'
  | 'connecting'
  | 'connected'
  | 'connect-failed'
  | 'querying'
  | 'queried'
  | 'restarting'
  | 'done'

export interface WorkflowOptions {
  driver: Driver
  fixMode: boolean
  connectionTimeoutSeconds?: number | null  // Run-wide override of the descriptor timeout
  log: LogFn
}

// The only side-effect gate: restart iff fix mode is on and routes were rejected
export function shouldRestartRouting(fixMode: boolean, counts: RouteStatusCounts): boolean {
  return fixMode && counts.Rejected > 0
}

export function unconnectedResult(
  descriptor: DeviceDescriptor,
  error: string | null,
  skipped = false
): DeviceResult {
  return Object.freeze({
    host: descriptor.host,
    displayName: descriptor.displayName,
    connected: false,
    statusCounts: emptyStatusCounts(),
    restartAttempted: false,
    restartSucceeded: false,
    skipped,
    error,
  })
}

/**
 * Connect, query, maybe restart, disconnect. Never rejects: faults, including
 * a failing log sink, end up in `error` next to whatever was already gathered.
 * Once connected, disconnect runs exactly once on every path.
 */
export async function runDeviceWorkflow(
  descriptor: DeviceDescriptor,
  options: WorkflowOptions
): Promise<DeviceResult> {
  // First failure of the caller's log, if any
  const faults: { log: string | null } = { log: null }
  const log: LogFn = (level, message) => {
    try {
      options.log(level, message)
    } catch (err) {
      if (faults.log === null) faults.log = errorMessage(err)
    }
  }

  let state: WorkflowState = 'init'
  const transition = (next: WorkflowState) => {
    log('debug', `${state} -> ${next}`)
    state = next
  }

  const session = new DeviceSession(descriptor, options.driver, log)
  let connected = false
  let statusCounts = emptyStatusCounts()
  let restartAttempted = false
  let restartSucceeded = false
  let error: string | null = null

  try {
    transition('connecting')
    connected = await session.connect(options.connectionTimeoutSeconds ?? descriptor.connectTimeoutSeconds)

    if (!connected) {
      transition('connect-failed')
      error = session.lastError ?? 'Connection failed'
    } else {
      transition('connected')
      transition('querying')
      statusCounts = await session.queryRouteStatus()
      transition('queried')

      if (shouldRestartRouting(options.fixMode, statusCounts)) {
        log('info', `Found ${statusCounts.Rejected} rejected routes on ${descriptor.host}`)
        transition('restarting')
        restartAttempted = true
        restartSucceeded = await session.restartRouting()
      }
    }
  } catch (err) {
    error = errorMessage(err)
    log('error', `Unexpected error processing ${descriptor.host} (in ${state}): ${error}`)
  } finally {
    session.disconnect()
    transition('done')
  }

  if (error === null && faults.log !== null) {
    error = `Log write failed: ${faults.log}`
  }

  return Object.freeze({
    host: descriptor.host,
    displayName: descriptor.displayName,
    connected,
    statusCounts,
    restartAttempted,
    restartSucceeded,
    skipped: false,
    error,
  })
}
