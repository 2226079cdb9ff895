import { emptyStatusCounts } from './classifier'
import { ROUTE_STATUSES, type DeviceResult, type RouteStatus, type RouteStatusCounts } from './types'

export const DEVICE_COLUMN_WIDTH = 30
const RULE = '='.repeat(60)

export type RestartOutcome = 'success' | 'failed' | 'not-attempted'

export interface DeviceReportLine {
  display: string  // name:host
  host: string
  connected: boolean
  skipped: boolean
  statusCounts: RouteStatusCounts
  restart: RestartOutcome
}

export interface RejectedDevice {
  display: string
  rejected: number
}

export interface RestartBreakdown {
  succeeded: RejectedDevice[]
  failed: RejectedDevice[]
  notAttempted: RejectedDevice[]
}

export interface FleetReport {
  fixMode: boolean
  devices: DeviceReportLine[]
  totals: RouteStatusCounts
  connectedCount: number
  connectionFailures: string[]
  skipped: string[]
  rejectedDevices: RejectedDevice[]
  restartBreakdown: RestartBreakdown | null  // Fix mode only
}

export function deviceDisplay(result: Pick<DeviceResult, 'displayName' | 'host'>): string {
  return `${result.displayName}:${result.host}`
}

function restartOutcome(result: DeviceResult): RestartOutcome {
  if (!result.restartAttempted) return 'not-attempted'
  return result.restartSucceeded ? 'success' : 'failed'
}

function compareResults(a: DeviceResult, b: DeviceResult): number {
  if (a.host !== b.host) return a.host < b.host ? -1 : 1
  if (a.displayName !== b.displayName) return a.displayName < b.displayName ? -1 : 1
  return 0
}

/**
 * Pure reduction of a finished result set. Lines are sorted by host then name,
 * so any ordering of the same results produces the same report.
 */
export function aggregateFleetReport(results: readonly DeviceResult[], fixMode: boolean): FleetReport {
  const sorted = [...results].sort(compareResults)
  const totals: Record<RouteStatus, number> = { ...emptyStatusCounts() }
  const devices: DeviceReportLine[] = []
  const connectionFailures: string[] = []
  const skipped: string[] = []
  const rejectedDevices: RejectedDevice[] = []
  const breakdown: RestartBreakdown = { succeeded: [], failed: [], notAttempted: [] }
  let connectedCount = 0

  for (const result of sorted) {
    const display = deviceDisplay(result)
    const restart = restartOutcome(result)
    devices.push({
      display,
      host: result.host,
      connected: result.connected,
      skipped: result.skipped,
      statusCounts: result.statusCounts,
      restart,
    })

    if (result.skipped) {
      skipped.push(display)
      continue
    }
    if (!result.connected) {
      connectionFailures.push(display)
      continue
    }

    connectedCount++
    for (const status of ROUTE_STATUSES) {
      totals[status] += result.statusCounts[status]
    }

    const rejected = result.statusCounts.Rejected
    if (rejected > 0) {
      const entry = { display, rejected }
      rejectedDevices.push(entry)
      if (restart === 'success') breakdown.succeeded.push(entry)
      else if (restart === 'failed') breakdown.failed.push(entry)
      else breakdown.notAttempted.push(entry)
    }
  }

  return {
    fixMode,
    devices,
    totals: Object.freeze(totals),
    connectedCount,
    connectionFailures,
    skipped,
    rejectedDevices,
    restartBreakdown: fixMode ? breakdown : null,
  }
}

// "Accepted: 3, Rejected: 1" over the non-zero categories, or "" when all are zero
export function formatStatusCounts(counts: RouteStatusCounts): string {
  return ROUTE_STATUSES
    .filter(status => counts[status] > 0)
    .map(status => `${status}: ${counts[status]}`)
    .join(', ')
}

const RESTART_MARKERS: Record<RestartOutcome, string> = {
  'success': ' [Restart: SUCCESS]',
  'failed': ' [Restart: FAILED]',
  'not-attempted': ' [Restart: NO]',
}

function renderDeviceLine(line: DeviceReportLine, fixMode: boolean): string {
  const label = line.display.padEnd(DEVICE_COLUMN_WIDTH)
  if (line.skipped) return `${label} - SKIPPED (run aborted)`
  if (!line.connected) return `${label} - CONNECTION FAILED`

  let status = formatStatusCounts(line.statusCounts) || 'No routes found'
  if (fixMode) status += RESTART_MARKERS[line.restart]
  return `${label} - ${status}`
}

export function renderFleetReport(report: FleetReport): string[] {
  const lines: string[] = ['', 'EVPN Route Status Summary:', RULE]

  for (const device of report.devices) {
    lines.push(renderDeviceLine(device, report.fixMode))
  }

  lines.push('', RULE, 'Overall Summary:')
  lines.push(`Total routes: ${formatStatusCounts(report.totals) || 'none'}`)
  if (report.connectionFailures.length > 0) {
    lines.push(`Connection failures: ${report.connectionFailures.length}`)
  }

  if (report.rejectedDevices.length === 0) return lines

  lines.push('', `Devices with rejected routes: ${report.rejectedDevices.length}`)

  const breakdown = report.restartBreakdown
  if (breakdown) {
    for (const { display, rejected } of breakdown.notAttempted) {
      lines.push(`  - ${display}: ${rejected} rejected routes (no fix attempted)`)
    }
    if (breakdown.succeeded.length > 0) {
      lines.push('', `Successfully restarted routing on ${breakdown.succeeded.length} device(s):`)
      for (const { display, rejected } of breakdown.succeeded) {
        lines.push(`  - ${display}: Fixed ${rejected} rejected routes`)
      }
    }
    if (breakdown.failed.length > 0) {
      lines.push('', `Failed to restart routing on ${breakdown.failed.length} device(s):`)
      for (const { display, rejected } of breakdown.failed) {
        lines.push(`  - ${display}: ${rejected} rejected routes (fix failed)`)
      }
    }
  } else {
    for (const { display, rejected } of report.rejectedDevices) {
      lines.push(`  - ${display}: ${rejected} rejected routes`)
    }
    lines.push('', 'To fix rejected routes, run with --fix option')
  }

  return lines
}
