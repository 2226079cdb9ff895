import { describe, it, expect } from 'vitest'
import { aggregateFleetReport, formatStatusCounts, renderFleetReport } from './report'
import { emptyStatusCounts } from './classifier'
import type { DeviceResult, RouteStatusCounts } from './types'

const RULE = '='.repeat(60)
const pad = (display: string) => display.padEnd(30)

function result(
  name: string,
  host: string,
  counts: Partial<RouteStatusCounts>,
  extra: Partial<DeviceResult> = {}
): DeviceResult {
  return {
    host,
    displayName: name,
    connected: true,
    statusCounts: { ...emptyStatusCounts(), ...counts },
    restartAttempted: false,
    restartSucceeded: false,
    skipped: false,
    error: null,
    ...extra,
  }
}

const unreachable = (name: string, host: string) =>
  result(name, host, {}, { connected: false, error: 'connect ECONNREFUSED' })

describe('formatStatusCounts', () => {
  it('lists non-zero categories in fixed order', () => {
    expect(formatStatusCounts({ ...emptyStatusCounts(), Unknown: 1, Accepted: 4, Pending: 2 }))
      .toBe('Accepted: 4, Pending: 2, Unknown: 1')
  })

  it('is empty when everything is zero', () => {
    expect(formatStatusCounts(emptyStatusCounts())).toBe('')
  })
})

describe('aggregateFleetReport', () => {
  const results = [
    result('leaf2', '10.0.0.2', { Accepted: 3, Rejected: 2 }),
    unreachable('leaf3', '10.0.0.3'),
    result('leaf1', '10.0.0.1', { Accepted: 5 }),
    result('leaf6', '10.0.0.6', {}, { connected: false, skipped: true, error: 'Run aborted before dispatch' }),
  ]

  it('sums only devices that were reached', () => {
    const report = aggregateFleetReport(results, false)

    expect(report.totals).toEqual({ Accepted: 8, Rejected: 2, Pending: 0, Invalid: 0, Unknown: 0 })
    expect(report.connectedCount).toBe(2)
    expect(report.connectionFailures).toEqual(['leaf3:10.0.0.3'])
    expect(report.skipped).toEqual(['leaf6:10.0.0.6'])
    expect(report.rejectedDevices).toEqual([{ display: 'leaf2:10.0.0.2', rejected: 2 }])
    expect(report.restartBreakdown).toBeNull()
  })

  it('orders device lines by host then name', () => {
    const report = aggregateFleetReport([
      result('b', '10.0.0.9', {}),
      result('z', '10.0.0.10', {}),
      result('a', '10.0.0.9', {}),
    ], false)

    expect(report.devices.map(d => d.display)).toEqual(['z:10.0.0.10', 'a:10.0.0.9', 'b:10.0.0.9'])
  })

  it('does not depend on the order of results', () => {
    const forward = aggregateFleetReport(results, true)
    const backward = aggregateFleetReport([...results].reverse(), true)
    expect(backward).toEqual(forward)
  })

  it('splits rejected devices by restart outcome in fix mode', () => {
    const report = aggregateFleetReport([
      result('ok', '10.0.0.1', { Rejected: 1 }, { restartAttempted: true, restartSucceeded: true }),
      result('bad', '10.0.0.2', { Rejected: 2 }, { restartAttempted: true }),
      result('none', '10.0.0.3', { Rejected: 3 }),
    ], true)

    expect(report.restartBreakdown).toEqual({
      succeeded: [{ display: 'ok:10.0.0.1', rejected: 1 }],
      failed: [{ display: 'bad:10.0.0.2', rejected: 2 }],
      notAttempted: [{ display: 'none:10.0.0.3', rejected: 3 }],
    })
  })
})

describe('renderFleetReport', () => {
  it('renders an audit with rejected routes and a connection failure', () => {
    const report = aggregateFleetReport([
      result('leaf2', '10.0.0.2', { Accepted: 3, Rejected: 2 }),
      unreachable('leaf3', '10.0.0.3'),
      result('leaf1', '10.0.0.1', { Accepted: 5 }),
    ], false)

    expect(renderFleetReport(report)).toEqual([
      '',
      'EVPN Route Status Summary:',
      RULE,
      `${pad('leaf1:10.0.0.1')} - Accepted: 5`,
      `${pad('leaf2:10.0.0.2')} - Accepted: 3, Rejected: 2`,
      `${pad('leaf3:10.0.0.3')} - CONNECTION FAILED`,
      '',
      RULE,
      'Overall Summary:',
      'Total routes: Accepted: 8, Rejected: 2',
      'Connection failures: 1',
      '',
      'Devices with rejected routes: 1',
      '  - leaf2:10.0.0.2: 2 rejected routes',
      '',
      'To fix rejected routes, run with --fix option',
    ])
  })

  it('renders restart outcomes in fix mode', () => {
    const report = aggregateFleetReport([
      result('leaf1', '10.0.0.1', { Accepted: 5 }),
      result('leaf2', '10.0.0.2', { Accepted: 3, Rejected: 2 }, { restartAttempted: true, restartSucceeded: true }),
      result('leaf4', '10.0.0.4', { Rejected: 1, Pending: 1 }, { restartAttempted: true }),
      result('leaf5', '10.0.0.5', { Rejected: 4 }),
      result('leaf6', '10.0.0.6', {}, { connected: false, skipped: true }),
    ], true)

    expect(renderFleetReport(report)).toEqual([
      '',
      'EVPN Route Status Summary:',
      RULE,
      `${pad('leaf1:10.0.0.1')} - Accepted: 5 [Restart: NO]`,
      `${pad('leaf2:10.0.0.2')} - Accepted: 3, Rejected: 2 [Restart: SUCCESS]`,
      `${pad('leaf4:10.0.0.4')} - Rejected: 1, Pending: 1 [Restart: FAILED]`,
      `${pad('leaf5:10.0.0.5')} - Rejected: 4 [Restart: NO]`,
      `${pad('leaf6:10.0.0.6')} - SKIPPED (run aborted)`,
      '',
      RULE,
      'Overall Summary:',
      'Total routes: Accepted: 8, Rejected: 7, Pending: 1',
      '',
      'Devices with rejected routes: 3',
      '  - leaf5:10.0.0.5: 4 rejected routes (no fix attempted)',
      '',
      'Successfully restarted routing on 1 device(s):',
      '  - leaf2:10.0.0.2: Fixed 2 rejected routes',
      '',
      'Failed to restart routing on 1 device(s):',
      '  - leaf4:10.0.0.4: 1 rejected routes (fix failed)',
    ])
  })

  it('stops after the totals when nothing was rejected', () => {
    const report = aggregateFleetReport([result('empty', '10.0.0.7', {})], false)

    expect(renderFleetReport(report)).toEqual([
      '',
      'EVPN Route Status Summary:',
      RULE,
      `${pad('empty:10.0.0.7')} - No routes found`,
      '',
      RULE,
      'Overall Summary:',
      'Total routes: none',
    ])
  })

  it('pads the device column to a fixed width', () => {
    const report = aggregateFleetReport([result('a', '1.1.1.1', { Accepted: 1 })], false)
    expect(renderFleetReport(report)[3]).toBe('a:1.1.1.1                      - Accepted: 1')
  })

  it('renders the same lines every time', () => {
    const report = aggregateFleetReport([result('leaf1', '10.0.0.1', { Rejected: 1 })], true)
    expect(renderFleetReport(report)).toEqual(renderFleetReport(report))
  })
})
