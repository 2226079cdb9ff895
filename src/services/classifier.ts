import { ROUTE_STATUSES, type LogFn, type RouteStatus, type RouteStatusCounts } from './types'

const KNOWN_STATUSES: ReadonlySet<string> = new Set<RouteStatus>(['Accepted', 'Rejected', 'Pending', 'Invalid'])

function isKnownStatus(token: string): token is Exclude<RouteStatus, 'Unknown'> {
  return KNOWN_STATUSES.has(token)
}

function zeroCounts(): Record<RouteStatus, number> {
  return { Accepted: 0, Rejected: 0, Pending: 0, Invalid: 0, Unknown: 0 }
}

export function emptyStatusCounts(): RouteStatusCounts {
  return Object.freeze(zeroCounts())
}

export function totalRoutes(counts: RouteStatusCounts): number {
  return ROUTE_STATUSES.reduce((sum, status) => sum + counts[status], 0)
}

/**
 * Fold raw adv-ip-route-status tokens into per-category counts.
 * Tokens are trimmed; missing or empty text counts as Unknown. Anything not
 * an exact known status is counted as Unknown and reported through `log`.
 */
export function classifyRouteStatuses(
  tokens: readonly (string | null | undefined)[],
  log?: LogFn
): RouteStatusCounts {
  const counts = zeroCounts()

  for (const raw of tokens) {
    const status = raw?.trim() || 'Unknown'
    if (isKnownStatus(status)) {
      counts[status]++
    } else {
      counts.Unknown++
      if (status !== 'Unknown' && log) log('warn', `Unknown status found: ${status}`)
    }
  }

  return Object.freeze(counts)
}
