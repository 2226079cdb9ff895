// Shared types for the fleet audit services

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error'

export interface LogMessage {
  timestamp: string
  level: LogLevel
  message: string
}

export type LogFn = (level: LogLevel, message: string) => void

// Closed set of route acceptance categories, in report order
export const ROUTE_STATUSES = ['Accepted', 'Rejected', 'Pending', 'Invalid', 'Unknown'] as const

export type RouteStatus = (typeof ROUTE_STATUSES)[number]

export type RouteStatusCounts = Readonly<Record<RouteStatus, number>>

export interface DeviceDescriptor {
  readonly host: string
  readonly displayName: string
  readonly username: string
  readonly password: string
  readonly port: number
  readonly connectTimeoutSeconds: number
  readonly tags: readonly string[]
  readonly group: string  // Inventory host group, informational
}

export interface DeviceResult {
  readonly host: string
  readonly displayName: string
  readonly connected: boolean
  readonly statusCounts: RouteStatusCounts
  readonly restartAttempted: boolean
  readonly restartSucceeded: boolean  // false unless restartAttempted
  readonly skipped: boolean  // Run was aborted before this device was dispatched
  readonly error: string | null
}

export interface FleetConfig {
  concurrencyLimit: number
  connectionTimeoutSeconds: number | null  // Overrides every descriptor's timeout when set
  fixMode: boolean
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
