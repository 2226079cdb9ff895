import type { LogFn } from '../types'

export type { LogFn }

export interface ConnectTarget {
  host: string
  port: number
  username: string
  password: string
  timeoutSeconds: number
}

// Connection result type
export type ConnectResult =
  | { success: true; session: DriverSession }
  | { success: false; authFailed: boolean; reason: string }

export type RpcResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string }

// An open management session on one device
export interface DriverSession {
  // Raw adv-ip-route-status text of every advertised EVPN IP prefix, in reply order
  getRouteStatuses(log?: LogFn): Promise<RpcResult<string[]>>
  restartRouting(log?: LogFn): Promise<RpcResult<void>>
  close(): void
}

// Driver interface that all vendor drivers must implement
export interface Driver {
  name: string
  connect(target: ConnectTarget, log?: LogFn): Promise<ConnectResult>
}
