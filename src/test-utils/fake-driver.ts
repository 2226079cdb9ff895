import type { ConnectResult, ConnectTarget, Driver, DriverSession, RpcResult } from '../services/drivers'

export interface FakeDeviceBehavior {
  connect?: 'ok' | 'auth-failed' | 'unreachable' | 'throw'
  statuses?: string[] | 'rpc-error' | 'throw'
  restart?: 'ok' | 'rpc-error' | 'throw'
  closeThrows?: boolean
  delayMs?: number
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * In-process stand-in for a device transport. Records every call per host and
 * tracks how many sessions are open at once.
 */
export class FakeDriver implements Driver {
  name = 'fake'
  readonly connects: ConnectTarget[] = []
  readonly queries: string[] = []
  readonly restarts: string[] = []
  readonly closes: string[] = []
  inFlight = 0
  maxInFlight = 0
  private behaviors: Record<string, FakeDeviceBehavior>

  constructor(behaviors: Record<string, FakeDeviceBehavior> = {}) {
    this.behaviors = behaviors
  }

  async connect(target: ConnectTarget): Promise<ConnectResult> {
    const behavior = this.behaviors[target.host] ?? {}
    this.connects.push(target)
    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    await sleep(behavior.delayMs ?? 1)

    switch (behavior.connect ?? 'ok') {
      case 'auth-failed':
        this.inFlight--
        return { success: false, authFailed: true, reason: 'Authentication rejected' }
      case 'unreachable':
        this.inFlight--
        return { success: false, authFailed: false, reason: 'connect ECONNREFUSED' }
      case 'throw':
        this.inFlight--
        throw new Error('transport exploded')
      case 'ok':
        return { success: true, session: this.openSession(target.host, behavior) }
    }
  }

  private openSession(host: string, behavior: FakeDeviceBehavior): DriverSession {
    return {
      getRouteStatuses: async (): Promise<RpcResult<string[]>> => {
        this.queries.push(host)
        await sleep(behavior.delayMs ?? 1)
        const statuses = behavior.statuses ?? []
        if (statuses === 'throw') throw new Error('query exploded')
        if (statuses === 'rpc-error') return { ok: false, error: 'RPC error: syntax error' }
        return { ok: true, value: statuses }
      },
      restartRouting: async (): Promise<RpcResult<void>> => {
        this.restarts.push(host)
        const restart = behavior.restart ?? 'ok'
        if (restart === 'throw') throw new Error('restart exploded')
        if (restart === 'rpc-error') return { ok: false, error: 'RPC error: permission denied' }
        return { ok: true, value: undefined }
      },
      close: () => {
        this.closes.push(host)
        this.inFlight--
        if (behavior.closeThrows) throw new Error('close exploded')
      },
    }
  }
}
