import { classifyRouteStatuses, emptyStatusCounts } from './classifier'
import type { Driver, DriverSession } from './drivers'
import { errorMessage, type DeviceDescriptor, type LogFn, type RouteStatusCounts } from './types'

/**
 * One device's management connection. Every operation fails closed:
 * transport errors become `false` / zero counts plus a logged diagnostic.
 */
export class DeviceSession {
  private descriptor: DeviceDescriptor
  private driver: Driver
  private log: LogFn
  private session: DriverSession | null = null
  private failure: string | null = null

  constructor(descriptor: DeviceDescriptor, driver: Driver, log: LogFn) {
    this.descriptor = descriptor
    this.driver = driver
    this.log = log
  }

  get connected(): boolean {
    return this.session !== null
  }

  // Why the last connect attempt failed, if it did
  get lastError(): string | null {
    return this.failure
  }

  async connect(timeoutSeconds = this.descriptor.connectTimeoutSeconds): Promise<boolean> {
    if (this.session) return true

    const { host, port, username, password } = this.descriptor
    try {
      const result = await this.driver.connect({ host, port, username, password, timeoutSeconds }, this.log)
      if (!result.success) {
        this.failure = result.authFailed ? `Authentication failed: ${result.reason}` : result.reason
        if (result.authFailed) {
          this.log('error', `Authentication failed for ${username}@${host}: ${result.reason}`)
        } else {
          this.log('error', `Connection failed to ${host}: ${result.reason}`)
        }
        return false
      }
      this.failure = null
      this.session = result.session
      this.log('info', `Connected to ${host}`)
      return true
    } catch (err) {
      this.failure = errorMessage(err)
      this.log('error', `Unexpected error connecting to ${host}: ${this.failure}`)
      return false
    }
  }

  async queryRouteStatus(): Promise<RouteStatusCounts> {
    if (!this.session) {
      this.log('error', 'Device not connected')
      return emptyStatusCounts()
    }

    try {
      const result = await this.session.getRouteStatuses(this.log)
      if (!result.ok) {
        this.log('error', `Failed to get EVPN status from ${this.descriptor.host}: ${result.error}`)
        return emptyStatusCounts()
      }
      const counts = classifyRouteStatuses(result.value, this.log)
      this.log('info', `EVPN route status for ${this.descriptor.host}: ${JSON.stringify(counts)}`)
      return counts
    } catch (err) {
      this.log('error', `Unexpected error getting EVPN status from ${this.descriptor.host}: ${errorMessage(err)}`)
      return emptyStatusCounts()
    }
  }

  async restartRouting(): Promise<boolean> {
    if (!this.session) {
      this.log('error', 'Device not connected')
      return false
    }

    try {
      this.log('warn', `Restarting routing process on ${this.descriptor.host}`)
      const result = await this.session.restartRouting(this.log)
      if (!result.ok) {
        this.log('error', `Failed to restart routing on ${this.descriptor.host}: ${result.error}`)
        return false
      }
      this.log('success', `Routing restart initiated on ${this.descriptor.host}`)
      return true
    } catch (err) {
      this.log('error', `Unexpected error restarting routing on ${this.descriptor.host}: ${errorMessage(err)}`)
      return false
    }
  }

  // Safe to call repeatedly, and when never connected
  disconnect() {
    const session = this.session
    if (!session) return
    this.session = null
    try {
      session.close()
      this.log('info', `Disconnected from ${this.descriptor.host}`)
    } catch (err) {
      this.log('error', `Error while disconnecting from ${this.descriptor.host}: ${errorMessage(err)}`)
    }
  }
}
