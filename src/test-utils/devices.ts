import type { DeviceDescriptor } from '../services/types'

export function device(host: string, overrides: Partial<DeviceDescriptor> = {}): DeviceDescriptor {
  return Object.freeze({
    host,
    displayName: host,
    username: 'netops',
    password: 'test-secret',
    port: 22,
    connectTimeoutSeconds: 30,
    tags: [],
    group: 'all',
    ...overrides,
  })
}
