// Device drivers and shared driver types

export * from './types'
export { NetconfChannel, NETCONF_EOM } from './netconf'
export { junosNetconfDriver, extractRouteStatuses, checkRpcReply } from './junos'
