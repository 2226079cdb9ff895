import { Client, type Algorithms } from 'ssh2'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { errorMessage } from '../types'
import { NetconfChannel } from './netconf'
import type { ConnectResult, ConnectTarget, Driver, DriverSession, LogFn, RpcResult } from './types'

export const EVPN_ROUTE_STATUS_RPC = '<get-evpn-ip-prefix-database-information/>'
export const RESTART_ROUTING_RPC = '<restart-routing-process/>'

const ROUTE_STATUS_ELEMENT = 'adv-ip-route-status'

// Modern algorithms first, with fallbacks for older Junos firmware
const SSH_ALGORITHMS: Algorithms = {
  kex: [
    'curve25519-sha256',
    'curve25519-sha256@libssh.org',
    'ecdh-sha2-nistp256',
    'ecdh-sha2-nistp384',
    'ecdh-sha2-nistp521',
    'diffie-hellman-group-exchange-sha256',
    'diffie-hellman-group14-sha256',
    'diffie-hellman-group14-sha1',
  ],
  serverHostKey: [
    'ssh-ed25519',
    'ecdsa-sha2-nistp256',
    'ecdsa-sha2-nistp384',
    'ecdsa-sha2-nistp521',
    'rsa-sha2-512',
    'rsa-sha2-256',
    'ssh-rsa',  // Legacy algorithm for older Junos releases
  ],
}

// Every element parsed as an array so repeated and single children look the same
const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: () => true,
})

type XmlNode = Record<string, unknown>

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function textOf(node: unknown): string {
  if (typeof node === 'string') return node
  if (typeof node === 'number' || typeof node === 'boolean') return String(node)
  if (isXmlNode(node) && '#text' in node) return textOf(node['#text'])
  return ''
}

// Collect the text of every element named `tag` at any depth (like xpath .//tag)
function collectText(node: unknown, tag: string, out: string[]): string[] {
  if (Array.isArray(node)) {
    for (const item of node) collectText(item, tag, out)
  } else if (isXmlNode(node)) {
    for (const [key, value] of Object.entries(node)) {
      if (key === tag) {
        for (const item of Array.isArray(value) ? value : [value]) out.push(textOf(item))
      } else {
        collectText(value, tag, out)
      }
    }
  }
  return out
}

function collectNodes(node: unknown, tag: string, out: XmlNode[]): XmlNode[] {
  if (Array.isArray(node)) {
    for (const item of node) collectNodes(item, tag, out)
  } else if (isXmlNode(node)) {
    for (const [key, value] of Object.entries(node)) {
      if (key === tag) {
        for (const item of Array.isArray(value) ? value : [value]) {
          out.push(isXmlNode(item) ? item : {})
        }
      }
      collectNodes(value, tag, out)
    }
  }
  return out
}

export interface RpcErrorInfo {
  severity: string
  message: string
}

interface ParsedReply {
  tree: unknown
  errors: RpcErrorInfo[]  // Error-severity rpc-errors only
  warnings: RpcErrorInfo[]
}

function parseReply(xml: string): RpcResult<ParsedReply> {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    return { ok: false, error: `Malformed RPC reply: ${validation.err.msg}` }
  }

  const tree: unknown = parser.parse(xml)
  const errors: RpcErrorInfo[] = []
  const warnings: RpcErrorInfo[] = []
  for (const node of collectNodes(tree, 'rpc-error', [])) {
    const severity = collectText(node, 'error-severity', [])[0] || 'error'
    const message = collectText(node, 'error-message', [])[0] || 'unspecified rpc-error'
    if (severity === 'warning') warnings.push({ severity, message })
    else errors.push({ severity, message })
  }
  return { ok: true, value: { tree, errors, warnings } }
}

function logWarnings(reply: ParsedReply, log?: LogFn) {
  if (!log) return
  for (const warning of reply.warnings) log('warn', `RPC warning: ${warning.message}`)
}

// Pull the adv-ip-route-status tokens out of a get-evpn-ip-prefix-database-information reply
export function extractRouteStatuses(xml: string, log?: LogFn): RpcResult<string[]> {
  const parsed = parseReply(xml)
  if (!parsed.ok) return parsed
  logWarnings(parsed.value, log)
  if (parsed.value.errors.length > 0) {
    return { ok: false, error: `RPC error: ${parsed.value.errors.map(e => e.message).join('; ')}` }
  }

  const statuses = collectText(parsed.value.tree, ROUTE_STATUS_ELEMENT, [])
  if (log) {
    const prefixes = collectText(parsed.value.tree, 'entry-prefix', [])
    log('debug', `Found ${statuses.length} ${ROUTE_STATUS_ELEMENT} elements (${prefixes.length} entry-prefix)`)
  }
  return { ok: true, value: statuses }
}

// Any reply without an error-severity rpc-error counts as acknowledged
export function checkRpcReply(xml: string, log?: LogFn): RpcResult<void> {
  const parsed = parseReply(xml)
  if (!parsed.ok) return parsed
  logWarnings(parsed.value, log)
  if (parsed.value.errors.length > 0) {
    return { ok: false, error: `RPC error: ${parsed.value.errors.map(e => e.message).join('; ')}` }
  }
  return { ok: true, value: undefined }
}

class JunosSession implements DriverSession {
  private client: Client
  private channel: NetconfChannel

  constructor(client: Client, channel: NetconfChannel) {
    this.client = client
    this.channel = channel
  }

  async getRouteStatuses(log?: LogFn): Promise<RpcResult<string[]>> {
    try {
      const reply = await this.channel.rpc(EVPN_ROUTE_STATUS_RPC)
      return extractRouteStatuses(reply, log)
    } catch (err) {
      return { ok: false, error: errorMessage(err) }
    }
  }

  async restartRouting(log?: LogFn): Promise<RpcResult<void>> {
    try {
      const reply = await this.channel.rpc(RESTART_ROUTING_RPC)
      return checkRpcReply(reply, log)
    } catch (err) {
      return { ok: false, error: errorMessage(err) }
    }
  }

  close() {
    try {
      this.channel.close()
    } finally {
      this.client.end()
    }
  }
}

// Open SSH, start the netconf subsystem and exchange hellos (single attempt)
function connectNetconf(target: ConnectTarget, log?: LogFn): Promise<ConnectResult> {
  const timeout = target.timeoutSeconds * 1000

  return new Promise((resolve) => {
    const client = new Client()
    let settled = false

    const finish = (result: ConnectResult) => {
      if (settled) {
        if (result.success) result.session.close()
        return
      }
      settled = true
      clearTimeout(timer)
      if (!result.success) client.end()
      resolve(result)
    }

    const timer = setTimeout(() => {
      finish({ success: false, authFailed: false, reason: `Timed out after ${target.timeoutSeconds}s` })
    }, timeout)

    client.on('ready', () => {
      if (log) log('debug', 'SSH session ready, starting netconf subsystem')
      client.subsys('netconf', (err, stream) => {
        if (err) {
          finish({ success: false, authFailed: false, reason: `netconf subsystem unavailable: ${err.message}` })
          return
        }
        const channel = new NetconfChannel(stream, timeout)
        channel.hello()
          .then(() => finish({ success: true, session: new JunosSession(client, channel) }))
          .catch((helloErr: unknown) => {
            channel.close()
            finish({ success: false, authFailed: false, reason: `NETCONF hello failed: ${errorMessage(helloErr)}` })
          })
      })
    })

    client.on('error', (err: Error & { level?: string }) => {
      // Auth failures have level 'client-authentication'
      const isAuthError = err.level === 'client-authentication'
      finish({ success: false, authFailed: isAuthError, reason: err.message })
    })

    client.connect({
      host: target.host,
      port: target.port,
      username: target.username,
      password: target.password,
      readyTimeout: timeout,
      algorithms: SSH_ALGORITHMS,
    })
  })
}

export const junosNetconfDriver: Driver = {
  name: 'junos-netconf',
  connect: connectNetconf,
}
