import type { Duplex } from 'stream'

// NETCONF 1.0 end-of-message delimiter (RFC 6242 section 4.3)
export const NETCONF_EOM = ']]>]]>'

export const NETCONF_BASE_NS = 'urn:ietf:params:xml:ns:netconf:base:1.0'

// Advertise base:1.0 only so the server keeps end-of-message framing
export const CLIENT_HELLO =
  '<?xml version="1.0" encoding="UTF-8"?>' +
  `<hello xmlns="${NETCONF_BASE_NS}">` +
  '<capabilities><capability>urn:ietf:params:netconf:base:1.0</capability></capabilities>' +
  '</hello>'

interface Waiter {
  resolve: (message: string) => void
  reject: (err: Error) => void
  timer: ReturnType<typeof setTimeout>
}

/**
 * Message framing over an SSH `netconf` subsystem stream.
 * Replies are matched to requests in order; NETCONF servers answer RPCs
 * sequentially on a session.
 */
export class NetconfChannel {
  private stream: Duplex
  private timeout: number
  private buffer = ''
  private queued: string[] = []
  private waiters: Waiter[] = []
  private messageId = 0
  private closed = false
  private closeReason: Error | null = null

  constructor(stream: Duplex, timeout = 30000) {
    this.stream = stream
    this.timeout = timeout

    // Decode as a stream so a character split across chunks stays whole
    stream.setEncoding('utf8')
    stream.on('data', (chunk: string) => this.onData(chunk))
    stream.on('error', (err: Error) => this.fail(err))
    stream.on('close', () => this.fail(new Error('NETCONF channel closed')))
  }

  get isClosed(): boolean {
    return this.closed
  }

  private onData(data: string) {
    this.buffer += data
    let end = this.buffer.indexOf(NETCONF_EOM)
    while (end !== -1) {
      const message = this.buffer.slice(0, end).trim()
      this.buffer = this.buffer.slice(end + NETCONF_EOM.length)
      this.deliver(message)
      end = this.buffer.indexOf(NETCONF_EOM)
    }
  }

  private deliver(message: string) {
    const waiter = this.waiters.shift()
    if (waiter) {
      clearTimeout(waiter.timer)
      waiter.resolve(message)
    } else {
      this.queued.push(message)
    }
  }

  private fail(err: Error) {
    if (this.closed) return
    this.closed = true
    this.closeReason = err
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer)
      waiter.reject(err)
    }
  }

  // Next complete message from the server
  nextMessage(timeout = this.timeout): Promise<string> {
    const queued = this.queued.shift()
    if (queued !== undefined) return Promise.resolve(queued)
    if (this.closed) return Promise.reject(this.closeReason ?? new Error('NETCONF channel closed'))

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter)
          reject(new Error(`NETCONF reply timeout after ${timeout}ms`))
        }, timeout),
      }
      this.waiters.push(waiter)
    })
  }

  private send(xml: string) {
    if (this.closed) throw this.closeReason ?? new Error('NETCONF channel closed')
    this.stream.write(xml + NETCONF_EOM)
  }

  // Exchange hellos; resolves with the server's hello
  async hello(): Promise<string> {
    this.send(CLIENT_HELLO)
    const serverHello = await this.nextMessage()
    if (!/<(\w+:)?hello[\s>]/.test(serverHello)) {
      throw new Error('Server did not send a NETCONF hello')
    }
    return serverHello
  }

  // Send one RPC body (e.g. "<get-config/>") and wait for its rpc-reply
  async rpc(body: string): Promise<string> {
    const id = ++this.messageId
    this.send(`<rpc message-id="${id}" xmlns="${NETCONF_BASE_NS}">${body}</rpc>`)
    return this.nextMessage()
  }

  close() {
    if (this.closed) return
    try {
      this.send(`<rpc message-id="${++this.messageId}" xmlns="${NETCONF_BASE_NS}"><close-session/></rpc>`)
    } finally {
      this.fail(new Error('NETCONF channel closed'))
      this.stream.end()
    }
  }
}
