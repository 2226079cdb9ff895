import { Duplex } from 'stream'
import { describe, it, expect } from 'vitest'
import { CLIENT_HELLO, NETCONF_BASE_NS, NETCONF_EOM, NetconfChannel } from './netconf'

// Device side of a netconf subsystem stream: captures client writes, lets the test push replies
function fakeStream() {
  const written: string[] = []
  const stream = new Duplex({
    read() {},
    write(chunk, _encoding, callback) {
      written.push(String(chunk))
      callback()
    },
  })
  return { stream, written }
}

const SERVER_HELLO =
  `<hello xmlns="${NETCONF_BASE_NS}"><capabilities>` +
  '<capability>urn:ietf:params:netconf:base:1.0</capability>' +
  '</capabilities><session-id>42</session-id></hello>'

describe('NetconfChannel', () => {
  it('exchanges hellos', async () => {
    const { stream, written } = fakeStream()
    const channel = new NetconfChannel(stream)

    const hello = channel.hello()
    stream.push(`\n${SERVER_HELLO}\n${NETCONF_EOM}`)

    expect(await hello).toBe(SERVER_HELLO)
    expect(written).toEqual([CLIENT_HELLO + NETCONF_EOM])
  })

  it('accepts a namespace-prefixed hello', async () => {
    const { stream } = fakeStream()
    const channel = new NetconfChannel(stream)

    const hello = channel.hello()
    stream.push(`<nc:hello xmlns:nc="${NETCONF_BASE_NS}"></nc:hello>${NETCONF_EOM}`)

    await expect(hello).resolves.toBe(`<nc:hello xmlns:nc="${NETCONF_BASE_NS}"></nc:hello>`)
  })

  it('rejects a server that does not send a hello', async () => {
    const { stream } = fakeStream()
    const channel = new NetconfChannel(stream)

    const hello = channel.hello()
    stream.push(`<rpc-reply><ok/></rpc-reply>${NETCONF_EOM}`)

    await expect(hello).rejects.toThrow('Server did not send a NETCONF hello')
  })

  it('frames RPCs with increasing message ids', async () => {
    const { stream, written } = fakeStream()
    const channel = new NetconfChannel(stream)

    const first = channel.rpc('<get-software-information/>')
    stream.push(`<rpc-reply>one</rpc-reply>${NETCONF_EOM}`)
    await first
    const second = channel.rpc('<get-route-information/>')
    stream.push(`<rpc-reply>two</rpc-reply>${NETCONF_EOM}`)

    expect(await second).toBe('<rpc-reply>two</rpc-reply>')
    expect(written).toEqual([
      `<rpc message-id="1" xmlns="${NETCONF_BASE_NS}"><get-software-information/></rpc>${NETCONF_EOM}`,
      `<rpc message-id="2" xmlns="${NETCONF_BASE_NS}"><get-route-information/></rpc>${NETCONF_EOM}`,
    ])
  })

  it('reassembles a reply split across chunks', async () => {
    const { stream } = fakeStream()
    const channel = new NetconfChannel(stream)

    const reply = channel.rpc('<get/>')
    stream.push('<rpc-reply><data>')
    stream.push('</data></rpc-reply>]]>')
    stream.push(']]>')

    expect(await reply).toBe('<rpc-reply><data></data></rpc-reply>')
  })

  it('keeps a multi-byte character split across chunks', async () => {
    const { stream } = fakeStream()
    const channel = new NetconfChannel(stream)

    const reply = channel.nextMessage()
    const bytes = Buffer.from(`<name>caf\u00e9</name>${NETCONF_EOM}`, 'utf8')
    stream.push(bytes.subarray(0, 10))
    stream.push(bytes.subarray(10))

    expect(await reply).toBe('<name>caf\u00e9</name>')
  })

  it('delivers several messages from one chunk in order', async () => {
    const { stream } = fakeStream()
    const channel = new NetconfChannel(stream)

    const first = channel.nextMessage()
    const second = channel.nextMessage()
    stream.push(`<a/>${NETCONF_EOM}<b/>${NETCONF_EOM}`)

    expect(await first).toBe('<a/>')
    expect(await second).toBe('<b/>')
  })

  it('times out when no reply arrives', async () => {
    const { stream } = fakeStream()
    const channel = new NetconfChannel(stream, 20)

    await expect(channel.rpc('<get/>')).rejects.toThrow('NETCONF reply timeout after 20ms')
  })

  it('fails pending and later requests once the stream closes', async () => {
    const { stream } = fakeStream()
    const channel = new NetconfChannel(stream)

    const pending = channel.rpc('<get/>')
    stream.destroy()

    await expect(pending).rejects.toThrow('NETCONF channel closed')
    expect(channel.isClosed).toBe(true)
    await expect(channel.rpc('<get/>')).rejects.toThrow('NETCONF channel closed')
  })

  it('sends close-session on close', () => {
    const { stream, written } = fakeStream()
    const channel = new NetconfChannel(stream)

    channel.close()
    channel.close()

    expect(written).toEqual([
      `<rpc message-id="1" xmlns="${NETCONF_BASE_NS}"><close-session/></rpc>${NETCONF_EOM}`,
    ])
    expect(channel.isClosed).toBe(true)
  })
})
