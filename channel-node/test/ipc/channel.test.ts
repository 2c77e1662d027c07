import { PassThrough, Writable } from 'node:stream'
import { ChannelClosedError, ChannelFailedError, ConfigError } from '@fifolink/protocol'
import { beforeEach, describe, expect, it } from 'vitest'
import { Channel, openChannel } from '../../src/ipc/channel.js'
import { MemoryTransport } from '../_harness/index.js'

async function openPair(
  transport: MemoryTransport,
  name: string,
  bufferCapacity = 32
): Promise<{ server: Channel; client: Channel }> {
  await transport.create(name)
  const server = await openChannel(transport, name, 'server', { bufferCapacity })
  const client = await openChannel(transport, name, 'client', { bufferCapacity })
  return { server, client }
}

describe('Channel', () => {
  let transport: MemoryTransport

  beforeEach(() => {
    transport = new MemoryTransport()
  })

  it('writes in slices no larger than the buffer capacity', async () => {
    const sizes: number[] = []
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        sizes.push(chunk.length)
        callback()
      }
    })
    const channel = new Channel('data1_', 'client', { input: new PassThrough(), output }, transport, {
      bufferCapacity: 32
    })

    await channel.writeExact(Buffer.alloc(70))

    expect(sizes).toEqual([32, 32, 6])
  })

  it('carries bytes from client to server and back', async () => {
    const { server, client } = await openPair(transport, 'data1_')

    await client.writeExact(Buffer.from('ping'))
    expect((await server.readExact(4)).toString()).toBe('ping')

    await server.writeExact(Buffer.from('pong'))
    expect((await client.readExact(4)).toString()).toBe('pong')
  })

  it('derives the kind from the name unless given', async () => {
    await transport.create('control')
    const control = await openChannel(transport, 'control', 'client', { bufferCapacity: 64 })
    const { client } = await openPair(transport, 'data1_')

    expect(control.kind).toBe('control')
    expect(client.kind).toBe('ephemeral')
  })

  it('rejects an invalid buffer capacity before attaching', async () => {
    await expect(
      openChannel(transport, 'missing', 'client', { bufferCapacity: 8 })
    ).rejects.toThrow(ConfigError)
  })

  it('fails to attach to a channel that does not exist', async () => {
    await expect(
      openChannel(transport, 'nope', 'client', { bufferCapacity: 64 })
    ).rejects.toMatchObject({ name: 'TransportError', code: 'missing' })
  })

  describe('exchange', () => {
    it('serializes request/response pairs', async () => {
      const { server, client } = await openPair(transport, 'data1_')
      const log: string[] = []

      const echo = (async () => {
        for (let i = 0; i < 2; i++) {
          const byte = (await server.readExact(1)).toString()
          log.push(`server got ${byte}`)
          await server.writeExact(Buffer.from(byte.toUpperCase()))
        }
      })()

      const roundTrip = (letter: string) =>
        client.exchange(async () => {
          log.push(`client sends ${letter}`)
          await client.writeExact(Buffer.from(letter))
          return (await client.readExact(1)).toString()
        })

      const results = await Promise.all([roundTrip('a'), roundTrip('b')])
      await echo

      expect(results).toEqual(['A', 'B'])
      expect(log).toEqual(['client sends a', 'server got a', 'client sends b', 'server got b'])
    })

    it('latches the first failure', async () => {
      const { client } = await openPair(transport, 'data1_')

      await expect(
        client.exchange(async () => {
          throw new Error('boom')
        })
      ).rejects.toThrow('boom')

      expect(client.isFailed).toBe(true)
      const next = client.exchange(async () => 'unreachable')
      await expect(next).rejects.toThrow(ChannelFailedError)
      await expect(next).rejects.toThrow('Channel "data1_" has previously failed: boom')
    })

    it('does not run the body after close', async () => {
      const { client } = await openPair(transport, 'data1_')
      await client.close()

      let ran = false
      await expect(
        client.exchange(async () => {
          ran = true
        })
      ).rejects.toThrow(ChannelClosedError)
      expect(ran).toBe(false)
    })
  })

  describe('close', () => {
    it('is idempotent', async () => {
      const { client } = await openPair(transport, 'data1_')

      const first = client.close()
      expect(client.close()).toBe(first)
      await first
      expect(client.isOpen).toBe(false)
    })

    it('rejects later operations with ChannelClosedError', async () => {
      const { client } = await openPair(transport, 'data1_')
      await client.close()

      await expect(client.readExact(1)).rejects.toThrow(
        new ChannelClosedError('data1_')
      )
      await expect(client.writeExact(Buffer.from('x'))).rejects.toThrow('Channel "data1_" is closed')
    })

    it('leaves the named resources in place on the client side', async () => {
      const { client } = await openPair(transport, 'data1_')
      await client.close()

      expect(transport.removed).toEqual([])
      expect(transport.has('data1_')).toBe(true)
    })

    it('removes the named resources on the server side', async () => {
      const { server } = await openPair(transport, 'data1_')
      await server.close()

      expect(transport.removed).toEqual(['data1_'])
    })

    it('ends the stream the peer reads from', async () => {
      const { server, client } = await openPair(transport, 'data1_')

      const pending = server.readExact(4)
      await client.close()

      await expect(pending).rejects.toMatchObject({ code: 'short_read' })
    })

    it('leaves the peer able to finish a write after the server releases', async () => {
      const { server, client } = await openPair(transport, 'data1_')
      await server.close()

      await expect(client.writeExact(Buffer.alloc(4))).resolves.toBeUndefined()
      await client.close()
      expect(client.isOpen).toBe(false)
    })
  })
})
