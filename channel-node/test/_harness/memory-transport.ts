import { PassThrough } from 'node:stream'
import { type ChannelRole, TransportError } from '@fifolink/protocol'
import type { ChannelStreams, Transport } from '../../src/ipc/transport.js'

interface StreamPair {
  /** client → server */
  readonly request: PassThrough
  /** server → client */
  readonly response: PassThrough
}

/**
 * In-process Transport: each channel is a pair of PassThrough streams.
 * Records create/remove calls so tests can assert on resource ownership.
 */
export class MemoryTransport implements Transport {
  readonly created: string[] = []
  readonly removed: string[] = []
  private readonly pairs = new Map<string, StreamPair>()

  async create(name: string): Promise<void> {
    this.created.push(name)
    this.pairs.set(name, { request: new PassThrough(), response: new PassThrough() })
  }

  async attach(name: string, role: ChannelRole): Promise<ChannelStreams> {
    const pair = this.pairs.get(name)
    if (!pair) {
      throw new TransportError('missing', `Channel "${name}" does not exist`)
    }
    // Each side reads through its own stream, so destroying one side's input
    // leaves the peer's output intact, as with separate FIFO descriptors
    const source = role === 'server' ? pair.request : pair.response
    const input = new PassThrough()
    source.pipe(input)
    return { input, output: role === 'server' ? pair.response : pair.request }
  }

  async remove(name: string): Promise<void> {
    this.removed.push(name)
    this.pairs.delete(name)
  }

  has(name: string): boolean {
    return this.pairs.has(name)
  }
}
