/**
 * Channel: one logical duplex link made of two one-directional byte streams.
 *
 * Invariants:
 * - One logical request at a time: exchange() serializes request/response
 *   pairs through a promise chain, so replies always match requests
 * - Fail-fast: after a failed exchange, every later operation rejects with
 *   ChannelFailedError carrying the first failure
 * - No single transport write exceeds the buffer capacity
 * - Only the server (creator) side removes the named resources on close
 *
 * @module
 */
import {
  type ChannelKind,
  ChannelClosedError,
  ChannelFailedError,
  type ChannelRole,
  CONTROL_CHANNEL_NAME,
  validateBufferCapacity
} from '@fifolink/protocol'
import { ExactReader } from './exact-reader.js'
import type { ChannelStreams, Transport } from './transport.js'
import { endStream, writeWithBackpressure } from './write.js'

export interface ChannelOptions {
  /** Negotiated buffer capacity; caps every single transport write */
  readonly bufferCapacity: number
  /** Defaults to `control` for the control channel name, `ephemeral` otherwise */
  readonly kind?: ChannelKind
}

export class Channel {
  readonly name: string
  readonly role: ChannelRole
  readonly kind: ChannelKind
  readonly bufferCapacity: number
  private readonly streams: ChannelStreams
  private readonly transport: Transport
  private readonly reader: ExactReader
  private closing: Promise<void> | null = null
  private failure: unknown = null
  private chain: Promise<void> = Promise.resolve()

  constructor(
    name: string,
    role: ChannelRole,
    streams: ChannelStreams,
    transport: Transport,
    options: ChannelOptions
  ) {
    this.name = name
    this.role = role
    this.kind = options.kind ?? (name === CONTROL_CHANNEL_NAME ? 'control' : 'ephemeral')
    this.bufferCapacity = validateBufferCapacity(options.bufferCapacity)
    this.streams = streams
    this.transport = transport
    this.reader = new ExactReader(streams.input)
    this.reader.start()
  }

  /** False once close() has been called. */
  get isOpen(): boolean {
    return this.closing === null
  }

  /** True if an exchange on this channel has failed. */
  get isFailed(): boolean {
    return this.failure !== null
  }

  /**
   * Write the whole buffer, in slices no larger than the buffer capacity.
   * @throws ChannelClosedError if the channel was closed
   * @throws TransportError if the stream fails or closes
   */
  async writeExact(data: Uint8Array): Promise<void> {
    this.assertOpen()
    for (let offset = 0; offset < data.length; offset += this.bufferCapacity) {
      await writeWithBackpressure(
        this.streams.output,
        data.subarray(offset, offset + this.bufferCapacity)
      )
    }
  }

  /**
   * Read exactly `size` bytes.
   * @throws TransportError (`short_read`) if the peer closes first
   */
  async readExact(size: number): Promise<Buffer> {
    this.assertOpen()
    return this.reader.readExact(size)
  }

  /**
   * Read through the next `delimiter` byte (inclusive).
   * @throws ProtocolError if no delimiter appears within `maxLength` bytes
   */
  async readDelimited(delimiter: number, maxLength: number): Promise<Buffer> {
    this.assertOpen()
    return this.reader.readDelimited(delimiter, maxLength)
  }

  /**
   * Run one request/response exchange as a critical section on this channel.
   * A failure inside `fn` marks the channel failed.
   */
  exchange<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.chain.then(async () => {
      if (this.failure !== null) {
        throw new ChannelFailedError(this.name, this.failure)
      }
      this.assertOpen()
      try {
        return await fn()
      } catch (err) {
        this.failure = err
        throw err
      }
    })
    // Chain continues regardless to maintain serialization
    this.chain = result.then(
      () => {},
      () => {}
    )
    return result
  }

  /**
   * Release the channel. Idempotent.
   *
   * Flushes and ends the outbound stream, then destroys the inbound one.
   * The server side additionally removes the named resources.
   */
  close(): Promise<void> {
    if (this.closing === null) {
      this.closing = this.release()
    }
    return this.closing
  }

  private async release(): Promise<void> {
    this.reader.stop()
    try {
      await endStream(this.streams.output)
    } finally {
      this.streams.input.destroy()
      if (this.role === 'server') {
        await this.transport.remove(this.name)
      }
    }
  }

  private assertOpen(): void {
    if (this.closing !== null) {
      throw new ChannelClosedError(this.name)
    }
  }
}

/**
 * Attach to an existing channel.
 *
 * The server side must have created the resources with `transport.create()`
 * first; a client fails with TransportError (`missing`) when they do not
 * appear within the transport's attach timeout.
 */
export async function openChannel(
  transport: Transport,
  name: string,
  role: ChannelRole,
  options: ChannelOptions
): Promise<Channel> {
  const bufferCapacity = validateBufferCapacity(options.bufferCapacity)
  const streams = await transport.attach(name, role)
  return new Channel(name, role, streams, transport, { ...options, bufferCapacity })
}
