/**
 * ExactReader: turns a readable byte stream into exact-length reads.
 *
 * Incoming chunks are accumulated in an internal buffer; a pending read
 * resolves as soon as enough bytes are buffered, regardless of how the
 * transport split them. Only one read may be outstanding at a time, matching
 * the one-request-at-a-time discipline of a channel.
 *
 * @module
 */
import type { Readable } from 'node:stream'
import { ProtocolError, TransportError } from '@fifolink/protocol'

type PendingRead =
  | { readonly kind: 'exact'; readonly size: number }
  | { readonly kind: 'delimited'; readonly delimiter: number; readonly maxLength: number }

interface PendingEntry {
  readonly read: PendingRead
  readonly resolve: (data: Buffer) => void
  readonly reject: (err: Error) => void
}

/**
 * Reads exact byte counts from a stream.
 *
 * Lifecycle:
 * 1. Construct with a readable stream
 * 2. Call start() to begin buffering
 * 3. Call readExact()/readDelimited(), one at a time
 * 4. Call stop() when the channel is released
 *
 * On EOF, a pending read that cannot be satisfied from the buffer rejects
 * with a `short_read` TransportError.
 */
export class ExactReader {
  private pending: PendingEntry | null = null
  /** Unconsumed chunks in arrival order; joined only when a read needs them */
  private chunks: Buffer[] = []
  private length = 0
  private ended = false
  private failure: TransportError | null = null
  private stopped = false
  private readonly stream: Readable

  constructor(stream: Readable) {
    this.stream = stream
  }

  /**
   * Start reading from the stream.
   * Attaches data/end/error listeners.
   */
  start(): void {
    this.stream.on('data', this.onData)
    this.stream.on('end', this.onEnd)
    this.stream.on('error', this.onError)
  }

  /**
   * Stop the reader and reject the pending read, if any.
   */
  stop(): void {
    if (this.stopped) return
    this.stopped = true
    this.stream.removeListener('data', this.onData)
    this.stream.removeListener('end', this.onEnd)
    this.stream.removeListener('error', this.onError)
    this.rejectPending(new TransportError('closed', 'Reader stopped'))
  }

  /** Number of bytes buffered but not yet consumed. */
  get buffered(): number {
    return this.length
  }

  /**
   * Resolve with exactly `size` bytes.
   */
  readExact(size: number): Promise<Buffer> {
    if (!Number.isSafeInteger(size) || size < 0) {
      return Promise.reject(new RangeError(`read size must be a non-negative integer, got ${size}`))
    }
    return this.enqueue({ kind: 'exact', size })
  }

  /**
   * Resolve with every byte up to and including the next `delimiter`.
   * Rejects with ProtocolError if no delimiter appears within `maxLength` bytes.
   */
  readDelimited(delimiter: number, maxLength: number): Promise<Buffer> {
    return this.enqueue({ kind: 'delimited', delimiter, maxLength })
  }

  private enqueue(read: PendingRead): Promise<Buffer> {
    if (this.stopped) {
      return Promise.reject(new TransportError('closed', 'Reader stopped'))
    }
    if (this.pending) {
      return Promise.reject(new Error('A read is already outstanding on this stream'))
    }
    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { read, resolve, reject }
      this.drain()
    })
  }

  private readonly onData = (chunk: Buffer): void => {
    if (chunk.length === 0) return
    this.chunks.push(chunk)
    this.length += chunk.length
    this.drain()
  }

  private readonly onEnd = (): void => {
    this.ended = true
    this.drain()
  }

  private readonly onError = (err: Error): void => {
    this.failure = new TransportError('read_failed', `Read failed: ${err.message}`, { cause: err })
    this.drain()
  }

  /** Satisfy the pending read from the buffer, or fail it if no more data can arrive. */
  private drain(): void {
    const entry = this.pending
    if (!entry) return

    const { read } = entry
    if (read.kind === 'exact') {
      if (this.length >= read.size) {
        this.settle((e) => e.resolve(this.take(read.size)))
        return
      }
    } else {
      const index = this.indexOf(read.delimiter, read.maxLength)
      if (index !== -1) {
        this.settle((e) => e.resolve(this.take(index + 1)))
        return
      }
      if (this.length >= read.maxLength) {
        this.settle((e) =>
          e.reject(
            new ProtocolError(`No delimiter within ${read.maxLength} bytes`)
          )
        )
        return
      }
    }

    if (this.failure) {
      const failure = this.failure
      this.settle((e) => e.reject(failure))
      return
    }
    if (this.ended) {
      const expected = read.kind === 'exact' ? `${read.size} bytes` : 'a delimiter'
      this.settle((e) =>
        e.reject(
          new TransportError(
            'short_read',
            `Stream ended after ${this.length} bytes while waiting for ${expected}`
          )
        )
      )
    }
  }

  /** Position of `byte` within the first `limit` buffered bytes, or -1. */
  private indexOf(byte: number, limit: number): number {
    let base = 0
    for (const chunk of this.chunks) {
      if (base >= limit) break
      const index = chunk.subarray(0, limit - base).indexOf(byte)
      if (index !== -1) return base + index
      base += chunk.length
    }
    return -1
  }

  /** Remove and return the first `size` buffered bytes (size <= length). */
  private take(size: number): Buffer {
    const parts: Buffer[] = []
    let remaining = size
    while (remaining > 0) {
      const head = this.chunks[0]
      if (head === undefined) break
      if (head.length <= remaining) {
        parts.push(head)
        this.chunks.shift()
        remaining -= head.length
      } else {
        parts.push(head.subarray(0, remaining))
        this.chunks[0] = head.subarray(remaining)
        remaining = 0
      }
    }
    this.length -= size
    const [only] = parts
    return parts.length === 1 && only ? only : Buffer.concat(parts, size)
  }

  private settle(fn: (entry: PendingEntry) => void): void {
    const entry = this.pending
    if (!entry) return
    this.pending = null
    fn(entry)
  }

  private rejectPending(err: Error): void {
    this.settle((e) => e.reject(err))
  }
}
