/**
 * Backpressure-aware writes to a Node writable stream.
 *
 * @module
 */
import type { Writable } from 'node:stream'
import { TransportError } from '@fifolink/protocol'

/**
 * Error thrown when the output stream is closed or finished unexpectedly.
 */
export class StreamClosedError extends TransportError {
  constructor(public readonly reason: 'destroyed' | 'ended' | 'close' | 'finish') {
    super('closed', `Output stream unavailable: ${reason}`)
    this.name = 'StreamClosedError'
  }
}

/**
 * Write a buffer to a stream with backpressure handling.
 * Resolves only from a single code path to avoid double-resolution.
 *
 * @returns Promise that resolves when data is accepted by the stream
 * @throws StreamClosedError if the stream is closed/finished
 * @throws TransportError (`write_failed`) if the stream emits an error
 */
export function writeWithBackpressure(stream: Writable, data: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed) {
      reject(new StreamClosedError('destroyed'))
      return
    }
    if (stream.writableEnded || stream.writableFinished) {
      reject(new StreamClosedError('ended'))
      return
    }

    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      fn()
    }

    const onError = (err: Error) =>
      settle(() =>
        reject(new TransportError('write_failed', `Write failed: ${err.message}`, { cause: err }))
      )
    const onClose = () => settle(() => reject(new StreamClosedError('close')))
    const onFinish = () => settle(() => reject(new StreamClosedError('finish')))
    const onDrain = () => settle(() => resolve())

    const cleanup = () => {
      stream.off('error', onError)
      stream.off('close', onClose)
      stream.off('finish', onFinish)
      stream.off('drain', onDrain)
    }

    // Attach listeners before write to catch synchronous errors
    stream.on('error', onError)
    stream.on('close', onClose)
    stream.on('finish', onFinish)

    const canContinue = stream.write(data)

    if (canContinue) {
      // Buffer accepted, resolve on next tick to ensure
      // any synchronous error from write() is caught first
      setImmediate(() => settle(() => resolve()))
    } else {
      stream.on('drain', onDrain)
    }
  })
}

/**
 * End a writable stream, resolving once everything buffered has been flushed.
 * Resolves immediately if the stream is already finished or destroyed.
 */
export function endStream(stream: Writable): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (stream.destroyed || stream.writableFinished) {
      resolve()
      return
    }
    const onError = (err: Error): void => {
      cleanup()
      reject(new TransportError('write_failed', `Flush failed: ${err.message}`, { cause: err }))
    }
    const cleanup = (): void => {
      stream.off('error', onError)
    }
    stream.on('error', onError)
    stream.end(() => {
      cleanup()
      resolve()
    })
  })
}
