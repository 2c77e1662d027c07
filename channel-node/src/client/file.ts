/**
 * File transfer: a size query followed by offset-bounded chunk requests.
 *
 * Chunks are requested strictly in increasing offset order with no gap or
 * overlap, and every chunk reaches the sink before the next is requested.
 * Any failure aborts the whole transfer; there is no resume.
 *
 * @module
 */
import type { Writable } from 'node:stream'
import {
  decodeFileSizeReply,
  encodedFileRequestSize,
  encodeFileRequest,
  FILE_SIZE_REPLY_SIZE,
  iterateChunks,
  RequestValidationError,
  validateFileRequest,
  validateMaxChunk
} from '@fifolink/protocol'
import type { Channel } from '../ipc/channel.js'
import { writeWithBackpressure } from '../ipc/write.js'

/**
 * Destination of transferred bytes, written in arrival order.
 */
export interface ByteSink {
  write(chunk: Buffer): Promise<void>
}

/**
 * In-memory sink that keeps every chunk.
 */
export interface CollectSink extends ByteSink {
  readonly chunks: readonly Buffer[]
  /** Concatenation of every chunk written so far. */
  bytes(): Buffer
}

export function collectSink(): CollectSink {
  const chunks: Buffer[] = []
  return {
    chunks,
    async write(chunk) {
      chunks.push(chunk)
    },
    bytes() {
      return Buffer.concat(chunks)
    }
  }
}

/**
 * Sink that writes to a Node writable stream, waiting on backpressure.
 * The caller ends the stream once the transfer is complete.
 */
export function writableSink(stream: Writable): ByteSink {
  return {
    write(chunk) {
      return writeWithBackpressure(stream, chunk)
    }
  }
}

export interface FileTransferOptions {
  /** Called once with the total length, before any chunk is requested. */
  readonly onSize?: (totalLength: number) => void
}

export interface FileTransferResult {
  readonly fileName: string
  readonly totalLength: number
  /** Number of chunk requests issued */
  readonly chunks: number
}

/**
 * Reject file names whose request would not fit in one transport write.
 * @throws RequestValidationError
 */
function assertFitsCapacity(fileName: string, bufferCapacity: number): void {
  const size = encodedFileRequestSize(fileName)
  if (size > bufferCapacity) {
    throw new RequestValidationError(
      `File request for "${fileName}" is ${size} bytes, exceeding the buffer capacity ${bufferCapacity}`
    )
  }
}

/**
 * Ask the server for the total length of `fileName`.
 *
 * @throws RemoteFileNotFoundError if the server reports the file missing
 * @throws ProtocolError if the reply is out of range
 */
export async function fetchFileSize(channel: Channel, fileName: string): Promise<number> {
  const request = { offset: 0, length: 0, fileName }
  validateFileRequest(request)
  assertFitsCapacity(fileName, channel.bufferCapacity)

  const message = encodeFileRequest(request)
  const reply = await channel.exchange(async () => {
    await channel.writeExact(message)
    return channel.readExact(FILE_SIZE_REPLY_SIZE)
  })
  return decodeFileSizeReply(reply, fileName)
}

/**
 * Fetch a whole file into `sink`.
 *
 * @param maxChunk - Maximum bytes per chunk request; a positive integer no
 *   larger than the channel's buffer capacity
 * @throws ConfigError if `maxChunk` is invalid (before any I/O)
 */
export async function fetchFile(
  channel: Channel,
  fileName: string,
  maxChunk: number,
  sink: ByteSink,
  options: FileTransferOptions = {}
): Promise<FileTransferResult> {
  validateMaxChunk(maxChunk, channel.bufferCapacity)

  const totalLength = await fetchFileSize(channel, fileName)
  options.onSize?.(totalLength)

  let chunks = 0
  for (const chunk of iterateChunks(totalLength, maxChunk)) {
    const message = encodeFileRequest({ offset: chunk.offset, length: chunk.length, fileName })
    const data = await channel.exchange(async () => {
      await channel.writeExact(message)
      return channel.readExact(chunk.length)
    })
    await sink.write(data)
    chunks++
  }

  return { fileName, totalLength, chunks }
}
