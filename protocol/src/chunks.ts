/**
 * Chunk planning for file transfers.
 *
 * A file of `totalLength` bytes is fetched in strides of `maxChunk`; the final
 * stride is clamped so no request reaches past end of file. Chunks are
 * contiguous: `offset[i + 1] === offset[i] + length[i]`.
 *
 * @module
 */

import { ConfigError } from './errors.js'

/**
 * Metadata for a single chunk request (without data).
 */
export interface ChunkMeta {
  /** Sequence number, starts at 1 */
  readonly seq: number
  readonly offset: number
  readonly length: number
  readonly isLast: boolean
}

/**
 * Validate a chunk size against the negotiated buffer capacity.
 * @throws ConfigError if `maxChunk` is not a positive integer or exceeds `bufferCapacity`
 */
export function validateMaxChunk(maxChunk: number, bufferCapacity?: number): void {
  if (!Number.isSafeInteger(maxChunk) || maxChunk <= 0) {
    throw new ConfigError(`maxChunk must be a positive integer, got ${maxChunk}`)
  }
  if (bufferCapacity !== undefined && maxChunk > bufferCapacity) {
    throw new ConfigError(
      `maxChunk ${maxChunk} exceeds the buffer capacity ${bufferCapacity}`
    )
  }
}

/**
 * Generator over the chunks of a file, one at a time.
 *
 * @param totalLength - File length in bytes
 * @param maxChunk - Maximum bytes per chunk (> 0)
 * @throws ConfigError if `maxChunk` is invalid or `totalLength` is negative
 */
export function* iterateChunks(
  totalLength: number,
  maxChunk: number
): Generator<ChunkMeta, void, unknown> {
  validateMaxChunk(maxChunk)
  if (!Number.isSafeInteger(totalLength) || totalLength < 0) {
    throw new ConfigError(`totalLength must be a non-negative integer, got ${totalLength}`)
  }

  let offset = 0
  let seq = 1

  while (offset < totalLength) {
    const length = Math.min(maxChunk, totalLength - offset)
    const isLast = offset + length >= totalLength

    yield { seq, offset, length, isLast }

    offset += length
    seq++
  }
}

/**
 * Calculate every chunk of a file. An empty file has no chunks.
 */
export function planChunks(totalLength: number, maxChunk: number): ChunkMeta[] {
  return Array.from(iterateChunks(totalLength, maxChunk))
}
