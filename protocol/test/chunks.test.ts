import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { iterateChunks, planChunks, validateMaxChunk } from '../src/chunks.js'
import { ConfigError } from '../src/errors.js'

describe('planChunks', () => {
  it('splits a file into full strides and a clamped tail', () => {
    expect(planChunks(600, 256)).toEqual([
      { seq: 1, offset: 0, length: 256, isLast: false },
      { seq: 2, offset: 256, length: 256, isLast: false },
      { seq: 3, offset: 512, length: 88, isLast: true }
    ])
  })

  it('issues one chunk when the file fits', () => {
    expect(planChunks(10, 256)).toEqual([{ seq: 1, offset: 0, length: 10, isLast: true }])
  })

  it('has no tail when the length is an exact multiple', () => {
    const chunks = planChunks(512, 256)
    expect(chunks).toHaveLength(2)
    expect(chunks[1]).toEqual({ seq: 2, offset: 256, length: 256, isLast: true })
  })

  it('has no chunks for an empty file', () => {
    expect(planChunks(0, 256)).toEqual([])
  })

  it('rejects a non-positive chunk size before yielding anything', () => {
    expect(() => planChunks(100, 0)).toThrow(new ConfigError('maxChunk must be a positive integer, got 0'))
    expect(() => iterateChunks(100, -1).next()).toThrow(ConfigError)
  })

  it('rejects a negative total length', () => {
    expect(() => planChunks(-1, 16)).toThrow('totalLength must be a non-negative integer, got -1')
  })

  it('covers the file contiguously without reaching past the end', () => {
    fc.assert(
      fc.property(fc.nat({ max: 100_000 }), fc.integer({ min: 1, max: 5_000 }), (total, maxChunk) => {
        const chunks = planChunks(total, maxChunk)
        let expectedOffset = 0
        for (const [i, chunk] of chunks.entries()) {
          expect(chunk.seq).toBe(i + 1)
          expect(chunk.offset).toBe(expectedOffset)
          expect(chunk.length).toBeGreaterThan(0)
          expect(chunk.length).toBeLessThanOrEqual(maxChunk)
          expect(chunk.isLast).toBe(i === chunks.length - 1)
          expectedOffset += chunk.length
        }
        expect(expectedOffset).toBe(total)
        expect(chunks).toHaveLength(Math.ceil(total / maxChunk))
      })
    )
  })
})

describe('validateMaxChunk', () => {
  it('accepts a chunk size up to the buffer capacity', () => {
    expect(() => validateMaxChunk(256, 256)).not.toThrow()
    expect(() => validateMaxChunk(1, 256)).not.toThrow()
  })

  it('rejects a chunk size above the buffer capacity', () => {
    expect(() => validateMaxChunk(257, 256)).toThrow(
      new ConfigError('maxChunk 257 exceeds the buffer capacity 256')
    )
  })

  it('rejects fractional sizes', () => {
    expect(() => validateMaxChunk(1.5)).toThrow('maxChunk must be a positive integer, got 1.5')
  })
})
