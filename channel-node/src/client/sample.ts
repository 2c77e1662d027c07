/**
 * Sample lookups: one request, one 8-byte reply.
 *
 * @module
 */
import {
  decodeSampleReply,
  encodeSampleRequest,
  SAMPLE_REPLY_SIZE,
  type SampleRequest
} from '@fifolink/protocol'
import type { Channel } from '../ipc/channel.js'

/**
 * Fetch a single sample value.
 *
 * @throws RequestValidationError if a request field is out of range (no I/O happens)
 * @throws SampleUnavailableError if the server has no such sample
 * @throws TransportError if the channel fails
 */
export async function fetchSample(channel: Channel, request: SampleRequest): Promise<number> {
  const message = encodeSampleRequest(request)
  const reply = await channel.exchange(async () => {
    await channel.writeExact(message)
    return channel.readExact(SAMPLE_REPLY_SIZE)
  })
  return decodeSampleReply(reply, request)
}

export interface SeriesOptions {
  readonly subjectId: number
  /** Number of rows, default 1000 */
  readonly count?: number
  /** Seconds between rows, default 0.004 */
  readonly interval?: number
  /** Series to fetch for every row, default [1, 2] */
  readonly seriesIndices?: readonly number[]
}

export interface SeriesRow {
  readonly time: number
  readonly values: readonly number[]
}

/**
 * Fetch a window of rows for one subject, starting at time 0.
 * Issues one sample request per (row, series) pair, in order.
 */
export async function fetchSeries(channel: Channel, options: SeriesOptions): Promise<SeriesRow[]> {
  const count = options.count ?? 1000
  const interval = options.interval ?? 0.004
  const seriesIndices = options.seriesIndices ?? [1, 2]
  const rows: SeriesRow[] = []

  for (let i = 0; i < count; i++) {
    const time = i * interval
    const values: number[] = []
    for (const seriesIndex of seriesIndices) {
      values.push(await fetchSample(channel, { subjectId: options.subjectId, timestamp: time, seriesIndex }))
    }
    rows.push({ time, values })
  }

  return rows
}

/**
 * Format a number with six significant digits and no trailing zeros.
 */
export function formatSampleValue(value: number): string {
  return String(Number(value.toPrecision(6)))
}

/**
 * Render rows as `time,v1,v2,...` lines.
 */
export function formatSeriesCsv(rows: readonly SeriesRow[]): string {
  return rows
    .map((row) => [row.time, ...row.values].map(formatSampleValue).join(',') + '\n')
    .join('')
}
