/**
 * Data stores behind the request server.
 *
 * The protocol treats them as black boxes queried by key; these
 * implementations read a directory of CSV series and plain files.
 *
 * @module
 */
import { open, readFile, stat } from 'node:fs/promises'
import { basename, join } from 'node:path'
import type { SampleRequest } from '@fifolink/protocol'

export interface SampleStore {
  /** Resolve the sample, or undefined if the store has none. */
  lookup(request: SampleRequest): Promise<number | undefined>
}

export interface FileStore {
  /** Resolve the file length, or undefined if the file does not exist. */
  size(fileName: string): Promise<number | undefined>
  /** Read exactly `length` bytes at `offset`. */
  read(fileName: string, offset: number, length: number): Promise<Buffer>
}

/** Rows of one subject, keyed by {@link timeKey}. */
export type SeriesTable = Map<number, number[]>

/**
 * Key a timestamp at microsecond resolution, so `i * 0.004` matches the
 * `0.036` written in a CSV file.
 */
export function timeKey(timestamp: number): number {
  return Math.round(timestamp * 1_000_000)
}

/**
 * Parse `time,v1,v2,...` lines. Lines whose time is not a number
 * (headers, blanks) are skipped.
 */
export function parseSeriesCsv(text: string): SeriesTable {
  const table: SeriesTable = new Map()
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (trimmed === '') continue
    const [time, ...values] = trimmed.split(',').map((field) => Number.parseFloat(field))
    if (time === undefined || Number.isNaN(time)) continue
    table.set(timeKey(time), values)
  }
  return table
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

function isMissing(err: unknown): boolean {
  return isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')
}

/**
 * Samples from `<dir>/<subjectId>.csv`, loaded once per subject.
 */
export class CsvSampleStore implements SampleStore {
  private readonly tables = new Map<number, Promise<SeriesTable | undefined>>()

  constructor(readonly dir: string) {}

  async lookup(request: SampleRequest): Promise<number | undefined> {
    const table = await this.table(request.subjectId)
    const row = table?.get(timeKey(request.timestamp))
    const value = row?.[request.seriesIndex - 1]
    return value === undefined || Number.isNaN(value) ? undefined : value
  }

  private table(subjectId: number): Promise<SeriesTable | undefined> {
    let table = this.tables.get(subjectId)
    if (!table) {
      table = this.load(subjectId)
      this.tables.set(subjectId, table)
    }
    return table
  }

  private async load(subjectId: number): Promise<SeriesTable | undefined> {
    try {
      const text = await readFile(join(this.dir, `${subjectId}.csv`), 'utf-8')
      return parseSeriesCsv(text)
    } catch (err) {
      if (isMissing(err)) return undefined
      throw err
    }
  }
}

/**
 * Files directly inside `dir`. Names containing path separators or
 * dot segments are reported as absent.
 */
export class DirectoryFileStore implements FileStore {
  constructor(readonly dir: string) {}

  async size(fileName: string): Promise<number | undefined> {
    const path = this.resolve(fileName)
    if (path === undefined) return undefined
    try {
      const info = await stat(path)
      return info.isFile() ? info.size : undefined
    } catch (err) {
      if (isMissing(err)) return undefined
      throw err
    }
  }

  async read(fileName: string, offset: number, length: number): Promise<Buffer> {
    const path = this.resolve(fileName)
    if (path === undefined) {
      throw new Error(`Invalid file name "${fileName}"`)
    }

    const handle = await open(path, 'r')
    try {
      const data = Buffer.alloc(length)
      let filled = 0
      while (filled < length) {
        const { bytesRead } = await handle.read(data, filled, length - filled, offset + filled)
        if (bytesRead === 0) {
          throw new Error(
            `"${fileName}" ended after ${offset + filled} bytes, expected ${offset + length}`
          )
        }
        filled += bytesRead
      }
      return data
    } finally {
      await handle.close()
    }
  }

  private resolve(fileName: string): string | undefined {
    if (
      fileName === '' ||
      fileName === '.' ||
      fileName === '..' ||
      fileName.includes('/') ||
      fileName.includes('\\') ||
      basename(fileName) !== fileName
    ) {
      return undefined
    }
    return join(this.dir, fileName)
  }
}
