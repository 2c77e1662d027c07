/**
 * Command-line and environment parsing for the client and server entrypoints.
 *
 * Extracted from the entrypoints so it can be tested without triggering
 * main() side-effects.
 *
 * @module
 */
import { basename } from 'node:path'
import { parseArgs } from 'node:util'
import {
  ConfigError,
  errorMessage,
  parseAttachTimeout,
  parseBufferCapacity
} from '@fifolink/protocol'

/** Environment variables read by the entrypoints. */
export type Environment = Readonly<Record<string, string | undefined>>

export interface ClientConfig {
  /** `-p`: subject to query */
  readonly subjectId?: number
  /** `-t`: timestamp of a single sample */
  readonly timestamp?: number
  /** `-e`: series of a single sample */
  readonly seriesIndex: number
  /** `-f`: file to transfer */
  readonly fileName?: string
  /** `-m`: buffer capacity, also passed to a spawned server */
  readonly bufferCapacity: number
  /** `-c`: use a private channel */
  readonly newChannel: boolean
  /** False with `--no-server`: attach to a server that is already running */
  readonly spawnServer: boolean
  readonly pipeDir: string
  readonly dataDir: string
  readonly outputDir: string
  readonly attachTimeoutMs: number
}

export interface ServerConfig {
  readonly bufferCapacity: number
  readonly pipeDir: string
  readonly dataDir: string
}

export const DEFAULT_PIPE_DIR = '.'
export const DEFAULT_DATA_DIR = 'BIMDC'
export const DEFAULT_OUTPUT_DIR = 'received'

function parseNonNegativeInteger(raw: string, flag: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${flag} must be a non-negative integer, got "${raw}"`)
  }
  return Number.parseInt(raw, 10)
}

function parseNonNegativeNumber(raw: string, flag: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${flag} must be a number >= 0, got "${raw}"`)
  }
  return value
}

function parseOrThrow<T>(fn: () => T): T {
  try {
    return fn()
  } catch (err) {
    if (err instanceof ConfigError) throw err
    throw new ConfigError(errorMessage(err))
  }
}

/**
 * Parse client arguments.
 * @throws ConfigError on unknown flags or invalid values
 */
export function parseClientArgs(argv: readonly string[], env: Environment = {}): ClientConfig {
  const { values } = parseOrThrow(() =>
    parseArgs({
      args: [...argv],
      options: {
        person: { type: 'string', short: 'p' },
        time: { type: 'string', short: 't' },
        ecg: { type: 'string', short: 'e' },
        file: { type: 'string', short: 'f' },
        capacity: { type: 'string', short: 'm' },
        channel: { type: 'boolean', short: 'c', default: false },
        'no-server': { type: 'boolean', default: false },
        'pipe-dir': { type: 'string' },
        'data-dir': { type: 'string' },
        out: { type: 'string' }
      },
      allowPositionals: false,
      strict: true
    })
  )

  let seriesIndex = 1
  if (values.ecg !== undefined) {
    seriesIndex = parseNonNegativeInteger(values.ecg, '-e')
    if (seriesIndex < 1) {
      throw new ConfigError(`-e must be >= 1, got ${seriesIndex}`)
    }
  }
  if (values.file === '') {
    throw new ConfigError('-f must not be empty')
  }
  if (
    values.file !== undefined &&
    (basename(values.file) !== values.file || values.file === '.' || values.file === '..')
  ) {
    throw new ConfigError(`-f must be a plain file name, got "${values.file}"`)
  }

  return {
    ...(values.person !== undefined && { subjectId: parseNonNegativeInteger(values.person, '-p') }),
    ...(values.time !== undefined && { timestamp: parseNonNegativeNumber(values.time, '-t') }),
    seriesIndex,
    ...(values.file !== undefined && { fileName: values.file }),
    bufferCapacity: parseBufferCapacity(values.capacity),
    newChannel: values.channel === true,
    spawnServer: values['no-server'] !== true,
    pipeDir: values['pipe-dir'] ?? env.FIFOLINK_PIPE_DIR ?? DEFAULT_PIPE_DIR,
    dataDir: values['data-dir'] ?? env.FIFOLINK_DATA_DIR ?? DEFAULT_DATA_DIR,
    outputDir: values.out ?? DEFAULT_OUTPUT_DIR,
    attachTimeoutMs: parseAttachTimeout(env.FIFOLINK_ATTACH_TIMEOUT_MS)
  }
}

/**
 * Parse server arguments.
 * @throws ConfigError on unknown flags or invalid values
 */
export function parseServerArgs(argv: readonly string[], env: Environment = {}): ServerConfig {
  const { values } = parseOrThrow(() =>
    parseArgs({
      args: [...argv],
      options: {
        capacity: { type: 'string', short: 'm' },
        'pipe-dir': { type: 'string' },
        'data-dir': { type: 'string' }
      },
      allowPositionals: false,
      strict: true
    })
  )

  return {
    bufferCapacity: parseBufferCapacity(values.capacity),
    pipeDir: values['pipe-dir'] ?? env.FIFOLINK_PIPE_DIR ?? DEFAULT_PIPE_DIR,
    dataDir: values['data-dir'] ?? env.FIFOLINK_DATA_DIR ?? DEFAULT_DATA_DIR
  }
}
