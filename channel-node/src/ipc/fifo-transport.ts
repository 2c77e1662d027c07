/**
 * FifoTransport: channels backed by pairs of named pipes.
 *
 * A channel named `N` in directory `D` uses two FIFOs:
 * - `D/fifo_N1`: client → server
 * - `D/fifo_N2`: server → client
 *
 * The server creates both with `mkfifo`. Both sides open `fifo_N1` first, so
 * the blocking opens pair up without deadlock. Opening happens on the libuv
 * threadpool (a FIFO open blocks until the peer opens the other end); the
 * opened descriptors are then handed to `net.Socket`, which drives them
 * through the event loop instead of blocking threadpool reads.
 *
 * @module
 */
import { execFile } from 'node:child_process'
import { closeSync, constants, open } from 'node:fs'
import { mkdir, stat, unlink } from 'node:fs/promises'
import { Socket } from 'node:net'
import { join } from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import { promisify } from 'node:util'
import {
  type ChannelRole,
  DEFAULT_ATTACH_TIMEOUT_MS,
  errorMessage,
  TransportError
} from '@fifolink/protocol'
import type { ChannelStreams, Transport } from './transport.js'

const execFileAsync = promisify(execFile)
const openAsync = promisify(open)

/** Interval between existence checks while a client waits for a channel. */
const ATTACH_POLL_INTERVAL_MS = 20

export interface FifoTransportOptions {
  /** Directory holding the FIFOs */
  readonly dir: string
  /** How long a client waits for a channel's FIFOs to appear */
  readonly attachTimeoutMs?: number
}

/**
 * Paths of the two FIFOs of a channel.
 */
export interface FifoPaths {
  /** client → server */
  readonly request: string
  /** server → client */
  readonly response: string
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

async function isFifo(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFIFO()
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return false
    throw err
  }
}

async function unlinkIfPresent(path: string): Promise<void> {
  try {
    await unlink(path)
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return
    throw err
  }
}

export class FifoTransport implements Transport {
  readonly dir: string
  private readonly attachTimeoutMs: number

  constructor(options: FifoTransportOptions) {
    this.dir = options.dir
    this.attachTimeoutMs = options.attachTimeoutMs ?? DEFAULT_ATTACH_TIMEOUT_MS
  }

  paths(name: string): FifoPaths {
    return {
      request: join(this.dir, `fifo_${name}1`),
      response: join(this.dir, `fifo_${name}2`)
    }
  }

  async create(name: string): Promise<void> {
    const { request, response } = this.paths(name)
    try {
      await mkdir(this.dir, { recursive: true })
      await this.remove(name)
      await execFileAsync('mkfifo', ['-m', '600', request, response])
    } catch (err) {
      throw new TransportError(
        'create_failed',
        `Creating FIFOs for channel "${name}" failed: ${errorMessage(err)}`,
        { cause: err }
      )
    }
  }

  async attach(name: string, role: ChannelRole): Promise<ChannelStreams> {
    const { request, response } = this.paths(name)

    await this.waitForFifos(name, role === 'client' ? this.attachTimeoutMs : 0)

    const opened: number[] = []
    try {
      if (role === 'server') {
        const inputFd = await openAsync(request, constants.O_RDONLY)
        opened.push(inputFd)
        const outputFd = await openAsync(response, constants.O_WRONLY)
        return wrapDescriptors(inputFd, outputFd)
      }
      const outputFd = await openAsync(request, constants.O_WRONLY)
      opened.push(outputFd)
      const inputFd = await openAsync(response, constants.O_RDONLY)
      return wrapDescriptors(inputFd, outputFd)
    } catch (err) {
      for (const fd of opened) closeSync(fd)
      throw new TransportError(
        'missing',
        `Opening FIFOs for channel "${name}" failed: ${errorMessage(err)}`,
        { cause: err }
      )
    }
  }

  async remove(name: string): Promise<void> {
    const { request, response } = this.paths(name)
    await unlinkIfPresent(request)
    await unlinkIfPresent(response)
  }

  /**
   * Wait until both FIFOs of `name` exist.
   * @throws TransportError (`missing`) once `timeoutMs` has elapsed
   */
  private async waitForFifos(name: string, timeoutMs: number): Promise<void> {
    const { request, response } = this.paths(name)
    const deadline = Date.now() + timeoutMs

    for (;;) {
      if ((await isFifo(request)) && (await isFifo(response))) return
      if (Date.now() >= deadline) {
        throw new TransportError(
          'missing',
          `Channel "${name}" not found in ${this.dir} after ${timeoutMs}ms`
        )
      }
      await sleep(ATTACH_POLL_INTERVAL_MS)
    }
  }
}

function wrapDescriptors(inputFd: number, outputFd: number): ChannelStreams {
  return {
    input: new Socket({ fd: inputFd, readable: true, writable: false }),
    output: new Socket({ fd: outputFd, readable: false, writable: true })
  }
}
