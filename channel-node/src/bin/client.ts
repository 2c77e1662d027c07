#!/usr/bin/env node
/**
 * CLI entrypoint for the fifolink client.
 *
 * Usage:
 *   fifolink-client [-p subject] [-t time] [-e series] [-f file] [-m capacity] [-c]
 *                   [--no-server] [--pipe-dir dir] [--data-dir dir] [--out dir]
 *
 * Unless `--no-server` is given, the server is spawned as a child process
 * with the same buffer capacity, and stopped at the end of the run.
 *
 * - `-p P -t T [-e E]`: print one sample
 * - `-p P`: write the first 1000 rows of both series to `<out>/xP.csv`
 * - `-f F`: transfer `F` to `<out>/F`
 * - `-c`: perform the requests on a private channel
 *
 * Exit codes:
 * - 0: Success
 * - 1: Protocol or transport failure
 * - 3: Invalid arguments
 *
 * @module
 */
import { type ChildProcess, spawn } from 'node:child_process'
import { createWriteStream, type WriteStream } from 'node:fs'
import { mkdir, rm, writeFile } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { CONTROL_CHANNEL_NAME, errorMessage } from '@fifolink/protocol'
import { type ClientConfig, parseClientArgs } from '../args.js'
import type { FileTransferResult } from '../client/file.js'
import { formatSampleValue, formatSeriesCsv } from '../client/sample.js'
import { ControlSession } from '../client/session.js'
import { FifoTransport } from '../ipc/fifo-transport.js'
import { endStream, writeWithBackpressure } from '../ipc/write.js'

/**
 * Write an error message to stderr and exit with code 3 (invalid input).
 */
function fatalError(message: string): never {
  process.stderr.write(`Error: ${message}\n`)
  process.exit(3)
}

/**
 * Spawn the server next to this entrypoint, forwarding Node flags so a
 * TypeScript loader (when present) applies to the child too.
 */
function spawnServer(config: ClientConfig): ChildProcess {
  const self = fileURLToPath(import.meta.url)
  const serverEntry = fileURLToPath(new URL(`./server${extname(self)}`, import.meta.url))
  return spawn(
    process.execPath,
    [
      ...process.execArgv,
      serverEntry,
      '-m',
      String(config.bufferCapacity),
      '--pipe-dir',
      config.pipeDir,
      '--data-dir',
      config.dataDir
    ],
    { stdio: ['ignore', 'inherit', 'inherit'] }
  )
}

function waitForExit(child: ChildProcess): Promise<number | null> {
  return new Promise((resolve) => {
    if (child.exitCode !== null || child.signalCode !== null) {
      resolve(child.exitCode)
      return
    }
    child.once('exit', (code) => resolve(code))
  })
}

/**
 * Destroy a partial output and remove its file.
 */
async function discard(output: WriteStream, path: string): Promise<void> {
  if (!output.closed) {
    await new Promise<void>((resolve) => {
      output.once('close', () => resolve())
      output.destroy()
    })
  }
  await rm(path, { force: true })
}

/**
 * Transfer `fileName` into `outputDir`. The output file is created once the
 * server has reported a size, and removed if the transfer then fails.
 */
async function receiveFile(
  session: ControlSession,
  fileName: string,
  outputDir: string
): Promise<FileTransferResult> {
  const target = join(outputDir, fileName)
  const file: { output?: WriteStream } = {}
  const opened = (): WriteStream => {
    if (file.output === undefined) {
      file.output = createWriteStream(target)
    }
    return file.output
  }

  await mkdir(outputDir, { recursive: true })
  try {
    const result = await session.fetchFile(
      fileName,
      { write: (chunk) => writeWithBackpressure(opened(), chunk) },
      undefined,
      {
        onSize: (totalLength) => {
          opened()
          process.stdout.write(`File ${fileName} has length: ${totalLength} bytes\n`)
        }
      }
    )
    await endStream(opened())
    return result
  } catch (err) {
    if (file.output !== undefined) {
      await discard(file.output, target)
    }
    throw err
  }
}

async function run(session: ControlSession, config: ClientConfig): Promise<void> {
  if (config.newChannel) {
    await session.openPrivateChannel()
  }

  if (config.subjectId !== undefined && config.timestamp !== undefined) {
    const value = await session.fetchSample({
      subjectId: config.subjectId,
      timestamp: config.timestamp,
      seriesIndex: config.seriesIndex
    })
    process.stdout.write(
      `For person ${config.subjectId}, at time ${config.timestamp}, the value of ecg ${config.seriesIndex} is ${formatSampleValue(value)}\n`
    )
  } else if (config.subjectId !== undefined) {
    const started = Date.now()
    const rows = await session.fetchSeries({ subjectId: config.subjectId })
    await mkdir(config.outputDir, { recursive: true })
    await writeFile(join(config.outputDir, `x${config.subjectId}.csv`), formatSeriesCsv(rows))
    process.stderr.write(`Fetched ${rows.length} rows in ${Date.now() - started}ms\n`)
  }

  if (config.fileName !== undefined) {
    const started = Date.now()
    const result = await receiveFile(session, config.fileName, config.outputDir)
    process.stderr.write(
      `Transferred ${result.totalLength} bytes in ${result.chunks} chunks in ${Date.now() - started}ms\n`
    )
  }
}

async function main(): Promise<never> {
  let config: ClientConfig
  try {
    config = parseClientArgs(process.argv.slice(2), process.env)
  } catch (err) {
    fatalError(errorMessage(err))
  }

  const transport = new FifoTransport({
    dir: config.pipeDir,
    attachTimeoutMs: config.attachTimeoutMs
  })

  let server: ChildProcess | undefined
  if (config.spawnServer) {
    // Stale FIFOs from an earlier run would let us attach before the new server recreates them
    await transport.remove(CONTROL_CHANNEL_NAME)
    server = spawnServer(config)
  }

  let exitCode = 0
  try {
    const session = await ControlSession.open({
      transport,
      bufferCapacity: config.bufferCapacity
    })
    try {
      await run(session, config)
    } finally {
      process.stdout.write(`Closing Channel: ${session.active.name}\n`)
      if (server) {
        await session.terminate()
      } else {
        await session.shutdown()
      }
    }
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    exitCode = 1
    server?.kill('SIGTERM')
  }

  if (server) {
    await waitForExit(server)
  }
  process.exit(exitCode)
}

main().catch((err) => {
  process.stderr.write(`Unexpected error: ${errorMessage(err)}\n`)
  process.exit(2)
})
