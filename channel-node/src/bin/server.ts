#!/usr/bin/env node
/**
 * CLI entrypoint for the fifolink request server.
 *
 * Usage:
 *   fifolink-server [-m capacity] [--pipe-dir dir] [--data-dir dir]
 *
 * Serves `<data-dir>/<subject>.csv` samples and the files in `<data-dir>`
 * over named pipes in `<pipe-dir>`, until the control channel receives quit.
 * Stderr is used for diagnostics.
 *
 * Exit codes:
 * - 0: Control channel quit
 * - 2: Server crash
 * - 3: Invalid arguments
 *
 * @module
 */
import { errorMessage } from '@fifolink/protocol'
import { parseServerArgs, type ServerConfig } from '../args.js'
import { FifoTransport } from '../ipc/fifo-transport.js'
import { RequestServer } from '../server/request-server.js'
import { CsvSampleStore, DirectoryFileStore } from '../server/stores.js'

/**
 * Write an error message to stderr and exit with code 3 (invalid input).
 */
function fatalError(message: string): never {
  process.stderr.write(`Error: ${message}\n`)
  process.exit(3)
}

async function main(): Promise<never> {
  let config: ServerConfig
  try {
    config = parseServerArgs(process.argv.slice(2), process.env)
  } catch (err) {
    fatalError(errorMessage(err))
  }

  const server = new RequestServer({
    transport: new FifoTransport({ dir: config.pipeDir }),
    bufferCapacity: config.bufferCapacity,
    samples: new CsvSampleStore(config.dataDir),
    files: new DirectoryFileStore(config.dataDir)
  })

  process.on('SIGTERM', () => void server.close())
  process.on('SIGINT', () => void server.close())

  await server.listen()
  await server.closed

  process.stdout.write('Server terminated\n')
  process.exit(0)
}

main().catch((err) => {
  process.stderr.write(`Unexpected error: ${errorMessage(err)}\n`)
  process.exit(2)
})
