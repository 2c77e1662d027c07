/**
 * Integration test: channels over real named pipes.
 *
 * Runs the request server and a client session in the same process against
 * FIFOs in a temporary directory, and verifies:
 * - Attaching pairs up the blocking opens on both sides
 * - Requests work on the control channel and on a private channel
 * - The server removes every FIFO once the control channel quits
 * - A client fails with `missing` when no server created the channel
 */
import { mkdtemp, readdir, readFile, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { collectSink } from '../../src/client/file.js'
import { ControlSession } from '../../src/client/session.js'
import { FifoTransport } from '../../src/ipc/fifo-transport.js'
import { RequestServer } from '../../src/server/request-server.js'
import { CsvSampleStore, DirectoryFileStore } from '../../src/server/stores.js'
import { TextCollector } from '../_harness/index.js'

const fixtures = fileURLToPath(new URL('../fixtures/data', import.meta.url))

describe.skipIf(process.platform === 'win32')('FifoTransport', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fifolink-fifo-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('names the two FIFOs of a channel', () => {
    const transport = new FifoTransport({ dir })
    expect(transport.paths('control')).toEqual({
      request: join(dir, 'fifo_control1'),
      response: join(dir, 'fifo_control2')
    })
  })

  it('creates owner-only FIFOs and removes them idempotently', async () => {
    const transport = new FifoTransport({ dir })
    await transport.create('data1_')

    const info = await stat(join(dir, 'fifo_data1_1'))
    expect(info.isFIFO()).toBe(true)
    expect(info.mode & 0o777).toBe(0o600)
    expect((await readdir(dir)).sort()).toEqual(['fifo_data1_1', 'fifo_data1_2'])

    await transport.remove('data1_')
    await transport.remove('data1_')
    expect(await readdir(dir)).toEqual([])
  })

  it('fails to attach as a client when the channel never appears', async () => {
    const transport = new FifoTransport({ dir, attachTimeoutMs: 50 })

    await expect(transport.attach('nope', 'client')).rejects.toMatchObject({
      name: 'TransportError',
      code: 'missing',
      message: `Channel "nope" not found in ${dir} after 50ms`
    })
  })

  it('serves samples and files end to end', async () => {
    const diagnostics = new TextCollector()
    const server = new RequestServer({
      transport: new FifoTransport({ dir }),
      bufferCapacity: 64,
      samples: new CsvSampleStore(fixtures),
      files: new DirectoryFileStore(fixtures),
      diagnostics
    })
    await server.listen()

    const session = await ControlSession.open({
      transport: new FifoTransport({ dir, attachTimeoutMs: 2_000 }),
      bufferCapacity: 64
    })

    await expect(
      session.fetchSample({ subjectId: 1, timestamp: 0.004, seriesIndex: 1 })
    ).resolves.toBe(0.42)

    const channel = await session.openPrivateChannel()
    expect(channel.name).toBe('data1_')

    const sink = collectSink()
    const result = await session.fetchFile('2.csv', sink)
    const expected = await readFile(join(fixtures, '2.csv'))

    expect(result.totalLength).toBe(expected.length)
    expect(result.chunks).toBe(Math.ceil(expected.length / 64))
    expect(sink.bytes().equals(expected)).toBe(true)

    await session.terminate()
    await server.closed

    expect(diagnostics.lines).toEqual([])
    expect(await readdir(dir)).toEqual([])
  })
})
