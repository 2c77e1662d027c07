import { PassThrough } from 'node:stream'
import {
  ConfigError,
  DEFAULT_BUFFER_CAPACITY,
  encodeFileSizeReply,
  RemoteFileNotFoundError,
  RequestValidationError
} from '@fifolink/protocol'
import { describe, expect, it } from 'vitest'
import {
  collectSink,
  fetchFile,
  fetchFileSize,
  writableSink
} from '../../src/client/file.js'
import { shutdown } from '../../src/client/shutdown.js'
import {
  FakeFileStore,
  MemoryTransport,
  patternBytes,
  scriptedPeer,
  startServer
} from '../_harness/index.js'

describe('fetchFileSize', () => {
  it('returns the length reported by the server', async () => {
    const files = new FakeFileStore({ 'a.bin': patternBytes(1000) })
    const { server, control } = await startServer({ files })

    await expect(fetchFileSize(control, 'a.bin')).resolves.toBe(1000)

    await shutdown(control)
    await server.closed
  })

  it('maps the not-found sentinel without failing the channel', async () => {
    const files = new FakeFileStore({ 'a.bin': patternBytes(10) })
    const { server, control } = await startServer({ files })

    await expect(fetchFileSize(control, 'nope.bin')).rejects.toThrow(
      new RemoteFileNotFoundError('nope.bin')
    )
    expect(control.isFailed).toBe(false)
    await expect(fetchFileSize(control, 'a.bin')).resolves.toBe(10)

    await shutdown(control)
    await server.closed
  })

  it('refuses a name whose request exceeds the buffer capacity', async () => {
    const { client } = await scriptedPeer(new MemoryTransport(), 'control', 32)

    await expect(fetchFileSize(client, 'twenty-characters.xy')).rejects.toThrow(
      new RequestValidationError(
        'File request for "twenty-characters.xy" is 37 bytes, exceeding the buffer capacity 32'
      )
    )
    expect(client.isFailed).toBe(false)
  })

  it('fails the channel on a negative size other than the sentinel', async () => {
    const { server, client } = await scriptedPeer(new MemoryTransport(), 'control')

    const reply = (async () => {
      await server.readExact(22)
      await server.writeExact(encodeFileSizeReply(-7))
    })()

    await expect(fetchFileSize(client, 'a.bin')).rejects.toThrow(
      'File-size reply for "a.bin" is negative: -7'
    )
    await reply
  })
})

describe('fetchFile', () => {
  it('fetches a file in capacity-sized chunks with a clamped tail', async () => {
    const content = patternBytes(600)
    const files = new FakeFileStore({ 'a.bin': content })
    const { server, control } = await startServer({ files })
    const sink = collectSink()
    const sizes: number[] = []

    const result = await fetchFile(control, 'a.bin', 256, sink, {
      onSize: (total) => sizes.push(total)
    })

    expect(result).toEqual({ fileName: 'a.bin', totalLength: 600, chunks: 3 })
    expect(sizes).toEqual([600])
    expect(sink.bytes().equals(content)).toBe(true)
    expect(sink.chunks.map((c) => c.length)).toEqual([256, 256, 88])
    expect(files.reads).toEqual([
      { fileName: 'a.bin', offset: 0, length: 256 },
      { fileName: 'a.bin', offset: 256, length: 256 },
      { fileName: 'a.bin', offset: 512, length: 88 }
    ])

    await shutdown(control)
    await server.closed
  })

  it('uses a smaller chunk size when asked', async () => {
    const content = patternBytes(250)
    const files = new FakeFileStore({ 'x1.csv': content })
    const { server, control } = await startServer({ files })
    const sink = collectSink()

    const result = await fetchFile(control, 'x1.csv', 100, sink)

    expect(result.chunks).toBe(3)
    expect(sink.chunks.map((c) => c.length)).toEqual([100, 100, 50])
    expect(sink.bytes().equals(content)).toBe(true)

    await shutdown(control)
    await server.closed
  })

  it('issues no chunk requests for an empty file', async () => {
    const files = new FakeFileStore({ 'empty.bin': Buffer.alloc(0) })
    const { server, control } = await startServer({ files })
    const sink = collectSink()

    const result = await fetchFile(control, 'empty.bin', 256, sink)

    expect(result).toEqual({ fileName: 'empty.bin', totalLength: 0, chunks: 0 })
    expect(sink.chunks).toEqual([])
    expect(files.reads).toEqual([])

    await shutdown(control)
    await server.closed
  })

  it('yields identical bytes when the same file is fetched twice', async () => {
    const files = new FakeFileStore({ 'a.bin': patternBytes(777) })
    const { server, control } = await startServer({ files })
    const first = collectSink()
    const second = collectSink()

    await fetchFile(control, 'a.bin', 256, first)
    await fetchFile(control, 'a.bin', 256, second)

    expect(first.bytes().equals(second.bytes())).toBe(true)

    await shutdown(control)
    await server.closed
  })

  it('reproduces a 10 MiB file chunked at the default buffer capacity', async () => {
    const content = patternBytes(10 * 1024 * 1024)
    const files = new FakeFileStore({ 'large.bin': content })
    const { server, control } = await startServer({ files })
    const sink = collectSink()

    const result = await fetchFile(control, 'large.bin', DEFAULT_BUFFER_CAPACITY, sink)

    expect(result.chunks).toBe((10 * 1024 * 1024) / DEFAULT_BUFFER_CAPACITY)
    expect(sink.bytes().equals(content)).toBe(true)

    await shutdown(control)
    await server.closed
  }, 60_000)

  it('rejects a missing file before requesting chunks', async () => {
    const { server, control } = await startServer()
    const sink = collectSink()

    await expect(fetchFile(control, 'missing.bin', 256, sink)).rejects.toThrow(
      RemoteFileNotFoundError
    )
    expect(sink.chunks).toEqual([])

    await shutdown(control)
    await server.closed
  })

  it('rejects a chunk size above the buffer capacity before any I/O', async () => {
    const { client } = await scriptedPeer(new MemoryTransport(), 'control', 64)

    await expect(fetchFile(client, 'a.bin', 65, collectSink())).rejects.toThrow(
      new ConfigError('maxChunk 65 exceeds the buffer capacity 64')
    )
    expect(client.isFailed).toBe(false)
  })

  it('streams chunks into a writable', async () => {
    const content = patternBytes(300)
    const files = new FakeFileStore({ 'a.bin': content })
    const { server, control } = await startServer({ files })
    const output = new PassThrough()
    const received: Buffer[] = []
    output.on('data', (chunk: Buffer) => received.push(chunk))

    await fetchFile(control, 'a.bin', 256, writableSink(output))

    expect(Buffer.concat(received).equals(content)).toBe(true)

    await shutdown(control)
    await server.closed
  })
})
