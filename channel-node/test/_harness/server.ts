import { Writable } from 'node:stream'
import { type Channel, openChannel } from '../../src/ipc/channel.js'
import { RequestServer } from '../../src/server/request-server.js'
import type { FileStore, SampleStore } from '../../src/server/stores.js'
import { MemoryTransport } from './memory-transport.js'
import { FakeFileStore, FakeSampleStore } from './stores.js'

/**
 * Collect everything written to a stream as text.
 */
export class TextCollector extends Writable {
  private text = ''

  _write(chunk: Buffer, _encoding: string, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString('utf-8')
    callback()
  }

  get lines(): string[] {
    return this.text.split('\n').filter((line) => line !== '')
  }
}

export interface ListeningServer {
  readonly transport: MemoryTransport
  readonly server: RequestServer
  readonly diagnostics: TextCollector
}

export interface ServerHarness extends ListeningServer {
  /** Client end of the control channel */
  readonly control: Channel
}

export interface ServerHarnessOptions {
  readonly bufferCapacity?: number
  readonly samples?: SampleStore
  readonly files?: FileStore
}

/**
 * Start a RequestServer over a MemoryTransport.
 */
export async function listenServer(options: ServerHarnessOptions = {}): Promise<ListeningServer> {
  const transport = new MemoryTransport()
  const diagnostics = new TextCollector()
  const server = new RequestServer({
    transport,
    bufferCapacity: options.bufferCapacity ?? 256,
    samples: options.samples ?? new FakeSampleStore(),
    files: options.files ?? new FakeFileStore(),
    diagnostics
  })
  await server.listen()
  return { transport, server, diagnostics }
}

/**
 * Start a RequestServer and attach a client to its control channel.
 */
export async function startServer(options: ServerHarnessOptions = {}): Promise<ServerHarness> {
  const listening = await listenServer(options)
  const control = await openChannel(listening.transport, 'control', 'client', {
    bufferCapacity: options.bufferCapacity ?? 256
  })
  return { ...listening, control }
}

/**
 * Create a channel and attach its server end, for tests that script the
 * server's replies by hand.
 */
export async function scriptedPeer(
  transport: MemoryTransport,
  name: string,
  bufferCapacity = 256
): Promise<{ server: Channel; client: Channel }> {
  await transport.create(name)
  const server = await openChannel(transport, name, 'server', { bufferCapacity })
  const client = await openChannel(transport, name, 'client', { bufferCapacity })
  return { server, client }
}
