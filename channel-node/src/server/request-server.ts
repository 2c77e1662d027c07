/**
 * RequestServer: the paired server side of the request-channel protocol.
 *
 * Responsibilities:
 * - Create the control channel and serve it until it receives quit
 * - Create a uniquely named channel per new-channel request and serve it
 *   concurrently with every other live channel
 * - Answer sample lookups and file size/chunk requests from the stores
 *
 * Reply sentinels:
 * - sample not found → NaN
 * - size query for a missing file → -1
 *
 * A protocol violation on a channel is reported to diagnostics and closes
 * that channel only; quit on the control channel stops the whole server.
 *
 * @module
 */
import type { Writable } from 'node:stream'
import {
  CONTROL_CHANNEL_NAME,
  decodeFileName,
  decodeFileRequestFields,
  decodeSampleRequestBody,
  decodeTag,
  encodeChannelNameReply,
  encodeFileSizeReply,
  encodeSampleReply,
  errorMessage,
  FILE_NOT_FOUND_SIZE,
  FILE_REQUEST_FIELDS_SIZE,
  FILE_REQUEST_HEADER_SIZE,
  isSizeQuery,
  MessageTag,
  ProtocolError,
  SAMPLE_REQUEST_BODY_SIZE,
  TAG_SIZE,
  validateBufferCapacity
} from '@fifolink/protocol'
import { type Channel, openChannel } from '../ipc/channel.js'
import type { Transport } from '../ipc/transport.js'
import type { FileStore, SampleStore } from './stores.js'

const NUL = 0

export interface RequestServerOptions {
  readonly transport: Transport
  /** Buffer capacity agreed with clients at startup */
  readonly bufferCapacity: number
  readonly samples: SampleStore
  readonly files: FileStore
  /** Defaults to `control` */
  readonly controlName?: string
  /** Diagnostics output, defaults to process.stderr */
  readonly diagnostics?: Writable
}

/**
 * Name assigned to the Nth channel created by a server.
 */
export function ephemeralChannelName(n: number): string {
  return `data${n}_`
}

export class RequestServer {
  /** Resolves once the server has stopped and every channel is closed. */
  readonly closed: Promise<void>
  private readonly transport: Transport
  private readonly bufferCapacity: number
  private readonly samples: SampleStore
  private readonly files: FileStore
  private readonly controlName: string
  private readonly diagnostics: Writable
  private readonly live = new Set<Channel>()
  private readonly tasks = new Set<Promise<void>>()
  private channelCount = 0
  private listening = false
  private stopping: Promise<void> | null = null
  private resolveClosed: () => void = () => {}

  constructor(options: RequestServerOptions) {
    this.transport = options.transport
    this.bufferCapacity = validateBufferCapacity(options.bufferCapacity)
    this.samples = options.samples
    this.files = options.files
    this.controlName = options.controlName ?? CONTROL_CHANNEL_NAME
    this.diagnostics = options.diagnostics ?? process.stderr
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve
    })
  }

  /** Names of channels currently being served. */
  get liveChannels(): string[] {
    return [...this.live].map((channel) => channel.name)
  }

  /**
   * Create the control channel resources and start serving it.
   * Resolves once clients can attach.
   */
  async listen(): Promise<void> {
    if (this.listening) {
      throw new Error('RequestServer is already listening')
    }
    this.listening = true
    await this.transport.create(this.controlName)
    this.track(this.serveNew(this.controlName, 'control'))
  }

  /**
   * Stop serving: close every live channel and remove the control resources.
   * Idempotent; never rejects (failures go to diagnostics).
   */
  close(): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.stop()
    }
    return this.stopping
  }

  private async stop(): Promise<void> {
    const channels = [...this.live]
    this.live.clear()
    const results = await Promise.allSettled(channels.map((channel) => channel.close()))
    for (const [i, result] of results.entries()) {
      if (result.status === 'rejected') {
        this.log(`closing channel "${channels[i].name}" failed: ${errorMessage(result.reason)}`)
      }
    }
    try {
      await this.transport.remove(this.controlName)
    } catch (err) {
      this.log(`removing control channel failed: ${errorMessage(err)}`)
    }
    this.resolveClosed()
  }

  private track(task: Promise<void>): void {
    this.tasks.add(task)
    void task.finally(() => this.tasks.delete(task))
  }

  private log(line: string): void {
    this.diagnostics.write(`[server] ${line}\n`)
  }

  /** Attach to a created channel and serve it until quit or failure. */
  private async serveNew(name: string, kind: 'control' | 'ephemeral'): Promise<void> {
    let channel: Channel
    try {
      channel = await openChannel(this.transport, name, 'server', {
        bufferCapacity: this.bufferCapacity,
        kind
      })
    } catch (err) {
      this.log(`attaching channel "${name}" failed: ${errorMessage(err)}`)
      if (kind === 'control') await this.close()
      return
    }

    if (this.stopping !== null) {
      await this.release(channel)
      return
    }
    this.live.add(channel)
    await this.serve(channel)
  }

  private async serve(channel: Channel): Promise<void> {
    try {
      for (;;) {
        const tag = decodeTag(await channel.readExact(TAG_SIZE))
        switch (tag) {
          case MessageTag.DATA:
            await this.handleSample(channel)
            break
          case MessageTag.FILE:
            await this.handleFile(channel)
            break
          case MessageTag.NEW_CHANNEL:
            await this.handleNewChannel(channel)
            break
          case MessageTag.QUIT:
            await this.handleQuit(channel)
            return
          default: {
            const _exhaustive: never = tag
            throw new ProtocolError(`Unhandled message tag ${String(_exhaustive)}`)
          }
        }
      }
    } catch (err) {
      // Closed underneath us by close(): not a channel failure
      if (!channel.isOpen) return
      this.log(`channel "${channel.name}" failed: ${errorMessage(err)}`)
      this.live.delete(channel)
      await this.release(channel)
      if (channel.kind === 'control') await this.close()
    }
  }

  private async release(channel: Channel): Promise<void> {
    try {
      await channel.close()
    } catch (err) {
      this.log(`closing channel "${channel.name}" failed: ${errorMessage(err)}`)
    }
  }

  private async handleSample(channel: Channel): Promise<void> {
    const request = decodeSampleRequestBody(await channel.readExact(SAMPLE_REQUEST_BODY_SIZE))
    const value = await this.samples.lookup(request)
    await channel.writeExact(encodeSampleReply(value ?? Number.NaN))
  }

  private async handleFile(channel: Channel): Promise<void> {
    const { offset, length } = decodeFileRequestFields(
      await channel.readExact(FILE_REQUEST_FIELDS_SIZE)
    )
    const fileName = decodeFileName(
      await channel.readDelimited(NUL, this.bufferCapacity - FILE_REQUEST_HEADER_SIZE)
    )
    const size = await this.files.size(fileName)

    if (isSizeQuery({ offset, length, fileName })) {
      await channel.writeExact(encodeFileSizeReply(size ?? FILE_NOT_FOUND_SIZE))
      return
    }

    if (length > this.bufferCapacity) {
      throw new ProtocolError(
        `Chunk length ${length} exceeds the buffer capacity ${this.bufferCapacity}`
      )
    }
    if (size === undefined) {
      throw new ProtocolError(`Chunk requested from missing file "${fileName}"`)
    }
    if (offset + length > size) {
      throw new ProtocolError(
        `Chunk ${offset}+${length} reaches past the end of "${fileName}" (${size} bytes)`
      )
    }
    await channel.writeExact(await this.files.read(fileName, offset, length))
  }

  private async handleNewChannel(channel: Channel): Promise<void> {
    this.channelCount++
    const name = ephemeralChannelName(this.channelCount)
    await this.transport.create(name)
    await channel.writeExact(encodeChannelNameReply(name))
    // Attaching blocks until the client attaches; keep serving this channel meanwhile
    this.track(this.serveNew(name, 'ephemeral'))
  }

  private async handleQuit(channel: Channel): Promise<void> {
    this.live.delete(channel)
    await this.release(channel)
    if (channel.kind === 'control') {
      await this.close()
    }
  }
}
