/**
 * ControlSession: the client's view of a running server.
 *
 * Attaches to the well-known control channel. Requests go to the active
 * channel, which is the control channel until a private channel is created;
 * from then on the private channel is active and control stays open but idle.
 *
 * @module
 */
import { CONTROL_CHANNEL_NAME, type SampleRequest } from '@fifolink/protocol'
import { type Channel, openChannel } from '../ipc/channel.js'
import type { Transport } from '../ipc/transport.js'
import { createChannel } from './channel-factory.js'
import { type ByteSink, type FileTransferOptions, type FileTransferResult, fetchFile } from './file.js'
import { fetchSample, fetchSeries, type SeriesOptions, type SeriesRow } from './sample.js'
import { shutdown } from './shutdown.js'

export interface ControlSessionOptions {
  readonly transport: Transport
  /** Buffer capacity agreed with the server at startup */
  readonly bufferCapacity: number
  /** Defaults to `control` */
  readonly controlName?: string
}

export class ControlSession {
  readonly control: Channel
  private readonly transport: Transport
  private readonly ephemeral: Channel[] = []
  private current: Channel

  private constructor(control: Channel, transport: Transport) {
    this.control = control
    this.transport = transport
    this.current = control
  }

  /**
   * Attach to the server's control channel.
   * @throws TransportError (`missing`) if the server is not live
   */
  static async open(options: ControlSessionOptions): Promise<ControlSession> {
    const control = await openChannel(
      options.transport,
      options.controlName ?? CONTROL_CHANNEL_NAME,
      'client',
      { bufferCapacity: options.bufferCapacity, kind: 'control' }
    )
    return new ControlSession(control, options.transport)
  }

  /** Channel used by fetchSample/fetchSeries/fetchFile/shutdown. */
  get active(): Channel {
    return this.current
  }

  get bufferCapacity(): number {
    return this.control.bufferCapacity
  }

  /**
   * Create a private channel and make it the active one.
   */
  async openPrivateChannel(): Promise<Channel> {
    const live = this.ephemeral.filter((channel) => channel.isOpen).map((channel) => channel.name)
    const channel = await createChannel(this.control, this.transport, { reservedNames: live })
    this.ephemeral.push(channel)
    this.current = channel
    return channel
  }

  fetchSample(request: SampleRequest): Promise<number> {
    return fetchSample(this.current, request)
  }

  fetchSeries(options: SeriesOptions): Promise<SeriesRow[]> {
    return fetchSeries(this.current, options)
  }

  /**
   * Fetch a file on the active channel.
   * `maxChunk` defaults to the buffer capacity.
   */
  fetchFile(
    fileName: string,
    sink: ByteSink,
    maxChunk: number = this.bufferCapacity,
    options?: FileTransferOptions
  ): Promise<FileTransferResult> {
    return fetchFile(this.current, fileName, maxChunk, sink, options)
  }

  /**
   * Send quit on the active channel and release it.
   */
  shutdown(): Promise<void> {
    return shutdown(this.current)
  }

  /**
   * Quit every channel this session still holds, control last.
   * The server stops once its control channel receives quit; only the
   * process that bootstrapped the server should call this.
   */
  async terminate(): Promise<void> {
    for (const channel of this.ephemeral) {
      if (channel.isOpen) await shutdown(channel)
    }
    if (this.control.isOpen) await shutdown(this.control)
  }
}
