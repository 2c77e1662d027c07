/**
 * Message shapes of the request-channel protocol.
 *
 * @module
 */

/**
 * "Give me the value of series `seriesIndex` for subject `subjectId`
 * at time `timestamp`."
 */
export interface SampleRequest {
  readonly subjectId: number
  readonly timestamp: number
  /** 1-based series index */
  readonly seriesIndex: number
}

/**
 * "Give me `length` bytes of `fileName` starting at `offset`."
 * `offset = 0, length = 0` is a size query.
 */
export interface FileChunkRequest {
  readonly offset: number
  readonly length: number
  readonly fileName: string
}

export interface SampleRequestMessage extends SampleRequest {
  readonly type: 'data'
}

export interface FileRequestMessage extends FileChunkRequest {
  readonly type: 'file'
}

export interface NewChannelMessage {
  readonly type: 'new_channel'
}

export interface QuitMessage {
  readonly type: 'quit'
}

/**
 * Union of every request a client may send.
 */
export type RequestMessage = SampleRequestMessage | FileRequestMessage | NewChannelMessage | QuitMessage

export type RequestType = RequestMessage['type']

/**
 * Which end of a channel a process holds. The server side creates the named
 * resources; the client side attaches to them.
 */
export type ChannelRole = 'server' | 'client'

/**
 * `control` channels are created by the server at startup and never
 * destroyed by a client; `ephemeral` channels are created on request.
 */
export type ChannelKind = 'control' | 'ephemeral'

/**
 * Returns true if the request is a size query rather than a data request.
 */
export function isSizeQuery(request: FileChunkRequest): boolean {
  return request.offset === 0 && request.length === 0
}
