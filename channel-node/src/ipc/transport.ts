/**
 * Transport seam between a channel and the named resources behind it.
 *
 * @module
 */
import type { Readable, Writable } from 'node:stream'
import type { ChannelRole } from '@fifolink/protocol'

/**
 * The two one-directional streams of an attached channel, seen from one side.
 */
export interface ChannelStreams {
  /** Bytes arriving from the peer */
  readonly input: Readable
  /** Bytes sent to the peer */
  readonly output: Writable
}

/**
 * Creates, attaches to and removes named channel resources.
 *
 * The server side calls create() before attach(); the client side only
 * attaches and must fail when the resources do not exist.
 */
export interface Transport {
  /** Create the named resources for `name`, replacing stale ones. */
  create(name: string): Promise<void>
  /**
   * Attach to the resources of `name` with the given role.
   * @throws TransportError (`missing`) if they do not exist within the attach timeout
   */
  attach(name: string, role: ChannelRole): Promise<ChannelStreams>
  /** Remove the named resources. Missing resources are not an error. */
  remove(name: string): Promise<void>
}
