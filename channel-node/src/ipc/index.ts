/**
 * Channel transport: exact reads and writes over pairs of one-directional
 * byte streams, backed by named pipes in production.
 *
 * @module
 */

export { Channel, type ChannelOptions, openChannel } from './channel.js'
export { ExactReader } from './exact-reader.js'
export { type FifoPaths, FifoTransport, type FifoTransportOptions } from './fifo-transport.js'
export type { ChannelStreams, Transport } from './transport.js'
export { endStream, StreamClosedError, writeWithBackpressure } from './write.js'
