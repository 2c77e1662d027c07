/**
 * fifolink channel-node
 *
 * Node.js client and paired server for the request-channel protocol over
 * named pipes.
 *
 * @packageDocumentation
 */

// Client
export {
  type CreateChannelOptions,
  createChannel
} from './client/channel-factory.js'
export {
  type ByteSink,
  type CollectSink,
  collectSink,
  type FileTransferOptions,
  type FileTransferResult,
  fetchFile,
  fetchFileSize,
  writableSink
} from './client/file.js'
export {
  fetchSample,
  fetchSeries,
  formatSampleValue,
  formatSeriesCsv,
  type SeriesOptions,
  type SeriesRow
} from './client/sample.js'
export { ControlSession, type ControlSessionOptions } from './client/session.js'
export { shutdown } from './client/shutdown.js'

// Channel transport
export {
  Channel,
  type ChannelOptions,
  type ChannelStreams,
  FifoTransport,
  type FifoTransportOptions,
  openChannel,
  StreamClosedError,
  type Transport
} from './ipc/index.js'

// Server
export {
  ephemeralChannelName,
  RequestServer,
  type RequestServerOptions
} from './server/request-server.js'
export {
  CsvSampleStore,
  DirectoryFileStore,
  type FileStore,
  parseSeriesCsv,
  type SampleStore,
  type SeriesTable,
  timeKey
} from './server/stores.js'

// Configuration
export { type ClientConfig, parseClientArgs, parseServerArgs, type ServerConfig } from './args.js'
