/**
 * fifolink protocol
 *
 * Wire format, codec and error taxonomy shared by the client and the paired
 * request server. Contains no I/O.
 *
 * @packageDocumentation
 */

export { type ChunkMeta, iterateChunks, planChunks, validateMaxChunk } from './chunks.js'
export {
  DEFAULT_ATTACH_TIMEOUT_MS,
  parseAttachTimeout,
  parseBufferCapacity,
  validateBufferCapacity
} from './config.js'
export {
  decodeChannelNameReply,
  decodeFileName,
  decodeFileRequestFields,
  decodeFileSizeReply,
  decodeMessage,
  decodeSampleReply,
  decodeSampleRequestBody,
  decodeTag,
  encodeChannelNameReply,
  encodedFileRequestSize,
  encodeFileRequest,
  encodeFileSizeReply,
  encodeNewChannelRequest,
  encodeQuit,
  encodeSampleReply,
  encodeSampleRequest,
  validateFileRequest,
  validateSampleRequest
} from './codec.js'
export {
  CHANNEL_NAME_REPLY_SIZE,
  CONTROL_CHANNEL_NAME,
  DEFAULT_BUFFER_CAPACITY,
  FILE_NOT_FOUND_SIZE,
  FILE_REQUEST_FIELDS_SIZE,
  FILE_REQUEST_HEADER_SIZE,
  FILE_SIZE_REPLY_SIZE,
  INT32_MAX,
  MAX_BUFFER_CAPACITY,
  MessageTag,
  MIN_BUFFER_CAPACITY,
  type RequestTag,
  SAMPLE_REPLY_SIZE,
  SAMPLE_REQUEST_BODY_SIZE,
  SAMPLE_REQUEST_SIZE,
  TAG_SIZE,
  WIRE_FORMAT_VERSION
} from './constants.js'
export {
  ChannelClosedError,
  ChannelFailedError,
  ConfigError,
  errorMessage,
  ProtocolError,
  RemoteFileNotFoundError,
  RequestValidationError,
  SampleUnavailableError,
  TransportError,
  type TransportErrorCode
} from './errors.js'
export {
  type ChannelKind,
  type ChannelRole,
  type FileChunkRequest,
  type FileRequestMessage,
  isSizeQuery,
  type NewChannelMessage,
  type QuitMessage,
  type RequestMessage,
  type RequestType,
  type SampleRequest,
  type SampleRequestMessage
} from './types.js'
