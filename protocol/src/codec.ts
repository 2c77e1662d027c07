/**
 * Binary encoder/decoder pairs for every message shape (wire format v1).
 *
 * Layouts are packed and little-endian, so both peers agree byte for byte
 * regardless of how either side lays out its in-memory structures. The only
 * variable-length field is the file name of a file request; its length is
 * implied by the number of bytes written, so callers must hand the transport
 * exactly the buffer returned by {@link encodeFileRequest}.
 *
 * @module
 */

import {
  CHANNEL_NAME_REPLY_SIZE,
  FILE_NOT_FOUND_SIZE,
  FILE_REQUEST_FIELDS_SIZE,
  FILE_REQUEST_HEADER_SIZE,
  FILE_SIZE_REPLY_SIZE,
  INT32_MAX,
  MessageTag,
  type RequestTag,
  SAMPLE_REPLY_SIZE,
  SAMPLE_REQUEST_BODY_SIZE,
  SAMPLE_REQUEST_SIZE,
  TAG_SIZE
} from './constants.js'
import {
  ProtocolError,
  RemoteFileNotFoundError,
  RequestValidationError,
  SampleUnavailableError
} from './errors.js'
import type { FileChunkRequest, RequestMessage, SampleRequest } from './types.js'

const NUL = 0
const MAX_SAFE_BIGINT = BigInt(Number.MAX_SAFE_INTEGER)

function isInt32InRange(value: number, min: number): boolean {
  return Number.isInteger(value) && value >= min && value <= INT32_MAX
}

function isRequestTag(tag: number): tag is RequestTag {
  return (
    tag === MessageTag.DATA ||
    tag === MessageTag.FILE ||
    tag === MessageTag.NEW_CHANNEL ||
    tag === MessageTag.QUIT
  )
}

function requireLength(buffer: Uint8Array, expected: number, what: string): void {
  if (buffer.length < expected) {
    throw new ProtocolError(
      `Truncated ${what}: expected ${expected} bytes, got ${buffer.length}`
    )
  }
}

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length)
}

function encodeTagOnly(tag: MessageTag): Buffer {
  const buf = Buffer.alloc(TAG_SIZE)
  buf.writeUInt32LE(tag, 0)
  return buf
}

/**
 * Encode a new-channel request (tag only).
 */
export function encodeNewChannelRequest(): Buffer {
  return encodeTagOnly(MessageTag.NEW_CHANNEL)
}

/**
 * Encode a quit message (tag only). Quit is the only message without a reply.
 */
export function encodeQuit(): Buffer {
  return encodeTagOnly(MessageTag.QUIT)
}

/**
 * Validate the fields of a sample request.
 * @throws RequestValidationError if a field is out of range
 */
export function validateSampleRequest(request: SampleRequest): void {
  if (!isInt32InRange(request.subjectId, 0)) {
    throw new RequestValidationError(
      `subjectId must be an integer between 0 and ${INT32_MAX}, got ${request.subjectId}`
    )
  }
  if (!Number.isFinite(request.timestamp) || request.timestamp < 0) {
    throw new RequestValidationError(
      `timestamp must be a finite number >= 0, got ${request.timestamp}`
    )
  }
  if (!isInt32InRange(request.seriesIndex, 1)) {
    throw new RequestValidationError(
      `seriesIndex must be an integer between 1 and ${INT32_MAX}, got ${request.seriesIndex}`
    )
  }
}

/**
 * Encode a sample request (20 bytes).
 * @throws RequestValidationError if a field is out of range
 */
export function encodeSampleRequest(request: SampleRequest): Buffer {
  validateSampleRequest(request)

  const buf = Buffer.alloc(SAMPLE_REQUEST_SIZE)
  buf.writeUInt32LE(MessageTag.DATA, 0)
  buf.writeInt32LE(request.subjectId, 4)
  buf.writeDoubleLE(request.timestamp, 8)
  buf.writeInt32LE(request.seriesIndex, 16)
  return buf
}

/**
 * Number of bytes {@link encodeFileRequest} produces for the given name.
 */
export function encodedFileRequestSize(fileName: string): number {
  return FILE_REQUEST_HEADER_SIZE + Buffer.byteLength(fileName, 'utf-8') + 1
}

/**
 * Validate the fields of a file request.
 * @throws RequestValidationError if a field is out of range
 */
export function validateFileRequest(request: FileChunkRequest): void {
  if (!Number.isSafeInteger(request.offset) || request.offset < 0) {
    throw new RequestValidationError(`offset must be a safe integer >= 0, got ${request.offset}`)
  }
  if (!isInt32InRange(request.length, 0)) {
    throw new RequestValidationError(
      `length must be an integer between 0 and ${INT32_MAX}, got ${request.length}`
    )
  }
  if (request.fileName === '') {
    throw new RequestValidationError('fileName must not be empty')
  }
  if (request.fileName.includes('\0')) {
    throw new RequestValidationError('fileName must not contain NUL')
  }
}

/**
 * Encode a file request: fixed fields, the utf-8 file name and a NUL.
 * @throws RequestValidationError if a field is out of range
 */
export function encodeFileRequest(request: FileChunkRequest): Buffer {
  validateFileRequest(request)

  const name = Buffer.from(request.fileName, 'utf-8')
  // alloc() zero-fills, which also writes the NUL terminator
  const buf = Buffer.alloc(FILE_REQUEST_HEADER_SIZE + name.length + 1)
  buf.writeUInt32LE(MessageTag.FILE, 0)
  buf.writeBigInt64LE(BigInt(request.offset), 4)
  buf.writeInt32LE(request.length, 12)
  name.copy(buf, FILE_REQUEST_HEADER_SIZE)
  return buf
}

/**
 * Decode the message-type tag at the start of a buffer.
 * @throws ProtocolError on a short buffer or unknown tag
 */
export function decodeTag(bytes: Uint8Array): RequestTag {
  requireLength(bytes, TAG_SIZE, 'message tag')
  const tag = asBuffer(bytes).readUInt32LE(0)
  if (!isRequestTag(tag)) {
    throw new ProtocolError(`Unknown message tag ${tag}`)
  }
  return tag
}

/**
 * Decode the body of a sample request (the 16 bytes after the tag).
 */
export function decodeSampleRequestBody(bytes: Uint8Array): SampleRequest {
  requireLength(bytes, SAMPLE_REQUEST_BODY_SIZE, 'sample request')
  const buf = asBuffer(bytes)
  return {
    subjectId: buf.readInt32LE(0),
    timestamp: buf.readDoubleLE(4),
    seriesIndex: buf.readInt32LE(12)
  }
}

/**
 * Decode the fixed fields of a file request (the 12 bytes after the tag).
 */
export function decodeFileRequestFields(bytes: Uint8Array): { offset: number; length: number } {
  requireLength(bytes, FILE_REQUEST_FIELDS_SIZE, 'file request')
  const buf = asBuffer(bytes)
  const offset = buf.readBigInt64LE(0)
  const length = buf.readInt32LE(8)

  if (offset < 0n || offset > MAX_SAFE_BIGINT) {
    throw new ProtocolError(`File request offset out of range: ${offset}`)
  }
  if (length < 0) {
    throw new ProtocolError(`File request length out of range: ${length}`)
  }
  return { offset: Number(offset), length }
}

/**
 * Decode a NUL-terminated file name.
 * @throws ProtocolError if the terminator is missing or the name is empty
 */
export function decodeFileName(bytes: Uint8Array): string {
  const buf = asBuffer(bytes)
  const end = buf.indexOf(NUL)
  if (end === -1) {
    throw new ProtocolError('File request name is not NUL-terminated')
  }
  if (end === 0) {
    throw new ProtocolError('File request name is empty')
  }
  return buf.toString('utf-8', 0, end)
}

/**
 * Decode a complete request message. Structural inverse of the encoders.
 * @throws ProtocolError on a short buffer, unknown tag or malformed file name
 */
export function decodeMessage(bytes: Uint8Array): RequestMessage {
  const tag = decodeTag(bytes)
  switch (tag) {
    case MessageTag.DATA: {
      requireLength(bytes, SAMPLE_REQUEST_SIZE, 'sample request')
      return { type: 'data', ...decodeSampleRequestBody(bytes.subarray(TAG_SIZE)) }
    }
    case MessageTag.FILE: {
      requireLength(bytes, FILE_REQUEST_HEADER_SIZE, 'file request')
      const fields = decodeFileRequestFields(bytes.subarray(TAG_SIZE))
      const fileName = decodeFileName(bytes.subarray(FILE_REQUEST_HEADER_SIZE))
      return { type: 'file', ...fields, fileName }
    }
    case MessageTag.NEW_CHANNEL:
      return { type: 'new_channel' }
    case MessageTag.QUIT:
      return { type: 'quit' }
    default: {
      const _exhaustive: never = tag
      throw new ProtocolError(`Unknown message tag ${String(_exhaustive)}`)
    }
  }
}

/**
 * Encode a sample reply. The server sends NaN when it has no such sample.
 */
export function encodeSampleReply(value: number): Buffer {
  const buf = Buffer.alloc(SAMPLE_REPLY_SIZE)
  buf.writeDoubleLE(value, 0)
  return buf
}

/**
 * Decode the reply to `request`.
 *
 * @throws SampleUnavailableError if the server sent the NaN sentinel
 * @throws ProtocolError on a short buffer or an infinite value
 */
export function decodeSampleReply(bytes: Uint8Array, request: SampleRequest): number {
  requireLength(bytes, SAMPLE_REPLY_SIZE, 'sample reply')
  const value = asBuffer(bytes).readDoubleLE(0)
  if (Number.isNaN(value)) {
    throw new SampleUnavailableError(request.subjectId, request.timestamp, request.seriesIndex)
  }
  if (!Number.isFinite(value)) {
    throw new ProtocolError(`Sample reply is not finite: ${value}`)
  }
  return value
}

/**
 * Encode a file-size reply. Pass {@link FILE_NOT_FOUND_SIZE} for a missing file.
 */
export function encodeFileSizeReply(size: number | bigint): Buffer {
  const buf = Buffer.alloc(FILE_SIZE_REPLY_SIZE)
  buf.writeBigInt64LE(BigInt(size), 0)
  return buf
}

/**
 * Decode the reply to a size query for `fileName`.
 *
 * @throws RemoteFileNotFoundError if the server sent the not-found sentinel (-1)
 * @throws ProtocolError on a short buffer or any other out-of-range length
 */
export function decodeFileSizeReply(bytes: Uint8Array, fileName: string): number {
  requireLength(bytes, FILE_SIZE_REPLY_SIZE, 'file-size reply')
  const size = asBuffer(bytes).readBigInt64LE(0)
  if (size === FILE_NOT_FOUND_SIZE) {
    throw new RemoteFileNotFoundError(fileName)
  }
  if (size < 0n) {
    throw new ProtocolError(`File-size reply for "${fileName}" is negative: ${size}`)
  }
  if (size > MAX_SAFE_BIGINT) {
    throw new ProtocolError(`File-size reply for "${fileName}" is too large: ${size}`)
  }
  return Number(size)
}

/**
 * Encode a new-channel reply: the name, a NUL and zero padding.
 * @throws ProtocolError if the name is empty, contains NUL or does not fit
 */
export function encodeChannelNameReply(name: string): Buffer {
  const bytes = Buffer.from(name, 'utf-8')
  if (bytes.length === 0 || name.includes('\0')) {
    throw new ProtocolError(`Invalid channel name "${name}"`)
  }
  if (bytes.length >= CHANNEL_NAME_REPLY_SIZE) {
    throw new ProtocolError(
      `Channel name "${name}" does not fit in ${CHANNEL_NAME_REPLY_SIZE} bytes`
    )
  }
  const buf = Buffer.alloc(CHANNEL_NAME_REPLY_SIZE)
  bytes.copy(buf, 0)
  return buf
}

/**
 * Decode a new-channel reply.
 * @throws ProtocolError on a short buffer, missing terminator or empty name
 */
export function decodeChannelNameReply(bytes: Uint8Array): string {
  requireLength(bytes, CHANNEL_NAME_REPLY_SIZE, 'new-channel reply')
  const buf = asBuffer(bytes).subarray(0, CHANNEL_NAME_REPLY_SIZE)
  const end = buf.indexOf(NUL)
  if (end === -1) {
    throw new ProtocolError('New-channel reply is not NUL-terminated')
  }
  if (end === 0) {
    throw new ProtocolError('New-channel reply carries an empty name')
  }
  return buf.toString('utf-8', 0, end)
}
