/**
 * Wire constants for the request-channel protocol.
 *
 * Layout version 1 (all integers little-endian, no padding):
 * - new-channel: u32 tag
 * - quit: u32 tag
 * - sample request: u32 tag, i32 subjectId, f64 timestamp, i32 seriesIndex
 * - file request: u32 tag, i64 offset, i32 length, utf-8 name, NUL
 *
 * @module
 */

/**
 * Version of the binary layout described above.
 * Peers agree on it out of band; it is not sent on the wire.
 */
export const WIRE_FORMAT_VERSION = 1

/**
 * Message-type tags. `UNKNOWN` is reserved and never valid on the wire.
 */
export const MessageTag = {
  UNKNOWN: 0,
  DATA: 1,
  FILE: 2,
  NEW_CHANNEL: 3,
  QUIT: 4
} as const

export type MessageTag = (typeof MessageTag)[keyof typeof MessageTag]

/** Tags that may appear on the wire. */
export type RequestTag = Exclude<MessageTag, typeof MessageTag.UNKNOWN>

/** Size of the message-type tag in bytes. */
export const TAG_SIZE = 4

/** Sample request: tag + subjectId + timestamp + seriesIndex. */
export const SAMPLE_REQUEST_SIZE = TAG_SIZE + 4 + 8 + 4

/** Sample request body (everything after the tag). */
export const SAMPLE_REQUEST_BODY_SIZE = SAMPLE_REQUEST_SIZE - TAG_SIZE

/** Fixed portion of a file request: tag + offset + length. */
export const FILE_REQUEST_HEADER_SIZE = TAG_SIZE + 8 + 4

/** Fixed fields of a file request after the tag: offset + length. */
export const FILE_REQUEST_FIELDS_SIZE = FILE_REQUEST_HEADER_SIZE - TAG_SIZE

/** Sample reply: one f64. */
export const SAMPLE_REPLY_SIZE = 8

/** File-size reply: one i64. */
export const FILE_SIZE_REPLY_SIZE = 8

/** New-channel reply: NUL-terminated name in a fixed, zero-padded buffer. */
export const CHANNEL_NAME_REPLY_SIZE = 30

/** File-size reply sent by the server when the file does not exist. */
export const FILE_NOT_FOUND_SIZE = -1n

/** Name of the well-known channel created by the server at startup. */
export const CONTROL_CHANNEL_NAME = 'control'

/** Default buffer capacity in bytes, used when no capacity is given at startup. */
export const DEFAULT_BUFFER_CAPACITY = 256

/**
 * Smallest accepted buffer capacity. Every fixed-size request and a file
 * request with a short name must fit in one transport write.
 */
export const MIN_BUFFER_CAPACITY = 32

/** Largest accepted buffer capacity (16 MiB). */
export const MAX_BUFFER_CAPACITY = 16 * 1024 * 1024

/** Largest value a signed 32-bit wire field can carry. */
export const INT32_MAX = 0x7fffffff
