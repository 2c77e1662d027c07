/**
 * Error taxonomy for the request-channel protocol.
 *
 * Transport errors (missing resources, short reads, closed peers) and
 * protocol errors (malformed or out-of-range messages) are separate class
 * hierarchies. Neither is retried anywhere in the protocol core.
 *
 * @module
 */

/**
 * Failure category of a {@link TransportError}.
 */
export type TransportErrorCode =
  | 'missing'
  | 'create_failed'
  | 'short_read'
  | 'closed'
  | 'write_failed'
  | 'read_failed'

/**
 * Error thrown when the byte transport under a channel fails.
 */
export class TransportError extends Error {
  constructor(
    public readonly code: TransportErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message)
    this.name = 'TransportError'
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

/**
 * Error thrown when an operation is attempted on a channel that was closed
 * (for example after a quit message was sent on it).
 */
export class ChannelClosedError extends TransportError {
  constructor(public readonly channelName: string) {
    super('closed', `Channel "${channelName}" is closed`)
    this.name = 'ChannelClosedError'
  }
}

/**
 * Error thrown when a channel is used after an earlier exchange on it failed.
 * The first failure is kept as the cause.
 */
export class ChannelFailedError extends Error {
  constructor(
    public readonly channelName: string,
    originalCause: unknown
  ) {
    super(`Channel "${channelName}" has previously failed: ${errorMessage(originalCause)}`)
    this.name = 'ChannelFailedError'
    this.cause = originalCause
  }
}

/**
 * Error thrown when a peer sends a message the protocol does not allow.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/**
 * The server answered a size query with the not-found sentinel.
 */
export class RemoteFileNotFoundError extends ProtocolError {
  constructor(public readonly fileName: string) {
    super(`Server reports file "${fileName}" does not exist`)
    this.name = 'RemoteFileNotFoundError'
  }
}

/**
 * The server answered a sample request with the absent-sample sentinel (NaN).
 */
export class SampleUnavailableError extends ProtocolError {
  constructor(
    public readonly subjectId: number,
    public readonly timestamp: number,
    public readonly seriesIndex: number
  ) {
    super(
      `Server has no sample for subject ${subjectId}, time ${timestamp}, series ${seriesIndex}`
    )
    this.name = 'SampleUnavailableError'
  }
}

/**
 * Error thrown when a request cannot be encoded because a field is out of range.
 */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RequestValidationError'
  }
}

/**
 * Error thrown when a configuration value (capacity, chunk size, timeout)
 * is invalid. Raised before any I/O happens.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
