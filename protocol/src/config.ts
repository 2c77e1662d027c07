/**
 * Validation of the values peers agree on out of band.
 *
 * @module
 */

import { DEFAULT_BUFFER_CAPACITY, MAX_BUFFER_CAPACITY, MIN_BUFFER_CAPACITY } from './constants.js'
import { ConfigError } from './errors.js'

/** Default time a client waits for a channel's named resources to appear. */
export const DEFAULT_ATTACH_TIMEOUT_MS = 5_000

/**
 * Validate a buffer capacity.
 * @throws ConfigError if the value is not an integer within the accepted range
 */
export function validateBufferCapacity(capacity: number): number {
  if (
    !Number.isInteger(capacity) ||
    capacity < MIN_BUFFER_CAPACITY ||
    capacity > MAX_BUFFER_CAPACITY
  ) {
    throw new ConfigError(
      `buffer capacity must be an integer between ${MIN_BUFFER_CAPACITY} and ${MAX_BUFFER_CAPACITY}, got ${capacity}`
    )
  }
  return capacity
}

/**
 * Parse a buffer capacity from a command-line or environment string.
 * An absent value yields {@link DEFAULT_BUFFER_CAPACITY}.
 *
 * @throws ConfigError if the string is not a decimal integer in range
 */
export function parseBufferCapacity(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_BUFFER_CAPACITY
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`buffer capacity must be a decimal integer, got "${raw}"`)
  }
  return validateBufferCapacity(Number.parseInt(raw.trim(), 10))
}

/**
 * Parse an attach timeout in milliseconds.
 * An absent value yields {@link DEFAULT_ATTACH_TIMEOUT_MS}.
 *
 * @throws ConfigError if the string is not a non-negative integer
 */
export function parseAttachTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_ATTACH_TIMEOUT_MS
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`attach timeout must be a non-negative integer, got "${raw}"`)
  }
  return Number.parseInt(raw.trim(), 10)
}
