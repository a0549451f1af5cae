/**
 * Timestamps and clocks
 *
 * Every persisted time is an ISO 8601 UTC string so that lexical order
 * matches chronological order in SQLite comparisons.
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

/**
 * Timestamp type - ISO 8601 formatted string
 * Format: YYYY-MM-DDTHH:mm:ss.sssZ
 */
export type Timestamp = string;

/**
 * Source of the current time. Injected everywhere a deadline is computed.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/;

export function isValidTimestamp(value: unknown): value is Timestamp {
  if (typeof value !== 'string' || !TIMESTAMP_PATTERN.test(value)) {
    return false;
  }
  // Rejects rolled-over dates such as Feb 30
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    return false;
  }
  return date.toISOString().slice(0, 10) === value.slice(0, 10);
}

export function validateTimestamp(value: unknown, field: string): Timestamp {
  if (!isValidTimestamp(value)) {
    throw new ValidationError(
      `Invalid timestamp format for ${field}. Expected ISO 8601 format (YYYY-MM-DDTHH:mm:ss.sssZ)`,
      ErrorCode.INVALID_TIMESTAMP,
      { field, value, expected: 'YYYY-MM-DDTHH:mm:ss.sssZ' }
    );
  }
  return value;
}

/**
 * Creates a timestamp for the given clock (system time by default)
 */
export function createTimestamp(clock: Clock = systemClock): Timestamp {
  return clock().toISOString();
}

/**
 * Timestamp `seconds` after `from`
 */
export function addSeconds(from: Date, seconds: number): Timestamp {
  return new Date(from.getTime() + seconds * 1000).toISOString();
}

export function parseTimestamp(timestamp: Timestamp): Date {
  return new Date(timestamp);
}
