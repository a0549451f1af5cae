/**
 * Duration parsing and formatting
 */

import { ValidationError, ErrorCode } from '@tasklane/core';
import type { Duration, DurationString } from './types.js';

export const DURATION_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
} as const;

type DurationUnit = keyof typeof DURATION_UNITS;

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/;

function isDurationUnit(value: string): value is DurationUnit {
  return value in DURATION_UNITS;
}

export function isDurationString(value: unknown): value is DurationString {
  return typeof value === 'string' && DURATION_PATTERN.test(value);
}

/**
 * '5m' → 300000
 */
export function parseDuration(value: string, field = 'duration'): Duration {
  const match = value.trim().match(DURATION_PATTERN);
  const unit = match?.[2];
  if (!match || unit === undefined || !isDurationUnit(unit)) {
    throw new ValidationError(
      `Invalid duration format: '${value}'. Expected format: <number><unit> (e.g., '500ms', '5m', '1h')`,
      ErrorCode.INVALID_CONFIG,
      { field, value, expected: '<number><unit> where unit is ms, s, m, h, or d' }
    );
  }

  const result = parseFloat(match[1]) * DURATION_UNITS[unit];
  if (!Number.isFinite(result)) {
    throw new ValidationError(`Duration overflow: '${value}' produces non-finite value`, ErrorCode.INVALID_CONFIG, {
      field,
      value,
    });
  }
  return Math.round(result);
}

/**
 * Numbers are taken as milliseconds; numeric strings too
 */
export function parseDurationValue(value: unknown, field = 'duration'): Duration {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(
        `Invalid duration value: ${value}. Must be a non-negative finite number`,
        ErrorCode.INVALID_CONFIG,
        { field, value, expected: 'non-negative finite number' }
      );
    }
    return Math.round(value);
  }
  if (typeof value === 'string') {
    if (/^\d+$/.test(value.trim())) {
      return Number(value.trim());
    }
    return parseDuration(value, field);
  }
  throw new ValidationError(`Invalid duration value for ${field}`, ErrorCode.INVALID_CONFIG, {
    field,
    value,
    expected: 'number of milliseconds or duration string',
  });
}

export function formatDuration(ms: Duration): string {
  if (ms >= DURATION_UNITS.d && ms % DURATION_UNITS.d === 0) {
    return `${ms / DURATION_UNITS.d}d`;
  }
  if (ms >= DURATION_UNITS.h && ms % DURATION_UNITS.h === 0) {
    return `${ms / DURATION_UNITS.h}h`;
  }
  if (ms >= DURATION_UNITS.m && ms % DURATION_UNITS.m === 0) {
    return `${ms / DURATION_UNITS.m}m`;
  }
  if (ms >= DURATION_UNITS.s && ms % DURATION_UNITS.s === 0) {
    return `${ms / DURATION_UNITS.s}s`;
  }
  return `${ms}ms`;
}
