export type Micros = number;    // microseconds (durations, offsets)
export type Timestamp = number; // microseconds since 1970-01-01T00:00:00Z
export type Days = number;      // days since 1970-01-01

export const USECS_PER_MSEC = 1_000;
export const USECS_PER_SEC = 1_000_000;
export const USECS_PER_MINUTE = 60 * USECS_PER_SEC;
export const USECS_PER_HOUR = 60 * USECS_PER_MINUTE;
export const USECS_PER_DAY = 24 * USECS_PER_HOUR;

/**
 * Timestamps are safe-integer microseconds, which covers
 * 1684-07-28 00:12:25.259009 to 2255-06-05 23:47:34.740991 UTC.
 */
export const MIN_TIMESTAMP: Timestamp = -Number.MAX_SAFE_INTEGER;
export const MAX_TIMESTAMP: Timestamp = Number.MAX_SAFE_INTEGER;
