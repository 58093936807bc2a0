/**
 * Timestamp Text Conversion
 *
 * Timestamps are integer microseconds since the Unix epoch, always UTC.
 * Calendar arithmetic uses the proleptic Gregorian calendar on plain
 * integers so that microsecond precision survives. Only timestamps between
 * MIN_TIMESTAMP and MAX_TIMESTAMP (years 1684 to 2255) are representable.
 */

import type { Timestamp, Days } from "@tempora/contracts";
import {
  USECS_PER_DAY,
  USECS_PER_HOUR,
  USECS_PER_MINUTE,
  USECS_PER_SEC,
} from "@tempora/contracts";

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Days from 1970-01-01 to the given civil date.
 * Month is 1-based.
 */
export function daysFromCivil(year: number, month: number, day: number): Days {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const mp = (month + 9) % 12;
  const doy = Math.floor((153 * mp + 2) / 5) + day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146097 + doe - 719468;
}

export function civilFromDays(days: Days): {
  year: number;
  month: number;
  day: number;
} {
  const z = days + 719468;
  const era = Math.floor(z / 146097);
  const doe = z - era * 146097;
  const yoe = Math.floor(
    (doe - Math.floor(doe / 1460) + Math.floor(doe / 36524) - Math.floor(doe / 146096)) / 365
  );
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  return { year: yoe + era * 400 + (month <= 2 ? 1 : 0), month, day };
}

function daysInMonth(year: number, month: number): number {
  return daysFromCivil(month === 12 ? year + 1 : year, month === 12 ? 1 : month + 1, 1) -
    daysFromCivil(year, month, 1);
}

function isValidDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function parseOffset(zone: string | undefined): number | null {
  if (zone === undefined || zone.toUpperCase() === "Z") return 0;
  const sign = zone[0] === "-" ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  if (hours > 15 || minutes >= 60) return null;
  return sign * (hours * USECS_PER_HOUR + minutes * USECS_PER_MINUTE);
}

/**
 * Parse `YYYY-MM-DD[ HH:MM[:SS[.ffffff]]][Z|±HH[:MM]]`.
 * A missing zone means UTC. Returns null for anything else, including
 * instants outside the representable range.
 */
export function parseTimestamp(text: string): Timestamp | null {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  if (!isValidDate(year, month, day)) return null;

  const hour = h === undefined ? 0 : Number(h);
  const minute = mi === undefined ? 0 : Number(mi);
  const second = s === undefined ? 0 : Number(s);
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offset = parseOffset(zone);
  if (offset === null) return null;

  const micros = frac === undefined ? 0 : Number(frac.padEnd(6, "0"));
  const t =
    daysFromCivil(year, month, day) * USECS_PER_DAY +
    hour * USECS_PER_HOUR +
    minute * USECS_PER_MINUTE +
    second * USECS_PER_SEC +
    micros -
    offset;
  return Number.isSafeInteger(t) ? t : null;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

function splitTimestamp(t: Timestamp): { date: string; time: string } {
  const days = Math.floor(t / USECS_PER_DAY);
  let rest = t - days * USECS_PER_DAY;
  const hour = Math.floor(rest / USECS_PER_HOUR);
  rest -= hour * USECS_PER_HOUR;
  const minute = Math.floor(rest / USECS_PER_MINUTE);
  rest -= minute * USECS_PER_MINUTE;
  const second = Math.floor(rest / USECS_PER_SEC);
  const micros = rest - second * USECS_PER_SEC;

  let time = `${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}`;
  if (micros > 0) {
    time += "." + pad(micros, 6).replace(/0+$/, "");
  }
  return { date: formatDate(days), time };
}

/** `2000-01-01 00:00:00+00`, with trailing-zero-trimmed microseconds. */
export function formatTimestamp(t: Timestamp): string {
  const { date, time } = splitTimestamp(t);
  return `${date} ${time}+00`;
}

/** ISO 8601 form used by MF-JSON: `2000-01-01T00:00:00Z`. */
export function formatIsoTimestamp(t: Timestamp): string {
  const { date, time } = splitTimestamp(t);
  return `${date}T${time}Z`;
}

export function parseDate(text: string): Days | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!isValidDate(year, month, day)) return null;
  return daysFromCivil(year, month, day);
}

export function formatDate(days: Days): string {
  const { year, month, day } = civilFromDays(days);
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/** Build a timestamp from calendar parts (UTC). Month is 1-based. */
export function timestamp(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  micros = 0
): Timestamp {
  return (
    daysFromCivil(year, month, day) * USECS_PER_DAY +
    hour * USECS_PER_HOUR +
    minute * USECS_PER_MINUTE +
    second * USECS_PER_SEC +
    micros
  );
}
