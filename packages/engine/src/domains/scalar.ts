/**
 * Scalar Domains
 *
 * The four ordered domains spans are defined over. `int` and `date` are
 * discrete: their spans are kept canonical as [lower, upper).
 */

import type { ScalarDomain } from "@tempora/contracts";
import {
  formatDate,
  formatTimestamp,
  parseDate,
  parseTimestamp,
} from "../time/timestamps";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$|^[+-]?(inf|infinity)$/i;

/**
 * Shortest exact decimal form, optionally rounded to `maxDecimals`
 * fractional digits with trailing zeros dropped.
 */
export function formatNumber(value: number, maxDecimals?: number): string {
  if (maxDecimals === undefined || !Number.isFinite(value)) {
    return String(value);
  }
  const rounded = Number(value.toFixed(maxDecimals));
  return String(Object.is(rounded, -0) ? 0 : rounded);
}

export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

export function parseFloatValue(text: string): number | null {
  const trimmed = text.trim();
  if (!FLOAT_PATTERN.test(trimmed)) return null;
  if (/inf/i.test(trimmed)) {
    return trimmed.startsWith("-") ? -Infinity : Infinity;
  }
  return Number(trimmed);
}

export const IntDomain: ScalarDomain<"int"> = {
  kind: "int",
  discrete: true,
  isValid: (value) => Number.isSafeInteger(value),
  snap: (value) => Math.floor(value),
  format: (value) => String(value),
  parse: parseInteger,
};

export const FloatDomain: ScalarDomain<"float"> = {
  kind: "float",
  discrete: false,
  isValid: (value) => !Number.isNaN(value),
  snap: (value) => value,
  format: (value) => formatNumber(value),
  parse: parseFloatValue,
};

export const TimestampDomain: ScalarDomain<"timestamp"> = {
  kind: "timestamp",
  discrete: false,
  isValid: (value) => Number.isSafeInteger(value),
  snap: (value) => Math.floor(value),
  format: formatTimestamp,
  parse: parseTimestamp,
};

export const DateDomain: ScalarDomain<"date"> = {
  kind: "date",
  discrete: true,
  isValid: (value) => Number.isSafeInteger(value),
  snap: (value) => Math.floor(value),
  format: formatDate,
  parse: parseDate,
};

export const SCALAR_DOMAINS = {
  int: IntDomain,
  float: FloatDomain,
  timestamp: TimestampDomain,
  date: DateDomain,
} as const;
