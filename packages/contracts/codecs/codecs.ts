/**
 * Codec Configuration
 *
 * Options shared by the WKT, WKB and MF-JSON codecs.
 */

import type { ParseError } from "../errors/errors";
import type { Srid } from "../values/values";

export type WkbVariant = "basic" | "extended";

export interface WktConfig {
  /**
   * Maximum number of decimal digits written for float values and point
   * coordinates. Undefined writes the shortest exact representation.
   */
  maxDecimals?: number;

  /** Log decoding decisions to the console. @default false */
  debug?: boolean;
}

export interface WkbConfig {
  /**
   * basic: header + elements.
   * extended: version byte prefix, SRID written for point values.
   * @default "basic"
   */
  variant: WkbVariant;

  /** @default false */
  debug?: boolean;
}

export interface MfJsonConfig {
  /** Indent output. Parsing accepts both renderings. @default false */
  pretty: boolean;

  /**
   * Decimal digits kept for floats and coordinates. Undefined writes the
   * shortest representation that reads back as the same double.
   */
  precision?: number;

  /** Write "bbox" and "period" members. @default false */
  withBBox: boolean;

  /**
   * Spatial reference written as the crs name, overriding the value's own
   * SRID. Written as "EPSG:<srid>" when absent and the SRID is non-zero.
   */
  srs?: string;

  /**
   * SRID assigned to points when the input has no crs. Undefined keeps
   * the SRID of the domain passed to decode.
   */
  defaultSrid?: Srid;

  /** @default false */
  debug?: boolean;
}

/**
 * Result of a non-throwing decode.
 */
export type DecodeResult<T> =
  | { success: true; data: T }
  | { success: false; error: ParseError };
