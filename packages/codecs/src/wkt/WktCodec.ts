/**
 * WKT Codec
 *
 * Text form of temporal values, spans and span sets:
 *
 *   1.5@2000-01-01 00:00:00+00
 *   SRID=4326;Interp=Step;[POINT(1 1)@2000-01-01 00:00:00+00, ...]
 *   {[1, 2), [3, 4)}
 *
 * Decoding needs the value domain, since "1@..." reads as either an int
 * or a float.
 */

import type {
  AnyValueDomain,
  BoolDomain,
  DecodeResult,
  NumberDomain,
  Point,
  PointDomain,
  ScalarDomain,
  ScalarKind,
  TextDomain,
  WktConfig,
} from "@tempora/contracts";
import {
  isPointDomain,
  visitTemporal,
  withSrid,
  type AnyTemporal,
  type Span,
  type SpanSet,
  type Temporal,
} from "@tempora/engine";
import { toDecodeResult } from "../shared/result";
import { Scanner } from "./Scanner";
import { readSpan, readSpanSet, readSrid, readStepMarker, readTemporal } from "./reader";
import { BOOL_WKT, TEXT_WKT, numberWkt, pointWkt } from "./values";
import { writeSpan, writeSpanSet, writeTemporal } from "./writer";

const DEFAULT_CONFIG: WktConfig = {
  maxDecimals: undefined,
  debug: false,
};

export class WktCodec {
  private config: WktConfig;

  constructor(config: Partial<WktConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    const { maxDecimals } = this.config;
    if (maxDecimals !== undefined && !(Number.isInteger(maxDecimals) && maxDecimals >= 0)) {
      throw new RangeError(`maxDecimals must be a non-negative integer, got ${maxDecimals}`);
    }
  }

  // ==========================================================================
  // Temporal values
  // ==========================================================================

  encode(temporal: AnyTemporal): string {
    const { maxDecimals } = this.config;
    return visitTemporal(temporal, {
      bool: (t) => writeTemporal(t, BOOL_WKT.write),
      number: (t) =>
        writeTemporal(t, numberWkt(t.domain.kind === "int" ? "int" : "float", maxDecimals).write),
      text: (t) => writeTemporal(t, TEXT_WKT.write),
      point: (t) => {
        const srid = isPointDomain(t.domain) ? t.domain.srid : 0;
        const prefix = srid !== 0 ? `SRID=${srid};` : "";
        return prefix + writeTemporal(t, pointWkt(maxDecimals).write);
      },
    });
  }

  /**
   * Parse a temporal value of `domain`. A point value's `SRID=` prefix
   * overrides the domain's SRID.
   * @throws ParseError
   */
  decode(text: string, domain: PointDomain): Temporal<Point>;
  decode(text: string, domain: NumberDomain): Temporal<number>;
  decode(text: string, domain: BoolDomain): Temporal<boolean>;
  decode(text: string, domain: TextDomain): Temporal<string>;
  decode(text: string, domain: AnyValueDomain): AnyTemporal {
    return this.decodeAny(text, domain);
  }

  safeDecode(text: string, domain: PointDomain): DecodeResult<Temporal<Point>>;
  safeDecode(text: string, domain: NumberDomain): DecodeResult<Temporal<number>>;
  safeDecode(text: string, domain: BoolDomain): DecodeResult<Temporal<boolean>>;
  safeDecode(text: string, domain: TextDomain): DecodeResult<Temporal<string>>;
  safeDecode(text: string, domain: AnyValueDomain): DecodeResult<AnyTemporal> {
    return toDecodeResult(() => this.decodeAny(text, domain));
  }

  private decodeAny(text: string, domain: AnyValueDomain): AnyTemporal {
    const scanner = new Scanner(text);
    const srid = readSrid(scanner);
    const step = readStepMarker(scanner);
    const temporal = this.readBody(scanner, domain, srid, step);
    if (!scanner.atEnd()) {
      throw scanner.fail("unexpected trailing input");
    }
    return temporal;
  }

  private readBody(
    scanner: Scanner,
    domain: AnyValueDomain,
    srid: number | null,
    step: boolean
  ): AnyTemporal {
    switch (domain.kind) {
      case "point": {
        if (srid === null) return readTemporal(scanner, domain, pointWkt(), step);
        if (this.config.debug && srid !== domain.srid) {
          console.log(`[WktCodec] SRID ${srid} overrides domain SRID ${domain.srid}`);
        }
        return readTemporal(scanner, withSrid(domain, srid), pointWkt(), step);
      }
      case "bool":
        return readTemporal(scanner, this.rejectSrid(scanner, srid, domain), BOOL_WKT, step);
      case "int":
      case "float":
        return readTemporal(
          scanner,
          this.rejectSrid(scanner, srid, domain),
          numberWkt(domain.kind),
          step
        );
      case "text":
        return readTemporal(scanner, this.rejectSrid(scanner, srid, domain), TEXT_WKT, step);
    }
  }

  private rejectSrid<D extends AnyValueDomain>(scanner: Scanner, srid: number | null, domain: D): D {
    if (srid !== null) {
      throw scanner.fail(`SRID is only valid for point values, not ${domain.kind}`, 0);
    }
    return domain;
  }

  // ==========================================================================
  // Spans
  // ==========================================================================

  encodeSpan<K extends ScalarKind>(span: Span<K>): string {
    return writeSpan(span, this.config.maxDecimals);
  }

  /** @throws ParseError */
  decodeSpan<K extends ScalarKind>(text: string, domain: ScalarDomain<K>): Span<K> {
    const scanner = new Scanner(text);
    const span = readSpan(scanner, domain);
    if (!scanner.atEnd()) throw scanner.fail("unexpected trailing input");
    return span;
  }

  encodeSpanSet<K extends ScalarKind>(set: SpanSet<K>): string {
    return writeSpanSet(set, this.config.maxDecimals);
  }

  /** @throws ParseError */
  decodeSpanSet<K extends ScalarKind>(text: string, domain: ScalarDomain<K>): SpanSet<K> {
    const scanner = new Scanner(text);
    const set = readSpanSet(scanner, domain);
    if (!scanner.atEnd()) throw scanner.fail("unexpected trailing input");
    return set;
  }
}
