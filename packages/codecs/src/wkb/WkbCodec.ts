/**
 * WKB Codec
 *
 * Little-endian binary form of temporal values, spans and span sets.
 *
 *   [version:u8]                       extended variant only (0x81)
 *   [type:u8][interp:u8][domain:u8][flags:u8]
 *   [srid:i32]                         extended variant, point values only
 *   [count:u32][elements...]
 *
 * Elements are (value, timestamp:i64) pairs. A sequence set counts its
 * sequences and writes each as [flags:u8][count:u32][elements...].
 * Spans: [type:u8][scalar:u8][flags:u8][lower][upper]; span sets:
 * [type:u8][scalar:u8][count:u32] then [flags:u8][lower][upper] per span.
 *
 * Decoding is strict: truncated input, unknown tags and trailing bytes
 * are ParseErrors carrying the byte offset.
 */

import type {
  AnyValueDomain,
  BoolDomain,
  DecodeResult,
  Interpolation,
  NumberDomain,
  Point,
  PointDomain,
  ScalarDomain,
  ScalarKind,
  TextDomain,
  ValueDomain,
  WkbConfig,
} from "@tempora/contracts";
import { InvalidTemporalError } from "@tempora/contracts";
import {
  Span,
  SpanSet,
  TInstant,
  TSequence,
  TSequenceSet,
  isInstant,
  isPointDomain,
  isSequence,
  visitTemporal,
  withSrid,
  type AnyTemporal,
  type Temporal,
} from "@tempora/engine";
import { construct, toDecodeResult } from "../shared/result";
import { ByteReader, ByteWriter, fromHex, toHex } from "./bytes";
import {
  DomainTag,
  EXTENDED_VERSION,
  Flags,
  InterpolationTag,
  ScalarTag,
  TypeTag,
  interpolationFromTag,
} from "./tags";
import {
  BOOL_WKB,
  FLOAT_WKB,
  INT_WKB,
  TEXT_WKB,
  pointWkb,
  type WkbValueFormat,
} from "./values";

const DEFAULT_CONFIG: WkbConfig = {
  variant: "basic",
  debug: false,
};

const KNOWN_FLAGS = Flags.lowerInclusive | Flags.upperInclusive | Flags.hasZ;

interface TemporalHeader {
  type: number;
  interpolation: Interpolation;
  flags: number;
  srid: number | null;
  count: number;
  /** Offset of the type byte. */
  start: number;
}

function boundFlags(lowerInclusive: boolean, upperInclusive: boolean): number {
  return (lowerInclusive ? Flags.lowerInclusive : 0) | (upperInclusive ? Flags.upperInclusive : 0);
}

function domainTag(domain: AnyValueDomain): number {
  switch (domain.kind) {
    case "point":
      return domain.geometry.geodetic ? DomainTag.geogpoint : DomainTag.geompoint;
    case "bool":
    case "int":
    case "float":
    case "text":
      return DomainTag[domain.kind];
  }
}

/** Z flag for a point value; every point must agree. */
function pointDimensions(temporal: Temporal<Point>): boolean {
  const points = temporal.values();
  const withZ = points.filter((p) => p.z !== undefined).length;
  if (withZ !== 0 && withZ !== points.length) {
    throw new InvalidTemporalError("Cannot encode a mix of 2D and 3D points");
  }
  return withZ > 0;
}

export class WkbCodec {
  private config: WkbConfig;

  constructor(config: Partial<WkbConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private get extended(): boolean {
    return this.config.variant === "extended";
  }

  // ==========================================================================
  // Encoding
  // ==========================================================================

  encode(temporal: AnyTemporal): Uint8Array {
    const writer = new ByteWriter();
    if (this.extended) writer.u8(EXTENDED_VERSION);

    visitTemporal<void>(temporal, {
      bool: (t) => this.writeTemporal(writer, t, DomainTag.bool, BOOL_WKB, 0, null),
      number: (t) =>
        t.domain.kind === "int"
          ? this.writeTemporal(writer, t, DomainTag.int, INT_WKB, 0, null)
          : this.writeTemporal(writer, t, DomainTag.float, FLOAT_WKB, 0, null),
      text: (t) => this.writeTemporal(writer, t, DomainTag.text, TEXT_WKB, 0, null),
      point: (t) => {
        const { domain } = t;
        const hasZ = pointDimensions(t);
        const geodetic = isPointDomain(domain) && domain.geometry.geodetic;
        const srid = isPointDomain(domain) ? domain.srid : 0;
        this.writeTemporal(
          writer,
          t,
          geodetic ? DomainTag.geogpoint : DomainTag.geompoint,
          pointWkb(hasZ),
          hasZ ? Flags.hasZ : 0,
          this.extended ? srid : null
        );
      },
    });
    return writer.toBytes();
  }

  encodeHex(temporal: AnyTemporal): string {
    return toHex(this.encode(temporal));
  }

  private writeTemporal<V>(
    writer: ByteWriter,
    temporal: Temporal<V>,
    tag: number,
    format: WkbValueFormat<V>,
    extraFlags: number,
    srid: number | null
  ): void {
    const writeElements = (instants: TInstant<V>[]) => {
      writer.u32(instants.length);
      for (const inst of instants) {
        format.write(writer, inst.value);
        writer.i64(inst.timestamp);
      }
    };
    const header = (type: number, flags: number) => {
      writer.u8(type).u8(InterpolationTag[temporal.interpolation]).u8(tag).u8(flags | extraFlags);
      if (srid !== null) writer.i32(srid);
    };

    if (isInstant(temporal)) {
      header(TypeTag.instant, boundFlags(true, true));
      writeElements([temporal]);
    } else if (isSequence(temporal)) {
      header(TypeTag.sequence, boundFlags(temporal.lowerInclusive, temporal.upperInclusive));
      writeElements(temporal.instants());
    } else {
      const sequences = temporal.sequences();
      header(TypeTag.sequenceSet, 0);
      writer.u32(sequences.length);
      for (const seq of sequences) {
        writer.u8(boundFlags(seq.lowerInclusive, seq.upperInclusive));
        writeElements(seq.instants());
      }
    }
  }

  // ==========================================================================
  // Decoding
  // ==========================================================================

  /**
   * Decode a temporal value of `domain`. The domain tag in the input must
   * match; the extended variant's SRID overrides the domain's.
   * @throws ParseError
   */
  decode(bytes: Uint8Array, domain: PointDomain): Temporal<Point>;
  decode(bytes: Uint8Array, domain: NumberDomain): Temporal<number>;
  decode(bytes: Uint8Array, domain: BoolDomain): Temporal<boolean>;
  decode(bytes: Uint8Array, domain: TextDomain): Temporal<string>;
  decode(bytes: Uint8Array, domain: AnyValueDomain): AnyTemporal {
    return this.decodeAny(bytes, domain);
  }

  decodeHex(hex: string, domain: PointDomain): Temporal<Point>;
  decodeHex(hex: string, domain: NumberDomain): Temporal<number>;
  decodeHex(hex: string, domain: BoolDomain): Temporal<boolean>;
  decodeHex(hex: string, domain: TextDomain): Temporal<string>;
  decodeHex(hex: string, domain: AnyValueDomain): AnyTemporal {
    return this.decodeAny(fromHex(hex), domain);
  }

  /** Accepts raw bytes or hex text. */
  safeDecode(input: Uint8Array | string, domain: PointDomain): DecodeResult<Temporal<Point>>;
  safeDecode(input: Uint8Array | string, domain: NumberDomain): DecodeResult<Temporal<number>>;
  safeDecode(input: Uint8Array | string, domain: BoolDomain): DecodeResult<Temporal<boolean>>;
  safeDecode(input: Uint8Array | string, domain: TextDomain): DecodeResult<Temporal<string>>;
  safeDecode(input: Uint8Array | string, domain: AnyValueDomain): DecodeResult<AnyTemporal> {
    return toDecodeResult(() =>
      this.decodeAny(typeof input === "string" ? fromHex(input) : input, domain)
    );
  }

  private decodeAny(bytes: Uint8Array, domain: AnyValueDomain): AnyTemporal {
    const reader = new ByteReader(bytes);
    const extended = this.readVersion(reader);
    const header = this.readHeader(reader, domain, extended);
    const temporal = this.readBody(reader, header, domain);
    if (reader.remaining > 0) {
      throw reader.fail(`${reader.remaining} trailing byte(s)`);
    }
    return temporal;
  }

  private readVersion(reader: ByteReader): boolean {
    const first = reader.peekU8();
    if (first === null || (first & 0x80) === 0) return false;
    const version = reader.u8();
    if (version !== EXTENDED_VERSION) {
      throw reader.fail(`unsupported WKB version ${version & 0x7f}`, 0);
    }
    return true;
  }

  private readHeader(reader: ByteReader, domain: AnyValueDomain, extended: boolean): TemporalHeader {
    const start = reader.position;
    const type = reader.u8();
    if (type !== TypeTag.instant && type !== TypeTag.sequence && type !== TypeTag.sequenceSet) {
      throw reader.fail(`expected a temporal type tag, found ${type}`, start);
    }

    const interpolationAt = reader.position;
    const interpolation = interpolationFromTag(reader.u8());
    if (interpolation === null) {
      throw reader.fail("unknown interpolation tag", interpolationAt);
    }

    const domainAt = reader.position;
    const tag = reader.u8();
    const expected = domainTag(domain);
    if (tag !== expected) {
      throw reader.fail(`domain tag ${tag} does not match ${domain.kind} (${expected})`, domainAt);
    }

    const flagsAt = reader.position;
    const flags = reader.u8();
    if ((flags & ~KNOWN_FLAGS) !== 0) {
      throw reader.fail(`unknown flag bits 0x${flags.toString(16)}`, flagsAt);
    }
    if ((flags & Flags.hasZ) !== 0 && domain.kind !== "point") {
      throw reader.fail(`Z flag set on a ${domain.kind} value`, flagsAt);
    }

    const srid = extended && domain.kind === "point" ? reader.i32() : null;
    const count = reader.u32();
    if (type === TypeTag.instant && (count !== 1 || interpolation !== "discrete")) {
      throw reader.fail("an instant holds exactly one discrete element", start);
    }
    return { type, interpolation, flags, srid, count, start };
  }

  private readBody(reader: ByteReader, header: TemporalHeader, domain: AnyValueDomain): AnyTemporal {
    switch (domain.kind) {
      case "bool":
        return this.readTemporal(reader, header, domain, BOOL_WKB);
      case "int":
        return this.readTemporal(reader, header, domain, INT_WKB);
      case "float":
        return this.readTemporal(reader, header, domain, FLOAT_WKB);
      case "text":
        return this.readTemporal(reader, header, domain, TEXT_WKB);
      case "point": {
        const resolved = header.srid === null ? domain : withSrid(domain, header.srid);
        if (this.config.debug && header.srid !== null) {
          console.log(`[WkbCodec] extended header, SRID ${header.srid}`);
        }
        return this.readTemporal(reader, header, resolved, pointWkb((header.flags & Flags.hasZ) !== 0));
      }
    }
  }

  private readTemporal<V>(
    reader: ByteReader,
    header: TemporalHeader,
    domain: ValueDomain<V>,
    format: WkbValueFormat<V>
  ): Temporal<V> {
    const readElements = (count: number) => {
      const instants: { value: V; timestamp: number }[] = [];
      for (let i = 0; i < count; i++) {
        const value = format.read(reader);
        instants.push({ value, timestamp: reader.i64() });
      }
      return instants;
    };
    const { interpolation, start } = header;

    if (header.type === TypeTag.instant) {
      const [{ value, timestamp }] = readElements(1);
      return construct("wkb", start, () => new TInstant(domain, value, timestamp));
    }
    if (header.type === TypeTag.sequence) {
      const instants = readElements(header.count);
      return construct("wkb", start, () =>
        new TSequence(domain, instants, {
          interpolation,
          lowerInclusive: (header.flags & Flags.lowerInclusive) !== 0,
          upperInclusive: (header.flags & Flags.upperInclusive) !== 0,
        })
      );
    }

    const sequences: TSequence<V>[] = [];
    for (let i = 0; i < header.count; i++) {
      const seqStart = reader.position;
      const flags = reader.u8();
      const instants = readElements(reader.u32());
      sequences.push(
        construct("wkb", seqStart, () =>
          new TSequence(domain, instants, {
            interpolation,
            lowerInclusive: (flags & Flags.lowerInclusive) !== 0,
            upperInclusive: (flags & Flags.upperInclusive) !== 0,
          })
        )
      );
    }
    return construct("wkb", start, () => new TSequenceSet(sequences));
  }

  // ==========================================================================
  // Spans
  // ==========================================================================

  encodeSpan<K extends ScalarKind>(span: Span<K>): Uint8Array {
    const writer = new ByteWriter();
    if (this.extended) writer.u8(EXTENDED_VERSION);
    writer.u8(TypeTag.span).u8(ScalarTag[span.domain.kind]);
    this.writeSpanBody(writer, span);
    return writer.toBytes();
  }

  encodeSpanSet<K extends ScalarKind>(set: SpanSet<K>): Uint8Array {
    const writer = new ByteWriter();
    if (this.extended) writer.u8(EXTENDED_VERSION);
    writer.u8(TypeTag.spanSet).u8(ScalarTag[set.domain.kind]).u32(set.numSpans());
    for (const span of set.spans()) this.writeSpanBody(writer, span);
    return writer.toBytes();
  }

  /** @throws ParseError */
  decodeSpan<K extends ScalarKind>(bytes: Uint8Array, domain: ScalarDomain<K>): Span<K> {
    const reader = new ByteReader(bytes);
    this.readVersion(reader);
    this.readSpanHeader(reader, TypeTag.span, domain);
    const span = this.readSpanBody(reader, domain);
    if (reader.remaining > 0) throw reader.fail(`${reader.remaining} trailing byte(s)`);
    return span;
  }

  /** @throws ParseError */
  decodeSpanSet<K extends ScalarKind>(bytes: Uint8Array, domain: ScalarDomain<K>): SpanSet<K> {
    const reader = new ByteReader(bytes);
    this.readVersion(reader);
    const start = this.readSpanHeader(reader, TypeTag.spanSet, domain);
    const count = reader.u32();
    const spans: Span<K>[] = [];
    for (let i = 0; i < count; i++) spans.push(this.readSpanBody(reader, domain));
    if (reader.remaining > 0) throw reader.fail(`${reader.remaining} trailing byte(s)`);
    return construct("wkb", start, () => SpanSet.from(spans, domain));
  }

  private writeSpanBody<K extends ScalarKind>(writer: ByteWriter, span: Span<K>): void {
    writer.u8(boundFlags(span.lowerInclusive, span.upperInclusive));
    if (span.domain.kind === "float") writer.f64(span.lower).f64(span.upper);
    else writer.i64(span.lower).i64(span.upper);
  }

  private readSpanHeader<K extends ScalarKind>(
    reader: ByteReader,
    type: number,
    domain: ScalarDomain<K>
  ): number {
    const start = reader.position;
    const found = reader.u8();
    if (found !== type) {
      throw reader.fail(`expected type tag ${type}, found ${found}`, start);
    }
    const scalarAt = reader.position;
    const scalar = reader.u8();
    if (scalar !== ScalarTag[domain.kind]) {
      throw reader.fail(`scalar tag ${scalar} does not match ${domain.kind}`, scalarAt);
    }
    return start;
  }

  private readSpanBody<K extends ScalarKind>(reader: ByteReader, domain: ScalarDomain<K>): Span<K> {
    const start = reader.position;
    const flags = reader.u8();
    if ((flags & ~(Flags.lowerInclusive | Flags.upperInclusive)) !== 0) {
      throw reader.fail(`unknown flag bits 0x${flags.toString(16)}`, start);
    }
    const float = domain.kind === "float";
    const lower = float ? reader.f64() : reader.i64();
    const upper = float ? reader.f64() : reader.i64();
    return construct("wkb", start, () =>
      new Span(
        domain,
        lower,
        upper,
        (flags & Flags.lowerInclusive) !== 0,
        (flags & Flags.upperInclusive) !== 0
      )
    );
  }
}
