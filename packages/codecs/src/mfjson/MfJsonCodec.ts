/**
 * MF-JSON Codec
 *
 * Reads and writes the OGC Moving Features JSON encoding of temporal
 * values. Pretty and compact renderings parse to the same value.
 */

import type { z } from "zod";
import type {
  AnyValueDomain,
  BoolDomain,
  DecodeResult,
  InstantData,
  Interpolation,
  MfJsonConfig,
  NumberDomain,
  Point,
  PointDomain,
  SequenceOptions,
  TextDomain,
  ValueDomain,
} from "@tempora/contracts";
import { InvalidTemporalError, ParseError } from "@tempora/contracts";
import {
  TInstant,
  TSequence,
  TSequenceSet,
  formatIsoTimestamp,
  isInstant,
  isPointDomain,
  parseTimestamp,
  stbox,
  tbox,
  visitTemporal,
  withSrid,
  type AnyTemporal,
  type Temporal,
} from "@tempora/engine";
import { construct, toDecodeResult } from "../shared/result";
import {
  BoolValue,
  Coordinates,
  DocumentSchema,
  FloatValue,
  IntValue,
  MOVING_TYPES,
  TextValue,
  sridFromCrsName,
  type MfJsonDocument,
  type Samples,
} from "./schema";

const DEFAULT_CONFIG: MfJsonConfig = {
  pretty: false,
  precision: undefined,
  withBBox: false,
  srs: undefined,
  defaultSrid: undefined,
  debug: false,
};

type InterpolationName = "Discrete" | "Step" | "Linear";

const INTERPOLATION_NAMES: Record<Interpolation, InterpolationName> = {
  discrete: "Discrete",
  step: "Step",
  linear: "Linear",
};

const INTERPOLATION_MODES: Record<InterpolationName, Interpolation> = {
  Discrete: "discrete",
  Step: "step",
  Linear: "linear",
};

type Path = ReadonlyArray<string | number>;
type Member = "values" | "coordinates";

function fail(reason: string, path: Path = []): ParseError {
  return new ParseError("mfjson", null, reason, path);
}

/** Position reported by JSON.parse, when the runtime gives one. */
function syntaxErrorPosition(message: string): number | null {
  const match = /position (\d+)/.exec(message);
  return match ? Number(match[1]) : null;
}

export class MfJsonCodec {
  private config: MfJsonConfig;

  constructor(config: Partial<MfJsonConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    const { precision } = this.config;
    if (precision !== undefined && (!Number.isInteger(precision) || precision < 0 || precision > 100)) {
      throw new RangeError(`precision must be an integer in [0, 100], got ${precision}`);
    }
  }

  // ==========================================================================
  // Encoding
  // ==========================================================================

  encode(temporal: AnyTemporal): string {
    const document = visitTemporal<Record<string, unknown>>(temporal, {
      bool: (t) => this.document(t, MOVING_TYPES.bool, "values", (v) => v),
      number: (t) =>
        this.document(
          t,
          t.domain.kind === "int" ? MOVING_TYPES.int : MOVING_TYPES.float,
          "values",
          (v) => (t.domain.kind === "int" ? v : this.round(v)),
          () => {
            const box = tbox(t);
            return [this.round(box.values.lower), this.round(box.values.upper)];
          }
        ),
      text: (t) => this.document(t, MOVING_TYPES.text, "values", (v) => v),
      point: (t) =>
        this.document(
          t,
          MOVING_TYPES.point,
          "coordinates",
          (p) => [p.x, p.y, ...(p.z === undefined ? [] : [p.z])].map((c) => this.round(c)),
          () => {
            const { xmin, ymin, zmin, xmax, ymax, zmax } = stbox(t).extent;
            const low = zmin === undefined ? [xmin, ymin] : [xmin, ymin, zmin];
            const high = zmax === undefined ? [xmax, ymax] : [xmax, ymax, zmax];
            return [...low, ...high].map((c) => this.round(c));
          }
        ),
    });
    return this.config.pretty ? JSON.stringify(document, null, 2) : JSON.stringify(document);
  }

  private round(value: number): number {
    // JSON has no encoding for NaN or the infinities
    if (!Number.isFinite(value)) {
      throw new InvalidTemporalError(`MF-JSON cannot encode the number ${value}`);
    }
    const { precision } = this.config;
    return precision === undefined ? value : Number(value.toFixed(precision));
  }

  private document<V>(
    temporal: Temporal<V>,
    type: string,
    member: Member,
    writeValue: (value: V) => unknown,
    bbox?: () => number[]
  ): Record<string, unknown> {
    const document: Record<string, unknown> = { type };

    const crs = this.crsName(temporal.domain);
    if (crs !== null) {
      document.crs = { type: "Name", properties: { name: crs } };
    }
    if (this.config.withBBox) {
      if (bbox !== undefined) document.bbox = bbox();
      const period = temporal.period();
      document.period = {
        begin: formatIsoTimestamp(period.lower),
        end: formatIsoTimestamp(period.upper),
        lower_inc: period.lowerInclusive,
        upper_inc: period.upperInclusive,
      };
    }

    const samples = (seq: TSequence<V>) => {
      const instants = seq.instants();
      return {
        [member]: instants.map((inst) => writeValue(inst.value)),
        datetimes: instants.map((inst) => formatIsoTimestamp(inst.timestamp)),
        lower_inc: seq.lowerInclusive,
        upper_inc: seq.upperInclusive,
      };
    };

    if (isInstant(temporal)) {
      document[member] = [writeValue(temporal.value)];
      document.datetimes = [formatIsoTimestamp(temporal.timestamp)];
      document.interpolation = "None";
    } else if (temporal.subtype === "sequence") {
      Object.assign(document, samples(temporal.sequences()[0]));
      document.interpolation = INTERPOLATION_NAMES[temporal.interpolation];
    } else {
      document.sequences = temporal.sequences().map(samples);
      document.interpolation = INTERPOLATION_NAMES[temporal.interpolation];
    }
    return document;
  }

  private crsName<V>(domain: ValueDomain<V>): string | null {
    if (!isPointDomain(domain)) return null;
    if (this.config.srs !== undefined) return this.config.srs;
    return domain.srid !== 0 ? `EPSG:${domain.srid}` : null;
  }

  // ==========================================================================
  // Decoding
  // ==========================================================================

  /**
   * Parse an MF-JSON document holding a temporal value of `domain`.
   * Schema violations carry the JSON path of the offending member.
   * @throws ParseError
   */
  decode(json: string, domain: PointDomain): Temporal<Point>;
  decode(json: string, domain: NumberDomain): Temporal<number>;
  decode(json: string, domain: BoolDomain): Temporal<boolean>;
  decode(json: string, domain: TextDomain): Temporal<string>;
  decode(json: string, domain: AnyValueDomain): AnyTemporal {
    return this.decodeAny(json, domain);
  }

  safeDecode(json: string, domain: PointDomain): DecodeResult<Temporal<Point>>;
  safeDecode(json: string, domain: NumberDomain): DecodeResult<Temporal<number>>;
  safeDecode(json: string, domain: BoolDomain): DecodeResult<Temporal<boolean>>;
  safeDecode(json: string, domain: TextDomain): DecodeResult<Temporal<string>>;
  safeDecode(json: string, domain: AnyValueDomain): DecodeResult<AnyTemporal> {
    return toDecodeResult(() => this.decodeAny(json, domain));
  }

  private decodeAny(json: string, domain: AnyValueDomain): AnyTemporal {
    const document = this.parseDocument(json);
    const expected = MOVING_TYPES[domain.kind];
    if (document.type !== expected) {
      throw fail(`expected type "${expected}", found "${document.type}"`, ["type"]);
    }

    switch (domain.kind) {
      case "bool":
        return this.build(document, domain, BoolValue, "values");
      case "int":
        return this.build(document, domain, IntValue, "values");
      case "float":
        return this.build(document, domain, FloatValue, "values");
      case "text":
        return this.build(document, domain, TextValue, "values");
      case "point":
        return this.build(document, this.resolveSrid(document, domain), Coordinates, "coordinates");
    }
  }

  private parseDocument(json: string): MfJsonDocument {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ParseError("mfjson", syntaxErrorPosition(message), `invalid JSON: ${message}`);
    }
    const parsed = DocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      throw fail(issue.message, issue.path);
    }
    return parsed.data;
  }

  private resolveSrid(document: MfJsonDocument, domain: PointDomain): PointDomain {
    if (document.crs === undefined) {
      const srid = this.config.defaultSrid ?? domain.srid;
      if (this.config.debug) {
        console.log(`[MfJsonCodec] crs absent, using SRID ${srid}`);
      }
      return withSrid(domain, srid);
    }
    const name = document.crs.properties.name;
    const srid = sridFromCrsName(name);
    if (srid === null) {
      throw fail(`unrecognized crs name "${name}"`, ["crs", "properties", "name"]);
    }
    return withSrid(domain, srid);
  }

  private build<V>(
    document: MfJsonDocument,
    domain: ValueDomain<V>,
    valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
    member: Member
  ): Temporal<V> {
    const interpolation = document.interpolation;

    if (document.sequences !== undefined) {
      if (interpolation === "None") {
        throw fail("a sequence set needs an interpolation", ["interpolation"]);
      }
      const mode = INTERPOLATION_MODES[interpolation];
      const sequences = document.sequences.map((samples, i) => {
        const path = ["sequences", i];
        const instants = this.instants(samples, domain, valueSchema, member, path);
        return construct(
          "mfjson",
          null,
          () => new TSequence(domain, instants, this.options(mode, samples)),
          path
        );
      });
      return construct("mfjson", null, () => new TSequenceSet(sequences), ["sequences"]);
    }

    const { datetimes } = document;
    if (datetimes === undefined) {
      throw fail(`expected "datetimes" or "sequences"`, ["datetimes"]);
    }
    const instants = this.instants({ ...document, datetimes }, domain, valueSchema, member, []);

    if (interpolation === "None") {
      if (instants.length !== 1) {
        throw fail(`an instant holds one value, found ${instants.length}`, [member]);
      }
      const [{ value, timestamp }] = instants;
      return construct("mfjson", null, () => new TInstant(domain, value, timestamp));
    }
    const mode = INTERPOLATION_MODES[interpolation];
    return construct("mfjson", null, () =>
      new TSequence(domain, instants, this.options(mode, document))
    );
  }

  private options(
    interpolation: Interpolation,
    samples: Pick<Samples, "lower_inc" | "upper_inc">
  ): Required<SequenceOptions> {
    return {
      interpolation,
      lowerInclusive: samples.lower_inc ?? true,
      upperInclusive: samples.upper_inc ?? true,
    };
  }

  private instants<V>(
    samples: Samples,
    domain: ValueDomain<V>,
    valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
    member: Member,
    path: Path
  ): InstantData<V>[] {
    const raw = member === "coordinates" ? samples.coordinates : samples.values;
    if (raw === undefined) {
      throw fail(`expected "${member}"`, [...path, member]);
    }
    if (raw.length !== samples.datetimes.length) {
      throw fail(
        `"${member}" has ${raw.length} entries but "datetimes" has ${samples.datetimes.length}`,
        [...path, "datetimes"]
      );
    }

    return raw.map((item, i) => {
      const parsed = valueSchema.safeParse(item);
      if (!parsed.success) {
        throw fail(`invalid ${domain.kind} value: ${parsed.error.issues[0].message}`, [...path, member, i]);
      }
      const text = samples.datetimes[i];
      const timestamp = parseTimestamp(text);
      if (timestamp === null) {
        throw fail(`invalid datetime "${text}"`, [...path, "datetimes", i]);
      }
      return { value: parsed.data, timestamp };
    });
  }
}
