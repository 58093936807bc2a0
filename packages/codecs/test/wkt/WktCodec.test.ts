import { describe, it, expect } from "vitest";
import type { DecodeResult } from "@tempora/contracts";
import { NoValueAtTimestampError, ParseError, USECS_PER_DAY, USECS_PER_HOUR } from "@tempora/contracts";
import {
  FloatDomain,
  IntDomain,
  SpanSet,
  TBOOL,
  TFLOAT,
  TGEOMPOINT,
  TINT,
  TInstant,
  TSequence,
  TSequenceSet,
  TTEXT,
  TimestampDomain,
  floatSpan,
  intSpan,
  isPointDomain,
  length,
  tgeompoint,
  timestamp,
  tstzSpan,
} from "@tempora/engine";
import { WktCodec } from "../../src/wkt/WktCodec";

const T0 = timestamp(2000, 1, 1);
const DAY = USECS_PER_DAY;

function errorOf<T>(result: DecodeResult<T>): ParseError {
  if (result.success) throw new Error("expected decoding to fail");
  return result.error;
}

describe("WktCodec", () => {
  const codec = new WktCodec();

  describe("encode", () => {
    it("writes instants", () => {
      expect(codec.encode(new TInstant(TFLOAT, 1.5, T0))).toBe("1.5@2000-01-01 00:00:00+00");
      expect(codec.encode(new TInstant(TBOOL, true, T0))).toBe("t@2000-01-01 00:00:00+00");
    });

    it("writes continuous sequences with their bounds", () => {
      const seq = new TSequence(
        TFLOAT,
        [
          { value: 1, timestamp: T0 },
          { value: 2.5, timestamp: T0 + DAY },
        ],
        { upperInclusive: false }
      );
      expect(codec.encode(seq)).toBe(
        "[1@2000-01-01 00:00:00+00, 2.5@2000-01-02 00:00:00+00)"
      );
    });

    it("marks step interpolation only where linear is the default", () => {
      const instants = [
        { value: 1, timestamp: T0 },
        { value: 2, timestamp: T0 + DAY },
      ];
      expect(codec.encode(new TSequence(TFLOAT, instants, { interpolation: "step" }))).toBe(
        "Interp=Step;[1@2000-01-01 00:00:00+00, 2@2000-01-02 00:00:00+00]"
      );
      expect(codec.encode(new TSequence(TINT, instants))).toBe(
        "[1@2000-01-01 00:00:00+00, 2@2000-01-02 00:00:00+00]"
      );
    });

    it("writes discrete sequences in braces", () => {
      const seq = new TSequence(
        TBOOL,
        [
          { value: true, timestamp: T0 },
          { value: false, timestamp: T0 + DAY },
        ],
        { interpolation: "discrete" }
      );
      expect(codec.encode(seq)).toBe("{t@2000-01-01 00:00:00+00, f@2000-01-02 00:00:00+00}");
    });

    it("writes sequence sets", () => {
      const set = new TSequenceSet([
        new TSequence(TFLOAT, [
          { value: 1, timestamp: T0 },
          { value: 2, timestamp: T0 + DAY },
        ]),
        new TSequence(TFLOAT, [
          { value: 3, timestamp: T0 + 2 * DAY },
          { value: 4, timestamp: T0 + 3 * DAY },
        ]),
      ]);
      expect(codec.encode(set)).toBe(
        "{[1@2000-01-01 00:00:00+00, 2@2000-01-02 00:00:00+00], " +
          "[3@2000-01-03 00:00:00+00, 4@2000-01-04 00:00:00+00]}"
      );
    });

    it("escapes quotes in text", () => {
      expect(codec.encode(new TInstant(TTEXT, 'say "hi"', T0))).toBe(
        '"say \\"hi\\""@2000-01-01 00:00:00+00'
      );
    });

    it("prefixes the SRID of points", () => {
      const domain = tgeompoint({ srid: 4326 });
      expect(codec.encode(new TInstant(domain, { x: 1, y: 2 }, T0))).toBe(
        "SRID=4326;POINT(1 2)@2000-01-01 00:00:00+00"
      );
      expect(codec.encode(new TInstant(TGEOMPOINT, { x: 1, y: 2, z: 3 }, T0))).toBe(
        "POINT Z (1 2 3)@2000-01-01 00:00:00+00"
      );
    });

    it("caps float digits", () => {
      const rounded = new WktCodec({ maxDecimals: 2 });
      expect(rounded.encode(new TInstant(TFLOAT, 1.23456, T0))).toBe("1.23@2000-01-01 00:00:00+00");
      expect(rounded.encode(new TInstant(TGEOMPOINT, { x: 0.125, y: 1 / 3 }, T0))).toBe(
        "POINT(0.13 0.33)@2000-01-01 00:00:00+00"
      );
    });

    it("rejects a negative maxDecimals", () => {
      expect(() => new WktCodec({ maxDecimals: -1 })).toThrow(RangeError);
    });
  });

  describe("round trips", () => {
    const texts: Array<[string, string]> = [
      ["bool", "{t@2000-01-01 00:00:00+00, f@2000-01-02 00:00:00+00}"],
      ["int", "[1@2000-01-01 00:00:00+00, 5@2000-01-02 00:00:00+00)"],
      ["float", "Interp=Step;{[1.5@2000-01-01 00:00:00+00], (2@2000-01-02 00:00:00+00, 3@2000-01-03 00:00:00+00]}"],
      ["text", '"a\\\\b"@2000-01-01 00:00:00.5+00'],
      ["point", "SRID=3857;[POINT(1 1)@2000-01-01 00:00:00+00, POINT(2 3)@2000-01-02 00:00:00+00]"],
    ];

    it.each(texts)("reproduces %s text", (kind, text) => {
      switch (kind) {
        case "bool":
          expect(codec.encode(codec.decode(text, TBOOL))).toBe(text);
          break;
        case "int":
          expect(codec.encode(codec.decode(text, TINT))).toBe(text);
          break;
        case "float":
          expect(codec.encode(codec.decode(text, TFLOAT))).toBe(text);
          break;
        case "text":
          expect(codec.encode(codec.decode(text, TTEXT))).toBe(text);
          break;
        default:
          expect(codec.encode(codec.decode(text, TGEOMPOINT))).toBe(text);
      }
    });

    it("decodes values equal to the encoded ones", () => {
      const seq = new TSequence(TFLOAT, [
        { value: -0.25, timestamp: T0 },
        { value: 1e-7, timestamp: T0 + 1 },
      ]);
      expect(codec.decode(codec.encode(seq), TFLOAT).equals(seq)).toBe(true);
    });
  });

  describe("decode", () => {
    it("reads a linear point trajectory", () => {
      const temporal = codec.decode(
        "[POINT(1 1)@2000-01-01, POINT(2 2)@2000-01-02]",
        TGEOMPOINT
      );
      expect(temporal.interpolation).toBe("linear");
      expect(temporal.numInstants()).toBe(2);
      expect(temporal.boundingBox().equals(tstzSpan(T0, T0 + DAY, true, true))).toBe(true);
      expect(length(temporal)).toBeCloseTo(Math.SQRT2, 12);
    });

    it("reads discrete samples without values between them", () => {
      const temporal = codec.decode(
        "{POINT(1 1)@2000-01-01, POINT(2 2)@2000-01-02}",
        TGEOMPOINT
      );
      expect(temporal.interpolation).toBe("discrete");
      expect(() => temporal.valueAt(T0 + 12 * USECS_PER_HOUR)).toThrow(NoValueAtTimestampError);
    });

    it("defaults integers to step interpolation", () => {
      expect(codec.decode("[1@2000-01-01, 2@2000-01-02]", TINT).interpolation).toBe("step");
    });

    it("lets the SRID prefix override the domain", () => {
      const temporal = codec.decode("SRID=4326;POINT(1 2)@2000-01-01", TGEOMPOINT);
      expect(isPointDomain(temporal.domain) && temporal.domain.srid).toBe(4326);
    });

    it("accepts spelled-out booleans and time zone offsets", () => {
      const temporal = codec.decode("TRUE@2000-01-01 02:00:00+02", TBOOL);
      expect(temporal.startValue()).toBe(true);
      expect(temporal.startTimestamp()).toBe(T0);
    });

    it("tolerates extra whitespace", () => {
      const temporal = codec.decode(" { [ 1@2000-01-01 , 2@2000-01-02 ] , [3@2000-01-03] } ", TFLOAT);
      expect(temporal.subtype).toBe("sequence_set");
      expect(temporal.numInstants()).toBe(3);
    });
  });

  describe("errors", () => {
    it("reports the offset of a bad timestamp", () => {
      const error = errorOf(codec.safeDecode("1.5@2000-13-01", TFLOAT));
      expect(error.format).toBe("wkt");
      expect(error.position).toBe(4);
      expect(error.reason).toBe('invalid timestamp "2000-13-01"');
    });

    it("rejects timestamps outside the representable range", () => {
      const error = errorOf(codec.safeDecode("1.5@1600-01-01", TFLOAT));
      expect(error.position).toBe(4);
      expect(error.reason).toBe('invalid timestamp "1600-01-01"');
    });

    it("reports the offset of a bad value", () => {
      const error = errorOf(codec.safeDecode("abc@2000-01-01", TFLOAT));
      expect(error.position).toBe(0);
      expect(error.reason).toBe('invalid float "abc"');
    });

    it("reports construction failures at the value's start", () => {
      const error = errorOf(codec.safeDecode("[1@2000-01-02, 2@2000-01-01]", TFLOAT));
      expect(error.position).toBe(0);
      expect(error.reason).toMatch(/precedes/);
    });

    it("rejects sequences sharing a timestamp in a set", () => {
      const text = "{[1@2000-01-01, 2@2000-01-02], [3@2000-01-02, 4@2000-01-03]}";
      expect(errorOf(codec.safeDecode(text, TFLOAT)).position).toBe(0);
    });

    it("rejects trailing input", () => {
      const error = errorOf(codec.safeDecode("[1@2000-01-01, 2@2000-01-02] x", TFLOAT));
      expect(error.position).toBe(29);
      expect(error.reason).toBe("unexpected trailing input");
    });

    it("rejects truncated input", () => {
      const error = errorOf(codec.safeDecode("[1@2000-01-01", TFLOAT));
      expect(error.position).toBe(13);
      expect(error.reason).toBe("unexpected end of input");
    });

    it("rejects empty input", () => {
      expect(errorOf(codec.safeDecode("", TFLOAT)).reason).toBe("expected a float");
    });

    it("rejects an SRID on non-point values", () => {
      const error = errorOf(codec.safeDecode("SRID=4326;1@2000-01-01", TFLOAT));
      expect(error.position).toBe(0);
      expect(error.reason).toBe("SRID is only valid for point values, not float");
    });

    it("throws from decode", () => {
      expect(() => codec.decode("1@nope", TINT)).toThrow(ParseError);
    });
  });

  describe("spans", () => {
    it("writes and reads float spans", () => {
      expect(codec.encodeSpan(floatSpan(1.5, 2))).toBe("[1.5, 2)");
      expect(codec.decodeSpan("(1.5, 2]", FloatDomain).equals(floatSpan(1.5, 2, false, true))).toBe(
        true
      );
    });

    it("canonicalizes integer spans", () => {
      const span = codec.decodeSpan("[1, 3]", IntDomain);
      expect(span.equals(intSpan(1, 4))).toBe(true);
      expect(codec.encodeSpan(span)).toBe("[1, 4)");
    });

    it("writes timestamp spans", () => {
      expect(codec.encodeSpan(tstzSpan(T0, T0 + DAY))).toBe(
        "[2000-01-01 00:00:00+00, 2000-01-02 00:00:00+00)"
      );
      expect(codec.decodeSpan("[2000-01-01, 2000-01-02)", TimestampDomain).upper).toBe(T0 + DAY);
    });

    it("rejects inverted bounds", () => {
      expect(() => codec.decodeSpan("[3, 1]", FloatDomain)).toThrow(ParseError);
    });

    it("normalizes span sets", () => {
      const set = codec.decodeSpanSet("{[1, 2), [2, 3), [5, 6]}", FloatDomain);
      expect(set.numSpans()).toBe(2);
      expect(codec.encodeSpanSet(set)).toBe("{[1, 3), [5, 6]}");
    });

    it("reads the empty span set", () => {
      expect(codec.decodeSpanSet("{}", FloatDomain).isEmpty()).toBe(true);
      expect(codec.encodeSpanSet(SpanSet.empty(FloatDomain))).toBe("{}");
    });
  });
});
