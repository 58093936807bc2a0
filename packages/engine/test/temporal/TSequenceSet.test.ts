import { describe, it, expect } from "vitest";
import {
  DuplicateTimestampError,
  IncompatibleInterpolationError,
  InvalidTemporalError,
  UnorderedInstantsError,
  USECS_PER_HOUR,
} from "@tempora/contracts";
import { TFLOAT } from "../../src/domains/values";
import { tstzSpan } from "../../src/spans/Span";
import { TSequence } from "../../src/temporal/TSequence";
import { TSequenceSet } from "../../src/temporal/TSequenceSet";
import { timestamp } from "../../src/time/timestamps";

const T0 = timestamp(2000, 1, 1);
const H = USECS_PER_HOUR;

function linear(a: number, b: number, start: number, end: number): TSequence<number> {
  return new TSequence(TFLOAT, [
    { value: a, timestamp: start },
    { value: b, timestamp: end },
  ]);
}

describe("TSequenceSet", () => {
  const first = linear(1, 2, T0, T0 + H);
  const second = linear(3, 4, T0 + 2 * H, T0 + 3 * H);
  const set = new TSequenceSet([first, second]);

  describe("construction", () => {
    it("rejects an empty list", () => {
      expect(() => new TSequenceSet<number>([])).toThrow(InvalidTemporalError);
    });

    it("rejects overlapping sequences", () => {
      expect(() => new TSequenceSet([first, linear(5, 6, T0 + H / 2, T0 + 2 * H)])).toThrow(
        UnorderedInstantsError
      );
    });

    it("rejects sequences sharing an inclusive boundary", () => {
      expect(() => new TSequenceSet([first, linear(5, 6, T0 + H, T0 + 2 * H)])).toThrow(
        DuplicateTimestampError
      );
    });

    it("accepts touching sequences when one bound is exclusive", () => {
      const touching = new TSequence(
        TFLOAT,
        [
          { value: 5, timestamp: T0 + H },
          { value: 6, timestamp: T0 + 2 * H },
        ],
        { lowerInclusive: false }
      );
      expect(new TSequenceSet([first, touching]).numSequences()).toBe(2);
    });

    it("rejects mixed interpolations", () => {
      const step = new TSequence(TFLOAT, [{ value: 5, timestamp: T0 + 2 * H }], {
        interpolation: "step",
      });
      expect(() => new TSequenceSet([first, step])).toThrow(IncompatibleInterpolationError);
    });
  });

  describe("valueAt", () => {
    it("delegates to the containing sequence", () => {
      expect(set.valueAt(T0 + H / 2)).toBe(1.5);
      expect(set.valueAt(T0 + 2 * H + H / 2)).toBe(3.5);
    });

    it("is null in gaps and outside", () => {
      expect(set.valueAt(T0 + H + H / 2)).toBeNull();
      expect(set.valueAt(T0 + 4 * H)).toBeNull();
    });
  });

  describe("time", () => {
    it("measures defined time and the overall extent", () => {
      expect(set.duration()).toBe(2 * H);
      expect(set.duration(true)).toBe(3 * H);
      expect(set.time().numSpans()).toBe(2);
    });

    it("spans the first to the last sequence", () => {
      expect(set.period().equals(tstzSpan(T0, T0 + 3 * H, true, true))).toBe(true);
    });

    it("shifts and scales every component with one transform", () => {
      expect(set.shiftTime(H).startTimestamp()).toBe(T0 + H);
      const stretched = set.scaleTime(6 * H);
      expect(stretched.timestamps()).toEqual([T0, T0 + 2 * H, T0 + 4 * H, T0 + 6 * H]);
    });
  });

  describe("accessors", () => {
    it("flattens instants across sequences", () => {
      expect(set.numInstants()).toBe(4);
      expect(set.values()).toEqual([1, 2, 3, 4]);
      expect(set.startSequence()).toBe(first);
      expect(set.endSequence()).toBe(second);
      expect(set.sequenceN(2)).toBeNull();
      expect(set.segments()).toHaveLength(2);
    });

    it("is its own sequence set", () => {
      expect(set.toSequenceSet()).toBe(set);
    });
  });

  describe("restriction", () => {
    it("cuts every component to a period", () => {
      const result = set.atTime(tstzSpan(T0 + H / 2, T0 + 2 * H + H / 2));
      expect(result?.numSequences()).toBe(2);
      expect(result?.values()).toEqual([1.5, 2, 3, 3.5]);
    });

    it("removes a period", () => {
      const result = set.minusTime(tstzSpan(T0, T0 + 2 * H));
      expect(result?.numSequences()).toBe(1);
      expect(result?.values()).toEqual([3, 4]);
    });

    it("finds value crossings within components", () => {
      const result = set.atValue(3.5);
      expect(result?.numInstants()).toBe(1);
      expect(result?.startTimestamp()).toBe(T0 + 2 * H + H / 2);
    });

    it("is null when nothing remains", () => {
      expect(set.atTime(tstzSpan(T0 + 5 * H, T0 + 6 * H))).toBeNull();
    });
  });

  it("compares structurally", () => {
    expect(set.equals(new TSequenceSet([first, second]))).toBe(true);
    expect(set.equals(new TSequenceSet([first]))).toBe(false);
    expect(set.compare(new TSequenceSet([first]))).toBeGreaterThan(0);
  });
});
