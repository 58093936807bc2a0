import { describe, it, expect } from "vitest";
import {
  IncompatibleInterpolationError,
  InvalidTemporalError,
  NoValueAtTimestampError,
} from "@tempora/contracts";
import { TFLOAT, TINT } from "../../src/domains/values";
import { assertInterpolation, interpolate, locate } from "../../src/interpolation/interpolate";

const start = { value: 0, timestamp: 0 };
const end = { value: 10, timestamp: 1000 };

describe("interpolate", () => {
  describe("linear", () => {
    it("is exact at the midpoint", () => {
      expect(interpolate(TFLOAT, start, end, 500, "linear")).toBe(5);
    });

    it("returns the samples at their own timestamps", () => {
      expect(interpolate(TFLOAT, start, end, 0, "linear")).toBe(0);
      expect(interpolate(TFLOAT, start, end, 1000, "linear")).toBe(10);
    });

    it("is undefined for domains without lerp", () => {
      expect(() => interpolate(TINT, start, end, 500, "linear")).toThrow(
        IncompatibleInterpolationError
      );
    });
  });

  describe("step", () => {
    it("holds the start value before the end timestamp", () => {
      expect(interpolate(TINT, start, end, 0, "step")).toBe(0);
      expect(interpolate(TINT, start, end, 999, "step")).toBe(0);
    });

    it("takes the end value at the end only when it closes the sequence", () => {
      expect(interpolate(TINT, start, end, 1000, "step")).toBe(0);
      expect(interpolate(TINT, start, end, 1000, "step", { closesSequence: true })).toBe(10);
    });
  });

  describe("discrete", () => {
    it("has values at the samples only", () => {
      expect(interpolate(TFLOAT, start, end, 1000, "discrete")).toBe(10);
      expect(() => interpolate(TFLOAT, start, end, 500, "discrete")).toThrow(
        NoValueAtTimestampError
      );
    });
  });

  it("rejects a zero-length segment", () => {
    expect(() => interpolate(TFLOAT, start, { value: 1, timestamp: 0 }, 0, "linear")).toThrow(
      InvalidTemporalError
    );
  });

  it("rejects timestamps outside the segment", () => {
    expect(() => interpolate(TFLOAT, start, end, 1001, "linear")).toThrow(NoValueAtTimestampError);
  });
});

describe("locate", () => {
  it("solves the crossing time", () => {
    expect(locate(TFLOAT, start, end, 2.5)).toBe(250);
  });

  it("rounds to the microsecond", () => {
    expect(locate(TFLOAT, { value: 0, timestamp: 0 }, { value: 3, timestamp: 10 }, 1)).toBe(3);
    expect(locate(TFLOAT, { value: 0, timestamp: 0 }, { value: 3, timestamp: 10 }, 2)).toBe(7);
  });

  it("drops a crossing that rounds onto a sample of another value", () => {
    const first = { value: 0, timestamp: 0 };
    const last = { value: 3, timestamp: 1 };
    expect(locate(TFLOAT, first, last, 1)).toBeNull();
    expect(locate(TFLOAT, first, last, 2)).toBeNull();
    expect(locate(TFLOAT, first, last, 3)).toBe(1);
  });

  it("returns null when the segment never takes the value", () => {
    expect(locate(TFLOAT, start, end, 20)).toBeNull();
  });
});

describe("assertInterpolation", () => {
  it("rejects linear integers", () => {
    expect(() => assertInterpolation(TINT, "linear")).toThrow(IncompatibleInterpolationError);
    expect(() => assertInterpolation(TINT, "step")).not.toThrow();
  });
});
