import { describe, it, expect } from "vitest";
import type { Point } from "@tempora/contracts";
import { UndefinedForDiscreteError, USECS_PER_HOUR } from "@tempora/contracts";
import { TFLOAT, TGEOMPOINT, TINT } from "../../src/domains/values";
import { integral, length, timeWeightedAverage } from "../../src/temporal/aggregates";
import { TInstant } from "../../src/temporal/TInstant";
import { TSequence } from "../../src/temporal/TSequence";
import { TSequenceSet } from "../../src/temporal/TSequenceSet";
import { timestamp } from "../../src/time/timestamps";

const T0 = timestamp(2000, 1, 1);
const H = USECS_PER_HOUR;

describe("length", () => {
  const path: Point[] = [
    { x: 0, y: 0 },
    { x: 1, y: 1 },
  ];
  const instants = path.map((value, i) => ({ value, timestamp: T0 + i * H }));

  it("sums distances along linear segments", () => {
    expect(length(new TSequence(TGEOMPOINT, instants))).toBeCloseTo(Math.SQRT2, 12);
  });

  it("is zero for step and discrete movement", () => {
    expect(length(new TSequence(TGEOMPOINT, instants, { interpolation: "step" }))).toBe(0);
    expect(length(new TSequence(TGEOMPOINT, instants, { interpolation: "discrete" }))).toBe(0);
  });
});

describe("integral and timeWeightedAverage", () => {
  it("integrates linear segments as trapezoids", () => {
    const ramp = new TSequence(TFLOAT, [
      { value: 0, timestamp: T0 },
      { value: 10, timestamp: T0 + 10 * H },
    ]);
    expect(integral(ramp)).toBe(50 * H);
    expect(timeWeightedAverage(ramp)).toBe(5);
  });

  it("integrates step segments as rectangles", () => {
    const steps = new TSequence(TINT, [
      { value: 1, timestamp: T0 },
      { value: 3, timestamp: T0 + H },
      { value: 5, timestamp: T0 + 2 * H },
    ]);
    expect(integral(steps)).toBe(4 * H);
    expect(timeWeightedAverage(steps)).toBe(2);
  });

  it("weights sequence set components by their duration", () => {
    const set = new TSequenceSet([
      new TSequence(TFLOAT, [
        { value: 1, timestamp: T0 },
        { value: 2, timestamp: T0 + H },
      ]),
      new TSequence(TFLOAT, [
        { value: 3, timestamp: T0 + 2 * H },
        { value: 4, timestamp: T0 + 3 * H },
      ]),
    ]);
    expect(timeWeightedAverage(set)).toBe(2.5);
  });

  it("returns the value of an instant", () => {
    const inst = new TInstant(TFLOAT, 7, T0);
    expect(integral(inst)).toBe(0);
    expect(timeWeightedAverage(inst)).toBe(7);
  });

  it("is undefined for discrete sequences", () => {
    const discrete = new TSequence(
      TFLOAT,
      [
        { value: 1, timestamp: T0 },
        { value: 2, timestamp: T0 + H },
      ],
      { interpolation: "discrete" }
    );
    expect(() => integral(discrete)).toThrow(UndefinedForDiscreteError);
    expect(() => timeWeightedAverage(discrete)).toThrow(UndefinedForDiscreteError);
  });
});
