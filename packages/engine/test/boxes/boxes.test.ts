import { describe, it, expect } from "vitest";
import type { Point } from "@tempora/contracts";
import { USECS_PER_DAY, USECS_PER_HOUR } from "@tempora/contracts";
import { TFLOAT, TGEOMPOINT, tgeompoint } from "../../src/domains/values";
import { floatSpan, tstzSpan } from "../../src/spans/Span";
import { TBox, tbox } from "../../src/boxes/TBox";
import { STBox, stbox } from "../../src/boxes/STBox";
import { TSequence } from "../../src/temporal/TSequence";
import { timestamp } from "../../src/time/timestamps";

const T0 = timestamp(2000, 1, 1);
const H = USECS_PER_HOUR;

function track(points: Point[], srid = 0): TSequence<Point> {
  const domain = srid === 0 ? TGEOMPOINT : tgeompoint({ srid });
  return new TSequence(
    domain,
    points.map((value, i) => ({ value, timestamp: T0 + i * USECS_PER_DAY }))
  );
}

describe("TBox", () => {
  const ramp = new TSequence(TFLOAT, [
    { value: 0, timestamp: T0 },
    { value: 10, timestamp: T0 + 10 * H },
  ]);

  it("bounds values and time", () => {
    const box = tbox(ramp);
    expect(box.values.equals(floatSpan(0, 10, true, true))).toBe(true);
    expect(box.toString()).toBe(
      "TBOX XT([0, 10],[2000-01-01 00:00:00+00, 2000-01-01 10:00:00+00])"
    );
  });

  it("expands, overlaps and contains", () => {
    const box = tbox(ramp);
    const other = new TBox(
      floatSpan(5, 20, true, true),
      tstzSpan(T0 + 5 * H, T0 + 20 * H, true, true)
    );
    const both = box.expand(other);
    const expected = new TBox(floatSpan(0, 20, true, true), tstzSpan(T0, T0 + 20 * H, true, true));
    expect(both.equals(expected)).toBe(true);
    expect(box.overlaps(other)).toBe(true);
    expect(both.contains(box)).toBe(true);
    expect(box.contains(both)).toBe(false);
  });
});

describe("STBox", () => {
  const diagonal = track([
    { x: 1, y: 1 },
    { x: 2, y: 2 },
  ]);

  it("bounds a planar trajectory", () => {
    const box = stbox(diagonal);
    expect(box.extent).toEqual({ xmin: 1, xmax: 2, ymin: 1, ymax: 2 });
    expect(box.hasZ()).toBe(false);
    expect(box.toString()).toBe(
      "STBOX XT(((1 1),(2 2)),[2000-01-01 00:00:00+00, 2000-01-02 00:00:00+00])"
    );
  });

  it("carries Z and SRID", () => {
    const box = stbox(
      track(
        [
          { x: 0, y: 0, z: 5 },
          { x: 1, y: 3, z: 2 },
        ],
        3857
      )
    );
    expect(box.hasZ()).toBe(true);
    expect(box.srid).toBe(3857);
    expect(box.toString()).toBe(
      "SRID=3857;STBOX ZT(((0 0 2),(1 3 5)),[2000-01-01 00:00:00+00, 2000-01-02 00:00:00+00])"
    );
  });

  it("drops Z when any point lacks it", () => {
    const box = STBox.of(
      track([
        { x: 0, y: 0, z: 1 },
        { x: 1, y: 1 },
      ])
    );
    expect(box.hasZ()).toBe(false);
  });

  it("expands, overlaps and contains", () => {
    const box = stbox(diagonal);
    const far = new STBox(
      { xmin: 5, xmax: 6, ymin: 5, ymax: 6 },
      tstzSpan(T0, T0 + USECS_PER_DAY, true, true)
    );
    expect(box.overlaps(far)).toBe(false);
    const both = box.expand(far);
    expect(both.extent).toEqual({ xmin: 1, xmax: 6, ymin: 1, ymax: 6 });
    expect(both.contains(box)).toBe(true);
    expect(box.contains(both)).toBe(false);
  });
});
