import { describe, it, expect } from "vitest";
import { InvalidSpanError } from "@tempora/contracts";
import { dateSpan, floatSpan, intSpan, tstzSpan } from "../../src/spans/Span";
import { timestamp } from "../../src/time/timestamps";

describe("Span", () => {
  describe("construction", () => {
    it("rejects lower > upper", () => {
      expect(() => floatSpan(2, 1)).toThrow(InvalidSpanError);
    });

    it("rejects a zero-width span with an exclusive bound", () => {
      expect(() => floatSpan(1, 1)).toThrow(InvalidSpanError);
      expect(floatSpan(1, 1, true, true).width()).toBe(0);
    });

    it("canonicalizes integer spans to [lower, upper)", () => {
      const closed = intSpan(1, 5, true, true);
      const open = intSpan(0, 6, false, false);
      expect(closed.toString()).toBe("[1, 6)");
      expect(closed.equals(open)).toBe(true);
    });

    it("canonicalizes date spans", () => {
      expect(dateSpan(0, 1, true, true).toString()).toBe("[1970-01-01, 1970-01-03)");
    });
  });

  describe("containment", () => {
    const spans = [
      floatSpan(1, 2),
      floatSpan(1, 2, false, true),
      floatSpan(1, 2, true, true),
      floatSpan(3, 3, true, true),
      intSpan(1, 4),
      tstzSpan(0, 1000, false, false),
    ];

    it("contains each bound exactly when the bound is inclusive", () => {
      for (const span of spans) {
        expect(span.contains(span.lower)).toBe(span.lowerInclusive);
        expect(span.contains(span.upper)).toBe(span.upperInclusive);
      }
    });

    it("contains spans it covers", () => {
      expect(floatSpan(0, 10).contains(floatSpan(2, 3))).toBe(true);
      expect(floatSpan(0, 10).contains(floatSpan(2, 10, true, true))).toBe(false);
      expect(floatSpan(2, 3).isContainedIn(floatSpan(0, 10))).toBe(true);
    });
  });

  describe("position", () => {
    const a = floatSpan(1, 2);
    const b = floatSpan(2, 3);
    const c = floatSpan(5, 6);

    it("detects adjacency on complementary bounds", () => {
      expect(a.isAdjacent(b)).toBe(true);
      expect(floatSpan(1, 2, true, true).isAdjacent(b)).toBe(false);
      expect(a.isAdjacent(c)).toBe(false);
    });

    it("orders spans left and right", () => {
      expect(a.isLeft(b)).toBe(true);
      expect(c.isRight(a)).toBe(true);
      expect(a.isOverOrLeft(b)).toBe(true);
      expect(b.isOverOrRight(a)).toBe(true);
      expect(b.isOverOrLeft(a)).toBe(false);
    });

    it("treats a shared inclusive bound as overlap", () => {
      expect(floatSpan(1, 2, true, true).overlaps(b)).toBe(true);
      expect(a.overlaps(b)).toBe(false);
    });
  });

  describe("intersection", () => {
    it("returns the common part", () => {
      const result = floatSpan(17.5, 18.5).intersection(floatSpan(18.0, 20.0));
      expect(result?.equals(floatSpan(18.0, 18.5))).toBe(true);
    });

    it("returns null for disjoint spans", () => {
      expect(floatSpan(17.5, 18.5).intersection(floatSpan(19.0, 20.0))).toBeNull();
    });

    it("is commutative", () => {
      const x = floatSpan(1, 5, false, true);
      const y = floatSpan(3, 8);
      expect(x.intersection(y)?.toString()).toBe("[3, 5]");
      expect(y.intersection(x)?.toString()).toBe("[3, 5]");
    });
  });

  describe("union", () => {
    it("merges overlapping and adjacent spans", () => {
      expect(floatSpan(1, 3).union(floatSpan(2, 4))?.toString()).toBe("[1, 4)");
      expect(floatSpan(1, 2).union(floatSpan(2, 3))?.toString()).toBe("[1, 3)");
    });

    it("returns null for separated spans in strict mode", () => {
      expect(floatSpan(1, 2).union(floatSpan(3, 4))).toBeNull();
    });

    it("returns the covering span in non-strict mode", () => {
      expect(floatSpan(1, 2).union(floatSpan(3, 4), false)?.toString()).toBe("[1, 4)");
    });
  });

  describe("shift and scale", () => {
    const span = floatSpan(0, 10);

    it("shifts both bounds", () => {
      expect(span.shift(5).toString()).toBe("[5, 15)");
    });

    it("scales around the midpoint by default", () => {
      expect(span.scale(4).toString()).toBe("[3, 7)");
    });

    it("scales from the lower bound when anchored there", () => {
      expect(span.scale(4, { anchor: "lower" }).toString()).toBe("[0, 4)");
    });

    it("shifts then scales", () => {
      expect(span.shiftScale(2, 4).toString()).toBe("[5, 9)");
    });

    it("preserves bound inclusivity", () => {
      const scaled = floatSpan(0, 10, false, true).scale(2);
      expect(scaled.lowerInclusive).toBe(false);
      expect(scaled.upperInclusive).toBe(true);
    });

    it("keeps integer spans on integers", () => {
      expect(intSpan(1, 4).scale(2).toString()).toBe("[1, 3)");
    });

    it("rejects a negative width", () => {
      expect(() => span.scale(-1)).toThrow(InvalidSpanError);
    });
  });

  describe("distance", () => {
    it("measures to the nearest bound", () => {
      expect(floatSpan(1, 3).distanceToValue(5)).toBe(2);
      expect(floatSpan(1, 3).distanceToValue(0)).toBe(1);
      expect(floatSpan(1, 3).distanceToValue(2)).toBe(0);
    });

    it("measures integer spans from their last member", () => {
      expect(intSpan(1, 3).distanceToValue(5)).toBe(3);
      expect(intSpan(1, 3).distanceToSpan(intSpan(6, 8))).toBe(4);
    });

    it("is zero for overlapping spans", () => {
      expect(floatSpan(1, 3).distanceToSpan(floatSpan(2, 4))).toBe(0);
    });
  });

  describe("ordering", () => {
    it("puts inclusive lower bounds first", () => {
      expect(floatSpan(1, 2).compare(floatSpan(1, 2, false))).toBeLessThan(0);
    });

    it("puts exclusive upper bounds first", () => {
      expect(floatSpan(1, 2).compare(floatSpan(1, 2, true, true))).toBeLessThan(0);
      expect(floatSpan(1, 2).compare(floatSpan(1, 2))).toBe(0);
    });
  });

  it("formats timestamp bounds", () => {
    const span = tstzSpan(timestamp(2000, 1, 1), timestamp(2000, 1, 2), true, true);
    expect(span.toString()).toBe("[2000-01-01 00:00:00+00, 2000-01-02 00:00:00+00]");
  });
});
