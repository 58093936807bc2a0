import { describe, it, expect } from "vitest";
import { InvalidSpanError } from "@tempora/contracts";
import { FloatDomain } from "../../src/domains/scalar";
import { floatSpan, intSpan } from "../../src/spans/Span";
import { SpanSet } from "../../src/spans/SpanSet";

describe("SpanSet", () => {
  describe("normalization", () => {
    it("sorts and merges overlapping and adjacent spans", () => {
      const set = SpanSet.of(floatSpan(5, 6), floatSpan(1, 3), floatSpan(2, 4), floatSpan(4, 4.5));
      expect(set.toString()).toBe("{[1, 4.5), [5, 6)}");
    });

    it("merges touching integer spans", () => {
      expect(SpanSet.of(intSpan(1, 3), intSpan(3, 5)).toString()).toBe("{[1, 5)}");
    });

    it("is idempotent", () => {
      const set = SpanSet.of(floatSpan(1, 2), floatSpan(1.5, 3), floatSpan(7, 8));
      expect(SpanSet.from(set.spans()).equals(set)).toBe(true);
    });

    it("needs a domain for an empty list", () => {
      expect(() => SpanSet.from([])).toThrow(InvalidSpanError);
      expect(SpanSet.from([], FloatDomain).isEmpty()).toBe(true);
    });
  });

  describe("union", () => {
    const s = SpanSet.of(floatSpan(17.5, 18.5), floatSpan(19.5, 20.5));
    const t = SpanSet.of(floatSpan(19.5, 23.5), floatSpan(45.5, 67.5));
    const u = SpanSet.of(floatSpan(0, 1), floatSpan(20, 30));

    it("merges members of both sets", () => {
      expect(s.union(t).toString()).toBe("{[17.5, 18.5), [19.5, 23.5), [45.5, 67.5)}");
    });

    it("is commutative and associative", () => {
      expect(s.union(t).equals(t.union(s))).toBe(true);
      expect(s.union(t).union(u).equals(s.union(t.union(u)))).toBe(true);
    });

    it("is idempotent", () => {
      expect(s.union(s).equals(s)).toBe(true);
    });
  });

  describe("intersection", () => {
    const s = SpanSet.of(floatSpan(1, 5), floatSpan(8, 12));
    const t = SpanSet.of(floatSpan(3, 9));

    it("keeps the shared parts", () => {
      expect(s.intersection(t).toString()).toBe("{[3, 5), [8, 9)}");
    });

    it("is commutative", () => {
      expect(s.intersection(t).equals(t.intersection(s))).toBe(true);
    });

    it("is empty, not null, for disjoint sets", () => {
      expect(s.intersection(floatSpan(20, 30)).isEmpty()).toBe(true);
    });
  });

  describe("minus", () => {
    it("cuts holes out of members", () => {
      const set = SpanSet.of(floatSpan(1, 10));
      expect(set.minus(floatSpan(3, 4)).toString()).toBe("{[1, 3), [4, 10)}");
    });

    it("removes members entirely covered", () => {
      const set = SpanSet.of(floatSpan(1, 2), floatSpan(5, 6));
      expect(set.minus(floatSpan(0, 3)).toString()).toBe("{[5, 6)}");
    });
  });

  describe("accessors", () => {
    const set = SpanSet.of(floatSpan(1, 2), floatSpan(3, 5));

    it("sums member widths when ignoring gaps", () => {
      expect(set.width(true)).toBe(3);
    });

    it("measures from first lower to last upper otherwise", () => {
      expect(set.width()).toBe(4);
    });

    it("exposes members", () => {
      expect(set.numSpans()).toBe(2);
      expect(set.startSpan()?.toString()).toBe("[1, 2)");
      expect(set.endSpan()?.toString()).toBe("[3, 5)");
      expect(set.spanN(5)).toBeNull();
      expect(set.boundingSpan()?.toString()).toBe("[1, 5)");
    });

    it("finds values by binary search", () => {
      expect(set.contains(1)).toBe(true);
      expect(set.contains(2)).toBe(false);
      expect(set.contains(4.5)).toBe(true);
      expect(set.contains(floatSpan(3, 4))).toBe(true);
    });

    it("shifts every member", () => {
      expect(set.shift(10).toString()).toBe("{[11, 12), [13, 15)}");
    });
  });

  describe("scale", () => {
    const ints = SpanSet.of(intSpan(1, 2), intSpan(3, 5));

    it("stretches members around the midpoint", () => {
      expect(ints.scale(8).toString()).toBe("{[-1, 1), [3, 7)}");
    });

    it("stretches from the lower bound when anchored there", () => {
      expect(ints.scale(8, { anchor: "lower" }).toString()).toBe("{[1, 3), [5, 9)}");
      expect(ints.shiftScale(10, 8, { anchor: "lower" }).toString()).toBe("{[11, 13), [15, 19)}");
    });

    it("merges members squeezed together", () => {
      expect(ints.scale(2, { anchor: "lower" }).toString()).toBe("{[1, 3)}");
    });

    it("keeps float bounds and their inclusivity", () => {
      const floats = SpanSet.of(floatSpan(0, 1, false, true), floatSpan(3, 4));
      expect(floats.scale(2, { anchor: "lower" }).toString()).toBe("{(0, 0.5], [1.5, 2)}");
    });

    it("rejects a negative width", () => {
      expect(() => ints.scale(-1)).toThrow(InvalidSpanError);
    });

    it("leaves an empty set alone", () => {
      expect(SpanSet.empty(FloatDomain).scale(3).isEmpty()).toBe(true);
    });
  });

  describe("position and distance", () => {
    const set = SpanSet.of(floatSpan(1, 2), floatSpan(3, 5));

    it("uses the first and last members", () => {
      expect(set.isLeft(floatSpan(6, 7))).toBe(true);
      expect(set.isRight(floatSpan(-2, 0))).toBe(true);
      expect(set.overlaps(floatSpan(4, 9))).toBe(true);
      expect(set.overlaps(floatSpan(2, 3))).toBe(false);
      expect(set.isAdjacent(floatSpan(2, 3))).toBe(true);
    });

    it("takes the minimum distance over members", () => {
      expect(set.distanceToValue(2.5)).toBe(0.5);
      expect(set.distanceToValue(4)).toBe(0);
      expect(set.distanceToSpan(floatSpan(8, 9))).toBe(3);
    });

    it("is infinitely far when empty", () => {
      expect(SpanSet.empty(FloatDomain).distanceToValue(1)).toBe(Infinity);
    });
  });
});
