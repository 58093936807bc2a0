/**
 * SpanSet
 *
 * A normalized set of spans over one scalar domain: sorted by lower bound,
 * pairwise disjoint and non-adjacent. Any iterable of spans is normalized
 * on construction, so every SpanSet in circulation satisfies the invariant.
 *
 * A SpanSet may be empty; that is how set algebra reports "nothing".
 */

import type { ScalarDomain, ScalarKind } from "@tempora/contracts";
import { InvalidSpanError } from "@tempora/contracts";
import { Span, compareLower, compareUpper, type ScaleOptions } from "./Span";

export class SpanSet<K extends ScalarKind = ScalarKind> {
  readonly domain: ScalarDomain<K>;
  private readonly members: ReadonlyArray<Span<K>>;

  private constructor(domain: ScalarDomain<K>, members: Span<K>[]) {
    this.domain = domain;
    this.members = members;
  }

  /**
   * Normalize `spans` into a SpanSet. The domain is taken from the first
   * span when not given; an empty input needs an explicit domain.
   */
  static from<K extends ScalarKind>(
    spans: Iterable<Span<K>>,
    domain?: ScalarDomain<K>
  ): SpanSet<K> {
    const list = Array.from(spans);
    const resolved = domain ?? list[0]?.domain;
    if (resolved === undefined) {
      throw new InvalidSpanError("Cannot infer the domain of an empty span set");
    }
    for (const span of list) {
      if (span.domain.kind !== resolved.kind) {
        throw new InvalidSpanError(
          `Cannot mix ${span.domain.kind} and ${resolved.kind} spans in one set`
        );
      }
    }
    return new SpanSet(resolved, normalize(list));
  }

  static of<K extends ScalarKind>(...spans: Span<K>[]): SpanSet<K> {
    return SpanSet.from(spans);
  }

  static empty<K extends ScalarKind>(domain: ScalarDomain<K>): SpanSet<K> {
    return new SpanSet(domain, []);
  }

  get kind(): K {
    return this.domain.kind;
  }

  isEmpty(): boolean {
    return this.members.length === 0;
  }

  numSpans(): number {
    return this.members.length;
  }

  spans(): Span<K>[] {
    return [...this.members];
  }

  spanN(n: number): Span<K> | null {
    return this.members[n] ?? null;
  }

  startSpan(): Span<K> | null {
    return this.members[0] ?? null;
  }

  endSpan(): Span<K> | null {
    return this.members[this.members.length - 1] ?? null;
  }

  /** Covering span from the first lower bound to the last upper bound. */
  boundingSpan(): Span<K> | null {
    const first = this.startSpan();
    const last = this.endSpan();
    if (first === null || last === null) return null;
    return new Span(
      this.domain,
      first.lower,
      last.upper,
      first.lowerInclusive,
      last.upperInclusive
    );
  }

  /**
   * With `ignoreGaps`, the sum of member widths; otherwise the distance
   * from the first lower bound to the last upper bound.
   */
  width(ignoreGaps = false): number {
    if (ignoreGaps) {
      return this.members.reduce((sum, span) => sum + span.width(), 0);
    }
    return this.boundingSpan()?.width() ?? 0;
  }

  // ==========================================================================
  // Predicates
  // ==========================================================================

  contains(value: number): boolean;
  contains(other: Span<K> | SpanSet<K>): boolean;
  contains(content: number | Span<K> | SpanSet<K>): boolean {
    if (typeof content === "number") {
      return this.findContaining(content) !== null;
    }
    const spans = content instanceof SpanSet ? content.members : [content];
    return spans.every((span) => this.members.some((member) => member.contains(span)));
  }

  isContainedIn(container: Span<K> | SpanSet<K>): boolean {
    return toSpanSet(container).contains(this);
  }

  overlaps(other: Span<K> | SpanSet<K>): boolean {
    const others = toSpanSet(other).members;
    let i = 0;
    let j = 0;
    while (i < this.members.length && j < others.length) {
      const a = this.members[i];
      const b = others[j];
      if (a.overlaps(b)) return true;
      if (compareUpper(a, b) <= 0) i++;
      else j++;
    }
    return false;
  }

  isLeft(other: Span<K> | SpanSet<K>): boolean {
    return this.compareEdges(other, (last, _first, _oLast, oFirst) => last.isLeft(oFirst));
  }

  isRight(other: Span<K> | SpanSet<K>): boolean {
    return this.compareEdges(other, (_last, first, oLast) => first.isRight(oLast));
  }

  isOverOrLeft(other: Span<K> | SpanSet<K>): boolean {
    return this.compareEdges(other, (last, _first, oLast) => last.isOverOrLeft(oLast));
  }

  isOverOrRight(other: Span<K> | SpanSet<K>): boolean {
    return this.compareEdges(other, (_last, first, _oLast, oFirst) =>
      first.isOverOrRight(oFirst)
    );
  }

  isAdjacent(other: Span<K> | SpanSet<K>): boolean {
    const others = toSpanSet(other);
    if (this.overlaps(others)) return false;
    return this.members.some((a) => others.members.some((b) => a.isAdjacent(b)));
  }

  // ==========================================================================
  // Set operations
  // ==========================================================================

  union(other: Span<K> | SpanSet<K>): SpanSet<K> {
    return SpanSet.from([...this.members, ...toSpanSet(other).members], this.domain);
  }

  /** Empty set, not an error, when nothing is shared. */
  intersection(other: Span<K> | SpanSet<K>): SpanSet<K> {
    const others = toSpanSet(other).members;
    const result: Span<K>[] = [];
    let i = 0;
    let j = 0;
    while (i < this.members.length && j < others.length) {
      const a = this.members[i];
      const b = others[j];
      const common = a.intersection(b);
      if (common !== null) result.push(common);
      if (compareUpper(a, b) <= 0) i++;
      else j++;
    }
    return SpanSet.from(result, this.domain);
  }

  /** Values of this set that are not in `other`. */
  minus(other: Span<K> | SpanSet<K>): SpanSet<K> {
    const others = toSpanSet(other).members;
    const result: Span<K>[] = [];
    for (const span of this.members) {
      let remaining: Span<K>[] = [span];
      for (const hole of others) {
        remaining = remaining.flatMap((piece) => subtract(piece, hole));
        if (remaining.length === 0) break;
      }
      result.push(...remaining);
    }
    return SpanSet.from(result, this.domain);
  }

  shift(delta: number): SpanSet<K> {
    return this.shiftScale(delta, undefined);
  }

  scale(width: number, options: ScaleOptions = {}): SpanSet<K> {
    return this.shiftScale(undefined, width, options);
  }

  /**
   * Shift every member by `delta`, then stretch the set so that its
   * bounding span has width `width`. Members keep their relative
   * positions; the anchor works as in Span.shiftScale. Members squeezed
   * onto a single value become instantaneous, and members brought
   * together are merged.
   */
  shiftScale(
    delta: number | undefined,
    width: number | undefined,
    options: ScaleOptions = {}
  ): SpanSet<K> {
    const shifted =
      delta === undefined
        ? this
        : new SpanSet(this.domain, this.members.map((span) => span.shift(delta)));
    const bounds = shifted.boundingSpan();
    if (width === undefined || bounds === null) return shifted;

    const target = bounds.scale(width, options);
    const oldWidth = bounds.width();
    const map = (value: number): number => {
      if (oldWidth === 0) return target.lower;
      if (value === bounds.upper) return target.upper;
      return this.domain.snap(target.lower + ((value - bounds.lower) * target.width()) / oldWidth);
    };

    const spans = shifted.members.map((span) => {
      const lower = map(span.lower);
      const upper = map(span.upper);
      return lower === upper
        ? new Span(this.domain, lower, lower, true, true)
        : new Span(this.domain, lower, upper, span.lowerInclusive, span.upperInclusive);
    });
    return SpanSet.from(spans, this.domain);
  }

  // ==========================================================================
  // Distances
  // ==========================================================================

  distanceToValue(value: number): number {
    return this.minimum((span) => span.distanceToValue(value));
  }

  distanceToSpan(other: Span<K>): number {
    return this.minimum((span) => span.distanceToSpan(other));
  }

  distanceToSpanSet(other: SpanSet<K>): number {
    return this.minimum((span) => other.distanceToSpan(span));
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  equals(other: SpanSet<K>): boolean {
    return (
      this.domain.kind === other.domain.kind &&
      this.members.length === other.members.length &&
      this.members.every((span, i) => span.equals(other.members[i]))
    );
  }

  /** Member-wise lexicographic order; a proper prefix sorts first. */
  compare(other: SpanSet<K>): number {
    const count = Math.min(this.members.length, other.members.length);
    for (let i = 0; i < count; i++) {
      const order = this.members[i].compare(other.members[i]);
      if (order !== 0) return order;
    }
    return this.members.length - other.members.length;
  }

  toString(): string {
    return `{${this.members.map((span) => span.toString()).join(", ")}}`;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /** Binary search for the member containing `value`. */
  private findContaining(value: number): Span<K> | null {
    let lo = 0;
    let hi = this.members.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const span = this.members[mid];
      if (span.contains(value)) return span;
      if (value < span.lower || (value === span.lower && !span.lowerInclusive)) {
        hi = mid - 1;
      } else {
        lo = mid + 1;
      }
    }
    return null;
  }

  private compareEdges(
    other: Span<K> | SpanSet<K>,
    test: (last: Span<K>, first: Span<K>, otherLast: Span<K>, otherFirst: Span<K>) => boolean
  ): boolean {
    const others = toSpanSet(other);
    const first = this.startSpan();
    const last = this.endSpan();
    const otherFirst = others.startSpan();
    const otherLast = others.endSpan();
    if (first === null || last === null || otherFirst === null || otherLast === null) {
      return false;
    }
    return test(last, first, otherLast, otherFirst);
  }

  private minimum(distance: (span: Span<K>) => number): number {
    if (this.members.length === 0) return Infinity;
    return Math.min(...this.members.map(distance));
  }
}

function toSpanSet<K extends ScalarKind>(value: Span<K> | SpanSet<K>): SpanSet<K> {
  return value instanceof SpanSet ? value : SpanSet.from([value]);
}

/**
 * Sort spans and merge every overlapping or adjacent pair.
 */
function normalize<K extends ScalarKind>(spans: Span<K>[]): Span<K>[] {
  const sorted = [...spans].sort((a, b) => a.compare(b));
  const merged: Span<K>[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last !== undefined && (last.overlaps(span) || last.isAdjacent(span))) {
      const union = last.union(span, false);
      if (union !== null) merged[merged.length - 1] = union;
    } else {
      merged.push(span);
    }
  }
  return merged;
}

/** `span` with the values of `hole` removed: zero, one or two pieces. */
function subtract<K extends ScalarKind>(span: Span<K>, hole: Span<K>): Span<K>[] {
  if (!span.overlaps(hole)) return [span];
  const pieces: Span<K>[] = [];
  if (compareLower(span, hole) < 0) {
    pieces.push(
      new Span(span.domain, span.lower, hole.lower, span.lowerInclusive, !hole.lowerInclusive)
    );
  }
  if (compareUpper(span, hole) > 0) {
    pieces.push(
      new Span(span.domain, hole.upper, span.upper, !hole.upperInclusive, span.upperInclusive)
    );
  }
  return pieces;
}
