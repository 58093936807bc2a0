/**
 * Span
 *
 * An immutable interval over an ordered scalar domain with explicit bound
 * inclusivity. One implementation serves every domain; the ScalarDomain
 * capability supplies validation, snapping and formatting.
 *
 * Discrete domains (int, date) are canonicalized on construction:
 * `[1, 5]` and `(0, 6)` both become `[1, 6)`.
 */

import type {
  ScalarDomain,
  ScalarKind,
  ScaleAnchor,
  SpanBounds,
} from "@tempora/contracts";
import { InvalidSpanError } from "@tempora/contracts";
import { DateDomain, FloatDomain, IntDomain, TimestampDomain } from "../domains/scalar";

/**
 * Options for rescaling a span.
 */
export interface ScaleOptions {
  /** @default "midpoint" */
  anchor?: ScaleAnchor;
}

function compareValues(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class Span<K extends ScalarKind = ScalarKind> implements SpanBounds {
  readonly domain: ScalarDomain<K>;
  readonly lower: number;
  readonly upper: number;
  readonly lowerInclusive: boolean;
  readonly upperInclusive: boolean;

  constructor(
    domain: ScalarDomain<K>,
    lower: number,
    upper: number,
    lowerInclusive = true,
    upperInclusive = false
  ) {
    if (!domain.isValid(lower) || !domain.isValid(upper)) {
      throw new InvalidSpanError(
        `Span bounds ${lower}, ${upper} are not ${domain.kind} values`
      );
    }

    let lo = lower;
    let hi = upper;
    let loInc = lowerInclusive;
    let hiInc = upperInclusive;
    if (domain.discrete) {
      if (!loInc) {
        lo += 1;
        loInc = true;
      }
      if (hiInc) {
        hi += 1;
        hiInc = false;
      }
    }

    if (lo > hi || (lo === hi && !(loInc && hiInc))) {
      throw new InvalidSpanError(
        `Invalid ${domain.kind} span: ${formatBounds(domain, lower, upper, lowerInclusive, upperInclusive)}`
      );
    }

    this.domain = domain;
    this.lower = lo;
    this.upper = hi;
    this.lowerInclusive = loInc;
    this.upperInclusive = hiInc;
  }

  get kind(): K {
    return this.domain.kind;
  }

  /** upper - lower, in domain units (microseconds for timestamps). */
  width(): number {
    return this.upper - this.lower;
  }

  // ==========================================================================
  // Containment and position
  // ==========================================================================

  contains(value: number): boolean;
  contains(other: Span<K>): boolean;
  contains(content: number | Span<K>): boolean {
    if (typeof content === "number") {
      const afterLower =
        this.lower < content || (this.lower === content && this.lowerInclusive);
      const beforeUpper =
        content < this.upper || (content === this.upper && this.upperInclusive);
      return afterLower && beforeUpper;
    }
    return compareLower(this, content) <= 0 && compareUpper(content, this) <= 0;
  }

  isContainedIn(container: Span<K>): boolean {
    return container.contains(this);
  }

  overlaps(other: Span<K>): boolean {
    return !endsBefore(this, other) && !endsBefore(other, this);
  }

  /** Entirely before `other`, sharing no value. */
  isLeft(other: Span<K>): boolean {
    return endsBefore(this, other);
  }

  /** Entirely after `other`, sharing no value. */
  isRight(other: Span<K>): boolean {
    return endsBefore(other, this);
  }

  /** Does not extend to the right of `other`. */
  isOverOrLeft(other: Span<K>): boolean {
    return compareUpper(this, other) <= 0;
  }

  /** Does not extend to the left of `other`. */
  isOverOrRight(other: Span<K>): boolean {
    return compareLower(this, other) >= 0;
  }

  /** Bounds touch with complementary inclusivity, e.g. [a, b) and [b, c). */
  isAdjacent(other: Span<K>): boolean {
    return (
      (this.upper === other.lower && this.upperInclusive !== other.lowerInclusive) ||
      (other.upper === this.lower && other.upperInclusive !== this.lowerInclusive)
    );
  }

  // ==========================================================================
  // Set operations
  // ==========================================================================

  /** Common part of both spans, or null when they are disjoint. */
  intersection(other: Span<K>): Span<K> | null {
    if (!this.overlaps(other)) return null;
    const lowerFrom = compareLower(this, other) >= 0 ? this : other;
    const upperFrom = compareUpper(this, other) <= 0 ? this : other;
    return new Span(
      this.domain,
      lowerFrom.lower,
      upperFrom.upper,
      lowerFrom.lowerInclusive,
      upperFrom.upperInclusive
    );
  }

  /**
   * Smallest span covering both spans.
   *
   * In strict mode the result must not add values that belong to neither
   * input: when the spans neither overlap nor touch, null is returned.
   * Non-strict mode always returns the covering span.
   */
  union(other: Span<K>, strict = true): Span<K> | null {
    if (strict && !this.overlaps(other) && !this.isAdjacent(other)) {
      return null;
    }
    const lowerFrom = compareLower(this, other) <= 0 ? this : other;
    const upperFrom = compareUpper(this, other) >= 0 ? this : other;
    return new Span(
      this.domain,
      lowerFrom.lower,
      upperFrom.upper,
      lowerFrom.lowerInclusive,
      upperFrom.upperInclusive
    );
  }

  // ==========================================================================
  // Transformations
  // ==========================================================================

  shift(delta: number): Span<K> {
    return this.shiftScale(delta, undefined);
  }

  scale(width: number, options: ScaleOptions = {}): Span<K> {
    return this.shiftScale(undefined, width, options);
  }

  /**
   * Shift by `delta`, then give the span width `width`. Bound inclusivity
   * is preserved. Unless anchored at the lower bound, the span keeps its
   * midpoint while being stretched or shrunk.
   */
  shiftScale(
    delta: number | undefined,
    width: number | undefined,
    options: ScaleOptions = {}
  ): Span<K> {
    if (width !== undefined && (width < 0 || Number.isNaN(width))) {
      throw new InvalidSpanError(`Span width must be non-negative, got ${width}`);
    }

    let lower = this.lower + (delta ?? 0);
    let upper = this.upper + (delta ?? 0);
    if (width !== undefined) {
      if ((options.anchor ?? "midpoint") === "midpoint") {
        lower += this.domain.snap((upper - lower - width) / 2);
      }
      upper = lower + width;
    }

    return new Span(
      this.domain,
      lower,
      upper,
      this.lowerInclusive,
      this.upperInclusive
    );
  }

  // ==========================================================================
  // Distances
  // ==========================================================================

  /** 0 when the value is inside the span. */
  distanceToValue(value: number): number {
    if (this.contains(value)) return 0;
    if (value <= this.lower) return this.lower - value;
    return value - lastValue(this);
  }

  /** 0 when the spans overlap. */
  distanceToSpan(other: Span<K>): number {
    if (this.overlaps(other)) return 0;
    if (this.isLeft(other)) return other.lower - lastValue(this);
    return this.lower - lastValue(other);
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  equals(other: Span<K>): boolean {
    return (
      this.domain.kind === other.domain.kind &&
      this.lower === other.lower &&
      this.upper === other.upper &&
      this.lowerInclusive === other.lowerInclusive &&
      this.upperInclusive === other.upperInclusive
    );
  }

  /**
   * Lexicographic order: lower bound (inclusive before exclusive), then
   * upper bound (exclusive before inclusive).
   */
  compare(other: Span<K>): number {
    const byLower = compareLower(this, other);
    return byLower !== 0 ? byLower : compareUpper(this, other);
  }

  toString(): string {
    return formatBounds(
      this.domain,
      this.lower,
      this.upper,
      this.lowerInclusive,
      this.upperInclusive
    );
  }
}

// ============================================================================
// Bound helpers
// ============================================================================

/** Order of lower bounds: an inclusive bound starts before an exclusive one. */
export function compareLower(a: SpanBounds, b: SpanBounds): number {
  const byValue = compareValues(a.lower, b.lower);
  if (byValue !== 0) return byValue;
  if (a.lowerInclusive === b.lowerInclusive) return 0;
  return a.lowerInclusive ? -1 : 1;
}

/** Order of upper bounds: an exclusive bound ends before an inclusive one. */
export function compareUpper(a: SpanBounds, b: SpanBounds): number {
  const byValue = compareValues(a.upper, b.upper);
  if (byValue !== 0) return byValue;
  if (a.upperInclusive === b.upperInclusive) return 0;
  return a.upperInclusive ? 1 : -1;
}

/** `a` ends before `b` starts, with no shared value. */
export function endsBefore(a: SpanBounds, b: SpanBounds): boolean {
  return (
    a.upper < b.lower ||
    (a.upper === b.lower && !(a.upperInclusive && b.lowerInclusive))
  );
}

/** Largest member value; discrete spans end one unit before the bound. */
function lastValue<K extends ScalarKind>(span: Span<K>): number {
  return span.domain.discrete ? span.upper - 1 : span.upper;
}

function formatBounds(
  domain: ScalarDomain,
  lower: number,
  upper: number,
  lowerInclusive: boolean,
  upperInclusive: boolean
): string {
  return `${lowerInclusive ? "[" : "("}${domain.format(lower)}, ${domain.format(upper)}${
    upperInclusive ? "]" : ")"
  }`;
}

// ============================================================================
// Constructors
// ============================================================================

export function intSpan(
  lower: number,
  upper: number,
  lowerInclusive = true,
  upperInclusive = false
): Span<"int"> {
  return new Span(IntDomain, lower, upper, lowerInclusive, upperInclusive);
}

export function floatSpan(
  lower: number,
  upper: number,
  lowerInclusive = true,
  upperInclusive = false
): Span<"float"> {
  return new Span(FloatDomain, lower, upper, lowerInclusive, upperInclusive);
}

export function tstzSpan(
  lower: number,
  upper: number,
  lowerInclusive = true,
  upperInclusive = false
): Span<"timestamp"> {
  return new Span(TimestampDomain, lower, upper, lowerInclusive, upperInclusive);
}

export function dateSpan(
  lower: number,
  upper: number,
  lowerInclusive = true,
  upperInclusive = false
): Span<"date"> {
  return new Span(DateDomain, lower, upper, lowerInclusive, upperInclusive);
}
