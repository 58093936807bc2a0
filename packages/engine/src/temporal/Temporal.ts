/**
 * Temporal
 *
 * Common base of instants, sequences and sequence sets. Accessors that
 * only need the ordered instants live here; subtypes implement value
 * lookup, restriction and the time transforms.
 *
 * Subclass modules import each other for conversions, so this module must
 * only refer to them as types.
 */

import type {
  Interpolation,
  Micros,
  TemporalSubtype,
  Timestamp,
  ValueDomain,
} from "@tempora/contracts";
import { InvalidTemporalError } from "@tempora/contracts";
import type { Span } from "../spans/Span";
import type { SpanSet } from "../spans/SpanSet";
import type { TInstant } from "./TInstant";
import type { TSequence } from "./TSequence";
import type { TSequenceSet } from "./TSequenceSet";

export type TimeRestriction = Span<"timestamp"> | SpanSet<"timestamp">;

export abstract class Temporal<V> {
  readonly domain: ValueDomain<V>;

  abstract readonly subtype: TemporalSubtype;
  abstract readonly interpolation: Interpolation;

  /** Time bounding box, computed on first use. */
  private cachedPeriod: Span<"timestamp"> | null = null;

  protected constructor(domain: ValueDomain<V>) {
    this.domain = domain;
  }

  abstract instants(): TInstant<V>[];

  /** Continuous pieces; an instant is a one-instant sequence. */
  abstract sequences(): TSequence<V>[];

  /** Two-instant sequences (or single instants) making up the value. */
  abstract segments(): TSequence<V>[];

  /**
   * Value at `t`, or null when `t` falls outside the value's bounds.
   * @throws NoValueAtTimestampError between the samples of a discrete value
   */
  abstract valueAt(t: Timestamp): V | null;

  /** Periods over which the value is defined. */
  abstract time(): SpanSet<"timestamp">;

  abstract shiftScaleTime(delta?: Micros, duration?: Micros): Temporal<V>;

  abstract atTime(time: TimeRestriction): Temporal<V> | null;
  abstract minusTime(time: TimeRestriction): Temporal<V> | null;
  abstract atValue(value: V): Temporal<V> | null;
  abstract minusValue(value: V): Temporal<V> | null;

  abstract toSequenceSet(): TSequenceSet<V>;

  abstract equals(other: Temporal<V>): boolean;

  protected abstract computePeriod(): Span<"timestamp">;

  // ==========================================================================
  // Time
  // ==========================================================================

  /**
   * Time bounding box: first to last timestamp with the value's own bound
   * inclusivity.
   */
  period(): Span<"timestamp"> {
    if (this.cachedPeriod === null) {
      this.cachedPeriod = this.computePeriod();
    }
    return this.cachedPeriod;
  }

  boundingBox(): Span<"timestamp"> {
    return this.period();
  }

  /**
   * Total defined time. With `ignoreGaps`, the distance from the first to
   * the last timestamp instead.
   */
  duration(ignoreGaps = false): Micros {
    if (ignoreGaps) return this.period().width();
    return this.time().width(true);
  }

  shiftTime(delta: Micros): Temporal<V> {
    return this.shiftScaleTime(delta, undefined);
  }

  scaleTime(duration: Micros): Temporal<V> {
    return this.shiftScaleTime(undefined, duration);
  }

  // ==========================================================================
  // Instants
  // ==========================================================================

  numInstants(): number {
    return this.instants().length;
  }

  instantN(n: number): TInstant<V> | null {
    return this.instants()[n] ?? null;
  }

  startInstant(): TInstant<V> {
    return this.instants()[0];
  }

  endInstant(): TInstant<V> {
    const instants = this.instants();
    return instants[instants.length - 1];
  }

  /** Instant with the smallest value; the earliest one on ties. */
  minInstant(): TInstant<V> {
    return this.instants().reduce((min, inst) =>
      this.domain.compare(inst.value, min.value) < 0 ? inst : min
    );
  }

  /** Instant with the largest value; the earliest one on ties. */
  maxInstant(): TInstant<V> {
    return this.instants().reduce((max, inst) =>
      this.domain.compare(inst.value, max.value) > 0 ? inst : max
    );
  }

  // ==========================================================================
  // Values
  // ==========================================================================

  values(): V[] {
    return this.instants().map((inst) => inst.value);
  }

  /** Distinct values in ascending order. */
  valueSet(): V[] {
    const sorted = this.values().sort((a, b) => this.domain.compare(a, b));
    return sorted.filter((value, i) => i === 0 || !this.domain.equals(sorted[i - 1], value));
  }

  startValue(): V {
    return this.startInstant().value;
  }

  endValue(): V {
    return this.endInstant().value;
  }

  minValue(): V {
    return this.minInstant().value;
  }

  maxValue(): V {
    return this.maxInstant().value;
  }

  // ==========================================================================
  // Timestamps
  // ==========================================================================

  timestamps(): Timestamp[] {
    return this.instants().map((inst) => inst.timestamp);
  }

  numTimestamps(): number {
    return this.numInstants();
  }

  startTimestamp(): Timestamp {
    return this.startInstant().timestamp;
  }

  endTimestamp(): Timestamp {
    return this.endInstant().timestamp;
  }

  timestampN(n: number): Timestamp | null {
    return this.instantN(n)?.timestamp ?? null;
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  /**
   * Order by time bounding box, then instant by instant.
   */
  compare(other: Temporal<V>): number {
    const byPeriod = this.period().compare(other.period());
    if (byPeriod !== 0) return byPeriod;
    const mine = this.instants();
    const theirs = other.instants();
    const count = Math.min(mine.length, theirs.length);
    for (let i = 0; i < count; i++) {
      const order = mine[i].compare(theirs[i]);
      if (order !== 0) return order;
    }
    return mine.length - theirs.length;
  }
}

/**
 * Affine map of timestamps shifting the start by `delta` and stretching
 * [start, end] to `duration`, rounded to the microsecond.
 */
export function timeTransform(
  start: Timestamp,
  end: Timestamp,
  delta: Micros | undefined,
  duration: Micros | undefined
): (t: Timestamp) => Timestamp {
  if (duration !== undefined && !(duration > 0)) {
    throw new InvalidTemporalError(`Duration must be positive, got ${duration}`);
  }
  const newStart = start + (delta ?? 0);
  const width = end - start;
  if (duration === undefined || width === 0) {
    return (t) => t + (delta ?? 0);
  }
  const factor = duration / width;
  return (t) => newStart + Math.round((t - start) * factor);
}
