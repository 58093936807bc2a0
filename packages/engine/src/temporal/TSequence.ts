/**
 * TSequence
 *
 * A run of instants with strictly increasing timestamps, one interpolation
 * mode and bound inclusivity flags. Discrete sequences are sets of
 * isolated samples; step and linear sequences denote a continuum between
 * their first and last timestamps.
 */

import type {
  InstantData,
  Interpolation,
  Micros,
  SequenceOptions,
  Timestamp,
  ValueDomain,
} from "@tempora/contracts";
import {
  DuplicateTimestampError,
  InvalidTemporalError,
  NoValueAtTimestampError,
  UnorderedInstantsError,
} from "@tempora/contracts";
import { Span, tstzSpan } from "../spans/Span";
import { SpanSet } from "../spans/SpanSet";
import { TimestampDomain } from "../domains/scalar";
import { domainsEqual } from "../domains/values";
import { assertInterpolation, interpolate, locate } from "../interpolation/interpolate";
import { Temporal, timeTransform, type TimeRestriction } from "./Temporal";
import { TInstant } from "./TInstant";
import { TSequenceSet } from "./TSequenceSet";

export class TSequence<V> extends Temporal<V> {
  readonly subtype = "sequence" as const;
  readonly interpolation: Interpolation;
  readonly lowerInclusive: boolean;
  readonly upperInclusive: boolean;

  private readonly samples: ReadonlyArray<TInstant<V>>;

  /**
   * @throws InvalidTemporalError for an empty list, invalid values, or
   *   exclusive bounds on a discrete or single-instant sequence
   * @throws UnorderedInstantsError / DuplicateTimestampError when
   *   timestamps are not strictly increasing
   * @throws IncompatibleInterpolationError for linear interpolation of a
   *   domain that cannot interpolate
   */
  constructor(
    domain: ValueDomain<V>,
    instants: ReadonlyArray<InstantData<V>>,
    options: SequenceOptions = {}
  ) {
    super(domain);
    const interpolation = options.interpolation ?? defaultInterpolation(domain);
    const lowerInclusive = options.lowerInclusive ?? true;
    const upperInclusive = options.upperInclusive ?? true;

    if (instants.length === 0) {
      throw new InvalidTemporalError("A sequence needs at least one instant");
    }
    assertInterpolation(domain, interpolation);
    if (interpolation === "discrete" && !(lowerInclusive && upperInclusive)) {
      throw new InvalidTemporalError("Discrete sequences have inclusive bounds");
    }
    if (instants.length === 1 && !(lowerInclusive && upperInclusive)) {
      throw new InvalidTemporalError("A single-instant sequence has inclusive bounds");
    }

    const samples = instants.map((inst) =>
      inst instanceof TInstant && domainsEqual(inst.domain, domain)
        ? inst
        : new TInstant(domain, inst.value, inst.timestamp)
    );
    for (let i = 1; i < samples.length; i++) {
      const prev = samples[i - 1].timestamp;
      const curr = samples[i].timestamp;
      if (curr === prev) {
        throw new DuplicateTimestampError(`Duplicate timestamp ${curr} at instant ${i}`);
      }
      if (curr < prev) {
        throw new UnorderedInstantsError(
          `Instant ${i} at ${curr} precedes instant ${i - 1} at ${prev}`
        );
      }
    }

    this.interpolation = interpolation;
    this.lowerInclusive = lowerInclusive;
    this.upperInclusive = upperInclusive;
    this.samples = samples;
  }

  instants(): TInstant<V>[] {
    return [...this.samples];
  }

  sequences(): TSequence<V>[] {
    return [this];
  }

  isContinuous(): boolean {
    return this.interpolation !== "discrete";
  }

  /**
   * Two-instant pieces of a continuous sequence; single instants for a
   * discrete one.
   */
  segments(): TSequence<V>[] {
    const n = this.samples.length;
    if (!this.isContinuous() || n === 1) {
      return this.samples.map((inst) => inst.toSequence(this.interpolation));
    }
    const segments: TSequence<V>[] = [];
    for (let i = 0; i < n - 1; i++) {
      segments.push(
        new TSequence(this.domain, [this.samples[i], this.samples[i + 1]], {
          interpolation: this.interpolation,
          lowerInclusive: i === 0 ? this.lowerInclusive : true,
          upperInclusive: i === n - 2 ? this.upperInclusive : false,
        })
      );
    }
    return segments;
  }

  // ==========================================================================
  // Value lookup
  // ==========================================================================

  valueAt(t: Timestamp): V | null {
    if (!this.period().contains(t)) return null;
    const index = this.search(t);
    const found = this.samples[index];
    if (found.timestamp === t) return found.value;
    if (this.interpolation === "discrete") {
      throw new NoValueAtTimestampError(t, `No sample at timestamp ${t} in a discrete sequence`);
    }
    return interpolate(this.domain, this.samples[index - 1], found, t, this.interpolation, {
      closesSequence: index === this.samples.length - 1 && this.upperInclusive,
    });
  }

  /**
   * Value at `t` within [start, end] ignoring bound inclusivity; steps
   * take the value starting at `t`.
   */
  private valueWithin(t: Timestamp): V {
    const index = this.search(t);
    const found = this.samples[index];
    if (found.timestamp === t) return found.value;
    if (index === 0) {
      throw new NoValueAtTimestampError(t);
    }
    return interpolate(this.domain, this.samples[index - 1], found, t, this.interpolation);
  }

  /** Value approached from the left at `t`, for step sequences. */
  private valueBefore(t: Timestamp): V {
    const index = this.search(t);
    return this.samples[Math.max(0, index - 1)].value;
  }

  /** Index of the first sample at or after `t` (clamped to the last). */
  private search(t: Timestamp): number {
    let lo = 0;
    let hi = this.samples.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.samples[mid].timestamp < t) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  // ==========================================================================
  // Time
  // ==========================================================================

  protected computePeriod(): Span<"timestamp"> {
    return tstzSpan(
      this.startTimestamp(),
      this.endTimestamp(),
      this.lowerInclusive,
      this.upperInclusive
    );
  }

  time(): SpanSet<"timestamp"> {
    if (this.isContinuous()) return SpanSet.of(this.period());
    return SpanSet.from(this.samples.map((inst) => inst.period()));
  }

  shiftScaleTime(delta?: Micros, duration?: Micros): TSequence<V> {
    return this.mapTimestamps(
      timeTransform(this.startTimestamp(), this.endTimestamp(), delta, duration)
    );
  }

  shiftTime(delta: Micros): TSequence<V> {
    return this.shiftScaleTime(delta);
  }

  scaleTime(duration: Micros): TSequence<V> {
    return this.shiftScaleTime(undefined, duration);
  }

  /** @internal Rebuild with every timestamp passed through `map`. */
  mapTimestamps(map: (t: Timestamp) => Timestamp): TSequence<V> {
    return new TSequence(
      this.domain,
      this.samples.map((inst) => ({ value: inst.value, timestamp: map(inst.timestamp) })),
      this.options()
    );
  }

  // ==========================================================================
  // Restriction
  // ==========================================================================

  atTime(time: TimeRestriction): TSequenceSet<V> | null {
    const periods = time instanceof SpanSet ? time : SpanSet.of(time);
    if (!this.isContinuous()) {
      return this.keepSamples((inst) => periods.contains(inst.timestamp));
    }
    const pieces = periods
      .intersection(this.period())
      .spans()
      .map((span) => this.restrictTo(span));
    return pieces.length > 0 ? new TSequenceSet(pieces) : null;
  }

  minusTime(time: TimeRestriction): TSequenceSet<V> | null {
    if (!this.isContinuous()) {
      return this.keepSamples((inst) => !time.contains(inst.timestamp));
    }
    return this.atTime(SpanSet.of(this.period()).minus(time));
  }

  /**
   * Restrict to the periods where the value equals `value`. Linear
   * segments crossing `value` contribute a synthetic instant at the
   * crossing time.
   */
  atValue(value: V): TSequenceSet<V> | null {
    if (!this.isContinuous()) {
      return this.keepSamples((inst) => this.domain.equals(inst.value, value));
    }
    const periods = this.periodsEqualTo(value);
    const pieces = periods.spans().map((span) =>
      span.lower === span.upper
        ? new TSequence(this.domain, [{ value, timestamp: span.lower }], {
            interpolation: this.interpolation,
          })
        : this.restrictTo(span)
    );
    return pieces.length > 0 ? new TSequenceSet(pieces) : null;
  }

  minusValue(value: V): TSequenceSet<V> | null {
    if (!this.isContinuous()) {
      return this.keepSamples((inst) => !this.domain.equals(inst.value, value));
    }
    return this.atTime(SpanSet.of(this.period()).minus(this.periodsEqualTo(value)));
  }

  /**
   * Periods, within this sequence's bounds, over which the value is
   * `value`.
   */
  private periodsEqualTo(value: V): SpanSet<"timestamp"> {
    const eq = (v: V) => this.domain.equals(v, value);
    const n = this.samples.length;
    const found: Span<"timestamp">[] = [];

    if (n === 1) {
      if (eq(this.samples[0].value)) found.push(this.samples[0].period());
    } else if (this.interpolation === "step") {
      for (let i = 0; i < n - 1; i++) {
        if (eq(this.samples[i].value)) {
          found.push(tstzSpan(this.samples[i].timestamp, this.samples[i + 1].timestamp, true, false));
        }
      }
      if (eq(this.samples[n - 1].value)) found.push(this.samples[n - 1].period());
    } else {
      for (let i = 0; i < n - 1; i++) {
        const start = this.samples[i];
        const end = this.samples[i + 1];
        if (eq(start.value) && eq(end.value)) {
          found.push(tstzSpan(start.timestamp, end.timestamp, true, true));
          continue;
        }
        const crossing = locate(this.domain, start, end, value);
        if (crossing !== null) found.push(tstzSpan(crossing, crossing, true, true));
      }
    }

    return SpanSet.from(found, TimestampDomain).intersection(this.period());
  }

  /** Sub-sequence over `span`, which must lie within this sequence's period. */
  private restrictTo(span: Span<"timestamp">): TSequence<V> {
    const { lower, upper } = span;
    const options = { interpolation: this.interpolation };
    if (lower === upper) {
      return new TSequence(this.domain, [{ value: this.valueWithin(lower), timestamp: lower }], options);
    }

    const instants: InstantData<V>[] = [{ value: this.valueWithin(lower), timestamp: lower }];
    for (const inst of this.samples) {
      if (inst.timestamp > lower && inst.timestamp < upper) instants.push(inst);
    }
    const endValue =
      this.interpolation === "step" && !span.upperInclusive
        ? this.valueBefore(upper)
        : this.valueWithin(upper);
    instants.push({ value: endValue, timestamp: upper });

    return new TSequence(this.domain, instants, {
      ...options,
      lowerInclusive: span.lowerInclusive,
      upperInclusive: span.upperInclusive,
    });
  }

  private keepSamples(keep: (inst: TInstant<V>) => boolean): TSequenceSet<V> | null {
    const kept = this.samples.filter(keep);
    if (kept.length === 0) return null;
    return new TSequenceSet([new TSequence(this.domain, kept, { interpolation: "discrete" })]);
  }

  // ==========================================================================
  // Construction helpers
  // ==========================================================================

  /** New sequence with `instant` appended after the last instant. */
  appendInstant(instant: InstantData<V>): TSequence<V> {
    return new TSequence(this.domain, [...this.samples, instant], this.options());
  }

  toSequenceSet(): TSequenceSet<V> {
    return new TSequenceSet([this]);
  }

  options(): Required<SequenceOptions> {
    return {
      interpolation: this.interpolation,
      lowerInclusive: this.lowerInclusive,
      upperInclusive: this.upperInclusive,
    };
  }

  equals(other: Temporal<V>): boolean {
    if (!(other instanceof TSequence)) return false;
    return (
      domainsEqual(this.domain, other.domain) &&
      this.interpolation === other.interpolation &&
      this.lowerInclusive === other.lowerInclusive &&
      this.upperInclusive === other.upperInclusive &&
      this.samples.length === other.samples.length &&
      this.samples.every((inst, i) => inst.equals(other.samples[i]))
    );
  }
}

/** Linear where the domain can interpolate, step otherwise. */
export function defaultInterpolation<V>(domain: ValueDomain<V>): Interpolation {
  return domain.lerp !== undefined ? "linear" : "step";
}
