/**
 * TSequenceSet
 *
 * Time-ordered, pairwise disjoint sequences sharing one domain and one
 * interpolation. Used for values with gaps or discontinuities.
 */

import type { Interpolation, Micros, Timestamp } from "@tempora/contracts";
import {
  DuplicateTimestampError,
  IncompatibleInterpolationError,
  InvalidTemporalError,
  UnorderedInstantsError,
} from "@tempora/contracts";
import { Span, tstzSpan } from "../spans/Span";
import { SpanSet } from "../spans/SpanSet";
import { TimestampDomain } from "../domains/scalar";
import { domainsEqual } from "../domains/values";
import { Temporal, timeTransform, type TimeRestriction } from "./Temporal";
import type { TInstant } from "./TInstant";
import type { TSequence } from "./TSequence";

export class TSequenceSet<V> extends Temporal<V> {
  readonly subtype = "sequence_set" as const;
  readonly interpolation: Interpolation;

  private readonly components: ReadonlyArray<TSequence<V>>;

  /**
   * @throws InvalidTemporalError for an empty list or mixed domains
   * @throws IncompatibleInterpolationError for mixed interpolations
   * @throws UnorderedInstantsError when components overlap or are out of
   *   order; DuplicateTimestampError when two components share a timestamp
   */
  constructor(sequences: ReadonlyArray<TSequence<V>>) {
    const first = sequences[0];
    if (first === undefined) {
      throw new InvalidTemporalError("A sequence set needs at least one sequence");
    }
    super(first.domain);

    for (let i = 1; i < sequences.length; i++) {
      const prev = sequences[i - 1];
      const curr = sequences[i];
      if (!domainsEqual(curr.domain, first.domain)) {
        throw new InvalidTemporalError("All sequences of a set share one value domain");
      }
      if (curr.interpolation !== first.interpolation) {
        throw new IncompatibleInterpolationError(
          `Cannot mix ${first.interpolation} and ${curr.interpolation} sequences in one set`
        );
      }
      const prevEnd = prev.endTimestamp();
      const currStart = curr.startTimestamp();
      if (currStart < prevEnd) {
        throw new UnorderedInstantsError(
          `Sequence ${i} starts at ${currStart}, before sequence ${i - 1} ends at ${prevEnd}`
        );
      }
      if (currStart === prevEnd && prev.upperInclusive && curr.lowerInclusive) {
        throw new DuplicateTimestampError(
          `Sequences ${i - 1} and ${i} both include timestamp ${currStart}`
        );
      }
    }

    this.interpolation = first.interpolation;
    this.components = [...sequences];
  }

  sequences(): TSequence<V>[] {
    return [...this.components];
  }

  numSequences(): number {
    return this.components.length;
  }

  sequenceN(n: number): TSequence<V> | null {
    return this.components[n] ?? null;
  }

  startSequence(): TSequence<V> {
    return this.components[0];
  }

  endSequence(): TSequence<V> {
    return this.components[this.components.length - 1];
  }

  instants(): TInstant<V>[] {
    return this.components.flatMap((seq) => seq.instants());
  }

  segments(): TSequence<V>[] {
    return this.components.flatMap((seq) => seq.segments());
  }

  /** Delegates to the component whose period contains `t`. */
  valueAt(t: Timestamp): V | null {
    let lo = 0;
    let hi = this.components.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const seq = this.components[mid];
      const period = seq.period();
      if (period.contains(t)) return seq.valueAt(t);
      if (t <= period.lower) hi = mid - 1;
      else lo = mid + 1;
    }
    return null;
  }

  protected computePeriod(): Span<"timestamp"> {
    const start = this.startSequence().period();
    const end = this.endSequence().period();
    return tstzSpan(start.lower, end.upper, start.lowerInclusive, end.upperInclusive);
  }

  time(): SpanSet<"timestamp"> {
    return SpanSet.from(
      this.components.flatMap((seq) => seq.time().spans()),
      TimestampDomain
    );
  }

  shiftScaleTime(delta?: Micros, duration?: Micros): TSequenceSet<V> {
    const map = timeTransform(this.startTimestamp(), this.endTimestamp(), delta, duration);
    return new TSequenceSet(this.components.map((seq) => seq.mapTimestamps(map)));
  }

  shiftTime(delta: Micros): TSequenceSet<V> {
    return this.shiftScaleTime(delta);
  }

  scaleTime(duration: Micros): TSequenceSet<V> {
    return this.shiftScaleTime(undefined, duration);
  }

  atTime(time: TimeRestriction): TSequenceSet<V> | null {
    return this.collect((seq) => seq.atTime(time));
  }

  minusTime(time: TimeRestriction): TSequenceSet<V> | null {
    return this.collect((seq) => seq.minusTime(time));
  }

  atValue(value: V): TSequenceSet<V> | null {
    return this.collect((seq) => seq.atValue(value));
  }

  minusValue(value: V): TSequenceSet<V> | null {
    return this.collect((seq) => seq.minusValue(value));
  }

  toSequenceSet(): TSequenceSet<V> {
    return this;
  }

  equals(other: Temporal<V>): boolean {
    if (!(other instanceof TSequenceSet)) return false;
    return (
      this.components.length === other.components.length &&
      this.components.every((seq, i) => seq.equals(other.components[i]))
    );
  }

  private collect(
    restrict: (seq: TSequence<V>) => TSequenceSet<V> | null
  ): TSequenceSet<V> | null {
    const pieces = this.components.flatMap((seq) => restrict(seq)?.sequences() ?? []);
    return pieces.length > 0 ? new TSequenceSet(pieces) : null;
  }
}
