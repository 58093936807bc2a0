import type {
  InstantData,
  Interpolation,
  Micros,
  Timestamp,
  ValueDomain,
} from "@tempora/contracts";
import { InvalidTemporalError, MAX_TIMESTAMP, MIN_TIMESTAMP } from "@tempora/contracts";
import { Span, tstzSpan } from "../spans/Span";
import { SpanSet } from "../spans/SpanSet";
import { domainsEqual } from "../domains/values";
import { Temporal, type TimeRestriction } from "./Temporal";
import { TSequence } from "./TSequence";
import { TSequenceSet } from "./TSequenceSet";

/**
 * A single timestamped value.
 */
export class TInstant<V> extends Temporal<V> implements InstantData<V> {
  readonly subtype = "instant" as const;
  readonly interpolation: Interpolation = "discrete";

  readonly value: V;
  readonly timestamp: Timestamp;

  constructor(domain: ValueDomain<V>, value: V, timestamp: Timestamp) {
    super(domain);
    if (!domain.isValid(value)) {
      throw new InvalidTemporalError(`Invalid ${domain.kind} value: ${String(value)}`);
    }
    if (!Number.isSafeInteger(timestamp)) {
      throw new InvalidTemporalError(
        `Timestamps must be integer microseconds between ${MIN_TIMESTAMP} and ${MAX_TIMESTAMP}, got ${timestamp}`
      );
    }
    this.value = value;
    this.timestamp = timestamp;
  }

  instants(): TInstant<V>[] {
    return [this];
  }

  sequences(): TSequence<V>[] {
    return [this.toSequence()];
  }

  segments(): TSequence<V>[] {
    return this.sequences();
  }

  valueAt(t: Timestamp): V | null {
    return t === this.timestamp ? this.value : null;
  }

  time(): SpanSet<"timestamp"> {
    return SpanSet.of(this.period());
  }

  protected computePeriod(): Span<"timestamp"> {
    return tstzSpan(this.timestamp, this.timestamp, true, true);
  }

  /** Scaling has no effect on a single instant. */
  shiftScaleTime(delta?: Micros, _duration?: Micros): TInstant<V> {
    return new TInstant(this.domain, this.value, this.timestamp + (delta ?? 0));
  }

  shiftTime(delta: Micros): TInstant<V> {
    return this.shiftScaleTime(delta);
  }

  atTime(time: TimeRestriction): TInstant<V> | null {
    return time.contains(this.timestamp) ? this : null;
  }

  minusTime(time: TimeRestriction): TInstant<V> | null {
    return time.contains(this.timestamp) ? null : this;
  }

  atValue(value: V): TInstant<V> | null {
    return this.domain.equals(this.value, value) ? this : null;
  }

  minusValue(value: V): TInstant<V> | null {
    return this.domain.equals(this.value, value) ? null : this;
  }

  toSequence(interpolation: Interpolation = "discrete"): TSequence<V> {
    return new TSequence(this.domain, [this], { interpolation });
  }

  toSequenceSet(): TSequenceSet<V> {
    return new TSequenceSet([this.toSequence()]);
  }

  equals(other: Temporal<V>): boolean {
    return (
      other instanceof TInstant &&
      domainsEqual(this.domain, other.domain) &&
      other.timestamp === this.timestamp &&
      this.domain.equals(this.value, other.value)
    );
  }

  /**
   * Instants order by value first, then timestamp. Against other temporal
   * subtypes the general time-first order applies.
   */
  compare(other: Temporal<V>): number {
    if (!(other instanceof TInstant)) return super.compare(other);
    const byValue = this.domain.compare(this.value, other.value);
    if (byValue !== 0) return byValue;
    return this.timestamp - other.timestamp;
  }
}
