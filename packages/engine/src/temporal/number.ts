/**
 * Temporal Numbers
 *
 * Operations that only make sense for temporal ints and floats:
 * restriction to value spans, value shifting and scaling, arithmetic and
 * derived values.
 *
 * Arithmetic between two temporal values is defined over their common
 * time. Linear operands are combined at the union of their timestamps,
 * plus the turning points of products; quotients of linear values are
 * sampled at those timestamps.
 */

import type {
  InstantData,
  Interpolation,
  NumberDomain,
  SpanBounds,
  Timestamp,
} from "@tempora/contracts";
import {
  IncompatibleInterpolationError,
  InvalidTemporalError,
  UndefinedForDiscreteError,
} from "@tempora/contracts";
import { TimestampDomain } from "../domains/scalar";
import { TFLOAT, TINT, isNumberDomain } from "../domains/values";
import { locate } from "../interpolation/interpolate";
import { type Span, compareUpper, tstzSpan } from "../spans/Span";
import { SpanSet } from "../spans/SpanSet";
import { formatTimestamp } from "../time/timestamps";
import type { Temporal } from "./Temporal";
import { TInstant } from "./TInstant";
import { TSequence } from "./TSequence";
import { TSequenceSet } from "./TSequenceSet";
import { isInstant, isSequenceSet } from "./guards";
import { rebuild } from "./rebuild";

function numberDomain(temporal: Temporal<number>): NumberDomain {
  const { domain } = temporal;
  if (!isNumberDomain(domain)) {
    throw new InvalidTemporalError(`Expected int or float values, got ${domain.kind}`);
  }
  return domain;
}

// ============================================================================
// Value restriction
// ============================================================================

export type NumberSpanSet = SpanSet<"int"> | SpanSet<"float">;

/** Restrict to the periods where the value lies within `span`. */
export function atSpan(temporal: Temporal<number>, span: SpanBounds): Temporal<number> | null {
  return restrictValues(temporal, [span], true);
}

export function minusSpan(temporal: Temporal<number>, span: SpanBounds): Temporal<number> | null {
  return restrictValues(temporal, [span], false);
}

export function atSpanSet(temporal: Temporal<number>, spans: NumberSpanSet): Temporal<number> | null {
  return restrictValues(temporal, boundsOf(spans), true);
}

export function minusSpanSet(
  temporal: Temporal<number>,
  spans: NumberSpanSet
): Temporal<number> | null {
  return restrictValues(temporal, boundsOf(spans), false);
}

function boundsOf(spans: NumberSpanSet): SpanBounds[] {
  const bounds: SpanBounds[] = spans.spans();
  return bounds;
}

function restrictValues(
  temporal: Temporal<number>,
  bounds: SpanBounds[],
  keep: boolean
): Temporal<number> | null {
  numberDomain(temporal);
  const matching = SpanSet.from(
    temporal.sequences().flatMap((seq) =>
      SpanSet.from(
        bounds.flatMap((b) => periodsWithin(seq, b)),
        TimestampDomain
      )
        .intersection(seq.period())
        .spans()
    ),
    TimestampDomain
  );
  const periods = keep ? matching : temporal.time().minus(matching);
  return periods.isEmpty() ? null : temporal.atTime(periods);
}

function boundsContain(bounds: SpanBounds, value: number): boolean {
  const afterLower = bounds.lower < value || (bounds.lower === value && bounds.lowerInclusive);
  const beforeUpper = value < bounds.upper || (value === bounds.upper && bounds.upperInclusive);
  return afterLower && beforeUpper;
}

/** Periods of `seq`, before applying its own bounds, with values in `bounds`. */
function periodsWithin(seq: TSequence<number>, bounds: SpanBounds): Span<"timestamp">[] {
  const instants = seq.instants();
  const inside = (inst: TInstant<number>) => boundsContain(bounds, inst.value);
  if (seq.interpolation === "discrete" || instants.length === 1) {
    return instants.filter(inside).map((inst) => inst.period());
  }

  const periods: Span<"timestamp">[] = [];
  for (let i = 0; i < instants.length - 1; i++) {
    const start = instants[i];
    const end = instants[i + 1];
    if (seq.interpolation === "step") {
      if (inside(start)) periods.push(tstzSpan(start.timestamp, end.timestamp, true, false));
      continue;
    }
    const period = linearPeriodWithin(start, end, bounds);
    if (period !== null) periods.push(period);
  }
  const last = instants[instants.length - 1];
  if (inside(last)) periods.push(last.period());
  return periods;
}

/**
 * Sub-period of the linear segment `start` → `end` whose values lie in
 * `bounds`, shrunk to whole microseconds.
 */
function linearPeriodWithin(
  start: InstantData<number>,
  end: InstantData<number>,
  bounds: SpanBounds
): Span<"timestamp"> | null {
  const a = start.value;
  const b = end.value;
  const t0 = start.timestamp;
  const dt = end.timestamp - t0;
  if (a === b) {
    return boundsContain(bounds, a) ? tstzSpan(t0, end.timestamp, true, true) : null;
  }

  const offset = (value: number) => ((value - a) * dt) / (b - a);
  const rising = b > a;
  let lo = offset(rising ? bounds.lower : bounds.upper);
  let loInc = rising ? bounds.lowerInclusive : bounds.upperInclusive;
  let hi = offset(rising ? bounds.upper : bounds.lower);
  let hiInc = rising ? bounds.upperInclusive : bounds.lowerInclusive;
  if (lo < 0) {
    lo = 0;
    loInc = true;
  }
  if (hi > dt) {
    hi = dt;
    hiInc = true;
  }

  const lower = Math.ceil(lo);
  const upper = Math.floor(hi);
  if (lower !== lo) loInc = true;
  if (upper !== hi) hiInc = true;
  if (lower > upper || (lower === upper && !(loInc && hiInc))) return null;
  return tstzSpan(t0 + lower, t0 + upper, loInc, hiInc);
}

// ============================================================================
// Value transforms
// ============================================================================

/**
 * Shift every value by `delta`, then stretch the values so that the
 * distance from the minimum to the maximum becomes `width`, keeping the
 * shifted minimum. Int results are rounded.
 */
export function shiftScaleValue(
  temporal: Temporal<number>,
  delta?: number,
  width?: number
): Temporal<number> {
  const domain = numberDomain(temporal);
  if (width !== undefined && !(width > 0)) {
    throw new InvalidTemporalError(`Value width must be positive, got ${width}`);
  }
  const min = temporal.minValue();
  const range = temporal.maxValue() - min;
  const shift = delta ?? 0;
  const snap = (value: number) => (domain.kind === "int" ? Math.round(value) : value);
  const map = (value: number) =>
    width === undefined || range === 0
      ? value + shift
      : min + shift + ((value - min) * width) / range;

  return rebuild(temporal, domain, (seq) =>
    seq.instants().map((inst) => ({ value: snap(map(inst.value)), timestamp: inst.timestamp }))
  );
}

export function shiftValue(temporal: Temporal<number>, delta: number): Temporal<number> {
  return shiftScaleValue(temporal, delta, undefined);
}

export function scaleValue(temporal: Temporal<number>, width: number): Temporal<number> {
  return shiftScaleValue(temporal, undefined, width);
}

/** Absolute value; linear segments crossing zero gain an instant at the crossing. */
export function abs(temporal: Temporal<number>): Temporal<number> {
  const domain = numberDomain(temporal);
  return rebuild(temporal, domain, (seq) =>
    withZeroCrossings(seq).map((inst) => ({ value: Math.abs(inst.value), timestamp: inst.timestamp }))
  );
}

function withZeroCrossings(seq: TSequence<number>): InstantData<number>[] {
  const instants = seq.instants();
  if (seq.interpolation !== "linear") return instants;
  const result: InstantData<number>[] = [instants[0]];
  for (let i = 1; i < instants.length; i++) {
    const start = instants[i - 1];
    const end = instants[i];
    if (start.value * end.value < 0) {
      const crossing = locate(seq.domain, start, end, 0);
      if (crossing !== null && crossing > start.timestamp && crossing < end.timestamp) {
        result.push({ value: 0, timestamp: crossing });
      }
    }
    result.push(end);
  }
  return result;
}

/**
 * Change in value from each instant to the next, as a step value. The
 * last instant repeats the final change and the upper bound becomes
 * exclusive. Instants, and sequences with a single instant, have none.
 * @throws UndefinedForDiscreteError for discrete sequences and sets
 */
export function deltaValue(temporal: Temporal<number>): Temporal<number> | null {
  const domain = numberDomain(temporal);
  if (isInstant(temporal)) return null;
  if (temporal.interpolation === "discrete") {
    throw new UndefinedForDiscreteError("deltaValue is undefined for discrete values");
  }

  const sequences = temporal
    .sequences()
    .filter((seq) => seq.numInstants() > 1)
    .map((seq) => {
      const instants = seq.instants();
      const deltas = instants.slice(1).map((inst, i) => inst.value - instants[i].value);
      deltas.push(deltas[deltas.length - 1]);
      return new TSequence(
        domain,
        instants.map((inst, i) => ({ value: deltas[i], timestamp: inst.timestamp })),
        { interpolation: "step", lowerInclusive: seq.lowerInclusive, upperInclusive: false }
      );
    });
  if (sequences.length === 0) return null;
  return isSequenceSet(temporal) ? new TSequenceSet(sequences) : sequences[0];
}

// ============================================================================
// Arithmetic
// ============================================================================

export type ArithmeticOperator = "+" | "-" | "*" | "/";

const OPERATIONS: Record<ArithmeticOperator, (a: number, b: number) => number> = {
  "+": (a, b) => a + b,
  "-": (a, b) => a - b,
  "*": (a, b) => a * b,
  "/": (a, b) => a / b,
};

export function add(temporal: Temporal<number>, other: number): Temporal<number>;
export function add(temporal: Temporal<number>, other: Temporal<number>): Temporal<number> | null;
export function add(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null;
export function add(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null {
  return arithmetic("+", temporal, other);
}

export function subtract(temporal: Temporal<number>, other: number): Temporal<number>;
export function subtract(
  temporal: Temporal<number>,
  other: Temporal<number>
): Temporal<number> | null;
export function subtract(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null;
export function subtract(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null {
  return arithmetic("-", temporal, other);
}

export function multiply(temporal: Temporal<number>, other: number): Temporal<number>;
export function multiply(
  temporal: Temporal<number>,
  other: Temporal<number>
): Temporal<number> | null;
export function multiply(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null;
export function multiply(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null {
  return arithmetic("*", temporal, other);
}

/**
 * Quotient as a float value.
 * @throws InvalidTemporalError when the divisor is or crosses zero
 */
export function divide(temporal: Temporal<number>, other: number): Temporal<number>;
export function divide(
  temporal: Temporal<number>,
  other: Temporal<number>
): Temporal<number> | null;
export function divide(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null;
export function divide(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null {
  return arithmetic("/", temporal, other);
}

/** Temporal absolute difference; null without common time. */
export function distance(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null {
  const difference = arithmetic("-", temporal, other);
  return difference === null ? null : abs(difference);
}

/** Smallest absolute difference over the common time. */
export function nearestApproachDistance(
  temporal: Temporal<number>,
  other: number | Temporal<number>
): number | null {
  return distance(temporal, other)?.minValue() ?? null;
}

function arithmetic(
  op: ArithmeticOperator,
  temporal: Temporal<number>,
  other: number | Temporal<number>
): Temporal<number> | null {
  return typeof other === "number"
    ? withScalar(op, temporal, other)
    : withTemporal(op, temporal, other);
}

/** Int only when both operands are ints and the operation is not a division. */
function resultDomain(
  op: ArithmeticOperator,
  left: NumberDomain,
  right: NumberDomain | number
): NumberDomain {
  const rightIsFloat = typeof right === "number" ? !Number.isInteger(right) : right.kind === "float";
  return op === "/" || left.kind === "float" || rightIsFloat ? TFLOAT : TINT;
}

function withScalar(op: ArithmeticOperator, temporal: Temporal<number>, value: number): Temporal<number> {
  const domain = resultDomain(op, numberDomain(temporal), value);
  if (op === "/" && value === 0) {
    throw new InvalidTemporalError("Division by zero");
  }
  const apply = OPERATIONS[op];
  return rebuild(temporal, domain, (seq) =>
    seq.instants().map((inst) => ({ value: apply(inst.value, value), timestamp: inst.timestamp }))
  );
}

type Combine = (t: Timestamp, a: number, b: number) => number;

function withTemporal(
  op: ArithmeticOperator,
  left: Temporal<number>,
  right: Temporal<number>
): Temporal<number> | null {
  const domain = resultDomain(op, numberDomain(left), numberDomain(right));
  const apply = OPERATIONS[op];
  const combine: Combine = (t, a, b) => {
    if (op === "/" && b === 0) {
      throw new InvalidTemporalError(`Division by zero at ${formatTimestamp(t)}`);
    }
    return apply(a, b);
  };
  const at = (t: Timestamp): InstantData<number> => ({
    value: combine(t, definedValue(left, t), definedValue(right, t)),
    timestamp: t,
  });

  const instant = isInstant(left) ? left : isInstant(right) ? right : null;
  if (instant !== null) {
    const t = instant.timestamp;
    if (!left.time().contains(t) || !right.time().contains(t)) return null;
    const { value } = at(t);
    return new TInstant(domain, value, t);
  }

  const wrap = (seq: TSequence<number>) =>
    isSequenceSet(left) || isSequenceSet(right) ? seq.toSequenceSet() : seq;

  if (left.interpolation === "discrete" || right.interpolation === "discrete") {
    const common = left.time().intersection(right.time());
    if (common.isEmpty()) return null;
    const instants = common.spans().map((span) => at(span.lower));
    return wrap(new TSequence(domain, instants, { interpolation: "discrete" }));
  }

  if (left.interpolation !== right.interpolation) {
    throw new IncompatibleInterpolationError(
      `Cannot combine ${left.interpolation} and ${right.interpolation} values`
    );
  }
  const mode = left.interpolation;

  const pieces: TSequence<number>[] = [];
  const lefts = left.sequences();
  const rights = right.sequences();
  let i = 0;
  let j = 0;
  while (i < lefts.length && j < rights.length) {
    const a = lefts[i];
    const b = rights[j];
    const period = a.period().intersection(b.period());
    if (period !== null) {
      pieces.push(combineOver(period, a, b, { op, mode, domain, combine }));
    }
    if (compareUpper(a.period(), b.period()) <= 0) i++;
    else j++;
  }

  if (pieces.length === 0) return null;
  return isSequenceSet(left) || isSequenceSet(right) ? new TSequenceSet(pieces) : pieces[0];
}

interface Combination {
  op: ArithmeticOperator;
  mode: Interpolation;
  domain: NumberDomain;
  combine: Combine;
}

/** Combine two continuous sequences over a period both cover. */
function combineOver(
  period: Span<"timestamp">,
  a: TSequence<number>,
  b: TSequence<number>,
  { op, mode, domain, combine }: Combination
): TSequence<number> {
  const options = {
    interpolation: mode,
    lowerInclusive: period.lowerInclusive,
    upperInclusive: period.upperInclusive,
  };
  if (period.lower === period.upper) {
    const t = period.lower;
    return new TSequence(
      domain,
      [{ value: combine(t, definedValue(a, t), definedValue(b, t)), timestamp: t }],
      options
    );
  }

  const pa = pieceOf(a, period);
  const pb = pieceOf(b, period);
  const timestamps = [...new Set([...pa.timestamps(), ...pb.timestamps()])].sort((x, y) => x - y);

  const extra: Timestamp[] = [];
  if (mode === "linear") {
    for (let k = 1; k < timestamps.length; k++) {
      const t0 = timestamps[k - 1];
      const t1 = timestamps[k];
      const a0 = sampleAt(pa, t0);
      const b0 = sampleAt(pb, t0);
      const b1 = sampleAt(pb, t1);
      if (op === "/" && b0 * b1 < 0) {
        throw new InvalidTemporalError(
          `Division by zero between ${formatTimestamp(t0)} and ${formatTimestamp(t1)}`
        );
      }
      if (op === "*") {
        const turn = turningPoint(t0, t1, a0, sampleAt(pa, t1) - a0, b0, b1 - b0);
        if (turn !== null) extra.push(turn);
      }
    }
  }

  const instants = [...timestamps, ...extra]
    .sort((x, y) => x - y)
    .map((t) => ({ value: combine(t, sampleAt(pa, t), sampleAt(pb, t)), timestamp: t }));
  return new TSequence(domain, instants, options);
}

/**
 * Timestamp strictly inside (t0, t1) where the product of two linear
 * functions, starting at a0 and b0 and changing by da and db, turns.
 */
function turningPoint(
  t0: Timestamp,
  t1: Timestamp,
  a0: number,
  da: number,
  b0: number,
  db: number
): Timestamp | null {
  if (da === 0 || db === 0) return null;
  const ratio = -(da * b0 + db * a0) / (2 * da * db);
  if (!(ratio > 0 && ratio < 1)) return null;
  const t = Math.round(t0 + (t1 - t0) * ratio);
  return t > t0 && t < t1 ? t : null;
}

function pieceOf(seq: TSequence<number>, period: Span<"timestamp">): TSequence<number> {
  const piece = seq.atTime(period)?.startSequence();
  if (piece === undefined) {
    throw new InvalidTemporalError(`Sequence is undefined over ${period.toString()}`);
  }
  return piece;
}

/** Value at `t` within [start, end] of `seq`, whatever its bounds. */
function sampleAt(seq: TSequence<number>, t: Timestamp): number {
  if (t === seq.startTimestamp()) return seq.startValue();
  if (t === seq.endTimestamp()) return seq.endValue();
  return definedValue(seq, t);
}

function definedValue(temporal: Temporal<number>, t: Timestamp): number {
  const value = temporal.valueAt(t);
  if (value === null) {
    throw new InvalidTemporalError(`No value at ${formatTimestamp(t)}`);
  }
  return value;
}
