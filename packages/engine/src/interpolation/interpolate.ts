/**
 * Interpolation Engine
 *
 * Pure functions computing the value of a segment at a timestamp from its
 * two bracketing samples. Sequences decide which segment to evaluate;
 * this module only knows about one pair of samples at a time.
 */

import type {
  InstantData,
  Interpolation,
  InterpolateOptions,
  Timestamp,
  ValueDomain,
} from "@tempora/contracts";
import {
  IncompatibleInterpolationError,
  InvalidTemporalError,
  NoValueAtTimestampError,
} from "@tempora/contracts";

/**
 * Value at `t` on the segment `start` → `end`, where
 * `start.timestamp <= t <= end.timestamp`.
 *
 * - discrete: defined only at the two sample timestamps
 * - step: the start value holds on [t0, t1); at t1 the end value is
 *   returned only when the end sample closes the sequence inclusively
 * - linear: affine interpolation through the domain's `lerp`
 *
 * @throws NoValueAtTimestampError for `t` outside the segment or inside a
 *   discrete gap
 * @throws InvalidTemporalError when both samples share a timestamp
 * @throws IncompatibleInterpolationError for linear interpolation of a
 *   domain without `lerp`
 */
export function interpolate<V>(
  domain: ValueDomain<V>,
  start: InstantData<V>,
  end: InstantData<V>,
  t: Timestamp,
  mode: Interpolation,
  options: InterpolateOptions = {}
): V {
  const t0 = start.timestamp;
  const t1 = end.timestamp;
  if (t0 >= t1) {
    throw new InvalidTemporalError(
      `Segment samples must have increasing timestamps, got ${t0} and ${t1}`
    );
  }
  if (t < t0 || t > t1) {
    throw new NoValueAtTimestampError(t, `Timestamp ${t} is outside the segment [${t0}, ${t1}]`);
  }

  switch (mode) {
    case "discrete":
      if (t === t0) return start.value;
      if (t === t1) return end.value;
      throw new NoValueAtTimestampError(t, `No sample at timestamp ${t} in a discrete sequence`);

    case "step":
      if (t === t1 && options.closesSequence) return end.value;
      return start.value;

    case "linear": {
      if (domain.lerp === undefined) {
        throw new IncompatibleInterpolationError(
          `Linear interpolation is not defined for ${domain.kind} values`
        );
      }
      if (t === t0) return start.value;
      if (t === t1) return end.value;
      return domain.lerp(start.value, end.value, (t - t0) / (t1 - t0));
    }
  }
}

/**
 * Timestamp at which the linear segment `start` → `end` takes `value`,
 * rounded to the microsecond, or null when it never does.
 * Segments constant at `value` report their start timestamp.
 */
export function locate<V>(
  domain: ValueDomain<V>,
  start: InstantData<V>,
  end: InstantData<V>,
  value: V
): Timestamp | null {
  if (domain.locate === undefined) {
    throw new IncompatibleInterpolationError(
      `Linear interpolation is not defined for ${domain.kind} values`
    );
  }
  const ratio = domain.locate(start.value, end.value, value);
  if (ratio === null) return null;
  const crossing = Math.round(start.timestamp + (end.timestamp - start.timestamp) * ratio);
  // A crossing rounded onto a sample must agree with the sample's value
  if (crossing === start.timestamp && !domain.equals(start.value, value)) return null;
  if (crossing === end.timestamp && !domain.equals(end.value, value)) return null;
  return crossing;
}

/** Linear interpolation is only defined for domains with `lerp`. */
export function assertInterpolation<V>(domain: ValueDomain<V>, mode: Interpolation): void {
  if (mode === "linear" && domain.lerp === undefined) {
    throw new IncompatibleInterpolationError(
      `Linear interpolation is not defined for ${domain.kind} values`
    );
  }
}
