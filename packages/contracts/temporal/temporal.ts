import type { Timestamp } from "../core/time";

/**
 * Interpolation between consecutive samples.
 * - discrete: isolated samples, undefined between them
 * - step: value holds until the next sample (right-continuous)
 * - linear: affine interpolation between samples
 */
export type Interpolation = "discrete" | "step" | "linear";

export type TemporalSubtype = "instant" | "sequence" | "sequence_set";

export interface InstantData<V> {
  value: V;
  timestamp: Timestamp;
}

export interface SequenceOptions {
  interpolation?: Interpolation;
  /** @default true */
  lowerInclusive?: boolean;
  /** @default true */
  upperInclusive?: boolean;
}

/**
 * Options for evaluating a step or linear segment at a timestamp.
 */
export interface InterpolateOptions {
  /**
   * The end sample closes the sequence with an inclusive upper bound.
   * Step interpolation only returns the end value at the end timestamp
   * when this is set.
   */
  closesSequence?: boolean;
}
