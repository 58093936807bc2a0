/**
 * Aggregates over temporal values: trajectory length, integral and
 * time-weighted average.
 */

import type { Point } from "@tempora/contracts";
import { InvalidTemporalError, UndefinedForDiscreteError } from "@tempora/contracts";
import { isPointDomain } from "../domains/values";
import type { Temporal } from "./Temporal";
import type { TSequence } from "./TSequence";

/**
 * Distance travelled along a point trajectory. Only linear sequences
 * move between samples; step and discrete ones contribute nothing.
 */
export function length(temporal: Temporal<Point>): number {
  const { domain } = temporal;
  if (!isPointDomain(domain)) {
    throw new InvalidTemporalError(`length is defined for point values, not ${domain.kind}`);
  }
  let total = 0;
  for (const seq of temporal.sequences()) {
    if (seq.interpolation !== "linear") continue;
    const instants = seq.instants();
    for (let i = 1; i < instants.length; i++) {
      total += domain.distance(instants[i - 1].value, instants[i].value);
    }
  }
  return total;
}

function sequenceIntegral(seq: TSequence<number>): number {
  const instants = seq.instants();
  let area = 0;
  for (let i = 1; i < instants.length; i++) {
    const prev = instants[i - 1];
    const curr = instants[i];
    const dt = curr.timestamp - prev.timestamp;
    area += seq.interpolation === "linear" ? ((prev.value + curr.value) / 2) * dt : prev.value * dt;
  }
  return area;
}

function assertContinuous(temporal: Temporal<number>, operation: string): void {
  if (temporal.subtype !== "instant" && temporal.interpolation === "discrete") {
    throw new UndefinedForDiscreteError(`${operation} is undefined for discrete values`);
  }
}

/**
 * Area under the value curve, in value × microseconds.
 * @throws UndefinedForDiscreteError for discrete sequences and sets
 */
export function integral(temporal: Temporal<number>): number {
  assertContinuous(temporal, "integral");
  return temporal.sequences().reduce((sum, seq) => sum + sequenceIntegral(seq), 0);
}

/**
 * Integral divided by the defined duration. Values without duration
 * (instants, sets of single instants) average their sample values.
 * @throws UndefinedForDiscreteError for discrete sequences and sets
 */
export function timeWeightedAverage(temporal: Temporal<number>): number {
  assertContinuous(temporal, "timeWeightedAverage");
  const duration = temporal.duration();
  if (duration === 0) {
    const values = temporal.values();
    return values.reduce((sum, v) => sum + v, 0) / values.length;
  }
  return integral(temporal) / duration;
}
