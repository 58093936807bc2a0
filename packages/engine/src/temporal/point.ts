/**
 * Temporal Points
 *
 * Float-valued projections of temporal points: coordinates, speed and
 * the distance travelled so far.
 */

import type { Point, PointDomain } from "@tempora/contracts";
import { InvalidTemporalError, USECS_PER_SEC } from "@tempora/contracts";
import { TFLOAT, isPointDomain } from "../domains/values";
import type { Temporal } from "./Temporal";
import { TSequence } from "./TSequence";
import { TSequenceSet } from "./TSequenceSet";
import { isSequenceSet } from "./guards";
import { rebuild } from "./rebuild";

function pointDomain(temporal: Temporal<Point>): PointDomain {
  const { domain } = temporal;
  if (!isPointDomain(domain)) {
    throw new InvalidTemporalError(`Expected point values, got ${domain.kind}`);
  }
  return domain;
}

function coordinate(temporal: Temporal<Point>, read: (p: Point) => number): Temporal<number> {
  return rebuild(temporal, TFLOAT, (seq) =>
    seq.instants().map((inst) => ({ value: read(inst.value), timestamp: inst.timestamp }))
  );
}

export function getX(temporal: Temporal<Point>): Temporal<number> {
  return coordinate(temporal, (p) => p.x);
}

export function getY(temporal: Temporal<Point>): Temporal<number> {
  return coordinate(temporal, (p) => p.y);
}

/** @throws InvalidTemporalError for 2D points */
export function getZ(temporal: Temporal<Point>): Temporal<number> {
  return coordinate(temporal, (p) => {
    if (p.z === undefined) {
      throw new InvalidTemporalError("z is defined for 3D points only");
    }
    return p.z;
  });
}

/**
 * Speed in distance units per second, as a step value holding each
 * segment's speed from its start. Only linear values move between
 * samples; anything else, and sequences of one instant, have no speed.
 */
export function speed(temporal: Temporal<Point>): Temporal<number> | null {
  const domain = pointDomain(temporal);
  if (temporal.interpolation !== "linear") return null;

  const sequences = temporal
    .sequences()
    .filter((seq) => seq.numInstants() > 1)
    .map((seq) => {
      const instants = seq.instants();
      const speeds = instants.slice(1).map((inst, i) => {
        const prev = instants[i];
        const seconds = (inst.timestamp - prev.timestamp) / USECS_PER_SEC;
        return domain.distance(prev.value, inst.value) / seconds;
      });
      speeds.push(speeds[speeds.length - 1]);
      return new TSequence(
        TFLOAT,
        instants.map((inst, i) => ({ value: speeds[i], timestamp: inst.timestamp })),
        { ...seq.options(), interpolation: "step" }
      );
    });
  if (sequences.length === 0) return null;
  return isSequenceSet(temporal) ? new TSequenceSet(sequences) : sequences[0];
}

/**
 * Distance travelled since the start, carried across the gaps of a
 * sequence set. Grows linearly along linear segments and stays flat
 * elsewhere.
 */
export function cumulativeLength(temporal: Temporal<Point>): Temporal<number> {
  const domain = pointDomain(temporal);
  let total = 0;
  return rebuild(temporal, TFLOAT, (seq) =>
    seq.instants().map((inst, i, instants) => {
      if (i > 0 && seq.interpolation === "linear") {
        total += domain.distance(instants[i - 1].value, inst.value);
      }
      return { value: total, timestamp: inst.timestamp };
    })
  );
}
