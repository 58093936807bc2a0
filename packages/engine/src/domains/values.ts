/**
 * Value Domains
 *
 * Capability objects for the base values temporal values carry.
 * Linear interpolation is available only where the domain defines `lerp`;
 * bool, int and text values change in steps.
 */

import type {
  BoolDomain,
  Geometry,
  NumberDomain,
  Point,
  PointDomain,
  Srid,
  TextDomain,
  ValueDomain,
} from "@tempora/contracts";

/** Relative tolerance used when testing whether a point lies on a segment. */
const LOCATE_TOLERANCE = 1e-10;

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function locateNumber(a: number, b: number, value: number): number | null {
  if (a === b) return a === value ? 0 : null;
  const ratio = (value - a) / (b - a);
  return ratio >= 0 && ratio <= 1 ? ratio : null;
}

export const TBOOL: BoolDomain = {
  kind: "bool",
  equals: (a, b) => a === b,
  compare: (a, b) => (a === b ? 0 : a ? 1 : -1),
  isValid: (value) => typeof value === "boolean",
};

export const TINT: NumberDomain = {
  kind: "int",
  equals: (a, b) => a === b,
  compare: compareNumbers,
  isValid: (value) => Number.isSafeInteger(value),
  distance: (a, b) => Math.abs(a - b),
};

export const TFLOAT: NumberDomain = {
  kind: "float",
  equals: (a, b) => a === b,
  compare: compareNumbers,
  isValid: (value) => typeof value === "number" && !Number.isNaN(value),
  lerp: (a, b, ratio) => a + (b - a) * ratio,
  locate: locateNumber,
  distance: (a, b) => Math.abs(a - b),
};

export const TTEXT: TextDomain = {
  kind: "text",
  equals: (a, b) => a === b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  isValid: (value) => typeof value === "string",
};

// ============================================================================
// Points
// ============================================================================

export const PlanarGeometry: Geometry = {
  geodetic: false,
  distance(a, b) {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const dz = a.z !== undefined && b.z !== undefined ? b.z - a.z : 0;
    return Math.sqrt(dx * dx + dy * dy + dz * dz);
  },
};

function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

function comparePoints(a: Point, b: Point): number {
  const byX = compareNumbers(a.x, b.x);
  if (byX !== 0) return byX;
  const byY = compareNumbers(a.y, b.y);
  if (byY !== 0) return byY;
  if (a.z === undefined || b.z === undefined) {
    return a.z === b.z ? 0 : a.z === undefined ? -1 : 1;
  }
  return compareNumbers(a.z, b.z);
}

function lerpPoint(a: Point, b: Point, ratio: number): Point {
  const point: Point = {
    x: a.x + (b.x - a.x) * ratio,
    y: a.y + (b.y - a.y) * ratio,
  };
  if (a.z !== undefined && b.z !== undefined) {
    point.z = a.z + (b.z - a.z) * ratio;
  }
  return point;
}

function locatePoint(a: Point, b: Point, value: Point): number | null {
  const deltas = [
    [a.x, b.x, value.x],
    [a.y, b.y, value.y],
  ];
  if (a.z !== undefined && b.z !== undefined && value.z !== undefined) {
    deltas.push([a.z, b.z, value.z]);
  }

  // Solve along the axis with the largest movement, then confirm the
  // candidate lies on the segment on every axis.
  let axis = 0;
  for (let i = 1; i < deltas.length; i++) {
    if (Math.abs(deltas[i][1] - deltas[i][0]) > Math.abs(deltas[axis][1] - deltas[axis][0])) {
      axis = i;
    }
  }
  const [from, to, target] = deltas[axis];
  if (from === to) return pointsEqual(a, value) ? 0 : null;

  const ratio = (target - from) / (to - from);
  if (ratio < 0 || ratio > 1) return null;

  const candidate = lerpPoint(a, b, ratio);
  const onSegment = deltas.every(([, , coord], i) => {
    const projected = i === 0 ? candidate.x : i === 1 ? candidate.y : candidate.z ?? coord;
    return Math.abs(projected - coord) <= LOCATE_TOLERANCE * Math.max(1, Math.abs(coord));
  });
  return onSegment ? ratio : null;
}

function isValidPoint(value: Point): boolean {
  return (
    Number.isFinite(value.x) &&
    Number.isFinite(value.y) &&
    (value.z === undefined || Number.isFinite(value.z))
  );
}

export interface PointDomainOptions {
  /** @default 0 for geometry, 4326 for geography */
  srid?: Srid;
}

export interface GeographyDomainOptions extends PointDomainOptions {
  /** Geodetic distance provider. */
  geometry: Geometry;
}

function makePointDomain(srid: Srid, geometry: Geometry): PointDomain {
  return {
    kind: "point",
    srid,
    geometry,
    equals: pointsEqual,
    compare: comparePoints,
    isValid: isValidPoint,
    lerp: lerpPoint,
    locate: locatePoint,
    distance: (a, b) => geometry.distance(a, b),
  };
}

/** Planar (Cartesian) points. */
export function tgeompoint(options: PointDomainOptions = {}): PointDomain {
  return makePointDomain(options.srid ?? 0, PlanarGeometry);
}

/** Points on the ellipsoid; distances come from the supplied geometry. */
export function tgeogpoint(options: GeographyDomainOptions): PointDomain {
  if (!options.geometry.geodetic) {
    throw new TypeError("tgeogpoint requires a geodetic geometry");
  }
  return makePointDomain(options.srid ?? 4326, options.geometry);
}

export const TGEOMPOINT: PointDomain = tgeompoint();

export function isPointDomain(domain: ValueDomain<unknown>): domain is PointDomain {
  return domain.kind === "point";
}

export function isNumberDomain(domain: ValueDomain<unknown>): domain is NumberDomain {
  return domain.kind === "int" || domain.kind === "float";
}

/**
 * Two domains describe the same value type: same kind and, for points,
 * same SRID and geodetic flag.
 */
export function domainsEqual(a: ValueDomain<unknown>, b: ValueDomain<unknown>): boolean {
  if (a.kind !== b.kind) return false;
  if (isPointDomain(a) && isPointDomain(b)) {
    return a.srid === b.srid && a.geometry.geodetic === b.geometry.geodetic;
  }
  return true;
}

export function canInterpolateLinearly<V>(domain: ValueDomain<V>): boolean {
  return domain.lerp !== undefined;
}

/** Same kind of point domain under another SRID. */
export function withSrid(domain: PointDomain, srid: Srid): PointDomain {
  if (domain.srid === srid) return domain;
  return makePointDomain(srid, domain.geometry);
}
