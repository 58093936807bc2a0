/**
 * Value Domain Types
 *
 * The base values a temporal value can carry. Each kind is described by a
 * ValueDomain capability; interpolation, distance and codecs dispatch on
 * the closed `kind` tag.
 */

export type ValueKind = "bool" | "int" | "float" | "text" | "point";

/** Planar or geodetic point. `z` is present only for 3D points. */
export interface Point {
  x: number;
  y: number;
  z?: number;
}

/**
 * Spatial operations the engine needs from a geometry library.
 * Planar geometry ships with the engine; geodetic computations are
 * supplied by the caller.
 */
export interface Geometry {
  readonly geodetic: boolean;
  distance(a: Point, b: Point): number;
}

export type Srid = number;

export interface ValueDomain<V> {
  readonly kind: ValueKind;

  equals(a: V, b: V): boolean;
  compare(a: V, b: V): number;
  isValid(value: V): boolean;

  /**
   * Affine interpolation between two values. Absent for domains that can
   * only change in steps (bool, int, text).
   */
  lerp?(a: V, b: V, ratio: number): V;

  /**
   * Ratio r in [0, 1] at which the segment a → b passes through `value`,
   * or null when it never does. Only meaningful where `lerp` exists.
   */
  locate?(a: V, b: V, value: V): number | null;

  /** Distance between two values, used for trajectory length. */
  distance?(a: V, b: V): number;
}

export interface NumberDomain extends ValueDomain<number> {
  readonly kind: "int" | "float";
}

export interface BoolDomain extends ValueDomain<boolean> {
  readonly kind: "bool";
}

export interface TextDomain extends ValueDomain<string> {
  readonly kind: "text";
}

export interface PointDomain extends ValueDomain<Point> {
  readonly kind: "point";
  readonly srid: Srid;
  readonly geometry: Geometry;
  distance(a: Point, b: Point): number;
}

export type AnyValueDomain = BoolDomain | NumberDomain | TextDomain | PointDomain;
