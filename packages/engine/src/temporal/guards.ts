import type { Point } from "@tempora/contracts";
import type { Temporal } from "./Temporal";
import { TInstant } from "./TInstant";
import { TSequence } from "./TSequence";
import { TSequenceSet } from "./TSequenceSet";

/** Any temporal value over one of the built-in value kinds. */
export type AnyTemporal =
  | Temporal<boolean>
  | Temporal<number>
  | Temporal<string>
  | Temporal<Point>;

export function isInstant<V>(temporal: Temporal<V>): temporal is TInstant<V> {
  return temporal instanceof TInstant;
}

export function isSequence<V>(temporal: Temporal<V>): temporal is TSequence<V> {
  return temporal instanceof TSequence;
}

export function isSequenceSet<V>(temporal: Temporal<V>): temporal is TSequenceSet<V> {
  return temporal instanceof TSequenceSet;
}

export function isBoolTemporal(temporal: AnyTemporal): temporal is Temporal<boolean> {
  return temporal.domain.kind === "bool";
}

export function isNumberTemporal(temporal: AnyTemporal): temporal is Temporal<number> {
  return temporal.domain.kind === "int" || temporal.domain.kind === "float";
}

export function isTextTemporal(temporal: AnyTemporal): temporal is Temporal<string> {
  return temporal.domain.kind === "text";
}

export function isPointTemporal(temporal: AnyTemporal): temporal is Temporal<Point> {
  return temporal.domain.kind === "point";
}

/**
 * Per-kind handlers for code that must see the concrete value type,
 * such as codecs.
 */
export interface TemporalVisitor<R> {
  bool(temporal: Temporal<boolean>): R;
  number(temporal: Temporal<number>): R;
  text(temporal: Temporal<string>): R;
  point(temporal: Temporal<Point>): R;
}

export function visitTemporal<R>(temporal: AnyTemporal, visitor: TemporalVisitor<R>): R {
  const { kind } = temporal.domain;
  if (isBoolTemporal(temporal)) return visitor.bool(temporal);
  if (isNumberTemporal(temporal)) return visitor.number(temporal);
  if (isTextTemporal(temporal)) return visitor.text(temporal);
  if (isPointTemporal(temporal)) return visitor.point(temporal);
  throw new TypeError(`Unsupported value kind ${kind}`);
}
