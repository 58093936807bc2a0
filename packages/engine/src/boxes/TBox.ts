/**
 * TBox
 *
 * Value range × time range of a numeric temporal value.
 */

import { floatSpan, type Span } from "../spans/Span";
import type { Temporal } from "../temporal/Temporal";

export class TBox {
  constructor(
    readonly values: Span<"float">,
    readonly period: Span<"timestamp">
  ) {}

  static of(temporal: Temporal<number>): TBox {
    return new TBox(
      floatSpan(temporal.minValue(), temporal.maxValue(), true, true),
      temporal.period()
    );
  }

  /** Smallest box containing both boxes. */
  expand(other: TBox): TBox {
    return new TBox(
      this.values.union(other.values, false) ?? this.values,
      this.period.union(other.period, false) ?? this.period
    );
  }

  overlaps(other: TBox): boolean {
    return this.values.overlaps(other.values) && this.period.overlaps(other.period);
  }

  contains(other: TBox): boolean {
    return this.values.contains(other.values) && this.period.contains(other.period);
  }

  equals(other: TBox): boolean {
    return this.values.equals(other.values) && this.period.equals(other.period);
  }

  toString(): string {
    return `TBOX XT(${this.values.toString()},${this.period.toString()})`;
  }
}

export function tbox(temporal: Temporal<number>): TBox {
  return TBox.of(temporal);
}
