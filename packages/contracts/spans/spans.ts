/**
 * Span Types
 *
 * A span is an interval over an ordered scalar domain. All supported
 * domains are represented by JavaScript numbers; the domain decides what a
 * number means (an integer, a float, microseconds, days) and how it prints.
 */

export type ScalarKind = "int" | "float" | "timestamp" | "date";

/**
 * Capability describing an ordered scalar domain.
 * The span algebra is written once against this interface.
 */
export interface ScalarDomain<K extends ScalarKind = ScalarKind> {
  readonly kind: K;

  /**
   * Integer-valued domain whose spans are kept canonical as [lower, upper).
   * Distances in a discrete domain are measured between the last and first
   * member values, not between the raw bounds.
   */
  readonly discrete: boolean;

  isValid(value: number): boolean;

  /** Bring an arithmetic result (offset, midpoint) back onto the domain. */
  snap(value: number): number;

  format(value: number): string;

  /** Returns null when the text is not a value of this domain. */
  parse(text: string): number | null;
}

export interface SpanBounds {
  lower: number;
  upper: number;
  lowerInclusive: boolean;
  upperInclusive: boolean;
}

/**
 * Which point stays fixed when a span is rescaled.
 * - midpoint: the span is recentered around its midpoint
 * - lower: the lower bound stays put and the upper bound moves
 */
export type ScaleAnchor = "midpoint" | "lower";
