/**
 * Error Types
 *
 * Every failure raised by the engine and codecs is a TemporalError with a
 * `kind` discriminant, so callers can switch on the kind instead of
 * matching messages.
 *
 * Algebra that legitimately produces nothing (disjoint intersections,
 * restrictions to absent values) returns null or an empty SpanSet and does
 * not throw.
 */

export type TemporalErrorKind =
  | "parse"
  | "invalid_span"
  | "invalid_temporal"
  | "unordered_instants"
  | "duplicate_timestamp"
  | "incompatible_interpolation"
  | "no_value_at_timestamp"
  | "undefined_for_discrete";

export type CodecFormat = "wkt" | "wkb" | "mfjson";

export abstract class TemporalError extends Error {
  abstract readonly kind: TemporalErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed text, binary or JSON input.
 *
 * `position` is a character offset (WKT), a byte offset (WKB), or null
 * when the failure has no single offset (MF-JSON schema violations, where
 * `path` locates the offending member instead).
 */
export class ParseError extends TemporalError {
  readonly kind = "parse" as const;

  constructor(
    readonly format: CodecFormat,
    readonly position: number | null,
    readonly reason: string,
    readonly path: ReadonlyArray<string | number> = []
  ) {
    super(
      position === null
        ? `${format}: ${reason}`
        : `${format} at ${position}: ${reason}`
    );
  }
}

/** lower > upper, or a zero-width span with an exclusive bound. */
export class InvalidSpanError extends TemporalError {
  readonly kind = "invalid_span" as const;
}

/** Empty sequences, bad bound flags, values the domain rejects. */
export class InvalidTemporalError extends TemporalError {
  readonly kind = "invalid_temporal" as const;
}

export class UnorderedInstantsError extends TemporalError {
  readonly kind = "unordered_instants" as const;
}

export class DuplicateTimestampError extends TemporalError {
  readonly kind = "duplicate_timestamp" as const;
}

/**
 * Linear interpolation requested for a domain that cannot interpolate, or
 * components with different interpolations in one sequence set.
 */
export class IncompatibleInterpolationError extends TemporalError {
  readonly kind = "incompatible_interpolation" as const;
}

export class NoValueAtTimestampError extends TemporalError {
  readonly kind = "no_value_at_timestamp" as const;

  constructor(readonly timestamp: number, message?: string) {
    super(message ?? `No value defined at timestamp ${timestamp}`);
  }
}

export class UndefinedForDiscreteError extends TemporalError {
  readonly kind = "undefined_for_discrete" as const;
}

export function isTemporalError(error: unknown): error is TemporalError {
  return error instanceof TemporalError;
}
