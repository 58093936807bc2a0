import type { ScalarKind } from "@tempora/contracts";
import {
  formatNumber,
  formatTimestamp,
  isInstant,
  isSequence,
  type Span,
  type SpanSet,
  type Temporal,
  type TSequence,
} from "@tempora/engine";

function writeInstant<V>(value: V, timestamp: number, write: (value: V) => string): string {
  return `${write(value)}@${formatTimestamp(timestamp)}`;
}

function writeSequence<V>(seq: TSequence<V>, write: (value: V) => string): string {
  const body = seq
    .instants()
    .map((inst) => writeInstant(inst.value, inst.timestamp, write))
    .join(", ");
  if (seq.interpolation === "discrete") return `{${body}}`;
  return `${seq.lowerInclusive ? "[" : "("}${body}${seq.upperInclusive ? "]" : ")"}`;
}

/**
 * WKT body of `temporal`, preceded by `Interp=Step;` for step values of
 * domains that default to linear.
 */
export function writeTemporal<V>(temporal: Temporal<V>, write: (value: V) => string): string {
  const marker =
    temporal.interpolation === "step" && temporal.domain.lerp !== undefined ? "Interp=Step;" : "";
  if (isInstant(temporal)) {
    return writeInstant(temporal.value, temporal.timestamp, write);
  }
  if (isSequence(temporal)) {
    return marker + writeSequence(temporal, write);
  }
  return `${marker}{${temporal
    .sequences()
    .map((seq) => writeSequence(seq, write))
    .join(", ")}}`;
}

function writeBound(span: Span, value: number, maxDecimals: number | undefined): string {
  return span.domain.kind === "float" ? formatNumber(value, maxDecimals) : span.domain.format(value);
}

export function writeSpan<K extends ScalarKind>(span: Span<K>, maxDecimals?: number): string {
  const lower = writeBound(span, span.lower, maxDecimals);
  const upper = writeBound(span, span.upper, maxDecimals);
  return `${span.lowerInclusive ? "[" : "("}${lower}, ${upper}${span.upperInclusive ? "]" : ")"}`;
}

export function writeSpanSet<K extends ScalarKind>(set: SpanSet<K>, maxDecimals?: number): string {
  return `{${set
    .spans()
    .map((span) => writeSpan(span, maxDecimals))
    .join(", ")}}`;
}
