/**
 * WKT reader
 *
 *   temporal  := ["SRID=" int ";"] ["Interp=Step;"] body
 *   body      := instant | discrete | continuous | set
 *   instant   := value "@" timestamp
 *   discrete  := "{" instant ("," instant)* "}"
 *   continuous:= ("[" | "(") instant ("," instant)* ("]" | ")")
 *   set       := "{" (continuous | discrete) ("," ...)* "}"
 */

import type { InstantData, ScalarDomain, ScalarKind, ValueDomain } from "@tempora/contracts";
import {
  Span,
  SpanSet,
  TInstant,
  TSequence,
  TSequenceSet,
  defaultInterpolation,
  parseTimestamp,
  type Temporal,
} from "@tempora/engine";
import { construct } from "../shared/result";
import type { Scanner } from "./Scanner";
import type { WktValueFormat } from "./values";

/** Reads `SRID=n;`; returns null when absent. */
export function readSrid(scanner: Scanner): number | null {
  const start = scanner.position;
  if (!scanner.consume("SRID=")) return null;
  const token = scanner.readToken(";", "an SRID");
  scanner.expect(";");
  if (!/^\d+$/.test(token.text)) {
    throw scanner.fail(`invalid SRID "${token.text}"`, start);
  }
  return Number(token.text);
}

export function readStepMarker(scanner: Scanner): boolean {
  return scanner.consume("Interp=Step;");
}

function readInstant<V>(scanner: Scanner, format: WktValueFormat<V>): InstantData<V> {
  const value = format.read(scanner);
  scanner.expect("@");
  const token = scanner.readToken(",]})", "a timestamp");
  const timestamp = parseTimestamp(token.text);
  if (timestamp === null) {
    throw scanner.fail(`invalid timestamp "${token.text}"`, token.start);
  }
  return { value, timestamp };
}

function readInstantList<V>(
  scanner: Scanner,
  format: WktValueFormat<V>,
  closers: string
): { instants: InstantData<V>[]; closer: string } {
  const instants = [readInstant(scanner, format)];
  for (;;) {
    const next = scanner.peek();
    if (next === ",") {
      scanner.next();
      instants.push(readInstant(scanner, format));
    } else if (next !== "" && closers.includes(next)) {
      scanner.next();
      return { instants, closer: next };
    } else {
      throw scanner.fail(
        next === "" ? "unexpected end of input" : `expected "," or one of "${closers}", found "${next}"`
      );
    }
  }
}

function readSequence<V>(
  scanner: Scanner,
  domain: ValueDomain<V>,
  format: WktValueFormat<V>,
  step: boolean
): TSequence<V> {
  scanner.skipWhitespace();
  const start = scanner.position;
  const opener = scanner.next();
  if (opener === "{") {
    const { instants } = readInstantList(scanner, format, "}");
    return construct("wkt", start, () =>
      new TSequence(domain, instants, { interpolation: "discrete" })
    );
  }
  const { instants, closer } = readInstantList(scanner, format, "])");
  return construct("wkt", start, () =>
    new TSequence(domain, instants, {
      interpolation: step ? "step" : defaultInterpolation(domain),
      lowerInclusive: opener === "[",
      upperInclusive: closer === "]",
    })
  );
}

/** Reads the body of a temporal value after any prefixes. */
export function readTemporal<V>(
  scanner: Scanner,
  domain: ValueDomain<V>,
  format: WktValueFormat<V>,
  step: boolean
): Temporal<V> {
  const start = scanner.position;
  const first = scanner.peek();

  if (first === "[" || first === "(") {
    return readSequence(scanner, domain, format, step);
  }
  if (first !== "{") {
    const { value, timestamp } = readInstant(scanner, format);
    return construct("wkt", start, () => new TInstant(domain, value, timestamp));
  }

  // "{" opens either a discrete sequence or a sequence set.
  scanner.next();
  const inner = scanner.peek();
  if (inner !== "[" && inner !== "(" && inner !== "{") {
    const { instants } = readInstantList(scanner, format, "}");
    return construct("wkt", start, () =>
      new TSequence(domain, instants, { interpolation: "discrete" })
    );
  }

  const sequences = [readSequence(scanner, domain, format, step)];
  while (scanner.peek() === ",") {
    scanner.next();
    sequences.push(readSequence(scanner, domain, format, step));
  }
  scanner.expect("}");
  return construct("wkt", start, () => new TSequenceSet(sequences));
}

export function readSpan<K extends ScalarKind>(scanner: Scanner, domain: ScalarDomain<K>): Span<K> {
  const start = scanner.position;
  const opener = scanner.peek();
  if (opener !== "[" && opener !== "(") {
    throw scanner.fail(`expected "[" or "(", found ${opener === "" ? "end of input" : `"${opener}"`}`);
  }
  scanner.next();
  const lower = readBound(scanner, domain, ",");
  scanner.expect(",");
  const upper = readBound(scanner, domain, "])");
  const closer = scanner.next();
  return construct("wkt", start, () =>
    new Span(domain, lower, upper, opener === "[", closer === "]")
  );
}

function readBound<K extends ScalarKind>(
  scanner: Scanner,
  domain: ScalarDomain<K>,
  stops: string
): number {
  const token = scanner.readToken(stops, `a ${domain.kind} bound`);
  const value = domain.parse(token.text);
  if (value === null) {
    throw scanner.fail(`invalid ${domain.kind} "${token.text}"`, token.start);
  }
  if (scanner.peek() === "") {
    throw scanner.fail("unexpected end of input");
  }
  return value;
}

export function readSpanSet<K extends ScalarKind>(
  scanner: Scanner,
  domain: ScalarDomain<K>
): SpanSet<K> {
  scanner.expect("{");
  if (scanner.peek() === "}") {
    scanner.next();
    return SpanSet.empty(domain);
  }
  const start = scanner.position;
  const spans = [readSpan(scanner, domain)];
  while (scanner.peek() === ",") {
    scanner.next();
    spans.push(readSpan(scanner, domain));
  }
  scanner.expect("}");
  return construct("wkt", start, () => SpanSet.from(spans, domain));
}
