/**
 * WKT forms of the base values.
 */

import type { Point } from "@tempora/contracts";
import { formatNumber, parseFloatValue, parseInteger } from "@tempora/engine";
import type { Scanner } from "./Scanner";

export interface WktValueFormat<V> {
  write(value: V): string;
  /** Read one value; the scanner stops before the "@" separator. */
  read(scanner: Scanner): V;
}

export const BOOL_WKT: WktValueFormat<boolean> = {
  write: (value) => (value ? "t" : "f"),
  read(scanner) {
    const token = scanner.readToken("@", "a boolean");
    switch (token.text.toLowerCase()) {
      case "t":
      case "true":
        return true;
      case "f":
      case "false":
        return false;
      default:
        throw scanner.fail(`invalid boolean "${token.text}"`, token.start);
    }
  },
};

export function numberWkt(kind: "int" | "float", maxDecimals?: number): WktValueFormat<number> {
  const isInt = kind === "int";
  return {
    write: (value) => (isInt ? String(value) : formatNumber(value, maxDecimals)),
    read(scanner) {
      const token = scanner.readToken("@", `a ${kind}`);
      const value = isInt ? parseInteger(token.text) : parseFloatValue(token.text);
      if (value === null) {
        throw scanner.fail(`invalid ${kind} "${token.text}"`, token.start);
      }
      return value;
    },
  };
}

export const TEXT_WKT: WktValueFormat<string> = {
  write: (value) => `"${value.replace(/["\\]/g, (c) => `\\${c}`)}"`,
  read(scanner) {
    const start = scanner.position;
    scanner.expect('"');
    let value = "";
    for (;;) {
      const char = scanner.next();
      if (char === "") throw scanner.fail("unterminated text value", start);
      if (char === '"') return value;
      if (char === "\\") {
        const escaped = scanner.next();
        if (escaped === "") throw scanner.fail("unterminated text value", start);
        value += escaped;
      } else {
        value += char;
      }
    }
  },
};

export function pointWkt(maxDecimals?: number): WktValueFormat<Point> {
  return {
    write(point) {
      const coords = [point.x, point.y, ...(point.z === undefined ? [] : [point.z])]
        .map((c) => formatNumber(c, maxDecimals))
        .join(" ");
      return point.z === undefined ? `POINT(${coords})` : `POINT Z (${coords})`;
    },
    read(scanner) {
      const start = scanner.position;
      if (!scanner.consume("POINT")) {
        throw scanner.fail("expected POINT", start);
      }
      const hasZ = scanner.consume("Z");
      scanner.expect("(");
      const token = scanner.readToken(")", "coordinates");
      scanner.expect(")");

      const coords = token.text.split(/\s+/).map((c) => parseFloatValue(c));
      const expected = hasZ ? 3 : [2, 3].includes(coords.length) ? coords.length : 2;
      if (coords.length !== expected) {
        throw scanner.fail(`expected ${expected} coordinates, found ${coords.length}`, token.start);
      }
      const finite = coords.filter((c): c is number => c !== null && Number.isFinite(c));
      if (finite.length !== coords.length) {
        throw scanner.fail(`invalid coordinates "${token.text}"`, token.start);
      }
      const [x, y, z] = finite;
      return z === undefined ? { x, y } : { x, y, z };
    },
  };
}
