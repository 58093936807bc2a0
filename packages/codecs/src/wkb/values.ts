/**
 * Binary forms of the base values.
 */

import type { Point } from "@tempora/contracts";
import type { ByteReader, ByteWriter } from "./bytes";

export interface WkbValueFormat<V> {
  write(writer: ByteWriter, value: V): void;
  read(reader: ByteReader): V;
}

export const BOOL_WKB: WkbValueFormat<boolean> = {
  write: (writer, value) => writer.u8(value ? 1 : 0),
  read(reader) {
    const start = reader.position;
    const byte = reader.u8();
    if (byte > 1) throw reader.fail(`invalid boolean byte ${byte}`, start);
    return byte === 1;
  },
};

export const INT_WKB: WkbValueFormat<number> = {
  write: (writer, value) => writer.i64(value),
  read: (reader) => reader.i64(),
};

export const FLOAT_WKB: WkbValueFormat<number> = {
  write: (writer, value) => writer.f64(value),
  read: (reader) => reader.f64(),
};

export const TEXT_WKB: WkbValueFormat<string> = {
  write: (writer, value) => writer.text(value),
  read: (reader) => reader.text(),
};

/** Points carry a z coordinate exactly when the header's Z flag is set. */
export function pointWkb(hasZ: boolean): WkbValueFormat<Point> {
  return {
    write(writer, point) {
      writer.f64(point.x).f64(point.y);
      if (hasZ) writer.f64(point.z ?? 0);
    },
    read(reader) {
      const x = reader.f64();
      const y = reader.f64();
      return hasZ ? { x, y, z: reader.f64() } : { x, y };
    },
  };
}
