/**
 * Little-endian byte buffers for WKB.
 */

import { ParseError } from "@tempora/contracts";
import { TextDecoder, TextEncoder } from "node:util";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export class ByteWriter {
  private buffer = new Uint8Array(64);
  private view = new DataView(this.buffer.buffer);
  private length = 0;

  private reserve(bytes: number): number {
    const offset = this.length;
    if (offset + bytes > this.buffer.length) {
      const grown = new Uint8Array(Math.max(this.buffer.length * 2, offset + bytes));
      grown.set(this.buffer);
      this.buffer = grown;
      this.view = new DataView(grown.buffer);
    }
    this.length += bytes;
    return offset;
  }

  u8(value: number): this {
    this.view.setUint8(this.reserve(1), value);
    return this;
  }

  u32(value: number): this {
    this.view.setUint32(this.reserve(4), value, true);
    return this;
  }

  i32(value: number): this {
    this.view.setInt32(this.reserve(4), value, true);
    return this;
  }

  i64(value: number): this {
    this.view.setBigInt64(this.reserve(8), BigInt(value), true);
    return this;
  }

  f64(value: number): this {
    this.view.setFloat64(this.reserve(8), value, true);
    return this;
  }

  text(value: string): this {
    const bytes = encoder.encode(value);
    this.u32(bytes.length);
    this.buffer.set(bytes, this.reserve(bytes.length));
    return this;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}

export class ByteReader {
  private view: DataView;
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  private take(size: number): number {
    if (this.pos + size > this.bytes.length) {
      throw this.fail(`unexpected end of input, needed ${size} more byte(s)`);
    }
    const offset = this.pos;
    this.pos += size;
    return offset;
  }

  peekU8(): number | null {
    return this.pos < this.bytes.length ? this.view.getUint8(this.pos) : null;
  }

  u8(): number {
    return this.view.getUint8(this.take(1));
  }

  u32(): number {
    return this.view.getUint32(this.take(4), true);
  }

  i32(): number {
    return this.view.getInt32(this.take(4), true);
  }

  i64(): number {
    const start = this.pos;
    const value = this.view.getBigInt64(this.take(8), true);
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw this.fail(`integer ${value} out of range`, start);
    }
    return Number(value);
  }

  f64(): number {
    return this.view.getFloat64(this.take(8), true);
  }

  text(): string {
    const start = this.pos;
    const size = this.u32();
    const offset = this.take(size);
    try {
      return decoder.decode(this.bytes.subarray(offset, offset + size));
    } catch (error) {
      throw this.fail(`invalid UTF-8 text: ${error instanceof Error ? error.message : String(error)}`, start);
    }
  }

  fail(reason: string, position: number = this.pos): ParseError {
    return new ParseError("wkb", position, reason);
  }
}

// ============================================================================
// Hex
// ============================================================================

export function toHex(bytes: Uint8Array): string {
  let hex = "";
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, "0");
  }
  return hex.toUpperCase();
}

/** @throws ParseError with the character offset of the bad digit */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new ParseError("wkb", hex.length, "hex input has an odd number of digits");
  }
  const bad = hex.search(/[^0-9a-fA-F]/);
  if (bad >= 0) {
    throw new ParseError("wkb", bad, `invalid hex digit "${hex[bad]}"`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
