import { ParseError } from "@tempora/contracts";

/**
 * Cursor over WKT text. Positions reported in errors are character
 * offsets into the original input.
 */
export class Scanner {
  private pos = 0;

  constructor(readonly text: string) {}

  get position(): number {
    return this.pos;
  }

  atEnd(): boolean {
    this.skipWhitespace();
    return this.pos >= this.text.length;
  }

  skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  /** Next non-blank character, or "" at the end of input. */
  peek(): string {
    this.skipWhitespace();
    return this.text[this.pos] ?? "";
  }

  next(): string {
    const char = this.text[this.pos] ?? "";
    this.pos++;
    return char;
  }

  /** Consume `token` (case-insensitive) if it comes next. */
  consume(token: string): boolean {
    this.skipWhitespace();
    const candidate = this.text.slice(this.pos, this.pos + token.length);
    if (candidate.toUpperCase() !== token.toUpperCase()) return false;
    this.pos += token.length;
    return true;
  }

  expect(char: string): void {
    const found = this.peek();
    if (found !== char) {
      throw this.fail(found === "" ? `expected "${char}", found end of input` : `expected "${char}", found "${found}"`);
    }
    this.pos++;
  }

  /**
   * Read up to (not including) the first of `stops`, trimmed.
   * Fails on an empty token.
   */
  readToken(stops: string, what: string): { text: string; start: number } {
    this.skipWhitespace();
    const start = this.pos;
    while (this.pos < this.text.length && !stops.includes(this.text[this.pos])) {
      this.pos++;
    }
    const text = this.text.slice(start, this.pos).trim();
    if (text === "") {
      throw this.fail(`expected ${what}`, start);
    }
    return { text, start };
  }

  fail(reason: string, position: number = this.pos): ParseError {
    return new ParseError("wkt", position, reason);
  }
}
