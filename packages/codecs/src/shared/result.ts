import type { CodecFormat, DecodeResult } from "@tempora/contracts";
import { ParseError, isTemporalError } from "@tempora/contracts";

/**
 * Run `decode`, reporting parse failures as values.
 * Anything other than a ParseError is a bug and still throws.
 */
export function toDecodeResult<T>(decode: () => T): DecodeResult<T> {
  try {
    return { success: true, data: decode() };
  } catch (error) {
    if (error instanceof ParseError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Build a value from decoded parts. Construction failures (unordered
 * instants, invalid spans) become ParseErrors at `position`.
 */
export function construct<T>(
  format: CodecFormat,
  position: number | null,
  build: () => T,
  path: ReadonlyArray<string | number> = []
): T {
  try {
    return build();
  } catch (error) {
    if (isTemporalError(error) && !(error instanceof ParseError)) {
      throw new ParseError(format, position, error.message, path);
    }
    throw error;
  }
}
