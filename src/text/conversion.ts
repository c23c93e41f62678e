import { err, ok, type Result } from "../internal/result.ts";
import { TextBuffer } from "./text_buffer.ts";
import { ParseError } from "./text_errors.ts";
import type { TextView } from "./text_view.ts";

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;
const INTEGER = /^[+-]?\d+$/;

/**
 * Parses decimal numeric text: an optional sign, digits with an optional
 * fraction, an optional exponent, or one of `inf`, `infinity` and `nan`.
 * Surrounding whitespace is not accepted; trim the view first.
 */
export function parseNumber(view: TextView): Result<number, ParseError> {
  const text = view.toString();
  if (text.length === 0) {
    return err(new ParseError("Cannot parse a number from empty text", text, "empty"));
  }
  if (DECIMAL.test(text)) {
    return ok(Number(text));
  }
  const special = SPECIAL.exec(text);
  if (special) {
    if (special[2].toLowerCase() === "nan") {
      return ok(Number.NaN);
    }
    return ok(special[1] === "-" ? -Infinity : Infinity);
  }
  return err(new ParseError(`Invalid number: ${JSON.stringify(text)}`, text, "invalid"));
}

/**
 * Parses an optionally signed run of ASCII digits. Values outside the safe
 * integer range fail with kind `out-of-range`.
 */
export function parseInteger(view: TextView): Result<number, ParseError> {
  const text = view.toString();
  if (text.length === 0) {
    return err(new ParseError("Cannot parse an integer from empty text", text, "empty"));
  }
  if (!INTEGER.test(text)) {
    return err(new ParseError(`Invalid integer: ${JSON.stringify(text)}`, text, "invalid"));
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    return err(
      new ParseError(`Integer out of range: ${text}`, text, "out-of-range"),
    );
  }
  return ok(value === 0 ? 0 : value);
}

/** Formats a number as text using the shortest round-trip form. */
export function toText(value: number): TextBuffer {
  return TextBuffer.from(String(value));
}
