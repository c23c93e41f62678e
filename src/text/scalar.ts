import { err, ok, type Result } from "../internal/result.ts";
import { InvalidCodepointError } from "./text_errors.ts";

/** Largest Unicode code point. */
export const MAX_CODEPOINT = 0x10ffff;
/** First code point of the surrogate range. */
export const SURROGATE_START = 0xd800;
/** Last code point of the surrogate range. */
export const SURROGATE_END = 0xdfff;

const ALPHABETIC = /^\p{Alphabetic}$/u;
const NUMERIC = /^\p{N}$/u;
const WHITESPACE = /^\p{White_Space}$/u;
// With the `u` flag a lone surrogate is matched as its own code point.
const LONE_SURROGATE = /\p{Cs}/u;

let wrapScalar: (value: number) => Scalar;

/** Returns true if `value` is a Unicode scalar value. */
export function isScalarValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_CODEPOINT &&
    (value < SURROGATE_START || value > SURROGATE_END);
}

/** Returns true if `text` holds an unpaired UTF-16 surrogate. */
export function hasLoneSurrogate(text: string): boolean {
  return LONE_SURROGATE.test(text);
}

/**
 * A single Unicode scalar value: any code point outside the surrogate range.
 *
 * Instances are immutable and can only be obtained through validating
 * factories or from decoding, so holding a `Scalar` means holding a valid
 * value.
 *
 * @example
 * ```typescript
 * const result = Scalar.fromCodepoint(0x00df);
 * if (result.kind === "ok") {
 *   result.value.toUppercase().map(String); // ["S", "S"]
 * }
 * ```
 */
export class Scalar {
  /** The code point. */
  public readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  static {
    wrapScalar = (value) => new Scalar(value);
  }

  /** Validates an integer and wraps it. */
  public static fromCodepoint(
    value: number,
  ): Result<Scalar, InvalidCodepointError> {
    if (!isScalarValue(value)) {
      const hex = Number.isInteger(value) && value >= 0
        ? ` (U+${value.toString(16).toUpperCase()})`
        : "";
      return err(
        new InvalidCodepointError(
          `Not a Unicode scalar value: ${value}${hex}`,
          value,
        ),
      );
    }
    return ok(new Scalar(value));
  }

  /**
   * Builds a scalar from a string holding exactly one scalar value.
   * @throws InvalidCodepointError for empty strings, longer strings and lone
   * surrogates. The error of an empty string carries `NaN` as its code point.
   */
  public static of(char: string): Scalar {
    const codepoint = char.codePointAt(0);
    if (codepoint === undefined) {
      throw new InvalidCodepointError(
        "Expected one scalar, got empty string",
        Number.NaN,
      );
    }
    const width = codepoint > 0xffff ? 2 : 1;
    if (char.length !== width) {
      throw new InvalidCodepointError(
        `Expected one scalar, got ${JSON.stringify(char)}`,
        codepoint,
      );
    }
    if (!isScalarValue(codepoint)) {
      throw new InvalidCodepointError(
        `Lone surrogate U+${codepoint.toString(16).toUpperCase()} is not a scalar value`,
        codepoint,
      );
    }
    return new Scalar(codepoint);
  }

  /** Number of bytes in the UTF-8 encoding. */
  public encodedLength(): 1 | 2 | 3 | 4 {
    if (this.value < 0x80) return 1;
    if (this.value < 0x800) return 2;
    if (this.value < 0x10000) return 3;
    return 4;
  }

  /**
   * Full Unicode uppercase mapping. One scalar may map to several
   * (`ß` becomes `S`, `S`). The mapping is locale-independent.
   */
  public toUppercase(): Scalar[] {
    return fromString(this.toString().toUpperCase());
  }

  /** Full Unicode lowercase mapping, locale-independent. */
  public toLowercase(): Scalar[] {
    return fromString(this.toString().toLowerCase());
  }

  /** Has the Unicode `Alphabetic` property. */
  public isAlphabetic(): boolean {
    return ALPHABETIC.test(this.toString());
  }

  /** Belongs to one of the general categories Nd, Nl or No. */
  public isNumeric(): boolean {
    return NUMERIC.test(this.toString());
  }

  /** Has the Unicode `White_Space` property. */
  public isWhitespace(): boolean {
    return WHITESPACE.test(this.toString());
  }

  public isAscii(): boolean {
    return this.value < 0x80;
  }

  public equals(other: Scalar): boolean {
    return this.value === other.value;
  }

  /** Orders by code point. */
  public compare(other: Scalar): number {
    return this.value < other.value ? -1 : this.value > other.value ? 1 : 0;
  }

  public toString(): string {
    return String.fromCodePoint(this.value);
  }
}

// Case mapping never produces surrogates from a scalar value, so the code
// points of the mapped string are scalars already.
function fromString(text: string): Scalar[] {
  const scalars: Scalar[] = [];
  for (const char of text) {
    const codepoint = char.codePointAt(0);
    if (codepoint !== undefined) {
      scalars.push(wrapScalar(codepoint));
    }
  }
  return scalars;
}

/**
 * Wraps a code point the caller has already validated. Not part of the
 * package's public surface.
 */
export function uncheckedScalar(value: number): Scalar {
  return wrapScalar(value);
}
