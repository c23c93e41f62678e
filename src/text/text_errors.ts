/**
 * Error types shared by the scalar, codec, view and buffer modules.
 *
 * Recoverable failures are handed back inside a `Result`; the classes below
 * are the error payloads. `StaleViewError` is the exception: it marks a
 * broken borrow and is always thrown.
 */

/** Error for integers that are not Unicode scalar values. */
export class InvalidCodepointError extends RangeError {
  /** The rejected value. */
  public readonly codepoint: number;

  constructor(message: string, codepoint: number) {
    super(message);
    this.name = "InvalidCodepointError";
    this.codepoint = codepoint;
  }
}

/** Why a byte sequence failed to decode. */
export type MalformedReason =
  | "unexpected-continuation"
  | "invalid-lead"
  | "invalid-continuation"
  | "truncated"
  | "overlong"
  | "surrogate"
  | "out-of-range";

/** Error for byte sequences that are not well-formed UTF-8. */
export class MalformedSequenceError extends Error {
  /** Offset of the lead byte of the offending sequence. */
  public readonly offset: number;
  /** Length of the longest valid prefix of the input. */
  public readonly validUpTo: number;
  /** What was wrong with the sequence. */
  public readonly reason: MalformedReason;

  constructor(
    message: string,
    offset: number,
    reason: MalformedReason,
    validUpTo: number = offset,
  ) {
    super(message);
    this.name = "MalformedSequenceError";
    this.offset = offset;
    this.reason = reason;
    this.validUpTo = validUpTo;
  }
}

/** Error for byte ranges that are out of bounds or split a scalar. */
export class BoundaryError extends RangeError {
  /** Requested start offset. */
  public readonly start: number;
  /** Requested end offset. */
  public readonly end: number;
  /** Byte length of the text the range was taken against. */
  public readonly length: number;

  constructor(message: string, start: number, end: number, length: number) {
    super(message);
    this.name = "BoundaryError";
    this.start = start;
    this.end = end;
    this.length = length;
  }
}

/** Why numeric text failed to parse. */
export type ParseErrorKind = "empty" | "invalid" | "out-of-range";

/** Error for text that does not hold a number. */
export class ParseError extends Error {
  /** The text that was parsed. */
  public readonly input: string;
  public readonly kind: ParseErrorKind;

  constructor(message: string, input: string, kind: ParseErrorKind) {
    super(message);
    this.name = "ParseError";
    this.input = input;
    this.kind = kind;
  }
}

/** Error thrown when a view is used after its buffer was mutated. */
export class StaleViewError extends Error {
  /** Buffer generation when the view was taken. */
  public readonly createdAt: number;
  /** Buffer generation at the time of use. */
  public readonly current: number;

  constructor(createdAt: number, current: number) {
    super(
      `View is stale: taken at buffer generation ${createdAt}, buffer is now at generation ${current}`,
    );
    this.name = "StaleViewError";
    this.createdAt = createdAt;
    this.current = current;
  }
}
