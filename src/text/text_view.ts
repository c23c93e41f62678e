import type { Borrow } from "../internal/generation.ts";
import {
  compareBytes,
  indexOfBytes,
  matchesAt,
} from "../internal/byte_search.ts";
import { err, ok, type Result } from "../internal/result.ts";
import { decodeOne, isBoundary, isContinuationByte, validate } from "./codec.ts";
import type { Scalar } from "./scalar.ts";
import { decodeString, encodeString } from "./text_encoding.ts";
import { BoundaryError, type MalformedSequenceError } from "./text_errors.ts";

let readView: (view: TextView) => Uint8Array;
let wrapView: (bytes: Uint8Array, borrow: Borrow | undefined) => TextView;

/**
 * Immutable, non-owning view of well-formed UTF-8 text.
 *
 * A view never copies the bytes it looks at. Views taken from a
 * {@link TextBuffer} borrow the buffer's storage and become stale as soon as
 * the buffer is mutated; any use of a stale view throws `StaleViewError`.
 * Views built from strings or validated bytes own a private copy and stay
 * valid for their whole lifetime.
 *
 * There is deliberately no `charAt(index)`: UTF-8 is variable-width, so
 * reaching the n-th scalar is an O(n) scan. Use {@link chars} or
 * {@link charIndices} instead.
 *
 * @example
 * ```typescript
 * const view = TextView.from("  Rust is fun!  ").trim();
 * const word = view.slice(0, 4); // { kind: "ok", value: TextView("Rust") }
 * ```
 */
export class TextView {
  readonly #bytes: Uint8Array;
  readonly #borrow: Borrow | undefined;

  private constructor(bytes: Uint8Array, borrow: Borrow | undefined) {
    this.#bytes = bytes;
    this.#borrow = borrow;
  }

  static {
    readView = (view) => view.#read();
    wrapView = (bytes, borrow) => new TextView(bytes, borrow);
  }

  /**
   * Creates a view over the UTF-8 encoding of `text`.
   * @throws InvalidCodepointError if `text` holds a lone surrogate.
   */
  public static from(text: string): TextView {
    return new TextView(encodeString(text), undefined);
  }

  /** Copies and validates `bytes`. */
  public static fromBytes(
    bytes: Uint8Array,
  ): Result<TextView, MalformedSequenceError> {
    const checked = validate(bytes);
    if (checked.kind === "err") {
      return checked;
    }
    return ok(new TextView(bytes.slice(), undefined));
  }

  // The underlying bytes, after checking the borrow is still live.
  #read(): Uint8Array {
    this.#borrow?.check();
    return this.#bytes;
  }

  /** True while the owning buffer has not been mutated. */
  public isLive(): boolean {
    return this.#borrow?.isLive() ?? true;
  }

  /** Length in bytes. */
  public length(): number {
    return this.#read().length;
  }

  public isEmpty(): boolean {
    return this.length() === 0;
  }

  /** Number of scalars. Scans the whole view on every call. */
  public charCount(): number {
    const bytes = this.#read();
    let count = 0;
    for (let i = 0; i < bytes.length; i++) {
      if (!isContinuationByte(bytes[i])) {
        count++;
      }
    }
    return count;
  }

  /**
   * The scalars of the view, decoded lazily. Every iteration starts over
   * from the first byte.
   */
  public chars(): Iterable<Scalar> {
    this.#read();
    return {
      [Symbol.iterator]: () => this.#scalars(),
    };
  }

  /** Like {@link chars}, paired with the byte offset of each scalar. */
  public charIndices(): Iterable<[number, Scalar]> {
    this.#read();
    return {
      [Symbol.iterator]: () => this.#indexedScalars(),
    };
  }

  /** The raw byte values of the view. */
  public bytes(): Iterable<number> {
    this.#read();
    return {
      [Symbol.iterator]: () => this.#byteValues(),
    };
  }

  *#indexedScalars(): Generator<[number, Scalar]> {
    let offset = 0;
    while (offset < this.#read().length) {
      const decoded = decodeOne(this.#read(), offset);
      if (decoded.kind === "err") {
        throw decoded.error;
      }
      yield [offset, decoded.value.scalar];
      offset += decoded.value.length;
    }
  }

  *#scalars(): Generator<Scalar> {
    for (const [, scalar] of this.#indexedScalars()) {
      yield scalar;
    }
  }

  *#byteValues(): Generator<number> {
    for (let i = 0; i < this.#read().length; i++) {
      yield this.#read()[i];
    }
  }

  /**
   * Returns the sub-view `[start, end)`. Both offsets must be scalar
   * boundaries with `start <= end <= length()`.
   */
  public slice(start: number, end: number): Result<TextView, BoundaryError> {
    const bytes = this.#read();
    const problem = checkRange(bytes, start, end);
    if (problem !== undefined) {
      return err(new BoundaryError(problem, start, end, bytes.length));
    }
    return ok(new TextView(bytes.subarray(start, end), this.#borrow));
  }

  /** True if `needle` occurs anywhere in the view. */
  public contains(needle: TextView): boolean {
    return this.find(needle) !== undefined;
  }

  /**
   * Byte offset of the first occurrence of `needle`, or undefined.
   * An empty needle is found at offset 0.
   */
  public find(needle: TextView): number | undefined {
    const index = indexOfBytes(this.#read(), needle.#read());
    return index === -1 ? undefined : index;
  }

  public startsWith(prefix: TextView): boolean {
    return matchesAt(this.#read(), prefix.#read(), 0);
  }

  public endsWith(suffix: TextView): boolean {
    const bytes = this.#read();
    const tail = suffix.#read();
    return matchesAt(bytes, tail, bytes.length - tail.length);
  }

  /**
   * Splits the view on non-overlapping occurrences of `separator`, scanning
   * left to right. An empty separator yields each scalar on its own.
   */
  public split(separator: TextView): Iterable<TextView> {
    this.#read();
    return {
      [Symbol.iterator]: () => this.#pieces(separator),
    };
  }

  *#pieces(separator: TextView): Generator<TextView> {
    const sep = separator.#read();
    if (sep.length === 0) {
      for (const [offset, scalar] of this.#indexedScalars()) {
        yield this.#sub(offset, offset + scalar.encodedLength());
      }
      return;
    }
    let start = 0;
    for (;;) {
      const bytes = this.#read();
      const match = indexOfBytes(bytes, sep, start);
      if (match === -1) {
        yield this.#sub(start, bytes.length);
        return;
      }
      yield this.#sub(start, match);
      start = match + sep.length;
    }
  }

  /** View without leading and trailing whitespace scalars. */
  public trim(): TextView {
    return this.trimStart().trimEnd();
  }

  /** View without leading whitespace scalars. */
  public trimStart(): TextView {
    const bytes = this.#read();
    let start = 0;
    while (start < bytes.length) {
      const decoded = decodeOne(bytes, start);
      if (decoded.kind === "err" || !decoded.value.scalar.isWhitespace()) {
        break;
      }
      start += decoded.value.length;
    }
    return start === 0 ? this : this.#sub(start, bytes.length);
  }

  /** View without trailing whitespace scalars. */
  public trimEnd(): TextView {
    const bytes = this.#read();
    let end = bytes.length;
    while (end > 0) {
      let start = end - 1;
      while (start > 0 && isContinuationByte(bytes[start])) {
        start--;
      }
      const decoded = decodeOne(bytes, start);
      if (decoded.kind === "err" || !decoded.value.scalar.isWhitespace()) {
        break;
      }
      end = start;
    }
    return end === bytes.length ? this : this.#sub(0, end);
  }

  #sub(start: number, end: number): TextView {
    return new TextView(this.#read().subarray(start, end), this.#borrow);
  }

  /** Byte-for-byte equality. */
  public equals(other: TextView): boolean {
    return this.compare(other) === 0;
  }

  /** Lexicographic byte order, which matches code point order. */
  public compare(other: TextView): number {
    return compareBytes(this.#read(), other.#read());
  }

  /** A copy of the bytes. */
  public toBytes(): Uint8Array {
    return this.#read().slice();
  }

  public toString(): string {
    return decodeString(this.#read());
  }
}

/**
 * The bytes a view looks at, without copying. Throws `StaleViewError` for a
 * stale view. Callers must not write to the returned array; this function is
 * not part of the package's public surface.
 */
export function viewBytes(view: TextView): Uint8Array {
  return readView(view);
}

/**
 * Wraps bytes that are known to be valid UTF-8 without copying them. Not part
 * of the package's public surface.
 */
export function borrowedView(bytes: Uint8Array, borrow?: Borrow): TextView {
  return wrapView(bytes, borrow);
}

/**
 * Describes what is wrong with the byte range `[start, end)` of `bytes`, or
 * returns undefined when it is a valid boundary-aligned range.
 */
export function checkRange(
  bytes: Uint8Array,
  start: number,
  end: number,
): string | undefined {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    return `Range offsets must be integers. Got start=${start}, end=${end}`;
  }
  if (start < 0 || start > end) {
    return `Invalid range: start=${start}, end=${end}`;
  }
  if (end > bytes.length) {
    return `Range end ${end} exceeds length ${bytes.length}`;
  }
  if (!isBoundary(bytes, start)) {
    return `Range start ${start} is not a scalar boundary`;
  }
  if (!isBoundary(bytes, end)) {
    return `Range end ${end} is not a scalar boundary`;
  }
  return undefined;
}
