import { Generation } from "../internal/generation.ts";
import { indexOfBytes } from "../internal/byte_search.ts";
import { err, ok, type Result } from "../internal/result.ts";
import { CapacityManager, type GrowthStats } from "./capacity_manager.ts";
import { decodeOne, encodeInto, isContinuationByte, validate } from "./codec.ts";
import type { Scalar } from "./scalar.ts";
import { decodeLossy, decodeString, encodeString } from "./text_encoding.ts";
import {
  BoundaryError,
  type MalformedSequenceError,
} from "./text_errors.ts";
import {
  borrowedView,
  checkRange,
  type TextView,
  viewBytes,
} from "./text_view.ts";

/** Options accepted by the {@link TextBuffer} factories. */
export interface TextBufferOptions {
  /**
   * Growth policy to use. Sharing one manager between buffers pools their
   * growth statistics.
   */
  capacityManager?: CapacityManager;
}

/**
 * Owned, growable UTF-8 text.
 *
 * Key features:
 * - Always valid: bytes `[0, len())` are well-formed UTF-8 after every
 *   operation. Inputs are validated before storage is touched, so a failed
 *   operation leaves the content as it was.
 * - Amortized growth: storage doubles when an append does not fit (see
 *   {@link CapacityManager}).
 * - Borrow tracking: {@link asView} hands out zero-copy views. Every mutation
 *   bumps the buffer's generation, and a view taken before the mutation
 *   throws `StaleViewError` when used afterwards.
 *
 * @example
 * ```typescript
 * const buffer = TextBuffer.from("Hello");
 * buffer.push(Scalar.of(","));
 * buffer.pushView(TextView.from(" world"));
 * buffer.toString(); // "Hello, world"
 * ```
 */
export class TextBuffer {
  #storage: Uint8Array;
  #length = 0;
  readonly #generation = new Generation();
  readonly #capacityManager: CapacityManager;

  /** Creates an empty buffer with zero capacity. */
  constructor(options: TextBufferOptions = {}) {
    this.#storage = new Uint8Array(0);
    this.#capacityManager = options.capacityManager ?? new CapacityManager();
  }

  /**
   * Creates an empty buffer with room for `capacity` bytes.
   * @throws RangeError if `capacity` is negative or not an integer.
   */
  public static withCapacity(
    capacity: number,
    options: TextBufferOptions = {},
  ): TextBuffer {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(
        `Capacity must be a non-negative integer. Got ${capacity}`,
      );
    }
    const buffer = new TextBuffer(options);
    buffer.#storage = new Uint8Array(capacity);
    return buffer;
  }

  /** Copies the bytes of `view` into a new buffer. */
  public static fromView(
    view: TextView,
    options: TextBufferOptions = {},
  ): TextBuffer {
    const buffer = new TextBuffer(options);
    buffer.#storage = view.toBytes();
    buffer.#length = buffer.#storage.length;
    return buffer;
  }

  /**
   * Creates a buffer holding `text`.
   * @throws InvalidCodepointError if `text` holds a lone surrogate.
   */
  public static from(text: string, options: TextBufferOptions = {}): TextBuffer {
    const buffer = new TextBuffer(options);
    buffer.#storage = encodeString(text);
    buffer.#length = buffer.#storage.length;
    return buffer;
  }

  /** Copies `bytes` into a new buffer if they are well-formed UTF-8. */
  public static fromBytes(
    bytes: Uint8Array,
    options: TextBufferOptions = {},
  ): Result<TextBuffer, MalformedSequenceError> {
    const checked = validate(bytes);
    if (checked.kind === "err") {
      return checked;
    }
    const buffer = new TextBuffer(options);
    buffer.#storage = bytes.slice();
    buffer.#length = bytes.length;
    return ok(buffer);
  }

  /**
   * Copies `bytes` into a new buffer, replacing every ill-formed subpart
   * with U+FFFD.
   */
  public static fromBytesLossy(
    bytes: Uint8Array,
    options: TextBufferOptions = {},
  ): TextBuffer {
    return TextBuffer.from(decodeLossy(bytes), options);
  }

  /** Length in bytes. */
  public len(): number {
    return this.#length;
  }

  /** Bytes the buffer can hold without reallocating. */
  public capacity(): number {
    return this.#storage.length;
  }

  public isEmpty(): boolean {
    return this.#length === 0;
  }

  /** Reallocation counters of this buffer's capacity manager. */
  public growthStats(): GrowthStats {
    return this.#capacityManager.stats();
  }

  /**
   * Zero-copy view of the whole content. The view is invalidated by the
   * next mutation of this buffer.
   */
  public asView(): TextView {
    return borrowedView(this.#contents(), this.#generation.borrow());
  }

  /** Appends one scalar. */
  public push(scalar: Scalar): void {
    const size = scalar.encodedLength();
    this.#ensureCapacity(this.#length + size);
    this.#generation.bump();
    this.#length += encodeInto(scalar, this.#storage, this.#length);
  }

  /** Appends the bytes of `view`, which may be a view of this buffer. */
  public pushView(view: TextView): void {
    const bytes = viewBytes(view);
    this.#ensureCapacity(this.#length + bytes.length);
    this.#generation.bump();
    this.#storage.set(bytes, this.#length);
    this.#length += bytes.length;
  }

  /** Removes and returns the last scalar, if any. */
  public pop(): Scalar | undefined {
    if (this.#length === 0) {
      return undefined;
    }
    let start = this.#length - 1;
    while (start > 0 && isContinuationByte(this.#storage[start])) {
      start--;
    }
    const decoded = decodeOne(this.#contents(), start);
    if (decoded.kind === "err") {
      throw decoded.error;
    }
    this.#generation.bump();
    this.#length = start;
    return decoded.value.scalar;
  }

  /** Inserts `view` at a boundary-aligned byte offset. */
  public insertView(
    offset: number,
    view: TextView,
  ): Result<void, BoundaryError> {
    return this.replaceRange(offset, offset, view);
  }

  /**
   * Replaces the boundary-aligned byte range `[start, end)` with the bytes
   * of `view`.
   */
  public replaceRange(
    start: number,
    end: number,
    view: TextView,
  ): Result<void, BoundaryError> {
    const problem = checkRange(this.#contents(), start, end);
    if (problem !== undefined) {
      return err(new BoundaryError(problem, start, end, this.#length));
    }
    let insert = viewBytes(view);
    if (insert.buffer === this.#storage.buffer) {
      // Shifting the tail below would overwrite a view of ourselves.
      insert = insert.slice();
    }
    const newLength = this.#length - (end - start) + insert.length;
    this.#ensureCapacity(newLength);
    this.#generation.bump();
    this.#storage.copyWithin(start + insert.length, end, this.#length);
    this.#storage.set(insert, start);
    this.#length = newLength;
    return ok(undefined);
  }

  /**
   * Shortens the buffer to `length` bytes. Lengths at or beyond the current
   * length leave the buffer unchanged.
   */
  public truncate(length: number): Result<void, BoundaryError> {
    if (Number.isInteger(length) && length >= this.#length) {
      return ok(undefined);
    }
    const problem = checkRange(this.#contents(), 0, length);
    if (problem !== undefined) {
      return err(new BoundaryError(problem, 0, length, this.#length));
    }
    this.#generation.bump();
    this.#length = length;
    return ok(undefined);
  }

  /** Empties the buffer, keeping its capacity. */
  public clear(): void {
    this.#generation.bump();
    this.#length = 0;
  }

  /**
   * Makes room for at least `additional` more bytes.
   * @throws RangeError if `additional` is negative or not an integer.
   */
  public reserve(additional: number): void {
    if (!Number.isInteger(additional) || additional < 0) {
      throw new RangeError(
        `Additional capacity must be a non-negative integer. Got ${additional}`,
      );
    }
    this.#generation.bump();
    this.#ensureCapacity(this.#length + additional);
  }

  /** Drops spare capacity. */
  public shrinkToFit(): void {
    if (this.#storage.length === this.#length) {
      return;
    }
    this.#generation.bump();
    this.#storage = this.#capacityManager.resize(
      this.#storage,
      this.#length,
      this.#length,
    );
  }

  /**
   * Returns a new buffer with every non-overlapping occurrence of `needle`
   * replaced, scanning left to right. An empty needle matches at every
   * scalar boundary, both ends included.
   */
  public replace(needle: TextView, replacement: TextView): TextBuffer {
    const haystack = this.#contents();
    const pattern = viewBytes(needle);
    const substitute = viewBytes(replacement);
    const out = new TextBuffer();

    if (pattern.length === 0) {
      out.#append(substitute);
      let offset = 0;
      while (offset < haystack.length) {
        let next = offset + 1;
        while (next < haystack.length && isContinuationByte(haystack[next])) {
          next++;
        }
        out.#append(haystack.subarray(offset, next));
        out.#append(substitute);
        offset = next;
      }
      return out;
    }

    let start = 0;
    for (;;) {
      const match = indexOfBytes(haystack, pattern, start);
      if (match === -1) {
        break;
      }
      out.#append(haystack.subarray(start, match));
      out.#append(substitute);
      start = match + pattern.length;
    }
    out.#append(haystack.subarray(start));
    return out;
  }

  public toString(): string {
    return decodeString(this.#contents());
  }

  #contents(): Uint8Array {
    return this.#storage.subarray(0, this.#length);
  }

  #ensureCapacity(required: number): void {
    this.#storage = this.#capacityManager.ensure(
      this.#storage,
      this.#length,
      required,
    );
  }

  // Only for bytes already known to be valid UTF-8 on scalar boundaries.
  #append(bytes: Uint8Array): void {
    if (bytes.length === 0) {
      return;
    }
    this.#ensureCapacity(this.#length + bytes.length);
    this.#storage.set(bytes, this.#length);
    this.#length += bytes.length;
  }
}
