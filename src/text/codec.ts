import { err, ok, type Result } from "../internal/result.ts";
import {
  MAX_CODEPOINT,
  type Scalar,
  SURROGATE_END,
  SURROGATE_START,
  uncheckedScalar,
} from "./scalar.ts";
import { type MalformedReason, MalformedSequenceError } from "./text_errors.ts";

export { decodeLossy } from "./text_encoding.ts";

/** A decoded scalar and the number of bytes it occupied. */
export interface Decoded {
  readonly scalar: Scalar;
  readonly length: 1 | 2 | 3 | 4;
}

/** Returns true for bytes of the form `10xxxxxx`. */
export function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

function malformed(
  offset: number,
  reason: MalformedReason,
  detail: string,
): Result<never, MalformedSequenceError> {
  return err(
    new MalformedSequenceError(
      `Malformed UTF-8 at offset ${offset}: ${detail}`,
      offset,
      reason,
    ),
  );
}

/**
 * Decodes the scalar starting at `offset`.
 *
 * `offset` must be a boundary. Overlong forms, surrogates, values above
 * U+10FFFF, truncated sequences and stray continuation bytes are rejected.
 */
export function decodeOne(
  bytes: Uint8Array,
  offset: number,
): Result<Decoded, MalformedSequenceError> {
  if (!Number.isInteger(offset) || offset < 0 || offset >= bytes.length) {
    return malformed(offset, "truncated", "no bytes left to decode");
  }
  const lead = bytes[offset];
  if (lead < 0x80) {
    return ok<Decoded>({ scalar: uncheckedScalar(lead), length: 1 });
  }
  if (lead < 0xc0) {
    return malformed(
      offset,
      "unexpected-continuation",
      `continuation byte 0x${lead.toString(16)} in lead position`,
    );
  }

  let length: 2 | 3 | 4;
  let value: number;
  if (lead < 0xe0) {
    if (lead < 0xc2) {
      return malformed(offset, "overlong", `lead byte 0x${lead.toString(16)}`);
    }
    length = 2;
    value = lead & 0x1f;
  } else if (lead < 0xf0) {
    length = 3;
    value = lead & 0x0f;
  } else if (lead < 0xf5) {
    length = 4;
    value = lead & 0x07;
  } else {
    return malformed(
      offset,
      "invalid-lead",
      `byte 0x${lead.toString(16)} never appears in UTF-8`,
    );
  }

  for (let i = 1; i < length; i++) {
    const index = offset + i;
    if (index >= bytes.length) {
      return malformed(
        offset,
        "truncated",
        `expected ${length} bytes, found ${bytes.length - offset}`,
      );
    }
    const byte = bytes[index];
    if (!isContinuationByte(byte)) {
      return malformed(
        offset,
        "invalid-continuation",
        `byte 0x${byte.toString(16)} at offset ${index} is not a continuation byte`,
      );
    }
    value = (value << 6) | (byte & 0x3f);
  }

  if ((length === 3 && value < 0x800) || (length === 4 && value < 0x10000)) {
    return malformed(offset, "overlong", `U+${hex(value)} in ${length} bytes`);
  }
  if (value >= SURROGATE_START && value <= SURROGATE_END) {
    return malformed(offset, "surrogate", `encoded surrogate U+${hex(value)}`);
  }
  if (value > MAX_CODEPOINT) {
    return malformed(offset, "out-of-range", `U+${hex(value)} exceeds U+10FFFF`);
  }
  return ok({ scalar: uncheckedScalar(value), length });
}

function hex(value: number): string {
  return value.toString(16).toUpperCase().padStart(4, "0");
}

/**
 * Writes the UTF-8 encoding of `scalar` at `offset` and returns the number
 * of bytes written. The caller guarantees `target` has room.
 */
export function encodeInto(
  scalar: Scalar,
  target: Uint8Array,
  offset: number,
): 1 | 2 | 3 | 4 {
  const cp = scalar.value;
  if (cp < 0x80) {
    target[offset] = cp;
    return 1;
  }
  if (cp < 0x800) {
    target[offset] = 0xc0 | (cp >> 6);
    target[offset + 1] = 0x80 | (cp & 0x3f);
    return 2;
  }
  if (cp < 0x10000) {
    target[offset] = 0xe0 | (cp >> 12);
    target[offset + 1] = 0x80 | ((cp >> 6) & 0x3f);
    target[offset + 2] = 0x80 | (cp & 0x3f);
    return 3;
  }
  target[offset] = 0xf0 | (cp >> 18);
  target[offset + 1] = 0x80 | ((cp >> 12) & 0x3f);
  target[offset + 2] = 0x80 | ((cp >> 6) & 0x3f);
  target[offset + 3] = 0x80 | (cp & 0x3f);
  return 4;
}

/** Encodes a scalar into a fresh array of 1 to 4 bytes. */
export function encode(scalar: Scalar): Uint8Array {
  const bytes = new Uint8Array(scalar.encodedLength());
  encodeInto(scalar, bytes, 0);
  return bytes;
}

/**
 * Returns true if `offset` does not fall inside a multi-byte sequence.
 * Both ends of the array are boundaries; offsets outside it are not.
 */
export function isBoundary(bytes: Uint8Array, offset: number): boolean {
  if (!Number.isInteger(offset) || offset < 0 || offset > bytes.length) {
    return false;
  }
  if (offset === 0 || offset === bytes.length) {
    return true;
  }
  return !isContinuationByte(bytes[offset]);
}

/**
 * Checks that the whole array is well-formed UTF-8. On failure the error's
 * `validUpTo` is the length of the longest valid prefix.
 */
export function validate(
  bytes: Uint8Array,
): Result<void, MalformedSequenceError> {
  let offset = 0;
  while (offset < bytes.length) {
    if (bytes[offset] < 0x80) {
      offset++;
      continue;
    }
    const decoded = decodeOne(bytes, offset);
    if (decoded.kind === "err") {
      return decoded;
    }
    offset += decoded.value.length;
  }
  return ok(undefined);
}
