/**
 * Byte-level search and comparison over `Uint8Array` ranges.
 *
 * Search is the naive O(n·m) scan. Text handled here is short enough that a
 * linear-time matcher does not pay for its setup.
 */

/**
 * Compares two byte arrays lexicographically.
 * @returns -1, 0 or 1.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = a[i] - b[i];
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  if (a.length === b.length) {
    return 0;
  }
  return a.length < b.length ? -1 : 1;
}

/** Returns true if `needle` occurs in `haystack` at `offset`. */
export function matchesAt(
  haystack: Uint8Array,
  needle: Uint8Array,
  offset: number,
): boolean {
  if (offset < 0 || offset + needle.length > haystack.length) {
    return false;
  }
  for (let i = 0; i < needle.length; i++) {
    if (haystack[offset + i] !== needle[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Finds the first occurrence of `needle` at or after `from`.
 * @returns The offset of the match, or -1.
 */
export function indexOfBytes(
  haystack: Uint8Array,
  needle: Uint8Array,
  from = 0,
): number {
  const last = haystack.length - needle.length;
  for (let offset = Math.max(from, 0); offset <= last; offset++) {
    if (matchesAt(haystack, needle, offset)) {
      return offset;
    }
  }
  return -1;
}
