/**
 * Conversions between JS strings and UTF-8 bytes.
 *
 * The shared `TextEncoder` substitutes U+FFFD for lone surrogates, so strings
 * are checked before they are encoded. The strict decoder is only fed bytes
 * that were validated already; `decodeLossy` is the one place that
 * substitutes.
 */
import { hasLoneSurrogate } from "./scalar.ts";
import { InvalidCodepointError } from "./text_errors.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });
const lossyDecoder = new TextDecoder("utf-8");

/**
 * Encodes a string into UTF-8.
 * @throws InvalidCodepointError if the string holds a lone surrogate.
 */
export function encodeString(input: string): Uint8Array {
  if (hasLoneSurrogate(input)) {
    const index = input.search(/\p{Cs}/u);
    const codeUnit = input.charCodeAt(index);
    throw new InvalidCodepointError(
      `Lone surrogate U+${codeUnit.toString(16).toUpperCase()} at index ${index} cannot be encoded`,
      codeUnit,
    );
  }
  return encoder.encode(input);
}

/** Decodes well-formed UTF-8 into a string. */
export function decodeString(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Decodes bytes into a string, replacing each maximal ill-formed subpart
 * with U+FFFD.
 */
export function decodeLossy(bytes: Uint8Array): string {
  return lossyDecoder.decode(bytes);
}
