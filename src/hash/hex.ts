/**
 * Strict hexadecimal codec.
 *
 * Decoding rejects odd-length input and any character outside [0-9a-fA-F].
 * Buffer.from(s, "hex") silently truncates at the first bad pair, so the
 * input is checked before it reaches Buffer.
 */

import { HashError } from "./errors.js";

const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;

/** True when `input` is even-length and made only of hex digits. */
export function isHex(input: string): boolean {
  return HEX_RE.test(input);
}

/**
 * Decode a hex string into bytes.
 *
 * @throws HashError DECODE_ERROR on odd length or a non-hex character
 */
export function decodeHex(input: string): Buffer {
  if (input.length % 2 !== 0) {
    throw new HashError(
      `Hex input has odd length (${input.length})`,
      "DECODE_ERROR",
      { length: input.length },
    );
  }
  if (!isHex(input)) {
    const index = input.search(/[^0-9a-fA-F]/);
    throw new HashError(
      `Invalid hex character at offset ${index}`,
      "DECODE_ERROR",
      { offset: index },
    );
  }
  return Buffer.from(input, "hex");
}

/** Lowercase hex, two characters per byte. */
export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    "hex",
  );
}

/** Reverse the byte order of a hex string (Bitcoin display order). */
export function reverseHex(input: string): string {
  return encodeHex(decodeHex(input).reverse());
}
