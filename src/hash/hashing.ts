/**
 * Double SHA-256 ("hash256") over hex-encoded input.
 *
 * hashBtcHeader:
 *   - Bound the input length (optional) before anything is allocated.
 *   - Decode the hex strictly.
 *   - SHA-256 the bytes, then SHA-256 the 32 raw digest bytes.
 *   - Return the lowercase hex of the second digest, unreversed.
 *
 * Pure functions — no I/O, no side effects.
 */

import { createHash } from "node:crypto";
import { HashError } from "./errors.js";
import { decodeHex, encodeHex } from "./hex.js";

/** Size of a serialized Bitcoin block header in bytes. */
export const BLOCK_HEADER_BYTES = 80;

/** Input bound applied at the invocation boundary and by the CLI. */
export const DEFAULT_MAX_INPUT_BYTES = 1_048_576;

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** Single SHA-256 pass. */
export function sha256(data: Uint8Array): Buffer {
  return createHash("sha256").update(data).digest();
}

/** SHA-256 applied twice; the second pass covers the raw first digest. */
export function hash256(data: Uint8Array): Buffer {
  return sha256(sha256(data));
}

// ---------------------------------------------------------------------------
// hashBtcHeader
// ---------------------------------------------------------------------------

export interface HashOptions {
  /** Reject inputs that decode to more than this many bytes. */
  maxInputBytes?: number;
  /** Reject inputs that are not exactly one 80-byte header. */
  requireHeaderLength?: boolean;
}

export type HashResult =
  | { ok: true; digest: string }
  | { ok: false; error: HashError };

/**
 * Hash a hex-encoded header (or any hex byte string) with double SHA-256.
 *
 * Never throws for bad input: decode and size failures come back as
 * `{ ok: false }`.
 */
export function hashBtcHeader(
  input: string,
  options: HashOptions = {},
): HashResult {
  const { maxInputBytes, requireHeaderLength = false } = options;

  if (maxInputBytes !== undefined && input.length > maxInputBytes * 2) {
    return {
      ok: false,
      error: new HashError(
        `Input exceeds ${maxInputBytes} bytes`,
        "INPUT_TOO_LARGE",
        { maxInputBytes, hexLength: input.length },
      ),
    };
  }

  let bytes: Buffer;
  try {
    bytes = decodeHex(input);
  } catch (e: unknown) {
    if (e instanceof HashError) return { ok: false, error: e };
    throw e;
  }

  if (requireHeaderLength && bytes.length !== BLOCK_HEADER_BYTES) {
    return {
      ok: false,
      error: new HashError(
        `Block header must be ${BLOCK_HEADER_BYTES} bytes, got ${bytes.length}`,
        "HEADER_LENGTH_INVALID",
        { length: bytes.length },
      ),
    };
  }

  return { ok: true, digest: encodeHex(hash256(bytes)) };
}
