/**
 * Block header parsing and proof-of-work checks.
 *
 * Serialized layout (80 bytes, little-endian integers):
 *   0   version        int32
 *   4   prevBlockHash  32 bytes
 *   36  merkleRoot     32 bytes
 *   68  time           uint32
 *   72  bits           uint32 (compact target)
 *   76  nonce          uint32
 *
 * Hashes are reported in display order (byte-reversed), matching block
 * explorers and RPC output.
 */

import { HashError } from "../hash/errors.js";
import { decodeHex, encodeHex, reverseHex } from "../hash/hex.js";
import {
  BLOCK_HEADER_BYTES,
  hashBtcHeader,
  type HashOptions,
} from "../hash/hashing.js";

export interface BlockHeader {
  version: number;
  /** Display order. */
  prevBlockHash: string;
  /** Display order. */
  merkleRoot: string;
  /** UNIX seconds. */
  time: number;
  bits: number;
  nonce: number;
}

export interface ProofOfWorkResult {
  blockId: string;
  /** 32-byte big-endian hex. */
  target: string;
  meetsTarget: boolean;
}

const MAX_TARGET = (1n << 256n) - 1n;

function displayHash(bytes: Buffer): string {
  return encodeHex(Buffer.from(bytes).reverse());
}

/**
 * Parse an 80-byte serialized header. Input longer than one header is
 * rejected before it is decoded.
 *
 * @throws HashError DECODE_ERROR for bad hex, HEADER_LENGTH_INVALID for
 *   anything other than 80 bytes
 */
export function parseBlockHeader(input: string): BlockHeader {
  if (input.length > BLOCK_HEADER_BYTES * 2) {
    throw new HashError(
      `Block header must be ${BLOCK_HEADER_BYTES} bytes, got ${input.length} hex characters`,
      "HEADER_LENGTH_INVALID",
      { hexLength: input.length },
    );
  }
  const bytes = decodeHex(input);
  if (bytes.length !== BLOCK_HEADER_BYTES) {
    throw new HashError(
      `Block header must be ${BLOCK_HEADER_BYTES} bytes, got ${bytes.length}`,
      "HEADER_LENGTH_INVALID",
      { length: bytes.length },
    );
  }

  return {
    version: bytes.readInt32LE(0),
    prevBlockHash: displayHash(bytes.subarray(4, 36)),
    merkleRoot: displayHash(bytes.subarray(36, 68)),
    time: bytes.readUInt32LE(68),
    bits: bytes.readUInt32LE(72),
    nonce: bytes.readUInt32LE(76),
  };
}

/**
 * Display-order block hash: the double SHA-256 of the header, reversed.
 *
 * @throws HashError when the input does not hash
 */
export function blockId(input: string, options: HashOptions = {}): string {
  const result = hashBtcHeader(input, options);
  if (!result.ok) throw result.error;
  return reverseHex(result.digest);
}

/**
 * Expand the compact ("nBits") encoding into a 256-bit target.
 *
 * The top byte is a base-256 exponent, the low 23 bits the mantissa; bit 23
 * is a sign bit and must be clear whenever the word left after the exponent
 * shift is non-zero.
 */
export function compactToTarget(bits: number): bigint {
  if (!Number.isInteger(bits) || bits < 0 || bits > 0xffffffff) {
    throw new HashError(`Compact target out of range: ${bits}`, "TARGET_INVALID", {
      bits,
    });
  }
  const exponent = bits >>> 24;
  const mantissa = bits & 0x007fffff;
  const negative = (bits & 0x00800000) !== 0;
  const word = exponent <= 3 ? mantissa >>> (8 * (3 - exponent)) : mantissa;

  if (negative && word !== 0) {
    throw new HashError(
      `Compact target is negative: 0x${bits.toString(16)}`,
      "TARGET_INVALID",
      { bits },
    );
  }

  const target =
    exponent <= 3 ? BigInt(word) : BigInt(word) << BigInt(8 * (exponent - 3));

  if (target > MAX_TARGET) {
    throw new HashError(
      `Compact target overflows 256 bits: 0x${bits.toString(16)}`,
      "TARGET_INVALID",
      { bits },
    );
  }
  return target;
}

/** Compare the header's hash against the target its own `bits` declare. */
export function checkProofOfWork(
  input: string,
  options: HashOptions = {},
): ProofOfWorkResult {
  const header = parseBlockHeader(input);
  const target = compactToTarget(header.bits);
  const id = blockId(input, options);

  return {
    blockId: id,
    target: target.toString(16).padStart(64, "0"),
    meetsTarget: BigInt(`0x${id}`) <= target,
  };
}
