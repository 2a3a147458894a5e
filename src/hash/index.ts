export { HashError, type HashErrorCode } from "./errors.js";

export { isHex, decodeHex, encodeHex, reverseHex } from "./hex.js";

export {
  sha256,
  hash256,
  hashBtcHeader,
  BLOCK_HEADER_BYTES,
  DEFAULT_MAX_INPUT_BYTES,
  type HashOptions,
  type HashResult,
} from "./hashing.js";
