/**
 * headerhash — double SHA-256 of hex-encoded Bitcoin block headers.
 */

export * from "./hash/index.js";
export * from "./header/index.js";
export * from "./contracts/index.js";
export * from "./service/index.js";
export { canonicalJson } from "./common/canonical.js";
