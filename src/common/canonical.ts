/**
 * Canonical JSON serialization for CLI and boundary output.
 *
 * Guarantees:
 *   1. Keys sorted lexicographically at every nesting level.
 *   2. No `undefined` values (omitted, never serialized as null).
 *   3. bigint serialized as a decimal string.
 *   4. Byte arrays (Buffer, Uint8Array) serialized as lowercase hex.
 *   5. Arrays preserve element order.
 *   6. Identical logical input → byte-identical output.
 *
 * Pure function — no side effects.
 */

import { encodeHex } from "../hash/hex.js";

export function canonicalJson(value: unknown): string {
  return JSON.stringify(toSortedValue(value));
}

function toSortedValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === "bigint") {
    return value.toString(10);
  }

  if (value instanceof Uint8Array) {
    return encodeHex(value);
  }

  if (Array.isArray(value)) {
    return value.map(toSortedValue);
  }

  if (typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    )) {
      if (v !== undefined) {
        sorted[key] = toSortedValue(v);
      }
    }
    return sorted;
  }

  return value;
}
