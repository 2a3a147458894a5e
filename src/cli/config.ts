/**
 * CLI configuration: hashing limits resolved from the environment.
 *
 * Defaults:
 *   maxInputBytes:        1 MiB of decoded input
 *   requireHeaderLength:  false (any hex byte string is hashed)
 *
 * Environment overrides:
 *   HEADERHASH_MAX_INPUT_BYTES        positive integer
 *   HEADERHASH_REQUIRE_HEADER_LENGTH  true | false | 1 | 0
 */

import { DEFAULT_MAX_INPUT_BYTES, type HashOptions } from "../hash/hashing.js";

export interface HeaderHashConfig {
  maxInputBytes: number;
  requireHeaderLength: boolean;
}

export { DEFAULT_MAX_INPUT_BYTES };

export type ConfigErrorCode = "CONFIG_INVALID";

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode = "CONFIG_INVALID";
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

function parsePositiveInt(name: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(name, `expected a positive integer, got "${raw}"`);
  }
  const n = Number(raw.trim());
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new ConfigError(name, `expected a positive integer, got "${raw}"`);
  }
  return n;
}

function parseBool(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      throw new ConfigError(name, `expected true or false, got "${raw}"`);
  }
}

export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
): HeaderHashConfig {
  const rawMax = env["HEADERHASH_MAX_INPUT_BYTES"];
  const rawStrict = env["HEADERHASH_REQUIRE_HEADER_LENGTH"];
  return {
    maxInputBytes:
      rawMax === undefined
        ? DEFAULT_MAX_INPUT_BYTES
        : parsePositiveInt("HEADERHASH_MAX_INPUT_BYTES", rawMax),
    requireHeaderLength:
      rawStrict === undefined
        ? false
        : parseBool("HEADERHASH_REQUIRE_HEADER_LENGTH", rawStrict),
  };
}

export function toHashOptions(config: HeaderHashConfig): HashOptions {
  return {
    maxInputBytes: config.maxInputBytes,
    requireHeaderLength: config.requireHeaderLength,
  };
}
