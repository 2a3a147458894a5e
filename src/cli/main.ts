/**
 * hhash dispatch.
 *
 * `run` maps argv + environment to an exit code and never exits the
 * process itself; `runMain` adds the Fatal handler used by the entry point.
 */

import { ConfigError, resolveConfig, type HeaderHashConfig } from "./config.js";
import {
  cmdHash,
  cmdBlockId,
  cmdInspect,
  cmdBatch,
  cmdConfigShow,
} from "./commands.js";
import { parseArgs } from "./args.js";

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export const USAGE = `hhash — block header hashing

Usage:
  hhash hash <hex> [--json]
  hhash block-id <hex> [--json]
  hhash inspect <hex> [--json]
  hhash batch --file <path> [--json]
  hhash config show [--json]

Environment:
  HEADERHASH_MAX_INPUT_BYTES        Largest accepted input, in decoded bytes
  HEADERHASH_REQUIRE_HEADER_LENGTH  Only accept 80-byte headers (true|false)
`;

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

function requireHex(positional: string[], command: string): string | undefined {
  const hex = positional[1];
  if (hex === undefined) {
    process.stderr.write(`Usage: hhash ${command} <hex>\n`);
  }
  return hex;
}

export function run(argv: string[], env: NodeJS.ProcessEnv): number {
  if (argv.length === 0) {
    process.stderr.write(USAGE);
    return 1;
  }

  const { positional, flags, boolFlags } = parseArgs(argv);
  const json = boolFlags.has("json");

  if (boolFlags.has("help") || boolFlags.has("h") || positional[0] === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  let config: HeaderHashConfig;
  try {
    config = resolveConfig(env);
  } catch (e: unknown) {
    if (!(e instanceof ConfigError)) throw e;
    process.stderr.write(`error: ${e.message}\n`);
    return 1;
  }

  const command = positional[0];

  switch (command) {
    case "hash": {
      const hex = requireHex(positional, command);
      return hex === undefined ? 1 : cmdHash(hex, config, json);
    }

    case "block-id": {
      const hex = requireHex(positional, command);
      return hex === undefined ? 1 : cmdBlockId(hex, config, json);
    }

    case "inspect": {
      const hex = requireHex(positional, command);
      return hex === undefined ? 1 : cmdInspect(hex, config, json);
    }

    case "batch":
      return cmdBatch(flags, config, json);

    case "config":
      if (positional[1] === "show") {
        return cmdConfigShow(config, json);
      }
      process.stderr.write("Unknown config subcommand. Use: config show\n");
      return 1;

    default:
      process.stderr.write(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

/** `run` with unexpected errors reported as `Fatal:` and exit code 2. */
export async function runMain(
  argv: string[],
  env: NodeJS.ProcessEnv,
): Promise<number> {
  try {
    return run(argv, env);
  } catch (e: unknown) {
    process.stderr.write(
      `Fatal: ${e instanceof Error ? e.message : String(e)}\n`,
    );
    return 2;
  }
}
