/**
 * Minimal argv parsing: positionals, `--name value` flags, and bare
 * `--name` boolean flags. Flags in BOOLEAN_FLAGS never take a value, so
 * `hash --json <hex>` keeps the hex as a positional.
 */

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["json", "help"]);

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string>;
  boolFlags: Set<string>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const boolFlags = new Set<string>();

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (
        !BOOLEAN_FLAGS.has(name) &&
        next !== undefined &&
        !next.startsWith("--")
      ) {
        flags.set(name, next);
        i += 2;
      } else {
        boolFlags.add(name);
        flags.set(name, "true");
        i += 1;
      }
    } else if (arg === "-h") {
      boolFlags.add("h");
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags };
}
