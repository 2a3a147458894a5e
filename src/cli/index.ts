#!/usr/bin/env node
/**
 * hhash — block header hashing CLI.
 *
 * Usage:
 *   hhash <command> [options]
 *
 * Commands:
 *   hash <hex>              Double SHA-256 of hex input (unreversed)
 *   block-id <hex>          Display-order block hash
 *   inspect <hex>           Decode an 80-byte header and check its work
 *   batch --file <path>     Hash every request in a JSON batch file
 *   config show             Show resolved configuration
 */

import { runMain } from "./main.js";

runMain(process.argv.slice(2), process.env).then((code) => process.exit(code));
