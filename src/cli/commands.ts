/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments
 *   - calls library functions (no hashing logic here)
 *   - writes to stdout / stderr
 *   - returns an exit code (0 = success, 1 = error, 3 = batch had failures)
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { canonicalJson } from "../common/canonical.js";
import { HashError } from "../hash/errors.js";
import { hashBtcHeader } from "../hash/hashing.js";
import { blockId, checkProofOfWork, parseBlockHeader } from "../header/header.js";
import { invokeBatch } from "../service/invoke.js";
import { type HeaderHashConfig, toHashOptions } from "./config.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function err(msg: string): void {
  process.stderr.write(`error: ${msg}\n`);
}

function out(msg: string): void {
  process.stdout.write(msg + "\n");
}

function requireFlag(
  flags: Map<string, string>,
  name: string,
): string | undefined {
  const v = flags.get(name);
  if (!v) {
    err(`missing required flag: --${name}`);
    return undefined;
  }
  return v;
}

function readJsonFile(path: string): unknown {
  const abs = resolve(path);
  if (!existsSync(abs)) {
    throw new Error(`File not found: ${abs}`);
  }
  const raw = readFileSync(abs, "utf8");
  return JSON.parse(raw) as unknown;
}

function reportHashError(e: HashError, json: boolean): number {
  if (json) {
    out(canonicalJson({ ok: false, code: e.code, error: e.message }));
  } else {
    err(`${e.code}: ${e.message}`);
  }
  return 1;
}

// ---------------------------------------------------------------------------
// hash
// ---------------------------------------------------------------------------

export function cmdHash(
  headerHex: string,
  config: HeaderHashConfig,
  json: boolean,
): number {
  const result = hashBtcHeader(headerHex, toHashOptions(config));
  if (!result.ok) {
    return reportHashError(result.error, json);
  }
  if (json) {
    out(canonicalJson({ ok: true, digest: result.digest }));
  } else {
    out(result.digest);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// block-id
// ---------------------------------------------------------------------------

export function cmdBlockId(
  headerHex: string,
  config: HeaderHashConfig,
  json: boolean,
): number {
  let id: string;
  try {
    id = blockId(headerHex, toHashOptions(config));
  } catch (e: unknown) {
    if (e instanceof HashError) return reportHashError(e, json);
    throw e;
  }
  if (json) {
    out(canonicalJson({ ok: true, blockId: id }));
  } else {
    out(id);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// inspect
// ---------------------------------------------------------------------------

export function cmdInspect(
  headerHex: string,
  config: HeaderHashConfig,
  json: boolean,
): number {
  try {
    const header = parseBlockHeader(headerHex);
    const pow = checkProofOfWork(headerHex, toHashOptions(config));
    if (json) {
      out(canonicalJson({ ok: true, header, proofOfWork: pow }));
    } else {
      out(`version:       ${header.version}`);
      out(`prevBlockHash: ${header.prevBlockHash}`);
      out(`merkleRoot:    ${header.merkleRoot}`);
      out(`time:          ${header.time}`);
      out(`bits:          0x${header.bits.toString(16).padStart(8, "0")}`);
      out(`nonce:         ${header.nonce}`);
      out(`blockId:       ${pow.blockId}`);
      out(`target:        ${pow.target}`);
      out(`meetsTarget:   ${pow.meetsTarget ? "yes" : "no"}`);
    }
    return 0;
  } catch (e: unknown) {
    if (e instanceof HashError) return reportHashError(e, json);
    throw e;
  }
}

// ---------------------------------------------------------------------------
// batch
// ---------------------------------------------------------------------------

export function cmdBatch(
  flags: Map<string, string>,
  config: HeaderHashConfig,
  json: boolean,
): number {
  const file = requireFlag(flags, "file");
  if (!file) return 1;

  let data: unknown;
  try {
    data = readJsonFile(file);
  } catch (e: unknown) {
    err(e instanceof Error ? e.message : String(e));
    return 1;
  }

  const result = invokeBatch(data, toHashOptions(config));
  if (!result.valid) {
    err(`Invalid batch: ${result.error}`);
    return 1;
  }

  if (json) {
    out(canonicalJson(result));
  } else {
    for (const o of result.outcomes) {
      if (o.status === "success") {
        out(`${o.requestId}  ok    ${o.output}`);
      } else {
        out(`${o.requestId}  fail  ${o.code}`);
      }
    }
    out(`${result.succeeded} succeeded, ${result.failed} failed`);
  }
  return result.failed === 0 ? 0 : 3;
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(
  config: HeaderHashConfig,
  json: boolean,
): number {
  if (json) {
    out(canonicalJson(config));
  } else {
    out(`maxInputBytes:       ${config.maxInputBytes}`);
    out(`requireHeaderLength: ${config.requireHeaderLength}`);
  }
  return 0;
}
