/**
 * Invocation boundary for hashBtcHeader.
 *
 * Every call ends in exactly one of two outcomes:
 *   - success: the 64-char lowercase digest
 *   - failure: an error code plus an opaque hex payload
 *
 * Bad input never throws and never yields a partial digest. The payload is
 * empty for decode failures; callers must not parse it.
 *
 * Input is bounded by DEFAULT_MAX_INPUT_BYTES unless the caller passes its
 * own maxInputBytes.
 */

import { v4 as uuidv4 } from "uuid";
import {
  HashRequestSchema,
  HashBatchSchema,
  type CallOutcome,
  type OutcomeCode,
} from "../contracts/schemas.js";
import {
  DEFAULT_MAX_INPUT_BYTES,
  hashBtcHeader,
  type HashOptions,
} from "../hash/hashing.js";
import { encodeHex } from "../hash/hex.js";
import type { HashError } from "../hash/errors.js";

export interface BatchOutcome {
  valid: true;
  outcomes: CallOutcome[];
  succeeded: number;
  failed: number;
}

export interface BatchRejection {
  valid: false;
  error: string;
}

export type BatchResult = BatchOutcome | BatchRejection;

function failure(
  requestId: string,
  code: OutcomeCode,
  message: string,
): CallOutcome {
  return {
    status: "failure",
    requestId,
    code,
    payload: encodeHex(Buffer.from(message, "utf8")),
  };
}

function withDefaultBound(options: HashOptions): HashOptions {
  return {
    ...options,
    maxInputBytes: options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES,
  };
}

function hashFailure(requestId: string, error: HashError): CallOutcome {
  if (error.code === "DECODE_ERROR") {
    return { status: "failure", requestId, code: error.code, payload: "" };
  }
  return failure(requestId, error.code, error.message);
}

/** Validate one request and hash its header. */
export function invokeHashBtcHeader(
  request: unknown,
  options: HashOptions = {},
): CallOutcome {
  const parsed = HashRequestSchema.safeParse(request);
  if (!parsed.success) {
    return failure(uuidv4(), "REQUEST_INVALID", parsed.error.message);
  }

  const requestId = parsed.data.requestId ?? uuidv4();
  const result = hashBtcHeader(
    parsed.data.headerHex,
    withDefaultBound(options),
  );
  if (!result.ok) {
    return hashFailure(requestId, result.error);
  }
  return { status: "success", requestId, output: result.digest };
}

/**
 * Run every request of a batch independently, preserving order.
 * One failing request does not affect the others.
 */
export function invokeBatch(
  batch: unknown,
  options: HashOptions = {},
): BatchResult {
  const parsed = HashBatchSchema.safeParse(batch);
  if (!parsed.success) {
    return { valid: false, error: parsed.error.message };
  }

  const bounded = withDefaultBound(options);
  const outcomes = parsed.data.requests.map((r) =>
    invokeHashBtcHeader(r, bounded),
  );
  const succeeded = outcomes.filter((o) => o.status === "success").length;
  return {
    valid: true,
    outcomes,
    succeeded,
    failed: outcomes.length - succeeded,
  };
}
