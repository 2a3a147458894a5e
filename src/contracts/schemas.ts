/**
 * Zod schemas for the hash invocation boundary.
 *
 * Request objects use .passthrough() so callers may attach their own
 * correlation fields without being rejected. Hex validity is NOT checked
 * here: a malformed hex string is a hashing outcome (DECODE_ERROR), not a
 * malformed request.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Shared field-level schemas
// ---------------------------------------------------------------------------

const UUID_V4_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

const uuidV4 = z.string().regex(UUID_V4_RE, "Must be a valid UUID v4");

const digestHex = z
  .string()
  .regex(/^[0-9a-f]{64}$/, "Must be 64 lowercase hex characters");

/** Upper bound on requests in one batch. */
export const MAX_BATCH_SIZE = 1000;

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export const HashRequestSchema = z
  .object({
    headerHex: z.string(),
    requestId: uuidV4.optional(),
  })
  .passthrough();

export const HashBatchSchema = z
  .object({
    requests: z.array(z.unknown()).min(1).max(MAX_BATCH_SIZE),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export const OutcomeCodeSchema = z.enum([
  "DECODE_ERROR",
  "INPUT_TOO_LARGE",
  "HEADER_LENGTH_INVALID",
  "TARGET_INVALID",
  "REQUEST_INVALID",
]);

export const CallOutcomeSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    requestId: uuidV4,
    output: digestHex,
  }),
  z.object({
    status: z.literal("failure"),
    requestId: uuidV4,
    code: OutcomeCodeSchema,
    payload: z.string().regex(/^(?:[0-9a-f]{2})*$/, "Must be lowercase hex"),
  }),
]);

// ---------------------------------------------------------------------------
// Type exports (inferred from schemas)
// ---------------------------------------------------------------------------

export type HashRequest = z.infer<typeof HashRequestSchema>;
export type HashBatch = z.infer<typeof HashBatchSchema>;
export type OutcomeCode = z.infer<typeof OutcomeCodeSchema>;
export type CallOutcome = z.infer<typeof CallOutcomeSchema>;
