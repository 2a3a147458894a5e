export {
  HashRequestSchema,
  HashBatchSchema,
  OutcomeCodeSchema,
  CallOutcomeSchema,
  MAX_BATCH_SIZE,
  type HashRequest,
  type HashBatch,
  type OutcomeCode,
  type CallOutcome,
} from "./schemas.js";
