export {
  invokeHashBtcHeader,
  invokeBatch,
  type BatchOutcome,
  type BatchRejection,
  type BatchResult,
} from "./invoke.js";
