export {
  parseBlockHeader,
  blockId,
  compactToTarget,
  checkProofOfWork,
  type BlockHeader,
  type ProofOfWorkResult,
} from "./header.js";
