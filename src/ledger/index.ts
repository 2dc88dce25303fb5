// ============================================
// LEDGER MODULE EXPORTS
// ============================================
export { ClaimLedger, claimIdFor, isSettled } from "./claim-ledger.js";
export { ClaimStatus, ResolutionType } from "./types.js";
export { InvalidRoundError } from "./errors.js";
export type {
  Claim,
  ClaimLedgerConfig,
  ClaimRehashSummary,
  ResolutionPoint,
  ResponseAnalysis,
  RehashWarning,
  SettledClaimRehash,
  ExcessiveClaimRehash,
  RepetitiveQuestion,
  ProgressSummary,
  ProgressionGuidance,
  LedgerExport,
} from "./types.js";
