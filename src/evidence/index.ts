// ============================================
// EVIDENCE MODULE EXPORTS
// ============================================
export { EvidenceValidator, emptyEvidenceReport, emptyRelevanceSummary } from "./evidence-validator.js";
export { extractCitations } from "./citations.js";
export { EvidenceRelevance } from "./types.js";
export type {
  Citation,
  EvidenceValidation,
  EvidenceValidatorConfig,
  MessageEvidenceReport,
  RelevanceSummary,
} from "./types.js";
