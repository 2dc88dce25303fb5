// ============================================
// AGREEMENT MODULE EXPORTS
// ============================================
export { AgreementClassifier, neutralAgreement } from "./agreement-classifier.js";
export { AgreementLevel } from "./types.js";
export type { AgreementAnalysis, AgreementSignals, EndDecision } from "./types.js";
