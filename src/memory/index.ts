// ============================================
// MEMORY MODULE EXPORTS
// ============================================
export { QualityReportStore } from "./store.js";
export type { ConversationRecord, DecisionRecord } from "./types.js";
