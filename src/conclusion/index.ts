// ============================================
// CONCLUSION MODULE EXPORTS
// ============================================
export { ConclusionDetector, stanceScore } from "./conclusion-detector.js";
export { DebateStage } from "./types.js";
export type {
  ConclusionAnalysis,
  ConclusionIndicators,
  ConclusionDetectorConfig,
  HistoryEntry,
  AgreementLogEntry,
} from "./types.js";
