// ============================================
// METRICS MODULE EXPORTS
// ============================================
export { MaturityAssessor, stageForScore } from "./maturity-assessor.js";
export { identityRefiner, clampScore } from "./refine.js";
export type {
  ScoreRefiner,
  MaturityStage,
  MaturityFactors,
  MaturityAssessment,
  MaturityAssessorConfig,
} from "./types.js";
