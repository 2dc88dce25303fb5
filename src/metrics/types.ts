// ============================================
// MATURITY METRICS TYPES
// ============================================

/**
 * Adjusts a heuristic score in [0, 1]. The default is the identity; callers
 * plug in a secondary judge (for example a model call made elsewhere).
 */
export type ScoreRefiner = (score: number) => number;

export type MaturityStage = "exploration" | "refinement" | "convergence" | "consensus";

export interface MaturityFactors {
  roundProgression: number; // 0-0.3
  lengthConvergence: number; // 0-0.2
  technicalDensity: number; // 0-0.25
  statementRatio: number; // 0-0.15
  agreementIndicators: number; // 0-0.1
}

export interface MaturityAssessment {
  score: number; // 0-1, after refinement
  heuristicScore: number; // 0-1
  refined: boolean; // Whether the refiner was consulted
  stage: MaturityStage;
  factors: MaturityFactors;
}

export interface MaturityAssessorConfig {
  windowSize?: number; // Messages kept for analysis (default: 10)
  roundHorizon?: number; // Round at which round progression saturates (default: 15)
  refineJump?: number; // Heuristic change that triggers refinement (default: 0.3)
  refineEvery?: number; // Refinement also runs every N rounds (default: 5)
  refineWeight?: number; // Share of the refined score in the blend (default: 0.3)
}
