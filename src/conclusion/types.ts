// ============================================
// CONCLUSION DETECTION TYPES
// ============================================

export enum DebateStage {
  INITIAL_EXPLORATION = "initial_exploration",
  ACTIVE_ENGAGEMENT = "active_engagement",
  DEEP_ANALYSIS = "deep_analysis",
  CONVERGENCE_ATTEMPT = "convergence_attempt",
  NATURAL_CONCLUSION = "natural_conclusion",
  CIRCULAR_REPETITION = "circular_repetition",
}

export interface HistoryEntry {
  speaker: string;
  message: string;
  round: number;
  length: number; // Word count
}

export interface AgreementLogEntry {
  speaker: string;
  phrase: string;
  messageIndex: number;
}

export interface ConclusionIndicators {
  conclusionPhrases: number; // Distinct conclusion phrases in the recent window
  agreementCount: number; // Agreement phrases logged over the whole history
  exhaustionPhrases: number;
  stagnationPhrases: number;
  repetitionCount: number; // Per-speaker 3-grams seen at least 3 times
  messageLengthDecline: boolean;
  topicSaturation: number; // Coverage families touched so far
  roundsProcessed: number; // History length / 2
  positionConvergence: number; // Speakers whose stance settled
  circularDebateScore: number;
}

export interface ConclusionAnalysis {
  stage: DebateStage;
  shouldConclude: boolean;
  confidence: number; // 0-1
  reason: string;
  suggestedAction: string;
  indicators?: ConclusionIndicators; // Absent until enough messages exist
}

export interface ConclusionDetectorConfig {
  minMessages?: number; // Messages required before any decision (default: 4)
  recentWindow?: number; // Messages scanned for phrase indicators (default: 6)
  stagnationWindow?: number; // Messages scanned for stagnation in the circular score (default: 4)
}
