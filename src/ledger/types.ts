// ============================================
// CLAIM LEDGER TYPES
// ============================================

export enum ClaimStatus {
  PROPOSED = "proposed", // Newly introduced
  DISPUTED = "disputed", // Actively contested
  SUPPORTED = "supported", // Accepted or backed by evidence
  CHALLENGED = "challenged", // Explicitly challenged by the other party
  SETTLED_AGREED = "settled_agreed", // Both parties agree
  SETTLED_DISAGREED = "settled_disagreed", // Agreed to disagree
  ABANDONED = "abandoned", // No longer pursued
}

export enum ResolutionType {
  EVIDENCE_BASED = "evidence_based",
  LOGICAL = "logical",
  DEFINITIONAL = "definitional",
  EMPIRICAL = "empirical",
  PRAGMATIC = "pragmatic",
  PHILOSOPHICAL = "philosophical",
}

export interface Claim {
  id: string; // Stable hash of the lowercased text
  text: string;
  speaker: string;
  roundIntroduced: number;
  status: ClaimStatus;
  supportingEvidence: string[];
  challenges: string[];
  rehashCount: number; // Never decreases
  lastMentionedRound: number;
  settledRound?: number;
  resolutionType?: ResolutionType;
}

export interface ResolutionPoint {
  readonly id: string;
  readonly description: string;
  readonly resolutionType: ResolutionType;
  readonly roundResolved: number;
  readonly agreedByBoth: boolean;
  readonly positionA: string;
  readonly positionB: string;
  readonly evidenceBasis: readonly string[];
}

export interface ResponseAnalysis {
  agreements: string[]; // Claim ids marked SUPPORTED
  challenges: string[]; // Claim ids marked CHALLENGED
  evidenceProvided: string[]; // Evidence markers found in the message
  speaker: string;
  round: number;
}

// ============================================
// REHASH WARNINGS
// ============================================

export interface SettledClaimRehash {
  kind: "settled_claim";
  claimId: string;
  claimText: string;
  status: ClaimStatus.SETTLED_AGREED | ClaimStatus.SETTLED_DISAGREED;
  settledRound?: number;
  rehashCount: number;
}

export interface ExcessiveClaimRehash {
  kind: "excessive_claim";
  claimId: string;
  claimText: string;
  rehashCount: number;
  suggestion: string;
}

export interface RepetitiveQuestion {
  kind: "repetitive_question";
  pattern: string; // Question bucket label
  text: string; // The question, truncated to 100 characters
  count: number;
  suggestion: string;
}

export type RehashWarning = SettledClaimRehash | ExcessiveClaimRehash | RepetitiveQuestion;

// ============================================
// PROGRESS REPORTING
// ============================================

export interface ClaimRehashSummary {
  claim: string; // Truncated claim text
  rehashCount: number;
  speaker: string;
}

export interface ProgressSummary {
  round: number;
  totalClaims: number;
  settledClaims: number;
  activeClaims: number;
  progressPercentage: number; // 0-100
  resolutionPoints: number;
  rehashWarnings: ClaimRehashSummary[];
  settledResolutions: ResolutionPoint[];
  unresolvedDisagreements: ResolutionPoint[];
}

export interface ProgressionGuidance {
  suggestions: string[];
  warnings: string[];
  nextSteps: string[];
}

export interface LedgerExport {
  metadata: {
    currentRound: number;
    totalClaims: number;
    totalResolutions: number;
    exportTimestamp: string;
  };
  claims: Record<
    string,
    {
      text: string;
      speaker: string;
      status: ClaimStatus;
      roundIntroduced: number;
      rehashCount: number;
      challenges: number;
    }
  >;
  resolutions: Record<
    string,
    {
      description: string;
      type: ResolutionType;
      agreed: boolean;
      round: number;
      positionA: string;
      positionB: string;
    }
  >;
  progressSummary: ProgressSummary;
}

export interface ClaimLedgerConfig {
  rehashThreshold?: number; // Repeats before a claim or question pattern is flagged (default: 3)
  similarityThreshold?: number; // Jaccard threshold for "same claim" (default: 0.3)
  minClaimLength?: number; // Sentences at or below this length are never claims (default: 20)
  minQuestionLength?: number; // Question candidates at or below this length are ignored (default: 10)
  stagnantRounds?: number; // Rounds a DISPUTED claim may stay open before a warning (default: 5)
}
