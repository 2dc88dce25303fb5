import type { AgreementAnalysis } from "../agreement/index.js";
import type { ConclusionAnalysis, ConclusionDetectorConfig } from "../conclusion/index.js";
import type { EvidenceValidatorConfig, MessageEvidenceReport } from "../evidence/index.js";
import type { ClaimLedgerConfig, LedgerExport, RehashWarning, ResponseAnalysis } from "../ledger/index.js";
import type { MaturityAssessment, MaturityAssessorConfig, ScoreRefiner } from "../metrics/index.js";
import type { DriftIntervention, TopicAnalysis, TopicMonitorConfig } from "../topics/index.js";
import type { SimilarityFn } from "../text/index.js";

// ============================================
// CONTROLLER INPUT
// ============================================

export interface ConversationSeed {
  topic: string;
  domain?: string; // Domain label, e.g. "ai_consciousness"
}

export interface InboundMessage {
  speaker: string;
  text: string; // Already stripped of reasoning markup
  round?: number; // When omitted every message starts a new round
}

// ============================================
// CONTROLLER OUTPUT
// ============================================

/**
 * Plain data meant to be interpolated into the next generation request.
 */
export interface GuidanceBundle {
  settledResolutions: string[];
  activeClaims: string[];
  warnings: string[]; // Rehash, drift and progression warnings
  suggestions: string[];
  nextStep: string;
  refocus: string; // Refocus block, empty unless drift intervention is due
}

export type QualityStep =
  | "claims"
  | "responses"
  | "rehashing"
  | "agreement"
  | "topic"
  | "conclusion"
  | "evidence"
  | "maturity"
  | "guidance";

export interface QualityDecision {
  conversationId: string;
  round: number;
  speaker: string;
  shouldContinue: boolean;
  reason: string;
  newClaims: string[];
  responses: ResponseAnalysis;
  rehashWarnings: RehashWarning[];
  agreement: AgreementAnalysis;
  topic: TopicAnalysis;
  intervention: DriftIntervention;
  conclusion: ConclusionAnalysis;
  evidence: MessageEvidenceReport;
  maturity: MaturityAssessment;
  guidance: GuidanceBundle;
  guidanceText: string;
  failedSteps: QualityStep[]; // Steps that threw and were replaced by neutral results
}

// ============================================
// CONFIGURATION
// ============================================

export interface ControllerConfig {
  ledger?: ClaimLedgerConfig;
  topic?: TopicMonitorConfig;
  conclusion?: ConclusionDetectorConfig;
  evidence?: Omit<EvidenceValidatorConfig, "domain">;
  maturity?: MaturityAssessorConfig;
  similarity?: SimilarityFn; // Claim similarity (default: word-set Jaccard)
  refine?: ScoreRefiner; // Maturity refinement hook (default: identity)
  conclusionStopConfidence?: number; // Conclusions above this confidence stop the exchange (default: 0.8)
  staleClaimRounds?: number; // Idle rounds before an open claim is abandoned (default: 10)
}

// ============================================
// PLUGINS
// ============================================

export interface QualityPlugin {
  name: string;
  version?: string;
  onConversationStarted?(conversationId: string, seed: ConversationSeed): Promise<void>;
  onDecision?(decision: QualityDecision): Promise<void>;
  onConversationEnded?(conversationId: string, ledger: LedgerExport): Promise<void>;
  initialize?(): Promise<void>;
  cleanup?(): Promise<void>;
}
