import type { DomainRuleDefinition } from "../lexicon/index.js";
import type { ScoreRefiner } from "../metrics/index.js";

// ============================================
// EVIDENCE VALIDATION TYPES
// ============================================

export enum EvidenceRelevance {
  HIGHLY_RELEVANT = "highly_relevant", // Direct support for the claim
  MODERATELY_RELEVANT = "moderately_relevant", // Related, not direct support
  TANGENTIALLY_RELATED = "tangentially_related", // Loosely connected
  IRRELEVANT = "irrelevant", // No clear connection
  CONTRADICTORY = "contradictory", // Reserved: contradicts the claim
}

export interface Citation {
  authors: string[];
  journal: string;
  year: number; // 0 when the reference carries no year
  fullText: string;
  context: string; // Up to 50 characters either side of the reference
  offset: number; // Character offset of fullText in the source message
}

export interface EvidenceValidation {
  citation: Citation;
  claim: string; // Sentence the citation was judged against
  relevance: EvidenceRelevance;
  confidence: number; // 0-1
  explanation: string;
  topicMatchScore: number; // Share of topic words found in the context
  contextAnalysis: string;
}

export type RelevanceSummary = Record<EvidenceRelevance, number>;

export interface MessageEvidenceReport {
  totalCitations: number;
  validations: EvidenceValidation[];
  relevanceSummary: RelevanceSummary;
  evidenceQualityScore: number; // 0-1
  overallEvidenceQuality: string;
}

export interface EvidenceValidatorConfig {
  knowledgeCutoffYear?: number; // Later years are treated as fabricated (default: 2023)
  domain?: string; // Conversation domain label used to activate domain rules
  domainRules?: readonly DomainRuleDefinition[];
  contextRadius?: number; // Characters captured either side of a citation (default: 50)
  minClaimLength?: number; // Sentences at or below this length are not claims (default: 20)
  refine?: ScoreRefiner; // Applied to the aggregate score before clamping
}
