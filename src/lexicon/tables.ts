import agreementData from "./data/agreement.json" with { type: "json" };
import ledgerData from "./data/ledger.json" with { type: "json" };
import topicData from "./data/topics.json" with { type: "json" };
import conclusionData from "./data/conclusion.json" with { type: "json" };
import evidenceData from "./data/evidence.json" with { type: "json" };
import maturityData from "./data/maturity.json" with { type: "json" };
import { PhraseTable } from "./phrase-table.js";
import type { QuestionBucketRule } from "./types.js";

// ============================================
// AGREEMENT LEXICON
// ============================================
export const AGREEMENT_LEXICON = {
  disagreement: new PhraseTable("disagreement", agreementData.disagreement),
  reservation: new PhraseTable("reservation", agreementData.reservation),
  continuation: new PhraseTable("continuation", agreementData.continuation),
  question: new PhraseTable("question", agreementData.questionPatterns, { mode: "pattern" }),
  agreement: new PhraseTable("agreement", agreementData.agreement),
  strongAgreement: new PhraseTable("strongAgreement", agreementData.strongAgreement),
  stop: new PhraseTable("stop", agreementData.stop),
} as const;

// ============================================
// CLAIM LEDGER LEXICON
// ============================================
export const LEDGER_LEXICON = {
  claimLeads: new PhraseTable("claimLeads", ledgerData.claimLeads),
  strongAssertions: new PhraseTable("strongAssertions", ledgerData.strongAssertions),
  agreement: new PhraseTable("agreement", ledgerData.agreement),
  challenge: new PhraseTable("challenge", ledgerData.challenge),
  evidenceMarkers: new PhraseTable("evidenceMarkers", ledgerData.evidenceMarkers),
  questionBuckets: ledgerData.questionBuckets.map(
    (rule): QuestionBucketRule => ({ label: rule.label, pattern: new RegExp(rule.pattern, "i") })
  ),
} as const;

// ============================================
// TOPIC LEXICON (raw keyword families)
// ============================================
export const TOPIC_LEXICON: {
  coreFamilies: Readonly<Record<string, readonly string[]>>;
  driftFamilies: Readonly<Record<string, readonly string[]>>;
  tangentialFamilies: readonly string[];
} = topicData;

// ============================================
// CONCLUSION LEXICON
// ============================================
const { stance } = conclusionData;

export const CONCLUSION_LEXICON = {
  conclusion: new PhraseTable("conclusion", conclusionData.conclusion),
  agreement: new PhraseTable("agreement", conclusionData.agreement),
  exhaustion: new PhraseTable("exhaustion", conclusionData.exhaustion),
  stagnation: new PhraseTable("stagnation", conclusionData.stagnation),
  stance: [
    new PhraseTable("strongPositive", stance.strongPositive.phrases, { weight: stance.strongPositive.weight }),
    new PhraseTable("positive", stance.positive.phrases, { weight: stance.positive.weight }),
    new PhraseTable("neutral", stance.neutral.phrases, { weight: stance.neutral.weight }),
    new PhraseTable("negative", stance.negative.phrases, { weight: stance.negative.weight }),
    new PhraseTable("strongNegative", stance.strongNegative.phrases, { weight: stance.strongNegative.weight }),
  ],
} as const;

export const COVERAGE_FAMILIES: Readonly<Record<string, readonly string[]>> = conclusionData.coverage;

// ============================================
// EVIDENCE LEXICON
// ============================================
export interface DomainRuleDefinition {
  name: string;
  label: string;
  domain?: string; // Conversation domain label that activates the rule regardless of topic text
  topicKeywords: readonly string[]; // Empty: rule applies to any topic
  exemptTopicKeywords: readonly string[];
  offTopicKeywords: readonly string[];
  onTopicKeywords: readonly string[];
  minOffTopicHits: number;
  confidence: number;
}

export const EVIDENCE_LEXICON = {
  genericResearch: new PhraseTable("genericResearch", evidenceData.genericResearch),
  support: new PhraseTable("support", evidenceData.supportPhrases),
  mention: new PhraseTable("mention", evidenceData.mentionPhrases),
} as const;

export const DEFAULT_DOMAIN_RULES: readonly DomainRuleDefinition[] = evidenceData.domainRules;

// ============================================
// MATURITY LEXICON
// ============================================
export const MATURITY_LEXICON = {
  technicalTerms: new PhraseTable("technicalTerms", maturityData.technicalTerms),
  agreementWords: new PhraseTable("agreementWords", maturityData.agreementWords),
} as const;
