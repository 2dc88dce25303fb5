import { EvidenceRelevance } from "./types.js";
import type {
  Citation,
  EvidenceValidation,
  EvidenceValidatorConfig,
  MessageEvidenceReport,
  RelevanceSummary,
} from "./types.js";
import { extractCitations } from "./citations.js";
import { DEFAULT_DOMAIN_RULES, EVIDENCE_LEXICON, PhraseTable } from "../lexicon/index.js";
import type { DomainRuleDefinition } from "../lexicon/index.js";
import { contentWords, splitSentences, wordSet } from "../text/index.js";
import { clampScore, identityRefiner } from "../metrics/index.js";
import type { ScoreRefiner } from "../metrics/index.js";

const RELEVANCE_WEIGHTS: Readonly<Record<EvidenceRelevance, number>> = {
  [EvidenceRelevance.HIGHLY_RELEVANT]: 1.0,
  [EvidenceRelevance.MODERATELY_RELEVANT]: 0.7,
  [EvidenceRelevance.TANGENTIALLY_RELATED]: 0.3,
  [EvidenceRelevance.IRRELEVANT]: 0.0,
  [EvidenceRelevance.CONTRADICTORY]: -0.5,
};

interface CompiledDomainRule {
  definition: DomainRuleDefinition;
  topic: PhraseTable;
  exempt: PhraseTable;
  offTopic: PhraseTable;
  onTopic: PhraseTable;
}

interface RelevanceVerdict {
  relevance: EvidenceRelevance;
  confidence: number;
  explanation: string;
}

export function emptyRelevanceSummary(): RelevanceSummary {
  return {
    [EvidenceRelevance.HIGHLY_RELEVANT]: 0,
    [EvidenceRelevance.MODERATELY_RELEVANT]: 0,
    [EvidenceRelevance.TANGENTIALLY_RELATED]: 0,
    [EvidenceRelevance.IRRELEVANT]: 0,
    [EvidenceRelevance.CONTRADICTORY]: 0,
  };
}

/**
 * Report for a message without citations.
 */
export function emptyEvidenceReport(): MessageEvidenceReport {
  return {
    totalCitations: 0,
    validations: [],
    relevanceSummary: emptyRelevanceSummary(),
    evidenceQualityScore: 0,
    overallEvidenceQuality: "No citations found",
  };
}

// ============================================
// EVIDENCE VALIDATOR
// ============================================

/**
 * Judges whether the citations in a message plausibly support the
 * conversation topic. Stateless apart from its configuration.
 */
export class EvidenceValidator {
  private config: Required<Omit<EvidenceValidatorConfig, "domain" | "domainRules" | "refine">>;
  private domain: string | undefined;
  private refine: ScoreRefiner;
  private rules: CompiledDomainRule[];

  constructor(config: EvidenceValidatorConfig = {}) {
    this.config = {
      knowledgeCutoffYear: config.knowledgeCutoffYear ?? 2023,
      contextRadius: config.contextRadius ?? 50,
      minClaimLength: config.minClaimLength ?? 20,
    };
    this.domain = config.domain;
    this.refine = config.refine ?? identityRefiner;
    this.rules = (config.domainRules ?? DEFAULT_DOMAIN_RULES).map((definition) => ({
      definition,
      topic: new PhraseTable(`${definition.name}:topic`, definition.topicKeywords),
      exempt: new PhraseTable(`${definition.name}:exempt`, definition.exemptTopicKeywords),
      offTopic: new PhraseTable(`${definition.name}:off`, definition.offTopicKeywords),
      onTopic: new PhraseTable(`${definition.name}:on`, definition.onTopicKeywords),
    }));
  }

  get knowledgeCutoffYear(): number {
    return this.config.knowledgeCutoffYear;
  }

  extractCitations(text: string): Citation[] {
    return extractCitations(text, this.config.contextRadius);
  }

  validate(citation: Citation, claim: string, topic: string): EvidenceValidation {
    // Future-dated references never count as support
    if (citation.year !== 0 && citation.year > this.config.knowledgeCutoffYear) {
      return {
        citation,
        claim,
        relevance: EvidenceRelevance.IRRELEVANT,
        confidence: 0.95,
        explanation: `Future-dated citation (${citation.year}) - likely fabricated or invalid based on knowledge cutoff`,
        topicMatchScore: 0,
        contextAnalysis: "Citation dated beyond knowledge cutoff",
      };
    }

    const topicWords = new Set(contentWords(topic));
    const contextWords = wordSet(citation.context);
    const overlap = [...topicWords].filter((word) => contextWords.has(word));

    const verdict = this.domainMismatch(citation, topic) ?? this.overlapVerdict(citation, overlap);

    return {
      citation,
      claim,
      ...verdict,
      topicMatchScore: topicWords.size > 0 ? overlap.length / topicWords.size : 0,
      contextAnalysis: this.analyzeContext(citation.context),
    };
  }

  private domainMismatch(citation: Citation, topic: string): RelevanceVerdict | undefined {
    const searchable = `${citation.context} ${citation.journal}`;

    for (const rule of this.rules) {
      const { definition } = rule;
      const applies =
        definition.topicKeywords.length === 0 ||
        rule.topic.has(topic) ||
        (definition.domain !== undefined && definition.domain === this.domain);
      if (!applies || rule.exempt.has(topic)) continue;

      const offHits = rule.offTopic.countPresent(searchable);
      const onHits = rule.onTopic.countPresent(citation.context);
      if (offHits >= definition.minOffTopicHits && onHits === 0) {
        return {
          relevance: EvidenceRelevance.IRRELEVANT,
          confidence: definition.confidence,
          explanation: `${definition.label} research cited for unrelated topic. Found ${offHits} off-topic keywords, ${onHits} on-topic keywords.`,
        };
      }
    }

    return undefined;
  }

  private overlapVerdict(citation: Citation, overlap: readonly string[]): RelevanceVerdict {
    if (overlap.length >= 3) {
      return {
        relevance: EvidenceRelevance.HIGHLY_RELEVANT,
        confidence: 0.8,
        explanation: `Strong keyword overlap: ${overlap.slice(0, 5).join(", ")}`,
      };
    }

    if (overlap.length >= 1) {
      return {
        relevance: EvidenceRelevance.MODERATELY_RELEVANT,
        confidence: 0.6,
        explanation: `Some keyword overlap: ${overlap.join(", ")}`,
      };
    }

    if (EVIDENCE_LEXICON.genericResearch.has(citation.context)) {
      return {
        relevance: EvidenceRelevance.TANGENTIALLY_RELATED,
        confidence: 0.7,
        explanation: "Only generic research terms found, no specific topic relevance",
      };
    }

    return {
      relevance: EvidenceRelevance.IRRELEVANT,
      confidence: 0.5,
      explanation: "No clear relevance to topic detected",
    };
  }

  private analyzeContext(context: string): string {
    const support = EVIDENCE_LEXICON.support.countPresent(context);
    const mention = EVIDENCE_LEXICON.mention.countPresent(context);

    if (support > mention) return "Citation used as supporting evidence";
    if (mention > 0) return "Citation mentioned but not clearly supporting the claim";
    return "Citation context unclear";
  }

  // ============================================
  // MESSAGE-LEVEL VALIDATION
  // ============================================

  validateMessage(message: string, topic: string): MessageEvidenceReport {
    const citations = this.extractCitations(message);
    if (citations.length === 0) {
      return emptyEvidenceReport();
    }

    const claims = splitSentences(message).filter((sentence) => sentence.text.length > this.config.minClaimLength);
    const relevanceSummary = emptyRelevanceSummary();
    const validations: EvidenceValidation[] = [];

    for (const citation of citations) {
      const validation = this.validate(citation, nearestClaim(claims, citation.offset), topic);
      validations.push(validation);
      relevanceSummary[validation.relevance] += 1;
    }

    const evidenceQualityScore = this.qualityScore(relevanceSummary, citations.length);

    return {
      totalCitations: citations.length,
      validations,
      relevanceSummary,
      evidenceQualityScore,
      overallEvidenceQuality: describeQuality(evidenceQualityScore, relevanceSummary, citations.length),
    };
  }

  private qualityScore(summary: RelevanceSummary, total: number): number {
    if (total === 0) return 0;

    let weighted = 0;
    for (const level of Object.values(EvidenceRelevance)) {
      weighted += RELEVANCE_WEIGHTS[level] * summary[level];
    }
    return clampScore(this.refine(Math.max(0, weighted / total)));
  }
}

/**
 * The closest sentence starting at or before the citation, else the closest overall.
 */
function nearestClaim(claims: ReadonlyArray<{ text: string; offset: number }>, offset: number): string {
  let preceding: { text: string; offset: number } | undefined;
  let closest: { text: string; offset: number } | undefined;

  for (const claim of claims) {
    if (claim.offset <= offset && (!preceding || claim.offset > preceding.offset)) {
      preceding = claim;
    }
    if (!closest || Math.abs(claim.offset - offset) < Math.abs(closest.offset - offset)) {
      closest = claim;
    }
  }

  return (preceding ?? closest)?.text ?? "";
}

function describeQuality(score: number, summary: RelevanceSummary, total: number): string {
  const irrelevant = summary[EvidenceRelevance.IRRELEVANT];

  if (irrelevant / total > 0.5) {
    return `Poor evidence quality: ${irrelevant}/${total} citations are irrelevant to the topic`;
  }
  if (score >= 0.8) return "High quality evidence with relevant citations";
  if (score >= 0.6) return "Moderate evidence quality with some relevant citations";
  if (score >= 0.4) return "Low evidence quality with limited relevant citations";
  return "Very poor evidence quality with mostly irrelevant citations";
}
