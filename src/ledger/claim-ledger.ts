import { createHash } from "node:crypto";
import { ClaimStatus, ResolutionType } from "./types.js";
import { InvalidRoundError } from "./errors.js";
import type {
  Claim,
  ClaimLedgerConfig,
  LedgerExport,
  ProgressSummary,
  ProgressionGuidance,
  RehashWarning,
  ResolutionPoint,
  ResponseAnalysis,
} from "./types.js";
import { LEDGER_LEXICON } from "../lexicon/index.js";
import {
  isBlank,
  isSimilarText,
  jaccardSimilarity,
  normalizeForMatching,
  splitClaimCandidates,
  splitQuestions,
  tokenize,
  truncate,
} from "../text/index.js";
import type { SimilarityFn } from "../text/index.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";

const SETTLED_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.SETTLED_AGREED,
  ClaimStatus.SETTLED_DISAGREED,
]);

const ACTIVE_STATUSES: ReadonlySet<ClaimStatus> = new Set([ClaimStatus.DISPUTED, ClaimStatus.CHALLENGED]);

export function isSettled(status: ClaimStatus): status is ClaimStatus.SETTLED_AGREED | ClaimStatus.SETTLED_DISAGREED {
  return SETTLED_STATUSES.has(status);
}

export function claimIdFor(text: string): string {
  return createHash("md5").update(normalizeForMatching(text)).digest("hex").slice(0, 8);
}

function resolutionIdFor(description: string): string {
  return `res_${createHash("md5").update(description).digest("hex").slice(0, 8)}`;
}

// ============================================
// CLAIM LEDGER
// ============================================

/**
 * Per-conversation bookkeeping of claims, questions and resolution points.
 *
 * One instance belongs to exactly one conversation; callers serialize access.
 */
export class ClaimLedger {
  private config: Required<ClaimLedgerConfig>;
  private similarity: SimilarityFn;
  private logger: Logger;
  private currentRound = 0;
  private claims = new Map<string, Claim>();
  private resolutions = new Map<string, ResolutionPoint>();
  private questionBuckets = new Map<string, number>();
  private questionsAsked = new Map<string, number>();

  constructor(config: ClaimLedgerConfig = {}, similarity: SimilarityFn = jaccardSimilarity, logger?: Logger) {
    this.config = {
      rehashThreshold: config.rehashThreshold ?? 3,
      similarityThreshold: config.similarityThreshold ?? 0.3,
      minClaimLength: config.minClaimLength ?? 20,
      minQuestionLength: config.minQuestionLength ?? 10,
      stagnantRounds: config.stagnantRounds ?? 5,
    };
    this.similarity = similarity;
    this.logger = logger ?? getDefaultLogger();
  }

  get round(): number {
    return this.currentRound;
  }

  get rehashThreshold(): number {
    return this.config.rehashThreshold;
  }

  advanceRound(): number {
    this.currentRound += 1;
    return this.currentRound;
  }

  /**
   * Jump forward to `round`. Earlier rounds leave the ledger where it is.
   */
  setRound(round: number): number {
    if (!Number.isSafeInteger(round) || round < 0) {
      throw new InvalidRoundError(round);
    }
    this.currentRound = Math.max(this.currentRound, round);
    return this.currentRound;
  }

  getClaim(claimId: string): Claim | undefined {
    return this.claims.get(claimId);
  }

  getClaims(): Claim[] {
    return [...this.claims.values()];
  }

  getResolutionPoints(): ResolutionPoint[] {
    return [...this.resolutions.values()];
  }

  getQuestionBucketCount(label: string): number {
    return this.questionBuckets.get(label) ?? 0;
  }

  /**
   * How often `speaker` asked exactly this question (case-insensitive).
   */
  getQuestionCount(speaker: string, question: string): number {
    return this.questionsAsked.get(this.questionKey(speaker, question)) ?? 0;
  }

  // ============================================
  // CLAIM EXTRACTION
  // ============================================

  /**
   * Record the claims in `message` and return the ids of newly created ones.
   * Any part of a sentence containing "?" is only ever tracked as a question.
   */
  extractClaims(message: string, speaker: string): string[] {
    if (isBlank(message)) return [];

    const created: string[] = [];

    for (const candidate of splitClaimCandidates(message)) {
      if (candidate.isQuestion) {
        this.trackQuestion(candidate.text, speaker);
        continue;
      }

      const { text } = candidate;
      if (text.length <= this.config.minClaimLength || !this.looksLikeClaim(text)) {
        continue;
      }

      const claimId = claimIdFor(text);
      const existing = this.claims.get(claimId);

      if (existing) {
        existing.rehashCount += 1;
        existing.lastMentionedRound = this.currentRound;
        continue;
      }

      this.claims.set(claimId, {
        id: claimId,
        text,
        speaker,
        roundIntroduced: this.currentRound,
        status: ClaimStatus.PROPOSED,
        supportingEvidence: [],
        challenges: [],
        rehashCount: 0,
        lastMentionedRound: this.currentRound,
      });
      created.push(claimId);
    }

    if (created.length > 0) {
      this.logger.debug("Claims extracted", { round: this.currentRound, speaker, count: created.length });
    }

    return created;
  }

  private looksLikeClaim(sentence: string): boolean {
    return LEDGER_LEXICON.claimLeads.has(sentence) || LEDGER_LEXICON.strongAssertions.has(sentence);
  }

  private questionKey(speaker: string, question: string): string {
    return `${speaker}:${normalizeForMatching(question).trim()}`;
  }

  private trackQuestion(question: string, speaker: string): void {
    const key = this.questionKey(speaker, question);
    this.questionsAsked.set(key, (this.questionsAsked.get(key) ?? 0) + 1);
  }

  /**
   * Unsettled claims by speakers other than `speaker` mentioned since `sinceRound`.
   */
  recentClaimIds(speaker: string, sinceRound: number): string[] {
    return this.getClaims()
      .filter(
        (claim) =>
          claim.speaker !== speaker && claim.lastMentionedRound >= sinceRound && !isSettled(claim.status)
      )
      .map((claim) => claim.id);
  }

  // ============================================
  // RESPONSE ANALYSIS
  // ============================================

  /**
   * Update the status of the claims `message` responds to. Unknown ids are ignored.
   */
  analyzeResponses(message: string, speaker: string, claimIds: readonly string[]): ResponseAnalysis {
    const analysis: ResponseAnalysis = {
      agreements: [],
      challenges: [],
      evidenceProvided: [],
      speaker,
      round: this.currentRound,
    };
    if (isBlank(message)) return analysis;

    const targets = [...new Set(claimIds)]
      .map((claimId) => this.claims.get(claimId))
      .filter((claim): claim is Claim => claim !== undefined && !isSettled(claim.status));

    analysis.evidenceProvided = LEDGER_LEXICON.evidenceMarkers.matches(message);

    if (LEDGER_LEXICON.agreement.has(message)) {
      for (const claim of targets) {
        claim.status = ClaimStatus.SUPPORTED;
        if (analysis.evidenceProvided.length > 0) {
          claim.supportingEvidence.push(message);
        }
        analysis.agreements.push(claim.id);
      }
    }

    if (LEDGER_LEXICON.challenge.has(message)) {
      for (const claim of targets) {
        claim.status = ClaimStatus.CHALLENGED;
        claim.challenges.push(message);
        analysis.challenges.push(claim.id);
      }
    }

    return analysis;
  }

  /**
   * Mark proposed or supported claims as disputed. Returns the ids that changed.
   */
  markDisputed(claimIds: readonly string[]): string[] {
    const changed: string[] = [];
    for (const claimId of new Set(claimIds)) {
      const claim = this.claims.get(claimId);
      if (claim && (claim.status === ClaimStatus.PROPOSED || claim.status === ClaimStatus.SUPPORTED)) {
        claim.status = ClaimStatus.DISPUTED;
        changed.push(claimId);
      }
    }
    return changed;
  }

  /**
   * Abandon unsettled claims nobody has mentioned for more than `maxIdleRounds`.
   */
  abandonStaleClaims(maxIdleRounds: number): string[] {
    const abandoned: string[] = [];
    for (const claim of this.claims.values()) {
      if (isSettled(claim.status) || claim.status === ClaimStatus.ABANDONED) continue;
      if (this.currentRound - claim.lastMentionedRound > maxIdleRounds) {
        claim.status = ClaimStatus.ABANDONED;
        abandoned.push(claim.id);
      }
    }
    return abandoned;
  }

  // ============================================
  // REHASH DETECTION
  // ============================================

  detectRehashing(message: string): RehashWarning[] {
    if (isBlank(message)) return [];

    const warnings: RehashWarning[] = [];
    const threshold = this.config.rehashThreshold;

    for (const claim of this.claims.values()) {
      if (!isSimilarText(claim.text, message, this.config.similarityThreshold, this.similarity)) {
        continue;
      }

      if (isSettled(claim.status)) {
        warnings.push({
          kind: "settled_claim",
          claimId: claim.id,
          claimText: claim.text,
          status: claim.status,
          settledRound: claim.settledRound,
          rehashCount: claim.rehashCount,
        });
      } else if (claim.rehashCount >= threshold) {
        warnings.push({
          kind: "excessive_claim",
          claimId: claim.id,
          claimText: claim.text,
          rehashCount: claim.rehashCount,
          suggestion: "Consider moving to new aspect or concluding this point",
        });
      }
    }

    for (const question of splitQuestions(message)) {
      if (question.length <= this.config.minQuestionLength) continue;

      const bucket = this.classifyQuestion(question);
      if (!bucket) continue;

      const count = (this.questionBuckets.get(bucket) ?? 0) + 1;
      this.questionBuckets.set(bucket, count);

      if (count >= threshold) {
        warnings.push({
          kind: "repetitive_question",
          pattern: bucket,
          text: truncate(question, 100),
          count,
          suggestion: `This type of question has been asked ${count} times. Consider accepting previous answers or asking more specific follow-ups.`,
        });
      }
    }

    if (warnings.length > 0) {
      this.logger.warn("Rehashing detected", {
        round: this.currentRound,
        warnings: warnings.map((warning) => warning.kind),
      });
    }

    return warnings;
  }

  /**
   * Bucket label for a question: the first matching rule, else its first two words.
   */
  classifyQuestion(question: string): string | undefined {
    const normalized = normalizeForMatching(question).trim();

    for (const rule of LEDGER_LEXICON.questionBuckets) {
      if (rule.pattern.test(normalized)) {
        return rule.label;
      }
    }

    const words = tokenize(normalized);
    return words.length >= 2 ? `${words[0]}_${words[1]}` : undefined;
  }

  // ============================================
  // RESOLUTIONS
  // ============================================

  createResolutionPoint(
    description: string,
    resolutionType: ResolutionType,
    positionA: string,
    positionB: string,
    agreed: boolean,
    evidence: readonly string[] = []
  ): string {
    const resolutionId = resolutionIdFor(description);
    const resolution: ResolutionPoint = Object.freeze({
      id: resolutionId,
      description,
      resolutionType,
      roundResolved: this.currentRound,
      agreedByBoth: agreed,
      positionA,
      positionB,
      evidenceBasis: Object.freeze([...evidence]),
    });

    if (this.resolutions.has(resolutionId)) {
      this.logger.warn("Resolution point already recorded", { resolutionId, description });
      return resolutionId;
    }
    this.resolutions.set(resolutionId, resolution);

    const settledStatus = agreed ? ClaimStatus.SETTLED_AGREED : ClaimStatus.SETTLED_DISAGREED;
    let settled = 0;
    for (const claim of this.claims.values()) {
      if (!ACTIVE_STATUSES.has(claim.status)) continue;
      if (this.similarity(claim.text, description) >= this.config.similarityThreshold) {
        claim.status = settledStatus;
        claim.settledRound = this.currentRound;
        claim.resolutionType = resolutionType;
        settled++;
      }
    }

    this.logger.info("Resolution point created", {
      resolutionId,
      round: this.currentRound,
      agreed,
      resolutionType,
      claimsSettled: settled,
    });

    return resolutionId;
  }

  // ============================================
  // PROGRESS
  // ============================================

  progressSummary(): ProgressSummary {
    const claims = this.getClaims();
    const resolutions = this.getResolutionPoints();
    const totalClaims = claims.length;
    const settledClaims = claims.filter((claim) => isSettled(claim.status)).length;
    const activeClaims = claims.filter((claim) => ACTIVE_STATUSES.has(claim.status)).length;

    return {
      round: this.currentRound,
      totalClaims,
      settledClaims,
      activeClaims,
      progressPercentage: totalClaims > 0 ? (settledClaims / totalClaims) * 100 : 0,
      resolutionPoints: resolutions.length,
      rehashWarnings: claims
        .filter((claim) => claim.rehashCount >= this.config.rehashThreshold)
        .map((claim) => ({
          claim: truncate(claim.text, 100),
          rehashCount: claim.rehashCount,
          speaker: claim.speaker,
        })),
      settledResolutions: resolutions.filter((resolution) => resolution.agreedByBoth),
      unresolvedDisagreements: resolutions.filter((resolution) => !resolution.agreedByBoth),
    };
  }

  /**
   * Active claims, most recently introduced last.
   */
  activeClaims(): Claim[] {
    return this.getClaims().filter((claim) => ACTIVE_STATUSES.has(claim.status));
  }

  progressionGuidance(): ProgressionGuidance {
    const summary = this.progressSummary();
    const guidance: ProgressionGuidance = { suggestions: [], warnings: [], nextSteps: [] };

    if (summary.rehashWarnings.length > 0) {
      guidance.warnings.push(`Detecting rehashing of ${summary.rehashWarnings.length} claims`);
      guidance.suggestions.push("Consider focusing on new evidence or moving to adjacent topics");
    }

    const stagnant = this.getClaims().filter(
      (claim) =>
        claim.status === ClaimStatus.DISPUTED && this.currentRound - claim.roundIntroduced > this.config.stagnantRounds
    );
    if (stagnant.length > 0) {
      guidance.warnings.push(
        `${stagnant.length} claims have been disputed for >${this.config.stagnantRounds} rounds`
      );
      guidance.suggestions.push("Consider requesting specific evidence or agreeing to disagree");
    }

    if (summary.progressPercentage < 30) {
      guidance.nextSteps.push("Focus on establishing common ground and shared definitions");
    } else if (summary.progressPercentage < 60) {
      guidance.nextSteps.push("Work toward resolution of key disputed points");
    } else {
      guidance.nextSteps.push("Synthesize agreements and identify remaining differences");
    }

    return guidance;
  }

  exportStructure(): LedgerExport {
    const claims: LedgerExport["claims"] = {};
    for (const claim of this.claims.values()) {
      claims[claim.id] = {
        text: claim.text,
        speaker: claim.speaker,
        status: claim.status,
        roundIntroduced: claim.roundIntroduced,
        rehashCount: claim.rehashCount,
        challenges: claim.challenges.length,
      };
    }

    const resolutions: LedgerExport["resolutions"] = {};
    for (const resolution of this.resolutions.values()) {
      resolutions[resolution.id] = {
        description: resolution.description,
        type: resolution.resolutionType,
        agreed: resolution.agreedByBoth,
        round: resolution.roundResolved,
        positionA: resolution.positionA,
        positionB: resolution.positionB,
      };
    }

    return {
      metadata: {
        currentRound: this.currentRound,
        totalClaims: this.claims.size,
        totalResolutions: this.resolutions.size,
        exportTimestamp: new Date().toISOString(),
      },
      claims,
      resolutions,
      progressSummary: this.progressSummary(),
    };
  }
}
