import { DebateStage } from "./types.js";
import type {
  AgreementLogEntry,
  ConclusionAnalysis,
  ConclusionDetectorConfig,
  ConclusionIndicators,
  HistoryEntry,
} from "./types.js";
import { CONCLUSION_LEXICON, COVERAGE_FAMILIES, PhraseTable, compileFamilies } from "../lexicon/index.js";
import { normalizeForMatching, wordCount } from "../text/index.js";

const TRIGRAM_PATTERN = /\b\w{4,}\s+\w{4,}\s+\w{4,}\b/g;

/**
 * Sum of stance weights over the distinct stance phrases in a message.
 */
export function stanceScore(message: string, stance: readonly PhraseTable[] = CONCLUSION_LEXICON.stance): number {
  return stance.reduce((score, table) => score + table.score(message), 0);
}

function average(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

// ============================================
// CONCLUSION DETECTOR
// ============================================

/**
 * Rolling-history judge of whether a debate has run its course.
 */
export class ConclusionDetector {
  private config: Required<ConclusionDetectorConfig>;
  private history: HistoryEntry[] = [];
  private positions = new Map<string, number[]>();
  private coverage = new Set<string>();
  private agreementLog: AgreementLogEntry[] = [];
  private repetitions = new Map<string, number>();
  private coverageFamilies = compileFamilies(COVERAGE_FAMILIES);

  constructor(config: ConclusionDetectorConfig = {}) {
    this.config = {
      minMessages: config.minMessages ?? 4,
      recentWindow: config.recentWindow ?? 6,
      stagnationWindow: config.stagnationWindow ?? 4,
    };
  }

  get messageCount(): number {
    return this.history.length;
  }

  get topicCoverage(): string[] {
    return [...this.coverage];
  }

  positionScores(speaker: string): number[] {
    return [...(this.positions.get(speaker) ?? [])];
  }

  analyzeMessage(message: string, speaker: string, round: number): void {
    this.history.push({ speaker, message, round, length: wordCount(message) });

    const scores = this.positions.get(speaker) ?? [];
    scores.push(stanceScore(message));
    this.positions.set(speaker, scores);

    for (const [family, table] of this.coverageFamilies) {
      if (table.has(message)) this.coverage.add(family);
    }

    for (const phrase of CONCLUSION_LEXICON.agreement.matches(message)) {
      this.agreementLog.push({ speaker, phrase, messageIndex: this.history.length });
    }

    for (const trigram of normalizeForMatching(message).match(TRIGRAM_PATTERN) ?? []) {
      const key = `${speaker}:${trigram}`;
      this.repetitions.set(key, (this.repetitions.get(key) ?? 0) + 1);
    }
  }

  shouldConclude(): ConclusionAnalysis {
    if (this.history.length < this.config.minMessages) {
      return {
        stage: DebateStage.INITIAL_EXPLORATION,
        shouldConclude: false,
        confidence: 0,
        reason: "Debate still in early stages",
        suggestedAction: "Continue exploration of topic",
      };
    }

    const indicators = this.indicators();
    const stage = this.stageFor(indicators);
    return { stage, ...this.decide(stage, indicators), indicators };
  }

  indicators(): ConclusionIndicators {
    const recentText = this.recentText(this.config.recentWindow);

    return {
      conclusionPhrases: CONCLUSION_LEXICON.conclusion.countPresent(recentText),
      agreementCount: this.agreementLog.length,
      exhaustionPhrases: CONCLUSION_LEXICON.exhaustion.countPresent(recentText),
      stagnationPhrases: CONCLUSION_LEXICON.stagnation.countPresent(recentText),
      repetitionCount: this.repeatedTrigrams(3),
      messageLengthDecline: this.lengthDeclined(),
      topicSaturation: this.coverage.size,
      roundsProcessed: Math.floor(this.history.length / 2),
      positionConvergence: this.convergedSpeakers(),
      circularDebateScore: this.circularScore(),
    };
  }

  private recentText(window: number): string {
    return this.history
      .slice(-window)
      .map((entry) => entry.message)
      .join(" ");
  }

  private repeatedTrigrams(minCount: number): number {
    let count = 0;
    for (const seen of this.repetitions.values()) {
      if (seen >= minCount) count++;
    }
    return count;
  }

  private lengthDeclined(): boolean {
    if (this.history.length < 6) return false;
    const recent = average(this.history.slice(-6).map((entry) => entry.length));
    const early = average(this.history.slice(0, 6).map((entry) => entry.length));
    return recent < early * 0.7;
  }

  private convergedSpeakers(): number {
    let converged = 0;
    for (const scores of this.positions.values()) {
      if (scores.length < 4) continue;
      const recent = average(scores.slice(-3));
      const early = average(scores.slice(0, 3));
      if (Math.abs(recent - early) < Math.abs(early) * 0.5) converged++;
    }
    return converged;
  }

  private circularScore(): number {
    let score = this.repeatedTrigrams(4);
    score += CONCLUSION_LEXICON.stagnation.countPresent(this.recentText(this.config.stagnationWindow));
    // Coverage plateau
    if (this.history.length > 10 && this.coverage.size < 4) {
      score += 2;
    }
    return score;
  }

  // ============================================
  // STAGE & DECISION
  // ============================================

  private stageFor(indicators: ConclusionIndicators): DebateStage {
    if (indicators.circularDebateScore >= 5 || indicators.repetitionCount >= 4) {
      return DebateStage.CIRCULAR_REPETITION;
    }

    if (indicators.conclusionPhrases >= 2 || indicators.agreementCount >= 3 || indicators.exhaustionPhrases >= 3) {
      return DebateStage.NATURAL_CONCLUSION;
    }

    const rounds = indicators.roundsProcessed;
    if (rounds <= 3) return DebateStage.INITIAL_EXPLORATION;
    if (rounds <= 8) return DebateStage.ACTIVE_ENGAGEMENT;
    if (rounds <= 15) return DebateStage.DEEP_ANALYSIS;

    return indicators.positionConvergence >= 2 ? DebateStage.CONVERGENCE_ATTEMPT : DebateStage.CIRCULAR_REPETITION;
  }

  private decide(
    stage: DebateStage,
    indicators: ConclusionIndicators
  ): Pick<ConclusionAnalysis, "shouldConclude" | "confidence" | "reason" | "suggestedAction"> {
    if (stage === DebateStage.NATURAL_CONCLUSION) {
      return {
        shouldConclude: true,
        confidence: 0.9,
        reason:
          `Natural conclusion detected: ${indicators.conclusionPhrases} conclusion phrases, ` +
          `${indicators.agreementCount} agreements, ${indicators.exhaustionPhrases} exhaustion indicators`,
        suggestedAction: "Summarize key points of agreement and disagreement, then conclude the debate",
      };
    }

    if (stage === DebateStage.CIRCULAR_REPETITION) {
      return {
        shouldConclude: true,
        confidence: 0.8,
        reason:
          `Circular debate detected: ${indicators.repetitionCount} repeated patterns, ` +
          `circular score: ${indicators.circularDebateScore}, ${indicators.stagnationPhrases} stagnation phrases`,
        suggestedAction:
          "Acknowledge the impasse, summarize positions, and suggest agreeing to disagree or exploring new angles",
      };
    }

    if (stage === DebateStage.CONVERGENCE_ATTEMPT && indicators.roundsProcessed > 20) {
      return {
        shouldConclude: true,
        confidence: 0.7,
        reason: `Extended debate showing convergence attempts but no resolution after ${indicators.roundsProcessed} rounds`,
        suggestedAction:
          "Attempt final synthesis of positions or gracefully conclude with areas of agreement and disagreement",
      };
    }

    if (indicators.roundsProcessed > 25) {
      return {
        shouldConclude: true,
        confidence: 0.6,
        reason: `Very long debate (${indicators.roundsProcessed} rounds) with potential diminishing returns`,
        suggestedAction: "Consider concluding the current thread and potentially starting a new focused sub-topic",
      };
    }

    return {
      shouldConclude: false,
      confidence: 0.1,
      reason: `Debate still progressing in ${stage} stage`,
      suggestedAction: "Continue current discussion path",
    };
  }
}
