import type {
  MaturityAssessment,
  MaturityAssessorConfig,
  MaturityFactors,
  MaturityStage,
  ScoreRefiner,
} from "./types.js";
import { clampScore, identityRefiner } from "./refine.js";
import { MATURITY_LEXICON } from "../lexicon/index.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";

export function stageForScore(score: number): MaturityStage {
  if (score < 0.25) return "exploration";
  if (score < 0.5) return "refinement";
  if (score < 0.75) return "convergence";
  return "consensus";
}

// ============================================
// MATURITY ASSESSOR
// ============================================
export class MaturityAssessor {
  private config: Required<MaturityAssessorConfig>;
  private refine: ScoreRefiner;
  private logger: Logger;
  private messageHistory: string[] = [];
  private lastScore = 0;

  constructor(config: MaturityAssessorConfig = {}, refine: ScoreRefiner = identityRefiner, logger?: Logger) {
    this.config = {
      windowSize: config.windowSize ?? 10,
      roundHorizon: config.roundHorizon ?? 15,
      refineJump: config.refineJump ?? 0.3,
      refineEvery: config.refineEvery ?? 5,
      refineWeight: config.refineWeight ?? 0.3,
    };
    this.refine = refine;
    this.logger = logger ?? getDefaultLogger();
  }

  get currentScore(): number {
    return this.lastScore;
  }

  /**
   * Track a new message, keeping only the recent window
   */
  trackMessage(content: string): void {
    this.messageHistory.push(content);
    if (this.messageHistory.length > this.config.windowSize) {
      this.messageHistory.shift();
    }
  }

  assess(round: number): MaturityAssessment {
    const factors = this.calculateFactors(round);
    const heuristicScore = clampScore(
      factors.roundProgression +
        factors.lengthConvergence +
        factors.technicalDensity +
        factors.statementRatio +
        factors.agreementIndicators
    );

    const refined =
      Math.abs(heuristicScore - this.lastScore) > this.config.refineJump ||
      (round > 0 && round % this.config.refineEvery === 0);

    let score = heuristicScore;
    if (refined) {
      const external = clampScore(this.refine(heuristicScore));
      score = heuristicScore * (1 - this.config.refineWeight) + external * this.config.refineWeight;
    }

    this.lastScore = score;
    const stage = stageForScore(score);
    this.logger.debug("Maturity assessed", { round, score, heuristicScore, stage, refined });

    return { score, heuristicScore, refined, stage, factors };
  }

  /**
   * Heuristic components; an empty history scores zero everywhere.
   */
  calculateFactors(round: number): MaturityFactors {
    const factors: MaturityFactors = {
      roundProgression: 0,
      lengthConvergence: 0,
      technicalDensity: 0,
      statementRatio: 0,
      agreementIndicators: 0,
    };
    if (this.messageHistory.length === 0) return factors;

    // 1. Round progression
    factors.roundProgression = Math.min(Math.max(round, 0) / this.config.roundHorizon, 1) * 0.3;

    // 2. Length convergence over the last four messages
    if (this.messageHistory.length >= 4) {
      const lengths = this.messageHistory.slice(-4).map((message) => message.length);
      const spread = Math.max(...lengths) - Math.min(...lengths);
      factors.lengthConvergence = Math.max(0, 1 - spread / 500) * 0.2;
    }

    const recentText = this.messageHistory.slice(-2).join(" ");

    // 3. Technical term density
    const technical = MATURITY_LEXICON.technicalTerms;
    factors.technicalDensity = (technical.countPresent(recentText) / technical.size) * 0.25;

    // 4. Statements versus questions
    const questions = countChar(recentText, "?");
    const statements = countChar(recentText, ".") + countChar(recentText, "!");
    if (statements > 0) {
      factors.statementRatio = (statements / (statements + questions)) * 0.15;
    }

    // 5. Agreement words
    factors.agreementIndicators =
      Math.min(MATURITY_LEXICON.agreementWords.countPresent(recentText) / 3, 1) * 0.1;

    return factors;
  }
}

function countChar(text: string, char: string): number {
  return text.split(char).length - 1;
}
