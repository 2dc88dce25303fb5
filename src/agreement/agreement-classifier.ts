import { AgreementLevel } from "./types.js";
import type { AgreementAnalysis, AgreementSignals, EndDecision } from "./types.js";
import { AGREEMENT_LEXICON } from "../lexicon/index.js";
import { isBlank, wordCount } from "../text/index.js";

interface LevelVerdict {
  level: AgreementLevel;
  confidence: number;
  shouldContinue: boolean;
}

/**
 * Ordered rule table, first match wins. Question and reservation checks sit
 * ahead of plain agreement counts so a polite opener followed by pending
 * questions still continues.
 */
const LEVEL_RULES: ReadonlyArray<{ when: (s: AgreementSignals) => boolean; verdict: LevelVerdict }> = [
  {
    when: (s) => s.stop > 0 || s.strongAgreement >= 2,
    verdict: { level: AgreementLevel.STRONG_AGREEMENT, confidence: 0.95, shouldContinue: false },
  },
  {
    when: (s) => s.disagreement >= 3 || (s.disagreement >= 1 && s.reservation >= 3),
    verdict: { level: AgreementLevel.STRONG_DISAGREEMENT, confidence: 0.9, shouldContinue: true },
  },
  {
    when: (s) => (s.reservation >= 2 && s.continuation >= 1) || s.questions >= 3,
    verdict: { level: AgreementLevel.DISAGREEMENT, confidence: 0.85, shouldContinue: true },
  },
  {
    when: (s) => s.agreement >= 1 && s.reservation >= 1,
    verdict: { level: AgreementLevel.MIXED_RESPONSE, confidence: 0.7, shouldContinue: true },
  },
  {
    when: (s) => s.agreement >= 2 && s.reservation <= 1 && s.questions <= 2,
    verdict: { level: AgreementLevel.LEANING_AGREEMENT, confidence: 0.75, shouldContinue: true },
  },
  {
    when: (s) => s.agreement >= 3 || s.strongAgreement >= 1,
    verdict: { level: AgreementLevel.STRONG_AGREEMENT, confidence: 0.9, shouldContinue: false },
  },
  {
    when: (s) => s.agreement >= 1 && s.reservation === 0 && s.continuation === 0,
    verdict: { level: AgreementLevel.AGREEMENT, confidence: 0.8, shouldContinue: false },
  },
  {
    when: (s) => s.questions >= 6 || s.reservation > 0 || s.continuation > 0,
    verdict: { level: AgreementLevel.DISAGREEMENT, confidence: 0.6, shouldContinue: true },
  },
];

const FALLBACK_VERDICT: LevelVerdict = {
  level: AgreementLevel.MIXED_RESPONSE,
  confidence: 0.5,
  shouldContinue: true,
};

function emptySignals(): AgreementSignals {
  return {
    disagreement: 0,
    reservation: 0,
    continuation: 0,
    questions: 0,
    agreement: 0,
    strongAgreement: 0,
    stop: 0,
  };
}

/**
 * Neutral result used for blank input and failed analyses.
 */
export function neutralAgreement(explanation = "Unable to determine agreement level clearly"): AgreementAnalysis {
  return {
    ...FALLBACK_VERDICT,
    explanation,
    signals: emptySignals(),
    messageStats: { sentences: 0, words: 0 },
  };
}

// ============================================
// AGREEMENT CLASSIFIER
// ============================================

/**
 * Stateless per-message classifier deciding whether a reply agrees or wants
 * to keep debating. Safe to share between conversations.
 */
export class AgreementClassifier {
  analyze(message: string): AgreementAnalysis {
    if (isBlank(message)) {
      return neutralAgreement();
    }

    const signals = this.countSignals(message);
    const verdict = LEVEL_RULES.find((rule) => rule.when(signals))?.verdict ?? FALLBACK_VERDICT;

    return {
      ...verdict,
      explanation: this.explain(verdict.level, signals),
      signals,
      messageStats: {
        sentences: message.split(".").filter((part) => part.trim().length > 0).length,
        words: wordCount(message),
      },
    };
  }

  shouldEnd(message: string): EndDecision {
    return this.endDecision(this.analyze(message));
  }

  /**
   * Stop/continue verdict for an analysis that was already computed.
   */
  endDecision(analysis: AgreementAnalysis): EndDecision {
    if (!analysis.shouldContinue) {
      if (analysis.level === AgreementLevel.STRONG_AGREEMENT || analysis.level === AgreementLevel.AGREEMENT) {
        return { shouldEnd: true, reason: `Agreement reached - ${analysis.explanation}` };
      }
      return { shouldEnd: true, reason: `Conversation concluded - ${analysis.explanation}` };
    }

    return { shouldEnd: false, reason: `Debate continues - ${analysis.explanation}` };
  }

  countSignals(message: string): AgreementSignals {
    return {
      disagreement: AGREEMENT_LEXICON.disagreement.countOccurrences(message),
      reservation: AGREEMENT_LEXICON.reservation.countOccurrences(message),
      continuation: AGREEMENT_LEXICON.continuation.countOccurrences(message),
      questions: AGREEMENT_LEXICON.question.countOccurrences(message),
      agreement: AGREEMENT_LEXICON.agreement.countOccurrences(message),
      strongAgreement: AGREEMENT_LEXICON.strongAgreement.countOccurrences(message),
      stop: AGREEMENT_LEXICON.stop.countOccurrences(message),
    };
  }

  private explain(level: AgreementLevel, s: AgreementSignals): string {
    switch (level) {
      case AgreementLevel.STRONG_AGREEMENT:
        return `Strong agreement with ${s.strongAgreement} strong agreement signals and ${s.stop} stop signals`;
      case AgreementLevel.AGREEMENT:
        return `Agreement with ${s.agreement} agreement signals and minimal reservations`;
      case AgreementLevel.LEANING_AGREEMENT:
        return `Leaning toward agreement (${s.agreement} agreement signals) with some concerns remaining`;
      case AgreementLevel.MIXED_RESPONSE:
        return `Mixed response with ${s.agreement} agreement and ${s.reservation} reservation signals`;
      case AgreementLevel.DISAGREEMENT:
        return `Wants to continue debating: ${s.reservation} reservations, ${s.questions} questions, ${s.continuation} continuation signals`;
      case AgreementLevel.STRONG_DISAGREEMENT:
        return `Strong disagreement with ${s.disagreement} disagreement and ${s.reservation} reservation signals`;
    }
  }
}
