// ============================================
// AGREEMENT CLASSIFIER TYPES
// ============================================

/**
 * Ordinal agreement level; higher means closer to agreement.
 */
export enum AgreementLevel {
  STRONG_DISAGREEMENT = 1,
  DISAGREEMENT = 2,
  MIXED_RESPONSE = 3,
  LEANING_AGREEMENT = 4,
  AGREEMENT = 5,
  STRONG_AGREEMENT = 6,
}

export interface AgreementSignals {
  disagreement: number;
  reservation: number;
  continuation: number;
  questions: number;
  agreement: number;
  strongAgreement: number;
  stop: number;
}

export interface AgreementAnalysis {
  level: AgreementLevel;
  confidence: number; // 0-1
  shouldContinue: boolean;
  explanation: string;
  signals: AgreementSignals;
  messageStats: {
    sentences: number;
    words: number;
  };
}

export interface EndDecision {
  shouldEnd: boolean;
  reason: string;
}
