// ============================================
// QUALITY REPORT TYPES
// ============================================

export interface ConversationRecord {
  id: string;
  topic: string;
  domain?: string;
  isComplete: boolean;
  ledgerExport?: string; // JSON snapshot written when the conversation ends
  createdAt?: Date;
  completedAt?: Date | null;
}

export interface DecisionRecord {
  id?: number;
  conversationId: string;
  round: number;
  speaker: string;
  shouldContinue: boolean;
  reason: string;
  agreementLevel: string;
  topicRelevance: string;
  stage: string;
  evidenceScore: number;
  maturityScore: number;
  rehashWarnings: number;
  payload: string; // Full decision as JSON
  createdAt?: Date;
}

export interface ConversationRow {
  id: string;
  topic: string;
  domain: string | null;
  is_complete: number;
  ledger_export: string | null;
  created_at: string;
  completed_at: string | null;
}

export interface DecisionRow {
  id: number;
  conversation_id: string;
  round: number;
  speaker: string;
  should_continue: number;
  reason: string;
  agreement_level: string;
  topic_relevance: string;
  stage: string;
  evidence_score: number;
  maturity_score: number;
  rehash_warnings: number;
  payload: string;
  created_at: string;
}
