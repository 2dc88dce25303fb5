import Database from "better-sqlite3";
import type { ConversationRecord, ConversationRow, DecisionRecord, DecisionRow } from "./types.js";
import { AgreementLevel } from "../agreement/index.js";
import type { QualityDecision } from "../controller/types.js";
import type { LedgerExport } from "../ledger/index.js";
import { TopicRelevance } from "../topics/index.js";

// ============================================
// QUALITY REPORT STORE
// ============================================
export class QualityReportStore {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = "quality-reports.db") {
    this.dbPath = dbPath;
    this.db = new Database(dbPath);
    this.initializeSchema();
  }

  get path(): string {
    return this.dbPath;
  }

  // ============================================
  // DATABASE INITIALIZATION
  // ============================================
  private initializeSchema(): void {
    this.db.pragma("foreign_keys = ON");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS quality_conversations (
        id TEXT PRIMARY KEY,
        topic TEXT NOT NULL,
        domain TEXT,
        is_complete INTEGER DEFAULT 0,
        ledger_export TEXT,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        completed_at DATETIME
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS quality_decisions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id TEXT NOT NULL,
        round INTEGER NOT NULL,
        speaker TEXT NOT NULL,
        should_continue INTEGER NOT NULL,
        reason TEXT NOT NULL,
        agreement_level TEXT NOT NULL,
        topic_relevance TEXT NOT NULL,
        stage TEXT NOT NULL,
        evidence_score REAL NOT NULL,
        maturity_score REAL NOT NULL,
        rehash_warnings INTEGER NOT NULL,
        payload TEXT NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (conversation_id) REFERENCES quality_conversations(id) ON DELETE CASCADE
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_quality_decisions_conversation
      ON quality_decisions(conversation_id, round);
    `);
  }

  // ============================================
  // CONVERSATION OPERATIONS
  // ============================================

  /**
   * Create a conversation record; an existing id is left untouched.
   */
  createConversation(conversation: Pick<ConversationRecord, "id" | "topic" | "domain">): void {
    this.db
      .prepare<[string, string, string | null]>(
        `INSERT OR IGNORE INTO quality_conversations (id, topic, domain) VALUES (?, ?, ?)`
      )
      .run(conversation.id, conversation.topic, conversation.domain ?? null);
  }

  getConversation(conversationId: string): ConversationRecord | undefined {
    const row = this.db
      .prepare<[string], ConversationRow>(`SELECT * FROM quality_conversations WHERE id = ?`)
      .get(conversationId);

    if (!row) return undefined;

    return {
      id: row.id,
      topic: row.topic,
      ...(row.domain !== null && { domain: row.domain }),
      isComplete: row.is_complete === 1,
      ...(row.ledger_export !== null && { ledgerExport: row.ledger_export }),
      createdAt: new Date(row.created_at),
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
    };
  }

  saveLedgerExport(conversationId: string, ledger: LedgerExport): void {
    this.db
      .prepare<[string, string]>(`UPDATE quality_conversations SET ledger_export = ? WHERE id = ?`)
      .run(JSON.stringify(ledger), conversationId);
  }

  completeConversation(conversationId: string): void {
    this.db
      .prepare<[string]>(
        `UPDATE quality_conversations SET is_complete = 1, completed_at = CURRENT_TIMESTAMP WHERE id = ?`
      )
      .run(conversationId);
  }

  // ============================================
  // DECISION OPERATIONS
  // ============================================

  saveDecision(decision: QualityDecision): number {
    const result = this.db
      .prepare<[string, number, string, number, string, string, string, string, number, number, number, string]>(`
        INSERT INTO quality_decisions (
          conversation_id, round, speaker, should_continue, reason, agreement_level,
          topic_relevance, stage, evidence_score, maturity_score, rehash_warnings, payload
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        decision.conversationId,
        decision.round,
        decision.speaker,
        decision.shouldContinue ? 1 : 0,
        decision.reason,
        AgreementLevel[decision.agreement.level],
        TopicRelevance[decision.topic.relevance],
        decision.conclusion.stage,
        decision.evidence.evidenceQualityScore,
        decision.maturity.score,
        decision.rehashWarnings.length,
        JSON.stringify(decision)
      );

    return Number(result.lastInsertRowid);
  }

  getDecisions(conversationId: string): DecisionRecord[] {
    const rows = this.db
      .prepare<[string], DecisionRow>(
        `SELECT * FROM quality_decisions WHERE conversation_id = ? ORDER BY round ASC, id ASC`
      )
      .all(conversationId);

    return rows.map((row) => ({
      id: row.id,
      conversationId: row.conversation_id,
      round: row.round,
      speaker: row.speaker,
      shouldContinue: row.should_continue === 1,
      reason: row.reason,
      agreementLevel: row.agreement_level,
      topicRelevance: row.topic_relevance,
      stage: row.stage,
      evidenceScore: row.evidence_score,
      maturityScore: row.maturity_score,
      rehashWarnings: row.rehash_warnings,
      payload: row.payload,
      createdAt: new Date(row.created_at),
    }));
  }

  close(): void {
    this.db.close();
  }
}
