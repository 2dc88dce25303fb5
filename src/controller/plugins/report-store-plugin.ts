// ============================================
// REPORT STORE PLUGIN
// ============================================

import { BaseQualityPlugin } from "./base-plugin.js";
import type { ConversationSeed, QualityDecision } from "../types.js";
import type { LedgerExport } from "../../ledger/index.js";
import { QualityReportStore } from "../../memory/index.js";
import { getDefaultLogger } from "../../logger/index.js";

/**
 * Persists every decision and the final ledger through {@link QualityReportStore}.
 */
export class ReportStorePlugin extends BaseQualityPlugin {
  name = "report-store";
  version = "1.0.0";
  private logger = getDefaultLogger();
  private store: QualityReportStore;
  private ownsStore: boolean;

  /**
   * @param store - a store path, or an open store the caller keeps ownership of
   */
  constructor(store: QualityReportStore | string = "quality-reports.db") {
    super();
    this.ownsStore = typeof store === "string";
    this.store = typeof store === "string" ? new QualityReportStore(store) : store;
  }

  get reportStore(): QualityReportStore {
    return this.store;
  }

  async onConversationStarted(conversationId: string, seed: ConversationSeed): Promise<void> {
    this.store.createConversation({ id: conversationId, topic: seed.topic, domain: seed.domain });
  }

  async onDecision(decision: QualityDecision): Promise<void> {
    const id = this.store.saveDecision(decision);
    this.logger.debug("Decision persisted", { conversationId: decision.conversationId, decisionId: id });
  }

  async onConversationEnded(conversationId: string, ledger: LedgerExport): Promise<void> {
    this.store.saveLedgerExport(conversationId, ledger);
    this.store.completeConversation(conversationId);
  }

  async cleanup(): Promise<void> {
    if (this.ownsStore) {
      this.store.close();
      this.logger.info("Report store closed", { path: this.store.path });
    }
  }
}
