import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { QualityReportStore } from "../src/memory/index.js";
import { ControllerRegistry, ReportStorePlugin } from "../src/controller/index.js";

describe("QualityReportStore", () => {
  let store: QualityReportStore;

  beforeEach(() => {
    store = new QualityReportStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("keeps the first record for a conversation id", () => {
    store.createConversation({ id: "x", topic: "first" });
    store.createConversation({ id: "x", topic: "second", domain: "ai_consciousness" });

    const record = store.getConversation("x");

    expect(record).toMatchObject({ id: "x", topic: "first", isComplete: false, completedAt: null });
    expect(record).not.toHaveProperty("domain");
    expect(record).not.toHaveProperty("ledgerExport");
    expect(store.getConversation("missing")).toBeUndefined();
  });

  it("persists decisions and the final ledger through the plugin", async () => {
    const registry = new ControllerRegistry({ plugins: [new ReportStorePlugin(store)] });
    await registry.open("s1", { topic: "AI consciousness", domain: "ai_consciousness" });
    await registry.process("s1", {
      speaker: "A",
      text: "I argue that machine consciousness requires integrated information processing.",
    });
    await registry.process("s1", { speaker: "B", text: "I agree with that." });
    await registry.end("s1");
    await registry.cleanup();

    const conversation = store.getConversation("s1");
    expect(conversation).toMatchObject({ topic: "AI consciousness", domain: "ai_consciousness", isComplete: true });
    expect(JSON.parse(conversation?.ledgerExport ?? "{}").metadata.totalClaims).toBe(1);

    const decisions = store.getDecisions("s1");
    expect(decisions.map((decision) => [decision.round, decision.speaker, decision.shouldContinue])).toEqual([
      [1, "A", true],
      [2, "B", false],
    ]);
    expect(decisions[0]).toMatchObject({
      agreementLevel: "MIXED_RESPONSE",
      topicRelevance: "MODERATELY_RELEVANT",
      stage: "initial_exploration",
      evidenceScore: 0,
      rehashWarnings: 0,
    });
    expect(decisions[1]?.agreementLevel).toBe("AGREEMENT");
    expect(JSON.parse(decisions[1]?.payload ?? "{}").reason).toBe(
      "Agreement reached - Agreement with 1 agreement signals and minimal reservations"
    );
  });
});
