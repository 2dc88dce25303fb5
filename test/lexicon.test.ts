import { describe, it, expect } from "vitest";
import {
  AGREEMENT_LEXICON,
  CONCLUSION_LEXICON,
  DEFAULT_DOMAIN_RULES,
  LEDGER_LEXICON,
  PhraseTable,
  compileFamilies,
  compilePhrase,
} from "../src/lexicon/index.js";

describe("PhraseTable", () => {
  it("matches on word boundaries", () => {
    const table = new PhraseTable("reservation", ["but"]);
    expect(table.has("an attribute of the system")).toBe(false);
    expect(table.has("Yes, but no")).toBe(true);
  });

  it("counts occurrences and distinct phrases separately", () => {
    const table = new PhraseTable("agreement", ["i agree", "fair point"]);
    expect(table.countOccurrences("I agree. I agree again.")).toBe(2);
    expect(table.countPresent("I agree. I agree again.")).toBe(1);
    expect(table.matches("Fair point, and I agree")).toEqual(["i agree", "fair point"]);
  });

  it("matches curly apostrophes against straight ones", () => {
    expect(new PhraseTable("t", ["don't"]).has("I don’t know")).toBe(true);
  });

  it("matches punctuation-only phrases without word boundaries", () => {
    expect(compilePhrase("<stop>").pattern.source).toBe("<stop>");
    expect(new PhraseTable("stop", ["<stop>"]).has("ok <STOP>")).toBe(true);
  });

  it("supports regular expression sources", () => {
    const table = new PhraseTable("questions", ["\\?"], { mode: "pattern" });
    expect(table.countOccurrences("a? b?")).toBe(2);
  });

  it("weights scores", () => {
    const table = new PhraseTable("strong", ["definitely", "clearly"], { weight: 2 });
    expect(table.score("Definitely, clearly.")).toBe(4);
  });

  it("ignores blank sources", () => {
    expect(new PhraseTable("t", ["a", "  "]).size).toBe(1);
  });
});

describe("compileFamilies", () => {
  it("keeps family order", () => {
    expect([...compileFamilies({ first: ["x"], second: ["y"] }).keys()]).toEqual(["first", "second"]);
  });
});

describe("built-in tables", () => {
  it("loads every agreement category", () => {
    expect(AGREEMENT_LEXICON.disagreement.size).toBe(10);
    expect(AGREEMENT_LEXICON.stop.has("<stop>")).toBe(true);
  });

  it("orders question buckets", () => {
    expect(LEDGER_LEXICON.questionBuckets.map((rule) => rule.label)).toEqual([
      "how_do_you",
      "what_evidence",
      "could_you_provide",
      "can_you_share",
      "what_specific",
      "how_feasible",
      "what_methodology",
      "examples_request",
      "what_makes_you",
      "how_will_you",
      "what_problems",
    ]);
  });

  it("weights stance tables from strongly positive to strongly negative", () => {
    expect(CONCLUSION_LEXICON.stance.map((table) => table.weight)).toEqual([2, 1, 0, -1, -2]);
  });

  it("ships three domain rules", () => {
    expect(DEFAULT_DOMAIN_RULES.map((rule) => rule.name)).toEqual([
      "health_for_ai_consciousness",
      "diabetes",
      "obesity",
    ]);
  });
});
