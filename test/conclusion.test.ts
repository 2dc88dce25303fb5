import { describe, it, expect, beforeEach } from "vitest";
import { ConclusionDetector, DebateStage, stanceScore } from "../src/conclusion/index.js";

function feed(detector: ConclusionDetector, messages: ReadonlyArray<[string, string]>): void {
  messages.forEach(([speaker, message], index) => {
    detector.analyzeMessage(message, speaker, Math.floor(index / 2) + 1);
  });
}

const OPENING: ReadonlyArray<[string, string]> = [
  ["A", "Memory is reconstructive."],
  ["B", "Memory is reproductive."],
  ["A", "Sleep consolidates traces."],
  ["B", "Traces decay quickly."],
  ["A", "Rehearsal strengthens recall."],
  ["B", "Recall varies widely."],
];

describe("stanceScore", () => {
  it("sums the weights of the distinct stance phrases present", () => {
    expect(stanceScore("I think it is definitely likely.")).toBe(4);
    expect(stanceScore("I doubt it, probably not.")).toBe(-1);
    expect(stanceScore("Clearly impossible.")).toBe(0);
  });
});

describe("ConclusionDetector", () => {
  let detector: ConclusionDetector;

  beforeEach(() => {
    detector = new ConclusionDetector();
  });

  it("withholds judgement with fewer than four messages", () => {
    feed(detector, OPENING.slice(0, 3));

    expect(detector.shouldConclude()).toEqual({
      stage: DebateStage.INITIAL_EXPLORATION,
      shouldConclude: false,
      confidence: 0,
      reason: "Debate still in early stages",
      suggestedAction: "Continue exploration of topic",
    });
  });

  it("detects a natural conclusion from closing phrases", () => {
    feed(detector, [
      ...OPENING,
      ["A", "In conclusion, reconstruction dominates."],
      ["B", "Overall, both effects matter."],
    ]);

    const analysis = detector.shouldConclude();

    expect(analysis.stage).toBe(DebateStage.NATURAL_CONCLUSION);
    expect(analysis.shouldConclude).toBe(true);
    expect(analysis.confidence).toBe(0.9);
    expect(analysis.reason).toBe(
      "Natural conclusion detected: 2 conclusion phrases, 0 agreements, 0 exhaustion indicators"
    );
    expect(analysis.indicators).toMatchObject({ roundsProcessed: 4, circularDebateScore: 0, repetitionCount: 0 });
  });

  it("detects a natural conclusion from accumulated agreement", () => {
    feed(detector, [
      ["A", "Memory is reconstructive."],
      ["B", "I agree, good point."],
      ["A", "Sleep matters."],
      ["B", "That makes sense."],
    ]);

    expect(detector.shouldConclude()).toMatchObject({
      stage: DebateStage.NATURAL_CONCLUSION,
      reason: "Natural conclusion detected: 0 conclusion phrases, 3 agreements, 0 exhaustion indicators",
    });
  });

  it("keeps going while the debate is still developing", () => {
    feed(detector, [...OPENING, ["A", "Context matters greatly."], ["B", "Results remain mixed."]]);

    expect(detector.shouldConclude()).toMatchObject({
      stage: DebateStage.ACTIVE_ENGAGEMENT,
      shouldConclude: false,
      confidence: 0.1,
      reason: "Debate still progressing in active_engagement stage",
      suggestedAction: "Continue current discussion path",
    });
  });

  it("flags a speaker who keeps repeating the same phrasing", () => {
    const repeated = "Neural networks cannot think about their internal states during sleep cycles either.";
    feed(detector, [
      ["A", repeated],
      ["B", "Maybe so."],
      ["A", repeated],
      ["B", "Perhaps not."],
      ["A", repeated],
    ]);

    const analysis = detector.shouldConclude();

    expect(analysis.stage).toBe(DebateStage.CIRCULAR_REPETITION);
    expect(analysis.shouldConclude).toBe(true);
    expect(analysis.confidence).toBe(0.8);
    expect(analysis.reason).toBe("Circular debate detected: 4 repeated patterns, circular score: 0, 0 stagnation phrases");
  });

  it("tracks coverage and per-speaker stance", () => {
    detector.analyzeMessage("Quantum ethics needs evidence.", "A", 1);
    detector.analyzeMessage("I think it is definitely likely.", "B", 1);

    expect(detector.topicCoverage).toEqual(["quantum_theories", "evidence_requirements", "ethical_implications"]);
    expect(detector.positionScores("B")).toEqual([4]);
    expect(detector.positionScores("C")).toEqual([]);
    expect(detector.messageCount).toBe(2);
  });

  it("notices shrinking messages", () => {
    for (let i = 0; i < 6; i++) detector.analyzeMessage("a b c d e f g h i j", i % 2 === 0 ? "A" : "B", i);
    expect(detector.indicators().messageLengthDecline).toBe(false);

    for (let i = 0; i < 6; i++) detector.analyzeMessage("ok then", i % 2 === 0 ? "A" : "B", i + 6);
    expect(detector.indicators().messageLengthDecline).toBe(true);
  });
});
