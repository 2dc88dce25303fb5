import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { parseTranscript, replayTranscript } from "../src/replay/transcript.js";
import { ControllerRegistry } from "../src/controller/index.js";

function loadFixture(): unknown {
  return JSON.parse(readFileSync(new URL("./fixtures/transcript.json", import.meta.url), "utf8"));
}

describe("parseTranscript", () => {
  it("accepts a well-formed transcript", () => {
    const transcript = parseTranscript(loadFixture());

    expect(transcript.topic).toBe("memory");
    expect(transcript).not.toHaveProperty("domain");
    expect(transcript.messages).toHaveLength(9);
    expect(transcript.messages[0]).toEqual({ speaker: "A", text: "Memory is reconstructive." });
  });

  it("names the offending field", () => {
    expect(() => parseTranscript([])).toThrow("Transcript must be a JSON object");
    expect(() => parseTranscript({ topic: " ", messages: [] })).toThrow("Transcript topic must be a non-empty string");
    expect(() => parseTranscript({ topic: "memory", messages: {} })).toThrow("Transcript messages must be an array");
    expect(() => parseTranscript({ topic: "memory", messages: [{ speaker: "", text: "hi" }] })).toThrow(
      "messages[0].speaker must be a non-empty string"
    );
    expect(() => parseTranscript({ topic: "memory", messages: [{ speaker: "A", text: "hi", round: 0 }] })).toThrow(
      "messages[0].round must be a positive integer"
    );
    expect(() =>
      parseTranscript({ topic: "memory", messages: [{ speaker: "A", text: "hi", round: Number.MAX_VALUE }] })
    ).toThrow("messages[0].round must be a positive integer");
  });
});

describe("replayTranscript", () => {
  it("stops at the first decision that ends the exchange", async () => {
    const registry = new ControllerRegistry();

    const result = await replayTranscript(registry, parseTranscript(loadFixture()));

    expect(result.conversationId).toBe("replay");
    expect(result.decisions).toHaveLength(8);
    expect(result.stoppedEarly).toBe(true);
    expect(result.ledger.metadata.currentRound).toBe(8);
    expect(registry.has("replay")).toBe(false);
  });

  it("runs the whole transcript when asked to", async () => {
    const result = await replayTranscript(new ControllerRegistry(), parseTranscript(loadFixture()), {
      conversationId: "full",
      stopOnEnd: false,
    });

    expect(result.conversationId).toBe("full");
    expect(result.decisions).toHaveLength(9);
    expect(result.stoppedEarly).toBe(false);
  });
});
