import { describe, it, expect } from "vitest";
import {
  contentWords,
  isBlank,
  isSimilarText,
  jaccardSimilarity,
  splitClaimCandidates,
  splitQuestions,
  splitSentences,
  tokenize,
  truncate,
  wordCount,
} from "../src/text/index.js";

describe("tokenize", () => {
  it("lowercases and strips edge punctuation", () => {
    expect(tokenize("Hello, World! It's  fine.")).toEqual(["hello", "world", "it's", "fine"]);
  });

  it("folds curly apostrophes", () => {
    expect(tokenize("Don’t")).toEqual(["don't"]);
  });
});

describe("wordCount", () => {
  it("counts whitespace-separated words", () => {
    expect(wordCount("  one two   three ")).toBe(3);
  });

  it("returns 0 for blank text", () => {
    expect(wordCount("   ")).toBe(0);
  });
});

describe("contentWords", () => {
  it("drops stop words and short words", () => {
    expect(contentWords("What is consciousness and how can AI systems become sentient", 3)).toEqual([
      "consciousness",
      "systems",
      "become",
      "sentient",
    ]);
  });
});

describe("splitSentences", () => {
  it("splits at terminators and records offsets", () => {
    expect(splitSentences("I think so. Do you? Yes!")).toEqual([
      { text: "I think so.", offset: 0, isQuestion: false },
      { text: "Do you?", offset: 12, isQuestion: true },
      { text: "Yes!", offset: 20, isQuestion: false },
    ]);
  });

  it("splits at line breaks", () => {
    expect(splitSentences("first line\nsecond line").map((s) => s.text)).toEqual(["first line", "second line"]);
  });

  it("returns nothing for blank text", () => {
    expect(splitSentences("  ")).toEqual([]);
  });
});

describe("splitClaimCandidates", () => {
  it("turns every fragment of a part containing a question mark into a question", () => {
    expect(splitClaimCandidates("Memory fades. Why? It decays, I think! Really?\nNo")).toEqual([
      { text: "Memory fades", isQuestion: false },
      { text: "Why?", isQuestion: true },
      { text: "It decays, I think?", isQuestion: true },
      { text: "Really?", isQuestion: true },
      { text: "No", isQuestion: false },
    ]);
  });
});

describe("splitQuestions", () => {
  it("keeps the last sentence of every question segment", () => {
    expect(splitQuestions("We covered that. Could you provide data? And why? Fine.")).toEqual([
      "Could you provide data",
      "And why",
    ]);
  });

  it("returns nothing without question marks", () => {
    expect(splitQuestions("No questions here.")).toEqual([]);
  });
});

describe("similarity", () => {
  it("computes word-set Jaccard overlap", () => {
    expect(jaccardSimilarity("the cat sat", "the cat ran")).toBe(0.5);
  });

  it("scores empty input as 0", () => {
    expect(jaccardSimilarity("", "anything")).toBe(0);
  });

  it("treats containment as similar", () => {
    expect(isSimilarText("Cat Sat", "the cat sat down")).toBe(true);
  });

  it("rejects unrelated text", () => {
    expect(isSimilarText("alpha beta", "gamma delta")).toBe(false);
  });

  it("accepts a custom similarity function", () => {
    expect(isSimilarText("alpha", "gamma", 0.3, () => 1)).toBe(true);
  });
});

describe("helpers", () => {
  it("truncates with an ellipsis", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
    expect(truncate("abc", 3)).toBe("abc");
  });

  it("detects blank values", () => {
    expect(isBlank(" \n ")).toBe(true);
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank("x")).toBe(false);
  });
});
