import { describe, it, expect } from "vitest";
import { EvidenceRelevance, EvidenceValidator, emptyEvidenceReport } from "../src/evidence/index.js";

const TOPIC = "machine consciousness and integrated information";
const SUPPORTED = "Machine consciousness needs integrated information, as Jones (2021) shows that clearly.";

describe("EvidenceValidator", () => {
  const validator = new EvidenceValidator();

  describe("extractCitations", () => {
    it("folds a journal reference into the author reference before it", () => {
      const [citation, ...rest] = validator.extractCitations(
        "Tononi (2004) published in Nature Neuroscience (2004) argued for integration."
      );

      expect(rest).toEqual([]);
      expect(citation).toMatchObject({
        authors: ["Tononi"],
        journal: "Nature Neuroscience",
        year: 2004,
        fullText: "Tononi (2004) published in Nature Neuroscience (2004)",
        offset: 0,
      });
    });

    it("keeps a standalone journal reference", () => {
      const citations = validator.extractCitations("As published in Science (2020), neurons fire.");

      expect(citations).toHaveLength(1);
      expect(citations[0]).toMatchObject({ authors: [], journal: "Science", year: 2020 });
    });

    it("matches the journal lead in any case but needs a capitalised name", () => {
      const citations = validator.extractCitations(
        "PUBLISHED IN Cognitive Science (2019) and Published in Brain. It was published in the archives."
      );

      expect(citations.map((citation) => [citation.journal, citation.year, citation.fullText])).toEqual([
        ["Cognitive Science", 2019, "PUBLISHED IN Cognitive Science (2019)"],
        ["Brain", 0, "Published in Brain"],
      ]);
    });

    it("orders citations by position", () => {
      const citations = validator.extractCitations("Smith (2010) and later Jones et al. (2015) agree.");
      expect(citations.map((citation) => citation.authors[0])).toEqual(["Smith", "Jones et al."]);
    });
  });

  describe("validate", () => {
    it("rejects citations dated after the knowledge cutoff", () => {
      const report = validator.validateMessage(
        "Allen Institute (2025) showed that machine consciousness is measurable.",
        "AI consciousness"
      );

      expect(report.totalCitations).toBe(1);
      const [validation] = report.validations;
      expect(validation).toMatchObject({
        relevance: EvidenceRelevance.IRRELEVANT,
        confidence: 0.95,
        topicMatchScore: 0,
        claim: "Allen Institute (2025) showed that machine consciousness is measurable.",
      });
      expect(validation?.explanation.toLowerCase()).toContain("future-dated");
      expect(report.evidenceQualityScore).toBe(0);
      expect(report.overallEvidenceQuality).toBe("Poor evidence quality: 1/1 citations are irrelevant to the topic");
    });

    it("accepts the cutoff year itself", () => {
      const [citation] = validator.extractCitations("Park (2023) showed it.");
      if (!citation) throw new Error("expected a citation");

      expect(validator.validate(citation, "", "anything")).toMatchObject({
        relevance: EvidenceRelevance.IRRELEVANT,
        confidence: 0.5,
        explanation: "No clear relevance to topic detected",
      });
    });

    it("rates strong topic overlap as highly relevant", () => {
      const [validation] = validator.validateMessage(SUPPORTED, TOPIC).validations;

      expect(validation).toMatchObject({
        relevance: EvidenceRelevance.HIGHLY_RELEVANT,
        confidence: 0.8,
        explanation: "Strong keyword overlap: consciousness, integrated, information",
        topicMatchScore: 0.75,
        contextAnalysis: "Citation used as supporting evidence",
      });
    });

    it("flags medical research cited for an AI consciousness topic", () => {
      const [validation] = validator.validateMessage(
        "Lee (2019) showed insulin therapy improves glucose control in diabetes patients.",
        "AI consciousness"
      ).validations;

      expect(validation).toMatchObject({
        relevance: EvidenceRelevance.IRRELEVANT,
        confidence: 0.9,
        explanation:
          "Health/medical research cited for unrelated topic. Found 3 off-topic keywords, 0 on-topic keywords.",
      });
    });

    it("activates a domain rule through the configured domain", () => {
      const message = "Lee (2019) showed insulin therapy improves glucose control in diabetes patients.";

      const withDomain = new EvidenceValidator({ domain: "ai_consciousness" });
      expect(withDomain.validateMessage(message, "machine ethics").validations[0]?.confidence).toBe(0.9);

      expect(validator.validateMessage(message, "machine ethics").validations[0]).toMatchObject({
        relevance: EvidenceRelevance.IRRELEVANT,
        confidence: 0.5,
        explanation: "No clear relevance to topic detected",
      });
    });

    it("applies topic-independent rules unless the topic is exempt", () => {
      const message = "Kim (2018) linked diabetes to diet.";

      expect(validator.validateMessage(message, "machine ethics").validations[0]).toMatchObject({
        relevance: EvidenceRelevance.IRRELEVANT,
        confidence: 0.95,
        explanation: "Diabetes research cited for unrelated topic. Found 1 off-topic keywords, 0 on-topic keywords.",
      });
      expect(validator.validateMessage(message, "diabetes research").validations[0]).toMatchObject({
        relevance: EvidenceRelevance.MODERATELY_RELEVANT,
        explanation: "Some keyword overlap: diabetes",
      });
    });
  });

  describe("validateMessage", () => {
    it("averages relevance weights across citations", () => {
      const report = validator.validateMessage(`${SUPPORTED} Smith (2030) disagrees.`, TOPIC);

      expect(report.totalCitations).toBe(2);
      expect(report.relevanceSummary).toEqual({
        [EvidenceRelevance.HIGHLY_RELEVANT]: 1,
        [EvidenceRelevance.MODERATELY_RELEVANT]: 0,
        [EvidenceRelevance.TANGENTIALLY_RELATED]: 0,
        [EvidenceRelevance.IRRELEVANT]: 1,
        [EvidenceRelevance.CONTRADICTORY]: 0,
      });
      expect(report.evidenceQualityScore).toBe(0.5);
      expect(report.overallEvidenceQuality).toBe("Low evidence quality with limited relevant citations");
    });

    it("reports messages without citations", () => {
      expect(validator.validateMessage("No references here.", TOPIC)).toEqual(emptyEvidenceReport());
      expect(emptyEvidenceReport().overallEvidenceQuality).toBe("No citations found");
    });

    it("passes the aggregate score through the refiner and clamps it", () => {
      const halving = new EvidenceValidator({ refine: (score) => score / 2 });
      expect(halving.validateMessage(SUPPORTED, TOPIC).evidenceQualityScore).toBe(0.5);

      const inflating = new EvidenceValidator({ refine: (score) => score + 3 });
      expect(inflating.validateMessage(SUPPORTED, TOPIC).evidenceQualityScore).toBe(1);
    });
  });
});
