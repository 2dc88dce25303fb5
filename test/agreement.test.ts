import { describe, it, expect } from "vitest";
import { AgreementClassifier, AgreementLevel, neutralAgreement } from "../src/agreement/index.js";

describe("AgreementClassifier", () => {
  const classifier = new AgreementClassifier();

  describe("analyze", () => {
    it("treats a stop token as strong agreement", () => {
      const analysis = classifier.analyze("<stop>");
      expect(analysis.level).toBe(AgreementLevel.STRONG_AGREEMENT);
      expect(analysis.confidence).toBe(0.95);
      expect(analysis.shouldContinue).toBe(false);
    });

    it("needs two strong agreement phrases for the highest confidence", () => {
      expect(classifier.analyze("You're absolutely right, that settles it.")).toMatchObject({
        level: AgreementLevel.STRONG_AGREEMENT,
        confidence: 0.95,
      });
      expect(classifier.analyze("I'm fully convinced.")).toMatchObject({
        level: AgreementLevel.STRONG_AGREEMENT,
        confidence: 0.9,
        shouldContinue: false,
      });
    });

    it("detects strong disagreement", () => {
      const analysis = classifier.analyze("I strongly disagree. This is wrong, and I reject the premise.");
      expect(analysis.signals.disagreement).toBe(3);
      expect(analysis.level).toBe(AgreementLevel.STRONG_DISAGREEMENT);
      expect(analysis.confidence).toBe(0.9);
    });

    it("keeps debating when a polite opener is followed by open questions", () => {
      const message =
        "I agree with your framing. Could you explain the mechanism? Why would it generalize? What data supports it?";

      const analysis = classifier.analyze(message);

      expect(analysis.signals).toMatchObject({ agreement: 1, questions: 5, continuation: 1, reservation: 0 });
      expect(analysis.level).toBe(AgreementLevel.DISAGREEMENT);
      expect(analysis.confidence).toBe(0.85);
      expect(classifier.shouldEnd(message)).toEqual({
        shouldEnd: false,
        reason: "Debate continues - Wants to continue debating: 0 reservations, 5 questions, 1 continuation signals",
      });
    });

    it("classifies agreement mixed with reservations", () => {
      const analysis = classifier.analyze("That makes sense, however I have doubts.");
      expect(analysis.level).toBe(AgreementLevel.MIXED_RESPONSE);
      expect(analysis.confidence).toBe(0.7);
      expect(analysis.explanation).toBe("Mixed response with 1 agreement and 2 reservation signals");
    });

    it("classifies repeated agreement without reservations as leaning", () => {
      expect(classifier.analyze("I agree, that makes sense.")).toMatchObject({
        level: AgreementLevel.LEANING_AGREEMENT,
        confidence: 0.75,
        shouldContinue: true,
      });
    });

    it("classifies plain agreement as final", () => {
      expect(classifier.analyze("I agree with that.")).toMatchObject({
        level: AgreementLevel.AGREEMENT,
        confidence: 0.8,
        shouldContinue: false,
      });
    });

    it("reads continuation phrases as a wish to keep going", () => {
      expect(classifier.analyze("Let's explore the second case.")).toMatchObject({
        level: AgreementLevel.DISAGREEMENT,
        confidence: 0.6,
      });
    });

    it("falls back to a mixed response when nothing matches", () => {
      expect(classifier.analyze("The weather is pleasant.")).toMatchObject({
        level: AgreementLevel.MIXED_RESPONSE,
        confidence: 0.5,
        shouldContinue: true,
        explanation: "Mixed response with 0 agreement and 0 reservation signals",
      });
    });

    it("only matches whole words", () => {
      expect(classifier.analyze("The butterfly effect is interesting.").signals.reservation).toBe(0);
    });

    it("reports message statistics", () => {
      expect(classifier.analyze("I agree. Fully. ").messageStats).toEqual({ sentences: 2, words: 3 });
    });

    it("returns the neutral analysis for blank input", () => {
      expect(classifier.analyze("   ")).toEqual({
        level: AgreementLevel.MIXED_RESPONSE,
        confidence: 0.5,
        shouldContinue: true,
        explanation: "Unable to determine agreement level clearly",
        signals: {
          disagreement: 0,
          reservation: 0,
          continuation: 0,
          questions: 0,
          agreement: 0,
          strongAgreement: 0,
          stop: 0,
        },
        messageStats: { sentences: 0, words: 0 },
      });
    });
  });

  describe("shouldEnd", () => {
    it("ends on agreement", () => {
      expect(classifier.shouldEnd("I agree with that.")).toEqual({
        shouldEnd: true,
        reason: "Agreement reached - Agreement with 1 agreement signals and minimal reservations",
      });
      expect(classifier.shouldEnd("<stop>")).toEqual({
        shouldEnd: true,
        reason: "Agreement reached - Strong agreement with 0 strong agreement signals and 1 stop signals",
      });
    });

    it("reports other stops as a concluded conversation", () => {
      const analysis = { ...neutralAgreement("parties walked away"), shouldContinue: false };
      expect(classifier.endDecision(analysis)).toEqual({
        shouldEnd: true,
        reason: "Conversation concluded - parties walked away",
      });
    });
  });
});
