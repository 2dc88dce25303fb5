import { describe, it, expect, vi } from "vitest";
import { MaturityAssessor, stageForScore } from "../src/metrics/index.js";

describe("stageForScore", () => {
  it("maps score bands to stages", () => {
    expect(stageForScore(0.24)).toBe("exploration");
    expect(stageForScore(0.25)).toBe("refinement");
    expect(stageForScore(0.5)).toBe("convergence");
    expect(stageForScore(0.75)).toBe("consensus");
  });
});

describe("MaturityAssessor", () => {
  it("scores an empty history as zero", () => {
    const assessment = new MaturityAssessor().assess(0);

    expect(assessment).toEqual({
      score: 0,
      heuristicScore: 0,
      refined: false,
      stage: "exploration",
      factors: {
        roundProgression: 0,
        lengthConvergence: 0,
        technicalDensity: 0,
        statementRatio: 0,
        agreementIndicators: 0,
      },
    });
  });

  it("combines the heuristic factors", () => {
    const refine = vi.fn((score: number) => score);
    const assessor = new MaturityAssessor({}, refine);
    assessor.trackMessage("I agree with this approach.");

    const assessment = assessor.assess(3);

    expect(assessment.factors.roundProgression).toBeCloseTo(0.06);
    expect(assessment.factors.lengthConvergence).toBe(0);
    expect(assessment.factors.technicalDensity).toBeCloseTo(0.03125);
    expect(assessment.factors.statementRatio).toBeCloseTo(0.15);
    expect(assessment.factors.agreementIndicators).toBeCloseTo(0.1 / 3);
    expect(assessment.heuristicScore).toBeCloseTo(0.27458);
    expect(assessment.refined).toBe(false);
    expect(assessment.stage).toBe("refinement");
    expect(refine).not.toHaveBeenCalled();
  });

  it("blends in the refiner on scheduled rounds", () => {
    const assessor = new MaturityAssessor({}, () => 1);
    assessor.trackMessage("I agree with this approach.");

    const assessment = assessor.assess(5);

    expect(assessment.refined).toBe(true);
    expect(assessment.score).toBeCloseTo(assessment.heuristicScore * 0.7 + 0.3);
    expect(assessor.currentScore).toBe(assessment.score);
  });

  it("rewards messages of similar length", () => {
    const assessor = new MaturityAssessor();
    for (let i = 0; i < 4; i++) assessor.trackMessage("Same length.");

    expect(assessor.calculateFactors(1).lengthConvergence).toBeCloseTo(0.2);
  });
});
