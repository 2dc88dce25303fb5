import type {
  ControllerConfig,
  ConversationSeed,
  GuidanceBundle,
  InboundMessage,
  QualityDecision,
  QualityStep,
} from "./types.js";
import { describeRehashWarning, renderGuidance } from "./guidance.js";
import { AgreementClassifier, AgreementLevel, neutralAgreement } from "../agreement/index.js";
import type { AgreementAnalysis } from "../agreement/index.js";
import { ConclusionDetector, DebateStage } from "../conclusion/index.js";
import type { ConclusionAnalysis } from "../conclusion/index.js";
import { EvidenceValidator, emptyEvidenceReport } from "../evidence/index.js";
import { ClaimLedger } from "../ledger/index.js";
import type { LedgerExport, RehashWarning, ResolutionType, ResponseAnalysis } from "../ledger/index.js";
import { MaturityAssessor, stageForScore } from "../metrics/index.js";
import type { MaturityAssessment } from "../metrics/index.js";
import { TopicCoherenceMonitor, neutralTopicAnalysis } from "../topics/index.js";
import type { DriftIntervention } from "../topics/index.js";
import { jaccardSimilarity, truncate } from "../text/index.js";
import { getDefaultLogger, toError } from "../logger/index.js";
import type { Logger } from "../logger/index.js";

export interface ControllerDependencies {
  classifier?: AgreementClassifier; // Stateless, may be shared between controllers
  logger?: Logger;
}

// ============================================
// CONVERSATION CONTROLLER
// ============================================

/**
 * Composition root for one conversation: owns its ledger, topic monitor,
 * conclusion detector and maturity assessor and turns every inbound message
 * into a single {@link QualityDecision}.
 *
 * Not safe for concurrent use; {@link ControllerRegistry} serializes calls per id.
 */
export class ConversationController {
  readonly conversationId: string;
  readonly seed: Readonly<ConversationSeed>;
  readonly ledger: ClaimLedger;
  readonly topicMonitor: TopicCoherenceMonitor;
  readonly conclusionDetector: ConclusionDetector;
  readonly maturityAssessor: MaturityAssessor;
  private classifier: AgreementClassifier;
  private validator: EvidenceValidator;
  private logger: Logger;
  private conclusionStopConfidence: number;
  private staleClaimRounds: number;
  private messagesProcessed = 0;

  constructor(
    conversationId: string,
    seed: ConversationSeed,
    config: ControllerConfig = {},
    dependencies: ControllerDependencies = {}
  ) {
    this.conversationId = conversationId;
    this.seed = Object.freeze({ ...seed });
    this.logger = (dependencies.logger ?? getDefaultLogger()).child({ conversationId });
    this.classifier = dependencies.classifier ?? new AgreementClassifier();
    this.conclusionStopConfidence = config.conclusionStopConfidence ?? 0.8;
    this.staleClaimRounds = config.staleClaimRounds ?? 10;

    this.ledger = new ClaimLedger(config.ledger, config.similarity ?? jaccardSimilarity, this.logger);
    this.topicMonitor = new TopicCoherenceMonitor(seed.topic, config.topic, this.logger);
    this.conclusionDetector = new ConclusionDetector(config.conclusion);
    this.maturityAssessor = new MaturityAssessor(config.maturity, config.refine, this.logger);
    this.validator = new EvidenceValidator({ ...config.evidence, domain: seed.domain });

    this.logger.info("Conversation controller created", {
      topic: seed.topic,
      domain: seed.domain,
      coreKeywords: this.topicMonitor.coreKeywordList.length,
    });
  }

  get round(): number {
    return this.ledger.round;
  }

  get messageCount(): number {
    return this.messagesProcessed;
  }

  // ============================================
  // MESSAGE PROCESSING
  // ============================================

  process(message: InboundMessage): QualityDecision {
    const failedSteps: QualityStep[] = [];
    const { speaker, text } = message;
    const round = this.syncRound(message.round);
    this.messagesProcessed += 1;

    const safely = <T>(step: QualityStep, run: () => T, fallback: () => T): T => {
      try {
        return run();
      } catch (error) {
        failedSteps.push(step);
        this.logger.error("Quality step failed", toError(error), { step, round, speaker });
        return fallback();
      }
    };

    const newClaims = safely(
      "claims",
      () => {
        const created = this.ledger.extractClaims(text, speaker);
        this.ledger.abandonStaleClaims(this.staleClaimRounds);
        return created;
      },
      (): string[] => []
    );

    const referencedClaims = safely(
      "responses",
      () => this.ledger.recentClaimIds(speaker, round - 1),
      (): string[] => []
    );
    const responses = safely(
      "responses",
      () => this.ledger.analyzeResponses(text, speaker, referencedClaims),
      (): ResponseAnalysis => ({ agreements: [], challenges: [], evidenceProvided: [], speaker, round })
    );

    const rehashWarnings = safely("rehashing", () => this.ledger.detectRehashing(text), (): RehashWarning[] => []);

    const agreement = safely<AgreementAnalysis>("agreement", () => this.classifier.analyze(text), () =>
      neutralAgreement()
    );
    if (agreement.level <= AgreementLevel.DISAGREEMENT) {
      safely("responses", () => this.ledger.markDisputed(referencedClaims), (): string[] => []);
    }

    const topic = safely("topic", () => this.topicMonitor.analyze(text, speaker), () =>
      neutralTopicAnalysis("Topic analysis unavailable")
    );
    const intervention = safely(
      "topic",
      () => this.topicMonitor.shouldIntervene(),
      (): DriftIntervention => ({ intervene: false, message: "" })
    );

    const conclusion = safely(
      "conclusion",
      () => {
        this.conclusionDetector.analyzeMessage(text, speaker, round);
        return this.conclusionDetector.shouldConclude();
      },
      (): ConclusionAnalysis => ({
        stage: DebateStage.INITIAL_EXPLORATION,
        shouldConclude: false,
        confidence: 0,
        reason: "Conclusion analysis unavailable",
        suggestedAction: "Continue current discussion path",
      })
    );

    const evidence = safely("evidence", () => this.validator.validateMessage(text, this.seed.topic), () =>
      emptyEvidenceReport()
    );

    const maturity = safely(
      "maturity",
      () => {
        this.maturityAssessor.trackMessage(text);
        return this.maturityAssessor.assess(round);
      },
      (): MaturityAssessment => this.neutralMaturity()
    );

    // Stop decision
    const end = this.classifier.endDecision(agreement);
    let shouldContinue = !end.shouldEnd;
    let reason = end.reason;
    if (shouldContinue && conclusion.shouldConclude && conclusion.confidence > this.conclusionStopConfidence) {
      shouldContinue = false;
      reason = `Conclusion detected - ${conclusion.reason}`;
    }

    const guidance = safely(
      "guidance",
      () => this.buildGuidance(shouldContinue, rehashWarnings, intervention, conclusion),
      (): GuidanceBundle => ({
        settledResolutions: [],
        activeClaims: [],
        warnings: [],
        suggestions: [],
        nextStep: shouldContinue ? "Continue current discussion path" : "Conclude the exchange",
        refocus: "",
      })
    );

    const decision: QualityDecision = {
      conversationId: this.conversationId,
      round,
      speaker,
      shouldContinue,
      reason,
      newClaims,
      responses,
      rehashWarnings,
      agreement,
      topic,
      intervention,
      conclusion,
      evidence,
      maturity,
      guidance,
      guidanceText: renderGuidance(guidance),
      failedSteps,
    };

    this.logger.info("Quality decision", {
      round,
      speaker,
      shouldContinue,
      agreement: AgreementLevel[agreement.level],
      relevance: topic.relevance,
      stage: conclusion.stage,
      citations: evidence.totalCitations,
      maturity: Number(maturity.score.toFixed(3)),
      rehashWarnings: rehashWarnings.length,
    });

    return decision;
  }

  /**
   * Advance the ledger to the message's round, or by one when no round is given.
   * An invalid round throws before any analyzer sees the message.
   */
  private syncRound(round: number | undefined): number {
    return round === undefined ? this.ledger.advanceRound() : this.ledger.setRound(round);
  }

  private neutralMaturity(): MaturityAssessment {
    const score = this.maturityAssessor.currentScore;
    return {
      score,
      heuristicScore: score,
      refined: false,
      stage: stageForScore(score),
      factors: {
        roundProgression: 0,
        lengthConvergence: 0,
        technicalDensity: 0,
        statementRatio: 0,
        agreementIndicators: 0,
      },
    };
  }

  // ============================================
  // GUIDANCE
  // ============================================

  private buildGuidance(
    shouldContinue: boolean,
    rehashWarnings: readonly RehashWarning[],
    intervention: DriftIntervention,
    conclusion: ConclusionAnalysis
  ): GuidanceBundle {
    const progression = this.ledger.progressionGuidance();

    const settledResolutions = this.ledger
      .getResolutionPoints()
      .map((resolution) =>
        resolution.agreedByBoth ? resolution.description : `${resolution.description} (agreed to disagree)`
      );

    const activeClaims = this.ledger
      .activeClaims()
      .slice(-5)
      .map((claim) => `${claim.speaker}: ${truncate(claim.text, 120)} [${claim.status}]`);

    const warnings = [
      ...rehashWarnings.map(describeRehashWarning),
      ...(intervention.intervene ? [intervention.message] : []),
      ...progression.warnings,
    ];

    let nextStep: string;
    if (!shouldContinue) {
      nextStep = conclusion.shouldConclude
        ? conclusion.suggestedAction
        : "Summarize the points of agreement and close the exchange";
    } else if (intervention.intervene) {
      nextStep = `Return to the core topic: ${this.seed.topic}`;
    } else {
      nextStep = progression.nextSteps[0] ?? "Continue current discussion path";
    }

    return {
      settledResolutions,
      activeClaims,
      warnings,
      suggestions: progression.suggestions,
      nextStep,
      refocus: this.topicMonitor.refocusGuidance(),
    };
  }

  // ============================================
  // RESOLUTIONS & EXPORT
  // ============================================

  recordResolution(
    description: string,
    type: ResolutionType,
    positionA: string,
    positionB: string,
    agreed: boolean,
    evidence: readonly string[] = []
  ): string {
    return this.ledger.createResolutionPoint(description, type, positionA, positionB, agreed, evidence);
  }

  exportLedger(): LedgerExport {
    return this.ledger.exportStructure();
  }
}
