import { TopicRelevance } from "./types.js";
import type {
  DriftIntervention,
  TopicAnalysis,
  TopicEvolutionSummary,
  TopicHistoryEntry,
  TopicMonitorConfig,
} from "./types.js";
import { PhraseTable, TOPIC_LEXICON, compileFamilies } from "../lexicon/index.js";
import { contentWords, isBlank, truncate, wordCount } from "../text/index.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";

interface RelevanceVerdict {
  relevance: TopicRelevance;
  confidence: number;
  explanation: string;
  suggestedRedirect: string;
}

const DRIFT_LEVELS: ReadonlySet<TopicRelevance> = new Set([
  TopicRelevance.TOPIC_DRIFT,
  TopicRelevance.COMPLETELY_UNRELATED,
]);

const ON_TOPIC_LEVELS: ReadonlySet<TopicRelevance> = new Set([
  TopicRelevance.HIGHLY_RELEVANT,
  TopicRelevance.MODERATELY_RELEVANT,
]);

/**
 * Zero-signal analysis that leaves the drift counter alone.
 */
export function neutralTopicAnalysis(explanation: string): TopicAnalysis {
  return {
    messageSegment: "",
    detectedTopics: [],
    relevance: TopicRelevance.TANGENTIALLY_RELATED,
    confidence: 0,
    coreMatches: 0,
    driftMatches: {},
    explanation,
    suggestedRedirect: "",
  };
}

// ============================================
// TOPIC COHERENCE MONITOR
// ============================================

/**
 * Tracks drift away from a seed topic for one conversation. Drifting messages
 * raise the drift counter, on-topic messages lower it (floor 0), and
 * intervention fires once the counter reaches the threshold.
 */
export class TopicCoherenceMonitor {
  readonly topic: string;
  private config: Required<TopicMonitorConfig>;
  private logger: Logger;
  private coreKeywords: PhraseTable;
  private driftFamilies: Map<string, PhraseTable>;
  private tangentialFamilies: ReadonlySet<string>;
  private history: TopicHistoryEntry[] = [];
  private driftCount = 0;

  constructor(topic: string, config: TopicMonitorConfig = {}, logger?: Logger) {
    this.topic = topic.trim();
    this.config = {
      driftThreshold: config.driftThreshold ?? 2,
      recentWindow: config.recentWindow ?? 5,
      minSeedWordLength: config.minSeedWordLength ?? 3,
      coreFamilies: config.coreFamilies ?? TOPIC_LEXICON.coreFamilies,
      driftFamilies: config.driftFamilies ?? TOPIC_LEXICON.driftFamilies,
      tangentialFamilies: config.tangentialFamilies ?? TOPIC_LEXICON.tangentialFamilies,
    };
    this.logger = logger ?? getDefaultLogger();
    this.coreKeywords = new PhraseTable("core", this.deriveCoreKeywords());
    this.driftFamilies = compileFamilies(this.config.driftFamilies);
    this.tangentialFamilies = new Set(this.config.tangentialFamilies);
  }

  get currentDriftCount(): number {
    return this.driftCount;
  }

  get coreKeywordList(): string[] {
    return this.coreKeywords.phrases;
  }

  /**
   * Seed content words plus every built-in core family the seed mentions.
   */
  private deriveCoreKeywords(): string[] {
    const keywords = new Set(contentWords(this.topic, this.config.minSeedWordLength));

    for (const [name, family] of Object.entries(this.config.coreFamilies)) {
      const table = new PhraseTable(name, family);
      if (table.has(this.topic)) {
        for (const keyword of table.phrases) keywords.add(keyword);
      }
    }

    return [...keywords];
  }

  // ============================================
  // ANALYSIS
  // ============================================

  analyze(message: string, speaker: string): TopicAnalysis {
    if (isBlank(message)) {
      return neutralTopicAnalysis("Empty message");
    }

    const coreMatches = this.coreKeywords.countPresent(message);
    const driftMatches: Record<string, number> = {};
    const detectedTopics: string[] = [];

    for (const [name, table] of this.driftFamilies) {
      const hits = table.countPresent(message);
      if (hits > 0) {
        detectedTopics.push(name);
        driftMatches[name] = hits;
      }
    }

    const verdict = this.classify(coreMatches, detectedTopics, driftMatches, wordCount(message));

    if (DRIFT_LEVELS.has(verdict.relevance)) {
      this.driftCount += 1;
    } else if (ON_TOPIC_LEVELS.has(verdict.relevance)) {
      this.driftCount = Math.max(0, this.driftCount - 1);
    }

    this.history.push({ speaker, relevance: verdict.relevance, topics: detectedTopics, coreMatches });

    if (DRIFT_LEVELS.has(verdict.relevance)) {
      this.logger.debug("Topic drift observed", {
        speaker,
        relevance: TopicRelevance[verdict.relevance],
        topics: detectedTopics,
        driftCount: this.driftCount,
      });
    }

    return {
      messageSegment: truncate(message, 200),
      detectedTopics,
      coreMatches,
      driftMatches,
      ...verdict,
    };
  }

  private classify(
    coreMatches: number,
    driftTopics: string[],
    driftMatches: Record<string, number>,
    words: number
  ): RelevanceVerdict {
    const scale = Math.max(words / 10, 1);
    const totalDrift = Object.values(driftMatches).reduce((sum, hits) => sum + hits, 0);
    const coreDensity = coreMatches / scale;
    const driftDensity = totalDrift / scale;
    const topics = driftTopics.join(", ");

    if (coreMatches === 0 && totalDrift >= 3) {
      return {
        relevance: TopicRelevance.COMPLETELY_UNRELATED,
        confidence: 0.9,
        explanation: `No core topic keywords found, but ${totalDrift} drift topic matches in: ${topics}`,
        suggestedRedirect: `Please refocus on the original topic: ${this.topic}`,
      };
    }

    if (driftDensity > coreDensity && totalDrift >= 5) {
      return {
        relevance: TopicRelevance.TOPIC_DRIFT,
        confidence: 0.8,
        explanation: `Significant topic drift detected. Core matches: ${coreMatches}, drift matches: ${totalDrift} in: ${topics}`,
        suggestedRedirect: `While ${topics} may be interesting, let's return to discussing ${this.topic}`,
      };
    }

    if (coreMatches >= 3 && totalDrift <= 2) {
      return {
        relevance: TopicRelevance.HIGHLY_RELEVANT,
        confidence: 0.9,
        explanation: `Strong focus on core topic with ${coreMatches} relevant keywords`,
        suggestedRedirect: "",
      };
    }

    if (coreMatches >= 1 && totalDrift <= coreMatches) {
      return {
        relevance: TopicRelevance.MODERATELY_RELEVANT,
        confidence: 0.7,
        explanation: `Moderate relevance with ${coreMatches} core keywords and ${totalDrift} drift matches`,
        suggestedRedirect: "",
      };
    }

    const tangential = driftTopics.some((name) => this.tangentialFamilies.has(name));
    if (coreMatches >= 1 || (totalDrift > 0 && tangential)) {
      return {
        relevance: TopicRelevance.TANGENTIALLY_RELATED,
        confidence: 0.6,
        explanation: `Tangentially related with ${coreMatches} core matches and focus on: ${topics}`,
        suggestedRedirect: `Consider connecting ${topics} back to the main discussion of ${this.topic}`,
      };
    }

    // Nothing ties the message to the core topic, with or without drift vocabulary
    return {
      relevance: TopicRelevance.TOPIC_DRIFT,
      confidence: 0.7,
      explanation:
        totalDrift > 0
          ? `Topic drift detected with ${totalDrift} matches in: ${topics}`
          : "Topic drift detected: no core topic keywords found",
      suggestedRedirect: `Let's refocus on the core question about ${this.topic}`,
    };
  }

  // ============================================
  // INTERVENTION & SUMMARY
  // ============================================

  shouldIntervene(): DriftIntervention {
    if (this.driftCount < this.config.driftThreshold) {
      return { intervene: false, message: "" };
    }

    const recent = this.history.slice(-this.config.recentWindow).flatMap((entry) => entry.topics);
    const focus = mostFrequent(recent) ?? "unrelated topics";

    return {
      intervene: true,
      message:
        `Significant topic drift detected (${this.driftCount} instances). ` +
        `Recent focus on: ${focus}. ` +
        `Please return to discussing ${this.topic}.`,
    };
  }

  evolutionSummary(): TopicEvolutionSummary {
    const relevanceDistribution: Record<string, number> = {};
    const topicFrequency = new Map<string, number>();

    for (const entry of this.history) {
      const label = TopicRelevance[entry.relevance];
      relevanceDistribution[label] = (relevanceDistribution[label] ?? 0) + 1;
      for (const topic of entry.topics) {
        topicFrequency.set(topic, (topicFrequency.get(topic) ?? 0) + 1);
      }
    }

    return {
      totalMessagesAnalyzed: this.history.length,
      currentDriftCount: this.driftCount,
      relevanceDistribution,
      mostDiscussedDriftTopics: [...topicFrequency.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, 3)
        .map(([topic, count]) => ({ topic, count })),
      driftInterventionNeeded: this.driftCount >= this.config.driftThreshold,
    };
  }

  /**
   * Plain-text block to append to the next generation request; empty unless
   * an intervention is due.
   */
  refocusGuidance(): string {
    const intervention = this.shouldIntervene();
    if (!intervention.intervene) return "";

    const driftTopics = this.evolutionSummary().mostDiscussedDriftTopics.map((entry) => entry.topic);

    return [
      "TOPIC COHERENCE WARNING:",
      intervention.message,
      "",
      `Recent drift topics: ${driftTopics.join(", ")}`,
      `Core topic: ${this.topic}`,
      "",
      "REFOCUS INSTRUCTIONS:",
      "- Acknowledge any insights from tangential topics briefly",
      `- Explicitly connect discussion back to ${this.topic}`,
      "- Ask questions that center on the core topic",
      "- Avoid introducing new unrelated subjects",
    ].join("\n");
  }
}

/**
 * Most frequent value; ties go to the value seen first.
 */
function mostFrequent(values: readonly string[]): string | undefined {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}
