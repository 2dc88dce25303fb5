// ============================================
// TOPIC COHERENCE TYPES
// ============================================

/**
 * Ordinal relevance of a message to the seed topic; higher means further away.
 */
export enum TopicRelevance {
  HIGHLY_RELEVANT = 1, // Directly on the seed topic
  MODERATELY_RELEVANT = 2, // Related, with some side material
  TANGENTIALLY_RELATED = 3, // Loosely connected
  TOPIC_DRIFT = 4, // Significant movement away from the topic
  COMPLETELY_UNRELATED = 5, // No connection to the topic
}

export interface TopicAnalysis {
  messageSegment: string; // First 200 characters of the message
  detectedTopics: string[]; // Drift families present in the message
  relevance: TopicRelevance;
  confidence: number; // 0-1
  coreMatches: number;
  driftMatches: Record<string, number>; // Hits per drift family
  explanation: string;
  suggestedRedirect: string; // Empty when no redirect is needed
}

export interface DriftIntervention {
  intervene: boolean;
  message: string;
}

export interface TopicHistoryEntry {
  speaker: string;
  relevance: TopicRelevance;
  topics: string[];
  coreMatches: number;
}

export interface TopicEvolutionSummary {
  totalMessagesAnalyzed: number;
  currentDriftCount: number;
  relevanceDistribution: Record<string, number>; // Analyses per relevance name
  mostDiscussedDriftTopics: Array<{ topic: string; count: number }>; // Top 3
  driftInterventionNeeded: boolean;
}

export interface TopicMonitorConfig {
  driftThreshold?: number; // Drift count that triggers intervention (default: 2)
  recentWindow?: number; // Analyses inspected when naming the drift family (default: 5)
  minSeedWordLength?: number; // Seed words at or below this length are not keywords (default: 3)
  coreFamilies?: Readonly<Record<string, readonly string[]>>; // Added when the seed mentions them
  driftFamilies?: Readonly<Record<string, readonly string[]>>;
  tangentialFamilies?: readonly string[]; // Drift families that count as tangential rather than drift
}
