// ============================================
// TOPIC MODULE EXPORTS
// ============================================
export { TopicCoherenceMonitor, neutralTopicAnalysis } from "./topic-coherence-monitor.js";
export { TopicRelevance } from "./types.js";
export type {
  TopicAnalysis,
  DriftIntervention,
  TopicHistoryEntry,
  TopicEvolutionSummary,
  TopicMonitorConfig,
} from "./types.js";
