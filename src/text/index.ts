// ============================================
// TEXT MODULE EXPORTS
// ============================================
export {
  normalizeForMatching,
  tokenize,
  wordSet,
  wordCount,
  isStopWord,
  contentWords,
  truncate,
  isBlank,
} from "./normalize.js";
export { splitSentences, splitClaimCandidates, splitQuestions } from "./sentences.js";
export {
  jaccardSimilarity,
  isSimilarText,
  DEFAULT_SIMILARITY_THRESHOLD,
} from "./similarity.js";
export type { Sentence, ClaimCandidate } from "./sentences.js";
export type { SimilarityFn } from "./similarity.js";
