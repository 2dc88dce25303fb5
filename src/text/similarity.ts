import { normalizeForMatching, wordSet } from "./normalize.js";

// ============================================
// LEXICAL SIMILARITY
// ============================================

/**
 * A `(text, text) -> [0, 1]` similarity measure.
 */
export type SimilarityFn = (a: string, b: string) => number;

export const DEFAULT_SIMILARITY_THRESHOLD = 0.3;

/**
 * Word-set Jaccard overlap. Empty inputs score 0.
 */
export const jaccardSimilarity: SimilarityFn = (a, b) => {
  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  const union = wordsA.size + wordsB.size - intersection;
  return union > 0 ? intersection / union : 0;
};

/**
 * True when `needle` appears verbatim in `haystack` (case-insensitive) or the
 * similarity score reaches the threshold.
 */
export function isSimilarText(
  needle: string,
  haystack: string,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
  similarity: SimilarityFn = jaccardSimilarity
): boolean {
  const normalizedNeedle = normalizeForMatching(needle).trim();
  if (normalizedNeedle.length > 0 && normalizeForMatching(haystack).includes(normalizedNeedle)) {
    return true;
  }
  return similarity(needle, haystack) >= threshold;
}
