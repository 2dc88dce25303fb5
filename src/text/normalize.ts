import stopWordList from "../lexicon/data/stopwords.json" with { type: "json" };

// ============================================
// TEXT NORMALIZATION
// ============================================
const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Lowercase text and fold typographic quotes so lexicon phrases such as
 * "don't" match messages written with curly apostrophes.
 */
export function normalizeForMatching(text: string): string {
  return text.toLowerCase().replace(/[‘’ʼ]/g, "'").replace(/[“”]/g, '"');
}

/**
 * Split text into lowercase word tokens with leading/trailing punctuation removed.
 */
export function tokenize(text: string): string[] {
  return normalizeForMatching(text)
    .split(/\s+/)
    .map((token) => token.replace(/^[^\w]+|[^\w]+$/g, ""))
    .filter((token) => token.length > 0);
}

export function wordSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

/**
 * Whitespace-delimited word count of the raw text.
 */
export function wordCount(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word);
}

/**
 * Tokens worth keeping as topic keywords: not a stop word and longer than `minLength`.
 */
export function contentWords(text: string, minLength: number = 0): string[] {
  return tokenize(text).filter((word) => word.length > minLength && !isStopWord(word));
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function isBlank(text: string | undefined | null): boolean {
  return typeof text !== "string" || text.trim().length === 0;
}
