// ============================================
// LEXICON TYPES
// ============================================

/**
 * "phrase": literal text matched on word boundaries.
 * "pattern": a regular expression source.
 */
export type MatchMode = "phrase" | "pattern";

export interface PhraseTableOptions {
  mode?: MatchMode; // default: "phrase"
  weight?: number; // Multiplier applied by PhraseTable.score (default: 1)
}

export interface CompiledPhrase {
  source: string;
  pattern: RegExp; // Global, case-insensitive
}

export interface QuestionBucketRule {
  label: string;
  pattern: RegExp;
}
