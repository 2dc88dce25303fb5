import type { CompiledPhrase, MatchMode, PhraseTableOptions } from "./types.js";
import { normalizeForMatching } from "../text/normalize.js";

// ============================================
// PHRASE TABLE
// ============================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build a word-bounded pattern for a literal phrase. Boundaries are only
 * added next to word characters so phrases like "<stop>" still match.
 */
export function compilePhrase(phrase: string, mode: MatchMode = "phrase"): CompiledPhrase {
  if (mode === "pattern") {
    return { source: phrase, pattern: new RegExp(phrase, "gi") };
  }

  const normalized = normalizeForMatching(phrase.trim());
  const start = /^\w/.test(normalized) ? "\\b" : "";
  const end = /\w$/.test(normalized) ? "\\b" : "";
  return {
    source: normalized,
    pattern: new RegExp(`${start}${escapeRegExp(normalized)}${end}`, "gi"),
  };
}

/**
 * A named list of phrases compiled once and matched many times.
 */
export class PhraseTable {
  readonly name: string;
  readonly weight: number;
  private readonly entries: CompiledPhrase[];

  constructor(name: string, sources: readonly string[], options: PhraseTableOptions = {}) {
    const mode = options.mode ?? "phrase";
    this.name = name;
    this.weight = options.weight ?? 1;
    this.entries = sources
      .filter((source) => source.trim().length > 0)
      .map((source) => compilePhrase(source, mode));
  }

  get size(): number {
    return this.entries.length;
  }

  get phrases(): string[] {
    return this.entries.map((entry) => entry.source);
  }

  /**
   * Total non-overlapping occurrences of every phrase.
   */
  countOccurrences(text: string): number {
    const normalized = normalizeForMatching(text);
    let count = 0;
    for (const entry of this.entries) {
      count += normalized.match(entry.pattern)?.length ?? 0;
    }
    return count;
  }

  /**
   * Number of distinct phrases present at least once.
   */
  countPresent(text: string): number {
    return this.matches(text).length;
  }

  /**
   * Distinct phrases present in the text, in table order.
   */
  matches(text: string): string[] {
    const normalized = normalizeForMatching(text);
    return this.entries
      .filter((entry) => normalized.search(entry.pattern) >= 0)
      .map((entry) => entry.source);
  }

  has(text: string): boolean {
    const normalized = normalizeForMatching(text);
    return this.entries.some((entry) => normalized.search(entry.pattern) >= 0);
  }

  /**
   * Weighted presence score: distinct matches times the table weight.
   */
  score(text: string): number {
    return this.countPresent(text) * this.weight;
  }
}

/**
 * Compile a record of keyword lists into named tables, keeping key order.
 */
export function compileFamilies(
  families: Readonly<Record<string, readonly string[]>>
): Map<string, PhraseTable> {
  const tables = new Map<string, PhraseTable>();
  for (const [name, keywords] of Object.entries(families)) {
    tables.set(name, new PhraseTable(name, keywords));
  }
  return tables;
}
