// ============================================
// LEXICON MODULE EXPORTS
// ============================================
export { PhraseTable, compilePhrase, compileFamilies } from "./phrase-table.js";
export {
  AGREEMENT_LEXICON,
  LEDGER_LEXICON,
  TOPIC_LEXICON,
  CONCLUSION_LEXICON,
  COVERAGE_FAMILIES,
  EVIDENCE_LEXICON,
  DEFAULT_DOMAIN_RULES,
  MATURITY_LEXICON,
} from "./tables.js";
export type { DomainRuleDefinition } from "./tables.js";
export type {
  MatchMode,
  PhraseTableOptions,
  CompiledPhrase,
  QuestionBucketRule,
} from "./types.js";
