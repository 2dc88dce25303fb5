// ============================================
// PUBLIC API
// ============================================
export * from "./lexicon/index.js";
export * from "./text/index.js";
export * from "./ledger/index.js";
export * from "./agreement/index.js";
export * from "./topics/index.js";
export * from "./conclusion/index.js";
export * from "./evidence/index.js";
export * from "./metrics/index.js";
export * from "./controller/index.js";
export * from "./memory/index.js";
export * from "./logger/index.js";
export { loadConfig } from "./config/config.js";
export type { Config } from "./config/config.js";
export { parseTranscript, replayTranscript } from "./replay/transcript.js";
export type { Transcript, ReplayOptions, ReplayResult } from "./replay/transcript.js";
