// ============================================
// CONTROLLER MODULE EXPORTS
// ============================================
export { ConversationController } from "./conversation-controller.js";
export type { ControllerDependencies } from "./conversation-controller.js";
export { ControllerRegistry } from "./registry.js";
export type { ControllerRegistryConfig } from "./registry.js";
export { renderGuidance, describeRehashWarning } from "./guidance.js";
export { BaseQualityPlugin, ReportStorePlugin } from "./plugins/index.js";
export type {
  ConversationSeed,
  InboundMessage,
  GuidanceBundle,
  QualityStep,
  QualityDecision,
  ControllerConfig,
  QualityPlugin,
} from "./types.js";
