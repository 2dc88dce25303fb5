import { ConversationController } from "./conversation-controller.js";
import type { ControllerConfig, ConversationSeed, InboundMessage, QualityDecision, QualityPlugin } from "./types.js";
import { AgreementClassifier } from "../agreement/index.js";
import type { LedgerExport } from "../ledger/index.js";
import { getDefaultLogger, toError } from "../logger/index.js";

export interface ControllerRegistryConfig {
  controller?: ControllerConfig; // Applied to every controller the registry creates
  plugins?: QualityPlugin[];
}

// ============================================
// CONTROLLER REGISTRY
// ============================================

/**
 * Owns one {@link ConversationController} per conversation id. Calls for the
 * same id run one at a time on a promise chain; different ids never wait on
 * each other.
 */
export class ControllerRegistry {
  private controllerConfig: ControllerConfig;
  private controllers: Map<string, ConversationController> = new Map();
  private queues: Map<string, Promise<void>> = new Map();
  private ending: Set<string> = new Set();
  private plugins: Map<string, QualityPlugin> = new Map();
  private classifier = new AgreementClassifier();
  private logger = getDefaultLogger();

  constructor(config: ControllerRegistryConfig = {}) {
    this.controllerConfig = config.controller ?? {};

    for (const plugin of config.plugins ?? []) {
      this.registerPlugin(plugin);
    }
  }

  get size(): number {
    return this.controllers.size;
  }

  // ============================================
  // PLUGIN MANAGEMENT
  // ============================================

  registerPlugin(plugin: QualityPlugin): void {
    this.plugins.set(plugin.name, plugin);
    this.logger.info("Plugin registered", { pluginName: plugin.name, version: plugin.version });
  }

  getPlugin(name: string): QualityPlugin | undefined {
    return this.plugins.get(name);
  }

  /**
   * Initialize every registered plugin. A failing plugin is logged and skipped.
   */
  async initialize(): Promise<void> {
    await this.notifyPlugins("initialize", (plugin) => plugin.initialize?.());
  }

  // ============================================
  // CONVERSATIONS
  // ============================================

  async open(conversationId: string, seed: ConversationSeed): Promise<ConversationController> {
    if (this.controllers.has(conversationId)) {
      throw new Error(`Conversation already open: ${conversationId}`);
    }

    const controller = new ConversationController(conversationId, seed, this.controllerConfig, {
      classifier: this.classifier,
      logger: this.logger,
    });
    this.controllers.set(conversationId, controller);

    await this.enqueue(conversationId, () =>
      this.notifyPlugins("onConversationStarted", (plugin) => plugin.onConversationStarted?.(conversationId, seed))
    );
    return controller;
  }

  get(conversationId: string): ConversationController | undefined {
    return this.controllers.get(conversationId);
  }

  has(conversationId: string): boolean {
    return this.controllers.has(conversationId) && !this.ending.has(conversationId);
  }

  process(conversationId: string, message: InboundMessage): Promise<QualityDecision> {
    const controller = this.controllers.get(conversationId);
    if (!controller) {
      return Promise.reject(new Error(`Unknown conversation: ${conversationId}`));
    }
    if (this.ending.has(conversationId)) {
      return Promise.reject(new Error(`Conversation is ending: ${conversationId}`));
    }

    return this.enqueue(conversationId, async () => {
      const decision = controller.process(message);
      await this.notifyPlugins("onDecision", (plugin) => plugin.onDecision?.(decision));
      return decision;
    });
  }

  /**
   * Close a conversation after its queued calls finish and return its final ledger.
   * Calls made after this one are rejected straight away.
   */
  end(conversationId: string): Promise<LedgerExport> {
    const controller = this.controllers.get(conversationId);
    if (!controller) {
      return Promise.reject(new Error(`Unknown conversation: ${conversationId}`));
    }
    if (this.ending.has(conversationId)) {
      return Promise.reject(new Error(`Conversation is ending: ${conversationId}`));
    }
    this.ending.add(conversationId);

    return this.enqueue(conversationId, async () => {
      const ledger = controller.exportLedger();
      this.controllers.delete(conversationId);
      this.queues.delete(conversationId);
      this.ending.delete(conversationId);
      await this.notifyPlugins("onConversationEnded", (plugin) =>
        plugin.onConversationEnded?.(conversationId, ledger)
      );
      this.logger.info("Conversation ended", {
        conversationId,
        rounds: ledger.metadata.currentRound,
        claims: ledger.metadata.totalClaims,
        resolutions: ledger.metadata.totalResolutions,
      });
      return ledger;
    });
  }

  async cleanup(): Promise<void> {
    await Promise.all(this.queues.values());
    await this.notifyPlugins("cleanup", (plugin) => plugin.cleanup?.());
    this.controllers.clear();
    this.queues.clear();
    this.ending.clear();
  }

  // ============================================
  // HELPERS
  // ============================================

  private enqueue<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(conversationId) ?? Promise.resolve();
    const next = previous.then(task);
    // The caller receives failures through `next`; the chain only tracks completion
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    if (this.controllers.has(conversationId)) {
      this.queues.set(conversationId, settled);
    }
    return next;
  }

  /**
   * Run a hook on every plugin; plugin failures are logged, never rethrown.
   */
  private async notifyPlugins(
    hook: keyof QualityPlugin,
    invoke: (plugin: QualityPlugin) => Promise<void> | undefined
  ): Promise<void> {
    for (const plugin of this.plugins.values()) {
      try {
        await invoke(plugin);
      } catch (error) {
        this.logger.warn("Plugin handler error", {
          pluginName: plugin.name,
          method: hook,
          error: toError(error).message,
        });
      }
    }
  }
}
