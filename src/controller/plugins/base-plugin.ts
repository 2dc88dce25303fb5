// ============================================
// BASE PLUGIN
// ============================================

import type { QualityDecision, QualityPlugin } from "../types.js";

/**
 * Base class for quality plugins.
 *
 * `onDecision` forwards only the decisions worth reacting to: drift
 * interventions go to {@link onDriftIntervention}, stop decisions to
 * {@link onStop}. Ordinary "continue" decisions are ignored unless a
 * subclass overrides `onDecision` itself.
 */
export abstract class BaseQualityPlugin implements QualityPlugin {
  abstract name: string;
  version?: string;

  async onDecision(decision: QualityDecision): Promise<void> {
    if (decision.intervention.intervene) {
      await this.onDriftIntervention(decision);
    }
    if (!decision.shouldContinue) {
      await this.onStop(decision);
    }
  }

  protected async onDriftIntervention(_decision: QualityDecision): Promise<void> {
    // Default: nothing to do
  }

  protected async onStop(_decision: QualityDecision): Promise<void> {
    // Default: nothing to do
  }
}
