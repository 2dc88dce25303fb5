#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { ControllerRegistry, ReportStorePlugin } from "./controller/index.js";
import type { QualityPlugin } from "./controller/index.js";
import { loadConfig } from "./config/config.js";
import { createLogger, parseLogLevel, setDefaultLogger, toError } from "./logger/index.js";
import type { AppLogger } from "./logger/index.js";
import { parseTranscript, replayTranscript } from "./replay/transcript.js";

// ============================================
// REPLAY CLI
// ============================================
let logger: AppLogger | null = null;
let registry: ControllerRegistry | null = null;

async function cleanup(): Promise<void> {
  if (registry) {
    await registry.cleanup();
  }
  if (logger) {
    await logger.close();
  }
}

process.on("SIGINT", () => {
  console.log("\n[Shutdown] Received SIGINT, cleaning up...");
  cleanup()
    .catch((error: unknown) => console.error("[Shutdown] Cleanup failed", error))
    .finally(() => process.exit(0));
});

function usage(): string {
  return "Usage: quality-replay <transcript.json> [--persist] [--keep-going]";
}

/**
 * Replay a transcript file through the quality engine and log each decision.
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const file = args.find((arg) => !arg.startsWith("--"));
  if (!file) {
    console.error(usage());
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();

  logger = createLogger({
    logDir: config.logDir,
    level: parseLogLevel(config.logLevel),
    enableConsole: true,
    enableFile: true,
  });
  await logger.initialize();
  setDefaultLogger(logger);

  const transcript = parseTranscript(JSON.parse(await readFile(file, "utf8")));

  const plugins: QualityPlugin[] = [];
  if (config.persistReports || args.includes("--persist")) {
    plugins.push(new ReportStorePlugin(config.qualityDbPath));
  }

  registry = new ControllerRegistry({
    controller: {
      ledger: { rehashThreshold: config.rehashThreshold },
      topic: { driftThreshold: config.driftThreshold },
      evidence: { knowledgeCutoffYear: config.knowledgeCutoffYear },
    },
    plugins,
  });
  await registry.initialize();

  logger.info("Replaying transcript", {
    file,
    topic: transcript.topic,
    messages: transcript.messages.length,
  });

  const result = await replayTranscript(registry, transcript, { stopOnEnd: !args.includes("--keep-going") });

  for (const decision of result.decisions) {
    logger.info(`Round ${decision.round} (${decision.speaker})`, {
      shouldContinue: decision.shouldContinue,
      reason: decision.reason,
      nextStep: decision.guidance.nextStep,
      warnings: decision.guidance.warnings,
    });
  }

  const last = result.decisions[result.decisions.length - 1];
  logger.info("Replay finished", {
    decisions: result.decisions.length,
    stoppedEarly: result.stoppedEarly,
    finalReason: last?.reason,
    progress: result.ledger.progressSummary.progressPercentage,
  });
}

main()
  .catch((error: unknown) => {
    const err = toError(error);
    if (logger) {
      logger.error("Replay failed", err);
    } else {
      console.error("Replay failed:", err.message);
    }
    process.exitCode = 1;
  })
  .then(() => cleanup())
  .catch((error: unknown) => {
    console.error("Cleanup failed:", toError(error).message);
    process.exitCode = 1;
  });
