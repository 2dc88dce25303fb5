import type { ControllerRegistry, InboundMessage, QualityDecision } from "../controller/index.js";
import type { LedgerExport } from "../ledger/index.js";

// ============================================
// TRANSCRIPT REPLAY
// ============================================

export interface Transcript {
  topic: string;
  domain?: string;
  messages: InboundMessage[];
}

export interface ReplayResult {
  conversationId: string;
  decisions: QualityDecision[];
  stoppedEarly: boolean; // A decision said stop before the transcript ran out
  ledger: LedgerExport;
}

export interface ReplayOptions {
  conversationId?: string;
  stopOnEnd?: boolean; // Stop at the first decision that ends the exchange (default: true)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseMessage(value: unknown, index: number): InboundMessage {
  if (!isRecord(value)) {
    throw new Error(`messages[${index}] must be an object`);
  }

  const { speaker, text, round } = value;
  if (typeof speaker !== "string" || speaker.trim() === "") {
    throw new Error(`messages[${index}].speaker must be a non-empty string`);
  }
  if (typeof text !== "string") {
    throw new Error(`messages[${index}].text must be a string`);
  }
  if (round !== undefined && (typeof round !== "number" || !Number.isSafeInteger(round) || round < 1)) {
    throw new Error(`messages[${index}].round must be a positive integer`);
  }

  return round === undefined ? { speaker, text } : { speaker, text, round };
}

/**
 * Validate parsed JSON of the form `{ topic, domain?, messages: [{ speaker, text, round? }] }`.
 */
export function parseTranscript(value: unknown): Transcript {
  if (!isRecord(value)) {
    throw new Error("Transcript must be a JSON object");
  }

  const { topic, domain, messages } = value;
  if (typeof topic !== "string" || topic.trim() === "") {
    throw new Error("Transcript topic must be a non-empty string");
  }
  if (domain !== undefined && typeof domain !== "string") {
    throw new Error("Transcript domain must be a string");
  }
  if (!Array.isArray(messages)) {
    throw new Error("Transcript messages must be an array");
  }

  return {
    topic,
    ...(domain !== undefined && { domain }),
    messages: messages.map((message: unknown, index) => parseMessage(message, index)),
  };
}

/**
 * Feed a transcript through a registry, one message at a time.
 */
export async function replayTranscript(
  registry: ControllerRegistry,
  transcript: Transcript,
  options: ReplayOptions = {}
): Promise<ReplayResult> {
  const conversationId = options.conversationId ?? "replay";
  const stopOnEnd = options.stopOnEnd ?? true;
  const decisions: QualityDecision[] = [];
  let stoppedEarly = false;

  await registry.open(conversationId, { topic: transcript.topic, domain: transcript.domain });

  for (const [index, message] of transcript.messages.entries()) {
    const decision = await registry.process(conversationId, message);
    decisions.push(decision);

    if (stopOnEnd && !decision.shouldContinue) {
      stoppedEarly = index < transcript.messages.length - 1;
      break;
    }
  }

  const ledger = await registry.end(conversationId);
  return { conversationId, decisions, stoppedEarly, ledger };
}
