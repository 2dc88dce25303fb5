import type { GuidanceBundle } from "./types.js";
import type { RehashWarning } from "../ledger/index.js";
import { truncate } from "../text/index.js";

export function describeRehashWarning(warning: RehashWarning): string {
  switch (warning.kind) {
    case "settled_claim":
      return warning.settledRound === undefined
        ? `Settled claim raised again: "${truncate(warning.claimText, 80)}"`
        : `Settled claim raised again (settled in round ${warning.settledRound}): "${truncate(warning.claimText, 80)}"`;
    case "excessive_claim":
      return `Claim repeated ${warning.rehashCount} times: "${truncate(warning.claimText, 80)}". ${warning.suggestion}`;
    case "repetitive_question":
      return warning.suggestion;
  }
}

function section(title: string, items: readonly string[]): string[] {
  return items.length > 0 ? [title, ...items.map((item) => `- ${item}`), ""] : [];
}

/**
 * Render a guidance bundle as plain text; empty sections are left out.
 */
export function renderGuidance(bundle: GuidanceBundle): string {
  const lines = [
    ...section("SETTLED POINTS (do not reopen):", bundle.settledResolutions),
    ...section("ACTIVE CLAIMS:", bundle.activeClaims),
    ...section("WARNINGS:", bundle.warnings),
    ...section("SUGGESTIONS:", bundle.suggestions),
    `NEXT STEP: ${bundle.nextStep}`,
  ];

  if (bundle.refocus.length > 0) {
    lines.push("", bundle.refocus);
  }

  return lines.join("\n");
}
