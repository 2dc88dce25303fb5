import type { ScoreRefiner } from "./types.js";

export const identityRefiner: ScoreRefiner = (score) => score;

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.min(1, Math.max(0, score));
}
