import type { Score } from "./types";

/** Magnitude used for mate scores, same convention as the UCI adapters. */
export const MATE_SCORE = 30000;

/**
 * Put a score on one numeric scale.
 *
 *   cp n          → n
 *   mate n (n>0)  → 30000 − n   (faster mate ranks higher)
 *   mate n (n≤0)  → −30000 − n  (being mated sooner ranks lower)
 */
export function scoreToCentipawns(score: Score): number {
  if (score.type === "cp") return score.value;
  return score.value > 0
    ? MATE_SCORE - score.value
    : -MATE_SCORE - score.value;
}

/** Negative when `a` is worse than `b` for the side to move, 0 when exactly equal. */
export function compareScores(a: Score, b: Score): number {
  return scoreToCentipawns(a) - scoreToCentipawns(b);
}

/** "+0.35", "-1.20", "#3", "#-2" */
export function formatScore(score: Score): string {
  if (score.type === "mate") return `#${score.value}`;
  const pawns = score.value / 100;
  return `${pawns >= 0 ? "+" : ""}${pawns.toFixed(2)}`;
}
