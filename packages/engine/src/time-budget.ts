import type { RemainingTime, StrategyConfig } from "./types";
import { DEFAULT_CONFIG } from "./config";

export interface SearchBudget {
  /** Time allotted to each candidate before the safety margin */
  perCandidateMs: number;
  /** What the oracle is actually given; always > 0 */
  deadlineMs: number;
  /** True when the clock forced the base time down */
  shrunk: boolean;
}

/**
 * Split a clock reading into a per-candidate oracle deadline.
 *
 * Start from `baseSearchMs` per candidate. On a running clock, if
 * candidateCount × base would spend more than `clockShare` of what is
 * left, give each candidate an equal slice of that share instead.
 * A fixed first-move limit carries no usable clock, so the base time
 * stands unchanged.
 *
 * Precondition: candidateCount ≥ 1 (no legal moves is the caller's problem).
 */
export function allocateSearchTime(
  remaining: RemainingTime,
  candidateCount: number,
  config: Pick<StrategyConfig, "time"> = DEFAULT_CONFIG
): SearchBudget {
  if (!Number.isInteger(candidateCount) || candidateCount < 1) {
    throw new RangeError(
      `candidateCount must be a positive integer, got ${candidateCount}`
    );
  }

  const { baseSearchMs, clockShare, safetyMarginMs, minDeadlineMs } =
    config.time;

  let perCandidateMs = baseSearchMs;
  let shrunk = false;

  if (remaining.type === "clock") {
    const share = remaining.remainingMs * clockShare;
    if (Number.isNaN(share) || candidateCount * baseSearchMs > share) {
      perCandidateMs = share / candidateCount;
      shrunk = true;
    }
  }

  const deadline = perCandidateMs - safetyMarginMs;
  // A flagged or bogus clock would otherwise ask the oracle for zero time
  const deadlineMs =
    Number.isFinite(deadline) && deadline > minDeadlineMs
      ? deadline
      : minDeadlineMs;

  return { perCandidateMs, deadlineMs, shrunk };
}
