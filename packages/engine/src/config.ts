import type { StrategyConfig } from "./types";

/** Partial override: any section may be given, each one only partly. */
export type StrategyConfigOverrides = {
  [K in keyof StrategyConfig]?: Partial<StrategyConfig[K]>;
};

/**
 * Deep-merge partial overrides into a base config.
 *
 * Every StrategyConfig section is a plain object, so a shallow
 * `{ ...base, ...partial }` would drop sibling fields — e.g.
 *   { time: { baseSearchMs: 50 } }
 * would wipe out time.clockShare. Each section is spread-merged instead.
 */
export function mergeConfig(
  base: StrategyConfig,
  partial: StrategyConfigOverrides | undefined
): StrategyConfig {
  if (!partial) return base;

  return {
    time: { ...base.time, ...partial.time },
    draws: { ...base.draws, ...partial.draws },
    oracle: { ...base.oracle, ...partial.oracle },
  };
}

/**
 * Default strategy configuration.
 *
 * The oracle path here is only a placeholder; the harness resolves the
 * real one (flag, environment, platform default) and passes it in.
 */
export const DEFAULT_CONFIG: StrategyConfig = {
  // --- Time budget ---
  // 100ms per candidate, never more than 10% of the clock per decision
  time: {
    baseSearchMs: 100,
    clockShare: 0.1,
    safetyMarginMs: 10,
    minDeadlineMs: 1,
  },

  // --- Draw seeking ---
  // 0.1 pawns = 10 centipawns
  draws: {
    threshold: 0.1,
  },

  // --- Oracle ---
  oracle: {
    path: "stockfish/stockfish",
  },
};
