// --- Strategy contract ---
export { MinimalStrategy } from "./strategy";
export type { StrategyOptions } from "./strategy";
export { NotificationShim } from "./notification-shim";
export type { EngineProtocol, NotificationTarget } from "./notification-shim";

// --- Policies ---
export { RandomMove, Alphabetical, FirstMove } from "./strategies/trivial";
export { OracleStrategy } from "./strategies/oracle-strategy";
export type { OracleStrategyOptions } from "./strategies/oracle-strategy";
export { WorstFish, breakWorstTie, tieCategory } from "./strategies/worst-fish";
export type { TieCategory } from "./strategies/worst-fish";
export { ILoveDraws } from "./strategies/i-love-draws";

// --- Building blocks ---
export { allocateSearchTime } from "./time-budget";
export type { SearchBudget } from "./time-budget";
export { scoreToCentipawns, compareScores, formatScore } from "./score";
export { ChessJsBoard, START_FEN } from "./board";
export { createSeededRandom, pickRandom, shuffle } from "./random";
export type { RandomSource } from "./random";
export { taggedLogger, silentLogger } from "./logger";
export {
  NotImplementedError,
  OracleError,
  PositionLeakError,
  UnknownStrategyError,
} from "./errors";

// --- Configuration ---
export { DEFAULT_CONFIG, mergeConfig } from "./config";
export type { StrategyConfigOverrides } from "./config";

// --- Types ---
export type {
  Side,
  BoardMove,
  BoardState,
  Score,
  SearchLimit,
  RemainingTime,
  EvaluationOracle,
  OracleOptions,
  OracleFactory,
  CandidateResult,
  GameResult,
  TimeControl,
  Logger,
  StrategyConfig,
} from "./types";

// --- Factory ---

import type { OracleFactory } from "./types";
import type { StrategyOptions } from "./strategy";
import { MinimalStrategy } from "./strategy";
import { RandomMove, Alphabetical, FirstMove } from "./strategies/trivial";
import { WorstFish } from "./strategies/worst-fish";
import { ILoveDraws } from "./strategies/i-love-draws";
import { UnknownStrategyError } from "./errors";

export const STRATEGY_NAMES = [
  "random",
  "alphabetical",
  "first-move",
  "worstfish",
  "ilovedraws",
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/** Names whose policy needs an evaluation oracle. */
export const ORACLE_STRATEGIES: readonly StrategyName[] = ["worstfish", "ilovedraws"];

export function isStrategyName(name: string): name is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(name);
}

/**
 * Create a strategy by name — the primary entry point for consumers.
 *
 * Oracle-backed policies open their oracle here, through `oracleFactory`;
 * the others never touch it.
 */
export function createStrategy(
  name: string,
  options: StrategyOptions & { oracleFactory?: OracleFactory } = {}
): MinimalStrategy {
  if (!isStrategyName(name)) {
    throw new UnknownStrategyError(name, STRATEGY_NAMES);
  }

  switch (name) {
    case "random":
      return new RandomMove(options);
    case "alphabetical":
      return new Alphabetical(options);
    case "first-move":
      return new FirstMove(options);
    case "worstfish":
    case "ilovedraws": {
      const { oracleFactory } = options;
      if (!oracleFactory) {
        throw new Error(`Strategy "${name}" needs an oracleFactory`);
      }
      return name === "worstfish"
        ? new WorstFish({ ...options, oracleFactory })
        : new ILoveDraws({ ...options, oracleFactory });
    }
  }
}
