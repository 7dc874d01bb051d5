/**
 * Public API for programmatic use (game drivers, scripts, tests).
 *
 * The CLI (`cli.ts`) is the main entry point for human use.
 */

export { UciOracle, uciOracleFactory, parseInfoScore } from "./uci-oracle";
export type { UciProcess, SpawnUci } from "./uci-oracle";
export { playGame, DEFAULT_TIME_CONTROL } from "./session";
export type { PlayOptions } from "./session";
export {
  resolveOraclePath,
  defaultOraclePath,
  loadEnvFile,
  ORACLE_PATH_ENV,
} from "./oracle-path";
export { formatGameSummary, formatMoveLine, formatDecision, formatClock } from "./format";
export type { GameEndReason, GameSummary, MoveRecord } from "./types";
