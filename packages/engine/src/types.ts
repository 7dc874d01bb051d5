/* ── Sides ─────────────────────────────────────────────────── */

export type Side = "white" | "black";

/* ── Board Abstraction ─────────────────────────────────────── */

/**
 * A legal transition from the current position.
 * Carries both canonical text forms; nothing else is attached to it.
 */
export interface BoardMove {
  /** Coordinate notation, e.g. "e2e4", "e7e8q" */
  uci: string;
  /** Standard Algebraic Notation, e.g. "Nf3", "exd5", "O-O" */
  san: string;
  from: string;
  to: string;
  promotion?: string;
}

/**
 * Rules-engine collaborator. The object *is* the position: strategies
 * push and pop candidate moves on it and must leave it as they found it.
 *
 * The default implementation wraps chess.js (see board.ts); tests use
 * scripted stand-ins.
 */
export interface BoardState {
  legalMoves(): BoardMove[];
  /** Apply a move. Must be paired with pop(), last-in-first-out. */
  push(move: BoardMove): void;
  pop(): BoardMove;
  turn(): Side;
  /** Whether `move` captures, judged before it is pushed. */
  isCapture(move: BoardMove): boolean;
  /** Whether the side to move is in check (call after push). */
  isCheck(): boolean;
  /** Stable key for the exact position, also what the oracle is sent. */
  fen(): string;
}

/* ── Evaluation ────────────────────────────────────────────── */

/**
 * Relative evaluation: from the point of view of the side to move in the
 * scored position. After a candidate is pushed that is the opponent.
 *
 * `mate` counts moves (not plies) to a forced mate; negative means being mated,
 * zero means already mated.
 */
export type Score =
  | { type: "cp"; value: number }
  | { type: "mate"; value: number };

export interface SearchLimit {
  movetimeMs: number;
}

/* ── Clock ─────────────────────────────────────────────────── */

/**
 * Clock reading for the side to move. The first move of a game arrives
 * as a fixed per-move limit instead of a running clock.
 */
export type RemainingTime =
  | { type: "clock"; remainingMs: number; incrementMs: number }
  | { type: "fixed"; movetimeMs: number };

/* ── Evaluation Oracle ─────────────────────────────────────── */

/**
 * External scorer. One instance per strategy, started once and closed
 * once. The harness provides a UCI child-process implementation.
 */
export interface EvaluationOracle {
  analyse(fen: string, limit: SearchLimit): Promise<Score>;
  close(): void;
}

export interface OracleOptions {
  /** Path to the oracle executable */
  path: string;
  /** Transposition table size in MB (UCI "Hash") */
  hashMb?: number;
  /** Search threads (UCI "Threads") */
  threads?: number;
}

export type OracleFactory = (options: OracleOptions) => EvaluationOracle;

/* ── Candidate Evaluation ──────────────────────────────────── */

export interface CandidateResult {
  move: BoardMove;
  score: Score;
  /** `score` on the single ordered scale from score.ts */
  centipawns: number;
  isCapture: boolean;
  isCheck: boolean;
}

/* ── Game Lifecycle ────────────────────────────────────────── */

export type GameResult = "1-0" | "0-1" | "1/2-1/2" | "*";

export interface TimeControl {
  initialMs: number;
  incrementMs: number;
}

/* ── Logging ───────────────────────────────────────────────── */

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/* ── Strategy Configuration ────────────────────────────────── */

export interface StrategyConfig {
  /** Per-candidate time budgeting (all values in milliseconds) */
  time: {
    /** Search time per candidate before any shrinking */
    baseSearchMs: number;
    /** Share of the remaining clock one decision may spend (0.1 = 10%) */
    clockShare: number;
    /** Subtracted from each deadline for round-trip overhead */
    safetyMarginMs: number;
    /** Floor for the deadline handed to the oracle */
    minDeadlineMs: number;
  };

  /** ILoveDraws early-exit */
  draws: {
    /** Accept a move immediately when |eval| in pawns is at or below this */
    threshold: number;
  };

  /** Oracle process settings, resolved once at strategy construction */
  oracle: OracleOptions;
}
