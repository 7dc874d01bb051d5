/**
 * Harness-specific type definitions.
 */

import type { BoardMove, GameResult, Side } from "@oddmoves/engine";

// ── Self-play session ───────────────────────────────────────────────

export type GameEndReason =
  | "checkmate"
  | "stalemate"
  | "insufficient material"
  | "threefold repetition"
  | "fifty-move rule"
  | "timeout"
  | "ply limit";

export interface MoveRecord {
  ply: number;
  /** Full-move number of the position the move was played from */
  moveNumber: number;
  side: Side;
  move: BoardMove;
  /** Wall time the strategy took to decide */
  thinkMs: number;
  /** Mover's clock after the move (increment included); null on a fixed-limit move */
  clockMs: number | null;
}

export interface GameSummary {
  white: string;
  black: string;
  result: GameResult;
  reason: GameEndReason;
  moves: MoveRecord[];
  finalFen: string;
  pgn: string;
}
