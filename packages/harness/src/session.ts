/**
 * Local self-play driver — plays two strategies against each other the
 * way a game server would drive them: clocks, increments, lifecycle
 * notifications and a guaranteed shutdown.
 *
 * Each side's first move gets a fixed per-move limit instead of a clock;
 * that move's thinking time is not charged.
 */

import { ChessJsBoard, START_FEN, taggedLogger } from "@oddmoves/engine";
import type {
  GameResult,
  Logger,
  MinimalStrategy,
  RemainingTime,
  Side,
  TimeControl,
} from "@oddmoves/engine";
import type { GameEndReason, GameSummary, MoveRecord } from "./types";

export interface PlayOptions {
  white: MinimalStrategy;
  black: MinimalStrategy;
  fen?: string;
  timeControl?: TimeControl;
  /** Per-move limit for each side's first move */
  firstMoveMs?: number;
  /** Stop with "*" after this many plies */
  maxPlies?: number;
  /** Millisecond clock; injectable for tests */
  now?: () => number;
  onMove?: (record: MoveRecord) => void;
  logger?: Logger;
}

export const DEFAULT_TIME_CONTROL: TimeControl = { initialMs: 180000, incrementMs: 2000 };

const other = (side: Side): Side => (side === "white" ? "black" : "white");

const winFor = (side: Side): GameResult => (side === "white" ? "1-0" : "0-1");

interface GameEnding {
  result: GameResult;
  reason: GameEndReason;
}

function detectGameEnd(board: ChessJsBoard): GameEnding | null {
  const { chess } = board;
  if (chess.isCheckmate()) return { result: winFor(other(board.turn())), reason: "checkmate" };
  if (chess.isStalemate()) return { result: "1/2-1/2", reason: "stalemate" };
  if (chess.isInsufficientMaterial()) return { result: "1/2-1/2", reason: "insufficient material" };
  if (chess.isThreefoldRepetition()) return { result: "1/2-1/2", reason: "threefold repetition" };
  if (chess.isDraw()) return { result: "1/2-1/2", reason: "fifty-move rule" };
  return null;
}

export async function playGame(options: PlayOptions): Promise<GameSummary> {
  const {
    white,
    black,
    timeControl = DEFAULT_TIME_CONTROL,
    firstMoveMs = 10000,
    maxPlies = 400,
    now = () => performance.now(),
  } = options;
  const log = taggedLogger("session", options.logger);
  const board = new ChessJsBoard(options.fen ?? START_FEN);
  const players: Record<Side, MinimalStrategy> = { white, black };
  // The same instance may play both colours
  const participants = [...new Set([white, black])];

  const clocks: Record<Side, number> = {
    white: timeControl.initialMs,
    black: timeControl.initialMs,
  };
  const hasMoved: Record<Side, boolean> = { white: false, black: false };
  const moves: MoveRecord[] = [];

  const playMoves = async (): Promise<GameEnding> => {
    for (;;) {
      const ended = detectGameEnd(board);
      if (ended) return ended;
      if (moves.length >= maxPlies) return { result: "*", reason: "ply limit" };

      const side = board.turn();
      const player = players[side];
      const fixed: RemainingTime = { type: "fixed", movetimeMs: firstMoveMs };
      const timeFor = (s: Side): number | RemainingTime =>
        hasMoved[s] ? clocks[s] : fixed;

      player.engine.ping();
      const started = now();
      const move = await player.chooseMoveWithPonder(
        board,
        timeFor("white"),
        timeFor("black"),
        timeControl.incrementMs,
        timeControl.incrementMs,
        false
      );
      const thinkMs = now() - started;

      let clockMs: number | null = null;
      if (hasMoved[side]) {
        clocks[side] -= thinkMs;
        if (clocks[side] <= 0) {
          log.info(`${player.name} (${side}) lost on time`);
          return { result: winFor(other(side)), reason: "timeout" };
        }
        clocks[side] += timeControl.incrementMs;
        clockMs = clocks[side];
      }
      hasMoved[side] = true;

      const legal = board.legalMoves().some((m) => m.uci === move.uci);
      if (!legal) {
        throw new Error(`${player.name} returned illegal move ${move.uci} in ${board.fen()}`);
      }
      const moveNumber = board.chess.moveNumber();
      board.push(move);

      const record: MoveRecord = {
        ply: moves.length + 1,
        moveNumber,
        side,
        move,
        thinkMs,
        clockMs,
      };
      moves.push(record);
      options.onMove?.(record);

      const opponent = players[other(side)];
      if (opponent !== player) opponent.onOpponentMove(move);
    }
  };

  let ending: GameEnding;
  try {
    for (const p of participants) {
      await p.initialize();
      p.engine.newGame();
      p.engine.setTimeControl(timeControl);
    }

    ending = await playMoves();

    for (const p of participants) {
      p.engine.reportGameResult(ending.result);
      p.onGameEnd(ending.result);
    }
  } finally {
    for (const p of participants) p.shutdown();
  }

  log.info(`${white.name} vs ${black.name}: ${ending.result} (${ending.reason})`);

  return {
    white: white.name,
    black: black.name,
    result: ending.result,
    reason: ending.reason,
    moves,
    finalFen: board.fen(),
    pgn: board.chess.pgn(),
  };
}
