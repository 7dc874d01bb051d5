/**
 * choose command — one decision from one strategy on one position.
 */

import { ChessJsBoard, START_FEN, createStrategy } from "@oddmoves/engine";
import type { BoardMove } from "@oddmoves/engine";
import { uciOracleFactory } from "../uci-oracle";
import { formatDecision } from "../format";
import { parseMs, strategyOptionsFrom } from "./shared";
import type { CommonOptions } from "./shared";

interface ChooseOptions extends CommonOptions {
  strategy: string;
  fen?: string;
  wtime: string;
  btime: string;
  winc: string;
  binc: string;
  movetime?: string;
}

export async function choose(options: ChooseOptions) {
  const board = new ChessJsBoard(options.fen ?? START_FEN);
  if (board.legalMoves().length === 0) {
    throw new Error(`No legal moves in ${board.fen()}`);
  }

  const strategy = createStrategy(options.strategy, {
    ...strategyOptionsFrom(options),
    oracleFactory: uciOracleFactory(),
  });

  try {
    const started = performance.now();
    const movetimeMs = parseMs(options.movetime, "--movetime");
    let move: BoardMove;
    if (movetimeMs !== undefined) {
      move = await strategy.chooseMove(board, { type: "fixed", movetimeMs });
    } else {
      move = await strategy.chooseMoveWithPonder(
        board,
        parseMs(options.wtime, "--wtime") ?? 0,
        parseMs(options.btime, "--btime") ?? 0,
        parseMs(options.winc, "--winc") ?? 0,
        parseMs(options.binc, "--binc") ?? 0
      );
    }
    console.log(formatDecision(strategy.name, move, performance.now() - started));
  } finally {
    strategy.shutdown();
  }
}
