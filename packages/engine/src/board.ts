/**
 * chess.js-backed BoardState — the default rules-engine collaborator.
 */

import { Chess } from "chess.js";
import type { Move as ChessJsMove } from "chess.js";
import type { BoardMove, BoardState, Side } from "./types";

export const START_FEN =
  "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

function toBoardMove(m: ChessJsMove): BoardMove {
  return {
    uci: `${m.from}${m.to}${m.promotion ?? ""}`,
    san: m.san,
    from: m.from,
    to: m.to,
    ...(m.promotion ? { promotion: m.promotion } : {}),
  };
}

export class ChessJsBoard implements BoardState {
  readonly chess: Chess;

  constructor(fen: string = START_FEN) {
    this.chess = new Chess(fen);
  }

  legalMoves(): BoardMove[] {
    return this.chess.moves({ verbose: true }).map(toBoardMove);
  }

  push(move: BoardMove): void {
    // chess.js throws on illegal input
    this.chess.move({ from: move.from, to: move.to, promotion: move.promotion });
  }

  pop(): BoardMove {
    const undone = this.chess.undo();
    if (!undone) throw new Error("pop() called with no move to undo");
    return toBoardMove(undone);
  }

  turn(): Side {
    return this.chess.turn() === "w" ? "white" : "black";
  }

  isCapture(move: BoardMove): boolean {
    const legal = this.chess
      .moves({ verbose: true })
      .find((m) => m.from === move.from && m.to === move.to);
    // En passant reports the pawn too
    return legal?.captured !== undefined;
  }

  isCheck(): boolean {
    return this.chess.inCheck();
  }

  fen(): string {
    return this.chess.fen();
  }

  /** Play a move given in UCI or SAN and return it in both notations. */
  play(notation: string): BoardMove {
    const found = this.legalMoves().find(
      (m) => m.uci === notation || m.san === notation
    );
    if (!found) {
      throw new Error(`Illegal move "${notation}" in ${this.fen()}`);
    }
    this.push(found);
    return found;
  }
}
