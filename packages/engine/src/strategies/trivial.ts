/**
 * Oracle-free policies. Strategy names and ideas from tom7's eloWorld.
 */

import type { BoardMove, BoardState } from "../types";
import { pickRandom } from "../random";
import { MinimalStrategy } from "../strategy";

/** Code-unit order, the same for every locale. */
function firstBy(moves: BoardMove[], key: (m: BoardMove) => string): BoardMove {
  return moves
    .slice()
    .sort((a, b) => (key(a) < key(b) ? -1 : key(a) > key(b) ? 1 : 0))[0];
}

export class RandomMove extends MinimalStrategy {
  protected async search(board: BoardState): Promise<BoardMove> {
    return pickRandom(board.legalMoves(), this.random);
  }
}

/** First move by SAN ("Na3" before "a3", since uppercase sorts first). */
export class Alphabetical extends MinimalStrategy {
  protected async search(board: BoardState): Promise<BoardMove> {
    return firstBy(board.legalMoves(), (m) => m.san);
  }
}

/** First move by UCI coordinates. */
export class FirstMove extends MinimalStrategy {
  protected async search(board: BoardState): Promise<BoardMove> {
    return firstBy(board.legalMoves(), (m) => m.uci);
  }
}
