/**
 * ILoveDraws — steers toward the most balanced position.
 *
 * Candidates are visited in shuffled order. The first one whose
 * |evaluation| is within the draw threshold is played on the spot;
 * otherwise the move with the smallest |evaluation| wins, ties broken
 * uniformly at random.
 */

import type { BoardMove, BoardState, RemainingTime } from "../types";
import { pickRandom, shuffle } from "../random";
import { OracleStrategy } from "./oracle-strategy";

export class ILoveDraws extends OracleStrategy {
  protected async search(
    board: BoardState,
    remaining: RemainingTime
  ): Promise<BoardMove> {
    const order = shuffle(board.legalMoves(), this.random);
    const { deadlineMs } = this.budget(remaining, order.length);
    const { threshold } = this.config.draws;

    let closest: number | null = null;
    let closestMoves: BoardMove[] = [];

    for (const move of order) {
      const { centipawns } = await this.probe(board, move, deadlineMs);
      const imbalance = Math.abs(centipawns);

      // In pawns: threshold * 100 is inexact for values like 0.29
      if (imbalance / 100 <= threshold) {
        this.log.debug(`early exit on ${move.san} (|eval| ${imbalance}cp)`);
        return move;
      }

      if (closest === null || imbalance < closest) {
        closest = imbalance;
        closestMoves = [move];
      } else if (imbalance === closest) {
        closestMoves.push(move);
      }
    }

    const chosen = pickRandom(closestMoves, this.random);
    this.log.debug(`chose ${chosen.san} (|eval| ${closest}cp, ${closestMoves.length} tied)`);
    return chosen;
  }
}
