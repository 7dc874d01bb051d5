/**
 * WorstFish — plays the move the oracle likes least for the side to move.
 *
 * Each candidate is scored from the opponent's perspective (they are to
 * move after it), so the *highest* score is the worst move for us. Ties on
 * that maximum are broken by category: quiet moves first, then checks,
 * then captures, uniformly at random within the chosen category.
 */

import type { BoardMove, BoardState, CandidateResult, RemainingTime } from "../types";
import { pickRandom } from "../random";
import type { RandomSource } from "../random";
import { compareScores, formatScore } from "../score";
import { OracleStrategy } from "./oracle-strategy";

export type TieCategory = "quiet" | "check" | "capture";

/** A capture that also gives check counts as a capture. */
export function tieCategory(result: Pick<CandidateResult, "isCapture" | "isCheck">): TieCategory {
  if (result.isCapture) return "capture";
  if (result.isCheck) return "check";
  return "quiet";
}

const CATEGORY_PREFERENCE: TieCategory[] = ["quiet", "check", "capture"];

/** Random pick from the most preferred non-empty category. */
export function breakWorstTie(
  ties: CandidateResult[],
  random: RandomSource
): CandidateResult {
  for (const category of CATEGORY_PREFERENCE) {
    const inCategory = ties.filter((r) => tieCategory(r) === category);
    if (inCategory.length > 0) return pickRandom(inCategory, random);
  }
  throw new Error("No tied candidates to choose from");
}

export class WorstFish extends OracleStrategy {
  protected async search(
    board: BoardState,
    remaining: RemainingTime
  ): Promise<BoardMove> {
    const legalMoves = board.legalMoves();
    const { deadlineMs, shrunk } = this.budget(remaining, legalMoves.length);
    this.log.debug(
      `${legalMoves.length} candidates at ${deadlineMs.toFixed(1)}ms${shrunk ? " (clock-limited)" : ""}`
    );

    let worstMoves: CandidateResult[] = [];

    for (const move of legalMoves) {
      const result = await this.probe(board, move, deadlineMs);
      const order = worstMoves.length === 0 ? 1 : compareScores(result.score, worstMoves[0].score);

      if (order > 0) {
        worstMoves = [result];
      } else if (order === 0) {
        worstMoves.push(result);
      }
    }

    const chosen = breakWorstTie(worstMoves, this.random);
    this.log.debug(
      `chose ${chosen.move.san} (${formatScore(chosen.score)} for opponent, ${worstMoves.length} tied)`
    );
    return chosen.move;
  }
}
