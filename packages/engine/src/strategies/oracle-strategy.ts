import type {
  BoardMove,
  BoardState,
  CandidateResult,
  EvaluationOracle,
  OracleFactory,
  RemainingTime,
} from "../types";
import { MinimalStrategy } from "../strategy";
import type { StrategyOptions } from "../strategy";
import { allocateSearchTime } from "../time-budget";
import type { SearchBudget } from "../time-budget";
import { scoreToCentipawns } from "../score";

export interface OracleStrategyOptions extends StrategyOptions {
  /** Opens the oracle; called exactly once, from the constructor */
  oracleFactory: OracleFactory;
}

/**
 * A policy that scores candidates with an evaluation oracle it owns.
 * The oracle is opened at construction and closed by the first shutdown().
 */
export abstract class OracleStrategy extends MinimalStrategy {
  protected readonly oracle: EvaluationOracle;

  constructor(options: OracleStrategyOptions) {
    super(options);
    this.oracle = options.oracleFactory(this.config.oracle);
  }

  protected budget(remaining: RemainingTime, candidateCount: number): SearchBudget {
    return allocateSearchTime(remaining, candidateCount, this.config);
  }

  /**
   * Score one candidate: tag it, play it, ask the oracle about the
   * resulting position, take it back. The score is relative to the
   * opponent, who is to move after the candidate.
   *
   * The move is popped even when the oracle throws.
   */
  protected async probe(
    board: BoardState,
    move: BoardMove,
    deadlineMs: number
  ): Promise<CandidateResult> {
    const isCapture = board.isCapture(move);
    board.push(move);
    try {
      const isCheck = board.isCheck();
      const score = await this.oracle.analyse(board.fen(), {
        movetimeMs: deadlineMs,
      });
      return {
        move,
        score,
        centipawns: scoreToCentipawns(score),
        isCapture,
        isCheck,
      };
    } finally {
      board.pop();
    }
  }

  protected quit(): void {
    this.oracle.close();
  }
}
