import type {
  BoardMove,
  BoardState,
  GameResult,
  Logger,
  RemainingTime,
  StrategyConfig,
} from "./types";
import { DEFAULT_CONFIG, mergeConfig } from "./config";
import type { StrategyConfigOverrides } from "./config";
import { NotImplementedError, PositionLeakError } from "./errors";
import { taggedLogger } from "./logger";
import { NotificationShim } from "./notification-shim";
import type { EngineProtocol, NotificationTarget } from "./notification-shim";
import type { RandomSource } from "./random";

export interface StrategyOptions {
  /** Display name; defaults to the class name */
  name?: string;
  config?: StrategyConfigOverrides;
  /** Uniform [0, 1) source for random choices (default Math.random) */
  random?: RandomSource;
  logger?: Logger;
}

/**
 * Base for every move-selection policy.
 *
 * A policy must at least override `search`. Everything else (lifecycle
 * hooks, notifications, clock selection) has a working default.
 */
export class MinimalStrategy implements NotificationTarget {
  readonly name: string;
  /** Engine-shaped object for wrappers; forwards every call to notify() */
  readonly engine: EngineProtocol;
  protected readonly config: StrategyConfig;
  protected readonly random: RandomSource;
  protected readonly log: Logger;
  private stopped = false;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.config = mergeConfig(DEFAULT_CONFIG, options.config);
    this.random = options.random ?? Math.random;
    this.log = taggedLogger(this.name.toLowerCase(), options.logger);
    this.engine = new NotificationShim(this, this.name);
  }

  /**
   * Pick one legal move for the side to move.
   *
   * Precondition: the position has at least one legal move.
   * The board is probed in place and handed back unchanged.
   */
  async chooseMove(
    board: BoardState,
    remaining: RemainingTime,
    ponder = false
  ): Promise<BoardMove> {
    const before = board.fen();
    const move = await this.search(board, remaining, ponder);
    const after = board.fen();
    if (after !== before) {
      throw new PositionLeakError(this.name, before, after);
    }
    return move;
  }

  /**
   * Same as chooseMove, given both clocks. Plain numbers are running
   * clocks in milliseconds; a RemainingTime passes through as is (the
   * fixed limit used for a game's first move).
   */
  chooseMoveWithPonder(
    board: BoardState,
    wtime: number | RemainingTime,
    btime: number | RemainingTime,
    winc: number,
    binc: number,
    ponder = false
  ): Promise<BoardMove> {
    const white = board.turn() === "white";
    const time = white ? wtime : btime;
    const remaining: RemainingTime =
      typeof time === "number"
        ? { type: "clock", remainingMs: time, incrementMs: white ? winc : binc }
        : time;
    return this.chooseMove(board, remaining, ponder);
  }

  protected async search(
    _board: BoardState,
    _remaining: RemainingTime,
    _ponder: boolean
  ): Promise<BoardMove> {
    throw new NotImplementedError("search");
  }

  /* ── Lifecycle hooks ───────────────────────────────────── */

  async initialize(): Promise<void> {}

  onOpponentMove(_move: BoardMove): void {}

  onGameEnd(_result: GameResult): void {}

  /**
   * Called with every method a wrapper invokes on `engine`.
   * Nothing happens unless a policy overrides this.
   */
  notify(_method: string, _args: unknown[]): void {}

  /** Release resources. Safe to call any number of times. */
  shutdown(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.quit();
  }

  get isShutDown(): boolean {
    return this.stopped;
  }

  /** Runs once, from the first shutdown(). */
  protected quit(): void {}
}
