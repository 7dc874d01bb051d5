import { describe, it, expect } from "vitest";
import { WorstFish, breakWorstTie, tieCategory } from "./worst-fish";
import { OracleError } from "../errors";
import { silentLogger } from "../logger";
import { createSeededRandom } from "../random";
import { ChessJsBoard } from "../board";
import {
  ScriptedBoard,
  StubOracle,
  scoresByMove,
  stubFactory,
} from "../testing";
import type { ScriptedMove } from "../testing";
import type { RemainingTime, Score } from "../types";

const FIXED: RemainingTime = { type: "fixed", movetimeMs: 1000 };

function setup(
  moves: ScriptedMove[],
  scores: Record<string, Score | number>,
  random: () => number = Math.random
) {
  const oracle = new StubOracle(scoresByMove(scores));
  const factory = stubFactory(oracle);
  const strategy = new WorstFish({
    oracleFactory: factory,
    random,
    logger: silentLogger,
    config: { oracle: { path: "/opt/test-oracle" } },
  });
  return { board: new ScriptedBoard(moves), oracle, factory, strategy };
}

describe("WorstFish", () => {
  it("plays the move that scores best for the opponent", async () => {
    const { board, strategy } = setup(
      [{ uci: "a2a3" }, { uci: "b2b3" }],
      { a2a3: 500, b2b3: -500 }
    );
    expect((await strategy.chooseMove(board, FIXED)).uci).toBe("a2a3");
  });

  it("ranks a mate for the opponent above any material swing", async () => {
    const { board, strategy } = setup(
      [{ uci: "a2a3" }, { uci: "b2b3" }, { uci: "c2c3" }],
      { a2a3: 900, b2b3: { type: "mate", value: 3 }, c2c3: { type: "mate", value: -1 } }
    );
    expect((await strategy.chooseMove(board, FIXED)).uci).toBe("b2b3");
  });

  it("hands the opponent the fastest mate on offer", async () => {
    const { board, strategy } = setup(
      [{ uci: "a2a3" }, { uci: "b2b3" }, { uci: "c2c3" }],
      {
        a2a3: { type: "mate", value: 5 },
        b2b3: { type: "mate", value: 2 },
        c2c3: { type: "mate", value: 9 },
      }
    );
    expect((await strategy.chooseMove(board, FIXED)).uci).toBe("b2b3");
  });

  it("treats the same mate distance as a tie", async () => {
    const { board, strategy } = setup(
      [{ uci: "a2a3", capture: true }, { uci: "b2b3" }],
      { a2a3: { type: "mate", value: 2 }, b2b3: { type: "mate", value: 2 } }
    );
    expect((await strategy.chooseMove(board, FIXED)).uci).toBe("b2b3");
  });

  it("prefers a quiet move among equally bad ones, every time", async () => {
    const random = createSeededRandom(7);
    for (let trial = 0; trial < 30; trial++) {
      const { board, strategy } = setup(
        [
          { uci: "d1h5", check: true },
          { uci: "e4d5", capture: true },
          { uci: "a2a3" },
          { uci: "h2h3" },
        ],
        { d1h5: 200, e4d5: 200, a2a3: 200, h2h3: 150 },
        random
      );
      expect((await strategy.chooseMove(board, FIXED)).uci).toBe("a2a3");
    }
  });

  it("prefers a check over a capture when no quiet move ties", async () => {
    const { board, strategy } = setup(
      [{ uci: "e4d5", capture: true }, { uci: "d1h5", check: true }, { uci: "a2a3" }],
      { e4d5: 300, d1h5: 300, a2a3: 299 }
    );
    expect((await strategy.chooseMove(board, FIXED)).uci).toBe("d1h5");
  });

  it("falls back to a capture only when it alone holds the maximum", async () => {
    const { board, strategy } = setup(
      [{ uci: "a2a3" }, { uci: "d1h5", check: true }, { uci: "e4d5", capture: true }],
      { a2a3: 40, d1h5: 40, e4d5: 41 }
    );
    expect((await strategy.chooseMove(board, FIXED)).uci).toBe("e4d5");
  });

  it("picks uniformly within the winning category", async () => {
    const moves = [{ uci: "a2a3" }, { uci: "h2h3" }];
    const scores = { a2a3: 0, h2h3: 0 };
    const low = setup(moves, scores, () => 0);
    const high = setup(moves, scores, () => 0.99);
    expect((await low.strategy.chooseMove(low.board, FIXED)).uci).toBe("a2a3");
    expect((await high.strategy.chooseMove(high.board, FIXED)).uci).toBe("h2h3");
  });

  it("probes every candidate once and restores the board", async () => {
    const { board, oracle, strategy } = setup(
      [{ uci: "a2a3" }, { uci: "b2b3" }, { uci: "c2c3" }],
      {}
    );
    await strategy.chooseMove(board, FIXED);
    expect(board.pushed).toEqual(["a2a3", "b2b3", "c2c3"]);
    expect(oracle.calls.map((c) => c.fen)).toEqual([
      "root a2a3",
      "root b2b3",
      "root c2c3",
    ]);
    expect(board.depth).toBe(0);
    expect(board.fen()).toBe("root");
  });

  it("gives the oracle the allocated deadline", async () => {
    const { board, oracle, strategy } = setup(
      [{ uci: "a2a3" }, { uci: "b2b3" }, { uci: "c2c3" }],
      {}
    );
    // 1500ms left → 150ms share over 3 candidates → 50ms, minus 10ms margin
    await strategy.chooseMove(board, { type: "clock", remainingMs: 1500, incrementMs: 0 });
    expect(oracle.calls.map((c) => c.limit.movetimeMs)).toEqual([40, 40, 40]);

    await strategy.chooseMove(board, FIXED);
    expect(oracle.calls.slice(3).map((c) => c.limit.movetimeMs)).toEqual([90, 90, 90]);
  });

  it("propagates oracle failures after undoing the probe", async () => {
    const { board, oracle, strategy } = setup([{ uci: "a2a3" }, { uci: "b2b3" }], {});
    oracle.failWith = new OracleError("engine exited with code 1");
    await expect(strategy.chooseMove(board, FIXED)).rejects.toBeInstanceOf(OracleError);
    expect(board.fen()).toBe("root");
    expect(oracle.calls).toHaveLength(1);
  });

  it("opens the oracle once at construction and closes it once", () => {
    const { oracle, factory, strategy } = setup([{ uci: "a2a3" }], {});
    expect(factory.opened).toEqual([{ path: "/opt/test-oracle" }]);
    strategy.shutdown();
    strategy.shutdown();
    expect(oracle.closeCount).toBe(1);
  });

  it("returns the only legal move on a real board", async () => {
    const oracle = new StubOracle();
    const strategy = new WorstFish({ oracleFactory: stubFactory(oracle), logger: silentLogger });
    const board = new ChessJsBoard("7k/8/8/8/7p/1q6/7P/K7 w - - 0 1");
    const move = await strategy.chooseMove(board, FIXED);
    expect(move.uci).toBe("h2h3");
    expect(oracle.calls).toHaveLength(1);
  });
});

describe("tie categories", () => {
  it("counts a checking capture as a capture", () => {
    expect(tieCategory({ isCapture: true, isCheck: true })).toBe("capture");
    expect(tieCategory({ isCapture: false, isCheck: true })).toBe("check");
    expect(tieCategory({ isCapture: false, isCheck: false })).toBe("quiet");
  });

  it("refuses an empty tie set", () => {
    expect(() => breakWorstTie([], Math.random)).toThrow(/No tied candidates/);
  });
});
