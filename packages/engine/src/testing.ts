/**
 * In-process stand-ins for the board and the oracle, shared by tests.
 */

import type {
  BoardMove,
  BoardState,
  EvaluationOracle,
  OracleFactory,
  OracleOptions,
  Score,
  SearchLimit,
  Side,
} from "./types";
import { OracleError } from "./errors";

export interface ScriptedMove {
  uci: string;
  san?: string;
  capture?: boolean;
  check?: boolean;
}

/**
 * A one-ply BoardState: fixed root moves with explicit capture/check tags.
 * fen() is "root" at the root and "root <uci>" after a push.
 */
export class ScriptedBoard implements BoardState {
  readonly pushed: string[] = [];
  private readonly stack: ScriptedMove[] = [];
  private readonly byUci: Map<string, ScriptedMove>;

  constructor(
    private readonly moves: ScriptedMove[],
    private readonly side: Side = "white"
  ) {
    this.byUci = new Map(moves.map((m) => [m.uci, m]));
  }

  static fenAfter(uci: string): string {
    return `root ${uci}`;
  }

  legalMoves(): BoardMove[] {
    if (this.stack.length > 0) return [];
    return this.moves.map((m) => ({
      uci: m.uci,
      san: m.san ?? m.uci,
      from: m.uci.slice(0, 2),
      to: m.uci.slice(2, 4),
    }));
  }

  push(move: BoardMove): void {
    const scripted = this.byUci.get(move.uci);
    if (!scripted || this.stack.length > 0) {
      throw new Error(`ScriptedBoard: unexpected push ${move.uci}`);
    }
    this.stack.push(scripted);
    this.pushed.push(move.uci);
  }

  pop(): BoardMove {
    const top = this.stack.pop();
    if (!top) throw new Error("ScriptedBoard: pop on empty stack");
    return { uci: top.uci, san: top.san ?? top.uci, from: "", to: "" };
  }

  turn(): Side {
    if (this.stack.length % 2 === 0) return this.side;
    return this.side === "white" ? "black" : "white";
  }

  isCapture(move: BoardMove): boolean {
    return this.byUci.get(move.uci)?.capture ?? false;
  }

  isCheck(): boolean {
    return this.stack[this.stack.length - 1]?.check ?? false;
  }

  fen(): string {
    return ["root", ...this.stack.map((m) => m.uci)].join(" ");
  }

  get depth(): number {
    return this.stack.length;
  }
}

/** Scores keyed by fen; plain numbers are centipawns. Unknown fens score 0. */
export class StubOracle implements EvaluationOracle {
  readonly calls: { fen: string; limit: SearchLimit }[] = [];
  closeCount = 0;
  failWith: Error | null = null;

  constructor(private readonly scores: Record<string, Score | number> = {}) {}

  async analyse(fen: string, limit: SearchLimit): Promise<Score> {
    this.calls.push({ fen, limit });
    if (this.failWith) throw this.failWith;
    if (this.closeCount > 0) throw new OracleError("oracle is closed");
    const s = this.scores[fen];
    if (s === undefined) return { type: "cp", value: 0 };
    return typeof s === "number" ? { type: "cp", value: s } : s;
  }

  close(): void {
    this.closeCount++;
  }
}

/** Factory that hands out `oracle` and records the options it was opened with. */
export function stubFactory(oracle: EvaluationOracle): OracleFactory & {
  opened: OracleOptions[];
} {
  const opened: OracleOptions[] = [];
  const factory = (options: OracleOptions) => {
    opened.push(options);
    return oracle;
  };
  return Object.assign(factory, { opened });
}

/** Scores for a ScriptedBoard, keyed by move instead of fen. */
export function scoresByMove(
  byMove: Record<string, Score | number>
): Record<string, Score | number> {
  const out: Record<string, Score | number> = {};
  for (const [uci, score] of Object.entries(byMove)) {
    out[ScriptedBoard.fenAfter(uci)] = score;
  }
  return out;
}
