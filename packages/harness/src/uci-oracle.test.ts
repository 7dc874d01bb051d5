import { describe, it, expect } from "vitest";
import { EventEmitter } from "node:events";
import { createInterface } from "node:readline";
import { PassThrough } from "node:stream";
import { OracleError, silentLogger } from "@oddmoves/engine";
import type { OracleOptions } from "@oddmoves/engine";
import { UciOracle, parseInfoScore } from "./uci-oracle";
import type { UciProcess } from "./uci-oracle";

type Respond = (cmd: string, fake: FakeUciProcess) => void;

/** In-process stand-in for a UCI engine on the other end of two pipes. */
class FakeUciProcess extends EventEmitter implements UciProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly received: string[] = [];
  killed = 0;

  constructor(private readonly respond: Respond) {
    super();
    createInterface({ input: this.stdin }).on("line", (cmd: string) => {
      this.received.push(cmd);
      this.respond(cmd, this);
    });
  }

  reply(...lines: string[]): void {
    for (const line of lines) this.stdout.write(`${line}\n`);
  }

  kill(): boolean {
    this.killed++;
    return true;
  }
}

/** A well-behaved engine; `infoByFen` is the score part of its last info line. */
function engine(infoByFen: Record<string, string> = {}): Respond {
  let fen = "";
  return (cmd, fake) => {
    if (cmd === "uci") fake.reply("id name FakeFish", "uciok");
    else if (cmd === "isready") fake.reply("readyok");
    else if (cmd.startsWith("position fen ")) fen = cmd.slice("position fen ".length);
    else if (cmd.startsWith("go")) {
      fake.reply(
        "info depth 1 score cp 3 nodes 20 pv e2e4",
        `info depth 8 ${infoByFen[fen] ?? "score cp 0"} nodes 4000 pv e2e4 e7e5`,
        "bestmove e2e4 ponder e7e5"
      );
    }
  };
}

function open(respond: Respond, options: Partial<OracleOptions> = {}) {
  const spawned: FakeUciProcess[] = [];
  const oracle = new UciOracle(
    { path: "/opt/fakefish", ...options },
    () => {
      const proc = new FakeUciProcess(respond);
      spawned.push(proc);
      return proc;
    },
    silentLogger
  );
  const [fake] = spawned;
  if (!fake) throw new Error("spawn was not called");
  return { oracle, fake };
}

const tick = () => new Promise((resolve) => setTimeout(resolve, 10));

describe("parseInfoScore", () => {
  it("reads centipawn and mate scores", () => {
    expect(parseInfoScore("info depth 12 seldepth 18 score cp -41 nodes 9 pv d7d5")).toEqual({
      type: "cp",
      value: -41,
    });
    expect(parseInfoScore("info depth 20 score mate 4 pv h5f7")).toEqual({ type: "mate", value: 4 });
  });

  it("skips bounds and lines without a score", () => {
    expect(parseInfoScore("info depth 9 score cp 80 lowerbound pv e2e4")).toBeNull();
    expect(parseInfoScore("info depth 9 score cp 80 upperbound pv e2e4")).toBeNull();
    expect(parseInfoScore("info string NNUE evaluation enabled")).toBeNull();
    expect(parseInfoScore("bestmove e2e4")).toBeNull();
  });
});

describe("UciOracle", () => {
  it("handshakes once, then answers with the last reported score", async () => {
    const { oracle, fake } = open(engine({ "fen-a": "score cp 31", "fen-b": "score mate -3" }));

    expect(await oracle.analyse("fen-a", { movetimeMs: 40.7 })).toEqual({ type: "cp", value: 31 });
    expect(await oracle.analyse("fen-b", { movetimeMs: 90 })).toEqual({ type: "mate", value: -3 });

    expect(fake.received).toEqual([
      "uci",
      "isready",
      "position fen fen-a",
      "go movetime 40",
      "isready",
      "position fen fen-b",
      "go movetime 90",
    ]);
  });

  it("sends hash and thread settings during the handshake", async () => {
    const { oracle, fake } = open(engine(), { hashMb: 64, threads: 2 });
    await oracle.analyse("fen-a", { movetimeMs: 1 });
    expect(fake.received.slice(0, 4)).toEqual([
      "uci",
      "setoption name Hash value 64",
      "setoption name Threads value 2",
      "isready",
    ]);
  });

  it("ignores bound-only scores", async () => {
    const { oracle } = open((cmd, fake) => {
      if (cmd === "uci") fake.reply("uciok");
      else if (cmd === "isready") fake.reply("readyok");
      else if (cmd.startsWith("go")) {
        fake.reply(
          "info depth 5 score cp 20 pv e2e4",
          "info depth 6 score cp 500 lowerbound pv e2e4",
          "bestmove e2e4"
        );
      }
    });
    expect(await oracle.analyse("fen-a", { movetimeMs: 50 })).toEqual({ type: "cp", value: 20 });
  });

  it("rejects when bestmove arrives without any score", async () => {
    const { oracle } = open((cmd, fake) => {
      if (cmd === "uci") fake.reply("uciok");
      else if (cmd === "isready") fake.reply("readyok");
      else if (cmd.startsWith("go")) fake.reply("bestmove (none)");
    });
    await expect(oracle.analyse("fen-a", { movetimeMs: 50 })).rejects.toThrow(
      /No score reported/
    );
  });

  it("refuses a non-positive time limit without talking to the process", async () => {
    const { oracle, fake } = open(engine());
    await expect(oracle.analyse("fen-a", { movetimeMs: 0 })).rejects.toBeInstanceOf(RangeError);
    expect(fake.received).toEqual([]);
  });

  it("fails the pending query and every later one when the process dies", async () => {
    const { oracle } = open((cmd, fake) => {
      if (cmd === "uci") fake.reply("uciok");
      else if (cmd === "isready") fake.reply("readyok");
      else if (cmd.startsWith("go")) setImmediate(() => fake.emit("exit", 139, null));
    });

    await expect(oracle.analyse("fen-a", { movetimeMs: 50 })).rejects.toThrow(
      /exited unexpectedly \(code 139/
    );
    await expect(oracle.analyse("fen-b", { movetimeMs: 50 })).rejects.toBeInstanceOf(OracleError);
  });

  it("surfaces a process error such as a missing executable", async () => {
    const { oracle } = open((cmd, fake) => {
      if (cmd === "uci") fake.emit("error", new Error("spawn /opt/fakefish ENOENT"));
    });
    await expect(oracle.analyse("fen-a", { movetimeMs: 50 })).rejects.toThrow(/ENOENT/);
  });

  it("wraps a spawn that throws", () => {
    expect(
      () =>
        new UciOracle({ path: "/nowhere" }, () => {
          throw new Error("EACCES");
        })
    ).toThrow(OracleError);
  });

  it("closes once, even before first use, and refuses queries afterwards", async () => {
    const { oracle, fake } = open(engine());
    oracle.close();
    oracle.close();
    expect(fake.killed).toBe(1);
    await tick();
    expect(fake.received).toEqual(["quit"]);
    await expect(oracle.analyse("fen-a", { movetimeMs: 50 })).rejects.toThrow(/closed/);
  });

  it("does not report an exit it asked for", async () => {
    const { oracle, fake } = open(engine());
    await oracle.analyse("fen-a", { movetimeMs: 10 });
    oracle.close();
    expect(() => fake.emit("exit", 0, null)).not.toThrow();
  });

  it("rejects a query that is still running when the oracle is closed", async () => {
    let oracle: UciOracle | null = null;
    const opened = open((cmd, fake) => {
      if (cmd === "uci") fake.reply("uciok");
      else if (cmd === "isready") fake.reply("readyok");
      else if (cmd.startsWith("go")) setImmediate(() => oracle?.close());
    });
    oracle = opened.oracle;
    await expect(opened.oracle.analyse("fen-a", { movetimeMs: 50 })).rejects.toThrow(/closed/);
  });
});
