/**
 * UCI child-process oracle implementing EvaluationOracle.
 *
 * The executable is spawned when the oracle is constructed. The UCI
 * handshake happens lazily, on the first analyse() call:
 *   uci → uciok, [setoption Hash/Threads], isready → readyok
 *
 * Each query is `position fen <fen>` + `go movetime <ms>`; the score of
 * the last `info ... score` line before `bestmove` is the answer.
 *
 * A process error or an exit we did not ask for poisons the oracle: the
 * pending query and every later one reject with an OracleError.
 */

import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { OracleError, taggedLogger } from "@oddmoves/engine";
import type {
  EvaluationOracle,
  Logger,
  OracleFactory,
  OracleOptions,
  Score,
  SearchLimit,
} from "@oddmoves/engine";

/** The slice of ChildProcess the oracle talks to. */
export interface UciProcess extends EventEmitter {
  stdin: Writable;
  stdout: Readable;
  kill(): boolean;
}

export type SpawnUci = (path: string) => UciProcess;

const spawnExecutable: SpawnUci = (path) =>
  spawn(path, [], { stdio: ["pipe", "pipe", "ignore"] });

interface Waiter {
  onLine: (line: string) => void;
  reject: (err: Error) => void;
}

/**
 * Parse the score from a UCI info line.
 * Bound-only scores (lowerbound/upperbound) are skipped.
 */
export function parseInfoScore(line: string): Score | null {
  if (!line.startsWith("info") || /\b(lower|upper)bound\b/.test(line)) {
    return null;
  }
  const match = line.match(/score (cp|mate) (-?\d+)/);
  if (!match) return null;
  return { type: match[1] === "cp" ? "cp" : "mate", value: parseInt(match[2], 10) };
}

export class UciOracle implements EvaluationOracle {
  private readonly proc: UciProcess;
  private readonly log: Logger;
  private readonly waiters = new Set<Waiter>();
  private initPromise: Promise<void> | null = null;
  private failure: OracleError | null = null;
  private closed = false;

  constructor(
    private readonly options: OracleOptions,
    spawnProcess: SpawnUci = spawnExecutable,
    logger?: Logger
  ) {
    this.log = taggedLogger("oracle", logger);

    try {
      this.proc = spawnProcess(options.path);
    } catch (err) {
      throw new OracleError(`Failed to start oracle at ${options.path}`, err);
    }

    this.proc.on("error", (err: Error) => {
      this.fail(new OracleError(`Oracle process error: ${err.message}`, err));
    });
    this.proc.on("exit", (code: number | null, signal: string | null) => {
      if (this.closed) return;
      this.fail(
        new OracleError(`Oracle exited unexpectedly (code ${code}, signal ${signal})`)
      );
    });
    this.proc.stdin.on("error", (err: Error) => {
      this.fail(new OracleError(`Oracle stdin closed: ${err.message}`, err));
    });

    createInterface({ input: this.proc.stdout }).on("line", (line: string) => {
      const trimmed = line.trim();
      if (!trimmed) return;
      for (const waiter of [...this.waiters]) waiter.onLine(trimmed);
    });
  }

  async analyse(fen: string, limit: SearchLimit): Promise<Score> {
    if (this.closed) throw new OracleError("Oracle has been closed");
    if (!(limit.movetimeMs > 0)) {
      throw new RangeError(`movetimeMs must be positive, got ${limit.movetimeMs}`);
    }

    await this.init();
    await this.isReady();
    this.send(`position fen ${fen}`);

    const movetime = Math.max(1, Math.floor(limit.movetimeMs));
    let last: Score | null = null;

    return this.request(`go movetime ${movetime}`, (line) => {
      if (line.startsWith("info")) {
        last = parseInfoScore(line) ?? last;
        return undefined;
      }
      if (!line.startsWith("bestmove")) return undefined;
      if (!last) {
        throw new OracleError(`No score reported before "${line}" for ${fen}`);
      }
      return last;
    });
  }

  /** Stop the process. Safe to call repeatedly, or before any query. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const closedErr = new OracleError("Oracle has been closed");
    for (const waiter of [...this.waiters]) waiter.reject(closedErr);

    if (!this.failure && this.proc.stdin.writable) {
      this.proc.stdin.end("quit\n");
    }
    this.proc.kill();
    this.log.debug(`closed ${this.options.path}`);
  }

  /* ── Protocol helpers ──────────────────────────────────── */

  private init(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = (async () => {
        await this.request("uci", (line) => (line === "uciok" ? true : undefined));
        if (this.options.hashMb !== undefined) {
          this.send(`setoption name Hash value ${this.options.hashMb}`);
        }
        if (this.options.threads !== undefined) {
          this.send(`setoption name Threads value ${this.options.threads}`);
        }
        this.log.debug(`ready: ${this.options.path}`);
      })();
    }
    return this.initPromise;
  }

  private async isReady(): Promise<void> {
    await this.request("isready", (line) => (line === "readyok" ? true : undefined));
  }

  private send(cmd: string): void {
    if (this.failure) throw this.failure;
    if (this.closed) throw new OracleError("Oracle has been closed");
    this.proc.stdin.write(`${cmd}\n`);
  }

  /**
   * Send `cmd` and resolve with the first non-undefined value `match`
   * returns for an output line. A throw from `match` rejects.
   */
  private request<T>(
    cmd: string,
    match: (line: string) => T | undefined
  ): Promise<T> {
    if (this.failure) return Promise.reject(this.failure);

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter = {
        onLine: (line) => {
          let value: T | undefined;
          try {
            value = match(line);
          } catch (err) {
            waiter.reject(err instanceof Error ? err : new OracleError(String(err)));
            return;
          }
          if (value !== undefined) {
            this.waiters.delete(waiter);
            resolve(value);
          }
        },
        reject: (err) => {
          this.waiters.delete(waiter);
          reject(err);
        },
      };
      this.waiters.add(waiter);

      try {
        this.send(cmd);
      } catch (err) {
        waiter.reject(err instanceof Error ? err : new OracleError(String(err)));
      }
    });
  }

  private fail(err: OracleError): void {
    if (this.failure || this.closed) return;
    this.failure = err;
    this.log.error(err.message);
    for (const waiter of [...this.waiters]) waiter.reject(err);
  }
}

/** OracleFactory that spawns a UciOracle per strategy. */
export function uciOracleFactory(
  spawnProcess?: SpawnUci,
  logger?: Logger
): OracleFactory {
  return (options) => new UciOracle(options, spawnProcess, logger);
}
