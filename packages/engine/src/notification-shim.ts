/**
 * Notification shim — gives a strategy without a real engine object the
 * full engine surface a wrapping layer expects.
 *
 * Every call is turned into `owner.notify(methodName, args)`. The base
 * strategy ignores notifications; a policy overrides `notify` to react to
 * the ones it cares about.
 */

import type { GameResult, TimeControl } from "./types";

export interface NotificationTarget {
  notify(method: string, args: unknown[]): void;
}

/** Engine surface a game wrapper may call on `strategy.engine`. */
export interface EngineProtocol {
  readonly id: { name: string };
  configure(options: Record<string, unknown>): void;
  setHashSize(megabytes: number): void;
  setOption(name: string, value: unknown): void;
  ping(): void;
  newGame(): void;
  setTimeControl(timeControl: TimeControl): void;
  reportGameResult(result: GameResult): void;
  stop(): void;
  quit(): void;
  /** Anything not listed above. */
  call(method: string, ...args: unknown[]): void;
}

export class NotificationShim implements EngineProtocol {
  readonly id: { name: string };

  constructor(
    private readonly owner: NotificationTarget,
    name: string
  ) {
    this.id = { name };
  }

  configure(options: Record<string, unknown>): void {
    this.owner.notify("configure", [options]);
  }

  setHashSize(megabytes: number): void {
    this.owner.notify("setHashSize", [megabytes]);
  }

  setOption(name: string, value: unknown): void {
    this.owner.notify("setOption", [name, value]);
  }

  ping(): void {
    this.owner.notify("ping", []);
  }

  newGame(): void {
    this.owner.notify("newGame", []);
  }

  setTimeControl(timeControl: TimeControl): void {
    this.owner.notify("setTimeControl", [timeControl]);
  }

  reportGameResult(result: GameResult): void {
    this.owner.notify("reportGameResult", [result]);
  }

  stop(): void {
    this.owner.notify("stop", []);
  }

  quit(): void {
    this.owner.notify("quit", []);
  }

  call(method: string, ...args: unknown[]): void {
    this.owner.notify(method, args);
  }
}
