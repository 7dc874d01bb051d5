/** A policy did not override the search operation. */
export class NotImplementedError extends Error {
  constructor(method = "search") {
    super(`The ${method} method is not implemented`);
    this.name = "NotImplementedError";
  }
}

/** The evaluation oracle failed to start, died, or broke protocol. */
export class OracleError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "OracleError";
    this.cause = cause;
  }
}

/** A strategy returned without undoing every probe it pushed. */
export class PositionLeakError extends Error {
  constructor(strategy: string, before: string, after: string) {
    super(`${strategy} left the position changed: "${before}" -> "${after}"`);
    this.name = "PositionLeakError";
  }
}

export class UnknownStrategyError extends Error {
  constructor(name: string, known: readonly string[]) {
    super(`Unknown strategy "${name}". Known: ${known.join(", ")}`);
    this.name = "UnknownStrategyError";
  }
}
