import type { Logger } from "./types";

/**
 * Prefix every line with a bracketed tag, e.g. "[worstfish] ...".
 * Debug output only appears when ODDMOVES_DEBUG is set.
 */
export function taggedLogger(tag: string, base: Logger = console): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (debugEnabled()) base.debug(prefix, ...args);
    },
    info: (...args) => base.info(prefix, ...args),
    warn: (...args) => base.warn(prefix, ...args),
    error: (...args) => base.error(prefix, ...args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function debugEnabled(): boolean {
  return typeof process !== "undefined" && !!process.env.ODDMOVES_DEBUG;
}
