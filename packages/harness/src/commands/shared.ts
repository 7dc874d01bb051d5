/**
 * Option handling shared by the choose and play commands.
 */

import { createSeededRandom } from "@oddmoves/engine";
import type { StrategyConfigOverrides, StrategyOptions } from "@oddmoves/engine";
import { resolveOraclePath } from "../oracle-path";

const FIELD_TYPES: Record<string, Record<string, "number" | "string">> = {
  time: {
    baseSearchMs: "number",
    clockShare: "number",
    safetyMarginMs: "number",
    minDeadlineMs: "number",
  },
  draws: { threshold: "number" },
  oracle: { path: "string", hashMb: "number", threads: "number" },
};
const SECTIONS = Object.keys(FIELD_TYPES);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Shape check for `--config` JSON: known sections and fields, right types. */
export function isConfigOverrides(value: unknown): value is StrategyConfigOverrides {
  if (!isPlainObject(value)) return false;
  return Object.entries(value).every(([key, section]) => {
    const fields = FIELD_TYPES[key];
    if (!fields || !isPlainObject(section)) return false;
    return Object.entries(section).every(
      ([field, v]) => fields[field] !== undefined && typeof v === fields[field]
    );
  });
}

export function parseConfigOverrides(json: string | undefined): StrategyConfigOverrides {
  if (!json) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`Invalid config JSON: ${json}`, { cause: err });
  }
  if (!isConfigOverrides(parsed)) {
    throw new Error(`Config must be an object with sections ${SECTIONS.join(", ")}: ${json}`);
  }
  return parsed;
}

export interface CommonOptions {
  oracle?: string;
  config?: string;
  seed?: string;
}

/**
 * Merge --config with the resolved oracle path. An explicit --oracle wins
 * over a path given in --config, which wins over the environment.
 */
export function strategyOptionsFrom(options: CommonOptions): StrategyOptions {
  const overrides = parseConfigOverrides(options.config);
  const path = resolveOraclePath(options.oracle ?? overrides.oracle?.path);
  return {
    config: { ...overrides, oracle: { ...overrides.oracle, path } },
    random: options.seed === undefined ? undefined : createSeededRandom(parseSeed(options.seed)),
  };
}

export function parseSeed(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isSafeInteger(n)) {
    throw new Error(`--seed must be an integer, got "${value}"`);
  }
  return n;
}

export function parseMs(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new Error(`${label} must be a number, got "${value}"`);
  return n;
}
