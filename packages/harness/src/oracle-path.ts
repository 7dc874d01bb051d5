/**
 * Oracle executable resolution — done once, by the harness, and handed to
 * strategies through StrategyConfig.oracle.path.
 *
 * Order: explicit --oracle flag → ODDMOVES_ORACLE_PATH → platform default.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

export const ORACLE_PATH_ENV = "ODDMOVES_ORACLE_PATH";

export function defaultOraclePath(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "stockfish\\stockfish.exe" : "stockfish/stockfish";
}

export function resolveOraclePath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  if (explicit) return explicit;
  const fromEnv = env[ORACLE_PATH_ENV]?.trim();
  if (fromEnv) return fromEnv;
  return defaultOraclePath(platform);
}

/**
 * Load KEY=VALUE lines from `.env` then `.env.local` in `dir`.
 * Existing variables win, so CI settings are never overridden.
 */
export function loadEnvFile(
  dir: string,
  env: NodeJS.ProcessEnv = process.env
): void {
  for (const name of [".env", ".env.local"]) {
    const envPath = join(dir, name);
    if (!existsSync(envPath)) continue;
    const content = readFileSync(envPath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const eqIdx = trimmed.indexOf("=");
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      const value = trimmed.slice(eqIdx + 1).trim();
      if (!env[key]) {
        env[key] = value;
      }
    }
  }
}
