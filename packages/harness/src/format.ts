/**
 * CLI output formatting — move lines and game summaries.
 */

import type { BoardMove } from "@oddmoves/engine";
import type { GameSummary, MoveRecord } from "./types";

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/** "  12. ... Nf6     0.4s  [2:57.3]" */
export function formatMoveLine(record: MoveRecord): string {
  const { moveNumber } = record;
  const prefix = record.side === "white" ? `${moveNumber}.` : `${moveNumber}. ...`;
  const clock = record.clockMs === null ? "" : `  [${formatClock(record.clockMs)}]`;
  return `  ${prefix.padStart(8)} ${record.move.san.padEnd(8)} ${seconds(record.thinkMs).padStart(6)}${clock}`;
}

/** m:ss.t */
export function formatClock(ms: number): string {
  const totalTenths = Math.max(0, Math.floor(ms / 100));
  const minutes = Math.floor(totalTenths / 600);
  const secs = ((totalTenths % 600) / 10).toFixed(1).padStart(4, "0");
  return `${minutes}:${secs}`;
}

export function formatDecision(strategy: string, move: BoardMove, elapsedMs: number): string {
  return `${strategy} plays ${move.san} (${move.uci}) after ${seconds(elapsedMs)}`;
}

export function formatGameSummary(summary: GameSummary): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(`  ${summary.white} (white) vs ${summary.black} (black)`);
  lines.push("  " + "─".repeat(50));
  lines.push(`  Result:   ${summary.result} (${summary.reason})`);
  lines.push(`  Plies:    ${summary.moves.length}`);
  lines.push(`  Final:    ${summary.finalFen}`);
  lines.push("");
  return lines.join("\n");
}
