/**
 * list command — registered strategies and the oracle they would use.
 */

import { ORACLE_STRATEGIES, STRATEGY_NAMES } from "@oddmoves/engine";
import { resolveOraclePath } from "../oracle-path";

export function list(options: { oracle?: string }) {
  const oraclePath = resolveOraclePath(options.oracle);
  console.log("\nStrategies:");
  for (const name of STRATEGY_NAMES) {
    const note = ORACLE_STRATEGIES.includes(name) ? `  (oracle: ${oraclePath})` : "";
    console.log(`  ${name}${note}`);
  }
  console.log("");
}
