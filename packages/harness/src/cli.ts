#!/usr/bin/env tsx

/**
 * oddmoves harness CLI — run a strategy on a position, or play a local game.
 */

import { Command } from "commander";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { choose } from "./commands/choose";
import { play } from "./commands/play";
import { list } from "./commands/list";
import { ORACLE_PATH_ENV, loadEnvFile } from "./oracle-path";

// Root .env / .env.local (packages/harness/src → repo root)
loadEnvFile(join(dirname(fileURLToPath(import.meta.url)), "..", "..", ".."));

const program = new Command()
  .name("oddmoves")
  .description("Pluggable move-selection strategies for chess")
  .version("0.1.0");

const oracleHelp = `Oracle executable (default: $${ORACLE_PATH_ENV}, then stockfish/stockfish)`;

program
  .command("list")
  .description("List the available strategies")
  .option("--oracle <path>", oracleHelp)
  .action(list);

program
  .command("choose")
  .description("Pick one move for the side to move")
  .requiredOption("-s, --strategy <name>", "Strategy name (see `list`)")
  .option("-f, --fen <fen>", "Position (default: starting position)")
  .option("--wtime <ms>", "White's remaining clock", "60000")
  .option("--btime <ms>", "Black's remaining clock", "60000")
  .option("--winc <ms>", "White's increment", "0")
  .option("--binc <ms>", "Black's increment", "0")
  .option("--movetime <ms>", "Fixed per-move limit instead of a clock")
  .option("--oracle <path>", oracleHelp)
  .option("-c, --config <json>", "StrategyConfig overrides as JSON string")
  .option("--seed <n>", "Random seed for reproducible choices")
  .action(choose);

program
  .command("play")
  .description("Play a local game between two strategies")
  .requiredOption("-w, --white <name>", "White's strategy")
  .requiredOption("-b, --black <name>", "Black's strategy")
  .option("-f, --fen <fen>", "Starting position")
  .option("-t, --time <seconds>", "Initial clock per side", "180")
  .option("-i, --inc <seconds>", "Increment per move", "2")
  .option("--first-move <ms>", "Fixed limit for each side's first move", "10000")
  .option("--max-plies <n>", "Stop the game after this many plies", "400")
  .option("--oracle <path>", oracleHelp)
  .option("-c, --config <json>", "StrategyConfig overrides as JSON string")
  .option("--seed <n>", "Random seed for reproducible games")
  .option("--pgn", "Print the game as PGN at the end")
  .action(play);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
