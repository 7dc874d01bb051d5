/**
 * play command — a local game between two strategies.
 */

import { createStrategy } from "@oddmoves/engine";
import type { MinimalStrategy } from "@oddmoves/engine";
import { uciOracleFactory } from "../uci-oracle";
import { playGame } from "../session";
import { formatGameSummary, formatMoveLine } from "../format";
import { parseMs, strategyOptionsFrom } from "./shared";
import type { CommonOptions } from "./shared";

interface PlayCommandOptions extends CommonOptions {
  white: string;
  black: string;
  fen?: string;
  time: string;
  inc: string;
  firstMove: string;
  maxPlies: string;
  pgn?: boolean;
}

export async function play(options: PlayCommandOptions) {
  const strategyOptions = strategyOptionsFrom(options);
  const oracleFactory = uciOracleFactory();

  const created: MinimalStrategy[] = [];
  let white: MinimalStrategy;
  let black: MinimalStrategy;
  try {
    white = createStrategy(options.white, { ...strategyOptions, oracleFactory });
    created.push(white);
    black = createStrategy(options.black, { ...strategyOptions, oracleFactory });
    created.push(black);
  } catch (err) {
    // playGame owns shutdown once it starts; before that it is ours
    for (const s of created) s.shutdown();
    throw err;
  }

  const initialMs = (parseMs(options.time, "--time") ?? 180) * 1000;
  const incrementMs = (parseMs(options.inc, "--inc") ?? 2) * 1000;

  console.log(
    `\n${white.name} vs ${black.name}, ${initialMs / 1000}+${incrementMs / 1000}`
  );

  const summary = await playGame({
    white,
    black,
    fen: options.fen,
    timeControl: { initialMs, incrementMs },
    firstMoveMs: parseMs(options.firstMove, "--first-move"),
    maxPlies: parseMs(options.maxPlies, "--max-plies"),
    onMove: (record) => console.log(formatMoveLine(record)),
  });

  console.log(formatGameSummary(summary));
  if (options.pgn) console.log(summary.pgn);
}
