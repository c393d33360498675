import type { Command } from "commander";
import { type GameState, type Mark, type Rng, SeededRng } from "@tictacfoe/core";
import { getGameUI, type MoveChooser } from "@tictacfoe/engine";
import { type AiConfig, type Strategy, chooseMove, playSeries, search } from "@tictacfoe/ai";
import { initConfig, parseGameCount, parseStrategy, setCliOverride, toSettings } from "../config/index.js";
import { exitWithError } from "../errors.js";
import log from "../logger.js";

interface BenchOptions {
  variant?: string;
  first: string;
  second: string;
  games: string;
  seed?: string;
  budget?: string;
  exploration?: string;
}

/** A chooser that also logs the statistics of every strong search at debug level. */
function benchPlayer(strategy: Strategy, label: string, config: AiConfig, rng: Rng): MoveChooser {
  if (strategy !== "strong") {
    return (state) => chooseMove(state, strategy, config, rng);
  }
  return (state: GameState) => {
    const result = search(state, config, rng);
    log.debug(
      {
        player: label,
        turn: state.moveHistory.length + 1,
        move: result.move,
        iterations: result.iterations,
        elapsedMs: Math.round(result.elapsedMs),
        children: result.children.map((c) => `${c.move.board}:${c.move.cell}=${c.visits}`).join(" "),
      },
      "search",
    );
    return result.move;
  };
}

export function registerBenchCommand(program: Command): void {
  program
    .command("bench")
    .description("Play AI against AI headlessly and tally the results")
    .option("-v, --variant <variant>", "classic or ultimate")
    .option("-a, --first <strategy>", "First AI: weak, medium or strong", "strong")
    .option("-b, --second <strategy>", "Second AI: weak, medium or strong", "medium")
    .option("-n, --games <N>", "Number of games to play", "10")
    .option("--seed <seed>", "Seed for every random choice")
    .option("--budget <budget>", "Strong AI budget: iterations (2000) or time (500ms, 2s)")
    .option("--exploration <c>", "UCB1 exploration constant")
    .action(async (opts: BenchOptions) => {
      try {
        if (opts.variant) setCliOverride("variant", opts.variant);
        if (opts.seed) setCliOverride("seed", opts.seed);
        if (opts.budget) setCliOverride("budget", opts.budget);
        if (opts.exploration) setCliOverride("exploration", opts.exploration);

        const settings = toSettings(await initConfig());
        log.level(settings.logLevel);

        const a = parseStrategy(opts.first);
        const b = parseStrategy(opts.second);
        const games = parseGameCount(opts.games);

        const rng = new SeededRng(settings.seed);
        const ui = getGameUI(settings.variant);
        const aLabel = `A (${a})`;
        const bLabel = `B (${b})`;

        log.info({ variant: settings.variant, a, b, games, seed: settings.seed, ai: settings.ai }, "bench started");

        const tally = playSeries(
          settings.variant,
          benchPlayer(a, aLabel, settings.ai, rng),
          benchPlayer(b, bLabel, settings.ai, rng),
          games,
          (index, result, aMark: Mark) => {
            const { outcome } = result;
            let winner = "draw";
            if (outcome.status === "win") {
              winner = outcome.winner === aMark ? aLabel : bLabel;
            }
            log.info(
              {
                game: index + 1,
                x: aMark === "X" ? aLabel : bLabel,
                winner,
                moves: result.moves.length,
              },
              "game finished",
            );
            log.debug({ game: index + 1, moves: result.moves.map((m) => ui.formatMove(m)) }, "move list");
          },
        );

        console.log(`\n${settings.variant}: ${games} games, alternating who starts`);
        console.log("──────────────────────────────────────");
        console.log(`  ${aLabel.padEnd(14)} ${tally.a} wins`);
        console.log(`  ${bLabel.padEnd(14)} ${tally.b} wins`);
        console.log(`  ${"draws".padEnd(14)} ${tally.draws}`);
        console.log("");
      } catch (err) {
        exitWithError(err);
      }
    });
}
