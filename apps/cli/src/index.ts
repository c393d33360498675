import dotenv from "dotenv";
dotenv.config();

import { program } from "commander";
import bunyan from "bunyan";
import React from "react";
import { render } from "ink";
import { SeededRng } from "@tictacfoe/core";
import { defaultRegistry } from "@tictacfoe/engine";
import { App } from "./tui/App.js";
import { initConfig, setCliOverride, toSettings } from "./config/index.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerBenchCommand } from "./commands/bench.js";
import { exitWithError } from "./errors.js";
import log from "./logger.js";

interface PlayOptions {
  variant?: string;
  opponent?: string;
  budget?: string;
  exploration?: string;
  seed?: string;
  aiFirst?: boolean;
}

program
  .name("tictacfoe")
  .description("Tic-Tac-Toe and Ultimate Tic-Tac-Toe against humans and AIs in the terminal")
  .version("0.1.0", "-V, --version");

registerConfigCommand(program);
registerBenchCommand(program);

program
  .command("play", { isDefault: true })
  .description("Start a game in the terminal")
  .option("-v, --variant <variant>", "classic or ultimate")
  .option("-o, --opponent <opponent>", "human, weak, medium or strong")
  .option("--budget <budget>", "Strong AI budget: iterations (2000) or time (500ms, 2s)")
  .option("--exploration <c>", "UCB1 exploration constant")
  .option("--seed <seed>", "Seed for the AI's random choices")
  .option("--ai-first", "Let the AI open the first game")
  .action(async (opts: PlayOptions) => {
    try {
      if (opts.variant) setCliOverride("variant", opts.variant);
      if (opts.opponent) setCliOverride("opponent", opts.opponent);
      if (opts.budget) setCliOverride("budget", opts.budget);
      if (opts.exploration) setCliOverride("exploration", opts.exploration);
      if (opts.seed) setCliOverride("seed", opts.seed);

      const settings = toSettings(await initConfig());
      // Ink owns the terminal; only warnings and above reach stderr while it draws
      log.level(Math.max(bunyan.resolveLevel(settings.logLevel), bunyan.WARN));

      // Flags that pick the game skip the menu
      const skipMenu = Boolean(opts.variant || opts.opponent);

      const { waitUntilExit } = render(
        React.createElement(App, {
          settings,
          rng: new SeededRng(settings.seed),
          skipMenu,
          aiFirst: Boolean(opts.aiFirst),
        }),
      );
      await waitUntilExit();
    } catch (err) {
      exitWithError(err);
    }
  });

program
  .command("games")
  .description("List available game variants")
  .action(() => {
    console.log("\nAvailable Games:");
    console.log("────────────────");
    for (const game of defaultRegistry.list()) {
      console.log(`  ${game.name} (${game.variant})`);
      console.log(`    ${game.description}`);
      console.log("");
    }
  });

program.parse();
