import type bunyan from "bunyan";
import type { Variant } from "@tictacfoe/core";
import { type AiConfig, type SearchBudget, type Strategy, STRATEGIES, validateConfig } from "@tictacfoe/ai";
import { ConfigError } from "../errors.js";
import { LOG_LEVELS } from "../logger.js";
import { type ConfigData, CONFIG_KEYS } from "./defaults.js";

export type Opponent = "human" | Strategy;

export const VARIANTS: readonly Variant[] = ["classic", "ultimate"];
export const OPPONENTS: readonly Opponent[] = ["human", ...STRATEGIES];

/** The resolved configuration, parsed into the types the game and the AI take. */
export interface Settings {
  variant: Variant;
  opponent: Opponent;
  ai: AiConfig;
  seed: string;
  logLevel: bunyan.LogLevelString;
}

function oneOf<T extends string>(options: readonly T[], raw: string, what: string): T {
  const value = raw.trim().toLowerCase();
  const found = options.find((o) => o === value);
  if (found === undefined) {
    throw new ConfigError(`Unknown ${what} "${raw}". Expected one of: ${options.join(", ")}`);
  }
  return found;
}

export function parseVariant(raw: string): Variant {
  return oneOf(VARIANTS, raw, "variant");
}

export function parseOpponent(raw: string): Opponent {
  return oneOf(OPPONENTS, raw, "opponent");
}

export function parseStrategy(raw: string): Strategy {
  return oneOf(STRATEGIES, raw, "strategy");
}

export function parseLogLevel(raw: string): bunyan.LogLevelString {
  return oneOf(LOG_LEVELS, raw, "log level");
}

/**
 * "2000" is an iteration count; "500ms" and "2s" are time allowances.
 */
export function parseBudget(raw: string): SearchBudget {
  const value = raw.trim().toLowerCase();

  if (/^\d+$/.test(value)) {
    const count = Number(value);
    if (count > 0) {
      return { kind: "iterations", count };
    }
  }

  const timed = /^(\d+(?:\.\d+)?)(ms|s)$/.exec(value);
  if (timed) {
    const amount = Number(timed[1]);
    const ms = timed[2] === "s" ? amount * 1000 : amount;
    if (ms > 0) {
      return { kind: "time", ms };
    }
  }

  throw new ConfigError(
    `Invalid search budget "${raw}". Use a positive iteration count (2000) or a duration (500ms, 2s)`,
  );
}

export function parseExploration(raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Invalid exploration constant "${raw}". Use a non-negative number`);
  }
  return value;
}

export function parseConfigKey(raw: string): keyof ConfigData {
  const found = CONFIG_KEYS.find((k) => k === raw);
  if (found === undefined) {
    throw new ConfigError(`Unknown config key: "${raw}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return found;
}

export function parseGameCount(raw: string): number {
  const games = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(games) || games <= 0) {
    throw new ConfigError(`Invalid game count "${raw}". Use a positive integer`);
  }
  return games;
}

/** Throws ConfigError if `value` is not acceptable for `key`. */
export function validateValue(key: keyof ConfigData, value: string): void {
  switch (key) {
    case "variant":
      parseVariant(value);
      break;
    case "opponent":
      parseOpponent(value);
      break;
    case "budget":
      parseBudget(value);
      break;
    case "exploration":
      parseExploration(value);
      break;
    case "logLevel":
      parseLogLevel(value);
      break;
    case "seed":
      break;
  }
}

export function toSettings(config: ConfigData, now: () => number = Date.now): Settings {
  const ai: AiConfig = {
    budget: parseBudget(config.budget),
    explorationConstant: parseExploration(config.exploration),
  };
  validateConfig(ai);

  return {
    variant: parseVariant(config.variant),
    opponent: parseOpponent(config.opponent),
    ai,
    seed: config.seed !== "" ? config.seed : String(now()),
    logLevel: parseLogLevel(config.logLevel),
  };
}
