import { DEFAULT_AI_CONFIG } from "@tictacfoe/ai";

export interface ConfigData {
  variant: string;
  /** "human" or an AI strategy */
  opponent: string;
  /** Strong search budget: iterations ("2000") or time ("500ms", "2s") */
  budget: string;
  exploration: string;
  /** Seed for every random choice; empty for a fresh one each run */
  seed: string;
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "variant",
  "opponent",
  "budget",
  "exploration",
  "seed",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  variant: "classic",
  opponent: "medium",
  budget: "1000",
  exploration: String(DEFAULT_AI_CONFIG.explorationConstant),
  seed: "",
  logLevel: "info",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  variant: "TICTACFOE_VARIANT",
  opponent: "TICTACFOE_OPPONENT",
  budget: "TICTACFOE_MCTS_BUDGET",
  exploration: "TICTACFOE_EXPLORATION",
  seed: "TICTACFOE_SEED",
  logLevel: "LOG_LEVEL",
};
