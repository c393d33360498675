import type { Command } from "commander";
import { createInterface } from "node:readline";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  writeConfigFile,
  getConfigPath,
  validateValue,
  parseConfigKey,
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  OPPONENTS,
  VARIANTS,
  type ConfigData,
} from "../config/index.js";
import { exitWithError } from "../errors.js";

function createPrompter() {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    ask(prompt: string): Promise<string> {
      if (closed) return Promise.resolve("");
      return new Promise((resolve) => {
        rl.question(prompt, (answer) => resolve(answer));
        rl.once("close", () => resolve(""));
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.tictacfoe/config.json)");

  configCmd.action(async () => {
    try {
      await runWizard();
    } catch (err) {
      exitWithError(err);
    }
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      try {
        const configKey = parseConfigKey(key);
        validateValue(configKey, value);
        await updateConfigFile(configKey, value);
        console.log(`Set ${configKey} = ${value}`);
      } catch (err) {
        exitWithError(err);
      }
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      try {
        const configKey = parseConfigKey(key);
        const resolved = await resolveConfig();
        console.log(resolved[configKey]);
      } catch (err) {
        exitWithError(err);
      }
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      try {
        await printConfigList();
      } catch (err) {
        exitWithError(err);
      }
    });
}

async function askValid(
  prompter: ReturnType<typeof createPrompter>,
  key: keyof ConfigData,
  prompt: string,
  current: string,
): Promise<string> {
  for (;;) {
    const answer = (await prompter.ask(`${prompt} [${current}]: `)).trim();
    if (!answer) return current;
    try {
      validateValue(key, answer);
      return answer;
    } catch (err) {
      console.log(`  ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

export async function runWizard(): Promise<void> {
  const existing = await readConfigFile();
  const prompter = createPrompter();

  console.log("\nTic-Tac-Foe Configuration");
  console.log("─────────────────────────\n");

  try {
    const variant = await askValid(
      prompter,
      "variant",
      `Variant (${VARIANTS.join("/")})`,
      existing.variant || DEFAULTS.variant,
    );
    const opponent = await askValid(
      prompter,
      "opponent",
      `Opponent (${OPPONENTS.join("/")})`,
      existing.opponent || DEFAULTS.opponent,
    );
    const budget = await askValid(
      prompter,
      "budget",
      "Strong AI budget (iterations, or 500ms / 2s)",
      existing.budget || DEFAULTS.budget,
    );

    await writeConfigFile({ ...existing, variant, opponent, budget });
    console.log(`\nConfig saved to ${getConfigPath()}\n`);

    const resolved = await resolveConfig();
    for (const key of CONFIG_KEYS) {
      console.log(`  ${key}: ${display(resolved[key])}`);
    }
    console.log("");
  } finally {
    prompter.close();
  }
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    const source = getSource(key, fileData);
    console.log(`  ${key}: ${display(resolved[key])}  (${source})`);
  }
  console.log("");
}

function display(value: string): string {
  return value === "" ? "(not set)" : value;
}

function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
): string {
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}
