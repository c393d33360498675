import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { type ConfigData, CONFIG_KEYS } from "./defaults.js";

const CONFIG_DIR = join(homedir(), ".tictacfoe");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export function getConfigPath(): string {
  return CONFIG_PATH;
}

/** Keep only known keys with string values from parsed JSON. */
export function pickConfig(parsed: unknown): Partial<ConfigData> {
  const picked: Partial<ConfigData> = {};
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return picked;
  }
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === "string") {
      picked[key] = value;
    }
  }
  return picked;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  try {
    const raw = await readFile(CONFIG_PATH, "utf-8");
    return pickConfig(JSON.parse(raw));
  } catch (err) {
    if (isMissingFile(err)) {
      return {};
    }
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${CONFIG_PATH} is malformed and was ignored. ` +
          `Run "tictacfoe config" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(CONFIG_DIR, { recursive: true });
  await writeFile(CONFIG_PATH, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
