import { type ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults.js";
import { readConfigFile } from "./configFile.js";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

/**
 * Layer the sources, later ones winning: defaults, config file, environment,
 * command-line flags. Empty strings never override.
 */
export function mergeConfig(
  fileConfig: Partial<ConfigData>,
  env: NodeJS.ProcessEnv,
  overrides: Partial<ConfigData>,
): ConfigData {
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "") {
      resolved[key] = fileVal;
    }

    const envVal = env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      resolved[key] = envVal;
    }

    const cliVal = overrides[key];
    if (cliVal !== undefined && cliVal !== "") {
      resolved[key] = cliVal;
    }
  }

  return resolved;
}

export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  return mergeConfig(fileConfig, process.env, cliOverrides);
}
