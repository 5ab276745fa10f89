import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults.js";
import { readConfigFile } from "./configFile.js";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) {
    delete cliOverrides[key];
  }
}

function pick(value: string | undefined): string | undefined {
  return value !== undefined && value !== "" ? value : undefined;
}

/** Defaults, then the config file, then the environment, then CLI flags */
export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    resolved[key] =
      pick(cliOverrides[key]) ??
      pick(process.env[ENV_MAP[key]]) ??
      pick(fileConfig[key]) ??
      resolved[key];
  }

  return resolved;
}
