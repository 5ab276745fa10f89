import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { CONFIG_KEYS, ConfigData } from "./defaults.js";

/** `REVERSI_HOME` relocates the config directory (default ~/.reversi) */
export function getConfigDir(): string {
  return process.env.REVERSI_HOME || join(homedir(), ".reversi");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const configPath = getConfigPath();
  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${configPath} is malformed and was ignored. ` +
          `Run "reversi config set <key> <value>" to recreate it.`,
      );
      return {};
    }
    throw err;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  const data: Partial<ConfigData> = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === "string") {
      data[key] = value;
    }
  }
  return data;
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
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
