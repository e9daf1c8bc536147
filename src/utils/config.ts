import { readFile, access } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';

const CONFIG_PATHS = [
  join(homedir(), '.dedupecopiesrc'),
  join(homedir(), '.config', 'dedupe-copies', 'config.json'),
];

export const CONFIG_ENV_VAR = 'DEDUPE_COPIES_CONFIG';

export interface Config {
  ignoredPaths?: string[];   // File names or absolute paths never considered
  minSize?: number;          // Bytes; smaller files never considered
  verbose?: boolean;
}

const DEFAULT_CONFIG: Config = {
  ignoredPaths: [],
  minSize: 0,
  verbose: false,
};

let cachedConfig: Config | null = null;

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function getDefaultConfig(): Config {
  return { ...DEFAULT_CONFIG, ignoredPaths: [] };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Keep only the known, well-typed keys of a parsed config file.
 */
export function parseConfig(raw: unknown): Partial<Config> {
  if (typeof raw !== 'object' || raw === null) {
    return {};
  }

  const parsed: Partial<Config> = {};
  const ignoredPaths: unknown = Reflect.get(raw, 'ignoredPaths');
  const minSize: unknown = Reflect.get(raw, 'minSize');
  const verbose: unknown = Reflect.get(raw, 'verbose');

  if (isStringArray(ignoredPaths)) parsed.ignoredPaths = ignoredPaths;
  if (typeof minSize === 'number' && Number.isInteger(minSize) && minSize >= 0) parsed.minSize = minSize;
  if (typeof verbose === 'boolean') parsed.verbose = verbose;

  return parsed;
}

export class ConfigError extends Error {
  constructor(public path: string, message: string) {
    super(`Invalid config file '${path}': ${message}`);
    this.name = 'ConfigError';
  }
}

async function readConfigFile(path: string): Promise<Config> {
  const content = await readFile(path, 'utf-8');
  try {
    return { ...getDefaultConfig(), ...parseConfig(JSON.parse(content)) };
  } catch (error) {
    throw new ConfigError(path, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Load the first config file found. An explicit path, then
 * $DEDUPE_COPIES_CONFIG, then the rc locations in the home directory.
 * Missing files fall through to the defaults; malformed JSON throws.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  const envPath = process.env[CONFIG_ENV_VAR];
  const paths = configPath ? [configPath] : envPath ? [envPath, ...CONFIG_PATHS] : CONFIG_PATHS;

  for (const path of paths) {
    try {
      await access(path);
    } catch {
      continue;
    }
    const config = await readConfigFile(path);
    if (!configPath) cachedConfig = config;
    return config;
  }

  const config = getDefaultConfig();
  if (!configPath) cachedConfig = config;
  return config;
}
