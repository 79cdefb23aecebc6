// config/load.ts
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { CONFIG_FILE_NAME } from '../constants.ts';
import { formatIssues } from '../schemas/u64.ts';
import { AppConfig } from './schema.ts';

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: Env;
}

function validate(raw: unknown, origin: string): AppConfig {
  const result = AppConfig.safeParse(raw);
  if (!result.success) {
    throw new Error(`Config validation failed (${origin}):\n${formatIssues(result.error)}`);
  }
  return result.data;
}

function readJsonFile(path: string, label: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to load ${label}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }
}

/** RELAYER_API_KEYS="alice:key-a,bob:key-b" */
export function parseRelayerList(raw: string): { name: string; apiKey: string }[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const sep = entry.indexOf(':');
      if (sep <= 0) {
        throw new Error(`Invalid RELAYER_API_KEYS entry "${entry}", expected name:apiKey`);
      }
      return { name: entry.slice(0, sep), apiKey: entry.slice(sep + 1) };
    });
}

function fromEnvVars(env: Env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  if (env.PORT) raw.port = env.PORT;
  if (env.REDIS_URL) raw.redisUrl = env.REDIS_URL;
  if (env.REDIS_KEY_PREFIX !== undefined) raw.keyPrefix = env.REDIS_KEY_PREFIX;
  if (env.STATE_KEY) raw.stateKey = env.STATE_KEY;
  if (env.RELAYER_API_KEYS) raw.relayers = parseRelayerList(env.RELAYER_API_KEYS);
  return raw;
}

export async function loadConfig(filename?: string, opts: LoadConfigOptions = {}): Promise<AppConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;

  // Priority 1: explicitly provided file path (from command line args)
  if (filename) {
    const explicitConfigPath = join(cwd, filename);
    if (!existsSync(explicitConfigPath)) {
      throw new Error(`Config file not found: ${explicitConfigPath}`);
    }
    return validate(readJsonFile(explicitConfigPath, filename), filename);
  }

  // Priority 2: config.oracle.json in the working directory
  const defaultConfigPath = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(defaultConfigPath)) {
    return validate(readJsonFile(defaultConfigPath, CONFIG_FILE_NAME), CONFIG_FILE_NAME);
  }

  // Priority 3: ORACLE_CONFIG holding the whole document as JSON
  if (env.ORACLE_CONFIG) {
    let configData: unknown;
    try {
      configData = JSON.parse(env.ORACLE_CONFIG);
    } catch (error) {
      throw new Error(
        `Failed to parse ORACLE_CONFIG: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    return validate(configData, 'ORACLE_CONFIG');
  }

  // Priority 4: individual env vars, defaults for the rest
  return validate(fromEnvVars(env), 'environment');
}
