/**
 * Configuration Management
 *
 * Layers configuration from defaults, a JSON file (with per-environment
 * sections) and environment variables, in that order.
 */

import { readFile } from 'node:fs/promises';
import { isLogFormat, isLogLevel, type LogFormat, type LogLevel } from '../telemetry/logger.ts';
import { isRecord } from '../validation/validators.ts';

export type DatabaseDriver = 'sqlite' | 'memory';

export interface DatabaseOptions {
  driver: DatabaseDriver;
  path: string;
}

export interface ConfigOptions {
  port: number;
  host: string;
  env: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  database: DatabaseOptions;
}

export type PartialConfig = Partial<Omit<ConfigOptions, 'database'>> & {
  database?: Partial<DatabaseOptions>;
};

export const DEFAULT_CONFIG_PATH = 'config/app.json';

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8000,
  host: '0.0.0.0',
  env: 'development',
  logLevel: 'info',
  logFormat: 'pretty',
  database: {
    driver: 'sqlite',
    path: 'posts.db',
  },
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class Config {
  private config: ConfigOptions;

  constructor(...overrides: PartialConfig[]) {
    this.config = overrides.reduce(mergeConfig, DEFAULT_CONFIG);
  }

  get<K extends keyof ConfigOptions>(key: K): ConfigOptions[K] {
    return this.config[key];
  }

  all(): ConfigOptions {
    return { ...this.config, database: { ...this.config.database } };
  }
}

function mergeConfig(base: ConfigOptions, override: PartialConfig): ConfigOptions {
  return {
    ...base,
    ...override,
    database: { ...base.database, ...override.database },
  };
}

function isDatabaseDriver(value: unknown): value is DatabaseDriver {
  return value === 'sqlite' || value === 'memory';
}

function expectString(value: unknown, key: string, source: string): string {
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`${source}: ${key} must be a non-empty string`);
  }
  return value;
}

function parsePort(value: unknown, source: string): number {
  const port = typeof value === 'string' ? Number(value) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${source}: port must be an integer between 0 and 65535`);
  }
  return port;
}

/**
 * Validate a raw configuration object. Unknown keys are ignored.
 */
export function parsePartialConfig(raw: unknown, source: string): PartialConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: configuration must be a JSON object`);
  }

  const result: PartialConfig = {};

  if (raw.port !== undefined) result.port = parsePort(raw.port, source);
  if (raw.host !== undefined) result.host = expectString(raw.host, 'host', source);
  if (raw.env !== undefined) result.env = expectString(raw.env, 'env', source);

  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      throw new ConfigError(`${source}: logLevel must be one of debug, info, warn, error`);
    }
    result.logLevel = raw.logLevel;
  }

  if (raw.logFormat !== undefined) {
    if (!isLogFormat(raw.logFormat)) {
      throw new ConfigError(`${source}: logFormat must be json or pretty`);
    }
    result.logFormat = raw.logFormat;
  }

  if (raw.database !== undefined) {
    if (!isRecord(raw.database)) {
      throw new ConfigError(`${source}: database must be an object`);
    }
    const database: Partial<DatabaseOptions> = {};
    if (raw.database.driver !== undefined) {
      if (!isDatabaseDriver(raw.database.driver)) {
        throw new ConfigError(`${source}: database.driver must be sqlite or memory`);
      }
      database.driver = raw.database.driver;
    }
    if (raw.database.path !== undefined) {
      database.path = expectString(raw.database.path, 'database.path', source);
    }
    result.database = database;
  }

  return result;
}

/**
 * Configuration overrides read from environment variables
 */
export function envOverrides(env: NodeJS.ProcessEnv): PartialConfig {
  const database: Record<string, unknown> = {};
  if (env.DATABASE_DRIVER) database.driver = env.DATABASE_DRIVER;
  if (env.DATABASE_PATH) database.path = env.DATABASE_PATH;

  const raw: Record<string, unknown> = {};
  if (env.PORT) raw.port = env.PORT;
  if (env.HOST) raw.host = env.HOST;
  if (env.APP_ENV) raw.env = env.APP_ENV;
  if (env.LOG_LEVEL) raw.logLevel = env.LOG_LEVEL;
  if (env.LOG_FORMAT) raw.logFormat = env.LOG_FORMAT;
  if (Object.keys(database).length > 0) raw.database = database;

  return parsePartialConfig(raw, 'environment');
}

async function readConfigFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${path}: invalid JSON (${reason})`);
  }
}

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from the config file and the environment.
 *
 * The file may hold an `environments` object whose entry for the active
 * env (APP_ENV, else the file's `env`) is applied over the file's top level.
 * A missing file is the same as an empty one.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env;
  const path = options.path ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

  const raw = await readConfigFile(path);
  const fileConfig = parsePartialConfig(raw, path);
  const fromEnv = envOverrides(env);

  const activeEnv = fromEnv.env ?? fileConfig.env ?? DEFAULT_CONFIG.env;
  let envSection: PartialConfig = {};
  if (isRecord(raw) && isRecord(raw.environments) && raw.environments[activeEnv] !== undefined) {
    envSection = parsePartialConfig(raw.environments[activeEnv], `${path} (environments.${activeEnv})`);
  }

  return new Config(fileConfig, envSection, fromEnv, { env: activeEnv });
}
