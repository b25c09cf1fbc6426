import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../errors.js';

export const ServerConfigSchema = z.object({
  transport: z.enum(['stdio', 'http']).default('http'),
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(8181),
});

export const LoggingConfigSchema = z.object({
  debug: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Transport = ServerConfig['transport'];

export const CONFIG_FILE = '.tagged-memory.json';

export const ENV_PREFIX = 'TAGGED_MEMORY_';

// Values given on the command line; anything undefined falls through
export interface ConfigOverrides {
  transport?: string;
  host?: string;
  port?: string | number;
  debug?: boolean;
}

export interface ResolveConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/**
 * Read a JSON config file. An explicit path must exist; the default file in
 * the working directory is optional.
 */
export function loadConfigFile(configPath?: string, cwd: string = process.cwd()): Record<string, unknown> {
  const filePath = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE);

  if (!fs.existsSync(filePath)) {
    if (configPath) {
      throw new ConfigError('Config file not found', filePath);
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Could not read config: ${err instanceof Error ? err.message : String(err)}`,
      filePath
    );
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Config must be a JSON object', filePath);
  }
  return { ...raw };
}

/**
 * Defaults < config file < environment < command-line overrides.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): Config {
  const { env = process.env, overrides = {} } = options;
  const file = loadConfigFile(options.configPath, options.cwd);

  const fromEnv: ConfigOverrides = {
    transport: env[`${ENV_PREFIX}TRANSPORT`],
    host: env[`${ENV_PREFIX}HOST`],
    port: env[`${ENV_PREFIX}PORT`],
    debug: parseBoolean(env[`${ENV_PREFIX}DEBUG`], `${ENV_PREFIX}DEBUG`),
  };

  const server = {
    ...sectionOf(file, 'server'),
    ...defined({ transport: fromEnv.transport, host: fromEnv.host, port: parsePort(fromEnv.port) }),
    ...defined({ transport: overrides.transport, host: overrides.host, port: parsePort(overrides.port) }),
  };
  const logging = {
    ...sectionOf(file, 'logging'),
    ...defined({ debug: fromEnv.debug }),
    ...defined({ debug: overrides.debug }),
  };

  const result = ConfigSchema.safeParse({ ...file, server, logging });
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`Invalid configuration: ${where}${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

export function getConfigValue(config: Config, key: string): unknown {
  const keys = key.split('.');

  let current: unknown = config;
  for (const k of keys) {
    if (typeof current !== 'object' || current === null || !Object.hasOwn(current, k)) {
      return undefined;
    }
    current = Reflect.get(current, k);
  }

  return current;
}

export function parsePort(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const port = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(port)) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return port;
}

function parseBoolean(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`Invalid boolean for ${name}: ${value}`);
}

function sectionOf(file: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = file[key];
  return typeof section === 'object' && section !== null && !Array.isArray(section)
    ? { ...section }
    : {};
}

function defined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
