/**
 * Configuration loader for the pattern library server.
 *
 * Sources, lowest precedence first:
 * - built-in defaults
 * - optional YAML file (CONFIG_PATH), with ${VAR} / ${VAR:-default} substitution
 * - PORT, HOST and LOG_LEVEL environment variables
 *
 * PATTERNS_DIR is always read from the environment and is required.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig, CorsConfig, LogLevel, ServerConfig } from './types.js';
import { DEFAULT_SERVER_CONFIG, PATTERNS_DIR_ENV } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: env.CONFIG_PATH; no file when neither is set) */
  configPath?: string;
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Substitute environment variables in a string.
 */
function substituteEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => substituteEnvVarsRecursive(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * Read PATTERNS_DIR and resolve it to an absolute path.
 *
 * @throws ConfigValidationError when the variable is missing or empty
 */
export function resolvePatternsDir(env: NodeJS.ProcessEnv = process.env): string {
  const value = env[PATTERNS_DIR_ENV];
  if (value === undefined || value.trim() === '') {
    throw new ConfigValidationError(
      `${PATTERNS_DIR_ENV} environment variable must be set`,
      PATTERNS_DIR_ENV,
      value
    );
  }
  return resolve(value);
}

function parsePort(value: unknown, path: string): number {
  const port = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', path, value);
  }
  return port;
}

function parseCorsConfig(value: unknown, path: string): Partial<CorsConfig> {
  if (typeof value === 'boolean') {
    return { enabled: value };
  }
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be a boolean or an object', path, value);
  }

  const cors: Partial<CorsConfig> = {};
  if (value.enabled !== undefined) {
    if (typeof value.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.enabled`, value.enabled);
    }
    cors.enabled = value.enabled;
  }
  if (value.origins !== undefined) {
    const origins = value.origins;
    if (!Array.isArray(origins) || !origins.every((o): o is string => typeof o === 'string')) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.origins`, origins);
    }
    cors.origins = origins;
  }
  return cors;
}

/**
 * Validate the server section of the config file.
 */
export function parseServerConfig(value: unknown, path = 'server'): Partial<ServerConfig> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', path, value);
  }

  const server: Partial<ServerConfig> = {};

  if (value.port !== undefined) {
    server.port = parsePort(value.port, `${path}.port`);
  }

  if (value.host !== undefined) {
    if (typeof value.host !== 'string' || value.host.length === 0) {
      throw new ConfigValidationError('host must be a string', `${path}.host`, value.host);
    }
    server.host = value.host;
  }

  if (value.logLevel !== undefined) {
    if (!isLogLevel(value.logLevel)) {
      throw new ConfigValidationError(
        `logLevel must be one of: ${LOG_LEVELS.join(', ')}`,
        `${path}.logLevel`,
        value.logLevel
      );
    }
    server.logLevel = value.logLevel;
  }

  if (value.cors !== undefined) {
    server.cors = { ...DEFAULT_SERVER_CONFIG.cors, ...parseCorsConfig(value.cors, `${path}.cors`) };
  }

  return server;
}

/**
 * Read the server section from a YAML config file.
 */
async function readConfigFile(configPath: string, env: NodeJS.ProcessEnv): Promise<unknown> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return undefined;
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (parsed === null || parsed === undefined) {
    return undefined;
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError('must be an object', '', parsed);
  }

  return substituteEnvVarsRecursive(parsed.server, env);
}

/**
 * Load and validate the application configuration.
 *
 * @throws ConfigValidationError when PATTERNS_DIR is missing or a setting is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const patternsDir = resolvePatternsDir(env);

  const configPath = options.configPath ?? env.CONFIG_PATH;
  const fileServer = configPath ? parseServerConfig(await readConfigFile(configPath, env)) : {};

  const envServer = parseServerConfig(
    {
      ...(env.PORT ? { port: env.PORT } : {}),
      ...(env.HOST ? { host: env.HOST } : {}),
      ...(env.LOG_LEVEL ? { logLevel: env.LOG_LEVEL } : {}),
    },
    'env'
  );

  return {
    patternsDir,
    server: { ...DEFAULT_SERVER_CONFIG, ...fileServer, ...envServer },
  };
}
