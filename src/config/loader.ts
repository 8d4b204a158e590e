/**
 * Configuration loader for informant-ontology.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values for every setting
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { LOG_LEVELS, moduleLogger, type Logger, type LogLevel } from '../logging/logger.js';
import type { AppConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.INFORMANT_CONFIG or './informant.config.yaml') */
  configPath?: string;
  logger?: Logger;
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

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, log: Logger): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    log.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
export function substituteEnvVarsRecursive(obj: unknown, log: Logger = moduleLogger('config')): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, log);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => substituteEnvVarsRecursive(item, log));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, log);
    }
    return result;
  }
  return obj;
}

/** Substituted values arrive as strings. */
const flag = z.preprocess(
  value => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);

const nullableString = z.preprocess(value => (value === '' ? null : value), z.string().min(1).nullable());

const logLevelSchema = z.custom<LogLevel>(
  value => typeof value === 'string' && LOG_LEVELS.some(level => level === value),
  { message: `must be one of: ${LOG_LEVELS.join(', ')}` }
);

const ontologySchema = z.object({
  rootType: z.string().min(1).default(DEFAULT_CONFIG.ontology.rootType),
  dynamicDepthMode: flag.default(DEFAULT_CONFIG.ontology.dynamicDepthMode),
  path: nullableString.default(DEFAULT_CONFIG.ontology.path),
}).strict();

const querySchema = z.object({
  escapeMarker: z.string().min(1).default(DEFAULT_CONFIG.query.escapeMarker),
  onMissing: flag.default(DEFAULT_CONFIG.query.onMissing),
  workers: z.coerce.number().int().positive().default(DEFAULT_CONFIG.query.workers),
  chunkSize: z.union([z.null(), z.coerce.number().int().positive()]).default(DEFAULT_CONFIG.query.chunkSize),
}).strict();

const storeSchema = z.object({
  path: nullableString.default(DEFAULT_CONFIG.store.path),
  verifyOnAppend: flag.default(DEFAULT_CONFIG.store.verifyOnAppend),
}).strict();

const loggingSchema = z.object({
  level: logLevelSchema.default(DEFAULT_CONFIG.logging.level),
}).strict();

/**
 * Schema of the whole file; absent sections and settings take their defaults.
 */
export const appConfigSchema: z.ZodType<AppConfig, z.ZodTypeDef, unknown> = z.object({
  ontology: ontologySchema.default({}),
  query: querySchema.default({}),
  store: storeSchema.default({}),
  logging: loggingSchema.default({}),
}).strict();

function valueAt(root: unknown, path: Array<string | number>): unknown {
  let current = root;
  for (const segment of path) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Object.entries(current).find(([key]) => key === String(segment))?.[1];
  }
  return current;
}

/**
 * Validate a parsed configuration document and apply defaults.
 *
 * @throws ConfigValidationError naming the first offending setting
 */
export function validateConfig(config: unknown): AppConfig {
  const parsed = appConfigSchema.safeParse(config ?? {});
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  const path = issue?.path ?? [];
  throw new ConfigValidationError(issue?.message ?? 'invalid configuration', path.join('.'), valueAt(config, path));
}

/**
 * Load configuration from a YAML file.
 *
 * A missing file yields the defaults.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const log = moduleLogger('config', options.logger);
  const configPath = options.configPath
    ?? process.env.INFORMANT_CONFIG
    ?? './informant.config.yaml';

  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    log.warn(`Config file not found at ${absolutePath}, using defaults`);
    return validateConfig({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return validateConfig(substituteEnvVarsRecursive(parsed, log));
}
