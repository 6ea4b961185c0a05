/**
 * Configuration loader for thermal-map.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isLogLevel, LOG_LEVELS } from '../logging/logger.js';
import type { AppConfig, LoggingConfig, OutputConfig, PathsConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

export const CONFIG_PATH_ENV = 'THERMAL_MAP_CONFIG';
export const DEFAULT_CONFIG_FILE = './thermal-map.yaml';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.THERMAL_MAP_CONFIG or './thermal-map.yaml') */
  configPath?: string;
  /** Called for non-fatal problems such as a missing file (default: console.warn) */
  warn?: (message: string) => void;
}

export interface LoadedConfig {
  config: AppConfig;
  /** Absolute path of the file read, or null when defaults were used */
  sourcePath: string | null;
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
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function substituteEnvVars(value: string, warn: (message: string) => void): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
export function substituteEnvVarsRecursive(
  obj: unknown,
  warn: (message: string) => void = console.warn
): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, warn);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, warn));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, warn);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function validateSection(config: unknown, path: string, keys: string[]): Record<string, unknown> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  for (const key of keys) {
    const value = config[key];
    if (value !== undefined && (typeof value !== 'string' || value.length === 0)) {
      throw new ConfigValidationError(`${key} must be a non-empty string`, `${path}.${key}`, value);
    }
  }
  return config;
}

function validatePathsConfig(config: unknown, path = 'paths'): asserts config is Partial<PathsConfig> {
  validateSection(config, path, ['log', 'template', 'outputDir']);
}

function validateOutputConfig(config: unknown, path = 'output'): asserts config is Partial<OutputConfig> {
  const c = validateSection(config, path, ['fileName']);
  if (typeof c.fileName === 'string' && /[\\/]/.test(c.fileName)) {
    throw new ConfigValidationError('fileName must not contain a directory', `${path}.fileName`, c.fileName);
  }
}

function validateLoggingConfig(config: unknown, path = 'logging'): asserts config is Partial<LoggingConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  if (config.level !== undefined && !isLogLevel(config.level)) {
    throw new ConfigValidationError(
      `level must be one of: ${LOG_LEVELS.join(', ')}`,
      `${path}.level`,
      config.level
    );
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is Partial<{
  paths: Partial<PathsConfig>;
  output: Partial<OutputConfig>;
  logging: Partial<LoggingConfig>;
}> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }
  if (config.paths !== undefined) {
    validatePathsConfig(config.paths);
  }
  if (config.output !== undefined) {
    validateOutputConfig(config.output);
  }
  if (config.logging !== undefined) {
    validateLoggingConfig(config.logging);
  }
}

/**
 * Merge a validated partial config over the defaults.
 */
export function applyDefaults(partial: unknown): AppConfig {
  validateConfig(partial);
  return {
    paths: { ...DEFAULT_CONFIG.paths, ...partial.paths },
    output: { ...DEFAULT_CONFIG.output, ...partial.output },
    logging: { ...DEFAULT_CONFIG.logging, ...partial.logging },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * A missing file is not an error: defaults are returned and a warning is
 * reported.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const warn = options.warn ?? console.warn;
  const configPath = options.configPath
    ?? process.env[CONFIG_PATH_ENV]
    ?? DEFAULT_CONFIG_FILE;

  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    warn(`Config file not found at ${absolutePath}, using defaults`);
    return { config: structuredClone(DEFAULT_CONFIG), sourcePath: null };
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const substituted = substituteEnvVarsRecursive(parsed ?? {}, warn);

  return { config: applyDefaults(substituted), sourcePath: absolutePath };
}

/**
 * Resolve relative paths against the directory of the config file, or the
 * working directory when defaults were used.
 */
export function resolveConfigPaths(loaded: LoadedConfig, cwd: string = process.cwd()): PathsConfig {
  const base = loaded.sourcePath ? dirname(loaded.sourcePath) : cwd;
  const abs = (p: string): string => (isAbsolute(p) ? p : resolve(base, p));
  return {
    log: abs(loaded.config.paths.log),
    template: abs(loaded.config.paths.template),
    outputDir: abs(loaded.config.paths.outputDir),
  };
}
