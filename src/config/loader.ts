/**
 * Configuration File Loader
 *
 * Loads configuration from multiple sources with precedence:
 * 1. Environment variables (highest priority)
 * 2. Project-local config (.typed-event-bus/config.yml)
 * 3. Global user config (~/.typed-event-bus/config.yml)
 * 4. Built-in defaults (lowest priority)
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import { EventBusConfigSchema, type EventBusConfig } from './schema';
import { DEFAULT_CONFIG } from './defaults';

/**
 * Untyped configuration layer, as read from a file or the environment
 */
export type ConfigLayer = Record<string, unknown>;

/**
 * Where each source is looked up. Defaults to the real process values.
 */
export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_DIR = '.typed-event-bus';
export const CONFIG_FILE = 'config.yml';
export const ENV_PREFIX = 'TYPED_EVENT_BUS_';

/**
 * Cached configuration to avoid repeated file system access
 */
let cachedConfig: EventBusConfig | null = null;

/**
 * Load and merge configuration from all sources.
 *
 * @returns Complete configuration with all required fields
 * @throws {Error} If configuration validation fails
 */
export function loadConfig(options: LoadConfigOptions = {}): EventBusConfig {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;

  let config = toLayer(DEFAULT_CONFIG);

  const globalConfig = loadConfigFile(path.join(homeDir, CONFIG_DIR, CONFIG_FILE));
  if (globalConfig) {
    config = deepMerge(config, globalConfig);
  }

  const projectConfig = loadConfigFile(path.join(cwd, CONFIG_DIR, CONFIG_FILE));
  if (projectConfig) {
    config = deepMerge(config, projectConfig);
  }

  const envConfig = loadEnvironmentConfig(env);
  if (envConfig) {
    config = deepMerge(config, envConfig);
  }

  const validated = parseConfig(config);
  cachedConfig = validated;
  return validated;
}

/**
 * Get cached configuration or load if not cached.
 *
 * Options only take effect when nothing is cached yet.
 */
export function getConfig(options?: LoadConfigOptions): EventBusConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  return loadConfig(options);
}

/**
 * Reload configuration, clearing cache and re-reading all sources.
 */
export function reloadConfig(options?: LoadConfigOptions): EventBusConfig {
  cachedConfig = null;
  return loadConfig(options);
}

/**
 * Clear cached configuration. Useful for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Load configuration from a YAML file.
 *
 * @param filePath - Path to YAML configuration file
 * @returns Parsed configuration layer or null if the file is missing or empty
 * @throws {Error} If YAML parsing fails or the document is not a mapping
 */
export function loadConfigFile(filePath: string): ConfigLayer | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new Error(`YAML parsing error in ${filePath}:\n  ${error.message}`);
    }
    throw error;
  }

  // Empty file
  if (parsed === undefined || parsed === null) {
    return null;
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid configuration file: ${filePath} - expected object`);
  }

  return parsed;
}

/**
 * Load configuration from environment variables.
 *
 * - TYPED_EVENT_BUS_MAX_LISTENERS
 * - TYPED_EVENT_BUS_VERBOSE_MEMORY_LEAK
 * - TYPED_EVENT_BUS_LOG_LEVEL
 * - TYPED_EVENT_BUS_LOG_FILE
 * - TYPED_EVENT_BUS_CONSOLE_OUTPUT
 * - TYPED_EVENT_BUS_NO_COLOR
 *
 * @returns Configuration layer, or null when no variable is set
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer | null {
  const pools: ConfigLayer = {};
  const logging: ConfigLayer = {};

  const maxListeners = env[`${ENV_PREFIX}MAX_LISTENERS`];
  if (maxListeners) {
    pools.maxListeners = parseInt(maxListeners, 10);
  }
  const verboseMemoryLeak = env[`${ENV_PREFIX}VERBOSE_MEMORY_LEAK`];
  if (verboseMemoryLeak !== undefined) {
    pools.verboseMemoryLeak = verboseMemoryLeak === 'true';
  }

  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level) {
    logging.level = level;
  }
  const filePath = env[`${ENV_PREFIX}LOG_FILE`];
  if (filePath) {
    logging.filePath = filePath;
  }
  const consoleOutput = env[`${ENV_PREFIX}CONSOLE_OUTPUT`];
  if (consoleOutput !== undefined) {
    logging.consoleOutput = consoleOutput === 'true';
  }
  const noColor = env[`${ENV_PREFIX}NO_COLOR`];
  if (noColor !== undefined) {
    logging.noColor = noColor === 'true';
  }

  const config: ConfigLayer = {};
  if (Object.keys(pools).length > 0) {
    config.pools = pools;
  }
  if (Object.keys(logging).length > 0) {
    config.logging = logging;
  }

  return Object.keys(config).length > 0 ? config : null;
}

/**
 * Deep merge two layers, with source overriding target.
 *
 * - Nested objects are merged recursively
 * - Arrays are replaced entirely (not merged)
 * - Undefined source values are skipped
 */
export function deepMerge(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) {
      continue;
    }

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Format Zod validation errors into human-readable message.
 */
export function formatValidationErrors(error: ZodError): string {
  const errors = error.issues.map((issue) => {
    const issuePath = issue.path.join('.');
    return `  • ${issuePath}: ${issue.message}`;
  });

  return `Configuration validation failed:\n${errors.join('\n')}`;
}

/**
 * Validate a configuration file without loading it.
 *
 * @param filePath - Path to configuration file
 * @returns Validation result with errors if any
 */
export function validateConfigFile(
  filePath: string
): { valid: boolean; errors?: string } {
  try {
    const config = loadConfigFile(filePath);
    if (!config) {
      return { valid: false, errors: 'Configuration file not found' };
    }

    parseConfig(deepMerge(toLayer(DEFAULT_CONFIG), config));
    return { valid: true };
  } catch (error) {
    if (error instanceof Error) {
      return { valid: false, errors: error.message };
    }
    return { valid: false, errors: 'Unknown validation error' };
  }
}

function parseConfig(layer: ConfigLayer): EventBusConfig {
  try {
    return EventBusConfigSchema.parse(layer);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(formatValidationErrors(error));
    }
    throw error;
  }
}

function toLayer(config: EventBusConfig): ConfigLayer {
  return {
    pools: { ...config.pools },
    logging: { ...config.logging },
  };
}

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
