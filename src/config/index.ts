/**
 * Configuration Management Module
 *
 * @example
 * ```typescript
 * import { getConfig } from './config';
 *
 * const config = getConfig();
 * console.log(config.pools.maxListeners);
 * ```
 */

export {
  type PoolConfig,
  type LoggingConfig,
  type EventBusConfig,
  type ValidatedEventBusConfig,
  PoolConfigSchema,
  LoggingConfigSchema,
  EventBusConfigSchema,
} from './schema';

export { DEFAULT_CONFIG } from './defaults';

export {
  loadConfig,
  getConfig,
  reloadConfig,
  clearConfigCache,
  loadConfigFile,
  loadEnvironmentConfig,
  validateConfigFile,
  deepMerge,
  formatValidationErrors,
  CONFIG_DIR,
  CONFIG_FILE,
  ENV_PREFIX,
  type ConfigLayer,
  type LoadConfigOptions,
} from './loader';
