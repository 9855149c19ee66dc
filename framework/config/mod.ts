/**
 * Configuration
 */

export {
  Config,
  ConfigError,
  loadConfig,
  parsePartialConfig,
  envOverrides,
  DEFAULT_CONFIG_PATH,
  type ConfigOptions,
  type PartialConfig,
  type DatabaseOptions,
  type DatabaseDriver,
  type LoadConfigOptions,
} from './config.ts';
