export {
  loadConfig,
  resolveConfig,
  applyEnvOverrides,
  parseSimpleYaml,
  ConfigError,
  CONFIG_PATH_ENV,
  DEFAULT_DATABASE_URL,
} from './config.js';
export type { AppConfig, ApplierConfig, TelemetryConfig, LogRotationConfig, LoadConfigOptions } from './config.js';
