/**
 * Configuration module exports
 */

export {
  type AccountsConfig,
  type AccountsConfigOverrides,
  DEFAULT_CONFIG,
  mergeConfig,
  type RpcConfig,
  validateConfig,
} from './accounts-config.ts';
export {
  CONFIG_FILE_NAMES,
  ConfigLoader,
  loadConfig,
  type LoadConfigOptions,
  parseConfigFile,
} from './config-loader.ts';
export {
  ACCOUNTS_ENV_VARS,
  type AccountsEnvVar,
  getEnvironmentConfigDocumentation,
  validateEnvironment,
  type ValidationResult,
} from './env-validator.ts';
