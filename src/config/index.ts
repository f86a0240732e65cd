/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `ragline config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  RetrievalConfigSchema,
  WebSearchConfigSchema,
  CompletionConfigSchema,
  IngestionConfigSchema,
  IngestionModeSchema,
} from './schema.js';
export type { Config, PartialConfig, IngestionMode } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
} from './loader.js';

// Paths
export { getRaglineDir, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  getApiKey,
  hasApiKey,
  SETUP_INSTRUCTIONS,
  SERVICE_ENV_VARS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, ServiceName } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMAND_REQUIREMENTS,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
