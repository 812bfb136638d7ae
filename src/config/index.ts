/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `ragchat config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  OpenAIConfigSchema,
  SearchConfigSchema,
  GenerationConfigSchema,
  ObservabilityConfigSchema,
  ServerConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfig,
  readConfigFile,
  envOverrides,
  getConfigValue,
  listConfig,
  getConfigPath,
  writeConfigTemplate,
  _clearConfigCache,
  CONFIG_FILE_NAME,
} from './loader.js';
export type { LoadConfigOptions } from './loader.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasLangfuseKeys,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_GENERATION,
  COMMANDS_REQUIRING_SEARCH,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
