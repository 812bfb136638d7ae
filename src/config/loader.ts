/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Locate ragchat.toml ($RAGCHAT_CONFIG, else ./ragchat.toml); optional
 * 2. Validate the file against the partial schema
 * 3. Merge defaults <- file <- environment variables
 * 4. Validate the merged result and cache it for the process
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { loadEnv, type EnvVars } from './env.js';
import { ConfigurationError } from '../errors/index.js';

export const CONFIG_FILE_NAME = 'ragchat.toml';

/**
 * Get the config file path: $RAGCHAT_CONFIG, or ragchat.toml in the
 * working directory.
 */
export function getConfigPath(env: EnvVars = loadEnv()): string {
  return path.resolve(env.RAGCHAT_CONFIG ?? path.join(process.cwd(), CONFIG_FILE_NAME));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Undefined source values leave the target value in place.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Read and validate the TOML file. A missing file is an empty override.
 *
 * @throws ConfigurationError if the file exists but is invalid
 */
export function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigurationError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: ragchat config init --force`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigurationError(
      `Invalid configuration in ${configPath}:\n${formatIssues(validationResult.error.issues)}`,
      'Run: ragchat config init --force  to restore defaults'
    );
  }

  return validationResult.data;
}

/**
 * Map environment variables onto config keys. Unset variables stay
 * undefined and are skipped by the merge.
 */
export function envOverrides(env: EnvVars): PartialConfig {
  return {
    openai: {
      endpoint: env.AZURE_OPENAI_ENDPOINT,
      chat_deployment: env.AZURE_OPENAI_CHAT_DEPLOYMENT,
      api_version: env.AZURE_OPENAI_API_VERSION,
    },
    search: {
      endpoint: env.AZURE_AI_SEARCH_ENDPOINT,
      index_name: env.AZURE_SEARCH_INDEX_NAME,
    },
    observability: {
      langfuse_public_key: env.LANGFUSE_PUBLIC_KEY,
      langfuse_secret_key: env.LANGFUSE_SECRET_KEY,
      langfuse_host: env.LANGFUSE_BASE_URL,
    },
    server: {
      port: env.PORT,
      cors_origin: env.CORS_ORIGIN,
    },
  };
}

/**
 * Options for loadConfig (mainly for tests).
 */
export interface LoadConfigOptions {
  /** Config file to read instead of the default location */
  configPath?: string;
  /** Environment to apply instead of process.env */
  env?: EnvVars;
}

/**
 * Load the merged configuration (defaults + file + environment).
 *
 * @throws ConfigurationError if the file or the merged result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? loadEnv();
  const configPath = options.configPath ?? getConfigPath(env);

  const fromFile = deepMerge(DEFAULT_CONFIG, readConfigFile(configPath));
  const merged = deepMerge(fromFile, envOverrides(env));

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration:\n${formatIssues(result.error.issues)}`,
      `Check ${configPath} and your environment variables`
    );
  }

  return result.data;
}

/** Process-wide config, loaded on first access */
let _configCache: Config | null = null;

/**
 * Get the process-wide configuration, loading it once.
 */
export function getConfig(): Config {
  if (_configCache === null) {
    _configCache = loadConfig();
  }
  return _configCache;
}

/**
 * Clear the cached configuration.
 * FOR TESTING ONLY.
 *
 * @internal
 */
export function _clearConfigCache(): void {
  _configCache = null;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue(config, 'search.top_k') => 5
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

const SECRET_KEYS = new Set(['observability.langfuse_public_key', 'observability.langfuse_secret_key']);

/**
 * List all config values in a flat format, with Langfuse keys masked.
 * Returns entries like ['search.top_k', 5]
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else if (SECRET_KEYS.has(fullKey)) {
        entries.push([fullKey, value ? '********' : value]);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}

/**
 * Write the commented config template.
 *
 * @throws ConfigurationError if the file exists and force is not set
 */
export function writeConfigTemplate(configPath: string, force = false): void {
  if (fs.existsSync(configPath) && !force) {
    throw new ConfigurationError(
      `Config file already exists: ${configPath}`,
      'Run: ragchat config init --force  to overwrite it'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
}
