/**
 * Environment Variable Handler
 *
 * Loads the environment overrides for ragchat.toml. Supports .env files
 * for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Langfuse keys are NEVER logged, even in verbose mode
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

// Load .env file (no-op if it doesn't exist)
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

const PortSchema = z
  .string()
  .regex(/^\d+$/, 'must be a whole number')
  .transform(Number);

/**
 * Every variable is optional: an unset variable leaves the file/default
 * value in place.
 */
export const EnvSchema = z.object({
  AZURE_OPENAI_ENDPOINT: z.string().optional(),
  AZURE_OPENAI_CHAT_DEPLOYMENT: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().optional(),
  AZURE_AI_SEARCH_ENDPOINT: z.string().optional(),
  AZURE_SEARCH_INDEX_NAME: z.string().optional(),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_BASE_URL: z.string().optional(),
  PORT: PortSchema.optional(),
  CORS_ORIGIN: z.string().optional(),
  /** Explicit path to the TOML config file */
  RAGCHAT_CONFIG: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Cached environment (loaded once at first access) */
let _envCache: EnvVars | null = null;

/** Blank values count as unset */
function readVar(name: string): string | undefined {
  const value = process.env[name];
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * @throws ConfigurationError if a variable has an invalid value (e.g. PORT=abc)
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const result = EnvSchema.safeParse({
    AZURE_OPENAI_ENDPOINT: readVar('AZURE_OPENAI_ENDPOINT'),
    AZURE_OPENAI_CHAT_DEPLOYMENT: readVar('AZURE_OPENAI_CHAT_DEPLOYMENT'),
    AZURE_OPENAI_API_VERSION: readVar('AZURE_OPENAI_API_VERSION'),
    AZURE_AI_SEARCH_ENDPOINT: readVar('AZURE_AI_SEARCH_ENDPOINT'),
    AZURE_SEARCH_INDEX_NAME: readVar('AZURE_SEARCH_INDEX_NAME'),
    LANGFUSE_PUBLIC_KEY: readVar('LANGFUSE_PUBLIC_KEY'),
    LANGFUSE_SECRET_KEY: readVar('LANGFUSE_SECRET_KEY'),
    LANGFUSE_BASE_URL: readVar('LANGFUSE_BASE_URL'),
    PORT: readVar('PORT'),
    CORS_ORIGIN: readVar('CORS_ORIGIN'),
    RAGCHAT_CONFIG: readVar('RAGCHAT_CONFIG'),
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid environment variables:\n  ${issues.join('\n  ')}`,
      'Fix the values in your shell or .env file'
    );
  }

  _envCache = result.data;
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check whether both Langfuse keys are present, without exposing them.
 */
export function hasLangfuseKeys(): boolean {
  const env = loadEnv();
  return Boolean(env.LANGFUSE_PUBLIC_KEY && env.LANGFUSE_SECRET_KEY);
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to set different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when a required endpoint is missing.
 */
export const SETUP_INSTRUCTIONS: Record<'openai' | 'search' | 'credentials', string> = {
  openai: `
To use Azure OpenAI:

1. Find your resource endpoint in the Azure portal (Keys and Endpoint)
2. Set the environment variable (or add it to .env):

   export AZURE_OPENAI_ENDPOINT="https://<resource>.openai.azure.com"
   export AZURE_OPENAI_CHAT_DEPLOYMENT="gpt-4o-mini"
`.trim(),

  search: `
To use Azure AI Search:

1. Find your search service URL in the Azure portal (Overview)
2. Set the environment variable (or add it to .env):

   export AZURE_AI_SEARCH_ENDPOINT="https://<service>.search.windows.net"
   export AZURE_SEARCH_INDEX_NAME="documents"
`.trim(),

  credentials: `
rag-chat signs in with DefaultAzureCredential (no API keys):

   az login                # local development
   # or set AZURE_CLIENT_ID / AZURE_TENANT_ID / AZURE_CLIENT_SECRET
`.trim(),
};
