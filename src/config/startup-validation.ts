/**
 * Startup Configuration Validation
 *
 * Checks at CLI startup that the endpoints a command needs are configured.
 * Missing endpoints stop that command; Langfuse issues are only warnings.
 * Commands that don't need a collaborator (config, serve) always run.
 */

import chalk from 'chalk';
import type { Config } from './schema.js';
import { SETUP_INSTRUCTIONS } from './env.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  /** Whether all required settings are present */
  valid: boolean;
  /** Warning messages (non-fatal issues) */
  warnings: string[];
  /** Error messages (will prevent the command from running) */
  errors: string[];
  /** Hint messages with setup instructions */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Require the Azure AI Search endpoint */
  requireSearch?: boolean;
  /** Require the Azure OpenAI endpoint */
  requireGeneration?: boolean;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate a loaded configuration.
 *
 * @example
 * const result = validateStartupConfig(getConfig(), { requireSearch: true });
 * if (!result.valid) printStartupValidation(result);
 */
export function validateStartupConfig(
  config: Config,
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { requireSearch = false, requireGeneration = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  if (requireSearch && !config.search.endpoint) {
    errors.push('Azure AI Search endpoint is not configured');
    hints.push(SETUP_INSTRUCTIONS.search);
  }

  if (requireGeneration && !config.openai.endpoint) {
    errors.push('Azure OpenAI endpoint is not configured');
    hints.push(SETUP_INSTRUCTIONS.openai);
  }

  const obs = config.observability;
  const hasPublic = Boolean(obs.langfuse_public_key);
  const hasSecret = Boolean(obs.langfuse_secret_key);

  if (obs.enabled && hasPublic !== hasSecret) {
    warnings.push(
      'Only one Langfuse key is set; tracing stays local until both LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY are present'
    );
  }

  if (obs.enabled && hasPublic && hasSecret && obs.sample_rate === 0) {
    warnings.push('observability.sample_rate is 0; no traces will be sent');
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation warnings/errors to console.
 *
 * @param verbose - Whether to show warnings too (default: only errors)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/** Commands that call the chat-completion deployment */
export const COMMANDS_REQUIRING_GENERATION = ['ask', 'chat'];

/** Commands that query the search index */
export const COMMANDS_REQUIRING_SEARCH = ['ask', 'chat', 'search'];

/**
 * Validation options for a command name (e.g. 'ask', 'config').
 */
export function getValidationOptionsForCommand(
  command: string
): StartupValidationOptions {
  return {
    requireSearch: COMMANDS_REQUIRING_SEARCH.includes(command),
    requireGeneration: COMMANDS_REQUIRING_GENERATION.includes(command),
  };
}
