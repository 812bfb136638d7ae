/**
 * CLI error output
 *
 * Every thrown value is first reduced to an ErrorOutput, then rendered
 * as colored text or JSON. `--verbose` adds the cause and stack.
 */

import chalk from 'chalk';
import { AppError, errorMessage } from './types.js';

export interface ErrorHandlerOptions {
  /** Show the cause and stack trace */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  type: string;
  code: number;
  hint?: string;
  cause?: string;
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

function describe(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof AppError) {
    return {
      error: error.message,
      type: error.name,
      code: error.code,
      hint: error.hint,
      cause: verbose && error.cause !== undefined ? errorMessage(error.cause) : undefined,
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return { error: error.message, type: error.name, code: 1, stack: verbose ? error.stack : undefined };
  }
  return { error: String(error), type: 'Unknown', code: 1 };
}

function renderText(output: ErrorOutput, suggestVerbose: boolean): string {
  const lines = [chalk.red('Error: ') + output.error];

  const hint = output.hint ?? (suggestVerbose ? VERBOSE_HINT : undefined);
  if (hint) lines.push(chalk.dim('Hint: ') + hint);
  if (output.cause !== undefined) lines.push(chalk.dim('Cause: ') + output.cause);
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Format an error for display without exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = describe(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }
  // Unexpected errors point at --verbose until it is given
  const suggestVerbose = !verbose && error instanceof Error && !(error instanceof AppError);
  return renderText(output, suggestVerbose);
}

/**
 * AppErrors carry their own exit code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof AppError ? error.code : 1;
}

/**
 * Format the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for process-level events:
 *
 *   process.on('unhandledRejection', createGlobalErrorHandler({ verbose }));
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
