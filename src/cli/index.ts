#!/usr/bin/env node
/**
 * rag-chat CLI Entry Point
 *
 * This is the main entry point for the `ragchat` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createSearchCommand } from './commands/search.js';
import { createServeCommand } from './commands/serve.js';
import {
  handleError,
  createGlobalErrorHandler,
  ConfigurationError,
  ValidationError,
} from '../errors/index.js';
import {
  getConfig,
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';
import { VERSION } from '../utils/version.js';

// Create the root program
const program = new Command();

program
  .name('ragchat')
  .description('Grounded answers from an Azure AI Search index with Azure OpenAI')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('ragchat ask "What is the deductible?"')}   Ask one question
  ${chalk.cyan('ragchat chat')}                           Multi-turn chat
  ${chalk.cyan('ragchat search "deductible" -k 10')}      Retrieval only
  ${chalk.cyan('ragchat serve --port 8000')}              Start the HTTP API
  ${chalk.cyan('ragchat config init')}                    Write ragchat.toml
`);

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createServeCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new ValidationError(`Unknown command: ${operands[0] ?? ''}`, ['Run: ragchat --help  to see available commands']);
});

// Check the endpoints a command needs before it runs
program.hook('preAction', (_thisCommand, actionCommand) => {
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());
  if (!validationOptions.requireSearch && !validationOptions.requireGeneration) {
    return;
  }

  const opts = getGlobalOptions();
  const result = validateStartupConfig(getConfig(), validationOptions);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new ConfigurationError('Configuration validation failed', 'Fix the issues above and try again');
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

await main();
