/**
 * Serve Command
 *
 * Starts the HTTP API.
 *
 *   ragchat serve
 *   ragchat serve --port 9000
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { getConfig } from '../../config/loader.js';
import { startServer } from '../../server/index.js';
import { errorMessage } from '../../errors/index.js';
import { parseOption, PortSchema } from '../validation.js';

interface ServeCommandOptions {
  port?: string;
}

export function createServeCommand(getContext: () => CommandContext): Command {
  return new Command('serve')
    .description('Start the HTTP API (POST /chat, POST /chat/stream, GET /search)')
    .option('-p, --port <number>', 'Port to listen on (default: server.port)')
    .action(async (cmdOptions: ServeCommandOptions) => {
      const ctx = getContext();
      const port = cmdOptions.port === undefined ? undefined : parseOption(PortSchema, cmdOptions.port, '--port');

      const running = await startServer(getConfig(), { port, logger: ctx });
      ctx.log(chalk.dim('Press Ctrl+C to stop'));

      const stop = (signal: string): void => {
        ctx.debug(`Received ${signal}, shutting down`);
        running
          .close()
          .then(() => ctx.log(chalk.dim('Server stopped')))
          .catch((error: unknown) => {
            ctx.error(`Shutdown failed: ${errorMessage(error)}`);
            process.exitCode = 1;
          });
      };
      process.once('SIGINT', () => stop('SIGINT'));
      process.once('SIGTERM', () => stop('SIGTERM'));
    });
}
