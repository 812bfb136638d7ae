/**
 * Config Command
 *
 * Inspects and bootstraps ragchat.toml:
 *   ragchat config list          - Show the merged configuration
 *   ragchat config get <key>     - Get a specific value
 *   ragchat config path          - Show config file location
 *   ragchat config init          - Write a commented template
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfig,
  listConfig,
  getConfigPath,
  writeConfigTemplate,
} from '../../config/loader.js';
import type { CommandContext } from '../types.js';

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (value === undefined) return '(not set)';
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * A whole section (e.g. "search") as an object, or undefined.
 */
function sectionValue(entries: Map<string, unknown>, section: string): Record<string, unknown> | undefined {
  const prefix = `${section}.`;
  const fields = [...entries]
    .filter(([key]) => key.startsWith(prefix))
    .map(([key, value]): [string, unknown] => [key.slice(prefix.length), value]);
  return fields.length > 0 ? Object.fromEntries(fields) : undefined;
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Inspect configuration settings');

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values (Langfuse keys masked)')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig(getConfig());

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by top-level key for readability
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., ragchat config get search.top_k)')
    .action((key: string) => {
      const ctx = getContext();
      // Read through listConfig so secrets stay masked
      const masked = new Map(listConfig(getConfig()));
      const value = masked.has(key) ? masked.get(key) : sectionValue(masked, key);

      if (value === undefined) {
        ctx.error(`Unknown config key: ${key}`);
        ctx.log(`Run ${chalk.cyan('ragchat config list')} to see all available keys.`);
        process.exitCode = 1;
        return;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('init')
    .description('Write a commented ragchat.toml template')
    .option('-f, --force', 'Overwrite an existing file')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();
      const configPath = getConfigPath();

      writeConfigTemplate(configPath, options.force ?? false);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: configPath }));
      } else {
        ctx.log(`${chalk.green('✓')} Wrote ${chalk.cyan(configPath)}`);
      }
    });

  return configCmd;
}
