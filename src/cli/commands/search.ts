/**
 * Search Command
 *
 * Retrieval only: runs the hybrid query and prints the ranked documents.
 *
 *   ragchat search "deductible"
 *   ragchat search "deductible" --top-k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { getConfig } from '../../config/loader.js';
import { createRAGEngine } from '../../agent/rag-engine.js';
import { formatResults, formatResultJSON } from '../../search/formatter.js';
import { parseOption, QuestionSchema, TopKSchema } from '../validation.js';

interface SearchCommandOptions {
  topK?: string;
  semantic: boolean;
}

export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query')
    .description('Search the index without generating an answer')
    .option('-k, --top-k <number>', 'Number of results (default: search.top_k)')
    .option('--no-semantic', 'Disable semantic re-ranking')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const trimmed = parseOption(QuestionSchema, query, 'query');
      const topK = cmdOptions.topK === undefined ? undefined : parseOption(TopKSchema, cmdOptions.topK, '--top-k');

      const engine = createRAGEngine(getConfig(), { logger: ctx });

      try {
        const documents = await engine.getDocuments(trimmed, {
          topK,
          useSemanticRanker: cmdOptions.semantic ? undefined : false,
        });

        if (ctx.options.json) {
          console.log(
            JSON.stringify({ query: trimmed, documents: documents.map((d) => formatResultJSON(d)) }, null, 2)
          );
          return;
        }

        if (documents.length === 0) {
          ctx.log(chalk.yellow(`No results for: "${trimmed}"`));
          return;
        }

        ctx.log(chalk.dim(`${documents.length} result${documents.length === 1 ? '' : 's'}`));
        ctx.log('');
        ctx.log(formatResults(documents));
      } finally {
        await engine.shutdown();
      }
    });
}
