/**
 * Ask Command
 *
 * One grounded question against the search index, answered by the chat
 * deployment. The answer streams to stdout, followed by the documents it
 * was grounded on.
 *
 *   ragchat ask "What is the deductible?"
 *   ragchat ask "What is covered?" --top-k 10 --no-semantic
 *   ragchat ask "What is the deductible?" --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { getConfig } from '../../config/loader.js';
import { createRAGEngine, type RAGEngine } from '../../agent/rag-engine.js';
import { formatCitations, toSourceJSON, type SourceJSON } from '../../agent/citations.js';
import type { RAGResult, RetrievalOptions } from '../../agent/types.js';
import { parseOption, QuestionSchema, TopKSchema } from '../validation.js';

// ============================================================================
// Types
// ============================================================================

interface AskCommandOptions {
  topK?: string;
  /** false with --no-semantic */
  semantic: boolean;
}

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  question: string;
  answer: string;
  sources: SourceJSON[];
  formattedSources: string;
}

// ============================================================================
// Helper Functions
// ============================================================================

export function toAskJSON(question: string, result: RAGResult): AskOutputJSON {
  return {
    question,
    answer: result.answer,
    sources: result.documents.map(toSourceJSON),
    formattedSources: result.formattedSources,
  };
}

/**
 * Stream the answer to stdout and return the final result.
 */
async function streamAnswer(
  engine: RAGEngine,
  question: string,
  options: RetrievalOptions,
  ctx: CommandContext
): Promise<RAGResult | undefined> {
  let result: RAGResult | undefined;

  for await (const event of engine.chatStream(question, [], options)) {
    if (event.type === 'fragment') {
      process.stdout.write(event.text);
    } else {
      result = event.result;
    }
  }

  // Ensure newline after streaming completes
  process.stdout.write('\n');
  ctx.debug(`Stream complete (${result?.answer.length ?? 0} chars)`);
  return result;
}

function displaySources(ctx: CommandContext, result: RAGResult): void {
  ctx.log('');
  ctx.log(chalk.bold('Sources:'));
  ctx.log(formatCitations(result.documents));
}

// ============================================================================
// Command Factory
// ============================================================================

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer from the indexed documents')
    .description('Ask a question answered from the search index')
    .option('-k, --top-k <number>', 'Number of documents to retrieve (default: search.top_k)')
    .option('--no-semantic', 'Disable semantic re-ranking')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const trimmed = parseOption(QuestionSchema, question, 'question');
      const retrieval: RetrievalOptions = {
        topK: cmdOptions.topK === undefined ? undefined : parseOption(TopKSchema, cmdOptions.topK, '--top-k'),
        useSemanticRanker: cmdOptions.semantic ? undefined : false,
      };
      ctx.debug(`Question: "${trimmed}" ${JSON.stringify(retrieval)}`);

      const engine = createRAGEngine(getConfig(), { logger: ctx });

      try {
        if (ctx.options.json) {
          const result = await engine.chat(trimmed, [], retrieval);
          console.log(JSON.stringify(toAskJSON(trimmed, result), null, 2));
          return;
        }

        const result = await streamAnswer(engine, trimmed, retrieval, ctx);
        if (result) {
          displaySources(ctx, result);
        }
      } finally {
        await engine.shutdown();
      }
    });
}
