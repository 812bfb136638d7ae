/**
 * Chat Command
 *
 * Interactive multi-turn REPL. Every question goes through the full RAG
 * pipeline with the turns of this session as history; nothing outlives
 * the process.
 *
 *   ragchat chat
 *   ragchat chat --top-k 10
 *
 * REPL commands:
 *   /help, /clear, /sources, exit (or /exit, quit)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'node:readline';
import type { CommandContext } from '../types.js';
import { getConfig } from '../../config/loader.js';
import { createRAGEngine, type RAGEngine } from '../../agent/rag-engine.js';
import { formatCitations } from '../../agent/citations.js';
import type { ConversationTurn, RetrievalOptions, RetrievedDocument } from '../../agent/types.js';
import { AppError, errorMessage } from '../../errors/index.js';
import { parseOption, TopKSchema } from '../validation.js';

// ============================================================================
// Types
// ============================================================================

interface ChatCommandOptions {
  topK?: string;
  semantic: boolean;
}

/** Where streamed answer text goes */
export type Writer = (text: string) => void;

interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  /** Returns false to end the session */
  handler: (session: ChatSession, ctx: CommandContext) => boolean;
}

const PROMPT = chalk.cyan('you> ');

// ============================================================================
// Session
// ============================================================================

/**
 * Conversation state for one REPL run.
 */
export class ChatSession {
  /** Completed user/assistant turns, oldest first */
  readonly history: ConversationTurn[] = [];
  /** Documents behind the last answer */
  lastDocuments: readonly RetrievedDocument[] = [];

  constructor(
    private readonly engine: RAGEngine,
    private readonly ctx: CommandContext,
    private readonly retrieval: RetrievalOptions = {},
    private readonly write: Writer = (text) => process.stdout.write(text)
  ) {}

  clear(): void {
    this.history.length = 0;
    this.lastDocuments = [];
  }

  /**
   * Answer one question, streaming the text. The turn is only added to
   * the history once the answer completed.
   */
  async ask(question: string): Promise<void> {
    let answer: string | undefined;

    for await (const event of this.engine.chatStream(question, this.history, this.retrieval)) {
      if (event.type === 'fragment') {
        this.write(event.text);
      } else {
        answer = event.result.answer;
        this.lastDocuments = event.result.documents;
      }
    }
    this.write('\n');

    if (answer !== undefined) {
      this.history.push({ role: 'user', content: question }, { role: 'assistant', content: answer });
      this.ctx.debug(`History: ${this.history.length} turns`);
    }
  }

  /**
   * Handle one input line. Returns false when the session should end.
   */
  async handleLine(line: string): Promise<boolean> {
    const input = line.trim();
    if (!input) return true;

    const command = findCommand(input);
    if (command) {
      return command.handler(this, this.ctx);
    }
    if (input.startsWith('/')) {
      this.ctx.warn(`Unknown command: ${input.split(/\s+/)[0] ?? input}. Type /help for commands.`);
      return true;
    }

    try {
      await this.ask(input);
    } catch (error) {
      this.write('\n');
      this.ctx.error(errorMessage(error));
      if (error instanceof AppError && error.hint) {
        this.ctx.log(chalk.dim(error.hint));
      }
    }
    return true;
  }
}

// ============================================================================
// REPL Commands Registry
// ============================================================================

const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: (_session, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Available Commands:'));
      for (const cmd of REPL_COMMANDS) {
        const aliasStr =
          cmd.aliases.length > 0 ? chalk.dim(` (${cmd.aliases.map((a) => '/' + a).join(', ')})`) : '';
        ctx.log(`  ${chalk.cyan('/' + cmd.name)}${aliasStr}  ${cmd.description}`);
      }
      ctx.log('');
      return true;
    },
  },
  {
    name: 'clear',
    aliases: ['c'],
    description: 'Forget the conversation so far',
    handler: (session, ctx) => {
      session.clear();
      ctx.log(chalk.dim('Conversation cleared.'));
      return true;
    },
  },
  {
    name: 'sources',
    aliases: ['s'],
    description: 'Show the documents behind the last answer',
    handler: (session, ctx) => {
      ctx.log(formatCitations(session.lastDocuments));
      return true;
    },
  },
  {
    name: 'exit',
    aliases: ['quit', 'q'],
    description: 'End the chat',
    handler: (_session, ctx) => {
      ctx.log(chalk.dim('Goodbye!'));
      return false;
    },
  },
];

/**
 * Match "/name", "/alias", or a bare "exit"/"quit".
 */
export function findCommand(input: string): REPLCommand | undefined {
  const lowered = input.toLowerCase();
  const name = lowered.startsWith('/') ? lowered.slice(1).split(/\s+/)[0] : lowered;
  if (!lowered.startsWith('/') && name !== 'exit' && name !== 'quit') {
    return undefined;
  }
  return REPL_COMMANDS.find((cmd) => cmd.name === name || (name !== undefined && cmd.aliases.includes(name)));
}

// ============================================================================
// REPL loop
// ============================================================================

/**
 * Event-based readline loop; a line is fully handled before the prompt
 * is shown again.
 */
function runChatREPL(session: ChatSession, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: PROMPT,
    });

    let busy = false;

    rl.on('line', (line) => {
      if (busy) return;
      busy = true;
      rl.pause();

      session
        .handleLine(line)
        .then((keepGoing) => {
          if (keepGoing) {
            rl.resume();
            rl.prompt();
          } else {
            rl.close();
          }
        })
        .catch((error: unknown) => {
          ctx.error(errorMessage(error));
          rl.resume();
          rl.prompt();
        })
        .finally(() => {
          busy = false;
        });
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    rl.on('close', () => resolve());

    ctx.log(chalk.bold('rag-chat') + chalk.dim(' - ask about your documents. Type /help for commands.'));
    ctx.log('');
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive multi-turn chat over the search index')
    .option('-k, --top-k <number>', 'Number of documents to retrieve per question')
    .option('--no-semantic', 'Disable semantic re-ranking')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();

      const retrieval: RetrievalOptions = {
        topK: cmdOptions.topK === undefined ? undefined : parseOption(TopKSchema, cmdOptions.topK, '--top-k'),
        useSemanticRanker: cmdOptions.semantic ? undefined : false,
      };

      const engine = createRAGEngine(getConfig(), { logger: ctx });
      try {
        await runChatREPL(new ChatSession(engine, ctx, retrieval), ctx);
      } finally {
        await engine.shutdown();
      }
    });
}
