/**
 * rag-chat - Library Entry Point
 *
 * Grounded chat over an Azure AI Search index with answers from an Azure
 * OpenAI deployment. The CLI (`ragchat`) and the HTTP API are thin
 * adapters over the exports below.
 *
 * @example One-shot answer
 * ```typescript
 * import { createRAGEngine, getConfig } from 'rag-chat';
 *
 * const engine = createRAGEngine(getConfig());
 * const result = await engine.chat('What is the deductible?');
 * console.log(result.answer, result.documents.length);
 * await engine.shutdown();
 * ```
 *
 * @example Streaming
 * ```typescript
 * for await (const event of engine.chatStream('What is the deductible?', history)) {
 *   if (event.type === 'fragment') process.stdout.write(event.text);
 *   else console.log(event.result.formattedSources);
 * }
 * ```
 *
 * @packageDocumentation
 */

// Orchestrator, prompts and citations
export * from './agent/index.js';

// Collaborators
export {
  AzureSearchCollaborator,
  toRetrievedDocument,
  formatSources,
  formatResult,
  formatResults,
  formatResultJSON,
  NO_SOURCES_SENTINEL,
  type AzureSearchOptions,
  type HybridSearchRequest,
  type SearchRecord,
  type SearchCollaborator,
  type SearchResultJSON,
} from './search/index.js';
export {
  AzureOpenAICollaborator,
  getSharedCredential,
  type AzureOpenAIOptions,
  type ChatMessage,
  type Completion,
  type CompletionRequest,
  type GenerationCollaborator,
  type StreamDelta,
  type TokenUsage,
} from './providers/index.js';

// Telemetry
export {
  createTracer,
  createNoopTracer,
  createLangfuseTracer,
  createSafeTracer,
  type Tracer,
  type TraceHandle,
  type SpanHandle,
} from './observability/index.js';

// Configuration
export {
  getConfig,
  loadConfig,
  validateStartupConfig,
  ConfigSchema,
  DEFAULT_CONFIG,
  type Config,
} from './config/index.js';

// Errors
export {
  AppError,
  ConfigurationError,
  ValidationError,
  RetrievalError,
  GenerationError,
  TelemetryError,
} from './errors/index.js';

// HTTP API
export { createApp, startServer, type AppDeps, type RunningServer } from './server/index.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';

// CLI types for custom commands
export type { GlobalOptions, CommandContext } from './cli/types.js';
