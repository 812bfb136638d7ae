/**
 * Agent Module
 *
 * The RAG engine: retrieval, prompt construction and generation for one
 * chat invocation, streamed or not.
 *
 * @example
 * ```typescript
 * import { createRAGEngine, formatCitations } from './agent/index.js';
 *
 * const engine = createRAGEngine(config);
 * const result = await engine.chat('What is the deductible?');
 * console.log(result.answer);
 * console.log(formatCitations(result.documents));
 * ```
 */

// Engine
export {
  RAGEngine,
  createRAGEngine,
  type RAGEngineDeps,
  type CreateRAGEngineOptions,
} from './rag-engine.js';

// Prompt construction
export {
  buildMessages,
  buildDirectMessages,
  templateFromString,
  defaultTemplate,
  DEFAULT_SYSTEM_PROMPT,
  DIRECT_SYSTEM_PROMPT,
  SOURCES_PLACEHOLDER,
} from './prompt.js';

// Citations
export {
  formatCitation,
  formatCitations,
  toSourceJSON,
  NO_DOCUMENTS_MESSAGE,
  CitationFormatOptionsSchema,
  type CitationFormatOptions,
  type SourceJSON,
} from './citations.js';

// Types
export { ConversationTurnSchema } from './types.js';
export type {
  ConversationTurn,
  PromptMessage,
  PromptTemplate,
  RetrievalOptions,
  ChatOptions,
  GenerateOptions,
  RAGResult,
  ChatStreamEvent,
  RetrievedDocument,
} from './types.js';
