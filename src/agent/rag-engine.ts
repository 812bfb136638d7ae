/**
 * RAG Engine
 *
 * Sequences one chat invocation over the search and chat-completion
 * backends:
 *
 * ```
 * query ──► search ──► formatSources ──► buildMessages ──► generate ──► RAGResult
 *             │              │                                │
 *        search_documents  format_sources              generate_response
 *             └──────────── children of rag_chat_workflow ────┘
 * ```
 *
 * Steps never overlap: generation starts only after retrieval finished.
 * Each step runs in its own span under the invocation's trace; a failing
 * step marks the trace with rag.status=error and the error is rethrown.
 * Telemetry calls go through the safe tracer and cannot change the
 * outcome.
 *
 * @example
 * ```typescript
 * const engine = createRAGEngine(getConfig());
 *
 * const result = await engine.chat('What is the deductible?');
 * console.log(result.answer);
 *
 * for await (const event of engine.chatStream('What is the deductible?')) {
 *   if (event.type === 'fragment') process.stdout.write(event.text);
 * }
 * ```
 */

import type { Config } from '../config/schema.js';
import { SETUP_INSTRUCTIONS } from '../config/env.js';
import {
  ConfigurationError,
  GenerationError,
  RetrievalError,
  ValidationError,
} from '../errors/index.js';
import {
  createTracer,
  createSafeTracer,
  runInSpan,
  shouldRecord,
  NOOP_TRACE,
  type GenerationOptions,
  type SpanHandle,
  type SpanOptions,
  type TraceHandle,
  type TraceOptions,
  type Tracer,
} from '../observability/index.js';
import { AzureOpenAICollaborator } from '../providers/azure-openai.js';
import type {
  Completion,
  CompletionRequest,
  GenerationCollaborator,
  StreamDelta,
} from '../providers/types.js';
import { AzureSearchCollaborator } from '../search/azure-search.js';
import { formatSources } from '../search/formatter.js';
import {
  toRetrievedDocument,
  type SearchCollaborator,
  type SearchRecord,
} from '../search/types.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { buildMessages, defaultTemplate } from './prompt.js';
import {
  recordCompletion,
  recordFormattedSources,
  recordGenerationRequest,
  recordSearchResults,
  recordWorkflowOutcome,
} from './telemetry.js';
import type {
  ChatOptions,
  ChatStreamEvent,
  ConversationTurn,
  GenerateOptions,
  PromptMessage,
  PromptTemplate,
  RAGResult,
  RetrievalOptions,
  RetrievedDocument,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RAGEngineDeps {
  config: Config;
  search: SearchCollaborator;
  generation: GenerationCollaborator;
  /** Guarded by createSafeTracer; no tracing when absent */
  tracer?: Tracer;
  logger?: Logger;
  /** System prompt template (default: grounded-answer instructions) */
  template?: PromptTemplate;
}

interface Requirements {
  search?: boolean;
  generation?: boolean;
}

// ============================================================================
// VALIDATION
// ============================================================================

function validateQuery(query: string): void {
  if (query.trim().length === 0) {
    throw new ValidationError('Query must not be empty');
  }
}

function validateTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError(`topK must be a positive integer, got ${topK}`);
  }
}

// ============================================================================
// ENGINE
// ============================================================================

export class RAGEngine {
  private readonly config: Config;
  private readonly searchBackend: SearchCollaborator;
  private readonly generationBackend: GenerationCollaborator;
  private readonly tracer?: Tracer;
  private readonly logger: Logger;
  private readonly template: PromptTemplate;

  constructor(deps: RAGEngineDeps) {
    this.config = deps.config;
    this.searchBackend = deps.search;
    this.generationBackend = deps.generation;
    this.logger = deps.logger ?? consoleLogger;
    // Injected tracers get the same guard as the configured one
    this.tracer = deps.tracer ? createSafeTracer(deps.tracer, this.logger) : undefined;
    this.template = deps.template ?? defaultTemplate;
  }

  // --------------------------------------------------------------------------
  // Pipeline steps
  // --------------------------------------------------------------------------

  /**
   * Run one hybrid query. Results keep the backend's rank order.
   *
   * @throws ConfigurationError if the search endpoint is not configured
   * @throws ValidationError for an empty query or a non-positive topK
   * @throws RetrievalError when the backend fails
   */
  async search(query: string, options: RetrievalOptions = {}): Promise<RetrievedDocument[]> {
    this.assertConfigured({ search: true });
    validateQuery(query);
    return this.runSearch(query, options);
  }

  /**
   * Build the sources block for the system prompt. Pure.
   */
  formatSources(documents: readonly RetrievedDocument[]): string {
    return formatSources(documents);
  }

  /**
   * `[system] + history + [user]`, the system message rendered from
   * `template` (the engine's template by default).
   */
  buildMessages(
    query: string,
    formattedSources: string,
    history: readonly ConversationTurn[] = [],
    template: PromptTemplate = this.template
  ): PromptMessage[] {
    return buildMessages(query, formattedSources, history, template);
  }

  /**
   * Submit messages to the configured deployment.
   *
   * With `stream: true` the promise resolves to the backend's delta
   * stream once the request was accepted; otherwise to the finished
   * completion.
   *
   * @throws GenerationError when the backend fails
   */
  generate(
    messages: readonly PromptMessage[],
    options: GenerateOptions & { stream: true }
  ): Promise<AsyncIterable<StreamDelta>>;
  generate(
    messages: readonly PromptMessage[],
    options?: GenerateOptions & { stream?: false }
  ): Promise<Completion>;
  async generate(
    messages: readonly PromptMessage[],
    options: GenerateOptions = {}
  ): Promise<Completion | AsyncIterable<StreamDelta>> {
    this.assertConfigured({ generation: true });
    return options.stream
      ? this.runStream(messages, options)
      : this.runComplete(messages, options);
  }

  // --------------------------------------------------------------------------
  // Workflows
  // --------------------------------------------------------------------------

  /**
   * search → formatSources → buildMessages → generate, strictly in order.
   */
  async chat(
    query: string,
    history: readonly ConversationTurn[] = [],
    options: ChatOptions = {}
  ): Promise<RAGResult> {
    this.assertConfigured({ search: true, generation: true });
    validateQuery(query);

    const trace = this.openWorkflow('rag_chat_workflow', query, history, options, false);
    trace.addEvent('rag_workflow_started', { query_length: query.length });

    try {
      trace.addEvent('step_1_search_started');
      const documents = await this.runSearch(query, options, trace);
      trace.addEvent('step_1_search_completed', { documents_found: documents.length });

      trace.addEvent('step_2_format_started');
      const formattedSources = this.runFormat(documents, trace);
      trace.addEvent('step_2_format_completed', { sources_length: formattedSources.length });

      trace.addEvent('step_3_build_messages_started');
      const messages = this.buildMessages(query, formattedSources, history);
      trace.addEvent('step_3_build_messages_completed', { message_count: messages.length });

      trace.addEvent('step_4_generate_started');
      const completion = await this.runComplete(messages, {}, trace);
      trace.addEvent('step_4_generate_completed', { answer_length: completion.content.length });

      recordWorkflowOutcome(trace, query, formattedSources, completion.content, documents.length);
      trace.setAttribute('rag.total_tokens', completion.usage.totalTokens);
      trace.update({ output: completion.content });
      trace.addEvent('rag_workflow_completed');

      this.logger.debug?.(
        `Answered with ${completion.usage.totalTokens} tokens from ${documents.length} documents`
      );

      return {
        answer: completion.content,
        documents,
        formattedSources,
        systemPrompt: messages[0]?.content ?? '',
        usage: completion.usage,
        finishReason: completion.finishReason,
      };
    } catch (error) {
      trace.setAttribute('rag.status', 'error').recordException(error);
      throw error;
    } finally {
      trace.end();
    }
  }

  /**
   * Streaming variant of chat().
   *
   * Retrieval and formatting finish before the first fragment. Every
   * non-empty delta becomes one `fragment` event, in arrival order; a
   * single `done` event with the complete result follows. A failure
   * mid-stream ends the sequence with the error and no `done` event.
   * Abandoning the iteration closes the trace with rag.status=cancelled.
   */
  async *chatStream(
    query: string,
    history: readonly ConversationTurn[] = [],
    options: ChatOptions = {}
  ): AsyncGenerator<ChatStreamEvent, void, undefined> {
    this.assertConfigured({ search: true, generation: true });
    validateQuery(query);

    const trace = this.openWorkflow('rag_chat_stream_workflow', query, history, options, true);
    trace.addEvent('rag_stream_workflow_started', { query_length: query.length });

    let open = true;
    const close = (): void => {
      if (open) {
        open = false;
        trace.end();
      }
    };

    try {
      trace.addEvent('step_1_search_started');
      const documents = await this.runSearch(query, options, trace);
      trace.addEvent('step_1_search_completed', { documents_found: documents.length });

      trace.addEvent('step_2_format_started');
      const formattedSources = this.runFormat(documents, trace);
      trace.addEvent('step_2_format_completed', { sources_length: formattedSources.length });

      trace.addEvent('step_3_build_messages_started');
      const messages = this.buildMessages(query, formattedSources, history);
      trace.addEvent('step_3_build_messages_completed', { message_count: messages.length });

      trace.addEvent('step_4_stream_started');
      const deltas = await this.runStream(messages, {}, trace);

      let answer = '';
      let chunkCount = 0;
      try {
        for await (const delta of deltas) {
          if (!delta.content) continue;
          answer += delta.content;
          chunkCount += 1;
          yield { type: 'fragment', text: delta.content };
        }
      } catch (error) {
        throw GenerationError.from(error);
      }

      trace.addEvent('step_4_stream_completed', {
        answer_length: answer.length,
        chunk_count: chunkCount,
      });
      recordWorkflowOutcome(trace, query, formattedSources, answer, documents.length);
      trace.setAttribute('rag.stream_chunk_count', chunkCount);
      trace.update({ output: answer });
      trace.addEvent('rag_stream_workflow_completed');
      close();

      yield {
        type: 'done',
        result: {
          answer,
          documents,
          formattedSources,
          systemPrompt: messages[0]?.content ?? '',
        },
      };
    } catch (error) {
      if (open) {
        trace.setAttribute('rag.status', 'error').recordException(error);
        close();
      }
      throw error;
    } finally {
      if (open) {
        trace.setAttribute('rag.status', 'cancelled');
        close();
      }
    }
  }

  /**
   * Retrieval without generation.
   */
  async getDocuments(query: string, options: RetrievalOptions = {}): Promise<RetrievedDocument[]> {
    return this.search(query, options);
  }

  /**
   * Flush and stop the tracer. Call once on process exit.
   */
  async shutdown(): Promise<void> {
    await this.tracer?.shutdown();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private assertConfigured(requirements: Requirements): void {
    if (requirements.search && !this.config.search.endpoint) {
      throw new ConfigurationError(
        'Azure AI Search endpoint is not configured',
        SETUP_INSTRUCTIONS.search
      );
    }
    if (requirements.generation && !this.config.openai.endpoint) {
      throw new ConfigurationError(
        'Azure OpenAI endpoint is not configured',
        SETUP_INSTRUCTIONS.openai
      );
    }
  }

  /** Root trace, or the no-op trace when sampled out or untraced */
  private openTrace(options: TraceOptions): TraceHandle {
    if (!this.tracer || !shouldRecord(this.config.observability.sample_rate)) {
      return NOOP_TRACE;
    }
    return this.tracer.trace(options);
  }

  private openSpan(parent: TraceHandle | undefined, options: SpanOptions): SpanHandle {
    return parent ? parent.span(options) : this.openTrace(options);
  }

  private openGeneration(parent: TraceHandle | undefined, options: GenerationOptions): SpanHandle {
    return parent ? parent.generation(options) : this.openTrace(options);
  }

  private openWorkflow(
    name: string,
    query: string,
    history: readonly ConversationTurn[],
    options: ChatOptions,
    streaming: boolean
  ): TraceHandle {
    return this.openTrace({
      name,
      input: query,
      sessionId: options.sessionId,
      attributes: {
        'rag.query': query,
        'rag.workflow_type': streaming ? 'streaming' : 'complete',
        'rag.streaming': streaming,
        'rag.conversation_turns': history.length,
      },
    });
  }

  private async runSearch(
    query: string,
    options: RetrievalOptions,
    parent?: TraceHandle
  ): Promise<RetrievedDocument[]> {
    const topK = options.topK ?? this.config.search.top_k;
    const useSemanticRanker = options.useSemanticRanker ?? this.config.search.use_semantic_ranker;
    validateTopK(topK);

    const indexName = this.config.search.index_name;
    const span = this.openSpan(parent, {
      name: 'search_documents',
      input: query,
      attributes: {
        'search.query': query,
        'search.top_k': topK,
        'search.use_semantic_ranker': useSemanticRanker,
        'search.index_name': indexName,
        'search.type': 'hybrid',
      },
    });

    return runInSpan(span, async () => {
      span.addEvent('search_started', { index: indexName });
      this.logger.debug?.(`Searching ${indexName} (top ${topK}) for: ${query}`);

      let records: SearchRecord[];
      try {
        records = await this.searchBackend.hybridSearch({
          text: query,
          top: topK,
          vectorField: this.config.search.vector_field_name,
          semanticConfiguration: useSemanticRanker
            ? this.config.search.semantic_configuration_name
            : undefined,
        });
      } catch (error) {
        throw RetrievalError.from(error);
      }

      const documents = records.map(toRetrievedDocument);
      recordSearchResults(span, documents);
      span.update({ output: { documents_found: documents.length } });
      span.addEvent('search_completed', { documents_found: documents.length });
      this.logger.debug?.(`Retrieved ${documents.length} documents`);
      return documents;
    });
  }

  private runFormat(documents: readonly RetrievedDocument[], parent: TraceHandle): string {
    const span = parent.span({ name: 'format_sources' });
    try {
      const formatted = this.formatSources(documents);
      recordFormattedSources(span, documents.length, formatted);
      if (documents.length === 0) {
        this.logger.debug?.('No documents retrieved; prompting without sources');
      }
      return formatted;
    } finally {
      span.end();
    }
  }

  private request(messages: readonly PromptMessage[], options: GenerateOptions): CompletionRequest {
    return {
      deployment: this.config.openai.chat_deployment,
      messages,
      maxTokens: options.maxTokens ?? this.config.generation.max_tokens,
      temperature: options.temperature ?? this.config.generation.temperature,
    };
  }

  private openGenerateSpan(
    request: CompletionRequest,
    stream: boolean,
    parent?: TraceHandle
  ): SpanHandle {
    const span = this.openGeneration(parent, {
      name: 'generate_response',
      model: request.deployment,
      modelParameters: { max_tokens: request.maxTokens, temperature: request.temperature },
      input: request.messages,
    });
    recordGenerationRequest(span, request.messages, { ...request, stream });
    span.addEvent('llm_call_started', { model: request.deployment, stream });
    this.logger.debug?.(
      `Calling ${request.deployment} with ${request.messages.length} messages${stream ? ' (streaming)' : ''}`
    );
    return span;
  }

  private async runComplete(
    messages: readonly PromptMessage[],
    options: GenerateOptions,
    parent?: TraceHandle
  ): Promise<Completion> {
    const request = this.request(messages, options);
    const span = this.openGenerateSpan(request, false, parent);

    return runInSpan(span, async () => {
      let completion: Completion;
      try {
        completion = await this.generationBackend.complete(request);
      } catch (error) {
        throw GenerationError.from(error);
      }
      recordCompletion(span, completion);
      span.update({ output: completion.content });
      span.addEvent('llm_call_completed');
      return completion;
    });
  }

  private async runStream(
    messages: readonly PromptMessage[],
    options: GenerateOptions,
    parent?: TraceHandle
  ): Promise<AsyncIterable<StreamDelta>> {
    const request = this.request(messages, options);
    const span = this.openGenerateSpan(request, true, parent);

    return runInSpan(span, async () => {
      let deltas: AsyncIterable<StreamDelta>;
      try {
        deltas = await this.generationBackend.stream(request);
      } catch (error) {
        throw GenerationError.from(error);
      }
      span.addEvent('llm_call_completed');
      return deltas;
    });
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

export interface CreateRAGEngineOptions {
  logger?: Logger;
  /** Defaults to createTracer(config, logger) */
  tracer?: Tracer;
  template?: PromptTemplate;
  /** Defaults to Azure AI Search */
  search?: SearchCollaborator;
  /** Defaults to Azure OpenAI */
  generation?: GenerationCollaborator;
}

/**
 * Wire a RAGEngine to the Azure backends and the configured tracer.
 *
 * Nothing connects yet: clients and the credential are created on first
 * use.
 */
export function createRAGEngine(config: Config, options: CreateRAGEngineOptions = {}): RAGEngine {
  const logger = options.logger ?? consoleLogger;

  return new RAGEngine({
    config,
    logger,
    template: options.template,
    tracer: options.tracer ?? createTracer(config, logger),
    search:
      options.search ??
      new AzureSearchCollaborator({
        endpoint: config.search.endpoint,
        indexName: config.search.index_name,
        logger,
      }),
    generation:
      options.generation ??
      new AzureOpenAICollaborator({
        endpoint: config.openai.endpoint,
        apiVersion: config.openai.api_version,
        logger,
      }),
  });
}
