/**
 * Observability Types
 *
 * Tracer abstraction for Langfuse v4 (OpenTelemetry-based) observability.
 * Follows the null-object pattern: NoopTracer when not configured, real
 * LangfuseTracer when keys are present. The RAG engine creates and uses
 * tracers without knowing which implementation it has.
 *
 * Maps to Langfuse v4 SDK:
 *   tracer.trace()           → startObservation(name, attrs)
 *   traceHandle.span()       → parent.startObservation(name, attrs)
 *   traceHandle.generation() → parent.startObservation(name, attrs, { asType: 'generation' })
 *   handle.update()          → obs.update({ output, metadata })
 *   handle.setAttribute()    → obs.otelSpan.setAttribute()
 *   handle.addEvent()        → obs.otelSpan.addEvent()
 *   handle.recordException() → obs.otelSpan.recordException() + error attributes
 *   handle.end()             → obs.end()
 *   tracer.flush()           → processor.forceFlush()
 *   tracer.shutdown()        → sdk.shutdown()
 */

// ============================================================================
// Attribute values
// ============================================================================

/** Values a span attribute or event attribute may hold */
export type AttributeValue = string | number | boolean;

export type Attributes = Record<string, AttributeValue>;

// ============================================================================
// Input Options
// ============================================================================

/** Options for creating a new trace (root observation). */
export interface TraceOptions {
  /** Trace name (e.g., 'rag_chat_workflow', 'search_documents') */
  name: string;
  /** User-provided input (the query) */
  input?: unknown;
  /** Arbitrary metadata */
  metadata?: Record<string, unknown>;
  /** Session ID for grouping related traces (e.g., one chat REPL) */
  sessionId?: string;
  /** Attributes set as soon as the trace starts */
  attributes?: Attributes;
}

/** Options for creating a span within a trace. */
export interface SpanOptions {
  /** Span name (e.g., 'search_documents', 'format_sources') */
  name: string;
  /** Input data */
  input?: unknown;
  /** Arbitrary metadata */
  metadata?: Record<string, unknown>;
  /** Attributes set as soon as the span starts */
  attributes?: Attributes;
}

/** Options for creating a generation (LLM call) within a trace. */
export interface GenerationOptions extends SpanOptions {
  /** Deployment / model name */
  model?: string;
  /** Request parameters (max_tokens, temperature) */
  modelParameters?: Record<string, string | number>;
}

/** Data to update a handle with before ending. */
export interface UpdateData {
  /** Output data */
  output?: unknown;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Handles (returned by trace/span/generation creation)
// ============================================================================

/**
 * Handle for a span or generation observation. Call end() exactly once.
 */
export interface SpanHandle {
  /** Update the span with output/metadata */
  update(data: UpdateData): SpanHandle;
  /** Set a single attribute */
  setAttribute(key: string, value: AttributeValue): SpanHandle;
  /** Add a timestamped event */
  addEvent(name: string, attributes?: Attributes): SpanHandle;
  /** Record an exception and mark the span with error=true and error.message */
  recordException(error: unknown): SpanHandle;
  /** End the span */
  end(): void;
}

/**
 * Handle for a trace (root observation).
 * Returned by Tracer.trace(). Use to create child spans and generations.
 */
export interface TraceHandle extends SpanHandle {
  /** The trace ID (Langfuse trace ID when remote, undefined for noop) */
  readonly traceId?: string;
  /** Create a child span within this trace */
  span(options: SpanOptions): SpanHandle;
  /** Create a child generation (LLM call) within this trace */
  generation(options: GenerationOptions): SpanHandle;
}

// ============================================================================
// Core Tracer Interface
// ============================================================================

/**
 * Core tracer interface for observability.
 * Implementations: NoopTracer (zero overhead) or LangfuseTracer (real tracing),
 * usually wrapped by the safe tracer.
 */
export interface Tracer {
  /** Create a new trace for one pipeline invocation */
  trace(options: TraceOptions): TraceHandle;
  /** Flush all pending events to the backend */
  flush(): Promise<void>;
  /** Shut down the tracer (flushes and prevents further events) */
  shutdown(): Promise<void>;
  /** Whether this tracer sends data to a remote service */
  readonly isRemote: boolean;
}
