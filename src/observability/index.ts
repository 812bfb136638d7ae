/**
 * Observability Module
 *
 * Tracer abstraction for Langfuse v4 (OpenTelemetry-based) observability.
 * The RAG engine takes a Tracer from createTracer(config) and opens one
 * trace per pipeline invocation.
 *
 * @example
 * ```typescript
 * import { createTracer } from '../observability/index.js';
 *
 * const tracer = createTracer(config);
 * const trace = tracer.trace({ name: 'rag_chat_workflow', input: query });
 * // ... do work ...
 * trace.end();
 * await tracer.shutdown();
 * ```
 */

// Types
export type {
  Tracer,
  TraceHandle,
  SpanHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
  AttributeValue,
  Attributes,
} from './types.js';

// Factory (primary API)
export { createTracer } from './factory.js';

// Implementations (for testing or direct use)
export { createNoopTracer, NOOP_SPAN, NOOP_TRACE } from './noop-tracer.js';
export { createLangfuseTracer, type LangfuseTracerConfig } from './langfuse-tracer.js';
export { createSafeTracer } from './safe-tracer.js';

// Helpers
export { runInSpan } from './scope.js';
export { shouldRecord } from './sampling.js';
