/**
 * NoopTracer — Null-object pattern implementation.
 *
 * Used when observability is disabled, Langfuse keys are not configured,
 * or a request is sampled out. Every call returns the same frozen handles.
 */

import type {
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

/** No-op span — every method returns self, end() does nothing. */
export const NOOP_SPAN: SpanHandle = Object.freeze({
  update(_data: UpdateData): SpanHandle {
    return NOOP_SPAN;
  },
  setAttribute(_key: string, _value: AttributeValue): SpanHandle {
    return NOOP_SPAN;
  },
  addEvent(_name: string, _attributes?: Attributes): SpanHandle {
    return NOOP_SPAN;
  },
  recordException(_error: unknown): SpanHandle {
    return NOOP_SPAN;
  },
  end(): void {},
});

/** No-op trace — children are NOOP_SPAN. */
export const NOOP_TRACE: TraceHandle = Object.freeze({
  span(_options: SpanOptions): SpanHandle {
    return NOOP_SPAN;
  },
  generation(_options: GenerationOptions): SpanHandle {
    return NOOP_SPAN;
  },
  update(_data: UpdateData): SpanHandle {
    return NOOP_TRACE;
  },
  setAttribute(_key: string, _value: AttributeValue): SpanHandle {
    return NOOP_TRACE;
  },
  addEvent(_name: string, _attributes?: Attributes): SpanHandle {
    return NOOP_TRACE;
  },
  recordException(_error: unknown): SpanHandle {
    return NOOP_TRACE;
  },
  end(): void {},
});

/**
 * Create a no-operation tracer. No side effects, no allocations per trace.
 */
export function createNoopTracer(): Tracer {
  return {
    trace(_options: TraceOptions): TraceHandle {
      return NOOP_TRACE;
    },
    async flush(): Promise<void> {},
    async shutdown(): Promise<void> {},
    isRemote: false,
  };
}
