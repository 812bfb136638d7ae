/**
 * LangfuseTracer — Langfuse v4 (OpenTelemetry-based) implementation.
 *
 * Initializes an OpenTelemetry NodeSDK with a LangfuseSpanProcessor that
 * exports spans to Langfuse. Observations come from startObservation()
 * (handle-based API) in @langfuse/tracing; raw attributes, events and
 * exceptions go to the observation's underlying OpenTelemetry span so that
 * the gen_ai.* / search.* / rag.* keys arrive unchanged.
 *
 * Lifecycle:
 *   createLangfuseTracer(config) → Tracer
 *     tracer.trace() → creates root observation
 *       handle.span() → creates child span observation
 *       handle.generation() → creates child generation observation
 *     tracer.flush() → processor.forceFlush()
 *     tracer.shutdown() → sdk.shutdown() (flushes + closes)
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';
import { startObservation } from '@langfuse/tracing';
import type { Span } from '@opentelemetry/api';
import { errorMessage } from '../errors/index.js';
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

// ============================================================================
// Config
// ============================================================================

/** Configuration required to create a LangfuseTracer. */
export interface LangfuseTracerConfig {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
  /** Recorded as the service.name resource attribute */
  serviceName?: string;
}

/** Root observation as returned by startObservation() */
type RootObservation = ReturnType<typeof startObservation>;

/** The part of a span or generation observation the handles use */
interface Observation {
  readonly otelSpan: Span;
  update(attributes: {
    output?: unknown;
    metadata?: Record<string, unknown>;
    level?: 'ERROR';
    statusMessage?: string;
  }): unknown;
  end(): void;
}

// ============================================================================
// Handle wrappers (adapt Langfuse observations to our interface)
// ============================================================================

function applyAttributes(obs: Observation, attributes: Attributes | undefined): void {
  if (!attributes) return;
  for (const [key, value] of Object.entries(attributes)) {
    obs.otelSpan.setAttribute(key, value);
  }
}

/**
 * Wraps a Langfuse observation as a SpanHandle.
 */
function wrapSpan(obs: Observation): SpanHandle {
  const handle: SpanHandle = {
    update(data: UpdateData): SpanHandle {
      obs.update({
        output: data.output,
        metadata: data.metadata,
      });
      return handle;
    },
    setAttribute(key: string, value: AttributeValue): SpanHandle {
      obs.otelSpan.setAttribute(key, value);
      return handle;
    },
    addEvent(name: string, attributes?: Attributes): SpanHandle {
      obs.otelSpan.addEvent(name, attributes);
      return handle;
    },
    recordException(error: unknown): SpanHandle {
      const message = errorMessage(error);
      obs.otelSpan.recordException(error instanceof Error ? error : message);
      obs.otelSpan.setAttribute('error', true);
      obs.otelSpan.setAttribute('error.message', message);
      obs.update({ level: 'ERROR', statusMessage: message });
      return handle;
    },
    end(): void {
      obs.end();
    },
  };
  return handle;
}

/**
 * Wraps a root Langfuse observation as a TraceHandle.
 */
function wrapTrace(obs: RootObservation): TraceHandle {
  const self = wrapSpan(obs);
  return {
    traceId: obs.otelSpan.spanContext().traceId,
    span(options: SpanOptions): SpanHandle {
      const child = obs.startObservation(options.name, {
        input: options.input,
        metadata: options.metadata,
      });
      applyAttributes(child, options.attributes);
      return wrapSpan(child);
    },
    generation(options: GenerationOptions): SpanHandle {
      const child = obs.startObservation(
        options.name,
        {
          model: options.model,
          modelParameters: options.modelParameters,
          input: options.input,
          metadata: options.metadata,
        },
        { asType: 'generation' },
      );
      applyAttributes(child, options.attributes);
      return wrapSpan(child);
    },
    update: self.update,
    setAttribute: self.setAttribute,
    addEvent: self.addEvent,
    recordException: self.recordException,
    end: self.end,
  };
}

// ============================================================================
// LangfuseTracer factory
// ============================================================================

/**
 * Create a Langfuse-backed tracer using the v4 OpenTelemetry SDK.
 *
 * The SDK is started here and must be shut down on process exit.
 */
export function createLangfuseTracer(config: LangfuseTracerConfig): Tracer {
  const processor = new LangfuseSpanProcessor({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });

  const sdk = new NodeSDK({
    serviceName: config.serviceName,
    spanProcessors: [processor],
  });

  sdk.start();

  return {
    trace(options: TraceOptions): TraceHandle {
      const obs = startObservation(options.name, {
        input: options.input,
        metadata: options.metadata,
      });

      // sessionId is a trace-level attribute in Langfuse v4
      if (options.sessionId) {
        obs.updateTrace({ sessionId: options.sessionId });
      }

      applyAttributes(obs, options.attributes);
      return wrapTrace(obs);
    },

    async flush(): Promise<void> {
      await processor.forceFlush();
    },

    async shutdown(): Promise<void> {
      await sdk.shutdown();
    },

    isRemote: true,
  };
}
