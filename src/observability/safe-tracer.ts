/**
 * Safe Tracer
 *
 * Telemetry must never break a chat request. createSafeTracer() wraps any
 * Tracer so that every call on it, and on the handles it hands out, is
 * guarded: a failure is logged at debug level as a TelemetryError and the
 * pipeline keeps going with a no-op handle.
 */

import { TelemetryError, errorMessage } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { NOOP_SPAN, NOOP_TRACE } from './noop-tracer.js';
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

function report(logger: Logger, operation: string, error: unknown): void {
  const wrapped = new TelemetryError(`Telemetry ${operation} failed: ${errorMessage(error)}`, error);
  logger.debug?.(wrapped.message);
}

function guard(logger: Logger, operation: string, fn: () => void): void {
  try {
    fn();
  } catch (error) {
    report(logger, operation, error);
  }
}

function safeSpan(inner: SpanHandle, logger: Logger): SpanHandle {
  const handle: SpanHandle = {
    update(data: UpdateData): SpanHandle {
      guard(logger, 'update', () => inner.update(data));
      return handle;
    },
    setAttribute(key: string, value: AttributeValue): SpanHandle {
      guard(logger, `setAttribute(${key})`, () => inner.setAttribute(key, value));
      return handle;
    },
    addEvent(name: string, attributes?: Attributes): SpanHandle {
      guard(logger, `addEvent(${name})`, () => inner.addEvent(name, attributes));
      return handle;
    },
    recordException(error: unknown): SpanHandle {
      guard(logger, 'recordException', () => inner.recordException(error));
      return handle;
    },
    end(): void {
      guard(logger, 'end', () => inner.end());
    },
  };
  return handle;
}

function safeTrace(inner: TraceHandle, logger: Logger): TraceHandle {
  const self = safeSpan(inner, logger);
  return {
    traceId: inner.traceId,
    span(options: SpanOptions): SpanHandle {
      try {
        return safeSpan(inner.span(options), logger);
      } catch (error) {
        report(logger, `span(${options.name})`, error);
        return NOOP_SPAN;
      }
    },
    generation(options: GenerationOptions): SpanHandle {
      try {
        return safeSpan(inner.generation(options), logger);
      } catch (error) {
        report(logger, `generation(${options.name})`, error);
        return NOOP_SPAN;
      }
    },
    update: self.update,
    setAttribute: self.setAttribute,
    addEvent: self.addEvent,
    recordException: self.recordException,
    end: self.end,
  };
}

/** Tracers built here; wrapping one again returns it as is */
const guarded = new WeakSet<Tracer>();

/**
 * Wrap a tracer so that no telemetry failure reaches the caller.
 */
export function createSafeTracer(inner: Tracer, logger: Logger): Tracer {
  if (guarded.has(inner)) {
    return inner;
  }

  const tracer: Tracer = {
    trace(options: TraceOptions): TraceHandle {
      try {
        return safeTrace(inner.trace(options), logger);
      } catch (error) {
        report(logger, `trace(${options.name})`, error);
        return NOOP_TRACE;
      }
    },

    async flush(): Promise<void> {
      try {
        await inner.flush();
      } catch (error) {
        report(logger, 'flush', error);
      }
    },

    async shutdown(): Promise<void> {
      try {
        await inner.shutdown();
      } catch (error) {
        report(logger, 'shutdown', error);
      }
    },

    isRemote: inner.isRemote,
  };
  guarded.add(tracer);
  return tracer;
}
