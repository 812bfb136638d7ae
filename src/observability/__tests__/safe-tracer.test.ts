import { describe, it, expect, vi } from 'vitest';
import { createSafeTracer } from '../safe-tracer.js';
import { NOOP_SPAN, NOOP_TRACE } from '../noop-tracer.js';
import type { Tracer, TraceHandle, SpanHandle } from '../types.js';

function throwingSpan(): SpanHandle {
  const fail = (): never => {
    throw new Error('exporter down');
  };
  return {
    update: fail,
    setAttribute: fail,
    addEvent: fail,
    recordException: fail,
    end: fail,
  };
}

function tracerWith(trace: TraceHandle): Tracer {
  return {
    trace: () => trace,
    flush: async () => {},
    shutdown: async () => {},
    isRemote: true,
  };
}

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe('createSafeTracer', () => {
  it('passes calls through to the inner handles', () => {
    const setAttribute = vi.fn();
    const inner: TraceHandle = {
      ...NOOP_TRACE,
      traceId: 'trace-1',
      setAttribute(key, value) {
        setAttribute(key, value);
        return inner;
      },
    };
    const trace = createSafeTracer(tracerWith(inner), makeLogger()).trace({ name: 't' });
    trace.setAttribute('rag.status', 'success');
    expect(setAttribute).toHaveBeenCalledWith('rag.status', 'success');
    expect(trace.traceId).toBe('trace-1');
  });

  it('falls back to the no-op trace when trace() throws', () => {
    const logger = makeLogger();
    const inner: Tracer = {
      ...tracerWith(NOOP_TRACE),
      trace: () => {
        throw new Error('not started');
      },
    };
    const trace = createSafeTracer(inner, logger).trace({ name: 'rag_chat_workflow' });
    expect(trace).toBe(NOOP_TRACE);
    expect(logger.debug).toHaveBeenCalledWith(
      'Telemetry trace(rag_chat_workflow) failed: not started'
    );
  });

  it('falls back to the no-op span when span() throws', () => {
    const logger = makeLogger();
    const inner: TraceHandle = {
      ...NOOP_TRACE,
      span: () => {
        throw new Error('no parent');
      },
    };
    const span = createSafeTracer(tracerWith(inner), logger)
      .trace({ name: 't' })
      .span({ name: 'search_documents' });
    expect(span).toBe(NOOP_SPAN);
    expect(logger.debug).toHaveBeenCalledWith('Telemetry span(search_documents) failed: no parent');
  });

  it('swallows and logs failures on every span method', () => {
    const logger = makeLogger();
    const inner: TraceHandle = {
      ...throwingSpan(),
      span: () => throwingSpan(),
      generation: () => throwingSpan(),
    };
    const trace = createSafeTracer(tracerWith(inner), logger).trace({ name: 't' });
    const span = trace.generation({ name: 'generate_response' });

    expect(() => {
      span.update({ output: 'x' }).setAttribute('k', 1).addEvent('e').recordException(new Error('x'));
      span.end();
      trace.end();
    }).not.toThrow();
    expect(logger.debug).toHaveBeenCalledWith('Telemetry setAttribute(k) failed: exporter down');
    expect(logger.debug).toHaveBeenCalledTimes(6);
  });

  it('logs a rejected flush or shutdown instead of rejecting', async () => {
    const logger = makeLogger();
    const inner: Tracer = {
      ...tracerWith(NOOP_TRACE),
      flush: async () => {
        throw new Error('timeout');
      },
      shutdown: async () => {
        throw new Error('closed');
      },
    };
    const tracer = createSafeTracer(inner, logger);
    await expect(tracer.flush()).resolves.toBeUndefined();
    await expect(tracer.shutdown()).resolves.toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith('Telemetry flush failed: timeout');
    expect(logger.debug).toHaveBeenCalledWith('Telemetry shutdown failed: closed');
  });

  it('keeps the inner isRemote flag', () => {
    expect(createSafeTracer(tracerWith(NOOP_TRACE), makeLogger()).isRemote).toBe(true);
  });

  it('returns an already guarded tracer unchanged', () => {
    const logger = makeLogger();
    const once = createSafeTracer(tracerWith(NOOP_TRACE), logger);

    expect(createSafeTracer(once, logger)).toBe(once);
  });
});
