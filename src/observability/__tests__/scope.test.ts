import { describe, it, expect, vi } from 'vitest';
import { runInSpan } from '../scope.js';
import type { SpanHandle } from '../types.js';

function recordingSpan() {
  const calls: string[] = [];
  const span: SpanHandle = {
    update: () => span,
    setAttribute: (key, value) => {
      calls.push(`${key}=${String(value)}`);
      return span;
    },
    addEvent: () => span,
    recordException: vi.fn(() => span),
    end: vi.fn(() => {
      calls.push('end');
    }),
  };
  return { span, calls };
}

describe('runInSpan', () => {
  it('returns the result and ends the span', async () => {
    const { span, calls } = recordingSpan();
    await expect(runInSpan(span, async () => 42)).resolves.toBe(42);
    expect(calls).toEqual(['end']);
  });

  it('marks the span, records the error and rethrows', async () => {
    const { span, calls } = recordingSpan();
    const error = new Error('search failed');
    await expect(
      runInSpan(span, async () => {
        throw error;
      })
    ).rejects.toBe(error);
    expect(calls).toEqual(['status=error', 'end']);
    expect(span.recordException).toHaveBeenCalledWith(error);
  });
});
