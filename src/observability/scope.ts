/**
 * Span scoping helper.
 *
 * runInSpan() runs one pipeline step inside an already-open span: a thrown
 * error marks the span (status=error plus the recorded exception) and is
 * rethrown, and the span is ended on every path.
 */

import type { SpanHandle } from './types.js';

export async function runInSpan<T>(span: SpanHandle, fn: (span: SpanHandle) => Promise<T>): Promise<T> {
  try {
    return await fn(span);
  } catch (error) {
    span.setAttribute('status', 'error').recordException(error);
    throw error;
  } finally {
    span.end();
  }
}
