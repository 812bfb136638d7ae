/**
 * Trace Sampling
 *
 * Controls the fraction of pipeline invocations sent to Langfuse.
 * Applied by the RAG engine before it opens a trace; a sampled-out
 * invocation runs against the no-op trace.
 *
 * At sample_rate=1.0 (default), every invocation is traced.
 * At 0.0, nothing is traced.
 */

/**
 * Check if this invocation should be traced based on sample_rate.
 *
 * @param sampleRate - Value between 0.0 (never) and 1.0 (always)
 */
export function shouldRecord(sampleRate: number): boolean {
  if (sampleRate >= 1.0) return true;
  if (sampleRate <= 0.0) return false;
  return Math.random() < sampleRate;
}
