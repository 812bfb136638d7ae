/**
 * Span attributes recorded by the RAG engine.
 *
 * Attribute keys follow the search.*, format.*, gen_ai.* and rag.*
 * conventions. Previews are cut for telemetry only; the text sent to the
 * model is never shortened.
 */

import type { SpanHandle } from '../observability/types.js';
import type { Completion } from '../providers/types.js';
import type { PromptMessage, RetrievedDocument } from './types.js';

/** Documents described individually on the search span */
const DOCUMENT_PREVIEW_COUNT = 5;
const DOCUMENT_PREVIEW_CHARS = 2000;
const MESSAGE_PREVIEW_CHARS = 10000;
const CONTEXT_PREVIEW_CHARS = 8000;

export const GEN_AI_SYSTEM = 'azure_openai';

function preview(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

export function recordSearchResults(span: SpanHandle, documents: readonly RetrievedDocument[]): void {
  span.setAttribute('search.documents_found', documents.length);

  const top = documents[0];
  if (!top) return;

  span.setAttribute('search.top_score', top.relevanceScore);
  const sources = documents.map((d) => d.source).filter((s) => s.length > 0);
  span.setAttribute('search.sources', sources.slice(0, DOCUMENT_PREVIEW_COUNT).join(', '));

  documents.slice(0, DOCUMENT_PREVIEW_COUNT).forEach((doc, i) => {
    const prefix = `search.doc_${i + 1}`;
    span
      .setAttribute(`${prefix}.source`, doc.source || 'unknown')
      .setAttribute(`${prefix}.title`, doc.title || 'untitled')
      .setAttribute(`${prefix}.page`, doc.pageNumber)
      .setAttribute(`${prefix}.score`, doc.relevanceScore)
      .setAttribute(`${prefix}.content`, preview(doc.content, DOCUMENT_PREVIEW_CHARS));
  });
}

export function recordFormattedSources(
  span: SpanHandle,
  documentCount: number,
  formatted: string
): void {
  span.setAttribute('format.document_count', documentCount);
  if (documentCount === 0) {
    span.setAttribute('format.result', 'no_sources');
    return;
  }
  span
    .setAttribute('format.output_chars', formatted.length)
    .setAttribute('format.sources_count', documentCount)
    .setAttribute('format.context_text', preview(formatted, CONTEXT_PREVIEW_CHARS));
}

export interface GenerationRequestInfo {
  deployment: string;
  maxTokens: number;
  temperature: number;
  stream: boolean;
}

export function recordGenerationRequest(
  span: SpanHandle,
  messages: readonly PromptMessage[],
  request: GenerationRequestInfo
): void {
  span
    .setAttribute('gen_ai.system', GEN_AI_SYSTEM)
    .setAttribute('gen_ai.request.model', request.deployment)
    .setAttribute('gen_ai.request.max_tokens', request.maxTokens)
    .setAttribute('gen_ai.request.temperature', request.temperature)
    .setAttribute('gen_ai.request.streaming', request.stream)
    .setAttribute('gen_ai.request.message_count', messages.length)
    .setAttribute(
      'gen_ai.request.input_chars',
      messages.reduce((total, m) => total + m.content.length, 0)
    );

  messages.forEach((message, i) => {
    span
      .setAttribute(`gen_ai.request.message_${i}.role`, message.role)
      .setAttribute(`gen_ai.request.message_${i}.content`, preview(message.content, MESSAGE_PREVIEW_CHARS));
  });
}

export function recordCompletion(span: SpanHandle, completion: Completion): void {
  span
    .setAttribute('gen_ai.response.prompt_tokens', completion.usage.promptTokens)
    .setAttribute('gen_ai.response.completion_tokens', completion.usage.completionTokens)
    .setAttribute('gen_ai.response.total_tokens', completion.usage.totalTokens)
    .setAttribute('gen_ai.response.content', completion.content)
    .setAttribute('gen_ai.response.finish_reason', completion.finishReason);
}

/**
 * Success attributes on the workflow trace.
 */
export function recordWorkflowOutcome(
  span: SpanHandle,
  query: string,
  formattedSources: string,
  answer: string,
  documentCount: number
): void {
  span
    .setAttribute('rag.documents_retrieved', documentCount)
    .setAttribute('rag.answer_length', answer.length)
    .setAttribute('rag.status', 'success')
    .setAttribute('rag.input.user_query', query)
    .setAttribute('rag.input.context', preview(formattedSources, CONTEXT_PREVIEW_CHARS))
    .setAttribute('rag.output.answer', answer);
}
