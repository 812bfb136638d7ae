/**
 * Source and Result Formatting
 *
 * formatSources() builds the text block injected into the system prompt;
 * the remaining helpers render search results for the terminal and for
 * JSON consumers.
 *
 * @example
 * ```typescript
 * formatSources([doc]);
 * // policy.pdf#page=3: The deductible is $500.
 *
 * formatResult(doc);
 * // [0.92] policy.pdf#page=3
 * //   The deductible is $500.
 * ```
 */

import type { RetrievedDocument } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Returned by formatSources() for an empty document list */
export const NO_SOURCES_SENTINEL = 'No sources available.';

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Content preview length used by the HTTP search endpoint */
export const SEARCH_PREVIEW_LENGTH = 500;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

const LINE_BREAKS = /(?:\r\n|\r|\n)+/g;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Truncate content to a maximum length with ellipsis.
 *
 * Collapses all whitespace runs to single spaces first, which keeps
 * snippets on one terminal line.
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

/**
 * Cut content at `maxLength` characters, appending "..." when cut.
 * Unlike truncateSnippet() the text is otherwise left alone.
 */
export function previewContent(content: string, maxLength: number = SEARCH_PREVIEW_LENGTH): string {
  return content.length > maxLength ? content.slice(0, maxLength) + '...' : content;
}

/**
 * "source#page=N", or just the source when the page is unknown.
 */
export function sourceLabel(document: RetrievedDocument): string {
  const source = document.source || 'unknown';
  return document.pageNumber ? `${source}#page=${document.pageNumber}` : source;
}

// ============================================================================
// Prompt Sources
// ============================================================================

/**
 * Build the sources block for the system prompt.
 *
 * One line per document, `{source}[#page=N]: {content}`, separated by a
 * blank line. Content is never truncated.
 *
 * The generator does not see a document's content verbatim: every line
 * break in it (`\n`, `\r\n`, runs of blank lines) becomes one space, so a
 * sources line always holds exactly one document. No other character is
 * changed. Callers that need the stored text use `document.content`.
 */
export function formatSources(documents: readonly RetrievedDocument[]): string {
  if (documents.length === 0) {
    return NO_SOURCES_SENTINEL;
  }

  return documents
    .map((document) => `${sourceLabel(document)}: ${document.content}`.replace(LINE_BREAKS, ' '))
    .join('\n\n');
}

// ============================================================================
// Display Formatting
// ============================================================================

/**
 * Format a single search result for text display.
 *
 * Output format:
 * ```
 * [0.92] policy.pdf#page=3  (reranked 2.71)
 *   The deductible is $500.
 * ```
 */
export function formatResult(
  document: RetrievedDocument,
  snippetLength: number = DEFAULT_SNIPPET_LENGTH
): string {
  let header = `[${formatScore(document.relevanceScore)}] ${sourceLabel(document)}`;
  if (document.rerankScore) {
    header += `  (reranked ${formatScore(document.rerankScore)})`;
  }

  return `${header}\n${SNIPPET_INDENT}${truncateSnippet(document.content, snippetLength)}`;
}

/**
 * Format multiple search results, separated by blank lines.
 */
export function formatResults(
  documents: readonly RetrievedDocument[],
  snippetLength?: number
): string {
  return documents.map((document) => formatResult(document, snippetLength)).join('\n\n');
}

/** JSON shape of a search result (CLI --json and GET /search) */
export interface SearchResultJSON {
  content: string;
  title: string;
  source: string;
  pageNumber: number;
  score: number;
  rerankerScore: number;
}

/**
 * Format a search result as a JSON-serializable object with the content
 * cut to `previewLength` characters.
 */
export function formatResultJSON(
  document: RetrievedDocument,
  previewLength: number = SEARCH_PREVIEW_LENGTH
): SearchResultJSON {
  return {
    content: previewContent(document.content, previewLength),
    title: document.title,
    source: document.source,
    pageNumber: document.pageNumber,
    score: document.relevanceScore,
    rerankerScore: document.rerankScore,
  };
}
