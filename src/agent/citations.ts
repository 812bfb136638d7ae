/**
 * Citation Formatter
 *
 * Terminal and JSON rendering of the documents an answer was grounded on.
 * Complements formatSources(), which renders the same documents for the
 * model.
 *
 * @example
 * ```typescript
 * formatCitations(result.documents);
 * // 1. Policy
 * //    📄 policy.pdf (Page 3)
 * //    🎯 Relevance: 2.50
 * ```
 */

import { z } from 'zod';
import { formatScore } from '../search/formatter.js';
import type { RetrievedDocument } from './types.js';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

/**
 * Options for formatting citations.
 */
export interface CitationFormatOptions {
  /** Show the re-ranker relevance line (default: true) */
  showScores?: boolean;

  /** Maximum number of citations to display (default: unlimited) */
  limit?: number;

  /** Show "...and N more" when truncated (default: true) */
  showTruncationHint?: boolean;
}

/**
 * JSON projection of a document, as returned by the chat API.
 */
export interface SourceJSON {
  title: string;
  source: string;
  pageNumber: number;
  score: number;
}

/** Returned by formatCitations() for an empty list */
export const NO_DOCUMENTS_MESSAGE = 'No documents retrieved.';

/**
 * Zod schema for CitationFormatOptions validation.
 */
export const CitationFormatOptionsSchema = z.object({
  showScores: z.boolean().optional(),
  limit: z.number().int().min(0).optional(),
  showTruncationHint: z.boolean().optional(),
});

const DEFAULT_CITATION_CONFIG = {
  showScores: true,
  limit: 0, // 0 = no limit
  showTruncationHint: true,
};

// ============================================================================
// CORE FORMATTING FUNCTIONS
// ============================================================================

/**
 * Format one citation. `index` is 1-based.
 *
 * @example
 * ```typescript
 * formatCitation(doc, 1)
 * // "1. Policy\n   📄 policy.pdf (Page 3)\n   🎯 Relevance: 2.50"
 * ```
 */
export function formatCitation(
  document: RetrievedDocument,
  index: number,
  options: CitationFormatOptions = {}
): string {
  const showScores = options.showScores ?? DEFAULT_CITATION_CONFIG.showScores;

  let text = `${index}. ${document.title || 'Untitled'}`;
  if (document.source) {
    text += `\n   📄 ${document.source}`;
  }
  if (document.pageNumber) {
    text += ` (Page ${document.pageNumber})`;
  }
  if (showScores && document.rerankScore) {
    text += `\n   🎯 Relevance: ${formatScore(document.rerankScore)}`;
  }
  return text;
}

/**
 * Format citations, one block per document separated by blank lines.
 */
export function formatCitations(
  documents: readonly RetrievedDocument[],
  options: CitationFormatOptions = {}
): string {
  if (documents.length === 0) {
    return NO_DOCUMENTS_MESSAGE;
  }

  const config = { ...DEFAULT_CITATION_CONFIG, ...CitationFormatOptionsSchema.parse(options) };

  const limit = config.limit > 0 ? config.limit : documents.length;
  const shown = documents.slice(0, limit);
  const truncatedCount = documents.length - shown.length;

  const blocks = shown.map((document, i) => formatCitation(document, i + 1, config));

  if (truncatedCount > 0 && config.showTruncationHint) {
    blocks.push(`...and ${truncatedCount} more`);
  }

  return blocks.join('\n\n');
}

// ============================================================================
// JSON FORMATTING FUNCTIONS
// ============================================================================

export function toSourceJSON(document: RetrievedDocument): SourceJSON {
  return {
    title: document.title,
    source: document.source,
    pageNumber: document.pageNumber,
    score: document.relevanceScore,
  };
}
