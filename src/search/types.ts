/**
 * Search Module Types
 *
 * The retrieved-document shape the RAG engine works with, and the narrow
 * contract a hybrid-search backend has to satisfy.
 */

import { z } from 'zod';

/**
 * One search result, as handed to prompt construction.
 *
 * `content` is never null (empty string when the index returned no field);
 * `pageNumber` 0 means unknown; `rerankScore` is 0 when semantic re-ranking
 * was not applied. Instances are frozen.
 */
export interface RetrievedDocument {
  readonly content: string;
  readonly title: string;
  readonly source: string;
  readonly pageNumber: number;
  /** Raw hybrid search score */
  readonly relevanceScore: number;
  /** Semantic re-ranker score */
  readonly rerankScore: number;
}

/**
 * One hybrid request: lexical match on `text` plus a vectorizable-text
 * query over `vectorField`. Semantic re-ranking is requested when
 * `semanticConfiguration` is set.
 */
export interface HybridSearchRequest {
  text: string;
  top: number;
  vectorField: string;
  semanticConfiguration?: string;
}

/**
 * A raw ranked record from the search backend.
 */
export interface SearchRecord {
  /** Stored fields (content, title, source, page_number) */
  document: unknown;
  /** @search.score */
  score?: number;
  /** @search.reranker_score */
  rerankerScore?: number;
}

/**
 * Hybrid-search backend used by the RAG engine.
 */
export interface SearchCollaborator {
  /** Results in the backend's rank order */
  hybridSearch(request: HybridSearchRequest): Promise<SearchRecord[]>;
}

/** Index fields read into a RetrievedDocument */
export const SEARCH_SELECT_FIELDS = ['content', 'title', 'source', 'page_number'] as const;

/**
 * Stored fields of an index document. Missing or mistyped fields fall
 * back to empty/zero instead of failing the whole search.
 */
const IndexDocumentSchema = z.object({
  content: z.string().catch(''),
  title: z.string().catch(''),
  source: z.string().catch(''),
  page_number: z.number().int().nonnegative().catch(0),
});

const EMPTY_FIELDS: z.infer<typeof IndexDocumentSchema> = {
  content: '',
  title: '',
  source: '',
  page_number: 0,
};

/**
 * Map a backend record to a frozen RetrievedDocument.
 */
export function toRetrievedDocument(record: SearchRecord): RetrievedDocument {
  const parsed = IndexDocumentSchema.safeParse(record.document);
  const fields = parsed.success ? parsed.data : EMPTY_FIELDS;

  return Object.freeze({
    content: fields.content,
    title: fields.title,
    source: fields.source,
    pageNumber: fields.page_number,
    relevanceScore: record.score ?? 0,
    rerankScore: record.rerankerScore ?? 0,
  });
}
