/**
 * Search Module
 *
 * Hybrid retrieval against Azure AI Search plus the formatting of
 * retrieved documents for prompts, the terminal and JSON.
 *
 * @example
 * ```typescript
 * import { AzureSearchCollaborator, formatSources } from './search/index.js';
 *
 * const search = new AzureSearchCollaborator({ endpoint, indexName: 'documents' });
 * const records = await search.hybridSearch({ text: 'deductible', top: 5, vectorField: 'embedding' });
 * ```
 */

export type {
  RetrievedDocument,
  HybridSearchRequest,
  SearchRecord,
  SearchCollaborator,
} from './types.js';
export { toRetrievedDocument, SEARCH_SELECT_FIELDS } from './types.js';

export { AzureSearchCollaborator, type AzureSearchOptions } from './azure-search.js';

export {
  formatSources,
  formatScore,
  truncateSnippet,
  previewContent,
  sourceLabel,
  formatResult,
  formatResults,
  formatResultJSON,
  NO_SOURCES_SENTINEL,
  SEARCH_PREVIEW_LENGTH,
  type SearchResultJSON,
} from './formatter.js';
