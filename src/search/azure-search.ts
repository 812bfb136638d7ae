/**
 * Azure AI Search Collaborator
 *
 * Runs hybrid queries (keyword + vectorizable text, optional semantic
 * re-ranking) against one index. The SearchClient is created on first use
 * with the shared Azure credential.
 */

import { SearchClient, type VectorSearchOptions } from '@azure/search-documents';
import type { TokenCredential } from '@azure/identity';

import { ConfigurationError } from '../errors/index.js';
import { SETUP_INSTRUCTIONS } from '../config/env.js';
import { getSharedCredential } from '../providers/credential.js';
import { Lazy } from '../utils/lazy.js';
import type { Logger } from '../utils/logger.js';
import type {
  HybridSearchRequest,
  SearchCollaborator,
  SearchRecord,
} from './types.js';
import { SEARCH_SELECT_FIELDS } from './types.js';

export interface AzureSearchOptions {
  /** Search service endpoint, e.g. https://my-search.search.windows.net */
  endpoint: string;
  indexName: string;
  /** Defaults to the process-wide DefaultAzureCredential */
  credential?: () => Promise<TokenCredential>;
  logger?: Logger;
}

export class AzureSearchCollaborator implements SearchCollaborator {
  private readonly client: Lazy<SearchClient<object>>;
  private readonly logger?: Logger;

  constructor(options: AzureSearchOptions) {
    const getCredential = options.credential ?? getSharedCredential;
    this.logger = options.logger;

    this.client = new Lazy(async () => {
      if (!options.endpoint) {
        throw new ConfigurationError(
          'Azure AI Search endpoint is not configured',
          SETUP_INSTRUCTIONS.search
        );
      }
      const credential = await getCredential();
      this.logger?.debug?.(`Connecting to index ${options.indexName} at ${options.endpoint}`);
      return new SearchClient<object>(options.endpoint, options.indexName, credential);
    });
  }

  async hybridSearch(request: HybridSearchRequest): Promise<SearchRecord[]> {
    const client = await this.client.get();

    const vectorSearchOptions: VectorSearchOptions<object> = {
      queries: [
        {
          kind: 'text',
          text: request.text,
          kNearestNeighborsCount: request.top,
          fields: [request.vectorField],
        },
      ],
    };

    const base = {
      top: request.top,
      select: [...SEARCH_SELECT_FIELDS],
      vectorSearchOptions,
    };

    const response = request.semanticConfiguration
      ? await client.search(request.text, {
          ...base,
          queryType: 'semantic',
          semanticSearchOptions: { configurationName: request.semanticConfiguration },
        })
      : await client.search(request.text, base);

    const records: SearchRecord[] = [];
    for await (const result of response.results) {
      records.push({
        document: result.document,
        score: result.score,
        rerankerScore: result.rerankerScore,
      });
    }
    return records;
  }
}
