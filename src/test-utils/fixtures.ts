/**
 * Test fixtures: configuration and documents.
 */

import type { Config } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { RetrievedDocument, SearchRecord } from '../search/types.js';

export const TEST_SEARCH_ENDPOINT = 'https://search.example.net';
export const TEST_OPENAI_ENDPOINT = 'https://openai.example.com';

type ConfigOverrides = { [K in keyof Config]?: Partial<Config[K]> };

/**
 * A fully configured Config (both endpoints set, telemetry off) with
 * per-section overrides.
 */
export function createTestConfig(overrides: ConfigOverrides = {}): Config {
  return {
    openai: { ...DEFAULT_CONFIG.openai, endpoint: TEST_OPENAI_ENDPOINT, ...overrides.openai },
    search: { ...DEFAULT_CONFIG.search, endpoint: TEST_SEARCH_ENDPOINT, ...overrides.search },
    generation: { ...DEFAULT_CONFIG.generation, ...overrides.generation },
    observability: { ...DEFAULT_CONFIG.observability, enabled: false, ...overrides.observability },
    server: { ...DEFAULT_CONFIG.server, ...overrides.server },
  };
}

/**
 * A frozen RetrievedDocument with sensible defaults.
 */
export function createDocument(overrides: Partial<RetrievedDocument> = {}): RetrievedDocument {
  return Object.freeze({
    content: 'The deductible is $500.',
    title: 'Policy',
    source: 'policy.pdf',
    pageNumber: 3,
    relevanceScore: 0.82,
    rerankScore: 2.5,
    ...overrides,
  });
}

/**
 * A raw search backend record with index field names.
 */
export function createRecord(
  fields: { content?: string; title?: string; source?: string; page_number?: number } = {},
  score = 0.82,
  rerankerScore?: number
): SearchRecord {
  return {
    document: {
      content: 'The deductible is $500.',
      title: 'Policy',
      source: 'policy.pdf',
      page_number: 3,
      ...fields,
    },
    score,
    rerankerScore,
  };
}
