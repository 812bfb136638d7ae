/**
 * Request schemas for the HTTP API.
 */

import { z } from 'zod';
import { ConversationTurnSchema } from '../agent/types.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

export const MAX_TOKENS_LIMIT = 4096;
export const TOP_K_LIMIT = 20;

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  conversationHistory: z.array(ConversationTurnSchema).default([]),
  /** Only used when useRag is false; empty means the default assistant prompt */
  systemPrompt: z.string().default(''),
  maxTokens: z.number().int().min(1).max(MAX_TOKENS_LIMIT).default(DEFAULT_CONFIG.generation.max_tokens),
  temperature: z.number().min(0).max(2).default(DEFAULT_CONFIG.generation.temperature),
  useRag: z.boolean().default(true),
  topK: z.number().int().min(1).max(TOP_K_LIMIT).default(DEFAULT_CONFIG.search.top_k),
  sessionId: z.string().optional(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export const SearchQuerySchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  top_k: z.coerce.number().int().min(1).max(TOP_K_LIMIT).default(DEFAULT_CONFIG.search.top_k),
});

export type SearchQuery = z.infer<typeof SearchQuerySchema>;
