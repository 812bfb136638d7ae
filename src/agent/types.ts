/**
 * Agent Module Types
 *
 * Data model of one RAG chat invocation: the caller's history, the
 * prompt sent to the model, and the result handed back.
 */

import { z } from 'zod';

import type { RetrievedDocument } from '../search/types.js';
import type { ChatMessage, TokenUsage } from '../providers/types.js';

export type { RetrievedDocument };

// ============================================================================
// CONVERSATION
// ============================================================================

/**
 * Zod schema for one prior turn of conversation.
 *
 * Used by the HTTP layer to validate `conversationHistory`.
 */
export const ConversationTurnSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

/** A prior turn supplied by the caller; never mutated */
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

/** A message of the prompt sent to the chat-completion backend */
export type PromptMessage = ChatMessage;

/**
 * Builds the system prompt from the formatted sources block.
 */
export type PromptTemplate = (params: { sources: string }) => string;

// ============================================================================
// OPTIONS
// ============================================================================

/** Per-call retrieval overrides; unset fields come from config */
export interface RetrievalOptions {
  /** Number of documents to retrieve (positive integer) */
  topK?: number;
  /** Request semantic re-ranking */
  useSemanticRanker?: boolean;
}

export interface ChatOptions extends RetrievalOptions {
  /** Groups the traces of one conversation */
  sessionId?: string;
}

/** Per-call generation overrides; unset fields come from config */
export interface GenerateOptions {
  stream?: boolean;
  maxTokens?: number;
  temperature?: number;
}

// ============================================================================
// RESULTS
// ============================================================================

/**
 * Complete outcome of one chat invocation.
 *
 * `documents` keep the search backend's rank order and each of them has
 * exactly one line in `formattedSources`, in the same order.
 */
export interface RAGResult {
  answer: string;
  documents: readonly RetrievedDocument[];
  /** The sources block injected into the system prompt */
  formattedSources: string;
  /** The resolved system message, sources included */
  systemPrompt: string;
  /** Token usage (non-streamed chat only) */
  usage?: TokenUsage;
  /** Finish reason (non-streamed chat only) */
  finishReason?: string;
}

/**
 * One item of a streamed chat: zero or more fragments, then exactly one
 * `done` carrying the complete result.
 */
export type ChatStreamEvent =
  | { type: 'fragment'; text: string }
  | { type: 'done'; result: RAGResult };
