/**
 * Generation Collaborator Types
 *
 * Normalized request/response shapes for a chat-completion backend.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  /** Deployment (model) name */
  deployment: string;
  messages: readonly ChatMessage[];
  maxTokens: number;
  temperature: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** A finished, non-streamed completion */
export interface Completion {
  content: string;
  /** Model reported by the backend */
  model: string;
  finishReason: string;
  usage: TokenUsage;
}

/** One streamed chunk; `content` is absent for role-only or empty chunks */
export interface StreamDelta {
  content?: string;
}

/**
 * Chat-completion backend used by the RAG engine.
 */
export interface GenerationCollaborator {
  complete(request: CompletionRequest): Promise<Completion>;
  /**
   * Resolves once the backend accepted the request; the iterable then
   * yields deltas in arrival order.
   */
  stream(request: CompletionRequest): Promise<AsyncIterable<StreamDelta>>;
}
