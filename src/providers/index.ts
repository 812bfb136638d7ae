/**
 * Providers Module
 *
 * Chat-completion backend (Azure OpenAI) and the shared Azure credential.
 */

export type {
  ChatRole,
  ChatMessage,
  CompletionRequest,
  TokenUsage,
  Completion,
  StreamDelta,
  GenerationCollaborator,
} from './types.js';

export { AzureOpenAICollaborator, type AzureOpenAIOptions } from './azure-openai.js';

export {
  getSharedCredential,
  createTokenProvider,
  COGNITIVE_SERVICES_SCOPE,
  _resetSharedCredential,
} from './credential.js';
