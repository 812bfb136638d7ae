/**
 * Shared Azure credential.
 *
 * One DefaultAzureCredential per process, created on first use and shared
 * by the search and chat-completion clients.
 */

import { DefaultAzureCredential, getBearerTokenProvider, type TokenCredential } from '@azure/identity';
import { Lazy } from '../utils/lazy.js';

/** Entra ID scope for Azure OpenAI */
export const COGNITIVE_SERVICES_SCOPE = 'https://cognitiveservices.azure.com/.default';

const sharedCredential = new Lazy<TokenCredential>(async () => new DefaultAzureCredential());

export function getSharedCredential(): Promise<TokenCredential> {
  return sharedCredential.get();
}

/**
 * Bearer token provider for Azure OpenAI built on the given credential.
 */
export function createTokenProvider(credential: TokenCredential): () => Promise<string> {
  return getBearerTokenProvider(credential, COGNITIVE_SERVICES_SCOPE);
}

/** Drop the cached credential (for testing) */
export function _resetSharedCredential(): void {
  sharedCredential.reset();
}
