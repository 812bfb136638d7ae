/**
 * Configuration Schema
 *
 * Defines the shape of ragchat.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/** An endpoint URL, or the empty string for "not configured" */
const EndpointSchema = z.union([z.literal(''), z.string().url()]);

/**
 * Azure OpenAI chat-completion deployment
 */
export const OpenAIConfigSchema = z.object({
  endpoint: EndpointSchema.describe('Azure OpenAI resource endpoint'),
  chat_deployment: z.string().min(1).describe('Chat-completion deployment name'),
  api_version: z.string().min(1).describe('Azure OpenAI REST API version'),
});

/**
 * Azure AI Search hybrid retrieval
 */
export const SearchConfigSchema = z.object({
  endpoint: EndpointSchema.describe('Azure AI Search service endpoint'),
  index_name: z.string().min(1).describe('Index to query'),
  top_k: z.number().int().min(1).max(50).describe('Default number of documents to retrieve'),
  use_semantic_ranker: z.boolean().describe('Re-rank results with the semantic ranker'),
  semantic_configuration_name: z
    .string()
    .min(1)
    .describe('Semantic configuration defined on the index'),
  vector_field_name: z.string().min(1).describe('Vector field used for the vectorizable-text query'),
});

/**
 * Default generation parameters
 */
export const GenerationConfigSchema = z.object({
  max_tokens: z.number().int().min(1).max(16384).describe('Maximum tokens in the answer'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
});

/**
 * Langfuse tracing
 */
export const ObservabilityConfigSchema = z.object({
  enabled: z.boolean().describe('Emit traces when Langfuse keys are present'),
  sample_rate: z.number().min(0).max(1).describe('Fraction of requests that are traced'),
  langfuse_host: z.string().url().describe('Langfuse base URL'),
  langfuse_public_key: z.string().optional().describe('Langfuse public key'),
  langfuse_secret_key: z.string().optional().describe('Langfuse secret key'),
  service_name: z.string().min(1).describe('Service name attached to every trace'),
});

/**
 * HTTP API server
 */
export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).describe('Port for ragchat serve'),
  cors_origin: z.string().min(1).describe('Allowed CORS origin'),
});

/**
 * Root configuration schema
 * This is the complete shape of ragchat.toml
 */
export const ConfigSchema = z.object({
  openai: OpenAIConfigSchema,
  search: SearchConfigSchema,
  generation: GenerationConfigSchema,
  observability: ObservabilityConfigSchema,
  server: ServerConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
