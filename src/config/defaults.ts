/**
 * Default Configuration Values
 *
 * The loader merges ragchat.toml and then environment variables
 * ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  // Endpoints have no sensible default; they come from the file or env
  openai: {
    endpoint: '',
    chat_deployment: 'gpt-4o-mini',
    api_version: '2024-10-21',
  },

  search: {
    endpoint: '',
    index_name: 'documents',
    top_k: 5,
    use_semantic_ranker: true,
    semantic_configuration_name: 'default-semantic',
    vector_field_name: 'embedding',
  },

  generation: {
    max_tokens: 2048,
    temperature: 0.7,
  },

  // Tracing is on, but stays local-only (noop) until Langfuse keys exist
  observability: {
    enabled: true,
    sample_rate: 1.0,
    langfuse_host: 'https://cloud.langfuse.com',
    service_name: 'rag-chat',
  },

  server: {
    port: 8000,
    cors_origin: '*',
  },
};

/**
 * Config file template (TOML format)
 * Written by: ragchat config init
 */
export const CONFIG_TEMPLATE = `# rag-chat configuration
# Environment variables (and a .env file) override every value below.

[openai]
# endpoint = "https://<resource>.openai.azure.com"   # or AZURE_OPENAI_ENDPOINT
chat_deployment = "${DEFAULT_CONFIG.openai.chat_deployment}"
api_version = "${DEFAULT_CONFIG.openai.api_version}"

[search]
# endpoint = "https://<service>.search.windows.net"  # or AZURE_AI_SEARCH_ENDPOINT
index_name = "${DEFAULT_CONFIG.search.index_name}"
top_k = ${DEFAULT_CONFIG.search.top_k}
use_semantic_ranker = ${DEFAULT_CONFIG.search.use_semantic_ranker}
semantic_configuration_name = "${DEFAULT_CONFIG.search.semantic_configuration_name}"
vector_field_name = "${DEFAULT_CONFIG.search.vector_field_name}"

[generation]
max_tokens = ${DEFAULT_CONFIG.generation.max_tokens}
temperature = ${DEFAULT_CONFIG.generation.temperature}

# Langfuse tracing is opt-in: no keys means no remote traces
[observability]
enabled = ${DEFAULT_CONFIG.observability.enabled}
sample_rate = ${DEFAULT_CONFIG.observability.sample_rate}
langfuse_host = "${DEFAULT_CONFIG.observability.langfuse_host}"
service_name = "${DEFAULT_CONFIG.observability.service_name}"
# langfuse_public_key = "pk-lf-..."  # or set LANGFUSE_PUBLIC_KEY env var
# langfuse_secret_key = "sk-lf-..."  # or set LANGFUSE_SECRET_KEY env var

[server]
port = ${DEFAULT_CONFIG.server.port}
cors_origin = "${DEFAULT_CONFIG.server.cors_origin}"
`;
