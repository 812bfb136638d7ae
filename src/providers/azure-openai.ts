/**
 * Azure OpenAI Chat Collaborator
 *
 * Wraps the `openai` package's AzureOpenAI client, authenticated with an
 * Entra ID bearer token from the shared credential. The client is created
 * on first use.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import type { TokenCredential } from '@azure/identity';

import { ConfigurationError } from '../errors/index.js';
import { SETUP_INSTRUCTIONS } from '../config/env.js';
import { Lazy } from '../utils/lazy.js';
import type { Logger } from '../utils/logger.js';
import { createTokenProvider, getSharedCredential } from './credential.js';
import type {
  ChatMessage,
  Completion,
  CompletionRequest,
  GenerationCollaborator,
  StreamDelta,
} from './types.js';

type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type CompletionChunk = OpenAI.Chat.ChatCompletionChunk;

export interface AzureOpenAIOptions {
  /** Resource endpoint, e.g. https://my-resource.openai.azure.com */
  endpoint: string;
  apiVersion: string;
  /** Defaults to the process-wide DefaultAzureCredential */
  credential?: () => Promise<TokenCredential>;
  logger?: Logger;
}

function toMessageParam(message: ChatMessage): MessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

async function* toDeltas(chunks: AsyncIterable<CompletionChunk>): AsyncGenerator<StreamDelta> {
  for await (const chunk of chunks) {
    const content = chunk.choices[0]?.delta?.content;
    yield content ? { content } : {};
  }
}

export class AzureOpenAICollaborator implements GenerationCollaborator {
  private readonly client: Lazy<AzureOpenAI>;

  constructor(options: AzureOpenAIOptions) {
    const getCredential = options.credential ?? getSharedCredential;

    this.client = new Lazy(async () => {
      if (!options.endpoint) {
        throw new ConfigurationError(
          'Azure OpenAI endpoint is not configured',
          SETUP_INSTRUCTIONS.openai
        );
      }
      const credential = await getCredential();
      options.logger?.debug?.(`Connecting to Azure OpenAI at ${options.endpoint}`);
      return new AzureOpenAI({
        endpoint: options.endpoint,
        apiVersion: options.apiVersion,
        azureADTokenProvider: createTokenProvider(credential),
      });
    });
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const client = await this.client.get();
    const response = await client.chat.completions.create({
      model: request.deployment,
      messages: request.messages.map(toMessageParam),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });

    const choice = response.choices[0];
    return {
      content: choice?.message.content ?? '',
      model: response.model,
      finishReason: choice?.finish_reason ?? 'unknown',
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }

  async stream(request: CompletionRequest): Promise<AsyncIterable<StreamDelta>> {
    const client = await this.client.get();
    const chunks = await client.chat.completions.create({
      model: request.deployment,
      messages: request.messages.map(toMessageParam),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      stream: true,
    });
    return toDeltas(chunks);
  }
}
