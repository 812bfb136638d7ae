/**
 * In-process stand-ins for the search and chat-completion backends.
 */

import type {
  HybridSearchRequest,
  SearchCollaborator,
  SearchRecord,
} from '../search/types.js';
import type {
  Completion,
  CompletionRequest,
  GenerationCollaborator,
  StreamDelta,
} from '../providers/types.js';

/**
 * Returns scripted records and remembers every request.
 */
export class FakeSearchCollaborator implements SearchCollaborator {
  readonly requests: HybridSearchRequest[] = [];

  constructor(
    private readonly records: SearchRecord[] = [],
    private readonly error?: Error
  ) {}

  async hybridSearch(request: HybridSearchRequest): Promise<SearchRecord[]> {
    this.requests.push(request);
    if (this.error) {
      throw this.error;
    }
    return this.records;
  }
}

export interface FakeGenerationOptions {
  /** Fields of the non-streamed completion */
  completion?: Partial<Completion>;
  /** Streamed fragments; undefined becomes a delta without content */
  fragments?: Array<string | undefined>;
  /** Error raised by complete()/stream(), or mid-stream when failAfter is set */
  error?: Error;
  /** Number of fragments yielded before the stream fails */
  failAfter?: number;
}

export const FAKE_COMPLETION: Completion = {
  content: 'The deductible is $500 [policy.pdf#page=3].',
  model: 'gpt-4o-mini',
  finishReason: 'stop',
  usage: { promptTokens: 120, completionTokens: 12, totalTokens: 132 },
};

/**
 * Returns a scripted completion or fragment stream and remembers every
 * request. `pulled` counts the deltas the consumer actually took and
 * `closed` records whether the stream was finished or abandoned.
 */
export class FakeGenerationCollaborator implements GenerationCollaborator {
  readonly requests: CompletionRequest[] = [];
  pulled = 0;
  closed = false;

  constructor(private readonly options: FakeGenerationOptions = {}) {}

  async complete(request: CompletionRequest): Promise<Completion> {
    this.requests.push(request);
    if (this.options.error) {
      throw this.options.error;
    }
    return { ...FAKE_COMPLETION, ...this.options.completion };
  }

  async stream(request: CompletionRequest): Promise<AsyncIterable<StreamDelta>> {
    this.requests.push(request);
    if (this.options.error && this.options.failAfter === undefined) {
      throw this.options.error;
    }
    return this.deltas();
  }

  private async *deltas(): AsyncGenerator<StreamDelta> {
    const { fragments = [], failAfter, error } = this.options;
    try {
      for (const [index, fragment] of fragments.entries()) {
        if (index === failAfter) {
          throw error ?? new Error('stream interrupted');
        }
        this.pulled += 1;
        yield fragment === undefined ? {} : { content: fragment };
      }
      if (failAfter !== undefined) {
        throw error ?? new Error('stream interrupted');
      }
    } finally {
      this.closed = true;
    }
  }
}
