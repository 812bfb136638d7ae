/**
 * Chat routes.
 *
 * `POST /chat` answers in one JSON response; `POST /chat/stream` sends one
 * SSE `data:` frame per fragment followed by `data: [DONE]`. With
 * `useRag: false` both skip retrieval and send the conversation to the
 * deployment under a plain assistant prompt.
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { RAGEngine } from '../../agent/rag-engine.js';
import { buildDirectMessages } from '../../agent/prompt.js';
import { toSourceJSON } from '../../agent/citations.js';
import type { PromptMessage } from '../../agent/types.js';
import type { Config } from '../../config/schema.js';
import { errorMessage } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { validateRequest } from '../middleware/validate-request.js';
import { ChatRequestSchema, type ChatRequest } from '../schemas.js';
import type { Controller } from './types.js';

export const STREAM_DONE = '[DONE]';
export const STREAM_ERROR_MESSAGE = 'Failed generating response';

/**
 * Writes SSE frames. Headers go out with the first frame, so a failure
 * before any output can still become a regular JSON error.
 */
class EventStream {
  private closed = false;

  constructor(private readonly res: Response) {
    res.on('close', () => {
      this.closed = true;
    });
  }

  get started(): boolean {
    return this.res.headersSent;
  }

  /** The client went away before the stream finished */
  get abandoned(): boolean {
    return this.closed && !this.res.writableEnded;
  }

  send(data: string, event?: string): void {
    if (this.res.writableEnded) return;
    if (!this.res.headersSent) {
      this.res.status(200);
      this.res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
      this.res.setHeader('Cache-Control', 'no-cache, no-transform');
      this.res.setHeader('Connection', 'keep-alive');
      this.res.setHeader('X-Accel-Buffering', 'no');
    }
    if (event) {
      this.res.write(`event: ${event}\n`);
    }
    this.res.write(`data: ${data}\n\n`);
  }

  end(): void {
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }
}

export class ChatController implements Controller {
  public readonly router = Router();

  constructor(
    private readonly engine: RAGEngine,
    private readonly config: Config,
    private readonly logger: Logger
  ) {
    this.router.post('/chat', validateRequest(ChatRequestSchema), this.chat.bind(this));
    this.router.post('/chat/stream', validateRequest(ChatRequestSchema), this.stream.bind(this));
  }

  async chat(req: Request, res: Response, next: NextFunction): Promise<void> {
    const body: ChatRequest = req.body;
    try {
      if (body.useRag) {
        const result = await this.engine.chat(body.message, body.conversationHistory, {
          topK: body.topK,
          sessionId: body.sessionId,
        });
        res.json({
          response: result.answer,
          model: this.config.openai.chat_deployment,
          usage: result.usage ?? {},
          sources: result.documents.map(toSourceJSON),
        });
        return;
      }

      const completion = await this.engine.generate(this.directMessages(body), {
        maxTokens: body.maxTokens,
        temperature: body.temperature,
      });
      res.json({
        response: completion.content,
        model: completion.model,
        usage: completion.usage,
        sources: [],
      });
    } catch (error) {
      next(error);
    }
  }

  async stream(req: Request, res: Response, next: NextFunction): Promise<void> {
    const body: ChatRequest = req.body;
    const events = new EventStream(res);

    try {
      for await (const fragment of this.fragments(body)) {
        if (events.abandoned) break;
        events.send(fragment);
      }
      if (!events.abandoned) {
        events.send(STREAM_DONE);
      }
      events.end();
    } catch (error) {
      if (!events.started) {
        next(error);
        return;
      }
      this.logger.error(`Chat stream failed: ${errorMessage(error)}`);
      events.send(JSON.stringify({ message: STREAM_ERROR_MESSAGE }), 'error');
      events.end();
    }
  }

  private async *fragments(body: ChatRequest): AsyncGenerator<string, void, undefined> {
    if (body.useRag) {
      const events = this.engine.chatStream(body.message, body.conversationHistory, {
        topK: body.topK,
        sessionId: body.sessionId,
      });
      for await (const event of events) {
        if (event.type === 'fragment') {
          yield event.text;
        }
      }
      return;
    }

    const deltas = await this.engine.generate(this.directMessages(body), {
      stream: true,
      maxTokens: body.maxTokens,
      temperature: body.temperature,
    });
    for await (const delta of deltas) {
      if (delta.content) {
        yield delta.content;
      }
    }
  }

  private directMessages(body: ChatRequest): PromptMessage[] {
    return buildDirectMessages(body.message, body.conversationHistory, body.systemPrompt);
  }
}
