/**
 * Express application for the HTTP API.
 *
 * Routes:
 *   GET  /              service description
 *   GET  /health        liveness and configured model
 *   POST /chat          complete answer (RAG or direct)
 *   POST /chat/stream   SSE answer fragments
 *   GET  /search        retrieval only
 */

import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import type { RAGEngine } from '../agent/rag-engine.js';
import type { Config } from '../config/schema.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { ChatController } from './controllers/chat.js';
import { HealthController } from './controllers/health.js';
import { SearchController } from './controllers/search.js';
import type { Controller } from './controllers/types.js';
import { createErrorHandler } from './middleware/error-handler.js';

export interface AppDeps {
  config: Config;
  engine: RAGEngine;
  logger?: Logger;
}

export function createApp(deps: AppDeps): express.Application {
  const { config, engine } = deps;
  const logger = deps.logger ?? consoleLogger;
  const app = express();

  app.use(helmet());
  app.use(express.json());
  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      limit: 100, // per IP per window
      standardHeaders: true,
      legacyHeaders: false,
    })
  );
  app.use(
    cors({
      origin: config.server.cors_origin,
      methods: ['GET', 'POST', 'OPTIONS'],
    })
  );

  const controllers: Controller[] = [
    new HealthController(config),
    new ChatController(engine, config, logger),
    new SearchController(engine),
  ];
  for (const controller of controllers) {
    app.use('/', controller.router);
  }

  app.use(createErrorHandler(logger));
  return app;
}
