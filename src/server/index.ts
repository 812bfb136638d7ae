/**
 * HTTP server lifecycle.
 */

import type { Server } from 'node:http';
import { createRAGEngine, type RAGEngine } from '../agent/rag-engine.js';
import type { Config } from '../config/schema.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { createApp } from './app.js';

export { createApp, type AppDeps } from './app.js';
export { ChatRequestSchema, SearchQuerySchema, type ChatRequest, type SearchQuery } from './schemas.js';

export interface StartServerOptions {
  port?: number;
  logger?: Logger;
  engine?: RAGEngine;
}

export interface RunningServer {
  server: Server;
  /** The port actually bound */
  port: number;
  /** Stop accepting connections and flush telemetry */
  close(): Promise<void>;
}

export async function startServer(config: Config, options: StartServerOptions = {}): Promise<RunningServer> {
  const logger = options.logger ?? consoleLogger;
  const engine = options.engine ?? createRAGEngine(config, { logger });
  const port = options.port ?? config.server.port;
  const app = createApp({ config, engine, logger });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, () => resolve(listening));
    listening.once('error', reject);
  });

  // Port 0 asks the OS for a free one
  const address = server.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;
  logger.info(`Server running on http://localhost:${boundPort}`);

  return {
    server,
    port: boundPort,
    async close(): Promise<void> {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await engine.shutdown();
    },
  };
}
