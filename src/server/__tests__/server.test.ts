/**
 * Server Lifecycle Tests
 *
 * Listens on an OS-assigned port; no requests are made.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { startServer, type RunningServer } from '../index.js';
import { RAGEngine } from '../../agent/rag-engine.js';
import { silentLogger } from '../../utils/logger.js';
import {
  createTestConfig,
  FakeGenerationCollaborator,
  FakeSearchCollaborator,
} from '../../test-utils/index.js';

function createEngine(): RAGEngine {
  return new RAGEngine({
    config: createTestConfig(),
    search: new FakeSearchCollaborator(),
    generation: new FakeGenerationCollaborator(),
    logger: silentLogger,
  });
}

describe('startServer', () => {
  const running: RunningServer[] = [];

  afterEach(async () => {
    for (const server of running.splice(0)) {
      if (server.server.listening) {
        await server.close();
      }
    }
  });

  it('listens on a free port and reports it', async () => {
    const logger = { ...silentLogger, info: vi.fn() };
    const server = await startServer(createTestConfig(), { port: 0, logger, engine: createEngine() });
    running.push(server);

    expect(server.server.listening).toBe(true);
    expect(server.port).toBeGreaterThan(0);
    expect(logger.info).toHaveBeenCalledWith(`Server running on http://localhost:${server.port}`);
  });

  it('close() stops listening and shuts the engine down', async () => {
    const engine = createEngine();
    const shutdown = vi.spyOn(engine, 'shutdown');
    const server = await startServer(createTestConfig(), { port: 0, logger: silentLogger, engine });

    await server.close();

    expect(server.server.listening).toBe(false);
    expect(shutdown).toHaveBeenCalledTimes(1);
  });

  it('rejects when the port is taken', async () => {
    const first = await startServer(createTestConfig(), { port: 0, logger: silentLogger, engine: createEngine() });
    running.push(first);

    await expect(
      startServer(createTestConfig(), { port: first.port, logger: silentLogger, engine: createEngine() })
    ).rejects.toHaveProperty('code', 'EADDRINUSE');
  });
});
