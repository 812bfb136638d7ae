/**
 * Tracer Factory
 *
 * Creates the appropriate Tracer based on configuration.
 *
 * Decision tree:
 *   1. observability.enabled === false  → NoopTracer
 *   2. Either Langfuse key missing      → NoopTracer (local-only mode)
 *   3. Both keys present                → LangfuseTracer (OTel + Langfuse)
 *
 * LANGFUSE_* environment variables are already folded into the config by
 * the loader, so only the config is read here. The result is always wrapped
 * by the safe tracer.
 */

import type { Config } from '../config/schema.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import type { Tracer } from './types.js';
import { createNoopTracer } from './noop-tracer.js';
import { createLangfuseTracer } from './langfuse-tracer.js';
import { createSafeTracer } from './safe-tracer.js';

/**
 * Create a tracer based on the application configuration.
 *
 * @param config - Full application config (reads the observability section)
 * @param logger - Receives debug output when a telemetry call fails
 */
export function createTracer(config: Config, logger: Logger = consoleLogger): Tracer {
  const obsConfig = config.observability;

  if (!obsConfig.enabled) {
    return createSafeTracer(createNoopTracer(), logger);
  }

  const publicKey = obsConfig.langfuse_public_key;
  const secretKey = obsConfig.langfuse_secret_key;

  if (!publicKey || !secretKey) {
    logger.debug?.('Langfuse keys not configured; tracing disabled');
    return createSafeTracer(createNoopTracer(), logger);
  }

  return createSafeTracer(
    createLangfuseTracer({
      publicKey,
      secretKey,
      baseUrl: obsConfig.langfuse_host,
      serviceName: obsConfig.service_name,
    }),
    logger
  );
}
