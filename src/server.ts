// src/server.ts
import Fastify, { type FastifyInstance, type FastifyError } from 'fastify';
import cors from '@fastify/cors';

import { config } from './config';

// Observability
import {
  createLogger,
  registerObservability,
  requestIdGenerator,
  getRequestLogger,
} from './observability';

// Rate limiting middleware
import { registerRateLimit } from './middleware/rateLimit';

// Routes
import healthRoutes from './routes/health';
import metricsRoutes from './routes/metrics';
import { patchRoutes } from './routes/patch';
import { consistencyRoutes } from './routes/consistency';
import { knowledgeBaseRoutes } from './routes/knowledgeBase';

const log = createLogger('server');

/**
 * Assemble the app without listening; tests drive it through app.inject().
 */
export async function buildServer(): Promise<FastifyInstance> {
  // Request logging comes from registerObservability(); Fastify's own logger stays off
  const app = Fastify({
    logger: false,
    genReqId: requestIdGenerator,
    bodyLimit: config.server.bodyLimitBytes,
  });

  registerObservability(app);

  await app.register(cors, { origin: config.cors.origins });

  // Must be before route registration
  await registerRateLimit(app);

  app.setErrorHandler((err: FastifyError, req, reply) => {
    const status = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    if (status >= 500) {
      getRequestLogger(req).error({ err }, 'unhandled route error');
      return reply.code(status).send({ error: 'internal_error', message: 'Internal server error' });
    }
    return reply.code(status).send({ error: err.code ?? 'bad_request', message: err.message });
  });

  await app.register(healthRoutes);
  await app.register(metricsRoutes);
  await app.register(patchRoutes);
  await app.register(consistencyRoutes);
  await app.register(knowledgeBaseRoutes);

  return app;
}

// --- Main ---
async function main() {
  const app = await buildServer();

  log.info({
    cwd: process.cwd(),
    node: process.version,
    aiProvider: config.ai.provider,
    searchUrl: config.retrieval.searchUrl,
    processUrl: config.retrieval.processUrl,
  }, 'boot');

  const shutdown = (signal: string) => {
    log.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  await app.listen({ port: config.server.port, host: config.server.host });
  log.info({ port: config.server.port }, 'API listening');
}

if (require.main === module) {
  main().catch((err) => {
    log.fatal({ err }, 'Server startup failed');
    process.exit(1);
  });
}
