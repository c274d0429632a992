import Fastify, { type FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import type { AppConfig } from './lib/config.js';
import { BatchError, errorMessage } from './lib/errors.js';
import batchRoutes from './routes/batches.js';

export function buildApp(config: AppConfig): FastifyInstance {
  const app = Fastify({ logger: { level: config.logLevel } });

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'invalid_request', issues: error.issues });
    }
    if (error instanceof BatchError) {
      const status = error.kind === 'missing_source_directory' ? 404 : 422;
      return reply.code(status).send({ error: error.kind, message: error.message });
    }
    req.log.error(error);
    return reply.code(error.statusCode ?? 500).send({ error: 'internal_error', message: errorMessage(error) });
  });

  app.get('/health', async () => ({ ok: true }));

  app.register(batchRoutes, { config });
  return app;
}
