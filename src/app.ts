import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import { registerEventRoutes, type EventStore } from './modules/events/index.js';
import { registerEngineRoutes, type EngineHost } from './modules/engine/index.js';

export interface AppDeps<Q, P> {
  eventStore: EventStore;
  host: EngineHost<Q, P>;
  logLevel?: string;
}

/**
 * Build Fastify Application
 */
export function buildApp<Q, P>(deps: AppDeps<Q, P>): FastifyInstance {
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? env.LOG_LEVEL,
    },
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors (malformed JSON bodies included)
    if (err.validation || err.statusCode === 400) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerEventRoutes(fastify, { store: deps.eventStore });
    await registerEngineRoutes(fastify, { host: deps.host });
  });

  return app;
}
