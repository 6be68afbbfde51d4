import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import { rootLogger } from './common/logger.js';
import { registerServingRoutes } from './modules/serving/index.js';
import type { InitializedState } from './modules/serving/index.js';

export interface BuildAppOptions {
  /** Result of ModelServer.initialize(); read-only for every handler. */
  state: InitializedState;
  logger?: FastifyBaseLogger | boolean;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions): FastifyInstance {
  const logger: FastifyBaseLogger | boolean = options.logger ?? rootLogger;
  const app = Fastify({
    logger,
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
  });

  // Global error handler
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        request.log.warn({ code: err.code }, err.message);
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation / body parsing errors
    if (err.validation || (err.statusCode !== undefined && err.statusCode < 500)) {
      return reply.status(err.statusCode ?? 400).send({
        ok: false,
        error: 'BAD_REQUEST',
        message: err.message,
      });
    }

    // Unknown errors
    request.log.error(err);
    return reply.status(500).send({
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

  app.register(async (instance) => {
    await registerServingRoutes(instance, options.state);
  });

  return app;
}
