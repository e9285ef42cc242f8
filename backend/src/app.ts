import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppError } from './common/errors.js';
import type { AppConfig } from './config/env.js';
import { signalRoutes, type RefreshCoordinator, type SignalCache } from './modules/signal/index.js';

export type BuildAppOptions = {
  server: Pick<AppConfig['server'], 'nodeEnv' | 'logLevel' | 'corsOrigins'>;
  cache: SignalCache;
  coordinator: RefreshCoordinator;
  /** false disables the request logger (tests) */
  logger?: boolean;
  now?: () => number;
};

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions): FastifyInstance {
  const { server } = options;

  const app = Fastify({
    logger: options.logger === false ? false : { level: server.logLevel },
    trustProxy: true,
  });

  // CORS
  void app.register(cors, {
    origin: server.corsOrigins,
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.warn({ code: err.code }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
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
      message: server.nodeEnv === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  void app.register(signalRoutes, {
    prefix: '/api',
    cache: options.cache,
    coordinator: options.coordinator,
    now: options.now,
  });

  return app;
}
