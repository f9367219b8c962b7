import Fastify, { type FastifyError, type FastifyServerOptions } from 'fastify';
import {
  ReadError,
  StoreNotInitializedError,
  WriteError,
} from './domain/index.js';
import type { PullEventStore } from './domain/index.js';
import { storePlugin } from './infrastructure/index.js';
import { healthRoutes, metricsRoutes, eventRoutes } from './interfaces/http/index.js';

export interface BuildAppOptions extends FastifyServerOptions {
  /** Store shared by every route; closed when the app closes. */
  store: PullEventStore;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 *
 * Order:
 * 1) Store plugin
 * 2) Error + not-found handlers
 * 3) HTTP routes
 */
export async function buildApp(opts: BuildAppOptions) {
  const { store, ...fastifyOpts } = opts;

  const app = Fastify({
    bodyLimit: 4096,
    // `/metrics/` answers like `/metrics`
    ignoreTrailingSlash: true,
    ...fastifyOpts,
  });

  await app.register(storePlugin, { store });

  // --------------------------------------------------
  // Error mapping
  // --------------------------------------------------

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof StoreNotInitializedError) {
      request.log.warn('Request rejected: store not initialized');
      return reply.status(503).send({ error: 'store not initialized' });
    }

    if (error instanceof WriteError || error instanceof ReadError) {
      request.log.error({ err: error }, 'Storage failure');
      return reply.status(500).send({ error: 'storage unavailable' });
    }

    // Body parser errors: malformed or empty JSON, unsupported media type,
    // payload over bodyLimit.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.debug({ err: error }, 'Malformed request body');
      return reply.status(400).send({ error: 'body' });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ error: 'internal error' });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ error: 'not found' });
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await app.register(healthRoutes);
  await app.register(metricsRoutes);
  await app.register(eventRoutes);

  return app;
}
