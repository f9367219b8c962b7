import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { PullEventStore } from '../../domain/index.js';

export interface StorePluginOptions {
  store: PullEventStore;
}

/**
 * Fastify plugin that owns the pull event store's lifecycle.
 *
 * Decorates `fastify.store` for use by routes.
 * Closes the store on server shutdown.
 */
async function storePlugin(fastify: FastifyInstance, opts: StorePluginOptions): Promise<void> {
  fastify.decorate('store', opts.store);

  fastify.addHook('onClose', async () => {
    await opts.store.close();
    fastify.log.info('Store closed');
  });
}

export default fp(storePlugin, {
  name: 'store',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.store` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    store: PullEventStore;
  }
}
