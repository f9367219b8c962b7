import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * Health check: round-trips to the store.
 *
 * GET /health → 200 {"status":"ok"} | 503 {"status":"unavailable"}
 *
 * Never propagates a store failure: anything other than a `true`
 * health check is answered with 503.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/health',
    async (request: FastifyRequest, reply: FastifyReply) => {
      let healthy = false;
      try {
        healthy = await fastify.store.healthCheck();
      } catch (err: unknown) {
        request.log.error({ err }, 'Store health check threw');
      }

      if (!healthy) {
        return reply.status(503).send({ status: 'unavailable' });
      }
      return reply.status(200).send({ status: 'ok' });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
