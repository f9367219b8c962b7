import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { report, discover } from '../../application/reporter.js';

/**
 * Metrics API routes, polled by Zabbix HTTP agent items.
 *
 * GET /metrics            — per-image counters, optionally one image
 * GET /metrics/discovery  — low-level discovery of tracked images
 */
async function metricsRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/metrics',
    async (
      request: FastifyRequest<{ Querystring: { image?: string | string[] } }>,
      reply: FastifyReply,
    ) => {
      const raw = request.query.image;
      if (Array.isArray(raw)) {
        return reply.status(400).send({ error: 'image' });
      }
      const image = raw?.trim();

      fastify.log.debug({ image: image ?? '*' }, 'Metrics endpoint hit');

      const payload = await report(
        fastify.store,
        image !== undefined && image !== '' ? { image } : {},
      );

      return reply.status(200).send(payload);
    },
  );

  fastify.get(
    '/metrics/discovery',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const payload = await discover(fastify.store);
      return reply.status(200).send(payload);
    },
  );
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
