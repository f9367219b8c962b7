import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ingest } from '../../application/recorder.js';
import { listPullEvents, getPullEvent } from '../../application/query-events.js';
import { isPullOutcome } from '../../domain/index.js';
import type { PullOutcome } from '../../domain/index.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values and `NaN` for anything that is
 * not a safe integer (`1e20` would overflow the OFFSET bigint).
 */
function safeInt(value: string | string[] | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return NaN;
  const n = Number(value);
  if (value.trim() === '' || !Number.isSafeInteger(n)) return NaN;
  return n;
}

/**
 * Pull event routes.
 *
 * POST /events             — ingest one pull report
 * GET  /events             — paginated event list with filters
 * GET  /events/:event_id   — single event by ID
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Ingestion.
   *
   * Validates → records (awaited, so storage failures reach the caller)
   * → returns 202 with the assigned event_id.
   */
  fastify.post(
    '/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const result = await ingest(fastify.store, request.body);

      if (!result.ok) {
        request.log.debug({ field: result.error.field, reason: result.error.message }, 'Pull report rejected');
        return reply.status(400).send({ error: result.error.field });
      }

      request.log.debug(
        { event_id: result.event.event_id, image: result.event.image, outcome: result.event.outcome },
        'Pull event recorded',
      );

      return reply.status(202).send({
        status: 'accepted',
        event_id: result.event.event_id,
      });
    },
  );

  /**
   * GET /events
   *
   * Query params: limit, offset, image, outcome
   */
  fastify.get(
    '/events',
    async (
      request: FastifyRequest<{
        Querystring: {
          limit?: string | string[];
          offset?: string | string[];
          image?: string | string[];
          outcome?: string | string[];
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset' });
      }
      if (Array.isArray(q.image)) {
        return reply.status(400).send({ error: 'image' });
      }

      let outcome: PullOutcome | undefined;
      if (q.outcome !== undefined) {
        if (Array.isArray(q.outcome) || !isPullOutcome(q.outcome)) {
          return reply.status(400).send({ error: 'outcome' });
        }
        outcome = q.outcome;
      }

      const result = await listPullEvents(fastify.store, {
        limit,
        offset,
        image: q.image,
        outcome,
      });

      return reply.status(200).send(result);
    },
  );

  /**
   * GET /events/:event_id
   */
  fastify.get(
    '/events/:event_id',
    async (
      request: FastifyRequest<{ Params: { event_id: string } }>,
      reply: FastifyReply,
    ) => {
      const { event_id } = request.params;
      if (!UUID_RE.test(event_id)) {
        return reply.status(400).send({ error: 'event_id' });
      }

      const event = await getPullEvent(fastify.store, event_id);
      if (event === null) {
        return reply.status(404).send({ error: 'not found' });
      }

      return reply.status(200).send(event);
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
