import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventInputSchema, eventBatchSchema, toStreamEvent } from '../../application/index.js';

/**
 * In-process producer path.
 *
 * POST /api/v1/events        - broadcast a single event
 * POST /api/v1/events/batch  - broadcast several, in array order
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Validates → assigns id if missing → broadcasts → 202.
   */
  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventInputSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = toStreamEvent(parsed.data);
      const result = fastify.streams.broadcast(event);

      return reply.status(202).send({
        status: 'accepted',
        id: event.id,
        delivered: result.delivered,
      });
    },
  );

  /**
   * The whole batch is validated up-front; one invalid entry rejects all
   * of it, so nothing is broadcast partially.
   */
  fastify.post(
    '/api/v1/events/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const events = parsed.data.map((input) => toStreamEvent(input));
      for (const event of events) {
        fastify.streams.broadcast(event);
      }

      return reply.status(202).send({
        status: 'accepted',
        count: events.length,
        ids: events.map((e) => e.id),
      });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['streams'],
  fastify: '5.x',
});
