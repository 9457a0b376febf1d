import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { LoopProducer } from '../../infrastructure/index.js';

type ProducerState = 'running' | 'stopped' | 'disabled';

function producerState(producer: LoopProducer | null): ProducerState {
  if (producer === null) return 'disabled';
  return producer.running ? 'running' : 'stopped';
}

/**
 * Read-only status surfaces.
 *
 * GET /                - service banner with client count
 * GET /health          - clients, replay window and producer state
 * GET /api/v1/clients  - per-session snapshots
 */
async function statusRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      status: 'running',
      clients: fastify.streams.count(),
      endpoints: {
        stream: '/stream',
        health: '/health',
        clients: '/api/v1/clients',
        events: '/api/v1/events',
      },
    });
  });

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { history } = fastify.streams;

    return reply.status(200).send({
      status: 'healthy',
      connected_clients: fastify.streams.count(),
      history: {
        size: history.size(),
        capacity: history.capacity,
        latest_id: history.latestId() ?? null,
      },
      producers: {
        sample_events: producerState(fastify.producers.sample),
        heartbeat: producerState(fastify.producers.heartbeat),
      },
    });
  });

  fastify.get('/api/v1/clients', async (_request: FastifyRequest, reply: FastifyReply) => {
    const clients = fastify.streams.listSessions();
    return reply.status(200).send({ count: clients.length, clients });
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  dependencies: ['streams', 'producers'],
  fastify: '5.x',
});
