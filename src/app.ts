import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { StreamConfig } from './infrastructure/index.js';
import {
  streamPlugin,
  producersPlugin,
  streamRoutes,
  statusRoutes,
  eventRoutes,
} from './interfaces/http/index.js';

export interface BuildServerOptions {
  config: StreamConfig;
  log: Logger;
}

/**
 * Assembles the Fastify instance without listening.
 *
 * Order:
 * 1) Fan-out engine
 * 2) Producers (started on ready)
 * 3) HTTP routes
 */
export async function buildServer({ config, log }: BuildServerOptions): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = log;
  const fastify = Fastify({ loggerInstance });

  // --------------------------------------------------
  // Core
  // --------------------------------------------------

  await fastify.register(streamPlugin, {
    queueSize: config.stream.queue_size,
    historySize: config.stream.history_size,
    maxSessions: config.stream.max_clients,
    log,
  });

  await fastify.register(producersPlugin, {
    sampleEvents: config.producers.sample_events,
    heartbeatIntervalMs: config.producers.heartbeat_interval_seconds * 1000,
    log,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(streamRoutes, { pollIntervalMs: config.stream.poll_interval_ms });
  await fastify.register(statusRoutes);
  await fastify.register(eventRoutes);

  return fastify;
}
