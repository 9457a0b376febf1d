import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { StreamManager } from '../../application/index.js';

export interface StreamPluginOptions {
  queueSize: number;
  historySize: number;
  maxSessions: number;
  log: Logger;
}

/**
 * Fastify plugin that owns the fan-out engine.
 *
 * - Decorates `fastify.streams` for routes and producers.
 * - On shutdown, removes every session before the server stops accepting,
 *   so open SSE responses end instead of holding `close()` open.
 */
async function streamPlugin(fastify: FastifyInstance, opts: StreamPluginOptions): Promise<void> {
  const manager = new StreamManager({
    queueSize: opts.queueSize,
    historySize: opts.historySize,
    maxSessions: opts.maxSessions,
    log: opts.log,
  });

  fastify.decorate('streams', manager);

  fastify.addHook('preClose', async () => {
    const open = manager.count();
    manager.close();
    fastify.log.info({ closedSessions: open }, 'Stream sessions closed');
  });
}

export default fp(streamPlugin, {
  name: 'streams',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.streams` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    streams: StreamManager;
  }
}
