import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { HeartbeatProducer, SampleEventProducer } from '../../infrastructure/index.js';

export interface ProducersPluginOptions {
  sampleEvents: boolean;
  /** 0 disables the heartbeat. */
  heartbeatIntervalMs: number;
  log: Logger;
}

export interface ProducerSet {
  sample: SampleEventProducer | null;
  heartbeat: HeartbeatProducer | null;
}

/**
 * Starts the built-in producers once the server is ready and stops them
 * on close. Disabled producers are decorated as `null`.
 */
async function producersPlugin(fastify: FastifyInstance, opts: ProducersPluginOptions): Promise<void> {
  const producers: ProducerSet = {
    sample: opts.sampleEvents ? new SampleEventProducer(fastify.streams, opts.log) : null,
    heartbeat: opts.heartbeatIntervalMs > 0
      ? new HeartbeatProducer(fastify.streams, opts.log, { intervalMs: opts.heartbeatIntervalMs })
      : null,
  };

  fastify.decorate('producers', producers);

  fastify.addHook('onReady', async () => {
    producers.sample?.start();
    producers.heartbeat?.start();
  });

  fastify.addHook('preClose', async () => {
    await Promise.all([producers.sample?.stop(), producers.heartbeat?.stop()]);
  });
}

export default fp(producersPlugin, {
  name: 'producers',
  dependencies: ['streams'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    producers: ProducerSet;
  }
}
