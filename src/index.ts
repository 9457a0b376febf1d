import { pino } from 'pino';
import { buildServer } from './app.js';
import { loadStreamConfig, startEventSubscriber } from './infrastructure/index.js';

/**
 * Bootstrap the streaming server.
 *
 * Order:
 * 1) Config + logger
 * 2) Fastify instance (engine, producers, routes)
 * 3) Register shutdown hooks
 * 4) listen()
 * 5) Redis ingest (optional)
 */
async function main(): Promise<void> {
  const config = loadStreamConfig();
  const log = pino({ level: config.server.log_level });

  const fastify = await buildServer({ config, log });

  log.info(
    { stream: config.stream, producers: config.producers, ingest: { enabled: config.ingest.redis_enabled } },
    'Stream config loaded',
  );

  let cleanupSubscriber:
    null | (() => Promise<void>) = null;

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    if (cleanupSubscriber) {
      await cleanupSubscriber();
    }
  });

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  // --------------------------------------------------
  // Redis ingest (after listen)
  // --------------------------------------------------

  if (config.ingest.redis_enabled) {
    cleanupSubscriber = await startEventSubscriber(
      config.ingest.redis_url,
      config.ingest.redis_channel,
      log,
      (event) => {
        fastify.streams.broadcast(event);
      },
    );
  }

  // Graceful shutdown on SIGINT / SIGTERM
  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
