import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { StreamEvent } from '../../domain/index.js';
import { eventInputSchema, toStreamEvent } from '../../application/event-schema.js';

export type IngestHandler = (event: StreamEvent) => void;

/**
 * Parses one Pub/Sub message and hands the resulting event to `handler`.
 *
 * Malformed JSON and schema failures are logged and skipped. A throwing
 * handler is logged too, so one bad message never tears down the
 * subscription. Returns whether the message was forwarded.
 *
 * Exported for unit testing; callers should use `startEventSubscriber()`.
 */
export function handleIngestMessage(
  message: string,
  log: Logger,
  handler: IngestHandler,
): boolean {
  let body: unknown;
  try {
    body = JSON.parse(message);
  } catch (err: unknown) {
    log.warn({ err, message }, 'Failed to parse ingest message, skipping');
    return false;
  }

  const parsed = eventInputSchema.safeParse(body);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues }, 'Malformed ingest event, skipping');
    return false;
  }

  const event = toStreamEvent(parsed.data);
  try {
    handler(event);
  } catch (err: unknown) {
    log.error({ err, eventId: event.id }, 'Ingest handler failed');
    return false;
  }

  log.debug({ eventId: event.id, category: event.category }, 'Ingest event received');
  return true;
}

/**
 * Subscribes to a Redis Pub/Sub channel and feeds every valid message
 * into `handler` (normally `StreamManager.broadcast`).
 *
 * ioredis requires a dedicated connection for subscriber mode.
 * Returns a cleanup function for graceful shutdown.
 */
export async function startEventSubscriber(
  redisUrl: string,
  channel: string,
  log: Logger,
  handler: IngestHandler,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();
  log.info('Ingest subscriber Redis connection established');

  sub.on('message', (received: string, message: string) => {
    if (received !== channel) return;
    handleIngestMessage(message, log, handler);
  });

  await sub.subscribe(channel);
  log.info({ channel }, 'Subscribed to ingest channel');

  return async () => {
    await sub.unsubscribe(channel).catch((err: unknown) => {
      log.warn({ err, channel }, 'Ingest unsubscribe failed');
    });
    await sub.quit().catch((err: unknown) => {
      log.warn({ err }, 'Ingest subscriber quit failed');
    });
    log.info('Ingest subscriber disconnected');
  };
}
