import { once } from 'node:events';
import type { ServerResponse } from 'node:http';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  deliverSession,
  encodeComment,
  streamQuerySchema,
  toSessionMetadata,
  withSession,
} from '../../application/index.js';
import type { EventSink } from '../../application/index.js';
import { SessionLimitError } from '../../domain/index.js';

export interface StreamRoutesOptions {
  pollIntervalMs: number;
}

const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

/** Standard EventSource reconnect header; wins over the query parameter. */
function lastEventIdHeader(request: FastifyRequest): string | undefined {
  const value = request.headers['last-event-id'];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Writes to the raw response, waiting for `drain` when the socket buffer
 * is full. A slow socket therefore stalls only this session's consumer,
 * and its queue fills until broadcast disconnects it.
 */
function responseSink(res: ServerResponse, signal: AbortSignal): EventSink {
  return {
    async write(chunk: string): Promise<void> {
      // A destroyed response never emits 'drain'
      if (res.destroyed || res.writableEnded) return;
      if (res.write(chunk) || res.destroyed) return;
      try {
        await once(res, 'drain', { signal });
      } catch (err: unknown) {
        if (!signal.aborted) throw err;
      }
    },
  };
}

/**
 * Server-Sent Events endpoint.
 *
 * GET /stream?name=&tags=a,b&topics=metric,log&strict=true&last_event_id=
 *
 * The session lives exactly as long as the response: it is registered
 * before headers go out and unregistered when the client disconnects,
 * the queue overflows, or the server shuts down.
 */
async function streamRoutes(fastify: FastifyInstance, opts: StreamRoutesOptions): Promise<void> {

  fastify.get(
    '/stream',
    async (
      request: FastifyRequest<{ Querystring: Record<string, string | undefined> }>,
      reply: FastifyReply,
    ) => {
      const parsed = streamQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const resumeFrom = lastEventIdHeader(request) ?? parsed.data.last_event_id;
      const disconnect = new AbortController();

      try {
        await withSession(
          fastify.streams,
          toSessionMetadata(parsed.data),
          async (handle) => {
            reply.raw.on('close', () => disconnect.abort());
            reply.hijack();

            // The client may have gone while the request sat in the hook chain
            if (reply.raw.destroyed || request.raw.destroyed) {
              disconnect.abort();
              request.log.info({ sessionId: handle.sessionId }, 'Client gone before stream opened');
              return;
            }

            reply.raw.writeHead(200, SSE_HEADERS);
            reply.raw.write(encodeComment(`connected ${handle.sessionId}`));

            const summary = await deliverSession({
              manager: fastify.streams,
              handle,
              resumeFrom,
              signal: disconnect.signal,
              pollIntervalMs: opts.pollIntervalMs,
              sink: responseSink(reply.raw, disconnect.signal),
            });

            request.log.info({ ...summary }, 'Stream closed');
          },
          disconnect.signal,
        );
      } catch (err: unknown) {
        if (err instanceof SessionLimitError) {
          request.log.warn({ limit: err.limit }, 'Stream rejected, session limit reached');
          return reply.status(503).send({ error: err.message });
        }
        // Nothing written yet, let Fastify's error handler answer
        if (!reply.sent) throw err;
        request.log.error({ err }, 'Stream error');
      }

      if (!reply.raw.writableEnded && !reply.raw.destroyed) reply.raw.end();
      return reply;
    },
  );
}

export default fp(streamRoutes, {
  name: 'stream-routes',
  dependencies: ['streams'],
  fastify: '5.x',
});
