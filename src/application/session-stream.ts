import type { RemovalReason, SessionMetadata } from '../domain/index.js';
import type { SessionHandle } from './client-registry.js';
import type { StreamManager } from './stream-manager.js';
import { shouldDeliver } from './topic-filter.js';
import { encodeEvent } from './sse-encoder.js';

/** Where encoded records go. A returned promise is awaited before the next pull. */
export interface EventSink {
  write(chunk: string): void | Promise<void>;
}

export interface DeliveryOptions {
  manager: StreamManager;
  handle: SessionHandle;
  sink: EventSink;
  /** Aborted by the transport when the client goes away. */
  signal: AbortSignal;
  /** Upper bound on a single wait for the next event. */
  pollIntervalMs: number;
  /** Resume token: id of the last event the client processed. */
  resumeFrom?: string | undefined;
}

export interface DeliverySummary {
  sessionId: string;
  replayed: number;
  written: number;
  filtered: number;
  endedBy: 'disconnect' | 'closed';
}

/**
 * Registers a session for the duration of `fn`.
 *
 * The session is unregistered on every exit path: normal return, thrown
 * error, or cancellation through `signal`. A registration failure
 * propagates before `fn` runs.
 */
export async function withSession<T>(
  manager: StreamManager,
  metadata: SessionMetadata,
  fn: (handle: SessionHandle) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  const handle = manager.register(metadata);
  try {
    return await fn(handle);
  } finally {
    const reason: RemovalReason = signal?.aborted ? 'disconnect' : 'unsubscribe';
    manager.unregister(handle.sessionId, reason);
  }
}

/**
 * Consumer side of one session.
 *
 * Replays missed events when a resume token is given, then pulls from the
 * session queue until the client disconnects or the queue is closed
 * (overflow or shutdown). Each dequeued event passes the topic filter
 * before it is encoded and written.
 */
export async function deliverSession(options: DeliveryOptions): Promise<DeliverySummary> {
  const { manager, handle, sink, signal, pollIntervalMs } = options;

  const replayed = options.resumeFrom !== undefined
    ? manager.replay(handle, options.resumeFrom)
    : 0;

  let written = 0;
  let filtered = 0;

  while (!signal.aborted) {
    const event = await handle.queue.take(pollIntervalMs, signal);

    if (event === null) {
      if (handle.queue.closed && handle.queue.size === 0) break;
      continue;
    }

    if (!shouldDeliver(handle, event)) {
      filtered++;
      continue;
    }

    await sink.write(encodeEvent(event));
    written++;
  }

  return {
    sessionId: handle.sessionId,
    replayed,
    written,
    filtered,
    endedBy: signal.aborted ? 'disconnect' : 'closed',
  };
}
