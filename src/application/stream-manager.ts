import type { Logger } from 'pino';
import type { SessionMetadata, SessionSnapshot, StreamEvent, RemovalReason } from '../domain/index.js';
import { ClientRegistry } from './client-registry.js';
import type { SessionHandle } from './client-registry.js';
import { EventHistory } from './event-history.js';

export interface StreamManagerOptions {
  queueSize: number;
  historySize: number;
  maxSessions?: number;
  log: Logger;
}

export interface BroadcastResult {
  /** Sessions whose queue accepted the event. */
  delivered: number;
  /** Sessions removed because their queue was already full. */
  disconnected: string[];
}

/**
 * Fan-out engine: owns the client registry and the replay history.
 *
 * `broadcast()` never waits on a subscriber. A session whose queue is full
 * when an event arrives is removed rather than stalling the producer or
 * the other sessions; the event itself still reaches everyone else.
 */
export class StreamManager {
  readonly registry: ClientRegistry;
  readonly history: EventHistory;
  private readonly log: Logger;

  constructor(options: StreamManagerOptions) {
    this.log = options.log;
    this.history = new EventHistory(options.historySize);
    this.registry = new ClientRegistry({
      queueSize: options.queueSize,
      maxSessions: options.maxSessions,
      log: options.log,
    });
  }

  register(metadata?: SessionMetadata): SessionHandle {
    return this.registry.register(metadata);
  }

  unregister(sessionId: string, reason?: RemovalReason): boolean {
    return this.registry.unregister(sessionId, reason);
  }

  /**
   * 1. Record into history (regardless of subscriber count).
   * 2. Snapshot the registry.
   * 3. Offer to every queue; count successes, collect refusals.
   * 4. Remove every session that refused.
   */
  broadcast(event: StreamEvent): BroadcastResult {
    this.history.record(event);

    const overflowed: string[] = [];
    let delivered = 0;

    for (const session of this.registry.snapshot()) {
      if (session.queue.offer(event)) {
        session.eventsDelivered++;
        delivered++;
      } else {
        overflowed.push(session.id);
      }
    }

    for (const sessionId of overflowed) {
      this.registry.unregister(sessionId, 'overflow');
    }

    this.log.debug(
      { eventId: event.id, category: event.category, delivered, disconnected: overflowed.length },
      'Event broadcast',
    );

    return { delivered, disconnected: overflowed };
  }

  /**
   * Pre-fills a session's queue with everything after `lastEventId`.
   *
   * Returns the number of events enqueued; 0 for an unknown token.
   */
  replay(handle: SessionHandle, lastEventId: string): number {
    const replayed = this.history.replayInto(lastEventId, handle.queue);
    this.registry.recordDelivered(handle.sessionId, replayed);

    this.log.info(
      { sessionId: handle.sessionId, lastEventId, replayed },
      replayed > 0 ? 'Replayed missed events' : 'Nothing to replay',
    );
    return replayed;
  }

  count(): number {
    return this.registry.count();
  }

  listSessions(): SessionSnapshot[] {
    return this.registry.listSessions();
  }

  /** Removes every session, waking their delivery loops. */
  close(): void {
    for (const session of this.registry.snapshot()) {
      this.registry.unregister(session.id, 'shutdown');
    }
  }
}
