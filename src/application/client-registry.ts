import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  RemovalReason,
  SessionMetadata,
  SessionSnapshot,
  StreamEvent,
  TopicSubscription,
} from '../domain/index.js';
import { ANONYMOUS, SessionLimitError, toSubscription } from '../domain/index.js';
import { BoundedQueue } from './bounded-queue.js';

/** Live per-subscriber state. Only the registry and the broadcast engine touch it. */
export interface ClientSession {
  readonly id: string;
  readonly displayName: string;
  readonly tags: readonly string[];
  readonly subscription: TopicSubscription;
  readonly queue: BoundedQueue<StreamEvent>;
  readonly connectedAt: string;
  eventsDelivered: number;
}

/** What `register()` hands back to the transport. */
export interface SessionHandle {
  readonly sessionId: string;
  readonly queue: BoundedQueue<StreamEvent>;
  readonly subscription: TopicSubscription;
}

export interface ClientRegistryOptions {
  /** Per-session queue capacity. */
  queueSize: number;
  /** Upper bound on concurrent sessions. */
  maxSessions?: number;
  log: Logger;
}

/**
 * Session id → ClientSession map.
 *
 * Every method is synchronous, so each one runs to completion within a
 * single event-loop turn: register, unregister and the broadcast snapshot
 * can never interleave. Read methods hand out copies, never the map.
 */
export class ClientRegistry {
  private readonly sessions: Map<string, ClientSession> = new Map();
  private readonly queueSize: number;
  private readonly maxSessions: number;
  private readonly log: Logger;

  constructor(options: ClientRegistryOptions) {
    this.queueSize = options.queueSize;
    this.maxSessions = options.maxSessions ?? Number.POSITIVE_INFINITY;
    this.log = options.log;
  }

  /**
   * Creates a session with a fresh id and an empty bounded queue.
   *
   * @throws SessionLimitError when `maxSessions` sessions are already registered.
   */
  register(metadata: SessionMetadata = {}): SessionHandle {
    if (this.sessions.size >= this.maxSessions) {
      throw new SessionLimitError(this.maxSessions);
    }

    const session: ClientSession = {
      id: randomUUID(),
      displayName: metadata.displayName?.trim() || ANONYMOUS,
      tags: [...(metadata.tags ?? [])],
      subscription: toSubscription(metadata),
      queue: new BoundedQueue<StreamEvent>(this.queueSize),
      connectedAt: new Date().toISOString(),
      eventsDelivered: 0,
    };

    this.sessions.set(session.id, session);

    this.log.info(
      { sessionId: session.id, displayName: session.displayName, clientCount: this.sessions.size },
      'Client connected',
    );

    return { sessionId: session.id, queue: session.queue, subscription: session.subscription };
  }

  /**
   * Removes a session and closes its queue.
   *
   * Idempotent. Returns false when the id is not registered.
   */
  unregister(sessionId: string, reason: RemovalReason = 'unsubscribe'): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    this.sessions.delete(sessionId);
    session.queue.close();

    const fields = {
      sessionId,
      reason,
      eventsDelivered: session.eventsDelivered,
      clientCount: this.sessions.size,
    };
    if (reason === 'overflow') {
      this.log.warn(fields, 'Client queue full, disconnecting');
    } else {
      this.log.info(fields, 'Client disconnected');
    }
    return true;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  count(): number {
    return this.sessions.size;
  }

  /** Adds `n` to a session's delivered counter. No-op for unknown ids. */
  recordDelivered(sessionId: string, n: number): void {
    const session = this.sessions.get(sessionId);
    if (session) session.eventsDelivered += n;
  }

  /** Stable array of the sessions registered right now. */
  snapshot(): ClientSession[] {
    return [...this.sessions.values()];
  }

  listSessions(): SessionSnapshot[] {
    return this.snapshot().map((s) => ({
      id: s.id,
      displayName: s.displayName,
      tags: [...s.tags],
      topics: s.subscription.kind === 'all' ? 'all' : [...s.subscription.topics],
      strictTopics: s.subscription.kind === 'only' && s.subscription.strict,
      connectedAt: s.connectedAt,
      eventsDelivered: s.eventsDelivered,
      queued: s.queue.size,
      queueCapacity: s.queue.capacity,
    }));
  }
}
