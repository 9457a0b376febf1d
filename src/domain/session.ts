/** Display name used when a subscriber does not identify itself. */
export const ANONYMOUS = 'anonymous';

/**
 * What a session wants to receive.
 *
 * `all` is the unset case. `only` lists explicit topics; `strict` lets a
 * subscriber opt out of heartbeats by leaving "heartbeat" off the list.
 */
export type TopicSubscription =
  | { readonly kind: 'all' }
  | { readonly kind: 'only'; readonly topics: ReadonlySet<string>; readonly strict: boolean };

export const ALL_TOPICS: TopicSubscription = Object.freeze({ kind: 'all' });

/** Metadata a transport supplies at subscribe time. Every field is optional. */
export interface SessionMetadata {
  displayName?: string;
  tags?: readonly string[];
  topics?: readonly string[];
  strictTopics?: boolean;
}

/** Why a session left the registry. */
export type RemovalReason = 'unsubscribe' | 'disconnect' | 'overflow' | 'shutdown';

/** Read-only copy of a session's state for status surfaces. */
export interface SessionSnapshot {
  readonly id: string;
  readonly displayName: string;
  readonly tags: readonly string[];
  readonly topics: readonly string[] | 'all';
  readonly strictTopics: boolean;
  readonly connectedAt: string; // ISO-8601
  readonly eventsDelivered: number;
  readonly queued: number;
  readonly queueCapacity: number;
}

/** Converts optional subscriber input into a TopicSubscription. */
export function toSubscription(metadata: SessionMetadata): TopicSubscription {
  if (metadata.topics === undefined) return ALL_TOPICS;
  return {
    kind: 'only',
    topics: new Set(metadata.topics),
    strict: metadata.strictTopics ?? false,
  };
}

/**
 * Raised when the registry cannot take another session.
 *
 * Fatal for that one registration only; existing sessions are unaffected.
 */
export class SessionLimitError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Session limit reached (${limit})`);
    this.name = 'SessionLimitError';
    this.limit = limit;
  }
}
