import type { StreamEvent } from '../domain/index.js';
import type { TopicSubscription } from '../domain/index.js';

/** Payload field that names a data/system event's topic. */
export const TOPIC_FIELD = 'type';

export const HEARTBEAT_TOPIC = 'heartbeat';

/**
 * Topic an event is filed under.
 *
 * Heartbeats are always "heartbeat". Anything else uses the payload's
 * `type` string when there is one, otherwise its category.
 */
export function effectiveTopic(event: StreamEvent): string {
  if (event.category === 'heartbeat') return HEARTBEAT_TOPIC;

  const declared = event.payload[TOPIC_FIELD];
  return typeof declared === 'string' ? declared : event.category;
}

/**
 * Per-session delivery decision, applied by the consumer after dequeue.
 *
 * Heartbeats pass a topic list unless the subscriber asked for strict
 * filtering with a non-empty list that leaves "heartbeat" out.
 */
export function shouldDeliver(
  session: { readonly subscription: TopicSubscription },
  event: StreamEvent,
): boolean {
  const sub = session.subscription;
  if (sub.kind === 'all') return true;

  if (event.category === 'heartbeat') {
    return !(sub.strict && sub.topics.size > 0 && !sub.topics.has(HEARTBEAT_TOPIC));
  }

  return sub.topics.has(effectiveTopic(event));
}
