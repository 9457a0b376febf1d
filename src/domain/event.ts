/**
 * Core domain types for the streamed event model.
 *
 * These types define the canonical shape of an event as it flows
 * from producers through the fan-out engine to subscribers.
 * They carry no framework dependencies.
 */

/** Categories understood by the topic filter. */
export const EVENT_CATEGORIES = ['data', 'heartbeat', 'system'] as const;

export type EventCategory = (typeof EVENT_CATEGORIES)[number];

/** Free-form structured payload, serialized opaquely on the wire. */
export type EventPayload = Readonly<Record<string, unknown>>;

/**
 * Canonical StreamEvent entity.
 *
 * `id` is supplied by the producer and doubles as the resume token a
 * client sends back on reconnect. It must be unique within the history
 * window. `timestamp` is informational; ordering is the order in which
 * events reach `broadcast`.
 */
export interface StreamEvent {
  readonly id: string;
  readonly category: EventCategory;
  readonly payload: EventPayload;
  readonly timestamp: string; // ISO-8601
}

export interface CreateEventInput {
  id: string;
  category: EventCategory;
  payload?: Record<string, unknown>;
  timestamp?: string;
}

/** Builds a frozen StreamEvent; the payload is shallow-copied so later caller mutations do not leak in. */
export function createEvent(input: CreateEventInput): StreamEvent {
  return Object.freeze({
    id: input.id,
    category: input.category,
    payload: Object.freeze({ ...(input.payload ?? {}) }),
    timestamp: input.timestamp ?? new Date().toISOString(),
  });
}

export function isEventCategory(value: unknown): value is EventCategory {
  return typeof value === 'string' && (EVENT_CATEGORIES as readonly string[]).includes(value);
}
