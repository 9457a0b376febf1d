import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { EVENT_CATEGORIES, createEvent } from '../domain/index.js';
import type { SessionMetadata, StreamEvent } from '../domain/index.js';

/** Ids end up on an SSE `id:` line, so they must stay on one line. */
const SINGLE_LINE = /^[^\r\n]+$/;

/**
 * Zod schema for an event submitted by a producer (HTTP or Redis ingest).
 *
 * - `id` is optional; a UUID is assigned when absent.
 * - `category` defaults to "data".
 * - `payload` is an open-ended object; the engine never inspects it
 *   beyond the topic field.
 */
export const eventInputSchema = z.object({
  id: z.string().min(1).max(255).regex(SINGLE_LINE, 'Must not contain line breaks').optional(),
  category: z.enum(EVENT_CATEGORIES).default('data'),
  payload: z.record(z.string(), z.unknown()).default({}),
  timestamp: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }).optional(),
});

export type EventInput = z.infer<typeof eventInputSchema>;

export const eventBatchSchema = z
  .array(eventInputSchema)
  .min(1, 'Batch must contain at least one event')
  .max(1000, 'Batch must contain at most 1000 events');

/** Completes a validated input into an immutable StreamEvent. */
export function toStreamEvent(
  input: EventInput,
  idFactory: () => string = randomUUID,
): StreamEvent {
  return createEvent({
    id: input.id ?? idFactory(),
    category: input.category,
    payload: input.payload,
    timestamp: input.timestamp,
  });
}

/** "a, b,,c" → ["a", "b", "c"] */
const csvList = z
  .string()
  .max(2048)
  .transform((raw) => raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0));

/**
 * Query string accepted by GET /stream.
 *
 * An absent `topics` means "everything"; a present but empty one is an
 * explicit empty subscription (heartbeats only).
 */
export const streamQuerySchema = z.object({
  name: z.string().max(255).optional(),
  tags: csvList.optional(),
  topics: csvList.optional(),
  strict: z.enum(['true', 'false']).transform((v) => v === 'true').optional(),
  last_event_id: z.string().min(1).max(255).optional(),
});

export type StreamQuery = z.infer<typeof streamQuerySchema>;

export function toSessionMetadata(query: StreamQuery): SessionMetadata {
  return {
    displayName: query.name,
    tags: query.tags,
    topics: query.topics,
    strictTopics: query.strict,
  };
}
