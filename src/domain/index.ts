export type { StreamEvent, EventCategory, EventPayload, CreateEventInput } from './event.js';
export { EVENT_CATEGORIES, createEvent, isEventCategory } from './event.js';
export type {
  TopicSubscription,
  SessionMetadata,
  SessionSnapshot,
  RemovalReason,
} from './session.js';
export { ANONYMOUS, ALL_TOPICS, toSubscription, SessionLimitError } from './session.js';
