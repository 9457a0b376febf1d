export { BoundedQueue } from './bounded-queue.js';
export { EventHistory } from './event-history.js';
export { ClientRegistry } from './client-registry.js';
export type { ClientSession, SessionHandle, ClientRegistryOptions } from './client-registry.js';
export { StreamManager } from './stream-manager.js';
export type { StreamManagerOptions, BroadcastResult } from './stream-manager.js';
export { shouldDeliver, effectiveTopic, TOPIC_FIELD, HEARTBEAT_TOPIC } from './topic-filter.js';
export { encodeEvent, encodeComment, RETRY_MS } from './sse-encoder.js';
export { withSession, deliverSession } from './session-stream.js';
export type { EventSink, DeliveryOptions, DeliverySummary } from './session-stream.js';
export {
  eventInputSchema,
  eventBatchSchema,
  streamQuerySchema,
  toStreamEvent,
  toSessionMetadata,
} from './event-schema.js';
export type { EventInput, StreamQuery } from './event-schema.js';
