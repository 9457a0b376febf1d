export { startEventSubscriber, handleIngestMessage } from './event-subscriber.js';
export type { IngestHandler } from './event-subscriber.js';
