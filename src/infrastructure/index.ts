export { loadStreamConfig, parseSimpleYaml, DEFAULT_CONFIG } from './config/index.js';
export type { StreamConfig, LogLevel } from './config/index.js';
export { HeartbeatProducer, SampleEventProducer, LoopProducer } from './producers/index.js';
export type { BroadcastTarget } from './producers/index.js';
export { startEventSubscriber, handleIngestMessage } from './redis/index.js';
export type { IngestHandler } from './redis/index.js';
