export { LoopProducer, sleep } from './loop-producer.js';
export type { BroadcastTarget } from './loop-producer.js';
export { HeartbeatProducer } from './heartbeat-producer.js';
export type { HeartbeatProducerOptions } from './heartbeat-producer.js';
export { SampleEventProducer } from './sample-producer.js';
export type { SampleProducerOptions } from './sample-producer.js';
