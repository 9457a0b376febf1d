export { default as streamPlugin } from './stream-plugin.js';
export type { StreamPluginOptions } from './stream-plugin.js';
export { default as producersPlugin } from './producers-plugin.js';
export type { ProducersPluginOptions, ProducerSet } from './producers-plugin.js';
export { default as streamRoutes } from './stream-routes.js';
export type { StreamRoutesOptions } from './stream-routes.js';
export { default as statusRoutes } from './status-routes.js';
export { default as eventRoutes } from './event-routes.js';
