export { loadStreamConfig, parseSimpleYaml, DEFAULT_CONFIG } from './stream-config.js';
export type { StreamConfig, LogLevel } from './stream-config.js';
