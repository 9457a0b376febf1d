import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

/**
 * Server configuration loaded from config/stream.yaml.
 */
export interface StreamConfig {
  server: { host: string; port: number; log_level: LogLevel };
  stream: {
    queue_size: number;
    history_size: number;
    poll_interval_ms: number;
    max_clients: number;
  };
  producers: { sample_events: boolean; heartbeat_interval_seconds: number };
  ingest: { redis_enabled: boolean; redis_url: string; redis_channel: string };
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Defaults: 100-event client queues, 1000-event replay window,
 * heartbeat every 30 s, Redis ingest off.
 */
export const DEFAULT_CONFIG: StreamConfig = {
  server: { host: '0.0.0.0', port: 8000, log_level: 'info' },
  stream: {
    queue_size: 100,
    history_size: 1000,
    poll_interval_ms: 1000,
    max_clients: 10_000,
  },
  producers: { sample_events: true, heartbeat_interval_seconds: 30 },
  ingest: {
    redis_enabled: false,
    redis_url: 'redis://localhost:6379',
    redis_channel: 'stream_events',
  },
};

/** Largest delay `setTimeout` honours; longer ones fire after 1 ms. */
const MAX_TIMER_MS = 2_147_483_647;

const positiveInt = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(1).max(max).catch(fallback);

/** Each field falls back to its default on its own; one bad value never discards the rest. */
const configSchema = z.object({
  server: z.object({
    host: z.string().min(1).catch(DEFAULT_CONFIG.server.host),
    port: z.coerce.number().int().min(0).max(65535).catch(DEFAULT_CONFIG.server.port),
    log_level: z.enum(LOG_LEVELS).catch(DEFAULT_CONFIG.server.log_level),
  }),
  stream: z.object({
    queue_size: positiveInt(DEFAULT_CONFIG.stream.queue_size),
    history_size: positiveInt(DEFAULT_CONFIG.stream.history_size),
    poll_interval_ms: positiveInt(DEFAULT_CONFIG.stream.poll_interval_ms, MAX_TIMER_MS),
    max_clients: positiveInt(DEFAULT_CONFIG.stream.max_clients),
  }),
  producers: z.object({
    sample_events: z.boolean().catch(DEFAULT_CONFIG.producers.sample_events),
    // 0 disables the heartbeat
    heartbeat_interval_seconds: z.coerce
      .number()
      .min(0)
      .max(Math.floor(MAX_TIMER_MS / 1000))
      .catch(DEFAULT_CONFIG.producers.heartbeat_interval_seconds),
  }),
  ingest: z.object({
    redis_enabled: z.boolean().catch(DEFAULT_CONFIG.ingest.redis_enabled),
    redis_url: z.string().min(1).catch(DEFAULT_CONFIG.ingest.redis_url),
    redis_channel: z.string().min(1).catch(DEFAULT_CONFIG.ingest.redis_channel),
  }),
});

type Section = Record<string, unknown>;

/**
 * Minimal YAML reader for the flat config layout.
 *
 * Handles top-level section keys with indented scalar values
 * (strings, quoted strings, true/false). Not a general-purpose parser.
 */
export function parseSimpleYaml(content: string): Record<string, Section> {
  const result: Record<string, Section> = {};
  let current: Section | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const key = line.slice(0, colonIdx).trim();

    // Top-level key (no leading whitespace) opens a section
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      current = {};
      result[key] = current;
      continue;
    }

    if (current === null) continue;

    let value: unknown = stripComment(line.slice(colonIdx + 1).trim());
    if (value === 'true') {
      value = true;
    } else if (value === 'false') {
      value = false;
    } else if (typeof value === 'string' && value.length >= 2 && /^(["']).*\1$/.test(value)) {
      value = value.slice(1, -1);
    }
    current[key] = value;
  }

  return result;
}

/** Drops a trailing ` # comment` outside of quotes. */
function stripComment(value: string): string {
  if (value.startsWith('"') || value.startsWith("'")) return value;
  const idx = value.indexOf(' #');
  return idx === -1 ? value : value.slice(0, idx).trim();
}

function readYaml(filePath: string): Record<string, Section> {
  try {
    return parseSimpleYaml(readFileSync(filePath, 'utf-8'));
  } catch {
    // Missing or unreadable file: run on defaults
    return {};
  }
}

/**
 * Loads configuration: defaults ← YAML file ← environment.
 *
 * Env overrides: HOST, PORT, LOG_LEVEL, REDIS_URL,
 * STREAM_QUEUE_SIZE, STREAM_HISTORY_SIZE.
 */
export function loadStreamConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): StreamConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'stream.yaml');
  const parsed = readYaml(filePath);

  const raw = {
    server: { ...parsed['server'] },
    stream: { ...parsed['stream'] },
    producers: { ...parsed['producers'] },
    ingest: { ...parsed['ingest'] },
  };

  if (env['HOST']) raw.server['host'] = env['HOST'];
  if (env['PORT']) raw.server['port'] = env['PORT'];
  if (env['LOG_LEVEL']) raw.server['log_level'] = env['LOG_LEVEL'];
  if (env['REDIS_URL']) raw.ingest['redis_url'] = env['REDIS_URL'];
  if (env['STREAM_QUEUE_SIZE']) raw.stream['queue_size'] = env['STREAM_QUEUE_SIZE'];
  if (env['STREAM_HISTORY_SIZE']) raw.stream['history_size'] = env['STREAM_HISTORY_SIZE'];

  return configSchema.parse(raw);
}
