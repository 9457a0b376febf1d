import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { createEvent } from '../../domain/index.js';
import type { StreamEvent } from '../../domain/index.js';
import { LoopProducer } from './loop-producer.js';
import type { BroadcastTarget } from './loop-producer.js';

const SEVERITIES = ['low', 'medium', 'high'] as const;

export interface SampleProducerOptions {
  minDelayMs?: number;
  maxDelayMs?: number;
  /** Uniform [0, 1) source; injectable for tests. */
  random?: () => number;
  idFactory?: () => string;
}

/**
 * Demo data source: a metric, log or alert sample at a random
 * 0.5–2 s interval. Payload `type` is the topic subscribers filter on.
 */
export class SampleEventProducer extends LoopProducer {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly random: () => number;
  private readonly idFactory: () => string;

  constructor(target: BroadcastTarget, log: Logger, options: SampleProducerOptions = {}) {
    super('sample-events', target, log);
    this.minDelayMs = options.minDelayMs ?? 500;
    this.maxDelayMs = options.maxDelayMs ?? 2000;
    this.random = options.random ?? Math.random;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  protected produce(): StreamEvent {
    return createEvent({
      id: this.idFactory(),
      category: 'data',
      payload: this.samplePayload(),
    });
  }

  protected nextDelayMs(): number {
    return this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
  }

  private samplePayload(): Record<string, unknown> {
    const pick = Math.floor(this.random() * 4);
    switch (pick) {
      case 0:
        return { type: 'metric', name: 'cpu_usage', value: round(this.random() * 100) };
      case 1:
        return { type: 'metric', name: 'memory_usage', value: round(this.random() * 100) };
      case 2:
        return { type: 'log', level: 'INFO', message: `Process ${randomUUID()}` };
      default:
        return {
          type: 'alert',
          severity: SEVERITIES[Math.floor(this.random() * SEVERITIES.length)] ?? 'low',
        };
    }
  }
}

function round(n: number): number {
  return Math.round(n * 100) / 100;
}
