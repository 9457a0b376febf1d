import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { createEvent } from '../../domain/index.js';
import type { StreamEvent } from '../../domain/index.js';
import { LoopProducer } from './loop-producer.js';
import type { BroadcastTarget } from './loop-producer.js';

export interface HeartbeatProducerOptions {
  intervalMs?: number;
  idFactory?: () => string;
  now?: () => Date;
}

/**
 * Emits a `heartbeat` event immediately on start and then every
 * `intervalMs`, carrying the current client count.
 */
export class HeartbeatProducer extends LoopProducer {
  readonly intervalMs: number;
  private readonly idFactory: () => string;
  private readonly now: () => Date;

  constructor(target: BroadcastTarget, log: Logger, options: HeartbeatProducerOptions = {}) {
    super('heartbeat', target, log);
    this.intervalMs = options.intervalMs ?? 30_000;
    this.idFactory = options.idFactory ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  protected produce(): StreamEvent {
    const timestamp = this.now().toISOString();
    return createEvent({
      id: this.idFactory(),
      category: 'heartbeat',
      payload: { timestamp, clients: this.target.count() },
      timestamp,
    });
  }

  protected nextDelayMs(): number {
    return this.intervalMs;
  }
}
