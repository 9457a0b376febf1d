import type { Logger } from 'pino';
import type { StreamEvent } from '../../domain/index.js';

/** The slice of the fan-out engine a producer needs. */
export interface BroadcastTarget {
  broadcast(event: StreamEvent): unknown;
  count(): number;
}

/**
 * Base for producers that emit on a timer until stopped.
 *
 * A failing iteration is logged and retried after `retryDelayMs`; it never
 * reaches the broadcast engine or stops the loop. `stop()` aborts the
 * current wait and resolves once the loop has exited.
 */
export abstract class LoopProducer {
  protected readonly target: BroadcastTarget;
  protected readonly log: Logger;
  private readonly name: string;
  private readonly retryDelayMs: number;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  protected constructor(name: string, target: BroadcastTarget, log: Logger, retryDelayMs = 1000) {
    this.name = name;
    this.target = target;
    this.log = log;
    this.retryDelayMs = retryDelayMs;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /** Idempotent. */
  start(): void {
    if (this.controller) return;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.log.info({ producer: this.name }, 'Producer started');
  }

  /** A `start()` issued while this is pending begins a fresh loop. */
  async stop(): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    if (!controller) return;

    this.controller = null;
    this.loop = null;
    controller.abort();
    await loop;
    this.log.info({ producer: this.name }, 'Producer stopped');
  }

  /** Builds the next event. */
  protected abstract produce(): StreamEvent;

  /** Wait after a successful emit. */
  protected abstract nextDelayMs(): number;

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let delay: number;
      try {
        this.target.broadcast(this.produce());
        delay = this.nextDelayMs();
      } catch (err: unknown) {
        this.log.error({ err, producer: this.name }, 'Producer iteration failed, retrying');
        delay = this.retryDelayMs;
      }
      await sleep(delay, signal);
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
