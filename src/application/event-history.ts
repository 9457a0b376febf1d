import type { StreamEvent } from '../domain/index.js';
import type { BoundedQueue } from './bounded-queue.js';

/**
 * Ring buffer of the most recent events, used for reconnection replay.
 *
 * Holds at most `capacity` events in insertion order. Recording past
 * capacity overwrites the oldest slot, so the retained window is always a
 * contiguous suffix of everything ever recorded.
 *
 * Lookups scan by event id rather than by position: a client only ever
 * sees ids, and positions shift as the ring wraps.
 */
export class EventHistory {
  readonly capacity: number;
  private readonly slots: Array<StreamEvent | undefined>;
  /** Index of the oldest retained event. */
  private head = 0;
  private length = 0;

  constructor(capacity: number = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer (received ${capacity})`);
    }
    this.capacity = capacity;
    this.slots = new Array<StreamEvent | undefined>(capacity);
  }

  /** Appends, evicting the oldest entry first when full. */
  record(event: StreamEvent): void {
    if (this.length < this.capacity) {
      this.slots[(this.head + this.length) % this.capacity] = event;
      this.length++;
      return;
    }

    this.slots[this.head] = event;
    this.head = (this.head + 1) % this.capacity;
  }

  size(): number {
    return this.length;
  }

  latestId(): string | undefined {
    return this.at(this.length - 1)?.id;
  }

  oldestId(): string | undefined {
    return this.at(0)?.id;
  }

  /**
   * Events recorded strictly after `eventId`, oldest first.
   *
   * Empty when the id is the newest entry, was evicted, or never existed.
   * Scans newest → oldest since resume tokens are usually recent.
   */
  suffixAfter(eventId: string): StreamEvent[] {
    for (let i = this.length - 1; i >= 0; i--) {
      if (this.at(i)?.id !== eventId) continue;

      const suffix: StreamEvent[] = [];
      for (let j = i + 1; j < this.length; j++) {
        const event = this.at(j);
        if (event) suffix.push(event);
      }
      return suffix;
    }
    return [];
  }

  /**
   * Offers the suffix after `eventId` to `queue` without waiting.
   *
   * Stops at the first refused offer and returns how many went in.
   */
  replayInto(eventId: string, queue: BoundedQueue<StreamEvent>): number {
    let enqueued = 0;
    for (const event of this.suffixAfter(eventId)) {
      if (!queue.offer(event)) break;
      enqueued++;
    }
    return enqueued;
  }

  /** Retained events, oldest first. */
  toArray(): StreamEvent[] {
    const out: StreamEvent[] = [];
    for (let i = 0; i < this.length; i++) {
      const event = this.at(i);
      if (event) out.push(event);
    }
    return out;
  }

  /** Logical index 0 = oldest retained event. */
  private at(index: number): StreamEvent | undefined {
    if (index < 0 || index >= this.length) return undefined;
    return this.slots[(this.head + index) % this.capacity];
  }
}
