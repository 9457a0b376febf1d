import { describe, it, expect } from 'vitest';
import { EventHistory } from '../../src/application/event-history.js';
import { BoundedQueue } from '../../src/application/bounded-queue.js';
import type { StreamEvent } from '../../src/domain/index.js';
import { makeEvent } from '../helpers.js';

function ids(events: readonly StreamEvent[]): string[] {
  return events.map((e) => e.id);
}

function recordAll(history: EventHistory, count: number): StreamEvent[] {
  const events: StreamEvent[] = [];
  for (let i = 1; i <= count; i++) {
    const event = makeEvent({ id: `e${i}` });
    history.record(event);
    events.push(event);
  }
  return events;
}

describe('EventHistory', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new EventHistory(0)).toThrow(RangeError);
  });

  describe('empty buffer', () => {
    it('has no latest id and an empty suffix', () => {
      const history = new EventHistory(5);

      expect(history.size()).toBe(0);
      expect(history.latestId()).toBeUndefined();
      expect(history.oldestId()).toBeUndefined();
      expect(history.suffixAfter('anything')).toEqual([]);
    });
  });

  describe('suffixAfter', () => {
    it('returns the events strictly after the match, in order', () => {
      const history = new EventHistory(10);
      recordAll(history, 5);

      expect(ids(history.suffixAfter('e2'))).toEqual(['e3', 'e4', 'e5']);
    });

    it('returns the same event objects that were recorded', () => {
      const history = new EventHistory(10);
      const [e1, e2] = recordAll(history, 2);

      expect(history.suffixAfter(e1?.id ?? '')[0]).toBe(e2);
    });

    it('returns [] for an unknown id', () => {
      const history = new EventHistory(10);
      recordAll(history, 5);

      expect(history.suffixAfter('nonexistent')).toEqual([]);
    });

    it('returns [] when the id is the most recent event', () => {
      const history = new EventHistory(10);
      recordAll(history, 3);

      expect(history.suffixAfter('e3')).toEqual([]);
    });
  });

  describe('ring eviction', () => {
    it('retains only the newest `capacity` events', () => {
      const history = new EventHistory(5);
      recordAll(history, 10);

      expect(history.size()).toBe(5);
      expect(history.latestId()).toBe('e10');
      expect(history.oldestId()).toBe('e6');
      expect(history.suffixAfter('e1')).toEqual([]);
      expect(ids(history.toArray())).toEqual(['e6', 'e7', 'e8', 'e9', 'e10']);
    });

    it('still finds suffixes across the wrap point', () => {
      const history = new EventHistory(5);
      recordAll(history, 8);

      expect(ids(history.suffixAfter('e5'))).toEqual(['e6', 'e7', 'e8']);
      expect(ids(history.suffixAfter('e4'))).toEqual(['e5', 'e6', 'e7', 'e8']);
    });

    it('works with a capacity of one', () => {
      const history = new EventHistory(1);
      recordAll(history, 3);

      expect(history.size()).toBe(1);
      expect(history.latestId()).toBe('e3');
      expect(history.suffixAfter('e2')).toEqual([]);
    });
  });

  describe('replayInto', () => {
    it('enqueues the whole suffix when there is room', () => {
      const history = new EventHistory(10);
      recordAll(history, 4);
      const queue = new BoundedQueue<StreamEvent>(10);

      expect(history.replayInto('e1', queue)).toBe(3);
      expect(ids(queue.drain())).toEqual(['e2', 'e3', 'e4']);
    });

    it('stops early without throwing when the queue fills', () => {
      const history = new EventHistory(10);
      recordAll(history, 5);
      const queue = new BoundedQueue<StreamEvent>(2);

      expect(history.replayInto('e1', queue)).toBe(2);
      expect(ids(queue.drain())).toEqual(['e2', 'e3']);
    });

    it('enqueues nothing for an unknown token', () => {
      const history = new EventHistory(10);
      recordAll(history, 3);
      const queue = new BoundedQueue<StreamEvent>(5);

      expect(history.replayInto('gone', queue)).toBe(0);
      expect(queue.size).toBe(0);
    });
  });
});
