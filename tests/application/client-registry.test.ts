import { describe, it, expect, beforeEach } from 'vitest';
import type { Logger } from 'pino';
import { ClientRegistry } from '../../src/application/client-registry.js';
import { SessionLimitError } from '../../src/domain/index.js';
import { fakeLogger, makeEvent } from '../helpers.js';

describe('ClientRegistry', () => {
  let log: Logger;
  let registry: ClientRegistry;

  beforeEach(() => {
    log = fakeLogger();
    registry = new ClientRegistry({ queueSize: 3, log });
  });

  it('counts N registrations and N - M after M unregistrations', () => {
    const ids = Array.from({ length: 7 }, () => registry.register().sessionId);
    expect(registry.count()).toBe(7);

    for (const id of ids.slice(0, 4)) {
      registry.unregister(id);
    }

    expect(registry.count()).toBe(3);
  });

  it('never hands out the same id twice', () => {
    const ids = new Set(Array.from({ length: 50 }, () => registry.register().sessionId));
    expect(ids.size).toBe(50);
  });

  it('gives every session its own queue of the configured capacity', () => {
    const a = registry.register();
    const b = registry.register();

    expect(a.queue).not.toBe(b.queue);
    expect(a.queue.capacity).toBe(3);
  });

  it('treats unregister as idempotent', () => {
    const { sessionId } = registry.register();

    expect(registry.unregister(sessionId)).toBe(true);
    expect(registry.unregister(sessionId)).toBe(false);
    expect(registry.unregister('never-registered')).toBe(false);
    expect(registry.count()).toBe(0);
  });

  it('closes the session queue on unregister', () => {
    const { sessionId, queue } = registry.register();

    registry.unregister(sessionId);

    expect(queue.closed).toBe(true);
  });

  it('defaults the display name to "anonymous"', () => {
    registry.register();
    registry.register({ displayName: '   ' });
    registry.register({ displayName: ' dashboard ' });

    expect(registry.listSessions().map((s) => s.displayName)).toEqual([
      'anonymous',
      'anonymous',
      'dashboard',
    ]);
  });

  it('snapshots metadata into plain copies', () => {
    const tags = ['ops'];
    registry.register({ tags, topics: ['metric', 'log'], strictTopics: true });
    registry.register();

    const [filtered, open] = registry.listSessions();
    tags.push('mutated');

    expect(filtered?.tags).toEqual(['ops']);
    expect(filtered?.topics).toEqual(['metric', 'log']);
    expect(filtered?.strictTopics).toBe(true);
    expect(open?.topics).toBe('all');
    expect(open?.strictTopics).toBe(false);
  });

  it('reports queue depth and delivered count', () => {
    const { sessionId, queue } = registry.register();
    queue.offer(makeEvent());
    registry.recordDelivered(sessionId, 4);

    const [snapshot] = registry.listSessions();

    expect(snapshot?.queued).toBe(1);
    expect(snapshot?.queueCapacity).toBe(3);
    expect(snapshot?.eventsDelivered).toBe(4);
  });

  it('returns a snapshot array unaffected by later registrations', () => {
    registry.register();
    const snapshot = registry.snapshot();

    registry.register();

    expect(snapshot).toHaveLength(1);
    expect(registry.count()).toBe(2);
  });

  it('refuses registration past maxSessions without touching existing sessions', () => {
    const limited = new ClientRegistry({ queueSize: 1, maxSessions: 2, log });
    const first = limited.register();
    limited.register();

    expect(() => limited.register()).toThrow(SessionLimitError);
    expect(limited.count()).toBe(2);
    expect(limited.has(first.sessionId)).toBe(true);
  });

  it('logs overflow removals as warnings', () => {
    const { sessionId } = registry.register();

    registry.unregister(sessionId, 'overflow');

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId, reason: 'overflow', clientCount: 0 }),
      'Client queue full, disconnecting',
    );
  });

  it('logs other removals at info with the reason', () => {
    const { sessionId } = registry.register();

    registry.unregister(sessionId, 'disconnect');

    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId, reason: 'disconnect' }),
      'Client disconnected',
    );
  });
});
