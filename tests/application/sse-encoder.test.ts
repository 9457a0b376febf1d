import { describe, it, expect } from 'vitest';
import { encodeEvent, encodeComment, RETRY_MS } from '../../src/application/sse-encoder.js';
import { createEvent } from '../../src/domain/index.js';

describe('encodeEvent', () => {
  it('writes id, event, data, retry and a blank line in that order', () => {
    const event = createEvent({ id: 'test-123', category: 'data', payload: { message: 'hello' } });

    expect(encodeEvent(event)).toBe(
      'id: test-123\nevent: data\ndata: {"message":"hello"}\nretry: 5000\n\n',
    );
  });

  it('advertises a 5 second retry', () => {
    expect(RETRY_MS).toBe(5000);
  });

  it('keeps multi-line payload values on a single data line', () => {
    const event = createEvent({ id: 'm-1', category: 'system', payload: { text: 'a\nb' } });

    const lines = encodeEvent(event).split('\n');

    expect(lines).toEqual([
      'id: m-1',
      'event: system',
      'data: {"text":"a\\nb"}',
      'retry: 5000',
      '',
      '',
    ]);
  });

  it('encodes an empty payload as {}', () => {
    const event = createEvent({ id: 'hb', category: 'heartbeat' });
    expect(encodeEvent(event)).toBe('id: hb\nevent: heartbeat\ndata: {}\nretry: 5000\n\n');
  });
});

describe('encodeComment', () => {
  it('produces a comment record', () => {
    expect(encodeComment('connected abc')).toBe(': connected abc\n\n');
  });
});

describe('createEvent', () => {
  it('freezes the event and copies the payload', () => {
    const payload: Record<string, unknown> = { type: 'log' };
    const event = createEvent({ id: 'x', category: 'data', payload, timestamp: '2026-03-01T00:00:00.000Z' });
    payload['type'] = 'changed';

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
    expect(event.payload['type']).toBe('log');
    expect(event.timestamp).toBe('2026-03-01T00:00:00.000Z');
  });
});
