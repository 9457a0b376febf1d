import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createEvent } from '../src/domain/index.js';
import type { EventCategory, StreamEvent } from '../src/domain/index.js';

let counter = 0;

/**
 * Factory for test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(
  overrides: { id?: string; category?: EventCategory; payload?: Record<string, unknown> } = {},
): StreamEvent {
  counter++;
  return createEvent({
    id: overrides.id ?? `evt-${counter}`,
    category: overrides.category ?? 'data',
    payload: overrides.payload ?? { type: 'metric', value: counter },
    timestamp: '2026-03-01T12:00:00.000Z',
  });
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}
