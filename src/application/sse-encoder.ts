import type { StreamEvent } from '../domain/index.js';

/** Client reconnection delay advertised on every event, in milliseconds. */
export const RETRY_MS = 5000;

/**
 * Encodes an event as one Server-Sent Events record:
 *
 *   id: <id>
 *   event: <category>
 *   data: <payload as JSON>
 *   retry: 5000
 *   <blank line>
 *
 * Field order is fixed; parsers split records on the blank line.
 */
export function encodeEvent(event: StreamEvent): string {
  return [
    `id: ${event.id}`,
    `event: ${event.category}`,
    `data: ${JSON.stringify(event.payload)}`,
    `retry: ${RETRY_MS}`,
    '',
  ].join('\n') + '\n';
}

/** SSE comment line; keeps idle connections open through proxies. */
export function encodeComment(text: string): string {
  return `: ${text}\n\n`;
}
