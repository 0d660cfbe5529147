/**
 * Test payloads shaped like `GET /rest/bug` responses.
 */

import { readFileSync } from 'node:fs';

const BUG_TEMPLATE: string = readFileSync(new URL('./bug.json', import.meta.url), 'utf-8');

/** A raw bug object as the server sends it, with `overrides` applied. */
export function bugPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const bug: Record<string, unknown> = JSON.parse(BUG_TEMPLATE);
  return { ...bug, ...overrides };
}

export function listPayload(bugs: Record<string, unknown>[]): Record<string, unknown> {
  return {
    offset: 0,
    limit: '0',
    total_matches: bugs.length,
    bugs,
  };
}
