/**
 * Session Types
 *
 * Options that shape every request a BugzillaClient issues.
 */

/** How requests authenticate against Bugzilla. */
export type AuthMode = { type: 'anonymous' } | { type: 'api-key'; apiKey: string };

/**
 * Upper bound on the number of bugs one response may contain.
 *
 * - `default`: the instance's own cap applies.
 * - `limit`: use this cap instead. Not validated; the server decides what it accepts.
 * - `unlimited`: sends `limit=0`, which lifts the cap and returns every match.
 */
export type PaginationMode =
  | { type: 'default' }
  | { type: 'limit'; limit: number }
  | { type: 'unlimited' };

export const ANONYMOUS: AuthMode = { type: 'anonymous' };
export const DEFAULT_PAGINATION: PaginationMode = { type: 'default' };

/** Bugzilla's built-in default field set. */
export const DEFAULT_FIELDS: readonly string[] = ['_default'];

export function apiKeyAuth(apiKey: string): AuthMode {
  return { type: 'api-key', apiKey };
}

export function limitPagination(limit: number): PaginationMode {
  return { type: 'limit', limit };
}

export const UNLIMITED: PaginationMode = { type: 'unlimited' };
