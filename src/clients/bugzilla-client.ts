/**
 * Bugzilla REST API Client
 *
 * Uses native fetch (Node 18+). Read-only: fetches bugs by ID from
 * `<host>/rest/bug` and validates them against the schemas in ./types.ts.
 *
 * A client is immutable. Every `with*` method returns a new client, so one
 * configured instance can be shared freely.
 */

import { ApiErrorSchema, ListResponseSchema } from './types.js';
import type { ApiError, Bug } from './types.js';
import {
  ANONYMOUS,
  DEFAULT_FIELDS,
  DEFAULT_PAGINATION,
  type AuthMode,
  type PaginationMode,
} from '../types/session.js';
import { debug } from '../logging.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export type BugzillaErrorKind =
  | 'configuration'
  | 'transport'
  | 'api'
  | 'deserialization'
  | 'not_found';

export class BugzillaClientError extends Error {
  public readonly statusCode: number | undefined;
  public readonly bugzillaCode: number | undefined;

  constructor(
    message: string,
    public readonly kind: BugzillaErrorKind,
    details: { statusCode?: number; bugzillaCode?: number; cause?: unknown } = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'BugzillaClientError';
    this.statusCode = details.statusCode;
    this.bugzillaCode = details.bugzillaCode;
  }
}

interface ClientOptions {
  host: string;
  baseUrl: string;
  auth: AuthMode;
  pagination: PaginationMode;
  fields: readonly string[];
  timeoutMs: number;
}

export class BugzillaClient {
  private constructor(private readonly options: ClientOptions) {}

  /**
   * Create a client bound to `host` (e.g. `https://bugzilla.example.com`):
   * anonymous, server-default pagination, `_default` fields.
   */
  static create(host: string): BugzillaClient {
    let url: URL;
    try {
      url = new URL(host);
    } catch (error) {
      throw new BugzillaClientError(`Invalid Bugzilla host: ${host}`, 'configuration', {
        cause: error,
      });
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new BugzillaClientError(
        `Invalid Bugzilla host: ${host} (expected an http or https URL)`,
        'configuration'
      );
    }

    return new BugzillaClient({
      host,
      baseUrl: host.replace(/\/+$/, ''),
      auth: ANONYMOUS,
      pagination: DEFAULT_PAGINATION,
      fields: DEFAULT_FIELDS,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
  }

  get host(): string {
    return this.options.host;
  }

  get auth(): AuthMode {
    return this.options.auth;
  }

  get pagination(): PaginationMode {
    return this.options.pagination;
  }

  get fields(): readonly string[] {
    return this.options.fields;
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  // ─── Configuration ─────────────────────────────────────

  /**
   * Use `auth` for every request. An API key is sent as
   * `Authorization: Bearer <key>`.
   */
  withAuth(auth: AuthMode): BugzillaClient {
    if (auth.type === 'api-key') {
      try {
        new Headers({ Authorization: bearer(auth.apiKey) });
      } catch (error) {
        throw new BugzillaClientError(
          'API key cannot be sent in an Authorization header',
          'configuration',
          { cause: error }
        );
      }
    }
    return new BugzillaClient({ ...this.options, auth });
  }

  withPagination(pagination: PaginationMode): BugzillaClient {
    return new BugzillaClient({ ...this.options, pagination });
  }

  /**
   * Replace the requested field set. Not additive: include `_default`
   * explicitly to keep the default fields. An empty list omits
   * `include_fields`, so the server picks.
   */
  withFields(fields: readonly string[]): BugzillaClient {
    return new BugzillaClient({ ...this.options, fields: [...fields] });
  }

  withTimeout(timeoutMs: number): BugzillaClient {
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new BugzillaClientError(
        `Timeout must be a positive number of milliseconds, got ${timeoutMs}`,
        'configuration'
      );
    }
    return new BugzillaClient({ ...this.options, timeoutMs });
  }

  // ─── Queries ────────────────────────────────────────────

  /**
   * Path of the query for `ids`, relative to the host:
   * `rest/bug?id=<ids>[&include_fields=<fields>][&limit=<n>]`.
   * Each id and field name is percent-encoded; the separating commas are not.
   */
  bugQueryPath(ids: readonly string[]): string {
    const idList = ids.map((id) => encodeURIComponent(id)).join(',');
    return `rest/bug?id=${idList}${fieldsQuery(this.options.fields)}${paginationQuery(this.options.pagination)}`;
  }

  /**
   * Fetch several bugs by ID. Fewer bugs than IDs (or none) is not an
   * error; compare the result against `ids` if every bug must be present.
   */
  async getBugs(ids: readonly string[]): Promise<Bug[]> {
    if (ids.length === 0) return [];

    const path = this.bugQueryPath(ids);
    const body = await this.get(path);

    const apiError = ApiErrorSchema.safeParse(body);
    if (apiError.success) {
      throw new BugzillaClientError(describeApiError(apiError.data, path), 'api', {
        bugzillaCode: apiError.data.code,
      });
    }

    const result = ListResponseSchema.safeParse(body);
    if (!result.success) {
      throw new BugzillaClientError(
        `Unexpected Bugzilla response for ${path}: ${result.error.message}`,
        'deserialization',
        { cause: result.error }
      );
    }

    debug(
      `${path}: ${result.data.bugs.length} bug(s), ${result.data.total_matches} total match(es)`,
      result.data
    );
    return result.data.bugs;
  }

  /**
   * Fetch one bug by ID (or alias).
   * Throws a `not_found` error when the server returns no bug.
   */
  async getBug(id: string): Promise<Bug> {
    const [bug] = await this.getBugs([id]);
    if (!bug) {
      throw new BugzillaClientError(`Bug ${id} not found`, 'not_found');
    }
    return bug;
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async get(path: string): Promise<unknown> {
    const url = `${this.options.baseUrl}/${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.options.auth.type === 'api-key') {
      headers['Authorization'] = bearer(this.options.auth.apiKey);
    }

    debug(`GET ${url}`);

    try {
      let response: Response;
      try {
        response = await fetch(url, { method: 'GET', headers, signal: controller.signal });
      } catch (error) {
        const reason = controller.signal.aborted
          ? `timed out after ${this.options.timeoutMs}ms`
          : describeCause(error);
        throw new BugzillaClientError(`Bugzilla request failed for ${path}: ${reason}`, 'transport', {
          cause: error,
        });
      }

      if (!response.ok) {
        const envelope = await readErrorEnvelope(response);
        const detail = envelope ? ` (${envelope.code}: ${envelope.message})` : '';
        throw new BugzillaClientError(
          `Bugzilla API error: ${response.status} ${response.statusText} for ${path}${detail}`,
          'transport',
          { statusCode: response.status, bugzillaCode: envelope?.code }
        );
      }

      try {
        const body: unknown = await response.json();
        return body;
      } catch (error) {
        if (error instanceof SyntaxError) {
          throw new BugzillaClientError(
            `Bugzilla response for ${path} is not valid JSON`,
            'deserialization',
            { statusCode: response.status, cause: error }
          );
        }
        throw new BugzillaClientError(
          `Bugzilla response for ${path} could not be read: ${describeCause(error)}`,
          'transport',
          { statusCode: response.status, cause: error }
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}

// ─── Query Fragments ──────────────────────────────────────

/** `&include_fields=a,b`, or nothing for an empty list. */
export function fieldsQuery(fields: readonly string[]): string {
  if (fields.length === 0) return '';
  return `&include_fields=${fields.map((field) => encodeURIComponent(field)).join(',')}`;
}

/** `&limit=<n>`, `&limit=0` for unlimited, nothing for the server default. */
export function paginationQuery(pagination: PaginationMode): string {
  switch (pagination.type) {
    case 'default':
      return '';
    case 'limit':
      return `&limit=${pagination.limit}`;
    case 'unlimited':
      return '&limit=0';
  }
}

// ─── Helpers ──────────────────────────────────────────────

function bearer(apiKey: string): string {
  return `Bearer ${apiKey}`;
}

function describeApiError(error: ApiError, path: string): string {
  return `Bugzilla error ${error.code} for ${path}: ${error.message}`;
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readErrorEnvelope(response: Response): Promise<ApiError | undefined> {
  try {
    const result = ApiErrorSchema.safeParse(await response.json());
    return result.success ? result.data : undefined;
  } catch {
    // Error pages are often HTML; the status line is reported either way.
    return undefined;
  }
}
