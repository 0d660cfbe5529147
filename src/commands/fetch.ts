/**
 * bugzilla bug / bugs — Bug Lookup Commands
 *
 * Host and API key come from --host / --api-key, falling back to the
 * resolved credentials (environment, then credentials file).
 */

import { resolveBugzillaCredentials } from '../config/credentials.js';
import { createBugzillaClient } from '../clients/factory.js';
import type { BugzillaClient } from '../clients/bugzilla-client.js';
import { formatBug, formatBugList } from '../generators/bug-report.js';
import { limitPagination, UNLIMITED } from '../types/session.js';
import { parseWholeNumber, splitFields, splitIds } from './args.js';
import { debug } from '../logging.js';

// ─── Commands ───────────────────────────────────────────────

export async function runBug(positionals: string[], flags: Record<string, string>): Promise<string> {
  const [id, ...rest] = splitIds(positionals);
  if (id === undefined || rest.length > 0) {
    throw new Error('Usage: bugzilla bug <id>');
  }

  const client = configureQuery(resolveClient(flags), flags);
  const bug = await client.getBug(id);

  if (flags['json'] !== undefined) {
    return JSON.stringify(bug, null, 2);
  }
  return formatBug(bug, { host: client.host });
}

export async function runBugs(positionals: string[], flags: Record<string, string>): Promise<string> {
  const ids = splitIds(positionals);
  if (ids.length === 0) {
    throw new Error('Usage: bugzilla bugs <id> [<id>...]');
  }

  const client = configureQuery(resolveClient(flags), flags);
  const bugs = await client.getBugs(ids);

  if (flags['json'] !== undefined) {
    return JSON.stringify(bugs, null, 2);
  }
  return formatBugList(bugs, ids, { host: client.host });
}

// ─── Helpers ────────────────────────────────────────────────

/**
 * Build the client from flags and stored credentials. A stored API key
 * is only used for the host it was stored with.
 */
export function resolveClient(flags: Record<string, string>): BugzillaClient {
  const stored = resolveBugzillaCredentials();
  const host = flags['host'] || stored?.host;
  if (!host) {
    throw new Error(
      'No Bugzilla host. Pass --host, set BUGZILLA_HOST, or run "bugzilla auth login".'
    );
  }

  const apiKey = flags['api-key'] || (stored && stored.host === host ? stored.apiKey : undefined);
  debug(`Using ${host} (${apiKey ? 'API key' : 'anonymous'})`);

  const client = createBugzillaClient(apiKey ? { host, apiKey } : { host });
  const timeout = flags['timeout'];
  return timeout ? client.withTimeout(parseWholeNumber(timeout, 'timeout')) : client;
}

function configureQuery(client: BugzillaClient, flags: Record<string, string>): BugzillaClient {
  let configured = client;

  const fields = flags['fields'];
  if (fields !== undefined) {
    configured = configured.withFields(splitFields(fields));
  }

  const limit = flags['limit'];
  if (flags['unlimited'] !== undefined) {
    if (limit !== undefined) {
      throw new Error('--limit and --unlimited cannot be combined');
    }
    configured = configured.withPagination(UNLIMITED);
  } else if (limit !== undefined) {
    configured = configured.withPagination(limitPagination(parseWholeNumber(limit, 'limit')));
  }

  return configured;
}
