/**
 * Credentials Resolver
 *
 * Resolves the Bugzilla host and API key in order:
 * 1. Environment variables (BUGZILLA_HOST, optionally BUGZILLA_API_KEY)
 * 2. ~/.bugzilla-client/credentials.json
 * 3. Returns null if neither found
 *
 * A host without an API key means anonymous access.
 * Credentials file is stored with 600 permissions (owner read/write only).
 */

import { readFileSync, writeFileSync, existsSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import type { BugzillaCredentials, CredentialsConfig, ResolvedCredentials } from './types.js';
import { ensureConfigDir, credentialsPath } from './paths.js';
import { log } from '../logging.js';

// ─── Zod Schema ──────────────────────────────────────────────

const CredentialsSchema = z.object({
  bugzilla: z
    .object({
      host: z.string().url(),
      apiKey: z.string().min(1).optional(),
    })
    .optional(),
});

// ─── Environment Variable Names ──────────────────────────────

const ENV_BUGZILLA_HOST = 'BUGZILLA_HOST';
const ENV_BUGZILLA_API_KEY = 'BUGZILLA_API_KEY';

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve Bugzilla credentials.
 * Checks env vars first, then credentials file.
 */
export function resolveBugzillaCredentials(): ResolvedCredentials | null {
  // 1. Environment variables
  const envHost = process.env[ENV_BUGZILLA_HOST];
  if (envHost) {
    const envKey = process.env[ENV_BUGZILLA_API_KEY];
    return envKey
      ? { host: envHost, apiKey: envKey, source: 'env' }
      : { host: envHost, source: 'env' };
  }

  // 2. Credentials file
  const fileConfig = readCredentialsFile();
  if (fileConfig?.bugzilla?.host) {
    return { ...fileConfig.bugzilla, source: 'file' };
  }

  return null;
}

// ─── File Operations ─────────────────────────────────────────

/**
 * Read credentials from ~/.bugzilla-client/credentials.json.
 * Returns null if the file doesn't exist, isn't JSON, or fails validation,
 * so login can still overwrite a corrupt file.
 */
function readCredentialsFile(): CredentialsConfig | null {
  const filePath = credentialsPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log(`Ignoring ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
  const result = CredentialsSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return result.data;
}

/**
 * Write credentials to ~/.bugzilla-client/credentials.json with 600 permissions.
 */
export function writeCredentials(config: CredentialsConfig): void {
  ensureConfigDir();
  const filePath = credentialsPath();
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  chmodSync(filePath, 0o600);
}

/**
 * Store Bugzilla credentials, replacing any previously stored ones.
 */
export function saveBugzillaCredentials(credentials: BugzillaCredentials): void {
  const existing = readCredentialsFile() ?? {};
  writeCredentials({ ...existing, bugzilla: credentials });
}

/**
 * Remove stored Bugzilla credentials. Returns false if none were stored.
 */
export function clearBugzillaCredentials(): boolean {
  const existing = readCredentialsFile();
  if (!existing?.bugzilla) {
    return false;
  }
  writeCredentials({ ...existing, bugzilla: undefined });
  return true;
}
