/**
 * bugzilla auth — Credential Management Commands
 *
 * Subcommands:
 *   login   — Store a Bugzilla host and (optionally) an API key
 *   status  — Show which host and key will be used
 *   logout  — Remove stored credentials
 */

import {
  resolveBugzillaCredentials,
  saveBugzillaCredentials,
  clearBugzillaCredentials,
} from '../config/credentials.js';
import { credentialsPath, resolveConfigDir } from '../config/paths.js';
import { BugzillaClient } from '../clients/bugzilla-client.js';
import {
  createPrompt,
  isInteractive,
  ask,
  askSecret,
  printHeader,
  printSuccess,
  printWarning,
  printInfo,
} from './prompt.js';

// ─── Login ─────────────────────────────────────────────────

export async function runAuthLogin(flags: Record<string, string>): Promise<void> {
  printHeader('bugzilla auth login');

  let host = flags['host'] || undefined;
  let apiKey = flags['api-key'] || undefined;

  if (!host) {
    if (!isInteractive()) {
      throw new Error('--host is required when not running interactively');
    }
    const rl = createPrompt();
    try {
      host = await ask(rl, 'Bugzilla URL (e.g. https://bugzilla.example.com)', {
        required: true,
        validate: validateHost,
      });
      if (!apiKey) {
        apiKey = (await askSecret(rl, 'API key (leave empty for anonymous access)')) || undefined;
      }
    } finally {
      rl.close();
    }
  }

  const error = validateHost(host);
  if (error) {
    throw new Error(error);
  }

  saveBugzillaCredentials(apiKey ? { host, apiKey } : { host });
  printSuccess(`Bugzilla: ${host} (${apiKey ? 'API key' : 'anonymous access'})`);
  printInfo(`Saved to ${credentialsPath()}`);

  if (process.env['BUGZILLA_HOST']) {
    printWarning('BUGZILLA_HOST is set and takes precedence over stored credentials');
  }
}

// ─── Status ────────────────────────────────────────────────

export function runAuthStatus(): void {
  printHeader('bugzilla auth status');
  printInfo(`Config directory: ${resolveConfigDir()}`);

  const credentials = resolveBugzillaCredentials();
  if (!credentials) {
    printWarning('Bugzilla: not configured. Run "bugzilla auth login" or set BUGZILLA_HOST.');
    return;
  }

  const source = credentials.source === 'env' ? 'environment' : 'credentials file';
  printSuccess(`Bugzilla: ${credentials.host} (from ${source})`);
  printInfo(credentials.apiKey ? 'API key: configured' : 'API key: none (anonymous access)');
}

// ─── Logout ────────────────────────────────────────────────

export function runAuthLogout(): void {
  printHeader('bugzilla auth logout');

  if (clearBugzillaCredentials()) {
    printSuccess('Bugzilla: stored credentials removed');
  } else {
    printInfo('Bugzilla: no stored credentials found');
  }
}

// ─── Helpers ───────────────────────────────────────────────

function validateHost(value: string): string | null {
  try {
    BugzillaClient.create(value);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : 'Invalid Bugzilla host';
  }
}
