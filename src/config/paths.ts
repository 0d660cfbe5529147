/**
 * Where the CLI keeps its state: `$BUGZILLA_HOME`, else `~/.bugzilla-client`.
 * The directory is owner-only (700) since it holds API keys.
 */

import { mkdirSync, chmodSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

const HOME_ENV = 'BUGZILLA_HOME';
const DIR_NAME = '.bugzilla-client';
const CREDENTIALS_FILE = 'credentials.json';
const DIR_MODE = 0o700;

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env[HOME_ENV] || join(homedir(), DIR_NAME);
}

/** Create the config directory if needed, tighten its mode, and return it. */
export function ensureConfigDir(): string {
  const dir = resolveConfigDir();
  // mkdir's mode only applies to a directory it creates
  if (existsSync(dir)) {
    chmodSync(dir, DIR_MODE);
  } else {
    mkdirSync(dir, { recursive: true, mode: DIR_MODE });
  }
  return dir;
}

export function credentialsPath(): string {
  return join(resolveConfigDir(), CREDENTIALS_FILE);
}
