import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';

vi.mock('../config/credentials.js', () => ({
  resolveBugzillaCredentials: vi.fn(() => null),
  saveBugzillaCredentials: vi.fn(),
  clearBugzillaCredentials: vi.fn(() => false),
}));

vi.mock('../config/paths.js', () => ({
  credentialsPath: vi.fn(() => '/mock/.bugzilla-client/credentials.json'),
  resolveConfigDir: vi.fn(() => '/mock/.bugzilla-client'),
}));

vi.mock('./prompt.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./prompt.js')>();
  return { ...actual, isInteractive: vi.fn(() => false) };
});

import { runAuthLogin, runAuthStatus, runAuthLogout } from './auth.js';
import {
  resolveBugzillaCredentials,
  saveBugzillaCredentials,
  clearBugzillaCredentials,
} from '../config/credentials.js';

const OK = '\x1b[32m[ok]\x1b[0m';
const INFO = '\x1b[2m[i]\x1b[0m';
const WARN = '\x1b[33m[!]\x1b[0m';

const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

describe('auth commands', () => {
  const savedHost = process.env['BUGZILLA_HOST'];

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(resolveBugzillaCredentials).mockReturnValue(null);
    vi.mocked(clearBugzillaCredentials).mockReturnValue(false);
    delete process.env['BUGZILLA_HOST'];
  });

  afterAll(() => {
    logSpy.mockRestore();
  });

  afterEach(() => {
    if (savedHost === undefined) {
      delete process.env['BUGZILLA_HOST'];
    } else {
      process.env['BUGZILLA_HOST'] = savedHost;
    }
  });

  function printed(): unknown[] {
    return logSpy.mock.calls.map((call) => call[0]);
  }

  describe('runAuthLogin', () => {
    it('stores host and API key', async () => {
      await runAuthLogin({ host: 'https://bugzilla.example.com', 'api-key': 'test-key' });

      expect(saveBugzillaCredentials).toHaveBeenCalledWith({
        host: 'https://bugzilla.example.com',
        apiKey: 'test-key',
      });
      expect(printed()).toContain(`${OK} Bugzilla: https://bugzilla.example.com (API key)`);
      expect(printed()).toContain(`${INFO} Saved to /mock/.bugzilla-client/credentials.json`);
    });

    it('stores anonymous access when no key is given', async () => {
      await runAuthLogin({ host: 'https://bugzilla.example.com', 'api-key': '' });

      expect(saveBugzillaCredentials).toHaveBeenCalledWith({ host: 'https://bugzilla.example.com' });
      expect(printed()).toContain(`${OK} Bugzilla: https://bugzilla.example.com (anonymous access)`);
    });

    it('rejects an invalid host without saving', async () => {
      await expect(runAuthLogin({ host: 'bugzilla' })).rejects.toThrow(
        'Invalid Bugzilla host: bugzilla'
      );
      expect(saveBugzillaCredentials).not.toHaveBeenCalled();
    });

    it('requires --host when not interactive', async () => {
      await expect(runAuthLogin({})).rejects.toThrow(
        '--host is required when not running interactively'
      );
    });

    it('warns when BUGZILLA_HOST overrides stored credentials', async () => {
      process.env['BUGZILLA_HOST'] = 'https://env.example.com';
      await runAuthLogin({ host: 'https://bugzilla.example.com' });
      expect(printed()).toContain(
        `${WARN} BUGZILLA_HOST is set and takes precedence over stored credentials`
      );
    });
  });

  describe('runAuthStatus', () => {
    it('reports missing configuration', () => {
      runAuthStatus();
      expect(printed()).toContain(
        `${WARN} Bugzilla: not configured. Run "bugzilla auth login" or set BUGZILLA_HOST.`
      );
    });

    it('reports the host, its source and whether a key is set', () => {
      vi.mocked(resolveBugzillaCredentials).mockReturnValue({
        host: 'https://bugzilla.example.com',
        apiKey: 'test-key',
        source: 'env',
      });

      runAuthStatus();

      expect(printed()).toContain(`${INFO} Config directory: /mock/.bugzilla-client`);
      expect(printed()).toContain(`${OK} Bugzilla: https://bugzilla.example.com (from environment)`);
      expect(printed()).toContain(`${INFO} API key: configured`);
      expect(printed().join('\n')).not.toContain('test-key');
    });
  });

  describe('runAuthLogout', () => {
    it('removes stored credentials', () => {
      vi.mocked(clearBugzillaCredentials).mockReturnValue(true);
      runAuthLogout();
      expect(printed()).toContain(`${OK} Bugzilla: stored credentials removed`);
    });

    it('reports when nothing was stored', () => {
      runAuthLogout();
      expect(printed()).toContain(`${INFO} Bugzilla: no stored credentials found`);
    });
  });
});
