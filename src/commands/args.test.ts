import { describe, it, expect } from 'vitest';
import { parseArgs, parseWholeNumber, splitFields, splitIds } from './args.js';

function argv(...args: string[]): string[] {
  return ['node', 'bugzilla', ...args];
}

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs(argv())).toEqual({ command: 'help', positionals: [], flags: {} });
  });

  it('collects positionals and value flags', () => {
    expect(parseArgs(argv('bugs', '1', '2', '--limit', '10', '--fields', '_default,flags'))).toEqual({
      command: 'bugs',
      positionals: ['1', '2'],
      flags: { limit: '10', fields: '_default,flags' },
    });
  });

  it('does not let switches swallow the next argument', () => {
    expect(parseArgs(argv('bugs', '--json', '1', '--unlimited', '2'))).toEqual({
      command: 'bugs',
      positionals: ['1', '2'],
      flags: { json: '', unlimited: '' },
    });
  });

  it('accepts --flag=value, including an empty value', () => {
    expect(parseArgs(argv('bug', '5', '--fields=')).flags).toEqual({ fields: '' });
    expect(parseArgs(argv('bug', '5', '--host=https://bugzilla.example.com')).flags).toEqual({
      host: 'https://bugzilla.example.com',
    });
  });

  it('joins compound auth and help commands', () => {
    expect(parseArgs(argv('auth', 'login', '--host', 'https://bugzilla.example.com'))).toEqual({
      command: 'auth-login',
      positionals: [],
      flags: { host: 'https://bugzilla.example.com' },
    });
    expect(parseArgs(argv('help', 'bugs')).command).toBe('help-bugs');
  });

  it('treats a trailing value flag as empty', () => {
    expect(parseArgs(argv('bug', '1', '--api-key')).flags).toEqual({ 'api-key': '' });
  });
});

describe('splitIds', () => {
  it('splits commas and drops empty entries', () => {
    expect(splitIds(['1,2', ' 3 ', ',', 'alias-x'])).toEqual(['1', '2', '3', 'alias-x']);
  });
});

describe('splitFields', () => {
  it('returns an empty list for an empty value', () => {
    expect(splitFields('')).toEqual([]);
    expect(splitFields('_default, flags')).toEqual(['_default', 'flags']);
  });
});

describe('parseWholeNumber', () => {
  it('parses digits and rejects anything else', () => {
    expect(parseWholeNumber('25', 'limit')).toBe(25);
    expect(() => parseWholeNumber('-1', 'limit')).toThrow('--limit must be a whole number, got "-1"');
    expect(() => parseWholeNumber('1.5', 'timeout')).toThrow(
      '--timeout must be a whole number, got "1.5"'
    );
  });
});
