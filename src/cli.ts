#!/usr/bin/env node

/**
 * Bugzilla CLI
 *
 * Look up bugs from the command line.
 *
 * Usage:
 *   bugzilla bug 123 [--fields _default,flags] [--json]
 *   bugzilla bugs 123 456 [--limit 50 | --unlimited] [--json]
 *   bugzilla auth login --host https://bugzilla.example.com [--api-key KEY]
 *   bugzilla auth status
 */

import { parseArgs } from './commands/args.js';
import { runBug, runBugs } from './commands/fetch.js';
import { runAuthLogin, runAuthStatus, runAuthLogout } from './commands/auth.js';
import { log } from './logging.js';

// ─── Help ───────────────────────────────────────────────────

const GLOBAL_OPTIONS = `  Connection options:
    --host <url>            Bugzilla URL (default: BUGZILLA_HOST or stored credentials)
    --api-key <key>         API key (default: BUGZILLA_API_KEY or stored credentials)
    --timeout <ms>          Request timeout in milliseconds (default: 30000)`;

const COMMAND_HELP: Record<string, string> = {
  bug: `bugzilla bug — Show One Bug

  Usage:
    bugzilla bug <id> [options]

  Options:
    --fields <a,b,...>      Fields to request. Replaces the default set;
                            include _default to keep it. Empty = server default.
    --json                  Print the bug as JSON

${GLOBAL_OPTIONS}

  Examples:
    bugzilla bug 123
    bugzilla bug 123 --fields _default,flags,tags`,

  bugs: `bugzilla bugs — Show Several Bugs

  Fetches all IDs in one request. IDs the server does not return are
  listed at the end; that is not an error.

  Usage:
    bugzilla bugs <id> [<id>...] [options]

  Options:
    --fields <a,b,...>      Fields to request (see "bugzilla help bug")
    --limit <n>             Maximum number of bugs in the response
    --unlimited             Lift the server's limit (sends limit=0)
    --json                  Print the bugs as JSON

${GLOBAL_OPTIONS}

  Examples:
    bugzilla bugs 123 456 789
    bugzilla bugs 123,456 --unlimited --json`,

  'auth-login': `bugzilla auth login — Store Credentials

  Saves the host and API key to ~/.bugzilla-client/credentials.json
  (permissions 600). Prompts for them when run without --host.

  Usage:
    bugzilla auth login [--host <url>] [--api-key <key>]

  Examples:
    bugzilla auth login --host https://bugzilla.example.com --api-key KEY`,

  'auth-status': `bugzilla auth status — Show Credential Status

  Usage:
    bugzilla auth status`,

  'auth-logout': `bugzilla auth logout — Remove Stored Credentials

  Usage:
    bugzilla auth logout`,
};

// Allow "help auth" → "auth-login"
COMMAND_HELP['auth'] = COMMAND_HELP['auth-login'] ?? '';

function showHelp(command?: string): string {
  if (command) {
    const help = COMMAND_HELP[command];
    if (help) return help;
  }

  return `bugzilla — Bugzilla REST client

  Usage:
    bugzilla <command> [options]

  Commands:
    bug <id>                Show one bug
    bugs <id>...            Show several bugs
    auth login              Store host and API key
    auth status             Show credential status
    auth logout             Remove stored credentials
    help [command]          Show help

  Run "bugzilla help <command>" for command options.`;
}

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, positionals, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'bug':
        output = await runBug(positionals, flags);
        break;
      case 'bugs':
        output = await runBugs(positionals, flags);
        break;
      case 'auth-login':
        await runAuthLogin(flags);
        return;
      case 'auth-status':
      case 'auth':
        runAuthStatus();
        return;
      case 'auth-logout':
        runAuthLogout();
        return;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
        process.exitCode = 1;
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error) => {
  log('Fatal error:', error);
  process.exit(1);
});
