/**
 * Command-line argument parsing.
 *
 * `bugzilla <command> [subcommand] [positionals...] [--flag value] [--switch]`
 */

/** Flags that never take a value, so `--json 123` leaves 123 positional. */
const SWITCHES = new Set(['json', 'unlimited', 'help']);

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, string>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let start = 1;

  // Handle compound commands: "auth login" → "auth-login", "help bugs" → "help-bugs"
  if ((command === 'auth' || command === 'help') && args[1] && !args[1].startsWith('--')) {
    command = `${command}-${args[1]}`;
    start = 2;
  }

  const flags: Record<string, string> = {};
  const positionals: string[] = [];

  for (let i = start; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }

    const next = args[i + 1];
    if (!SWITCHES.has(body) && next !== undefined && !next.startsWith('--')) {
      flags[body] = next;
      i++;
    } else {
      flags[body] = '';
    }
  }

  return { command, positionals, flags };
}

/** Split `1,2 3` style positionals into individual IDs. */
export function splitIds(positionals: string[]): string[] {
  return positionals
    .flatMap((value) => value.split(','))
    .map((id) => id.trim())
    .filter(Boolean);
}

/** `--fields a,b` → `['a', 'b']`; `--fields ''` → `[]`. */
export function splitFields(value: string): string[] {
  return value
    .split(',')
    .map((field) => field.trim())
    .filter(Boolean);
}

export function parseWholeNumber(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`--${flag} must be a whole number, got "${value}"`);
  }
  return Number(value);
}
