/**
 * Terminal I/O Utilities
 *
 * Wraps node:readline/promises for interactive CLI prompting.
 * Provides styled output helpers for consistent formatting.
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

// ─── Readline Factory ─────────────────────────────────────────

export function createPrompt(): Interface {
  return createInterface({ input: stdin, output: stdout });
}

export function isInteractive(): boolean {
  return stdin.isTTY === true;
}

// ─── Prompt Functions ─────────────────────────────────────────

export interface AskOptions {
  required?: boolean;
  validate?: (value: string) => string | null;
}

/**
 * Ask a question and return the trimmed answer.
 * Loops until a valid, non-empty answer is given when required.
 */
export async function ask(rl: Interface, question: string, opts: AskOptions = {}): Promise<string> {
  const { required = false, validate } = opts;

  for (;;) {
    const value = (await rl.question(`${question}: `)).trim();

    if (required && !value) {
      printWarning('This field is required. Please enter a value.');
      continue;
    }

    if (validate) {
      const error = validate(value);
      if (error) {
        printWarning(error);
        continue;
      }
    }

    return value;
  }
}

/**
 * Ask for a secret value (e.g., API key).
 * Masks input by switching to raw mode.
 */
export async function askSecret(rl: Interface, question: string): Promise<string> {
  if (!stdin.isTTY) {
    // Non-interactive: fall back to regular readline
    const answer = await rl.question(`${question}: `);
    return answer.trim();
  }

  return new Promise((resolve) => {
    stdout.write(`${question}: `);
    stdin.setRawMode(true);
    stdin.resume();

    let secret = '';

    const finish = () => {
      stdin.setRawMode(false);
      stdin.pause();
      stdin.removeListener('data', onData);
      stdout.write('\n');
    };

    const onData = (data: Buffer) => {
      const char = data.toString();

      if (char === '\n' || char === '\r' || char === '\u0004') {
        // Enter or Ctrl+D
        finish();
        resolve(secret.trim());
      } else if (char === '\u0003') {
        // Ctrl+C
        finish();
        rl.close();
        process.exit(0);
      } else if (char === '\u007F' || char === '\b') {
        // Backspace
        if (secret.length > 0) {
          secret = secret.slice(0, -1);
          stdout.write('\b \b');
        }
      } else if (char.charCodeAt(0) >= 32) {
        secret += char;
        stdout.write('*');
      }
    };

    stdin.on('data', onData);
  });
}

// ─── Styled Output ───────────────────────────────────────────

const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

export function printHeader(text: string): void {
  console.log(`\n${BOLD}${CYAN}${text}${RESET}`);
  console.log(`${DIM}${'─'.repeat(text.length)}${RESET}`);
}

export function printSuccess(text: string): void {
  console.log(`${GREEN}[ok]${RESET} ${text}`);
}

export function printWarning(text: string): void {
  console.log(`${YELLOW}[!]${RESET} ${text}`);
}

export function printInfo(text: string): void {
  console.log(`${DIM}[i]${RESET} ${text}`);
}
