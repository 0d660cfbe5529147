/**
 * Stderr logging. stdout belongs to CLI output and the MCP stdio transport.
 */

const PREFIX = '[bugzilla]';

export function isDebugEnabled(): boolean {
  const flag = process.env['BUGZILLA_DEBUG'];
  return flag !== undefined && flag !== '' && flag !== '0';
}

/** Log only when BUGZILLA_DEBUG is set. */
export function debug(message: string, ...details: unknown[]): void {
  if (isDebugEnabled()) {
    console.error(`${PREFIX} ${message}`, ...details);
  }
}

export function log(message: string, ...details: unknown[]): void {
  console.error(`${PREFIX} ${message}`, ...details);
}
