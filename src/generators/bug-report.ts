/**
 * Bug Report Generator
 *
 * Renders fetched bugs as Markdown for the CLI and the MCP tools.
 * All functions are synchronous — no I/O, no API calls.
 */

import type { Bug, Flag, User } from '../clients/types.js';

interface FormatOptions {
  /** Host the bugs came from; adds a `show_bug.cgi` link when set. */
  host?: string;
}

function formatUser(login: string, detail: User | null | undefined): string {
  if (detail?.real_name) {
    return `${detail.real_name} (${detail.email})`;
  }
  return login;
}

function formatFlag(flag: Flag): string {
  return flag.requestee ? `${flag.name}${flag.status}(${flag.requestee})` : `${flag.name}${flag.status}`;
}

function formatStatus(bug: Bug): string {
  const status = bug.resolution ? `${bug.status} ${bug.resolution}` : bug.status;
  return bug.dupe_of ? `${status} (duplicate of ${bug.dupe_of})` : status;
}

/**
 * Render one bug as a Markdown section.
 */
export function formatBug(bug: Bug, options: FormatOptions = {}): string {
  const parts: string[] = [];
  parts.push(`## Bug ${bug.id}: ${bug.summary}`);
  parts.push('');
  parts.push(`- **Status:** ${formatStatus(bug)}`);
  parts.push(`- **Product:** ${bug.product} / ${bug.component.join(', ')}`);
  parts.push(`- **Severity:** ${bug.severity} · **Priority:** ${bug.priority}`);
  parts.push(`- **Assignee:** ${formatUser(bug.assigned_to, bug.assigned_to_detail)}`);
  parts.push(`- **Created:** ${bug.creation_time} · **Updated:** ${bug.last_change_time}`);

  if (bug.depends_on.length > 0) {
    parts.push(`- **Depends on:** ${bug.depends_on.join(', ')}`);
  }
  if (bug.blocks.length > 0) {
    parts.push(`- **Blocks:** ${bug.blocks.join(', ')}`);
  }
  if (bug.keywords.length > 0) {
    parts.push(`- **Keywords:** ${bug.keywords.join(', ')}`);
  }
  if (bug.flags && bug.flags.length > 0) {
    parts.push(`- **Flags:** ${bug.flags.map(formatFlag).join(', ')}`);
  }

  const extraKeys = Object.keys(bug.extra).sort();
  if (extraKeys.length > 0) {
    parts.push(`- **Other fields:** ${extraKeys.join(', ')}`);
  }

  if (options.host) {
    parts.push(`- **Link:** ${options.host.replace(/\/+$/, '')}/show_bug.cgi?id=${bug.id}`);
  }

  return parts.join('\n');
}

/**
 * Render several bugs, noting requested IDs the server did not return.
 * Only numeric IDs are compared; aliases are never reported as missing.
 */
export function formatBugList(
  bugs: Bug[],
  requestedIds: readonly string[],
  options: FormatOptions = {}
): string {
  if (bugs.length === 0) {
    return 'No bugs found.';
  }

  const sections = bugs.map((bug) => formatBug(bug, options));

  const returned = new Set(bugs.map((bug) => String(bug.id)));
  const missing = requestedIds.filter((id) => /^\d+$/.test(id) && !returned.has(String(Number(id))));
  if (missing.length > 0) {
    sections.push(`Not returned: ${missing.join(', ')}`);
  }

  return sections.join('\n\n');
}
