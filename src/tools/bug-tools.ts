/**
 * MCP Bug Tools
 *
 * Tool definitions and handlers for `get_bug` and `get_bugs`. Handlers take
 * the client from a provider so credentials are resolved per call.
 */

import type { BugzillaClient } from '../clients/bugzilla-client.js';
import { formatBug, formatBugList } from '../generators/bug-report.js';
import { limitPagination, UNLIMITED } from '../types/session.js';
import { GetBugArgsSchema, GetBugsArgsSchema, describeIssues } from '../validators.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ClientProvider = () => BugzillaClient;

const FIELDS_PROPERTY = {
  type: 'array' as const,
  items: { type: 'string' as const },
  description:
    'Bugzilla fields to return (e.g. ["_default", "flags"]). Replaces the default set; include "_default" to keep it.',
};

export const BUG_TOOLS = [
  {
    name: 'get_bug',
    description:
      'Fetch a single Bugzilla bug by ID or alias. Returns status, product/component, assignee, relationships and any extra fields. Use when the user asks about "bug 123" or a Bugzilla link.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: {
          type: 'string' as const,
          description: 'Bug ID or alias',
        },
        fields: FIELDS_PROPERTY,
      },
      required: ['id'],
    },
  },
  {
    name: 'get_bugs',
    description:
      'Fetch several Bugzilla bugs by ID in one request. IDs the server does not return are listed at the end.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ids: {
          type: 'array' as const,
          items: { type: 'string' as const },
          description: 'Bug IDs or aliases',
        },
        fields: FIELDS_PROPERTY,
        limit: {
          type: 'number' as const,
          description: 'Maximum number of bugs to return (default: server limit)',
        },
        unlimited: {
          type: 'boolean' as const,
          description: 'Lift the server limit and return every match',
        },
      },
      required: ['ids'],
    },
  },
];

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

// ─── Handlers ────────────────────────────────────────────────

export async function handleGetBug(
  client: BugzillaClient,
  args: Record<string, unknown> | undefined
): Promise<ToolResult> {
  const parsed = GetBugArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid arguments for get_bug: ${describeIssues(parsed.error)}`);
  }

  const { id, fields } = parsed.data;
  const bug = await (fields ? client.withFields(fields) : client).getBug(id);
  return text(formatBug(bug, { host: client.host }));
}

export async function handleGetBugs(
  client: BugzillaClient,
  args: Record<string, unknown> | undefined
): Promise<ToolResult> {
  const parsed = GetBugsArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid arguments for get_bugs: ${describeIssues(parsed.error)}`);
  }

  const { ids, fields, limit, unlimited } = parsed.data;
  let configured = fields ? client.withFields(fields) : client;
  if (unlimited) {
    configured = configured.withPagination(UNLIMITED);
  } else if (limit !== undefined) {
    configured = configured.withPagination(limitPagination(limit));
  }

  const bugs = await configured.getBugs(ids);
  return text(formatBugList(bugs, ids, { host: client.host }));
}

/**
 * Dispatch a tool call. Failures become `isError` results rather than
 * protocol errors, so the model sees the message.
 */
export async function callBugTool(
  name: string,
  args: Record<string, unknown> | undefined,
  getClient: ClientProvider
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'get_bug':
        return await handleGetBug(getClient(), args);
      case 'get_bugs':
        return await handleGetBugs(getClient(), args);
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
}
