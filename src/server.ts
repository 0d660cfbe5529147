#!/usr/bin/env node

/**
 * Bugzilla MCP Server
 *
 * Exposes read-only bug lookups over stdio.
 *
 * Tools:
 *   get_bug   Fetch one bug by ID or alias
 *   get_bugs  Fetch several bugs in one request
 *
 * Credentials come from BUGZILLA_HOST / BUGZILLA_API_KEY or
 * ~/.bugzilla-client/credentials.json, resolved on every call.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { resolveBugzillaCredentials } from './config/credentials.js';
import { createBugzillaClient } from './clients/factory.js';
import type { BugzillaClient } from './clients/bugzilla-client.js';
import { BUG_TOOLS, callBugTool } from './tools/bug-tools.js';
import { debug, log } from './logging.js';

const VERSION = '0.3.0';

const SERVER_INSTRUCTIONS = `Bugzilla lookup server. Reads bugs from the configured Bugzilla instance.

Use these tools when the user mentions a Bugzilla bug number, alias or show_bug.cgi link:
- One bug → get_bug
- Several bugs, dependency or blocker lists → get_bugs`;

const server = new Server(
  { name: 'bugzilla', version: VERSION },
  {
    capabilities: { tools: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

function requireClient(): BugzillaClient {
  const credentials = resolveBugzillaCredentials();
  if (!credentials) {
    throw new Error(
      'No Bugzilla host configured. Set BUGZILLA_HOST (and BUGZILLA_API_KEY for private bugs) or run "bugzilla auth login".'
    );
  }
  debug(`Using ${credentials.host} (credentials from ${credentials.source})`);
  return createBugzillaClient(credentials);
}

// ─── Tools ───────────────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, () => {
  return { tools: BUG_TOOLS };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return callBugTool(name, args, requireClient);
});

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log(`MCP server v${VERSION} started`);
}

main().catch((error) => {
  log('Fatal error:', error);
  process.exit(1);
});
