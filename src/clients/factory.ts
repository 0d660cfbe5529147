import { BugzillaClient } from './bugzilla-client.js';
import { apiKeyAuth } from '../types/session.js';
import type { BugzillaCredentials } from '../config/types.js';

/**
 * Client for stored or environment credentials: API key auth when a key
 * is present, anonymous otherwise.
 */
export function createBugzillaClient(credentials: BugzillaCredentials): BugzillaClient {
  const client = BugzillaClient.create(credentials.host);
  return credentials.apiKey ? client.withAuth(apiKeyAuth(credentials.apiKey)) : client;
}
