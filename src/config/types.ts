/**
 * Configuration Types
 *
 * Shape of the stored credentials. The Zod schema in credentials.ts
 * validates against these.
 */

/** Where to find Bugzilla, and the API key to use there (if any). */
export interface BugzillaCredentials {
  host: string;
  apiKey?: string;
}

/** How the resolved credentials were found. */
export type CredentialsSource = 'env' | 'file';

export interface ResolvedCredentials extends BugzillaCredentials {
  source: CredentialsSource;
}

/** Root credentials — stored in ~/.bugzilla-client/credentials.json */
export interface CredentialsConfig {
  bugzilla?: BugzillaCredentials;
}
