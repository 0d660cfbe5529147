/**
 * Read-only client for the Bugzilla REST API.
 *
 * @example
 * const client = BugzillaClient.create('https://bugzilla.example.com')
 *   .withAuth(apiKeyAuth(process.env.BUGZILLA_API_KEY ?? ''))
 *   .withFields(['_default', 'flags']);
 * const bug = await client.getBug('123');
 */

export {
  BugzillaClient,
  BugzillaClientError,
  fieldsQuery,
  paginationQuery,
  type BugzillaErrorKind,
} from './clients/bugzilla-client.js';
export { createBugzillaClient } from './clients/factory.js';
export {
  ApiErrorSchema,
  BugSchema,
  FlagSchema,
  ListResponseSchema,
  UserSchema,
  type ApiError,
  type Bug,
  type ExtraFields,
  type Flag,
  type ListResponse,
  type User,
} from './clients/types.js';
export {
  ANONYMOUS,
  DEFAULT_FIELDS,
  DEFAULT_PAGINATION,
  UNLIMITED,
  apiKeyAuth,
  limitPagination,
  type AuthMode,
  type PaginationMode,
} from './types/session.js';
export { resolveBugzillaCredentials } from './config/credentials.js';
export type { BugzillaCredentials, ResolvedCredentials } from './config/types.js';
export { formatBug, formatBugList } from './generators/bug-report.js';
