/**
 * Bugzilla API Response Types
 *
 * Shapes returned by the Bugzilla v1 REST API, with the zod schemas that
 * validate them. Every record keeps the keys it does not name in `extra`,
 * so fields added by the server (or custom fields of an instance) survive
 * validation.
 *
 * API documentation:
 * https://bugzilla.readthedocs.io/en/latest/api/core/v1/bug.html
 */

import { z } from 'zod';

/** Keys of a JSON object that no named field claims. */
export type ExtraFields = Record<string, unknown>;

// ─── Records ─────────────────────────────────────────────────

export interface User {
  email: string;
  id: number;
  name: string;
  real_name: string;
  extra: ExtraFields;
}

/** A review or approval flag. Only returned when `flags` is requested. */
export interface Flag {
  id: number;
  type_id: number;
  creation_date: string;
  modification_date: string;
  name: string;
  /** `+`, `-`, `?` or `X` */
  status: string;
  setter: string;
  requestee?: string | null;
  extra: ExtraFields;
}

export interface Bug {
  op_sys: string;
  classification: string;
  id: number;
  url: string;
  creator: string;
  creator_detail: User;
  summary: string;
  status: string;
  estimated_time: number;
  target_milestone: string;
  /** Parallel to `cc_detail`. */
  cc: string[];
  cc_detail: User[];
  is_open: boolean;
  is_creator_accessible: boolean;
  docs_contact: string;
  docs_contact_detail?: User | null;
  assigned_to: string;
  assigned_to_detail: User;
  resolution: string;
  severity: string;
  product: string;
  platform: string;
  last_change_time: string;
  remaining_time: number;
  priority: string;
  whiteboard: string;
  creation_time: string;
  is_confirmed: boolean;
  qa_contact: string;
  qa_contact_detail?: User | null;
  dupe_of?: number | null;
  target_release: string[];
  actual_time: number;
  component: string[];
  is_cc_accessible: boolean;
  version: string[];
  keywords: string[];
  depends_on: number[];
  blocks: number[];
  see_also: string[];
  groups: string[];
  deadline?: string | null;
  update_token?: string | null;
  work_time?: number | null;
  // Not part of the `_default` field set:
  flags?: Flag[] | null;
  tags?: string[] | null;
  dependent_products?: string[] | null;
  extra: ExtraFields;
}

/** Envelope of `GET /rest/bug`. */
export interface ListResponse {
  offset: number;
  /** Textual on the wire, e.g. `"20"`. */
  limit: string;
  total_matches: number;
  bugs: Bug[];
  extra: ExtraFields;
}

/** Envelope Bugzilla returns instead of a result when a call fails. */
export interface ApiError {
  error: true;
  message: string;
  code: number;
  extra: ExtraFields;
}

// ─── Schemas ─────────────────────────────────────────────────

/**
 * Object schema that accepts unknown keys and moves them into `extra`.
 */
function withExtraFields<T extends z.ZodRawShape>(shape: T) {
  const known = new Set(Object.keys(shape));
  return z
    .object(shape)
    .passthrough()
    .transform((value) => {
      const fields = { ...value };
      const bag: Record<string, unknown> = fields;
      const extra: ExtraFields = {};
      for (const key of Object.keys(bag)) {
        if (!known.has(key)) {
          extra[key] = bag[key];
          delete bag[key];
        }
      }
      return Object.assign(fields, { extra });
    });
}

export const UserSchema: z.ZodType<User, z.ZodTypeDef, unknown> = withExtraFields({
  email: z.string(),
  id: z.number().int(),
  name: z.string(),
  real_name: z.string(),
});

export const FlagSchema: z.ZodType<Flag, z.ZodTypeDef, unknown> = withExtraFields({
  id: z.number().int(),
  type_id: z.number().int(),
  creation_date: z.string(),
  modification_date: z.string(),
  name: z.string(),
  status: z.string(),
  setter: z.string(),
  requestee: z.string().nullish(),
});

export const BugSchema: z.ZodType<Bug, z.ZodTypeDef, unknown> = withExtraFields({
  op_sys: z.string(),
  classification: z.string(),
  id: z.number().int().positive(),
  url: z.string(),
  creator: z.string(),
  creator_detail: UserSchema,
  summary: z.string(),
  status: z.string(),
  estimated_time: z.number(),
  target_milestone: z.string(),
  cc: z.array(z.string()),
  cc_detail: z.array(UserSchema),
  is_open: z.boolean(),
  is_creator_accessible: z.boolean(),
  docs_contact: z.string(),
  docs_contact_detail: UserSchema.nullish(),
  assigned_to: z.string(),
  assigned_to_detail: UserSchema,
  resolution: z.string(),
  severity: z.string(),
  product: z.string(),
  platform: z.string(),
  last_change_time: z.string(),
  remaining_time: z.number(),
  priority: z.string(),
  whiteboard: z.string(),
  creation_time: z.string(),
  is_confirmed: z.boolean(),
  qa_contact: z.string(),
  qa_contact_detail: UserSchema.nullish(),
  dupe_of: z.number().int().nullish(),
  target_release: z.array(z.string()),
  actual_time: z.number(),
  component: z.array(z.string()),
  is_cc_accessible: z.boolean(),
  version: z.array(z.string()),
  keywords: z.array(z.string()),
  depends_on: z.array(z.number().int()),
  blocks: z.array(z.number().int()),
  see_also: z.array(z.string()),
  groups: z.array(z.string()),
  deadline: z.string().nullish(),
  update_token: z.string().nullish(),
  work_time: z.number().nullish(),
  flags: z.array(FlagSchema).nullish(),
  tags: z.array(z.string()).nullish(),
  dependent_products: z.array(z.string()).nullish(),
}).superRefine((bug, ctx) => {
  if (bug.cc.length !== bug.cc_detail.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['cc_detail'],
      message: `cc has ${bug.cc.length} entries but cc_detail has ${bug.cc_detail.length}`,
    });
  }
});

const BugListSchema = z.array(BugSchema).superRefine((bugs, ctx) => {
  const seen = new Set<number>();
  bugs.forEach((bug, index) => {
    if (seen.has(bug.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate bug id ${bug.id}`,
      });
    }
    seen.add(bug.id);
  });
});

export const ListResponseSchema: z.ZodType<ListResponse, z.ZodTypeDef, unknown> =
  withExtraFields({
    offset: z.number().int(),
    limit: z.string(),
    total_matches: z.number().int(),
    bugs: BugListSchema,
  });

export const ApiErrorSchema: z.ZodType<ApiError, z.ZodTypeDef, unknown> = withExtraFields({
  error: z.literal(true),
  message: z.string(),
  code: z.number().int(),
});
