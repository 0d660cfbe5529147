/**
 * Zod schemas for validating MCP tool arguments.
 *
 * Bug IDs may arrive as numbers or strings (aliases are strings);
 * both are normalized to strings for the client.
 */

import { z } from 'zod';

const BugIdSchema = z
  .union([z.string().trim().min(1), z.number().int().positive()])
  .transform((id) => String(id));

const FieldListSchema = z.array(z.string().trim().min(1));

export const GetBugArgsSchema = z.object({
  id: BugIdSchema,
  fields: FieldListSchema.optional(),
});

export const GetBugsArgsSchema = z
  .object({
    ids: z.array(BugIdSchema).min(1),
    fields: FieldListSchema.optional(),
    limit: z.number().int().positive().optional(),
    unlimited: z.boolean().optional(),
  })
  .refine((args) => !(args.limit !== undefined && args.unlimited), {
    message: 'limit and unlimited cannot be combined',
    path: ['limit'],
  });

export type GetBugArgs = z.infer<typeof GetBugArgsSchema>;
export type GetBugsArgs = z.infer<typeof GetBugsArgsSchema>;

/** One line per issue, e.g. `ids: Required`. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
