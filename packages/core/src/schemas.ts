// packages/core/src/schemas.ts
import { z } from 'zod';

export const DEFAULT_LIMIT = 100;

// Model output often carries `null` where it means "nothing"; fold those into empties.
const DocumentSchema = z.record(z.unknown());
const DocOrEmpty = DocumentSchema.nullish().transform((v) => v ?? {});

export const SortValueSchema = z.union([z.number(), z.string(), DocumentSchema]);
const SortOrEmpty = z.record(SortValueSchema).nullish().transform((v) => v ?? {});

// The alias is asked for as `as`, but `alias` shows up often enough to accept both.
export const JoinSpecSchema = z
  .object({
    collection: z.string().min(1),
    type: z.enum(['lookup', 'match']).nullish().transform((v) => v ?? 'lookup'),
    local_field: z.string().nullish().transform((v) => v ?? ''),
    foreign_field: z.string().nullish().transform((v) => v ?? ''),
    as: z.string().optional(),
    alias: z.string().optional()
  })
  .transform((j) => ({
    collection: j.collection,
    type: j.type,
    local_field: j.local_field,
    foreign_field: j.foreign_field,
    as: j.as ?? j.alias ?? j.collection
  }));

export function querySpecSchema(defaultLimit: number = DEFAULT_LIMIT) {
  return z.object({
    primary_collection: z.string({
      required_error: 'primary_collection is required',
      invalid_type_error: 'primary_collection must be a string'
    }),
    filter: DocOrEmpty,
    projection: DocOrEmpty,
    sort: SortOrEmpty,
    limit: z.number().int().positive().nullish().transform((v) => v ?? defaultLimit),
    aggregation: z.array(DocumentSchema).nullish().transform((v) => v ?? []),
    joins: z.array(JoinSpecSchema).nullish().transform((v) => v ?? [])
  });
}

export const QuerySpecSchema = querySpecSchema();
export type ParsedQuerySpec = z.output<typeof QuerySpecSchema>;

// Issue list shaped the way HTTP validation errors are reported.
export function describeIssues(err: z.ZodError): Array<{ path: string; msg: string; code: string }> {
  return err.issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
}
