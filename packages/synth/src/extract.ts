// packages/synth/src/extract.ts
// Pull one query specification out of free-form model text.
import {
  DEFAULT_LIMIT, MalformedQuerySpecError, NoQuerySpecFoundError, describeIssues, querySpecSchema,
  type Document, type QuerySpec
} from '@docquery/core';

export type ExtractionTier = 'bare' | 'fenced' | 'braces';

const FENCED_JSON = /```json\s*([\s\S]*?)```/i;

function isPlainObject(v: unknown): v is Document {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** JSON.parse that only accepts an object at the top level. */
export function parseJsonObject(text: string): Document | null {
  try {
    const v: unknown = JSON.parse(text);
    return isPlainObject(v) ? v : null;
  } catch {
    return null;
  }
}

/** Tries each tier in order and reports which one produced the object. */
export function locateJsonObject(raw: string): { value: Document; tier: ExtractionTier } | null {
  const bare = parseJsonObject(raw.trim());
  if (bare) return { value: bare, tier: 'bare' };

  const fenced = FENCED_JSON.exec(raw);
  if (fenced) {
    const value = parseJsonObject(fenced[1].trim());
    if (value) return { value, tier: 'fenced' };
  }

  const first = raw.indexOf('{');
  const last = raw.lastIndexOf('}');
  if (first !== -1 && last > first) {
    const value = parseJsonObject(raw.slice(first, last + 1));
    if (value) return { value, tier: 'braces' };
  }

  return null;
}

export interface ExtractOptions {
  defaultLimit?: number;
}

export function extractQuerySpec(raw: string, opts: ExtractOptions = {}): QuerySpec {
  const found = locateJsonObject(raw);
  if (!found) throw new NoQuerySpecFoundError(raw);

  if (!('primary_collection' in found.value)) {
    throw new MalformedQuerySpecError('primary_collection is required', raw);
  }

  const parsed = querySpecSchema(opts.defaultLimit ?? DEFAULT_LIMIT).safeParse(found.value);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    const reason = issues.map((i) => (i.path ? `${i.path}: ${i.msg}` : i.msg)).join('; ');
    throw new MalformedQuerySpecError(reason, raw, issues);
  }
  return parsed.data;
}
