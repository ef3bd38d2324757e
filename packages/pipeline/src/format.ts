// packages/pipeline/src/format.ts
import { Binary, ObjectId, UUID } from 'mongodb';
import {
  errorMessage,
  type FormatFailure, type FormatOutcome, type FormattedResponse, type QuerySpec, type Row
} from '@docquery/core';
import { collectionsInvolved } from './collections.js';

function hasBsonType(v: object): boolean {
  return '_bsontype' in v && typeof v._bsontype === 'string';
}

function isPlainObject(v: object): boolean {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

// Cycles throw unless `lenient`, which marks them and stringifies bigints so the result always serializes.
function walk(v: unknown, ancestors: Set<object>, lenient: boolean): unknown {
  if (v instanceof ObjectId) return v.toHexString();
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? String(v) : v.toISOString();
  if (typeof v === 'bigint') return lenient ? v.toString() : v;
  if (typeof v !== 'object' || v === null) return v;
  // Decimal128, Long, UUID, Timestamp and friends: their string form is the value.
  if (v instanceof Binary && !(v instanceof UUID)) return v.toString('base64');
  if (hasBsonType(v)) return String(v);
  if (!Array.isArray(v) && !isPlainObject(v)) return v;

  if (ancestors.has(v)) {
    if (lenient) return '[Circular]';
    throw new Error('Cannot format a cyclic structure');
  }
  ancestors.add(v);
  try {
    if (Array.isArray(v)) return v.map((x) => walk(x, ancestors, lenient));
    const out: Record<string, unknown> = {};
    for (const [k, x] of Object.entries(v)) out[k] = walk(x, ancestors, lenient);
    return out;
  } finally {
    ancestors.delete(v);
  }
}

/** Store-native values become strings; arrays and plain objects are copied, everything else kept. */
export function normalizeValue(v: unknown): unknown {
  return walk(v, new Set(), false);
}

/** Indented JSON for any outcome, including raw rows the formatter could not handle. */
export function toJsonText(value: unknown): string {
  return JSON.stringify(walk(value, new Set(), true), null, 2);
}

export interface FormatOptions {
  now?: () => Date;
}

export function isFormatFailure(o: FormatOutcome): o is FormatFailure {
  return 'error' in o;
}

export function formatResults(rows: Row[], spec: QuerySpec, opts: FormatOptions = {}): FormatOutcome {
  const now = opts.now ?? (() => new Date());
  try {
    const data = rows.map((r) => normalizeValue(r));
    const response: FormattedResponse = {
      query_info: {
        primary_collection: spec.primary_collection,
        query_type: spec.aggregation.length > 0 ? 'aggregation' : 'find',
        limit: spec.limit,
        joins: spec.joins,
        generated_query: spec
      },
      results: {
        total_count: data.length,
        data
      },
      summary: {
        execution_time: now().toISOString(),
        result_count: data.length,
        collections_involved: collectionsInvolved(spec)
      }
    };
    return response;
  } catch (e) {
    return { error: `Failed to format results: ${errorMessage(e)}`, raw_results: rows };
  }
}
