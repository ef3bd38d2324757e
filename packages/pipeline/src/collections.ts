// packages/pipeline/src/collections.ts
import type { Document, QuerySpec } from '@docquery/core';

// Stage operator -> field naming the foreign collection.
const FOREIGN_COLLECTION_FIELDS: Record<string, string> = {
  $lookup: 'from',
  $graphLookup: 'from',
  $unionWith: 'coll'
};

function isPlainObject(v: unknown): v is Document {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function stageCollections(stage: Document): string[] {
  const out: string[] = [];
  for (const [op, field] of Object.entries(FOREIGN_COLLECTION_FIELDS)) {
    const body = stage[op];
    if (op === '$unionWith' && typeof body === 'string') {
      out.push(body);
    } else if (isPlainObject(body)) {
      const name = body[field];
      if (typeof name === 'string') out.push(name);
    }
  }
  return out;
}

/** Primary first, then joins, then pipeline references; first occurrence wins. */
export function collectionsInvolved(spec: QuerySpec): string[] {
  const seen = new Set<string>();
  const add = (name: string) => {
    if (name) seen.add(name);
  };

  add(spec.primary_collection);
  for (const j of spec.joins) add(j.collection);
  for (const stage of spec.aggregation) stageCollections(stage).forEach(add);
  return [...seen];
}
