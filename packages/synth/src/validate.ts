// packages/synth/src/validate.ts
// Advisory checks over a generated spec. Findings are returned as warnings;
// nothing here blocks execution.
import { errorMessage, type Document, type QuerySpec } from '@docquery/core';
import type { SchemaContext } from '@docquery/schema';

const WRITE_STAGES = ['$out', '$merge'] as const;

function isPlainObject(v: unknown): v is Document {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function stageBody(stage: Document, op: string): Document | undefined {
  const body = stage[op];
  return isPlainObject(body) ? body : undefined;
}

// Every `$size` operand inside an expression tree.
function collectSizeArgs(expr: unknown, out: unknown[] = []): unknown[] {
  if (Array.isArray(expr)) {
    for (const e of expr) collectSizeArgs(e, out);
  } else if (isPlainObject(expr)) {
    for (const [k, v] of Object.entries(expr)) {
      if (k === '$size') out.push(v);
      else collectSizeArgs(v, out);
    }
  }
  return out;
}

function lookupAliases(spec: QuerySpec): Set<string> {
  const aliases = new Set(spec.joins.map((j) => j.as).filter(Boolean));
  for (const stage of spec.aggregation) {
    const as = stageBody(stage, '$lookup')?.as;
    if (typeof as === 'string') aliases.add(as);
  }
  return aliases;
}

function checkSizeOperands(spec: QuerySpec, schema: SchemaContext | undefined, warnings: string[]): void {
  const aliases = lookupAliases(spec);
  const arrays = schema?.arrayFields();

  spec.aggregation.forEach((stage, i) => {
    const group = stageBody(stage, '$group');
    if (!group) return;
    for (const [field, acc] of Object.entries(group)) {
      if (field === '_id') continue;
      for (const arg of collectSizeArgs(acc)) {
        if (typeof arg !== 'string' || !arg.startsWith('$')) {
          warnings.push(`Stage ${i} ($group.${field}): $size operand ${JSON.stringify(arg)} is not a field path`);
          continue;
        }
        const path = arg.slice(1);
        const root = path.split('.')[0];
        if (aliases.has(root)) continue;
        if (arrays && (arrays.has(path) || arrays.has(root))) continue;
        warnings.push(
          `Stage ${i} ($group.${field}): $size on "${arg}" which is not a known array in ${spec.primary_collection}`
        );
      }
    }
  });
}

function checkLookups(spec: QuerySpec, warnings: string[]): void {
  const declared = new Set(spec.joins.map((j) => j.collection));
  spec.aggregation.forEach((stage, i) => {
    const lookup = stageBody(stage, '$lookup');
    if (!lookup) return;
    const from = lookup.from;
    if (typeof from !== 'string' || !declared.has(from)) {
      warnings.push(`Stage ${i} ($lookup): collection ${JSON.stringify(from)} is not listed in joins`);
    }
  });

  if (!spec.aggregation.length) return;
  const looked = new Set(
    spec.aggregation.map((s) => stageBody(s, '$lookup')?.from).filter((f): f is string => typeof f === 'string')
  );
  for (const j of spec.joins) {
    if (j.type === 'lookup' && !looked.has(j.collection)) {
      warnings.push(`Join to ${j.collection} has no matching $lookup stage`);
    }
  }
}

function checkSorts(spec: QuerySpec, warnings: string[]): void {
  if (!spec.aggregation.length && Object.keys(spec.sort).length === 0) {
    warnings.push('Empty sort clause; it will be omitted from the find');
  }
  spec.aggregation.forEach((stage, i) => {
    if ('$sort' in stage) {
      const sort = stage.$sort;
      if (!isPlainObject(sort) || Object.keys(sort).length === 0) {
        warnings.push(`Stage ${i} ($sort): empty sort specification is rejected by the store`);
      }
    }
  });
}

function checkWriteStages(spec: QuerySpec, warnings: string[]): void {
  spec.aggregation.forEach((stage, i) => {
    for (const op of WRITE_STAGES) {
      if (op in stage) warnings.push(`Stage ${i} (${op}): write stages are refused by the read-only store`);
    }
  });
}

export function validateQuerySpec(spec: QuerySpec, schema?: SchemaContext): string[] {
  const warnings: string[] = [];
  try {
    if (schema && spec.primary_collection && !schema.mentions(spec.primary_collection)) {
      warnings.push(`Primary collection ${spec.primary_collection} is not mentioned in the schema`);
    }
    checkSizeOperands(spec, schema, warnings);
    checkLookups(spec, warnings);
    checkSorts(spec, warnings);
    checkWriteStages(spec, warnings);
  } catch (e) {
    warnings.push(`Validation aborted: ${errorMessage(e)}`);
  }
  return warnings;
}
