import fs from 'node:fs';
import path from 'node:path';
import { InputValidationError, childLogger } from '@docquery/core';

const log = childLogger('schema');

const ARRAY_MARKER = /\barray\b|\blist of\b|\[\]/i;
// `name:` / `"name":` / `- name` / `* name`, with dotted paths allowed
const DECLARED_NAME = /(?:^|[\s{,(])"?([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*)"?\s*:|^\s*[-*]\s+"?([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*)/g;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const NOT_A_FIELD = new Set(['array', 'list', 'object', 'string', 'number', 'type']);

function scanArrayFields(text: string): ReadonlySet<string> {
  const found = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    if (!ARRAY_MARKER.test(line)) continue;
    for (const m of line.matchAll(DECLARED_NAME)) {
      const name = m[1] ?? m[2];
      if (!name || NOT_A_FIELD.has(name.toLowerCase())) continue;
      found.add(name);
      // nested paths also mark their last segment, e.g. `application.tags`
      const last = name.split('.').pop();
      if (last && last !== name) found.add(last);
    }
  }
  return found;
}

/**
 * Immutable holder of the caller-supplied schema description. The text is
 * free-form (markdown, YAML-ish or JSON), so the helpers here are lexical.
 */
export class SchemaContext {
  readonly text: string;
  readonly source?: string;
  private readonly arrays: ReadonlySet<string>;

  constructor(text: string, source?: string) {
    this.text = text;
    this.source = source;
    this.arrays = scanArrayFields(text);
    Object.freeze(this);
  }

  get length(): number {
    return this.text.length;
  }

  isEmpty(): boolean {
    return this.text.trim().length === 0;
  }

  /** Whole-word match; dotted paths count as words. */
  mentions(name: string): boolean {
    if (!name) return false;
    return new RegExp(`(^|[^\\w$.])${escapeRegExp(name)}($|[^\\w$])`).test(this.text);
  }

  /** Identifiers declared on lines that describe an array or list. */
  arrayFields(): ReadonlySet<string> {
    return this.arrays;
  }
}

function findUp(filename: string, startDir = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function resolveSchemaPath(p: string, startDir = process.cwd()): string | null {
  if (path.isAbsolute(p)) return fs.existsSync(p) ? p : null;
  const direct = path.resolve(startDir, p);
  if (fs.existsSync(direct)) return direct;
  // bare file names are looked up the directory tree, like a config file
  return p.includes('/') || p.includes(path.sep) ? null : findUp(p, startDir);
}

export function loadSchemaContext(p: string, startDir = process.cwd()): SchemaContext {
  const resolved = resolveSchemaPath(p, startDir);
  if (!resolved) {
    throw new InputValidationError(`Schema file not found: ${p}`, { path: p });
  }
  const text = fs.readFileSync(resolved, 'utf-8');
  log.info({ path: resolved, length: text.length }, 'schema-loaded');
  return new SchemaContext(text, resolved);
}
