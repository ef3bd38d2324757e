/* tests/helpers.ts */
// In-process stand-ins for the model and the document store.
import type {
  DocumentStore, GenerateOptions, ModelClient, NativeQuery, QuerySpec, Row, StoreHealth
} from '@docquery/core';

export class StubModel implements ModelClient {
  name = 'stub';
  readonly prompts: string[] = [];
  readonly options: Array<GenerateOptions | undefined> = [];

  constructor(private readonly reply: string | ((prompt: string) => string | Promise<string>)) {}

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    return typeof this.reply === 'string' ? this.reply : this.reply(prompt);
  }
}

export class FailingModel implements ModelClient {
  name = 'failing';
  calls = 0;
  constructor(private readonly error: Error = new Error('provider unavailable')) {}
  async generate(): Promise<string> {
    this.calls++;
    throw this.error;
  }
}

export interface FakeStoreOptions {
  rows?: Row[] | ((query: NativeQuery) => Row[]);
  failWith?: Error;
  failInitWith?: Error;
  failSwitchWith?: Error;
  initDelayMs?: number;
}

export class FakeStore implements DocumentStore {
  name = 'fake';
  initCalls = 0;
  closed = false;
  readonly switches: string[] = [];
  readonly queries: NativeQuery[] = [];

  constructor(private readonly opts: FakeStoreOptions = {}) {}

  async initialize(): Promise<void> {
    this.initCalls++;
    if (this.opts.initDelayMs) await new Promise((r) => setTimeout(r, this.opts.initDelayMs));
    if (this.opts.failInitWith) throw this.opts.failInitWith;
  }

  async switchCollection(name: string): Promise<void> {
    this.switches.push(name);
    if (this.opts.failSwitchWith) throw this.opts.failSwitchWith;
  }

  async executeNativeQuery(query: NativeQuery): Promise<Row[]> {
    this.queries.push(query);
    if (this.opts.failWith) throw this.opts.failWith;
    const rows = this.opts.rows ?? [];
    return typeof rows === 'function' ? rows(query) : rows;
  }

  async health(): Promise<StoreHealth> {
    return this.opts.failInitWith ? { ok: false, error: this.opts.failInitWith.message } : { ok: true };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Total number of calls that reached the store. */
  get callCount(): number {
    return this.initCalls + this.switches.length + this.queries.length;
  }
}

export function makeSpec(overrides: Partial<QuerySpec> = {}): QuerySpec {
  return {
    primary_collection: 'application_snapshot',
    filter: {},
    projection: {},
    sort: {},
    limit: 10,
    aggregation: [],
    joins: [],
    ...overrides
  };
}

export const APP_SCHEMA = [
  'Collection: application_snapshot',
  '  - application.csiId: string',
  '  - application.criticality: string, one of High | Medium | Low (case-sensitive)',
  '  - application.level3: string',
  'Collection: employee_ratio',
  '  - csiId: string',
  '  - employeeRatioSnapshot: array of ratio entries',
  'Collection: management_segment_tree',
  '  - name: string',
  'Relationships:',
  '  application_snapshot.application.csiId -> employee_ratio.csiId',
  '  application_snapshot.application.level3 -> management_segment_tree.name'
].join('\n');
