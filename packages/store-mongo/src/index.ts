// packages/store-mongo/src/index.ts
import { MongoClient, type Db, type Document as MongoDocument, type FindOptions, type SortDirection } from 'mongodb';
import {
  childLogger, errorMessage,
  type Document, type DocumentStore, type FindParams, type Logger, type NativeQuery, type Row, type SortValue,
  type StoreHealth
} from '@docquery/core';

export interface MongoStoreConfig {
  uri?: string;
  db?: string;
  serverSelectionTimeoutMS?: number;
}

const WRITE_STAGES = new Set(['$out', '$merge']);

// The store is read-only; generated pipelines must not write.
export function assertReadOnlyPipeline(pipeline: Document[]): void {
  pipeline.forEach((stage, i) => {
    for (const op of Object.keys(stage)) {
      if (WRITE_STAGES.has(op)) {
        throw new Error(`Write stage ${op} at position ${i} is not allowed on a read-only store`);
      }
    }
  });
}

function isEmpty(o: object | undefined): boolean {
  return !o || Object.keys(o).length === 0;
}

const SORT_WORDS = new Set(['asc', 'desc', 'ascending', 'descending']);

function toSortDirection(key: string, v: SortValue): SortDirection {
  if (typeof v === 'number') return v < 0 ? -1 : 1;
  if (typeof v === 'string') {
    const w = v.toLowerCase();
    if (w === 'asc' || w === 'ascending') return 1;
    if (SORT_WORDS.has(w)) return -1;
  } else if (typeof v.$meta === 'string') {
    return { $meta: v.$meta };
  }
  throw new Error(`Invalid sort direction for ${key}: ${JSON.stringify(v)}`);
}

export function toMongoSort(sort: Record<string, SortValue>): Record<string, SortDirection> {
  const out: Record<string, SortDirection> = {};
  for (const [key, v] of Object.entries(sort)) out[key] = toSortDirection(key, v);
  return out;
}

// The server rejects an empty sort, so absent and empty are treated alike.
export function buildFindOptions(params: FindParams): FindOptions {
  const opts: FindOptions = { limit: params.limit };
  if (params.projection && !isEmpty(params.projection)) opts.projection = params.projection;
  if (params.sort && !isEmpty(params.sort)) opts.sort = toMongoSort(params.sort);
  return opts;
}

export class MongoStore implements DocumentStore {
  name = 'mongodb' as const;
  private cli?: MongoClient;
  private db?: Db;
  private activeCollection?: string;
  private readonly uri: string;
  private readonly dbName: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(cfg: MongoStoreConfig = {}, logger?: Logger) {
    this.uri = cfg.uri ?? 'mongodb://127.0.0.1:27017';
    this.dbName = cfg.db ?? 'docquery';
    this.timeoutMs = cfg.serverSelectionTimeoutMS ?? 5000;
    this.log = logger ?? childLogger('store-mongo');
  }

  get currentCollection(): string | undefined {
    return this.activeCollection;
  }

  async initialize(): Promise<void> {
    // re-initializing replaces the current client
    if (this.cli) await this.close();

    const cli = await MongoClient.connect(this.uri, { serverSelectionTimeoutMS: this.timeoutMs });
    try {
      const db = cli.db(this.dbName);
      await db.command({ ping: 1 });
      const infos = await db.listCollections({}, { nameOnly: true }).toArray();
      this.cli = cli;
      this.db = db;
      this.log.info({ db: this.dbName, collections: infos.map((c) => c.name).sort() }, 'mongo-connected');
    } catch (e) {
      this.cli = undefined;
      this.db = undefined;
      await cli.close();
      throw e;
    }
  }

  private requireDb(): Db {
    if (!this.db) throw new Error('Mongo store is not initialized; call initialize() first');
    return this.db;
  }

  async listCollections(): Promise<string[]> {
    const infos = await this.requireDb().listCollections({}, { nameOnly: true }).toArray();
    return infos.map((c) => c.name).sort();
  }

  // Informational only: every native query names its collection explicitly.
  async switchCollection(name: string): Promise<void> {
    const known = await this.listCollections();
    if (!known.includes(name)) {
      this.log.warn({ collection: name, available: known }, 'collection-not-found');
    }
    this.activeCollection = name;
  }

  async executeNativeQuery(query: NativeQuery): Promise<Row[]> {
    const coll = this.requireDb().collection(query.collection);

    if (query.operation === 'aggregate') {
      assertReadOnlyPipeline(query.params.pipeline);
      const rows = await coll.aggregate(query.params.pipeline, { allowDiskUse: true }).toArray();
      this.log.debug({ collection: query.collection, rowCount: rows.length }, 'aggregate-done');
      return rows;
    }

    const filter: MongoDocument = query.params.filter;
    const rows = await coll.find(filter, buildFindOptions(query.params)).toArray();
    this.log.debug({ collection: query.collection, rowCount: rows.length }, 'find-done');
    return rows;
  }

  async health(): Promise<StoreHealth> {
    try {
      await this.requireDb().command({ ping: 1 });
      return { ok: true };
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
  }

  async close(): Promise<void> {
    await this.cli?.close();
    this.cli = undefined;
    this.db = undefined;
    this.activeCollection = undefined;
  }
}

export default MongoStore;
