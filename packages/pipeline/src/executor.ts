// packages/pipeline/src/executor.ts
import {
  AggregationExecutionError, FindExecutionError, MissingCollectionError, StoreInitializationError,
  childLogger, errorMessage,
  type DocumentStore, type ExecutionPlan, type FindParams, type Logger, type QuerySpec, type Row
} from '@docquery/core';

function isEmpty(o: object): boolean {
  return Object.keys(o).length === 0;
}

/**
 * Picks the strategy for a spec: a non-empty aggregation means the pipeline
 * runs and filter/projection/sort are ignored; otherwise a plain find.
 */
export function toExecutionPlan(spec: QuerySpec): ExecutionPlan {
  if (spec.aggregation.length > 0) {
    return {
      kind: 'aggregate',
      collection: spec.primary_collection,
      pipeline: [...spec.aggregation, { $limit: spec.limit }],
      limit: spec.limit
    };
  }
  return {
    kind: 'find',
    collection: spec.primary_collection,
    filter: spec.filter,
    projection: spec.projection,
    sort: spec.sort,
    limit: spec.limit
  };
}

export function findParams(plan: Extract<ExecutionPlan, { kind: 'find' }>): FindParams {
  const params: FindParams = { filter: plan.filter, limit: plan.limit };
  if (!isEmpty(plan.projection)) params.projection = plan.projection;
  if (!isEmpty(plan.sort)) params.sort = plan.sort;
  return params;
}

export class QueryExecutor {
  private initPromise: Promise<void> | null = null;
  private readonly log: Logger;

  constructor(private readonly store: DocumentStore, logger?: Logger) {
    this.log = logger ?? childLogger('executor');
  }

  // Concurrent callers share one attempt; a failed attempt may be retried.
  async ensureInitialized(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.store.initialize().catch((e: unknown) => {
        this.initPromise = null;
        this.log.error({ err: errorMessage(e), store: this.store.name }, 'store-init-failed');
        throw new StoreInitializationError(e);
      });
    }
    return this.initPromise;
  }

  async execute(spec: QuerySpec): Promise<Row[]> {
    if (!spec.primary_collection.trim()) throw new MissingCollectionError();

    await this.ensureInitialized();
    const plan = toExecutionPlan(spec);
    try {
      await this.store.switchCollection(plan.collection);
    } catch (e) {
      this.log.error({ collection: plan.collection, err: errorMessage(e) }, 'switch-failed');
      throw plan.kind === 'aggregate'
        ? new AggregationExecutionError(plan.collection, e)
        : new FindExecutionError(plan.collection, e);
    }
    return this.executePlan(plan);
  }

  async executePlan(plan: ExecutionPlan): Promise<Row[]> {
    const t0 = Date.now();
    if (plan.kind === 'aggregate') {
      this.log.info({ collection: plan.collection, stages: plan.pipeline.length }, 'aggregate-start');
      try {
        const rows = await this.store.executeNativeQuery({
          operation: 'aggregate',
          collection: plan.collection,
          params: { pipeline: plan.pipeline }
        });
        this.log.info({ collection: plan.collection, rowCount: rows.length, ms: Date.now() - t0 }, 'aggregate-done');
        return rows;
      } catch (e) {
        this.log.error({ collection: plan.collection, err: errorMessage(e) }, 'aggregate-failed');
        throw new AggregationExecutionError(plan.collection, e);
      }
    }

    this.log.info({ collection: plan.collection, filter: plan.filter }, 'find-start');
    try {
      const rows = await this.store.executeNativeQuery({
        operation: 'find',
        collection: plan.collection,
        params: findParams(plan)
      });
      this.log.info({ collection: plan.collection, rowCount: rows.length, ms: Date.now() - t0 }, 'find-done');
      return rows;
    } catch (e) {
      this.log.error({ collection: plan.collection, err: errorMessage(e) }, 'find-failed');
      throw new FindExecutionError(plan.collection, e);
    }
  }
}
