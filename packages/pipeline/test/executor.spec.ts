import { describe, it, expect } from 'vitest';
import {
  AggregationExecutionError, FindExecutionError, MissingCollectionError, StoreInitializationError
} from '@docquery/core';
import { QueryExecutor, toExecutionPlan } from '../src/index.js';
import { FakeStore, makeSpec } from '../../../tests/helpers.js';

describe('toExecutionPlan', () => {
  it('chooses find when there is no aggregation', () => {
    const plan = toExecutionPlan(makeSpec({ filter: { a: 1 }, limit: 7 }));
    expect(plan).toEqual({
      kind: 'find', collection: 'application_snapshot', filter: { a: 1 }, projection: {}, sort: {}, limit: 7
    });
  });

  it('chooses aggregate and appends the limit stage without touching the spec', () => {
    const spec = makeSpec({ aggregation: [{ $match: { x: 1 } }], filter: { ignored: true }, limit: 4 });
    const plan = toExecutionPlan(spec);
    expect(plan).toEqual({
      kind: 'aggregate', collection: 'application_snapshot', pipeline: [{ $match: { x: 1 } }, { $limit: 4 }], limit: 4
    });
    expect(spec.aggregation).toEqual([{ $match: { x: 1 } }]);
  });
});

describe('QueryExecutor', () => {
  it('runs a find with filter and limit only when sort and projection are empty', async () => {
    const store = new FakeStore({ rows: [{ a: 1 }] });
    const rows = await new QueryExecutor(store).execute(makeSpec({ filter: { 'application.criticality': 'High' } }));

    expect(rows).toEqual([{ a: 1 }]);
    expect(store.switches).toEqual(['application_snapshot']);
    expect(store.queries).toEqual([{
      operation: 'find',
      collection: 'application_snapshot',
      params: { filter: { 'application.criticality': 'High' }, limit: 10 }
    }]);
  });

  it('forwards non-empty sort and projection', async () => {
    const store = new FakeStore();
    await new QueryExecutor(store).execute(makeSpec({ sort: { name: -1 }, projection: { name: 1 } }));
    expect(store.queries[0]).toEqual({
      operation: 'find',
      collection: 'application_snapshot',
      params: { filter: {}, projection: { name: 1 }, sort: { name: -1 }, limit: 10 }
    });
  });

  it('issues only an aggregate when a pipeline is present', async () => {
    const store = new FakeStore({ rows: [{ _id: 'High', count: 3 }] });
    const spec = makeSpec({
      filter: { never: 'used' },
      sort: { never: 1 },
      aggregation: [{ $group: { _id: '$application.criticality', count: { $sum: 1 } } }],
      limit: 5
    });

    await new QueryExecutor(store).execute(spec);

    expect(store.queries).toHaveLength(1);
    expect(store.queries[0]).toEqual({
      operation: 'aggregate',
      collection: 'application_snapshot',
      params: {
        pipeline: [{ $group: { _id: '$application.criticality', count: { $sum: 1 } } }, { $limit: 5 }]
      }
    });
    expect(spec.aggregation).toHaveLength(1);
  });

  it('rejects a blank primary collection before touching the store', async () => {
    const store = new FakeStore();
    const exec = new QueryExecutor(store);
    await expect(exec.execute(makeSpec({ primary_collection: '' }))).rejects.toBeInstanceOf(MissingCollectionError);
    await expect(exec.execute(makeSpec({ primary_collection: '   ' }))).rejects.toThrow(
      'No primary_collection specified in query'
    );
    expect(store.callCount).toBe(0);
  });

  it('initializes once for concurrent callers', async () => {
    const store = new FakeStore({ initDelayMs: 10 });
    const exec = new QueryExecutor(store);
    await Promise.all([exec.execute(makeSpec()), exec.execute(makeSpec()), exec.execute(makeSpec())]);
    expect(store.initCalls).toBe(1);
    expect(store.queries).toHaveLength(3);
  });

  it('surfaces a failed initialization and allows a retry', async () => {
    const store = new FakeStore({ failInitWith: new Error('connection refused') });
    const exec = new QueryExecutor(store);

    const err = await exec.execute(makeSpec()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreInitializationError);
    expect(err).toHaveProperty('message', 'Failed to initialize document store: connection refused');

    await exec.execute(makeSpec()).catch(() => undefined);
    expect(store.initCalls).toBe(2);
    expect(store.queries).toHaveLength(0);
  });

  it('wraps find failures with the store message intact', async () => {
    const store = new FakeStore({ failWith: new Error('bad filter') });
    const err = await new QueryExecutor(store).execute(makeSpec()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FindExecutionError);
    expect(err).toHaveProperty('message', 'Find failed on application_snapshot: bad filter');
  });

  it('wraps aggregation failures and attaches the array hint', async () => {
    const store = new FakeStore({
      failWith: new Error('The argument to $size must be an array. Type of the argument was missing')
    });
    const spec = makeSpec({ aggregation: [{ $group: { _id: null, n: { $sum: { $size: '$tags' } } } }] });
    const err = await new QueryExecutor(store).execute(spec).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AggregationExecutionError);
    expect(err).toHaveProperty(
      'message',
      'Aggregation failed on application_snapshot: The argument to $size must be an array. Type of the argument was missing'
    );
    expect(err).toHaveProperty('details.hint',
      '$size needs an array; check that every referenced field exists and is an array in the schema');
  });

  it('types a failed collection switch by the query mode', async () => {
    const down = new Error('connection pool was cleared');
    const store = new FakeStore({ failSwitchWith: down });
    const executor = new QueryExecutor(store);

    const findErr = await executor.execute(makeSpec()).catch((e: unknown) => e);
    expect(findErr).toBeInstanceOf(FindExecutionError);
    expect(findErr).toHaveProperty('message', 'Find failed on application_snapshot: connection pool was cleared');
    expect(findErr).toHaveProperty('code', 'FIND_EXECUTION');

    const aggErr = await executor.execute(makeSpec({ aggregation: [{ $match: {} }] })).catch((e: unknown) => e);
    expect(aggErr).toBeInstanceOf(AggregationExecutionError);
    expect(aggErr).toHaveProperty('message', 'Aggregation failed on application_snapshot: connection pool was cleared');

    expect(store.switches).toEqual(['application_snapshot', 'application_snapshot']);
    expect(store.queries).toHaveLength(0);
  });

  it('returns rows unchanged', async () => {
    const when = new Date('2024-01-02T03:04:05.000Z');
    const store = new FakeStore({ rows: [{ when }] });
    const rows = await new QueryExecutor(store).execute(makeSpec());
    expect(rows[0]?.when).toBe(when);
  });
});
