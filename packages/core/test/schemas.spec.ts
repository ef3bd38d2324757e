import { describe, it, expect } from 'vitest';
import { QuerySpecSchema, querySpecSchema, describeIssues } from '../src/index.js';

describe('QuerySpecSchema', () => {
  it('fills defaults for omitted and null fields', () => {
    const spec = QuerySpecSchema.parse({ primary_collection: 'orders', sort: null, joins: null });
    expect(spec).toEqual({
      primary_collection: 'orders',
      filter: {},
      projection: {},
      sort: {},
      limit: 100,
      aggregation: [],
      joins: []
    });
  });

  it('uses the supplied default limit', () => {
    expect(querySpecSchema(5).parse({ primary_collection: 'orders' }).limit).toBe(5);
  });

  it('normalizes join aliases', () => {
    const spec = QuerySpecSchema.parse({
      primary_collection: 'orders',
      joins: [
        { collection: 'customers', local_field: 'customer_id', foreign_field: 'id', alias: 'customer' },
        { collection: 'stores', type: 'match', local_field: 'store_id', foreign_field: 'id', as: 'store' },
        { collection: 'regions' }
      ]
    });
    expect(spec.joins).toEqual([
      { collection: 'customers', type: 'lookup', local_field: 'customer_id', foreign_field: 'id', as: 'customer' },
      { collection: 'stores', type: 'match', local_field: 'store_id', foreign_field: 'id', as: 'store' },
      { collection: 'regions', type: 'lookup', local_field: '', foreign_field: '', as: 'regions' }
    ]);
  });

  it('rejects a non-positive limit and non-array aggregation', () => {
    const res = QuerySpecSchema.safeParse({ primary_collection: 'orders', limit: 0, aggregation: {} });
    expect(res.success).toBe(false);
    if (!res.success) {
      const paths = describeIssues(res.error).map((i) => i.path);
      expect(paths).toEqual(['limit', 'aggregation']);
    }
  });
});
