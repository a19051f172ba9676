import { describe, it, expect } from 'vitest';

import { OPAQUE, type Provenance } from '@lineagekit/types';

import { LineageUnavailableError, MalformedQueryError } from '../errors.js';
import { ColumnResolver, unionProvenance, type UpstreamRelation } from '../sql/column-resolver.js';

function col(producer: string, column: string): Provenance {
  return { kind: 'column', producer, column };
}

const upstream = new Map<string, UpstreamRelation>([
  ['main.raw_customers', { producer: 'raw_customers', columns: ['id', 'name', 'email'] }],
  ['main.orders', { producer: 'orders', columns: ['order_id', 'customer_id', 'amount'] }],
  ['main.src', { producer: 'src', columns: ['a', 'b', 'c'] }],
  ['shop.undocumented', { producer: 'shop.undocumented', columns: undefined }],
]);

describe('ColumnResolver', () => {
  const resolver = new ColumnResolver();

  it('should expand select * in source column order', () => {
    const lineage = resolver.resolve('m', 'select * from main.src', upstream);

    expect(lineage).toEqual({
      model: 'm',
      columns: [
        { name: 'a', provenance: [col('src', 'a')] },
        { name: 'b', provenance: [col('src', 'b')] },
        { name: 'c', provenance: [col('src', 'c')] },
      ],
      references: [],
    });
  });

  it('should attribute aliased columns and expressions across joins', () => {
    const lineage = resolver.resolve(
      'm',
      `select c.id as customer_id, upper(c.name) as full_name, 1 as one, c.id + o.amount as total
       from main.raw_customers c
       join main.orders o on c.id = o.customer_id
       where o.amount > 0`,
      upstream
    );

    expect(lineage.columns).toEqual([
      { name: 'customer_id', provenance: [col('raw_customers', 'id')] },
      { name: 'full_name', provenance: [col('raw_customers', 'name')] },
      { name: 'one', provenance: [OPAQUE] },
      { name: 'total', provenance: [col('raw_customers', 'id'), col('orders', 'amount')] },
    ]);
    expect(lineage.references).toEqual([
      col('raw_customers', 'id'),
      col('orders', 'customer_id'),
      col('orders', 'amount'),
    ]);
  });

  it('should name unaliased expressions by position', () => {
    const lineage = resolver.resolve('m', 'select a, b + c from main.src', upstream);

    expect(lineage.columns.map((column) => column.name)).toEqual(['a', '_col_1']);
  });

  it('should name unaliased casts after the column they convert', () => {
    const lineage = resolver.resolve(
      'm',
      'select a::bigint, cast(b as int), cast(c::varchar as text) as c2, a + 1 from main.src',
      upstream
    );

    expect(lineage.columns).toEqual([
      { name: 'a', provenance: [col('src', 'a')] },
      { name: 'b', provenance: [col('src', 'b')] },
      { name: 'c2', provenance: [col('src', 'c')] },
      { name: '_col_3', provenance: [col('src', 'a')] },
    ]);
  });

  it('should treat functions called without parentheses as opaque', () => {
    const lineage = resolver.resolve(
      'm',
      'select current_timestamp as loaded_at, current_date as d, current_user, a from main.src',
      upstream
    );

    expect(lineage.columns).toEqual([
      { name: 'loaded_at', provenance: [OPAQUE] },
      { name: 'd', provenance: [OPAQUE] },
      { name: '_col_2', provenance: [OPAQUE] },
      { name: 'a', provenance: [col('src', 'a')] },
    ]);
    expect(lineage.references).toEqual([]);
  });

  it('should resolve CTEs as local relations and keep unused CTE columns as references', () => {
    const lineage = resolver.resolve(
      'm',
      `with base as (select id, name from main.raw_customers),
            unused as (select email from main.raw_customers)
       select name from base`,
      upstream
    );

    expect(lineage.columns).toEqual([{ name: 'name', provenance: [col('raw_customers', 'name')] }]);
    expect(lineage.references).toEqual([
      col('raw_customers', 'id'),
      col('raw_customers', 'name'),
      col('raw_customers', 'email'),
    ]);
  });

  it('should rename CTE columns from a column list', () => {
    const lineage = resolver.resolve(
      'm',
      'with t (x, y) as (select a, b from main.src) select y from t',
      upstream
    );

    expect(lineage.columns).toEqual([{ name: 'y', provenance: [col('src', 'b')] }]);
  });

  it('should report columns a local relation does not expose as unresolved', () => {
    const lineage = resolver.resolve(
      'm',
      'with base as (select id from main.raw_customers) select b.name from base b',
      upstream
    );

    expect(lineage.columns).toEqual([
      { name: 'name', provenance: [{ kind: 'unresolved', column: 'name', relation: 'b' }] },
    ]);
  });

  it('should attribute a missing column of the only upstream relation to that relation', () => {
    const sql = 'select id, nonexistant_column from main.raw_customers';
    const lineage = resolver.resolve('m', sql, upstream);

    expect(lineage.columns[1]).toEqual({
      name: 'nonexistant_column',
      provenance: [col('raw_customers', 'nonexistant_column')],
    });
  });

  it('should leave an unqualified column no joined relation exposes unresolved', () => {
    const lineage = resolver.resolve(
      'm',
      'select missing from main.raw_customers c join main.orders o on c.id = o.customer_id',
      upstream
    );

    expect(lineage.columns[0]?.provenance).toEqual([
      { kind: 'unresolved', column: 'missing', relation: null },
    ]);
  });

  it('should resolve subqueries in FROM', () => {
    const lineage = resolver.resolve(
      'm',
      'select s.total from (select sum(amount) as total from main.orders) s',
      upstream
    );

    expect(lineage.columns).toEqual([{ name: 'total', provenance: [col('orders', 'amount')] }]);
    expect(lineage.references).toEqual([col('orders', 'amount')]);
  });

  it('should union provenance per position across set operations', () => {
    const lineage = resolver.resolve(
      'm',
      'select id from main.raw_customers union select customer_id from main.orders',
      upstream
    );

    expect(lineage.columns).toEqual([
      { name: 'id', provenance: [col('raw_customers', 'id'), col('orders', 'customer_id')] },
    ]);
  });

  it('should respect EXCLUDE and merge USING columns in wildcards', () => {
    const excludeSql = 'select * exclude (email) from main.raw_customers';
    const excluded = resolver.resolve('m', excludeSql, upstream);
    expect(excluded.columns.map((column) => column.name)).toEqual(['id', 'name']);

    const joined = resolver.resolve(
      'm',
      'select * from main.raw_customers ' +
        'join (select customer_id as id, amount from main.orders) o using (id)',
      upstream
    );
    expect(joined.columns.map((column) => column.name)).toEqual(['id', 'name', 'email', 'amount']);
    expect(joined.references).toEqual([
      col('orders', 'customer_id'),
      col('orders', 'amount'),
      col('raw_customers', 'id'),
    ]);
  });

  it('should treat relations that are neither models nor sources as undeclared producers', () => {
    const lineage = resolver.resolve('m', 'select x.a from analytics.events x', upstream);

    expect(lineage.columns).toEqual([{ name: 'a', provenance: [col('analytics.events', 'a')] }]);
  });

  it('should give table function columns opaque provenance', () => {
    const lineage = resolver.resolve('m', 'select g from generate_series(1, 3) as t(g)', upstream);

    expect(lineage.columns).toEqual([{ name: 'g', provenance: [OPAQUE] }]);
  });

  it('should tolerate wildcards over unknown columns inside EXISTS', () => {
    const lineage = resolver.resolve(
      'm',
      'select id from main.raw_customers c ' +
        'where exists (select * from shop.undocumented u where u.cid = c.id)',
      upstream
    );

    expect(lineage.columns).toEqual([{ name: 'id', provenance: [col('raw_customers', 'id')] }]);
    expect(lineage.references).toEqual([
      col('shop.undocumented', 'cid'),
      col('raw_customers', 'id'),
    ]);
  });

  it('should fold identifiers the way the dialect does', () => {
    const snowflake = new ColumnResolver({ dialect: 'snowflake' });
    const lineage = snowflake.resolve(
      'm',
      'select Id, "name" from main.raw',
      new Map([['main.raw', { producer: 'raw', columns: ['id', 'name'] }]])
    );

    expect(snowflake.dialectName).toBe('snowflake');
    expect(lineage.columns).toEqual([
      { name: 'ID', provenance: [col('raw', 'ID')] },
      { name: 'name', provenance: [col('raw', 'name')] },
    ]);
  });

  describe('errors', () => {
    it('should reject set operations with branches of different widths', () => {
      const sql =
        'select id, name from main.raw_customers union all select customer_id from main.orders';
      expect(() => resolver.resolve('m', sql, upstream)).toThrow(
        "Malformed query in 'm': UNION branches have 2 and 1 columns"
      );
    });

    it('should refuse to expand * over a relation with unknown columns', () => {
      const resolve = () => resolver.resolve('m', 'select * from shop.undocumented', upstream);

      expect(resolve).toThrow(LineageUnavailableError);
      expect(resolve).toThrow(
        "Lineage of 'm' is unavailable: cannot expand * over 'shop.undocumented' " +
          'because its columns are unknown'
      );
    });

    it('should reject wildcards without a FROM clause or with an unknown qualifier', () => {
      expect(() => resolver.resolve('m', 'select *', upstream)).toThrow(MalformedQueryError);
      expect(() => resolver.resolve('m', 'select z.* from main.src', upstream)).toThrow(
        "Malformed query in 'm': unknown relation 'z' in z.*"
      );
    });
  });
});

describe('unionProvenance', () => {
  it('should de-duplicate in first-seen order and drop opaque entries', () => {
    expect(unionProvenance([[col('a', 'x'), OPAQUE], [col('a', 'x'), col('b', 'y')]])).toEqual([
      col('a', 'x'),
      col('b', 'y'),
    ]);
  });

  it('should fall back to opaque when nothing else contributes', () => {
    expect(unionProvenance([[OPAQUE], []])).toEqual([OPAQUE]);
  });
});
