import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect } from 'vitest';

import type { ProjectInput } from '@lineagekit/types';

import { ContentCache } from '../cache/content-cache.js';
import { FileSystemCacheStore, InMemoryCacheStore } from '../cache/stores.js';
import { CyclicDependencyError } from '../errors.js';
import {
  createLineagePipeline,
  LineagePipeline,
  type AnalysisReport,
} from '../lineage/pipeline.js';
import { createProject, type Project } from '../lineage/project.js';

const RAW_CUSTOMERS = "select id, name from {{ source('shop', 'customers') }}";

function warehouse(customersSql: string, rawCustomersSql = RAW_CUSTOMERS): Project {
  const models: ProjectInput['models'] = [
    { name: 'raw_customers', rawSql: rawCustomersSql, path: 'models/raw_customers.sql' },
    { name: 'customers', rawSql: customersSql, path: 'models/customers.sql' },
  ];
  return createProject({
    models,
    sources: [
      { sourceName: 'shop', name: 'customers', columns: [{ name: 'id' }, { name: 'name' }] },
    ],
  });
}

const broken = warehouse(
  "select id as customer_id, name as full_name, nonexistant_column from {{ ref('raw_customers') }}"
);
const fixed = warehouse(
  "select id as customer_id, name as full_name from {{ ref('raw_customers') }}"
);

function plainSqlProject(rawCustomersSql: string, sourceColumns: string[]): Project {
  const sources: ProjectInput['sources'] = [
    { sourceName: 'shop', name: 'customers', columns: sourceColumns.map((name) => ({ name })) },
  ];
  return createProject({
    models: [
      { name: 'raw_customers', rawSql: rawCustomersSql, path: 'models/raw_customers.sql' },
      {
        name: 'customers',
        rawSql: 'select id, foo from raw_customers',
        path: 'models/customers.sql',
      },
      {
        name: 'shop_customers',
        rawSql: 'select id, foo from shop.customers',
        path: 'models/shop_customers.sql',
      },
    ],
    sources,
  });
}

function columnNames(report: AnalysisReport, model: string): string[] | undefined {
  return report.graph.columnsOf(model)?.map((column) => column.name);
}

function status(render: string, lineage: string, validation: string) {
  return { render, lineage, validation };
}

function codes(report: { diagnostics: readonly { model: string; code: string }[] }): string[][] {
  return report.diagnostics.map((diagnostic) => [diagnostic.model, diagnostic.code]);
}

describe('LineagePipeline', () => {
  it('should report a column missing from the upstream model', async () => {
    const report = await new LineagePipeline().analyze(broken);

    expect(report.order).toEqual(['raw_customers', 'customers']);
    expect(report.failures).toEqual([]);
    expect(report.diagnostics).toEqual([
      {
        severity: 'error',
        code: 'missing-column',
        model: 'customers',
        column: 'nonexistant_column',
        upstream: { relation: 'raw_customers', column: 'nonexistant_column' },
        message:
          "Column 'nonexistant_column' of model 'customers' references 'nonexistant_column', " +
          "which does not exist in upstream 'raw_customers'",
      },
    ]);
    expect(report.hasErrors).toBe(true);
    expect(report.cache).toBeUndefined();
  });

  it('should pass a project whose columns all exist', async () => {
    const report = await new LineagePipeline().analyze(fixed);

    expect(report.diagnostics).toEqual([]);
    expect(report.hasErrors).toBe(false);
    expect(report.lineage.get('customers')).toEqual({
      model: 'customers',
      columns: [
        {
          name: 'customer_id',
          provenance: [{ kind: 'column', producer: 'raw_customers', column: 'id' }],
        },
        {
          name: 'full_name',
          provenance: [{ kind: 'column', producer: 'raw_customers', column: 'name' }],
        },
      ],
      references: [
        { kind: 'column', producer: 'raw_customers', column: 'id' },
        { kind: 'column', producer: 'raw_customers', column: 'name' },
      ],
    });
    expect(columnNames(report, 'raw_customers')).toEqual(['id', 'name']);
  });

  it('should abort the run on a reference cycle', async () => {
    const project = createProject({
      models: [
        { name: 'a', rawSql: "select * from {{ ref('b') }}", path: 'models/a.sql' },
        { name: 'b', rawSql: "select * from {{ ref('a') }}", path: 'models/b.sql' },
      ],
    });

    await expect(new LineagePipeline().analyze(project)).rejects.toThrow(CyclicDependencyError);
  });

  it('should fail only the models affected by an unresolved reference', async () => {
    const project = createProject({
      models: [
        { name: 'broken', rawSql: "select * from {{ ref('ghost') }}", path: 'models/broken.sql' },
        {
          name: 'downstream',
          rawSql: "select x from {{ ref('broken') }}",
          path: 'models/downstream.sql',
        },
        { name: 'ok', rawSql: 'select 1 as one', path: 'models/ok.sql' },
      ],
    });

    const report = await new LineagePipeline().analyze(project);

    expect(report.order).toEqual(['broken', 'downstream', 'ok']);
    expect(report.failures).toEqual([
      {
        model: 'broken',
        code: 'UNRESOLVED_REFERENCE',
        message: "Model 'broken' references model 'ghost' which does not exist in the project",
      },
      {
        model: 'downstream',
        code: 'LINEAGE_UNAVAILABLE',
        message:
          "Lineage of 'downstream' is unavailable: upstream model 'broken' " +
          'could not be analyzed and declares no columns',
      },
    ]);
    expect(Array.from(report.lineage.keys())).toEqual(['ok']);
    expect(report.hasErrors).toBe(true);
  });

  it('should use documented columns of a failed upstream model', async () => {
    const project = createProject({
      models: [
        {
          name: 'broken',
          rawSql: 'select from',
          path: 'models/broken.sql',
          columns: [{ name: 'x' }],
        },
        {
          name: 'downstream',
          rawSql: "select x from {{ ref('broken') }}",
          path: 'models/downstream.sql',
        },
      ],
    });

    const report = await new LineagePipeline().analyze(project);

    expect(report.failures.map((failure) => [failure.model, failure.code])).toEqual([
      ['broken', 'MALFORMED_QUERY'],
    ]);
    expect(report.lineage.get('downstream')?.columns).toEqual([
      { name: 'x', provenance: [{ kind: 'column', producer: 'broken', column: 'x' }] },
    ]);
    expect(report.diagnostics).toEqual([]);
  });

  it('should name casts after their column and treat niladic functions as opaque', async () => {
    const project = createProject({
      models: [
        {
          name: 'raw_orders',
          rawSql: "select id, amount from {{ source('shop', 'orders') }}",
          path: 'models/raw_orders.sql',
        },
        {
          name: 'orders',
          rawSql:
            'select id::bigint, cast(amount as int), current_timestamp as loaded_at ' +
            "from {{ ref('raw_orders') }}",
          path: 'models/orders.sql',
        },
        {
          name: 'report',
          rawSql: "select id, amount, loaded_at from {{ ref('orders') }}",
          path: 'models/report.sql',
        },
      ],
      sources: [
        { sourceName: 'shop', name: 'orders', columns: [{ name: 'id' }, { name: 'amount' }] },
      ],
    });

    const report = await new LineagePipeline().analyze(project);

    expect(report.failures).toEqual([]);
    expect(report.diagnostics).toEqual([]);
    expect(columnNames(report, 'orders')).toEqual(['id', 'amount', 'loaded_at']);
  });

  describe('caching', () => {
    it('should reuse every artifact on an unchanged rerun', async () => {
      const store = new InMemoryCacheStore();
      const first = await new LineagePipeline({ cache: new ContentCache(store) }).analyze(broken);
      const second = await new LineagePipeline({ cache: new ContentCache(store) }).analyze(broken);

      expect(first.cache).toEqual({ hits: 0, misses: 6, corrupt: 0, writes: 6, writeFailures: 0 });
      expect(second.cache).toEqual({ hits: 6, misses: 0, corrupt: 0, writes: 0, writeFailures: 0 });
      expect(second.modelCache.get('customers')).toEqual(status('hit', 'hit', 'hit'));
      expect(JSON.stringify(Array.from(second.lineage.entries()))).toBe(
        JSON.stringify(Array.from(first.lineage.entries()))
      );
      expect(JSON.stringify(second.diagnostics)).toBe(JSON.stringify(first.diagnostics));
      expect(second.diagnostics.every((diagnostic) => Object.isFrozen(diagnostic))).toBe(true);
    });

    it('should recompute downstream lineage when an upstream model changes', async () => {
      const store = new InMemoryCacheStore();
      await new LineagePipeline({ cache: new ContentCache(store) }).analyze(fixed);

      const changed = warehouse(
        "select id as customer_id, name as full_name from {{ ref('raw_customers') }}",
        "select id, name as name from {{ source('shop', 'customers') }}"
      );
      const report = await new LineagePipeline({ cache: new ContentCache(store) }).analyze(changed);

      expect(report.modelCache.get('raw_customers')).toEqual(status('miss', 'miss', 'miss'));
      expect(report.modelCache.get('customers')).toEqual(status('hit', 'miss', 'miss'));
      expect(columnNames(report, 'raw_customers')).toEqual(['id', 'name']);
    });

    it('should revalidate when a relation named in plain SQL changes', async () => {
      const store = new InMemoryCacheStore();
      const before = plainSqlProject('select 1 as id', ['id']);
      const after = plainSqlProject('select 1 as id, 2 as foo', ['id', 'foo']);

      const first = await new LineagePipeline({ cache: new ContentCache(store) }).analyze(before);
      const cached = await new LineagePipeline({ cache: new ContentCache(store) }).analyze(after);
      const fresh = await new LineagePipeline().analyze(after);

      expect(codes(first)).toEqual([
        ['customers', 'missing-column'],
        ['shop_customers', 'missing-column'],
      ]);
      expect(codes(cached)).toEqual([]);
      expect(JSON.stringify(cached.diagnostics)).toBe(JSON.stringify(fresh.diagnostics));
      expect(cached.modelCache.get('customers')).toEqual(status('hit', 'hit', 'miss'));
      expect(cached.modelCache.get('shop_customers')).toEqual(status('hit', 'hit', 'miss'));
    });

    it('should finish the run without caching when the store cannot be opened', async () => {
      const directory = await mkdtemp(join(tmpdir(), 'lineage-pipeline-'));
      try {
        const blocker = join(directory, 'not-a-directory');
        await writeFile(blocker, 'x', 'utf8');
        const cache = new ContentCache(new FileSystemCacheStore(join(blocker, 'cache')));

        const report = await new LineagePipeline({ cache }).analyze(fixed);

        expect(cache.enabled).toBe(false);
        expect(report.diagnostics).toEqual([]);
        expect(report.failures).toEqual([]);
        expect(report.cache).toEqual({
          hits: 0,
          misses: 6,
          corrupt: 0,
          writes: 0,
          writeFailures: 0,
        });
      } finally {
        await rm(directory, { recursive: true, force: true });
      }
    });

    it('should keep validation results apart per reporting option', async () => {
      const store = new InMemoryCacheStore();
      await new LineagePipeline({ cache: new ContentCache(store) }).analyze(fixed);

      const report = await new LineagePipeline({
        cache: new ContentCache(store),
        reportUndocumentedColumns: true,
      }).analyze(fixed);

      expect(report.modelCache.get('customers')).toEqual(status('hit', 'hit', 'miss'));
    });
  });
});

describe('createLineagePipeline', () => {
  it('should wire the configured cache store', async () => {
    const pipeline = createLineagePipeline({
      dialect: 'duckdb',
      macroDepthLimit: 16,
      schema: 'main',
      concurrency: 2,
      reportUndocumentedColumns: false,
      buildValidityMinutes: 1440,
      cache: { driver: 'memory' },
      logLevel: 'silent',
      prettyLogs: false,
    });

    const report = await pipeline.analyze(fixed);

    expect(report.cache?.writes).toBe(6);
    expect(report.hasErrors).toBe(false);
  });
});
