import { describe, it, expect } from 'vitest';

import type { BuildManifest } from '@lineagekit/types';

import { contentFingerprint, macroFingerprint } from '../cache/fingerprint.js';
import { ConfigurationError } from '../errors.js';
import {
  createExecutionAnalyzer,
  ExecutionAnalyzer,
  parseBuildManifest,
  type ModelExecutionAnalysis,
} from '../lineage/execution.js';
import { LineagePipeline, type AnalysisReport } from '../lineage/pipeline.js';
import { createProject, type Project } from '../lineage/project.js';

const BUILT_AT = new Date('2026-03-01T12:00:00.000Z');
const STG_ORDERS =
  "select id, {{ cents('amount_cents') }} as amount from {{ source('shop', 'orders') }}";

function shop(stgOrdersSql = STG_ORDERS, centsBody = '({{ col }} / 100)'): Project {
  return createProject({
    models: [
      { name: 'stg_orders', rawSql: stgOrdersSql, path: 'models/stg_orders.sql' },
      {
        name: 'orders',
        rawSql: "select id, amount from {{ ref('stg_orders') }}",
        path: 'models/orders.sql',
      },
      { name: 'audit', rawSql: 'select 1 as one', path: 'models/audit.sql' },
    ],
    sources: [
      { sourceName: 'shop', name: 'orders', columns: [{ name: 'id' }, { name: 'amount_cents' }] },
    ],
    macros: [{ name: 'cents', parameters: [{ name: 'col' }], body: centsBody }],
  });
}

function analyzerAt(project: Project, date: Date): ExecutionAnalyzer {
  return new ExecutionAnalyzer(project, { now: () => date });
}

async function builtManifest(project: Project, failed: string[] = []): Promise<BuildManifest> {
  const report = await new LineagePipeline().analyze(project);
  return analyzerAt(project, BUILT_AT).recordBuild(
    report,
    undefined,
    report.order.map((model) => ({ model, succeeded: !failed.includes(model) }))
  );
}

function reasonsOf(
  analyses: ReadonlyMap<string, ModelExecutionAnalysis>
): Record<string, string[]> {
  return Object.fromEntries(
    Array.from(analyses.values()).map((analysis) => [
      analysis.model,
      analysis.reasons.map((reason) => `${reason.code}: ${reason.description}`),
    ])
  );
}

async function analyze(project: Project, manifest: BuildManifest | undefined, at = BUILT_AT) {
  const report: AnalysisReport = await new LineagePipeline().analyze(project);
  return analyzerAt(project, at).analyze(report, manifest);
}

describe('ExecutionAnalyzer', () => {
  it('should run every model that has never been built', async () => {
    const analyses = await analyze(shop(), undefined);

    expect(Array.from(analyses.keys())).toEqual(['audit', 'stg_orders', 'orders']);
    expect(reasonsOf(analyses)).toEqual({
      audit: ["MODEL_STALE: Model 'audit' has never been built"],
      stg_orders: ["MODEL_STALE: Model 'stg_orders' has never been built"],
      orders: [
        "MODEL_STALE: Model 'orders' has never been built",
        'UPSTREAM_MODELS_CHANGED: Upstream models changed: stg_orders',
      ],
    });
    expect(analyses.get('audit')?.needsExecution).toBe(true);
  });

  it('should skip models whose last build is still valid', async () => {
    const manifest = await builtManifest(shop());
    const analyses = await analyze(shop(), manifest, new Date('2026-03-02T11:59:00.000Z'));

    const needsExecution = Array.from(analyses.values()).map((analysis) => analysis.needsExecution);
    expect(needsExecution).toEqual([false, false, false]);
  });

  it('should rerun a changed model and the models reading it', async () => {
    const manifest = await builtManifest(shop());
    const changed = shop(`${STG_ORDERS} where id > 0`);

    expect(reasonsOf(await analyze(changed, manifest))).toEqual({
      audit: [],
      stg_orders: ["MODEL_STALE: Model 'stg_orders' has changed since its last build"],
      orders: ['UPSTREAM_MODELS_CHANGED: Upstream models changed: stg_orders'],
    });
  });

  it('should rerun models that expand a changed macro', async () => {
    const manifest = await builtManifest(shop());

    expect(reasonsOf(await analyze(shop(STG_ORDERS, '({{ col }} / 100.0)'), manifest))).toEqual({
      audit: [],
      stg_orders: ['UPSTREAM_MACROS_CHANGED: Upstream macros changed: cents'],
      orders: [],
    });
  });

  it('should rerun failed builds and their downstream models', async () => {
    const manifest = await builtManifest(shop(), ['stg_orders']);

    expect(reasonsOf(await analyze(shop(), manifest))).toEqual({
      audit: [],
      stg_orders: ["MODEL_STALE: Model 'stg_orders' failed its last build"],
      orders: ['UPSTREAM_MODELS_CHANGED: Upstream models changed: stg_orders'],
    });
  });

  it('should rerun builds older than the validity window', async () => {
    const manifest = await builtManifest(shop());
    const analyses = await analyze(shop(), manifest, new Date('2026-03-02T12:00:01.000Z'));

    expect(reasonsOf(analyses).audit).toEqual([
      "MODEL_STALE: Model 'audit' was built more than 1440 minutes ago",
    ]);
  });

  it('should analyze only the selected models', async () => {
    const project = shop();
    const report = await new LineagePipeline().analyze(project);
    const analyzer = analyzerAt(project, BUILT_AT);
    const analyses = analyzer.analyze(report, await builtManifest(project), '+orders');

    expect(Array.from(analyses.keys())).toEqual(['stg_orders', 'orders']);
    expect(() => analyzer.analyze(report, undefined, 'ghost')).toThrow(ConfigurationError);
  });

  it('should take the validity window from configuration', async () => {
    const project = shop();
    const report = await new LineagePipeline().analyze(project);
    const analyzer = createExecutionAnalyzer(project, { buildValidityMinutes: 1 });
    const longAgo = analyzerAt(project, new Date('2020-01-01T00:00:00.000Z'));
    const manifest = longAgo.recordBuild(report, undefined, [{ model: 'audit', succeeded: true }]);

    expect(analyzer.analyze(report, manifest, 'audit').get('audit')?.reasons).toEqual([
      { code: 'MODEL_STALE', description: "Model 'audit' was built more than 1 minutes ago" },
    ]);
  });
});

describe('ExecutionAnalyzer.recordBuild', () => {
  it('should record content and macro fingerprints of the built models', async () => {
    const project = shop();
    const report = await new LineagePipeline().analyze(project);
    const analyzer = analyzerAt(project, BUILT_AT);

    const first = analyzer.recordBuild(report, undefined, [
      { model: 'stg_orders', succeeded: true },
    ]);
    const second = analyzer.recordBuild(report, first, [{ model: 'audit', succeeded: false }]);

    const stgOrders = project.models.get('stg_orders');
    const cents = project.macros.get('cents');
    expect(stgOrders && cents).toBeTruthy();
    if (!stgOrders || !cents) {
      return;
    }
    expect(second.version).toBe(1);
    expect(second.models.map((record) => [record.model, record.succeeded])).toEqual([
      ['audit', false],
      ['stg_orders', true],
    ]);
    expect(second.models[1]).toEqual({
      model: 'stg_orders',
      contentFingerprint: contentFingerprint(stgOrders),
      macros: { cents: macroFingerprint('cents', cents) },
      builtAt: '2026-03-01T12:00:00.000Z',
      succeeded: true,
    });
  });

  it('should reject outcomes for models outside the project', async () => {
    const project = shop();
    const report = await new LineagePipeline().analyze(project);

    const analyzer = analyzerAt(project, BUILT_AT);

    expect(() =>
      analyzer.recordBuild(report, undefined, [{ model: 'ghost', succeeded: true }])
    ).toThrow("Unknown model in build outcome: 'ghost'");
  });
});

describe('parseBuildManifest', () => {
  it('should read a manifest written as JSON', async () => {
    const manifest = await builtManifest(shop());

    expect(parseBuildManifest(JSON.parse(JSON.stringify(manifest)))).toEqual(manifest);
  });

  it('should reject values that are not manifests', () => {
    expect(() => parseBuildManifest({ version: 2, models: [] })).toThrow(ConfigurationError);
    expect(() => parseBuildManifest({ version: 1, models: [{ model: 'a' }] })).toThrow(
      'Invalid build manifest'
    );
  });
});
