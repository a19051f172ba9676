/**
 * Lineage Pipeline
 *
 * Render → graph → fingerprint → resolve (in waves) → validate → flush.
 * Per-model failures are collected into the report; a reference cycle
 * aborts the run.
 *
 * @module core/lineage/pipeline
 */

import type {
  Diagnostic,
  ModelFailure,
  ModelLineage,
  Reference,
  SqlDialect,
} from '@lineagekit/types';

import { ContentCache, type ContentCacheStats } from '../cache/content-cache.js';
import {
  computeFingerprints,
  computeVersionTag,
  fingerprintNode,
  fingerprintProducers,
  renderFingerprint,
} from '../cache/fingerprint.js';
import { createCacheStoreFromConfig } from '../cache/stores.js';
import type { AnalyzerConfig } from '../env.js';
import { LineageUnavailableError, toModelFailure } from '../errors.js';
import { createLogger, generateRunId, withRunId, type Logger } from '../logger.js';
import { ColumnResolver, type UpstreamRelation } from '../sql/column-resolver.js';
import {
  DEFAULT_MACRO_DEPTH_LIMIT,
  TemplateRenderer,
  type RenderResult,
} from '../templating/renderer.js';
import { mapInBatches } from '../utils.js';

import { LineageGraphBuilder, type LineageGraph } from './graph-builder.js';
import type { Project } from './project.js';
import { LineageValidator, producersOf } from './validator.js';

// =============================================================================
// TYPES
// =============================================================================

export type CacheOutcome = 'hit' | 'miss' | 'skipped';

export interface ModelCacheStatus {
  render: CacheOutcome;
  lineage: CacheOutcome;
  validation: CacheOutcome;
}

export interface AnalysisReport {
  runId: string;
  /** Ordered by topological model order */
  diagnostics: Diagnostic[];
  failures: ModelFailure[];
  order: string[];
  graph: LineageGraph;
  /** Rendered SQL, references and expanded macros of every model that rendered */
  rendered: ReadonlyMap<string, RenderResult>;
  lineage: ReadonlyMap<string, ModelLineage>;
  cache: ContentCacheStats | undefined;
  modelCache: ReadonlyMap<string, ModelCacheStatus>;
  hasErrors: boolean;
}

export interface LineagePipelineOptions {
  dialect?: SqlDialect;
  macroDepthLimit?: number;
  /** Models rendered or resolved at once (default: 8) */
  concurrency?: number;
  reportUndocumentedColumns?: boolean;
  cache?: ContentCache;
  logger?: Logger;
}

interface RunState {
  project: Project;
  logger: Logger;
  versionTag: string;
  rendered: Map<string, RenderResult>;
  lineage: Map<string, ModelLineage>;
  failures: Map<string, ModelFailure>;
  modelCache: Map<string, ModelCacheStatus>;
}

function statusOf(state: RunState, model: string): ModelCacheStatus {
  let status = state.modelCache.get(model);
  if (!status) {
    status = { render: 'skipped', lineage: 'skipped', validation: 'skipped' };
    state.modelCache.set(model, status);
  }
  return status;
}

// =============================================================================
// PIPELINE
// =============================================================================

export class LineagePipeline {
  private readonly dialect: SqlDialect;
  private readonly macroDepthLimit: number;
  private readonly concurrency: number;
  private readonly reportUndocumentedColumns: boolean;
  private readonly cache: ContentCache | undefined;
  private readonly logger: Logger;

  constructor(options: LineagePipelineOptions = {}) {
    this.dialect = options.dialect ?? 'duckdb';
    this.macroDepthLimit = options.macroDepthLimit ?? DEFAULT_MACRO_DEPTH_LIMIT;
    this.concurrency = options.concurrency ?? 8;
    this.reportUndocumentedColumns = options.reportUndocumentedColumns ?? false;
    this.cache = options.cache;
    this.logger = options.logger ?? createLogger({ name: 'lineage-pipeline' });
  }

  /**
   * Analyze every model of the project
   *
   * @throws CyclicDependencyError if model references form a cycle
   */
  async analyze(project: Project): Promise<AnalysisReport> {
    const runId = generateRunId();
    const state: RunState = {
      project,
      logger: withRunId(this.logger, runId),
      versionTag: computeVersionTag(project, this.dialect),
      rendered: new Map(),
      lineage: new Map(),
      failures: new Map(),
      modelCache: new Map(),
    };
    const startTime = Date.now();

    await this.cache?.load();

    await this.renderAll(state);

    const builder = new LineageGraphBuilder(state.logger);
    for (const name of Array.from(project.models.keys()).sort()) {
      builder.addModel(name, state.rendered.get(name)?.references ?? []);
    }
    const graph = builder.build();
    const order = graph.topologicalOrder();

    const fingerprints = computeFingerprints(
      project,
      order,
      (name) => graph.referencesOf(name),
      state.versionTag
    );

    await this.resolveAll(state, graph, fingerprints);
    const diagnostics = await this.validateAll(state, order, fingerprints);

    await this.cache?.flush();

    const failures = order.flatMap((name) => {
      const failure = state.failures.get(name);
      return failure ? [failure] : [];
    });
    const hasErrors = failures.length > 0 || diagnostics.some((d) => d.severity === 'error');

    state.logger.info(
      {
        models: order.length,
        failures: failures.length,
        diagnostics: diagnostics.length,
        hasErrors,
        durationMs: Date.now() - startTime,
      },
      'Lineage analysis completed'
    );

    return {
      runId,
      diagnostics,
      failures,
      order,
      graph,
      rendered: state.rendered,
      lineage: state.lineage,
      cache: this.cache?.stats(),
      modelCache: state.modelCache,
      hasErrors,
    };
  }

  // ===========================================================================
  // STAGES
  // ===========================================================================

  private async renderAll(state: RunState): Promise<void> {
    const { project } = state;
    const renderer = new TemplateRenderer(project, {
      macroDepthLimit: this.macroDepthLimit,
      logger: state.logger,
    });
    const stillValid = (references: readonly Reference[]): boolean =>
      references.every((reference) =>
        reference.kind === 'model'
          ? project.models.has(reference.target)
          : project.sources.has(reference.target)
      );

    await mapInBatches(Array.from(project.models.values()), this.concurrency, async (model) => {
      const status = statusOf(state, model.name);
      const fingerprint = renderFingerprint(model, state.versionTag);

      const cached = await this.cache?.get('rendered-sql', fingerprint);
      if (cached && cached.model === model.name && stillValid(cached.references)) {
        state.rendered.set(model.name, {
          sql: cached.sql,
          references: cached.references,
          macros: cached.macros,
        });
        status.render = 'hit';
        return;
      }

      status.render = 'miss';
      try {
        const result = renderer.render(model);
        state.rendered.set(model.name, result);
        this.cache?.put('rendered-sql', fingerprint, {
          kind: 'rendered-sql',
          model: model.name,
          ...result,
        });
      } catch (error) {
        this.recordFailure(state, model.name, error);
      }
    });
  }

  private async resolveAll(
    state: RunState,
    graph: LineageGraph,
    fingerprints: ReadonlyMap<string, string>
  ): Promise<void> {
    const resolver = new ColumnResolver({ dialect: this.dialect, logger: state.logger });

    for (const wave of graph.levels()) {
      await mapInBatches(wave, this.concurrency, async (name) => {
        const rendered = state.rendered.get(name);
        const fingerprint = fingerprints.get(name);
        if (!rendered || fingerprint === undefined) {
          return;
        }
        const status = statusOf(state, name);

        const cached = await this.cache?.get('lineage', fingerprint);
        if (cached && cached.lineage.model === name) {
          state.lineage.set(name, cached.lineage);
          graph.setColumns(name, cached.lineage);
          status.lineage = 'hit';
          return;
        }

        status.lineage = 'miss';
        try {
          const upstream = this.upstreamRelations(state, name, rendered.references);
          const lineage = resolver.resolve(name, rendered.sql, upstream);
          state.lineage.set(name, lineage);
          graph.setColumns(name, lineage);
          this.cache?.put('lineage', fingerprint, { kind: 'lineage', lineage });
        } catch (error) {
          this.recordFailure(state, name, error);
        }
      });
    }
  }

  /**
   * Columns of every relation a model reads; an upstream model that failed
   * and has no documentation makes the model's lineage unavailable
   */
  private upstreamRelations(
    state: RunState,
    model: string,
    references: readonly Reference[]
  ): Map<string, UpstreamRelation> {
    const upstream = new Map<string, UpstreamRelation>();

    for (const reference of references) {
      if (reference.kind === 'source') {
        const documented = state.project.sources.get(reference.target)?.columns ?? [];
        upstream.set(reference.relation, {
          producer: reference.target,
          columns: documented.length > 0 ? documented.map((column) => column.name) : undefined,
        });
        continue;
      }

      const computed = state.lineage.get(reference.target)?.columns.map((column) => column.name);
      const documented = state.project.models.get(reference.target)?.columns ?? [];
      const columns =
        computed ?? (documented.length > 0 ? documented.map((column) => column.name) : undefined);
      if (!columns) {
        throw new LineageUnavailableError(
          model,
          reference.relation,
          `upstream model '${reference.target}' could not be analyzed and declares no columns`
        );
      }
      upstream.set(reference.relation, { producer: reference.target, columns });
    }

    return upstream;
  }

  private async validateAll(
    state: RunState,
    order: readonly string[],
    fingerprints: ReadonlyMap<string, string>
  ): Promise<Diagnostic[]> {
    const validator = new LineageValidator(state.project, {
      dialect: this.dialect,
      reportUndocumentedColumns: this.reportUndocumentedColumns,
      logger: state.logger,
    });
    const variant = this.reportUndocumentedColumns ? 'validation:undocumented' : 'validation';

    const validateOne = async (name: string): Promise<Diagnostic[]> => {
      const lineage = state.lineage.get(name);
      const fingerprint = fingerprints.get(name);
      if (!lineage || fingerprint === undefined) {
        return [];
      }
      const status = statusOf(state, name);
      const producers = fingerprintProducers(
        state.project,
        producersOf(lineage),
        fingerprints,
        state.versionTag
      );
      const key = fingerprintNode(variant, [fingerprint, ...producers], state.versionTag);

      const cached = await this.cache?.get('validation', key);
      if (cached && cached.model === name) {
        status.validation = 'hit';
        return cached.diagnostics.map((d) => Object.freeze(d));
      }

      status.validation = 'miss';
      const diagnostics = validator.validateModel(lineage, state.lineage);
      this.cache?.put('validation', key, { kind: 'validation', model: name, diagnostics });
      return diagnostics;
    };

    const perModel = await mapInBatches(order, this.concurrency, validateOne);
    return perModel.flat();
  }

  private recordFailure(state: RunState, model: string, error: unknown): void {
    const failure = toModelFailure(model, error);
    state.failures.set(model, failure);
    state.logger.warn({ model, code: failure.code }, failure.message);
  }
}

/**
 * Pipeline wired from environment configuration, with its cache store
 */
export function createLineagePipeline(config: AnalyzerConfig, logger?: Logger): LineagePipeline {
  const pipelineLogger =
    logger ??
    createLogger({ name: 'lineage-pipeline', level: config.logLevel, pretty: config.prettyLogs });
  const store = createCacheStoreFromConfig(config.cache, pipelineLogger);

  return new LineagePipeline({
    dialect: config.dialect,
    macroDepthLimit: config.macroDepthLimit,
    concurrency: config.concurrency,
    reportUndocumentedColumns: config.reportUndocumentedColumns,
    cache: new ContentCache(store, { logger: pipelineLogger }),
    logger: pipelineLogger,
  });
}
