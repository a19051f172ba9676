/**
 * Execution analysis
 *
 * Decides which selected models must be built again by comparing the current
 * project with the build manifest written after earlier builds. A model runs
 * when it is stale itself, when a direct upstream model is stale, or when a
 * project macro it expands changed since its last build.
 *
 * @module core/lineage/execution
 */

import {
  BUILD_MANIFEST_VERSION,
  BuildManifestSchema,
  type BuildManifest,
  type BuildRecord,
  type ExecutionReason,
} from '@lineagekit/types';

import { contentFingerprint, macroFingerprint } from '../cache/fingerprint.js';
import type { AnalyzerConfig } from '../env.js';
import { ConfigurationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

import type { AnalysisReport } from './pipeline.js';
import type { Project } from './project.js';
import { selectModels } from './selection.js';

export const DEFAULT_BUILD_VALIDITY_MINUTES = 1440;

export interface ExecutionAnalyzerOptions {
  /** Minutes a successful build stays reusable (default: 1440) */
  validityMinutes?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface ModelExecutionAnalysis {
  model: string;
  needsExecution: boolean;
  reasons: ExecutionReason[];
}

export interface BuildOutcome {
  model: string;
  succeeded: boolean;
}

/**
 * @throws ConfigurationError if the value is not a build manifest
 */
export function parseBuildManifest(value: unknown): BuildManifest {
  const result = BuildManifestSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError('Invalid build manifest', result.error.flatten());
  }
  return result.data;
}

function indexRecords(manifest: BuildManifest | undefined): Map<string, BuildRecord> {
  const records = manifest?.models ?? [];
  return new Map(records.map((record): [string, BuildRecord] => [record.model, record]));
}

export class ExecutionAnalyzer {
  private readonly project: Project;
  private readonly validityMinutes: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(project: Project, options: ExecutionAnalyzerOptions = {}) {
    this.project = project;
    this.validityMinutes = options.validityMinutes ?? DEFAULT_BUILD_VALIDITY_MINUTES;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ name: 'execution-analyzer' });
  }

  /**
   * Analyze the selected models, or every model without a selector
   *
   * @throws ConfigurationError on malformed selectors or unknown models
   */
  analyze(
    report: AnalysisReport,
    manifest: BuildManifest | undefined,
    selector?: string
  ): Map<string, ModelExecutionAnalysis> {
    const records = indexRecords(manifest);
    const models = selector === undefined ? report.order : selectModels(report.graph, selector);

    const analyses = new Map<string, ModelExecutionAnalysis>();
    for (const name of models) {
      analyses.set(name, this.analyzeModel(name, report, records));
    }

    const toExecute = Array.from(analyses.values()).filter((a) => a.needsExecution).length;
    this.logger.info(
      { selected: models.length, toExecute, toSkip: models.length - toExecute },
      'Execution analysis completed'
    );
    return analyses;
  }

  private analyzeModel(
    name: string,
    report: AnalysisReport,
    records: ReadonlyMap<string, BuildRecord>
  ): ModelExecutionAnalysis {
    const reasons: ExecutionReason[] = [];

    const staleness = this.staleness(name, records);
    if (staleness) {
      reasons.push({ code: 'MODEL_STALE', description: `Model '${name}' ${staleness}` });
    }

    const changedModels = (report.graph.node(name)?.upstream ?? []).filter(
      (upstream) => this.staleness(upstream, records) !== undefined
    );
    if (changedModels.length > 0) {
      reasons.push({
        code: 'UPSTREAM_MODELS_CHANGED',
        description: `Upstream models changed: ${changedModels.join(', ')}`,
      });
    }

    const record = records.get(name);
    const changedMacros = (report.rendered.get(name)?.macros ?? []).filter((key) => {
      const macro = this.project.macros.get(key);
      if (!record || !macro) {
        return false;
      }
      return record.macros[key] !== macroFingerprint(key, macro);
    });
    if (changedMacros.length > 0) {
      reasons.push({
        code: 'UPSTREAM_MACROS_CHANGED',
        description: `Upstream macros changed: ${changedMacros.join(', ')}`,
      });
    }

    return { model: name, needsExecution: reasons.length > 0, reasons };
  }

  /**
   * Why the last build of a model cannot be reused; undefined when it can
   */
  private staleness(name: string, records: ReadonlyMap<string, BuildRecord>): string | undefined {
    const model = this.project.models.get(name);
    const record = records.get(name);
    if (!model || !record) {
      return 'has never been built';
    }
    if (!record.succeeded) {
      return 'failed its last build';
    }
    if (record.contentFingerprint !== contentFingerprint(model)) {
      return 'has changed since its last build';
    }
    if (Date.parse(record.builtAt) + this.validityMinutes * 60_000 < this.now().getTime()) {
      return `was built more than ${this.validityMinutes} minutes ago`;
    }
    return undefined;
  }

  /**
   * Manifest after building the given models; records of other models are kept
   *
   * @throws ConfigurationError if an outcome names a model outside the project
   */
  recordBuild(
    report: AnalysisReport,
    manifest: BuildManifest | undefined,
    outcomes: readonly BuildOutcome[]
  ): BuildManifest {
    const records = indexRecords(manifest);
    const builtAt = this.now().toISOString();

    for (const { model: name, succeeded } of outcomes) {
      const model = this.project.models.get(name);
      if (!model) {
        throw new ConfigurationError(`Unknown model in build outcome: '${name}'`);
      }
      const macros: Record<string, string> = {};
      for (const key of report.rendered.get(name)?.macros ?? []) {
        const macro = this.project.macros.get(key);
        if (macro) {
          macros[key] = macroFingerprint(key, macro);
        }
      }
      records.set(name, {
        model: name,
        contentFingerprint: contentFingerprint(model),
        macros,
        builtAt,
        succeeded,
      });
    }

    return {
      version: BUILD_MANIFEST_VERSION,
      models: Array.from(records.values()).sort((a, b) => a.model.localeCompare(b.model)),
    };
  }
}

/**
 * Analyzer using the configured build validity window
 */
export function createExecutionAnalyzer(
  project: Project,
  config: Pick<AnalyzerConfig, 'buildValidityMinutes'>,
  logger?: Logger
): ExecutionAnalyzer {
  return new ExecutionAnalyzer(project, { validityMinutes: config.buildValidityMinutes, logger });
}
