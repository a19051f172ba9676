/**
 * Project model, dependency graph, validation and the analysis pipeline
 *
 * @module core/lineage
 */

export { createProject, macroKey, modelRelation, type Project } from './project.js';
export {
  loadProjectFiles,
  extractMacros,
  type LoadProjectOptions,
  type LoadedProjectFiles,
} from './project-loader.js';
export {
  LineageGraph,
  LineageGraphBuilder,
  toMermaid,
  type GraphNode,
  type GraphStats,
} from './graph-builder.js';
export { parseSelector, selectModels, type ParsedSelector } from './selection.js';
export { LineageValidator, producersOf, type LineageValidatorOptions } from './validator.js';
export {
  LineagePipeline,
  createLineagePipeline,
  type AnalysisReport,
  type CacheOutcome,
  type LineagePipelineOptions,
  type ModelCacheStatus,
} from './pipeline.js';
export {
  ExecutionAnalyzer,
  createExecutionAnalyzer,
  parseBuildManifest,
  DEFAULT_BUILD_VALIDITY_MINUTES,
  type ExecutionAnalyzerOptions,
  type ModelExecutionAnalysis,
  type BuildOutcome,
} from './execution.js';
