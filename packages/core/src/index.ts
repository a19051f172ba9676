/**
 * @lineagekit/core
 *
 * Template rendering, column-level SQL lineage, content caching and
 * column-existence validation for SQL model projects.
 */

export {
  createLogger,
  withRunId,
  generateRunId,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ConfigurationError,
  ModelAnalysisError,
  TemplateSyntaxError,
  UnresolvedReferenceError,
  MacroRecursionError,
  MalformedQueryError,
  LineageUnavailableError,
  CyclicDependencyError,
  CacheStoreError,
  isOperationalError,
  isModelAnalysisError,
  toSafeErrorResponse,
  toError,
  toModelFailure,
  type SafeErrorDetails,
  type UnresolvedTargetKind,
} from './errors.js';

export {
  LineageEnvSchema,
  validateEnv,
  loadConfig,
  type LineageEnv,
  type AnalyzerConfig,
  type CacheDriverConfig,
} from './env.js';

export { chunkArray, mapInBatches } from './utils.js';

export * from './templating/index.js';
export * from './sql/index.js';
export * from './cache/index.js';
export * from './lineage/index.js';
