/**
 * Error taxonomy of the lineage pipeline
 *
 * Per-model errors (unresolved reference, macro recursion, malformed query,
 * unavailable lineage) fail one model and are collected into the report.
 * CyclicDependencyError aborts the whole run.
 */

import type { ModelFailure } from '@lineagekit/types';

export interface SafeErrorDetails {
  code: string;
  message: string;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for reporting surfaces
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Invalid configuration or project input
 */
export class ConfigurationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

// ============================================================================
// PER-MODEL ERRORS
// ============================================================================

/**
 * Base class for failures that only affect one model
 */
export class ModelAnalysisError extends AppError {
  public readonly model: string;

  constructor(model: string, message: string, code: string) {
    super(message, code);
    this.name = 'ModelAnalysisError';
    this.model = model;
  }
}

/**
 * Template text that cannot be parsed into directives
 */
export class TemplateSyntaxError extends ModelAnalysisError {
  public readonly offset: number;

  constructor(model: string, message: string, offset: number) {
    super(
      model,
      `Template syntax error in '${model}' at offset ${offset}: ${message}`,
      'TEMPLATE_SYNTAX_ERROR'
    );
    this.name = 'TemplateSyntaxError';
    this.offset = offset;
  }
}

export type UnresolvedTargetKind = 'model' | 'source' | 'macro' | 'var';

/**
 * A directive names something the project does not have
 */
export class UnresolvedReferenceError extends ModelAnalysisError {
  public readonly target: string;
  public readonly targetKind: UnresolvedTargetKind;

  constructor(model: string, target: string, targetKind: UnresolvedTargetKind = 'model') {
    super(
      model,
      `Model '${model}' references ${targetKind} '${target}' which does not exist in the project`,
      'UNRESOLVED_REFERENCE'
    );
    this.name = 'UnresolvedReferenceError';
    this.target = target;
    this.targetKind = targetKind;
  }
}

/**
 * Macro expansion exceeded the configured depth
 */
export class MacroRecursionError extends ModelAnalysisError {
  public readonly chain: readonly string[];
  public readonly depthLimit: number;

  constructor(model: string, chain: readonly string[], depthLimit: number) {
    super(
      model,
      `Macro expansion in '${model}' exceeded depth ${depthLimit}: ${chain.join(' -> ')}`,
      'MACRO_RECURSION'
    );
    this.name = 'MacroRecursionError';
    this.chain = chain;
    this.depthLimit = depthLimit;
  }
}

/**
 * Rendered SQL that cannot be parsed or is structurally invalid
 */
export class MalformedQueryError extends ModelAnalysisError {
  public readonly position: number | undefined;

  constructor(model: string, message: string, position?: number) {
    super(
      model,
      position === undefined
        ? `Malformed query in '${model}': ${message}`
        : `Malformed query in '${model}' at position ${position}: ${message}`,
      'MALFORMED_QUERY'
    );
    this.name = 'MalformedQueryError';
    this.position = position;
  }
}

/**
 * Columns of an upstream relation are needed but unknown
 */
export class LineageUnavailableError extends ModelAnalysisError {
  public readonly relation: string;

  constructor(model: string, relation: string, reason: string) {
    super(model, `Lineage of '${model}' is unavailable: ${reason}`, 'LINEAGE_UNAVAILABLE');
    this.name = 'LineageUnavailableError';
    this.relation = relation;
  }
}

// ============================================================================
// RUN-LEVEL ERRORS
// ============================================================================

/**
 * Model references form a cycle; no evaluation order exists
 */
export class CyclicDependencyError extends AppError {
  public readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Cyclic dependency between models: ${cycle.join(' -> ')}`, 'CYCLIC_DEPENDENCY');
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

/**
 * Cache store operation failed
 */
export class CacheStoreError extends AppError {
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(operation: string, message: string, originalError?: Error) {
    super(`Cache ${operation} failed: ${message}`, 'CACHE_STORE_ERROR');
    this.name = 'CacheStoreError';
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Check if error is operational (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Check if error fails a single model rather than the run
 */
export function isModelAnalysisError(error: unknown): error is ModelAnalysisError {
  return error instanceof ModelAnalysisError;
}

/**
 * Convert unknown error to safe error details
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
  };
}

/**
 * Normalize a caught value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Record a per-model failure for the analysis report
 *
 * Anything that is not a model analysis error is rethrown.
 */
export function toModelFailure(model: string, error: unknown): ModelFailure {
  if (!isModelAnalysisError(error)) {
    throw toError(error);
  }
  return { model, code: error.code, message: error.message };
}
