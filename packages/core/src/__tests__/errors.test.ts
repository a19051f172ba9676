import { describe, it, expect } from 'vitest';
import {
  AppError,
  CacheStoreError,
  ConfigurationError,
  CyclicDependencyError,
  LineageUnavailableError,
  MacroRecursionError,
  MalformedQueryError,
  TemplateSyntaxError,
  UnresolvedReferenceError,
  isModelAnalysisError,
  isOperationalError,
  toError,
  toModelFailure,
  toSafeErrorResponse,
} from '../errors.js';

describe('AppError', () => {
  it('should create error with correct properties', () => {
    const error = new AppError('Test error', 'TEST_CODE');

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.isOperational).toBe(true);
    expect(error).toBeInstanceOf(Error);
  });

  it('should return safe error details', () => {
    expect(new AppError('Test', 'CODE').toSafeError()).toEqual({ code: 'CODE', message: 'Test' });
  });
});

describe('ConfigurationError', () => {
  it('should keep validation details', () => {
    const error = new ConfigurationError('Invalid project definition', { models: ['Required'] });

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.details).toEqual({ models: ['Required'] });
  });
});

describe('per-model errors', () => {
  it('should carry the model name and a stable code', () => {
    const errors = [
      new TemplateSyntaxError('m', "unterminated '{{' tag", 4),
      new UnresolvedReferenceError('m', 'orders'),
      new MacroRecursionError('m', ['m', 'loop', 'loop'], 1),
      new MalformedQueryError('m', 'unexpected end of input', 12),
      new LineageUnavailableError('m', 'main.orders', 'columns unknown'),
    ];

    expect(errors.map((error) => [error.model, error.code])).toEqual([
      ['m', 'TEMPLATE_SYNTAX_ERROR'],
      ['m', 'UNRESOLVED_REFERENCE'],
      ['m', 'MACRO_RECURSION'],
      ['m', 'MALFORMED_QUERY'],
      ['m', 'LINEAGE_UNAVAILABLE'],
    ]);
    expect(errors.every((error) => isModelAnalysisError(error))).toBe(true);
  });

  it('should format messages with their location', () => {
    expect(new TemplateSyntaxError('m', "unterminated '{{' tag", 4).message).toBe(
      "Template syntax error in 'm' at offset 4: unterminated '{{' tag"
    );
    expect(new UnresolvedReferenceError('m', 'shop.orders', 'source').message).toBe(
      "Model 'm' references source 'shop.orders' which does not exist in the project"
    );
    const malformed = new MalformedQueryError('m', 'empty query');
    const unavailable = new LineageUnavailableError('m', 'main.orders', 'columns unknown');
    expect(malformed.message).toBe("Malformed query in 'm': empty query");
    expect(unavailable.relation).toBe('main.orders');
  });
});

describe('run-level errors', () => {
  it('should not be model analysis errors', () => {
    expect(isModelAnalysisError(new CyclicDependencyError(['a', 'b', 'a']))).toBe(false);
    expect(isModelAnalysisError(new CacheStoreError('read', 'disk'))).toBe(false);
  });

  it('should prefix cache store failures with the operation', () => {
    const cause = new Error('EACCES');
    const error = new CacheStoreError('write', 'cannot write entry k', cause);

    expect(error.message).toBe('Cache write failed: cannot write entry k');
    expect(error.operation).toBe('write');
    expect(error.originalError).toBe(cause);
  });
});

describe('isOperationalError', () => {
  it('should return true for AppError instances', () => {
    expect(isOperationalError(new ConfigurationError('bad'))).toBe(true);
  });

  it('should return false for regular errors and non-errors', () => {
    expect(isOperationalError(new Error('Regular'))).toBe(false);
    expect(isOperationalError('string')).toBe(false);
    expect(isOperationalError(null)).toBe(false);
  });
});

describe('toSafeErrorResponse', () => {
  it('should return safe error for operational errors', () => {
    expect(toSafeErrorResponse(new MalformedQueryError('m', 'empty query'))).toEqual({
      code: 'MALFORMED_QUERY',
      message: "Malformed query in 'm': empty query",
    });
  });

  it('should hide details of unexpected errors', () => {
    expect(toSafeErrorResponse(new Error('Internal details'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
});

describe('toError', () => {
  it('should keep errors and wrap other values', () => {
    const error = new Error('x');

    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
  });
});

describe('toModelFailure', () => {
  it('should record model analysis errors', () => {
    expect(toModelFailure('m', new UnresolvedReferenceError('m', 'orders'))).toEqual({
      model: 'm',
      code: 'UNRESOLVED_REFERENCE',
      message: "Model 'm' references model 'orders' which does not exist in the project",
    });
  });

  it('should rethrow anything else', () => {
    expect(() => toModelFailure('m', new TypeError('bug'))).toThrow(TypeError);
    const cycle = new CyclicDependencyError(['a', 'a']);
    expect(() => toModelFailure('m', cycle)).toThrow(CyclicDependencyError);
  });
});
