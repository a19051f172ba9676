/**
 * SQL parsing and column resolution
 *
 * @module core/sql
 */

export type * from './ast.js';
export {
  DIALECTS,
  getDialect,
  normalizeIdentifier,
  normalizeRelationName,
  type DialectRules,
  type IdentifierCase,
} from './dialect.js';
export { tokenize, type SqlToken } from './tokenizer.js';
export { parseQuery } from './parser.js';
export {
  ColumnResolver,
  unionProvenance,
  type ColumnResolverOptions,
  type UpstreamRelation,
  type UpstreamRelations,
} from './column-resolver.js';
