/**
 * SQL dialect rules the resolver depends on
 *
 * @module core/sql/dialect
 */

import type { SqlDialect } from '@lineagekit/types';

/**
 * `lower`/`upper` fold unquoted identifiers only; `insensitive` folds quoted
 * identifiers as well
 */
export type IdentifierCase = 'lower' | 'upper' | 'insensitive';

export interface DialectRules {
  name: SqlDialect;
  /** Folding applied to identifiers before comparison */
  identifierCase: IdentifierCase;
  /** Characters opening a quoted identifier, mapped to their closing character */
  identifierQuotes: Readonly<Record<string, string>>;
  /** Whether `"..."` is a string literal rather than an identifier */
  doubleQuotedStrings: boolean;
}

const ANSI_QUOTES = { '"': '"' } as const;
const BACKTICK_QUOTES = { '`': '`' } as const;

export const DIALECTS: Readonly<Record<SqlDialect, DialectRules>> = {
  duckdb: {
    name: 'duckdb',
    identifierCase: 'lower',
    identifierQuotes: ANSI_QUOTES,
    doubleQuotedStrings: false,
  },
  postgres: {
    name: 'postgres',
    identifierCase: 'lower',
    identifierQuotes: ANSI_QUOTES,
    doubleQuotedStrings: false,
  },
  redshift: {
    name: 'redshift',
    identifierCase: 'lower',
    identifierQuotes: ANSI_QUOTES,
    doubleQuotedStrings: false,
  },
  snowflake: {
    name: 'snowflake',
    identifierCase: 'upper',
    identifierQuotes: ANSI_QUOTES,
    doubleQuotedStrings: false,
  },
  bigquery: {
    name: 'bigquery',
    identifierCase: 'insensitive',
    identifierQuotes: BACKTICK_QUOTES,
    doubleQuotedStrings: true,
  },
  databricks: {
    name: 'databricks',
    identifierCase: 'insensitive',
    identifierQuotes: BACKTICK_QUOTES,
    doubleQuotedStrings: true,
  },
  mysql: {
    name: 'mysql',
    identifierCase: 'insensitive',
    identifierQuotes: BACKTICK_QUOTES,
    doubleQuotedStrings: true,
  },
  athena: {
    name: 'athena',
    identifierCase: 'lower',
    identifierQuotes: { '"': '"', '`': '`' },
    doubleQuotedStrings: false,
  },
  trino: {
    name: 'trino',
    identifierCase: 'lower',
    identifierQuotes: ANSI_QUOTES,
    doubleQuotedStrings: false,
  },
};

export function getDialect(name: SqlDialect): DialectRules {
  return DIALECTS[name];
}

/**
 * Normalize an identifier the way the dialect compares it
 */
export function normalizeIdentifier(value: string, quoted: boolean, dialect: DialectRules): string {
  switch (dialect.identifierCase) {
    case 'insensitive':
      return value.toLowerCase();
    case 'lower':
      return quoted ? value : value.toLowerCase();
    case 'upper':
      return quoted ? value : value.toUpperCase();
  }
}

/**
 * Normalize a dotted relation identifier as written by the renderer (unquoted parts)
 */
export function normalizeRelationName(relation: string, dialect: DialectRules): string {
  return relation
    .split('.')
    .map((part) => normalizeIdentifier(part, false, dialect))
    .join('.');
}
