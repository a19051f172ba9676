/**
 * SQL tokenizer
 *
 * @module core/sql/tokenizer
 */

import { MalformedQueryError } from '../errors.js';

import type { DialectRules } from './dialect.js';

export type SqlToken =
  | { type: 'word'; value: string; upper: string; position: number }
  | { type: 'quoted'; value: string; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'number'; value: string; position: number }
  | { type: 'parameter'; value: string; position: number }
  | { type: 'operator'; value: string; position: number }
  | { type: 'eof'; position: number };

const OPERATORS = [
  '->>',
  '::',
  '<=>',
  '<=',
  '>=',
  '<>',
  '!=',
  '==',
  '||',
  '->',
  '=>',
  '+',
  '-',
  '*',
  '/',
  '%',
  '=',
  '<',
  '>',
  '(',
  ')',
  ',',
  '.',
  ';',
  '[',
  ']',
  '{',
  '}',
  ':',
  '|',
  '&',
  '^',
  '~',
];

const WORD = /^[\p{L}_][\p{L}\p{N}_$]*/u;
const NUMBER = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/;
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

/**
 * Read a delimited literal where a doubled closing character escapes itself
 */
function readDelimited(
  sql: string,
  start: number,
  close: string,
  backslashEscapes: boolean
): { value: string; end: number } | undefined {
  let value = '';
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (backslashEscapes && ch === '\\') {
      value += sql[i + 1] ?? '';
      i += 2;
      continue;
    }
    if (ch === close) {
      if (sql[i + 1] === close) {
        value += close;
        i += 2;
        continue;
      }
      return { value, end: i + 1 };
    }
    value += ch;
    i++;
  }
  return undefined;
}

/**
 * Split SQL text into tokens, dropping whitespace and comments
 *
 * @throws MalformedQueryError on unterminated literals/comments or unknown characters
 */
export function tokenize(sql: string, dialect: DialectRules, model: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i] ?? '';

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (sql.startsWith('--', i)) {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end + 1;
      continue;
    }

    if (sql.startsWith('/*', i)) {
      const end = sql.indexOf('*/', i + 2);
      if (end === -1) {
        throw new MalformedQueryError(model, 'unterminated block comment', i);
      }
      i = end + 2;
      continue;
    }

    const rest = sql.slice(i);

    if (ch === "'" || (ch === '"' && dialect.doubleQuotedStrings)) {
      const literal = readDelimited(sql, i, ch, dialect.doubleQuotedStrings);
      if (!literal) {
        throw new MalformedQueryError(model, 'unterminated string literal', i);
      }
      tokens.push({ type: 'string', value: literal.value, position: i });
      i = literal.end;
      continue;
    }

    const identifierClose = dialect.identifierQuotes[ch];
    if (identifierClose) {
      const literal = readDelimited(sql, i, identifierClose, false);
      if (!literal) {
        throw new MalformedQueryError(model, 'unterminated quoted identifier', i);
      }
      tokens.push({ type: 'quoted', value: literal.value, position: i });
      i = literal.end;
      continue;
    }

    if (ch === '$') {
      const tag = DOLLAR_TAG.exec(rest);
      if (tag) {
        const end = sql.indexOf(tag[0], i + tag[0].length);
        if (end === -1) {
          throw new MalformedQueryError(model, 'unterminated dollar-quoted string', i);
        }
        tokens.push({ type: 'string', value: sql.slice(i + tag[0].length, end), position: i });
        i = end + tag[0].length;
        continue;
      }
      const positional = /^\$\d+/.exec(rest);
      if (positional) {
        tokens.push({ type: 'parameter', value: positional[0], position: i });
        i += positional[0].length;
        continue;
      }
    }

    if (ch === '?') {
      tokens.push({ type: 'parameter', value: '?', position: i });
      i++;
      continue;
    }

    const number = NUMBER.exec(rest);
    if (number) {
      tokens.push({ type: 'number', value: number[0], position: i });
      i += number[0].length;
      continue;
    }

    const word = WORD.exec(rest);
    if (word) {
      tokens.push({ type: 'word', value: word[0], upper: word[0].toUpperCase(), position: i });
      i += word[0].length;
      continue;
    }

    const operator = OPERATORS.find((op) => sql.startsWith(op, i));
    if (operator) {
      tokens.push({ type: 'operator', value: operator, position: i });
      i += operator.length;
      continue;
    }

    throw new MalformedQueryError(model, `unexpected character '${ch}'`, i);
  }

  tokens.push({ type: 'eof', position: sql.length });
  return tokens;
}
