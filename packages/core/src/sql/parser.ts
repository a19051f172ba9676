/**
 * SQL parser
 *
 * Recursive-descent parser from rendered model SQL to the query AST. Accepts
 * exactly one statement; constructs it does not understand raise
 * MalformedQueryError with the offending position.
 *
 * @module core/sql/parser
 */

import { MalformedQueryError } from '../errors.js';

import type {
  CommonTableExpression,
  Expr,
  FromItem,
  Identifier,
  JoinType,
  Query,
  ReplaceItem,
  SelectItem,
  SelectQuery,
  SetOperator,
  WhenClause,
  WindowSpec,
  WithClause,
} from './ast.js';
import type { DialectRules } from './dialect.js';
import { tokenize, type SqlToken } from './tokenizer.js';

/** Words that are never an unquoted identifier or alias */
const RESERVED = new Set([
  'ALL',
  'AND',
  'ANTI',
  'AS',
  'BETWEEN',
  'BY',
  'CASE',
  'CAST',
  'CROSS',
  'DISTINCT',
  'ELSE',
  'END',
  'EXCEPT',
  'EXISTS',
  'FALSE',
  'FETCH',
  'FROM',
  'FULL',
  'GROUP',
  'HAVING',
  'ILIKE',
  'IN',
  'INNER',
  'INTERSECT',
  'INTERVAL',
  'IS',
  'JOIN',
  'LATERAL',
  'LEFT',
  'LIKE',
  'LIMIT',
  'NATURAL',
  'NOT',
  'NULL',
  'OFFSET',
  'ON',
  'OR',
  'ORDER',
  'OUTER',
  'OVER',
  'QUALIFY',
  'RIGHT',
  'RLIKE',
  'SELECT',
  'SEMI',
  'SIMILAR',
  'THEN',
  'TRUE',
  'UNION',
  'USING',
  'VALUES',
  'WHEN',
  'WHERE',
  'WINDOW',
  'WITH',
]);

/** Non-reserved words that still end an expression instead of aliasing it */
const ALIAS_STOP = new Set(['ASOF', 'POSITIONAL', 'TABLESAMPLE', 'PIVOT', 'UNPIVOT', 'EXCLUDE']);

/** Reserved words that may still name a function */
const FUNCTION_KEYWORDS = new Set(['LEFT', 'RIGHT']);

/** Functions callable without parentheses */
const NILADIC_FUNCTIONS = new Set([
  'CURRENT_DATE',
  'CURRENT_TIME',
  'CURRENT_TIMESTAMP',
  'LOCALTIME',
  'LOCALTIMESTAMP',
  'CURRENT_USER',
  'SESSION_USER',
  'CURRENT_SCHEMA',
]);

const COMPARISON_OPERATORS = new Set(['=', '==', '<>', '!=', '<', '>', '<=', '>=', '<=>', '=>']);
const ADDITIVE_OPERATORS = new Set(['+', '-', '||', '->', '->>', '&', '|', '^']);
const MULTIPLICATIVE_OPERATORS = new Set(['*', '/', '%']);
const PATTERN_OPERATORS = new Set(['LIKE', 'ILIKE', 'RLIKE', 'SIMILAR']);

const INTERVAL_UNITS = new Set(
  [
    'YEAR',
    'QUARTER',
    'MONTH',
    'WEEK',
    'DAY',
    'HOUR',
    'MINUTE',
    'SECOND',
    'MILLISECOND',
    'MICROSECOND',
  ].flatMap((unit) => [unit, `${unit}S`])
);

const TYPE_CONTINUATIONS = new Set(['PRECISION', 'VARYING', 'WITH', 'WITHOUT', 'TIME', 'ZONE']);

function describe(token: SqlToken): string {
  return token.type === 'eof' ? 'end of input' : `'${token.value}'`;
}

class SqlParser {
  private readonly tokens: SqlToken[];
  private index = 0;

  constructor(
    sql: string,
    dialect: DialectRules,
    private readonly model: string
  ) {
    this.tokens = tokenize(sql, dialect, model);
  }

  // ===========================================================================
  // TOKEN HELPERS
  // ===========================================================================

  private peek(offset = 0): SqlToken {
    const token = this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
    if (!token) {
      return { type: 'eof', position: 0 };
    }
    return token;
  }

  private advance(): SqlToken {
    const token = this.peek();
    if (token.type !== 'eof') {
      this.index++;
    }
    return token;
  }

  private fail(message: string, token: SqlToken = this.peek()): never {
    throw new MalformedQueryError(this.model, message, token.position);
  }

  /** Upper-cased word at the offset, undefined for any other token */
  private wordAt(offset = 0): string | undefined {
    const token = this.peek(offset);
    return token.type === 'word' ? token.upper : undefined;
  }

  private atKeyword(...words: string[]): boolean {
    const word = this.wordAt();
    return word !== undefined && words.includes(word);
  }

  private acceptKeyword(word: string): boolean {
    if (this.wordAt() === word) {
      this.index++;
      return true;
    }
    return false;
  }

  private expectKeyword(word: string): void {
    if (!this.acceptKeyword(word)) {
      this.fail(`expected ${word}, found ${describe(this.peek())}`);
    }
  }

  private operatorAt(offset = 0): string | undefined {
    const token = this.peek(offset);
    return token.type === 'operator' ? token.value : undefined;
  }

  private acceptOperator(operator: string): boolean {
    if (this.operatorAt() === operator) {
      this.index++;
      return true;
    }
    return false;
  }

  private expectOperator(operator: string): void {
    if (!this.acceptOperator(operator)) {
      this.fail(`expected '${operator}', found ${describe(this.peek())}`);
    }
  }

  private isIdentifierAt(offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'quoted' || (token.type === 'word' && !RESERVED.has(token.upper));
  }

  private parseIdentifier(): Identifier {
    const token = this.peek();
    if (token.type === 'quoted') {
      this.index++;
      return { value: token.value, quoted: true };
    }
    if (token.type === 'word' && !RESERVED.has(token.upper)) {
      this.index++;
      return { value: token.value, quoted: false };
    }
    return this.fail(`expected identifier, found ${describe(token)}`);
  }

  /** Identifier after a dot, where reserved words are plain names */
  private parseMemberName(): Identifier {
    const token = this.peek();
    if (token.type === 'word') {
      this.index++;
      return { value: token.value, quoted: false };
    }
    return this.parseIdentifier();
  }

  private parseIdentifierList(): Identifier[] {
    this.expectOperator('(');
    const identifiers = [this.parseIdentifier()];
    while (this.acceptOperator(',')) {
      identifiers.push(this.parseIdentifier());
    }
    this.expectOperator(')');
    return identifiers;
  }

  private parseExprList(): Expr[] {
    const exprs = [this.parseExpr()];
    while (this.acceptOperator(',')) {
      exprs.push(this.parseExpr());
    }
    return exprs;
  }

  /** Whether a query starts at the offset, looking through opening parentheses */
  private queryStartsAt(offset: number): boolean {
    let k = offset;
    while (this.operatorAt(k) === '(') {
      k++;
    }
    const word = this.wordAt(k);
    return word === 'SELECT' || word === 'WITH' || word === 'VALUES';
  }

  // ===========================================================================
  // STATEMENTS AND QUERIES
  // ===========================================================================

  parseStatement(): Query {
    while (this.acceptOperator(';')) {
      // leading empty statements
    }
    const query = this.parseQuery();
    while (this.acceptOperator(';')) {
      // trailing terminators
    }
    const rest = this.peek();
    if (rest.type !== 'eof') {
      this.fail(`expected a single statement, found ${describe(rest)}`, rest);
    }
    return query;
  }

  private parseQuery(): Query {
    const withClause = this.atKeyword('WITH') ? this.parseWith() : undefined;
    let query = this.parseSetExpression();

    let orderBy: Expr[] = [];
    if (this.acceptKeyword('ORDER')) {
      this.expectKeyword('BY');
      orderBy = this.parseOrderList();
    }
    const { limit, offset } = this.parseLimit();

    if (query.kind !== 'values') {
      query = {
        ...query,
        orderBy: orderBy.length > 0 ? orderBy : query.orderBy,
        limit: limit ?? query.limit,
        offset: offset ?? query.offset,
      };
    }

    if (withClause) {
      query = { ...query, with: mergeWith(withClause, query.with) };
    }
    return query;
  }

  private parseLimit(): { limit: Expr | undefined; offset: Expr | undefined } {
    let limit: Expr | undefined;
    let offset: Expr | undefined;

    for (;;) {
      if (this.acceptKeyword('LIMIT')) {
        limit = this.acceptKeyword('ALL') ? undefined : this.parseExpr();
        if (this.acceptOperator(',')) {
          offset = limit;
          limit = this.parseExpr();
        }
      } else if (this.acceptKeyword('OFFSET')) {
        offset = this.parseExpr();
        if (this.atKeyword('ROW', 'ROWS')) {
          this.advance();
        }
      } else if (this.acceptKeyword('FETCH')) {
        if (!this.atKeyword('FIRST', 'NEXT')) {
          this.fail(`expected FIRST or NEXT, found ${describe(this.peek())}`);
        }
        this.advance();
        limit = this.atKeyword('ROW', 'ROWS') ? undefined : this.parseExpr();
        if (!this.atKeyword('ROW', 'ROWS')) {
          this.fail(`expected ROWS, found ${describe(this.peek())}`);
        }
        this.advance();
        this.expectKeyword('ONLY');
      } else {
        return { limit, offset };
      }
    }
  }

  private parseWith(): WithClause {
    this.expectKeyword('WITH');
    const recursive = this.acceptKeyword('RECURSIVE');
    const ctes: CommonTableExpression[] = [];

    do {
      const name = this.parseIdentifier();
      const columns = this.operatorAt() === '(' ? this.parseIdentifierList() : [];
      this.expectKeyword('AS');
      if (this.acceptKeyword('NOT')) {
        this.expectKeyword('MATERIALIZED');
      } else {
        this.acceptKeyword('MATERIALIZED');
      }
      this.expectOperator('(');
      const query = this.parseQuery();
      this.expectOperator(')');
      ctes.push({ name, columns, query });
    } while (this.acceptOperator(','));

    return { recursive, ctes };
  }

  private parseSetExpression(): Query {
    let left = this.parseQueryTerm();

    for (;;) {
      const word = this.wordAt();
      if (word !== 'UNION' && word !== 'INTERSECT' && word !== 'EXCEPT') {
        return left;
      }
      this.advance();
      const operator: SetOperator =
        word === 'UNION' ? 'union' : word === 'INTERSECT' ? 'intersect' : 'except';
      const all = this.acceptKeyword('ALL');
      if (!all) {
        this.acceptKeyword('DISTINCT');
      }
      const right = this.parseQueryTerm();
      left = {
        kind: 'set-operation',
        with: undefined,
        operator,
        all,
        left,
        right,
        orderBy: [],
        limit: undefined,
        offset: undefined,
      };
    }
  }

  private parseQueryTerm(): Query {
    if (this.acceptOperator('(')) {
      const query = this.parseQuery();
      this.expectOperator(')');
      return query;
    }
    if (this.atKeyword('SELECT')) {
      return this.parseSelect();
    }
    if (this.acceptKeyword('VALUES')) {
      const rows: Expr[][] = [];
      do {
        this.expectOperator('(');
        rows.push(this.parseExprList());
        this.expectOperator(')');
      } while (this.acceptOperator(','));
      return { kind: 'values', with: undefined, rows };
    }
    return this.fail(`expected SELECT, found ${describe(this.peek())}`);
  }

  private parseSelect(): SelectQuery {
    this.expectKeyword('SELECT');

    let distinct = false;
    let distinctOn: Expr[] = [];
    if (this.acceptKeyword('DISTINCT')) {
      distinct = true;
      if (this.acceptKeyword('ON')) {
        this.expectOperator('(');
        distinctOn = this.parseExprList();
        this.expectOperator(')');
      }
    } else {
      this.acceptKeyword('ALL');
    }

    const items = [this.parseSelectItem()];
    while (this.acceptOperator(',')) {
      if (this.atKeyword('FROM')) {
        break;
      }
      items.push(this.parseSelectItem());
    }

    const from = this.acceptKeyword('FROM') ? this.parseFromList() : undefined;
    const where = this.acceptKeyword('WHERE') ? this.parseExpr() : undefined;

    let groupBy: Expr[] = [];
    if (this.acceptKeyword('GROUP')) {
      this.expectKeyword('BY');
      groupBy = this.acceptKeyword('ALL') ? [] : this.parseExprList();
    }

    const having = this.acceptKeyword('HAVING') ? this.parseExpr() : undefined;

    const windows: SelectQuery['windows'] = [];
    let qualify: Expr | undefined;
    for (;;) {
      if (this.acceptKeyword('WINDOW')) {
        do {
          const name = this.parseIdentifier();
          this.expectKeyword('AS');
          windows.push({ name, spec: this.parseWindowSpec() });
        } while (this.acceptOperator(','));
      } else if (this.acceptKeyword('QUALIFY')) {
        qualify = this.parseExpr();
      } else {
        break;
      }
    }

    return {
      kind: 'select',
      with: undefined,
      distinct,
      distinctOn,
      items,
      from,
      where,
      groupBy,
      having,
      windows,
      qualify,
      orderBy: [],
      limit: undefined,
      offset: undefined,
    };
  }

  private parseSelectItem(): SelectItem {
    if (this.acceptOperator('*')) {
      return this.parseWildcardModifiers([]);
    }

    let k = 0;
    while (this.isIdentifierAt(k) && this.operatorAt(k + 1) === '.') {
      k += 2;
    }
    if (k > 0 && this.operatorAt(k) === '*') {
      const qualifier: Identifier[] = [];
      while (this.operatorAt() !== '*') {
        qualifier.push(this.parseIdentifier());
        this.expectOperator('.');
      }
      this.expectOperator('*');
      return this.parseWildcardModifiers(qualifier);
    }

    const expr = this.parseExpr();
    return { kind: 'expression', expr, alias: this.parseAlias() };
  }

  private parseWildcardModifiers(qualifier: Identifier[]): SelectItem {
    const exclude: Identifier[] = [];
    const replace: ReplaceItem[] = [];

    for (;;) {
      if (this.acceptKeyword('EXCLUDE')) {
        if (this.operatorAt() === '(') {
          exclude.push(...this.parseIdentifierList());
        } else {
          exclude.push(this.parseIdentifier());
        }
      } else if (this.wordAt() === 'EXCEPT' && this.operatorAt(1) === '(') {
        this.advance();
        exclude.push(...this.parseIdentifierList());
      } else if (this.wordAt() === 'REPLACE' && this.operatorAt(1) === '(') {
        this.advance();
        this.expectOperator('(');
        do {
          const expr = this.parseExpr();
          this.expectKeyword('AS');
          replace.push({ expr, alias: this.parseIdentifier() });
        } while (this.acceptOperator(','));
        this.expectOperator(')');
      } else {
        return { kind: 'wildcard', qualifier, exclude, replace };
      }
    }
  }

  private parseAlias(): Identifier | undefined {
    if (this.acceptKeyword('AS')) {
      const token = this.peek();
      if (token.type === 'string') {
        this.index++;
        return { value: token.value, quoted: true };
      }
      return this.parseIdentifier();
    }
    const word = this.wordAt();
    if (this.isIdentifierAt() && (word === undefined || !ALIAS_STOP.has(word))) {
      return this.parseIdentifier();
    }
    return undefined;
  }

  // ===========================================================================
  // FROM CLAUSE
  // ===========================================================================

  private parseFromList(): FromItem {
    let left = this.parseJoinedTable();
    while (this.acceptOperator(',')) {
      const right = this.parseJoinedTable();
      left = {
        kind: 'join',
        joinType: 'comma',
        natural: false,
        left,
        right,
        on: undefined,
        using: [],
      };
    }
    return left;
  }

  private parseJoinedTable(): FromItem {
    let left = this.parseTablePrimary();

    for (;;) {
      const join = this.parseJoinKeyword();
      if (!join) {
        return left;
      }
      const right = this.parseTablePrimary();
      let on: Expr | undefined;
      let using: Identifier[] = [];
      if (this.acceptKeyword('ON')) {
        on = this.parseExpr();
      } else if (this.acceptKeyword('USING')) {
        using = this.parseIdentifierList();
      }
      left = {
        kind: 'join',
        joinType: join.joinType,
        natural: join.natural,
        left,
        right,
        on,
        using,
      };
    }
  }

  private parseJoinKeyword(): { joinType: JoinType; natural: boolean } | undefined {
    const natural = this.acceptKeyword('NATURAL');
    let joinType: JoinType | undefined;

    const word = this.wordAt();
    if (word === 'JOIN') {
      joinType = 'inner';
    } else if (word === 'INNER') {
      this.advance();
      joinType = 'inner';
    } else if (word === 'LEFT' || word === 'RIGHT' || word === 'FULL') {
      this.advance();
      if (word === 'LEFT' && this.atKeyword('SEMI', 'ANTI')) {
        joinType = this.wordAt() === 'SEMI' ? 'semi' : 'anti';
        this.advance();
      } else {
        this.acceptKeyword('OUTER');
        joinType = word === 'LEFT' ? 'left' : word === 'RIGHT' ? 'right' : 'full';
      }
    } else if (word === 'CROSS') {
      this.advance();
      joinType = 'cross';
    } else if (word === 'SEMI' || word === 'ANTI') {
      this.advance();
      joinType = word === 'SEMI' ? 'semi' : 'anti';
    }

    if (joinType === undefined) {
      if (natural) {
        this.fail(`expected JOIN after NATURAL, found ${describe(this.peek())}`);
      }
      return undefined;
    }
    this.expectKeyword('JOIN');
    return { joinType, natural };
  }

  private parseTablePrimary(): FromItem {
    const lateral = this.acceptKeyword('LATERAL');

    if (this.operatorAt() === '(') {
      if (this.queryStartsAt(1)) {
        this.advance();
        const query = this.parseQuery();
        this.expectOperator(')');
        const { alias, columnAliases } = this.parseTableAlias();
        return { kind: 'subquery', query, alias, columnAliases, lateral };
      }
      this.advance();
      const nested = this.parseJoinedTable();
      this.expectOperator(')');
      return nested;
    }

    const name = [this.parseIdentifier()];
    while (this.acceptOperator('.')) {
      name.push(this.parseMemberName());
    }

    if (this.operatorAt() === '(') {
      this.advance();
      const args = this.operatorAt() === ')' ? [] : this.parseExprList();
      this.expectOperator(')');
      const { alias, columnAliases } = this.parseTableAlias();
      return {
        kind: 'table-function',
        name: name.map((part) => part.value).join('.'),
        args,
        alias,
        columnAliases,
      };
    }

    const { alias, columnAliases } = this.parseTableAlias();
    return { kind: 'table', name, alias, columnAliases };
  }

  private parseTableAlias(): { alias: Identifier | undefined; columnAliases: Identifier[] } {
    const alias = this.parseAlias();
    const columnAliases = alias && this.operatorAt() === '(' ? this.parseIdentifierList() : [];
    return { alias, columnAliases };
  }

  // ===========================================================================
  // EXPRESSIONS
  // ===========================================================================

  parseExpr(): Expr {
    return this.parseOr();
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.acceptKeyword('OR')) {
      left = { kind: 'binary', operator: 'OR', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseNot();
    while (this.acceptKeyword('AND')) {
      left = { kind: 'binary', operator: 'AND', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.atKeyword('NOT') && this.wordAt(1) !== 'EXISTS') {
      this.advance();
      return { kind: 'unary', operator: 'NOT', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    let left = this.parseAdditive();

    for (;;) {
      const operator = this.operatorAt();
      if (operator !== undefined && COMPARISON_OPERATORS.has(operator)) {
        this.advance();
        left = { kind: 'binary', operator, left, right: this.parseAdditive() };
        continue;
      }

      if (this.acceptKeyword('IS')) {
        const negated = this.acceptKeyword('NOT');
        if (this.acceptKeyword('DISTINCT')) {
          this.expectKeyword('FROM');
          left = {
            kind: 'binary',
            operator: negated ? 'IS NOT DISTINCT FROM' : 'IS DISTINCT FROM',
            left,
            right: this.parseAdditive(),
          };
        } else {
          left = { kind: 'is', expr: left, value: this.parsePrimary(), negated };
        }
        continue;
      }

      const negated = this.atKeyword('NOT');
      const predicate = this.wordAt(negated ? 1 : 0);
      if (predicate === 'IN') {
        this.index += negated ? 2 : 1;
        left = this.parseInPredicate(left, negated);
      } else if (predicate === 'BETWEEN') {
        this.index += negated ? 2 : 1;
        const low = this.parseAdditive();
        this.expectKeyword('AND');
        left = { kind: 'between', expr: left, low, high: this.parseAdditive(), negated };
      } else if (predicate !== undefined && PATTERN_OPERATORS.has(predicate)) {
        this.index += negated ? 2 : 1;
        if (predicate === 'SIMILAR') {
          this.expectKeyword('TO');
        }
        const pattern = this.parseAdditive();
        const right: Expr = this.acceptKeyword('ESCAPE')
          ? { kind: 'binary', operator: 'ESCAPE', left: pattern, right: this.parseAdditive() }
          : pattern;
        const binary: Expr = { kind: 'binary', operator: predicate, left, right };
        left = negated ? { kind: 'unary', operator: 'NOT', operand: binary } : binary;
      } else {
        return left;
      }
    }
  }

  private parseInPredicate(expr: Expr, negated: boolean): Expr {
    if (this.operatorAt() !== '(') {
      return { kind: 'in', expr, list: [this.parseAdditive()], query: undefined, negated };
    }
    if (this.queryStartsAt(1)) {
      this.advance();
      const query = this.parseQuery();
      this.expectOperator(')');
      return { kind: 'in', expr, list: [], query, negated };
    }
    this.advance();
    const list = this.operatorAt() === ')' ? [] : this.parseExprList();
    this.expectOperator(')');
    return { kind: 'in', expr, list, query: undefined, negated };
  }

  private parseAdditive(): Expr {
    let left = this.parseMultiplicative();
    for (;;) {
      const operator = this.operatorAt();
      if (operator === undefined || !ADDITIVE_OPERATORS.has(operator)) {
        return left;
      }
      this.advance();
      left = { kind: 'binary', operator, left, right: this.parseMultiplicative() };
    }
  }

  private parseMultiplicative(): Expr {
    let left = this.parseUnary();
    for (;;) {
      const operator = this.operatorAt();
      if (operator === undefined || !MULTIPLICATIVE_OPERATORS.has(operator)) {
        return left;
      }
      this.advance();
      left = { kind: 'binary', operator, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): Expr {
    const operator = this.operatorAt();
    if (operator === '-' || operator === '+' || operator === '~') {
      this.advance();
      return { kind: 'unary', operator, operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();

    for (;;) {
      if (this.acceptOperator('::')) {
        expr = { kind: 'cast', expr, type: this.parseTypeName() };
      } else if (this.acceptOperator('[')) {
        const index = this.operatorAt() === ':' ? expr : this.parseExpr();
        if (this.acceptOperator(':')) {
          this.parseExpr();
        }
        this.expectOperator(']');
        expr = { kind: 'binary', operator: '[]', left: expr, right: index };
      } else if (this.operatorAt() === '.' && expr.kind !== 'column') {
        this.advance();
        this.parseMemberName();
      } else if (this.wordAt() === 'AT' && this.wordAt(1) === 'TIME') {
        this.advance();
        this.advance();
        this.expectKeyword('ZONE');
        expr = { kind: 'binary', operator: 'AT TIME ZONE', left: expr, right: this.parseUnary() };
      } else if (this.acceptKeyword('COLLATE')) {
        this.advance();
      } else {
        return expr;
      }
    }
  }

  private parseTypeName(): string {
    const parts = [this.parseMemberName().value];
    while (this.acceptOperator('.')) {
      parts.push(this.parseMemberName().value);
    }
    let type = parts.join('.');

    for (;;) {
      const word = this.wordAt();
      if (word !== undefined && TYPE_CONTINUATIONS.has(word)) {
        this.advance();
        type += ` ${word}`;
      } else {
        break;
      }
    }
    if (this.operatorAt() === '(') {
      type += this.collectBalanced();
    }
    while (this.operatorAt() === '[' && this.operatorAt(1) === ']') {
      this.advance();
      this.advance();
      type += '[]';
    }
    return type;
  }

  /** Consume a parenthesized token run verbatim, returning its text */
  private collectBalanced(): string {
    let depth = 0;
    let text = '';
    do {
      const token = this.advance();
      if (token.type === 'eof') {
        this.fail("expected ')', found end of input", token);
      }
      if (token.type === 'operator' && token.value === '(') {
        depth++;
      } else if (token.type === 'operator' && token.value === ')') {
        depth--;
      }
      text += token.value;
    } while (depth > 0);
    return text;
  }

  private parsePrimary(): Expr {
    const token = this.peek();

    switch (token.type) {
      case 'number':
        this.advance();
        return { kind: 'literal', type: 'number', value: token.value };
      case 'string':
        this.advance();
        return { kind: 'literal', type: 'string', value: token.value };
      case 'parameter':
        this.advance();
        return { kind: 'parameter', value: token.value };
      case 'operator':
        return this.parseOperatorPrimary(token);
      case 'quoted':
        return this.parseNameExpression();
      case 'word':
        return this.parseWordPrimary(token.upper);
      case 'eof':
        return this.fail('unexpected end of input', token);
    }
  }

  private parseOperatorPrimary(token: SqlToken): Expr {
    if (this.acceptOperator('(')) {
      if (this.queryStartsAt(0)) {
        const query = this.parseQuery();
        this.expectOperator(')');
        return { kind: 'subquery', query };
      }
      const first = this.parseExpr();
      if (this.operatorAt() === ',') {
        const args = [first];
        while (this.acceptOperator(',')) {
          args.push(this.parseExpr());
        }
        this.expectOperator(')');
        return callOf('row', args);
      }
      this.expectOperator(')');
      return first;
    }
    if (this.acceptOperator('[')) {
      const elements = this.operatorAt() === ']' ? [] : this.parseExprList();
      this.expectOperator(']');
      return { kind: 'array', elements };
    }
    if (this.acceptOperator('*')) {
      return { kind: 'star', qualifier: [] };
    }
    return this.fail(`unexpected ${describe(token)}`, token);
  }

  private parseWordPrimary(word: string): Expr {
    switch (word) {
      case 'TRUE':
      case 'FALSE':
        this.advance();
        return { kind: 'literal', type: 'boolean', value: word };
      case 'NULL':
        this.advance();
        return { kind: 'literal', type: 'null', value: word };
      case 'CASE':
        return this.parseCase();
      case 'EXISTS':
      case 'NOT': {
        const negated = this.acceptKeyword('NOT');
        this.expectKeyword('EXISTS');
        this.expectOperator('(');
        const query = this.parseQuery();
        this.expectOperator(')');
        return { kind: 'exists', query, negated };
      }
      case 'INTERVAL':
        return this.parseInterval();
    }

    const callFollows = this.operatorAt(1) === '(';
    if (NILADIC_FUNCTIONS.has(word) && this.operatorAt(1) !== '.') {
      this.advance();
      const name = word.toLowerCase();
      return callFollows ? this.parseFunctionCall(name) : callOf(name, []);
    }
    if (callFollows && (word === 'CAST' || word === 'TRY_CAST' || word === 'SAFE_CAST')) {
      return this.parseCast();
    }
    if (callFollows && word === 'EXTRACT') {
      this.advance();
      this.advance();
      this.advance();
      this.expectKeyword('FROM');
      const source = this.parseExpr();
      this.expectOperator(')');
      return callOf('extract', [source]);
    }
    if (word === 'ARRAY' && (this.operatorAt(1) === '[' || callFollows)) {
      this.advance();
      if (this.acceptOperator('[')) {
        const elements = this.operatorAt() === ']' ? [] : this.parseExprList();
        this.expectOperator(']');
        return { kind: 'array', elements };
      }
      return this.parseFunctionCall('array');
    }
    if (callFollows && FUNCTION_KEYWORDS.has(word)) {
      this.advance();
      return this.parseFunctionCall(word.toLowerCase());
    }
    if (RESERVED.has(word)) {
      return this.fail(`unexpected ${describe(this.peek())}`);
    }
    return this.parseNameExpression();
  }

  private parseNameExpression(): Expr {
    const first = this.parseIdentifier();

    const next = this.peek();
    if (!first.quoted && next.type === 'string') {
      this.advance();
      return { kind: 'literal', type: 'typed', value: `${first.value} '${next.value}'` };
    }

    const parts = [first];
    while (this.operatorAt() === '.') {
      this.advance();
      if (this.acceptOperator('*')) {
        return { kind: 'star', qualifier: parts };
      }
      parts.push(this.parseMemberName());
    }

    if (this.operatorAt() === '(') {
      return this.parseFunctionCall(parts.map((part) => part.value).join('.'));
    }
    return { kind: 'column', parts };
  }

  private parseFunctionCall(name: string): Expr {
    this.expectOperator('(');
    let distinct = false;
    const args: Expr[] = [];
    let orderBy: Expr[] = [];

    if (this.operatorAt() !== ')') {
      if (this.acceptKeyword('DISTINCT')) {
        distinct = true;
      } else {
        this.acceptKeyword('ALL');
      }
      if (this.atKeyword('BOTH', 'LEADING', 'TRAILING')) {
        this.advance();
      }

      for (;;) {
        const bareStar =
          this.operatorAt() === '*' && (this.operatorAt(1) === ')' || this.operatorAt(1) === ',');
        if (bareStar) {
          this.advance();
          args.push({ kind: 'star', qualifier: [] });
        } else if (this.operatorAt() !== ')' || args.length > 0) {
          args.push(this.parseExpr());
        }
        if (this.acceptOperator(',') || this.acceptKeyword('FROM') || this.acceptKeyword('FOR')) {
          continue;
        }
        break;
      }

      if (this.atKeyword('IGNORE', 'RESPECT')) {
        this.advance();
        this.expectKeyword('NULLS');
      }
      if (this.acceptKeyword('ORDER')) {
        this.expectKeyword('BY');
        orderBy = this.parseOrderList();
      }
      if (this.acceptKeyword('LIMIT')) {
        this.parseExpr();
      }
    }
    this.expectOperator(')');

    if (this.wordAt() === 'WITHIN' && this.wordAt(1) === 'GROUP') {
      this.advance();
      this.advance();
      this.expectOperator('(');
      this.expectKeyword('ORDER');
      this.expectKeyword('BY');
      orderBy = [...orderBy, ...this.parseOrderList()];
      this.expectOperator(')');
    }

    let filter: Expr | undefined;
    if (this.wordAt() === 'FILTER' && this.operatorAt(1) === '(') {
      this.advance();
      this.advance();
      this.expectKeyword('WHERE');
      filter = this.parseExpr();
      this.expectOperator(')');
    }

    if (this.atKeyword('IGNORE', 'RESPECT') && this.wordAt(1) === 'NULLS') {
      this.advance();
      this.advance();
    }

    const over = this.acceptKeyword('OVER') ? this.parseWindowSpec() : undefined;

    return { kind: 'function', name: name.toLowerCase(), args, distinct, orderBy, filter, over };
  }

  private parseWindowSpec(): WindowSpec {
    if (this.operatorAt() !== '(') {
      return { name: this.parseIdentifier(), partitionBy: [], orderBy: [] };
    }
    this.advance();

    let name: Identifier | undefined;
    if (this.isIdentifierAt() && !this.atKeyword('PARTITION', 'ROWS', 'RANGE', 'GROUPS')) {
      name = this.parseIdentifier();
    }

    let partitionBy: Expr[] = [];
    if (this.acceptKeyword('PARTITION')) {
      this.expectKeyword('BY');
      partitionBy = this.parseExprList();
    }

    let orderBy: Expr[] = [];
    if (this.acceptKeyword('ORDER')) {
      this.expectKeyword('BY');
      orderBy = this.parseOrderList();
    }

    // frame clauses carry no column references worth tracking
    let depth = 0;
    while (depth > 0 || this.operatorAt() !== ')') {
      const token = this.advance();
      if (token.type === 'eof') {
        this.fail("expected ')' to close window specification", token);
      }
      if (token.type === 'operator' && token.value === '(') {
        depth++;
      } else if (token.type === 'operator' && token.value === ')') {
        depth--;
      }
    }
    this.expectOperator(')');

    return { name, partitionBy, orderBy };
  }

  private parseOrderList(): Expr[] {
    if (this.acceptKeyword('ALL')) {
      this.parseOrderModifiers();
      return [];
    }
    const items: Expr[] = [];
    do {
      items.push(this.parseExpr());
      this.parseOrderModifiers();
    } while (this.acceptOperator(','));
    return items;
  }

  private parseOrderModifiers(): void {
    if (this.atKeyword('ASC', 'DESC')) {
      this.advance();
    }
    if (this.atKeyword('NULLS') && (this.wordAt(1) === 'FIRST' || this.wordAt(1) === 'LAST')) {
      this.advance();
      this.advance();
    }
  }

  private parseCase(): Expr {
    this.expectKeyword('CASE');
    const operand = this.atKeyword('WHEN') ? undefined : this.parseExpr();
    const whens: WhenClause[] = [];

    while (this.acceptKeyword('WHEN')) {
      const when = this.parseExpr();
      this.expectKeyword('THEN');
      whens.push({ when, then: this.parseExpr() });
    }
    if (whens.length === 0) {
      this.fail(`expected WHEN, found ${describe(this.peek())}`);
    }

    const otherwise = this.acceptKeyword('ELSE') ? this.parseExpr() : undefined;
    this.expectKeyword('END');
    return { kind: 'case', operand, whens, otherwise };
  }

  private parseCast(): Expr {
    this.advance();
    this.expectOperator('(');
    const expr = this.parseExpr();
    this.expectKeyword('AS');

    let type = '';
    let depth = 0;
    while (depth > 0 || this.operatorAt() !== ')') {
      const token = this.advance();
      if (token.type === 'eof') {
        this.fail("expected ')' to close CAST", token);
      }
      if (token.type === 'operator' && (token.value === '(' || token.value === '<')) {
        depth++;
      } else if (token.type === 'operator' && (token.value === ')' || token.value === '>')) {
        depth--;
      }
      type += type.length > 0 && token.type === 'word' ? ` ${token.value}` : token.value;
    }
    this.expectOperator(')');
    return { kind: 'cast', expr, type };
  }

  private parseInterval(): Expr {
    this.expectKeyword('INTERVAL');
    const value = this.parseUnary();
    let unit: string | undefined;
    const word = this.wordAt();
    if (word !== undefined && INTERVAL_UNITS.has(word)) {
      this.advance();
      unit = word;
      if (this.acceptKeyword('TO')) {
        const to = this.wordAt();
        if (to === undefined || !INTERVAL_UNITS.has(to)) {
          this.fail(`expected interval unit, found ${describe(this.peek())}`);
        }
        this.advance();
        unit = `${unit} TO ${to}`;
      }
    }
    return { kind: 'interval', value, unit };
  }
}

function callOf(name: string, args: Expr[]): Expr {
  return {
    kind: 'function',
    name,
    args,
    distinct: false,
    orderBy: [],
    filter: undefined,
    over: undefined,
  };
}

function mergeWith(outer: WithClause, inner: WithClause | undefined): WithClause {
  if (!inner) {
    return outer;
  }
  return { recursive: outer.recursive || inner.recursive, ctes: [...outer.ctes, ...inner.ctes] };
}

/**
 * Parse one rendered SQL statement into a query AST
 *
 * @throws MalformedQueryError if the text is not exactly one supported query
 */
export function parseQuery(sql: string, dialect: DialectRules, model: string): Query {
  return new SqlParser(sql, dialect, model).parseStatement();
}
