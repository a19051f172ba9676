/**
 * SQL query AST
 *
 * Closed, tagged representation of the query constructs the column resolver
 * understands. Every consumer switches on `kind` exhaustively.
 *
 * @module core/sql/ast
 */

export interface Identifier {
  value: string;
  quoted: boolean;
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export interface WindowSpec {
  /** Named window the spec refers to or extends */
  name: Identifier | undefined;
  partitionBy: Expr[];
  orderBy: Expr[];
}

export interface WhenClause {
  when: Expr;
  then: Expr;
}

export type Expr =
  | { kind: 'column'; parts: Identifier[] }
  | { kind: 'literal'; type: 'string' | 'number' | 'boolean' | 'null' | 'typed'; value: string }
  | { kind: 'parameter'; value: string }
  | { kind: 'star'; qualifier: Identifier[] }
  | {
      kind: 'function';
      name: string;
      args: Expr[];
      distinct: boolean;
      /** `ORDER BY` inside the call or `WITHIN GROUP` */
      orderBy: Expr[];
      filter: Expr | undefined;
      over: WindowSpec | undefined;
    }
  | { kind: 'unary'; operator: string; operand: Expr }
  | { kind: 'binary'; operator: string; left: Expr; right: Expr }
  | { kind: 'case'; operand: Expr | undefined; whens: WhenClause[]; otherwise: Expr | undefined }
  | { kind: 'cast'; expr: Expr; type: string }
  | { kind: 'subquery'; query: Query }
  | { kind: 'exists'; query: Query; negated: boolean }
  | { kind: 'in'; expr: Expr; list: Expr[]; query: Query | undefined; negated: boolean }
  | { kind: 'between'; expr: Expr; low: Expr; high: Expr; negated: boolean }
  | { kind: 'is'; expr: Expr; value: Expr; negated: boolean }
  | { kind: 'interval'; value: Expr; unit: string | undefined }
  | { kind: 'array'; elements: Expr[] };

// =============================================================================
// SELECT ITEMS AND RELATIONS
// =============================================================================

export interface ReplaceItem {
  expr: Expr;
  alias: Identifier;
}

export type SelectItem =
  | {
      kind: 'wildcard';
      qualifier: Identifier[];
      exclude: Identifier[];
      replace: ReplaceItem[];
    }
  | { kind: 'expression'; expr: Expr; alias: Identifier | undefined };

export type JoinType = 'inner' | 'left' | 'right' | 'full' | 'cross' | 'comma' | 'semi' | 'anti';

export type FromItem =
  | {
      kind: 'table';
      name: Identifier[];
      alias: Identifier | undefined;
      columnAliases: Identifier[];
    }
  | {
      kind: 'subquery';
      query: Query;
      alias: Identifier | undefined;
      columnAliases: Identifier[];
      lateral: boolean;
    }
  | {
      kind: 'table-function';
      name: string;
      args: Expr[];
      alias: Identifier | undefined;
      columnAliases: Identifier[];
    }
  | {
      kind: 'join';
      joinType: JoinType;
      natural: boolean;
      left: FromItem;
      right: FromItem;
      on: Expr | undefined;
      using: Identifier[];
    };

// =============================================================================
// QUERIES
// =============================================================================

export interface CommonTableExpression {
  name: Identifier;
  columns: Identifier[];
  query: Query;
}

export interface WithClause {
  recursive: boolean;
  ctes: CommonTableExpression[];
}

export interface SelectQuery {
  kind: 'select';
  with: WithClause | undefined;
  distinct: boolean;
  distinctOn: Expr[];
  items: SelectItem[];
  from: FromItem | undefined;
  where: Expr | undefined;
  groupBy: Expr[];
  having: Expr | undefined;
  windows: { name: Identifier; spec: WindowSpec }[];
  qualify: Expr | undefined;
  orderBy: Expr[];
  limit: Expr | undefined;
  offset: Expr | undefined;
}

export type SetOperator = 'union' | 'intersect' | 'except';

export interface SetOperationQuery {
  kind: 'set-operation';
  with: WithClause | undefined;
  operator: SetOperator;
  all: boolean;
  left: Query;
  right: Query;
  orderBy: Expr[];
  limit: Expr | undefined;
  offset: Expr | undefined;
}

export interface ValuesQuery {
  kind: 'values';
  with: WithClause | undefined;
  rows: Expr[][];
}

export type Query = SelectQuery | SetOperationQuery | ValuesQuery;
