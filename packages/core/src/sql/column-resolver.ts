/**
 * SQL Column Resolver
 *
 * Computes, for each output column of a model's rendered SQL, the upstream
 * columns it derives from, plus the columns the query consumes outside its
 * projection. CTEs and subqueries are resolved first and act as local
 * relations; upstream relations come from the renderer's references.
 *
 * @module core/sql/column-resolver
 */

import {
  OPAQUE,
  provenanceKey,
  type ModelLineage,
  type Provenance,
  type SqlDialect,
} from '@lineagekit/types';

import { LineageUnavailableError, MalformedQueryError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

import type {
  Expr,
  FromItem,
  Identifier,
  Query,
  SelectItem,
  SelectQuery,
  WithClause,
} from './ast.js';
import {
  getDialect,
  normalizeIdentifier,
  normalizeRelationName,
  type DialectRules,
} from './dialect.js';
import { parseQuery } from './parser.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Relation a model depends on, keyed by the identifier the renderer emitted
 */
export interface UpstreamRelation {
  /** Model name or source id producing the relation */
  producer: string;
  /** Column names in declaration order; undefined when unknown */
  columns: readonly string[] | undefined;
}

export type UpstreamRelations = ReadonlyMap<string, UpstreamRelation>;

export interface ColumnResolverOptions {
  dialect?: SqlDialect | DialectRules;
  logger?: Logger;
}

interface ScopeColumn {
  name: string;
  provenance: Provenance[];
}

type RelationOrigin = 'upstream' | 'local' | 'undeclared' | 'opaque';

interface ScopeRelation {
  /** Name the relation is qualified by (alias, else table name) */
  name: string;
  /** Full qualified path for `schema.table.column` references */
  path: string[];
  origin: RelationOrigin;
  producer: string | undefined;
  columns: ScopeColumn[] | undefined;
  /** Columns merged away by USING / NATURAL joins */
  hidden: Set<string>;
  /** False for the filtering side of semi and anti joins */
  inWildcard: boolean;
}

interface Scope {
  relations: ScopeRelation[];
  ctes: Map<string, ScopeColumn[]>;
  aliases: Map<string, Provenance[]>;
  parent: Scope | undefined;
}

function newScope(parent: Scope | undefined): Scope {
  return { relations: [], ctes: new Map(), aliases: new Map(), parent };
}

/**
 * Union of provenance lists, de-duplicated in first-seen order; opaque only
 * when nothing else contributes
 */
export function unionProvenance(lists: readonly (readonly Provenance[])[]): Provenance[] {
  const seen = new Set<string>();
  const merged: Provenance[] = [];
  for (const list of lists) {
    for (const entry of list) {
      if (entry.kind === 'opaque') {
        continue;
      }
      const key = provenanceKey(entry);
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(entry);
      }
    }
  }
  return merged.length > 0 ? merged : [OPAQUE];
}

// =============================================================================
// RESOLUTION RUN
// =============================================================================

class Resolution {
  private readonly references: Provenance[] = [];
  private readonly referenceKeys = new Set<string>();
  private readonly upstream = new Map<string, UpstreamRelation>();
  private existsDepth = 0;

  constructor(
    private readonly model: string,
    private readonly dialect: DialectRules,
    upstream: UpstreamRelations
  ) {
    for (const [relation, info] of upstream) {
      this.upstream.set(normalizeRelationName(relation, dialect), info);
    }
  }

  run(query: Query): ModelLineage {
    const columns = this.resolveQuery(query, undefined);
    return {
      model: this.model,
      columns: columns.map((column) => ({ name: column.name, provenance: column.provenance })),
      references: this.references,
    };
  }

  private normalize(identifier: Identifier): string {
    return normalizeIdentifier(identifier.value, identifier.quoted, this.dialect);
  }

  private addReferences(provenance: readonly Provenance[]): void {
    for (const entry of provenance) {
      if (entry.kind === 'opaque') {
        continue;
      }
      const key = provenanceKey(entry);
      if (!this.referenceKeys.has(key)) {
        this.referenceKeys.add(key);
        this.references.push(entry);
      }
    }
  }

  private consume(expr: Expr | undefined, scope: Scope): void {
    if (expr) {
      this.addReferences(this.expressionProvenance(expr, scope));
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  private resolveQuery(query: Query, parent: Scope | undefined): ScopeColumn[] {
    const scope = query.with ? this.resolveWith(query.with, parent) : parent;

    switch (query.kind) {
      case 'select':
        return this.resolveSelect(query, scope);
      case 'set-operation': {
        const left = this.resolveQuery(query.left, scope);
        const right = this.resolveQuery(query.right, scope);
        if (left.length !== right.length) {
          const operator = query.operator.toUpperCase();
          throw new MalformedQueryError(
            this.model,
            `${operator} branches have ${left.length} and ${right.length} columns`
          );
        }
        return left.map((column, index) => ({
          name: column.name,
          provenance: unionProvenance([column.provenance, right[index]?.provenance ?? []]),
        }));
      }
      case 'values': {
        const width = query.rows[0]?.length ?? 0;
        const valueScope = scope ?? newScope(undefined);
        return Array.from({ length: width }, (_, index) => ({
          name: `column${index + 1}`,
          provenance: unionProvenance(
            query.rows.map((row) => {
              const cell = row[index];
              if (!cell || row.length !== width) {
                throw new MalformedQueryError(this.model, 'VALUES rows have different widths');
              }
              return this.expressionProvenance(cell, valueScope);
            })
          ),
        }));
      }
    }
  }

  private resolveWith(withClause: WithClause, parent: Scope | undefined): Scope {
    const scope = newScope(parent);

    for (const cte of withClause.ctes) {
      const name = this.normalize(cte.name);
      if (withClause.recursive && cte.query.kind === 'set-operation') {
        const anchor = this.resolveQuery(cte.query.left, scope);
        scope.ctes.set(name, this.rename(anchor, cte.columns, name));
      }
      const columns = this.rename(this.resolveQuery(cte.query, scope), cte.columns, name);
      scope.ctes.set(name, columns);
      this.addReferences(columns.flatMap((column) => column.provenance));
    }

    return scope;
  }

  private rename(
    columns: ScopeColumn[],
    names: readonly Identifier[],
    relation: string
  ): ScopeColumn[] {
    if (names.length === 0) {
      return columns;
    }
    if (names.length > columns.length) {
      throw new MalformedQueryError(
        this.model,
        `'${relation}' has ${columns.length} columns but ${names.length} column names were given`
      );
    }
    return columns.map((column, index) => {
      const alias = names[index];
      return alias ? { name: this.normalize(alias), provenance: column.provenance } : column;
    });
  }

  private resolveSelect(select: SelectQuery, parent: Scope | undefined): ScopeColumn[] {
    const scope = newScope(parent);
    if (select.from) {
      this.addFromItem(select.from, scope, true);
    }

    const output: ScopeColumn[] = [];
    for (const item of select.items) {
      if (item.kind === 'wildcard') {
        output.push(...this.expandWildcard(item, scope));
        continue;
      }
      const provenance = this.expressionProvenance(item.expr, scope);
      const name = this.outputName(item.expr, item.alias, output.length);
      output.push({ name, provenance });
      if (!scope.aliases.has(name)) {
        scope.aliases.set(name, provenance);
      }
    }

    this.consume(select.where, scope);
    this.consume(select.having, scope);
    this.consume(select.qualify, scope);
    for (const expr of [...select.groupBy, ...select.orderBy, ...select.distinctOn]) {
      this.consume(expr, scope);
    }
    for (const window of select.windows) {
      for (const expr of [...window.spec.partitionBy, ...window.spec.orderBy]) {
        this.consume(expr, scope);
      }
    }

    return output;
  }

  private outputName(expr: Expr, alias: Identifier | undefined, position: number): string {
    if (alias) {
      return this.normalize(alias);
    }
    let named = expr;
    while (named.kind === 'cast') {
      named = named.expr;
    }
    if (named.kind === 'column') {
      const last = named.parts[named.parts.length - 1];
      if (last) {
        return this.normalize(last);
      }
    }
    return `_col_${position}`;
  }

  // ---------------------------------------------------------------------------
  // Relations
  // ---------------------------------------------------------------------------

  private addFromItem(item: FromItem, scope: Scope, inWildcard: boolean): ScopeRelation[] {
    switch (item.kind) {
      case 'table': {
        const relation = this.tableRelation(item, scope);
        relation.inWildcard = inWildcard;
        scope.relations.push(relation);
        return [relation];
      }
      case 'subquery': {
        const columns = this.resolveQuery(item.query, scope);
        const name = item.alias ? this.normalize(item.alias) : '';
        this.addReferences(columns.flatMap((column) => column.provenance));
        const relation: ScopeRelation = {
          name,
          path: [name],
          origin: 'local',
          producer: undefined,
          columns: this.rename(columns, item.columnAliases, name || 'subquery'),
          hidden: new Set(),
          inWildcard,
        };
        scope.relations.push(relation);
        return [relation];
      }
      case 'table-function': {
        for (const arg of item.args) {
          this.consume(arg, scope);
        }
        const name = item.alias ? this.normalize(item.alias) : item.name.toLowerCase();
        const relation: ScopeRelation = {
          name,
          path: [name],
          origin: 'opaque',
          producer: undefined,
          columns:
            item.columnAliases.length > 0 ? this.opaqueColumns(item.columnAliases) : undefined,
          hidden: new Set(),
          inWildcard,
        };
        scope.relations.push(relation);
        return [relation];
      }
      case 'join': {
        const left = this.addFromItem(item.left, scope, inWildcard);
        const filtering = item.joinType === 'semi' || item.joinType === 'anti';
        const right = this.addFromItem(item.right, scope, inWildcard && !filtering);

        const shared = item.natural
          ? this.sharedColumns(left, right)
          : item.using.map((identifier) => this.normalize(identifier));
        for (const column of shared) {
          for (const relation of right) {
            relation.hidden.add(column);
          }
          for (const relation of [...left, ...right]) {
            if (relation.columns?.some((c) => c.name === column)) {
              this.addReferences(this.columnOf(relation, column));
            }
          }
        }

        this.consume(item.on, scope);
        return [...left, ...right];
      }
    }
  }

  private opaqueColumns(names: readonly Identifier[]): ScopeColumn[] {
    return names.map((name): ScopeColumn => ({ name: this.normalize(name), provenance: [OPAQUE] }));
  }

  private sharedColumns(left: readonly ScopeRelation[], right: readonly ScopeRelation[]): string[] {
    const leftNames = new Set(
      left.flatMap((relation) => relation.columns?.map((c) => c.name) ?? [])
    );
    return right
      .flatMap((relation) => relation.columns?.map((c) => c.name) ?? [])
      .filter((name) => leftNames.has(name));
  }

  private tableRelation(item: Extract<FromItem, { kind: 'table' }>, scope: Scope): ScopeRelation {
    const names = item.name.map((part) => this.normalize(part));
    const alias = item.alias ? this.normalize(item.alias) : undefined;
    const tableName = names[names.length - 1] ?? '';
    const name = alias ?? tableName;
    const path = alias ? [alias] : names;

    const cte = names.length === 1 ? this.findCte(tableName, scope) : undefined;
    if (cte) {
      return {
        name,
        path,
        origin: 'local',
        producer: undefined,
        columns: this.rename(cte, item.columnAliases, name),
        hidden: new Set(),
        inWildcard: true,
      };
    }

    const key = names.join('.');
    const upstream = this.upstream.get(key);
    const producer = upstream ? upstream.producer : key;
    let columns = upstream?.columns?.map((column): ScopeColumn => {
      const normalized = normalizeIdentifier(column, false, this.dialect);
      return { name: normalized, provenance: [{ kind: 'column', producer, column: normalized }] };
    });

    if (columns) {
      columns = this.rename(columns, item.columnAliases, name);
    } else if (item.columnAliases.length > 0) {
      columns = this.opaqueColumns(item.columnAliases);
    }

    return {
      name,
      path,
      origin: upstream ? 'upstream' : 'undeclared',
      producer,
      columns,
      hidden: new Set(),
      inWildcard: true,
    };
  }

  private findCte(name: string, scope: Scope | undefined): ScopeColumn[] | undefined {
    for (let current = scope; current; current = current.parent) {
      const columns = current.ctes.get(name);
      if (columns) {
        return columns;
      }
    }
    return undefined;
  }

  private findRelation(qualifier: readonly string[], scope: Scope): ScopeRelation | undefined {
    const last = qualifier[qualifier.length - 1];
    return scope.relations.find((relation) => {
      if (relation.name !== last) {
        return false;
      }
      const offset = relation.path.length - qualifier.length;
      return (
        offset >= 0 && qualifier.every((part, index) => relation.path[offset + index] === part)
      );
    });
  }

  // ---------------------------------------------------------------------------
  // Columns
  // ---------------------------------------------------------------------------

  private expandWildcard(
    item: Extract<SelectItem, { kind: 'wildcard' }>,
    scope: Scope
  ): ScopeColumn[] {
    let relations: ScopeRelation[];
    if (item.qualifier.length > 0) {
      const qualifier = item.qualifier.map((part) => this.normalize(part));
      const relation = this.findRelation(qualifier, scope);
      if (!relation) {
        const name = qualifier.join('.');
        throw new MalformedQueryError(this.model, `unknown relation '${name}' in ${name}.*`);
      }
      relations = [relation];
    } else {
      relations = scope.relations.filter((relation) => relation.inWildcard);
      if (relations.length === 0) {
        throw new MalformedQueryError(this.model, 'SELECT * without a FROM clause');
      }
    }

    const excluded = new Set(item.exclude.map((identifier) => this.normalize(identifier)));
    const replaced = new Map(
      item.replace.map((entry) => [
        this.normalize(entry.alias),
        this.expressionProvenance(entry.expr, scope),
      ])
    );
    const qualified = item.qualifier.length > 0;

    const output: ScopeColumn[] = [];
    for (const relation of relations) {
      if (!relation.columns) {
        if (this.existsDepth > 0) {
          continue;
        }
        const label = relation.producer ?? relation.name;
        throw new LineageUnavailableError(
          this.model,
          label,
          `cannot expand * over '${label}' because its columns are unknown`
        );
      }
      for (const column of relation.columns) {
        if ((!qualified && relation.hidden.has(column.name)) || excluded.has(column.name)) {
          continue;
        }
        output.push({
          name: column.name,
          provenance: replaced.get(column.name) ?? column.provenance,
        });
      }
    }
    return output;
  }

  private columnOf(relation: ScopeRelation, column: string): Provenance[] {
    const found = relation.columns?.find((candidate) => candidate.name === column);
    if (found) {
      return found.provenance;
    }

    switch (relation.origin) {
      case 'upstream':
      case 'undeclared':
        return [{ kind: 'column', producer: relation.producer ?? relation.name, column }];
      case 'local':
        return [{ kind: 'unresolved', column, relation: relation.name || null }];
      case 'opaque':
        return relation.columns
          ? [{ kind: 'unresolved', column, relation: relation.name }]
          : [OPAQUE];
    }
  }

  private resolveColumn(parts: readonly Identifier[], scope: Scope): Provenance[] {
    const names = parts.map((part) => this.normalize(part));

    for (let k = Math.min(names.length - 1, 3); k >= 1; k--) {
      const qualifier = names.slice(0, k);
      const column = names[k];
      if (column === undefined) {
        continue;
      }
      for (let current: Scope | undefined = scope; current; current = current.parent) {
        const relation = this.findRelation(qualifier, current);
        if (relation) {
          return this.columnOf(relation, column);
        }
      }
    }

    // unqualified, or a struct field path rooted at a column
    return this.resolveUnqualified(names[0] ?? '', scope);
  }

  private resolveUnqualified(column: string, scope: Scope): Provenance[] {
    for (let current: Scope | undefined = scope; current; current = current.parent) {
      const exposing = current.relations.find((relation) =>
        relation.columns?.some((candidate) => candidate.name === column)
      );
      if (exposing) {
        return this.columnOf(exposing, column);
      }
      const unknown = current.relations.find((relation) => relation.columns === undefined);
      if (unknown) {
        return this.columnOf(unknown, column);
      }
      const alias = current.aliases.get(column);
      if (alias) {
        return alias;
      }
    }

    let innermost: Scope | undefined = scope;
    while (innermost && innermost.relations.length === 0) {
      innermost = innermost.parent;
    }
    const only = innermost?.relations.length === 1 ? innermost.relations[0] : undefined;
    return only ? this.columnOf(only, column) : [{ kind: 'unresolved', column, relation: null }];
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  private expressionProvenance(expr: Expr, scope: Scope): Provenance[] {
    const lists: Provenance[][] = [];
    this.collect(expr, scope, lists);
    return unionProvenance(lists);
  }

  private collect(expr: Expr, scope: Scope, out: Provenance[][]): void {
    switch (expr.kind) {
      case 'column':
        out.push(this.resolveColumn(expr.parts, scope));
        return;
      case 'literal':
      case 'parameter':
        return;
      case 'star': {
        if (expr.qualifier.length === 0) {
          return;
        }
        const qualifier = expr.qualifier.map((part) => this.normalize(part));
        const relation = this.findRelation(qualifier, scope);
        for (const column of relation?.columns ?? []) {
          out.push(column.provenance);
        }
        return;
      }
      case 'function':
        for (const child of [...expr.args, ...expr.orderBy]) {
          this.collect(child, scope, out);
        }
        if (expr.filter) {
          this.collect(expr.filter, scope, out);
        }
        for (const child of [...(expr.over?.partitionBy ?? []), ...(expr.over?.orderBy ?? [])]) {
          this.collect(child, scope, out);
        }
        return;
      case 'unary':
        this.collect(expr.operand, scope, out);
        return;
      case 'binary':
        this.collect(expr.left, scope, out);
        this.collect(expr.right, scope, out);
        return;
      case 'case':
        if (expr.operand) {
          this.collect(expr.operand, scope, out);
        }
        for (const clause of expr.whens) {
          this.collect(clause.when, scope, out);
          this.collect(clause.then, scope, out);
        }
        if (expr.otherwise) {
          this.collect(expr.otherwise, scope, out);
        }
        return;
      case 'cast':
        this.collect(expr.expr, scope, out);
        return;
      case 'interval':
        this.collect(expr.value, scope, out);
        return;
      case 'array':
        for (const element of expr.elements) {
          this.collect(element, scope, out);
        }
        return;
      case 'subquery':
        for (const column of this.resolveQuery(expr.query, scope)) {
          out.push(column.provenance);
        }
        return;
      case 'exists':
        this.existsDepth++;
        try {
          this.resolveQuery(expr.query, scope);
        } finally {
          this.existsDepth--;
        }
        return;
      case 'in':
        this.collect(expr.expr, scope, out);
        for (const element of expr.list) {
          this.collect(element, scope, out);
        }
        if (expr.query) {
          for (const column of this.resolveQuery(expr.query, scope)) {
            out.push(column.provenance);
          }
        }
        return;
      case 'between':
        this.collect(expr.expr, scope, out);
        this.collect(expr.low, scope, out);
        this.collect(expr.high, scope, out);
        return;
      case 'is':
        this.collect(expr.expr, scope, out);
        this.collect(expr.value, scope, out);
        return;
    }
  }
}

// =============================================================================
// RESOLVER
// =============================================================================

export class ColumnResolver {
  private readonly dialect: DialectRules;
  private readonly logger: Logger;

  constructor(options: ColumnResolverOptions = {}) {
    const dialect = options.dialect ?? 'duckdb';
    this.dialect = typeof dialect === 'string' ? getDialect(dialect) : dialect;
    this.logger = options.logger ?? createLogger({ name: 'column-resolver' });
  }

  get dialectName(): SqlDialect {
    return this.dialect.name;
  }

  /**
   * Resolve the column lineage of one rendered model
   *
   * @throws MalformedQueryError, LineageUnavailableError
   */
  resolve(model: string, sql: string, upstream: UpstreamRelations): ModelLineage {
    const query = parseQuery(sql, this.dialect, model);
    const lineage = new Resolution(model, this.dialect, upstream).run(query);

    this.logger.debug(
      { model, columns: lineage.columns.length, references: lineage.references.length },
      'Column lineage resolved'
    );
    return lineage;
  }
}
