/**
 * Column-existence validator
 *
 * Checks every upstream column a model's lineage points at against the
 * producer's computed columns, falling back to declared documentation for
 * sources and for models without computed lineage.
 *
 * @module core/lineage/validator
 */

import type {
  ColumnDoc,
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  ModelLineage,
  Provenance,
  SqlDialect,
} from '@lineagekit/types';
import { provenanceKey } from '@lineagekit/types';

import { createLogger, type Logger } from '../logger.js';
import { getDialect, normalizeIdentifier, type DialectRules } from '../sql/dialect.js';

import type { Project } from './project.js';

export interface LineageValidatorOptions {
  dialect?: SqlDialect | DialectRules;
  /** Warn about computed columns missing from a model's documentation */
  reportUndocumentedColumns?: boolean;
  logger?: Logger;
}

type UpstreamColumns =
  | { known: true; columns: ReadonlySet<string> }
  | { known: false; declared: boolean };

function diagnostic(
  severity: DiagnosticSeverity,
  code: DiagnosticCode,
  model: string,
  message: string,
  details: Pick<Diagnostic, 'column' | 'upstream'> = {}
): Diagnostic {
  return Object.freeze({ severity, code, model, ...details, message });
}

/**
 * Every relation a model's lineage points at, sorted
 */
export function producersOf(lineage: ModelLineage): string[] {
  const producers = new Set<string>();
  const entries = lineage.columns.flatMap((column) => column.provenance);
  for (const entry of [...entries, ...lineage.references]) {
    if (entry.kind === 'column') {
      producers.add(entry.producer);
    }
  }
  return Array.from(producers).sort();
}

export class LineageValidator {
  private readonly project: Project;
  private readonly dialect: DialectRules;
  private readonly reportUndocumented: boolean;
  private readonly logger: Logger;

  constructor(project: Project, options: LineageValidatorOptions = {}) {
    const dialect = options.dialect ?? 'duckdb';
    this.project = project;
    this.dialect = typeof dialect === 'string' ? getDialect(dialect) : dialect;
    this.reportUndocumented = options.reportUndocumentedColumns ?? false;
    this.logger = options.logger ?? createLogger({ name: 'lineage-validator' });
  }

  /**
   * Validate models in the given order; diagnostics keep that order
   */
  validate(order: readonly string[], computed: ReadonlyMap<string, ModelLineage>): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const name of order) {
      const lineage = computed.get(name);
      if (lineage) {
        diagnostics.push(...this.validateModel(lineage, computed));
      }
    }
    return diagnostics;
  }

  validateModel(lineage: ModelLineage, computed: ReadonlyMap<string, ModelLineage>): Diagnostic[] {
    const model = lineage.model;
    const diagnostics: Diagnostic[] = [];
    const reported = new Set<string>();
    const undeclared = new Set<string>();

    const check = (provenance: Provenance, column: string | undefined): void => {
      const finding = this.checkProvenance(model, provenance, column, computed, undeclared);
      if (finding) {
        reported.add(provenanceKey(provenance));
        diagnostics.push(finding);
      }
    };

    for (const column of lineage.columns) {
      for (const provenance of column.provenance) {
        check(provenance, column.name);
      }
    }
    for (const provenance of lineage.references) {
      if (!reported.has(provenanceKey(provenance))) {
        check(provenance, undefined);
      }
    }

    diagnostics.push(...this.checkDocumentation(lineage));

    if (diagnostics.length > 0) {
      this.logger.debug(
        { model, diagnostics: diagnostics.length },
        'Model validated with findings'
      );
    }
    return diagnostics;
  }

  private normalizeDocs(columns: readonly ColumnDoc[] | undefined): Set<string> {
    return new Set(
      (columns ?? []).map((column) => normalizeIdentifier(column.name, false, this.dialect))
    );
  }

  private upstreamColumns(
    producer: string,
    computed: ReadonlyMap<string, ModelLineage>
  ): UpstreamColumns {
    const lineage = computed.get(producer);
    if (lineage) {
      return { known: true, columns: new Set(lineage.columns.map((column) => column.name)) };
    }
    const documented =
      this.project.models.get(producer)?.columns ?? this.project.sources.get(producer)?.columns;
    if (documented && documented.length > 0) {
      return { known: true, columns: this.normalizeDocs(documented) };
    }
    const declared = this.project.models.has(producer) || this.project.sources.has(producer);
    return { known: false, declared };
  }

  private checkProvenance(
    model: string,
    provenance: Provenance,
    column: string | undefined,
    computed: ReadonlyMap<string, ModelLineage>,
    undeclared: Set<string>
  ): Diagnostic | undefined {
    const subject =
      column === undefined ? `Model '${model}'` : `Column '${column}' of model '${model}'`;

    switch (provenance.kind) {
      case 'opaque':
        return undefined;

      case 'unresolved': {
        const where =
          provenance.relation === null ? 'any relation in scope' : `'${provenance.relation}'`;
        return diagnostic(
          'error',
          'unresolved-column',
          model,
          `${subject} references '${provenance.column}', which is not exposed by ${where}`,
          { column, upstream: { relation: provenance.relation, column: provenance.column } }
        );
      }

      case 'column': {
        const upstream = this.upstreamColumns(provenance.producer, computed);
        if (upstream.known) {
          if (upstream.columns.has(provenance.column)) {
            return undefined;
          }
          return diagnostic(
            'error',
            'missing-column',
            model,
            `${subject} references '${provenance.column}', ` +
              `which does not exist in upstream '${provenance.producer}'`,
            { column, upstream: { relation: provenance.producer, column: provenance.column } }
          );
        }
        if (upstream.declared || undeclared.has(provenance.producer)) {
          return undefined;
        }
        undeclared.add(provenance.producer);
        return diagnostic(
          'warning',
          'undeclared-relation',
          model,
          `Model '${model}' reads '${provenance.producer}', ` +
            'which is neither a model nor a declared source'
        );
      }
    }
  }

  private checkDocumentation(lineage: ModelLineage): Diagnostic[] {
    const documented = this.project.models.get(lineage.model)?.columns ?? [];
    if (documented.length === 0) {
      return [];
    }

    const diagnostics: Diagnostic[] = [];
    const produced = new Set(lineage.columns.map((column) => column.name));

    for (const doc of documented) {
      if (!produced.has(normalizeIdentifier(doc.name, false, this.dialect))) {
        diagnostics.push(
          diagnostic(
            'warning',
            'documentation-drift',
            lineage.model,
            `Column '${doc.name}' is documented for model '${lineage.model}' ` +
              'but not produced by its query',
            { column: doc.name }
          )
        );
      }
    }

    if (this.reportUndocumented) {
      const names = this.normalizeDocs(documented);
      for (const column of lineage.columns) {
        if (!names.has(column.name)) {
          diagnostics.push(
            diagnostic(
              'warning',
              'undocumented-column',
              lineage.model,
              `Column '${column.name}' of model '${lineage.model}' is not documented`,
              { column: column.name }
            )
          );
        }
      }
    }

    return diagnostics;
  }
}
