/**
 * Column lineage schemas
 *
 * @module @lineagekit/types/lineage
 */

import { z } from 'zod';

// =============================================================================
// REFERENCES
// =============================================================================

/**
 * A dependency discovered while rendering a model
 */
export const ReferenceSchema = z.object({
  kind: z.enum(['model', 'source']),
  /** Model name, or `<sourceName>.<table>` for sources */
  target: z.string().min(1),
  /** Relation identifier the directive was rendered to */
  relation: z.string().min(1),
});
export type Reference = z.infer<typeof ReferenceSchema>;

// =============================================================================
// PROVENANCE
// =============================================================================

/**
 * Column of an upstream model, source or undeclared relation
 */
export const ColumnProvenanceSchema = z.object({
  kind: z.literal('column'),
  producer: z.string().min(1),
  column: z.string().min(1),
});

/**
 * Derived from something that is not a column: a literal, an unknown
 * function, a table function
 */
export const OpaqueProvenanceSchema = z.object({
  kind: z.literal('opaque'),
});

/**
 * Referenced column that no relation in scope exposes
 */
export const UnresolvedProvenanceSchema = z.object({
  kind: z.literal('unresolved'),
  column: z.string().min(1),
  /** Relation the reference was qualified with or resolved against, if any */
  relation: z.string().nullable(),
});

export const ProvenanceSchema = z.discriminatedUnion('kind', [
  ColumnProvenanceSchema,
  OpaqueProvenanceSchema,
  UnresolvedProvenanceSchema,
]);
export type Provenance = z.infer<typeof ProvenanceSchema>;
export type ColumnProvenance = z.infer<typeof ColumnProvenanceSchema>;
export type UnresolvedProvenance = z.infer<typeof UnresolvedProvenanceSchema>;

export const OPAQUE: Provenance = Object.freeze({ kind: 'opaque' });

// =============================================================================
// COLUMNS
// =============================================================================

export const ColumnLineageSchema = z.object({
  name: z.string().min(1),
  provenance: z.array(ProvenanceSchema),
});
export type ColumnLineage = z.infer<typeof ColumnLineageSchema>;

export const ModelLineageSchema = z.object({
  model: z.string().min(1),
  /** Output columns in projection order */
  columns: z.array(ColumnLineageSchema),
  /** Columns consumed outside the projection (filters, joins, grouping, unused CTEs) */
  references: z.array(ProvenanceSchema),
});
export type ModelLineage = z.infer<typeof ModelLineageSchema>;

/**
 * Stable identity of a provenance entry, used to de-duplicate
 */
export function provenanceKey(provenance: Provenance): string {
  switch (provenance.kind) {
    case 'column':
      return `column:${provenance.producer}:${provenance.column}`;
    case 'opaque':
      return 'opaque';
    case 'unresolved':
      return `unresolved:${provenance.relation ?? ''}:${provenance.column}`;
  }
}
