/**
 * Content cache artifacts
 *
 * Every stored value is an envelope tagged with the format version and the
 * artifact kind, so rendered SQL, lineage and validation entries can share one
 * store.
 *
 * @module @lineagekit/types/cache
 */

import { z } from 'zod';

import { DiagnosticSchema } from './diagnostic.schema.js';
import { ModelLineageSchema, ReferenceSchema } from './lineage.schema.js';

export const CACHE_FORMAT_VERSION = 1;

export const CacheArtifactKindSchema = z.enum(['rendered-sql', 'lineage', 'validation']);
export type CacheArtifactKind = z.infer<typeof CacheArtifactKindSchema>;

export const RenderedSqlArtifactSchema = z.object({
  kind: z.literal('rendered-sql'),
  model: z.string().min(1),
  sql: z.string(),
  references: z.array(ReferenceSchema),
  /** Macros expanded while rendering, in first-use order */
  macros: z.array(z.string()),
});

export const LineageArtifactSchema = z.object({
  kind: z.literal('lineage'),
  lineage: ModelLineageSchema,
});

export const ValidationArtifactSchema = z.object({
  kind: z.literal('validation'),
  model: z.string().min(1),
  diagnostics: z.array(DiagnosticSchema),
});

export const CacheArtifactSchema = z.discriminatedUnion('kind', [
  RenderedSqlArtifactSchema,
  LineageArtifactSchema,
  ValidationArtifactSchema,
]);
export type CacheArtifact = z.infer<typeof CacheArtifactSchema>;
export type RenderedSqlArtifact = z.infer<typeof RenderedSqlArtifactSchema>;
export type LineageArtifact = z.infer<typeof LineageArtifactSchema>;
export type ValidationArtifact = z.infer<typeof ValidationArtifactSchema>;

/**
 * Artifact type for a given kind
 */
export type ArtifactOf<K extends CacheArtifactKind> = Extract<CacheArtifact, { kind: K }>;

export const CacheEnvelopeSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  key: z.string().regex(/^[0-9a-f]{64}$/),
  createdAt: z.string().datetime(),
  artifact: CacheArtifactSchema,
});
export type CacheEnvelope = z.infer<typeof CacheEnvelopeSchema>;
