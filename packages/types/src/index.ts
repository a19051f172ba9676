/**
 * lineagekit Types Package
 *
 * Zod schemas and inferred types shared by the lineage pipeline and its
 * callers.
 *
 * @module @lineagekit/types
 */

export {
  SqlDialectSchema,
  ColumnDocSchema,
  ModelSchema,
  SourceSchema,
  TemplateLiteralSchema,
  MacroParameterSchema,
  MacroSchema,
  ProjectInputSchema,
  sourceId,
  type SqlDialect,
  type ColumnDoc,
  type Model,
  type Source,
  type TemplateLiteral,
  type MacroParameter,
  type Macro,
  type MacroInput,
  type ProjectInput,
  type ProjectDefinition,
} from './project.schema.js';

export {
  ReferenceSchema,
  ColumnProvenanceSchema,
  OpaqueProvenanceSchema,
  UnresolvedProvenanceSchema,
  ProvenanceSchema,
  ColumnLineageSchema,
  ModelLineageSchema,
  OPAQUE,
  provenanceKey,
  type Reference,
  type Provenance,
  type ColumnProvenance,
  type UnresolvedProvenance,
  type ColumnLineage,
  type ModelLineage,
} from './lineage.schema.js';

export {
  DiagnosticSeveritySchema,
  DiagnosticCodeSchema,
  DiagnosticSchema,
  ModelFailureSchema,
  type DiagnosticSeverity,
  type DiagnosticCode,
  type Diagnostic,
  type ModelFailure,
} from './diagnostic.schema.js';

export {
  CACHE_FORMAT_VERSION,
  CacheArtifactKindSchema,
  RenderedSqlArtifactSchema,
  LineageArtifactSchema,
  ValidationArtifactSchema,
  CacheArtifactSchema,
  CacheEnvelopeSchema,
  type CacheArtifactKind,
  type CacheArtifact,
  type RenderedSqlArtifact,
  type LineageArtifact,
  type ValidationArtifact,
  type ArtifactOf,
  type CacheEnvelope,
} from './cache.schema.js';

export {
  BUILD_MANIFEST_VERSION,
  BuildRecordSchema,
  BuildManifestSchema,
  ExecutionReasonCodeSchema,
  ExecutionReasonSchema,
  type BuildRecord,
  type BuildManifest,
  type ExecutionReasonCode,
  type ExecutionReason,
} from './build.schema.js';
