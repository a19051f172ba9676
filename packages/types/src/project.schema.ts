/**
 * Project input schemas
 *
 * A project is the immutable input of one analysis run: the models with their
 * raw templated SQL, the external sources and macros they may use, and the
 * project variables. Loaders outside this package build it; every component
 * receives it explicitly.
 *
 * @module @lineagekit/types/project
 */

import { z } from 'zod';

// =============================================================================
// DIALECTS
// =============================================================================

/**
 * SQL dialects with known identifier folding and quoting rules
 */
export const SqlDialectSchema = z.enum([
  'duckdb',
  'postgres',
  'redshift',
  'snowflake',
  'bigquery',
  'databricks',
  'mysql',
  'athena',
  'trino',
]);
export type SqlDialect = z.infer<typeof SqlDialectSchema>;

// =============================================================================
// DOCUMENTATION
// =============================================================================

export const ColumnDocSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
});
export type ColumnDoc = z.infer<typeof ColumnDocSchema>;

// =============================================================================
// MODELS, SOURCES, MACROS
// =============================================================================

const IdentifierSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z_][A-Za-z0-9_$]*$/, 'Must be a plain identifier');

/**
 * One SQL transformation unit
 */
export const ModelSchema = z.object({
  name: IdentifierSchema,
  rawSql: z.string(),
  path: z.string().min(1),
  description: z.string().optional(),
  /** Declared documentation, in declaration order */
  columns: z.array(ColumnDocSchema).optional(),
});
export type Model = z.infer<typeof ModelSchema>;

/**
 * External table known only through its documentation
 */
export const SourceSchema = z.object({
  sourceName: IdentifierSchema,
  name: IdentifierSchema,
  description: z.string().optional(),
  columns: z.array(ColumnDocSchema).optional(),
});
export type Source = z.infer<typeof SourceSchema>;

/**
 * Values a template expression can evaluate to
 */
export const TemplateLiteralSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type TemplateLiteral = z.infer<typeof TemplateLiteralSchema>;

export const MacroParameterSchema = z.object({
  name: IdentifierSchema,
  default: TemplateLiteralSchema.optional(),
});
export type MacroParameter = z.infer<typeof MacroParameterSchema>;

export const MacroSchema = z.object({
  name: IdentifierSchema,
  /** Namespace the macro is called through, e.g. `utils` in `utils.star()` */
  package: IdentifierSchema.optional(),
  parameters: z.array(MacroParameterSchema).default([]),
  body: z.string(),
});
export type Macro = z.infer<typeof MacroSchema>;
export type MacroInput = z.input<typeof MacroSchema>;

// =============================================================================
// PROJECT
// =============================================================================

export const ProjectInputSchema = z.object({
  models: z.array(ModelSchema),
  sources: z.array(SourceSchema).default([]),
  macros: z.array(MacroSchema).default([]),
  vars: z.record(TemplateLiteralSchema).default({}),
  /** Schema models are materialized into; `ref()` renders `<schema>.<model>` */
  schema: IdentifierSchema.default('main'),
});
export type ProjectInput = z.input<typeof ProjectInputSchema>;
export type ProjectDefinition = z.infer<typeof ProjectInputSchema>;

/**
 * Identity of a source in references and provenance: `<sourceName>.<name>`
 */
export function sourceId(source: Pick<Source, 'sourceName' | 'name'>): string {
  return `${source.sourceName}.${source.name}`;
}
