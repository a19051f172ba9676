/**
 * Validation diagnostics
 *
 * @module @lineagekit/types/diagnostic
 */

import { z } from 'zod';

export const DiagnosticSeveritySchema = z.enum(['error', 'warning']);
export type DiagnosticSeverity = z.infer<typeof DiagnosticSeveritySchema>;

export const DiagnosticCodeSchema = z.enum([
  /** Consumed upstream column does not exist */
  'missing-column',
  /** Column referenced against a local relation that lacks it, or found nowhere */
  'unresolved-column',
  /** Relation is neither a model nor a declared source */
  'undeclared-relation',
  /** Documented column absent from the computed lineage */
  'documentation-drift',
  /** Computed column absent from the model's documentation */
  'undocumented-column',
]);
export type DiagnosticCode = z.infer<typeof DiagnosticCodeSchema>;

export const DiagnosticSchema = z.object({
  severity: DiagnosticSeveritySchema,
  code: DiagnosticCodeSchema,
  model: z.string().min(1),
  column: z.string().optional(),
  upstream: z
    .object({
      relation: z.string().nullable(),
      column: z.string(),
    })
    .optional(),
  message: z.string(),
});
export type Diagnostic = z.infer<typeof DiagnosticSchema>;

/**
 * A model that could not be fully analyzed
 */
export const ModelFailureSchema = z.object({
  model: z.string().min(1),
  code: z.string().min(1),
  message: z.string(),
});
export type ModelFailure = z.infer<typeof ModelFailureSchema>;
