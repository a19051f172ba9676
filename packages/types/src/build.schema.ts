/**
 * Build manifest and execution analysis
 *
 * The manifest records, per model, what its inputs looked like the last time
 * it was built; the execution analysis compares it with the current project.
 *
 * @module @lineagekit/types/build
 */

import { z } from 'zod';

export const BUILD_MANIFEST_VERSION = 1;

export const BuildRecordSchema = z.object({
  model: z.string().min(1),
  /** Fingerprint of the model's own text at build time */
  contentFingerprint: z.string().min(1),
  /** Project macros the model expanded, keyed by macro key */
  macros: z.record(z.string(), z.string()),
  builtAt: z.string().datetime(),
  succeeded: z.boolean(),
});
export type BuildRecord = z.infer<typeof BuildRecordSchema>;

export const BuildManifestSchema = z.object({
  version: z.literal(BUILD_MANIFEST_VERSION),
  models: z.array(BuildRecordSchema),
});
export type BuildManifest = z.infer<typeof BuildManifestSchema>;

export const ExecutionReasonCodeSchema = z.enum([
  /** Never built, failed, changed since its build, or built too long ago */
  'MODEL_STALE',
  'UPSTREAM_MODELS_CHANGED',
  'UPSTREAM_MACROS_CHANGED',
]);
export type ExecutionReasonCode = z.infer<typeof ExecutionReasonCodeSchema>;

export const ExecutionReasonSchema = z.object({
  code: ExecutionReasonCodeSchema,
  description: z.string(),
});
export type ExecutionReason = z.infer<typeof ExecutionReasonSchema>;
