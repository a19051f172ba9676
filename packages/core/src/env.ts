import { SqlDialectSchema, type SqlDialect } from '@lineagekit/types';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Reads the analyzer settings callers may override through the environment
 */

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v ? parseInt(v, 10) : fallback))
    .pipe(z.number().int().positive().finite());

// Base runtime config
const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .optional(),
  LOG_PRETTY: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
});

// SQL and template settings
const AnalyzerEnvSchema = z.object({
  /** Dialect deciding identifier case folding and quoting */
  LINEAGE_SQL_DIALECT: SqlDialectSchema.default('duckdb'),
  /** Maximum nested macro expansions before a model fails */
  LINEAGE_MACRO_DEPTH_LIMIT: positiveInt(32),
  /** Schema that `ref()` renders model relations into */
  LINEAGE_SCHEMA: z.string().regex(/^[A-Za-z_][A-Za-z0-9_$]*$/).default('main'),
  /** Models rendered/resolved at the same time */
  LINEAGE_CONCURRENCY: positiveInt(8),
  /** Report computed columns missing from a model's documentation */
  LINEAGE_REPORT_UNDOCUMENTED: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
  /** Minutes a successful model build stays reusable */
  LINEAGE_BUILD_VALIDITY_MINUTES: positiveInt(1440),
});

// Cache persistence config
const CacheEnvSchema = z.object({
  LINEAGE_CACHE_DRIVER: z.enum(['filesystem', 'memory', 'postgres']).default('filesystem'),
  LINEAGE_CACHE_PATH: z.string().min(1).default('.lineage-cache'),
  LINEAGE_CACHE_TABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/)
    .default('lineage_cache'),
  DATABASE_URL: z.string().url().optional(),
});

export const LineageEnvSchema = RuntimeEnvSchema.merge(AnalyzerEnvSchema)
  .merge(CacheEnvSchema)
  .superRefine((env, ctx) => {
    if (env.LINEAGE_CACHE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when LINEAGE_CACHE_DRIVER is postgres',
      });
    }
  });

export type LineageEnv = z.infer<typeof LineageEnvSchema>;

export type CacheDriverConfig =
  | { driver: 'memory' }
  | { driver: 'filesystem'; directory: string }
  | { driver: 'postgres'; connectionString: string; tableName: string };

/**
 * Settings consumed by the pipeline
 */
export interface AnalyzerConfig {
  dialect: SqlDialect;
  macroDepthLimit: number;
  schema: string;
  concurrency: number;
  reportUndocumentedColumns: boolean;
  buildValidityMinutes: number;
  cache: CacheDriverConfig;
  logLevel: string | undefined;
  prettyLogs: boolean;
}

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): LineageEnv {
  const result = LineageEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new ConfigurationError(`Environment validation failed:\n${errorMessages}`, errors);
  }

  return result.data;
}

function toCacheConfig(env: LineageEnv): CacheDriverConfig {
  switch (env.LINEAGE_CACHE_DRIVER) {
    case 'memory':
      return { driver: 'memory' };
    case 'filesystem':
      return { driver: 'filesystem', directory: env.LINEAGE_CACHE_PATH };
    case 'postgres':
      if (!env.DATABASE_URL) {
        throw new ConfigurationError('DATABASE_URL is required for the postgres cache driver');
      }
      return {
        driver: 'postgres',
        connectionString: env.DATABASE_URL,
        tableName: env.LINEAGE_CACHE_TABLE,
      };
  }
}

/**
 * Load analyzer settings from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  const parsed = validateEnv(env);

  return {
    dialect: parsed.LINEAGE_SQL_DIALECT,
    macroDepthLimit: parsed.LINEAGE_MACRO_DEPTH_LIMIT,
    schema: parsed.LINEAGE_SCHEMA,
    concurrency: parsed.LINEAGE_CONCURRENCY,
    reportUndocumentedColumns: parsed.LINEAGE_REPORT_UNDOCUMENTED,
    buildValidityMinutes: parsed.LINEAGE_BUILD_VALIDITY_MINUTES,
    cache: toCacheConfig(parsed),
    logLevel: parsed.LOG_LEVEL,
    prettyLogs: parsed.LOG_PRETTY,
  };
}
