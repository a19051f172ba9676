import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logger for the lineage pipeline
 *
 * JSON output by default, pretty output on request. Credentials that can
 * reach log context (cache connection strings) are redacted.
 */

// Fields to completely redact
const REDACTED_FIELDS = ['password', 'secret', 'token', 'connectionString', 'databaseUrl'];

/**
 * Create a redaction config for Pino
 */
function createRedactor() {
  return {
    paths: [...REDACTED_FIELDS, ...REDACTED_FIELDS.map((field) => `*.${field}`)],
    censor: '[REDACTED]',
  };
}

/**
 * Get default log level based on environment
 */
function getDefaultLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) {
    return envLevel;
  }

  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  /** Pretty-print through pino-pretty instead of emitting JSON */
  pretty?: boolean;
  runId?: string;
}

/**
 * Create a logger instance
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = getDefaultLevel(), runId, pretty = false } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Use null to omit base, or provide runId if present
    base: runId ? { runId } : null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    }) as pino.DestinationStream;
    return pino(loggerOptions, transport);
  }

  return pino(loggerOptions);
}

/**
 * Create a child logger bound to one analysis run
 */
export function withRunId(logger: Logger, runId: string): Logger {
  return logger.child({ runId });
}

/**
 * Generate a run ID
 */
export function generateRunId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

// Default logger instance
export const logger = createLogger({ name: 'lineagekit' });

export type { Logger };
