/**
 * Cache Store Implementations
 *
 * In-memory, file system and PostgreSQL implementations of the CacheStore
 * interface. Stores hold opaque serialized envelopes; validation happens in
 * the ContentCache.
 *
 * @module core/cache/stores
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { CacheDriverConfig } from '../env.js';
import { CacheStoreError, ConfigurationError, toError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

// =============================================================================
// INTERFACE
// =============================================================================

export interface CacheStore {
  readonly name: string;
  /** Prepare the backing storage (directory, table) */
  open(): Promise<void>;
  get(key: string): Promise<string | undefined>;
  put(key: string, value: string): Promise<void>;
  close(): Promise<void>;
}

// =============================================================================
// IN-MEMORY STORE (Testing/Development)
// =============================================================================

/**
 * In-memory cache store for tests and single-process runs
 */
export class InMemoryCacheStore implements CacheStore {
  readonly name = 'memory';
  private readonly entries = new Map<string, string>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ name: 'in-memory-cache-store' });
  }

  async open(): Promise<void> {
    this.logger.debug({ entries: this.entries.size }, 'In-memory cache store opened');
  }

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async close(): Promise<void> {
    // entries outlive close so a later run in the same process can reuse them
  }

  /**
   * Get entry count (for testing)
   */
  size(): number {
    return this.entries.size;
  }

  /**
   * Clear all entries (for testing)
   */
  clear(): void {
    this.entries.clear();
  }
}

// =============================================================================
// FILE SYSTEM STORE
// =============================================================================

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per key under `<directory>/<first two key chars>/`
 *
 * Writes go to a temporary file renamed into place, so readers never see a
 * partial entry; concurrent writers of one key leave the last rename.
 */
export class FileSystemCacheStore implements CacheStore {
  readonly name = 'filesystem';
  private readonly logger: Logger;

  constructor(
    private readonly directory: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ name: 'filesystem-cache-store' });
  }

  pathFor(key: string): string {
    return join(this.directory, key.slice(0, 2), `${key}.json`);
  }

  async open(): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new CacheStoreError('open', `cannot create ${this.directory}`, toError(error));
    }
    this.logger.debug({ directory: this.directory }, 'File system cache store opened');
  }

  async get(key: string): Promise<string | undefined> {
    try {
      return await readFile(this.pathFor(key), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new CacheStoreError('read', `cannot read entry ${key}`, toError(error));
    }
  }

  async put(key: string, value: string): Promise<void> {
    const target = this.pathFor(key);
    const temporary = `${target}.${process.pid}.${randomUUID()}.tmp`;

    try {
      await mkdir(join(this.directory, key.slice(0, 2)), { recursive: true });
      await writeFile(temporary, value, 'utf8');
      await rename(temporary, target);
    } catch (error) {
      await rm(temporary, { force: true });
      throw new CacheStoreError('write', `cannot write entry ${key}`, toError(error));
    }
  }

  async close(): Promise<void> {
    // nothing held open between operations
  }
}

// =============================================================================
// POSTGRESQL STORE (Shared)
// =============================================================================

/**
 * The part of a `pg` pool the store uses
 */
export interface CacheQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export interface PostgresCacheStoreOptions {
  connectionString?: string;
  tableName?: string;
  /** Pre-built pool; created from `connectionString` when absent */
  pool?: CacheQueryable;
  maxConnections?: number;
  logger?: Logger;
}

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

async function createPool(connectionString: string, max: number): Promise<CacheQueryable> {
  const pg = await import('pg');
  const pool = new pg.default.Pool({ connectionString, max });
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
    end: () => pool.end(),
  };
}

function readValue(row: unknown): string | undefined {
  if (typeof row === 'object' && row !== null && 'value' in row && typeof row.value === 'string') {
    return row.value;
  }
  return undefined;
}

/**
 * Cache entries in one PostgreSQL table shared by every analyzer process
 */
export class PostgresCacheStore implements CacheStore {
  readonly name = 'postgres';
  private readonly tableName: string;
  private readonly logger: Logger;
  private readonly connectionString: string | undefined;
  private readonly maxConnections: number;
  private pool: CacheQueryable | undefined;
  private tableReady = false;

  constructor(options: PostgresCacheStoreOptions) {
    const tableName = options.tableName ?? 'lineage_cache';
    if (!TABLE_NAME.test(tableName)) {
      throw new ConfigurationError(`Invalid cache table name: ${tableName}`);
    }
    if (!options.pool && !options.connectionString) {
      throw new ConfigurationError('PostgresCacheStore needs a pool or a connection string');
    }
    this.tableName = tableName;
    this.pool = options.pool;
    this.connectionString = options.connectionString;
    this.maxConnections = options.maxConnections ?? 10;
    this.logger = options.logger ?? createLogger({ name: 'postgres-cache-store' });
  }

  private async getPool(): Promise<CacheQueryable> {
    if (!this.pool) {
      this.pool = await createPool(this.connectionString ?? '', this.maxConnections);
    }
    return this.pool;
  }

  private async ensureTable(): Promise<CacheQueryable> {
    const pool = await this.getPool();
    if (!this.tableReady) {
      await pool.query(
        `CREATE TABLE IF NOT EXISTS ${this.tableName} (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )`
      );
      this.tableReady = true;
      this.logger.debug({ table: this.tableName }, 'Cache table ready');
    }
    return pool;
  }

  async open(): Promise<void> {
    try {
      await this.ensureTable();
    } catch (error) {
      throw new CacheStoreError('open', `cannot prepare table ${this.tableName}`, toError(error));
    }
  }

  async get(key: string): Promise<string | undefined> {
    try {
      const pool = await this.ensureTable();
      const result = await pool.query(`SELECT value FROM ${this.tableName} WHERE key = $1`, [key]);
      return readValue(result.rows[0]);
    } catch (error) {
      throw new CacheStoreError('read', `cannot read entry ${key}`, toError(error));
    }
  }

  async put(key: string, value: string): Promise<void> {
    try {
      const pool = await this.ensureTable();
      await pool.query(
        `INSERT INTO ${this.tableName} (key, value, updated_at)
         VALUES ($1, $2, NOW())
         ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
        [key, value]
      );
    } catch (error) {
      throw new CacheStoreError('write', `cannot write entry ${key}`, toError(error));
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
      this.tableReady = false;
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Create the store selected by configuration
 */
export function createCacheStoreFromConfig(config: CacheDriverConfig, logger?: Logger): CacheStore {
  switch (config.driver) {
    case 'memory':
      return new InMemoryCacheStore(logger);
    case 'filesystem':
      return new FileSystemCacheStore(config.directory, logger);
    case 'postgres':
      return new PostgresCacheStore({
        connectionString: config.connectionString,
        tableName: config.tableName,
        logger,
      });
  }
}
