/**
 * Content-addressed artifact cache
 *
 * Reads go straight to the store; writes are buffered and flushed once per
 * run. Entries that are missing, unparsable, schema-invalid, of another kind
 * or of another format version count as misses. A store that cannot be
 * opened disables the cache for the run.
 *
 * @module core/cache/content-cache
 */

import {
  CACHE_FORMAT_VERSION,
  CacheEnvelopeSchema,
  type ArtifactOf,
  type CacheArtifact,
  type CacheArtifactKind,
  type CacheEnvelope,
} from '@lineagekit/types';

import { toError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { mapInBatches } from '../utils.js';

import { cacheKey } from './fingerprint.js';
import type { CacheStore } from './stores.js';

export interface ContentCacheStats {
  hits: number;
  misses: number;
  /** Entries present but rejected (unparsable, invalid, other version or kind) */
  corrupt: number;
  writes: number;
  writeFailures: number;
}

export interface ContentCacheOptions {
  /** Concurrent store writes during flush (default: 8) */
  writeConcurrency?: number;
  logger?: Logger;
  /** Clock for envelope timestamps */
  now?: () => Date;
}

function isArtifactOf<K extends CacheArtifactKind>(
  artifact: CacheArtifact,
  kind: K
): artifact is ArtifactOf<K> {
  return artifact.kind === kind;
}

function emptyStats(): ContentCacheStats {
  return { hits: 0, misses: 0, corrupt: 0, writes: 0, writeFailures: 0 };
}

export class ContentCache {
  private readonly store: CacheStore;
  private readonly logger: Logger;
  private readonly writeConcurrency: number;
  private readonly now: () => Date;
  private readonly pending = new Map<string, CacheEnvelope>();
  private disabled = false;
  private counters: ContentCacheStats = emptyStats();

  constructor(store: CacheStore, options: ContentCacheOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? createLogger({ name: 'content-cache' });
    this.writeConcurrency = options.writeConcurrency ?? 8;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Prepare the store and reset statistics for a new run
   */
  async load(): Promise<void> {
    this.counters = emptyStats();
    this.pending.clear();
    try {
      await this.store.open();
      this.disabled = false;
      this.logger.debug({ store: this.store.name }, 'Content cache loaded');
    } catch (error) {
      this.disabled = true;
      this.logger.error(
        { err: toError(error), store: this.store.name },
        'Cache store unavailable, caching disabled'
      );
    }
  }

  /** False after a failed load; every read then misses and nothing is written */
  get enabled(): boolean {
    return !this.disabled;
  }

  async get<K extends CacheArtifactKind>(
    kind: K,
    fingerprint: string
  ): Promise<ArtifactOf<K> | undefined> {
    if (this.disabled) {
      this.counters.misses++;
      return undefined;
    }
    const key = cacheKey(kind, fingerprint);

    const buffered = this.pending.get(key);
    if (buffered && isArtifactOf(buffered.artifact, kind)) {
      this.counters.hits++;
      return buffered.artifact;
    }

    let raw: string | undefined;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      this.logger.warn({ err: toError(error), kind, key }, 'Cache read failed, treating as miss');
      this.counters.misses++;
      return undefined;
    }

    if (raw === undefined) {
      this.counters.misses++;
      return undefined;
    }

    const artifact = this.decode(raw, key, kind);
    if (!artifact) {
      this.counters.corrupt++;
      this.counters.misses++;
      return undefined;
    }

    this.counters.hits++;
    return artifact;
  }

  private decode<K extends CacheArtifactKind>(
    raw: string,
    key: string,
    kind: K
  ): ArtifactOf<K> | undefined {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ err: toError(error), key }, 'Unparsable cache entry ignored');
      return undefined;
    }

    const result = CacheEnvelopeSchema.safeParse(json);
    if (!result.success) {
      this.logger.warn({ key, issues: result.error.issues.length }, 'Invalid cache entry ignored');
      return undefined;
    }
    if (result.data.key !== key || !isArtifactOf(result.data.artifact, kind)) {
      this.logger.warn(
        { key, kind, found: result.data.artifact.kind },
        'Mismatched cache entry ignored'
      );
      return undefined;
    }
    return result.data.artifact;
  }

  /**
   * Buffer an artifact for the next flush
   */
  put<K extends CacheArtifactKind>(kind: K, fingerprint: string, artifact: ArtifactOf<K>): void {
    if (this.disabled) {
      return;
    }
    const key = cacheKey(kind, fingerprint);
    this.pending.set(key, {
      version: CACHE_FORMAT_VERSION,
      key,
      createdAt: this.now().toISOString(),
      artifact,
    });
  }

  /**
   * Write buffered artifacts to the store
   *
   * A failed write is logged and counted; the run's results are unaffected.
   */
  async flush(): Promise<void> {
    const entries = Array.from(this.pending.entries());
    this.pending.clear();
    if (entries.length === 0) {
      return;
    }

    await mapInBatches(entries, this.writeConcurrency, async ([key, envelope]) => {
      try {
        await this.store.put(key, JSON.stringify(envelope));
        this.counters.writes++;
      } catch (error) {
        this.counters.writeFailures++;
        this.logger.error({ err: toError(error), key }, 'Cache write failed');
      }
    });

    this.logger.info(
      { written: this.counters.writes, failed: this.counters.writeFailures },
      'Content cache flushed'
    );
  }

  stats(): ContentCacheStats {
    return { ...this.counters };
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
