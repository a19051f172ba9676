/**
 * Content cache for rendered SQL, lineage and validation artifacts
 *
 * @module core/cache
 */

export {
  ENGINE_VERSION,
  fingerprintNode,
  cacheKey,
  computeVersionTag,
  fingerprintSource,
  fingerprintModel,
  renderFingerprint,
  computeFingerprints,
  fingerprintProducers,
  contentFingerprint,
  macroFingerprint,
} from './fingerprint.js';
export {
  InMemoryCacheStore,
  FileSystemCacheStore,
  PostgresCacheStore,
  createCacheStoreFromConfig,
  type CacheStore,
  type CacheQueryable,
  type PostgresCacheStoreOptions,
} from './stores.js';
export {
  ContentCache,
  type ContentCacheStats,
  type ContentCacheOptions,
} from './content-cache.js';
