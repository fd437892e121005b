// Configuration
export {
  createCachingOptions,
  validateCachingOptions,
  resolveProviderName,
  isCachingActive,
  effectiveDefaultDurationSeconds,
  findEndpointOptions,
  createStaticOptionsProvider,
  createReloadableOptionsProvider,
  CACHE_PROVIDERS,
  KEY_DISPLAY_MODES,
  DEFAULT_CACHE_STATUS_HEADER,
  FALLBACK_CACHE_DURATION_SECONDS
} from './Options';
export type {
  CachingOptions,
  CachingOptionsInput,
  CachingOptionsProvider,
  ReloadableOptionsProvider,
  CacheProviderName,
  KeyDisplayMode,
  EndpointCacheOptions,
  MemoryProviderSettings,
  DistributedProviderSettings,
  CacheDiagnosticsOptions
} from './Options';

// Keys
export {
  buildCacheKey,
  buildPrefixKey,
  buildIndexKey,
  buildCatalogKey,
  buildHashKey,
  extractPrefix
} from './keys/CacheKeyFormatter';
export { CacheKeyBuilder, cacheKey } from './keys/CacheKeyBuilder';

// TTLs
export {
  DO_NOT_CACHE,
  entryOptionsFromSeconds,
  resolveIndexTtlSeconds
} from './ttl/CacheEntryOptions';
export type { CacheEntryOptions } from './ttl/CacheEntryOptions';
export { CacheEntryOptionsFactory } from './ttl/CacheEntryOptionsFactory';

// Stores
export { CacheStore } from './CacheStore';
export type { CacheCallContext, CacheLookup } from './CacheStore';
export { PrefixIndex } from './PrefixIndex';
export type { TrackedKeyStorage } from './PrefixIndex';
export { MemoryCacheStore } from './memory/MemoryCacheStore';
export type { MemoryCacheStoreConfig } from './memory/MemoryCacheStore';
export { DistributedCacheStore } from './distributed/DistributedCacheStore';
export type { KeyValueClient } from './distributed/KeyValueClient';
export { JsonCacheCodec } from './distributed/CacheCodec';
export type { CacheCodec } from './distributed/CacheCodec';
export { RedisKeyValueClient, createRedisKeyValueClient } from './distributed/RedisKeyValueClient';
export { CacheStatsManager } from './CacheStats';
export type { CacheStats } from './CacheStats';

// Hashing
export { Sha256CacheKeyHasher } from './hashing/CacheKeyHasher';
export type { CacheKeyHasher } from './hashing/CacheKeyHasher';
export { buildHashIndexKey } from './hashing/CacheKeyIndex';
export type { CacheKeyIndex } from './hashing/CacheKeyIndex';
export { MemoryCacheKeyIndex } from './hashing/MemoryCacheKeyIndex';
export { DistributedCacheKeyIndex } from './hashing/DistributedCacheKeyIndex';

// Request-scoped helpers
export {
  CacheBypassContext,
  CACHE_BYPASS_HEADER,
  createBypassContextFromHeaders
} from './bypass/CacheBypassContext';
export type { RequestHeaders } from './bypass/CacheBypassContext';
export { displayKey, noopDiagnosticsPublisher } from './diagnostics/CacheDiagnosticsPublisher';
export type { CacheDiagnosticsPublisher, CacheStatus } from './diagnostics/CacheDiagnosticsPublisher';
export {
  HeaderCacheDiagnosticsPublisher,
  CACHE_KEY_HEADER,
  CACHE_DURATION_HEADER
} from './diagnostics/HeaderCacheDiagnosticsPublisher';
export type { HeaderSink } from './diagnostics/HeaderCacheDiagnosticsPublisher';

// Invalidation
export { CacheInvalidationService } from './invalidation/CacheInvalidationService';
export {
  handleInvalidationRequest,
  invalidationRequestSchema,
  MISSING_TARGET_ERROR
} from './invalidation/InvalidationRequest';
export type {
  InvalidationRequest,
  InvalidationResult,
  InvalidationAction,
  InvalidationRequestOptions
} from './invalidation/InvalidationRequest';

// Get-or-compute
export { createCachedQuery } from './CachedQuery';
export type {
  CachedQuery,
  CachedQueryContext,
  CachedQueryDefinition,
  CachedQueryDependencies
} from './CachedQuery';
export { createCachingInfrastructure } from './CachingInfrastructure';
export type { CachingInfrastructure, CachingInfrastructureConfig } from './CachingInfrastructure';

export { estimateValueSize, formatBytes } from './utils/CacheSize';
