import { CachingOptionsProvider } from './Options';
import { CacheStore } from './CacheStore';
import { MemoryCacheStore, MemoryCacheStoreConfig } from './memory/MemoryCacheStore';
import { DistributedCacheStore } from './distributed/DistributedCacheStore';
import { KeyValueClient } from './distributed/KeyValueClient';
import { CacheCodec } from './distributed/CacheCodec';
import { createRedisKeyValueClient } from './distributed/RedisKeyValueClient';
import { CacheKeyHasher, Sha256CacheKeyHasher } from './hashing/CacheKeyHasher';
import { CacheKeyIndex } from './hashing/CacheKeyIndex';
import { MemoryCacheKeyIndex } from './hashing/MemoryCacheKeyIndex';
import { DistributedCacheKeyIndex } from './hashing/DistributedCacheKeyIndex';
import { CacheEntryOptionsFactory } from './ttl/CacheEntryOptionsFactory';
import { CacheInvalidationService } from './invalidation/CacheInvalidationService';
import LibLogger from './logger';

const logger = LibLogger.get('CachingInfrastructure');

export interface CachingInfrastructureConfig {
  /** Remote client; when absent a Redis client is opened from `providerSettings.distributed.connectionString` */
  client?: KeyValueClient;
  codec?: CacheCodec;
  hasher?: CacheKeyHasher;
  memory?: Omit<MemoryCacheStoreConfig, 'keyIndex'>;
}

export interface CachingInfrastructure {
  store: CacheStore;
  keyIndex: CacheKeyIndex;
  hasher: CacheKeyHasher;
  entryOptionsFactory: CacheEntryOptionsFactory;
  invalidation: CacheInvalidationService;
}

/**
 * Wire the cache layer for the configured provider. The backend is chosen
 * here, once; later configuration reloads do not switch it.
 *
 * @throws Error when the Distributed provider has neither a client nor a connection string
 */
export const createCachingInfrastructure = (
  optionsProvider: CachingOptionsProvider,
  config: CachingInfrastructureConfig = {}
): CachingInfrastructure => {
  const options = optionsProvider.current();
  const hasher = config.hasher ?? new Sha256CacheKeyHasher();

  let store: CacheStore;
  let keyIndex: CacheKeyIndex;

  switch (options.provider) {
    case 'Distributed': {
      let client = config.client;
      if (!client) {
        const connectionString = options.providerSettings.distributed.connectionString?.trim();
        if (!connectionString) {
          throw new Error(
            'The Distributed cache provider needs a key/value client. ' +
            'Pass one as config.client or set providerSettings.distributed.connectionString.'
          );
        }
        client = createRedisKeyValueClient(connectionString);
      }
      keyIndex = new DistributedCacheKeyIndex(client, hasher, optionsProvider);
      store = new DistributedCacheStore(optionsProvider, client, config.codec, keyIndex);
      break;
    }
    case 'Memory':
      keyIndex = new MemoryCacheKeyIndex(hasher, optionsProvider);
      store = new MemoryCacheStore(optionsProvider, { ...config.memory, keyIndex });
      break;
  }

  logger.info('Caching infrastructure created', {
    provider: options.provider,
    implementationType: store.implementationType,
    enabled: options.enabled,
    disableCache: options.disableCache,
    keyPrefix: options.keyPrefix
  });

  return {
    store,
    keyIndex,
    hasher,
    entryOptionsFactory: new CacheEntryOptionsFactory(optionsProvider),
    invalidation: new CacheInvalidationService(store, keyIndex, hasher, optionsProvider)
  };
};
