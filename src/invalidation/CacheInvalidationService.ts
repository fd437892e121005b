import { CachingOptionsProvider } from '../Options';
import { CacheCallContext, CacheStore } from '../CacheStore';
import { CacheKeyHasher } from '../hashing/CacheKeyHasher';
import { CacheKeyIndex } from '../hashing/CacheKeyIndex';
import LibLogger from '../logger';

const logger = LibLogger.get('CacheInvalidationService');

/**
 * Administrative invalidation. Every operation is idempotent: invalidating
 * something that is not cached is a no-op.
 */
export class CacheInvalidationService {
  public constructor(
    private readonly store: CacheStore,
    private readonly keyIndex: CacheKeyIndex,
    private readonly hasher: CacheKeyHasher,
    private readonly optionsProvider: CachingOptionsProvider
  ) {}

  /**
   * Remove one entry. When keys are displayed hashed, `keyOrHash` may be a
   * hash taken from diagnostics output; it is resolved through the hash index
   * first and falls back to being treated as a logical key.
   */
  public async invalidateKey(keyOrHash: string, context: CacheCallContext = {}): Promise<void> {
    const options = this.optionsProvider.current();

    if (options.diagnostics.keyDisplayMode === 'Hash') {
      const resolved = await this.keyIndex.tryResolve(keyOrHash, context);
      if (resolved !== null) {
        logger.debug('invalidateKey resolved hash', { hash: keyOrHash, key: resolved });
        await this.store.remove(resolved, context);
        await this.keyIndex.remove(keyOrHash, context);
        return;
      }
    }

    logger.debug('invalidateKey', { key: keyOrHash });
    await this.store.remove(keyOrHash, context);
    if (options.diagnostics.keyDisplayMode === 'Hash') {
      await this.keyIndex.remove(this.hasher.hash(keyOrHash), context);
    }
  }

  public async invalidatePrefix(prefix: string, context: CacheCallContext = {}): Promise<void> {
    logger.debug('invalidatePrefix', { prefix });
    await this.store.removeByPrefix(prefix, context);
  }

  public async invalidateAll(context: CacheCallContext = {}): Promise<void> {
    logger.info('Invalidating every cached entry', { implementationType: this.store.implementationType });
    await this.store.removeByPrefix('', context);
  }
}
