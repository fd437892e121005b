import { CachingOptionsProvider } from '../Options';
import { CacheCallContext } from '../CacheStore';
import { CacheEntryOptions, resolveIndexTtlSeconds } from '../ttl/CacheEntryOptions';
import { KeyValueClient } from '../distributed/KeyValueClient';
import { CacheKeyHasher } from './CacheKeyHasher';
import { buildHashIndexKey, CacheKeyIndex } from './CacheKeyIndex';
import LibLogger from '../logger';

const logger = LibLogger.get('DistributedCacheKeyIndex');

/**
 * Hash index kept in the remote key/value service, so a hash seen in one
 * process's diagnostics can be resolved by any other. The logical key is
 * stored as the plain string value. Transport failures degrade like the
 * cache store: tracking and removal become no-ops, resolution a miss.
 */
export class DistributedCacheKeyIndex implements CacheKeyIndex {
  public constructor(
    private readonly client: KeyValueClient,
    private readonly hasher: CacheKeyHasher,
    private readonly optionsProvider: CachingOptionsProvider
  ) {}

  public async track(logicalKey: string, entryOptions: CacheEntryOptions, context: CacheCallContext = {}): Promise<void> {
    const hash = this.hasher.hash(logicalKey);
    if (hash === '') {
      return;
    }
    context.signal?.throwIfAborted();

    const options = this.optionsProvider.current();
    const ttlSeconds = resolveIndexTtlSeconds(options, entryOptions);
    try {
      await this.client.set(buildHashIndexKey(options, hash), logicalKey, ttlSeconds * 1000);
    } catch (error) {
      this.handleFailure('track', hash, error, context);
    }
  }

  public async tryResolve(hash: string, context: CacheCallContext = {}): Promise<string | null> {
    if (hash.trim() === '') {
      return null;
    }
    context.signal?.throwIfAborted();

    try {
      return await this.client.get(buildHashIndexKey(this.optionsProvider.current(), hash));
    } catch (error) {
      this.handleFailure('tryResolve', hash, error, context);
      return null;
    }
  }

  public async remove(hash: string, context: CacheCallContext = {}): Promise<void> {
    context.signal?.throwIfAborted();
    try {
      await this.client.delete(buildHashIndexKey(this.optionsProvider.current(), hash));
    } catch (error) {
      this.handleFailure('remove', hash, error, context);
    }
  }

  private handleFailure(operation: string, hash: string, error: unknown, context: CacheCallContext): void {
    if (context.signal?.aborted) {
      throw error;
    }
    logger.error(`Hash index ${operation} failed`, {
      hash,
      error: error instanceof Error ? error.message : String(error)
    });
  }
}
