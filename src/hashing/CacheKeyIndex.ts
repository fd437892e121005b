import { CachingOptions } from '../Options';
import { CacheCallContext } from '../CacheStore';
import { CacheEntryOptions } from '../ttl/CacheEntryOptions';
import { buildCacheKey, buildHashKey } from '../keys/CacheKeyFormatter';

/**
 * Maps hashed keys, as shown in diagnostics output, back to the logical keys
 * they were computed from so they can be invalidated.
 */
export interface CacheKeyIndex {
  /** Remember the hash of `logicalKey` for at least as long as its entry lives */
  track(logicalKey: string, entryOptions: CacheEntryOptions, context?: CacheCallContext): Promise<void>;
  /** The logical key behind a hash, or null when it is unknown or expired */
  tryResolve(hash: string, context?: CacheCallContext): Promise<string | null>;
  remove(hash: string, context?: CacheCallContext): Promise<void>;
}

export const buildHashIndexKey = (options: CachingOptions, hash: string): string =>
  buildCacheKey(options, buildHashKey(hash));
