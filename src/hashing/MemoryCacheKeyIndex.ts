import { CachingOptionsProvider } from '../Options';
import { CacheCallContext } from '../CacheStore';
import { CacheEntryOptions, resolveIndexTtlSeconds } from '../ttl/CacheEntryOptions';
import { CacheKeyHasher } from './CacheKeyHasher';
import { buildHashIndexKey, CacheKeyIndex } from './CacheKeyIndex';
import LibLogger from '../logger';

const logger = LibLogger.get('MemoryCacheKeyIndex');

// Expired mappings are otherwise only dropped when resolved
const PURGE_THRESHOLD = 1000;

interface HashEntry {
  logicalKey: string;
  expiresAt: number;
}

export class MemoryCacheKeyIndex implements CacheKeyIndex {
  private readonly entries: Map<string, HashEntry> = new Map();

  public constructor(
    private readonly hasher: CacheKeyHasher,
    private readonly optionsProvider: CachingOptionsProvider
  ) {}

  public async track(logicalKey: string, entryOptions: CacheEntryOptions, context: CacheCallContext = {}): Promise<void> {
    const hash = this.hasher.hash(logicalKey);
    if (hash === '') {
      return;
    }
    context.signal?.throwIfAborted();

    if (this.entries.size >= PURGE_THRESHOLD) {
      this.purgeExpired();
    }

    const options = this.optionsProvider.current();
    const ttlSeconds = resolveIndexTtlSeconds(options, entryOptions);
    this.entries.set(buildHashIndexKey(options, hash), {
      logicalKey,
      expiresAt: Date.now() + ttlSeconds * 1000
    });
    logger.trace('track', { hash, ttlSeconds });
  }

  public async tryResolve(hash: string, context: CacheCallContext = {}): Promise<string | null> {
    if (hash.trim() === '') {
      return null;
    }
    context.signal?.throwIfAborted();

    const indexKey = buildHashIndexKey(this.optionsProvider.current(), hash);
    const entry = this.entries.get(indexKey);
    if (!entry) {
      return null;
    }
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(indexKey);
      return null;
    }
    return entry.logicalKey;
  }

  public async remove(hash: string, context: CacheCallContext = {}): Promise<void> {
    context.signal?.throwIfAborted();
    this.entries.delete(buildHashIndexKey(this.optionsProvider.current(), hash));
  }

  public purgeExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [indexKey, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(indexKey);
        removed++;
      }
    }
    return removed;
  }

  public get size(): number {
    return this.entries.size;
  }
}
