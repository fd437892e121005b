import { CachingOptions, CachingOptionsProvider, isCachingActive } from './Options';
import { CacheBypassContext } from './bypass/CacheBypassContext';
import { CacheEntryOptions } from './ttl/CacheEntryOptions';
import { buildCacheKey } from './keys/CacheKeyFormatter';
import { PrefixIndex, TrackedKeyStorage } from './PrefixIndex';
import { CacheStats, CacheStatsManager } from './CacheStats';
import { CacheKeyIndex } from './hashing/CacheKeyIndex';
import LibLogger from './logger';

const logger = LibLogger.get('CacheStore');

/**
 * Per-call context: the caller's cancellation signal and the request's bypass switch
 */
export interface CacheCallContext {
  signal?: AbortSignal;
  bypass?: CacheBypassContext;
}

/**
 * A cache hit together with how long the entry has left to live
 */
export interface CacheLookup<T> {
  value: T;
  /** Milliseconds until the entry expires, as of this lookup */
  remainingTtlMs: number;
}

/**
 * Common contract of the in-process and remote backends.
 *
 * Subclasses provide physical storage; this class owns the enable/bypass
 * checks, key namespacing, prefix and hash tracking and the degradation policy: a
 * failing backend turns reads into misses and writes into no-ops, and is
 * logged rather than thrown. Only cancellation propagates to the caller.
 */
export abstract class CacheStore {
  /**
   * The implementation type identifier in the format "<category>/<implementation>"
   */
  public readonly implementationType: string;

  protected readonly optionsProvider: CachingOptionsProvider;
  protected readonly statsManager: CacheStatsManager;
  protected readonly prefixIndex: PrefixIndex;
  protected readonly keyIndex: CacheKeyIndex | null;

  protected constructor(
    optionsProvider: CachingOptionsProvider,
    implementationType: string,
    keyIndex?: CacheKeyIndex
  ) {
    this.optionsProvider = optionsProvider;
    this.implementationType = implementationType;
    this.keyIndex = keyIndex ?? null;
    this.statsManager = new CacheStatsManager(implementationType);
    const storage: TrackedKeyStorage = {
      readTrackedKeys: listKey => this.readTrackedKeys(listKey),
      writeTrackedKeys: (listKey, keys, ttlSeconds) => this.writeTrackedKeys(listKey, keys, ttlSeconds),
      deleteTrackedKeys: listKey => this.deleteTrackedKeys(listKey),
      deleteEntry: physicalKey => this.deleteEntry(physicalKey)
    };
    this.prefixIndex = new PrefixIndex(storage);
  }

  /**
   * Retrieve a value, or null on a miss
   */
  public async get<T>(key: string, context: CacheCallContext = {}): Promise<T | null> {
    const hit = await this.lookup<T>(key, context);
    return hit ? hit.value : null;
  }

  /**
   * Retrieve a value along with its remaining lifetime
   */
  public async lookup<T>(key: string, context: CacheCallContext = {}): Promise<CacheLookup<T> | null> {
    context.signal?.throwIfAborted();
    this.statsManager.incrementRequests();

    const options = this.optionsProvider.current();
    if (!this.isCacheEnabled(options, context)) {
      logger.trace('lookup skipped, caching inactive', { key, bypass: context.bypass?.reason });
      this.statsManager.incrementMisses();
      return null;
    }

    const physicalKey = buildCacheKey(options, key);
    try {
      const hit = await this.readEntry<T>(physicalKey);
      if (hit) {
        this.statsManager.incrementHits();
      } else {
        this.statsManager.incrementMisses();
      }
      return hit;
    } catch (error) {
      this.handleStoreFailure('lookup', physicalKey, error, context);
      this.statsManager.incrementMisses();
      return null;
    }
  }

  /**
   * Store a value and track it under its prefix. When keys are displayed
   * hashed and a key index is attached, the key's hash is recorded too.
   * Does nothing when caching is inactive or `absoluteTtlMs <= 0`.
   */
  public async set<T>(key: string, value: T, entryOptions: CacheEntryOptions, context: CacheCallContext = {}): Promise<void> {
    context.signal?.throwIfAborted();

    const options = this.optionsProvider.current();
    if (!this.isCacheEnabled(options, context) || entryOptions.absoluteTtlMs <= 0) {
      logger.trace('set skipped', { key, absoluteTtlMs: entryOptions.absoluteTtlMs });
      return;
    }

    const physicalKey = buildCacheKey(options, key);
    try {
      const stored = await this.writeEntry(physicalKey, value, entryOptions);
      this.statsManager.incrementSets();
      if (!stored) {
        logger.debug('set evicted on write, not tracked', { physicalKey });
        return;
      }
      await this.prefixIndex.track(options, key, physicalKey, entryOptions, context.signal);
      if (this.keyIndex && options.diagnostics.keyDisplayMode === 'Hash') {
        await this.keyIndex.track(key, entryOptions, context);
      }
    } catch (error) {
      this.handleStoreFailure('set', physicalKey, error, context);
    }
  }

  /**
   * Delete a value and drop it from its prefix index
   */
  public async remove(key: string, context: CacheCallContext = {}): Promise<void> {
    context.signal?.throwIfAborted();

    const options = this.optionsProvider.current();
    const physicalKey = buildCacheKey(options, key);
    try {
      await this.deleteEntry(physicalKey);
      this.statsManager.incrementRemovals();
      await this.prefixIndex.untrack(options, key, physicalKey, context.signal);
    } catch (error) {
      this.handleStoreFailure('remove', physicalKey, error, context);
    }
  }

  /**
   * Delete every value tracked under `prefix`. A blank prefix sweeps every
   * cataloged prefix of the namespace.
   */
  public async removeByPrefix(prefix: string, context: CacheCallContext = {}): Promise<void> {
    context.signal?.throwIfAborted();

    const options = this.optionsProvider.current();
    try {
      const removed = prefix.trim() === ''
        ? await this.prefixIndex.sweepAll(options, context.signal)
        : await this.prefixIndex.sweepPrefix(options, prefix, context.signal);
      this.statsManager.incrementPrefixSweeps();
      logger.debug('removeByPrefix', { prefix, removed });
    } catch (error) {
      this.handleStoreFailure('removeByPrefix', prefix, error, context);
    }
  }

  /**
   * Prefix keys currently listed in the namespace's catalog
   */
  public async getCatalog(): Promise<string[]> {
    return this.prefixIndex.catalog(this.optionsProvider.current());
  }

  /**
   * Physical keys currently tracked under a logical prefix
   */
  public async getTrackedKeys(prefix: string): Promise<string[]> {
    return this.prefixIndex.trackedKeys(this.optionsProvider.current(), prefix);
  }

  public getStats(): CacheStats {
    return this.statsManager.getStats();
  }

  protected isCacheEnabled(options: CachingOptions, context: CacheCallContext): boolean {
    return isCachingActive(options) && !context.bypass?.shouldBypass;
  }

  private handleStoreFailure(operation: string, key: string, error: unknown, context: CacheCallContext): void {
    if (context.signal?.aborted) {
      throw error;
    }
    this.statsManager.incrementStoreFailures();
    logger.error(`Cache store ${operation} failed, continuing without cache`, {
      implementationType: this.implementationType,
      key,
      error: error instanceof Error ? error.message : String(error)
    });
  }

  protected abstract readEntry<T>(physicalKey: string): Promise<CacheLookup<T> | null>;

  /** Resolves false when the entry was dropped again before returning, e.g. by a size limit */
  protected abstract writeEntry<T>(physicalKey: string, value: T, entryOptions: CacheEntryOptions): Promise<boolean>;

  protected abstract deleteEntry(physicalKey: string): Promise<void>;

  protected abstract readTrackedKeys(listKey: string): Promise<string[]>;

  /** See {@link TrackedKeyStorage.writeTrackedKeys} for the expiry rule */
  protected abstract writeTrackedKeys(listKey: string, keys: string[], ttlSeconds: number): Promise<void>;

  protected abstract deleteTrackedKeys(listKey: string): Promise<void>;
}
