import { CachingOptions } from './Options';
import {
  buildCatalogKey,
  buildIndexKey,
  buildPrefixKey,
  extractPrefix
} from './keys/CacheKeyFormatter';
import { CacheEntryOptions, DO_NOT_CACHE, resolveIndexTtlSeconds } from './ttl/CacheEntryOptions';
import LibLogger from './logger';

const logger = LibLogger.get('PrefixIndex');

/**
 * Storage primitives the prefix index needs from a backend: string lists
 * under a key, with an expiry, plus deletion of value entries.
 */
export interface TrackedKeyStorage {
  readTrackedKeys(listKey: string): Promise<string[]>;
  /**
   * Replace the list. Its expiry becomes the later of the current expiry and
   * `ttlSeconds` from now, so a rewrite never shortens an index's lifetime.
   */
  writeTrackedKeys(listKey: string, keys: string[], ttlSeconds: number): Promise<void>;
  deleteTrackedKeys(listKey: string): Promise<void>;
  deleteEntry(physicalKey: string): Promise<void>;
}

/**
 * Maintains, on top of a plain key/value substrate, the two structures that
 * make "remove by prefix" possible:
 *
 * - a prefix index per logical prefix (`<keyPrefix>:<prefix>:__index`) listing
 *   the physical keys written under it
 * - a prefix catalog per namespace (`<keyPrefix>:__prefix_catalog`) listing
 *   every prefix key that currently has a non-empty index
 *
 * Every update is a read-modify-write of one list. Concurrent writers may
 * lose or duplicate a reference; values stay independently TTL-bound, so a
 * drifting index can cost a wasted delete or leave an entry to expire on its
 * own, but never serves a stale value.
 */
export class PrefixIndex {
  constructor(private readonly storage: TrackedKeyStorage) {}

  async track(
    options: CachingOptions,
    logicalKey: string,
    physicalKey: string,
    entryOptions: CacheEntryOptions,
    signal?: AbortSignal
  ): Promise<void> {
    const logicalPrefix = extractPrefix(logicalKey);
    if (logicalPrefix.trim() === '') {
      logger.trace('track skipped, key has no prefix', { physicalKey });
      return;
    }

    const ttlSeconds = resolveIndexTtlSeconds(options, entryOptions);
    const prefixKey = buildPrefixKey(options, logicalPrefix);
    const indexKey = buildIndexKey(prefixKey);

    const keys = await this.storage.readTrackedKeys(indexKey);
    if (!keys.includes(physicalKey)) {
      keys.push(physicalKey);
    }
    // Rewritten even when already present so the index lives at least as long as this entry
    signal?.throwIfAborted();
    await this.storage.writeTrackedKeys(indexKey, keys, ttlSeconds);

    await this.addPrefixToCatalog(options, prefixKey, ttlSeconds, signal);
  }

  async untrack(
    options: CachingOptions,
    logicalKey: string,
    physicalKey: string,
    signal?: AbortSignal
  ): Promise<void> {
    const logicalPrefix = extractPrefix(logicalKey);
    if (logicalPrefix.trim() === '') {
      return;
    }

    const prefixKey = buildPrefixKey(options, logicalPrefix);
    const indexKey = buildIndexKey(prefixKey);
    const keys = await this.storage.readTrackedKeys(indexKey);
    const remaining = keys.filter(key => key !== physicalKey);
    if (remaining.length === keys.length) {
      return;
    }

    signal?.throwIfAborted();
    if (remaining.length === 0) {
      await this.storage.deleteTrackedKeys(indexKey);
      await this.removePrefixFromCatalog(options, prefixKey, signal);
    } else {
      await this.storage.writeTrackedKeys(indexKey, remaining, resolveIndexTtlSeconds(options, DO_NOT_CACHE));
    }
  }

  /**
   * Delete every entry tracked under one logical prefix, its index and its
   * catalog entry. Returns the number of tracked keys that were deleted.
   */
  async sweepPrefix(options: CachingOptions, prefix: string, signal?: AbortSignal): Promise<number> {
    return this.sweepPrefixKey(options, buildPrefixKey(options, prefix), signal);
  }

  /**
   * Sweep every cataloged prefix of the namespace, then drop the catalog.
   */
  async sweepAll(options: CachingOptions, signal?: AbortSignal): Promise<number> {
    const catalogKey = buildCatalogKey(options);
    const prefixKeys = await this.storage.readTrackedKeys(catalogKey);

    let removed = 0;
    for (const prefixKey of prefixKeys) {
      removed += await this.sweepPrefixKey(options, prefixKey, signal);
    }

    signal?.throwIfAborted();
    await this.storage.deleteTrackedKeys(catalogKey);
    logger.debug('sweepAll', { catalogKey, prefixes: prefixKeys.length, removed });
    return removed;
  }

  async catalog(options: CachingOptions): Promise<string[]> {
    return this.storage.readTrackedKeys(buildCatalogKey(options));
  }

  async trackedKeys(options: CachingOptions, prefix: string): Promise<string[]> {
    return this.storage.readTrackedKeys(buildIndexKey(buildPrefixKey(options, prefix)));
  }

  private async sweepPrefixKey(options: CachingOptions, prefixKey: string, signal?: AbortSignal): Promise<number> {
    const indexKey = buildIndexKey(prefixKey);
    const trackedKeys = await this.storage.readTrackedKeys(indexKey);

    for (const physicalKey of trackedKeys) {
      signal?.throwIfAborted();
      await this.storage.deleteEntry(physicalKey);
    }

    signal?.throwIfAborted();
    await this.storage.deleteTrackedKeys(indexKey);
    await this.removePrefixFromCatalog(options, prefixKey, signal);

    logger.debug('sweepPrefix', { prefixKey, removed: trackedKeys.length });
    return trackedKeys.length;
  }

  private async addPrefixToCatalog(
    options: CachingOptions,
    prefixKey: string,
    ttlSeconds: number,
    signal?: AbortSignal
  ): Promise<void> {
    const catalogKey = buildCatalogKey(options);
    const catalog = await this.storage.readTrackedKeys(catalogKey);
    if (!catalog.includes(prefixKey)) {
      catalog.push(prefixKey);
    }
    signal?.throwIfAborted();
    await this.storage.writeTrackedKeys(catalogKey, catalog, ttlSeconds);
  }

  private async removePrefixFromCatalog(options: CachingOptions, prefixKey: string, signal?: AbortSignal): Promise<void> {
    const catalogKey = buildCatalogKey(options);
    const catalog = await this.storage.readTrackedKeys(catalogKey);
    const remaining = catalog.filter(key => key !== prefixKey);
    if (remaining.length === catalog.length) {
      return;
    }

    signal?.throwIfAborted();
    if (remaining.length === 0) {
      await this.storage.deleteTrackedKeys(catalogKey);
    } else {
      await this.storage.writeTrackedKeys(catalogKey, remaining, resolveIndexTtlSeconds(options, DO_NOT_CACHE));
    }
  }
}
