import { CachingOptionsProvider } from '../Options';
import { CacheLookup, CacheStore } from '../CacheStore';
import { CacheEntryOptions } from '../ttl/CacheEntryOptions';
import { CacheKeyIndex } from '../hashing/CacheKeyIndex';
import { estimateValueSize, formatBytes } from '../utils/CacheSize';
import LibLogger from '../logger';

const logger = LibLogger.get('MemoryCacheStore');

const BYTES_PER_MB = 1024 * 1024;

interface MemoryEntry {
  value: unknown;
  /** Hard deadline from the absolute TTL */
  absoluteExpiresAt: number;
  /** Current deadline; earlier than the hard one while a sliding window applies */
  expiresAt: number;
  slidingTtlMs?: number;
  lastAccessedAt: number;
  estimatedSize: number;
}

interface TrackedList {
  keys: string[];
  expiresAt: number;
}

export interface MemoryCacheStoreConfig {
  /** Interval for sweeping expired entries in milliseconds; expired entries are otherwise dropped on access */
  cleanupIntervalMs?: number;
  /** Records hashes of stored keys when keys are displayed hashed */
  keyIndex?: CacheKeyIndex;
}

/**
 * In-process backend. Values are kept by reference in a Map and expire on
 * access; prefix indexes and the catalog live in a second Map with their own
 * expiry. When `providerSettings.memory.sizeLimitMB` is set, the least
 * recently accessed entries are evicted once the estimated size of stored
 * values exceeds the limit.
 */
export class MemoryCacheStore extends CacheStore {

  private entries: Map<string, MemoryEntry> = new Map();
  private trackedLists: Map<string, TrackedList> = new Map();
  private currentSizeBytes = 0;
  private cleanupTimer: NodeJS.Timeout | null = null;

  public constructor(optionsProvider: CachingOptionsProvider, config: MemoryCacheStoreConfig = {}) {
    super(optionsProvider, 'memory/map', config.keyIndex);

    if (config.cleanupIntervalMs && config.cleanupIntervalMs > 0) {
      this.cleanupTimer = setInterval(() => {
        this.purgeExpired();
      }, config.cleanupIntervalMs);

      // Don't keep the process alive just for cleanup
      this.cleanupTimer.unref();
    }
  }

  protected async readEntry<T>(physicalKey: string): Promise<CacheLookup<T> | null> {
    const entry = this.entries.get(physicalKey);
    if (!entry) {
      return null;
    }

    const now = Date.now();
    if (now >= entry.expiresAt) {
      logger.trace('readEntry expired', { physicalKey });
      this.dropEntry(physicalKey, entry);
      return null;
    }

    entry.lastAccessedAt = now;
    if (entry.slidingTtlMs) {
      entry.expiresAt = Math.min(now + entry.slidingTtlMs, entry.absoluteExpiresAt);
    }

    return {
      // Entries are written by set<T>; the caller names the type it reads back
      value: entry.value as T,
      remainingTtlMs: entry.expiresAt - now
    };
  }

  protected async writeEntry<T>(physicalKey: string, value: T, entryOptions: CacheEntryOptions): Promise<boolean> {
    const now = Date.now();
    const absoluteExpiresAt = now + entryOptions.absoluteTtlMs;
    const slidingTtlMs = entryOptions.slidingTtlMs && entryOptions.slidingTtlMs > 0
      ? entryOptions.slidingTtlMs
      : undefined;

    const existing = this.entries.get(physicalKey);
    if (existing) {
      this.dropEntry(physicalKey, existing);
    }

    const entry: MemoryEntry = {
      value,
      absoluteExpiresAt,
      expiresAt: slidingTtlMs ? Math.min(now + slidingTtlMs, absoluteExpiresAt) : absoluteExpiresAt,
      slidingTtlMs,
      lastAccessedAt: now,
      estimatedSize: estimateValueSize(value)
    };

    this.entries.set(physicalKey, entry);
    this.currentSizeBytes += entry.estimatedSize;

    logger.trace('writeEntry', {
      physicalKey,
      size: entry.estimatedSize,
      currentSize: this.currentSizeBytes,
      currentCount: this.entries.size
    });

    await this.enforceSizeLimit();
    return this.entries.get(physicalKey) === entry;
  }

  protected async deleteEntry(physicalKey: string): Promise<void> {
    const entry = this.entries.get(physicalKey);
    if (entry) {
      this.dropEntry(physicalKey, entry);
    }
  }

  protected async readTrackedKeys(listKey: string): Promise<string[]> {
    const list = this.trackedLists.get(listKey);
    if (!list) {
      return [];
    }
    if (Date.now() >= list.expiresAt) {
      this.trackedLists.delete(listKey);
      return [];
    }
    return [...list.keys];
  }

  protected async writeTrackedKeys(listKey: string, keys: string[], ttlSeconds: number): Promise<void> {
    const requestedExpiry = Date.now() + ttlSeconds * 1000;
    const current = this.trackedLists.get(listKey);
    this.trackedLists.set(listKey, {
      keys: [...keys],
      expiresAt: current ? Math.max(current.expiresAt, requestedExpiry) : requestedExpiry
    });
  }

  protected async deleteTrackedKeys(listKey: string): Promise<void> {
    this.trackedLists.delete(listKey);
  }

  /**
   * Drop every expired value and tracked list. Returns the number of values removed.
   */
  public purgeExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [physicalKey, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.dropEntry(physicalKey, entry);
        removed++;
      }
    }

    for (const [listKey, list] of this.trackedLists) {
      if (now >= list.expiresAt) {
        this.trackedLists.delete(listKey);
      }
    }

    if (removed > 0) {
      logger.debug('purgeExpired', { removed, remaining: this.entries.size });
    }
    return removed;
  }

  public getCurrentSize(): { itemCount: number; sizeBytes: number } {
    return {
      itemCount: this.entries.size,
      sizeBytes: this.currentSizeBytes
    };
  }

  public destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.entries.clear();
    this.trackedLists.clear();
    this.currentSizeBytes = 0;
  }

  private dropEntry(physicalKey: string, entry: MemoryEntry): void {
    this.entries.delete(physicalKey);
    this.currentSizeBytes -= entry.estimatedSize;
  }

  private async enforceSizeLimit(): Promise<void> {
    const sizeLimitMB = this.optionsProvider.current().providerSettings.memory.sizeLimitMB;
    if (!sizeLimitMB || sizeLimitMB <= 0) {
      return;
    }

    const maxSizeBytes = sizeLimitMB * BYTES_PER_MB;
    if (this.currentSizeBytes <= maxSizeBytes) {
      return;
    }

    for (const [physicalKey, entry] of this.entries) {
      if (entry.estimatedSize > maxSizeBytes) {
        logger.warning('Entry is larger than the configured size limit and will be evicted', {
          physicalKey,
          size: formatBytes(entry.estimatedSize, true),
          limit: formatBytes(maxSizeBytes, true)
        });
      }
    }

    this.purgeExpired();

    // Sort by lastAccessedAt ascending (oldest first)
    const candidates = Array.from(this.entries.entries())
      .sort(([, a], [, b]) => a.lastAccessedAt - b.lastAccessedAt);

    let evicted = 0;
    for (const [physicalKey, entry] of candidates) {
      if (this.currentSizeBytes <= maxSizeBytes) {
        break;
      }
      this.dropEntry(physicalKey, entry);
      await this.untrackPhysicalKey(physicalKey);
      evicted++;
    }

    if (evicted > 0) {
      logger.debug('Evicted entries to stay within size limit', {
        evicted,
        currentSize: this.currentSizeBytes,
        maxSizeBytes
      });
    }
  }

  private async untrackPhysicalKey(physicalKey: string): Promise<void> {
    const options = this.optionsProvider.current();
    const namespace = `${options.keyPrefix}:`;
    if (!physicalKey.startsWith(namespace)) {
      return;
    }
    await this.prefixIndex.untrack(options, physicalKey.slice(namespace.length), physicalKey);
  }
}
