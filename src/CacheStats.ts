import LibLogger from './logger';

const logger = LibLogger.get('CacheStats');

/**
 * Cache statistics tracking interface
 */
export interface CacheStats {
  /** Total number of lookups */
  numRequests: number;
  /** Lookups that returned a value */
  numHits: number;
  /** Lookups that returned nothing (absent, expired, disabled, bypassed or undecodable) */
  numMisses: number;
  /** Entries written */
  numSets: number;
  /** Single-key removals */
  numRemovals: number;
  /** Prefix sweeps, including full sweeps */
  numPrefixSweeps: number;
  /** Operations that degraded because the backing store failed */
  numStoreFailures: number;
}

const emptyStats = (): CacheStats => ({
  numRequests: 0,
  numHits: 0,
  numMisses: 0,
  numSets: 0,
  numRemovals: 0,
  numPrefixSweeps: 0,
  numStoreFailures: 0
});

/**
 * Cache statistics manager that tracks various cache metrics
 */
export class CacheStatsManager {
  private stats: CacheStats = emptyStats();
  private lastLoggedRequests = 0;
  private readonly LOG_THRESHOLD = 100; // Log every 100 requests

  constructor(private readonly storeType: string) {}

  incrementRequests(): void {
    this.stats.numRequests++;
    this.maybeLogStats();
  }

  incrementHits(): void {
    this.stats.numHits++;
  }

  incrementMisses(): void {
    this.stats.numMisses++;
  }

  incrementSets(): void {
    this.stats.numSets++;
  }

  incrementRemovals(): void {
    this.stats.numRemovals++;
  }

  incrementPrefixSweeps(): void {
    this.stats.numPrefixSweeps++;
  }

  incrementStoreFailures(): void {
    this.stats.numStoreFailures++;
  }

  private maybeLogStats(): void {
    const requestsSinceLastLog = this.stats.numRequests - this.lastLoggedRequests;

    if (requestsSinceLastLog >= this.LOG_THRESHOLD) {
      const hitRate = this.stats.numRequests > 0
        ? ((this.stats.numHits / this.stats.numRequests) * 100).toFixed(2)
        : '0.00';

      logger.debug('Cache statistics update', {
        store: this.storeType,
        totalRequests: this.stats.numRequests,
        hits: this.stats.numHits,
        misses: this.stats.numMisses,
        hitRate: `${hitRate}%`,
        sets: this.stats.numSets,
        storeFailures: this.stats.numStoreFailures,
        requestsSinceLastLog
      });

      this.lastLoggedRequests = this.stats.numRequests;
    }
  }

  /**
   * Get a copy of the current statistics
   */
  getStats(): CacheStats {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = emptyStats();
    this.lastLoggedRequests = 0;
  }
}
