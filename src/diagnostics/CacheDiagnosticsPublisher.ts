import { CachingOptions } from '../Options';
import { CacheKeyHasher } from '../hashing/CacheKeyHasher';

export type CacheStatus = 'HIT' | 'MISS';

/**
 * Reports the cache outcome of the current request to whatever surfaces it.
 * Durations are in milliseconds: the remaining TTL on a hit, the TTL just
 * written on a miss.
 */
export interface CacheDiagnosticsPublisher {
  reportHit(logicalKey: string, durationMs?: number): void;
  reportMiss(logicalKey: string, durationMs?: number): void;
}

export const noopDiagnosticsPublisher: CacheDiagnosticsPublisher = {
  reportHit: () => undefined,
  reportMiss: () => undefined
};

/**
 * The key as it should appear in diagnostics output for the configured display mode
 */
export const displayKey = (options: CachingOptions, hasher: CacheKeyHasher, logicalKey: string): string =>
  options.diagnostics.keyDisplayMode === 'Hash' ? hasher.hash(logicalKey) : logicalKey;
