import { CachingOptions, effectiveDefaultDurationSeconds } from '../Options';

/**
 * Expiration settings for a single cache write
 */
export interface CacheEntryOptions {
  /** Absolute lifetime in milliseconds; 0 means "do not write" */
  readonly absoluteTtlMs: number;
  /** Sliding window in milliseconds, renewed on every hit but never past the absolute deadline */
  readonly slidingTtlMs?: number;
}

export const DO_NOT_CACHE: CacheEntryOptions = Object.freeze({ absoluteTtlMs: 0 });

export const entryOptionsFromSeconds = (absoluteTtlSeconds: number, slidingTtlSeconds?: number): CacheEntryOptions => {
  const entryOptions: CacheEntryOptions = typeof slidingTtlSeconds === 'number' && slidingTtlSeconds > 0
    ? { absoluteTtlMs: absoluteTtlSeconds * 1000, slidingTtlMs: slidingTtlSeconds * 1000 }
    : { absoluteTtlMs: absoluteTtlSeconds * 1000 };
  return Object.freeze(entryOptions);
};

/**
 * Lifetime of index structures written alongside an entry:
 * max(entry TTL, indexKeyTtlSeconds), with non-positive values replaced by
 * the default duration. An index therefore never expires before the entry
 * that last refreshed it.
 */
export const resolveIndexTtlSeconds = (options: CachingOptions, entryOptions: CacheEntryOptions): number => {
  const fallback = effectiveDefaultDurationSeconds(options);

  let entrySeconds = Math.ceil(entryOptions.absoluteTtlMs / 1000);
  if (entrySeconds <= 0) {
    entrySeconds = fallback;
  }

  let indexSeconds = options.providerSettings.distributed.indexKeyTtlSeconds;
  if (indexSeconds <= 0) {
    indexSeconds = fallback;
  }

  return Math.max(entrySeconds, indexSeconds);
};
