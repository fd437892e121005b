/**
 * Resolves the TTLs for a cache write from the current configuration snapshot.
 *
 * Lookup order for the absolute TTL:
 * 1. the endpoint's own override (case-insensitive)
 * 2. the override registered under the empty name
 * 3. `defaultCacheDurationSeconds`, or 60 seconds when that is not positive
 */

import {
  CachingOptionsProvider,
  effectiveDefaultDurationSeconds,
  EndpointCacheOptions,
  findEndpointOptions,
  isCachingActive
} from '../Options';
import { CacheEntryOptions, DO_NOT_CACHE, entryOptionsFromSeconds } from './CacheEntryOptions';
import LibLogger from '../logger';

const logger = LibLogger.get('CacheEntryOptionsFactory');

export class CacheEntryOptionsFactory {
  constructor(private readonly optionsProvider: CachingOptionsProvider) {}

  create(endpointName: string): CacheEntryOptions {
    const options = this.optionsProvider.current();
    if (!options.enabled) {
      return DO_NOT_CACHE;
    }

    const endpoint: EndpointCacheOptions | undefined =
      findEndpointOptions(options, endpointName) ?? findEndpointOptions(options, '');

    let absoluteSeconds = endpoint?.absoluteTtlSeconds ?? options.defaultCacheDurationSeconds;
    if (absoluteSeconds <= 0) {
      absoluteSeconds = effectiveDefaultDurationSeconds(options);
    }

    const entryOptions = entryOptionsFromSeconds(absoluteSeconds, endpoint?.slidingTtlSeconds);

    logger.trace('create', {
      endpointName,
      absoluteTtlMs: entryOptions.absoluteTtlMs,
      slidingTtlMs: entryOptions.slidingTtlMs,
      active: isCachingActive(options)
    });

    return entryOptions;
  }
}
