import { CachingOptionsProvider, isCachingActive } from './Options';
import { CacheCallContext, CacheStore } from './CacheStore';
import { CacheEntryOptionsFactory } from './ttl/CacheEntryOptionsFactory';
import { CacheDiagnosticsPublisher, noopDiagnosticsPublisher } from './diagnostics/CacheDiagnosticsPublisher';
import LibLogger from './logger';

const logger = LibLogger.get('CachedQuery');

export interface CachedQueryDefinition<TRequest, TResult> {
  /** Endpoint name used to resolve TTLs from `perEndpoint` */
  endpoint: string;
  buildKey: (request: TRequest) => string;
  compute: (request: TRequest, signal?: AbortSignal) => Promise<TResult>;
  /** Results rejected here are returned but never cached */
  shouldCache?: (result: TResult) => boolean;
}

export interface CachedQueryDependencies {
  store: CacheStore;
  entryOptionsFactory: CacheEntryOptionsFactory;
  optionsProvider: CachingOptionsProvider;
}

export interface CachedQueryContext extends CacheCallContext {
  diagnostics?: CacheDiagnosticsPublisher;
}

export type CachedQuery<TRequest, TResult> =
  (request: TRequest, context?: CachedQueryContext) => Promise<TResult>;

/**
 * Wrap a query handler with get-or-compute caching.
 *
 * A hit returns the cached value; a miss runs `compute` and stores the result
 * under the endpoint's TTL. The reported miss carries that TTL only when the
 * result is actually stored. Concurrent misses for the same key each compute;
 * the last write wins.
 */
export const createCachedQuery = <TRequest, TResult>(
  definition: CachedQueryDefinition<TRequest, TResult>,
  dependencies: CachedQueryDependencies
): CachedQuery<TRequest, TResult> => {
  const { store, entryOptionsFactory, optionsProvider } = dependencies;

  return async (request: TRequest, context: CachedQueryContext = {}): Promise<TResult> => {
    const diagnostics = context.diagnostics ?? noopDiagnosticsPublisher;
    const key = definition.buildKey(request);

    const hit = await store.lookup<TResult>(key, context);
    if (hit) {
      logger.trace('hit', { endpoint: definition.endpoint, key });
      diagnostics.reportHit(key, hit.remainingTtlMs);
      return hit.value;
    }

    const result = await definition.compute(request, context.signal);
    if (definition.shouldCache && !definition.shouldCache(result)) {
      logger.trace('result not cacheable', { endpoint: definition.endpoint, key });
      return result;
    }

    const entryOptions = entryOptionsFactory.create(definition.endpoint);
    const stored = entryOptions.absoluteTtlMs > 0 &&
      isCachingActive(optionsProvider.current()) &&
      !context.bypass?.shouldBypass;
    diagnostics.reportMiss(key, stored ? entryOptions.absoluteTtlMs : undefined);
    await store.set(key, result, entryOptions, context);

    return result;
  };
};
