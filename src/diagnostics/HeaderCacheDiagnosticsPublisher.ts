import { CachingOptionsProvider } from '../Options';
import { CacheKeyHasher } from '../hashing/CacheKeyHasher';
import { CacheDiagnosticsPublisher, CacheStatus, displayKey } from './CacheDiagnosticsPublisher';

export const CACHE_KEY_HEADER = 'X-Cache-Key';
export const CACHE_DURATION_HEADER = 'X-Cache-Duration-Ms';

/**
 * Anything response headers can be written to; a Node `ServerResponse`
 * satisfies it.
 */
export interface HeaderSink {
  setHeader(name: string, value: string): unknown;
}

/**
 * Writes the cache outcome as response headers, when
 * `diagnostics.emitCacheStatusHeader` is on. Create one per response.
 */
export class HeaderCacheDiagnosticsPublisher implements CacheDiagnosticsPublisher {
  public constructor(
    private readonly sink: HeaderSink,
    private readonly optionsProvider: CachingOptionsProvider,
    private readonly hasher: CacheKeyHasher
  ) {}

  public reportHit(logicalKey: string, durationMs?: number): void {
    this.write('HIT', logicalKey, durationMs);
  }

  public reportMiss(logicalKey: string, durationMs?: number): void {
    this.write('MISS', logicalKey, durationMs);
  }

  private write(status: CacheStatus, logicalKey: string, durationMs?: number): void {
    const options = this.optionsProvider.current();
    if (!options.diagnostics.emitCacheStatusHeader) {
      return;
    }

    this.sink.setHeader(options.diagnostics.headerName, status);

    const shownKey = displayKey(options, this.hasher, logicalKey);
    if (shownKey.trim() !== '') {
      this.sink.setHeader(CACHE_KEY_HEADER, shownKey);
    }

    if (typeof durationMs === 'number' && durationMs > 0) {
      this.sink.setHeader(CACHE_DURATION_HEADER, Math.floor(durationMs).toString());
    }
  }
}
