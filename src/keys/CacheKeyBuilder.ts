/**
 * Builds logical keys of the form `Endpoint:alias=value:alias=value`.
 *
 * The endpoint name becomes the key's prefix, so every key produced for one
 * endpoint can be swept with a single prefix invalidation. Filter values are
 * trimmed and lower-cased; blank filters are left out so that equivalent
 * requests share a key.
 */
export class CacheKeyBuilder {
  private readonly segments: string[];

  public constructor(endpoint: string) {
    this.segments = [endpoint];
  }

  /**
   * Append a segment that is always present, such as paging
   */
  public with(alias: string, value: string | number | boolean): this {
    this.segments.push(`${alias}=${String(value)}`);
    return this;
  }

  /**
   * Append an optional filter; null, undefined and blank values are skipped
   */
  public filter(alias: string, value: string | number | boolean | null | undefined): this {
    if (value === null || typeof value === 'undefined') {
      return this;
    }
    const normalized = String(value).trim().toLowerCase();
    if (normalized === '') {
      return this;
    }
    this.segments.push(`${alias}=${normalized}`);
    return this;
  }

  public build(): string {
    return this.segments.join(':');
  }
}

export const cacheKey = (endpoint: string): CacheKeyBuilder => new CacheKeyBuilder(endpoint);
