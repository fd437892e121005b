import LibLogger from '../logger';

const logger = LibLogger.get('CacheBypassContext');

export const CACHE_BYPASS_HEADER = 'x-cache-bypass';

/**
 * Per-request switch that makes every cache operation behave as if caching
 * were disabled. Create one per request and pass it with each call; never
 * share an instance between requests.
 */
export class CacheBypassContext {
  private reasonValue: string | null = null;

  public get shouldBypass(): boolean {
    return this.reasonValue !== null;
  }

  public get reason(): string | null {
    return this.reasonValue;
  }

  public enable(reason: string): void {
    this.reasonValue = reason.trim() || 'unspecified';
    logger.debug('Cache bypass enabled', { reason: this.reasonValue });
  }

  public reset(): void {
    this.reasonValue = null;
  }
}

export type RequestHeaders = Record<string, string | string[] | undefined>;

const headerValues = (headers: RequestHeaders, name: string): string[] => {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      if (typeof value === 'undefined') {
        return [];
      }
      return Array.isArray(value) ? value : [value];
    }
  }
  return [];
};

const isTruthyFlag = (value: string): boolean =>
  ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());

/**
 * Build the bypass context for an incoming request.
 *
 * The debug signal is either `X-Cache-Bypass: true` or `Cache-Control: no-cache`.
 * It only takes effect when the caller has already decided the request is
 * authorized to skip the cache; otherwise it is ignored.
 */
export const createBypassContextFromHeaders = (
  headers: RequestHeaders,
  authorized: boolean
): CacheBypassContext => {
  const context = new CacheBypassContext();

  const bypassHeader = headerValues(headers, CACHE_BYPASS_HEADER).some(isTruthyFlag);
  const noCache = headerValues(headers, 'cache-control')
    .flatMap(value => value.split(','))
    .some(directive => directive.trim().toLowerCase() === 'no-cache');

  if (!bypassHeader && !noCache) {
    return context;
  }

  if (!authorized) {
    logger.debug('Ignoring cache bypass signal from unauthorized request');
    return context;
  }

  context.enable(bypassHeader ? 'x-cache-bypass header' : 'cache-control: no-cache');
  return context;
};
