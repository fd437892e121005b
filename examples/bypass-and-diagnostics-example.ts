/**
 * Bypass and Diagnostics Example
 *
 * Shows the cache status headers written for hits and misses, lookups by
 * hashed key, and how an authorized request skips the cache.
 */

import {
  createBypassContextFromHeaders,
  createCachedQuery,
  createCachingInfrastructure,
  createStaticOptionsProvider,
  handleInvalidationRequest,
  HeaderCacheDiagnosticsPublisher,
  type HeaderSink
} from '../src';

class ResponseHeaders implements HeaderSink {
  public readonly values = new Map<string, string>();

  public setHeader(name: string, value: string): void {
    this.values.set(name, value);
  }
}

async function bypassAndDiagnosticsExample(): Promise<void> {
  console.log('🚀 Bypass and Diagnostics Example\n');

  const optionsProvider = createStaticOptionsProvider({
    enabled: true,
    keyPrefix: 'demo',
    diagnostics: { emitCacheStatusHeader: true, keyDisplayMode: 'Hash' }
  });
  const infrastructure = createCachingInfrastructure(optionsProvider);

  const getReport = createCachedQuery<string, { region: string; total: number }>({
    endpoint: 'Reports',
    buildKey: region => `Reports:region=${region}`,
    compute: async region => ({ region, total: region.length * 100 })
  }, { ...infrastructure, optionsProvider });

  const handle = async (region: string, requestHeaders: Record<string, string>, authorized: boolean) => {
    const response = new ResponseHeaders();
    await getReport(region, {
      bypass: createBypassContextFromHeaders(requestHeaders, authorized),
      diagnostics: new HeaderCacheDiagnosticsPublisher(response, optionsProvider, infrastructure.hasher)
    });
    return response.values;
  };

  console.log('First request:', Object.fromEntries(await handle('north', {}, false)));
  const second = await handle('north', {}, false);
  console.log('Second request:', Object.fromEntries(second));
  console.log('Unauthorized bypass:', Object.fromEntries(await handle('north', { 'x-cache-bypass': 'true' }, false)));
  console.log('Authorized bypass:', Object.fromEntries(await handle('north', { 'x-cache-bypass': 'true' }, true)));

  // The hashed key from the diagnostics header is enough to invalidate the entry
  const hashedKey = second.get('X-Cache-Key');
  const result = await handleInvalidationRequest(infrastructure.invalidation, { key: hashedKey });
  console.log('Invalidate by hashed key:', result);
  console.log('After invalidation:', Object.fromEntries(await handle('north', {}, false)));

  console.log('\n✅ Bypass and Diagnostics Example Complete!');
}

export { bypassAndDiagnosticsExample };

if (import.meta.url === `file://${process.argv[1]}`) {
  bypassAndDiagnosticsExample().catch(console.error);
}
