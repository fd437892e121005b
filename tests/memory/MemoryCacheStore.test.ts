import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryCacheStore } from '../../src/memory/MemoryCacheStore';
import { CachingOptionsInput, createStaticOptionsProvider } from '../../src/Options';
import { DO_NOT_CACHE, entryOptionsFromSeconds } from '../../src/ttl/CacheEntryOptions';
import { CacheBypassContext } from '../../src/bypass/CacheBypassContext';
import { MemoryCacheKeyIndex } from '../../src/hashing/MemoryCacheKeyIndex';
import { Sha256CacheKeyHasher } from '../../src/hashing/CacheKeyHasher';

describe('MemoryCacheStore', () => {
  const sixtySeconds = entryOptionsFromSeconds(60);
  let store: MemoryCacheStore;

  const createStore = (input: CachingOptionsInput = {}) =>
    new MemoryCacheStore(createStaticOptionsProvider({ enabled: true, keyPrefix: 'test', ...input }));

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    store = createStore();
  });

  afterEach(() => {
    store.destroy();
  });

  it('should have correct implementationType', () => {
    expect(store.implementationType).toBe('memory/map');
  });

  describe('get and set', () => {
    it('should return what was stored', async () => {
      const payload = { items: [{ id: 1, lastName: 'Smith' }], total: 1 };
      await store.set('Employees:page=1', payload, sixtySeconds);

      expect(await store.get('Employees:page=1')).toEqual(payload);
    });

    it('should miss for unknown keys', async () => {
      expect(await store.get('Employees:page=1')).toBeNull();
    });

    it('should replace an existing entry completely', async () => {
      await store.set('Employees:page=1', { version: 1 }, entryOptionsFromSeconds(60, 10));
      await store.set('Employees:page=1', { version: 2 }, sixtySeconds);

      vi.advanceTimersByTime(30000);
      expect(await store.get('Employees:page=1')).toEqual({ version: 2 });
    });

    it('should not write when the absolute TTL is not positive', async () => {
      await store.set('Employees:page=1', 'value', DO_NOT_CACHE);
      expect(store.getCurrentSize().itemCount).toBe(0);
      expect(await store.getCatalog()).toEqual([]);
    });

    it('should treat disabled caching as always missing', async () => {
      const disabled = createStore({ enabled: false });
      await disabled.set('Employees:page=1', 'value', sixtySeconds);

      expect(await disabled.get('Employees:page=1')).toBeNull();
      expect(disabled.getCurrentSize().itemCount).toBe(0);
    });

    it('should let disableCache override enabled', async () => {
      const killed = createStore({ disableCache: true });
      await killed.set('Employees:page=1', 'value', sixtySeconds);

      expect(await killed.get('Employees:page=1')).toBeNull();
      expect(killed.getCurrentSize().itemCount).toBe(0);
    });

    it('should neither read nor write for a bypassed request', async () => {
      await store.set('Employees:page=1', 'cached', sixtySeconds);

      const bypass = new CacheBypassContext();
      bypass.enable('debugging');

      expect(await store.get('Employees:page=1', { bypass })).toBeNull();
      await store.set('Employees:page=1', 'fresh', sixtySeconds, { bypass });
      expect(await store.get('Employees:page=1')).toBe('cached');
    });

    it('should reject when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort(new Error('cancelled'));

      await expect(store.get('Employees:page=1', { signal: controller.signal })).rejects.toThrow('cancelled');
      await expect(store.set('Employees:page=1', 'value', sixtySeconds, { signal: controller.signal }))
        .rejects.toThrow('cancelled');
      expect(store.getCurrentSize().itemCount).toBe(0);
    });
  });

  describe('expiry', () => {
    it('should expire entries at their absolute deadline', async () => {
      await store.set('Employees:page=1', 'value', sixtySeconds);

      vi.advanceTimersByTime(59999);
      expect(await store.get('Employees:page=1')).toBe('value');

      vi.advanceTimersByTime(1);
      expect(await store.get('Employees:page=1')).toBeNull();
    });

    it('should report the remaining lifetime', async () => {
      await store.set('Employees:page=1', 'value', sixtySeconds);
      vi.advanceTimersByTime(10000);

      expect(await store.lookup('Employees:page=1')).toEqual({ value: 'value', remainingTtlMs: 50000 });
    });

    it('should renew sliding entries on every hit', async () => {
      await store.set('Employees:page=1', 'value', entryOptionsFromSeconds(60, 10));

      vi.advanceTimersByTime(9000);
      expect(await store.get('Employees:page=1')).toBe('value');
      vi.advanceTimersByTime(9000);
      expect(await store.get('Employees:page=1')).toBe('value');

      vi.advanceTimersByTime(10000);
      expect(await store.get('Employees:page=1')).toBeNull();
    });

    it('should never extend a sliding entry past its absolute deadline', async () => {
      await store.set('Employees:page=1', 'value', entryOptionsFromSeconds(60, 10));

      for (let elapsed = 5000; elapsed <= 55000; elapsed += 5000) {
        vi.advanceTimersByTime(5000);
        expect(await store.get('Employees:page=1')).toBe('value');
      }
      expect((await store.lookup('Employees:page=1'))?.remainingTtlMs).toBe(5000);

      vi.advanceTimersByTime(5000);
      expect(await store.get('Employees:page=1')).toBeNull();
    });

    it('should purge expired entries on demand', async () => {
      await store.set('Employees:page=1', 'short', entryOptionsFromSeconds(10));
      await store.set('Employees:page=2', 'long', sixtySeconds);

      vi.advanceTimersByTime(10000);

      expect(store.purgeExpired()).toBe(1);
      expect(store.getCurrentSize().itemCount).toBe(1);
    });

    it('should purge expired entries on the cleanup interval', async () => {
      const withCleanup = new MemoryCacheStore(
        createStaticOptionsProvider({ enabled: true, keyPrefix: 'test' }),
        { cleanupIntervalMs: 1000 }
      );
      await withCleanup.set('Employees:page=1', 'value', entryOptionsFromSeconds(1));

      vi.advanceTimersByTime(1000);

      expect(withCleanup.getCurrentSize().itemCount).toBe(0);
      withCleanup.destroy();
    });
  });

  describe('remove', () => {
    it('should delete the entry and drop it from its prefix index', async () => {
      await store.set('Employees:page=1', 'one', sixtySeconds);
      await store.set('Employees:page=2', 'two', sixtySeconds);

      await store.remove('Employees:page=1');

      expect(await store.get('Employees:page=1')).toBeNull();
      expect(await store.get('Employees:page=2')).toBe('two');
      expect(await store.getTrackedKeys('Employees')).toEqual(['test:Employees:page=2']);
    });

    it('should drop an emptied prefix from the catalog', async () => {
      await store.set('Employees:page=1', 'one', sixtySeconds);
      await store.remove('Employees:page=1');

      expect(await store.getTrackedKeys('Employees')).toEqual([]);
      expect(await store.getCatalog()).toEqual([]);
    });

    it('should be a no-op for absent keys', async () => {
      await expect(store.remove('Employees:page=1')).resolves.toBeUndefined();
    });
  });

  describe('removeByPrefix', () => {
    it('should invalidate one endpoint and leave the others', async () => {
      const payload = { items: ['smith'] };
      await store.set('Employees:page=1:size=10:last=smith', payload, sixtySeconds);
      await store.set('Employees:page=2:size=10', { items: [] }, sixtySeconds);
      await store.set('Positions:page=1', { items: ['engineer'] }, sixtySeconds);

      expect(await store.get('Employees:page=1:size=10:last=smith')).toEqual(payload);

      await store.removeByPrefix('Employees');

      expect(await store.get('Employees:page=1:size=10:last=smith')).toBeNull();
      expect(await store.get('Employees:page=2:size=10')).toBeNull();
      expect(await store.get('Positions:page=1')).toEqual({ items: ['engineer'] });
      expect(await store.getTrackedKeys('Employees')).toEqual([]);
      expect(await store.getCatalog()).toEqual(['test:Positions']);
    });

    it('should be idempotent', async () => {
      await store.set('Employees:page=1', 'one', sixtySeconds);

      await store.removeByPrefix('Employees');
      await store.removeByPrefix('Employees');

      expect(await store.get('Employees:page=1')).toBeNull();
      expect(store.getStats().numPrefixSweeps).toBe(2);
    });

    it('should sweep every prefix for a blank prefix', async () => {
      await store.set('Employees:page=1', 'one', sixtySeconds);
      await store.set('Positions:page=1', 'two', sixtySeconds);
      await store.set('Dashboard:Metrics', 'three', sixtySeconds);

      await store.removeByPrefix('  ');

      expect(await store.get('Employees:page=1')).toBeNull();
      expect(await store.get('Positions:page=1')).toBeNull();
      expect(await store.get('Dashboard:Metrics')).toBeNull();
      expect(await store.getCatalog()).toEqual([]);
      expect(store.getCurrentSize().itemCount).toBe(0);
    });

    it('should keep indexes alive for at least the entry TTL', async () => {
      const shortIndex = createStore({ providerSettings: { distributed: { indexKeyTtlSeconds: 10 } } });
      await shortIndex.set('Employees:page=1', 'one', entryOptionsFromSeconds(120));
      await shortIndex.set('Employees:page=2', 'two', entryOptionsFromSeconds(30));

      vi.advanceTimersByTime(60000);
      await shortIndex.removeByPrefix('Employees');

      expect(await shortIndex.get('Employees:page=1')).toBeNull();
    });
  });

  describe('concurrency', () => {
    it('should keep one of two concurrent writes to the same key', async () => {
      const first = { writer: 'first', rows: [1, 2, 3] };
      const second = { writer: 'second', rows: [4, 5, 6] };

      await Promise.all([
        store.set('Employees:page=1', first, sixtySeconds),
        store.set('Employees:page=1', second, sixtySeconds)
      ]);

      expect([first, second]).toContainEqual(await store.get('Employees:page=1'));
      expect(await store.getTrackedKeys('Employees')).toEqual(['test:Employees:page=1']);
    });
  });

  describe('size limit', () => {
    const halfMegabyteString = 'x'.repeat(300000);

    it('should evict the least recently accessed entries', async () => {
      const bounded = createStore({ providerSettings: { memory: { sizeLimitMB: 1 } } });

      await bounded.set('Blobs:id=a', halfMegabyteString, sixtySeconds);
      vi.advanceTimersByTime(1000);
      await bounded.set('Blobs:id=b', halfMegabyteString, sixtySeconds);

      expect(await bounded.get('Blobs:id=a')).toBeNull();
      expect(await bounded.get('Blobs:id=b')).toBe(halfMegabyteString);
      expect(bounded.getCurrentSize()).toEqual({ itemCount: 1, sizeBytes: 600000 });
      expect(await bounded.getTrackedKeys('Blobs')).toEqual(['test:Blobs:id=b']);
    });

    it('should keep recently read entries over older writes', async () => {
      const bounded = createStore({ providerSettings: { memory: { sizeLimitMB: 1 } } });
      const blob = 'y'.repeat(200000);

      await bounded.set('Blobs:id=a', blob, sixtySeconds);
      vi.advanceTimersByTime(1000);
      await bounded.set('Blobs:id=b', blob, sixtySeconds);
      vi.advanceTimersByTime(1000);
      expect(await bounded.get('Blobs:id=a')).toBe(blob);
      vi.advanceTimersByTime(1000);
      await bounded.set('Blobs:id=c', blob, sixtySeconds);

      expect(await bounded.get('Blobs:id=b')).toBeNull();
      expect(await bounded.get('Blobs:id=a')).toBe(blob);
      expect(await bounded.get('Blobs:id=c')).toBe(blob);
    });

    it('should not keep an entry larger than the limit', async () => {
      const bounded = createStore({ providerSettings: { memory: { sizeLimitMB: 1 } } });

      await bounded.set('Blobs:id=huge', 'x'.repeat(600000), sixtySeconds);

      expect(await bounded.get('Blobs:id=huge')).toBeNull();
      expect(bounded.getCurrentSize().itemCount).toBe(0);
    });

    it('should not index an entry evicted on write', async () => {
      const bounded = createStore({ providerSettings: { memory: { sizeLimitMB: 1 } } });

      await bounded.set('Blobs:id=huge', 'x'.repeat(600000), sixtySeconds);

      expect(await bounded.getCatalog()).toEqual([]);
      expect(await bounded.getTrackedKeys('Blobs')).toEqual([]);
      bounded.destroy();
    });
  });

  describe('hash index', () => {
    const hasher = new Sha256CacheKeyHasher();

    const createHashedStore = (keyDisplayMode: string) => {
      const optionsProvider = createStaticOptionsProvider({
        enabled: true,
        keyPrefix: 'test',
        diagnostics: { keyDisplayMode }
      });
      const keyIndex = new MemoryCacheKeyIndex(hasher, optionsProvider);
      return { keyIndex, hashed: new MemoryCacheStore(optionsProvider, { keyIndex }) };
    };

    it('should record the hash of every stored key in Hash mode', async () => {
      const { keyIndex, hashed } = createHashedStore('Hash');

      await hashed.set('Employees:page=1:last=smith', 'v', sixtySeconds);

      expect(await keyIndex.tryResolve(hasher.hash('Employees:page=1:last=smith'))).toBe('Employees:page=1:last=smith');
      hashed.destroy();
    });

    it('should not record hashes in Raw mode', async () => {
      const { keyIndex, hashed } = createHashedStore('Raw');

      await hashed.set('Employees:page=1', 'v', sixtySeconds);

      expect(keyIndex.size).toBe(0);
      hashed.destroy();
    });

    it('should not record hashes for writes that are skipped', async () => {
      const { keyIndex, hashed } = createHashedStore('Hash');
      const bypass = new CacheBypassContext();
      bypass.enable('debugging');

      await hashed.set('Employees:page=1', 'v', sixtySeconds, { bypass });
      await hashed.set('Employees:page=2', 'v', DO_NOT_CACHE);

      expect(keyIndex.size).toBe(0);
      hashed.destroy();
    });
  });

  describe('stats', () => {
    it('should count requests, hits, misses and writes', async () => {
      await store.set('Employees:page=1', 'one', sixtySeconds);
      await store.get('Employees:page=1');
      await store.get('Employees:page=2');
      await store.remove('Employees:page=1');

      expect(store.getStats()).toEqual({
        numRequests: 2,
        numHits: 1,
        numMisses: 1,
        numSets: 1,
        numRemovals: 1,
        numPrefixSweeps: 0,
        numStoreFailures: 0
      });
    });
  });
});
