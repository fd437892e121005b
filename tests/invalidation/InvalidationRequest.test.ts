import { beforeEach, describe, expect, it, vi } from 'vitest';
import { handleInvalidationRequest, MISSING_TARGET_ERROR } from '../../src/invalidation/InvalidationRequest';
import { CacheInvalidationService } from '../../src/invalidation/CacheInvalidationService';
import { MemoryCacheStore } from '../../src/memory/MemoryCacheStore';
import { MemoryCacheKeyIndex } from '../../src/hashing/MemoryCacheKeyIndex';
import { Sha256CacheKeyHasher } from '../../src/hashing/CacheKeyHasher';
import { createStaticOptionsProvider } from '../../src/Options';

describe('handleInvalidationRequest', () => {
  let service: CacheInvalidationService;

  beforeEach(() => {
    const provider = createStaticOptionsProvider({ enabled: true });
    const hasher = new Sha256CacheKeyHasher();
    service = new CacheInvalidationService(
      new MemoryCacheStore(provider),
      new MemoryCacheKeyIndex(hasher, provider),
      hasher,
      provider
    );
    vi.spyOn(service, 'invalidateAll');
    vi.spyOn(service, 'invalidateKey');
    vi.spyOn(service, 'invalidatePrefix');
  });

  it('should prefer invalidateAll over key and prefix', async () => {
    const result = await handleInvalidationRequest(service, {
      invalidateAll: true,
      key: 'Employees:page=1',
      prefix: 'Employees'
    });

    expect(result).toEqual({ ok: true, action: 'all' });
    expect(service.invalidateAll).toHaveBeenCalledTimes(1);
    expect(service.invalidateKey).not.toHaveBeenCalled();
    expect(service.invalidatePrefix).not.toHaveBeenCalled();
  });

  it('should accept invalidateAll from outside the body', async () => {
    const result = await handleInvalidationRequest(service, null, { invalidateAll: true });
    expect(result).toEqual({ ok: true, action: 'all' });
    expect(service.invalidateAll).toHaveBeenCalledTimes(1);
  });

  it('should prefer key over prefix', async () => {
    const result = await handleInvalidationRequest(service, { key: 'Employees:page=1', prefix: 'Employees' });

    expect(result).toEqual({ ok: true, action: 'key' });
    expect(service.invalidateKey).toHaveBeenCalledWith('Employees:page=1', { signal: undefined });
    expect(service.invalidatePrefix).not.toHaveBeenCalled();
  });

  it('should fall back to prefix when the key is blank', async () => {
    const result = await handleInvalidationRequest(service, { key: '   ', prefix: 'Employees', invalidateAll: false });

    expect(result).toEqual({ ok: true, action: 'prefix' });
    expect(service.invalidatePrefix).toHaveBeenCalledWith('Employees', { signal: undefined });
    expect(service.invalidateKey).not.toHaveBeenCalled();
  });

  it('should reject a request without a usable field', async () => {
    expect(await handleInvalidationRequest(service, {})).toEqual({ ok: false, error: MISSING_TARGET_ERROR });
    expect(await handleInvalidationRequest(service, undefined)).toEqual({ ok: false, error: MISSING_TARGET_ERROR });
    expect(await handleInvalidationRequest(service, { key: '', prefix: ' ' })).toEqual({ ok: false, error: MISSING_TARGET_ERROR });

    expect(service.invalidateAll).not.toHaveBeenCalled();
    expect(service.invalidateKey).not.toHaveBeenCalled();
    expect(service.invalidatePrefix).not.toHaveBeenCalled();
  });

  it('should reject a malformed body', async () => {
    const result = await handleInvalidationRequest(service, { key: 42 });

    expect(result.ok).toBe(false);
    expect(result).toEqual({ ok: false, error: 'Invalid invalidation request: key: Expected string, received number' });
    expect(service.invalidateKey).not.toHaveBeenCalled();
  });

  it('should pass the cancellation signal through', async () => {
    const controller = new AbortController();
    await handleInvalidationRequest(service, { prefix: 'Employees' }, { signal: controller.signal });
    expect(service.invalidatePrefix).toHaveBeenCalledWith('Employees', { signal: controller.signal });
  });
});
