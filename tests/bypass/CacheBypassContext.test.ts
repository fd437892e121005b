import { describe, expect, it } from 'vitest';
import { CacheBypassContext, createBypassContextFromHeaders } from '../../src/bypass/CacheBypassContext';

describe('CacheBypassContext', () => {
  it('should start inactive', () => {
    const context = new CacheBypassContext();
    expect(context.shouldBypass).toBe(false);
    expect(context.reason).toBeNull();
  });

  it('should record the reason when enabled', () => {
    const context = new CacheBypassContext();
    context.enable('load test');
    expect(context.shouldBypass).toBe(true);
    expect(context.reason).toBe('load test');
  });

  it('should substitute a reason for blank input', () => {
    const context = new CacheBypassContext();
    context.enable('  ');
    expect(context.reason).toBe('unspecified');
  });

  it('should deactivate on reset', () => {
    const context = new CacheBypassContext();
    context.enable('debugging');
    context.reset();
    expect(context.shouldBypass).toBe(false);
    expect(context.reason).toBeNull();
  });

  it('should keep separate instances independent', () => {
    const first = new CacheBypassContext();
    const second = new CacheBypassContext();
    first.enable('debugging');
    expect(second.shouldBypass).toBe(false);
  });
});

describe('createBypassContextFromHeaders', () => {
  it('should bypass for an authorized X-Cache-Bypass header', () => {
    const context = createBypassContextFromHeaders({ 'X-Cache-Bypass': 'true' }, true);
    expect(context.shouldBypass).toBe(true);
    expect(context.reason).toBe('x-cache-bypass header');
  });

  it('should accept the usual truthy flag spellings', () => {
    for (const value of ['1', 'TRUE', ' yes ', 'on']) {
      expect(createBypassContextFromHeaders({ 'x-cache-bypass': value }, true).shouldBypass).toBe(true);
    }
    expect(createBypassContextFromHeaders({ 'x-cache-bypass': 'false' }, true).shouldBypass).toBe(false);
  });

  it('should bypass for an authorized Cache-Control: no-cache', () => {
    const context = createBypassContextFromHeaders({ 'cache-control': 'max-age=0, No-Cache' }, true);
    expect(context.shouldBypass).toBe(true);
    expect(context.reason).toBe('cache-control: no-cache');
  });

  it('should read multi-valued headers', () => {
    const context = createBypassContextFromHeaders({ 'cache-control': ['max-age=0', 'no-cache'] }, true);
    expect(context.shouldBypass).toBe(true);
  });

  it('should ignore the signal from unauthorized requests', () => {
    const context = createBypassContextFromHeaders({ 'x-cache-bypass': 'true', 'cache-control': 'no-cache' }, false);
    expect(context.shouldBypass).toBe(false);
  });

  it('should not bypass without a signal', () => {
    const context = createBypassContextFromHeaders({ accept: 'application/json', 'cache-control': undefined }, true);
    expect(context.shouldBypass).toBe(false);
  });
});
