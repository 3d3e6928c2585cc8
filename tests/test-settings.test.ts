import { describe, it, expect } from 'vitest';
import { Type } from '@sinclair/typebox';
import { ConfigError } from '../src/errors.js';
import { SettingsRegistry } from '../src/settings.js';

const CacheSettings = Type.Object({
  ttl: Type.Integer({ minimum: 0, default: 60 }),
  mode: Type.Union([Type.Literal('lru'), Type.Literal('fifo')], { default: 'lru' }),
});

describe('SettingsRegistry', () => {
  it('fills schema defaults on registration', () => {
    const registry = new SettingsRegistry();
    const entry = registry.register('core.cache', CacheSettings, { ttl: 30 }, '2');
    expect(entry.defaults).toEqual({ ttl: 30, mode: 'lru' });
    expect(entry.version).toBe('2');
    expect(Object.isFrozen(entry.defaults)).toBe(true);
    expect(registry.moduleIds).toEqual(['core.cache']);
  });

  it('rejects defaults that violate the schema', () => {
    const registry = new SettingsRegistry();
    expect(() => registry.register('core.cache', CacheSettings, { ttl: -1 })).toThrow(ConfigError);
    expect(registry.has('core.cache')).toBe(false);
  });

  it('merges overrides over defaults and validates the result', () => {
    const registry = new SettingsRegistry();
    registry.register('core.cache', CacheSettings);
    expect(registry.resolve('core.cache', { mode: 'fifo' })).toEqual({ ttl: 60, mode: 'fifo' });
    expect(() => registry.resolve('core.cache', { mode: 'random' })).toThrow(/^Invalid settings for core\.cache: \/mode /);
  });

  it('returns overrides as-is for modules without a schema', () => {
    const registry = new SettingsRegistry();
    expect(registry.resolve('core.none', { any: 1 })).toEqual({ any: 1 });
    expect(registry.resolve('core.none')).toEqual({});
    expect(registry.get('core.none')).toBeNull();
  });

  it('replaces an entry registered twice', () => {
    const registry = new SettingsRegistry();
    registry.register('core.cache', CacheSettings, { ttl: 1 });
    registry.register('core.cache', CacheSettings, { ttl: 2 });
    expect(registry.get('core.cache')?.defaults).toEqual({ ttl: 2, mode: 'lru' });
  });
});
