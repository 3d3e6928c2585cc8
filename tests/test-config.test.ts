import { describe, it, expect } from 'vitest';
import { Config, resolveEngineSettings } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('Config', () => {
  it('reads dot paths', () => {
    const config = new Config({ modhost: { api: { prefix: '/api/v2' } }, name: 'app' });
    expect(config.get('modhost.api.prefix')).toBe('/api/v2');
    expect(config.get('name')).toBe('app');
  });

  it('returns the default for missing keys', () => {
    const config = new Config({ a: { b: 1 } });
    expect(config.get('a.c', 'fallback')).toBe('fallback');
    expect(config.get('a.b.c')).toBeUndefined();
    expect(config.has('a.b')).toBe(true);
    expect(config.has('x')).toBe(false);
  });

  it('works without data', () => {
    expect(new Config().get('anything', 3)).toBe(3);
  });
});

describe('resolveEngineSettings', () => {
  it('fills every default', () => {
    expect(resolveEngineSettings()).toEqual({
      modules: { root: './modules', max_depth: 4 },
      storage: { data_dir: './data/database' },
      lifecycle: { phase2_timeout_ms: 30000, startup_deadline_ms: 120000, concurrent: true },
      shutdown: { graceful_timeout_ms: 30000, forced_timeout_ms: 5000 },
      health: { interval_ms: 300000 },
      api: { prefix: '/api/v1' },
    });
  });

  it('merges partial overrides with defaults', () => {
    const settings = resolveEngineSettings(new Config({ modhost: { lifecycle: { phase2_timeout_ms: 500 } } }));
    expect(settings.lifecycle).toEqual({ phase2_timeout_ms: 500, startup_deadline_ms: 120000, concurrent: true });
    expect(settings.shutdown.forced_timeout_ms).toBe(5000);
  });

  it('does not mutate the host config', () => {
    const raw = { modhost: { api: {} } };
    resolveEngineSettings(new Config(raw));
    expect(raw.modhost.api).toEqual({});
  });

  it('names the offending key', () => {
    const config = new Config({ modhost: { modules: { max_depth: 0 } } });
    expect(() => resolveEngineSettings(config)).toThrow(ConfigError);
    expect(() => resolveEngineSettings(config)).toThrow(/modhost\.modules\.max_depth/);
  });

  it('rejects timeouts longer than a timer can wait', () => {
    const config = new Config({ modhost: { shutdown: { graceful_timeout_ms: 3_000_000_000 } } });
    expect(() => resolveEngineSettings(config)).toThrow(/modhost\.shutdown\.graceful_timeout_ms/);
  });

  it('rejects a prefix without a leading slash', () => {
    const config = new Config({ modhost: { api: { prefix: 'api' } } });
    expect(() => resolveEngineSettings(config)).toThrow(/modhost\.api\.prefix/);
  });

  it('rejects a non-mapping subtree', () => {
    expect(() => resolveEngineSettings(new Config({ modhost: 'yes' }))).toThrow("'modhost' settings must be a mapping");
  });
});
