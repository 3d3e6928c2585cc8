/**
 * Configuration accessor with dot-path key support, and the engine's own
 * validated settings.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from './errors.js';
import { MAX_TIMER_MS } from './utils/timeout.js';

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (current !== null && typeof current === 'object' && part in current) {
        current = Reflect.get(current, part);
      } else {
        return defaultValue;
      }
    }
    return current;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }
}

export const EngineSettingsSchema = Type.Object({
  modules: Type.Object({
    root: Type.String({ minLength: 1, default: './modules' }),
    max_depth: Type.Integer({ minimum: 1, default: 4 }),
  }, { default: {} }),
  storage: Type.Object({
    data_dir: Type.String({ minLength: 1, default: './data/database' }),
  }, { default: {} }),
  lifecycle: Type.Object({
    phase2_timeout_ms: Type.Integer({ minimum: 0, maximum: MAX_TIMER_MS, default: 30000 }),
    startup_deadline_ms: Type.Integer({ minimum: 0, maximum: MAX_TIMER_MS, default: 120000 }),
    concurrent: Type.Boolean({ default: true }),
  }, { default: {} }),
  shutdown: Type.Object({
    graceful_timeout_ms: Type.Integer({ minimum: 0, maximum: MAX_TIMER_MS, default: 30000 }),
    forced_timeout_ms: Type.Integer({ minimum: 0, maximum: MAX_TIMER_MS, default: 5000 }),
  }, { default: {} }),
  health: Type.Object({
    interval_ms: Type.Integer({ minimum: 1, maximum: MAX_TIMER_MS, default: 300000 }),
  }, { default: {} }),
  api: Type.Object({
    prefix: Type.String({ pattern: '^/', default: '/api/v1' }),
  }, { default: {} }),
});

export type EngineSettings = Static<typeof EngineSettingsSchema>;

/**
 * Read the `modhost` subtree of a host config, fill defaults and validate.
 * Zero timeouts disable the corresponding deadline.
 */
export function resolveEngineSettings(config?: Config | null): EngineSettings {
  const raw = config?.get('modhost') ?? {};
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError("'modhost' settings must be a mapping");
  }
  const candidate = Value.Default(EngineSettingsSchema, Value.Clone(raw));
  if (!Value.Check(EngineSettingsSchema, candidate)) {
    const errors = [...Value.Errors(EngineSettingsSchema, candidate)].map((e) => ({
      path: `modhost${e.path.replace(/\//g, '.')}`,
      message: e.message,
    }));
    throw new ConfigError(
      `Invalid modhost settings: ${errors.map((e) => `${e.path} ${e.message}`).join('; ')}`,
      { errors },
    );
  }
  return candidate;
}
