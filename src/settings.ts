/**
 * Per-module settings schemas registered during Phase 1.
 */

import type { TObject } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from './errors.js';

export interface SettingsEntry {
  readonly moduleId: string;
  readonly schema: TObject;
  readonly defaults: Readonly<Record<string, unknown>>;
  readonly version: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function validate(schema: TObject, value: unknown, moduleId: string, what: string): Record<string, unknown> {
  const candidate = Value.Default(schema, Value.Clone(value));
  if (!Value.Check(schema, candidate) || !isRecord(candidate)) {
    const errors = [...Value.Errors(schema, candidate)].map((e) => ({
      field: e.path || '/',
      message: e.message,
    }));
    throw new ConfigError(
      `Invalid ${what} for ${moduleId}: ${errors.map((e) => `${e.field} ${e.message}`).join('; ')}`,
      { moduleId, errors },
      { moduleId },
    );
  }
  return candidate;
}

/**
 * Writes are keyed by module id, so concurrent Phase 1 hooks never touch
 * each other's entries. Re-registering a module replaces its entry.
 */
export class SettingsRegistry {
  private _entries: Map<string, SettingsEntry> = new Map();

  register(moduleId: string, schema: TObject, defaults?: Record<string, unknown>, version?: string | null): SettingsEntry {
    const resolved = validate(schema, defaults ?? {}, moduleId, 'default settings');
    const entry: SettingsEntry = Object.freeze({
      moduleId,
      schema,
      defaults: Object.freeze(resolved),
      version: version ?? null,
    });
    this._entries.set(moduleId, entry);
    return entry;
  }

  get(moduleId: string): SettingsEntry | null {
    return this._entries.get(moduleId) ?? null;
  }

  has(moduleId: string): boolean {
    return this._entries.has(moduleId);
  }

  get moduleIds(): string[] {
    return [...this._entries.keys()].sort();
  }

  /**
   * Defaults merged with host overrides, validated against the module's
   * schema. Modules that registered no schema get the overrides back as-is.
   */
  resolve(moduleId: string, overrides?: Record<string, unknown> | null): Record<string, unknown> {
    const entry = this._entries.get(moduleId);
    if (entry === undefined) {
      return { ...(overrides ?? {}) };
    }
    return validate(entry.schema, { ...entry.defaults, ...(overrides ?? {}) }, moduleId, 'settings');
  }
}
