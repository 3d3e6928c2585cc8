/**
 * Contexts handed to module code during bootstrap.
 */

import type { TObject } from '@sinclair/typebox';
import type { Config, EngineSettings } from './config.js';
import type { ModuleDescriptor } from './descriptor.js';
import { InvalidInputError, MissingRequiredServiceError } from './errors.js';
import type { ContextLogger } from './observability/context-logger.js';
import type { ServiceDirectory } from './registry/registry.js';
import type { SettingsEntry, SettingsRegistry } from './settings.js';
import type { BaseHandle } from './storage/types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Host overrides for one module, read from `module_settings.<moduleId>`. */
export function moduleSettingsOverrides(config: Config, moduleId: string): Record<string, unknown> | null {
  const all = config.get('module_settings');
  if (!isRecord(all)) return null;
  const own: unknown = Reflect.get(all, moduleId);
  return isRecord(own) ? own : null;
}

/**
 * What a Phase 1 hook sees. No registry: Phase 1 runs before any service
 * exists.
 */
export class Phase1Context {
  readonly moduleId: string;
  readonly config: Config;
  readonly logger: ContextLogger;
  private readonly _settings: SettingsRegistry;

  constructor(moduleId: string, config: Config, logger: ContextLogger, settings: SettingsRegistry) {
    this.moduleId = moduleId;
    this.config = config;
    this.logger = logger;
    this._settings = settings;
    Object.freeze(this);
  }

  registerSettings(schema: TObject, defaults?: Record<string, unknown>, version?: string | null): SettingsEntry {
    return this._settings.register(this.moduleId, schema, defaults, version);
  }
}

export interface ModuleContextInit {
  descriptor: ModuleDescriptor;
  services: ServiceDirectory;
  config: Config;
  settings: EngineSettings;
  moduleSettings: SettingsRegistry;
  logger: ContextLogger;
  database: BaseHandle | null;
  runId: string;
}

/**
 * Passed to the service class constructor. Services obtained through it are
 * live only once Phase 2 has reached the module.
 */
export class ModuleContext {
  readonly moduleId: string;
  readonly descriptor: ModuleDescriptor;
  readonly services: ServiceDirectory;
  readonly config: Config;
  readonly settings: EngineSettings;
  readonly logger: ContextLogger;
  readonly database: BaseHandle | null;
  readonly runId: string;
  private readonly _moduleSettings: SettingsRegistry;

  constructor(init: ModuleContextInit) {
    this.moduleId = init.descriptor.moduleId;
    this.descriptor = init.descriptor;
    this.services = init.services;
    this.config = init.config;
    this.settings = init.settings;
    this.logger = init.logger;
    this.database = init.database;
    this.runId = init.runId;
    this._moduleSettings = init.moduleSettings;
    Object.freeze(this);
  }

  /** Settings registered in Phase 1, merged with host overrides. */
  moduleSettings(): Record<string, unknown> {
    return this._moduleSettings.resolve(this.moduleId, moduleSettingsOverrides(this.config, this.moduleId));
  }

  /**
   * Handle of a service this module declared in `requires`.
   */
  requireService(name: string): unknown {
    if (!this.descriptor.requires.includes(name)) {
      throw new InvalidInputError(`Module ${this.moduleId} does not declare a requirement on '${name}'`);
    }
    const found = this.services.lookup(name);
    if (!found.found) {
      throw new MissingRequiredServiceError(this.moduleId, name);
    }
    return found.record.handle;
  }
}
