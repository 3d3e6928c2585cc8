import { describe, it, expect } from 'vitest';
import { Type } from '@sinclair/typebox';
import { Config } from '../src/config.js';
import { ModuleContext, moduleSettingsOverrides, Phase1Context } from '../src/context.js';
import { defineModule } from '../src/descriptor.js';
import { InvalidInputError, MissingRequiredServiceError } from '../src/errors.js';
import { silentLogger } from '../src/observability/context-logger.js';
import { ServiceRegistry } from '../src/registry/registry.js';
import { SettingsRegistry } from '../src/settings.js';
import { settingsWith } from './helpers.js';

class Service {}

function contextFor(requires: string[], registry: ServiceRegistry, config = new Config({})): ModuleContext {
  const { descriptor } = defineModule({ id: 'core.user', serviceClass: Service, requires });
  return new ModuleContext({
    descriptor,
    services: registry.directory(),
    config,
    settings: settingsWith(),
    moduleSettings: new SettingsRegistry(),
    logger: silentLogger(),
    database: null,
    runId: 'run-1',
  });
}

describe('moduleSettingsOverrides', () => {
  it('reads the module entry under module_settings', () => {
    const config = new Config({ module_settings: { 'core.cache': { ttl: 5 }, 'core.bad': 3 } });
    expect(moduleSettingsOverrides(config, 'core.cache')).toEqual({ ttl: 5 });
    expect(moduleSettingsOverrides(config, 'core.bad')).toBeNull();
    expect(moduleSettingsOverrides(new Config({}), 'core.cache')).toBeNull();
  });
});

describe('Phase1Context', () => {
  it('registers settings under its own module id', () => {
    const settings = new SettingsRegistry();
    const ctx = new Phase1Context('core.cache', new Config({}), silentLogger(), settings);
    ctx.registerSettings(Type.Object({ ttl: Type.Integer({ default: 10 }) }));
    expect(settings.get('core.cache')?.defaults).toEqual({ ttl: 10 });
    expect(Object.isFrozen(ctx)).toBe(true);
  });
});

describe('ModuleContext', () => {
  it('returns the handle of a required service', () => {
    const registry = new ServiceRegistry();
    registry.open();
    const handle = { query: () => [] };
    registry.register('db.framework', handle, { moduleId: 'core.db' });

    const ctx = contextFor(['db.framework'], registry);
    expect(ctx.requireService('db.framework')).toBe(handle);
    expect(ctx.moduleId).toBe('core.user');
    expect(ctx.runId).toBe('run-1');
  });

  it('refuses services the module did not declare', () => {
    const registry = new ServiceRegistry();
    registry.open();
    registry.register('db.framework', {}, { moduleId: 'core.db' });
    const ctx = contextFor([], registry);
    expect(() => ctx.requireService('db.framework')).toThrow(InvalidInputError);
  });

  it('reports a declared service that is not registered', () => {
    const ctx = contextFor(['db.framework'], new ServiceRegistry());
    expect(() => ctx.requireService('db.framework')).toThrow(MissingRequiredServiceError);
    expect(() => ctx.requireService('db.framework')).toThrow(
      "Module core.user requires service 'db.framework' which is not registered",
    );
  });

  it('resolves module settings with host overrides', () => {
    const config = new Config({ module_settings: { 'core.user': { greeting: 'hi' } } });
    const ctx = contextFor([], new ServiceRegistry(), config);
    expect(ctx.moduleSettings()).toEqual({ greeting: 'hi' });
  });
});
