import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  CyclicDependencyError,
  DescriptorParseError,
  DuplicateServiceRegistrationError,
  EngineError,
  ErrorCodes,
  MissingRequiredServiceError,
  ModuleLifecycleError,
  Phase2TimeoutError,
  ShutdownHookTimeoutError,
  StartupDeadlineError,
  StorageBootstrapError,
  toError,
} from '../src/errors.js';

describe('EngineError', () => {
  it('formats as [code] message', () => {
    const err = new ConfigError('bad value');
    expect(err.toString()).toBe('[CONFIG_INVALID] bad value');
    expect(err).toBeInstanceOf(EngineError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ConfigError');
  });

  it('serializes only populated fields', () => {
    const err = new DescriptorParseError('core.cache', 'oops');
    const json = err.toJSON();
    expect(json['code']).toBe('DESCRIPTOR_PARSE_ERROR');
    expect(json['message']).toBe('Invalid descriptor for core.cache: oops');
    expect(json['module_id']).toBe('core.cache');
    expect(json['details']).toEqual({ reason: 'oops' });
    expect(typeof json['timestamp']).toBe('string');
    expect('cause' in json).toBe(false);
    expect('suggestion' in json).toBe(false);
  });

  it('keeps the cause', () => {
    const cause = new Error('EACCES');
    const err = new StorageBootstrapError('disk unavailable', 'main', { cause });
    expect(err.message).toBe('Storage bootstrap failed: disk unavailable');
    expect(err.details).toEqual({ databaseName: 'main' });
    expect(err.cause).toBe(cause);
    expect(err.toJSON()['cause']).toBe('Error: EACCES');
  });

  it('carries a suggestion when given', () => {
    const err = new ConfigError('missing root', {}, { suggestion: 'set modhost.modules.root' });
    expect(err.toJSON()['suggestion']).toBe('set modhost.modules.root');
  });
});

describe('error kinds', () => {
  it('names the cycle path', () => {
    const err = new CyclicDependencyError(['a', 'b', 'a']);
    expect(err.code).toBe(ErrorCodes.CYCLIC_DEPENDENCY);
    expect(err.message).toBe('Cyclic dependency detected: a -> b -> a');
    expect(err.cyclePath).toEqual(['a', 'b', 'a']);
  });

  it('names the missing service and the module', () => {
    const err = new MissingRequiredServiceError('standard.reports', 'svc.x');
    expect(err.code).toBe('MISSING_REQUIRED_SERVICE');
    expect(err.serviceName).toBe('svc.x');
    expect(err.moduleId).toBe('standard.reports');
  });

  it('reports timeouts with their limits', () => {
    expect(new Phase2TimeoutError('core.db', 250).message).toBe('Phase 2 of core.db timed out after 250ms');
    expect(new ShutdownHookTimeoutError('core.db', 'graceful', 100).details).toEqual({ phase: 'graceful', timeoutMs: 100 });
    expect(new StartupDeadlineError(100, []).message).toBe('Phase 2 did not finish within 100ms; pending: none');
    expect(new StartupDeadlineError(100, ['a', 'b']).details['pending']).toEqual(['a', 'b']);
  });

  it('identifies the existing provider on duplicates', () => {
    const err = new DuplicateServiceRegistrationError('svc.cache', 'core.cache', 'extensions.cache');
    expect(err.message).toBe("Service 'svc.cache' is already registered by core.cache");
    expect(err.moduleId).toBe('extensions.cache');
    expect(err.details['existingModuleId']).toBe('core.cache');
  });

  it('prefixes lifecycle failures with the stage', () => {
    const err = new ModuleLifecycleError('core.db', 'phase1', 'boom');
    expect(err.message).toBe('phase1 failed for core.db: boom');
    expect(err.details).toEqual({ stage: 'phase1' });
  });
});

describe('toError', () => {
  it('passes errors through and wraps other values', () => {
    const original = new Error('x');
    expect(toError(original)).toBe(original);
    expect(toError('plain').message).toBe('plain');
    expect(toError(42).message).toBe('42');
  });
});
