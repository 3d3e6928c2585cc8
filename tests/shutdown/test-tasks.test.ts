import { describe, it, expect } from 'vitest';
import type { ModuleDefinition } from '../../src/descriptor.js';
import { buildDependencyPlan } from '../../src/registry/dependencies.js';
import { buildShutdownTasks } from '../../src/shutdown/tasks.js';
import { createBufferLogger, recordingModule } from '../helpers.js';

const DEFAULTS = { gracefulTimeoutMs: 1000, forcedTimeoutMs: 100 };

function levelsOf(definitions: ModuleDefinition[], logger = createBufferLogger().logger): string[][] {
  const descriptors = definitions.map((d) => d.descriptor);
  return buildShutdownTasks(descriptors, buildDependencyPlan(descriptors), DEFAULTS, logger)
    .map((level) => level.map((t) => t.moduleId));
}

describe('buildShutdownTasks', () => {
  it('stops dependents before the providers they use', () => {
    const events: string[] = [];
    expect(levelsOf([
      recordingModule('core.a', events, { service: 'svc.a' }),
      recordingModule('core.b', events, { service: 'svc.b', requires: ['svc.a'] }),
      recordingModule('core.c', events, { requires: ['svc.b'] }),
      recordingModule('core.d', events, { requires: ['svc.a'] }),
    ])).toEqual([['core.c'], ['core.b', 'core.d'], ['core.a']]);
  });

  it('orders independent modules by shutdown priority', () => {
    const events: string[] = [];
    expect(levelsOf([
      recordingModule('core.late', events),
      recordingModule('core.early', events, { shutdownPriority: 10 }),
      recordingModule('core.mid', events, { shutdownPriority: 50 }),
      recordingModule('core.twin', events, { shutdownPriority: 50 }),
    ])).toEqual([['core.early'], ['core.mid', 'core.twin'], ['core.late']]);
  });

  it('puts a module before the modules it lists as shutdown dependencies', () => {
    const events: string[] = [];
    const definitions = [
      recordingModule('core.p', events, { shutdownDependencies: ['core.q'] }),
      recordingModule('core.q', events),
      recordingModule('core.r', events),
    ];
    expect(levelsOf(definitions)).toEqual([['core.p', 'core.r'], ['core.q']]);
  });

  it('ignores shutdown dependencies that contradict the dependency order', () => {
    const events: string[] = [];
    const { logger, entries } = createBufferLogger();
    const levels = levelsOf([
      recordingModule('core.a', events, { service: 'svc.a', shutdownDependencies: ['core.b'] }),
      recordingModule('core.b', events, { requires: ['svc.a'] }),
    ], logger);

    expect(levels).toEqual([['core.b'], ['core.a']]);
    expect(entries()).toContainEqual(expect.objectContaining({
      level: 'warn',
      message: 'Shutdown dependencies contradict the dependency order, ignoring them',
      extra: { modules: ['core.a'] },
    }));
  });

  it('fills hook timeouts from the defaults', () => {
    const events: string[] = [];
    const descriptors = [
      recordingModule('core.a', events, { gracefulTimeoutMs: 250 }),
    ].map((d) => d.descriptor);
    const [[task]] = buildShutdownTasks(descriptors, buildDependencyPlan(descriptors), DEFAULTS);
    expect(task).toEqual({
      moduleId: 'core.a',
      level: 0,
      priority: 100,
      dependencies: [],
      graceful: { method: 'cleanup', timeoutMs: 250 },
      forced: { method: 'forceCleanup', timeoutMs: 100 },
    });
  });

  it('returns no levels for no modules', () => {
    expect(levelsOf([])).toEqual([]);
  });
});
