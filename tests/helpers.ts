/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { Config, resolveEngineSettings } from '../src/config.js';
import type { EngineSettings } from '../src/config.js';
import type { ModuleContext } from '../src/context.js';
import { defineModule } from '../src/descriptor.js';
import type { DefineModuleOptions, ModuleDefinition } from '../src/descriptor.js';
import { HealthMonitor } from '../src/health.js';
import { LifecycleOrchestrator } from '../src/lifecycle/orchestrator.js';
import { ContextLogger } from '../src/observability/context-logger.js';
import type { LogLevel } from '../src/observability/context-logger.js';
import { ServiceRegistry } from '../src/registry/registry.js';
import { RouteTable } from '../src/routes.js';
import { SettingsRegistry } from '../src/settings.js';

export function createBufferLogger(level: LogLevel = 'debug'): {
  logger: ContextLogger;
  lines: string[];
  entries: () => Array<Record<string, unknown>>;
} {
  const lines: string[] = [];
  const logger = new ContextLogger({ level, output: { write: (s: string) => lines.push(s) } });
  return {
    logger,
    lines,
    entries: () => lines.map((l): Record<string, unknown> => JSON.parse(l)),
  };
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `modhost-${prefix}-`));
}

export function touch(root: string, relativePath: string, content = ''): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  return full;
}

export function settingsWith(overrides: Record<string, unknown> = {}): EngineSettings {
  return resolveEngineSettings(new Config({ modhost: overrides }));
}

export interface OrchestratorHarness {
  orchestrator: LifecycleOrchestrator;
  registry: ServiceRegistry;
  health: HealthMonitor;
  routes: RouteTable;
  settingsRegistry: SettingsRegistry;
  config: Config;
  lines: string[];
}

export function createOrchestrator(
  overrides: Record<string, unknown> = {},
  hostConfig: Record<string, unknown> = {},
): OrchestratorHarness {
  const { logger, lines } = createBufferLogger();
  const config = new Config({ ...hostConfig, modhost: overrides });
  const settings = resolveEngineSettings(config);
  const registry = new ServiceRegistry();
  const health = new HealthMonitor({ logger, defaultIntervalMs: settings.health.interval_ms });
  const routes = new RouteTable();
  const settingsRegistry = new SettingsRegistry();
  const orchestrator = new LifecycleOrchestrator({
    config,
    settings,
    logger,
    registry,
    settingsRegistry,
    health,
    routes,
    runId: 'run-test',
  });
  return { orchestrator, registry, health, routes, settingsRegistry, config, lines };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RecordingOptions extends Omit<DefineModuleOptions, 'id' | 'serviceClass' | 'phase2' | 'shutdown'> {
  onPhase2?: () => void | Promise<void>;
  onGraceful?: () => void | Promise<void>;
  onForced?: () => unknown;
  gracefulTimeoutMs?: number;
  forcedTimeoutMs?: number;
  shutdownPriority?: number;
  shutdownDependencies?: string[];
}

/**
 * A module whose hooks append to `events` as `<hook>:<moduleId>`.
 */
export function recordingModule(id: string, events: string[], options: RecordingOptions = {}): ModuleDefinition {
  const { onPhase2, onGraceful, onForced, gracefulTimeoutMs, forcedTimeoutMs, shutdownPriority, shutdownDependencies, ...rest } = options;

  class RecordingService {
    readonly context: ModuleContext;

    constructor(context: ModuleContext) {
      this.context = context;
      events.push(`construct:${id}`);
    }

    async setup(): Promise<void> {
      events.push(`phase2:${id}`);
      await onPhase2?.();
    }

    async cleanup(): Promise<void> {
      events.push(`graceful:${id}`);
      await onGraceful?.();
    }

    forceCleanup(): unknown {
      events.push(`forced:${id}`);
      return onForced?.();
    }
  }

  return defineModule({
    ...rest,
    id,
    serviceClass: RecordingService,
    phase2: 'setup',
    shutdown: {
      graceful: { method: 'cleanup', timeoutMs: gracefulTimeoutMs ?? null, priority: shutdownPriority, dependencies: shutdownDependencies },
      forced: { method: 'forceCleanup', timeoutMs: forcedTimeoutMs ?? null },
    },
  });
}
