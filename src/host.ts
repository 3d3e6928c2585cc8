/**
 * ModuleHost: the single object an application embeds to run its modules.
 */

import { resolve } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { EngineSettings } from './config.js';
import { Config, resolveEngineSettings } from './config.js';
import type { ModuleCatalog } from './descriptor.js';
import { PhaseViolationError } from './errors.js';
import { HealthMonitor } from './health.js';
import type { HealthResult } from './health.js';
import { LifecycleOrchestrator } from './lifecycle/orchestrator.js';
import type { StartupReport } from './lifecycle/orchestrator.js';
import { ModuleStateMachine } from './lifecycle/states.js';
import type { ModuleState } from './lifecycle/states.js';
import { ContextLogger, errorExtra } from './observability/context-logger.js';
import { discoverModules } from './registry/discovery.js';
import { ServiceRegistry } from './registry/registry.js';
import type { CapabilityMatch, ServiceDirectory, ServiceSnapshot } from './registry/registry.js';
import type { RouteEntry } from './routes.js';
import { RouteTable } from './routes.js';
import { SettingsRegistry } from './settings.js';
import { ShutdownCoordinator } from './shutdown/coordinator.js';
import type { ShutdownHandler, ShutdownReport } from './shutdown/coordinator.js';
import { buildShutdownTasks } from './shutdown/tasks.js';
import { runStorageBootstrap } from './storage/bootstrap.js';
import { FileCatalogStorage } from './storage/file-catalog.js';
import type { StorageCollaborator } from './storage/types.js';
import { DatabaseGroups } from './storage/types.js';

export interface ModuleHostOptions {
  config?: Config | Record<string, unknown> | null;
  logger?: ContextLogger | null;
  /** Modules linked in at build time. */
  catalog?: ModuleCatalog | null;
  /** Scan `modhost.modules.root`. Defaults to true unless a catalog is given. */
  scanTree?: boolean;
  /**
   * Storage collaborator. Defaults to a FileCatalogStorage under
   * `modhost.storage.data_dir` when the tree is scanned or a catalog module
   * declares storage.
   */
  storage?: StorageCollaborator | null;
}

export class ModuleHost {
  readonly config: Config;
  readonly settings: EngineSettings;
  /** Read-only view of the live services. */
  readonly registry: ServiceDirectory;
  readonly moduleSettings: SettingsRegistry = new SettingsRegistry();
  readonly health: HealthMonitor;
  private readonly _logger: ContextLogger;
  private readonly _catalog: ModuleCatalog | null;
  private readonly _scanTree: boolean;
  private readonly _storage: StorageCollaborator | null;
  private readonly _registry: ServiceRegistry;
  private readonly _routes: RouteTable = new RouteTable();
  private readonly _shutdownHandlers: ShutdownHandler[] = [];
  private _orchestrator: LifecycleOrchestrator | null = null;
  private _starting: Promise<StartupReport> | null = null;
  private _startSettled = false;
  private _report: StartupReport | null = null;
  private _shutdown: Promise<ShutdownReport> | null = null;
  private _runLogger: ContextLogger;

  constructor(options?: ModuleHostOptions) {
    const config = options?.config;
    this.config = config instanceof Config ? config : new Config(config ?? {});
    this.settings = resolveEngineSettings(this.config);
    this._logger = options?.logger ?? new ContextLogger({ name: 'modhost' });
    this._runLogger = this._logger;
    this._catalog = options?.catalog ?? null;
    this._scanTree = options?.scanTree ?? this._catalog === null;
    const catalogStorage = this._catalogDatabases().length > 0;
    this._storage = options?.storage !== undefined
      ? options.storage
      : this._scanTree || catalogStorage
        ? new FileCatalogStorage({
            dataDir: this.settings.storage.data_dir,
            maxDepth: this.settings.modules.max_depth,
            scanTree: this._scanTree,
            logger: this._logger.child({ name: 'modhost.storage' }),
          })
        : null;
    this._registry = new ServiceRegistry({
      onCallbackError: (event, name, error) => {
        this._runLogger.error('Registry listener failed', { event, service: name, ...errorExtra(error) });
      },
    });
    this.registry = this._registry.directory();
    this.health = new HealthMonitor({
      logger: this._logger.child({ name: 'modhost.health' }),
      defaultIntervalMs: this.settings.health.interval_ms,
    });
  }

  get moduleRoot(): string {
    return resolve(this.settings.modules.root);
  }

  get report(): StartupReport | null {
    return this._report;
  }

  /**
   * Storage bootstrap, discovery, Phase 1, instantiation and Phase 2.
   * Per-module failures land in the report; fatal ones (storage, cycles,
   * the startup deadline) are thrown.
   */
  async start(): Promise<StartupReport> {
    if (this._starting !== null) {
      throw new PhaseViolationError('ModuleHost.start() can only run once');
    }
    if (this._shutdown !== null) {
      throw new PhaseViolationError('ModuleHost has been shut down');
    }
    this._starting = this._runStart().finally(() => {
      this._startSettled = true;
    });
    return this._starting;
  }

  private _catalogDatabases(): string[] {
    const names = new Set<string>();
    for (const definition of this._catalog?.definitions() ?? []) {
      const storage = definition.descriptor.storage;
      if (storage !== null && !definition.descriptor.disabled) names.add(storage);
    }
    return [...names].sort();
  }

  private async _runStart(): Promise<StartupReport> {
    const runId = uuidv4();
    const logger = this._logger.child({ runId });
    this._runLogger = logger;
    const orchestrator = new LifecycleOrchestrator({
      config: this.config,
      settings: this.settings,
      logger,
      registry: this._registry,
      settingsRegistry: this.moduleSettings,
      health: this.health,
      routes: this._routes,
      runId,
    });
    this._orchestrator = orchestrator;
    logger.info('Starting module host', { root: this._scanTree ? this.moduleRoot : null });

    const databases = this._storage !== null
      ? await runStorageBootstrap(this._storage, this.moduleRoot, logger, this._catalogDatabases())
      : DatabaseGroups.empty();

    const discovery = await discoverModules({
      root: this._scanTree ? this.moduleRoot : null,
      catalog: this._catalog,
      maxDepth: this.settings.modules.max_depth,
      logger,
    });

    const report = await orchestrator.start({
      definitions: discovery.definitions,
      skipped: discovery.skipped,
      failures: discovery.failures,
      databases,
    });
    this._report = report;
    if (this._shutdown === null) {
      this.health.start();
    }
    return report;
  }

  /**
   * Register app-level cleanup, run in registration order after every
   * module has shut down. Returns a function removing it.
   */
  onShutdown(handler: ShutdownHandler): () => void {
    if (this._shutdown !== null) {
      throw new PhaseViolationError('Shutdown has already started');
    }
    this._shutdownHandlers.push(handler);
    return () => {
      const index = this._shutdownHandlers.indexOf(handler);
      if (index >= 0) this._shutdownHandlers.splice(index, 1);
    };
  }

  /**
   * Idempotent; every call resolves to the report of the first. A start in
   * progress is aborted and allowed to settle before any module shuts down.
   */
  shutdown(): Promise<ShutdownReport> {
    if (this._shutdown === null) {
      this._shutdown = this._runShutdown();
    }
    return this._shutdown;
  }

  private async _runShutdown(): Promise<ShutdownReport> {
    const orchestrator = this._orchestrator;
    if (this._starting !== null && !this._startSettled) {
      orchestrator?.abort('aborted by shutdown');
      await Promise.allSettled([this._starting]);
    }
    const coordinator = new ShutdownCoordinator({
      registry: this._registry,
      health: this.health,
      routes: this._routes,
      states: orchestrator?.states ?? new ModuleStateMachine(),
      logger: this._runLogger,
      handlers: [...this._shutdownHandlers],
      handlerTimeoutMs: this.settings.shutdown.graceful_timeout_ms,
    });

    const plan = orchestrator?.plan ?? null;
    const runtimes = (orchestrator?.runtimes() ?? []).filter((rt) => rt.instance !== null);
    const instances = new Map<string, object>();
    for (const rt of runtimes) {
      if (rt.instance !== null) instances.set(rt.descriptor.moduleId, rt.instance);
    }
    const levels = plan !== null
      ? buildShutdownTasks(runtimes.map((rt) => rt.descriptor), plan, {
          gracefulTimeoutMs: this.settings.shutdown.graceful_timeout_ms,
          forcedTimeoutMs: this.settings.shutdown.forced_timeout_ms,
        }, this._runLogger)
      : [];
    return coordinator.shutdown(levels, instances);
  }

  /**
   * Shut down once on SIGTERM or SIGINT. Returns a function removing the
   * handlers.
   */
  installSignalHandlers(options?: { exit?: boolean }): () => void {
    const exit = options?.exit ?? true;
    const handler = (signal: NodeJS.Signals): void => {
      this._runLogger.info('Signal received, shutting down', { signal });
      this.shutdown().then(
        () => {
          if (exit) process.exit(0);
        },
        (e: unknown) => {
          this._runLogger.fatal('Shutdown failed', errorExtra(e));
          if (exit) process.exit(1);
        },
      );
    };
    process.once('SIGTERM', handler);
    process.once('SIGINT', handler);
    return () => {
      process.off('SIGTERM', handler);
      process.off('SIGINT', handler);
    };
  }

  routes(): RouteEntry[] {
    return this._routes.list();
  }

  listServices(pattern?: string): ServiceSnapshot[] {
    return [...this._registry.listServices(pattern !== undefined ? { pattern } : undefined)];
  }

  getService(name: string): unknown | null {
    return this._registry.get(name);
  }

  describeService(name: string): string {
    return this._registry.describe(name);
  }

  findServices(term: string): CapabilityMatch[] {
    return this._registry.findByCapability(term);
  }

  moduleStates(): Record<string, ModuleState> {
    return this._orchestrator?.states.snapshot() ?? {};
  }

  checkHealth(): Promise<HealthResult[]> {
    return this.health.checkAll();
  }
}
