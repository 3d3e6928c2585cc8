/**
 * Two-phase bootstrap of discovered modules.
 *
 * Phase 1 runs every module's static setup hook with no access to services.
 * Service objects are then built, one per module, and Phase 2 runs in
 * dependency order: a module's hook only starts once every service it
 * requires is registered, and its own services are published when the hook
 * completes. Phase 2 hooks get a CancelToken that is cancelled when the hook
 * overruns its timeout or the bootstrap is abandoned.
 */

import { CancelToken } from '../cancel.js';
import type { Config, EngineSettings } from '../config.js';
import { ModuleContext, Phase1Context } from '../context.js';
import type { ModuleDefinition, ModuleDescriptor } from '../descriptor.js';
import {
  DuplicateServiceRegistrationError,
  EngineError,
  MissingRequiredServiceError,
  ModuleLifecycleError,
  Phase2TimeoutError,
  PhaseViolationError,
  StartupDeadlineError,
  toError,
} from '../errors.js';
import type { HealthMonitor } from '../health.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { errorExtra } from '../observability/context-logger.js';
import { buildDependencyPlan } from '../registry/dependencies.js';
import type { ServiceRegistry } from '../registry/registry.js';
import type { DependencyPlan, DiscoveryFailure } from '../registry/types.js';
import type { RouteTable } from '../routes.js';
import { bindRoutes } from '../routes.js';
import type { SettingsRegistry } from '../settings.js';
import type { BaseHandle, DatabaseGroups } from '../storage/types.js';
import { attempt, hasMethod, invokeMethod, withTimeout } from '../utils/index.js';
import { ModuleState, ModuleStateMachine } from './states.js';

export interface ModuleRuntime {
  readonly definition: ModuleDefinition;
  readonly descriptor: ModuleDescriptor;
  instance: object | null;
  database: BaseHandle | null;
}

export interface FailedModule {
  moduleId: string;
  code: string;
  message: string;
}

export interface StartupReport {
  runId: string;
  order: string[];
  registered: string[];
  failed: FailedModule[];
  skipped: string[];
  databases: string[];
  durationMs: number;
}

export interface StartInput {
  definitions: readonly ModuleDefinition[];
  skipped?: readonly string[];
  failures?: readonly DiscoveryFailure[];
  databases: DatabaseGroups;
}

export interface OrchestratorOptions {
  config: Config;
  settings: EngineSettings;
  logger: ContextLogger;
  registry: ServiceRegistry;
  settingsRegistry: SettingsRegistry;
  health: HealthMonitor;
  routes: RouteTable;
  runId: string;
}

function asEngineError(err: unknown, moduleId: string, stage: string): EngineError {
  if (err instanceof EngineError) return err;
  const cause = toError(err);
  return new ModuleLifecycleError(moduleId, stage, cause.message, { cause });
}

export class LifecycleOrchestrator {
  readonly states: ModuleStateMachine = new ModuleStateMachine();
  private readonly _opts: OrchestratorOptions;
  private readonly _logger: ContextLogger;
  private _runtimes: Map<string, ModuleRuntime> = new Map();
  private _failures: Map<string, EngineError> = new Map();
  private _plan: DependencyPlan | null = null;
  private _inflight: Map<string, CancelToken> = new Map();
  private _aborted = false;
  private _abortReason: string | null = null;
  private _started = false;
  private _finished = false;

  constructor(options: OrchestratorOptions) {
    this._opts = options;
    this._logger = options.logger;
  }

  get plan(): DependencyPlan | null {
    return this._plan;
  }

  runtime(moduleId: string): ModuleRuntime | null {
    return this._runtimes.get(moduleId) ?? null;
  }

  runtimes(): ModuleRuntime[] {
    return [...this._runtimes.values()];
  }

  failure(moduleId: string): EngineError | null {
    return this._failures.get(moduleId) ?? null;
  }

  get aborted(): boolean {
    return this._abortReason !== null;
  }

  /**
   * Abandon a bootstrap in progress: no further hook is started and the
   * tokens of running Phase 2 hooks are cancelled. Modules that have not
   * registered by the time start() returns are failed. No effect once
   * start() has finished.
   */
  abort(reason: string): void {
    if (this._finished || this._abortReason !== null) return;
    this._abortReason = reason;
    this._aborted = true;
    this._logger.warn('Bootstrap aborted', { reason, in_flight: [...this._inflight.keys()].sort() });
    this._cancelInflight(reason);
  }

  async start(input: StartInput): Promise<StartupReport> {
    if (this._started) {
      throw new PhaseViolationError('Bootstrap already ran for this orchestrator');
    }
    this._started = true;
    try {
      return await this._start(input);
    } finally {
      this._finished = true;
    }
  }

  private async _start(input: StartInput): Promise<StartupReport> {
    const began = Date.now();

    for (const failure of input.failures ?? []) {
      this.states.add(failure.moduleId);
      this._fail(failure.moduleId, failure.error);
    }
    for (const definition of input.definitions) {
      const id = definition.descriptor.moduleId;
      this._runtimes.set(id, { definition, descriptor: definition.descriptor, instance: null, database: null });
      this.states.add(id);
    }

    const plan = buildDependencyPlan(input.definitions.map((d) => d.descriptor));
    this._plan = plan;
    this._logger.info('Dependency order resolved', { order: plan.order, waves: plan.waves.length });

    if (!this._aborted) await this._runPhase1(plan);
    if (!this._aborted) this._instantiate(plan, input.databases);
    if (!this._aborted) await this._runPhase2(plan);
    if (this._abortReason !== null) {
      const reason = this._abortReason;
      const unfinished = this.states.inState(
        ModuleState.DISCOVERED,
        ModuleState.PHASE1_DONE,
        ModuleState.SERVICE_CREATED,
        ModuleState.PHASE2_DONE,
      );
      for (const id of unfinished) {
        this._fail(id, new ModuleLifecycleError(id, 'startup', reason));
      }
    }

    for (const id of this.states.inState(ModuleState.REGISTERED)) {
      this.states.transition(id, ModuleState.RUNNING);
    }

    const report: StartupReport = {
      runId: this._opts.runId,
      order: [...plan.order],
      registered: this.states.inState(ModuleState.RUNNING),
      failed: [...this._failures.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([moduleId, err]) => ({ moduleId, code: err.code, message: err.message })),
      skipped: [...(input.skipped ?? [])],
      databases: input.databases.names(),
      durationMs: Date.now() - began,
    };
    this._logger.info('Bootstrap complete', {
      registered: report.registered.length,
      failed: report.failed.length,
      duration_ms: report.durationMs,
    });
    return report;
  }

  private _assertBarrier(): void {
    const registry = this._opts.registry;
    if (registry.phase !== 'sealed' || registry.count !== 0) {
      throw new PhaseViolationError(
        `Phase 1 requires a sealed, empty registry (phase=${registry.phase}, services=${registry.count})`,
      );
    }
  }

  private _timeoutFor(descriptor: ModuleDescriptor): number {
    return descriptor.phase2TimeoutMs ?? this._opts.settings.lifecycle.phase2_timeout_ms;
  }

  private async _runPhase1(plan: DependencyPlan): Promise<void> {
    this._assertBarrier();
    this._logger.info('Phase 1 starting', { modules: plan.order.length });

    const results = await Promise.allSettled(plan.order.map(async (id) => {
      const rt = this._runtimes.get(id);
      if (rt === undefined) return;
      const hook = rt.descriptor.phase1;
      const cls = rt.definition.serviceClass;
      if (hook !== null && cls !== null) {
        const ctx = new Phase1Context(id, this._opts.config, this._logger.child({ moduleId: id }), this._opts.settingsRegistry);
        const timeoutMs = this._timeoutFor(rt.descriptor);
        const outcome = await withTimeout(attempt(() => invokeMethod(cls, hook, ctx)), timeoutMs);
        if (outcome.status === 'timeout') {
          throw new ModuleLifecycleError(id, 'phase1', `timed out after ${timeoutMs}ms`);
        }
        if (outcome.status === 'error') {
          throw asEngineError(outcome.error, id, 'phase1');
        }
      }
      this.states.transition(id, ModuleState.PHASE1_DONE);
    }));

    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        const id = plan.order[i];
        this._fail(id, asEngineError(result.reason, id, 'phase1'));
      }
    });

    this._assertBarrier();
  }

  private _instantiate(plan: DependencyPlan, databases: DatabaseGroups): void {
    for (const id of plan.order) {
      const rt = this._runtimes.get(id);
      if (rt === undefined || !this.states.is(id, ModuleState.PHASE1_DONE)) continue;
      const descriptor = rt.descriptor;
      try {
        if (descriptor.storage !== null) {
          rt.database = databases.get(descriptor.storage);
          if (rt.database === null) {
            throw new ModuleLifecycleError(id, 'storage', `database '${descriptor.storage}' was not bootstrapped`);
          }
        }
        const cls = rt.definition.serviceClass;
        if (cls !== null) {
          const ctx = new ModuleContext({
            descriptor,
            services: this._opts.registry.directory(),
            config: this._opts.config,
            settings: this._opts.settings,
            moduleSettings: this._opts.settingsRegistry,
            logger: this._logger.child({ moduleId: id }),
            database: rt.database,
            runId: this._opts.runId,
          });
          let instance: object;
          try {
            instance = new cls(ctx);
          } catch (e) {
            throw asEngineError(e, id, 'instantiate');
          }
          this._checkHooks(descriptor, instance);
          rt.instance = instance;
        }
        this.states.transition(id, ModuleState.SERVICE_CREATED);
      } catch (e) {
        this._fail(id, asEngineError(e, id, 'instantiate'));
      }
    }
  }

  private _checkHooks(descriptor: ModuleDescriptor, instance: object): void {
    const names = [
      descriptor.phase2,
      descriptor.healthCheck?.method ?? null,
      descriptor.shutdown.graceful?.method ?? null,
      descriptor.shutdown.forced?.method ?? null,
      ...descriptor.routes.map((r) => r.handler),
    ];
    for (const name of names) {
      if (name !== null && !hasMethod(instance, name)) {
        throw new ModuleLifecycleError(descriptor.moduleId, 'instantiate', `service has no method '${name}'`);
      }
    }
  }

  private async _runPhase2(plan: DependencyPlan): Promise<void> {
    this._opts.registry.open();
    const deadlineMs = this._opts.settings.lifecycle.startup_deadline_ms;
    const concurrent = this._opts.settings.lifecycle.concurrent;
    this._logger.info('Phase 2 starting', { waves: plan.waves.length, concurrent, deadline_ms: deadlineMs });

    const pass = async (): Promise<void> => {
      for (const wave of plan.waves) {
        if (this._aborted) return;
        if (concurrent) {
          await Promise.all(wave.map((id) => this._phase2Module(id, plan)));
        } else {
          for (const id of wave) {
            if (this._aborted) return;
            await this._phase2Module(id, plan);
          }
        }
      }
    };

    const outcome = await withTimeout(pass(), deadlineMs);
    if (outcome.status === 'error') {
      throw outcome.error;
    }
    if (outcome.status === 'timeout') {
      this._aborted = true;
      const pending = this.states.inState(ModuleState.SERVICE_CREATED, ModuleState.PHASE2_DONE);
      const err = new StartupDeadlineError(deadlineMs, pending);
      this._cancelInflight(err.message);
      for (const id of pending) {
        this._fail(id, err);
      }
      this._logger.fatal('Startup deadline exceeded', { pending, ...errorExtra(err) });
      throw err;
    }
  }

  private async _phase2Module(id: string, plan: DependencyPlan): Promise<void> {
    const rt = this._runtimes.get(id);
    if (this._aborted || rt === undefined || !this.states.is(id, ModuleState.SERVICE_CREATED)) return;
    const descriptor = rt.descriptor;
    const registry = this._opts.registry;
    const logger = this._logger.child({ moduleId: id });

    try {
      const unresolved = plan.unresolved.get(id) ?? [];
      if (unresolved.length > 0) {
        throw new MissingRequiredServiceError(id, unresolved[0]);
      }
      for (const service of descriptor.requires) {
        if (!registry.has(service)) {
          throw new MissingRequiredServiceError(id, service);
        }
      }

      const hook = descriptor.phase2;
      const instance = rt.instance;
      if (hook !== null && instance !== null) {
        const timeoutMs = this._timeoutFor(descriptor);
        const token = this._newToken(logger);
        this._inflight.set(id, token);
        const outcome = await withTimeout(attempt(() => invokeMethod(instance, hook, token)), timeoutMs);
        this._inflight.delete(id);
        if (this._aborted) return;
        if (outcome.status === 'timeout') {
          const err = new Phase2TimeoutError(id, timeoutMs);
          token.cancel(err.message);
          throw err;
        }
        if (outcome.status === 'error') {
          throw asEngineError(outcome.error, id, 'phase2');
        }
      }
      this.states.transition(id, ModuleState.PHASE2_DONE);

      for (const service of descriptor.services) {
        const existing = registry.lookup(service);
        if (existing.found) {
          throw new DuplicateServiceRegistrationError(service, existing.record.moduleId, id);
        }
      }
      if (instance !== null) {
        for (const service of descriptor.services) {
          registry.register(service, instance, { moduleId: id, methods: descriptor.methods, priority: descriptor.priority });
        }
      }
      this.states.transition(id, ModuleState.REGISTERED);
      if (instance !== null) {
        if (descriptor.healthCheck !== null) {
          this._opts.health.register(id, instance, descriptor.healthCheck);
        }
        if (descriptor.routes.length > 0) {
          this._opts.routes.add(id, bindRoutes(this._opts.settings.api.prefix, id, descriptor.routes, instance));
        }
      }
      logger.info('Module registered', { services: [...descriptor.services] });
    } catch (e) {
      this._fail(id, asEngineError(e, id, 'phase2'));
    }
  }

  private _newToken(logger: ContextLogger): CancelToken {
    return new CancelToken({
      onListenerError: (e) => logger.error('Cancellation listener failed', errorExtra(e)),
    });
  }

  private _cancelInflight(reason: string): void {
    for (const token of this._inflight.values()) {
      token.cancel(reason);
    }
  }

  private _fail(moduleId: string, err: EngineError): void {
    if (!this.states.fail(moduleId, err.message)) return;
    this._failures.set(moduleId, err);
    this._logger.error('Module failed', { module_id: moduleId, ...errorExtra(err) });
  }
}
