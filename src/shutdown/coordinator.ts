/**
 * Runs shutdown levels in order: graceful hook first, forced hook when the
 * graceful one is missing, fails or overruns. Application shutdown handlers
 * run once every level is done.
 */

import { CancelToken } from '../cancel.js';
import { ShutdownHookError, ShutdownHookTimeoutError } from '../errors.js';
import type { HealthMonitor } from '../health.js';
import { canTransition, ModuleState } from '../lifecycle/states.js';
import type { ModuleStateMachine } from '../lifecycle/states.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { errorExtra } from '../observability/context-logger.js';
import type { ServiceRegistry } from '../registry/registry.js';
import type { RouteTable } from '../routes.js';
import { attempt, invokeMethod, isThenable, withTimeout } from '../utils/index.js';
import type { ShutdownHook, ShutdownPhase, ShutdownTask } from './tasks.js';

export type HookOutcome = 'ok' | 'timeout' | 'error' | 'skipped';

export interface ModuleShutdownResult {
  moduleId: string;
  level: number;
  graceful: HookOutcome;
  forced: HookOutcome;
  unregistered: string[];
  state: ModuleState;
}

/** App-level cleanup run after every module has shut down. */
export type ShutdownHandler = () => void | Promise<void>;

export interface ShutdownReport {
  startedAt: string;
  durationMs: number;
  levels: number;
  modules: ModuleShutdownResult[];
  /** One outcome per handler, in registration order. */
  handlers: HookOutcome[];
  /** Shutdown always runs to the end; hook failures are reported per module. */
  completed: true;
}

export interface ShutdownCoordinatorOptions {
  registry: ServiceRegistry;
  health: HealthMonitor;
  routes: RouteTable;
  states: ModuleStateMachine;
  logger: ContextLogger;
  handlers?: readonly ShutdownHandler[];
  /** Bound on each shutdown handler; 0 waits forever. */
  handlerTimeoutMs?: number;
}

const FAILED_OUTCOMES: ReadonlySet<HookOutcome> = new Set(['timeout', 'error']);

export class ShutdownCoordinator {
  private readonly _opts: ShutdownCoordinatorOptions;
  private readonly _logger: ContextLogger;
  private _pending: Promise<ShutdownReport> | null = null;

  constructor(options: ShutdownCoordinatorOptions) {
    this._opts = options;
    this._logger = options.logger;
  }

  get triggered(): boolean {
    return this._pending !== null;
  }

  /**
   * Run the shutdown sequence. Only the first call does any work; later
   * calls get the same report.
   */
  shutdown(levels: readonly (readonly ShutdownTask[])[], instances: ReadonlyMap<string, object>): Promise<ShutdownReport> {
    if (this._pending === null) {
      this._pending = this._run(levels, instances);
    }
    return this._pending;
  }

  private async _run(
    levels: readonly (readonly ShutdownTask[])[],
    instances: ReadonlyMap<string, object>,
  ): Promise<ShutdownReport> {
    const began = Date.now();
    const startedAt = new Date(began).toISOString();
    this._logger.info('Shutdown starting', { levels: levels.length });

    this._opts.health.stop();
    this._opts.registry.beginDraining();

    const modules: ModuleShutdownResult[] = [];
    for (const level of levels) {
      const results = await Promise.all(level.map((task) => this._runTask(task, instances.get(task.moduleId) ?? null)));
      modules.push(...results);
    }

    const handlers = await this._runHandlers();

    const report: ShutdownReport = {
      startedAt,
      durationMs: Date.now() - began,
      levels: levels.length,
      modules,
      handlers,
      completed: true,
    };
    this._logger.info('Shutdown complete', { modules: modules.length, duration_ms: report.durationMs });
    return report;
  }

  private async _runTask(task: ShutdownTask, instance: object | null): Promise<ModuleShutdownResult> {
    const id = task.moduleId;
    const states = this._opts.states;
    const current = states.get(id);
    if (current !== null && canTransition(current, ModuleState.SHUTTING_DOWN)) {
      states.transition(id, ModuleState.SHUTTING_DOWN);
    }

    let graceful: HookOutcome = 'skipped';
    let forced: HookOutcome = 'skipped';
    if (instance !== null && task.graceful !== null) {
      graceful = await this._runGraceful(id, instance, task.graceful);
    }
    if (instance !== null && graceful !== 'ok' && task.forced !== null) {
      forced = await this._runForced(id, instance, task.forced);
    }

    const unregistered = this._opts.registry.unregisterModule(id);
    this._opts.health.unregister(id);
    this._opts.routes.removeModule(id);

    if (states.is(id, ModuleState.SHUTTING_DOWN)) {
      const bothFailed = FAILED_OUTCOMES.has(graceful) && FAILED_OUTCOMES.has(forced);
      states.transition(id, bothFailed ? ModuleState.FAILED : ModuleState.STOPPED, bothFailed ? 'shutdown hooks failed' : undefined);
    }

    return { moduleId: id, level: task.level, graceful, forced, unregistered, state: states.get(id) ?? ModuleState.STOPPED };
  }

  private async _runHandlers(): Promise<HookOutcome[]> {
    const handlers = this._opts.handlers ?? [];
    if (handlers.length === 0) return [];
    this._logger.info('Running shutdown handlers', { handlers: handlers.length });
    const outcomes: HookOutcome[] = [];
    for (const [index, handler] of handlers.entries()) {
      const outcome = await withTimeout(attempt(handler), this._opts.handlerTimeoutMs ?? 0);
      if (outcome.status === 'error') {
        this._logger.error('Shutdown handler failed', { handler: index, ...errorExtra(outcome.error) });
      } else if (outcome.status === 'timeout') {
        this._logger.error('Shutdown handler timed out', { handler: index, timeout_ms: this._opts.handlerTimeoutMs });
      }
      outcomes.push(outcome.status);
    }
    return outcomes;
  }

  /** The hook gets a CancelToken, cancelled if it overruns its timeout. */
  private async _runGraceful(moduleId: string, instance: object, hook: ShutdownHook): Promise<HookOutcome> {
    const token = new CancelToken({
      onListenerError: (e) => this._logger.error('Cancellation listener failed', { module_id: moduleId, ...errorExtra(e) }),
    });
    const outcome = await withTimeout(attempt(() => invokeMethod(instance, hook.method, token)), hook.timeoutMs);
    if (outcome.status === 'ok') return 'ok';
    const err = outcome.status === 'timeout'
      ? new ShutdownHookTimeoutError(moduleId, 'graceful', hook.timeoutMs)
      : this._hookError(moduleId, 'graceful', outcome.error);
    if (outcome.status === 'timeout') {
      token.cancel(err.message);
    }
    this._logger.warn('Graceful shutdown did not complete, forcing', { module_id: moduleId, ...errorExtra(err) });
    return outcome.status;
  }

  /**
   * The forced hook is called synchronously. A returned promise is raced
   * against what is left of the timeout; errors are logged and swallowed.
   */
  private async _runForced(moduleId: string, instance: object, hook: ShutdownHook): Promise<HookOutcome> {
    const began = Date.now();
    let result: unknown;
    try {
      result = invokeMethod(instance, hook.method);
    } catch (e) {
      this._logger.error('Forced shutdown failed', { module_id: moduleId, ...errorExtra(this._hookError(moduleId, 'forced', e)) });
      return 'error';
    }

    const bounded = hook.timeoutMs > 0;
    if (isThenable(result)) {
      const remaining = bounded ? Math.max(1, hook.timeoutMs - (Date.now() - began)) : 0;
      const outcome = await withTimeout(Promise.resolve(result), remaining);
      if (outcome.status === 'error') {
        this._logger.error('Forced shutdown failed', {
          module_id: moduleId,
          ...errorExtra(this._hookError(moduleId, 'forced', outcome.error)),
        });
        return 'error';
      }
      if (outcome.status === 'ok') return 'ok';
    } else if (!bounded || Date.now() - began <= hook.timeoutMs) {
      return 'ok';
    }

    const err = new ShutdownHookTimeoutError(moduleId, 'forced', hook.timeoutMs);
    this._logger.error('Forced shutdown overran its timeout', { module_id: moduleId, ...errorExtra(err) });
    return 'timeout';
  }

  private _hookError(moduleId: string, phase: ShutdownPhase, error: unknown): ShutdownHookError {
    const cause = error instanceof Error ? error : undefined;
    return new ShutdownHookError(moduleId, phase, cause?.message ?? String(error), { cause });
  }
}
