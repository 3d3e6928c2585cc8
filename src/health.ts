/**
 * Periodic module health checks.
 */

import type { HealthCheckSpec } from './descriptor.js';
import type { ContextLogger } from './observability/context-logger.js';
import { errorExtra } from './observability/context-logger.js';
import { attempt, invokeMethod } from './utils/index.js';

export interface HealthResult {
  moduleId: string;
  healthy: boolean;
  detail: unknown;
  checkedAt: string;
  error: { code: string; message: string } | null;
}

interface HealthTarget {
  handle: object;
  method: string;
  intervalMs: number;
}

/**
 * A hook may return a boolean, an object with a boolean `healthy` field, or
 * nothing (healthy). Throwing counts as unhealthy.
 */
export function interpretHealth(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (value !== null && typeof value === 'object') {
    const healthy: unknown = Reflect.get(value, 'healthy');
    if (typeof healthy === 'boolean') return healthy;
  }
  return true;
}

export class HealthMonitor {
  private readonly _logger: ContextLogger;
  private readonly _defaultIntervalMs: number;
  private _targets: Map<string, HealthTarget> = new Map();
  private _timers: Map<string, ReturnType<typeof setInterval>> = new Map();
  private _results: Map<string, HealthResult> = new Map();
  private _started = false;

  constructor(options: { logger: ContextLogger; defaultIntervalMs: number }) {
    this._logger = options.logger;
    this._defaultIntervalMs = options.defaultIntervalMs;
  }

  get running(): boolean {
    return this._started;
  }

  get moduleIds(): string[] {
    return [...this._targets.keys()].sort();
  }

  register(moduleId: string, handle: object, spec: HealthCheckSpec): void {
    const target: HealthTarget = {
      handle,
      method: spec.method,
      intervalMs: spec.intervalMs ?? this._defaultIntervalMs,
    };
    this._targets.set(moduleId, target);
    if (this.running) {
      this._schedule(moduleId, target);
    }
  }

  unregister(moduleId: string): void {
    this._clear(moduleId);
    this._targets.delete(moduleId);
    this._results.delete(moduleId);
  }

  async check(moduleId: string): Promise<HealthResult | null> {
    const target = this._targets.get(moduleId);
    if (target === undefined) return null;

    let result: HealthResult;
    try {
      const detail = await attempt(() => invokeMethod(target.handle, target.method));
      result = { moduleId, healthy: interpretHealth(detail), detail, checkedAt: new Date().toISOString(), error: null };
    } catch (e) {
      const extra = errorExtra(e);
      result = {
        moduleId,
        healthy: false,
        detail: null,
        checkedAt: new Date().toISOString(),
        error: { code: String(extra.error_code), message: String(extra.error_message) },
      };
    }

    this._results.set(moduleId, result);
    if (!result.healthy) {
      this._logger.warn('Health check failed', { module_id: moduleId, ...(result.error ?? {}) });
    }
    return result;
  }

  async checkAll(): Promise<HealthResult[]> {
    const results = await Promise.all(this.moduleIds.map((id) => this.check(id)));
    return results.filter((r): r is HealthResult => r !== null);
  }

  lastResult(moduleId: string): HealthResult | null {
    return this._results.get(moduleId) ?? null;
  }

  start(): void {
    this._started = true;
    for (const [moduleId, target] of this._targets) {
      this._schedule(moduleId, target);
    }
  }

  stop(): void {
    this._started = false;
    for (const moduleId of [...this._timers.keys()]) {
      this._clear(moduleId);
    }
  }

  private _schedule(moduleId: string, target: HealthTarget): void {
    this._clear(moduleId);
    const timer = setInterval(() => {
      this.check(moduleId).catch((e: unknown) => {
        this._logger.error('Health check crashed', { module_id: moduleId, ...errorExtra(e) });
      });
    }, target.intervalMs);
    timer.unref();
    this._timers.set(moduleId, timer);
  }

  private _clear(moduleId: string): void {
    const timer = this._timers.get(moduleId);
    if (timer !== undefined) {
      clearInterval(timer);
      this._timers.delete(moduleId);
    }
  }
}
