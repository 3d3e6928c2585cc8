/**
 * Route list published for the outer HTTP layer. The engine does no routing
 * itself; it binds handlers and hands the table over.
 */

import type { HttpMethod, RouteSpec } from './descriptor.js';
import { ModuleLifecycleError } from './errors.js';
import { bindMethod } from './utils/index.js';

export interface RouteEntry {
  readonly moduleId: string;
  readonly method: HttpMethod;
  readonly path: string;
  readonly handler: string;
  readonly invoke: (...args: unknown[]) => unknown;
}

/** `core.database` under `/api/v1` becomes `/api/v1/core/database`. */
export function moduleBasePath(prefix: string, moduleId: string): string {
  const base = prefix.replace(/\/+$/, '');
  return `${base}/${moduleId.split('.').join('/')}`;
}

export function joinRoutePath(prefix: string, moduleId: string, path: string): string {
  const full = moduleBasePath(prefix, moduleId) + path;
  return full.length > 1 ? full.replace(/\/+$/, '') : full;
}

export function bindRoutes(prefix: string, moduleId: string, specs: readonly RouteSpec[], handle: object): RouteEntry[] {
  return specs.map((spec) => {
    const invoke = bindMethod(handle, spec.handler);
    if (invoke === null) {
      throw new ModuleLifecycleError(moduleId, 'routes', `handler '${spec.handler}' is not a method of the service`);
    }
    return Object.freeze({
      moduleId,
      method: spec.method,
      path: joinRoutePath(prefix, moduleId, spec.path),
      handler: spec.handler,
      invoke,
    });
  });
}

export class RouteTable {
  private _byModule: Map<string, RouteEntry[]> = new Map();

  add(moduleId: string, entries: RouteEntry[]): void {
    this._byModule.set(moduleId, entries);
  }

  removeModule(moduleId: string): void {
    this._byModule.delete(moduleId);
  }

  /** Every published route, ordered by path then method. */
  list(): RouteEntry[] {
    return [...this._byModule.values()].flat().sort((a, b) => {
      if (a.path !== b.path) return a.path < b.path ? -1 : 1;
      return a.method < b.method ? -1 : a.method > b.method ? 1 : 0;
    });
  }

  get size(): number {
    let n = 0;
    for (const entries of this._byModule.values()) n += entries.length;
    return n;
  }
}
