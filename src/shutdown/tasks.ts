/**
 * Shutdown ordering.
 */

import type { ModuleDescriptor } from '../descriptor.js';
import type { ContextLogger } from '../observability/context-logger.js';
import type { DependencyPlan } from '../registry/types.js';

export type ShutdownPhase = 'graceful' | 'forced';

export interface ShutdownHook {
  readonly method: string;
  readonly timeoutMs: number;
}

export interface ShutdownTask {
  readonly moduleId: string;
  readonly level: number;
  readonly priority: number;
  /** Modules that must shut down after this one. */
  readonly dependencies: readonly string[];
  readonly graceful: ShutdownHook | null;
  readonly forced: ShutdownHook | null;
}

export interface ShutdownDefaults {
  gracefulTimeoutMs: number;
  forcedTimeoutMs: number;
}

interface Constraint {
  before: string;
  after: string;
}

function assignLevels(
  ids: readonly string[],
  initial: Map<string, number>,
  constraints: readonly Constraint[],
): Map<string, number> | null {
  const level = new Map(initial);
  for (let pass = 0; pass <= ids.length; pass++) {
    let changed = false;
    for (const { before, after } of constraints) {
      const need = (level.get(before) ?? 0) + 1;
      if ((level.get(after) ?? 0) < need) {
        level.set(after, need);
        changed = true;
      }
    }
    if (!changed) return level;
  }
  return null;
}

/**
 * Group instantiated modules into shutdown levels. Dependents go before the
 * providers they use (reverse dependency depth), then lower graceful
 * priority first; a module listing others in its graceful `dependencies`
 * goes before them. Modules sharing a level shut down concurrently and are
 * listed by id.
 */
export function buildShutdownTasks(
  descriptors: readonly ModuleDescriptor[],
  plan: DependencyPlan,
  defaults: ShutdownDefaults,
  logger?: ContextLogger | null,
): ShutdownTask[][] {
  const byId = new Map(descriptors.map((d) => [d.moduleId, d]));
  const ids = [...byId.keys()].sort();
  if (ids.length === 0) return [];

  const maxDepth = Math.max(0, ...ids.map((id) => plan.depth.get(id) ?? 0));
  const priorityOf = (d: ModuleDescriptor): number => d.shutdown.graceful?.priority ?? d.priority;
  const keyOf = (id: string): [number, number] => {
    const d = byId.get(id);
    return [maxDepth - (plan.depth.get(id) ?? 0), d !== undefined ? priorityOf(d) : 0];
  };

  const keys = [...new Set(ids.map((id) => keyOf(id).join(':')))]
    .map((k) => k.split(':').map(Number))
    .sort((a, b) => a[0] - b[0] || a[1] - b[1])
    .map((k) => k.join(':'));
  const initial = new Map(ids.map((id) => [id, keys.indexOf(keyOf(id).join(':'))]));

  const structural: Constraint[] = plan.edges
    .filter((e) => byId.has(e.from) && byId.has(e.to))
    .map((e) => ({ before: e.to, after: e.from }));
  const explicit: Constraint[] = [];
  for (const id of ids) {
    for (const dep of byId.get(id)?.shutdown.graceful?.dependencies ?? []) {
      if (byId.has(dep) && dep !== id) explicit.push({ before: id, after: dep });
    }
  }

  let levels = assignLevels(ids, initial, [...structural, ...explicit]);
  if (levels === null) {
    logger?.warn('Shutdown dependencies contradict the dependency order, ignoring them', {
      modules: [...new Set(explicit.map((c) => c.before))],
    });
    levels = assignLevels(ids, initial, structural) ?? initial;
  }

  const distinct = [...new Set(levels.values())].sort((a, b) => a - b);
  const grouped: ShutdownTask[][] = distinct.map(() => []);
  for (const id of ids) {
    const d = byId.get(id);
    if (d === undefined) continue;
    const level = distinct.indexOf(levels.get(id) ?? 0);
    const graceful = d.shutdown.graceful;
    const forced = d.shutdown.forced;
    grouped[level].push(Object.freeze({
      moduleId: id,
      level,
      priority: priorityOf(d),
      dependencies: graceful?.dependencies ?? [],
      graceful: graceful !== null
        ? { method: graceful.method, timeoutMs: graceful.timeoutMs ?? defaults.gracefulTimeoutMs }
        : null,
      forced: forced !== null
        ? { method: forced.method, timeoutMs: forced.timeoutMs ?? defaults.forcedTimeoutMs }
        : null,
    }));
  }
  return grouped;
}
