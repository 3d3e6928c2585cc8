/**
 * Dependency graph over "requires service" edges, ordered by Kahn's
 * topological sort in depth waves.
 */

import type { ModuleDescriptor } from '../descriptor.js';
import { CyclicDependencyError } from '../errors.js';
import type { DependencyEdge, DependencyPlan } from './types.js';

function compareBy(priority: ReadonlyMap<string, number>): (a: string, b: string) => number {
  return (a, b) => {
    const diff = (priority.get(a) ?? 0) - (priority.get(b) ?? 0);
    if (diff !== 0) return diff;
    return a < b ? -1 : a > b ? 1 : 0;
  };
}

/**
 * Build the Phase 2 plan for a descriptor set.
 *
 * Requirements nobody provides are reported in `unresolved` rather than
 * thrown: they fail the requiring module, not the whole start. A cycle
 * throws CyclicDependencyError naming one offending path.
 */
export function buildDependencyPlan(descriptors: readonly ModuleDescriptor[]): DependencyPlan {
  const ids = descriptors.map((d) => d.moduleId).sort();
  const byId = new Map(descriptors.map((d) => [d.moduleId, d]));
  const priority = new Map(descriptors.map((d) => [d.moduleId, d.priority]));
  const compare = compareBy(priority);

  const providers = new Map<string, string[]>();
  for (const id of ids) {
    for (const service of byId.get(id)?.services ?? []) {
      const list = providers.get(service) ?? [];
      list.push(id);
      providers.set(service, list);
    }
  }

  const edges: DependencyEdge[] = [];
  const unresolved = new Map<string, string[]>();
  const dependents = new Map<string, Set<string>>();
  const dependencies = new Map<string, Set<string>>();
  for (const id of ids) {
    dependents.set(id, new Set());
    dependencies.set(id, new Set());
  }

  for (const id of ids) {
    for (const service of byId.get(id)?.requires ?? []) {
      const provided = providers.get(service);
      if (provided === undefined) {
        const list = unresolved.get(id) ?? [];
        list.push(service);
        unresolved.set(id, list);
        continue;
      }
      for (const provider of provided) {
        if (provider === id) continue;
        edges.push({ from: provider, to: id, service });
        dependents.get(provider)?.add(id);
        dependencies.get(id)?.add(provider);
      }
    }
  }

  const inDegree = new Map<string, number>();
  for (const id of ids) {
    inDegree.set(id, dependencies.get(id)?.size ?? 0);
  }

  const waves: string[][] = [];
  const depth = new Map<string, number>();
  let current = ids.filter((id) => inDegree.get(id) === 0).sort(compare);
  while (current.length > 0) {
    waves.push(current);
    const next: string[] = [];
    for (const id of current) {
      depth.set(id, waves.length - 1);
      for (const dependent of dependents.get(id) ?? []) {
        const deg = (inDegree.get(dependent) ?? 1) - 1;
        inDegree.set(dependent, deg);
        if (deg === 0) next.push(dependent);
      }
    }
    current = next.sort(compare);
  }

  const order = waves.flat();
  if (order.length < ids.length) {
    const ordered = new Set(order);
    const remaining = ids.filter((id) => !ordered.has(id));
    throw new CyclicDependencyError(extractCycle(remaining, dependencies));
  }

  return {
    order,
    waves,
    depth,
    edges,
    providers,
    unresolved,
    dependenciesOf(moduleId: string): string[] {
      return [...(dependencies.get(moduleId) ?? [])].sort();
    },
    dependentsOf(moduleId: string, transitive: boolean = true): string[] {
      const direct = dependents.get(moduleId) ?? new Set<string>();
      if (!transitive) return [...direct].sort();
      const seen = new Set<string>();
      const queue = [...direct];
      while (queue.length > 0) {
        const next = queue.shift();
        if (next === undefined || seen.has(next)) continue;
        seen.add(next);
        queue.push(...(dependents.get(next) ?? []));
      }
      return [...seen].sort();
    },
  };
}

/**
 * Every module left after Kahn's pass still has an unprocessed dependency,
 * so walking dependencies from any of them must revisit a node.
 */
function extractCycle(remaining: string[], dependencies: ReadonlyMap<string, ReadonlySet<string>>): string[] {
  const left = new Set(remaining);
  const start = remaining[0];
  const visited: string[] = [start];
  const visitedSet = new Set([start]);
  let current = start;

  for (;;) {
    const nexts = [...(dependencies.get(current) ?? [])].filter((d) => left.has(d)).sort();
    if (nexts.length === 0) break;
    const nxt = nexts[0];
    if (visitedSet.has(nxt)) {
      const idx = visited.indexOf(nxt);
      return [...visited.slice(idx), nxt];
    }
    visited.push(nxt);
    visitedSet.add(nxt);
    current = nxt;
  }

  return [...remaining, start];
}
