import { describe, it, expect } from 'vitest';
import { defineModule } from '../../src/descriptor.js';
import type { ModuleDescriptor } from '../../src/descriptor.js';
import { CyclicDependencyError } from '../../src/errors.js';
import { buildDependencyPlan } from '../../src/registry/dependencies.js';

class Svc {}

function mod(id: string, services: string[], requires: string[] = [], priority?: number): ModuleDescriptor {
  return defineModule({ id, service: services, requires, priority, serviceClass: Svc }).descriptor;
}

describe('buildDependencyPlan', () => {
  it('handles an empty set', () => {
    const plan = buildDependencyPlan([]);
    expect(plan.order).toEqual([]);
    expect(plan.waves).toEqual([]);
  });

  it('orders providers before dependents', () => {
    const plan = buildDependencyPlan([
      mod('c', ['svc.c'], ['svc.b']),
      mod('a', ['svc.a']),
      mod('b', ['svc.b'], ['svc.a']),
    ]);
    expect(plan.order).toEqual(['a', 'b', 'c']);
    expect(plan.waves).toEqual([['a'], ['b'], ['c']]);
    expect(plan.depth.get('c')).toBe(2);
    expect(plan.edges).toEqual([
      { from: 'a', to: 'b', service: 'svc.a' },
      { from: 'b', to: 'c', service: 'svc.b' },
    ]);
  });

  it('breaks ties by priority, then id', () => {
    const plan = buildDependencyPlan([
      mod('zeta', ['svc.z'], [], 10),
      mod('alpha', ['svc.alpha']),
      mod('beta', ['svc.beta'], [], 100),
      mod('gamma', ['svc.g'], ['svc.alpha'], 1),
    ]);
    expect(plan.waves).toEqual([['zeta', 'alpha', 'beta'], ['gamma']]);
    expect(plan.order).toEqual(['zeta', 'alpha', 'beta', 'gamma']);
  });

  it('places a diamond by longest path', () => {
    const plan = buildDependencyPlan([
      mod('d', [], ['svc.b', 'svc.c']),
      mod('b', ['svc.b'], ['svc.a']),
      mod('c', ['svc.c'], ['svc.b']),
      mod('a', ['svc.a']),
    ]);
    expect(plan.waves).toEqual([['a'], ['b'], ['c'], ['d']]);
  });

  it('collects unresolved requirements instead of throwing', () => {
    const plan = buildDependencyPlan([mod('d', [], ['svc.x', 'svc.y'])]);
    expect(plan.unresolved.get('d')).toEqual(['svc.x', 'svc.y']);
    expect(plan.order).toEqual(['d']);
  });

  it('links a requirement to every provider of a duplicated service', () => {
    const plan = buildDependencyPlan([
      mod('p1', ['svc.shared']),
      mod('p2', ['svc.shared']),
      mod('user', [], ['svc.shared']),
    ]);
    expect(plan.providers.get('svc.shared')).toEqual(['p1', 'p2']);
    expect(plan.dependenciesOf('user')).toEqual(['p1', 'p2']);
  });

  it('throws naming the cycle', () => {
    const descriptors = [
      mod('a', ['svc.a'], ['svc.b']),
      mod('b', ['svc.b'], ['svc.a']),
      mod('c', ['svc.c']),
    ];
    expect(() => buildDependencyPlan(descriptors)).toThrow(CyclicDependencyError);
    try {
      buildDependencyPlan(descriptors);
    } catch (e) {
      expect(e).toBeInstanceOf(CyclicDependencyError);
      if (e instanceof CyclicDependencyError) {
        expect(e.cyclePath).toEqual(['a', 'b', 'a']);
        expect(e.message).toBe('Cyclic dependency detected: a -> b -> a');
      }
    }
  });

  it('finds the cycle behind a module that merely depends on it', () => {
    const descriptors = [
      mod('a', ['svc.a'], ['svc.c']),
      mod('c', ['svc.c'], ['svc.d']),
      mod('d', ['svc.d'], ['svc.c']),
    ];
    expect(() => buildDependencyPlan(descriptors)).toThrow('Cyclic dependency detected: c -> d -> c');
  });

  it('answers dependents transitively', () => {
    const plan = buildDependencyPlan([
      mod('a', ['svc.a']),
      mod('b', ['svc.b'], ['svc.a']),
      mod('c', ['svc.c'], ['svc.b']),
      mod('x', ['svc.x']),
    ]);
    expect(plan.dependentsOf('a')).toEqual(['b', 'c']);
    expect(plan.dependentsOf('a', false)).toEqual(['b']);
    expect(plan.dependentsOf('x')).toEqual([]);
    expect(plan.dependenciesOf('c')).toEqual(['b']);
  });
});
