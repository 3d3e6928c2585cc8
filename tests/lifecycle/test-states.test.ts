import { describe, it, expect } from 'vitest';
import { ModuleLifecycleError } from '../../src/errors.js';
import { canTransition, ModuleState, ModuleStateMachine } from '../../src/lifecycle/states.js';
import type { StateChange } from '../../src/lifecycle/states.js';

describe('canTransition', () => {
  it('follows the bootstrap path', () => {
    expect(canTransition('discovered', 'phase1_done')).toBe(true);
    expect(canTransition('phase1_done', 'service_created')).toBe(true);
    expect(canTransition('service_created', 'phase2_done')).toBe(true);
    expect(canTransition('phase2_done', 'registered')).toBe(true);
    expect(canTransition('registered', 'running')).toBe(true);
    expect(canTransition('running', 'shutting_down')).toBe(true);
    expect(canTransition('shutting_down', 'stopped')).toBe(true);
  });

  it('forbids skipping steps and leaving terminal states', () => {
    expect(canTransition('discovered', 'service_created')).toBe(false);
    expect(canTransition('phase1_done', 'shutting_down')).toBe(false);
    expect(canTransition('stopped', 'running')).toBe(false);
    expect(canTransition('failed', 'shutting_down')).toBe(false);
  });
});

describe('ModuleStateMachine', () => {
  it('starts every module as discovered', () => {
    const states = new ModuleStateMachine(['b.mod', 'a.mod']);
    states.add('c.mod');
    states.add('a.mod');
    expect(states.snapshot()).toEqual({ 'a.mod': 'discovered', 'b.mod': 'discovered', 'c.mod': 'discovered' });
  });

  it('rejects illegal transitions', () => {
    const states = new ModuleStateMachine(['a.mod']);
    expect(() => states.transition('a.mod', ModuleState.RUNNING)).toThrow(
      'state failed for a.mod: illegal transition discovered -> running',
    );
    expect(() => states.transition('ghost', ModuleState.FAILED)).toThrow(ModuleLifecycleError);
  });

  it('keeps failure reasons and notifies listeners', () => {
    const states = new ModuleStateMachine(['a.mod']);
    const changes: StateChange[] = [];
    states.onChange((c) => changes.push(c));

    expect(states.fail('a.mod', 'boom')).toBe(true);
    expect(states.fail('a.mod', 'again')).toBe(false);
    expect(states.reason('a.mod')).toBe('boom');
    expect(changes).toEqual([{ moduleId: 'a.mod', from: 'discovered', to: 'failed', reason: 'boom' }]);
  });

  it('does not fail a stopped module', () => {
    const states = new ModuleStateMachine(['a.mod']);
    for (const s of ['phase1_done', 'service_created', 'shutting_down', 'stopped'] as const) {
      states.transition('a.mod', s);
    }
    expect(states.fail('a.mod', 'late')).toBe(false);
    expect(states.get('a.mod')).toBe('stopped');
  });

  it('lists modules in a set of states, sorted', () => {
    const states = new ModuleStateMachine(['c.mod', 'a.mod', 'b.mod']);
    states.transition('c.mod', ModuleState.PHASE1_DONE);
    states.transition('a.mod', ModuleState.PHASE1_DONE);
    states.fail('b.mod', 'x');
    expect(states.inState(ModuleState.PHASE1_DONE)).toEqual(['a.mod', 'c.mod']);
    expect(states.inState(ModuleState.PHASE1_DONE, ModuleState.FAILED)).toEqual(['a.mod', 'b.mod', 'c.mod']);
    expect(states.is('b.mod', ModuleState.FAILED)).toBe(true);
    expect(states.get('missing')).toBeNull();
  });
});
