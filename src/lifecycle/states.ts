/**
 * Per-module lifecycle states and the transitions between them.
 */

import { ModuleLifecycleError } from '../errors.js';

export const ModuleState = Object.freeze({
  DISCOVERED: 'discovered',
  PHASE1_DONE: 'phase1_done',
  SERVICE_CREATED: 'service_created',
  PHASE2_DONE: 'phase2_done',
  REGISTERED: 'registered',
  RUNNING: 'running',
  SHUTTING_DOWN: 'shutting_down',
  STOPPED: 'stopped',
  FAILED: 'failed',
} as const);

export type ModuleState = (typeof ModuleState)[keyof typeof ModuleState];

const TRANSITIONS: Readonly<Record<ModuleState, readonly ModuleState[]>> = {
  discovered: ['phase1_done', 'failed'],
  phase1_done: ['service_created', 'failed'],
  service_created: ['phase2_done', 'shutting_down', 'failed'],
  phase2_done: ['registered', 'shutting_down', 'failed'],
  registered: ['running', 'shutting_down', 'failed'],
  running: ['shutting_down', 'failed'],
  shutting_down: ['stopped', 'failed'],
  stopped: [],
  failed: [],
};

export function canTransition(from: ModuleState, to: ModuleState): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface StateChange {
  moduleId: string;
  from: ModuleState;
  to: ModuleState;
  reason: string | null;
}

/** Tracks the state of every module in a run. `failed` and `stopped` are terminal. */
export class ModuleStateMachine {
  private _states: Map<string, ModuleState> = new Map();
  private _reasons: Map<string, string> = new Map();
  private _listeners: Array<(change: StateChange) => void> = [];

  constructor(moduleIds?: Iterable<string>) {
    for (const id of moduleIds ?? []) {
      this._states.set(id, ModuleState.DISCOVERED);
    }
  }

  add(moduleId: string): void {
    if (!this._states.has(moduleId)) {
      this._states.set(moduleId, ModuleState.DISCOVERED);
    }
  }

  get(moduleId: string): ModuleState | null {
    return this._states.get(moduleId) ?? null;
  }

  is(moduleId: string, ...states: ModuleState[]): boolean {
    const current = this._states.get(moduleId);
    return current !== undefined && states.includes(current);
  }

  transition(moduleId: string, to: ModuleState, reason?: string): void {
    const from = this._states.get(moduleId);
    if (from === undefined) {
      throw new ModuleLifecycleError(moduleId, 'state', 'unknown module');
    }
    if (!canTransition(from, to)) {
      throw new ModuleLifecycleError(moduleId, 'state', `illegal transition ${from} -> ${to}`);
    }
    this._states.set(moduleId, to);
    if (reason !== undefined) {
      this._reasons.set(moduleId, reason);
    }
    for (const listener of this._listeners) {
      listener({ moduleId, from, to, reason: reason ?? null });
    }
  }

  /** Mark a module failed unless it already reached a terminal state. */
  fail(moduleId: string, reason: string): boolean {
    if (this.is(moduleId, ModuleState.FAILED, ModuleState.STOPPED)) return false;
    this.transition(moduleId, ModuleState.FAILED, reason);
    return true;
  }

  reason(moduleId: string): string | null {
    return this._reasons.get(moduleId) ?? null;
  }

  onChange(listener: (change: StateChange) => void): void {
    this._listeners.push(listener);
  }

  inState(...states: ModuleState[]): string[] {
    return [...this._states.entries()]
      .filter(([, s]) => states.includes(s))
      .map(([id]) => id)
      .sort();
  }

  snapshot(): Record<string, ModuleState> {
    const result: Record<string, ModuleState> = {};
    for (const id of [...this._states.keys()].sort()) {
      const state = this._states.get(id);
      if (state !== undefined) result[id] = state;
    }
    return result;
  }
}
