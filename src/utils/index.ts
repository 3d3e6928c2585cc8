export { matchPattern } from './pattern.js';
export { MAX_TIMER_MS, withTimeout, attempt, isThenable } from './timeout.js';
export type { TimeoutOutcome } from './timeout.js';
export { hasMethod, invokeMethod, bindMethod } from './invoke.js';

/**
 * Copy arrays and plain objects recursively so freezing the copy leaves the
 * caller's data alone. Anything else (class instances, functions) is shared.
 */
export function cloneData<T>(value: T): T;
export function cloneData(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => cloneData(item));
  }
  if (value !== null && typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
      const copy: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        copy[key] = cloneData(item);
      }
      return copy;
    }
  }
  return value;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}
