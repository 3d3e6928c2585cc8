/**
 * Calling hooks referenced by name on service instances and classes.
 */

export function hasMethod(target: unknown, name: string): boolean {
  if (target === null || (typeof target !== 'object' && typeof target !== 'function')) return false;
  return typeof Reflect.get(target, name) === 'function';
}

/**
 * Invoke `target[name](...args)` with `target` bound as `this`.
 * Throws a TypeError when the member is missing or not callable.
 */
export function invokeMethod(target: unknown, name: string, ...args: unknown[]): unknown {
  if (target === null || (typeof target !== 'object' && typeof target !== 'function')) {
    throw new TypeError(`Cannot call '${name}' on ${String(target)}`);
  }
  const member: unknown = Reflect.get(target, name);
  if (typeof member !== 'function') {
    throw new TypeError(`'${name}' is not a method`);
  }
  return Reflect.apply(member, target, args);
}

/** Bind a named method to its instance, or null when absent. */
export function bindMethod(target: unknown, name: string): ((...args: unknown[]) => unknown) | null {
  if (!hasMethod(target, name)) return null;
  return (...args: unknown[]) => invokeMethod(target, name, ...args);
}
