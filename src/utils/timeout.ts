/**
 * Deadline helpers built on Promise.race.
 */

/** Largest delay a Node.js timer honours; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export type TimeoutOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'timeout' }
  | { status: 'error'; error: unknown };

/**
 * Race `work` against a timer. The timer is always cleared; the losing
 * promise is left to settle on its own. A non-positive timeout waits forever;
 * one above MAX_TIMER_MS is capped to it.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<TimeoutOutcome<T>> {
  const guarded = work.then(
    (value): TimeoutOutcome<T> => ({ status: 'ok', value }),
    (error: unknown): TimeoutOutcome<T> => ({ status: 'error', error }),
  );
  if (timeoutMs <= 0) {
    return guarded;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<TimeoutOutcome<T>>((resolve) => {
    timer = setTimeout(() => resolve({ status: 'timeout' }), Math.min(timeoutMs, MAX_TIMER_MS));
  });
  try {
    return await Promise.race([guarded, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/** Run a possibly-synchronous function, turning sync throws into rejections. */
export function attempt<T>(fn: () => T | Promise<T>): Promise<T> {
  try {
    return Promise.resolve(fn());
  } catch (e) {
    return Promise.reject(e);
  }
}

export function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    value !== null &&
    (typeof value === 'object' || typeof value === 'function') &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}
