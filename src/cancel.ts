/**
 * Cooperative cancellation for long-running lifecycle hooks.
 *
 * Phase 2 and graceful shutdown hooks receive a token. The engine cancels it
 * when the hook overruns its timeout or startup is abandoned; the hook is
 * expected to notice and stop.
 */

import { HookCancelledError } from './errors.js';

type CancelListener = (reason: string) => void;

export class CancelToken {
  private _reason: string | null = null;
  private _listeners: CancelListener[] = [];
  private readonly _onListenerError: ((error: unknown) => void) | null;

  /**
   * Listener errors go to `onListenerError`. Without one, every listener
   * still runs and the first error is rethrown from `cancel()`.
   */
  constructor(options?: { onListenerError?: (error: unknown) => void }) {
    this._onListenerError = options?.onListenerError ?? null;
  }

  get isCancelled(): boolean {
    return this._reason !== null;
  }

  get reason(): string | null {
    return this._reason;
  }

  /** First call wins; listeners run once, synchronously. */
  cancel(reason = 'cancelled'): void {
    if (this._reason !== null) return;
    this._reason = reason;
    const listeners = this._listeners;
    this._listeners = [];
    const errors: unknown[] = [];
    for (const listener of listeners) {
      try {
        listener(reason);
      } catch (e) {
        if (this._onListenerError !== null) {
          this._onListenerError(e);
        } else {
          errors.push(e);
        }
      }
    }
    if (errors.length > 0) {
      throw errors[0];
    }
  }

  /** Throws HookCancelledError once cancelled. */
  check(): void {
    if (this._reason !== null) {
      throw new HookCancelledError(this._reason);
    }
  }

  /**
   * Run `listener` on cancellation, or right away if already cancelled.
   * Returns a function removing it.
   */
  onCancel(listener: CancelListener): () => void {
    if (this._reason !== null) {
      listener(this._reason);
      return () => undefined;
    }
    this._listeners.push(listener);
    return () => {
      this._listeners = this._listeners.filter((l) => l !== listener);
    };
  }

  /** Resolves when the token is cancelled. */
  whenCancelled(): Promise<string> {
    return new Promise((resolve) => {
      this.onCancel(resolve);
    });
  }
}
