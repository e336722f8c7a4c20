/**
 * Typed single-event emitter.
 *
 * Listeners are kept in registration order and invoked synchronously and in
 * isolation: a listener that throws is logged and the remaining listeners
 * still run.
 *
 * @example
 * ```typescript
 * const changed = new Emitter<{ version: number }>('changed');
 * const sub = changed.event(e => console.log(e.version));
 * changed.fire({ version: 2 });
 * sub.dispose();
 * ```
 */

import { log } from './logger.js';

export interface Disposable {
  dispose(): void;
}

export type Listener<T> = (event: T) => void;

/** Subscribe function exposed to consumers; returns the registration handle. */
export type Event<T> = (listener: Listener<T>) => Disposable;

export class Emitter<T> {
  private listeners: Listener<T>[] = [];
  private disposed = false;

  constructor(private readonly name: string) {}

  readonly event: Event<T> = (listener) => {
    if (this.disposed) {
      return { dispose: () => {} };
    }

    this.listeners.push(listener);

    return {
      dispose: () => {
        this.listeners = this.listeners.filter(candidate => candidate !== listener);
      },
    };
  };

  fire(event: T): void {
    // Snapshot so listeners may unsubscribe while being notified
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        log.error(`Listener for '${this.name}' failed`, error);
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  dispose(): void {
    this.disposed = true;
    this.listeners = [];
  }
}

/**
 * Dispose every handle, continuing past failures, and empty the array.
 */
export function disposeAll(disposables: Disposable[]): void {
  const pending = disposables.splice(0);
  for (const disposable of pending) {
    try {
      disposable.dispose();
    } catch (error) {
      log.error('Failed to dispose subscription', error);
    }
  }
}
