/**
 * Mutex implementation for coordinating async operations
 *
 * `Mutex` is a FIFO lock for async sections. `AsyncGate` builds the
 * project-context lock on top of it: one logical unit of work runs at a time,
 * callers queue behind it without blocking the event loop, and work already
 * running inside the gate may enter it again.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ObjectDisposedError } from './error-utils.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class Mutex {
  private locked = false;
  private disposed = false;
  private queue: Waiter[] = [];

  constructor(private readonly name = 'Mutex') {}

  /**
   * Check if the mutex is currently locked
   */
  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Acquire the mutex lock
   * Waits if already locked
   */
  async acquire(): Promise<void> {
    if (this.disposed) {
      throw new ObjectDisposedError(this.name);
    }

    if (!this.locked) {
      this.locked = true;
      return;
    }

    // Wait for lock to be released
    await new Promise<void>((resolve, reject) => {
      this.queue.push({ resolve, reject });
    });
  }

  /**
   * Release the mutex lock
   * Hands ownership straight to the next waiter, if any
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      next.resolve();
    } else {
      this.locked = false;
    }
  }

  /**
   * Run a function with automatic acquire/release
   * Ensures lock is always released even if function throws
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Reject every queued waiter and refuse further acquisitions.
   * The current holder finishes normally.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const waiters = this.queue.splice(0);
    for (const waiter of waiters) {
      waiter.reject(new ObjectDisposedError(this.name));
    }
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  getQueueLength(): number {
    return this.queue.length;
  }
}

interface GateHold {
  active: boolean;
}

/**
 * Exclusive asynchronous gate with re-entry for the current holder.
 *
 * Ownership follows the async context of the holder, so a nested
 * `runExclusive` issued from inside the protected work runs inline instead of
 * deadlocking behind itself.
 */
export class AsyncGate {
  private readonly mutex: Mutex;
  private readonly holder = new AsyncLocalStorage<GateHold>();

  constructor(name = 'AsyncGate') {
    this.mutex = new Mutex(name);
  }

  async runExclusive<T>(work: () => Promise<T>): Promise<T> {
    // Timers and callbacks armed inside a section inherit its store; only a
    // hold that is still active counts as re-entry
    if (this.holder.getStore()?.active) {
      return work();
    }

    await this.mutex.acquire();
    const hold: GateHold = { active: true };
    try {
      return await this.holder.run(hold, work);
    } finally {
      hold.active = false;
      this.mutex.release();
    }
  }

  isHeld(): boolean {
    return this.mutex.isLocked();
  }

  getQueueLength(): number {
    return this.mutex.getQueueLength();
  }

  dispose(): void {
    this.mutex.dispose();
  }
}
