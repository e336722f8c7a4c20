import { Mutex } from '../utils/mutex.js';
import type { ForegroundDispatcher } from './types.js';

/**
 * Foreground resource for hosts without a UI thread: work handed over runs
 * one item at a time, in arrival order.
 */
export class SerialForegroundDispatcher implements ForegroundDispatcher {
  private readonly queue = new Mutex('foreground');

  run<T>(work: () => Promise<T>): Promise<T> {
    return this.queue.runExclusive(work);
  }

  dispose(): void {
    this.queue.dispose();
  }
}
