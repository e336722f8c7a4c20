import { SNAPSHOT_CONSTANTS } from '../config/constants.js';
import { log } from '../utils/logger.js';

export type ScheduledRunStatus = 'completed' | 'superseded' | 'cancelled';

export type ScheduledAction = (signal: AbortSignal) => void | Promise<void>;

export interface DebounceSchedulerOptions {
  delayMs?: number;
  /** Lifetime signal (project unload); once aborted nothing runs any more */
  signal?: AbortSignal;
  name?: string;
}

interface PendingRun {
  timer: NodeJS.Timeout;
  controller: AbortController;
  settle: (status: ScheduledRunStatus) => void;
  release: () => void;
}

/**
 * Collapses bursts of requests into one deferred run of the latest action.
 *
 * Every `schedule` call restarts the window and supersedes whatever was still
 * waiting. The returned promise reports how that request ended; a cancelled or
 * superseded request resolves rather than rejects. A throwing action rejects
 * its own promise.
 */
export class DebounceScheduler {
  private readonly delayMs: number;
  private readonly lifetime?: AbortSignal;
  private readonly name: string;
  private pending: PendingRun | null = null;
  private disposed = false;

  constructor(options: DebounceSchedulerOptions = {}) {
    this.delayMs = options.delayMs ?? SNAPSHOT_CONSTANTS.THROTTLE_MS;
    this.lifetime = options.signal;
    this.name = options.name ?? 'DebounceScheduler';
  }

  schedule(action: ScheduledAction, signal?: AbortSignal): Promise<ScheduledRunStatus> {
    this.settlePending('superseded');

    if (this.disposed || this.lifetime?.aborted || signal?.aborted) {
      return Promise.resolve('cancelled');
    }

    return new Promise<ScheduledRunStatus>((resolve, reject) => {
      const controller = new AbortController();
      const onAbort = (): void => {
        controller.abort();
        if (this.pending === run) {
          this.settlePending('cancelled');
        }
      };

      this.lifetime?.addEventListener('abort', onAbort);
      signal?.addEventListener('abort', onAbort);

      const release = (): void => {
        this.lifetime?.removeEventListener('abort', onAbort);
        signal?.removeEventListener('abort', onAbort);
      };

      const timer = setTimeout(() => {
        if (this.pending !== run) {
          return;
        }
        this.pending = null;

        void Promise.resolve()
          .then(() => action(controller.signal))
          .then(
            () => {
              release();
              resolve(controller.signal.aborted ? 'cancelled' : 'completed');
            },
            error => {
              release();
              reject(error);
            }
          );
      }, this.delayMs);

      const run: PendingRun = {
        timer,
        controller,
        release,
        settle: status => {
          clearTimeout(timer);
          controller.abort();
          release();
          resolve(status);
        },
      };

      this.pending = run;
    });
  }

  hasPending(): boolean {
    return this.pending !== null;
  }

  private settlePending(status: ScheduledRunStatus): void {
    const run = this.pending;
    if (!run) return;
    this.pending = null;
    run.settle(status);
    log.debug(`${this.name}: pending run ${status}`);
  }

  /**
   * Cancel any pending run; later requests resolve as cancelled.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.settlePending('cancelled');
  }
}
