import { DependenciesSnapshot } from '../snapshot/DependenciesSnapshot.js';

/**
 * Owner of the current snapshot reference.
 *
 * `update` is the snapshot critical section: a synchronous read-modify-write
 * that cannot interleave with another update on the event loop. Transforms
 * must not suspend and must not start a nested update.
 */
export class SnapshotStore {
  private snapshot: DependenciesSnapshot | null = null;
  private updating = false;

  constructor(private readonly projectPath: () => string) {}

  /** Materialises the empty snapshot on first access. */
  get current(): DependenciesSnapshot {
    this.snapshot ??= DependenciesSnapshot.createEmpty(this.projectPath());
    return this.snapshot;
  }

  /**
   * Replace the snapshot with `transform(current)`. Returns true when the
   * reference changed. If `transform` throws, the current snapshot stays.
   */
  update(transform: (current: DependenciesSnapshot) => DependenciesSnapshot): boolean {
    if (this.updating) {
      throw new Error('Snapshot updates must not be nested');
    }

    this.updating = true;
    try {
      const current = this.current;
      const next = transform(current);
      if (next === current) {
        return false;
      }
      this.snapshot = next;
      return true;
    } finally {
      this.updating = false;
    }
  }
}
