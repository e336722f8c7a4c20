import type {
  DependenciesSnapshotProvider,
  SnapshotChangedEvent,
  SnapshotProviderUnloadingEvent,
} from '../core/types.js';
import { disposeAll, Emitter, type Disposable } from '../utils/events.js';
import type { DependenciesSnapshot } from './DependenciesSnapshot.js';

export interface SnapshotProviderRegistry {
  registerSnapshotProvider(provider: DependenciesSnapshotProvider): Disposable;
}

interface Registration {
  provider: DependenciesSnapshotProvider;
  path: string;
  listeners: Disposable[];
}

function pathKey(projectPath: string): string {
  return projectPath.toLowerCase();
}

/**
 * Snapshot providers of every loaded project, keyed by project path.
 * Forwards their change notifications and forgets them once they unload.
 */
export class AggregateSnapshotProvider implements SnapshotProviderRegistry {
  private readonly registrations = new Map<string, Registration>();
  private readonly changed = new Emitter<SnapshotChangedEvent>('aggregate.snapshotChanged');
  private readonly unloading = new Emitter<SnapshotProviderUnloadingEvent>('aggregate.providerUnloading');

  readonly onSnapshotChanged = this.changed.event;
  readonly onSnapshotProviderUnloading = this.unloading.event;

  registerSnapshotProvider(provider: DependenciesSnapshotProvider): Disposable {
    const existing = this.registrations.get(pathKey(provider.projectFilePath));
    if (existing) {
      this.unregister(existing);
    }

    const registration: Registration = { provider, path: provider.projectFilePath, listeners: [] };
    registration.listeners.push(
      provider.onSnapshotChanged(event => this.changed.fire(event)),
      provider.onSnapshotRenamed(event => {
        if (this.registrations.get(pathKey(event.oldPath)) === registration) {
          this.registrations.delete(pathKey(event.oldPath));
        }
        registration.path = event.newPath;
        this.registrations.set(pathKey(event.newPath), registration);
      }),
      provider.onSnapshotProviderUnloading(event => {
        this.unregister(registration);
        this.unloading.fire(event);
      })
    );

    this.registrations.set(pathKey(registration.path), registration);

    return { dispose: () => this.unregister(registration) };
  }

  getSnapshotProvider(projectPath: string): DependenciesSnapshotProvider | null {
    return this.registrations.get(pathKey(projectPath))?.provider ?? null;
  }

  getSnapshots(): DependenciesSnapshot[] {
    return [...this.registrations.values()].map(registration => registration.provider.currentSnapshot);
  }

  get size(): number {
    return this.registrations.size;
  }

  private unregister(registration: Registration): void {
    disposeAll(registration.listeners);
    if (this.registrations.get(pathKey(registration.path)) === registration) {
      this.registrations.delete(pathKey(registration.path));
    }
  }
}
