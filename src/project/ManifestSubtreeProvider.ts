import type { Event, SubtreeChangedEvent, SubtreeProvider } from '../core/types.js';
import { hasChanges, type DependencyChangeSet } from '../snapshot/changes.js';
import { Emitter } from '../utils/events.js';

export interface ManifestSubtreeProviderOptions {
  providerType: string;
  implicitIcon?: string;
  order?: number;
}

/**
 * Subtree provider for one dependency type; changes are pushed in by the
 * owning project.
 */
export class ManifestSubtreeProvider implements SubtreeProvider {
  readonly providerType: string;
  readonly implicitIcon?: string;
  readonly order: number;

  private readonly changed: Emitter<SubtreeChangedEvent>;

  readonly onDependenciesChanged: Event<SubtreeChangedEvent>;

  constructor(options: ManifestSubtreeProviderOptions) {
    this.providerType = options.providerType;
    this.implicitIcon = options.implicitIcon;
    this.order = options.order ?? 0;
    this.changed = new Emitter<SubtreeChangedEvent>(`subtree.${options.providerType}`);
    this.onDependenciesChanged = this.changed.event;
  }

  /** Empty or missing `targetShortOrFullName` means "any target". */
  publish(changes: DependencyChangeSet, targetShortOrFullName?: string, signal?: AbortSignal): void {
    if (!hasChanges(changes)) {
      return;
    }
    this.changed.fire({ changes, targetShortOrFullName, signal });
  }

  dispose(): void {
    this.changed.dispose();
  }
}
