import type { AggregateProjectContext } from '../core/AggregateProjectContext.js';
import type { TargetFramework } from '../core/target-framework.js';
import type { CrossTargetSubscriber, SubscriberChangedEvent } from '../core/types.js';
import { hasChanges, type DependencyChangeSet } from '../snapshot/changes.js';
import { Emitter } from '../utils/events.js';
import { log } from '../utils/logger.js';
import { dependenciesFor, diffDependencies, manifestCatalog, type DependencyEntry, type Manifest } from './manifest.js';

export interface ManifestSource {
  readonly manifest: Manifest;
}

/**
 * Reports the per-target dependencies declared in a manifest, as differences
 * against what it last reported for the attached context.
 */
export class ManifestDependencySubscriber implements CrossTargetSubscriber {
  readonly name = 'manifest-dependencies';
  readonly order = 0;

  private readonly changed = new Emitter<SubscriberChangedEvent>('manifest-dependencies.changed');
  private readonly reported = new Map<string, readonly DependencyEntry[]>();
  private context: AggregateProjectContext | null = null;

  readonly onDependenciesChanged = this.changed.event;

  constructor(private readonly source: ManifestSource) {}

  // Manifest data is pushed through `report`; there are no evaluation feeds to link.
  initializeSubscriber(): void {}

  addSubscriptions(context: AggregateProjectContext): void {
    this.context = context;
    this.report();
  }

  releaseSubscriptions(): void {
    this.context = null;
    this.reported.clear();
  }

  get isAttached(): boolean {
    return this.context !== null;
  }

  report(): void {
    const context = this.context;
    if (!context) {
      return;
    }

    const manifest = this.source.manifest;
    const changes = new Map<TargetFramework, DependencyChangeSet>();
    for (const target of context.targetFrameworks) {
      const next = dependenciesFor(manifest, target);
      const changeSet = diffDependencies(this.reported.get(target.key) ?? [], next);
      this.reported.set(target.key, next);
      if (hasChanges(changeSet)) {
        changes.set(target, changeSet);
      }
    }

    if (changes.size === 0) {
      return;
    }

    log.debug('Manifest dependencies changed', { targets: [...changes.keys()].map(target => target.shortName) });
    this.changed.fire({
      changes,
      catalog: manifestCatalog(manifest),
      activeTarget: context.activeTargetFramework,
    });
  }

  dispose(): void {
    this.releaseSubscriptions();
    this.changed.dispose();
  }
}
