import type { TargetFramework } from '../core/target-framework.js';
import type { DependencyModel } from './dependency.js';

export interface RemovedDependency {
  readonly providerType: string;
  /** Provider-scoped id, as in `DependencyModel.id` */
  readonly dependencyId: string;
}

/**
 * Additions (or updates, when the id already exists) and removals for one target.
 */
export interface DependencyChangeSet {
  readonly added: readonly DependencyModel[];
  readonly removed: readonly RemovedDependency[];
}

export type TargetedChanges = ReadonlyMap<TargetFramework, DependencyChangeSet>;

export const NO_CHANGES: DependencyChangeSet = Object.freeze({ added: [], removed: [] });

export function hasChanges(changes: DependencyChangeSet | null | undefined): boolean {
  return !!changes && (changes.added.length > 0 || changes.removed.length > 0);
}

export function anyChanges(changes: TargetedChanges): boolean {
  for (const changeSet of changes.values()) {
    if (hasChanges(changeSet)) {
      return true;
    }
  }
  return false;
}

export function createChangeSet(
  added: readonly DependencyModel[] = [],
  removed: readonly RemovedDependency[] = []
): DependencyChangeSet {
  return { added: [...added], removed: [...removed] };
}
