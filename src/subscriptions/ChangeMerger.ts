import { orderByPrecedence } from '../core/precedence.js';
import type { TargetFramework } from '../core/target-framework.js';
import type { SubtreeProvider } from '../core/types.js';
import { DependenciesSnapshot } from '../snapshot/DependenciesSnapshot.js';
import { TargetedDependenciesSnapshot } from '../snapshot/TargetedDependenciesSnapshot.js';
import { hasChanges, type TargetedChanges } from '../snapshot/changes.js';
import { extractProjectItemSpecs, type ProjectCatalog, type ProjectItemSpecs } from '../snapshot/item-specs.js';
import type { SnapshotFilter } from '../snapshot/filters/types.js';

export interface MergeInput {
  readonly previous: DependenciesSnapshot;
  readonly changes: TargetedChanges;
  readonly catalog: ProjectCatalog | null;
  readonly activeTarget: TargetFramework | null;
  /** In precedence order; see `orderByPrecedence` */
  readonly filters: readonly SnapshotFilter[];
  readonly subtreeProviders: ReadonlyMap<string, SubtreeProvider>;
  /** Precomputed from `catalog`; derived from it when omitted */
  readonly projectItemSpecs?: ProjectItemSpecs | null;
}

/**
 * Index providers by type. Providers are ordered by precedence first, so the
 * preferred provider for a type wins.
 */
export function indexSubtreeProviders(providers: readonly SubtreeProvider[]): Map<string, SubtreeProvider> {
  const byType = new Map<string, SubtreeProvider>();
  for (const provider of orderByPrecedence(providers)) {
    byType.set(provider.providerType, provider);
  }
  return byType;
}

/**
 * Apply per-target change sets to `previous`.
 *
 * Pure: `previous` is never modified, and when no slice and no active target
 * changed the very same instance is returned. A filter that throws aborts the
 * whole batch before anything is published.
 */
export function mergeChanges(input: MergeInput): DependenciesSnapshot {
  const { previous } = input;

  // Item spec validation needs a catalog; without one there is no data
  const projectItemSpecs = input.catalog
    ? input.projectItemSpecs ?? extractProjectItemSpecs(input.catalog)
    : null;

  const options = {
    filters: input.filters,
    subtreeProviders: input.subtreeProviders,
    projectItemSpecs,
  };

  let targets: Map<string, TargetedDependenciesSnapshot> | null = null;

  for (const [targetFramework, changeSet] of input.changes) {
    if (!hasChanges(changeSet)) {
      continue;
    }

    const current =
      (targets ?? previous.targets).get(targetFramework.key) ??
      TargetedDependenciesSnapshot.createEmpty(previous.projectPath, targetFramework);

    const updated = current.applyChanges(changeSet, options);
    if (updated !== current) {
      targets ??= new Map(previous.targets);
      targets.set(targetFramework.key, updated);
    }
  }

  const activeTarget =
    input.activeTarget && !input.activeTarget.equals(previous.activeTarget)
      ? input.activeTarget
      : previous.activeTarget;

  if (!targets && activeTarget === previous.activeTarget) {
    return previous;
  }

  return DependenciesSnapshot.create(previous.projectPath, activeTarget, targets ?? previous.targets);
}
