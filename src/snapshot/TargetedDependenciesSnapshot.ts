import type { TargetFramework } from '../core/target-framework.js';
import type { SubtreeProvider } from '../core/types.js';
import { createDependency, getDependencyId, sameDependency, type Dependency } from './dependency.js';
import type { DependencyChangeSet } from './changes.js';
import type { ProjectItemSpecs } from './item-specs.js';
import type { FilterContext, SnapshotFilter } from './filters/types.js';

export interface ApplyChangesOptions {
  /** Already in precedence order */
  readonly filters: readonly SnapshotFilter[];
  readonly subtreeProviders: ReadonlyMap<string, SubtreeProvider>;
  readonly projectItemSpecs: ProjectItemSpecs | null;
}

/**
 * Immutable dependency data for one target framework.
 */
export class TargetedDependenciesSnapshot {
  private topLevel: Dependency[] | null = null;

  private constructor(
    readonly projectPath: string,
    readonly targetFramework: TargetFramework,
    readonly dependencies: ReadonlyMap<string, Dependency>
  ) {}

  static createEmpty(projectPath: string, targetFramework: TargetFramework): TargetedDependenciesSnapshot {
    return new TargetedDependenciesSnapshot(projectPath, targetFramework, new Map());
  }

  get(dependencyId: string): Dependency | undefined {
    return this.dependencies.get(dependencyId);
  }

  get size(): number {
    return this.dependencies.size;
  }

  get topLevelDependencies(): readonly Dependency[] {
    this.topLevel ??= [...this.dependencies.values()].filter(dependency => dependency.topLevel);
    return this.topLevel;
  }

  get hasUnresolvedDependency(): boolean {
    for (const dependency of this.dependencies.values()) {
      if (!dependency.resolved && dependency.visible) {
        return true;
      }
    }
    return false;
  }

  withProjectPath(projectPath: string): TargetedDependenciesSnapshot {
    return projectPath === this.projectPath
      ? this
      : new TargetedDependenciesSnapshot(projectPath, this.targetFramework, this.dependencies);
  }

  /**
   * Apply removals, then additions, through the filter chain. Returns this
   * instance when the slice ends up unchanged.
   */
  applyChanges(changes: DependencyChangeSet, options: ApplyChangesOptions): TargetedDependenciesSnapshot {
    const world = new Map(this.dependencies);
    let changed = false;

    const context: FilterContext = {
      projectPath: this.projectPath,
      targetFramework: this.targetFramework,
      subtreeProviders: options.subtreeProviders,
      projectItemSpecs: options.projectItemSpecs,
      get: dependencyId => world.get(dependencyId),
      values: () => world.values(),
      addOrUpdate: dependency => {
        const existing = world.get(dependency.id);
        if (!existing || !sameDependency(existing, dependency)) {
          world.set(dependency.id, dependency);
          changed = true;
        }
      },
    };

    for (const removed of changes.removed) {
      const dependencyId = getDependencyId(this.targetFramework, removed.providerType, removed.dependencyId);
      const existing = world.get(dependencyId);
      if (!existing) {
        continue;
      }

      const vetoed = options.filters.some(filter => filter.beforeRemove?.(existing, context) === false);
      if (!vetoed) {
        world.delete(dependencyId);
        changed = true;
      }
    }

    for (const model of changes.added) {
      let dependency: Dependency | null = createDependency(this.targetFramework, model);

      for (const filter of options.filters) {
        if (!filter.beforeAddOrUpdate) {
          continue;
        }
        const result = filter.beforeAddOrUpdate(dependency, context);
        if (result.action === 'reject') {
          dependency = null;
          break;
        }
        dependency = result.dependency;
      }

      if (dependency) {
        context.addOrUpdate(dependency);
      }
    }

    return changed ? new TargetedDependenciesSnapshot(this.projectPath, this.targetFramework, world) : this;
  }
}
