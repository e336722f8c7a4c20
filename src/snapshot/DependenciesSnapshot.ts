import { TargetFramework } from '../core/target-framework.js';
import type { Dependency } from './dependency.js';
import type { TargetedDependenciesSnapshot } from './TargetedDependenciesSnapshot.js';

/**
 * Immutable per-target view of a project's dependencies.
 *
 * Updates always produce a new instance; an operation that changes nothing
 * returns the same instance, so reference identity means "no change".
 */
export class DependenciesSnapshot {
  private constructor(
    readonly projectPath: string,
    readonly activeTarget: TargetFramework,
    readonly targets: ReadonlyMap<string, TargetedDependenciesSnapshot>
  ) {}

  static createEmpty(projectPath: string): DependenciesSnapshot {
    return new DependenciesSnapshot(projectPath, TargetFramework.Any, new Map());
  }

  static create(
    projectPath: string,
    activeTarget: TargetFramework,
    targets: ReadonlyMap<string, TargetedDependenciesSnapshot>
  ): DependenciesSnapshot {
    return new DependenciesSnapshot(projectPath, activeTarget, targets);
  }

  get targetFrameworks(): TargetFramework[] {
    return [...this.targets.values()].map(targeted => targeted.targetFramework);
  }

  get(target: TargetFramework): TargetedDependenciesSnapshot | undefined {
    return this.targets.get(target.key);
  }

  get hasUnresolvedDependency(): boolean {
    for (const targeted of this.targets.values()) {
      if (targeted.hasUnresolvedDependency) {
        return true;
      }
    }
    return false;
  }

  findDependency(dependencyId: string): Dependency | undefined {
    const id = dependencyId.toLowerCase();
    for (const targeted of this.targets.values()) {
      const dependency = targeted.get(id);
      if (dependency) {
        return dependency;
      }
    }
    return undefined;
  }

  removeTargets(targetsToRemove: Iterable<TargetFramework>): DependenciesSnapshot {
    let remaining: Map<string, TargetedDependenciesSnapshot> | null = null;

    for (const target of targetsToRemove) {
      if (!(remaining ?? this.targets).has(target.key)) {
        continue;
      }
      remaining ??= new Map(this.targets);
      remaining.delete(target.key);
    }

    return remaining ? new DependenciesSnapshot(this.projectPath, this.activeTarget, remaining) : this;
  }

  withProjectPath(projectPath: string): DependenciesSnapshot {
    if (projectPath === this.projectPath) {
      return this;
    }

    const targets = new Map<string, TargetedDependenciesSnapshot>();
    for (const [key, targeted] of this.targets) {
      targets.set(key, targeted.withProjectPath(projectPath));
    }
    return new DependenciesSnapshot(projectPath, this.activeTarget, targets);
  }
}
