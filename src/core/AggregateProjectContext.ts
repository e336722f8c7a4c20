import { PROJECT_PROPERTY_NAMES } from '../config/constants.js';
import type { Disposable } from '../utils/events.js';
import type { TargetFramework, TargetFrameworkProvider } from './target-framework.js';
import type { ConfiguredProject, ProjectConfiguration } from './types.js';

export interface AggregateProjectContextOptions {
  readonly targetFrameworks: readonly TargetFramework[];
  readonly activeTargetFramework: TargetFramework;
  readonly configuredProjects: Iterable<readonly [TargetFramework, ConfiguredProject]>;
  readonly targetFrameworkProvider: TargetFrameworkProvider;
  /** Defaults to "more than one target" */
  readonly isCrossTargeting?: boolean;
  readonly onDispose?: () => void;
}

const TARGET_DIMENSION = PROJECT_PROPERTY_NAMES.TARGET_FRAMEWORK_DIMENSION;

function sameIgnoringTarget(a: ProjectConfiguration, b: ProjectConfiguration): boolean {
  const names = new Set([...a.dimensions.keys(), ...b.dimensions.keys()]);
  names.delete(TARGET_DIMENSION);
  for (const name of names) {
    if (a.dimensions.get(name) !== b.dimensions.get(name)) {
      return false;
    }
  }
  return true;
}

/**
 * The active target frameworks of a project and the configured (per-target)
 * project behind each of them, treated as one unit.
 */
export class AggregateProjectContext implements Disposable {
  readonly targetFrameworks: readonly TargetFramework[];
  readonly activeTargetFramework: TargetFramework;
  readonly isCrossTargeting: boolean;

  private readonly configuredProjects = new Map<string, ConfiguredProject>();
  private readonly targetFrameworkProvider: TargetFrameworkProvider;
  private readonly onDispose?: () => void;
  private disposed = false;

  constructor(options: AggregateProjectContextOptions) {
    this.targetFrameworks = [...options.targetFrameworks];
    this.activeTargetFramework = options.activeTargetFramework;
    this.isCrossTargeting = options.isCrossTargeting ?? this.targetFrameworks.length > 1;
    this.targetFrameworkProvider = options.targetFrameworkProvider;
    this.onDispose = options.onDispose;

    for (const [targetFramework, configuredProject] of options.configuredProjects) {
      this.configuredProjects.set(targetFramework.key, configuredProject);
    }
  }

  get innerConfiguredProjects(): ConfiguredProject[] {
    return [...this.configuredProjects.values()];
  }

  getInnerConfiguredProject(target: TargetFramework): ConfiguredProject | null {
    return this.configuredProjects.get(target.key) ?? null;
  }

  /**
   * True when the known configurations that share the active configuration's
   * non-target dimensions name exactly this context's target frameworks, and
   * the active target is unchanged.
   */
  hasMatchingTargetFrameworks(
    activeConfiguration: ProjectConfiguration,
    knownConfigurations: readonly ProjectConfiguration[]
  ): boolean {
    if (!this.isCrossTargeting) {
      return false;
    }

    const activeTarget = this.targetFrameworkProvider.getTargetFramework(
      activeConfiguration.dimensions.get(TARGET_DIMENSION)
    );
    if (!activeTarget || !activeTarget.equals(this.activeTargetFramework)) {
      return false;
    }

    const knownTargets = new Set<string>();
    for (const configuration of knownConfigurations) {
      if (!sameIgnoringTarget(configuration, activeConfiguration)) {
        continue;
      }
      const target = this.targetFrameworkProvider.getTargetFramework(configuration.dimensions.get(TARGET_DIMENSION));
      if (!target) {
        return false;
      }
      knownTargets.add(target.key);
    }

    return (
      knownTargets.size === this.targetFrameworks.length &&
      this.targetFrameworks.every(target => knownTargets.has(target.key))
    );
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.configuredProjects.clear();
    this.onDispose?.();
  }
}
