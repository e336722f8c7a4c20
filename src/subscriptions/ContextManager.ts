import type { AggregateProjectContext } from '../core/AggregateProjectContext.js';
import type { TargetFramework, TargetFrameworkProvider } from '../core/target-framework.js';
import {
  isCrossTargetingConfiguration,
  type ActiveConfigurationRefreshService,
  type ConfiguredProject,
  type ForegroundDispatcher,
  type ProjectConfigurationService,
  type ProjectContextProvider,
} from '../core/types.js';
import { ObjectDisposedError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { AsyncGate } from '../utils/mutex.js';

export interface ContextManagerOptions {
  contextProvider: ProjectContextProvider;
  configurationService: ProjectConfigurationService;
  refreshService: ActiveConfigurationRefreshService;
  foreground: ForegroundDispatcher;
  targetFrameworkProvider: TargetFrameworkProvider;
  /**
   * Invoked inside the context lock right after a different context was
   * installed. Must not suspend.
   */
  onContextReplaced?: (previous: AggregateProjectContext | null, next: AggregateProjectContext) => void;
}

export interface ContextRefreshResult {
  readonly context: AggregateProjectContext;
  readonly previous: AggregateProjectContext | null;
  /** Identity comparison of `context` and `previous` */
  readonly changed: boolean;
}

/**
 * Targets present in `previous` but not in `next`; all of them when `next` is absent.
 */
export function computeRemovedTargets(
  previous: AggregateProjectContext | null,
  next: AggregateProjectContext | null
): TargetFramework[] {
  if (!previous) {
    return [];
  }
  if (!next) {
    return [...previous.targetFrameworks];
  }
  return previous.targetFrameworks.filter(
    target => !next.targetFrameworks.some(candidate => candidate.equals(target))
  );
}

/**
 * Sole owner of the current aggregate project context.
 *
 * Every read and refresh goes through one exclusive gate, so only one unit of
 * context work is in flight; concurrent refreshes queue and then observe the
 * context installed by the one before them. The context is replaced only once
 * the provider has produced a new one.
 */
export class ContextManager {
  private readonly gate = new AsyncGate('ContextManager');
  private current: AggregateProjectContext | null = null;
  private disposed = false;

  constructor(private readonly options: ContextManagerOptions) {}

  getCurrentContext(): Promise<AggregateProjectContext | null> {
    return this.gate.runExclusive(async () => this.current);
  }

  getOrCreateContext(): Promise<AggregateProjectContext> {
    return this.gate.runExclusive(async () => {
      if (this.current) {
        return this.current;
      }
      const result = await this.refreshCore();
      return result.context;
    });
  }

  /**
   * Recreate the context if the project's declared target frameworks no
   * longer match it; reuse it otherwise.
   */
  refreshIfTargetsChanged(): Promise<ContextRefreshResult> {
    return this.gate.runExclusive(() => this.refreshCore());
  }

  getConfiguredProject(target: TargetFramework): Promise<ConfiguredProject | null> {
    return this.gate.runExclusive(async () => this.current?.getInnerConfiguredProject(target) ?? null);
  }

  /** Synchronous identity check; never blocks on the gate. */
  isCurrent(context: AggregateProjectContext): boolean {
    return this.current === context;
  }

  private async refreshCore(): Promise<ContextRefreshResult> {
    if (this.disposed) {
      throw new ObjectDisposedError('ContextManager');
    }

    const previous = this.current;

    if (previous && (await this.isUpToDate(previous))) {
      log.debug('Reusing project context', {
        targets: previous.targetFrameworks.map(target => target.shortName),
      });
      return { context: previous, previous, changed: false };
    }

    await this.options.foreground.run(() => this.options.refreshService.refreshActiveConfiguration());

    const next = await this.options.contextProvider.createProjectContext();
    if (next === previous) {
      return { context: next, previous, changed: false };
    }

    this.current = next;
    log.debug('Created project context', {
      targets: next.targetFrameworks.map(target => target.shortName),
      active: next.activeTargetFramework.shortName,
      crossTargeting: next.isCrossTargeting,
    });

    this.options.onContextReplaced?.(previous, next);

    return { context: next, previous, changed: true };
  }

  private async isUpToDate(previous: AggregateProjectContext): Promise<boolean> {
    const { configurationService, targetFrameworkProvider } = this.options;

    if (!previous.isCrossTargeting) {
      const declared = await configurationService.readTargetFramework();
      const target = targetFrameworkProvider.getTargetFramework(declared);
      // An unresolvable target is treated as a change: recreate rather than reuse
      return target !== null && previous.activeTargetFramework.equals(target);
    }

    const active = configurationService.getActiveConfiguration();
    const known = await configurationService.getKnownConfigurations();
    return known.every(isCrossTargetingConfiguration) && previous.hasMatchingTargetFrameworks(active, known);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.gate.dispose();
  }
}
