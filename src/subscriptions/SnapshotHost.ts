import { PROJECT_PROPERTY_NAMES } from '../config/constants.js';
import type { AggregateProjectContext } from '../core/AggregateProjectContext.js';
import { orderByPrecedence } from '../core/precedence.js';
import { TargetFramework, type TargetFrameworkProvider } from '../core/target-framework.js';
import type {
  ActiveConfigurationRefreshService,
  ConfiguredProject,
  CrossTargetSubscriber,
  CrossTargetSubscriptionsHost,
  DependenciesSnapshotProvider,
  ForegroundDispatcher,
  ProjectConfigurationService,
  ProjectContextProvider,
  ProjectRenamedEvent,
  ProjectSubscriptionService,
  ProjectSubscriptionUpdate,
  ProjectTasksService,
  SnapshotChangedEvent,
  SnapshotProviderUnloadingEvent,
  SnapshotRenamedEvent,
  SubscriberChangedEvent,
  SubtreeChangedEvent,
  SubtreeProvider,
  UnconfiguredProject,
} from '../core/types.js';
import type { DependenciesSnapshot } from '../snapshot/DependenciesSnapshot.js';
import type { SnapshotProviderRegistry } from '../snapshot/AggregateSnapshotProvider.js';
import { anyChanges, hasChanges, type TargetedChanges } from '../snapshot/changes.js';
import type { SnapshotFilter } from '../snapshot/filters/types.js';
import { extractProjectItemSpecs, type ProjectCatalog } from '../snapshot/item-specs.js';
import { isCancellationError } from '../utils/error-utils.js';
import { disposeAll, Emitter, type Disposable } from '../utils/events.js';
import { log } from '../utils/logger.js';
import { indexSubtreeProviders, mergeChanges } from './ChangeMerger.js';
import { computeRemovedTargets, ContextManager } from './ContextManager.js';
import { DebounceScheduler } from './DebounceScheduler.js';
import { SnapshotStore } from './SnapshotStore.js';
import { SubscriptionRegistry } from './SubscriptionRegistry.js';

export type HostState = 'uninitialized' | 'initializing' | 'ready' | 'unloading' | 'disposed';

export interface SnapshotHostDependencies {
  project: UnconfiguredProject;
  tasks: ProjectTasksService;
  /** Evaluation feed of the active configured project */
  activeSubscriptionService: ProjectSubscriptionService;
  contextProvider: ProjectContextProvider;
  configurationService: ProjectConfigurationService;
  refreshService: ActiveConfigurationRefreshService;
  foreground: ForegroundDispatcher;
  targetFrameworkProvider: TargetFrameworkProvider;
  subscribers?: readonly CrossTargetSubscriber[];
  subtreeProviders?: readonly SubtreeProvider[];
  filters?: readonly SnapshotFilter[];
  snapshotProviderRegistry?: SnapshotProviderRegistry;
}

export interface SnapshotHostOptions {
  /** Notification debounce window; defaults to 250 ms */
  throttleMs?: number;
}

/**
 * True when the configuration batch touches TargetFramework or TargetFrameworks.
 */
export function hasTargetFrameworksChanged(update: ProjectSubscriptionUpdate): boolean {
  const change = update.projectChanges.get(PROJECT_PROPERTY_NAMES.CONFIGURATION_GENERAL_RULE);
  return (
    !!change &&
    (change.changedProperties.has(PROJECT_PROPERTY_NAMES.TARGET_FRAMEWORK) ||
      change.changedProperties.has(PROJECT_PROPERTY_NAMES.TARGET_FRAMEWORKS))
  );
}

/**
 * Keeps one authoritative dependency snapshot per project.
 *
 * Change events from subscribers and subtree providers are merged into the
 * snapshot one at a time and announced through a debounced `snapshotChanged`
 * notification. Configuration changes that touch the target frameworks
 * refresh the project context and rebuild the subscriptions around it.
 */
export class SnapshotHost implements DependenciesSnapshotProvider, CrossTargetSubscriptionsHost {
  private state: HostState = 'uninitialized';
  private disposing = false;
  private initialization: Promise<void> | null = null;
  private initialSubscriptionsAdded = false;
  private projectPath: string;

  private readonly store: SnapshotStore;
  private readonly scheduler: DebounceScheduler;
  private readonly contextManager: ContextManager;
  private readonly registry: SubscriptionRegistry;
  private readonly filters: readonly SnapshotFilter[];
  private readonly subtreeProviders: readonly SubtreeProvider[];
  private readonly subtreeProvidersByType: ReadonlyMap<string, SubtreeProvider>;
  private readonly projectListeners: Disposable[] = [];
  private readonly providerListeners: Disposable[] = [];
  private registration: Disposable | null = null;

  private readonly snapshotChanged = new Emitter<SnapshotChangedEvent>('snapshotChanged');
  private readonly snapshotRenamed = new Emitter<SnapshotRenamedEvent>('snapshotRenamed');
  private readonly providerUnloading = new Emitter<SnapshotProviderUnloadingEvent>('snapshotProviderUnloading');

  readonly onSnapshotChanged = this.snapshotChanged.event;
  readonly onSnapshotRenamed = this.snapshotRenamed.event;
  readonly onSnapshotProviderUnloading = this.providerUnloading.event;

  constructor(
    private readonly deps: SnapshotHostDependencies,
    options: SnapshotHostOptions = {}
  ) {
    this.projectPath = deps.project.fullPath;
    this.store = new SnapshotStore(() => this.projectPath);
    this.scheduler = new DebounceScheduler({
      delayMs: options.throttleMs,
      signal: deps.tasks.unloadSignal,
      name: 'snapshot-notifications',
    });
    this.contextManager = new ContextManager({
      contextProvider: deps.contextProvider,
      configurationService: deps.configurationService,
      refreshService: deps.refreshService,
      foreground: deps.foreground,
      targetFrameworkProvider: deps.targetFrameworkProvider,
      onContextReplaced: (previous, next) => this.onAggregateContextChanged(previous, next),
    });
    this.registry = new SubscriptionRegistry({
      subscribers: deps.subscribers ?? [],
      onConfigurationChanged: update => this.onProjectChangedCore(update),
    });
    this.filters = orderByPrecedence(deps.filters ?? []);
    this.subtreeProviders = orderByPrecedence(deps.subtreeProviders ?? []);
    this.subtreeProvidersByType = indexSubtreeProviders(this.subtreeProviders);
  }

  get currentSnapshot(): DependenciesSnapshot {
    return this.store.current;
  }

  get projectFilePath(): string {
    return this.projectPath;
  }

  get lifecycleState(): HostState {
    return this.state;
  }

  private get isShuttingDown(): boolean {
    return (
      this.disposing ||
      this.state === 'unloading' ||
      this.state === 'disposed' ||
      this.deps.tasks.unloadSignal.aborted
    );
  }

  /**
   * Structural-load signal: link the evaluation feed, hook up subscribers and
   * initialize. Repeated calls are ignored.
   */
  async onProjectFactoryCompleted(): Promise<void> {
    if (this.isShuttingDown || this.initialSubscriptionsAdded) {
      return;
    }
    this.initialSubscriptionsAdded = true;

    try {
      await this.deps.tasks.loadedProject(async () => {
        this.registry.linkToFeed(this.deps.activeSubscriptionService.projectRuleSource, update =>
          this.onProjectChanged(update)
        );
        this.registry.initializeSubscribers(this, this.deps.activeSubscriptionService, event =>
          this.onSubscriberDependenciesChanged(event)
        );
      });

      await this.ensureInitialized();
    } catch (error) {
      if (isCancellationError(error)) {
        log.debug('Project unloaded before dependency subscriptions were initialized');
        this.abandonInitialization();
        return;
      }
      throw error;
    }
  }

  async getCurrentContext(): Promise<AggregateProjectContext | null> {
    if (this.isShuttingDown) {
      return null;
    }

    await this.ensureInitialized();
    return this.contextManager.getCurrentContext();
  }

  getConfiguredProject(target: TargetFramework): Promise<ConfiguredProject | null> {
    if (this.isShuttingDown) {
      return Promise.resolve(null);
    }
    return this.contextManager.getConfiguredProject(target);
  }

  private ensureInitialized(): Promise<void> {
    // One-shot latch: the first trigger starts initialization, later ones share it
    this.initialization ??= this.initialize();
    return this.initialization;
  }

  private async initialize(): Promise<void> {
    this.state = 'initializing';

    try {
      await this.updateProjectContextAndSubscriptions();
    } catch (error) {
      if (isCancellationError(error)) {
        this.abandonInitialization();
      }
      throw error;
    }

    if (this.isShuttingDown) {
      this.abandonInitialization();
      return;
    }

    this.projectListeners.push(
      this.deps.project.onUnloading(() => this.onProjectUnloading()),
      this.deps.project.onRenamed(event => this.onProjectRenamed(event))
    );

    this.registration = this.deps.snapshotProviderRegistry?.registerSnapshotProvider(this) ?? null;

    for (const provider of this.subtreeProviders) {
      this.providerListeners.push(
        provider.onDependenciesChanged(event => this.onSubtreeProviderDependenciesChanged(event))
      );
    }

    this.state = 'ready';
    log.debug('Dependency snapshot host ready', { project: this.projectPath });
  }

  private async onProjectChanged(update: ProjectSubscriptionUpdate): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    try {
      await this.ensureInitialized();
    } catch (error) {
      if (isCancellationError(error)) return;
      throw error;
    }

    await this.onProjectChangedCore(update);
  }

  private async onProjectChangedCore(update: ProjectSubscriptionUpdate): Promise<void> {
    if (this.isShuttingDown || !hasTargetFrameworksChanged(update)) {
      return;
    }

    try {
      await this.updateProjectContextAndSubscriptions();
    } catch (error) {
      if (isCancellationError(error)) return;
      throw error;
    }
  }

  private async updateProjectContextAndSubscriptions(): Promise<void> {
    const { context, previous, changed } = await this.contextManager.refreshIfTargetsChanged();
    if (!changed) {
      return;
    }

    this.registry.releaseAll();
    previous?.dispose();

    await this.deps.tasks.loadedProject(async () => {
      // A later refresh may have installed a newer context meanwhile
      if (this.isShuttingDown || !this.contextManager.isCurrent(context)) {
        return;
      }
      this.registry.addSubscriptions(context);
    });
  }

  private onAggregateContextChanged(previous: AggregateProjectContext | null, next: AggregateProjectContext): void {
    const targetsToClean = computeRemovedTargets(previous, next);
    if (targetsToClean.length === 0) {
      return;
    }

    this.store.update(snapshot => snapshot.removeTargets(targetsToClean));
    this.scheduleDependenciesUpdate();
  }

  private onSubscriberDependenciesChanged(event: SubscriberChangedEvent): void {
    if (this.isShuttingDown || !anyChanges(event.changes)) {
      return;
    }

    this.updateDependenciesSnapshot(event.changes, event.catalog, event.activeTarget);
  }

  private onSubtreeProviderDependenciesChanged(event: SubtreeChangedEvent): void {
    if (this.isShuttingDown || !hasChanges(event.changes)) {
      return;
    }

    const targetFramework = this.resolveTargetFramework(event.targetShortOrFullName);
    const changes: TargetedChanges = new Map([[targetFramework, event.changes]]);

    this.updateDependenciesSnapshot(changes, null, null, event.signal);
  }

  private resolveTargetFramework(shortOrFullName: string | null | undefined): TargetFramework {
    if (!shortOrFullName || TargetFramework.Any.equals(shortOrFullName)) {
      return TargetFramework.Any;
    }
    return this.deps.targetFrameworkProvider.getTargetFramework(shortOrFullName) ?? TargetFramework.Any;
  }

  private updateDependenciesSnapshot(
    changes: TargetedChanges,
    catalog: ProjectCatalog | null,
    activeTarget: TargetFramework | null,
    signal?: AbortSignal
  ): void {
    const projectItemSpecs = extractProjectItemSpecs(catalog);

    // Incremental updates: the store applies them strictly one at a time
    const changed = this.store.update(previous =>
      mergeChanges({
        previous,
        changes,
        catalog,
        activeTarget,
        filters: this.filters,
        subtreeProviders: this.subtreeProvidersByType,
        projectItemSpecs,
      })
    );

    if (changed) {
      this.scheduleDependenciesUpdate(signal);
    }
  }

  private scheduleDependenciesUpdate(signal?: AbortSignal): void {
    void this.scheduler
      .schedule(runSignal => {
        if (runSignal.aborted || this.isShuttingDown) {
          return;
        }
        this.snapshotChanged.fire({ snapshot: this.store.current, signal: runSignal });
      }, signal)
      .then(
        status => log.debug('Snapshot notification finished', { status }),
        error => log.error('Snapshot notification failed', error)
      );
  }

  private onProjectRenamed(event: ProjectRenamedEvent): void {
    if (this.isShuttingDown) {
      return;
    }
    this.projectPath = event.newPath;
    this.store.update(snapshot => snapshot.withProjectPath(event.newPath));
    this.snapshotRenamed.fire({ oldPath: event.oldPath, newPath: event.newPath });
  }

  private onProjectUnloading(): void {
    if (this.isShuttingDown) {
      return;
    }
    this.beginUnloading();
  }

  /**
   * Unload began while initialization was still running, before the
   * unloading listener was registered.
   */
  private abandonInitialization(): void {
    if (this.disposing || this.state === 'unloading' || this.state === 'disposed') {
      return;
    }
    this.beginUnloading();
  }

  private beginUnloading(): void {
    this.state = 'unloading';

    disposeAll(this.projectListeners);

    this.providerUnloading.fire({ provider: this });

    this.registry.detachSubscribers();
    disposeAll(this.providerListeners);
    this.registry.releaseAll();
    log.debug('Dependency snapshot host unloading', { project: this.projectPath });
  }

  dispose(): void {
    if (this.state === 'disposed') {
      return;
    }
    this.disposing = true;

    disposeAll(this.projectListeners);
    this.registration?.dispose();
    this.registration = null;

    this.scheduler.dispose();
    this.contextManager.dispose();

    if (this.initialization) {
      this.registry.releaseAll();
    }
    this.registry.detachSubscribers();
    disposeAll(this.providerListeners);

    this.snapshotChanged.dispose();
    this.snapshotRenamed.dispose();
    this.providerUnloading.dispose();

    this.state = 'disposed';
  }
}
