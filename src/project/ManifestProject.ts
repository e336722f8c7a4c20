import path from 'path';
import chokidar from 'chokidar';
import { PROJECT_PROPERTY_NAMES, WATCHER_CONSTANTS } from '../config/constants.js';
import { AggregateProjectContext } from '../core/AggregateProjectContext.js';
import { SerialForegroundDispatcher } from '../core/foreground.js';
import { ProjectLifetime } from '../core/ProjectLifetime.js';
import { DefaultTargetFrameworkProvider, TargetFramework } from '../core/target-framework.js';
import type {
  ActiveConfigurationRefreshService,
  ConfiguredProject,
  ProjectConfiguration,
  ProjectConfigurationService,
  ProjectContextProvider,
  ProjectSubscriptionUpdate,
} from '../core/types.js';
import type { SnapshotProviderRegistry } from '../snapshot/AggregateSnapshotProvider.js';
import { createDefaultFilters, type SnapshotFilter } from '../snapshot/filters/index.js';
import { SnapshotHost } from '../subscriptions/SnapshotHost.js';
import { getErrorMessage, ManifestValidationError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import { ManifestChangeFeed } from './ManifestChangeFeed.js';
import { ManifestDependencySubscriber } from './ManifestDependencySubscriber.js';
import { ManifestSubtreeProvider, type ManifestSubtreeProviderOptions } from './ManifestSubtreeProvider.js';
import {
  activeTargetName,
  dependenciesFor,
  diffDependencies,
  PROVIDER_TYPES,
  readManifest,
  type DependencyEntry,
  type Manifest,
} from './manifest.js';

const SUBTREE_PROVIDERS: readonly ManifestSubtreeProviderOptions[] = [
  { providerType: PROVIDER_TYPES.PACKAGE, implicitIcon: 'PackageImplicit' },
  { providerType: PROVIDER_TYPES.PROJECT, implicitIcon: 'ProjectImplicit' },
  { providerType: PROVIDER_TYPES.ANALYZER },
];

export interface ManifestHostOptions {
  throttleMs?: number;
  /** Defaults to every built-in filter */
  filters?: readonly SnapshotFilter[];
  registry?: SnapshotProviderRegistry;
}

type ManifestWatcher = ReturnType<typeof chokidar.watch>;

function sameNames(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, index) => name.toLowerCase() === b[index]?.toLowerCase());
}

/**
 * A project described by a `depsnap.json` manifest.
 *
 * Plays every role the snapshot host expects from the project system:
 * lifetime, evaluation feeds, configuration queries and context creation.
 * Manifest edits become configuration batches (when the targets move) and
 * dependency changes.
 */
export class ManifestProject
  implements ProjectContextProvider, ProjectConfigurationService, ActiveConfigurationRefreshService
{
  readonly lifetime: ProjectLifetime;
  readonly activeFeed = new ManifestChangeFeed();
  readonly subscriber: ManifestDependencySubscriber;
  readonly subtreeProviders: readonly ManifestSubtreeProvider[];
  readonly targetFrameworkProvider = new DefaultTargetFrameworkProvider();
  readonly foreground = new SerialForegroundDispatcher();

  private current: Manifest;
  private version = 0;
  private contextCount = 0;
  private reportedShared: readonly DependencyEntry[] = [];
  private readonly configuredFeeds = new Set<ManifestChangeFeed>();
  private readonly reloads = new Mutex('manifest-reload');
  private watcher: ManifestWatcher | null = null;

  constructor(manifestPath: string, manifest: Manifest) {
    this.lifetime = new ProjectLifetime(path.resolve(manifestPath));
    this.current = manifest;
    this.subscriber = new ManifestDependencySubscriber(this);
    this.subtreeProviders = SUBTREE_PROVIDERS.map(options => new ManifestSubtreeProvider(options));
  }

  static async load(manifestPath: string): Promise<ManifestProject> {
    const fullPath = path.resolve(manifestPath);
    return new ManifestProject(fullPath, await readManifest(fullPath));
  }

  get manifest(): Manifest {
    return this.current;
  }

  get manifestPath(): string {
    return this.lifetime.fullPath;
  }

  get isCrossTargeting(): boolean {
    return this.current.targetFrameworks.length > 1;
  }

  /** Number of project contexts created so far */
  get contextsCreated(): number {
    return this.contextCount;
  }

  /**
   * Create a snapshot host over this project, complete its initialization and
   * report the dependencies that apply to every target.
   */
  async open(options: ManifestHostOptions = {}): Promise<SnapshotHost> {
    const host = new SnapshotHost(
      {
        project: this.lifetime,
        tasks: this.lifetime,
        activeSubscriptionService: this.activeFeed,
        contextProvider: this,
        configurationService: this,
        refreshService: this,
        foreground: this.foreground,
        targetFrameworkProvider: this.targetFrameworkProvider,
        subscribers: [this.subscriber],
        subtreeProviders: this.subtreeProviders,
        filters: options.filters ?? createDefaultFilters(),
        snapshotProviderRegistry: options.registry,
      },
      { throttleMs: options.throttleMs }
    );

    await host.onProjectFactoryCompleted();
    this.publishSharedDependencies();
    return host;
  }

  async readTargetFramework(): Promise<string | undefined> {
    // The outer project of a cross-targeting build has no single TargetFramework
    return this.isCrossTargeting ? undefined : this.current.targetFrameworks[0];
  }

  getActiveConfiguration(): ProjectConfiguration {
    return this.configurationFor(activeTargetName(this.current));
  }

  async getKnownConfigurations(): Promise<readonly ProjectConfiguration[]> {
    return this.current.targetFrameworks.map(name => this.configurationFor(name));
  }

  async refreshActiveConfiguration(): Promise<void> {
    log.debug('Active configuration refreshed', { configuration: this.getActiveConfiguration().name });
  }

  async createProjectContext(): Promise<AggregateProjectContext> {
    const manifest = this.current;
    const targets = manifest.targetFrameworks.map(name => this.resolveTarget(name));
    const activeTarget = this.resolveTarget(activeTargetName(manifest));

    const feeds: ManifestChangeFeed[] = [];
    const configuredProjects = targets.map(target => {
      const feed = new ManifestChangeFeed();
      feeds.push(feed);
      this.configuredFeeds.add(feed);
      const configuredProject: ConfiguredProject = {
        configuration: this.configurationFor(target.shortName),
        subscription: feed,
      };
      return [target, configuredProject] as const;
    });

    this.contextCount++;
    log.debug('Created project context', {
      targets: targets.map(target => target.shortName),
      active: activeTarget.shortName,
    });

    return new AggregateProjectContext({
      targetFrameworks: targets,
      activeTargetFramework: activeTarget,
      configuredProjects,
      targetFrameworkProvider: this.targetFrameworkProvider,
      isCrossTargeting: targets.length > 1,
      onDispose: () => feeds.forEach(feed => this.configuredFeeds.delete(feed)),
    });
  }

  /** Re-read the manifest file and apply it. */
  reload(): Promise<void> {
    return this.reloads.runExclusive(async () => {
      await this.apply(await readManifest(this.manifestPath));
    });
  }

  /**
   * Make `next` the current manifest and publish what changed: a configuration
   * batch when the target list or the active target moved, then the
   * dependency differences.
   */
  async apply(next: Manifest): Promise<void> {
    const previous = this.current;
    this.current = next;

    let update: ProjectSubscriptionUpdate | null = null;
    if (!sameNames(previous.targetFrameworks, next.targetFrameworks)) {
      update = this.configurationUpdate(PROJECT_PROPERTY_NAMES.TARGET_FRAMEWORKS, next.targetFrameworks.join(';'));
    } else if (activeTargetName(previous).toLowerCase() !== activeTargetName(next).toLowerCase()) {
      update = this.configurationUpdate(PROJECT_PROPERTY_NAMES.TARGET_FRAMEWORK, activeTargetName(next));
    }

    if (update) {
      // The active feed serves until the first context exists; the configured
      // projects' feeds after that
      for (const feed of [this.activeFeed, ...this.configuredFeeds]) {
        await feed.publish(update);
      }
    }

    this.subscriber.report();
    this.publishSharedDependencies();
  }

  /**
   * Reload on every change to the manifest file; unload the project when the
   * file disappears. Resolves once the watcher is ready.
   */
  async watch(): Promise<void> {
    if (this.watcher) {
      return;
    }

    const watcher = chokidar.watch(this.manifestPath, {
      ignoreInitial: true,
      persistent: true,
      awaitWriteFinish: {
        stabilityThreshold: WATCHER_CONSTANTS.STABILITY_THRESHOLD_MS,
        pollInterval: WATCHER_CONSTANTS.POLL_INTERVAL_MS,
      },
    });
    this.watcher = watcher;

    watcher.on('change', () => {
      void this.reload().catch(error => this.onReloadFailed(error));
    });
    watcher.on('unlink', () => {
      log.warn('Manifest removed, unloading project', { manifest: this.manifestPath });
      this.unload();
    });
    watcher.on('error', error => log.error('Manifest watch error', error));

    await new Promise<void>(resolve => watcher.once('ready', () => resolve()));
  }

  rename(newPath: string): void {
    const oldPath = this.manifestPath;
    const fullPath = path.resolve(newPath);
    this.lifetime.rename(fullPath);
    if (this.watcher && oldPath !== fullPath) {
      this.watcher.unwatch(oldPath);
      this.watcher.add(fullPath);
    }
  }

  unload(): void {
    this.lifetime.unload();
  }

  async dispose(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    await watcher?.close();

    this.reloads.dispose();
    this.subscriber.dispose();
    this.subtreeProviders.forEach(provider => provider.dispose());
    this.foreground.dispose();
  }

  private onReloadFailed(error: unknown): void {
    if (error instanceof ManifestValidationError) {
      log.warn('Ignoring invalid manifest', { manifest: error.manifestPath, issues: error.issues });
      return;
    }
    log.error('Failed to reload manifest', error, { manifest: this.manifestPath, reason: getErrorMessage(error) });
  }

  private publishSharedDependencies(): void {
    const previous = this.reportedShared;
    const next = dependenciesFor(this.current, TargetFramework.Any);
    this.reportedShared = next;

    for (const provider of this.subtreeProviders) {
      const ofType = (entry: DependencyEntry) => entry.providerType === provider.providerType;
      provider.publish(diffDependencies(previous.filter(ofType), next.filter(ofType)));
    }

    for (const entry of next) {
      if (!this.subtreeProviders.some(provider => provider.providerType === entry.providerType)) {
        log.warn('No provider for shared dependency', { id: entry.id, providerType: entry.providerType });
      }
    }
  }

  private configurationFor(targetName: string): ProjectConfiguration {
    const dimensions = new Map<string, string>([
      ['Configuration', this.current.configuration],
      ['Platform', 'AnyCPU'],
    ]);
    if (this.isCrossTargeting) {
      dimensions.set(PROJECT_PROPERTY_NAMES.TARGET_FRAMEWORK_DIMENSION, targetName);
    }
    return { name: [...dimensions.values()].join('|'), dimensions };
  }

  private configurationUpdate(property: string, value: string): ProjectSubscriptionUpdate {
    this.version++;
    return {
      version: this.version,
      projectChanges: new Map([
        [
          PROJECT_PROPERTY_NAMES.CONFIGURATION_GENERAL_RULE,
          { changedProperties: new Set([property]), after: new Map([[property, value]]) },
        ],
      ]),
    };
  }

  private resolveTarget(name: string): TargetFramework {
    const target = this.targetFrameworkProvider.getTargetFramework(name);
    if (!target) {
      throw new ManifestValidationError(this.manifestPath, [`Unknown target framework '${name}'`]);
    }
    return target;
  }
}
