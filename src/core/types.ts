/**
 * Contracts between the subscription core and the project system around it.
 */

import type { Disposable, Event } from '../utils/events.js';
import type { Precedence } from './precedence.js';
import type { TargetFramework } from './target-framework.js';
import type { AggregateProjectContext } from './AggregateProjectContext.js';
import type { DependenciesSnapshot } from '../snapshot/DependenciesSnapshot.js';
import type { DependencyChangeSet, TargetedChanges } from '../snapshot/changes.js';
import type { ProjectCatalog } from '../snapshot/item-specs.js';
import { PROJECT_PROPERTY_NAMES } from '../config/constants.js';

export type { Disposable, Event } from '../utils/events.js';

// ---------------------------------------------------------------------------
// Project configurations
// ---------------------------------------------------------------------------

export interface ProjectConfiguration {
  readonly name: string;
  /** e.g. Configuration=Debug, Platform=AnyCPU, TargetFramework=net6.0 */
  readonly dimensions: ReadonlyMap<string, string>;
}

export function isCrossTargetingConfiguration(configuration: ProjectConfiguration): boolean {
  return configuration.dimensions.has(PROJECT_PROPERTY_NAMES.TARGET_FRAMEWORK_DIMENSION);
}

// ---------------------------------------------------------------------------
// Change feeds
// ---------------------------------------------------------------------------

export interface ProjectChangeDescription {
  readonly changedProperties: ReadonlySet<string>;
  readonly after?: ReadonlyMap<string, string>;
}

/** One versioned batch of changed properties, keyed by rule name. */
export interface ProjectSubscriptionUpdate {
  readonly version: number;
  readonly projectChanges: ReadonlyMap<string, ProjectChangeDescription>;
}

export type ProjectUpdateHandler = (update: ProjectSubscriptionUpdate) => Promise<void>;

export interface ChangeFeedLinkOptions {
  readonly ruleNames: readonly string[];
}

export interface ProjectChangeFeed {
  /** Deliver matching batches to `handler` until the returned link is disposed. */
  link(handler: ProjectUpdateHandler, options: ChangeFeedLinkOptions): Disposable;
}

export interface ProjectSubscriptionService {
  readonly projectRuleSource: ProjectChangeFeed;
}

export interface ConfiguredProject {
  readonly configuration: ProjectConfiguration;
  readonly subscription: ProjectSubscriptionService;
}

// ---------------------------------------------------------------------------
// Context creation
// ---------------------------------------------------------------------------

export interface ProjectContextProvider {
  createProjectContext(): Promise<AggregateProjectContext>;
}

export interface ProjectConfigurationService {
  /** Evaluated TargetFramework property of the active configured project */
  readTargetFramework(): Promise<string | undefined>;
  getActiveConfiguration(): ProjectConfiguration;
  getKnownConfigurations(): Promise<readonly ProjectConfiguration[]>;
}

export interface ActiveConfigurationRefreshService {
  /** Must run on the foreground resource. */
  refreshActiveConfiguration(): Promise<void>;
}

/**
 * The single foreground (UI-affinity) resource. Work handed to it runs there
 * and the caller resumes once it completes.
 */
export interface ForegroundDispatcher {
  run<T>(work: () => Promise<T>): Promise<T>;
}

// ---------------------------------------------------------------------------
// Project lifetime
// ---------------------------------------------------------------------------

export interface ProjectRenamedEvent {
  readonly oldPath: string;
  readonly newPath: string;
}

export interface UnconfiguredProject {
  readonly fullPath: string;
  readonly onUnloading: Event<void>;
  readonly onRenamed: Event<ProjectRenamedEvent>;
}

export interface ProjectTasksService {
  /** Aborted once the project starts unloading */
  readonly unloadSignal: AbortSignal;
  /** Run `work` only while the project is loaded; rejects with a cancellation otherwise. */
  loadedProject<T>(work: () => Promise<T>): Promise<T>;
}

// ---------------------------------------------------------------------------
// Producers of dependency changes
// ---------------------------------------------------------------------------

export interface SubscriberChangedEvent {
  readonly changes: TargetedChanges;
  readonly catalog: ProjectCatalog | null;
  readonly activeTarget: TargetFramework | null;
}

export interface CrossTargetSubscriptionsHost {
  getCurrentContext(): Promise<AggregateProjectContext | null>;
  getConfiguredProject(target: TargetFramework): Promise<ConfiguredProject | null>;
}

export interface CrossTargetSubscriber extends Precedence {
  readonly name: string;
  readonly onDependenciesChanged: Event<SubscriberChangedEvent>;
  initializeSubscriber(host: CrossTargetSubscriptionsHost, subscriptionService: ProjectSubscriptionService): void;
  addSubscriptions(context: AggregateProjectContext): void;
  /** Drop per-target state tied to the context being torn down. */
  releaseSubscriptions(): void;
}

export interface SubtreeChangedEvent {
  readonly changes: DependencyChangeSet;
  /** Short or full target name; empty or absent means "any target" */
  readonly targetShortOrFullName?: string | null;
  readonly signal?: AbortSignal;
}

export interface SubtreeProvider extends Precedence {
  readonly providerType: string;
  readonly implicitIcon?: string;
  readonly onDependenciesChanged: Event<SubtreeChangedEvent>;
}

// ---------------------------------------------------------------------------
// Exposed surface
// ---------------------------------------------------------------------------

export interface SnapshotChangedEvent {
  readonly snapshot: DependenciesSnapshot;
  readonly signal: AbortSignal;
}

export interface SnapshotRenamedEvent {
  readonly oldPath: string;
  readonly newPath: string;
}

export interface SnapshotProviderUnloadingEvent {
  readonly provider: DependenciesSnapshotProvider;
}

export interface DependenciesSnapshotProvider {
  readonly currentSnapshot: DependenciesSnapshot;
  readonly projectFilePath: string;
  readonly onSnapshotChanged: Event<SnapshotChangedEvent>;
  readonly onSnapshotRenamed: Event<SnapshotRenamedEvent>;
  readonly onSnapshotProviderUnloading: Event<SnapshotProviderUnloadingEvent>;
}
