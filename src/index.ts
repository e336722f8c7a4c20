export { SnapshotHost, hasTargetFrameworksChanged } from './subscriptions/SnapshotHost.js';
export type { HostState, SnapshotHostDependencies, SnapshotHostOptions } from './subscriptions/SnapshotHost.js';
export { ContextManager, computeRemovedTargets } from './subscriptions/ContextManager.js';
export type { ContextManagerOptions, ContextRefreshResult } from './subscriptions/ContextManager.js';
export { SubscriptionRegistry } from './subscriptions/SubscriptionRegistry.js';
export type { SubscriptionRegistryOptions } from './subscriptions/SubscriptionRegistry.js';
export { mergeChanges, indexSubtreeProviders } from './subscriptions/ChangeMerger.js';
export type { MergeInput } from './subscriptions/ChangeMerger.js';
export { DebounceScheduler } from './subscriptions/DebounceScheduler.js';
export type { ScheduledRunStatus, ScheduledAction, DebounceSchedulerOptions } from './subscriptions/DebounceScheduler.js';
export { SnapshotStore } from './subscriptions/SnapshotStore.js';

export { AggregateProjectContext } from './core/AggregateProjectContext.js';
export { ProjectLifetime } from './core/ProjectLifetime.js';
export { SerialForegroundDispatcher } from './core/foreground.js';
export { TargetFramework, DefaultTargetFrameworkProvider, parseTargetFramework } from './core/target-framework.js';
export type { TargetFrameworkProvider } from './core/target-framework.js';
export { orderByPrecedence } from './core/precedence.js';
export type { Precedence } from './core/precedence.js';
export * from './core/types.js';

export { DependenciesSnapshot } from './snapshot/DependenciesSnapshot.js';
export { TargetedDependenciesSnapshot } from './snapshot/TargetedDependenciesSnapshot.js';
export { AggregateSnapshotProvider } from './snapshot/AggregateSnapshotProvider.js';
export type { SnapshotProviderRegistry } from './snapshot/AggregateSnapshotProvider.js';
export * from './snapshot/dependency.js';
export * from './snapshot/changes.js';
export * from './snapshot/item-specs.js';
export * from './snapshot/filters/index.js';

export { ManifestProject } from './project/ManifestProject.js';
export type { ManifestHostOptions } from './project/ManifestProject.js';
export { parseManifest, readManifest } from './project/manifest.js';
export type { Manifest, DependencyEntry } from './project/manifest.js';

export { loadConfig } from './config/loader.js';
export type { DepsnapConfig } from './config/types.js';
export {
  ObjectDisposedError,
  ProjectUnloadedError,
  ManifestValidationError,
  isCancellationError,
} from './utils/error-utils.js';
export { Emitter } from './utils/events.js';
export type { Listener } from './utils/events.js';
