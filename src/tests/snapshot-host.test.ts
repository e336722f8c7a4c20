import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';

import { SerialForegroundDispatcher } from '../core/foreground.js';
import { ProjectLifetime } from '../core/ProjectLifetime.js';
import { TargetFramework } from '../core/target-framework.js';
import type { SnapshotProviderUnloadingEvent, SnapshotRenamedEvent, UnconfiguredProject } from '../core/types.js';
import { ManifestChangeFeed } from '../project/ManifestChangeFeed.js';
import { ManifestSubtreeProvider } from '../project/ManifestSubtreeProvider.js';
import { AggregateSnapshotProvider } from '../snapshot/AggregateSnapshotProvider.js';
import { createChangeSet } from '../snapshot/changes.js';
import type { DependenciesSnapshot } from '../snapshot/DependenciesSnapshot.js';
import { createDefaultFilters } from '../snapshot/filters/index.js';
import { SnapshotHost, hasTargetFrameworksChanged } from '../subscriptions/SnapshotHost.js';
import { log, LogLevel } from '../utils/logger.js';
import { FakeProjectSystem, FakeSubscriber, model, targetFrameworkProvider, targetsChangedUpdate, tf } from './helpers/fakes.js';

log.setLevel(LogLevel.SILENT);

const PROJECT = '/work/app/app.csproj';
const THROTTLE_MS = 20;

interface Harness {
  lifetime: ProjectLifetime;
  activeFeed: ManifestChangeFeed;
  system: FakeProjectSystem;
  subscriber: FakeSubscriber;
  packages: ManifestSubtreeProvider;
  host: SnapshotHost;
  notifications: DependenciesSnapshot[];
}

function createHarness(
  targets: string[] = ['net6.0', 'net7.0'],
  registry?: AggregateSnapshotProvider,
  project?: UnconfiguredProject
): Harness {
  const lifetime = new ProjectLifetime(PROJECT);
  const activeFeed = new ManifestChangeFeed();
  const system = new FakeProjectSystem(targets);
  const subscriber = new FakeSubscriber();
  const packages = new ManifestSubtreeProvider({ providerType: 'NuGetDependency', implicitIcon: 'PackageImplicit' });

  const host = new SnapshotHost(
    {
      project: project ?? lifetime,
      tasks: lifetime,
      activeSubscriptionService: activeFeed,
      contextProvider: system,
      configurationService: system,
      refreshService: system,
      foreground: new SerialForegroundDispatcher(),
      targetFrameworkProvider,
      subscribers: [subscriber],
      subtreeProviders: [packages],
      filters: createDefaultFilters(),
      snapshotProviderRegistry: registry,
    },
    { throttleMs: THROTTLE_MS }
  );

  const notifications: DependenciesSnapshot[] = [];
  host.onSnapshotChanged(event => notifications.push(event.snapshot));

  return { lifetime, activeFeed, system, subscriber, packages, host, notifications };
}

function settle(): Promise<void> {
  return delay(THROTTLE_MS * 4);
}

function ids(snapshot: DependenciesSnapshot, target: TargetFramework): string[] {
  return [...(snapshot.get(target)?.dependencies.keys() ?? [])].sort();
}

test('hasTargetFrameworksChanged looks only at target framework properties', () => {
  assert.equal(hasTargetFrameworksChanged(targetsChangedUpdate()), true);
  assert.equal(
    hasTargetFrameworksChanged({
      version: 1,
      projectChanges: new Map([['ConfigurationGeneral', { changedProperties: new Set(['OutputType']) }]]),
    }),
    false
  );
  assert.equal(hasTargetFrameworksChanged({ version: 1, projectChanges: new Map() }), false);
});

test('the structural-load signal initializes the host once', async () => {
  const { host, system, subscriber, activeFeed } = createHarness();
  assert.equal(host.lifecycleState, 'uninitialized');

  await host.onProjectFactoryCompleted();
  await host.onProjectFactoryCompleted();

  assert.equal(host.lifecycleState, 'ready');
  assert.equal(system.contextsCreated, 1);
  assert.equal(subscriber.initializeCount, 1);
  assert.equal(subscriber.attachedContexts.length, 1);
  assert.equal(system.liveFeedLinks, 2);
  // The evaluation link is part of the released set once the first context is built
  assert.equal(activeFeed.linkCount, 0);
  assert.equal(subscriber.releaseCount, 1);

  host.dispose();
});

test('the current snapshot is created lazily, once', () => {
  const { host } = createHarness();

  const snapshot = host.currentSnapshot;

  assert.equal(host.currentSnapshot, snapshot);
  assert.equal(snapshot.projectPath, PROJECT);
  assert.equal(snapshot.targets.size, 0);
  host.dispose();
});

test('subscriber changes are merged and announced once per burst', async () => {
  const { host, subscriber, notifications } = createHarness();
  await host.onProjectFactoryCompleted();

  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('Alpha')])]]), null, tf('net6.0'));
  subscriber.emit(new Map([[tf('net7.0'), createChangeSet([model('Beta')])]]));
  await settle();

  assert.equal(notifications.length, 1);
  const snapshot = notifications[0];
  assert.ok(snapshot);
  assert.equal(snapshot, host.currentSnapshot);
  assert.equal(snapshot.activeTarget.shortName, 'net6.0');
  assert.deepEqual(ids(snapshot, tf('net6.0')), ['net6.0/nugetdependency/alpha']);
  assert.deepEqual(ids(snapshot, tf('net7.0')), ['net7.0/nugetdependency/beta']);

  host.dispose();
});

test('changes that alter nothing publish nothing', async () => {
  const { host, subscriber, notifications } = createHarness();
  await host.onProjectFactoryCompleted();

  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('Alpha')])]]));
  await settle();
  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('Alpha')])]]));
  subscriber.emit(new Map([[tf('net6.0'), createChangeSet()]]));
  await settle();

  assert.equal(notifications.length, 1);
  host.dispose();
});

test('dropping a target framework removes exactly its slice with one notification', async () => {
  const { host, system, subscriber, notifications } = createHarness(['net6.0', 'net7.0']);
  await host.onProjectFactoryCompleted();
  const firstContext = system.contexts[0];

  subscriber.emit(
    new Map([
      [tf('net6.0'), createChangeSet([model('Alpha')])],
      [tf('net7.0'), createChangeSet([model('Beta')])],
    ])
  );
  await settle();
  const before = host.currentSnapshot;
  const net6Slice = before.get(tf('net6.0'));
  assert.equal(notifications.length, 1);

  system.targets = ['net6.0'];
  await system.publishTargetsChanged();
  await settle();

  assert.equal(notifications.length, 2);
  const after = host.currentSnapshot;
  assert.notEqual(after, before);
  assert.deepEqual(after.targetFrameworks.map(target => target.shortName), ['net6.0']);
  assert.equal(after.get(tf('net6.0')), net6Slice);
  assert.equal(system.contextsCreated, 2);
  assert.equal(firstContext?.isDisposed(), true);
  assert.equal(subscriber.releaseCount, 2);
  assert.equal(subscriber.attachedContexts.length, 2);
  assert.equal(system.liveFeedLinks, 1);

  host.dispose();
});

test('adding then removing a dependency leaves no trace and notifies once', async () => {
  const { host, subscriber, notifications } = createHarness();
  await host.onProjectFactoryCompleted();

  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('A')])]]));
  subscriber.emit(
    new Map([[tf('net6.0'), createChangeSet([], [{ providerType: 'NuGetDependency', dependencyId: 'A' }])]])
  );
  await settle();

  assert.equal(notifications.length, 1);
  assert.equal(host.currentSnapshot.findDependency('net6.0/nugetdependency/a'), undefined);
  assert.deepEqual(ids(host.currentSnapshot, tf('net6.0')), []);

  host.dispose();
});

test('configuration batches that do not touch targets keep the context', async () => {
  const { host, system } = createHarness();
  await host.onProjectFactoryCompleted();

  for (const feed of system.feeds) {
    await feed.publish({
      version: 2,
      projectChanges: new Map([['ConfigurationGeneral', { changedProperties: new Set(['OutputType']) }]]),
    });
  }
  await system.publishTargetsChanged(3);

  assert.equal(system.contextsCreated, 1);
  host.dispose();
});

test('subtree provider changes land on the named target or on "any"', async () => {
  const { host, packages } = createHarness();
  await host.onProjectFactoryCompleted();

  packages.publish(createChangeSet([model('Shared')]));
  packages.publish(createChangeSet([model('Targeted')]), '.NETCoreApp,Version=v7.0');
  packages.publish(createChangeSet([model('Stray')]), 'not-a-target');

  const snapshot = host.currentSnapshot;
  assert.deepEqual(ids(snapshot, TargetFramework.Any), ['any/nugetdependency/shared', 'any/nugetdependency/stray']);
  assert.deepEqual(ids(snapshot, tf('net7.0')), ['net7.0/nugetdependency/targeted']);

  host.dispose();
});

test('getCurrentContext initializes on demand', async () => {
  const { host, system } = createHarness();

  const context = await host.getCurrentContext();

  assert.ok(context);
  assert.equal(context, system.contexts[0]);
  assert.equal(host.lifecycleState, 'ready');
  const configured = await host.getConfiguredProject(tf('net7.0'));
  assert.equal(configured?.configuration.dimensions.get('TargetFramework'), 'net7.0');

  host.dispose();
});

test('renaming the project moves the snapshot and raises snapshotRenamed', async () => {
  const { host, lifetime } = createHarness();
  await host.onProjectFactoryCompleted();
  const renamed: SnapshotRenamedEvent[] = [];
  host.onSnapshotRenamed(event => renamed.push(event));

  lifetime.rename('/work/app/renamed.csproj');

  assert.equal(host.projectFilePath, '/work/app/renamed.csproj');
  assert.equal(host.currentSnapshot.projectPath, '/work/app/renamed.csproj');
  assert.deepEqual(renamed, [{ oldPath: PROJECT, newPath: '/work/app/renamed.csproj' }]);

  host.dispose();
});

test('unloading raises one notification, releases everything and cancels pending work', async () => {
  const { host, lifetime, system, subscriber, notifications } = createHarness();
  await host.onProjectFactoryCompleted();
  const unloading: SnapshotProviderUnloadingEvent[] = [];
  host.onSnapshotProviderUnloading(event => unloading.push(event));

  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('Alpha')])]]));
  const snapshotAtUnload = host.currentSnapshot;
  lifetime.unload();
  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('Late')])]]));
  await settle();

  assert.equal(host.lifecycleState, 'unloading');
  assert.equal(unloading.length, 1);
  assert.equal(unloading[0]?.provider, host);
  assert.equal(notifications.length, 0);
  assert.equal(host.currentSnapshot, snapshotAtUnload);
  assert.equal(subscriber.releaseCount, 2);
  assert.equal(system.liveFeedLinks, 0);
  assert.equal(await host.getCurrentContext(), null);

  host.dispose();
  assert.equal(host.lifecycleState, 'disposed');
});

test('a project unloaded before the structural-load signal is not initialized', async () => {
  const { host, lifetime, system } = createHarness();
  lifetime.unload();

  await host.onProjectFactoryCompleted();

  assert.equal(system.contextsCreated, 0);
  host.dispose();
});

test('dispose cancels the pending notification and ignores later signals', async () => {
  const { host, subscriber, system, notifications } = createHarness();
  await host.onProjectFactoryCompleted();

  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('Alpha')])]]));
  host.dispose();
  await settle();
  await host.onProjectFactoryCompleted();

  assert.equal(notifications.length, 0);
  assert.equal(host.lifecycleState, 'disposed');
  assert.equal(system.contextsCreated, 1);
  assert.equal(system.liveFeedLinks, 0);
});

test('a failing context provider surfaces through initialization', async () => {
  const { host, system } = createHarness();
  system.failNext = new Error('evaluation failed');

  await assert.rejects(host.onProjectFactoryCompleted(), { message: 'evaluation failed' });
  host.dispose();
});

test('the host registers with the aggregate snapshot provider until it unloads', async () => {
  const registry = new AggregateSnapshotProvider();
  const forwarded: DependenciesSnapshot[] = [];
  registry.onSnapshotChanged(event => forwarded.push(event.snapshot));
  const { host, lifetime, subscriber } = createHarness(['net6.0'], registry);
  await host.onProjectFactoryCompleted();

  assert.equal(registry.getSnapshotProvider(PROJECT), host);

  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('Alpha')])]]));
  await settle();
  assert.equal(forwarded.length, 1);

  lifetime.unload();
  assert.equal(registry.getSnapshotProvider(PROJECT), null);
  assert.equal(registry.size, 0);

  host.dispose();
});

test('unloading while the first context is being created tears the host down', async () => {
  const { host, lifetime, system, subscriber, notifications } = createHarness();
  system.createDelayMs = 30;
  const unloading: SnapshotProviderUnloadingEvent[] = [];
  host.onSnapshotProviderUnloading(event => unloading.push(event));
  const initial = host.currentSnapshot;

  const completed = host.onProjectFactoryCompleted();
  await delay(5);
  lifetime.unload();
  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('DuringInit')])]]));
  await completed;
  subscriber.emit(new Map([[tf('net6.0'), createChangeSet([model('AfterInit')])]]));
  await settle();

  assert.equal(host.lifecycleState, 'unloading');
  assert.equal(unloading.length, 1);
  assert.equal(unloading[0]?.provider, host);
  assert.equal(subscriber.listenerCount, 0);
  assert.equal(host.currentSnapshot, initial);
  assert.equal(notifications.length, 0);
  assert.equal(system.liveFeedLinks, 0);
  assert.equal(await host.getCurrentContext(), null);

  host.dispose();
});

test('overlapping target changes leave only the last context attached', async () => {
  const { host, system, subscriber } = createHarness(['net6.0', 'net7.0']);
  await host.onProjectFactoryCompleted();
  subscriber.emit(
    new Map([
      [tf('net6.0'), createChangeSet([model('Alpha')])],
      [tf('net7.0'), createChangeSet([model('Beta')])],
    ])
  );
  system.createDelayMs = 20;

  system.targets = ['net6.0'];
  system.active = 'net6.0';
  const first = system.publishTargetsChanged(2);
  await delay(5);
  system.targets = ['net7.0', 'net8.0'];
  system.active = 'net7.0';
  const second = system.publishTargetsChanged(3);
  await Promise.all([first, second]);

  const current = await host.getCurrentContext();
  assert.ok(current);
  assert.equal(system.contextsCreated, 3);
  assert.deepEqual(current.targetFrameworks.map(target => target.shortName), ['net7.0', 'net8.0']);
  assert.equal(subscriber.attachedContexts.at(-1), current);
  assert.equal(system.liveFeedLinks, current.targetFrameworks.length);
  for (const superseded of system.contexts.filter(context => context !== current)) {
    assert.equal(superseded.isDisposed(), true);
  }
  // Each replacement removed the targets it dropped: net7.0 first, then net6.0
  assert.equal(host.currentSnapshot.targets.size, 0);

  host.dispose();
});

test('a rename that arrives after unload began is ignored', async () => {
  const identity = new ProjectLifetime(PROJECT);
  const { host, lifetime } = createHarness(['net6.0'], undefined, identity);
  await host.onProjectFactoryCompleted();
  const renamed: SnapshotRenamedEvent[] = [];
  host.onSnapshotRenamed(event => renamed.push(event));

  lifetime.unload();
  identity.rename('/work/app/late.csproj');

  assert.equal(host.projectFilePath, PROJECT);
  assert.equal(host.currentSnapshot.projectPath, PROJECT);
  assert.deepEqual(renamed, []);

  host.dispose();
});
