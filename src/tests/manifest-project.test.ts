import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';

import { TargetFramework } from '../core/target-framework.js';
import {
  dependenciesFor,
  diffDependencies,
  manifestCatalog,
  parseManifest,
  readManifest,
  type DependencyEntry,
} from '../project/manifest.js';
import { ManifestProject } from '../project/ManifestProject.js';
import { ManifestValidationError } from '../utils/error-utils.js';
import { log, LogLevel } from '../utils/logger.js';
import { tf } from './helpers/fakes.js';
import { createTempDir, writeTempFile, type TempDir } from './helpers/temp-dir.js';

log.setLevel(LogLevel.SILENT);

const MANIFEST = '/work/app/depsnap.json';

function entry(id: string, overrides: Partial<DependencyEntry> = {}): DependencyEntry {
  return { id, providerType: 'NuGetDependency', resolved: true, topLevel: true, children: [], ...overrides };
}

function manifestIssues(raw: unknown): string[] {
  try {
    parseManifest(MANIFEST, raw);
  } catch (error) {
    if (error instanceof ManifestValidationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

const twoTargets = {
  targetFrameworks: ['net6.0', 'net7.0'],
  dependencies: {
    'net6.0': [{ id: 'Alpha', version: '1.0.0' }],
    'net7.0': [{ id: 'Beta' }],
    any: [{ id: 'Shared' }],
  },
};

async function withManifestProject(
  raw: unknown,
  body: (project: ManifestProject, temp: TempDir) => Promise<void>
): Promise<void> {
  const temp = await createTempDir({ 'depsnap.json': JSON.stringify(raw) });
  const project = await ManifestProject.load(path.join(temp.root, 'depsnap.json'));
  try {
    await body(project, temp);
  } finally {
    project.unload();
    await project.dispose();
    await temp.cleanup();
  }
}

test('parseManifest fills in defaults', () => {
  const manifest = parseManifest(MANIFEST, {
    targetFrameworks: ['net6.0'],
    dependencies: { 'net6.0': [{ id: 'Alpha' }] },
  });

  assert.equal(manifest.configuration, 'Debug');
  assert.equal(manifest.activeTargetFramework, undefined);
  assert.deepEqual(manifest.dependencies['net6.0']?.[0], {
    id: 'Alpha',
    providerType: 'NuGetDependency',
    resolved: true,
    topLevel: true,
    children: [],
  });
});

test('parseManifest reports every problem with its location', () => {
  assert.deepEqual(manifestIssues({ targetFrameworks: ['net6.0', 'banana'], activeTargetFramework: 'net8.0' }), [
    "targetFrameworks.1: Unknown target framework 'banana'",
    "activeTargetFramework: 'net8.0' is not one of the declared target frameworks",
  ]);
  assert.deepEqual(manifestIssues({ targetFrameworks: [] }), [
    'targetFrameworks: At least one target framework is required',
  ]);
  assert.deepEqual(manifestIssues({ targetFrameworks: ['NET6.0'], activeTargetFramework: 'net6.0' }), []);
});

test('readManifest rejects files that are not JSON', async () => {
  const temp = await createTempDir({ 'depsnap.json': '{ targetFrameworks' });
  try {
    await assert.rejects(readManifest(path.join(temp.root, 'depsnap.json')), (error: unknown) => {
      assert.ok(error instanceof ManifestValidationError);
      assert.equal(error.issues.length, 1);
      assert.match(error.issues[0] ?? '', /^not valid JSON \(/);
      return true;
    });
  } finally {
    await temp.cleanup();
  }
});

test('dependency sections match short or full target names', () => {
  const manifest = parseManifest(MANIFEST, {
    targetFrameworks: ['net6.0'],
    dependencies: { '.NETCoreApp,Version=v6.0': [{ id: 'Alpha' }] },
  });

  assert.deepEqual(
    dependenciesFor(manifest, tf('net6.0')).map(dependency => dependency.id),
    ['Alpha']
  );
  assert.deepEqual(dependenciesFor(manifest, TargetFramework.Any), []);
});

test('the catalog defaults to the top-level dependency ids', () => {
  const manifest = parseManifest(MANIFEST, {
    targetFrameworks: ['net6.0'],
    dependencies: { 'net6.0': [{ id: 'Alpha' }, { id: 'Transitive', topLevel: false }] },
  });
  const declared = parseManifest(MANIFEST, { targetFrameworks: ['net6.0'], items: ['Alpha'] });

  assert.deepEqual(manifestCatalog(manifest), { items: [{ evaluatedInclude: 'Alpha' }] });
  assert.deepEqual(manifestCatalog(declared), { items: [{ evaluatedInclude: 'Alpha' }] });
});

test('diffDependencies reports removals and changed or new entries', () => {
  const changes = diffDependencies(
    [entry('Alpha', { version: '1.0.0' }), entry('Beta'), entry('Gamma')],
    [entry('alpha', { version: '2.0.0' }), entry('Gamma'), entry('Delta', { providerType: 'ProjectDependency' })]
  );

  assert.deepEqual(changes.removed, [{ providerType: 'NuGetDependency', dependencyId: 'Beta' }]);
  assert.deepEqual(
    changes.added.map(model => [model.id, model.version]),
    [
      ['alpha', '2.0.0'],
      ['Delta', undefined],
    ]
  );
  assert.deepEqual(changes.added[0]?.properties, { Version: '2.0.0' });
});

test('configurations carry the target dimension only when cross-targeting', async () => {
  const single = new ManifestProject(MANIFEST, parseManifest(MANIFEST, { targetFrameworks: ['net6.0'] }));
  const multi = new ManifestProject(
    MANIFEST,
    parseManifest(MANIFEST, { targetFrameworks: ['net6.0', 'net7.0'], configuration: 'Release' })
  );

  assert.equal(await single.readTargetFramework(), 'net6.0');
  assert.deepEqual(
    (await single.getKnownConfigurations()).map(configuration => configuration.name),
    ['Debug|AnyCPU']
  );
  assert.equal(await multi.readTargetFramework(), undefined);
  assert.deepEqual(
    (await multi.getKnownConfigurations()).map(configuration => configuration.name),
    ['Release|AnyCPU|net6.0', 'Release|AnyCPU|net7.0']
  );
  assert.equal(multi.getActiveConfiguration().dimensions.get('TargetFramework'), 'net6.0');

  await single.dispose();
  await multi.dispose();
});

test('opening a manifest project reports per-target and shared dependencies', async () => {
  await withManifestProject(twoTargets, async project => {
    const host = await project.open({ throttleMs: 20 });
    const snapshot = host.currentSnapshot;

    assert.equal(project.contextsCreated, 1);
    assert.equal(snapshot.activeTarget.shortName, 'net6.0');
    assert.equal(snapshot.findDependency('net6.0/nugetdependency/alpha')?.version, '1.0.0');
    assert.equal(snapshot.findDependency('net7.0/nugetdependency/beta')?.caption, 'Beta');
    assert.equal(snapshot.findDependency('any/nugetdependency/shared')?.caption, 'Shared');

    host.dispose();
  });
});

test('dependencies missing from the project items are marked implicit', async () => {
  const raw = {
    targetFrameworks: ['net6.0'],
    items: ['Alpha'],
    dependencies: { 'net6.0': [{ id: 'Alpha' }, { id: 'Runtime' }] },
  };

  await withManifestProject(raw, async project => {
    const host = await project.open({ throttleMs: 20 });

    const runtime = host.currentSnapshot.findDependency('net6.0/nugetdependency/runtime');
    assert.equal(runtime?.implicit, true);
    assert.equal(runtime?.icon, 'PackageImplicit');
    assert.equal(host.currentSnapshot.findDependency('net6.0/nugetdependency/alpha')?.implicit, false);

    host.dispose();
  });
});

test('dropping a target recreates the context and keeps the surviving slice', async () => {
  await withManifestProject(twoTargets, async project => {
    const host = await project.open({ throttleMs: 20 });
    const net6Slice = host.currentSnapshot.get(tf('net6.0'));

    await project.apply(
      parseManifest(project.manifestPath, { ...twoTargets, targetFrameworks: ['net6.0'] })
    );

    const snapshot = host.currentSnapshot;
    assert.equal(project.contextsCreated, 2);
    assert.deepEqual(snapshot.targetFrameworks.map(target => target.shortName), ['net6.0', 'any']);
    assert.equal(snapshot.get(tf('net6.0')), net6Slice);

    host.dispose();
  });
});

test('switching the active target recreates the context and moves the active target', async () => {
  await withManifestProject(twoTargets, async project => {
    const host = await project.open({ throttleMs: 20 });

    await project.apply(parseManifest(project.manifestPath, { ...twoTargets, activeTargetFramework: 'net7.0' }));

    assert.equal(project.contextsCreated, 2);
    assert.equal(host.currentSnapshot.activeTarget.shortName, 'net7.0');

    host.dispose();
  });
});

test('dependency edits flow through without a new context', async () => {
  await withManifestProject(twoTargets, async project => {
    const host = await project.open({ throttleMs: 20 });

    await project.apply(
      parseManifest(project.manifestPath, {
        ...twoTargets,
        dependencies: { 'net6.0': [{ id: 'Alpha', version: '2.0.0' }], 'net7.0': [] },
      })
    );

    const snapshot = host.currentSnapshot;
    assert.equal(project.contextsCreated, 1);
    assert.equal(snapshot.findDependency('net6.0/nugetdependency/alpha')?.version, '2.0.0');
    assert.equal(snapshot.findDependency('net7.0/nugetdependency/beta'), undefined);
    assert.equal(snapshot.findDependency('any/nugetdependency/shared'), undefined);

    host.dispose();
  });
});

test('reload picks up the file and keeps the last good manifest on errors', async () => {
  await withManifestProject(twoTargets, async (project, temp) => {
    const host = await project.open({ throttleMs: 20 });

    await writeTempFile(
      temp.root,
      'depsnap.json',
      JSON.stringify({ ...twoTargets, dependencies: { 'net6.0': [{ id: 'Alpha' }, { id: 'Omega' }] } })
    );
    await project.reload();
    assert.equal(host.currentSnapshot.findDependency('net6.0/nugetdependency/omega')?.caption, 'Omega');

    await writeTempFile(temp.root, 'depsnap.json', JSON.stringify({ targetFrameworks: [] }));
    await assert.rejects(project.reload(), {
      name: 'ManifestValidationError',
      issues: ['targetFrameworks: At least one target framework is required'],
    });
    assert.deepEqual(project.manifest.targetFrameworks, ['net6.0', 'net7.0']);

    host.dispose();
  });
});
