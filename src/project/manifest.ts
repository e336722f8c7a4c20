/**
 * `depsnap.json` project manifest: declared target frameworks and the
 * dependencies resolved for each of them.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { formatIssues } from '../config/schema.js';
import { parseTargetFramework, type TargetFramework } from '../core/target-framework.js';
import { ManifestValidationError } from '../utils/error-utils.js';
import type { DependencyModel } from '../snapshot/dependency.js';
import type { DependencyChangeSet, RemovedDependency } from '../snapshot/changes.js';
import type { ProjectCatalog } from '../snapshot/item-specs.js';

export const PROVIDER_TYPES = {
  PACKAGE: 'NuGetDependency',
  PROJECT: 'ProjectDependency',
  ANALYZER: 'AnalyzerDependency',
} as const;

const DependencyEntrySchema = z.object({
  id: z.string().trim().min(1, 'Dependency id cannot be empty'),
  providerType: z.string().trim().min(1).default(PROVIDER_TYPES.PACKAGE),
  caption: z.string().optional(),
  version: z.string().optional(),
  resolved: z.boolean().default(true),
  topLevel: z.boolean().default(true),
  implicit: z.boolean().optional(),
  children: z.array(z.string()).default([]),
});

export const ManifestSchema = z
  .object({
    targetFrameworks: z.array(z.string().trim().min(1)).min(1, 'At least one target framework is required'),
    activeTargetFramework: z.string().optional(),
    configuration: z.string().default('Debug'),
    /** Item specs written in the project file itself; defaults to the top-level dependency ids */
    items: z.array(z.string()).optional(),
    dependencies: z.record(z.array(DependencyEntrySchema)).default({}),
  })
  .superRefine((manifest, ctx) => {
    manifest.targetFrameworks.forEach((name, index) => {
      if (!parseTargetFramework(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['targetFrameworks', index],
          message: `Unknown target framework '${name}'`,
        });
      }
    });

    const active = manifest.activeTargetFramework?.toLowerCase();
    if (active && !manifest.targetFrameworks.some(name => name.toLowerCase() === active)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['activeTargetFramework'],
        message: `'${manifest.activeTargetFramework}' is not one of the declared target frameworks`,
      });
    }
  });

export type DependencyEntry = z.output<typeof DependencyEntrySchema>;
export type Manifest = z.output<typeof ManifestSchema>;

export function parseManifest(manifestPath: string, raw: unknown): Manifest {
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ManifestValidationError(manifestPath, formatIssues(parsed.error));
  }
  return parsed.data;
}

export async function readManifest(manifestPath: string): Promise<Manifest> {
  const content = await fs.readFile(manifestPath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ManifestValidationError(manifestPath, [`not valid JSON (${String(error)})`]);
  }
  return parseManifest(manifestPath, raw);
}

export function activeTargetName(manifest: Manifest): string {
  return manifest.activeTargetFramework ?? manifest.targetFrameworks[0] ?? 'any';
}

/**
 * Entries declared under the short or full name of `target`.
 */
export function dependenciesFor(manifest: Manifest, target: TargetFramework): DependencyEntry[] {
  for (const [key, entries] of Object.entries(manifest.dependencies)) {
    if (target.equals(key)) {
      return entries;
    }
  }
  return [];
}

export function toDependencyModel(entry: DependencyEntry): DependencyModel {
  return {
    id: entry.id,
    providerType: entry.providerType,
    caption: entry.caption ?? entry.id,
    originalItemSpec: entry.id,
    version: entry.version,
    resolved: entry.resolved,
    topLevel: entry.topLevel,
    implicit: entry.implicit,
    dependencyIds: entry.children,
    properties: entry.version ? { Version: entry.version } : {},
  };
}

export function manifestCatalog(manifest: Manifest): ProjectCatalog {
  const specs =
    manifest.items ??
    Object.values(manifest.dependencies).flatMap(entries =>
      entries.filter(entry => entry.topLevel).map(entry => entry.id)
    );
  return { items: specs.map(evaluatedInclude => ({ evaluatedInclude })) };
}

function entryKey(entry: DependencyEntry): string {
  return `${entry.providerType}/${entry.id}`.toLowerCase();
}

function sameEntry(a: DependencyEntry, b: DependencyEntry): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Change set turning `previous` into `next`.
 */
export function diffDependencies(
  previous: readonly DependencyEntry[],
  next: readonly DependencyEntry[]
): DependencyChangeSet {
  const before = new Map(previous.map(entry => [entryKey(entry), entry]));
  const after = new Map(next.map(entry => [entryKey(entry), entry]));

  const removed: RemovedDependency[] = [];
  for (const [key, entry] of before) {
    if (!after.has(key)) {
      removed.push({ providerType: entry.providerType, dependencyId: entry.id });
    }
  }

  const added: DependencyModel[] = [];
  for (const [key, entry] of after) {
    const old = before.get(key);
    if (!old || !sameEntry(old, entry)) {
      added.push(toDependencyModel(entry));
    }
  }

  return { added, removed };
}
