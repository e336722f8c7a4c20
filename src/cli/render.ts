import chalk, { type ChalkInstance } from 'chalk';
import type { Dependency } from '../snapshot/dependency.js';
import type { DependenciesSnapshot } from '../snapshot/DependenciesSnapshot.js';
import type { TargetedDependenciesSnapshot } from '../snapshot/TargetedDependenciesSnapshot.js';

const INDENT = '  ';

function byCaption(a: Dependency, b: Dependency): number {
  return a.caption.localeCompare(b.caption);
}

function describe(dependency: Dependency, paint: ChalkInstance): string {
  const text = dependency.version ? `${dependency.caption} ${dependency.version}` : dependency.caption;
  const tags: string[] = [];
  if (!dependency.resolved) tags.push('unresolved');
  if (dependency.implicit) tags.push('implicit');

  const label = dependency.resolved ? text : paint.red(text);
  return tags.length > 0 ? `${label}${paint.gray(` [${tags.join(', ')}]`)}` : label;
}

function renderDependency(
  targeted: TargetedDependenciesSnapshot,
  dependency: Dependency,
  depth: number,
  path: Set<string>,
  paint: ChalkInstance,
  lines: string[]
): void {
  lines.push(`${INDENT.repeat(depth)}${describe(dependency, paint)}`);

  path.add(dependency.id);
  for (const childId of dependency.dependencyIds) {
    const child = targeted.get(childId);
    // Skip unknown ids and cycles
    if (child && child.visible && !path.has(child.id)) {
      renderDependency(targeted, child, depth + 1, path, paint, lines);
    }
  }
  path.delete(dependency.id);
}

/**
 * Render a snapshot as an indented tree: targets, their visible top-level
 * dependencies sorted by caption, and each dependency's children.
 */
export function renderSnapshot(snapshot: DependenciesSnapshot, paint: ChalkInstance = chalk): string[] {
  const lines = [paint.bold(snapshot.projectPath)];

  if (snapshot.targets.size === 0) {
    lines.push(`${INDENT}${paint.gray('(no targets)')}`);
    return lines;
  }

  for (const targeted of snapshot.targets.values()) {
    const target = targeted.targetFramework;
    const active = target.equals(snapshot.activeTarget) ? paint.green(' (active)') : '';
    lines.push(`${INDENT}${paint.cyan(target.shortName)}${active}`);

    const topLevel = targeted.topLevelDependencies.filter(dependency => dependency.visible);
    if (topLevel.length === 0) {
      lines.push(`${INDENT.repeat(2)}${paint.gray('(no dependencies)')}`);
      continue;
    }

    for (const dependency of [...topLevel].sort(byCaption)) {
      renderDependency(targeted, dependency, 2, new Set(), paint, lines);
    }
  }

  return lines;
}

export interface SnapshotJson {
  projectPath: string;
  activeTarget: string;
  targets: {
    targetFramework: string;
    dependencies: {
      id: string;
      caption: string;
      version: string | null;
      resolved: boolean;
      topLevel: boolean;
      implicit: boolean;
      children: readonly string[];
    }[];
  }[];
}

export function snapshotToJson(snapshot: DependenciesSnapshot): SnapshotJson {
  return {
    projectPath: snapshot.projectPath,
    activeTarget: snapshot.activeTarget.shortName,
    targets: [...snapshot.targets.values()].map(targeted => ({
      targetFramework: targeted.targetFramework.shortName,
      dependencies: [...targeted.dependencies.values()].map(dependency => ({
        id: dependency.id,
        caption: dependency.caption,
        version: dependency.version ?? null,
        resolved: dependency.resolved,
        topLevel: dependency.topLevel,
        implicit: dependency.implicit,
        children: dependency.dependencyIds,
      })),
    })),
  };
}
