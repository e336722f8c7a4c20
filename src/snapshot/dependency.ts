import type { TargetFramework } from '../core/target-framework.js';

/**
 * A dependency as reported by a subscriber or subtree provider.
 */
export interface DependencyModel {
  /** Provider-scoped identity, e.g. a package id or a project path */
  readonly id: string;
  readonly providerType: string;
  readonly caption: string;
  readonly originalItemSpec: string;
  readonly version?: string;
  readonly resolved: boolean;
  readonly topLevel: boolean;
  readonly implicit?: boolean;
  readonly visible?: boolean;
  readonly icon?: string;
  /** Provider-scoped ids of child dependencies */
  readonly dependencyIds?: readonly string[];
  readonly properties?: Readonly<Record<string, string>>;
}

/**
 * A dependency as stored in a snapshot slice.
 */
export interface Dependency {
  /** Snapshot-wide identity: `<target>/<provider>/<model id>`, lower case */
  readonly id: string;
  readonly modelId: string;
  readonly targetFramework: TargetFramework;
  readonly providerType: string;
  readonly caption: string;
  readonly originalItemSpec: string;
  readonly version?: string;
  readonly resolved: boolean;
  readonly topLevel: boolean;
  readonly implicit: boolean;
  readonly visible: boolean;
  readonly icon?: string;
  readonly dependencyIds: readonly string[];
  readonly properties: Readonly<Record<string, string>>;
}

export function getDependencyId(targetFramework: TargetFramework, providerType: string, modelId: string): string {
  const normalizedModelId = modelId.replace(/\\/g, '/').replace(/\/+$/, '');
  return `${targetFramework.shortName}/${providerType}/${normalizedModelId}`.toLowerCase();
}

export function createDependency(targetFramework: TargetFramework, model: DependencyModel): Dependency {
  return {
    id: getDependencyId(targetFramework, model.providerType, model.id),
    modelId: model.id,
    targetFramework,
    providerType: model.providerType,
    caption: model.caption,
    originalItemSpec: model.originalItemSpec,
    version: model.version,
    resolved: model.resolved,
    topLevel: model.topLevel,
    implicit: model.implicit ?? false,
    visible: model.visible ?? true,
    icon: model.icon,
    dependencyIds: (model.dependencyIds ?? []).map(childId =>
      getDependencyId(targetFramework, model.providerType, childId)
    ),
    properties: { ...model.properties },
  };
}

export function withDependencyChanges(
  dependency: Dependency,
  patch: Partial<Pick<Dependency, 'caption' | 'implicit' | 'icon' | 'visible' | 'resolved'>>
): Dependency {
  return { ...dependency, ...patch };
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

function sameProperties(a: Readonly<Record<string, string>>, b: Readonly<Record<string, string>>): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every(key => a[key] === b[key]);
}

/**
 * Structural equality; an update that changes nothing is not a change.
 */
export function sameDependency(a: Dependency, b: Dependency): boolean {
  return (
    a.id === b.id &&
    a.caption === b.caption &&
    a.originalItemSpec === b.originalItemSpec &&
    a.version === b.version &&
    a.resolved === b.resolved &&
    a.topLevel === b.topLevel &&
    a.implicit === b.implicit &&
    a.visible === b.visible &&
    a.icon === b.icon &&
    sameList(a.dependencyIds, b.dependencyIds) &&
    sameProperties(a.properties, b.properties)
  );
}
