export * from './types.js';
export { UnresolvedDependenciesSnapshotFilter } from './UnresolvedDependenciesSnapshotFilter.js';
export { DuplicatedDependenciesSnapshotFilter, aliasCaption } from './DuplicatedDependenciesSnapshotFilter.js';
export { ImplicitTopLevelDependenciesSnapshotFilter } from './ImplicitTopLevelDependenciesSnapshotFilter.js';

import type { SnapshotFilter } from './types.js';
import { UnresolvedDependenciesSnapshotFilter } from './UnresolvedDependenciesSnapshotFilter.js';
import { DuplicatedDependenciesSnapshotFilter } from './DuplicatedDependenciesSnapshotFilter.js';
import { ImplicitTopLevelDependenciesSnapshotFilter } from './ImplicitTopLevelDependenciesSnapshotFilter.js';

/**
 * Built-in filters minus the ones named in configuration.
 */
export function createDefaultFilters(disabled: readonly string[] = []): SnapshotFilter[] {
  const skip = new Set(disabled);
  return [
    new UnresolvedDependenciesSnapshotFilter(),
    new DuplicatedDependenciesSnapshotFilter(),
    new ImplicitTopLevelDependenciesSnapshotFilter(),
  ].filter(filter => !skip.has(filter.name));
}
