import { accept, reject, type AddFilterResult, type FilterContext, type SnapshotFilter } from './types.js';
import type { Dependency } from '../dependency.js';

/**
 * An unresolved report never overwrites a dependency that is already resolved.
 */
export class UnresolvedDependenciesSnapshotFilter implements SnapshotFilter {
  readonly name = 'unresolved-dependencies';
  readonly order = 100;

  beforeAddOrUpdate(dependency: Dependency, context: FilterContext): AddFilterResult {
    if (!dependency.resolved && context.get(dependency.id)?.resolved) {
      return reject();
    }
    return accept(dependency);
  }
}
