import { withDependencyChanges, type Dependency } from '../dependency.js';
import { accept, type AddFilterResult, type FilterContext, type SnapshotFilter } from './types.js';

/**
 * A resolved top-level dependency that the project file does not declare was
 * brought in implicitly (by the SDK or a props file); mark it so.
 *
 * Without item spec data nothing can be decided and dependencies pass through.
 */
export class ImplicitTopLevelDependenciesSnapshotFilter implements SnapshotFilter {
  readonly name = 'implicit-top-level-dependencies';
  readonly order = 130;

  beforeAddOrUpdate(dependency: Dependency, context: FilterContext): AddFilterResult {
    const itemSpecs = context.projectItemSpecs;

    if (
      itemSpecs === null ||
      dependency.implicit ||
      !dependency.resolved ||
      !dependency.topLevel ||
      itemSpecs.has(dependency.originalItemSpec)
    ) {
      return accept(dependency);
    }

    const provider = context.subtreeProviders.get(dependency.providerType);
    if (!provider) {
      return accept(dependency);
    }

    return accept(
      withDependencyChanges(dependency, {
        implicit: true,
        icon: provider.implicitIcon ?? dependency.icon,
      })
    );
  }
}
