import { withDependencyChanges, type Dependency } from '../dependency.js';
import { accept, type AddFilterResult, type FilterContext, type SnapshotFilter } from './types.js';

export function aliasCaption(dependency: Dependency): string {
  return `${dependency.caption} (${dependency.originalItemSpec})`;
}

/**
 * Top-level dependencies from different providers that share a caption are
 * told apart by appending their item spec.
 */
export class DuplicatedDependenciesSnapshotFilter implements SnapshotFilter {
  readonly name = 'duplicated-dependencies';
  readonly order = 101;

  beforeAddOrUpdate(dependency: Dependency, context: FilterContext): AddFilterResult {
    if (!dependency.topLevel) {
      return accept(dependency);
    }

    let shouldAlias = false;

    for (const other of context.values()) {
      if (!other.topLevel || other.id === dependency.id) {
        continue;
      }

      if (other.caption === dependency.caption) {
        shouldAlias = true;
        context.addOrUpdate(withDependencyChanges(other, { caption: aliasCaption(other) }));
      } else if (
        other.caption === aliasCaption(dependency) ||
        // `other` was already aliased against this caption
        other.caption === `${dependency.caption} (${other.originalItemSpec})`
      ) {
        shouldAlias = true;
      }
    }

    return shouldAlias ? accept(withDependencyChanges(dependency, { caption: aliasCaption(dependency) })) : accept(dependency);
  }
}
