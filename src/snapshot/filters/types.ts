import type { Precedence } from '../../core/precedence.js';
import type { TargetFramework } from '../../core/target-framework.js';
import type { SubtreeProvider } from '../../core/types.js';
import type { Dependency } from '../dependency.js';
import type { ProjectItemSpecs } from '../item-specs.js';

/**
 * View of the target slice being rebuilt, handed to each filter.
 */
export interface FilterContext {
  readonly projectPath: string;
  readonly targetFramework: TargetFramework;
  readonly subtreeProviders: ReadonlyMap<string, SubtreeProvider>;
  /** null when the change carries no catalog ("no data") */
  readonly projectItemSpecs: ProjectItemSpecs | null;
  /** Current state of the slice, including edits made earlier in this batch */
  get(dependencyId: string): Dependency | undefined;
  values(): Iterable<Dependency>;
  /** Inject or replace another dependency in the slice */
  addOrUpdate(dependency: Dependency): void;
}

export type AddFilterResult =
  | { readonly action: 'accept'; readonly dependency: Dependency }
  | { readonly action: 'reject' };

export interface SnapshotFilter extends Precedence {
  readonly name: string;
  /** Runs for every addition or update; may transform, veto or inject. */
  beforeAddOrUpdate?(dependency: Dependency, context: FilterContext): AddFilterResult;
  /** Runs for every removal of an existing dependency; false keeps it. */
  beforeRemove?(dependency: Dependency, context: FilterContext): boolean;
}

export const accept = (dependency: Dependency): AddFilterResult => ({ action: 'accept', dependency });
export const reject = (): AddFilterResult => ({ action: 'reject' });
