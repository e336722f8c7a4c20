/**
 * Project items visible in an evaluation catalog, reduced to their item specs.
 */

export interface ProjectItem {
  /** Unescaped evaluated include */
  readonly evaluatedInclude: string;
  /** Items that come from imported files rather than the project file itself */
  readonly imported?: boolean;
}

export interface ProjectCatalog {
  readonly items: readonly ProjectItem[];
}

export interface ProjectItemSpecs {
  has(itemSpec: string): boolean;
  readonly size: number;
}

export type ItemSpecNormalizer = (itemSpec: string) => string;

export const ignoreCase: ItemSpecNormalizer = itemSpec => itemSpec.toLowerCase();

/**
 * Item specs declared directly in the project. Returns null ("no data") when
 * no catalog accompanies the change, e.g. for provider-driven updates.
 */
export function extractProjectItemSpecs(
  catalog: ProjectCatalog | null | undefined,
  normalize: ItemSpecNormalizer = ignoreCase
): ProjectItemSpecs | null {
  if (!catalog) {
    return null;
  }

  const specs = new Set<string>();
  for (const item of catalog.items) {
    if (item.imported || item.evaluatedInclude.length === 0) {
      continue;
    }
    specs.add(normalize(item.evaluatedInclude));
  }

  return {
    has: (itemSpec: string) => specs.has(normalize(itemSpec)),
    size: specs.size,
  };
}
