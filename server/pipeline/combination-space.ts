import type { Catalog, Language } from '../config/catalog.js';
import { canonicalize, type CombinationKey } from '../findings/combination-key.js';

export interface PlannedCombination {
  key: CombinationKey;
  priority: number;
}

export interface SpaceFilter {
  toolKeys?: readonly string[];
  languages?: readonly Language[];
}

/** Single-source combinations are cheapest and most requested, so they go first. */
export function defaultPriority(sourceCount: number): number {
  return 100 - 10 * sourceCount;
}

/** On-demand requests (urgency 1-10) jump ahead of everything seeded. */
export function requestPriority(urgency: number): number {
  return defaultPriority(0) + urgency;
}

export function nonEmptySubsets<T>(items: readonly T[]): T[][] {
  const subsets: T[][] = [];
  for (let mask = 1; mask < 1 << items.length; mask++) {
    const subset: T[] = [];
    items.forEach((item, i) => {
      if (mask & (1 << i)) subset.push(item);
    });
    subsets.push(subset);
  }
  return subsets;
}

/**
 * Every tool x non-empty source subset x language, highest priority first.
 */
export function enumerateCombinations(catalog: Catalog, filter: SpaceFilter = {}): PlannedCombination[] {
  const tools = filter.toolKeys
    ? catalog.tools.filter((tool) => filter.toolKeys?.includes(tool.key))
    : catalog.tools;
  const languages = filter.languages ?? catalog.languages;
  const subsets = nonEmptySubsets(catalog.sources.map((source) => source.key));

  const planned: PlannedCombination[] = [];
  for (const tool of tools) {
    for (const sources of subsets) {
      for (const language of languages) {
        const key = canonicalize(tool.key, sources, language, catalog);
        planned.push({ key, priority: defaultPriority(key.sourceKeys.length) });
      }
    }
  }
  return planned.sort((a, b) => b.priority - a.priority || a.key.canonical.localeCompare(b.key.canonical));
}
