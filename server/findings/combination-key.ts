import { createHash } from 'crypto';
import { InvalidCombinationError } from '../errors.js';
import type { Catalog, Language } from '../config/catalog.js';
import type { AnalysisType } from '../../shared/schema.js';

/**
 * Canonical identity of one (tool, source set, language) combination.
 * `canonical` is the exact string the hash was computed over; stores keep it
 * beside the hash and compare it on read.
 */
export interface CombinationKey {
  readonly toolKey: string;
  readonly toolId: number;
  readonly sourceKeys: readonly string[];
  readonly language: Language;
  readonly analysisType: AnalysisType;
  readonly canonical: string;
  readonly hash: string;
}

export function serializeCombination(toolKey: string, sourceKeys: readonly string[], language: string): string {
  return JSON.stringify({ tool: toolKey, sources: sourceKeys, language });
}

export function hashCanonical(canonical: string): string {
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

export function analysisTypeFor(sourceCount: number): AnalysisType {
  return sourceCount === 1 ? 'single' : 'multi';
}

/**
 * Resolve user-facing labels (any casing, spacing, alias or input order) to a
 * frozen CombinationKey. Throws InvalidCombinationError for unknown tools,
 * sources or languages and for an empty source set.
 */
export function canonicalize(
  tool: string,
  sources: readonly string[],
  language: string,
  catalog: Catalog,
): CombinationKey {
  const toolEntry = catalog.resolveTool(tool);
  if (!toolEntry) {
    throw new InvalidCombinationError(`Unknown tool "${tool}"`, { tool });
  }

  const resolvedLanguage = catalog.resolveLanguage(language);
  if (!resolvedLanguage) {
    throw new InvalidCombinationError(`Unsupported language "${language}"`, { language });
  }

  const unknown: string[] = [];
  const sourceKeys = new Set<string>();
  for (const source of sources) {
    if (source.trim() === '') continue;
    const entry = catalog.resolveSource(source);
    if (entry) sourceKeys.add(entry.key);
    else unknown.push(source);
  }
  if (unknown.length > 0) {
    throw new InvalidCombinationError(`Unknown source(s): ${unknown.join(', ')}`, { sources: unknown });
  }
  if (sourceKeys.size === 0) {
    throw new InvalidCombinationError('At least one data source is required', { sources: [...sources] });
  }

  const sorted = [...sourceKeys].sort();
  const canonical = serializeCombination(toolEntry.key, sorted, resolvedLanguage);

  return Object.freeze({
    toolKey: toolEntry.key,
    toolId: toolEntry.id,
    sourceKeys: Object.freeze(sorted),
    language: resolvedLanguage,
    analysisType: analysisTypeFor(sorted.length),
    canonical,
    hash: hashCanonical(canonical),
  });
}
