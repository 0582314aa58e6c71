import { describe, expect, it } from 'vitest';
import { catalog } from '../../__tests__/fixtures.js';
import { defaultPriority, enumerateCombinations, nonEmptySubsets } from '../combination-space.js';

describe('nonEmptySubsets', () => {
  it('lists every non-empty subset once', () => {
    expect(nonEmptySubsets(['a', 'b', 'c'])).toEqual([['a'], ['b'], ['a', 'b'], ['c'], ['a', 'c'], ['b', 'c'], ['a', 'b', 'c']]);
    expect(nonEmptySubsets([])).toEqual([]);
  });
});

describe('enumerateCombinations', () => {
  it('covers every tool, source subset and language', () => {
    const planned = enumerateCombinations(catalog);

    expect(planned).toHaveLength(21 * 31 * 2);
    expect(new Set(planned.map((entry) => entry.key.hash)).size).toBe(planned.length);
  });

  it('schedules single-source combinations first', () => {
    const planned = enumerateCombinations(catalog);

    expect(planned[0]?.key.analysisType).toBe('single');
    expect(planned[0]?.priority).toBe(90);
    expect(planned[planned.length - 1]?.key.sourceKeys).toHaveLength(5);
    expect(planned.filter((entry) => entry.priority === defaultPriority(1))).toHaveLength(21 * 5 * 2);
  });

  it('narrows to one tool and language', () => {
    const planned = enumerateCombinations(catalog, { toolKeys: ['benchmarking'], languages: ['en'] });

    expect(planned).toHaveLength(31);
    expect(planned.every((entry) => entry.key.toolKey === 'benchmarking' && entry.key.language === 'en')).toBe(true);
  });
});
