import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { keyFor, recordFor, text } from '../../__tests__/fixtures.js';
import { ContentValidator } from '../../findings/content-validator.js';
import { MemoryFindingsStore } from '../../findings/memory-findings-store.js';
import { REVALIDATION_REASON, revalidateStored } from '../revalidation.js';

const single = keyFor('benchmarking', ['trends']);
const multi = keyFor('benchmarking', ['trends', 'crossref']);

async function seededStore() {
  const store = new MemoryFindingsStore();
  await store.put(recordFor(single, 1, { conclusions: text(150, 'Conclusion') }));
  await store.put(recordFor(multi, 1));
  return store;
}

describe('revalidateStored', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('leaves records that still pass alone', async () => {
    const store = await seededStore();

    const report = await revalidateStored(store, new ContentValidator());

    expect(report).toEqual({ checked: 2, invalidated: 0, byStatus: { valid: 2, partial: 0, invalid: 0 }, invalidatedKeys: [] });
  });

  it('invalidates records that fail stricter thresholds', async () => {
    const store = await seededStore();

    const report = await revalidateStored(store, new ContentValidator({ requiredNarrativeMin: 100 }));

    expect(report.byStatus).toEqual({ valid: 1, partial: 0, invalid: 1 });
    expect(report.invalidatedKeys).toEqual([multi.canonical]);
    expect((await store.get(multi.hash))?.lifecycle).toMatchObject({
      isActive: false,
      invalidationReason: REVALIDATION_REASON,
    });
    expect((await store.get(single.hash))?.lifecycle.isActive).toBe(true);

    const again = await revalidateStored(store, new ContentValidator({ requiredNarrativeMin: 100 }));
    expect(again.checked).toBe(1);
  });

  it('only checks records within the filter', async () => {
    const store = await seededStore();

    const report = await revalidateStored(store, new ContentValidator({ requiredNarrativeMin: 100 }), {
      analysisType: 'single',
    });

    expect(report).toMatchObject({ checked: 1, invalidated: 0 });
    expect((await store.get(multi.hash))?.lifecycle.isActive).toBe(true);
  });
});
