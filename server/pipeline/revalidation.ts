import type { ValidationStatus } from '../../shared/schema.js';
import type { ContentValidator } from '../findings/content-validator.js';
import type { RecordFilter } from '../findings/findings-types.js';
import type { FindingsStore } from '../findings/findings-store.js';

export interface RevalidationReport {
  checked: number;
  invalidated: number;
  byStatus: Record<ValidationStatus, number>;
  invalidatedKeys: string[];
}

export const REVALIDATION_REASON = 'revalidation_failed';

/**
 * Re-classify active records against the validator's current thresholds and
 * soft-invalidate the ones that no longer pass. Records stay in the store, so
 * the next resolve for their hash regenerates them.
 */
export async function revalidateStored(
  store: FindingsStore,
  validator: ContentValidator,
  filter: Omit<RecordFilter, 'includeInactive'> = {},
): Promise<RevalidationReport> {
  const records = await store.list({ ...filter, includeInactive: false });
  const report: RevalidationReport = {
    checked: 0,
    invalidated: 0,
    byStatus: { valid: 0, partial: 0, invalid: 0 },
    invalidatedKeys: [],
  };

  for (const record of records) {
    const { status, issues } = validator.validateRecord(record);
    report.checked++;
    report.byStatus[status]++;
    if (status !== 'invalid') continue;

    if (await store.invalidate(record.combinationHash, REVALIDATION_REASON)) {
      report.invalidated++;
      report.invalidatedKeys.push(record.canonicalKey);
      console.warn(
        `⚠️ [Revalidation] Invalidated ${record.canonicalKey}: ${issues.map((issue) => issue.code).join(', ')}`,
      );
    }
  }

  console.log(`✅ [Revalidation] Checked ${report.checked} records, invalidated ${report.invalidated}`);
  return report;
}
