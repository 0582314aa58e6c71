import { StoreClosedError } from '../errors.js';
import type { FindingsStore, PutOptions } from './findings-store.js';
import { assertRecordShape, assertSupersedes, emptyStats, matchesFilter } from './findings-store.js';
import type { FindingsRecord, NewFindingsRecord, RecordFilter, StoreStats } from './findings-types.js';

/**
 * In-process FindingsStore for development (STORAGE_DRIVER=memory) and tests.
 * Each write completes synchronously between awaits, so writes to one hash
 * are totally ordered. Records are cloned on the way in and out.
 */
export class MemoryFindingsStore implements FindingsStore {
  private records = new Map<string, FindingsRecord>();
  private closed = false;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(hash: string): Promise<FindingsRecord | undefined> {
    this.ensureOpen();
    const record = this.records.get(hash);
    return record ? structuredClone(record) : undefined;
  }

  async put(record: NewFindingsRecord, options: PutOptions = {}): Promise<FindingsRecord> {
    this.ensureOpen();
    assertRecordShape(record);

    const existing = this.records.get(record.combinationHash);
    if (existing) assertSupersedes(existing, record, options);

    const now = this.now();
    const stored: FindingsRecord = {
      ...structuredClone(record),
      lifecycle: {
        isActive: true,
        invalidatedAt: null,
        invalidationReason: null,
        accessCount: existing?.lifecycle.accessCount ?? 0,
        lastAccessedAt: existing?.lifecycle.lastAccessedAt ?? null,
        createdAt: existing?.lifecycle.createdAt ?? now,
        updatedAt: now,
      },
    };
    this.records.set(record.combinationHash, stored);
    return structuredClone(stored);
  }

  async markAccessed(hash: string): Promise<void> {
    this.ensureOpen();
    const record = this.records.get(hash);
    if (!record) return;
    record.lifecycle.accessCount += 1;
    record.lifecycle.lastAccessedAt = this.now();
  }

  async invalidate(hash: string, reason: string): Promise<boolean> {
    this.ensureOpen();
    const record = this.records.get(hash);
    if (!record) return false;
    const now = this.now();
    record.lifecycle.isActive = false;
    record.lifecycle.invalidatedAt = now;
    record.lifecycle.invalidationReason = reason;
    record.lifecycle.updatedAt = now;
    return true;
  }

  async countValid(filter: RecordFilter = {}): Promise<number> {
    this.ensureOpen();
    let count = 0;
    for (const record of this.records.values()) {
      if (matchesFilter(record, { ...filter, includeInactive: false, validationStatus: 'valid' })) count++;
    }
    return count;
  }

  async list(filter: RecordFilter = {}): Promise<FindingsRecord[]> {
    this.ensureOpen();
    const matches = [...this.records.values()]
      .filter((record) => matchesFilter(record, filter))
      .sort((a, b) => a.canonicalKey.localeCompare(b.canonicalKey));
    const limited = filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
    return limited.map((record) => structuredClone(record));
  }

  async stats(filter: RecordFilter = {}): Promise<StoreStats> {
    this.ensureOpen();
    const stats = emptyStats();
    for (const record of this.records.values()) {
      if (!matchesFilter(record, { ...filter, includeInactive: true })) continue;
      stats.total++;
      stats.totalAccesses += record.lifecycle.accessCount;
      if (!record.lifecycle.isActive) {
        stats.invalidated++;
        continue;
      }
      stats.active++;
      stats.byStatus[record.validation.status]++;
      stats.byType[record.analysisType]++;
    }
    return stats;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) throw new StoreClosedError('MemoryFindingsStore');
  }
}
