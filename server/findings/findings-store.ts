import { SchemaViolationError, StaleWriteError } from '../errors.js';
import { hashCanonical, serializeCombination } from './combination-key.js';
import type { FindingsRecord, NewFindingsRecord, RecordFilter, StoreStats } from './findings-types.js';

/**
 * Persistent findings keyed by combination hash. Implementations serialize
 * writes per hash and never take a store-wide lock.
 */
export interface PutOptions {
  /** Let a record of the same schema version replace a usable one (forced refresh). */
  replaceCurrent?: boolean;
}

export interface FindingsStore {
  get(hash: string): Promise<FindingsRecord | undefined>;
  /** Insert, or supersede the stored record. Throws StaleWriteError / SchemaViolationError. */
  put(record: NewFindingsRecord, options?: PutOptions): Promise<FindingsRecord>;
  markAccessed(hash: string): Promise<void>;
  /** Soft-invalidate. Returns false when nothing is stored for the hash. */
  invalidate(hash: string, reason: string): Promise<boolean>;
  countValid(filter?: RecordFilter): Promise<number>;
  list(filter?: RecordFilter): Promise<FindingsRecord[]>;
  stats(filter?: RecordFilter): Promise<StoreStats>;
  close(): Promise<void>;
}

const MULTI_ONLY_FIELDS = ['correlationAnalysis', 'componentAnalysis', 'temporalAnalysis', 'seasonalAnalysis', 'spectralAnalysis'];

export function findSchemaViolations(record: NewFindingsRecord): string[] {
  const violations: string[] = [];

  const expectedCanonical = serializeCombination(record.toolKey, record.sourceKeys, record.language);
  if (record.canonicalKey !== expectedCanonical) {
    violations.push('canonical key does not match tool, sources and language');
  }
  if (record.combinationHash !== hashCanonical(record.canonicalKey)) {
    violations.push('combination hash does not match canonical key');
  }
  const sorted = [...new Set(record.sourceKeys)].sort();
  if (sorted.length !== record.sourceKeys.length || sorted.some((key, i) => key !== record.sourceKeys[i])) {
    violations.push('source keys must be sorted and unique');
  }
  if (!Number.isInteger(record.schemaVersion) || record.schemaVersion < 1) {
    violations.push(`schema version ${record.schemaVersion} is not a positive integer`);
  }

  if (record.analysisType === 'single') {
    if (record.sourceKeys.length !== 1) {
      violations.push(`single-source record has ${record.sourceKeys.length} sources`);
    }
    for (const field of MULTI_ONLY_FIELDS) {
      const value: unknown = Reflect.get(record, field);
      if (typeof value === 'string' && value.trim() !== '') {
        violations.push(`single-source record carries ${field}`);
      }
    }
  } else {
    if (record.sourceKeys.length < 2) {
      violations.push(`multi-source record has ${record.sourceKeys.length} source(s)`);
    }
    if (record.validation.status !== 'invalid' && record.principalFindings.trim() === '') {
      violations.push('multi-source record marked usable with empty principal findings');
    }
  }

  return violations;
}

export function assertRecordShape(record: NewFindingsRecord): void {
  const violations = findSchemaViolations(record);
  if (violations.length > 0) {
    throw new SchemaViolationError(record.combinationHash, violations);
  }
}

/**
 * A newer schema version always supersedes. An equal version only replaces a
 * record that was soft-invalidated or classified invalid, unless the caller
 * asked to replace the current record.
 */
export function canSupersede(existing: FindingsRecord, incoming: NewFindingsRecord, options: PutOptions = {}): boolean {
  if (incoming.schemaVersion > existing.schemaVersion) return true;
  if (incoming.schemaVersion < existing.schemaVersion) return false;
  if (options.replaceCurrent) return true;
  return !existing.lifecycle.isActive || existing.validation.status === 'invalid';
}

export function assertSupersedes(existing: FindingsRecord, incoming: NewFindingsRecord, options: PutOptions = {}): void {
  if (!canSupersede(existing, incoming, options)) {
    throw new StaleWriteError(incoming.combinationHash, incoming.schemaVersion, existing.schemaVersion);
  }
}

export function matchesFilter(record: FindingsRecord, filter: RecordFilter = {}): boolean {
  if (!filter.includeInactive && !record.lifecycle.isActive) return false;
  if (filter.toolKey && record.toolKey !== filter.toolKey) return false;
  if (filter.analysisType && record.analysisType !== filter.analysisType) return false;
  if (filter.language && record.language !== filter.language) return false;
  if (filter.validationStatus && record.validation.status !== filter.validationStatus) return false;
  return true;
}

export function emptyStats(): StoreStats {
  return {
    total: 0,
    active: 0,
    invalidated: 0,
    byStatus: { valid: 0, partial: 0, invalid: 0 },
    byType: { single: 0, multi: 0 },
    totalAccesses: 0,
  };
}
