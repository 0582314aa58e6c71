import { describe, expect, it } from 'vitest';
import type { ComputationJobRow, PrecomputedFindingsRow } from '../../../shared/schema.js';
import { SchemaViolationError } from '../../errors.js';
import { keyFor, recordFor, text } from '../../__tests__/fixtures.js';
import { toJob } from '../../pipeline/database-job-store.js';
import { toRecord, toRow } from '../database-findings-store.js';
import type { NewFindingsRecord } from '../findings-types.js';

const created = new Date('2024-03-01T10:00:00Z');

function storedRow(record: NewFindingsRecord): PrecomputedFindingsRow {
  const insert = toRow(record);
  return {
    ...insert,
    id: 7,
    correlationAnalysis: insert.correlationAnalysis ?? null,
    componentAnalysis: insert.componentAnalysis ?? null,
    temporalAnalysis: insert.temporalAnalysis ?? null,
    seasonalAnalysis: insert.seasonalAnalysis ?? null,
    spectralAnalysis: insert.spectralAnalysis ?? null,
    generationLatencyMs: insert.generationLatencyMs ?? 0,
    confidenceScore: insert.confidenceScore ?? 0,
    dataPointsCount: insert.dataPointsCount ?? 0,
    validationIssues: insert.validationIssues ?? [],
    isActive: insert.isActive ?? true,
    invalidatedAt: insert.invalidatedAt ?? null,
    invalidationReason: insert.invalidationReason ?? null,
    accessCount: 3,
    lastAccessedAt: created,
    createdAt: created,
    updatedAt: created,
  };
}

const lifecycle = {
  isActive: true,
  invalidatedAt: null,
  invalidationReason: null,
  accessCount: 3,
  lastAccessedAt: created,
  createdAt: created,
  updatedAt: created,
};

describe('findings row mapping', () => {
  it('stores single-source records with every cross-source column empty', () => {
    const record = recordFor(keyFor('benchmarking', ['trends']));

    const row = toRow(record);

    expect(row).toMatchObject({
      analysisType: 'single',
      sourceCount: 1,
      correlationAnalysis: null,
      componentAnalysis: null,
      temporalAnalysis: null,
      seasonalAnalysis: null,
      spectralAnalysis: null,
      generatorId: 'stub:v1',
      schemaVersion: 1,
    });
    expect(toRecord(storedRow(record))).toEqual({ ...record, lifecycle });
  });

  it('keeps multi-source sections through a round trip', () => {
    const record = recordFor(keyFor('benchmarking', ['trends', 'books']), 2, {
      temporal_analysis: text(90, 'Temporal'),
    });

    const row = toRow(record);
    expect(row.sourceCount).toBe(2);
    expect(row.correlationAnalysis).toBe(text(200, 'Correlation').trim());
    expect(row.seasonalAnalysis).toBeNull();

    const restored = toRecord(storedRow(record));
    expect(restored).toEqual({ ...record, lifecycle });
    expect(restored.analysisType === 'multi' && restored.temporalAnalysis).toBe(text(90, 'Temporal').trim());
  });

  it('rejects rows in an unsupported language', () => {
    const row = { ...storedRow(recordFor(keyFor('benchmarking', ['trends']))), language: 'fr' };
    expect(() => toRecord(row)).toThrow(SchemaViolationError);
  });
});

describe('job row mapping', () => {
  const row: ComputationJobRow = {
    id: 4,
    combinationHash: 'b'.repeat(64),
    canonicalKey: 'benchmarking|google_trends|en',
    toolKey: 'benchmarking',
    sourceKeys: ['google_trends'],
    sourceCount: 1,
    language: 'en',
    schemaVersion: 2,
    status: 'pending',
    attempts: 0,
    maxAttempts: 3,
    priority: 90,
    lastError: null,
    nextAttemptAt: null,
    leasedAt: null,
    completedAt: null,
    createdAt: created,
    updatedAt: created,
  };

  it('drops the derived source count', () => {
    const job = toJob(row);
    expect(job).not.toHaveProperty('sourceCount');
    expect(job).toMatchObject({ id: 4, language: 'en', sourceKeys: ['google_trends'] });
  });

  it('rejects an unsupported language', () => {
    expect(() => toJob({ ...row, language: 'de' })).toThrow('Job 4 has unsupported language "de"');
  });
});
