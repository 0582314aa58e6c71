import { and, asc, eq, sql, type SQL } from 'drizzle-orm';
import {
  insertPrecomputedFindingsSchema,
  precomputedFindings,
  type InsertPrecomputedFindings,
  type PrecomputedFindingsRow,
} from '../../shared/schema.js';
import type { Language } from '../config/catalog.js';
import type { Database } from '../db.js';
import { SchemaViolationError, StaleWriteError, StoreClosedError } from '../errors.js';
import type { FindingsStore, PutOptions } from './findings-store.js';
import { assertRecordShape, emptyStats } from './findings-store.js';
import type { FindingsRecord, NewFindingsRecord, RecordFilter, StoreStats } from './findings-types.js';

function parseLanguage(row: PrecomputedFindingsRow): Language {
  if (row.language === 'es' || row.language === 'en') return row.language;
  throw new SchemaViolationError(row.combinationHash, [`unsupported language "${row.language}"`]);
}

export function toRecord(row: PrecomputedFindingsRow): FindingsRecord {
  const base = {
    combinationHash: row.combinationHash,
    canonicalKey: row.canonicalKey,
    toolId: row.toolId,
    toolKey: row.toolKey,
    sourceKeys: row.sourceKeys,
    language: parseLanguage(row),
    executiveSummary: row.executiveSummary,
    principalFindings: row.principalFindings,
    strategicSynthesis: row.strategicSynthesis,
    conclusions: row.conclusions,
    metadata: {
      generatorId: row.generatorId,
      latencyMs: row.generationLatencyMs,
      confidenceScore: row.confidenceScore,
      dataPointsCount: row.dataPointsCount,
    },
    validation: { status: row.validationStatus, issues: row.validationIssues },
    schemaVersion: row.schemaVersion,
    lifecycle: {
      isActive: row.isActive,
      invalidatedAt: row.invalidatedAt,
      invalidationReason: row.invalidationReason,
      accessCount: row.accessCount,
      lastAccessedAt: row.lastAccessedAt,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    },
  };

  if (row.analysisType === 'single') {
    return { ...base, analysisType: 'single' };
  }
  return {
    ...base,
    analysisType: 'multi',
    correlationAnalysis: row.correlationAnalysis ?? '',
    componentAnalysis: row.componentAnalysis ?? '',
    temporalAnalysis: row.temporalAnalysis ?? undefined,
    seasonalAnalysis: row.seasonalAnalysis ?? undefined,
    spectralAnalysis: row.spectralAnalysis ?? undefined,
  };
}

export function toRow(record: NewFindingsRecord): InsertPrecomputedFindings {
  const multi = record.analysisType === 'multi' ? record : undefined;
  return {
    combinationHash: record.combinationHash,
    canonicalKey: record.canonicalKey,
    toolId: record.toolId,
    toolKey: record.toolKey,
    sourceKeys: [...record.sourceKeys],
    sourceCount: record.sourceKeys.length,
    language: record.language,
    analysisType: record.analysisType,
    executiveSummary: record.executiveSummary,
    principalFindings: record.principalFindings,
    strategicSynthesis: record.strategicSynthesis,
    conclusions: record.conclusions,
    correlationAnalysis: multi?.correlationAnalysis ?? null,
    componentAnalysis: multi?.componentAnalysis ?? null,
    temporalAnalysis: multi?.temporalAnalysis ?? null,
    seasonalAnalysis: multi?.seasonalAnalysis ?? null,
    spectralAnalysis: multi?.spectralAnalysis ?? null,
    generatorId: record.metadata.generatorId,
    generationLatencyMs: Math.round(record.metadata.latencyMs),
    confidenceScore: record.metadata.confidenceScore,
    dataPointsCount: record.metadata.dataPointsCount,
    validationStatus: record.validation.status,
    validationIssues: record.validation.issues,
    schemaVersion: record.schemaVersion,
    isActive: true,
    invalidatedAt: null,
    invalidationReason: null,
  };
}

function filterConditions(filter: RecordFilter): SQL | undefined {
  const conditions: SQL[] = [];
  if (!filter.includeInactive) conditions.push(eq(precomputedFindings.isActive, true));
  if (filter.toolKey) conditions.push(eq(precomputedFindings.toolKey, filter.toolKey));
  if (filter.analysisType) conditions.push(eq(precomputedFindings.analysisType, filter.analysisType));
  if (filter.language) conditions.push(eq(precomputedFindings.language, filter.language));
  if (filter.validationStatus) conditions.push(eq(precomputedFindings.validationStatus, filter.validationStatus));
  return and(...conditions);
}

/**
 * PostgreSQL FindingsStore. Writes are a single upsert whose update branch
 * only fires when the incoming record supersedes the stored one, so
 * concurrent writers to one hash are ordered by the row lock alone.
 */
export class DatabaseFindingsStore implements FindingsStore {
  private closed = false;

  constructor(private readonly db: Database) {}

  async get(hash: string): Promise<FindingsRecord | undefined> {
    this.ensureOpen();
    const [row] = await this.db
      .select()
      .from(precomputedFindings)
      .where(eq(precomputedFindings.combinationHash, hash))
      .limit(1);
    return row ? toRecord(row) : undefined;
  }

  async put(record: NewFindingsRecord, options: PutOptions = {}): Promise<FindingsRecord> {
    this.ensureOpen();
    assertRecordShape(record);

    const row = toRow(record);
    const checked = insertPrecomputedFindingsSchema.safeParse(row);
    if (!checked.success) {
      throw new SchemaViolationError(
        record.combinationHash,
        checked.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }

    const now = new Date();
    const { combinationHash: _hash, ...updatable } = row;
    const supersedes = options.replaceCurrent
      ? sql`${precomputedFindings.schemaVersion} <= ${record.schemaVersion}`
      : sql`${precomputedFindings.schemaVersion} < ${record.schemaVersion}
          OR (${precomputedFindings.schemaVersion} = ${record.schemaVersion}
            AND (${precomputedFindings.isActive} = false OR ${precomputedFindings.validationStatus} = 'invalid'))`;
    const [written] = await this.db
      .insert(precomputedFindings)
      .values({ ...row, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: precomputedFindings.combinationHash,
        set: { ...updatable, updatedAt: now },
        setWhere: supersedes,
      })
      .returning();

    if (written) {
      console.log(`💾 [FindingsStore] Stored ${record.analysisType} findings ${record.combinationHash.slice(0, 12)} (${record.validation.status}, v${record.schemaVersion})`);
      return toRecord(written);
    }

    const existing = await this.get(record.combinationHash);
    throw new StaleWriteError(record.combinationHash, record.schemaVersion, existing?.schemaVersion ?? record.schemaVersion);
  }

  async markAccessed(hash: string): Promise<void> {
    this.ensureOpen();
    await this.db
      .update(precomputedFindings)
      .set({
        accessCount: sql`${precomputedFindings.accessCount} + 1`,
        lastAccessedAt: new Date(),
      })
      .where(eq(precomputedFindings.combinationHash, hash));
  }

  async invalidate(hash: string, reason: string): Promise<boolean> {
    this.ensureOpen();
    const now = new Date();
    const updated = await this.db
      .update(precomputedFindings)
      .set({ isActive: false, invalidatedAt: now, invalidationReason: reason, updatedAt: now })
      .where(eq(precomputedFindings.combinationHash, hash))
      .returning({ id: precomputedFindings.id });
    return updated.length > 0;
  }

  async countValid(filter: RecordFilter = {}): Promise<number> {
    this.ensureOpen();
    const [result] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(precomputedFindings)
      .where(filterConditions({ ...filter, includeInactive: false, validationStatus: 'valid' }));
    return result?.count ?? 0;
  }

  async list(filter: RecordFilter = {}): Promise<FindingsRecord[]> {
    this.ensureOpen();
    const query = this.db
      .select()
      .from(precomputedFindings)
      .where(filterConditions(filter))
      .orderBy(asc(precomputedFindings.canonicalKey));
    const rows = filter.limit !== undefined ? await query.limit(filter.limit) : await query;
    return rows.map(toRecord);
  }

  async stats(filter: RecordFilter = {}): Promise<StoreStats> {
    this.ensureOpen();
    const groups = await this.db
      .select({
        isActive: precomputedFindings.isActive,
        status: precomputedFindings.validationStatus,
        type: precomputedFindings.analysisType,
        count: sql<number>`count(*)::int`,
        accesses: sql<number>`coalesce(sum(${precomputedFindings.accessCount}), 0)::int`,
      })
      .from(precomputedFindings)
      .where(filterConditions({ ...filter, includeInactive: true }))
      .groupBy(precomputedFindings.isActive, precomputedFindings.validationStatus, precomputedFindings.analysisType);

    const stats = emptyStats();
    for (const group of groups) {
      stats.total += group.count;
      stats.totalAccesses += group.accesses;
      if (!group.isActive) {
        stats.invalidated += group.count;
        continue;
      }
      stats.active += group.count;
      stats.byStatus[group.status] += group.count;
      stats.byType[group.type] += group.count;
    }
    return stats;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) throw new StoreClosedError('DatabaseFindingsStore');
  }
}
