import { and, asc, desc, eq, gte, inArray, isNull, lt, lte, notInArray, or, sql, type SQL } from 'drizzle-orm';
import { computationJobs, type ComputationJobRow, type InsertComputationJob } from '../../shared/schema.js';
import type { Database } from '../db.js';
import { RecordNotFoundError, StoreClosedError } from '../errors.js';
import type { ComputationJob, JobCounts, JobFilter, JobRequest, JobScope, JobStore, NewJob } from './job-store.js';
import { emptyCounts } from './job-store.js';

export function toJob(row: ComputationJobRow): ComputationJob {
  if (row.language !== 'es' && row.language !== 'en') {
    throw new Error(`Job ${row.id} has unsupported language "${row.language}"`);
  }
  const { sourceCount: _sourceCount, ...job } = row;
  return { ...job, language: row.language };
}

function scopeConditions(scope: JobScope): SQL[] {
  const conditions: SQL[] = [];
  if (scope.toolKey) conditions.push(eq(computationJobs.toolKey, scope.toolKey));
  if (scope.language) conditions.push(eq(computationJobs.language, scope.language));
  if (scope.schemaVersion !== undefined) conditions.push(eq(computationJobs.schemaVersion, scope.schemaVersion));
  return conditions;
}

function toInsertRow({ key, priority, maxAttempts, schemaVersion }: NewJob): InsertComputationJob {
  return {
    combinationHash: key.hash,
    canonicalKey: key.canonical,
    toolKey: key.toolKey,
    sourceKeys: [...key.sourceKeys],
    sourceCount: key.sourceKeys.length,
    language: key.language,
    schemaVersion,
    status: 'pending',
    attempts: 0,
    maxAttempts,
    priority,
  };
}

const LIVE_STATUSES: ComputationJob['status'][] = ['pending', 'running'];

const INSERT_CHUNK = 500;

/**
 * PostgreSQL job queue. Leases are conditional updates
 * (`... WHERE status = 'pending' ... FOR UPDATE SKIP LOCKED`), so several
 * pipeline processes can drain one queue without double-claiming.
 */
export class DatabaseJobStore implements JobStore {
  private closed = false;

  constructor(private readonly db: Database) {}

  async enqueue(jobs: NewJob[]): Promise<number> {
    this.ensureOpen();
    let inserted = 0;
    for (let i = 0; i < jobs.length; i += INSERT_CHUNK) {
      const rows = jobs.slice(i, i + INSERT_CHUNK).map(toInsertRow);
      const result = await this.db
        .insert(computationJobs)
        .values(rows)
        .onConflictDoNothing()
        .returning({ id: computationJobs.id });
      inserted += result.length;
    }
    return inserted;
  }

  async request(request: NewJob): Promise<JobRequest> {
    this.ensureOpen();
    const { key, priority, maxAttempts, schemaVersion } = request;
    const now = new Date();

    const [live] = await this.db
      .update(computationJobs)
      .set({ priority: sql`greatest(${computationJobs.priority}, ${priority})`, updatedAt: now })
      .where(and(eq(computationJobs.combinationHash, key.hash), inArray(computationJobs.status, LIVE_STATUSES)))
      .returning();
    if (live) return { job: toJob(live), outcome: 'existing' };

    const [created] = await this.db
      .insert(computationJobs)
      .values(toInsertRow(request))
      .onConflictDoNothing()
      .returning();
    if (created) return { job: toJob(created), outcome: 'created' };

    const [reopened] = await this.db
      .update(computationJobs)
      .set({
        status: 'pending',
        attempts: 0,
        maxAttempts,
        priority,
        lastError: null,
        nextAttemptAt: null,
        leasedAt: null,
        completedAt: null,
        updatedAt: now,
      })
      .where(
        and(
          eq(computationJobs.combinationHash, key.hash),
          eq(computationJobs.schemaVersion, schemaVersion),
          inArray(computationJobs.status, ['completed', 'failed']),
        ),
      )
      .returning();
    if (reopened) return { job: toJob(reopened), outcome: 'requeued' };

    // Another requester queued it between our statements.
    const [raced] = await this.db
      .select()
      .from(computationJobs)
      .where(and(eq(computationJobs.combinationHash, key.hash), inArray(computationJobs.status, LIVE_STATUSES)))
      .limit(1);
    if (raced) return { job: toJob(raced), outcome: 'existing' };
    throw new Error(`Could not queue a job for ${key.canonical}`);
  }

  async get(id: number): Promise<ComputationJob | undefined> {
    this.ensureOpen();
    const [row] = await this.db.select().from(computationJobs).where(eq(computationJobs.id, id)).limit(1);
    return row ? toJob(row) : undefined;
  }

  async claim(scope: JobScope, now: Date): Promise<ComputationJob | undefined> {
    this.ensureOpen();
    const next = this.db
      .select({ id: computationJobs.id })
      .from(computationJobs)
      .where(
        and(
          eq(computationJobs.status, 'pending'),
          or(isNull(computationJobs.nextAttemptAt), lte(computationJobs.nextAttemptAt, now)),
          ...scopeConditions(scope),
        ),
      )
      .orderBy(desc(computationJobs.priority), asc(computationJobs.id))
      .limit(1)
      .for('update', { skipLocked: true });

    const [row] = await this.db
      .update(computationJobs)
      .set({
        status: 'running',
        attempts: sql`${computationJobs.attempts} + 1`,
        leasedAt: now,
        updatedAt: now,
      })
      .where(and(eq(computationJobs.status, 'pending'), inArray(computationJobs.id, next)))
      .returning();
    return row ? toJob(row) : undefined;
  }

  async beginRetry(id: number, error: string, nextAttemptAt: Date): Promise<ComputationJob> {
    this.ensureOpen();
    const now = new Date();
    const [row] = await this.db
      .update(computationJobs)
      .set({
        attempts: sql`${computationJobs.attempts} + 1`,
        lastError: error,
        nextAttemptAt,
        leasedAt: now,
        updatedAt: now,
      })
      .where(eq(computationJobs.id, id))
      .returning();
    if (!row) throw new RecordNotFoundError(`job:${id}`);
    return toJob(row);
  }

  async complete(id: number): Promise<void> {
    this.ensureOpen();
    const now = new Date();
    await this.db
      .update(computationJobs)
      .set({ status: 'completed', completedAt: now, leasedAt: null, nextAttemptAt: null, updatedAt: now })
      .where(eq(computationJobs.id, id));
  }

  async fail(id: number, error: string): Promise<void> {
    this.ensureOpen();
    await this.db
      .update(computationJobs)
      .set({ status: 'failed', lastError: error, leasedAt: null, nextAttemptAt: null, updatedAt: new Date() })
      .where(eq(computationJobs.id, id));
  }

  async counts(scope: JobScope = {}): Promise<JobCounts> {
    this.ensureOpen();
    const rows = await this.db
      .select({ status: computationJobs.status, count: sql<number>`count(*)::int` })
      .from(computationJobs)
      .where(and(...scopeConditions(scope)))
      .groupBy(computationJobs.status);
    const counts = emptyCounts();
    for (const row of rows) counts[row.status] += row.count;
    return counts;
  }

  async list(filter: JobFilter = {}): Promise<ComputationJob[]> {
    this.ensureOpen();
    const conditions = scopeConditions(filter);
    if (filter.status) conditions.push(eq(computationJobs.status, filter.status));
    if (filter.minPriority !== undefined) conditions.push(gte(computationJobs.priority, filter.minPriority));

    const query = this.db
      .select()
      .from(computationJobs)
      .where(and(...conditions))
      .orderBy(desc(computationJobs.priority), asc(computationJobs.id));
    const rows = filter.limit !== undefined ? await query.limit(filter.limit) : await query;
    return rows.map(toJob);
  }

  async releaseStale(leasedBefore: Date): Promise<number> {
    this.ensureOpen();
    const released = await this.db
      .update(computationJobs)
      .set({ status: 'pending', leasedAt: null, updatedAt: new Date() })
      .where(and(eq(computationJobs.status, 'running'), lt(computationJobs.leasedAt, leasedBefore)))
      .returning({ id: computationJobs.id });
    return released.length;
  }

  async requeueFailed(scope: JobScope = {}): Promise<number> {
    this.ensureOpen();
    // Skip hashes that already have a live job under another schema version.
    const live = this.db
      .select({ hash: computationJobs.combinationHash })
      .from(computationJobs)
      .where(inArray(computationJobs.status, LIVE_STATUSES));
    const requeued = await this.db
      .update(computationJobs)
      .set({ status: 'pending', attempts: 0, nextAttemptAt: null, updatedAt: new Date() })
      .where(
        and(
          eq(computationJobs.status, 'failed'),
          notInArray(computationJobs.combinationHash, live),
          ...scopeConditions(scope),
        ),
      )
      .returning({ id: computationJobs.id });
    if (requeued.length > 0) {
      console.log(`🔁 [Pipeline] Re-queued ${requeued.length} failed jobs`);
    }
    return requeued.length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) throw new StoreClosedError('DatabaseJobStore');
  }
}
