import { RecordNotFoundError, StoreClosedError } from '../errors.js';
import type { ComputationJob, JobCounts, JobFilter, JobRequest, JobScope, JobStore, NewJob } from './job-store.js';
import { emptyCounts, isLive, matchesJobFilter, matchesScope } from './job-store.js';

function copy(job: ComputationJob): ComputationJob {
  return { ...job, sourceKeys: [...job.sourceKeys] };
}

function byQueueOrder(a: ComputationJob, b: ComputationJob): number {
  return b.priority - a.priority || a.id - b.id;
}

export class MemoryJobStore implements JobStore {
  private jobs = new Map<number, ComputationJob>();
  private nextId = 1;
  private closed = false;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async enqueue(jobs: NewJob[]): Promise<number> {
    this.ensureOpen();
    let inserted = 0;
    for (const job of jobs) {
      const clash = [...this.jobs.values()].some(
        (existing) =>
          existing.combinationHash === job.key.hash && (existing.schemaVersion === job.schemaVersion || isLive(existing)),
      );
      if (clash) continue;
      this.insert(job);
      inserted++;
    }
    return inserted;
  }

  async request(request: NewJob): Promise<JobRequest> {
    this.ensureOpen();
    const { key, priority, maxAttempts, schemaVersion } = request;
    const now = this.now();
    const jobs = [...this.jobs.values()];

    const live = jobs.find((job) => job.combinationHash === key.hash && isLive(job));
    if (live) {
      live.priority = Math.max(live.priority, priority);
      live.updatedAt = now;
      return { job: copy(live), outcome: 'existing' };
    }

    const finished = jobs.find((job) => job.combinationHash === key.hash && job.schemaVersion === schemaVersion);
    if (finished) {
      finished.status = 'pending';
      finished.attempts = 0;
      finished.maxAttempts = maxAttempts;
      finished.priority = priority;
      finished.lastError = null;
      finished.nextAttemptAt = null;
      finished.leasedAt = null;
      finished.completedAt = null;
      finished.updatedAt = now;
      return { job: copy(finished), outcome: 'requeued' };
    }

    return { job: copy(this.insert(request)), outcome: 'created' };
  }

  async get(id: number): Promise<ComputationJob | undefined> {
    this.ensureOpen();
    const job = this.jobs.get(id);
    return job ? copy(job) : undefined;
  }

  async claim(scope: JobScope, now: Date): Promise<ComputationJob | undefined> {
    this.ensureOpen();
    const next = [...this.jobs.values()]
      .filter(
        (job) =>
          job.status === 'pending' &&
          matchesScope(job, scope) &&
          (job.nextAttemptAt === null || job.nextAttemptAt.getTime() <= now.getTime()),
      )
      .sort(byQueueOrder)[0];
    if (!next) return undefined;

    next.status = 'running';
    next.attempts += 1;
    next.leasedAt = now;
    next.updatedAt = now;
    return { ...next };
  }

  async beginRetry(id: number, error: string, nextAttemptAt: Date): Promise<ComputationJob> {
    const job = this.require(id);
    job.attempts += 1;
    job.lastError = error;
    job.nextAttemptAt = nextAttemptAt;
    job.leasedAt = this.now();
    job.updatedAt = job.leasedAt;
    return { ...job };
  }

  async complete(id: number): Promise<void> {
    const job = this.require(id);
    const now = this.now();
    job.status = 'completed';
    job.completedAt = now;
    job.leasedAt = null;
    job.nextAttemptAt = null;
    job.updatedAt = now;
  }

  async fail(id: number, error: string): Promise<void> {
    const job = this.require(id);
    job.status = 'failed';
    job.lastError = error;
    job.leasedAt = null;
    job.nextAttemptAt = null;
    job.updatedAt = this.now();
  }

  async counts(scope: JobScope = {}): Promise<JobCounts> {
    this.ensureOpen();
    const counts = emptyCounts();
    for (const job of this.jobs.values()) {
      if (matchesScope(job, scope)) counts[job.status]++;
    }
    return counts;
  }

  async list(filter: JobFilter = {}): Promise<ComputationJob[]> {
    this.ensureOpen();
    const matches = [...this.jobs.values()].filter((job) => matchesJobFilter(job, filter)).sort(byQueueOrder);
    const limited = filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
    return limited.map(copy);
  }

  async releaseStale(leasedBefore: Date): Promise<number> {
    this.ensureOpen();
    let released = 0;
    for (const job of this.jobs.values()) {
      if (job.status === 'running' && job.leasedAt !== null && job.leasedAt.getTime() < leasedBefore.getTime()) {
        job.status = 'pending';
        job.leasedAt = null;
        job.updatedAt = this.now();
        released++;
      }
    }
    return released;
  }

  async requeueFailed(scope: JobScope = {}): Promise<number> {
    this.ensureOpen();
    let requeued = 0;
    for (const job of this.jobs.values()) {
      if (job.status !== 'failed' || !matchesScope(job, scope)) continue;
      if (this.hasLiveJob(job.combinationHash)) continue;
      job.status = 'pending';
      job.attempts = 0;
      job.nextAttemptAt = null;
      job.updatedAt = this.now();
      requeued++;
    }
    return requeued;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private hasLiveJob(hash: string): boolean {
    return [...this.jobs.values()].some((job) => job.combinationHash === hash && isLive(job));
  }

  private insert({ key, priority, maxAttempts, schemaVersion }: NewJob): ComputationJob {
    const now = this.now();
    const job: ComputationJob = {
      id: this.nextId++,
      combinationHash: key.hash,
      canonicalKey: key.canonical,
      toolKey: key.toolKey,
      sourceKeys: [...key.sourceKeys],
      language: key.language,
      schemaVersion,
      status: 'pending',
      attempts: 0,
      maxAttempts,
      priority,
      lastError: null,
      nextAttemptAt: null,
      leasedAt: null,
      completedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(job.id, job);
    return job;
  }

  private require(id: number): ComputationJob {
    this.ensureOpen();
    const job = this.jobs.get(id);
    if (!job) throw new RecordNotFoundError(`job:${id}`);
    return job;
  }

  private ensureOpen(): void {
    if (this.closed) throw new StoreClosedError('MemoryJobStore');
  }
}
