import type { JobStatus } from '../../shared/schema.js';
import type { Language } from '../config/catalog.js';
import type { CombinationKey } from '../findings/combination-key.js';

export type { JobStatus };

export interface ComputationJob {
  id: number;
  combinationHash: string;
  canonicalKey: string;
  toolKey: string;
  sourceKeys: string[];
  language: Language;
  schemaVersion: number;
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  priority: number;
  lastError: string | null;
  nextAttemptAt: Date | null;
  leasedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewJob {
  key: CombinationKey;
  priority: number;
  maxAttempts: number;
  schemaVersion: number;
}

export interface JobScope {
  toolKey?: string;
  language?: Language;
  schemaVersion?: number;
}

export interface JobFilter extends JobScope {
  status?: JobStatus;
  minPriority?: number;
  limit?: number;
}

export type JobCounts = Record<JobStatus, number>;

/**
 * How a request was satisfied: a new job, the live job already queued for the
 * hash, or a finished job for the same schema version put back in the queue.
 */
export type JobRequestOutcome = 'created' | 'existing' | 'requeued';

export interface JobRequest {
  job: ComputationJob;
  outcome: JobRequestOutcome;
}

/**
 * Durable work queue for the precomputation pipeline. At most one live
 * (pending or running) job exists per combination hash, and one job per
 * hash and schema version overall.
 */
export interface JobStore {
  /** Insert jobs that do not exist yet; returns how many were inserted. */
  enqueue(jobs: NewJob[]): Promise<number>;
  /** Queue one combination now, raising the priority of a live job when it is lower. */
  request(job: NewJob): Promise<JobRequest>;
  get(id: number): Promise<ComputationJob | undefined>;
  /** Lease the highest-priority due pending job: pending -> running, attempts + 1. */
  claim(scope: JobScope, now: Date): Promise<ComputationJob | undefined>;
  /** Record a failed attempt and start the next one: attempts + 1, lease renewed. */
  beginRetry(id: number, error: string, nextAttemptAt: Date): Promise<ComputationJob>;
  complete(id: number): Promise<void>;
  fail(id: number, error: string): Promise<void>;
  counts(scope?: JobScope): Promise<JobCounts>;
  list(filter?: JobFilter): Promise<ComputationJob[]>;
  /** Return running jobs leased before `leasedBefore` to pending. */
  releaseStale(leasedBefore: Date): Promise<number>;
  /** Return permanently failed jobs to pending with a fresh attempt budget. */
  requeueFailed(scope?: JobScope): Promise<number>;
  close(): Promise<void>;
}

export function isLive(job: Pick<ComputationJob, 'status'>): boolean {
  return job.status === 'pending' || job.status === 'running';
}

export function emptyCounts(): JobCounts {
  return { pending: 0, running: 0, completed: 0, failed: 0 };
}

export function matchesScope(job: ComputationJob, scope: JobScope = {}): boolean {
  if (scope.toolKey && job.toolKey !== scope.toolKey) return false;
  if (scope.language && job.language !== scope.language) return false;
  if (scope.schemaVersion !== undefined && job.schemaVersion !== scope.schemaVersion) return false;
  return true;
}

export function matchesJobFilter(job: ComputationJob, filter: JobFilter = {}): boolean {
  if (!matchesScope(job, filter)) return false;
  if (filter.status && job.status !== filter.status) return false;
  if (filter.minPriority !== undefined && job.priority < filter.minPriority) return false;
  return true;
}
