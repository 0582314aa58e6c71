/**
 * Precomputation pipeline: fills the findings cache across the combination
 * space through a bounded worker pool.
 *
 * Jobs live in a JobStore, so a run can stop at any point and the next run
 * resumes where it left off: completed jobs are never re-enqueued for the
 * same schema version, and running jobs whose lease expired are returned to
 * pending before workers start.
 */

import pLimit from 'p-limit';
import type { Catalog, Language } from '../config/catalog.js';
import {
  CombinationCollisionError,
  DatasetUnavailableError,
  FindingsError,
  GeneratorError,
  StaleWriteError,
  ValidationFailureError,
  errorMessage,
} from '../errors.js';
import type { CacheResolver } from '../findings/cache-resolver.js';
import { canonicalize, type CombinationKey } from '../findings/combination-key.js';
import { enumerateCombinations, requestPriority } from './combination-space.js';
import type { ComputationJob, JobCounts, JobFilter, JobRequest, JobScope, JobStore } from './job-store.js';
import { RateLimiter, backoffDelay, sleep, type Sleep } from './rate-limiter.js';

export interface PipelineSettings {
  concurrency: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  rateLimitPerMinute: number;
  leaseTimeoutMs: number;
  schemaVersion: number;
}

export interface PipelineDeps {
  jobs: JobStore;
  resolver: Pick<CacheResolver, 'generateAndStore'>;
  catalog: Catalog;
  settings: PipelineSettings;
  clock?: () => number;
  wait?: Sleep;
  random?: () => number;
}

export interface RunOptions {
  toolKey?: string;
  language?: Language;
  /** Stop after claiming this many jobs. */
  maxJobs?: number;
  concurrency?: number;
  /** Enqueue the combination space before draining (default true). */
  enqueue?: boolean;
  signal?: AbortSignal;
}

export interface FailedJobSummary {
  id: number;
  canonicalKey: string;
  attempts: number;
  error: string | null;
}

export interface RunReport {
  enqueued: number;
  released: number;
  processed: number;
  completed: number;
  generated: number;
  alreadyCached: number;
  failed: number;
  retries: number;
  durationMs: number;
  counts: JobCounts;
  failedJobs: FailedJobSummary[];
}

interface RunState {
  scope: JobScope;
  maxJobs?: number;
  claimed: number;
  signal: AbortSignal;
  limiter: RateLimiter;
  stats: { completed: number; generated: number; alreadyCached: number; failed: number; retries: number };
}

/**
 * Generator, validation and dataset read failures are worth another attempt;
 * malformed keys and schema violations are not.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof GeneratorError) return error.retryable;
  if (error instanceof ValidationFailureError) return true;
  if (error instanceof DatasetUnavailableError) return true;
  if (error instanceof FindingsError) return false;
  return true;
}

export class PrecomputationPipeline {
  private readonly clock: () => number;
  private readonly wait: Sleep;
  private readonly random: () => number;
  private active: AbortController | undefined;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? Date.now;
    this.wait = deps.wait ?? sleep;
    this.random = deps.random ?? Math.random;
  }

  /** Enqueue every combination in scope that has no job for the current schema version. */
  async seed(scope: { toolKey?: string; language?: Language } = {}): Promise<number> {
    const { settings, catalog, jobs } = this.deps;
    const planned = enumerateCombinations(catalog, {
      toolKeys: scope.toolKey ? [scope.toolKey] : undefined,
      languages: scope.language ? [scope.language] : undefined,
    });
    return jobs.enqueue(
      planned.map(({ key, priority }) => ({
        key,
        priority,
        maxAttempts: settings.maxAttempts,
        schemaVersion: settings.schemaVersion,
      })),
    );
  }

  /** Queue one combination ahead of the seeded space; `urgency` runs 1-10. */
  async request(key: CombinationKey, urgency: number): Promise<JobRequest> {
    const { settings, jobs } = this.deps;
    const result = await jobs.request({
      key,
      priority: requestPriority(urgency),
      maxAttempts: settings.maxAttempts,
      schemaVersion: settings.schemaVersion,
    });
    console.log(`🔄 [Pipeline] Regeneration requested for ${key.canonical}: job ${result.job.id} (${result.outcome})`);
    return result;
  }

  getJob(id: number): Promise<ComputationJob | undefined> {
    return this.deps.jobs.get(id);
  }

  async run(options: RunOptions = {}): Promise<RunReport> {
    const { jobs, settings } = this.deps;
    const started = this.clock();
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    this.active = controller;

    const scope: JobScope = {
      toolKey: options.toolKey,
      language: options.language,
      schemaVersion: settings.schemaVersion,
    };
    const concurrency = Math.max(1, options.concurrency ?? settings.concurrency);

    try {
      const enqueued = options.enqueue === false ? 0 : await this.seed(scope);
      const released = await jobs.releaseStale(new Date(this.clock() - settings.leaseTimeoutMs));

      console.log(JSON.stringify({
        ctx: 'precompute',
        event: 'phase_start',
        enqueued,
        released,
        concurrency,
        tool: scope.toolKey ?? null,
        language: scope.language ?? null,
      }));

      const state: RunState = {
        scope,
        maxJobs: options.maxJobs,
        claimed: 0,
        signal: controller.signal,
        limiter: new RateLimiter(settings.rateLimitPerMinute, this.clock, this.wait),
        stats: { completed: 0, generated: 0, alreadyCached: 0, failed: 0, retries: 0 },
      };

      const limit = pLimit(concurrency);
      await Promise.all(Array.from({ length: concurrency }, () => limit(() => this.worker(state))));

      const counts = await jobs.counts(scope);
      const failedJobs = (await jobs.list({ ...scope, status: 'failed' })).map(summarizeFailure);
      const report: RunReport = {
        enqueued,
        released,
        processed: state.stats.completed + state.stats.failed,
        ...state.stats,
        durationMs: this.clock() - started,
        counts,
        failedJobs,
      };

      console.log(JSON.stringify({
        ctx: 'precompute',
        event: 'phase_complete',
        processed: report.processed,
        completed: report.completed,
        generated: report.generated,
        cached: report.alreadyCached,
        failed: report.failed,
        retries: report.retries,
        counts,
        ms: report.durationMs,
      }));
      return report;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      if (this.active === controller) this.active = undefined;
    }
  }

  /** Ask a running `run` to stop claiming jobs and cancel in-flight generations. */
  stop(): void {
    this.active?.abort();
  }

  status(scope: JobScope = {}): Promise<JobCounts> {
    return this.deps.jobs.counts({ schemaVersion: this.deps.settings.schemaVersion, ...scope });
  }

  listJobs(filter: JobFilter = {}): Promise<ComputationJob[]> {
    return this.deps.jobs.list(filter);
  }

  async failedJobs(scope: JobScope = {}): Promise<FailedJobSummary[]> {
    return (await this.deps.jobs.list({ ...scope, status: 'failed' })).map(summarizeFailure);
  }

  requeueFailed(scope: JobScope = {}): Promise<number> {
    return this.deps.jobs.requeueFailed(scope);
  }

  releaseStale(): Promise<number> {
    return this.deps.jobs.releaseStale(new Date(this.clock() - this.deps.settings.leaseTimeoutMs));
  }

  private async worker(state: RunState): Promise<void> {
    while (!state.signal.aborted) {
      if (state.maxJobs !== undefined && state.claimed >= state.maxJobs) return;
      state.claimed++;
      const job = await this.deps.jobs.claim(state.scope, new Date(this.clock()));
      if (!job) {
        state.claimed--;
        return;
      }
      await this.process(job, state);
    }
  }

  private async process(job: ComputationJob, state: RunState): Promise<void> {
    const { jobs, resolver, settings } = this.deps;
    let current = job;

    let key: CombinationKey;
    try {
      key = this.keyFor(job);
    } catch (error) {
      await this.failJob(current, error, state);
      return;
    }

    for (;;) {
      await state.limiter.acquire(state.signal);
      if (state.signal.aborted) return;

      try {
        const result = await resolver.generateAndStore(key, { signal: state.signal });
        await jobs.complete(job.id);
        state.stats.completed++;
        if (result.generated) state.stats.generated++;
        else state.stats.alreadyCached++;
        return;
      } catch (error) {
        if (error instanceof StaleWriteError) {
          // Someone else stored a record that supersedes ours; the work is done.
          await jobs.complete(job.id);
          state.stats.completed++;
          state.stats.alreadyCached++;
          return;
        }
        // Leave the lease in place; releaseStale hands it to the next run.
        if (state.signal.aborted) return;

        if (!isRetryable(error) || current.attempts >= current.maxAttempts) {
          await this.failJob(current, error, state);
          return;
        }

        const delay = backoffDelay(current.attempts, settings.backoffBaseMs, settings.backoffMaxMs, this.random);
        console.log(JSON.stringify({
          ctx: 'precompute',
          event: 'retry',
          id: job.id,
          key: job.canonicalKey,
          attempt: current.attempts,
          delayMs: delay,
          error: errorMessage(error),
        }));
        current = await jobs.beginRetry(job.id, errorMessage(error), new Date(this.clock() + delay));
        state.stats.retries++;
        await this.wait(delay, state.signal);
      }
    }
  }

  private async failJob(job: ComputationJob, error: unknown, state: RunState): Promise<void> {
    await this.deps.jobs.fail(job.id, errorMessage(error));
    state.stats.failed++;
    console.log(JSON.stringify({
      ctx: 'precompute',
      event: 'job_failed',
      id: job.id,
      key: job.canonicalKey,
      attempts: job.attempts,
      retryable: isRetryable(error),
      error: errorMessage(error),
    }));
  }

  private keyFor(job: ComputationJob): CombinationKey {
    const key = canonicalize(job.toolKey, job.sourceKeys, job.language, this.deps.catalog);
    if (key.hash !== job.combinationHash) {
      throw new CombinationCollisionError(job.combinationHash, key.canonical, job.canonicalKey);
    }
    return key;
  }
}

function summarizeFailure(job: ComputationJob): FailedJobSummary {
  return { id: job.id, canonicalKey: job.canonicalKey, attempts: job.attempts, error: job.lastError };
}
