import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { DatasetUnavailableError, GeneratorError, InvalidCombinationError } from '../../errors.js';
import { StubDatasetProvider, StubGenerator, catalog, keyFor, recordFor } from '../../__tests__/fixtures.js';
import { CacheResolver } from '../../findings/cache-resolver.js';
import { ContentValidator } from '../../findings/content-validator.js';
import { MemoryFindingsStore } from '../../findings/memory-findings-store.js';
import { enumerateCombinations } from '../combination-space.js';
import { MemoryJobStore } from '../memory-job-store.js';
import { PrecomputationPipeline, isRetryable, type PipelineSettings } from '../precomputation-pipeline.js';

const settings: PipelineSettings = {
  concurrency: 4,
  maxAttempts: 3,
  backoffBaseMs: 10,
  backoffMaxMs: 100,
  rateLimitPerMinute: 0,
  leaseTimeoutMs: 60_000,
  schemaVersion: 2,
};

function setup(overrides: Partial<PipelineSettings> = {}) {
  const generator = new StubGenerator();
  const store = new MemoryFindingsStore();
  const jobs = new MemoryJobStore();
  const resolver = new CacheResolver({
    store,
    generator,
    datasets: new StubDatasetProvider(),
    validator: new ContentValidator(),
    schemaVersion: 2,
  });
  const waits: number[] = [];
  const pipeline = new PrecomputationPipeline({
    jobs,
    resolver,
    catalog,
    settings: { ...settings, ...overrides },
    wait: async (ms) => {
      waits.push(ms);
    },
    random: () => 0,
  });
  return { generator, store, jobs, pipeline, waits };
}

async function enqueueFirst(jobs: MemoryJobStore, count: number, maxAttempts = 3) {
  const planned = enumerateCombinations(catalog).slice(0, count);
  await jobs.enqueue(planned.map(({ key, priority }) => ({ key, priority, maxAttempts, schemaVersion: 2 })));
  return planned.map((entry) => entry.key);
}

function loggedEvents(log: { mock: { calls: unknown[][] } }, event: string): Record<string, unknown>[] {
  return log.mock.calls
    .map(([line]) => line)
    .filter((line): line is string => typeof line === 'string' && line.startsWith('{'))
    .map((line): Record<string, unknown> => JSON.parse(line))
    .filter((entry) => entry.event === event);
}

describe('PrecomputationPipeline', () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('completes a hundred jobs when one fails transiently', async () => {
    const { generator, jobs, pipeline, waits } = setup();
    const keys = await enqueueFirst(jobs, 100);
    const seventh = keys[6];
    if (!seventh) throw new Error('expected 100 keys');
    generator.failNext(seventh.hash, new GeneratorError('timeout', 'Generation timed out'));

    const report = await pipeline.run({ enqueue: false });

    expect(report).toMatchObject({ processed: 100, completed: 100, generated: 100, failed: 0, retries: 1 });
    expect(report.counts).toEqual({ pending: 0, running: 0, completed: 100, failed: 0 });
    expect(waits).toEqual([10]);

    const all = await jobs.list();
    expect(all.find((job) => job.combinationHash === seventh.hash)).toMatchObject({
      attempts: 2,
      lastError: 'Generation timed out',
    });
    expect(all.filter((job) => job.attempts === 1)).toHaveLength(99);
    expect(generator.callsFor(seventh.hash)).toBe(2);

    expect(loggedEvents(log, 'retry')).toEqual([
      expect.objectContaining({ ctx: 'precompute', key: seventh.canonical, attempt: 1, delayMs: 10 }),
    ]);
  });

  it('fails a job once its attempts are used up', async () => {
    const { generator, jobs, pipeline, waits } = setup();
    const [key] = await enqueueFirst(jobs, 1);
    if (!key) throw new Error('expected a key');
    generator.failNext(
      key.hash,
      new GeneratorError('rate_limited', 'first'),
      new GeneratorError('rate_limited', 'second'),
      new GeneratorError('rate_limited', 'third'),
    );

    const report = await pipeline.run({ enqueue: false });

    expect(report.failed).toBe(1);
    expect(report.retries).toBe(2);
    expect(waits).toEqual([10, 20]);
    expect(report.failedJobs).toEqual([{ id: 1, canonicalKey: key.canonical, attempts: 3, error: 'third' }]);
    expect(loggedEvents(log, 'job_failed')).toEqual([expect.objectContaining({ attempts: 3, retryable: true })]);
  });

  it('fails immediately on errors a retry cannot fix', async () => {
    const { generator, jobs, pipeline } = setup();
    const [key] = await enqueueFirst(jobs, 1);
    if (!key) throw new Error('expected a key');
    generator.failNext(key.hash, new InvalidCombinationError('bad key'));

    const report = await pipeline.run({ enqueue: false });

    expect(report.retries).toBe(0);
    expect(report.failedJobs).toEqual([{ id: 1, canonicalKey: key.canonical, attempts: 1, error: 'bad key' }]);
    expect(generator.callsFor(key.hash)).toBe(1);
  });

  it('requeues failed jobs for the next run', async () => {
    const { generator, jobs, pipeline } = setup();
    const [key] = await enqueueFirst(jobs, 1, 1);
    if (!key) throw new Error('expected a key');
    generator.failNext(key.hash, new GeneratorError('provider_error', 'upstream 500'));

    await pipeline.run({ enqueue: false });
    expect(await pipeline.requeueFailed()).toBe(1);
    const report = await pipeline.run({ enqueue: false });

    expect(report.completed).toBe(1);
    expect(report.failedJobs).toEqual([]);
  });

  it('seeds its scope once and skips completed work on the next run', async () => {
    const { generator, pipeline } = setup();

    const first = await pipeline.run({ toolKey: 'benchmarking', language: 'en' });
    expect(first).toMatchObject({ enqueued: 31, completed: 31, generated: 31 });

    const second = await pipeline.run({ toolKey: 'benchmarking', language: 'en' });
    expect(second).toMatchObject({ enqueued: 0, processed: 0 });
    expect(generator.calls).toHaveLength(31);
  });

  it('resumes after a crash without redoing completed jobs', async () => {
    const { generator, jobs, pipeline } = setup();
    const keys = await enqueueFirst(jobs, 3);

    const done = await jobs.claim({}, new Date());
    if (!done) throw new Error('expected a job');
    await jobs.complete(done.id);
    const abandoned = await jobs.claim({}, new Date(Date.now() - 120_000));
    if (!abandoned) throw new Error('expected a job');

    const report = await pipeline.run({ enqueue: false });

    expect(report).toMatchObject({ released: 1, completed: 2 });
    expect(report.counts.completed).toBe(3);
    expect(generator.callsFor(done.combinationHash)).toBe(0);
    expect(generator.calls.map((key) => key.hash).sort()).toEqual(
      keys.slice(1).map((key) => key.hash).sort(),
    );
  });

  it('counts combinations another writer already stored as cached', async () => {
    const { generator, jobs, store, pipeline } = setup();
    const [key] = await enqueueFirst(jobs, 1);
    if (!key) throw new Error('expected a key');
    await store.put(recordFor(key, 2));

    const report = await pipeline.run({ enqueue: false });

    expect(report).toMatchObject({ completed: 1, generated: 0, alreadyCached: 1 });
    expect(generator.calls).toHaveLength(0);
  });

  it('regenerates records stored under an older schema version', async () => {
    const { generator, jobs, store, pipeline } = setup();
    const key = keyFor('benchmarking', ['trends']);
    await store.put(recordFor(key, 1));
    await jobs.enqueue([{ key, priority: 90, maxAttempts: 3, schemaVersion: 2 }]);

    const report = await pipeline.run({ enqueue: false });

    expect(report).toMatchObject({ completed: 1, generated: 1, alreadyCached: 0 });
    expect(generator.callsFor(key.hash)).toBe(1);
    expect((await store.get(key.hash))?.schemaVersion).toBe(2);
  });

  it('stops claiming after maxJobs', async () => {
    const { jobs, pipeline } = setup();
    await enqueueFirst(jobs, 10);

    const report = await pipeline.run({ enqueue: false, maxJobs: 4, concurrency: 3 });

    expect(report.processed).toBe(4);
    expect(report.counts).toEqual({ pending: 6, running: 0, completed: 4, failed: 0 });
  });

  it('leaves the in-flight job leased when stopped', async () => {
    const { generator, jobs, pipeline } = setup({ concurrency: 1 });
    await enqueueFirst(jobs, 5);
    generator.hold();

    const running = pipeline.run({ enqueue: false });
    await vi.waitFor(() => expect(generator.calls).toHaveLength(1));
    pipeline.stop();
    generator.release();
    const report = await running;

    expect(report.processed).toBe(0);
    expect(report.counts).toEqual({ pending: 4, running: 1, completed: 0, failed: 0 });
  });
});

describe('isRetryable', () => {
  it('retries transient generator errors but not cancellations or bad keys', () => {
    expect(isRetryable(new GeneratorError('timeout', 'slow'))).toBe(true);
    expect(isRetryable(new GeneratorError('cancelled', 'stopped'))).toBe(false);
    expect(isRetryable(new InvalidCombinationError('bad'))).toBe(false);
    expect(isRetryable(new Error('socket hang up'))).toBe(true);
    expect(isRetryable(new DatasetUnavailableError('benchmarking', 'benchmarking.json', 'EMFILE'))).toBe(true);
  });
});
