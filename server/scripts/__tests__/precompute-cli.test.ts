import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadAppConfig } from '../../config/app-config.js';
import { InvalidCombinationError } from '../../errors.js';
import { MemoryFindingsStore } from '../../findings/memory-findings-store.js';
import { MemoryJobStore } from '../../pipeline/memory-job-store.js';
import { createServices } from '../../services.js';
import { StubDatasetProvider, StubGenerator, keyFor } from '../../__tests__/fixtures.js';
import { EXIT_CODES, createProgram } from '../precompute-cli.js';

// Each command closes its services; these stores outlive that so state
// carries from one command to the next.
class KeptFindingsStore extends MemoryFindingsStore {
  override async close(): Promise<void> {}
}

class KeptJobStore extends MemoryJobStore {
  override async close(): Promise<void> {}
}

describe('precompute CLI', () => {
  let lines: string[];
  let opened: boolean[];
  let generator: StubGenerator;
  let store: KeptFindingsStore;
  let jobs: KeptJobStore;

  const config = loadAppConfig({ STORAGE_DRIVER: 'memory', PIPELINE_RATE_LIMIT_PER_MINUTE: '0' });

  async function cli(...args: string[]): Promise<unknown> {
    lines = [];
    const program = createProgram(
      ({ simulate }) => {
        opened.push(simulate);
        return createServices(config, { store, jobs, generator, datasets: new StubDatasetProvider() });
      },
      (line) => lines.push(line),
    );
    await program.parseAsync(args, { from: 'user' });
    const [output] = lines;
    return output === undefined ? undefined : JSON.parse(output);
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    opened = [];
    generator = new StubGenerator();
    store = new KeptFindingsStore();
    jobs = new KeptJobStore();
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('runs one tool and language to completion', async () => {
    const report = await cli('run', '--tool', 'Benchmarking', '--language', 'en', '--simulate');

    expect(opened).toEqual([true]);
    expect(report).toMatchObject({ enqueued: 31, completed: 31, generated: 31, failed: 0, failedJobs: [] });
    expect(process.exitCode).toBe(EXIT_CODES.SUCCESS);

    expect(await cli('status', '--tool', 'benchmarking', '--language', 'en')).toEqual({
      schemaVersion: 2,
      counts: { pending: 0, running: 0, completed: 31, failed: 0 },
      countValid: 31,
    });
  });

  it('honours --limit', async () => {
    const report = await cli('run', '--tool', 'benchmarking', '--language', 'es', '--limit', '5', '--concurrency', '2');

    expect(opened).toEqual([false]);
    expect(report).toMatchObject({ processed: 5, counts: { pending: 26, completed: 5 } });
  });

  it('exits with the jobs-failed code and lists the failures', async () => {
    const broken = keyFor('benchmarking', ['crossref'], 'en');
    generator.failNext(broken.hash, new InvalidCombinationError('source retired'));

    const report = await cli('run', '--tool', 'benchmarking', '--language', 'en');
    expect(report).toMatchObject({ completed: 30, failed: 1 });
    expect(process.exitCode).toBe(EXIT_CODES.JOBS_FAILED);

    expect(await cli('failed')).toEqual([
      { id: expect.any(Number), canonicalKey: broken.canonical, attempts: 1, error: 'source retired' },
    ]);
    expect(await cli('requeue-failed', '--language', 'en')).toEqual({ requeued: 1 });
    expect(await cli('run', '--tool', 'benchmarking', '--language', 'en')).toMatchObject({ enqueued: 0, completed: 1 });
  });

  it('releases nothing when no lease has expired', async () => {
    expect(await cli('release-stale')).toEqual({ released: 0 });
    expect(process.exitCode).toBe(EXIT_CODES.SUCCESS);
  });

  it('revalidates stored findings', async () => {
    await cli('run', '--tool', 'benchmarking', '--language', 'en');

    expect(await cli('revalidate', '--type', 'single')).toEqual({
      checked: 5,
      invalidated: 0,
      byStatus: { valid: 5, partial: 0, invalid: 0 },
      invalidatedKeys: [],
    });
  });

  it('reports bad arguments as an execution error', async () => {
    expect(await cli('status', '--language', 'fr')).toBeUndefined();
    expect(process.exitCode).toBe(EXIT_CODES.EXECUTION_ERROR);
    expect(console.error).toHaveBeenCalledWith('❌ [Pipeline] Unsupported language "fr"');
  });
});
