import { afterEach, describe, expect, it, vi } from 'vitest';
import type { InsertUsageEvent } from '../../../shared/schema.js';
import { BufferedUsageRecorder, MemoryUsageSink, type UsageSink } from '../usage-recorder.js';

const at = new Date('2024-05-01T12:00:00Z');
const hash = 'a'.repeat(64);

describe('BufferedUsageRecorder', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('tallies hits, misses and errors as they are recorded', () => {
    const recorder = new BufferedUsageRecorder(new MemoryUsageSink());
    recorder.record({ combinationHash: hash, hit: true, latencyMs: 2, outcome: 'hit' });
    recorder.record({ combinationHash: hash, hit: false, latencyMs: 900, outcome: 'generated' });
    recorder.record({ combinationHash: hash, hit: false, latencyMs: 50, outcome: 'error' });

    expect(recorder.counters()).toEqual({ hits: 1, misses: 1, errors: 1, dropped: 0 });
  });

  it('writes nothing until flushed, then writes rounded events', async () => {
    const sink = new MemoryUsageSink();
    const recorder = new BufferedUsageRecorder(sink, { now: () => at });
    recorder.record({ combinationHash: hash, hit: true, latencyMs: 1.6, outcome: 'hit' });
    expect(sink.events).toHaveLength(0);

    await recorder.flush();

    expect(sink.events).toEqual([{ combinationHash: hash, occurredAt: at, hit: true, latencyMs: 2, outcome: 'hit' }]);
  });

  it('flushes on its own once a batch fills', async () => {
    const sink = new MemoryUsageSink();
    const recorder = new BufferedUsageRecorder(sink, { batchSize: 2 });
    recorder.record({ combinationHash: hash, hit: true, latencyMs: 1, outcome: 'hit' });
    recorder.record({ combinationHash: hash, hit: true, latencyMs: 1, outcome: 'hit' });
    recorder.record({ combinationHash: hash, hit: true, latencyMs: 1, outcome: 'hit' });

    await recorder.flush();
    expect(sink.events).toHaveLength(3);
  });

  it('drops a batch the sink rejects without throwing', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const failing: UsageSink = {
      write: async (_events: InsertUsageEvent[]) => {
        throw new Error('connection refused');
      },
    };
    const recorder = new BufferedUsageRecorder(failing);
    recorder.record({ combinationHash: hash, hit: false, latencyMs: 10, outcome: 'generated' });

    await expect(recorder.flush()).resolves.toBeUndefined();
    expect(recorder.counters().dropped).toBe(1);
  });

  it('flushes on its interval and once more on close', async () => {
    vi.useFakeTimers();
    const sink = new MemoryUsageSink();
    const recorder = new BufferedUsageRecorder(sink, { flushIntervalMs: 1000 });
    recorder.start();

    recorder.record({ combinationHash: hash, hit: true, latencyMs: 1, outcome: 'hit' });
    await vi.advanceTimersByTimeAsync(1000);
    expect(sink.events).toHaveLength(1);

    recorder.record({ combinationHash: hash, hit: true, latencyMs: 1, outcome: 'hit' });
    await recorder.close();
    expect(sink.events).toHaveLength(2);
  });
});
