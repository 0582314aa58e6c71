import { usageEvents, type InsertUsageEvent } from '../../shared/schema.js';
import type { Database } from '../db.js';
import { errorMessage } from '../errors.js';

export type UsageOutcome = 'hit' | 'generated' | 'error';

export interface UsageEventInput {
  combinationHash: string;
  hit: boolean;
  latencyMs: number;
  outcome: UsageOutcome;
}

export interface UsageCounters {
  hits: number;
  misses: number;
  errors: number;
  dropped: number;
}

/**
 * Append-only lookup telemetry. `record` never throws and never waits on I/O.
 */
export interface UsageRecorder {
  record(event: UsageEventInput): void;
  flush(): Promise<void>;
  counters(): UsageCounters;
  close(): Promise<void>;
}

export interface UsageSink {
  write(events: InsertUsageEvent[]): Promise<void>;
}

export class DatabaseUsageSink implements UsageSink {
  constructor(private readonly db: Database) {}

  async write(events: InsertUsageEvent[]): Promise<void> {
    if (events.length === 0) return;
    await this.db.insert(usageEvents).values(events);
  }
}

export class MemoryUsageSink implements UsageSink {
  readonly events: InsertUsageEvent[] = [];

  async write(events: InsertUsageEvent[]): Promise<void> {
    this.events.push(...events);
  }
}

export interface BufferedUsageRecorderOptions {
  batchSize?: number;
  flushIntervalMs?: number;
  now?: () => Date;
}

/**
 * Buffers events in memory and writes them to the sink in batches, either
 * when the batch fills or on a timer. A failed write drops that batch.
 */
export class BufferedUsageRecorder implements UsageRecorder {
  private buffer: InsertUsageEvent[] = [];
  private timer: NodeJS.Timeout | undefined;
  private pending: Promise<void> = Promise.resolve();
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly now: () => Date;
  private readonly tally: UsageCounters = { hits: 0, misses: 0, errors: 0, dropped: 0 };

  constructor(
    private readonly sink: UsageSink,
    options: BufferedUsageRecorderOptions = {},
  ) {
    this.batchSize = options.batchSize ?? 100;
    this.flushIntervalMs = options.flushIntervalMs ?? 5000;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.flush();
    }, this.flushIntervalMs);
    this.timer.unref();
  }

  record(event: UsageEventInput): void {
    if (event.outcome === 'error') this.tally.errors++;
    else if (event.hit) this.tally.hits++;
    else this.tally.misses++;

    this.buffer.push({
      combinationHash: event.combinationHash,
      occurredAt: this.now(),
      hit: event.hit,
      latencyMs: Math.max(0, Math.round(event.latencyMs)),
      outcome: event.outcome,
    });
    if (this.buffer.length >= this.batchSize) {
      void this.flush();
    }
  }

  /** Resolves once everything buffered so far has been written or dropped. */
  flush(): Promise<void> {
    const batch = this.buffer.splice(0, this.buffer.length);
    if (batch.length === 0) return this.pending;
    this.pending = this.pending.then(() => this.writeBatch(batch));
    return this.pending;
  }

  counters(): UsageCounters {
    return { ...this.tally };
  }

  async close(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.flush();
  }

  private async writeBatch(batch: InsertUsageEvent[]): Promise<void> {
    try {
      await this.sink.write(batch);
    } catch (error) {
      this.tally.dropped += batch.length;
      console.warn(`⚠️ [UsageRecorder] Dropped ${batch.length} usage events: ${errorMessage(error)}`);
    }
  }
}
