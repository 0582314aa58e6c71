/**
 * Database-first findings resolver.
 *
 * lookup -> hit -> return
 * lookup -> miss -> generate -> validate -> store -> return
 *                                        -> discard -> ValidationFailureError
 *
 * Generator failures are reported to the caller, never retried here; the
 * precomputation pipeline owns retries. Concurrent misses for one hash share
 * a single in-flight generation, and across processes the generation lease
 * for the hash decides who calls the generator.
 */

import { randomUUID } from 'crypto';

import {
  CombinationCollisionError,
  FindingsError,
  GeneratorError,
  StaleWriteError,
  ValidationFailureError,
  errorMessage,
} from '../errors.js';
import type { AnalysisGenerator, AnalysisOutput, DatasetProvider } from '../generator/types.js';
import { sleep, type Sleep } from '../pipeline/rate-limiter.js';
import { buildCandidate, toNewRecord } from './candidate-builder.js';
import type { CombinationKey } from './combination-key.js';
import type { ContentValidator } from './content-validator.js';
import type { FindingsStore } from './findings-store.js';
import type { FindingsRecord, NewFindingsRecord } from './findings-types.js';
import type { GenerationLeases } from './generation-lease.js';
import { advance, decideLookup, decideValidation, type ResolverPhase } from './resolver-state.js';
import type { UsageOutcome, UsageRecorder } from './usage-recorder.js';

export interface CacheResolverDeps {
  store: FindingsStore;
  generator: AnalysisGenerator;
  datasets: DatasetProvider;
  validator: ContentValidator;
  usage?: UsageRecorder;
  schemaVersion: number;
  /** Keep invalid generations in the store (never served) for diagnostics. */
  retainInvalid?: boolean;
  leases?: GenerationLeases;
  /** How long a lease protects a generation before others may take it over. */
  leaseTtlMs?: number;
  /** How often a caller waiting on another holder re-checks the store. */
  leasePollMs?: number;
  /** Lease owner id; unique per resolver unless given. */
  owner?: string;
  clock?: () => number;
  wait?: Sleep;
}

export interface ResolveOptions {
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

export interface ResolveResult {
  outcome: 'hit' | 'generated';
  record: FindingsRecord;
  degraded: boolean;
  latencyMs: number;
  trace: ResolverPhase[];
}

export interface GenerationResult {
  record: FindingsRecord;
  degraded: boolean;
  /** False when another writer stored a usable record first. */
  generated: boolean;
  trace: ResolverPhase[];
}

interface SharedGeneration {
  promise: Promise<GenerationResult>;
  /** Aborted once every joined caller has given up. */
  controller: AbortController;
  waiters: number;
}

export class CacheResolver {
  private inFlight = new Map<string, SharedGeneration>();
  private readonly clock: () => number;
  private readonly wait: Sleep;
  private readonly owner: string;

  constructor(private readonly deps: CacheResolverDeps) {
    this.clock = deps.clock ?? Date.now;
    this.wait = deps.wait ?? sleep;
    this.owner = deps.owner ?? randomUUID();
  }

  /** Number of generations currently running; exposed for status reporting. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  async resolve(key: CombinationKey, options: ResolveOptions = {}): Promise<ResolveResult> {
    const started = this.clock();
    const trace: ResolverPhase[] = ['lookup'];
    const short = key.hash.slice(0, 12);

    try {
      if (!options.forceRefresh) {
        const decision = decideLookup(await this.deps.store.get(key.hash), key);

        if (decision.kind === 'collision') {
          advance(trace, 'failed');
          console.error(`❌ [CacheResolver] Hash collision for ${short}: stored ${decision.storedCanonical}, expected ${key.canonical}`);
          throw new CombinationCollisionError(key.hash, key.canonical, decision.storedCanonical);
        }

        if (decision.kind === 'hit') {
          advance(trace, 'hit');
          await this.bumpAccess(key.hash);
          advance(trace, 'returned');
          const latencyMs = this.clock() - started;
          this.recordUsage(key.hash, true, latencyMs, 'hit');
          console.log(`✅ [CacheResolver] Hit ${short} (${decision.record.validation.status}) in ${latencyMs}ms`);
          return {
            outcome: 'hit',
            record: decision.record,
            degraded: decision.record.validation.status === 'partial',
            latencyMs,
            trace,
          };
        }

        console.log(`❌ [CacheResolver] Miss ${short} (${decision.reason})`);
      } else {
        console.log(`🔄 [CacheResolver] Forced refresh for ${short}`);
      }
      advance(trace, 'miss');

      const result = await this.generateAndStore(key, options);
      trace.push(...result.trace);
      const latencyMs = this.clock() - started;
      this.recordUsage(key.hash, false, latencyMs, 'generated');
      return {
        outcome: result.generated ? 'generated' : 'hit',
        record: result.record,
        degraded: result.degraded,
        latencyMs,
        trace,
      };
    } catch (error) {
      this.recordUsage(key.hash, false, this.clock() - started, 'error');
      throw error;
    }
  }

  /**
   * Generate, validate and persist findings for `key`, joining a generation
   * already in flight for the same hash. Used directly by the pipeline, which
   * wants records from older schema versions replaced, so those count as
   * misses here.
   */
  generateAndStore(key: CombinationKey, options: ResolveOptions = {}): Promise<GenerationResult> {
    let shared = this.inFlight.get(key.hash);
    if (shared) {
      console.log(`⏳ [CacheResolver] Joining in-flight generation for ${key.hash.slice(0, 12)}`);
    } else {
      const controller = new AbortController();
      const promise = this.runGeneration(key, options.forceRefresh ?? false, controller.signal).finally(() => {
        this.inFlight.delete(key.hash);
      });
      shared = { promise, controller, waiters: 0 };
      this.inFlight.set(key.hash, shared);
    }
    return this.join(shared, options.signal);
  }

  private join(shared: SharedGeneration, signal: AbortSignal | undefined): Promise<GenerationResult> {
    shared.waiters++;
    if (!signal) return shared.promise;

    const leave = () => {
      shared.waiters--;
      if (shared.waiters === 0) shared.controller.abort();
    };
    if (signal.aborted) {
      leave();
      return shared.promise;
    }
    signal.addEventListener('abort', leave, { once: true });
    return shared.promise.finally(() => signal.removeEventListener('abort', leave));
  }

  private async runGeneration(key: CombinationKey, forceRefresh: boolean, signal: AbortSignal): Promise<GenerationResult> {
    if (!forceRefresh) {
      // Another writer may have stored this combination since the caller looked.
      const current = await this.currentRecord(key);
      if (current) return current;
    }

    const stored = await this.acquireLease(key, forceRefresh, signal);
    if (stored) return stored;

    try {
      return await this.generateLeased(key, forceRefresh, signal);
    } finally {
      await this.releaseLease(key.hash);
    }
  }

  private async generateLeased(key: CombinationKey, forceRefresh: boolean, signal: AbortSignal): Promise<GenerationResult> {
    const { store, generator, datasets, validator, schemaVersion } = this.deps;
    const trace: ResolverPhase[] = [];
    const short = key.hash.slice(0, 12);

    trace.push('generate');
    const datasetSummary = await datasets.summarize(key);
    const started = this.clock();
    let output: AnalysisOutput;
    try {
      output = await generator.generate({ key, datasetSummary, signal });
    } catch (error) {
      advance(trace, 'failed');
      console.error(`❌ [CacheResolver] Generation failed for ${short}: ${errorMessage(error)}`);
      if (error instanceof FindingsError) throw error;
      throw new GeneratorError('provider_error', errorMessage(error));
    }
    const measuredLatencyMs = this.clock() - started;

    advance(trace, 'validate');
    const candidate = buildCandidate(key, output, { measuredLatencyMs, datasetPoints: datasetSummary.totalPoints });
    const report = validator.validateCandidate(candidate);
    const decision = decideValidation(report, this.deps.retainInvalid ?? false);

    if (decision.kind === 'discard') {
      advance(trace, 'discard');
      console.warn(`⚠️ [CacheResolver] Discarding invalid findings for ${short}: ${report.issues.map((i) => i.code).join(', ')}`);
      if (decision.retain) await this.retainForDiagnostics(toNewRecord(candidate, report, schemaVersion));
      advance(trace, 'failed');
      throw new ValidationFailureError(key.hash, report);
    }

    advance(trace, 'store');
    if (signal.aborted) {
      advance(trace, 'failed');
      throw new GeneratorError('cancelled', `Generation for ${short} was cancelled before it was stored`);
    }

    let record: FindingsRecord;
    try {
      record = await store.put(toNewRecord(candidate, report, schemaVersion), { replaceCurrent: forceRefresh });
    } catch (error) {
      if (!(error instanceof StaleWriteError)) throw error;
      // A concurrent writer committed first; serve its record if it is usable.
      const winner = decideLookup(await store.get(key.hash), key);
      if (winner.kind !== 'hit') throw error;
      console.warn(`⚠️ [CacheResolver] Stale write for ${short}; serving the stored record`);
      advance(trace, 'returned');
      return {
        record: winner.record,
        degraded: winner.record.validation.status === 'partial',
        generated: false,
        trace,
      };
    }
    advance(trace, 'returned');

    console.log(`✨ [CacheResolver] Generated ${key.analysisType} findings for ${short} (${report.status}) in ${measuredLatencyMs}ms`);
    return { record, degraded: decision.degraded, generated: true, trace };
  }

  /** A usable record at the current schema version, if one is stored. */
  private async currentRecord(key: CombinationKey): Promise<GenerationResult | undefined> {
    const current = decideLookup(await this.deps.store.get(key.hash), key, {
      currentSchemaVersion: this.deps.schemaVersion,
    });
    if (current.kind === 'collision') {
      throw new CombinationCollisionError(key.hash, key.canonical, current.storedCanonical);
    }
    if (current.kind === 'miss') return undefined;
    return {
      record: current.record,
      degraded: current.record.validation.status === 'partial',
      generated: false,
      trace: ['returned'],
    };
  }

  /**
   * Wait until this resolver holds the generation lease for `key`. Returns the
   * record instead when another holder stores one in the meantime.
   */
  private async acquireLease(
    key: CombinationKey,
    forceRefresh: boolean,
    signal: AbortSignal,
  ): Promise<GenerationResult | undefined> {
    const { leases } = this.deps;
    if (!leases) return undefined;
    const ttlMs = this.deps.leaseTtlMs ?? 300_000;
    const pollMs = this.deps.leasePollMs ?? 1_000;
    const short = key.hash.slice(0, 12);
    let waited = false;

    for (;;) {
      if (signal.aborted) {
        throw new GeneratorError('cancelled', `Generation for ${short} was cancelled while waiting for its lease`);
      }
      if (await leases.acquire(key.hash, this.owner, new Date(this.clock()), ttlMs)) {
        if (forceRefresh) return undefined;
        // A previous holder may have stored its record just before releasing.
        let current: GenerationResult | undefined;
        try {
          current = await this.currentRecord(key);
        } catch (error) {
          await this.releaseLease(key.hash);
          throw error;
        }
        if (current) await this.releaseLease(key.hash);
        return current;
      }
      if (!waited) {
        console.log(`⏳ [CacheResolver] ${short} is being generated by another process, waiting`);
        waited = true;
      }
      await this.wait(pollMs, signal);
      if (!forceRefresh) {
        const current = await this.currentRecord(key);
        if (current) return current;
      }
    }
  }

  private async releaseLease(hash: string): Promise<void> {
    if (!this.deps.leases) return;
    try {
      await this.deps.leases.release(hash, this.owner);
    } catch (error) {
      console.warn(`⚠️ [CacheResolver] Could not release generation lease for ${hash.slice(0, 12)}: ${errorMessage(error)}`);
    }
  }

  private async retainForDiagnostics(record: NewFindingsRecord): Promise<void> {
    try {
      await this.deps.store.put(record);
    } catch (error) {
      console.warn(`⚠️ [CacheResolver] Could not retain invalid findings ${record.combinationHash.slice(0, 12)}: ${errorMessage(error)}`);
    }
  }

  private async bumpAccess(hash: string): Promise<void> {
    try {
      await this.deps.store.markAccessed(hash);
    } catch (error) {
      console.warn(`⚠️ [CacheResolver] Could not update access counters for ${hash.slice(0, 12)}: ${errorMessage(error)}`);
    }
  }

  private recordUsage(hash: string, hit: boolean, latencyMs: number, outcome: UsageOutcome): void {
    if (!this.deps.usage) return;
    try {
      this.deps.usage.record({ combinationHash: hash, hit, latencyMs, outcome });
    } catch (error) {
      console.warn(`⚠️ [UsageRecorder] Failed to record usage: ${errorMessage(error)}`);
    }
  }
}
