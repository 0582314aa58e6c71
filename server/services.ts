import path from 'node:path';
import type { AppConfig } from './config/app-config.js';
import { loadCatalog, type Catalog } from './config/catalog.js';
import { createDatabase, type DatabaseHandle } from './db.js';
import { CacheResolver } from './findings/cache-resolver.js';
import { ContentValidator, type ValidationThresholds } from './findings/content-validator.js';
import { DatabaseFindingsStore } from './findings/database-findings-store.js';
import { DatabaseGenerationLeases } from './findings/database-generation-lease.js';
import type { FindingsStore } from './findings/findings-store.js';
import type { GenerationLeases } from './findings/generation-lease.js';
import { MemoryFindingsStore } from './findings/memory-findings-store.js';
import {
  BufferedUsageRecorder,
  DatabaseUsageSink,
  MemoryUsageSink,
  type UsageSink,
} from './findings/usage-recorder.js';
import { FileDatasetProvider } from './generator/dataset-provider.js';
import { OpenAIAnalysisGenerator, createOpenAIClient } from './generator/openai-generator.js';
import { SimulatedAnalysisGenerator } from './generator/simulated-generator.js';
import type { AnalysisGenerator, DatasetProvider } from './generator/types.js';
import { DatabaseJobStore } from './pipeline/database-job-store.js';
import type { JobStore } from './pipeline/job-store.js';
import { MemoryJobStore } from './pipeline/memory-job-store.js';
import { PrecomputationPipeline } from './pipeline/precomputation-pipeline.js';

export interface Services {
  config: AppConfig;
  catalog: Catalog;
  store: FindingsStore;
  jobs: JobStore;
  generator: AnalysisGenerator;
  validator: ContentValidator;
  usage: BufferedUsageRecorder;
  resolver: CacheResolver;
  pipeline: PrecomputationPipeline;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

/** Replace individual collaborators, mostly for tests and dry runs. */
export interface ServiceOverrides {
  catalog?: Catalog;
  store?: FindingsStore;
  jobs?: JobStore;
  leases?: GenerationLeases;
  generator?: AnalysisGenerator;
  datasets?: DatasetProvider;
  usageSink?: UsageSink;
  thresholds?: Partial<ValidationThresholds>;
  /** Use the template generator even when an API key is configured. */
  simulate?: boolean;
}

function chooseGenerator(config: AppConfig, catalog: Catalog, simulate: boolean): AnalysisGenerator {
  const { apiKey, baseUrl, models, timeoutMs, temperature, logPrompts } = config.generator;
  if (simulate || !apiKey) {
    if (!simulate) console.warn('⚠️ [Generator] OPENAI_API_KEY not set, using simulated generator');
    return new SimulatedAnalysisGenerator();
  }
  return new OpenAIAnalysisGenerator({
    client: createOpenAIClient(apiKey, baseUrl),
    catalog,
    models,
    timeoutMs,
    temperature,
    logPrompts,
  });
}

/**
 * Composition root. Everything the HTTP server and the CLI need is built
 * here from one AppConfig; `close()` flushes usage events and ends the pool.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const catalog = overrides.catalog ?? loadCatalog();
  const database: DatabaseHandle | undefined =
    config.storage.driver === 'postgres' && !(overrides.store && overrides.jobs && overrides.usageSink)
      ? createDatabase(config.storage.databaseUrl, config.storage.poolMax)
      : undefined;

  const store = overrides.store ?? (database ? new DatabaseFindingsStore(database.db) : new MemoryFindingsStore());
  const jobs = overrides.jobs ?? (database ? new DatabaseJobStore(database.db) : new MemoryJobStore());
  const usageSink = overrides.usageSink ?? (database ? new DatabaseUsageSink(database.db) : new MemoryUsageSink());
  // In-process coalescing covers a single process; postgres deployments share leases.
  const leases = overrides.leases ?? (database ? new DatabaseGenerationLeases(database.db) : undefined);

  const generator = overrides.generator ?? chooseGenerator(config, catalog, overrides.simulate ?? false);
  const datasets = overrides.datasets ?? new FileDatasetProvider(path.resolve(config.datasetDir), catalog);
  const validator = new ContentValidator(overrides.thresholds);

  const usage = new BufferedUsageRecorder(usageSink, {
    batchSize: config.usage.batchSize,
    flushIntervalMs: config.usage.flushIntervalMs,
  });
  usage.start();

  const resolver = new CacheResolver({
    store,
    generator,
    datasets,
    validator,
    usage,
    schemaVersion: config.findings.schemaVersion,
    retainInvalid: config.findings.retainInvalid,
    leases,
    leaseTtlMs: config.findings.leaseTtlMs,
    leasePollMs: config.findings.leasePollMs,
  });

  const pipeline = new PrecomputationPipeline({
    jobs,
    resolver,
    catalog,
    settings: { ...config.pipeline, schemaVersion: config.findings.schemaVersion },
  });

  console.log(
    `✅ [Services] Ready: storage=${database ? 'postgres' : 'memory'} generator=${generator.name} schema=v${config.findings.schemaVersion}`,
  );

  return {
    config,
    catalog,
    store,
    jobs,
    generator,
    validator,
    usage,
    resolver,
    pipeline,
    async healthCheck() {
      return database ? database.healthCheck() : true;
    },
    async close() {
      pipeline.stop();
      await usage.close();
      await store.close();
      await jobs.close();
      await leases?.close();
      await database?.close();
    },
  };
}
