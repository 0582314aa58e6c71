/**
 * Process configuration, read from the environment once at start-up.
 * Every consumer receives the parsed AppConfig; nothing else reads process.env.
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const modelList = z
  .string()
  .default('gpt-4o-mini,gpt-4o')
  .transform((value) =>
    value
      .split(',')
      .map((model) => model.trim())
      .filter((model) => model.length > 0),
  )
  .refine((models) => models.length > 0, 'at least one model is required');

const envSchema = z
  .object({
    DATABASE_URL: z.string().url().optional(),
    STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DB_POOL_MAX: positiveInt(10),

    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    GENERATOR_MODELS: modelList,
    GENERATOR_TIMEOUT_MS: positiveInt(60_000),
    GENERATOR_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    LOG_LLM_PROMPTS: booleanFlag,

    FINDINGS_SCHEMA_VERSION: positiveInt(2),
    RETAIN_INVALID_FINDINGS: booleanFlag,
    GENERATION_LEASE_TTL_MS: z.coerce.number().int().positive().optional(),
    GENERATION_LEASE_POLL_MS: positiveInt(1_000),

    PIPELINE_CONCURRENCY: positiveInt(4),
    PIPELINE_MAX_ATTEMPTS: positiveInt(3),
    PIPELINE_BACKOFF_BASE_MS: nonNegativeInt(1_000),
    PIPELINE_BACKOFF_MAX_MS: nonNegativeInt(30_000),
    PIPELINE_RATE_LIMIT_PER_MINUTE: nonNegativeInt(30),
    PIPELINE_LEASE_TIMEOUT_MS: positiveInt(600_000),

    USAGE_FLUSH_INTERVAL_MS: positiveInt(5_000),
    USAGE_BATCH_SIZE: positiveInt(100),

    DATASET_DIR: z.string().min(1).default('server/data/datasets'),
    PORT: positiveInt(5000),
  })
  .superRefine((env, ctx) => {
    if (env.PIPELINE_BACKOFF_MAX_MS < env.PIPELINE_BACKOFF_BASE_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PIPELINE_BACKOFF_MAX_MS'],
        message: 'must be at least PIPELINE_BACKOFF_BASE_MS',
      });
    }
  })
  .transform((env, ctx) => {
    let storage: AppConfig['storage'] = { driver: 'memory' };
    if (env.STORAGE_DRIVER === 'postgres') {
      if (!env.DATABASE_URL) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['DATABASE_URL'],
          message: 'required when STORAGE_DRIVER=postgres',
        });
        return z.NEVER;
      }
      storage = { driver: 'postgres', databaseUrl: env.DATABASE_URL, poolMax: env.DB_POOL_MAX };
    }
    return { ...env, storage };
  });

export interface AppConfig {
  readonly storage:
    | { readonly driver: 'postgres'; readonly databaseUrl: string; readonly poolMax: number }
    | { readonly driver: 'memory' };
  readonly generator: {
    readonly apiKey?: string;
    readonly baseUrl?: string;
    readonly models: readonly string[];
    readonly timeoutMs: number;
    readonly temperature: number;
    readonly logPrompts: boolean;
  };
  readonly findings: {
    readonly schemaVersion: number;
    readonly retainInvalid: boolean;
    readonly leaseTtlMs: number;
    readonly leasePollMs: number;
  };
  readonly pipeline: {
    readonly concurrency: number;
    readonly maxAttempts: number;
    readonly backoffBaseMs: number;
    readonly backoffMaxMs: number;
    readonly rateLimitPerMinute: number;
    readonly leaseTimeoutMs: number;
  };
  readonly usage: {
    readonly flushIntervalMs: number;
    readonly batchSize: number;
  };
  readonly datasetDir: string;
  readonly port: number;
}

// Empty strings in .env files mean "unset".
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  return cleaned;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(dropEmpty(env));
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`));
  }
  const e = result.data;

  return Object.freeze({
    storage: e.storage,
    generator: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      models: e.GENERATOR_MODELS,
      timeoutMs: e.GENERATOR_TIMEOUT_MS,
      temperature: e.GENERATOR_TEMPERATURE,
      logPrompts: e.LOG_LLM_PROMPTS,
    },
    findings: {
      schemaVersion: e.FINDINGS_SCHEMA_VERSION,
      retainInvalid: e.RETAIN_INVALID_FINDINGS,
      // Long enough for every configured model to time out once.
      leaseTtlMs: e.GENERATION_LEASE_TTL_MS ?? e.GENERATOR_TIMEOUT_MS * e.GENERATOR_MODELS.length + 60_000,
      leasePollMs: e.GENERATION_LEASE_POLL_MS,
    },
    pipeline: {
      concurrency: e.PIPELINE_CONCURRENCY,
      maxAttempts: e.PIPELINE_MAX_ATTEMPTS,
      backoffBaseMs: e.PIPELINE_BACKOFF_BASE_MS,
      backoffMaxMs: e.PIPELINE_BACKOFF_MAX_MS,
      rateLimitPerMinute: e.PIPELINE_RATE_LIMIT_PER_MINUTE,
      leaseTimeoutMs: e.PIPELINE_LEASE_TIMEOUT_MS,
    },
    usage: {
      flushIntervalMs: e.USAGE_FLUSH_INTERVAL_MS,
      batchSize: e.USAGE_BATCH_SIZE,
    },
    datasetDir: e.DATASET_DIR,
    port: e.PORT,
  });
}
