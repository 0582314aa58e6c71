/**
 * Operator CLI for the precomputation pipeline.
 *
 *   precompute run [--tool] [--language] [--limit] [--concurrency] [--simulate]
 *   precompute status | failed | requeue-failed | release-stale | revalidate
 */

import { Command } from 'commander';
import { z } from 'zod';
import { analysisTypes } from '../../shared/schema.js';
import { errorMessage } from '../errors.js';
import { revalidateStored } from '../pipeline/revalidation.js';
import { languageFilter, toolKeyFilter } from '../routes/respond.js';
import type { Services } from '../services.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  EXECUTION_ERROR: 1,
  JOBS_FAILED: 2,
} as const;

export type OpenServices = (options: { simulate: boolean }) => Services;

const scopeOptionsSchema = z.object({
  tool: z.string().min(1).optional(),
  language: z.string().min(1).optional(),
});

const runOptionsSchema = scopeOptionsSchema.extend({
  limit: z.coerce.number().int().positive().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  simulate: z.boolean().default(false),
});

const revalidateOptionsSchema = scopeOptionsSchema.extend({
  type: z.enum(analysisTypes).optional(),
});

type Output = (line: string) => void;

function print(out: Output, value: unknown): void {
  out(JSON.stringify(value, null, 2));
}

/**
 * Open services, run one command against them and always close them again.
 * The exit code is reported through `process.exitCode` so callers can reuse
 * the program in-process.
 */
async function withServices(
  open: OpenServices,
  simulate: boolean,
  command: (services: Services) => Promise<number>,
): Promise<void> {
  const services = open({ simulate });
  try {
    process.exitCode = await command(services);
  } catch (error) {
    console.error(`❌ [Pipeline] ${errorMessage(error)}`);
    process.exitCode = EXIT_CODES.EXECUTION_ERROR;
  } finally {
    await services.close();
  }
}

function scopeFrom(services: Services, options: z.infer<typeof scopeOptionsSchema>) {
  return {
    toolKey: toolKeyFilter(services.catalog, options.tool),
    language: languageFilter(services.catalog, options.language),
    schemaVersion: services.config.findings.schemaVersion,
  };
}

export function createProgram(open: OpenServices, out: Output = console.log): Command {
  const program = new Command();

  program
    .name('precompute')
    .description('Fill and inspect the precomputed findings cache');

  program
    .command('run')
    .description('Enqueue the combination space and drain pending jobs')
    .option('-t, --tool <tool>', 'Restrict to one tool (key or name)')
    .option('-l, --language <language>', 'Restrict to one language')
    .option('-n, --limit <number>', 'Stop after this many jobs')
    .option('-c, --concurrency <number>', 'Override worker count')
    .option('--simulate', 'Use the template generator instead of the LLM', false)
    .action(async (raw: unknown) => {
      const options = runOptionsSchema.parse(raw);
      await withServices(open, options.simulate, async (services) => {
        const scope = scopeFrom(services, options);
        const controller = new AbortController();
        const onSignal = () => {
          console.log('🛑 [Pipeline] Stopping after in-flight jobs');
          controller.abort();
        };
        process.once('SIGINT', onSignal);
        try {
          const report = await services.pipeline.run({
            toolKey: scope.toolKey,
            language: scope.language,
            maxJobs: options.limit,
            concurrency: options.concurrency,
            signal: controller.signal,
          });
          print(out, report);
          return report.failed > 0 ? EXIT_CODES.JOBS_FAILED : EXIT_CODES.SUCCESS;
        } finally {
          process.removeListener('SIGINT', onSignal);
        }
      });
    });

  program
    .command('status')
    .description('Show job counts by status')
    .option('-t, --tool <tool>', 'Restrict to one tool')
    .option('-l, --language <language>', 'Restrict to one language')
    .action(async (raw: unknown) => {
      const options = scopeOptionsSchema.parse(raw);
      await withServices(open, false, async (services) => {
        const scope = scopeFrom(services, options);
        const [counts, countValid] = await Promise.all([
          services.pipeline.status(scope),
          services.store.countValid({ toolKey: scope.toolKey, language: scope.language }),
        ]);
        print(out, { schemaVersion: scope.schemaVersion, counts, countValid });
        return EXIT_CODES.SUCCESS;
      });
    });

  program
    .command('failed')
    .description('List permanently failed jobs with their last error')
    .option('-t, --tool <tool>', 'Restrict to one tool')
    .option('-l, --language <language>', 'Restrict to one language')
    .action(async (raw: unknown) => {
      const options = scopeOptionsSchema.parse(raw);
      await withServices(open, false, async (services) => {
        print(out, await services.pipeline.failedJobs(scopeFrom(services, options)));
        return EXIT_CODES.SUCCESS;
      });
    });

  program
    .command('requeue-failed')
    .description('Move permanently failed jobs back to pending')
    .option('-t, --tool <tool>', 'Restrict to one tool')
    .option('-l, --language <language>', 'Restrict to one language')
    .action(async (raw: unknown) => {
      const options = scopeOptionsSchema.parse(raw);
      await withServices(open, false, async (services) => {
        const requeued = await services.pipeline.requeueFailed(scopeFrom(services, options));
        print(out, { requeued });
        return EXIT_CODES.SUCCESS;
      });
    });

  program
    .command('release-stale')
    .description('Return running jobs whose lease expired to pending')
    .action(async () => {
      await withServices(open, false, async (services) => {
        print(out, { released: await services.pipeline.releaseStale() });
        return EXIT_CODES.SUCCESS;
      });
    });

  program
    .command('revalidate')
    .description('Re-check stored findings against current thresholds')
    .option('-t, --tool <tool>', 'Restrict to one tool')
    .option('-l, --language <language>', 'Restrict to one language')
    .option('--type <type>', 'single or multi')
    .action(async (raw: unknown) => {
      const options = revalidateOptionsSchema.parse(raw);
      await withServices(open, false, async (services) => {
        const scope = scopeFrom(services, options);
        const report = await revalidateStored(services.store, services.validator, {
          toolKey: scope.toolKey,
          language: scope.language,
          analysisType: options.type,
        });
        print(out, report);
        return EXIT_CODES.SUCCESS;
      });
    });

  return program;
}
