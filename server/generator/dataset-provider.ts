import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Catalog } from '../config/catalog.js';
import { DatasetUnavailableError, errorMessage } from '../errors.js';
import type { CombinationKey } from '../findings/combination-key.js';
import type { DatasetProvider, DatasetSummary, SourceSummary } from './types.js';

const sourceStatsSchema = z.object({
  points: z.number().int().nonnegative(),
  startDate: z.string().nullable().default(null),
  endDate: z.string().nullable().default(null),
  mean: z.number().nullable().default(null),
  trendSlope: z.number().nullable().default(null),
});

const datasetFileSchema = z.object({
  asOf: z.string(),
  sources: z.record(sourceStatsSchema),
});

type DatasetFile = z.infer<typeof datasetFileSchema>;

/**
 * Reads per-tool dataset statistics from `<dir>/<toolKey>.json`. Summaries
 * depend only on file contents, so regenerated findings stay comparable.
 */
export class FileDatasetProvider implements DatasetProvider {
  private files = new Map<string, Promise<DatasetFile | undefined>>();

  constructor(
    private readonly dir: string,
    private readonly catalog: Catalog,
  ) {}

  async summarize(key: CombinationKey): Promise<DatasetSummary> {
    const file = await this.load(key.toolKey);
    const sources: SourceSummary[] = key.sourceKeys.map((sourceKey) => {
      const stats = file?.sources[sourceKey];
      return {
        sourceKey,
        displayName: this.catalog.sourceName(sourceKey),
        points: stats?.points ?? 0,
        startDate: stats?.startDate ?? null,
        endDate: stats?.endDate ?? null,
        mean: stats?.mean ?? null,
        trendSlope: stats?.trendSlope ?? null,
      };
    });

    return {
      toolKey: key.toolKey,
      toolName: this.catalog.toolName(key.toolKey, key.language),
      language: key.language,
      asOf: file?.asOf ?? 'unknown',
      totalPoints: sources.reduce((sum, source) => sum + source.points, 0),
      sources,
    };
  }

  private load(toolKey: string): Promise<DatasetFile | undefined> {
    let cached = this.files.get(toolKey);
    if (!cached) {
      cached = this.read(toolKey);
      this.files.set(toolKey, cached);
      // Failed loads are retried on the next request.
      cached.catch(() => {
        this.files.delete(toolKey);
      });
    }
    return cached;
  }

  private async read(toolKey: string): Promise<DatasetFile | undefined> {
    const file = path.join(this.dir, `${toolKey}.json`);
    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        console.warn(`⚠️ [Datasets] No dataset file for ${toolKey} at ${file}`);
        return undefined;
      }
      throw new DatasetUnavailableError(toolKey, file, errorMessage(error));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new DatasetUnavailableError(toolKey, file, errorMessage(error));
    }
    const parsed = datasetFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'file'}: ${issue.message}`);
      throw new DatasetUnavailableError(toolKey, file, issues.join('; '));
    }
    return parsed.data;
  }
}
