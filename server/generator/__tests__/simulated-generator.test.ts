import { fileURLToPath } from 'url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { catalog, keyFor } from '../../__tests__/fixtures.js';
import { buildCandidate } from '../../findings/candidate-builder.js';
import { ContentValidator } from '../../findings/content-validator.js';
import { FileDatasetProvider } from '../dataset-provider.js';
import { SimulatedAnalysisGenerator } from '../simulated-generator.js';

const datasetDir = fileURLToPath(new URL('../../data/datasets', import.meta.url));

describe('FileDatasetProvider', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('summarizes the requested sources from the tool file', async () => {
    const provider = new FileDatasetProvider(datasetDir, catalog);

    const summary = await provider.summarize(keyFor('benchmarking', ['trends', 'crossref'], 'en'));

    expect(summary).toMatchObject({ toolKey: 'benchmarking', toolName: 'Benchmarking', asOf: '2024-01-31', totalPoints: 1128 });
    expect(summary.sources.map((source) => [source.sourceKey, source.points])).toEqual([
      ['crossref', 888],
      ['google_trends', 240],
    ]);
    expect(summary.sources[1]).toMatchObject({ displayName: 'Google Trends', startDate: '2004-01', mean: 62.09 });
  });

  it('returns an empty summary when the tool has no file', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const provider = new FileDatasetProvider('/nonexistent/datasets', catalog);

    const summary = await provider.summarize(keyFor('benchmarking', ['trends']));

    expect(summary.asOf).toBe('unknown');
    expect(summary.totalPoints).toBe(0);
    expect(summary.sources).toEqual([
      {
        sourceKey: 'google_trends',
        displayName: 'Google Trends',
        points: 0,
        startDate: null,
        endDate: null,
        mean: null,
        trendSlope: null,
      },
    ]);
  });
});

describe('SimulatedAnalysisGenerator', () => {
  const provider = new FileDatasetProvider(datasetDir, catalog);
  const generator = new SimulatedAnalysisGenerator();
  const validator = new ContentValidator();

  it.each([
    { tool: 'benchmarking', sources: ['trends'], language: 'es' },
    { tool: 'benchmarking', sources: ['trends'], language: 'en' },
    { tool: 'calidad_total', sources: ['books', 'crossref'], language: 'es' },
    { tool: 'calidad_total', sources: ['books', 'crossref', 'bain_usability'], language: 'en' },
  ])('writes valid findings for $tool $sources ($language)', async ({ tool, sources, language }) => {
    const key = keyFor(tool, sources, language);
    const datasetSummary = await provider.summarize(key);

    const output = await generator.generate({ key, datasetSummary });
    const candidate = buildCandidate(key, output, { measuredLatencyMs: 0, datasetPoints: datasetSummary.totalPoints });

    expect(output.generator_id).toBe('simulated:v1');
    expect(output.data_points_count).toBe(datasetSummary.totalPoints);
    expect(validator.validateCandidate(candidate)).toEqual({ status: 'valid', issues: [] });
  });

  it('keeps cross-source sections empty for a single source', async () => {
    const key = keyFor('benchmarking', ['crossref'], 'en');
    const output = await generator.generate({ key, datasetSummary: await provider.summarize(key) });

    expect(output.correlation_analysis).toBe('');
    expect(output.component_analysis).toBe('');
    expect(output.executive_summary).toContain('Benchmarking');
  });

  it('refuses to start once cancelled', async () => {
    const key = keyFor('benchmarking', ['crossref']);
    const controller = new AbortController();
    controller.abort();

    await expect(
      generator.generate({ key, datasetSummary: await provider.summarize(key), signal: controller.signal }),
    ).rejects.toMatchObject({ kind: 'cancelled' });
  });
});
