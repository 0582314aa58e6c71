import { loadCatalog } from '../config/catalog.js';
import { buildCandidate, toNewRecord } from '../findings/candidate-builder.js';
import { canonicalize, type CombinationKey } from '../findings/combination-key.js';
import { ContentValidator } from '../findings/content-validator.js';
import type { FindingsSections, NewFindingsRecord } from '../findings/findings-types.js';
import {
  analysisOutputSchema,
  type AnalysisGenerator,
  type AnalysisOutput,
  type DatasetProvider,
  type DatasetSummary,
  type GenerateRequest,
  type RawAnalysisOutput,
} from '../generator/types.js';

export const catalog = loadCatalog();

export function keyFor(tool: string, sources: string[], language = 'es'): CombinationKey {
  return canonicalize(tool, sources, language, catalog);
}

/** Deterministic filler text of exactly `length` characters. */
export function text(length: number, seed = 'Observed adoption trend'): string {
  let out = '';
  while (out.length < length) out += `${seed} ${out.length}. `;
  return out.slice(0, length);
}

export function emptySections(): FindingsSections {
  return {
    executiveSummary: '',
    principalFindings: '',
    temporalAnalysis: '',
    seasonalAnalysis: '',
    spectralAnalysis: '',
    correlationAnalysis: '',
    componentAnalysis: '',
    strategicSynthesis: '',
    conclusions: '',
  };
}

/**
 * Generator output that validates as `valid` for the key's analysis type.
 */
export function validOutput(key: CombinationKey, overrides: RawAnalysisOutput = {}): AnalysisOutput {
  const shared: RawAnalysisOutput = {
    executive_summary: text(120, 'Executive summary'),
    strategic_synthesis: text(90, 'Synthesis'),
    conclusions: text(80, 'Conclusion'),
    generator_id: 'stub:v1',
    data_points_count: 240,
    confidence_score: 0.8,
    latency_ms: 15,
  };
  const body: RawAnalysisOutput =
    key.analysisType === 'single'
      ? {
          principal_findings: text(320, 'Principal'),
          temporal_analysis: text(100, 'Temporal'),
          seasonal_analysis: text(100, 'Seasonal'),
          spectral_analysis: text(100, 'Spectral'),
        }
      : {
          principal_findings: text(260, 'Principal'),
          correlation_analysis: text(200, 'Correlation'),
          component_analysis: text(200, 'Component'),
        };
  return analysisOutputSchema.parse({ ...shared, ...body, ...overrides });
}

/** A validated record for `key`, ready for FindingsStore.put. */
export function recordFor(key: CombinationKey, schemaVersion = 1, overrides: RawAnalysisOutput = {}): NewFindingsRecord {
  const candidate = buildCandidate(key, validOutput(key, overrides), { measuredLatencyMs: 10, datasetPoints: 100 });
  return toNewRecord(candidate, new ContentValidator().validateCandidate(candidate), schemaVersion);
}

export type Respond = (key: CombinationKey) => AnalysisOutput;

/**
 * Scripted generator: returns `respond(key)` unless an error was queued for
 * the key's hash. An optional gate holds every call until it is opened.
 */
export class StubGenerator implements AnalysisGenerator {
  readonly name = 'stub';
  readonly calls: CombinationKey[] = [];
  private failures = new Map<string, unknown[]>();
  private gate: Promise<void> | undefined;
  private openGate: (() => void) | undefined;

  constructor(private readonly respond: Respond = (key) => validOutput(key)) {}

  failNext(hash: string, ...errors: unknown[]): void {
    this.failures.set(hash, [...(this.failures.get(hash) ?? []), ...errors]);
  }

  hold(): void {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = undefined;
  }

  callsFor(hash: string): number {
    return this.calls.filter((key) => key.hash === hash).length;
  }

  async generate({ key }: GenerateRequest): Promise<AnalysisOutput> {
    this.calls.push(key);
    if (this.gate) await this.gate;
    const queued = this.failures.get(key.hash);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }
    return this.respond(key);
  }
}

export class StubDatasetProvider implements DatasetProvider {
  constructor(private readonly pointsPerSource = 100) {}

  async summarize(key: CombinationKey): Promise<DatasetSummary> {
    return {
      toolKey: key.toolKey,
      toolName: catalog.toolName(key.toolKey, key.language),
      language: key.language,
      asOf: '2024-01-31',
      totalPoints: this.pointsPerSource * key.sourceKeys.length,
      sources: key.sourceKeys.map((sourceKey) => ({
        sourceKey,
        displayName: catalog.sourceName(sourceKey),
        points: this.pointsPerSource,
        startDate: '2004-01-01',
        endDate: '2023-12-31',
        mean: 42.5,
        trendSlope: -0.12,
      })),
    };
  }
}
