import { z } from 'zod';
import type { Language } from '../config/catalog.js';
import type { CombinationKey } from '../findings/combination-key.js';

const narrative = z
  .union([z.string(), z.null()])
  .optional()
  .transform((value) => value ?? '');

const tableCell = z.union([z.string(), z.number(), z.null()]);

export const sectionKeySchema = z.enum([
  'executive_summary',
  'principal_findings',
  'temporal_analysis',
  'seasonal_analysis',
  'spectral_analysis',
  'correlation_analysis',
  'component_analysis',
  'strategic_synthesis',
  'conclusions',
]);

export type SectionKey = z.infer<typeof sectionKeySchema>;

/**
 * Generator output contract. Missing sections become empty strings; numeric
 * metadata is optional because some providers only return narrative.
 */
export const analysisOutputSchema = z.object({
  executive_summary: narrative,
  principal_findings: narrative,
  temporal_analysis: narrative,
  seasonal_analysis: narrative,
  spectral_analysis: narrative,
  correlation_analysis: narrative,
  component_analysis: narrative,
  strategic_synthesis: narrative,
  conclusions: narrative,
  tables: z
    .array(
      z.object({
        section: sectionKeySchema,
        title: z.string().optional(),
        columns: z.array(z.string()),
        rows: z.array(z.array(tableCell)),
      }),
    )
    .optional()
    .default([]),
  data_points_count: z.number().int().nonnegative().optional(),
  confidence_score: z.number().min(0).max(1).optional(),
  generator_id: z.string().optional(),
  latency_ms: z.number().nonnegative().optional(),
});

export type AnalysisOutput = z.infer<typeof analysisOutputSchema>;
export type RawAnalysisOutput = z.input<typeof analysisOutputSchema>;

export interface SourceSummary {
  sourceKey: string;
  displayName: string;
  points: number;
  startDate: string | null;
  endDate: string | null;
  mean: number | null;
  trendSlope: number | null;
}

export interface DatasetSummary {
  toolKey: string;
  toolName: string;
  language: Language;
  asOf: string;
  totalPoints: number;
  sources: SourceSummary[];
}

export interface GenerateRequest {
  key: CombinationKey;
  datasetSummary: DatasetSummary;
  signal?: AbortSignal;
}

/**
 * External analysis engine. Implementations throw GeneratorError for every
 * failure they can classify.
 */
export interface AnalysisGenerator {
  readonly name: string;
  generate(request: GenerateRequest): Promise<AnalysisOutput>;
}

export interface DatasetProvider {
  summarize(key: CombinationKey): Promise<DatasetSummary>;
}
