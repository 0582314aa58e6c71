import type { Catalog, Language } from '../config/catalog.js';
import type { CombinationKey } from '../findings/combination-key.js';
import type { DatasetSummary, SectionKey } from './types.js';

export interface AnalysisPrompt {
  systemPrompt: string;
  userPrompt: string;
  sections: SectionKey[];
}

const SINGLE_SECTIONS: SectionKey[] = [
  'executive_summary',
  'principal_findings',
  'temporal_analysis',
  'seasonal_analysis',
  'spectral_analysis',
  'strategic_synthesis',
  'conclusions',
];

const MULTI_SECTIONS: SectionKey[] = [
  'executive_summary',
  'principal_findings',
  'temporal_analysis',
  'seasonal_analysis',
  'spectral_analysis',
  'correlation_analysis',
  'component_analysis',
  'strategic_synthesis',
  'conclusions',
];

const LANGUAGE_NAMES: Record<Language, string> = { es: 'Spanish', en: 'English' };

function formatNumber(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(2);
}

export function describeDataset(summary: DatasetSummary): string {
  const lines = summary.sources.map(
    (source) =>
      `- ${source.displayName}: ${source.points} points` +
      (source.startDate && source.endDate ? `, ${source.startDate} to ${source.endDate}` : '') +
      `, mean ${formatNumber(source.mean)}, trend slope ${formatNumber(source.trendSlope)}`,
  );
  return [`Total data points: ${summary.totalPoints} (as of ${summary.asOf})`, ...lines].join('\n');
}

export function buildAnalysisPrompt(key: CombinationKey, summary: DatasetSummary, catalog: Catalog): AnalysisPrompt {
  const sections = key.analysisType === 'single' ? SINGLE_SECTIONS : MULTI_SECTIONS;
  const toolName = catalog.toolName(key.toolKey, key.language);
  const sourceNames = key.sourceKeys.map((source) => catalog.sourceName(source));

  const scope =
    key.analysisType === 'single'
      ? `This is a single-source analysis of ${sourceNames[0]}. Do not write correlation or principal component content: one source gives no basis for cross-source statistics.`
      : `This is a multi-source analysis across ${sourceNames.join(', ')}. Correlation_analysis must discuss how the sources move together; component_analysis must interpret the principal components, citing loadings and explained variance.`;

  const systemPrompt = [
    'You are a senior management research analyst writing doctoral-level findings about the adoption of management tools.',
    `Write every section in ${LANGUAGE_NAMES[key.language]}.`,
    scope,
    `Respond with one JSON object with exactly these string keys: ${sections.join(', ')}.`,
    'Optionally add "tables": an array of { "section", "title", "columns", "rows" } for tabular results instead of writing Markdown tables inside the narrative.',
    'Optionally add "confidence_score" between 0 and 1.',
  ].join('\n');

  const userPrompt = [
    `Management tool: ${toolName}`,
    `Data sources: ${sourceNames.join(', ')}`,
    '',
    'Dataset summary:',
    describeDataset(summary),
    '',
    'Ground every claim in the figures above and state numbers explicitly.',
  ].join('\n');

  return { systemPrompt, userPrompt, sections };
}
