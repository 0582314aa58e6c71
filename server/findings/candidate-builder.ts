import type { Language } from '../config/catalog.js';
import type { AnalysisOutput, SectionKey } from '../generator/types.js';
import type { CombinationKey } from './combination-key.js';
import type { ValidationReport } from './content-validator.js';
import type {
  AnalysisType,
  FindingsSections,
  GenerationMetadata,
  NewFindingsRecord,
  SectionName,
} from './findings-types.js';
import { renderMarkdownTable } from './markdown-table.js';

/**
 * Generator output mapped onto a combination, before validation decides
 * whether it may be stored.
 */
export interface FindingsCandidate {
  key: CombinationKey;
  analysisType: AnalysisType;
  sections: FindingsSections;
  metadata: GenerationMetadata;
}

export interface BuildCandidateOptions {
  measuredLatencyMs: number;
  datasetPoints: number;
}

const SECTION_FIELDS: Record<SectionKey, SectionName> = {
  executive_summary: 'executiveSummary',
  principal_findings: 'principalFindings',
  temporal_analysis: 'temporalAnalysis',
  seasonal_analysis: 'seasonalAnalysis',
  spectral_analysis: 'spectralAnalysis',
  correlation_analysis: 'correlationAnalysis',
  component_analysis: 'componentAnalysis',
  strategic_synthesis: 'strategicSynthesis',
  conclusions: 'conclusions',
};

const SUBSECTION_LABELS: Record<Language, Record<'temporal' | 'seasonal' | 'spectral' | 'synthesis' | 'conclusions', string>> = {
  es: {
    temporal: 'Análisis Temporal',
    seasonal: 'Patrones Estacionales',
    spectral: 'Análisis Espectral',
    synthesis: 'Síntesis Estratégica',
    conclusions: 'Conclusiones',
  },
  en: {
    temporal: 'Temporal Analysis',
    seasonal: 'Seasonal Patterns',
    spectral: 'Spectral Analysis',
    synthesis: 'Strategic Synthesis',
    conclusions: 'Conclusions',
  },
};

// Section length targets for the confidence heuristic
const SINGLE_TARGETS: ReadonlyArray<[SectionName, number]> = [
  ['executiveSummary', 150],
  ['principalFindings', 500],
  ['temporalAnalysis', 300],
  ['seasonalAnalysis', 250],
  ['spectralAnalysis', 250],
];

const MULTI_TARGETS: ReadonlyArray<[SectionName, number]> = [
  ['executiveSummary', 150],
  ['principalFindings', 500],
  ['componentAnalysis', 400],
];

const QUANTITATIVE_BONUS = 0.1;

export function countNumbers(text: string): number {
  return text.match(/\d+(?:[.,]\d+)?/g)?.length ?? 0;
}

export function estimateConfidence(analysisType: AnalysisType, sections: FindingsSections): number {
  const targets = analysisType === 'single' ? SINGLE_TARGETS : MULTI_TARGETS;
  const ratios = targets.map(([field, target]) => Math.min(1, sections[field].trim().length / target));
  let score = ratios.reduce((sum, ratio) => sum + ratio, 0) / ratios.length;

  const quantitative = analysisType === 'single' ? sections.principalFindings : sections.componentAnalysis;
  if (countNumbers(quantitative) >= 3) score += QUANTITATIVE_BONUS;

  return Math.round(Math.min(1, score) * 100) / 100;
}

/**
 * Single-source principal findings: the generator's own principal findings
 * followed by labeled temporal, seasonal, spectral, synthesis and conclusions
 * sub-sections, in that order. Empty parts are skipped.
 */
export function composeSingleSourceFindings(sections: FindingsSections, language: Language): string {
  const labels = SUBSECTION_LABELS[language];
  const parts: string[] = [];
  const own = sections.principalFindings.trim();
  if (own) parts.push(own);

  const ordered: Array<[string, string]> = [
    [labels.temporal, sections.temporalAnalysis],
    [labels.seasonal, sections.seasonalAnalysis],
    [labels.spectral, sections.spectralAnalysis],
    [labels.synthesis, sections.strategicSynthesis],
    [labels.conclusions, sections.conclusions],
  ];
  for (const [label, text] of ordered) {
    const body = text.trim();
    if (body) parts.push(`#### ${label}\n\n${body}`);
  }
  return parts.join('\n\n');
}

function sectionsFromOutput(output: AnalysisOutput): FindingsSections {
  const sections: FindingsSections = {
    executiveSummary: output.executive_summary,
    principalFindings: output.principal_findings,
    temporalAnalysis: output.temporal_analysis,
    seasonalAnalysis: output.seasonal_analysis,
    spectralAnalysis: output.spectral_analysis,
    correlationAnalysis: output.correlation_analysis,
    componentAnalysis: output.component_analysis,
    strategicSynthesis: output.strategic_synthesis,
    conclusions: output.conclusions,
  };

  for (const table of output.tables) {
    const field = SECTION_FIELDS[table.section];
    const rendered = renderMarkdownTable(table);
    if (!rendered) continue;
    const existing = sections[field].trim();
    sections[field] = existing ? `${existing}\n\n${rendered}` : rendered;
  }
  return sections;
}

export function buildCandidate(
  key: CombinationKey,
  output: AnalysisOutput,
  options: BuildCandidateOptions,
): FindingsCandidate {
  const sections = sectionsFromOutput(output);
  const confidenceScore = output.confidence_score ?? estimateConfidence(key.analysisType, sections);

  if (key.analysisType === 'single') {
    sections.principalFindings = composeSingleSourceFindings(sections, key.language);
  }

  return {
    key,
    analysisType: key.analysisType,
    sections,
    metadata: {
      generatorId: (output.generator_id ?? '').trim(),
      latencyMs: Math.round(output.latency_ms ?? options.measuredLatencyMs),
      confidenceScore,
      dataPointsCount: output.data_points_count ?? options.datasetPoints,
    },
  };
}

function optionalText(text: string): string | undefined {
  const trimmed = text.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Shape a validated candidate into the tagged record the store accepts.
 * Cross-source content on a single-source candidate is dropped here; the
 * validation issues already record that it was present.
 */
export function toNewRecord(
  candidate: FindingsCandidate,
  report: ValidationReport,
  schemaVersion: number,
): NewFindingsRecord {
  const { key, sections } = candidate;
  const base = {
    combinationHash: key.hash,
    canonicalKey: key.canonical,
    toolId: key.toolId,
    toolKey: key.toolKey,
    sourceKeys: [...key.sourceKeys],
    language: key.language,
    executiveSummary: sections.executiveSummary.trim(),
    principalFindings: sections.principalFindings.trim(),
    strategicSynthesis: sections.strategicSynthesis.trim(),
    conclusions: sections.conclusions.trim(),
    metadata: { ...candidate.metadata },
    validation: { status: report.status, issues: [...report.issues] },
    schemaVersion,
  };

  if (candidate.analysisType === 'single') {
    return { ...base, analysisType: 'single' };
  }
  return {
    ...base,
    analysisType: 'multi',
    correlationAnalysis: sections.correlationAnalysis.trim(),
    componentAnalysis: sections.componentAnalysis.trim(),
    temporalAnalysis: optionalText(sections.temporalAnalysis),
    seasonalAnalysis: optionalText(sections.seasonalAnalysis),
    spectralAnalysis: optionalText(sections.spectralAnalysis),
  };
}
