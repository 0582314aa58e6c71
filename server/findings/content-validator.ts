/**
 * Content validator: classifies a candidate (or stored) analysis as valid,
 * partial or invalid. Never mutates what it is given.
 *
 * Classification, in order:
 *   1. placeholder generator id or zero data points        -> invalid
 *   2. missing executive summary or conclusions            -> invalid
 *   3. single-source with correlation/component content    -> invalid
 *   4. single-source with a source count other than one    -> invalid
 *   5. multi-source with blank principal findings          -> invalid
 *   6. any remaining length or source-count shortfall      -> partial
 */

import type { FindingsCandidate } from './candidate-builder.js';
import type {
  AnalysisType,
  NewFindingsRecord,
  FindingsSections,
  GenerationMetadata,
  ValidationIssue,
  ValidationStatus,
} from './findings-types.js';

export interface ValidationThresholds {
  requiredNarrativeMin: number;
  singlePrincipalMin: number;
  multiPrincipalMin: number;
  correlationMin: number;
  componentMin: number;
  /** Cross-source content at or below this length counts as empty. */
  trivialMax: number;
  placeholderGeneratorIds: readonly string[];
}

export const DEFAULT_THRESHOLDS: ValidationThresholds = {
  requiredNarrativeMin: 40,
  singlePrincipalMin: 300,
  multiPrincipalMin: 200,
  correlationMin: 150,
  componentMin: 150,
  trivialMax: 40,
  placeholderGeneratorIds: ['', 'unknown', 'placeholder', 'default', 'none', 'n/a', 'null', 'undefined'],
};

export type ValidationIssueCode =
  | 'PLACEHOLDER_GENERATOR'
  | 'ZERO_DATA_POINTS'
  | 'MISSING_EXECUTIVE_SUMMARY'
  | 'MISSING_CONCLUSIONS'
  | 'UNEXPECTED_CROSS_SOURCE_CONTENT'
  | 'SINGLE_SOURCE_COUNT'
  | 'EMPTY_PRINCIPAL_FINDINGS'
  | 'SHORT_PRINCIPAL_FINDINGS'
  | 'SHORT_CORRELATION_ANALYSIS'
  | 'SHORT_COMPONENT_ANALYSIS'
  | 'INSUFFICIENT_SOURCES';

export interface ValidationReport {
  status: ValidationStatus;
  issues: ValidationIssue[];
}

export interface ValidationSubject {
  analysisType: AnalysisType;
  sourceCount: number;
  sections: FindingsSections;
  metadata: GenerationMetadata;
}

function length(text: string): number {
  return text.trim().length;
}

export class ContentValidator {
  readonly thresholds: ValidationThresholds;

  constructor(overrides: Partial<ValidationThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...overrides };
  }

  validate(subject: ValidationSubject): ValidationReport {
    const t = this.thresholds;
    const { sections, metadata } = subject;
    const issues: ValidationIssue[] = [];
    const add = (severity: ValidationIssue['severity'], code: ValidationIssueCode, message: string, field?: string) => {
      issues.push(field ? { code, field, severity, message } : { code, severity, message });
    };
    const invalid = (code: ValidationIssueCode, message: string, field?: string) => add('invalid', code, message, field);
    const partial = (code: ValidationIssueCode, message: string, field?: string) => add('partial', code, message, field);

    if (t.placeholderGeneratorIds.includes(metadata.generatorId.trim().toLowerCase())) {
      invalid('PLACEHOLDER_GENERATOR', `generator id "${metadata.generatorId}" is a placeholder`, 'generatorId');
    }
    if (!Number.isFinite(metadata.dataPointsCount) || metadata.dataPointsCount <= 0) {
      invalid('ZERO_DATA_POINTS', 'no data points were analysed', 'dataPointsCount');
    }

    if (length(sections.executiveSummary) < t.requiredNarrativeMin) {
      invalid('MISSING_EXECUTIVE_SUMMARY', 'executive summary is missing or too short', 'executiveSummary');
    }
    if (length(sections.conclusions) < t.requiredNarrativeMin) {
      invalid('MISSING_CONCLUSIONS', 'conclusions are missing or too short', 'conclusions');
    }

    if (subject.analysisType === 'single') {
      for (const field of ['correlationAnalysis', 'componentAnalysis'] as const) {
        if (length(sections[field]) > t.trivialMax) {
          invalid('UNEXPECTED_CROSS_SOURCE_CONTENT', `${field} is not allowed for a single source`, field);
        }
      }
      if (subject.sourceCount !== 1) {
        invalid('SINGLE_SOURCE_COUNT', `single-source analysis has ${subject.sourceCount} sources`);
      }
      if (length(sections.principalFindings) < t.singlePrincipalMin) {
        partial('SHORT_PRINCIPAL_FINDINGS', `principal findings shorter than ${t.singlePrincipalMin}`, 'principalFindings');
      }
    } else {
      const principal = length(sections.principalFindings);
      if (principal === 0) {
        invalid('EMPTY_PRINCIPAL_FINDINGS', 'principal findings are empty', 'principalFindings');
      } else if (principal < t.multiPrincipalMin) {
        partial('SHORT_PRINCIPAL_FINDINGS', `principal findings shorter than ${t.multiPrincipalMin}`, 'principalFindings');
      }
      if (length(sections.correlationAnalysis) < t.correlationMin) {
        partial('SHORT_CORRELATION_ANALYSIS', `correlation analysis shorter than ${t.correlationMin}`, 'correlationAnalysis');
      }
      if (length(sections.componentAnalysis) < t.componentMin) {
        partial('SHORT_COMPONENT_ANALYSIS', `component analysis shorter than ${t.componentMin}`, 'componentAnalysis');
      }
      if (subject.sourceCount < 2) {
        partial('INSUFFICIENT_SOURCES', `multi-source analysis has ${subject.sourceCount} source(s)`);
      }
    }

    const status: ValidationStatus = issues.some((issue) => issue.severity === 'invalid')
      ? 'invalid'
      : issues.length > 0
        ? 'partial'
        : 'valid';
    return { status, issues };
  }

  validateCandidate(candidate: FindingsCandidate): ValidationReport {
    return this.validate({
      analysisType: candidate.analysisType,
      sourceCount: candidate.key.sourceKeys.length,
      sections: candidate.sections,
      metadata: candidate.metadata,
    });
  }

  /** Re-run the rules against a stored record, e.g. after thresholds change. */
  validateRecord(record: NewFindingsRecord): ValidationReport {
    return this.validate(subjectFromRecord(record));
  }
}

export function subjectFromRecord(record: NewFindingsRecord): ValidationSubject {
  const shared = {
    executiveSummary: record.executiveSummary,
    principalFindings: record.principalFindings,
    strategicSynthesis: record.strategicSynthesis,
    conclusions: record.conclusions,
  };
  const sections: FindingsSections =
    record.analysisType === 'multi'
      ? {
          ...shared,
          correlationAnalysis: record.correlationAnalysis,
          componentAnalysis: record.componentAnalysis,
          temporalAnalysis: record.temporalAnalysis ?? '',
          seasonalAnalysis: record.seasonalAnalysis ?? '',
          spectralAnalysis: record.spectralAnalysis ?? '',
        }
      : {
          ...shared,
          correlationAnalysis: '',
          componentAnalysis: '',
          temporalAnalysis: '',
          seasonalAnalysis: '',
          spectralAnalysis: '',
        };
  return {
    analysisType: record.analysisType,
    sourceCount: record.sourceKeys.length,
    sections,
    metadata: record.metadata,
  };
}
