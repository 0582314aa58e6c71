import type { Language } from '../config/catalog.js';
import type { AnalysisType, ValidationIssue, ValidationStatus } from '../../shared/schema.js';

export type { AnalysisType, ValidationIssue, ValidationStatus };

export const SECTION_NAMES = [
  'executiveSummary',
  'principalFindings',
  'temporalAnalysis',
  'seasonalAnalysis',
  'spectralAnalysis',
  'correlationAnalysis',
  'componentAnalysis',
  'strategicSynthesis',
  'conclusions',
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

/** Flat narrative sections as produced by a generator; absent sections are ''. */
export type FindingsSections = Record<SectionName, string>;

export interface GenerationMetadata {
  generatorId: string;
  latencyMs: number;
  confidenceScore: number;
  dataPointsCount: number;
}

export interface FindingsIdentity {
  combinationHash: string;
  canonicalKey: string;
  toolId: number;
  toolKey: string;
  sourceKeys: readonly string[];
  language: Language;
}

interface FindingsBase extends FindingsIdentity {
  executiveSummary: string;
  principalFindings: string;
  strategicSynthesis: string;
  conclusions: string;
  metadata: GenerationMetadata;
  validation: { status: ValidationStatus; issues: ValidationIssue[] };
  schemaVersion: number;
}

/**
 * One source: temporal, seasonal and spectral narrative is folded into
 * principalFindings, and there is no cross-source content at all.
 */
export interface SingleSourceFindings extends FindingsBase {
  analysisType: 'single';
}

export interface MultiSourceFindings extends FindingsBase {
  analysisType: 'multi';
  correlationAnalysis: string;
  componentAnalysis: string;
  temporalAnalysis?: string;
  seasonalAnalysis?: string;
  spectralAnalysis?: string;
}

/** What a caller hands to FindingsStore.put. */
export type NewFindingsRecord = SingleSourceFindings | MultiSourceFindings;

export interface RecordLifecycle {
  isActive: boolean;
  invalidatedAt: Date | null;
  invalidationReason: string | null;
  accessCount: number;
  lastAccessedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type FindingsRecord = NewFindingsRecord & { lifecycle: RecordLifecycle };

export interface RecordFilter {
  toolKey?: string;
  analysisType?: AnalysisType;
  language?: Language;
  validationStatus?: ValidationStatus;
  includeInactive?: boolean;
  limit?: number;
}

export interface StoreStats {
  total: number;
  active: number;
  invalidated: number;
  byStatus: Record<ValidationStatus, number>;
  byType: Record<AnalysisType, number>;
  totalAccesses: number;
}
