import type { CombinationKey } from './combination-key.js';
import type { ValidationReport } from './content-validator.js';
import type { FindingsRecord } from './findings-types.js';

// Phases of one resolve call, and the transitions allowed between them.
export type ResolverPhase = 'lookup' | 'hit' | 'miss' | 'generate' | 'validate' | 'store' | 'discard' | 'returned' | 'failed';

const TRANSITIONS: Record<ResolverPhase, readonly ResolverPhase[]> = {
  lookup: ['hit', 'miss', 'failed'],
  hit: ['returned'],
  miss: ['generate', 'returned', 'failed'],
  generate: ['validate', 'failed'],
  validate: ['store', 'discard'],
  store: ['returned', 'failed'],
  discard: ['failed'],
  returned: [],
  failed: [],
};

export function canTransition(from: ResolverPhase, to: ResolverPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Append `to` to a phase trace, refusing transitions the state machine does
 * not allow.
 */
export function advance(trace: ResolverPhase[], to: ResolverPhase): void {
  const from = trace[trace.length - 1];
  if (from !== undefined && !canTransition(from, to)) {
    throw new Error(`Illegal resolver transition ${from} -> ${to}`);
  }
  trace.push(to);
}

export type MissReason = 'absent' | 'invalid' | 'inactive' | 'forced' | 'outdated';

export type LookupDecision =
  | { kind: 'hit'; record: FindingsRecord }
  | { kind: 'miss'; reason: MissReason }
  | { kind: 'collision'; storedCanonical: string };

export interface LookupOptions {
  forceRefresh?: boolean;
  /** Treat records written under an older schema version as misses. */
  currentSchemaVersion?: number;
}

export function decideLookup(
  record: FindingsRecord | undefined,
  key: CombinationKey,
  options: LookupOptions = {},
): LookupDecision {
  if (!record) return { kind: 'miss', reason: 'absent' };
  if (record.canonicalKey !== key.canonical) {
    return { kind: 'collision', storedCanonical: record.canonicalKey };
  }
  if (options.forceRefresh) return { kind: 'miss', reason: 'forced' };
  if (!record.lifecycle.isActive) return { kind: 'miss', reason: 'inactive' };
  if (record.validation.status === 'invalid') return { kind: 'miss', reason: 'invalid' };
  if (options.currentSchemaVersion !== undefined && record.schemaVersion < options.currentSchemaVersion) {
    return { kind: 'miss', reason: 'outdated' };
  }
  return { kind: 'hit', record };
}

export type ValidationDecision =
  | { kind: 'store'; degraded: boolean }
  | { kind: 'discard'; retain: boolean };

export function decideValidation(report: ValidationReport, retainInvalid: boolean): ValidationDecision {
  if (report.status === 'invalid') return { kind: 'discard', retain: retainInvalid };
  return { kind: 'store', degraded: report.status === 'partial' };
}
