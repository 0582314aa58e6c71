/**
 * Error taxonomy for the findings cache and precomputation pipeline.
 * Every error carries a machine-readable code so routes, the CLI and the
 * pipeline can branch on it without string matching.
 */

import type { ValidationReport } from './findings/content-validator.js';

export enum FindingsErrorCode {
  INVALID_COMBINATION = 'INVALID_COMBINATION',
  STALE_WRITE = 'STALE_WRITE',
  SCHEMA_VIOLATION = 'SCHEMA_VIOLATION',
  GENERATOR_ERROR = 'GENERATOR_ERROR',
  VALIDATION_FAILURE = 'VALIDATION_FAILURE',
  COMBINATION_COLLISION = 'COMBINATION_COLLISION',
  RECORD_NOT_FOUND = 'RECORD_NOT_FOUND',
  STORE_CLOSED = 'STORE_CLOSED',
  CONFIG_ERROR = 'CONFIG_ERROR',
  DATASET_UNAVAILABLE = 'DATASET_UNAVAILABLE',
}

export class FindingsError extends Error {
  constructor(
    readonly code: FindingsErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCombinationError extends FindingsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(FindingsErrorCode.INVALID_COMBINATION, message, details);
  }
}

export class StaleWriteError extends FindingsError {
  constructor(hash: string, incomingVersion: number, storedVersion: number) {
    super(
      FindingsErrorCode.STALE_WRITE,
      `Rejected write for ${hash.slice(0, 12)}: schema version ${incomingVersion} does not supersede stored version ${storedVersion}`,
      { hash, incomingVersion, storedVersion },
    );
  }
}

export class SchemaViolationError extends FindingsError {
  constructor(hash: string, readonly violations: string[]) {
    super(
      FindingsErrorCode.SCHEMA_VIOLATION,
      `Record ${hash.slice(0, 12)} violates the findings schema: ${violations.join('; ')}`,
      { hash, violations },
    );
  }
}

export type GeneratorErrorKind = 'timeout' | 'malformed_output' | 'rate_limited' | 'provider_error' | 'cancelled';

export class GeneratorError extends FindingsError {
  readonly retryable: boolean;

  constructor(
    readonly kind: GeneratorErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(FindingsErrorCode.GENERATOR_ERROR, message, { kind, ...details });
    this.retryable = kind !== 'cancelled';
  }
}

export class ValidationFailureError extends FindingsError {
  constructor(hash: string, readonly report: ValidationReport) {
    super(
      FindingsErrorCode.VALIDATION_FAILURE,
      `Generated content for ${hash.slice(0, 12)} is ${report.status}: ${report.issues.map((i) => i.code).join(', ')}`,
      { hash, status: report.status, issues: report.issues },
    );
  }
}

export class CombinationCollisionError extends FindingsError {
  constructor(hash: string, expected: string, stored: string) {
    super(
      FindingsErrorCode.COMBINATION_COLLISION,
      `Hash ${hash.slice(0, 12)} is stored for a different combination`,
      { hash, expected, stored },
    );
  }
}

export class RecordNotFoundError extends FindingsError {
  constructor(hash: string) {
    super(FindingsErrorCode.RECORD_NOT_FOUND, `No findings stored for ${hash.slice(0, 12)}`, { hash });
  }
}

export class StoreClosedError extends FindingsError {
  constructor(store: string) {
    super(FindingsErrorCode.STORE_CLOSED, `${store} is closed`);
  }
}

export class ConfigError extends FindingsError {
  constructor(readonly issues: string[]) {
    super(FindingsErrorCode.CONFIG_ERROR, `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
}

export class DatasetUnavailableError extends FindingsError {
  constructor(toolKey: string, file: string, reason: string) {
    super(FindingsErrorCode.DATASET_UNAVAILABLE, `Dataset for ${toolKey} could not be loaded from ${file}: ${reason}`, {
      toolKey,
      file,
    });
  }
}

export function isFindingsError(error: unknown): error is FindingsError {
  return error instanceof FindingsError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status for an error surfaced by the API layer.
 */
export function httpStatusFor(error: unknown): number {
  if (!(error instanceof FindingsError)) return 500;
  switch (error.code) {
    case FindingsErrorCode.INVALID_COMBINATION:
      return 400;
    case FindingsErrorCode.RECORD_NOT_FOUND:
      return 404;
    case FindingsErrorCode.GENERATOR_ERROR:
      if (error instanceof GeneratorError) {
        if (error.kind === 'timeout') return 504;
        if (error.kind === 'rate_limited') return 429;
      }
      return 502;
    case FindingsErrorCode.VALIDATION_FAILURE:
      return 422;
    case FindingsErrorCode.DATASET_UNAVAILABLE:
      return 503;
    case FindingsErrorCode.COMBINATION_COLLISION:
    case FindingsErrorCode.STALE_WRITE:
    case FindingsErrorCode.SCHEMA_VIOLATION:
      return 409;
    default:
      return 500;
  }
}
