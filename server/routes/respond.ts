import type { Response } from 'express';
import type { z } from 'zod';
import type { Catalog, Language } from '../config/catalog.js';
import { InvalidCombinationError, errorMessage, httpStatusFor, isFindingsError } from '../errors.js';

/** Error body shared by every API route: `{ success: false, error, code }`. */
export function sendError(res: Response, error: unknown, context: string): void {
  const status = httpStatusFor(error);
  const code = isFindingsError(error) ? error.code : 'INTERNAL_ERROR';
  if (status >= 500) {
    console.error(`❌ [API] ${context} failed:`, errorMessage(error));
  }
  res.status(status).json({ success: false, error: errorMessage(error), code });
}

export function sendInvalidRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({
    success: false,
    error: error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; '),
    code: 'INVALID_REQUEST',
  });
}

/** Resolve an optional tool label (key or localized name) to its catalog key. */
export function toolKeyFilter(catalog: Catalog, tool: string | undefined): string | undefined {
  if (tool === undefined) return undefined;
  const entry = catalog.resolveTool(tool);
  if (!entry) throw new InvalidCombinationError(`Unknown tool "${tool}"`, { tool });
  return entry.key;
}

export function languageFilter(catalog: Catalog, language: string | undefined): Language | undefined {
  if (language === undefined) return undefined;
  const resolved = catalog.resolveLanguage(language);
  if (!resolved) throw new InvalidCombinationError(`Unsupported language "${language}"`, { language });
  return resolved;
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}
