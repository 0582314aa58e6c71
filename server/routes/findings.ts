/**
 * Findings API
 *
 * GET  /api/findings             resolve a combination (cache hit or generation)
 * POST /api/findings/invalidate  soft-invalidate the stored record
 * GET  /api/findings/stats       store statistics and live hit/miss counters
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { analysisTypes } from '../../shared/schema.js';
import { RecordNotFoundError } from '../errors.js';
import { canonicalize } from '../findings/combination-key.js';
import type { Services } from '../services.js';
import { languageFilter, sendError, sendInvalidRequest, splitList, toolKeyFilter } from './respond.js';

export type FindingsRouteServices = Pick<Services, 'catalog' | 'resolver' | 'store' | 'usage'>;

const flag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const resolveQuerySchema = z.object({
  tool: z.string().min(1),
  sources: z.string().default(''),
  language: z.string().default('es'),
  refresh: flag,
});

const invalidateBodySchema = z.object({
  tool: z.string().min(1),
  sources: z.union([z.array(z.string()), z.string().transform(splitList)]),
  language: z.string().default('es'),
  reason: z.string().min(1).default('manual'),
});

const statsQuerySchema = z.object({
  tool: z.string().min(1).optional(),
  type: z.enum(analysisTypes).optional(),
  language: z.string().min(1).optional(),
});

export function createFindingsRouter(services: FindingsRouteServices): Router {
  const { catalog, resolver, store, usage } = services;
  const router = Router();

  router.get('/', async (req: Request, res: Response) => {
    const query = resolveQuerySchema.safeParse(req.query);
    if (!query.success) return sendInvalidRequest(res, query.error);

    try {
      const key = canonicalize(query.data.tool, splitList(query.data.sources), query.data.language, catalog);
      const result = await resolver.resolve(key, { forceRefresh: query.data.refresh });
      res.json({
        success: true,
        outcome: result.outcome,
        degraded: result.degraded,
        record: result.record,
        latencyMs: result.latencyMs,
      });
    } catch (error) {
      sendError(res, error, 'Resolve findings');
    }
  });

  router.post('/invalidate', async (req: Request, res: Response) => {
    const body = invalidateBodySchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalidRequest(res, body.error);

    try {
      const key = canonicalize(body.data.tool, body.data.sources, body.data.language, catalog);
      const invalidated = await store.invalidate(key.hash, body.data.reason);
      if (!invalidated) throw new RecordNotFoundError(key.hash);
      console.log(`🗑️ [API] Invalidated ${key.canonical} (${body.data.reason})`);
      res.json({ success: true, combinationHash: key.hash, reason: body.data.reason });
    } catch (error) {
      sendError(res, error, 'Invalidate findings');
    }
  });

  router.get('/stats', async (req: Request, res: Response) => {
    const query = statsQuerySchema.safeParse(req.query);
    if (!query.success) return sendInvalidRequest(res, query.error);

    try {
      const filter = {
        toolKey: toolKeyFilter(catalog, query.data.tool),
        analysisType: query.data.type,
        language: languageFilter(catalog, query.data.language),
      };
      const [stats, countValid] = await Promise.all([store.stats(filter), store.countValid(filter)]);
      res.json({
        success: true,
        stats,
        countValid,
        usage: usage.counters(),
        inFlight: resolver.inFlightCount,
      });
    } catch (error) {
      sendError(res, error, 'Findings stats');
    }
  });

  return router;
}
