/**
 * Precomputation API
 *
 * GET  /api/precomputation/status          job counts by status
 * GET  /api/precomputation/jobs            job listing, queue order
 * POST /api/precomputation/jobs            request regeneration of one combination
 * POST /api/precomputation/jobs/batch      request up to 10 combinations at once
 * GET  /api/precomputation/jobs/:id        status of one job
 * POST /api/precomputation/requeue-failed  move permanently failed jobs back to pending
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { jobStatuses } from '../../shared/schema.js';
import { RecordNotFoundError, errorMessage, isFindingsError } from '../errors.js';
import { canonicalize } from '../findings/combination-key.js';
import { decideLookup } from '../findings/resolver-state.js';
import type { Services } from '../services.js';
import { languageFilter, sendError, sendInvalidRequest, splitList, toolKeyFilter } from './respond.js';

export type PrecomputationRouteServices = Pick<Services, 'catalog' | 'pipeline' | 'config' | 'store'>;

const MAX_BATCH = 10;

const scopeSchema = z.object({
  tool: z.string().min(1).optional(),
  language: z.string().min(1).optional(),
});

const jobsQuerySchema = scopeSchema.extend({
  status: z.enum(jobStatuses).optional(),
  minPriority: z.coerce.number().int().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

const urgencySchema = z.coerce.number().int().min(1).max(10);

const combinationSchema = z.object({
  tool: z.string().min(1),
  sources: z.union([z.array(z.string()), z.string().transform(splitList)]),
  language: z.string().default('es'),
  priority: urgencySchema.optional(),
});

const requestBodySchema = combinationSchema.extend({ priority: urgencySchema.default(5) });

const batchBodySchema = z.object({
  combinations: z.array(combinationSchema).min(1).max(MAX_BATCH),
  priority: urgencySchema.default(5),
});

const jobIdSchema = z.object({ id: z.coerce.number().int().positive() });

type CombinationRequest = z.infer<typeof combinationSchema>;

export function createPrecomputationRouter(services: PrecomputationRouteServices): Router {
  const { catalog, pipeline, config, store } = services;
  const schemaVersion = config.findings.schemaVersion;
  const router = Router();

  // A usable record at the current schema version needs no job.
  async function requestOne(combination: CombinationRequest, urgency: number) {
    const key = canonicalize(combination.tool, combination.sources, combination.language, catalog);
    const stored = decideLookup(await store.get(key.hash), key, { currentSchemaVersion: schemaVersion });
    if (stored.kind === 'hit') {
      return { existing: true as const, combinationHash: key.hash, canonicalKey: key.canonical };
    }
    const { job, outcome } = await pipeline.request(key, combination.priority ?? urgency);
    return { existing: false as const, combinationHash: key.hash, canonicalKey: key.canonical, outcome, job };
  }

  router.get('/status', async (req: Request, res: Response) => {
    const query = scopeSchema.safeParse(req.query);
    if (!query.success) return sendInvalidRequest(res, query.error);

    try {
      const counts = await pipeline.status({
        toolKey: toolKeyFilter(catalog, query.data.tool),
        language: languageFilter(catalog, query.data.language),
      });
      res.json({ success: true, schemaVersion, counts });
    } catch (error) {
      sendError(res, error, 'Precomputation status');
    }
  });

  router.get('/jobs', async (req: Request, res: Response) => {
    const query = jobsQuerySchema.safeParse(req.query);
    if (!query.success) return sendInvalidRequest(res, query.error);

    try {
      const jobs = await pipeline.listJobs({
        toolKey: toolKeyFilter(catalog, query.data.tool),
        language: languageFilter(catalog, query.data.language),
        schemaVersion,
        status: query.data.status,
        minPriority: query.data.minPriority,
        limit: query.data.limit,
      });
      res.json({ success: true, count: jobs.length, jobs });
    } catch (error) {
      sendError(res, error, 'List jobs');
    }
  });

  router.post('/jobs', async (req: Request, res: Response) => {
    const body = requestBodySchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalidRequest(res, body.error);

    try {
      const result = await requestOne(body.data, body.data.priority);
      res.status(result.existing ? 200 : 202).json({ success: true, ...result });
    } catch (error) {
      sendError(res, error, 'Request regeneration');
    }
  });

  router.post('/jobs/batch', async (req: Request, res: Response) => {
    const body = batchBodySchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalidRequest(res, body.error);

    const results = [];
    for (const [index, combination] of body.data.combinations.entries()) {
      try {
        results.push({ index, success: true, ...(await requestOne(combination, body.data.priority)) });
      } catch (error) {
        if (!isFindingsError(error)) return sendError(res, error, 'Request batch regeneration');
        results.push({ index, success: false, error: errorMessage(error), code: error.code });
      }
    }
    const jobIds = results.flatMap((result) => ('job' in result && result.job ? [result.job.id] : []));
    res.status(202).json({
      success: true,
      total: results.length,
      queued: jobIds.length,
      failed: results.filter((result) => !result.success).length,
      jobIds,
      results,
    });
  });

  router.get('/jobs/:id', async (req: Request, res: Response) => {
    const params = jobIdSchema.safeParse(req.params);
    if (!params.success) return sendInvalidRequest(res, params.error);

    try {
      const job = await pipeline.getJob(params.data.id);
      if (!job) throw new RecordNotFoundError(`job:${params.data.id}`);
      res.json({ success: true, job });
    } catch (error) {
      sendError(res, error, 'Job status');
    }
  });

  router.post('/requeue-failed', async (req: Request, res: Response) => {
    const body = scopeSchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalidRequest(res, body.error);

    try {
      const requeued = await pipeline.requeueFailed({
        toolKey: toolKeyFilter(catalog, body.data.tool),
        language: languageFilter(catalog, body.data.language),
        schemaVersion,
      });
      res.json({ success: true, requeued });
    } catch (error) {
      sendError(res, error, 'Requeue failed jobs');
    }
  });

  return router;
}
