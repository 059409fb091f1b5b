import { Router } from 'express';
import { z } from 'zod';
import { sendSuccess, sendPaginated, buildPagination } from '../utils/response.js';
import { parseBody, parseParams, parseQuery } from '../middleware/validator.js';
import { NotFoundError } from '../utils/errors.js';
import type { LeadStore } from '../services/store/LeadStore.js';
import type { PipelineOrchestrator } from '../services/pipeline/PipelineOrchestrator.js';

const pairSchema = z.object({
  category: z.string().trim().min(1),
  location: z.string().trim().min(1),
});

const idParamsSchema = z.object({ id: z.string().min(1) });

const listRunsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

const runLeadsSchema = z.object({
  qualifiedOnly: z.enum(['true', 'false']).optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function createRunRoutes(orchestrator: PipelineOrchestrator, store: LeadStore, defaultLimit: number): Router {
  const router = Router();

  const limitSchema = z.number().int().min(1).max(100).default(defaultLimit);
  const createRunSchema = pairSchema.extend({ limit: limitSchema });
  const batchSchema = z.object({
    pairs: z.array(pairSchema).min(1).optional(),
    categories: z.array(z.string().trim().min(1)).min(1).optional(),
    locations: z.array(z.string().trim().min(1)).min(1).optional(),
    limit: limitSchema,
  });

  // POST /api/runs - Run the pipeline for one category and location
  router.post('/', async (req, res, next) => {
    try {
      const { category, location, limit } = parseBody(createRunSchema, req);
      const summary = await orchestrator.run(category, location, limit);
      sendSuccess(res, summary, 201);
    } catch (error: unknown) {
      next(error);
    }
  });

  // POST /api/runs/batch - Run every pair, or categories x locations
  router.post('/batch', async (req, res, next) => {
    try {
      const request = parseBody(batchSchema, req);
      const summary = await orchestrator.runBatch(request);
      sendSuccess(res, summary, 201);
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/runs - Most recent runs first
  router.get('/', async (req, res, next) => {
    try {
      const { limit } = parseQuery(listRunsSchema, req);
      sendSuccess(res, await store.listRuns(limit));
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/runs/:id
  router.get('/:id', async (req, res, next) => {
    try {
      const { id } = parseParams(idParamsSchema, req);
      const run = await store.getRun(id);
      if (!run) throw new NotFoundError('Search run', id);
      sendSuccess(res, run);
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/runs/:id/leads - Businesses this run observed, by score
  router.get('/:id/leads', async (req, res, next) => {
    try {
      const { id } = parseParams(idParamsSchema, req);
      const query = parseQuery(runLeadsSchema, req);
      const run = await store.getRun(id);
      if (!run) throw new NotFoundError('Search run', id);

      const filters = { runId: id, qualifiedOnly: query.qualifiedOnly === 'true' };
      const [leads, total] = await Promise.all([
        store.listLeads({ ...filters, limit: query.limit, offset: (query.page - 1) * query.limit }),
        store.countLeads(filters),
      ]);

      sendPaginated(res, leads, buildPagination(query.page, query.limit, total));
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
