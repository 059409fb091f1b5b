import { Router } from 'express';
import { z } from 'zod';
import { sendSuccess, sendPaginated, buildPagination } from '../utils/response.js';
import { parseParams, parseQuery } from '../middleware/validator.js';
import { NotFoundError } from '../utils/errors.js';
import { WEB_PRESENCE_VALUES, type LeadFilters } from '../types/business.types.js';
import type { LeadStore } from '../services/store/LeadStore.js';

const listLeadsSchema = z.object({
  qualifiedOnly: z.enum(['true', 'false']).optional(),
  minScore: z.coerce.number().int().min(0).max(100).optional(),
  category: z.string().min(1).optional(),
  location: z.string().min(1).optional(),
  webPresence: z.enum(WEB_PRESENCE_VALUES).optional(),
  runId: z.string().min(1).optional(),
  sort: z.enum(['score', 'recent']).default('score'),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const idParamsSchema = z.object({ id: z.string().min(1) });

export function createLeadRoutes(store: LeadStore): Router {
  const router = Router();

  // GET /api/leads - Filtered, paginated, highest score first
  router.get('/', async (req, res, next) => {
    try {
      const query = parseQuery(listLeadsSchema, req);
      const filters: LeadFilters = {
        qualifiedOnly: query.qualifiedOnly === 'true',
        minScore: query.minScore,
        category: query.category,
        location: query.location,
        webPresence: query.webPresence,
        runId: query.runId,
      };

      const [leads, total] = await Promise.all([
        store.listLeads(
          { ...filters, limit: query.limit, offset: (query.page - 1) * query.limit },
          query.sort === 'score',
        ),
        store.countLeads(filters),
      ]);

      sendPaginated(res, leads, buildPagination(query.page, query.limit, total));
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/leads/stats
  router.get('/stats', async (_req, res, next) => {
    try {
      sendSuccess(res, await store.getStatistics());
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/leads/:id
  router.get('/:id', async (req, res, next) => {
    try {
      const { id } = parseParams(idParamsSchema, req);
      const business = await store.getById(id);
      if (!business) throw new NotFoundError('Business', id);
      sendSuccess(res, business);
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/leads/:id/history - Score per observation, oldest first
  router.get('/:id/history', async (req, res, next) => {
    try {
      const { id } = parseParams(idParamsSchema, req);
      const business = await store.getById(id);
      if (!business) throw new NotFoundError('Business', id);
      sendSuccess(res, await store.getScoreHistory(id));
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
