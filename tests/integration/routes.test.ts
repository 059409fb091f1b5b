import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../src/app.js';
import { PipelineOrchestrator } from '../../src/services/pipeline/PipelineOrchestrator.js';
import type { SqliteLeadStore } from '../../src/services/store/SqliteLeadStore.js';
import { SourceError } from '../../src/utils/errors.js';
import { FakeSource, createMemoryStore, noSleep } from '../helpers/fakes.js';
import { loadLocalResults } from '../helpers/fixtures.js';

describe('HTTP API', () => {
  let store: SqliteLeadStore;
  let source: FakeSource;
  let app: Express;

  beforeEach(() => {
    store = createMemoryStore();
    source = new FakeSource(async ({ location, limit }) => {
      if (location === 'Nowhere') throw new SourceError('Invalid API key.', false);
      return loadLocalResults().slice(0, limit);
    });
    const orchestrator = new PipelineOrchestrator({ source, store }, { retry: { sleep: noSleep } });
    app = createApp({ orchestrator, store, defaultLimit: 20, rateLimit: { maxRequests: 1000 } });
  });

  afterEach(() => {
    store.close();
  });

  async function runFixture(): Promise<string> {
    const res = await request(app).post('/api/runs').send({ category: 'barber', location: 'Manchester UK' });
    expect(res.status).toBe(201);
    return String(res.body.data.runId);
  }

  it('GET /health', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', service: 'lead-pipeline' });
  });

  describe('runs', () => {
    it('POST /api/runs runs one pair with the default limit', async () => {
      const res = await request(app).post('/api/runs').send({ category: 'barber', location: 'Manchester UK' });

      expect(res.status).toBe(201);
      expect(res.body.success).toBe(true);
      expect(res.body.data).toMatchObject({
        status: 'completed',
        fetched: 6,
        resultCount: 5,
        qualifiedCount: 3,
        droppedCount: 1,
      });
      expect(source.calls).toEqual([{ category: 'barber', location: 'Manchester UK', limit: 20 }]);
    });

    it('POST /api/runs validates the body', async () => {
      const res = await request(app).post('/api/runs').send({ category: '', location: 'Leeds UK', limit: 500 });

      expect(res.status).toBe(400);
      expect(res.body.success).toBe(false);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.message).toContain('category');
      expect(source.calls).toHaveLength(0);
    });

    it('POST /api/runs returns a failed summary when the source fails', async () => {
      const res = await request(app).post('/api/runs').send({ category: 'barber', location: 'Nowhere', limit: 5 });

      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({ status: 'failed', error: 'Invalid API key.' });
    });

    it('POST /api/runs/batch runs every pair', async () => {
      const res = await request(app)
        .post('/api/runs/batch')
        .send({ categories: ['barber'], locations: ['Manchester UK', 'Nowhere'], limit: 3 });

      expect(res.status).toBe(201);
      expect(res.body.data.pairsProcessed).toBe(2);
      expect(res.body.data.failedPairs).toHaveLength(1);
      expect(res.body.data.failedPairs[0]).toMatchObject({ category: 'barber', location: 'Nowhere' });
      expect(res.body.data.totals.fetched).toBe(3);
    });

    it('GET /api/runs and GET /api/runs/:id', async () => {
      const runId = await runFixture();

      const list = await request(app).get('/api/runs');
      expect(list.status).toBe(200);
      expect(list.body.data).toHaveLength(1);
      expect(list.body.data[0].id).toBe(runId);

      const one = await request(app).get(`/api/runs/${runId}`);
      expect(one.status).toBe(200);
      expect(one.body.data).toMatchObject({ id: runId, status: 'completed', resultCount: 5 });
    });

    it('GET /api/runs/:id returns 404 for an unknown run', async () => {
      const res = await request(app).get('/api/runs/missing');
      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({ message: "Search run with id 'missing' not found", code: 'NOT_FOUND' });
    });

    it('GET /api/runs/:id/leads lists the run leads by score', async () => {
      const runId = await runFixture();

      const res = await request(app).get(`/api/runs/${runId}/leads`).query({ qualifiedOnly: 'true', limit: 2 });

      expect(res.status).toBe(200);
      expect(res.body.data.map((lead: { name: string }) => lead.name)).toEqual(['Northside Barbers', 'Fade Factory']);
      expect(res.body.pagination).toEqual({ page: 1, limit: 2, total: 3, totalPages: 2 });
    });
  });

  describe('leads', () => {
    it('GET /api/leads filters and paginates', async () => {
      await runFixture();

      const res = await request(app).get('/api/leads').query({ webPresence: 'none', page: 1, limit: 10 });

      expect(res.status).toBe(200);
      expect(res.body.data.map((lead: { name: string }) => lead.name)).toEqual([
        'Northside Barbers',
        'Corner Cuts',
        'Sharp Edge',
      ]);
      expect(res.body.pagination.total).toBe(3);
    });

    it('GET /api/leads rejects an unknown web presence value', async () => {
      const res = await request(app).get('/api/leads').query({ webPresence: 'maybe' });
      expect(res.status).toBe(400);
    });

    it('GET /api/leads/stats', async () => {
      await runFixture();

      const res = await request(app).get('/api/leads/stats');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({
        totalBusinesses: 5,
        qualifiedLeads: 3,
        byWebPresence: { none: 3, social_only: 1, has_website: 1 },
        totalRuns: 1,
        averageScore: 68,
      });
    });

    it('GET /api/leads/:id and its history', async () => {
      await runFixture();
      const [top] = await store.listLeads({ limit: 1 });

      const one = await request(app).get(`/api/leads/${top.id}`);
      expect(one.status).toBe(200);
      expect(one.body.data).toMatchObject({ name: 'Northside Barbers', leadScore: 100, qualifies: true });

      const history = await request(app).get(`/api/leads/${top.id}/history`);
      expect(history.status).toBe(200);
      expect(history.body.data).toHaveLength(1);
      expect(history.body.data[0]).toMatchObject({ leadScore: 100, webPresence: 'none' });
    });

    it('GET /api/leads/:id returns 404 for an unknown business', async () => {
      const res = await request(app).get('/api/leads/missing/history');
      expect(res.status).toBe(404);
    });
  });

  it('answers unknown routes with the error envelope', async () => {
    const res = await request(app).get('/api/nothing');
    expect(res.status).toBe(404);
    expect(res.body.success).toBe(false);
  });

  it('rate limits API calls', async () => {
    const limited = createApp({
      orchestrator: new PipelineOrchestrator({ source, store }),
      store,
      defaultLimit: 20,
      rateLimit: { maxRequests: 1 },
    });

    expect((await request(limited).get('/api/runs')).status).toBe(200);
    const res = await request(limited).get('/api/runs');
    expect(res.status).toBe(429);
    expect(res.headers['retry-after']).toBe('60');
  });
});
