import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SqliteLeadStore } from '../../src/services/store/SqliteLeadStore.js';
import type { SearchRun } from '../../src/types/run.types.js';
import { StoreError } from '../../src/utils/errors.js';
import { createMemoryStore, scoredBusiness } from '../helpers/fakes.js';

const FINISHED_AT = new Date('2026-03-01T12:00:00.000Z');

describe('SqliteLeadStore', () => {
  let store: SqliteLeadStore;
  let run: SearchRun;

  beforeEach(async () => {
    store = createMemoryStore(() => FINISHED_AT);
    run = await store.recordSearchRun({
      category: 'barber',
      location: 'Manchester UK',
      requestedLimit: 20,
      executedAt: new Date('2026-03-01T10:00:00.000Z'),
    });
  });

  afterEach(() => {
    store.close();
  });

  describe('search runs', () => {
    it('records a run in progress with zero tallies', async () => {
      expect(run.status).toBe('in_progress');
      const loaded = await store.getRun(run.id);
      expect(loaded).toEqual({
        id: run.id,
        category: 'barber',
        location: 'Manchester UK',
        requestedLimit: 20,
        executedAt: new Date('2026-03-01T10:00:00.000Z'),
        status: 'in_progress',
        resultCount: 0,
        qualifiedCount: 0,
        droppedCount: 0,
        failedCount: 0,
        completedAt: null,
        errorMessage: null,
      });
    });

    it('updates tallies and stamps completion', async () => {
      await store.updateRunCounts(
        run.id,
        { resultCount: 4, qualifiedCount: 2, droppedCount: 1, failedCount: 1 },
        'partial',
        '1 record(s) could not be processed',
      );
      const loaded = await store.getRun(run.id);
      expect(loaded).toMatchObject({
        status: 'partial',
        resultCount: 4,
        qualifiedCount: 2,
        droppedCount: 1,
        failedCount: 1,
        completedAt: FINISHED_AT,
        errorMessage: '1 record(s) could not be processed',
      });
    });

    it('rejects updates to an unknown run', async () => {
      await expect(
        store.updateRunCounts('missing', { resultCount: 0, qualifiedCount: 0, droppedCount: 0, failedCount: 0 }, 'completed'),
      ).rejects.toBeInstanceOf(StoreError);
    });

    it('lists the newest runs first', async () => {
      const later = await store.recordSearchRun({
        category: 'plumbing',
        location: 'Leeds UK',
        requestedLimit: 5,
        executedAt: new Date('2026-03-02T10:00:00.000Z'),
      });
      const runs = await store.listRuns(10);
      expect(runs.map((r) => r.id)).toEqual([later.id, run.id]);
      expect(await store.listRuns(1)).toHaveLength(1);
    });
  });

  describe('upsert', () => {
    it('inserts a new business and one history entry', async () => {
      const result = await store.upsert(scoredBusiness({ searchRunId: run.id }));
      expect(result.isNew).toBe(true);

      const business = await store.getById(result.businessId);
      expect(business).toMatchObject({
        identityKey: 'place:test-place-100',
        name: 'Test Barber',
        rating: 4.5,
        reviewCount: 50,
        webPresence: 'none',
        leadScore: 80,
        qualifies: true,
        rawPayload: { title: 'Test Barber' },
        searchRunId: run.id,
      });
      expect(business?.firstSeenAt).toEqual(new Date('2026-03-01T10:00:00.000Z'));

      const history = await store.getScoreHistory(result.businessId);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({ leadScore: 80, qualifies: true, searchRunId: run.id });
    });

    it('merges a repeat observation into the same row', async () => {
      const first = await store.upsert(scoredBusiness({ searchRunId: run.id }));
      const second = await store.upsert(
        scoredBusiness({
          searchRunId: run.id,
          name: 'Test Barber Renamed',
          phone: null,
          rating: null,
          reviewCount: 75,
          webPresence: 'has_website',
          website: 'https://testbarber.example.com',
          leadScore: 20,
          qualifies: false,
          observedAt: new Date('2026-03-05T10:00:00.000Z'),
        }),
      );

      expect(second).toEqual({ businessId: first.businessId, isNew: false });
      expect(await store.countBusinesses()).toBe(1);

      const merged = await store.getById(first.businessId);
      expect(merged).toMatchObject({
        name: 'Test Barber',
        phone: '01615550100',
        rating: null,
        reviewCount: 75,
        webPresence: 'has_website',
        website: 'https://testbarber.example.com',
        leadScore: 20,
        qualifies: false,
      });
      expect(merged?.firstSeenAt).toEqual(new Date('2026-03-01T10:00:00.000Z'));
      expect(merged?.lastSeenAt).toEqual(new Date('2026-03-05T10:00:00.000Z'));

      const history = await store.getScoreHistory(first.businessId);
      expect(history.map((h) => h.leadScore)).toEqual([80, 20]);
    });

    it('wraps constraint failures in StoreError', async () => {
      await expect(store.upsert(scoredBusiness({ searchRunId: 'no-such-run' }))).rejects.toBeInstanceOf(StoreError);
      expect(await store.countBusinesses()).toBe(0);
    });

    it('rejects a score outside 0..100', async () => {
      await expect(store.upsert(scoredBusiness({ searchRunId: run.id, leadScore: 120 }))).rejects.toBeInstanceOf(
        StoreError,
      );
    });
  });

  describe('lookups', () => {
    it('finds by identity and by normalized name and address', async () => {
      const { businessId } = await store.upsert(
        scoredBusiness({ searchRunId: run.id, identityKey: 'hash:abc', placeId: null }),
      );
      expect((await store.getByIdentity('hash:abc'))?.id).toBe(businessId);
      expect((await store.findByNameAndAddress('test barber', '1 test street manchester'))?.id).toBe(businessId);
      expect(await store.findByNameAndAddress('test barber', '2 test street manchester')).toBeNull();
      expect(await store.getById('missing')).toBeNull();
    });

    it('finds by place id on a row keyed by its fallback hash', async () => {
      const { businessId } = await store.upsert(
        scoredBusiness({ searchRunId: run.id, identityKey: 'hash:abc', placeId: 'test-place-300' }),
      );
      expect((await store.getByPlaceId('test-place-300'))?.id).toBe(businessId);
      expect(await store.getByPlaceId('test-place-999')).toBeNull();
    });
  });

  describe('listLeads', () => {
    beforeEach(async () => {
      await store.upsert(scoredBusiness({ searchRunId: run.id, identityKey: 'place:a', name: 'A', leadScore: 90 }));
      await store.upsert(
        scoredBusiness({
          searchRunId: run.id,
          identityKey: 'place:b',
          name: 'B',
          leadScore: 40,
          qualifies: false,
          webPresence: 'has_website',
        }),
      );
      await store.upsert(
        scoredBusiness({
          searchRunId: run.id,
          identityKey: 'place:c',
          name: 'C',
          leadScore: 70,
          webPresence: 'social_only',
          location: 'Leeds UK',
        }),
      );
    });

    it('orders by score, highest first', async () => {
      const leads = await store.listLeads();
      expect(leads.map((l) => l.name)).toEqual(['A', 'C', 'B']);
    });

    it('filters qualified leads and minimum score', async () => {
      expect((await store.listLeads({ qualifiedOnly: true })).map((l) => l.name)).toEqual(['A', 'C']);
      expect((await store.listLeads({ minScore: 70 })).map((l) => l.name)).toEqual(['A', 'C']);
    });

    it('filters by location case-insensitively and by web presence', async () => {
      expect((await store.listLeads({ location: 'leeds uk' })).map((l) => l.name)).toEqual(['C']);
      expect((await store.listLeads({ webPresence: 'has_website' })).map((l) => l.name)).toEqual(['B']);
    });

    it('paginates and counts', async () => {
      expect((await store.listLeads({ limit: 1, offset: 1 })).map((l) => l.name)).toEqual(['C']);
      expect(await store.countLeads({ qualifiedOnly: true })).toBe(2);
    });

    it('filters by the run that observed the business', async () => {
      const other = await store.recordSearchRun({
        category: 'barber',
        location: 'Leeds UK',
        requestedLimit: 5,
        executedAt: new Date('2026-03-02T10:00:00.000Z'),
      });
      await store.upsert(scoredBusiness({ searchRunId: other.id, identityKey: 'place:a', name: 'A', leadScore: 90 }));

      expect((await store.listLeads({ runId: other.id })).map((l) => l.name)).toEqual(['A']);
      expect(await store.countLeads({ runId: run.id })).toBe(3);
    });

    it('reports statistics', async () => {
      expect(await store.getStatistics()).toEqual({
        totalBusinesses: 3,
        qualifiedLeads: 2,
        byWebPresence: { none: 1, social_only: 1, has_website: 1 },
        totalRuns: 1,
        averageScore: 66.7,
      });
    });
  });

  it('reports empty statistics', async () => {
    expect(await store.getStatistics()).toEqual({
      totalBusinesses: 0,
      qualifiedLeads: 0,
      byWebPresence: { none: 0, social_only: 0, has_website: 0 },
      totalRuns: 1,
      averageScore: null,
    });
  });
});
