import type Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import {
  WEB_PRESENCE_VALUES,
  type Business,
  type LeadFilters,
  type LeadStatistics,
  type ScoreHistoryEntry,
  type ScoredBusiness,
  type WebPresence,
} from '../../types/business.types.js';
import {
  RUN_STATUSES,
  type NewSearchRun,
  type RunCounts,
  type RunStatus,
  type SearchRun,
} from '../../types/run.types.js';
import type { LeadStore, UpsertResult } from './LeadStore.js';
import { StoreError, toErrorMessage } from '../../utils/errors.js';
import { logger } from '../../config/logger.js';

interface BusinessRow {
  id: string;
  identity_key: string;
  place_id: string | null;
  name: string;
  normalized_name: string;
  address: string | null;
  normalized_address: string | null;
  phone: string | null;
  category: string;
  location: string;
  rating: number | null;
  review_count: number | null;
  web_presence: string;
  website: string | null;
  maps_url: string | null;
  latitude: number | null;
  longitude: number | null;
  primary_type: string | null;
  raw_payload: string;
  lead_score: number;
  qualifies: number;
  first_seen_at: string;
  last_seen_at: string;
  search_run_id: string;
}

interface RunRow {
  id: string;
  category: string;
  location: string;
  requested_limit: number;
  executed_at: string;
  status: string;
  result_count: number;
  qualified_count: number;
  dropped_count: number;
  failed_count: number;
  completed_at: string | null;
  error_message: string | null;
}

interface HistoryRow {
  id: number;
  business_id: string;
  search_run_id: string | null;
  lead_score: number;
  qualifies: number;
  rating: number | null;
  review_count: number | null;
  web_presence: string;
  recorded_at: string;
}

type BusinessParams = Omit<BusinessRow, 'first_seen_at' | 'last_seen_at'> & { seen_at: string };

type FilterParams = Record<string, string | number>;

const UPSERT_BUSINESS = `
  INSERT INTO businesses (
    id, identity_key, place_id, name, normalized_name, address, normalized_address, phone,
    category, location, rating, review_count, web_presence, website, maps_url,
    latitude, longitude, primary_type, raw_payload, lead_score, qualifies,
    first_seen_at, last_seen_at, search_run_id
  ) VALUES (
    @id, @identity_key, @place_id, @name, @normalized_name, @address, @normalized_address, @phone,
    @category, @location, @rating, @review_count, @web_presence, @website, @maps_url,
    @latitude, @longitude, @primary_type, @raw_payload, @lead_score, @qualifies,
    @seen_at, @seen_at, @search_run_id
  )
  ON CONFLICT (identity_key) DO UPDATE SET
    place_id = COALESCE(excluded.place_id, businesses.place_id),
    address = COALESCE(excluded.address, businesses.address),
    normalized_address = COALESCE(excluded.normalized_address, businesses.normalized_address),
    phone = COALESCE(excluded.phone, businesses.phone),
    maps_url = COALESCE(excluded.maps_url, businesses.maps_url),
    latitude = COALESCE(excluded.latitude, businesses.latitude),
    longitude = COALESCE(excluded.longitude, businesses.longitude),
    primary_type = COALESCE(excluded.primary_type, businesses.primary_type),
    rating = excluded.rating,
    review_count = excluded.review_count,
    web_presence = excluded.web_presence,
    website = excluded.website,
    raw_payload = excluded.raw_payload,
    lead_score = excluded.lead_score,
    qualifies = excluded.qualifies,
    last_seen_at = excluded.last_seen_at,
    search_run_id = excluded.search_run_id
  RETURNING id
`;

const INSERT_HISTORY = `
  INSERT INTO score_history (
    business_id, search_run_id, lead_score, qualifies, rating, review_count, web_presence, recorded_at
  ) VALUES (
    @business_id, @search_run_id, @lead_score, @qualifies, @rating, @review_count, @web_presence, @recorded_at
  )
`;

function toWebPresence(value: string): WebPresence {
  const match = WEB_PRESENCE_VALUES.find((candidate) => candidate === value);
  if (!match) throw new StoreError(`Unknown web presence value '${value}'`);
  return match;
}

function toRunStatus(value: string): RunStatus {
  const match = RUN_STATUSES.find((candidate) => candidate === value);
  if (!match) throw new StoreError(`Unknown run status '${value}'`);
  return match;
}

function toBusiness(row: BusinessRow): Business {
  const rawPayload: unknown = JSON.parse(row.raw_payload);
  return {
    id: row.id,
    identityKey: row.identity_key,
    placeId: row.place_id,
    name: row.name,
    normalizedName: row.normalized_name,
    address: row.address,
    normalizedAddress: row.normalized_address,
    phone: row.phone,
    category: row.category,
    location: row.location,
    rating: row.rating,
    reviewCount: row.review_count,
    webPresence: toWebPresence(row.web_presence),
    website: row.website,
    mapsUrl: row.maps_url,
    latitude: row.latitude,
    longitude: row.longitude,
    primaryType: row.primary_type,
    rawPayload,
    leadScore: row.lead_score,
    qualifies: row.qualifies === 1,
    firstSeenAt: new Date(row.first_seen_at),
    lastSeenAt: new Date(row.last_seen_at),
    searchRunId: row.search_run_id,
  };
}

function toSearchRun(row: RunRow): SearchRun {
  return {
    id: row.id,
    category: row.category,
    location: row.location,
    requestedLimit: row.requested_limit,
    executedAt: new Date(row.executed_at),
    status: toRunStatus(row.status),
    resultCount: row.result_count,
    qualifiedCount: row.qualified_count,
    droppedCount: row.dropped_count,
    failedCount: row.failed_count,
    completedAt: row.completed_at ? new Date(row.completed_at) : null,
    errorMessage: row.error_message,
  };
}

function toHistoryEntry(row: HistoryRow): ScoreHistoryEntry {
  return {
    id: row.id,
    businessId: row.business_id,
    searchRunId: row.search_run_id,
    leadScore: row.lead_score,
    qualifies: row.qualifies === 1,
    rating: row.rating,
    reviewCount: row.review_count,
    webPresence: toWebPresence(row.web_presence),
    recordedAt: new Date(row.recorded_at),
  };
}

function buildWhere(filters: LeadFilters): { clause: string; params: FilterParams } {
  const conditions: string[] = [];
  const params: FilterParams = {};

  if (filters.qualifiedOnly) {
    conditions.push('b.qualifies = 1');
  }
  if (filters.minScore !== undefined) {
    conditions.push('b.lead_score >= @minScore');
    params.minScore = filters.minScore;
  }
  if (filters.category) {
    conditions.push('b.category = @category COLLATE NOCASE');
    params.category = filters.category;
  }
  if (filters.location) {
    conditions.push('b.location = @location COLLATE NOCASE');
    params.location = filters.location;
  }
  if (filters.webPresence) {
    conditions.push('b.web_presence = @webPresence');
    params.webPresence = filters.webPresence;
  }
  if (filters.runId) {
    conditions.push(
      'EXISTS (SELECT 1 FROM score_history h WHERE h.business_id = b.id AND h.search_run_id = @runId)',
    );
    params.runId = filters.runId;
  }

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

export interface SqliteLeadStoreOptions {
  now?: () => Date;
}

/**
 * LeadStore on better-sqlite3. Calls are synchronous underneath; the async
 * surface matches the LeadStore contract.
 */
export class SqliteLeadStore implements LeadStore {
  private readonly now: () => Date;

  private readonly upsertBusiness: Database.Statement<[BusinessParams], { id: string }>;
  private readonly insertHistory: Database.Statement<
    [Omit<HistoryRow, 'id'>]
  >;
  private readonly upsertWithHistory: (params: BusinessParams, recordedAt: string) => string;

  constructor(
    private readonly db: Database.Database,
    options: SqliteLeadStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.upsertBusiness = db.prepare<BusinessParams, { id: string }>(UPSERT_BUSINESS);
    this.insertHistory = db.prepare<Omit<HistoryRow, 'id'>>(INSERT_HISTORY);

    this.upsertWithHistory = db.transaction((params: BusinessParams, recordedAt: string): string => {
      const row = this.upsertBusiness.get(params);
      if (!row) {
        throw new StoreError(`Upsert of ${params.identity_key} returned no row`);
      }
      this.insertHistory.run({
        business_id: row.id,
        search_run_id: params.search_run_id,
        lead_score: params.lead_score,
        qualifies: params.qualifies,
        rating: params.rating,
        review_count: params.review_count,
        web_presence: params.web_presence,
        recorded_at: recordedAt,
      });
      return row.id;
    });
  }

  async upsert(business: ScoredBusiness): Promise<UpsertResult> {
    return this.guard('upsert business', () => {
      const id = randomUUID();
      const seenAt = business.observedAt.toISOString();
      const businessId = this.upsertWithHistory(
        {
          id,
          identity_key: business.identityKey,
          place_id: business.placeId,
          name: business.name,
          normalized_name: business.normalizedName,
          address: business.address,
          normalized_address: business.normalizedAddress,
          phone: business.phone,
          category: business.category,
          location: business.location,
          rating: business.rating,
          review_count: business.reviewCount,
          web_presence: business.webPresence,
          website: business.website,
          maps_url: business.mapsUrl,
          latitude: business.latitude,
          longitude: business.longitude,
          primary_type: business.primaryType,
          raw_payload: JSON.stringify(business.rawPayload ?? null),
          lead_score: business.leadScore,
          qualifies: business.qualifies ? 1 : 0,
          seen_at: seenAt,
          search_run_id: business.searchRunId,
        },
        seenAt,
      );
      return { businessId, isNew: businessId === id };
    });
  }

  async getByIdentity(identityKey: string): Promise<Business | null> {
    return this.guard('load business by identity', () => {
      const row = this.db
        .prepare<[string], BusinessRow>('SELECT * FROM businesses WHERE identity_key = ?')
        .get(identityKey);
      return row ? toBusiness(row) : null;
    });
  }

  async getByPlaceId(placeId: string): Promise<Business | null> {
    return this.guard('load business by place id', () => {
      const row = this.db
        .prepare<[string], BusinessRow>(
          'SELECT * FROM businesses WHERE place_id = ? ORDER BY first_seen_at ASC LIMIT 1',
        )
        .get(placeId);
      return row ? toBusiness(row) : null;
    });
  }

  async findByNameAndAddress(normalizedName: string, normalizedAddress: string): Promise<Business | null> {
    return this.guard('match business by name and address', () => {
      const row = this.db
        .prepare<[string, string], BusinessRow>(
          `SELECT * FROM businesses
           WHERE normalized_name = ? AND normalized_address = ?
           ORDER BY first_seen_at ASC
           LIMIT 1`,
        )
        .get(normalizedName, normalizedAddress);
      return row ? toBusiness(row) : null;
    });
  }

  async getById(id: string): Promise<Business | null> {
    return this.guard('load business', () => {
      const row = this.db.prepare<[string], BusinessRow>('SELECT * FROM businesses WHERE id = ?').get(id);
      return row ? toBusiness(row) : null;
    });
  }

  async recordSearchRun(run: NewSearchRun): Promise<SearchRun> {
    return this.guard('record search run', () => {
      const id = randomUUID();
      this.db
        .prepare<[string, string, string, number, string]>(
          `INSERT INTO search_runs (id, category, location, requested_limit, executed_at, status)
           VALUES (?, ?, ?, ?, ?, 'in_progress')`,
        )
        .run(id, run.category, run.location, run.requestedLimit, run.executedAt.toISOString());

      return {
        ...run,
        id,
        status: 'in_progress',
        resultCount: 0,
        qualifiedCount: 0,
        droppedCount: 0,
        failedCount: 0,
        completedAt: null,
        errorMessage: null,
      };
    });
  }

  async updateRunCounts(
    runId: string,
    counts: RunCounts,
    status: RunStatus,
    errorMessage: string | null = null,
  ): Promise<void> {
    return this.guard('update search run', () => {
      const completedAt = status === 'in_progress' ? null : this.now().toISOString();
      const result = this.db
        .prepare<[number, number, number, number, string, string | null, string | null, string]>(
          `UPDATE search_runs
           SET result_count = ?, qualified_count = ?, dropped_count = ?, failed_count = ?,
               status = ?, completed_at = ?, error_message = ?
           WHERE id = ?`,
        )
        .run(
          counts.resultCount,
          counts.qualifiedCount,
          counts.droppedCount,
          counts.failedCount,
          status,
          completedAt,
          errorMessage,
          runId,
        );
      if (result.changes === 0) {
        throw new StoreError(`Search run ${runId} does not exist`);
      }
    });
  }

  async getRun(id: string): Promise<SearchRun | null> {
    return this.guard('load search run', () => {
      const row = this.db.prepare<[string], RunRow>('SELECT * FROM search_runs WHERE id = ?').get(id);
      return row ? toSearchRun(row) : null;
    });
  }

  async listRuns(limit = 50): Promise<SearchRun[]> {
    return this.guard('list search runs', () =>
      this.db
        .prepare<[number], RunRow>('SELECT * FROM search_runs ORDER BY executed_at DESC, rowid DESC LIMIT ?')
        .all(limit)
        .map(toSearchRun),
    );
  }

  async listLeads(filters: LeadFilters = {}, orderByScore = true): Promise<Business[]> {
    return this.guard('list leads', () => {
      const { clause, params } = buildWhere(filters);
      const order = orderByScore
        ? 'b.lead_score DESC, b.last_seen_at DESC, b.id ASC'
        : 'b.last_seen_at DESC, b.id ASC';
      const page: FilterParams = {
        ...params,
        limit: filters.limit ?? -1,
        offset: filters.offset ?? 0,
      };

      return this.db
        .prepare<FilterParams, BusinessRow>(
          `SELECT b.* FROM businesses b ${clause} ORDER BY ${order} LIMIT @limit OFFSET @offset`,
        )
        .all(page)
        .map(toBusiness);
    });
  }

  async countLeads(filters: LeadFilters = {}): Promise<number> {
    return this.guard('count leads', () => {
      const { clause, params } = buildWhere(filters);
      const row = this.db
        .prepare<FilterParams, { total: number }>(`SELECT COUNT(*) AS total FROM businesses b ${clause}`)
        .get(params);
      return row?.total ?? 0;
    });
  }

  async countBusinesses(): Promise<number> {
    return this.countLeads();
  }

  async getScoreHistory(businessId: string): Promise<ScoreHistoryEntry[]> {
    return this.guard('load score history', () =>
      this.db
        .prepare<[string], HistoryRow>(
          'SELECT * FROM score_history WHERE business_id = ? ORDER BY recorded_at ASC, id ASC',
        )
        .all(businessId)
        .map(toHistoryEntry),
    );
  }

  async getStatistics(): Promise<LeadStatistics> {
    return this.guard('compute statistics', () => {
      const totals = this.db
        .prepare<[], { total: number; qualified: number | null; average: number | null }>(
          'SELECT COUNT(*) AS total, SUM(qualifies) AS qualified, AVG(lead_score) AS average FROM businesses',
        )
        .get();
      const presence = this.db
        .prepare<[], { web_presence: string; total: number }>(
          'SELECT web_presence, COUNT(*) AS total FROM businesses GROUP BY web_presence',
        )
        .all();
      const runs = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM search_runs').get();

      const byWebPresence: Record<WebPresence, number> = { none: 0, social_only: 0, has_website: 0 };
      for (const row of presence) {
        byWebPresence[toWebPresence(row.web_presence)] = row.total;
      }

      const average = totals?.average ?? null;
      return {
        totalBusinesses: totals?.total ?? 0,
        qualifiedLeads: totals?.qualified ?? 0,
        byWebPresence,
        totalRuns: runs?.total ?? 0,
        averageScore: average === null ? null : Math.round(average * 10) / 10,
      };
    });
  }

  close(): void {
    this.db.close();
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error: unknown) {
      if (error instanceof StoreError) throw error;
      logger.error(`[SqliteLeadStore] Failed to ${action}: ${toErrorMessage(error)}`);
      throw new StoreError(`Failed to ${action}: ${toErrorMessage(error)}`);
    }
  }
}
