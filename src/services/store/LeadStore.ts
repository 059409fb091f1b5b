import type {
  Business,
  LeadFilters,
  LeadStatistics,
  ScoreHistoryEntry,
  ScoredBusiness,
} from '../../types/business.types.js';
import type { NewSearchRun, RunCounts, RunStatus, SearchRun } from '../../types/run.types.js';

export interface UpsertResult {
  businessId: string;
  isNew: boolean;
}

/**
 * Durable lead persistence. Implementations reject with StoreError.
 */
export interface LeadStore {
  /**
   * Insert the business or merge it into the row holding the same identity
   * key, and append a score history entry, as one atomic step.
   */
  upsert(business: ScoredBusiness): Promise<UpsertResult>;
  getByIdentity(identityKey: string): Promise<Business | null>;
  /** Finds the row holding a place id, whatever its identity key */
  getByPlaceId(placeId: string): Promise<Business | null>;
  findByNameAndAddress(normalizedName: string, normalizedAddress: string): Promise<Business | null>;
  getById(id: string): Promise<Business | null>;

  recordSearchRun(run: NewSearchRun): Promise<SearchRun>;
  updateRunCounts(runId: string, counts: RunCounts, status: RunStatus, errorMessage?: string | null): Promise<void>;
  getRun(id: string): Promise<SearchRun | null>;
  listRuns(limit?: number): Promise<SearchRun[]>;

  listLeads(filters?: LeadFilters, orderByScore?: boolean): Promise<Business[]>;
  countLeads(filters?: LeadFilters): Promise<number>;
  countBusinesses(): Promise<number>;
  getScoreHistory(businessId: string): Promise<ScoreHistoryEntry[]>;
  getStatistics(): Promise<LeadStatistics>;

  close(): void;
}
