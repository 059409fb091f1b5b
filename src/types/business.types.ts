export const WEB_PRESENCE_VALUES = ['none', 'social_only', 'has_website'] as const;

export type WebPresence = (typeof WEB_PRESENCE_VALUES)[number];

/**
 * A provider record mapped onto the canonical lead shape.
 * `null` marks an unknown value; it is never coerced to zero.
 */
export interface NormalizedBusiness {
  identityKey: string;
  placeId: string | null;
  name: string;
  normalizedName: string;
  address: string | null;
  normalizedAddress: string | null;
  phone: string | null;
  category: string;
  location: string;
  rating: number | null;
  reviewCount: number | null;
  webPresence: WebPresence;
  /** The URL that decided webPresence, if any */
  website: string | null;
  mapsUrl: string | null;
  latitude: number | null;
  longitude: number | null;
  primaryType: string | null;
  /** Untouched provider payload, kept for audit */
  rawPayload: unknown;
  observedAt: Date;
  searchRunId: string;
}

export interface ScoredBusiness extends NormalizedBusiness {
  leadScore: number;
  qualifies: boolean;
}

export interface Business extends Omit<ScoredBusiness, 'observedAt'> {
  id: string;
  firstSeenAt: Date;
  lastSeenAt: Date;
}

export type MatchType = 'place_id' | 'name_address' | 'name_phone' | 'new';

export interface BusinessMatch {
  businessId: string;
  identityKey: string;
  isNew: boolean;
  matchType: MatchType;
}

export interface ScoreHistoryEntry {
  id: number;
  businessId: string;
  searchRunId: string | null;
  leadScore: number;
  qualifies: boolean;
  rating: number | null;
  reviewCount: number | null;
  webPresence: WebPresence;
  recordedAt: Date;
}

export interface LeadFilters {
  qualifiedOnly?: boolean;
  minScore?: number;
  category?: string;
  location?: string;
  webPresence?: WebPresence;
  /** Businesses observed by this run (not only those it observed last) */
  runId?: string;
  limit?: number;
  offset?: number;
}

export interface LeadStatistics {
  totalBusinesses: number;
  qualifiedLeads: number;
  byWebPresence: Record<WebPresence, number>;
  totalRuns: number;
  averageScore: number | null;
}
