import type { BusinessMatch, MatchType, ScoredBusiness } from '../../types/business.types.js';
import type { LeadStore } from '../store/LeadStore.js';
import { logger } from '../../config/logger.js';

/**
 * Business entity resolution and deduplication.
 * Matches an incoming observation against stored identities, then persists
 * it through the store's atomic upsert so a repeat sighting never adds a row.
 *
 * Tiers:
 * 1. Provider place id, including one adopted by a row first stored without it
 * 2. Normalized name + normalized address (listings without a place id)
 * 3. Normalized name + phone, when there is no address either
 *
 * Two branches of a chain with the same name at the same address merge.
 * That trade-off is accepted.
 */
export class BusinessDeduplicator {
  async resolve(business: ScoredBusiness, store: LeadStore): Promise<BusinessMatch> {
    const { identityKey, matchType } = await this.findIdentity(business, store);

    const { businessId, isNew } = await store.upsert({ ...business, identityKey });

    // A concurrent writer can insert the same key between lookup and upsert
    const resolvedType: MatchType = isNew ? 'new' : matchType === 'new' ? this.tierFor(business) : matchType;

    if (isNew) {
      logger.debug(`[BusinessDeduplicator] New business "${business.name}" (${businessId})`);
    }

    return { businessId, identityKey, isNew, matchType: resolvedType };
  }

  private async findIdentity(
    business: ScoredBusiness,
    store: LeadStore,
  ): Promise<{ identityKey: string; matchType: MatchType }> {
    if (business.placeId) {
      const existing = await store.getByPlaceId(business.placeId);
      if (existing) {
        return { identityKey: existing.identityKey, matchType: 'place_id' };
      }
    }

    if (business.normalizedAddress) {
      const candidate = await store.findByNameAndAddress(business.normalizedName, business.normalizedAddress);
      // A row first stored without a place id adopts it; one with a different place id is another business
      if (candidate && (candidate.placeId === null || !business.placeId)) {
        return { identityKey: candidate.identityKey, matchType: 'name_address' };
      }
    }

    if (business.placeId || business.normalizedAddress) {
      return { identityKey: business.identityKey, matchType: 'new' };
    }

    const existing = await store.getByIdentity(business.identityKey);
    return { identityKey: business.identityKey, matchType: existing ? 'name_phone' : 'new' };
  }

  private tierFor(business: ScoredBusiness): MatchType {
    if (business.placeId) return 'place_id';
    return business.normalizedAddress ? 'name_address' : 'name_phone';
  }
}
