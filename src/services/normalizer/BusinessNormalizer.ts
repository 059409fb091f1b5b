import { z } from 'zod';
import type { NormalizedBusiness, WebPresence } from '../../types/business.types.js';
import type { SearchRun } from '../../types/run.types.js';
import { DEFAULT_SOCIAL_DOMAINS } from '../../config/qualification.js';
import { MalformedRecordError } from '../../utils/errors.js';
import { cleanString, isDomainIn, normalizeAddress, normalizeDomain, normalizeName } from '../../utils/text.js';
import { normalizePhone } from '../../utils/phone.js';
import { fallbackIdentityKey, placeIdentityKey } from '../../utils/identity.js';

const optionalString = z.string().optional().catch(undefined);
const numeric = z.union([z.number(), z.string()]).optional().catch(undefined);

/**
 * SerpApi `local_results` entry. Every field is optional and a field of the
 * wrong type reads as absent, so one odd value never rejects the listing.
 */
const localResultSchema = z.object({
  title: optionalString,
  place_id: optionalString,
  address: optionalString,
  phone: optionalString,
  rating: numeric,
  reviews: numeric,
  website: optionalString,
  link: optionalString,
  type: optionalString,
  gps_coordinates: z
    .object({ latitude: z.number(), longitude: z.number() })
    .optional()
    .catch(undefined),
  links: z.record(z.unknown()).optional().catch(undefined),
  social_links: z.unknown().optional(),
  profiles: z.unknown().optional(),
});

type LocalResult = z.infer<typeof localResultSchema>;

export type RunContext = Pick<SearchRun, 'id' | 'category' | 'location'>;

export interface NormalizerOptions {
  socialDomains?: readonly string[];
  now?: () => Date;
}

const RATING_PATTERN = /^\d+(\.\d+)?$/;
const COUNT_PATTERN = /^\d{1,3}(,\d{3})*$|^\d+$/;

export function parseRating(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  let rating: number;
  if (typeof value === 'number') {
    rating = value;
  } else {
    const trimmed = value.trim();
    if (!RATING_PATTERN.test(trimmed)) return null;
    rating = Number(trimmed);
  }
  return Number.isFinite(rating) && rating >= 0 && rating <= 5 ? rating : null;
}

export function parseReviewCount(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  const trimmed = value.trim();
  if (!COUNT_PATTERN.test(trimmed)) return null;
  return Number(trimmed.replaceAll(',', ''));
}

/** Every string found in a value, one or two levels deep */
function collectUrls(value: unknown, depth = 0): string[] {
  if (typeof value === 'string') return [value];
  if (depth > 2 || value === null || typeof value !== 'object') return [];
  const children = Array.isArray(value) ? value : Object.values(value);
  return children.flatMap((child: unknown) => collectUrls(child, depth + 1));
}

/**
 * Maps raw provider listings onto NormalizedBusiness.
 * Unknown numbers stay null; the normalizer never invents a zero.
 */
export class BusinessNormalizer {
  private readonly socialDomains: readonly string[];
  private readonly now: () => Date;

  constructor(options: NormalizerOptions = {}) {
    this.socialDomains = options.socialDomains ?? DEFAULT_SOCIAL_DOMAINS;
    this.now = options.now ?? (() => new Date());
  }

  normalize(raw: unknown, run: RunContext): NormalizedBusiness {
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      throw new MalformedRecordError('Listing is not an object');
    }

    const record = localResultSchema.parse(raw);

    const name = cleanString(record.title);
    const normalizedName = name ? normalizeName(name) : '';
    if (!name || !normalizedName) {
      throw new MalformedRecordError('Listing has no usable name');
    }

    const address = cleanString(record.address);
    const normalizedAddress = address ? normalizeAddress(address) || null : null;
    const phone = normalizePhone(record.phone);
    if (!normalizedAddress && !phone) {
      throw new MalformedRecordError(`Listing "${name}" has neither address nor phone`);
    }

    const placeId = cleanString(record.place_id);
    const { webPresence, website } = this.classifyWebPresence(record);

    return {
      identityKey: placeId
        ? placeIdentityKey(placeId)
        : fallbackIdentityKey(normalizedName, normalizedAddress, phone),
      placeId,
      name,
      normalizedName,
      address,
      normalizedAddress,
      phone,
      category: run.category,
      location: run.location,
      rating: parseRating(record.rating),
      reviewCount: parseReviewCount(record.reviews),
      webPresence,
      website,
      mapsUrl: this.buildMapsUrl(record, placeId, name, address ?? run.location),
      latitude: record.gps_coordinates?.latitude ?? null,
      longitude: record.gps_coordinates?.longitude ?? null,
      primaryType: cleanString(record.type),
      rawPayload: raw,
      observedAt: this.now(),
      searchRunId: run.id,
    };
  }

  private classifyWebPresence(record: LocalResult): { webPresence: WebPresence; website: string | null } {
    const linked = record.links?.website;
    const siteCandidates = [record.website, typeof linked === 'string' ? linked : undefined]
      .map((url) => cleanString(url))
      .filter((url): url is string => url !== null);

    const ownSite = siteCandidates.find((url) => normalizeDomain(url) !== null && !this.isSocial(url));
    if (ownSite) {
      return { webPresence: 'has_website', website: ownSite };
    }

    const social = [
      ...siteCandidates,
      ...collectUrls(record.links),
      ...collectUrls(record.social_links),
      ...collectUrls(record.profiles),
    ]
      .map((url) => url.trim())
      .find((url) => this.isSocial(url));
    if (social) {
      return { webPresence: 'social_only', website: social };
    }

    return { webPresence: 'none', website: null };
  }

  private isSocial(url: string): boolean {
    return isDomainIn(url, this.socialDomains);
  }

  private buildMapsUrl(record: LocalResult, placeId: string | null, name: string, where: string): string {
    const link = cleanString(record.link);
    if (link) return link;
    if (placeId) {
      return `https://www.google.com/maps/place/?q=place_id:${encodeURIComponent(placeId)}`;
    }
    return `https://www.google.com/maps/search/?api=1&query=${encodeURIComponent(`${name} ${where}`)}`;
  }
}
