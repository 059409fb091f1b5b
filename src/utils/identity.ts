import { createHash } from 'node:crypto';

export function placeIdentityKey(placeId: string): string {
  return `place:${placeId}`;
}

/**
 * Identity for listings without a provider place id: a hash of the normalized
 * name and address. Phone digits stand in when there is no address.
 * Two branches of a chain that share a name and address collapse into one key.
 */
export function fallbackIdentityKey(
  normalizedName: string,
  normalizedAddress: string | null,
  phone: string | null,
): string {
  const locator = normalizedAddress ?? `phone:${phone ?? ''}`;
  const digest = createHash('sha1').update(`${normalizedName}|${locator}`).digest('hex');
  return `hash:${digest}`;
}
