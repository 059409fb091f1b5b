/**
 * Lowercase, drop punctuation, collapse whitespace.
 * Letters and digits of any script are kept.
 */
function collapse(value: string): string {
  return value
    .normalize('NFKC')
    .toLowerCase()
    .replaceAll(/[^\p{L}\p{N}\s]/gu, '')
    .replaceAll(/\s+/g, ' ')
    .trim();
}

/**
 * Normalize a business name for fallback matching.
 * Legal suffixes are kept: "Joe's Pizza LLC" and "Joe's Pizza" stay distinct.
 */
export function normalizeName(name: string): string {
  return collapse(name);
}

/**
 * Normalize a street address for fallback matching.
 * Commas and periods vanish, so "12 High St., Leeds" equals "12 high st leeds".
 */
export function normalizeAddress(address: string): string {
  return collapse(address.replaceAll(/[,.]/g, ' '));
}

/**
 * Normalize a URL domain for matching.
 * Strip protocol, www prefix, trailing slash. Returns null for anything
 * that does not parse to an http(s) URL with a dotted host.
 */
export function normalizeDomain(url: string | null | undefined): string | null {
  if (!url) return null;
  const trimmed = url.trim();
  if (!trimmed || /\s/.test(trimmed)) return null;
  try {
    const parsed = new URL(/^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;
    const host = parsed.hostname.replace(/^www\./, '').toLowerCase();
    return host.includes('.') ? host : null;
  } catch {
    return null;
  }
}

/**
 * True when the URL's host is one of the given domains or a subdomain of one.
 */
export function isDomainIn(url: string, domains: readonly string[]): boolean {
  const host = normalizeDomain(url);
  if (!host) return false;
  return domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

/** Trimmed string or null for blanks */
export function cleanString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
