import type { RunPair } from '../types/run.types.js';

/** Business categories searched when a batch names none */
export const DEFAULT_TARGET_CATEGORIES: readonly string[] = [
  'restaurants',
  'tech repair',
  'barber',
  'plumbing',
  'auto repair',
];

/** Locations searched when a batch names none */
export const DEFAULT_TARGET_LOCATIONS: readonly string[] = [
  'Manchester UK',
  'London UK',
  'Birmingham UK',
  'Austin TX',
  'Portland OR',
];

export interface TargetLists {
  categories: string[];
  locations: string[];
}

/**
 * Split a comma-separated env value, trimming blanks and duplicates.
 * Falls back to the given defaults when nothing usable is left.
 */
export function parseTargetList(value: string | undefined, fallback: readonly string[]): string[] {
  const items = (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  const unique = [...new Set(items)];
  return unique.length > 0 ? unique : [...fallback];
}

export function loadTargets(env: { TARGET_CATEGORIES?: string; TARGET_LOCATIONS?: string }): TargetLists {
  return {
    categories: parseTargetList(env.TARGET_CATEGORIES, DEFAULT_TARGET_CATEGORIES),
    locations: parseTargetList(env.TARGET_LOCATIONS, DEFAULT_TARGET_LOCATIONS),
  };
}

/** Cartesian product, category-major, so one category finishes all locations before the next. */
export function expandPairs(categories: readonly string[], locations: readonly string[]): RunPair[] {
  const pairs: RunPair[] = [];
  for (const category of categories) {
    for (const location of locations) {
      pairs.push({ category, location });
    }
  }
  return pairs;
}
