import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { RawBusinessRecord } from '../../src/types/source.types.js';

const recordsSchema = z.array(z.record(z.unknown()));

/** SerpApi-shaped listings from tests/fixtures/local-results.json */
export function loadLocalResults(): RawBusinessRecord[] {
  const raw: unknown = JSON.parse(readFileSync(new URL('../fixtures/local-results.json', import.meta.url), 'utf-8'));
  return recordsSchema.parse(raw);
}

export function listing(overrides: RawBusinessRecord = {}): RawBusinessRecord {
  return {
    title: 'Test Barber',
    place_id: 'test-place-100',
    address: '1 Test Street, Manchester',
    phone: '0161 555 0100',
    rating: 4.5,
    reviews: 50,
    ...overrides,
  };
}
