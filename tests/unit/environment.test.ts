import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnvironment } from '../../src/config/environment.js';
import { expandPairs, loadTargets, parseTargetList } from '../../src/config/targets.js';

describe('parseEnvironment', () => {
  it('applies defaults', () => {
    const env = parseEnvironment({ SERPAPI_KEY: 'test-secret' });
    expect(env).toMatchObject({
      PORT: 5010,
      DATABASE_PATH: 'data/leads.db',
      SOURCE_TIMEOUT_MS: 20000,
      SOURCE_MAX_ATTEMPTS: 3,
      BATCH_CONCURRENCY: 1,
      DEFAULT_LIMIT: 20,
      CORS_ORIGIN: '*',
    });
    expect(env.MIN_RATING).toBeUndefined();
    expect(env.RUN_SCHEDULE).toBeUndefined();
  });

  it('coerces numeric overrides and treats blanks as unset', () => {
    const env = parseEnvironment({
      SERPAPI_KEY: 'test-secret',
      MIN_RATING: '4.3',
      MIN_REVIEWS: '',
      RUN_SCHEDULE: '',
      BATCH_CONCURRENCY: '3',
    });
    expect(env.MIN_RATING).toBe(4.3);
    expect(env.MIN_REVIEWS).toBeUndefined();
    expect(env.RUN_SCHEDULE).toBeUndefined();
    expect(env.BATCH_CONCURRENCY).toBe(3);
  });

  it('requires the API key', () => {
    expect(() => parseEnvironment({})).toThrow(ZodError);
  });

  it('rejects a rating threshold above 5', () => {
    expect(() => parseEnvironment({ SERPAPI_KEY: 'test-secret', MIN_RATING: '6' })).toThrow(ZodError);
  });
});

describe('targets', () => {
  it('splits, trims and de-duplicates', () => {
    expect(parseTargetList(' barber, plumbing ,,barber', ['x'])).toEqual(['barber', 'plumbing']);
  });

  it('falls back when nothing usable is given', () => {
    expect(parseTargetList(' , ', ['x', 'y'])).toEqual(['x', 'y']);
    expect(loadTargets({}).categories).toContain('barber');
  });

  it('expands category-major pairs', () => {
    expect(expandPairs(['barber', 'plumbing'], ['Leeds', 'York'])).toEqual([
      { category: 'barber', location: 'Leeds' },
      { category: 'barber', location: 'York' },
      { category: 'plumbing', location: 'Leeds' },
      { category: 'plumbing', location: 'York' },
    ]);
  });
});
