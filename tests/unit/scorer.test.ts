import { describe, it, expect } from 'vitest';
import { LeadScorer, evaluateCondition } from '../../src/services/scoring/LeadScorer.js';
import { DEFAULT_QUALIFICATION_CONFIG } from '../../src/config/qualification.js';
import { WEB_PRESENCE_VALUES } from '../../src/types/business.types.js';
import type { ScoringInput } from '../../src/types/scoring.types.js';

const scorer = new LeadScorer();

function input(overrides: Partial<ScoringInput> = {}): ScoringInput {
  return { rating: 4.6, reviewCount: 150, webPresence: 'none', ...overrides };
}

describe('evaluateCondition', () => {
  it('compares thresholds inclusively', () => {
    expect(evaluateCondition({ field: 'rating', gte: 4.0 }, input({ rating: 4.0 }))).toBe(true);
    expect(evaluateCondition({ field: 'reviewCount', gte: 20 }, input({ reviewCount: 19 }))).toBe(false);
  });

  it('never matches an unknown value', () => {
    expect(evaluateCondition({ field: 'rating', gte: 0 }, input({ rating: null }))).toBe(false);
    expect(evaluateCondition({ field: 'reviewCount', gte: 0 }, input({ reviewCount: null }))).toBe(false);
  });

  it('matches web presence by equality', () => {
    expect(evaluateCondition({ field: 'webPresence', equals: 'social_only' }, input({ webPresence: 'social_only' }))).toBe(
      true,
    );
  });
});

describe('LeadScorer', () => {
  it('gives 5.0 stars, 150 reviews and no website 100 points', () => {
    const result = scorer.score(input({ rating: 5.0, reviewCount: 150, webPresence: 'none' }));
    expect(result).toEqual({
      score: 100,
      qualifies: true,
      matchedRules: ['base_rating', 'base_reviews', 'rating_bonus', 'review_bonus', 'no_website'],
      notes: ['No website'],
    });
  });

  it('scores a social-only lead without the no-website points', () => {
    const result = scorer.score(input({ rating: 4.6, reviewCount: 45, webPresence: 'social_only' }));
    expect(result.score).toBe(70);
    expect(result.qualifies).toBe(true);
    expect(result.notes).toEqual(['Social media only']);
  });

  it('never qualifies a business that has a website', () => {
    const result = scorer.score(input({ webPresence: 'has_website' }));
    expect(result.score).toBe(75);
    expect(result.qualifies).toBe(false);
    expect(result.notes).toEqual(['Has website']);
  });

  it('never qualifies a rating of 3.5, whatever the reviews', () => {
    const result = scorer.score(input({ rating: 3.5, reviewCount: 5000 }));
    expect(result.qualifies).toBe(false);
    expect(result.score).toBe(65);
    expect(result.notes).toEqual(['Rating below 4', 'No website']);
  });

  it('fails closed on unknown rating or review count', () => {
    const unknownRating = scorer.score(input({ rating: null }));
    expect(unknownRating.qualifies).toBe(false);
    expect(unknownRating.notes).toContain('Rating unknown');

    const unknownReviews = scorer.score(input({ reviewCount: null }));
    expect(unknownReviews.qualifies).toBe(false);
    expect(unknownReviews.notes).toContain('Review count unknown');
  });

  it('qualifies exactly at the thresholds', () => {
    const result = scorer.score(input({ rating: 4.0, reviewCount: 20 }));
    expect(result.qualifies).toBe(true);
    expect(result.score).toBe(65);
  });

  it('flags too few reviews', () => {
    expect(scorer.score(input({ reviewCount: 19 })).notes).toEqual(['Reviews below 20', 'No website']);
  });

  it('stays within 0..100 and is deterministic across inputs', () => {
    const ratings = [null, 0, 3.9, 4.0, 4.5, 5];
    const counts = [null, 0, 19, 20, 100, 10000];
    for (const rating of ratings) {
      for (const reviewCount of counts) {
        for (const webPresence of WEB_PRESENCE_VALUES) {
          const sample = { rating, reviewCount, webPresence };
          const first = scorer.score(sample);
          expect(first.score).toBeGreaterThanOrEqual(0);
          expect(first.score).toBeLessThanOrEqual(100);
          expect(scorer.score(sample)).toEqual(first);
        }
      }
    }
  });

  it('clamps rule totals outside the range', () => {
    const generous = new LeadScorer({
      ...DEFAULT_QUALIFICATION_CONFIG,
      rules: [
        { name: 'a', description: '', points: 80, condition: { field: 'webPresence', equals: 'none' } },
        { name: 'b', description: '', points: 80, condition: { field: 'rating', gte: 1 } },
      ],
    });
    expect(generous.score(input()).score).toBe(100);

    const harsh = new LeadScorer({
      ...DEFAULT_QUALIFICATION_CONFIG,
      rules: [{ name: 'penalty', description: '', points: -50, condition: { field: 'webPresence', equals: 'none' } }],
    });
    expect(harsh.score(input()).score).toBe(0);
  });

  it('uses configured thresholds', () => {
    const strict = new LeadScorer({ ...DEFAULT_QUALIFICATION_CONFIG, minRating: 4.8, minReviews: 200 });
    const result = strict.score(input());
    expect(result.qualifies).toBe(false);
    expect(result.notes).toEqual(['Rating below 4.8', 'Reviews below 200', 'No website']);
  });
});
