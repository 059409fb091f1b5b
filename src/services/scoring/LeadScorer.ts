import type { QualificationConfig, RuleCondition, ScoreResult, ScoringInput } from '../../types/scoring.types.js';
import { DEFAULT_QUALIFICATION_CONFIG } from '../../config/qualification.js';

/**
 * Evaluate one rule condition. An unknown (null) rating or review count
 * never satisfies a threshold.
 */
export function evaluateCondition(condition: RuleCondition, input: ScoringInput): boolean {
  switch (condition.field) {
    case 'rating':
      return input.rating !== null && input.rating >= condition.gte;
    case 'reviewCount':
      return input.reviewCount !== null && input.reviewCount >= condition.gte;
    case 'webPresence':
      return input.webPresence === condition.equals;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Pure lead scoring. Same input and config, same result.
 */
export class LeadScorer {
  constructor(private readonly config: QualificationConfig = DEFAULT_QUALIFICATION_CONFIG) {}

  get qualification(): QualificationConfig {
    return this.config;
  }

  score(input: ScoringInput): ScoreResult {
    const matchedRules: string[] = [];
    let total = 0;

    for (const rule of this.config.rules) {
      if (evaluateCondition(rule.condition, input)) {
        matchedRules.push(rule.name);
        total += rule.points;
      }
    }

    const notes = this.buildNotes(input);
    const ratingOk = input.rating !== null && input.rating >= this.config.minRating;
    const reviewsOk = input.reviewCount !== null && input.reviewCount >= this.config.minReviews;

    return {
      score: Math.round(clamp(total, 0, 100)),
      qualifies: ratingOk && reviewsOk && input.webPresence !== 'has_website',
      matchedRules,
      notes,
    };
  }

  private buildNotes(input: ScoringInput): string[] {
    const notes: string[] = [];
    const { minRating, minReviews } = this.config;

    if (input.rating === null) {
      notes.push('Rating unknown');
    } else if (input.rating < minRating) {
      notes.push(`Rating below ${minRating}`);
    }

    if (input.reviewCount === null) {
      notes.push('Review count unknown');
    } else if (input.reviewCount < minReviews) {
      notes.push(`Reviews below ${minReviews}`);
    }

    switch (input.webPresence) {
      case 'none':
        notes.push('No website');
        break;
      case 'social_only':
        notes.push('Social media only');
        break;
      case 'has_website':
        notes.push('Has website');
        break;
    }

    return notes;
  }
}
