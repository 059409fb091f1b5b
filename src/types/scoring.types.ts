import type { NormalizedBusiness, WebPresence } from './business.types.js';

export type RuleCondition =
  | { field: 'rating'; gte: number }
  | { field: 'reviewCount'; gte: number }
  | { field: 'webPresence'; equals: WebPresence };

export interface QualificationRule {
  name: string;
  description: string;
  points: number;
  condition: RuleCondition;
}

export interface QualificationConfig {
  minRating: number;
  minReviews: number;
  rules: QualificationRule[];
}

export type ScoringInput = Pick<NormalizedBusiness, 'rating' | 'reviewCount' | 'webPresence'>;

export interface ScoreResult {
  score: number;
  qualifies: boolean;
  matchedRules: string[];
  notes: string[];
}
