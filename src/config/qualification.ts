import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { WEB_PRESENCE_VALUES } from '../types/business.types.js';
import type { QualificationConfig, QualificationRule } from '../types/scoring.types.js';

export const DEFAULT_MIN_RATING = 4.0;
export const DEFAULT_MIN_REVIEWS = 20;

export const DEFAULT_SCORING_RULES: readonly QualificationRule[] = [
  {
    name: 'base_rating',
    description: 'Rating at or above 4.0',
    points: 20,
    condition: { field: 'rating', gte: 4.0 },
  },
  {
    name: 'base_reviews',
    description: 'At least 20 reviews',
    points: 20,
    condition: { field: 'reviewCount', gte: 20 },
  },
  {
    name: 'rating_bonus',
    description: 'Rating at or above 4.5',
    points: 15,
    condition: { field: 'rating', gte: 4.5 },
  },
  {
    name: 'review_bonus',
    description: 'At least 100 reviews',
    points: 20,
    condition: { field: 'reviewCount', gte: 100 },
  },
  {
    name: 'no_website',
    description: 'No web presence at all',
    points: 25,
    condition: { field: 'webPresence', equals: 'none' },
  },
  {
    name: 'social_only',
    description: 'Only social media profiles',
    points: 15,
    condition: { field: 'webPresence', equals: 'social_only' },
  },
];

export const DEFAULT_QUALIFICATION_CONFIG: QualificationConfig = {
  minRating: DEFAULT_MIN_RATING,
  minReviews: DEFAULT_MIN_REVIEWS,
  rules: [...DEFAULT_SCORING_RULES],
};

/** A URL on one of these hosts is a social profile, not a website */
export const DEFAULT_SOCIAL_DOMAINS: readonly string[] = [
  'facebook.com',
  'fb.com',
  'instagram.com',
  'twitter.com',
  'x.com',
  'linkedin.com',
  'tiktok.com',
  'youtube.com',
  'youtu.be',
];

const ruleConditionSchema = z.discriminatedUnion('field', [
  z.object({ field: z.literal('rating'), gte: z.number().min(0).max(5) }),
  z.object({ field: z.literal('reviewCount'), gte: z.number().int().min(0) }),
  z.object({ field: z.literal('webPresence'), equals: z.enum(WEB_PRESENCE_VALUES) }),
]);

const ruleSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  points: z.number().int().min(-100).max(100),
  condition: ruleConditionSchema,
});

export const qualificationFileSchema = z.object({
  minRating: z.number().min(0).max(5).optional(),
  minReviews: z.number().int().min(0).optional(),
  rules: z
    .array(ruleSchema)
    .min(1)
    .refine((rules) => new Set(rules.map((r) => r.name)).size === rules.length, {
      message: 'Rule names must be unique',
    })
    .optional(),
});

export type QualificationFile = z.infer<typeof qualificationFileSchema>;

export interface QualificationSettings {
  MIN_RATING?: number;
  MIN_REVIEWS?: number;
  SCORING_RULES_FILE?: string;
}

export function readQualificationFile(path: string): QualificationFile {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return qualificationFileSchema.parse(raw);
}

/**
 * Build the scorer configuration. Precedence per value:
 * env override, then the rule file, then the built-in default.
 */
export function loadQualificationConfig(settings: QualificationSettings): QualificationConfig {
  const file = settings.SCORING_RULES_FILE ? readQualificationFile(settings.SCORING_RULES_FILE) : {};

  return {
    minRating: settings.MIN_RATING ?? file.minRating ?? DEFAULT_MIN_RATING,
    minReviews: settings.MIN_REVIEWS ?? file.minReviews ?? DEFAULT_MIN_REVIEWS,
    rules: file.rules ?? [...DEFAULT_SCORING_RULES],
  };
}
