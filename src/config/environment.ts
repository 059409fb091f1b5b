import { z } from 'zod';

/** Treat empty strings as undefined so optional env vars don't fail .min(1) */
const optionalKey = z.string().min(1).optional().or(z.literal('').transform(() => undefined));

/** Optional numeric override: absent or empty means "use the configured default" */
function optionalNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(5010),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DATABASE_PATH: z.string().min(1).default('data/leads.db'),
  SERPAPI_KEY: z.string().min(1, 'SERPAPI_KEY is required (https://serpapi.com)'),
  SERPAPI_BASE_URL: z.string().url().default('https://serpapi.com/search.json'),
  MIN_RATING: optionalNumber(z.coerce.number().min(0).max(5)),
  MIN_REVIEWS: optionalNumber(z.coerce.number().int().min(0)),
  SCORING_RULES_FILE: optionalKey,
  SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  SOURCE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  SOURCE_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(1),
  DEFAULT_LIMIT: z.coerce.number().int().min(1).max(100).default(20),
  TARGET_CATEGORIES: optionalKey,
  TARGET_LOCATIONS: optionalKey,
  RUN_SCHEDULE: optionalKey,
  CORS_ORIGIN: z.string().default('*'),
});

export type Environment = z.infer<typeof envSchema>;

let env: Environment | undefined;

export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  return envSchema.parse(source);
}

export function loadEnvironment(): Environment {
  if (env) return env;
  env = parseEnvironment(process.env);
  return env;
}
