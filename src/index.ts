import 'dotenv/config';
import { loadEnvironment } from './config/environment.js';
import { logger } from './config/logger.js';
import { getDatabase, closeDatabase } from './config/database.js';
import { loadQualificationConfig } from './config/qualification.js';
import { loadTargets } from './config/targets.js';
import { createApp } from './app.js';
import { SqliteLeadStore } from './services/store/SqliteLeadStore.js';
import { SerpApiSource } from './services/sources/SerpApiSource.js';
import { LeadScorer } from './services/scoring/LeadScorer.js';
import { PipelineOrchestrator } from './services/pipeline/PipelineOrchestrator.js';
import { RunScheduler } from './services/scheduler/RunScheduler.js';

const env = loadEnvironment();

// Initialize services
const store = new SqliteLeadStore(getDatabase());
const source = new SerpApiSource(env.SERPAPI_KEY, {
  baseUrl: env.SERPAPI_BASE_URL,
  timeoutMs: env.SOURCE_TIMEOUT_MS,
});
const qualification = loadQualificationConfig(env);
const targets = loadTargets(env);

const orchestrator = new PipelineOrchestrator(
  { source, store, scorer: new LeadScorer(qualification) },
  {
    sourceTimeoutMs: env.SOURCE_TIMEOUT_MS,
    retry: { maxAttempts: env.SOURCE_MAX_ATTEMPTS, baseDelayMs: env.SOURCE_BASE_DELAY_MS },
    batchConcurrency: env.BATCH_CONCURRENCY,
    targets,
  },
);

const scheduler = env.RUN_SCHEDULE
  ? new RunScheduler(orchestrator, {
      cronExpression: env.RUN_SCHEDULE,
      categories: targets.categories,
      locations: targets.locations,
      limit: env.DEFAULT_LIMIT,
    })
  : null;

const app = createApp({ orchestrator, store, defaultLimit: env.DEFAULT_LIMIT, corsOrigin: env.CORS_ORIGIN });

// Start server
const server = app.listen(env.PORT, () => {
  logger.info(`Lead pipeline backend running on port ${env.PORT}`);
  logger.info(`Environment: ${env.NODE_ENV}`);
  logger.info(
    `Qualification: rating >= ${qualification.minRating}, reviews >= ${qualification.minReviews}, ${qualification.rules.length} scoring rules`,
  );
  logger.info(`Health check: http://localhost:${env.PORT}/health`);

  // Start cron scheduler after server is listening
  if (scheduler && !scheduler.start()) {
    logger.warn('[RunScheduler] Not started, RUN_SCHEDULE is invalid');
  }
});

// Graceful shutdown
const shutdown = (): void => {
  logger.info('Shutting down...');
  scheduler?.stop();
  server.close(() => {
    closeDatabase();
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
