import express, { type Express } from 'express';
import cors from 'cors';
import { errorHandler } from './middleware/errorHandler.js';
import { createRateLimiter, type RateLimiterOptions } from './middleware/rateLimiter.js';
import healthRoutes from './routes/health.routes.js';
import { createRunRoutes } from './routes/run.routes.js';
import { createLeadRoutes } from './routes/lead.routes.js';
import { sendError } from './utils/response.js';
import type { LeadStore } from './services/store/LeadStore.js';
import type { PipelineOrchestrator } from './services/pipeline/PipelineOrchestrator.js';

export interface AppDependencies {
  orchestrator: PipelineOrchestrator;
  store: LeadStore;
  defaultLimit: number;
  corsOrigin?: string;
  rateLimit?: RateLimiterOptions;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  app.use(express.json());

  // Health check (outside /api prefix, not rate limited)
  app.use(healthRoutes);

  // API routes
  app.use('/api', createRateLimiter(deps.rateLimit));
  app.use('/api/runs', createRunRoutes(deps.orchestrator, deps.store, deps.defaultLimit));
  app.use('/api/leads', createLeadRoutes(deps.store));

  app.use((req, res) => {
    sendError(res, `No route for ${req.method} ${req.path}`, 404, 'NOT_FOUND');
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
