import cron, { type ScheduledTask } from 'node-cron';
import type { PipelineOrchestrator } from '../pipeline/PipelineOrchestrator.js';
import type { BatchSummary } from '../../types/run.types.js';
import { logger } from '../../config/logger.js';
import { toErrorMessage } from '../../utils/errors.js';

export interface RunScheduleConfig {
  cronExpression: string;
  categories: string[];
  locations: string[];
  limit: number;
}

/**
 * Registers one node-cron job that runs a batch over the configured
 * categories and locations. A trigger that fires while the previous batch
 * is still going is skipped.
 */
export class RunScheduler {
  private task: ScheduledTask | null = null;
  private running = false;

  constructor(
    private readonly orchestrator: PipelineOrchestrator,
    private readonly config: RunScheduleConfig,
  ) {}

  /**
   * Register the cron job. Returns false when the expression is invalid.
   */
  start(): boolean {
    if (this.task) return true;

    if (!cron.validate(this.config.cronExpression)) {
      logger.error(`[RunScheduler] Invalid cron expression "${this.config.cronExpression}"`);
      return false;
    }

    this.task = cron.schedule(this.config.cronExpression, () => {
      this.execute().catch((error: unknown) => {
        logger.error(`[RunScheduler] Scheduled batch failed: ${toErrorMessage(error)}`);
      });
    });

    logger.info(
      `[RunScheduler] Registered cron ${this.config.cronExpression} for ` +
        `${this.config.categories.length} categories x ${this.config.locations.length} locations`,
    );
    return true;
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('[RunScheduler] Stopped');
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one batch now. Resolves to null when a batch is already in flight.
   */
  async execute(): Promise<BatchSummary | null> {
    if (this.running) {
      logger.warn('[RunScheduler] Previous batch still running, skipping trigger');
      return null;
    }

    this.running = true;
    try {
      const { categories, locations, limit } = this.config;
      return await this.orchestrator.runBatch({ categories, locations, limit });
    } finally {
      this.running = false;
    }
  }
}
