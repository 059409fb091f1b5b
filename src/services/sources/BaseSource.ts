import axios from 'axios';
import type { SourceConfig, ThrottleConfig } from '../../config/sources.js';
import type { BusinessSource, RawBusinessRecord, SourceStatus } from '../../types/source.types.js';
import { SourceError, toErrorMessage } from '../../utils/errors.js';
import { logger } from '../../config/logger.js';

export interface SourceState {
  status: SourceStatus;
  requestsThisHour: number;
  requestsToday: number;
  lastRequestAt: Date | null;
  errorCount: number;
  hourResetAt: number;
  dayResetAt: number;
}

const HOUR_MS = 3_600_000;

/**
 * Abstract base class for raw record sources.
 * Tracks hourly and daily request quotas and turns transport failures
 * into SourceError with a transient flag the orchestrator can retry on.
 */
export abstract class BaseSource implements BusinessSource {
  abstract readonly sourceId: string;
  abstract readonly sourceName: string;

  protected readonly config: SourceConfig;
  protected readonly throttle: ThrottleConfig;
  protected state: SourceState;

  constructor(
    config: SourceConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.config = config;
    this.throttle = config.throttle;

    const current = this.now();
    this.state = {
      status: 'healthy',
      requestsThisHour: 0,
      requestsToday: 0,
      lastRequestAt: null,
      errorCount: 0,
      hourResetAt: current + HOUR_MS,
      dayResetAt: this.getNextMidnightUTC(current),
    };
  }

  abstract search(category: string, location: string, limit: number): Promise<RawBusinessRecord[]>;

  getState(): SourceState {
    this.refreshBuckets();
    return { ...this.state, status: this.getStatus() };
  }

  getStatus(): SourceStatus {
    this.refreshBuckets();

    if (
      this.state.requestsThisHour >= this.throttle.maxPerHour ||
      this.state.requestsToday >= this.throttle.maxPerDay
    ) {
      return 'throttled';
    }

    return 'healthy';
  }

  canMakeRequest(): boolean {
    return this.getStatus() === 'healthy';
  }

  /**
   * Quota exhaustion is not transient: retrying inside the same run cannot help.
   */
  protected assertCanRequest(): void {
    if (!this.canMakeRequest()) {
      throw new SourceError(
        `${this.sourceName} is throttled (${this.state.requestsThisHour}/${this.throttle.maxPerHour} this hour, ${this.state.requestsToday}/${this.throttle.maxPerDay} today)`,
        false,
        this.sourceId,
      );
    }
  }

  protected recordRequest(): void {
    this.refreshBuckets();
    this.state.requestsThisHour++;
    this.state.requestsToday++;
    this.state.lastRequestAt = new Date(this.now());
    this.state.errorCount = 0;
  }

  protected recordError(): void {
    this.state.errorCount++;
  }

  /**
   * Classify a transport failure. No response (network, timeout), 429 and
   * 5xx are transient; any other HTTP status is not.
   */
  protected toSourceError(error: unknown): SourceError {
    if (error instanceof SourceError) return error;

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === undefined) {
        return new SourceError(`${this.sourceName} request failed: ${error.message}`, true, this.sourceId);
      }
      const transient = status === 429 || status >= 500;
      return new SourceError(`${this.sourceName} responded ${status}: ${error.message}`, transient, this.sourceId);
    }

    logger.debug(`[${this.sourceId}] Unclassified failure: ${toErrorMessage(error)}`);
    return new SourceError(`${this.sourceName} failed: ${toErrorMessage(error)}`, false, this.sourceId);
  }

  private refreshBuckets(): void {
    const current = this.now();

    if (current >= this.state.hourResetAt) {
      this.state.requestsThisHour = 0;
      this.state.hourResetAt = current + HOUR_MS;
    }

    if (current >= this.state.dayResetAt) {
      this.state.requestsToday = 0;
      this.state.dayResetAt = this.getNextMidnightUTC(current);
    }
  }

  private getNextMidnightUTC(current: number): number {
    const now = new Date(current);
    return Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1);
  }
}
