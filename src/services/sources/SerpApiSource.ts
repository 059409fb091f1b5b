import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { BaseSource } from './BaseSource.js';
import { SOURCE_CONFIGS } from '../../config/sources.js';
import { logger } from '../../config/logger.js';
import { SourceError } from '../../utils/errors.js';
import type { RawBusinessRecord } from '../../types/source.types.js';

const DEFAULT_BASE_URL = 'https://serpapi.com/search.json';
const DEFAULT_TIMEOUT_MS = 15000;

/** SerpApi reports an empty result set as an error string */
const NO_RESULTS_PATTERN = /hasn't returned any results/i;

const serpApiResponseSchema = z
  .object({
    error: z.string().optional(),
    local_results: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();

export interface SerpApiSourceOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Preconfigured axios instance; tests pass one with an in-process adapter */
  http?: AxiosInstance;
  now?: () => number;
}

/**
 * SerpApi Google Maps search. Pages through `start` offsets until the
 * requested number of listings is collected or the provider runs dry.
 */
export class SerpApiSource extends BaseSource {
  readonly sourceId = SOURCE_CONFIGS.serpapi_google_maps.sourceId;
  readonly sourceName = SOURCE_CONFIGS.serpapi_google_maps.sourceName;

  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string,
    options: SerpApiSourceOptions = {},
  ) {
    super(SOURCE_CONFIGS.serpapi_google_maps, options.now);
    if (!apiKey) {
      throw new Error('SerpApiSource requires an API key');
    }
    this.http = options.http ?? axios.create();
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async search(
    category: string,
    location: string,
    limit: number,
    signal?: AbortSignal,
  ): Promise<RawBusinessRecord[]> {
    const { pageSize, maxPages } = this.config;
    const records: RawBusinessRecord[] = [];

    for (let page = 0; page < maxPages && records.length < limit; page++) {
      const batch = await this.fetchPage(category, location, page * pageSize, signal);
      records.push(...batch);
      if (batch.length < pageSize) break;
    }

    logger.info(
      `[${this.sourceId}] "${category}" in "${location}" returned ${records.length} listings (limit ${limit})`,
    );

    return records.slice(0, limit);
  }

  private async fetchPage(
    category: string,
    location: string,
    start: number,
    signal?: AbortSignal,
  ): Promise<RawBusinessRecord[]> {
    if (signal?.aborted) {
      throw new SourceError(`${this.sourceName} search aborted before offset ${start}`, true, this.sourceId);
    }
    this.assertCanRequest();

    const params: Record<string, string | number> = {
      engine: 'google_maps',
      type: 'search',
      q: `${category} in ${location}`,
      hl: 'en',
      api_key: this.apiKey,
    };
    if (start > 0) {
      params.start = start;
    }

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(this.baseUrl, {
        params,
        timeout: this.timeoutMs,
        responseType: 'json',
        signal,
      });
      data = response.data;
      this.recordRequest();
    } catch (error: unknown) {
      this.recordError();
      throw this.toSourceError(error);
    }

    const parsed = serpApiResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SourceError(`${this.sourceName} returned an unexpected response shape`, false, this.sourceId);
    }

    if (parsed.data.error) {
      if (NO_RESULTS_PATTERN.test(parsed.data.error)) {
        return [];
      }
      throw new SourceError(`${this.sourceName} error: ${parsed.data.error}`, false, this.sourceId);
    }

    return parsed.data.local_results ?? [];
  }
}
