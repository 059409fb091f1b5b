/** One listing exactly as the provider returned it */
export type RawBusinessRecord = Record<string, unknown>;

export type SourceStatus = 'healthy' | 'throttled';

export interface BusinessSource {
  readonly sourceId: string;
  readonly sourceName: string;
  /**
   * Fetch up to `limit` raw listings for a category in a location.
   * Rejects with SourceError; `transient` tells the caller whether a retry can help.
   * Once `signal` aborts, no further provider requests are made.
   */
  search(category: string, location: string, limit: number, signal?: AbortSignal): Promise<RawBusinessRecord[]>;
}
