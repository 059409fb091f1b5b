export interface ThrottleConfig {
  maxPerHour: number;
  maxPerDay: number;
}

export interface SourceConfig {
  sourceId: string;
  sourceName: string;
  /** Results the provider returns per page */
  pageSize: number;
  /** Hard cap on pages fetched for one search */
  maxPages: number;
  throttle: ThrottleConfig;
}

export const SOURCE_CONFIGS = {
  serpapi_google_maps: {
    sourceId: 'serpapi_google_maps',
    sourceName: 'SerpApi Google Maps',
    pageSize: 20,
    maxPages: 5,
    throttle: {
      maxPerHour: 200,
      maxPerDay: 1000,
    },
  },
} satisfies Record<string, SourceConfig>;
