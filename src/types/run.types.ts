export const RUN_STATUSES = ['in_progress', 'completed', 'partial', 'failed'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export interface RunPair {
  category: string;
  location: string;
}

export interface NewSearchRun extends RunPair {
  requestedLimit: number;
  executedAt: Date;
}

export interface RunCounts {
  resultCount: number;
  qualifiedCount: number;
  droppedCount: number;
  failedCount: number;
}

export interface SearchRun extends NewSearchRun, RunCounts {
  id: string;
  status: RunStatus;
  completedAt: Date | null;
  errorMessage: string | null;
}

export interface RunSummary extends RunPair, RunCounts {
  /** null when the run record itself could not be created */
  runId: string | null;
  status: RunStatus;
  fetched: number;
  newCount: number;
  updatedCount: number;
  error: string | null;
  startedAt: Date;
  completedAt: Date;
}

export interface BatchRequest {
  pairs?: RunPair[];
  categories?: string[];
  locations?: string[];
  limit: number;
}

export interface BatchTotals extends RunCounts {
  fetched: number;
  newCount: number;
  updatedCount: number;
}

export interface FailedPair extends RunPair {
  runId: string | null;
  error: string | null;
}

export interface BatchSummary {
  runs: RunSummary[];
  pairsProcessed: number;
  failedPairs: FailedPair[];
  totals: BatchTotals;
  startedAt: Date;
  completedAt: Date;
}
