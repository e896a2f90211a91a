/**
 * Explicit per-run context threaded through every stage
 */
export interface RunContext {
  runId: string;
  startedAt: Date;
}

export type RunStatus = 'completed' | 'completed_with_skips';

export interface SourceStats {
  fetched: number;
  filtered: number;
  errors: number;
}

export interface RunReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  status: RunStatus;
  sources: Record<string, SourceStats>;
  jobsFetched: number;
  jobsStored: number;
  duplicates: number;
  embeddingFailures: number;
  insertFailures: number;
  usersProcessed: number;
  userFailures: number;
  matchesFound: number;
  skippedPairs: number;
  emailsSent: number;
  deliveryFailures: number;
  recordsPersisted: number;
  recordsAlreadyPresent: number;
  persistFailures: number;
}
