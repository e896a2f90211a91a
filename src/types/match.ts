import { JobPosting } from './job';

/**
 * A computed but not yet delivered notification for one (user, job) pair
 */
export interface MatchIntent {
  userId: number;
  job: JobPosting;
  score: number;
}

/**
 * Proof that a user was notified of a job. Append-only; at most one per (user, job).
 */
export interface MatchRecord {
  userId: number;
  jobId: string;
  score: number;
  notifiedAt: Date;
  runId: string;
}

export interface MatchRecordWithJob extends MatchRecord {
  job: {
    title: string;
    company: string;
    url: string;
  };
}

export interface SkippedPair {
  userId: number;
  jobId: string;
  reason: string;
}
