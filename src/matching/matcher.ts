import { assertThreshold, DEFAULT_SIMILARITY_THRESHOLD } from '../config';
import { InvalidVectorError } from '../errors';
import { JobPosting } from '../types/job';
import { MatchIntent, SkippedPair } from '../types/match';
import { RunContext } from '../types/run';
import { MatchableUser } from '../types/user';
import { logger } from '../utils/logger';
import { matchScore } from './similarity';

/**
 * Read-only view of sent notifications the matcher needs for its idempotence guard
 */
export interface MatchHistory {
  hasMatch(userId: number, jobId: string): Promise<boolean>;
}

export interface MatcherOptions {
  threshold?: number;
}

export interface MatchOutcome {
  /** Ordered by descending score, ties by job id ascending */
  intents: MatchIntent[];
  skipped: SkippedPair[];
  belowThreshold: number;
  alreadyMatched: number;
}

/**
 * Decides which postings a user should be notified about.
 * Never writes to the store; the caller owns send + persist.
 */
export class Matcher {
  readonly threshold: number;

  constructor(
    private history: MatchHistory,
    options: MatcherOptions = {}
  ) {
    const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    assertThreshold(threshold);
    this.threshold = threshold;
  }

  async match(user: MatchableUser, candidates: JobPosting[], ctx: RunContext): Promise<MatchOutcome> {
    const skipped: SkippedPair[] = [];
    const aboveThreshold: MatchIntent[] = [];
    let belowThreshold = 0;

    for (const job of candidates) {
      let score: number;
      try {
        score = matchScore(user.cvVector, job.vector);
      } catch (error) {
        if (!(error instanceof InvalidVectorError)) throw error;
        skipped.push({ userId: user.id, jobId: job.id, reason: error.message });
        logger.warn(`Skipping pair with invalid vector`, {
          runId: ctx.runId,
          userId: user.id,
          jobId: job.id,
          reason: error.message,
        });
        continue;
      }

      if (score >= this.threshold) {
        aboveThreshold.push({ userId: user.id, job, score });
      } else {
        belowThreshold++;
      }
    }

    // Candidates may come from a stale snapshot; re-check before emitting
    const intents: MatchIntent[] = [];
    let alreadyMatched = 0;
    for (const intent of aboveThreshold) {
      if (await this.history.hasMatch(user.id, intent.job.id)) {
        alreadyMatched++;
        logger.debug(`Match already recorded, not emitting`, {
          runId: ctx.runId,
          userId: user.id,
          jobId: intent.job.id,
        });
        continue;
      }
      intents.push(intent);
    }

    intents.sort(compareIntents);

    logger.info(`Matched user ${user.id}`, {
      runId: ctx.runId,
      candidates: candidates.length,
      intents: intents.length,
      belowThreshold,
      alreadyMatched,
      skipped: skipped.length,
    });

    return { intents, skipped, belowThreshold, alreadyMatched };
  }
}

export function compareIntents(a: MatchIntent, b: MatchIntent): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.job.id < b.job.id) return -1;
  if (a.job.id > b.job.id) return 1;
  return 0;
}
