import { Store } from '../db/store';
import { Embedder } from '../embeddings/embedder';
import { EmbeddingServiceError } from '../errors';
import { Matcher } from '../matching/matcher';
import { RunContext, RunReport } from '../types/run';
import { MatchableUser, User, hasCvVector } from '../types/user';
import { logger } from '../utils/logger';
import { JobFetcherService } from './job-fetcher';
import { JobIngestionService } from './job-ingestion';
import { NotificationDispatcher } from './notification-dispatcher';

export interface PipelineDeps {
  fetcher: JobFetcherService;
  ingestion: JobIngestionService;
  store: Store;
  embedder: Embedder;
  matcher: Matcher;
  dispatcher: NotificationDispatcher;
}

export interface PipelineOptions {
  /** How far back the source fetch reaches */
  fetchLookbackHours: number;
  /** How far back stored postings stay candidates for matching */
  matchLookbackHours: number;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * One batch run: fetch -> ingest -> per user match -> notify -> record
 * No single posting, pair or user failure aborts the run.
 */
export class PipelineRunner {
  constructor(
    private deps: PipelineDeps,
    private options: PipelineOptions
  ) {}

  async run(ctx: RunContext): Promise<RunReport> {
    const startTime = Date.now();
    logger.info('Pipeline run started', { runId: ctx.runId, startedAt: ctx.startedAt.toISOString() });

    const fetchSince = new Date(ctx.startedAt.getTime() - this.options.fetchLookbackHours * HOUR_MS);
    const { postings, stats: sources } = await this.deps.fetcher.fetchAll(fetchSince, ctx);
    const ingestion = await this.deps.ingestion.ingest(postings, ctx);

    const report: RunReport = {
      runId: ctx.runId,
      startedAt: ctx.startedAt.toISOString(),
      finishedAt: '',
      durationMs: 0,
      status: 'completed',
      sources,
      jobsFetched: postings.length,
      jobsStored: ingestion.stored,
      duplicates: ingestion.duplicates,
      embeddingFailures: ingestion.embeddingFailures,
      insertFailures: ingestion.insertFailures,
      usersProcessed: 0,
      userFailures: 0,
      matchesFound: 0,
      skippedPairs: 0,
      emailsSent: 0,
      deliveryFailures: 0,
      recordsPersisted: 0,
      recordsAlreadyPresent: 0,
      persistFailures: 0,
    };

    const candidateSince = new Date(ctx.startedAt.getTime() - this.options.matchLookbackHours * HOUR_MS);
    const users = await this.deps.store.listUsersWithCv();
    logger.info(`Found ${users.length} users with a CV`, { runId: ctx.runId });

    for (const user of users) {
      try {
        await this.processUser(user, candidateSince, ctx, report);
      } catch (error) {
        report.userFailures++;
        logger.error(`Failed to process user`, error, { runId: ctx.runId, userId: user.id });
      }
    }

    const finishedAt = new Date();
    report.finishedAt = finishedAt.toISOString();
    report.durationMs = Date.now() - startTime;
    report.status = hasSkips(report) ? 'completed_with_skips' : 'completed';

    logger.info('Pipeline run completed', { ...report, sources: undefined });
    return report;
  }

  private async processUser(user: User, since: Date, ctx: RunContext, report: RunReport): Promise<void> {
    const matchable = await this.ensureCvVector(user, ctx);
    if (!matchable) {
      report.embeddingFailures++;
      return;
    }

    report.usersProcessed++;
    const candidates = await this.deps.store.getCandidateJobsForUser(matchable.id, since);
    const outcome = await this.deps.matcher.match(matchable, candidates, ctx);
    report.skippedPairs += outcome.skipped.length;
    report.matchesFound += outcome.intents.length;

    if (outcome.intents.length === 0) {
      return;
    }

    const result = await this.deps.dispatcher.dispatch(matchable, outcome.intents, ctx);
    if (result.delivered) {
      report.emailsSent++;
    } else {
      report.deliveryFailures++;
    }
    report.recordsPersisted += result.recorded;
    report.recordsAlreadyPresent += result.alreadyRecorded;
    report.persistFailures += result.persistFailures;
  }

  /**
   * Users whose CV was stored without a vector get embedded here
   */
  private async ensureCvVector(user: User, ctx: RunContext): Promise<MatchableUser | null> {
    if (hasCvVector(user)) return user;
    if (!user.cvText) return null;

    try {
      const cvVector = await this.deps.embedder.embed(user.cvText);
      await this.deps.store.updateCvVector(user.id, cvVector);
      logger.info(`Embedded pending CV`, { runId: ctx.runId, userId: user.id });
      return { ...user, cvVector };
    } catch (error) {
      if (!(error instanceof EmbeddingServiceError)) throw error;
      logger.warn(`Skipping user, CV embedding failed`, {
        runId: ctx.runId,
        userId: user.id,
        error: error.message,
      });
      return null;
    }
  }
}

export function hasSkips(report: RunReport): boolean {
  const sourceErrors = Object.values(report.sources).some(stats => stats.errors > 0);
  return (
    sourceErrors ||
    report.embeddingFailures > 0 ||
    report.insertFailures > 0 ||
    report.skippedPairs > 0 ||
    report.userFailures > 0 ||
    report.deliveryFailures > 0 ||
    report.persistFailures > 0
  );
}

/**
 * Process exit status for a finished run: 0 clean, 2 when anything was skipped
 */
export function exitCodeFor(report: RunReport): number {
  return report.status === 'completed' ? 0 : 2;
}
