import { Embedder } from '../embeddings/embedder';
import { fitJobToColumns } from '../db/jobs';
import { JobStore } from '../db/store';
import { EmbeddingServiceError } from '../errors';
import { IdentifiedPosting, JobPosting } from '../types/job';
import { RunContext } from '../types/run';
import { logger } from '../utils/logger';

export interface IngestionStats {
  received: number;
  duplicates: number;
  stored: number;
  embeddingFailures: number;
  /** Postings the store refused; logged and skipped */
  insertFailures: number;
  storedIds: string[];
}

export function jobEmbeddingText(posting: Pick<IdentifiedPosting, 'title' | 'description'>): string {
  return `${posting.title} ${posting.description}`;
}

/**
 * Embeds and stores postings the store has not seen yet.
 * Known ids are ignored, so re-scraped listings are never reprocessed.
 */
export class JobIngestionService {
  constructor(
    private store: JobStore,
    private embedder: Embedder
  ) {}

  async ingest(postings: IdentifiedPosting[], ctx: RunContext): Promise<IngestionStats> {
    const stats: IngestionStats = {
      received: postings.length,
      duplicates: 0,
      stored: 0,
      embeddingFailures: 0,
      insertFailures: 0,
      storedIds: [],
    };

    if (postings.length === 0) {
      return stats;
    }

    const existing = await this.store.findExistingJobIds(postings.map(p => p.id));

    for (const identified of postings) {
      if (existing.has(identified.id)) {
        stats.duplicates++;
        continue;
      }

      const posting = fitJobToColumns(identified);
      let vector: number[];
      try {
        vector = await this.embedder.embed(jobEmbeddingText(posting));
      } catch (error) {
        if (!(error instanceof EmbeddingServiceError)) throw error;
        stats.embeddingFailures++;
        logger.warn(`Skipping posting, embedding failed`, {
          runId: ctx.runId,
          jobId: posting.id,
          title: posting.title,
          error: error.message,
        });
        continue;
      }

      const job: JobPosting = { ...posting, vector, firstSeenAt: ctx.startedAt };
      let inserted: boolean;
      try {
        inserted = await this.store.insertJob(job);
      } catch (error) {
        stats.insertFailures++;
        logger.error(`Skipping posting, insert failed`, error, { runId: ctx.runId, jobId: job.id });
        continue;
      }

      if (inserted) {
        stats.stored++;
        stats.storedIds.push(job.id);
      } else {
        // Another run stored it between our lookup and insert
        stats.duplicates++;
      }
    }

    logger.info(`Ingestion complete`, {
      runId: ctx.runId,
      total: stats.received,
      stored: stats.stored,
      duplicates: stats.duplicates,
      embeddingFailures: stats.embeddingFailures,
      insertFailures: stats.insertFailures,
    });

    return stats;
  }
}
