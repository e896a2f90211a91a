import { JobSource } from '../sources/base';
import { IdentifiedPosting } from '../types/job';
import { RunContext, SourceStats } from '../types/run';
import { JobFilter, JobFilterOptions } from '../filters/job-filter';
import { generateJobId } from '../utils/hash';
import { logger } from '../utils/logger';

export interface JobFetcherOptions extends JobFilterOptions {
  maxJobsPerSource: number;
}

/**
 * Orchestrates job fetching from all sources
 */
export class JobFetcherService {
  private filter: JobFilter;

  constructor(
    private sources: JobSource[],
    private options: JobFetcherOptions
  ) {
    this.filter = new JobFilter(options);
  }

  /**
   * Fetches postings from all sources.
   * Returns filtered postings with stable ids, duplicates within the batch removed.
   */
  async fetchAll(since: Date, ctx: RunContext): Promise<{
    postings: IdentifiedPosting[];
    stats: Record<string, SourceStats>;
  }> {
    const stats: Record<string, SourceStats> = {};
    const byId = new Map<string, IdentifiedPosting>();

    for (const source of this.sources) {
      const sourceStats: SourceStats = { fetched: 0, filtered: 0, errors: 0 };

      try {
        logger.info(`Fetching from source: ${source.name}`, { runId: ctx.runId });

        const raw = await source.fetchPostings(since);
        sourceStats.fetched = raw.length;

        const limited = raw.slice(0, this.options.maxJobsPerSource);
        const filtered = this.filter.filter(limited);
        sourceStats.filtered = filtered.length;

        for (const posting of filtered) {
          const id = generateJobId(posting);
          if (!byId.has(id)) {
            byId.set(id, { ...posting, id });
          }
        }

        logger.info(`Source ${source.name} completed`, {
          runId: ctx.runId,
          fetched: sourceStats.fetched,
          afterLimit: limited.length,
          filtered: sourceStats.filtered,
          filteredOut: limited.length - filtered.length,
        });
      } catch (error) {
        sourceStats.errors = 1;
        logger.error(`Source ${source.name} failed`, error, { runId: ctx.runId });
        // Isolated failure: other sources still run
      }

      stats[source.name] = sourceStats;
    }

    return { postings: [...byId.values()], stats };
  }
}
