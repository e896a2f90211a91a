import { RawPosting } from '../types/job';
import { Config } from '../config';
import { logger } from '../utils/logger';

export type JobFilterOptions = Pick<Config, 'jobQueryKeywords' | 'jobExcludedKeywords' | 'jobLocations'>;

/**
 * Filters postings based on configuration
 * Empty lists disable the corresponding check
 */
export class JobFilter {
  constructor(private options: JobFilterOptions) {}

  /**
   * Checks if a posting matches the configured filters
   */
  matches(posting: RawPosting): boolean {
    // Query keywords: at least one must match
    if (this.options.jobQueryKeywords.length > 0) {
      const text = `${posting.title} ${posting.company} ${posting.description}`.toLowerCase();
      const hasKeyword = this.options.jobQueryKeywords.some(keyword =>
        text.includes(keyword.toLowerCase())
      );
      if (!hasKeyword) {
        logger.debug(`Job filtered out: no matching keywords`, { job: posting.title });
        return false;
      }
    }

    // Excluded keywords: none may match
    if (this.options.jobExcludedKeywords.length > 0) {
      const text = `${posting.title} ${posting.company}`.toLowerCase();
      const hasExcluded = this.options.jobExcludedKeywords.some(keyword =>
        text.includes(keyword.toLowerCase())
      );
      if (hasExcluded) {
        logger.debug(`Job filtered out: contains excluded keyword`, { job: posting.title });
        return false;
      }
    }

    if (this.options.jobLocations.length > 0) {
      const location = posting.location.toLowerCase();
      const matchesLocation = this.options.jobLocations.some(wanted =>
        location.includes(wanted.toLowerCase())
      );
      if (!matchesLocation) {
        logger.debug(`Job filtered out: location mismatch`, { job: posting.title, location: posting.location });
        return false;
      }
    }

    return true;
  }

  filter(postings: RawPosting[]): RawPosting[] {
    return postings.filter(posting => this.matches(posting));
  }
}
