import { PoolClient } from 'pg';
import { IdentifiedPosting, JobPosting } from '../types/job';
import { logger } from '../utils/logger';
import { truncateText } from '../utils/text';

interface JobRow {
  id: string;
  listing_id: string | null;
  title: string;
  company: string;
  location: string;
  description: string;
  url: string;
  source: string;
  posted_at: Date;
  vector: number[];
  first_seen_at: Date;
}

function toJobPosting(row: JobRow): JobPosting {
  return {
    id: row.id,
    listingId: row.listing_id ?? undefined,
    title: row.title,
    company: row.company,
    location: row.location,
    description: row.description,
    url: row.url,
    source: row.source,
    postedAt: new Date(row.posted_at),
    vector: row.vector,
    firstSeenAt: new Date(row.first_seen_at),
  };
}

// Widths of the VARCHAR columns in job_postings
export const JOB_COLUMN_LIMITS = {
  listingId: 255,
  title: 500,
  company: 255,
  location: 255,
  source: 50,
} as const;

// PostgreSQL text columns reject NUL characters
const NUL = /\u0000/g;

function fit(value: string, maxLength?: number): string {
  const clean = value.replace(NUL, '');
  return maxLength === undefined ? clean : truncateText(clean, maxLength);
}

/**
 * Trims scraped fields so the row fits the job_postings columns
 */
export function fitJobToColumns(posting: IdentifiedPosting): IdentifiedPosting {
  return {
    ...posting,
    listingId: posting.listingId === undefined ? undefined : fit(posting.listingId, JOB_COLUMN_LIMITS.listingId),
    title: fit(posting.title, JOB_COLUMN_LIMITS.title),
    company: fit(posting.company, JOB_COLUMN_LIMITS.company),
    location: fit(posting.location, JOB_COLUMN_LIMITS.location),
    description: fit(posting.description),
    url: fit(posting.url),
    source: fit(posting.source, JOB_COLUMN_LIMITS.source),
  };
}

/**
 * Database operations for job postings
 * Postings are immutable; the id primary key makes re-scrapes idempotent
 */
export class JobsRepository {
  async findExistingIds(client: PoolClient, ids: string[]): Promise<Set<string>> {
    if (ids.length === 0) return new Set();

    const result = await client.query<{ id: string }>(
      `SELECT id FROM job_postings WHERE id = ANY($1::varchar[])`,
      [ids]
    );
    return new Set(result.rows.map(row => row.id));
  }

  /**
   * Inserts a posting if its id is new
   * Returns true if inserted, false if it already existed
   */
  async insertJobIfNotExists(client: PoolClient, job: JobPosting): Promise<boolean> {
    try {
      const result = await client.query(
        `INSERT INTO job_postings (
          id, listing_id, title, company, location, description, url, source,
          posted_at, vector, first_seen_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
        ON CONFLICT (id) DO NOTHING
        RETURNING id`,
        [
          job.id,
          job.listingId ?? null,
          job.title,
          job.company,
          job.location,
          job.description,
          job.url,
          job.source,
          job.postedAt,
          job.vector,
          job.firstSeenAt,
        ]
      );

      return result.rows.length > 0;
    } catch (error) {
      logger.error(`Error inserting job posting`, error, { id: job.id, title: job.title });
      throw error;
    }
  }

  /**
   * Postings first seen since `since` that the user has not been notified about
   */
  async getCandidateJobsForUser(
    client: PoolClient,
    userId: number,
    since: Date
  ): Promise<JobPosting[]> {
    const result = await client.query<JobRow>(
      `SELECT
        j.id, j.listing_id, j.title, j.company, j.location, j.description, j.url,
        j.source, j.posted_at, j.vector, j.first_seen_at
      FROM job_postings j
      WHERE j.first_seen_at >= $2
        AND NOT EXISTS (
          SELECT 1 FROM match_records m
          WHERE m.user_id = $1 AND m.job_id = j.id
        )
      ORDER BY j.first_seen_at DESC, j.id ASC`,
      [userId, since]
    );

    return result.rows.map(toJobPosting);
  }
}
