import { PoolClient } from 'pg';
import { MatchRecord, MatchRecordWithJob } from '../types/match';
import { logger } from '../utils/logger';
import { translateUniqueViolation } from './errors';

interface MatchRow {
  user_id: number;
  job_id: string;
  score: number;
  notified_at: Date;
  run_id: string;
  title: string;
  company: string;
  url: string;
}

/**
 * Database operations for match records
 * The (user_id, job_id) primary key guarantees one notification per pair, ever
 */
export class MatchesRepository {
  /**
   * Appends a match record. A record for the same pair raises StoreConstraintViolation.
   */
  async insertMatch(client: PoolClient, record: MatchRecord): Promise<void> {
    try {
      await client.query(
        `INSERT INTO match_records (user_id, job_id, score, notified_at, run_id)
         VALUES ($1, $2, $3, $4, $5)`,
        [record.userId, record.jobId, record.score, record.notifiedAt, record.runId]
      );
    } catch (error) {
      const translated = translateUniqueViolation(error, 'match_records_user_job_key');
      if (translated === error) {
        logger.error(`Error inserting match record`, error, {
          userId: record.userId,
          jobId: record.jobId,
        });
      }
      throw translated;
    }
  }

  async exists(client: PoolClient, userId: number, jobId: string): Promise<boolean> {
    const result = await client.query(
      `SELECT 1 FROM match_records WHERE user_id = $1 AND job_id = $2`,
      [userId, jobId]
    );
    return result.rows.length > 0;
  }

  async listForUser(client: PoolClient, userId: number): Promise<MatchRecordWithJob[]> {
    const result = await client.query<MatchRow>(
      `SELECT m.user_id, m.job_id, m.score, m.notified_at, m.run_id, j.title, j.company, j.url
       FROM match_records m
       JOIN job_postings j ON j.id = m.job_id
       WHERE m.user_id = $1
       ORDER BY m.notified_at DESC, m.score DESC`,
      [userId]
    );

    return result.rows.map(row => ({
      userId: row.user_id,
      jobId: row.job_id,
      score: row.score,
      notifiedAt: new Date(row.notified_at),
      runId: row.run_id,
      job: { title: row.title, company: row.company, url: row.url },
    }));
  }
}
