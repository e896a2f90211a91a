import fetch from 'node-fetch';
import { z } from 'zod';
import { JobSource } from './base';
import { RawPosting } from '../types/job';
import { logger } from '../utils/logger';
import { stripHtml } from '../utils/text';

const RemoteOKJobSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  position: z.string().min(1),
  company: z.string().min(1),
  url: z.string().url().optional(),
  apply_url: z.string().url().optional(),
  location: z.string().optional().default(''),
  description: z.string().optional().default(''),
  tags: z.array(z.string()).optional().default([]),
  date: z.string(),
});

type RemoteOKJob = z.infer<typeof RemoteOKJobSchema>;

/**
 * RemoteOK API adapter
 * API Documentation: https://remoteok.com/api
 */
export class RemoteOKSource implements JobSource {
  readonly name = 'remoteok';

  constructor(
    private readonly apiUrl = 'https://remoteok.com/api',
    private readonly timeoutMs = 15000
  ) {}

  async fetchPostings(since: Date): Promise<RawPosting[]> {
    try {
      logger.info(`Fetching jobs from ${this.name} since ${since.toISOString()}`);

      const response = await fetch(this.apiUrl, {
        headers: { 'User-Agent': 'cv-job-alerts/1.0' },
        timeout: this.timeoutMs,
      });
      if (!response.ok) {
        throw new Error(`RemoteOK API returned ${response.status}`);
      }

      const data: unknown = await response.json();
      if (!Array.isArray(data)) {
        logger.warn(`RemoteOK API returned non-array data: ${typeof data}`);
        return [];
      }

      const postings: RawPosting[] = [];
      let skippedBeforeSince = 0;
      let skippedInvalid = 0;

      for (const item of data) {
        // The first element is a legal notice, not a job
        const parsed = RemoteOKJobSchema.safeParse(item);
        if (!parsed.success) {
          skippedInvalid++;
          continue;
        }

        const postedAt = new Date(parsed.data.date);
        if (isNaN(postedAt.getTime())) {
          skippedInvalid++;
          logger.warn(`Invalid date format for job, skipping`, { jobId: parsed.data.id, date: parsed.data.date });
          continue;
        }

        if (postedAt < since) {
          skippedBeforeSince++;
          continue;
        }

        postings.push(this.normalize(parsed.data, postedAt));
      }

      logger.info(`Fetched ${postings.length} jobs from ${this.name}`, {
        totalItems: data.length,
        normalized: postings.length,
        skippedBeforeSince,
        skippedInvalid,
        sinceDate: since.toISOString(),
      });
      return postings;
    } catch (error) {
      logger.error(`Error fetching jobs from ${this.name}`, error);
      throw error;
    }
  }

  private normalize(job: RemoteOKJob, postedAt: Date): RawPosting {
    const description = stripHtml(job.description);
    const tags = job.tags.length > 0 ? `\nTags: ${job.tags.join(', ')}` : '';

    return {
      listingId: job.id,
      title: job.position.trim(),
      company: job.company.trim(),
      location: job.location.trim() || 'Remote',
      description: `${description}${tags}`.trim() || job.position.trim(),
      url: job.url ?? job.apply_url ?? `https://remoteok.com/remote-jobs/${job.id}`,
      source: this.name,
      postedAt,
    };
  }
}
