import Parser from 'rss-parser';
import { JobSource } from './base';
import { RawPosting } from '../types/job';
import { logger } from '../utils/logger';
import { stripHtml } from '../utils/text';

type WwrFeed = {
  title?: string;
};

type WwrItem = {
  region?: string;
};

/**
 * Parses "Company: Job Title", falling back to "Job Title - Company"
 */
export function splitWwrTitle(raw: string): { title: string; company: string } {
  const colonMatch = raw.match(/^(.+?):\s*(.+)$/);
  if (colonMatch) {
    return { company: colonMatch[1].trim(), title: colonMatch[2].trim() };
  }

  const dashMatch = raw.match(/^(.+?)\s+-\s+(.+)$/);
  if (dashMatch) {
    return { title: dashMatch[1].trim(), company: dashMatch[2].trim() };
  }

  return { title: raw.trim(), company: 'Unknown Company' };
}

/**
 * WeWorkRemotely RSS adapter
 * RSS Feed: https://weworkremotely.com/categories/remote-programming-jobs.rss
 */
export class WeWorkRemotelySource implements JobSource {
  readonly name = 'weworkremotely';
  private readonly parser: Parser<WwrFeed, WwrItem>;

  constructor(
    private readonly rssUrl = 'https://weworkremotely.com/categories/remote-programming-jobs.rss',
    timeoutMs = 15000
  ) {
    this.parser = new Parser<WwrFeed, WwrItem>({
      timeout: timeoutMs,
      customFields: {
        item: ['region'],
      },
    });
  }

  async fetchPostings(since: Date): Promise<RawPosting[]> {
    try {
      logger.info(`Fetching jobs from ${this.name} since ${since.toISOString()}`);

      const feed = await this.parser.parseURL(this.rssUrl);
      const postings: RawPosting[] = [];
      let skippedBeforeSince = 0;
      let skippedInvalid = 0;

      for (const item of feed.items) {
        if (!item.title || !item.link) {
          skippedInvalid++;
          logger.debug(`Skipping item with missing title or link`, {
            hasTitle: !!item.title,
            hasLink: !!item.link,
          });
          continue;
        }

        const postedAt = item.pubDate ? new Date(item.pubDate) : new Date();
        if (isNaN(postedAt.getTime())) {
          skippedInvalid++;
          logger.debug(`Invalid date for item: ${item.title}`, { pubDate: item.pubDate });
          continue;
        }

        if (postedAt < since) {
          skippedBeforeSince++;
          continue;
        }

        const { title, company } = splitWwrTitle(item.title);
        const description = stripHtml(item.content ?? item.contentSnippet ?? '');

        postings.push({
          listingId: item.guid,
          title,
          company,
          location: item.region?.trim() || 'Remote',
          description: description || title,
          url: item.link,
          source: this.name,
          postedAt,
        });
      }

      logger.info(`Fetched ${postings.length} jobs from ${this.name}`, {
        totalItems: feed.items.length,
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
}
