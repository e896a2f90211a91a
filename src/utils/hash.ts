import { createHash } from 'crypto';
import { RawPosting } from '../types/job';

/**
 * Generates a stable identifier for a posting based on:
 * - source
 * - listing id (or the URL when the source has none)
 *
 * The same listing re-scraped on a later run gets the same id
 */
export function generateJobId(posting: Pick<RawPosting, 'source' | 'listingId' | 'url'>): string {
  const key = posting.listingId?.trim() || normalizeUrl(posting.url);
  const hashInput = `${posting.source.toLowerCase().trim()}|${key}`;
  return createHash('sha256').update(hashInput).digest('hex');
}

function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  try {
    const parsed = new URL(trimmed);
    parsed.hash = '';
    return parsed.toString().replace(/\/$/, '');
  } catch {
    return trimmed;
  }
}
