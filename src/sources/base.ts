import { RawPosting } from '../types/job';

/**
 * A job board adapter. Listings come back as RawPosting; transport and
 * payload failures are thrown and the fetcher isolates them per source.
 */
export interface JobSource {
  /** Stable source key, hashed into every posting id */
  readonly name: string;

  fetchPostings(since: Date): Promise<RawPosting[]>;
}
