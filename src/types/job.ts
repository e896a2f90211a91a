/**
 * Raw posting as produced by a job source (before embedding)
 * All job sources must normalize to this structure
 */
export interface RawPosting {
  /** Listing identifier on the source site, when the source exposes one */
  listingId?: string;
  title: string;
  company: string;
  location: string;
  description: string;
  url: string;
  source: string;
  postedAt: Date;
}

/**
 * Raw posting with its stable identifier
 */
export interface IdentifiedPosting extends RawPosting {
  id: string;
}

/**
 * Stored job posting. Immutable once created.
 */
export interface JobPosting extends IdentifiedPosting {
  vector: number[];
  firstSeenAt: Date;
}
