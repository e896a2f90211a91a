import { describe, expect, it } from 'vitest';
import { JobFilter } from '../src/filters/job-filter';
import { JobFetcherService } from '../src/services/job-fetcher';
import { generateJobId } from '../src/utils/hash';
import { StaticSource, ctx, makeRawPosting } from './fakes/fakes';

const noFilters = { jobQueryKeywords: [], jobExcludedKeywords: [], jobLocations: [] };
const since = new Date('2026-02-28T12:00:00Z');

describe('JobFilter', () => {
  const filter = new JobFilter({
    jobQueryKeywords: ['typescript'],
    jobExcludedKeywords: ['senior'],
    jobLocations: ['remote', 'berlin'],
  });

  it('keeps postings with a keyword and an accepted location', () => {
    expect(filter.matches(makeRawPosting({ location: 'Berlin, DE' }))).toBe(true);
  });

  it('drops postings without any keyword', () => {
    expect(filter.matches(makeRawPosting({ description: 'Build APIs in Go' }))).toBe(false);
  });

  it('drops postings with an excluded keyword in the title', () => {
    expect(filter.matches(makeRawPosting({ title: 'Senior Backend Engineer' }))).toBe(false);
  });

  it('drops postings outside the accepted locations', () => {
    expect(filter.matches(makeRawPosting({ location: 'Lagos' }))).toBe(false);
  });

  it('accepts everything when no filters are configured', () => {
    expect(new JobFilter(noFilters).filter([makeRawPosting(), makeRawPosting({ listingId: '2' })])).toHaveLength(2);
  });
});

describe('JobFetcherService', () => {
  it('isolates a failing source', async () => {
    const broken = new StaticSource('broken', new Error('HTTP 503'));
    const healthy = new StaticSource('healthy', [makeRawPosting({ source: 'healthy' })]);
    const fetcher = new JobFetcherService([broken, healthy], { maxJobsPerSource: 50, ...noFilters });

    const { postings, stats } = await fetcher.fetchAll(since, ctx);

    expect(postings).toHaveLength(1);
    expect(postings[0].id).toBe(generateJobId({ source: 'healthy', listingId: '100', url: '' }));
    expect(stats).toEqual({
      broken: { fetched: 0, filtered: 0, errors: 1 },
      healthy: { fetched: 1, filtered: 1, errors: 0 },
    });
  });

  it('removes duplicates within a batch', async () => {
    const source = new StaticSource('remoteok', [
      makeRawPosting({ listingId: '1', title: 'First copy' }),
      makeRawPosting({ listingId: '1', title: 'Second copy' }),
      makeRawPosting({ listingId: '2' }),
    ]);
    const fetcher = new JobFetcherService([source], { maxJobsPerSource: 50, ...noFilters });

    const { postings } = await fetcher.fetchAll(since, ctx);

    expect(postings.map(p => p.title)).toEqual(['First copy', 'Backend Engineer']);
  });

  it('applies the per-source limit before filtering', async () => {
    const source = new StaticSource(
      'remoteok',
      Array.from({ length: 5 }, (_, i) => makeRawPosting({ listingId: String(i) }))
    );
    const fetcher = new JobFetcherService([source], { maxJobsPerSource: 3, ...noFilters });

    const { postings, stats } = await fetcher.fetchAll(since, ctx);

    expect(postings.map(p => p.listingId)).toEqual(['0', '1', '2']);
    expect(stats.remoteok).toEqual({ fetched: 5, filtered: 3, errors: 0 });
  });
});
