import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../src/errors';
import { MatchHistory, Matcher } from '../src/matching/matcher';
import { ctx, makeJob, makeUser, vectorWithSimilarity } from './fakes/fakes';

class SetHistory implements MatchHistory {
  readonly checked: string[] = [];

  constructor(private recorded: Set<string> = new Set()) {}

  async hasMatch(userId: number, jobId: string): Promise<boolean> {
    this.checked.push(jobId);
    return this.recorded.has(`${userId}:${jobId}`);
  }
}

describe('Matcher', () => {
  const user = makeUser({ cvVector: [1, 0] });

  it('defaults the threshold to 0.70', () => {
    expect(new Matcher(new SetHistory()).threshold).toBe(0.7);
  });

  it('emits one intent for a 0.85 similarity pair', async () => {
    const matcher = new Matcher(new SetHistory(), { threshold: 0.7 });
    const job = makeJob('job-a', vectorWithSimilarity(0.85));

    const outcome = await matcher.match(user, [job], ctx);

    expect(outcome.intents).toHaveLength(1);
    expect(outcome.intents[0].job.id).toBe('job-a');
    expect(outcome.intents[0].userId).toBe(1);
    expect(outcome.intents[0].score).toBeCloseTo(0.85, 10);
  });

  it('emits nothing for a 0.65 similarity pair', async () => {
    const matcher = new Matcher(new SetHistory(), { threshold: 0.7 });

    const outcome = await matcher.match(user, [makeJob('job-a', vectorWithSimilarity(0.65))], ctx);

    expect(outcome.intents).toEqual([]);
    expect(outcome.belowThreshold).toBe(1);
  });

  it('retains a pair whose score equals the threshold', async () => {
    const matcher = new Matcher(new SetHistory(), { threshold: 1 });

    const outcome = await matcher.match(user, [makeJob('job-a', [3, 0])], ctx);

    expect(outcome.intents.map(i => i.job.id)).toEqual(['job-a']);
  });

  it('orders intents by descending score', async () => {
    const matcher = new Matcher(new SetHistory());
    const jobs = [makeJob('job-90', vectorWithSimilarity(0.9)), makeJob('job-95', vectorWithSimilarity(0.95))];

    const outcome = await matcher.match(user, jobs, ctx);

    expect(outcome.intents.map(i => i.job.id)).toEqual(['job-95', 'job-90']);
  });

  it('breaks score ties by job id ascending', async () => {
    const matcher = new Matcher(new SetHistory());
    const jobs = [
      makeJob('job-c', [2, 0]),
      makeJob('job-a', [5, 0]),
      makeJob('job-b', [1, 0]),
    ];

    const outcome = await matcher.match(user, jobs, ctx);

    expect(outcome.intents.map(i => i.job.id)).toEqual(['job-a', 'job-b', 'job-c']);
  });

  it('skips a dimension mismatch without failing the batch', async () => {
    const matcher = new Matcher(new SetHistory());
    const jobs = Array.from({ length: 10 }, (_, i) =>
      makeJob(`job-${i}`, i === 4 ? [1, 0, 0] : vectorWithSimilarity(0.5 + i * 0.05))
    );

    const outcome = await matcher.match(user, jobs, ctx);

    expect(outcome.skipped).toEqual([
      { userId: 1, jobId: 'job-4', reason: 'Dimension mismatch: CV has 2, job has 3' },
    ]);
    // Nine pairs were scored: job-0..3 are below 0.70, job-5..9 are above
    expect(outcome.belowThreshold + outcome.intents.length).toBe(9);
    expect(outcome.belowThreshold).toBe(4);
    expect(outcome.intents.map(i => i.job.id)).toEqual(['job-9', 'job-8', 'job-7', 'job-6', 'job-5']);
  });

  it('skips all-zero job vectors', async () => {
    const matcher = new Matcher(new SetHistory());

    const outcome = await matcher.match(user, [makeJob('job-z', [0, 0]), makeJob('job-ok', [1, 0])], ctx);

    expect(outcome.skipped.map(s => s.jobId)).toEqual(['job-z']);
    expect(outcome.intents.map(i => i.job.id)).toEqual(['job-ok']);
  });

  it('does not emit pairs that were recorded since the candidates were loaded', async () => {
    const history = new SetHistory(new Set(['1:job-a']));
    const matcher = new Matcher(history);
    const jobs = [makeJob('job-a', [1, 0]), makeJob('job-b', [1, 0])];

    const outcome = await matcher.match(user, jobs, ctx);

    expect(outcome.intents.map(i => i.job.id)).toEqual(['job-b']);
    expect(outcome.alreadyMatched).toBe(1);
  });

  it('only consults the history for pairs above the threshold', async () => {
    const history = new SetHistory();
    const matcher = new Matcher(history);

    await matcher.match(user, [makeJob('low', vectorWithSimilarity(0.1)), makeJob('high', [1, 0])], ctx);

    expect(history.checked).toEqual(['high']);
  });

  it('is stable under positive scaling of the CV vector', async () => {
    const matcher = new Matcher(new SetHistory());
    const jobs = [makeJob('near', vectorWithSimilarity(0.72)), makeJob('far', vectorWithSimilarity(0.68))];

    const small = await matcher.match(makeUser({ cvVector: [0.001, 0] }), jobs, ctx);
    const large = await matcher.match(makeUser({ cvVector: [1000, 0] }), jobs, ctx);

    expect(small.intents.map(i => i.job.id)).toEqual(['near']);
    expect(large.intents.map(i => i.job.id)).toEqual(['near']);
  });

  it.each([-0.1, 1.5, Number.NaN])('rejects threshold %s as a configuration error', threshold => {
    expect(() => new Matcher(new SetHistory(), { threshold })).toThrow(ConfigurationError);
  });
});
