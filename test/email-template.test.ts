import { describe, expect, it } from 'vitest';
import { formatScore, generateEmailText, generateSubject, renderMatchEmail } from '../src/services/email-template';
import { MatchIntent } from '../src/types/match';
import { makeJob } from './fakes/fakes';

const intent: MatchIntent = {
  userId: 1,
  job: makeJob('job-a', [1, 0], {
    title: 'Engineer <Platform>',
    company: 'Acme & Co',
    location: 'Remote',
    url: 'https://jobs.example.com/a',
  }),
  score: 0.8534,
};

describe('email template', () => {
  it('formats scores as percentages', () => {
    expect(formatScore(0.8534)).toBe('85.3%');
    expect(formatScore(1)).toBe('100.0%');
  });

  it('pluralises the subject', () => {
    expect(generateSubject(1)).toBe('1 new job match for your CV');
    expect(generateSubject(3)).toBe('3 new job matches for your CV');
  });

  it('renders a plain-text body', () => {
    expect(generateEmailText('Ada', [intent])).toBe(
      [
        'Hi Ada,',
        '',
        'We found 1 new job matches for your CV:',
        '',
        '- Engineer <Platform> at Acme & Co (Remote) - match 85.3%',
        '  https://jobs.example.com/a',
      ].join('\n')
    );
  });

  it('escapes job fields in the HTML body', () => {
    const { html } = renderMatchEmail('Ada <admin>', [intent]);

    expect(html).toContain('Engineer &lt;Platform&gt;</h2>');
    expect(html).toContain('Acme &amp; Co &bull; Remote');
    expect(html).toContain('Hi Ada &lt;admin&gt;, we found 1 new job matching your CV.');
    expect(html).toContain('<a href="https://jobs.example.com/a"');
  });
});
