import { describe, expect, it } from 'vitest';
import { generateJobId } from '../src/utils/hash';
import { extractTextFromPDF } from '../src/utils/pdf-extraction';
import { cleanText, escapeHtml, stripHtml, truncateText } from '../src/utils/text';

describe('generateJobId', () => {
  it('is stable for the same source and listing id', () => {
    const a = generateJobId({ source: 'remoteok', listingId: '42', url: 'https://a.example.com/1' });
    const b = generateJobId({ source: 'RemoteOK ', listingId: ' 42', url: 'https://b.example.com/2' });

    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('differs across sources', () => {
    const a = generateJobId({ source: 'remoteok', listingId: '42', url: 'https://a.example.com/1' });
    const b = generateJobId({ source: 'weworkremotely', listingId: '42', url: 'https://a.example.com/1' });

    expect(a).not.toBe(b);
  });

  it('falls back to the URL without fragment or trailing slash', () => {
    const a = generateJobId({ source: 'weworkremotely', url: 'https://jobs.example.com/role/' });
    const b = generateJobId({ source: 'weworkremotely', listingId: '', url: 'https://jobs.example.com/role#apply' });

    expect(a).toBe(b);
  });
});

describe('text helpers', () => {
  it('collapses whitespace and drops decorative symbols', () => {
    expect(cleanText('  Senior   Engineer ★★\n\nC# & Node.js  ')).toBe('Senior Engineer C# & Node.js');
  });

  it('truncates to the given length', () => {
    expect(truncateText('abcdef', 4)).toBe('abcd');
    expect(truncateText('abc', 4)).toBe('abc');
  });

  it('reduces HTML to text', () => {
    expect(stripHtml('<p>Hello&nbsp;<b>world</b></p><script>x()</script><ul><li>One &amp; two</li></ul>')).toBe(
      'Hello world\nOne & two'
    );
  });

  it('escapes HTML special characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;'
    );
  });
});

describe('extractTextFromPDF', () => {
  it('loads pdfjs and rejects bytes that are not a PDF', async () => {
    await expect(extractTextFromPDF(new TextEncoder().encode('plain text, not a PDF'))).rejects.toThrow(
      'Invalid PDF structure'
    );
  });
});
