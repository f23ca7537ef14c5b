import { afterEach, describe, expect, it, vi } from 'vitest';
import * as cheerio from 'cheerio';
import { absolutize, clean, fetchHtml, parseArgs, parseLimit, spacedText } from './utils.js';

describe('clean', () => {
  it('collapses whitespace runs and trims', () => {
    expect(clean('  a\n\tb  ')).toBe('a b');
  });

  it('treats missing text as empty', () => {
    expect(clean(null)).toBe('');
    expect(clean(undefined)).toBe('');
  });
});

describe('spacedText', () => {
  it('joins descendant text nodes with single spaces', () => {
    const $ = cheerio.load('<div id="x">  one<br>two <span>three</span><em>four</em>\n <!-- note --> </div>');

    expect(spacedText($, $('#x'))).toBe('one two three four');
  });

  it('returns an empty string for an empty selection', () => {
    const $ = cheerio.load('<div></div>');

    expect(spacedText($, $('p'))).toBe('');
  });
});

describe('absolutize', () => {
  it('resolves site-relative links', () => {
    expect(absolutize('/publications/investigation_reports/2024/aair/ao-2024-001', 'https://www.atsb.gov.au'))
      .toBe('https://www.atsb.gov.au/publications/investigation_reports/2024/aair/ao-2024-001');
  });

  it('leaves absolute links alone', () => {
    expect(absolutize('https://example.test/a', 'https://www.atsb.gov.au')).toBe('https://example.test/a');
  });
});

describe('parseArgs', () => {
  it('reads --key value, --key=value and bare flags', () => {
    expect(parseArgs(['--limit', '5', '--verbose', '--out=dir'])).toEqual({
      limit: '5',
      verbose: true,
      out: 'dir'
    });
  });
});

describe('parseLimit', () => {
  it('falls back to the default when absent', () => {
    expect(parseLimit(undefined, 10)).toBe(10);
  });

  it('accepts positive integers', () => {
    expect(parseLimit('25', 10)).toBe(25);
  });

  it.each([['0'], ['-3'], ['abc'], ['2.5']])('rejects %s', (value) => {
    expect(() => parseLimit(value, 10)).toThrow('--limit must be a positive integer');
  });

  it('rejects a flag with no value', () => {
    expect(() => parseLimit(true, 10)).toThrow('--limit must be a positive integer (got true)');
  });
});

describe('fetchHtml', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the response body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<p>ok</p>', { status: 200 })));
    await expect(fetchHtml('https://example.test/page')).resolves.toBe('<p>ok</p>');
  });

  it('throws on a non-2xx status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404, statusText: 'Not Found' })));
    await expect(fetchHtml('https://example.test/missing'))
      .rejects.toThrow('HTTP error for https://example.test/missing: 404 Not Found');
  });
});
