import { afterEach, describe, expect, it, vi } from 'vitest';
import { fetchReportDetail, parseDetail } from './detail.js';

const NARRATIVE_1 = 'On approach the pilot noticed the landing gear indication remained amber.';
const NARRATIVE_2 = 'The aircraft landed without further incident and the operator inspected the gear.';
const NARRATIVE_3 = 'A loose connector was found on the gear position sensor during that inspection.';
const NARRATIVE_4 = 'The operator has since added the connector to its scheduled maintenance checks.';
const NARRATIVE_5 = 'This fifth paragraph is long enough to qualify but comes after the first four.';

describe('parseDetail', () => {
  it('prefers the first h1 over the page title', () => {
    const page = parseDetail(`<html><head><title>Something else | ATSB</title></head>
      <body><h1>  Landing gear   issue involving Saab 340 </h1><h1>Second heading</h1></body></html>`);

    expect(page.title).toBe('Landing gear issue involving Saab 340');
  });

  it('falls back to the title element without the site suffix', () => {
    const page = parseDetail('<html><head><title>Fuel starvation involving Piper PA-28 | ATSB</title></head><body></body></html>');

    expect(page.title).toBe('Fuel starvation involving Piper PA-28');
  });

  it('separates words split by line breaks and inline elements', () => {
    const page = parseDetail(`<main>
      <h1>Collision with<br>terrain involving Cessna 172</h1>
      <p>The pilot reported a rough running<br>engine shortly after departure from the airfield.</p>
      <p><b>Short</b><i>text</i><br>here</p>
    </main>`);

    expect(page.title).toBe('Collision with terrain involving Cessna 172');
    expect(page.excerpt).toBe('The pilot reported a rough running engine shortly after departure from the airfield.');
  });

  it('counts the separating spaces toward the paragraph length', () => {
    // 20 + 20 characters, 41 once joined with a space
    const page = parseDetail(`<main><p>${'c'.repeat(20)}<br>${'d'.repeat(20)}</p></main>`);

    expect(page.excerpt).toBe(`${'c'.repeat(20)} ${'d'.repeat(20)}`);
  });

  it('returns an empty title when the page has no heading or title', () => {
    expect(parseDetail('<html><body><p>Nothing here</p></body></html>').title).toBe('');
  });

  it('keeps the first four paragraphs longer than 40 characters from main', () => {
    const page = parseDetail(`<html><body>
      <p>Outside main: ${NARRATIVE_5}</p>
      <main>
        <p>Photo: ATSB</p>
        <p>${NARRATIVE_1}</p>
        <p>${'a'.repeat(40)}</p>
        <p>${NARRATIVE_2}</p>
        <p>${NARRATIVE_3}</p>
        <p>${NARRATIVE_4}</p>
        <p>${NARRATIVE_5}</p>
      </main>
    </body></html>`);

    expect(page.excerpt).toBe([NARRATIVE_1, NARRATIVE_2, NARRATIVE_3, NARRATIVE_4].join('\n\n'));
  });

  it('keeps a paragraph of 41 characters', () => {
    const page = parseDetail(`<main><p>${'b'.repeat(41)}</p></main>`);

    expect(page.excerpt).toBe('b'.repeat(41));
  });

  it('reads the whole document when there is no main element', () => {
    const page = parseDetail(`<html><body><div><p>  ${NARRATIVE_1}\n  </p></div></body></html>`);

    expect(page.excerpt).toBe(NARRATIVE_1);
  });

  it('returns an empty excerpt when no paragraph qualifies', () => {
    expect(parseDetail('<main><p>Short</p><p>Figure 1</p></main>').excerpt).toBe('');
  });
});

describe('fetchReportDetail', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches and parses a report page', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(`<main><h1>Airprox near Bankstown</h1><p>${NARRATIVE_1}</p></main>`)));

    await expect(fetchReportDetail('https://www.atsb.gov.au/r/1')).resolves.toEqual({
      title: 'Airprox near Bankstown',
      excerpt: NARRATIVE_1
    });
  });
});
