/**
 * Read the title and a short narrative excerpt from a report page
 */

import * as cheerio from 'cheerio';
import { MAX_EXCERPT_PARAGRAPHS, MIN_PARAGRAPH_LENGTH, SITE_NAME_SUFFIX } from './config.js';
import { clean, fetchHtml, spacedText } from './utils.js';
import type { DetailPage } from './types.js';

function stripSiteSuffix(title: string): string {
  return title.endsWith(SITE_NAME_SUFFIX) ? title.slice(0, -SITE_NAME_SUFFIX.length) : title;
}

/**
 * Page title from the first h1, falling back to <title>.
 * Empty when the page has neither.
 */
export function extractTitle($: cheerio.CheerioAPI): string {
  const heading = $('h1').first();
  const raw = spacedText($, heading.length > 0 ? heading : $('title').first());
  return clean(stripSiteSuffix(raw));
}

/**
 * First few substantial paragraphs of the main content, blank-line separated
 */
export function extractExcerpt($: cheerio.CheerioAPI): string {
  const main = $('main').first();
  const paragraphs = (main.length > 0 ? main.find('p') : $('p'))
    .toArray()
    .map(p => spacedText($, $(p)))
    .filter(text => text.length > MIN_PARAGRAPH_LENGTH);

  return paragraphs.slice(0, MAX_EXCERPT_PARAGRAPHS).join('\n\n');
}

export function parseDetail(html: string): DetailPage {
  const $ = cheerio.load(html);
  return {
    title: extractTitle($),
    excerpt: extractExcerpt($)
  };
}

/**
 * Fetch a report page and extract its title and excerpt
 */
export async function fetchReportDetail(url: string): Promise<DetailPage> {
  const html = await fetchHtml(url);
  return parseDetail(html);
}
