/**
 * Fetch the latest investigation reports from the ATSB listing page
 */

import * as cheerio from 'cheerio';
import { parse as parseDate, isValid } from 'date-fns';
import { DEFAULT_REPORT_LIMIT, LIST_URL, REPORT_LINK_PATH, SITE_BASE_URL } from './config.js';
import { absolutize, fetchHtml, spacedText } from './utils.js';
import type { ReportSummary } from './types.js';

// Link text carrying one of these is a report-number link, not a title link
const REPORT_CODE_MARKERS = ['AO-', 'AA-'];

const DATE_PATTERN = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

const DATE_CELL = 2;
const STATUS_CELL = 3;

/**
 * Parse a d/m/yyyy occurrence date, or null when the text is not one
 */
export function parseOccurrenceDate(text: string): Date | null {
  // date-fns reads "yyyy" from as few as one digit
  if (!DATE_PATTERN.test(text)) return null;

  const date = parseDate(text, 'd/M/yyyy', new Date());
  return isValid(date) ? date : null;
}

function isReportCode(linkText: string): boolean {
  const upper = linkText.toUpperCase();
  return REPORT_CODE_MARKERS.some(marker => upper.includes(marker));
}

/**
 * Read report summaries from the rows of a listing page, in page order
 */
export function parseListingRows(html: string, baseUrl: string = SITE_BASE_URL): ReportSummary[] {
  const $ = cheerio.load(html);
  const items: ReportSummary[] = [];

  $('table tbody tr').each((_, row) => {
    const links = $(row).find(`a[href*="${REPORT_LINK_PATH}"]`).toArray();
    if (links.length === 0) return;

    const titleLink = links.find(a => !isReportCode(spacedText($, $(a)))) ?? links[0];
    const codeLink = links[links.length - 1];

    const cells = $(row).find('td').toArray().map(td => spacedText($, $(td)));
    const dateText = cells[DATE_CELL] ?? '';
    const status = cells[STATUS_CELL] ?? '';

    const href = $(titleLink).attr('href');

    items.push({
      report_no: spacedText($, $(codeLink)),
      title: spacedText($, $(titleLink)),
      report_url: href ? absolutize(href, baseUrl) : '',
      occurrence_date: parseOccurrenceDate(dateText),
      occurrence_date_text: dateText,
      investigation_status: status
    });
  });

  return items;
}

/**
 * De-duplicate by report number (last row wins, first position kept)
 */
export function dedupeByReportNo(items: ReportSummary[]): ReportSummary[] {
  const reportMap = new Map<string, ReportSummary>();

  for (const item of items) {
    reportMap.set(item.report_no, item);
  }

  return Array.from(reportMap.values());
}

function dateKey(item: ReportSummary): number {
  return item.occurrence_date ? item.occurrence_date.getTime() : Number.NEGATIVE_INFINITY;
}

/**
 * Sort by occurrence date descending; undated reports sort as the oldest
 */
export function sortByOccurrenceDesc(items: ReportSummary[]): ReportSummary[] {
  return [...items].sort((a, b) => {
    const aKey = dateKey(a);
    const bKey = dateKey(b);
    if (aKey === bKey) return 0;
    return bKey > aKey ? 1 : -1;
  });
}

/**
 * Turn a listing page into at most `limit` summaries, newest first
 */
export function parseListing(
  html: string,
  limit: number = DEFAULT_REPORT_LIMIT,
  baseUrl: string = SITE_BASE_URL
): ReportSummary[] {
  const items = dedupeByReportNo(parseListingRows(html, baseUrl));
  return sortByOccurrenceDesc(items).slice(0, limit);
}

/**
 * Main listing fetch
 */
export async function fetchListing(limit: number = DEFAULT_REPORT_LIMIT): Promise<ReportSummary[]> {
  console.log(`Fetching report listing from ${LIST_URL}...`);

  const html = await fetchHtml(LIST_URL);
  const items = parseListing(html, limit, LIST_URL);

  console.log(`  Found ${items.length} report${items.length === 1 ? '' : 's'}`);
  return items;
}
