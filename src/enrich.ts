/**
 * Merge listing summaries with their report pages and derived fields
 */

import { fetchReportDetail } from './detail.js';
import { parseAircraft, parseLocation, parseOperationType } from './extract.js';
import { classifyCause, classifySeverity } from './taxonomy.js';
import type { DetailPage, ReportDetail, ReportSummary } from './types.js';

/**
 * Build one ReportDetail from a summary and its page.
 * The page title replaces the listing title unless the page had none.
 */
export function assembleReport(summary: ReportSummary, page: DetailPage): ReportDetail {
  const title = page.title || summary.title;
  const combined = `${title}\n${page.excerpt}`;

  return {
    ...summary,
    title,
    aircraft: parseAircraft(title),
    location: parseLocation(title),
    operation_type: parseOperationType(title),
    key_text: page.excerpt,
    cause_category: classifyCause(combined),
    severity: classifySeverity(combined)
  };
}

/**
 * Fetch and enrich each report in listing order, one request at a time.
 * A failed page request aborts the whole batch.
 */
export async function enrichReports(listing: ReportSummary[]): Promise<ReportDetail[]> {
  const reports: ReportDetail[] = [];

  for (let i = 0; i < listing.length; i++) {
    const summary = listing[i];
    console.log(`  [${i + 1}/${listing.length}] ${summary.report_no}: ${summary.title}`);

    const page = await fetchReportDetail(summary.report_url);
    const report = assembleReport(summary, page);
    console.log(`    ${report.cause_category} / ${report.severity} / ${report.operation_type}`);

    reports.push(report);
  }

  return reports;
}
