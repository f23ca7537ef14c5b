/**
 * Aggregate enriched reports into the counts behind the digest and dashboard
 */

import type { DateWindow, InsightsSummary, ReportDetail, ValueCount } from './types.js';

const TOP_LOCATIONS = 5;

/**
 * Count occurrences of each value and return sorted by count descending.
 * Ties keep the order in which values first appeared.
 */
export function countBy<T extends string>(values: T[]): ValueCount<T>[] {
  const counts = new Map<T, number>();

  for (const value of values) {
    counts.set(value, (counts.get(value) || 0) + 1);
  }

  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([value, count]) => ({ value, count }));
}

/**
 * Earliest and latest occurrence date, ignoring undated reports
 */
export function dateWindow(reports: ReportDetail[]): DateWindow {
  let start: Date | null = null;
  let end: Date | null = null;

  for (const { occurrence_date: date } of reports) {
    if (!date) continue;
    if (!start || date < start) start = date;
    if (!end || date > end) end = date;
  }

  return { start, end };
}

/**
 * Main aggregate function
 */
export function summarize(reports: ReportDetail[]): InsightsSummary {
  return {
    total: reports.length,
    window: dateWindow(reports),
    causes: countBy(reports.map(r => r.cause_category)),
    operations: countBy(reports.map(r => r.operation_type)),
    severities: countBy(reports.map(r => r.severity)),
    locations: countBy(reports.map(r => r.location)).slice(0, TOP_LOCATIONS)
  };
}
