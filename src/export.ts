/**
 * Render enriched reports as CSV and JSON datasets
 */

import { format } from 'date-fns';
import type { ReportDetail, ReportRecord } from './types.js';

export const CSV_COLUMNS = [
  'report_no',
  'title',
  'report_url',
  'occurrence_date',
  'occurrence_date_text',
  'investigation_status',
  'aircraft',
  'location',
  'operation_type',
  'key_text',
  'cause_category',
  'severity'
] as const satisfies readonly (keyof ReportDetail)[];

const CSV_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const JSON_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Quote a CSV field when it holds a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvValue(report: ReportDetail, column: (typeof CSV_COLUMNS)[number]): string {
  if (column === 'occurrence_date') {
    return report.occurrence_date ? format(report.occurrence_date, CSV_DATE_FORMAT) : '';
  }
  return report[column];
}

export function toCsv(reports: ReportDetail[]): string {
  const lines = [CSV_COLUMNS.join(',')];

  for (const report of reports) {
    lines.push(CSV_COLUMNS.map(column => escapeCsvField(csvValue(report, column))).join(','));
  }

  return lines.join('\n') + '\n';
}

/**
 * Record as written to reports.json (date as yyyy-MM-dd)
 */
export function toRecord(report: ReportDetail): ReportRecord {
  return {
    ...report,
    occurrence_date: report.occurrence_date ? format(report.occurrence_date, JSON_DATE_FORMAT) : null
  };
}

export function toRecords(reports: ReportDetail[]): ReportRecord[] {
  return reports.map(toRecord);
}
