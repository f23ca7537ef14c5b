import type { ReportDetail } from '../types.js';

export function makeReport(overrides: Partial<ReportDetail> = {}): ReportDetail {
  return {
    report_no: 'AO-2024-001',
    title: 'Engine failure involving Boeing 737, near Sydney, on 5 May 2024',
    report_url: 'https://www.atsb.gov.au/publications/investigation_reports/2024/aair/ao-2024-001',
    occurrence_date: new Date(2024, 4, 5),
    occurrence_date_text: '05/05/2024',
    investigation_status: 'Closed',
    aircraft: 'Boeing 737',
    location: 'Sydney',
    operation_type: 'Air transport',
    key_text: '',
    cause_category: 'Mechanical / system issue',
    severity: 'Unknown',
    ...overrides
  };
}

export function reportLink(slug: string, text: string): string {
  return `<a href="/publications/investigation_reports/2024/aair/${slug}">${text}</a>`;
}

export function listingRow(cells: string[]): string {
  return `<tr>${cells.map(cell => `<td>${cell}</td>`).join('')}</tr>`;
}

export function listingTable(rows: string[]): string {
  return `<html><body><table>
<thead><tr><th>Title</th><th>Report</th><th>Occurrence date</th><th>Status</th></tr></thead>
<tbody>${rows.join('\n')}</tbody>
</table></body></html>`;
}

/**
 * Listing row in the site's column order: title, report number, date, status
 */
export function reportRow(code: string, title: string, date: string, status: string): string {
  const slug = code.toLowerCase();
  return listingRow([reportLink(slug, title), reportLink(slug, code), date, status]);
}
