/**
 * Self-contained HTML dashboard: four Plotly charts and the report table
 */

import { format } from 'date-fns';
import { PLOTLY_CDN_URL } from './config.js';
import type { InsightsSummary, ReportDetail } from './types.js';

export const TABLE_COLUMNS = [
  'report_no',
  'occurrence_date_text',
  'operation_type',
  'aircraft',
  'cause_category',
  'severity',
  'investigation_status',
  'report_url'
] as const satisfies readonly (keyof ReportDetail)[];

export interface ChartPanel {
  id: string;
  title: string;
  data: Record<string, unknown>[];
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

// JSON embedded in a <script> must not contain "</script>"
function toScriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

/**
 * Chart traces: causes and operation types as bars, severity as a pie,
 * and dated reports on a timeline (oldest first)
 */
export function buildCharts(summary: InsightsSummary, reports: ReportDetail[]): ChartPanel[] {
  const timeline = reports
    .filter(r => r.occurrence_date !== null)
    .sort((a, b) => (a.occurrence_date?.getTime() ?? 0) - (b.occurrence_date?.getTime() ?? 0));

  return [
    {
      id: 'chart-causes',
      title: 'Cause categories',
      data: [{
        type: 'bar',
        name: 'Causes',
        x: summary.causes.map(c => c.value),
        y: summary.causes.map(c => c.count)
      }]
    },
    {
      id: 'chart-operations',
      title: 'Operation type',
      data: [{
        type: 'bar',
        name: 'Operation type',
        x: summary.operations.map(c => c.value),
        y: summary.operations.map(c => c.count)
      }]
    },
    {
      id: 'chart-severity',
      title: 'Severity',
      data: [{
        type: 'pie',
        name: 'Severity',
        labels: summary.severities.map(c => c.value),
        values: summary.severities.map(c => c.count)
      }]
    },
    {
      id: 'chart-timeline',
      title: 'Timeline',
      data: [{
        type: 'scatter',
        mode: 'markers+lines',
        name: 'Timeline',
        x: timeline.map(r => (r.occurrence_date ? format(r.occurrence_date, 'yyyy-MM-dd') : '')),
        y: timeline.map(r => r.report_no),
        text: timeline.map(r => r.title)
      }]
    }
  ];
}

function renderCell(report: ReportDetail, column: (typeof TABLE_COLUMNS)[number]): string {
  const value = escapeHtml(report[column]);
  if (column === 'report_url' && value) {
    return `<a href="${value}">${value}</a>`;
  }
  return value;
}

export function renderTable(reports: ReportDetail[]): string {
  const header = TABLE_COLUMNS.map(column => `<th>${column}</th>`).join('');
  const rows = reports.map(report =>
    `<tr>${TABLE_COLUMNS.map(column => `<td>${renderCell(report, column)}</td>`).join('')}</tr>`
  );

  return [
    '<table class="reports">',
    `<thead><tr>${header}</tr></thead>`,
    '<tbody>',
    ...rows,
    '</tbody>',
    '</table>'
  ].join('\n');
}

export function renderDashboard(summary: InsightsSummary, reports: ReportDetail[]): string {
  const charts = buildCharts(summary, reports);
  const heading = `ATSB Aviation - Latest ${summary.total} Investigation Reports`;

  const panels = charts.map(chart => `<div class="panel" id="${chart.id}"></div>`).join('\n');
  const scripts = charts.map(chart =>
    `Plotly.newPlot(${JSON.stringify(chart.id)}, ${toScriptJson(chart.data)}, ${toScriptJson({ title: chart.title, height: 420 })});`
  ).join('\n');

  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>ATSB Dashboard</title>
<script src="${PLOTLY_CDN_URL}"></script>
<style>
  body { font-family: sans-serif; margin: 24px; }
  .grid { display: grid; grid-template-columns: 1fr 1fr; gap: 16px; max-width: 1300px; }
  table.reports { border-collapse: collapse; margin-top: 12px; }
  table.reports th, table.reports td { border: 1px solid #ccc; padding: 4px 8px; text-align: left; }
</style>
</head>
<body>
<h1>${escapeHtml(heading)}</h1>
<div class="grid">
${panels}
</div>
<h2>Report table</h2>
${renderTable(reports)}
<p>Source: Australian Transport Safety Bureau (ATSB). Links in table point to original report pages.</p>
<script>
${scripts}
</script>
</body>
</html>
`;
}
