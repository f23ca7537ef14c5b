import { describe, expect, it } from 'vitest';
import { buildCharts, escapeHtml, renderDashboard, renderTable } from './dashboard.js';
import { summarize } from './aggregate.js';
import { PLOTLY_CDN_URL } from './config.js';
import { makeReport } from './__fixtures__/reports.js';

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`))
      .toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
  });
});

describe('renderTable', () => {
  it('renders the selected columns with the URL as a link', () => {
    const table = renderTable([makeReport({ report_url: 'https://example.test/r?a=1&b=2' })]);
    const lines = table.split('\n');

    expect(lines[1]).toBe(
      '<thead><tr><th>report_no</th><th>occurrence_date_text</th><th>operation_type</th><th>aircraft</th>'
      + '<th>cause_category</th><th>severity</th><th>investigation_status</th><th>report_url</th></tr></thead>'
    );
    expect(lines[3]).toBe(
      '<tr><td>AO-2024-001</td><td>05/05/2024</td><td>Air transport</td><td>Boeing 737</td>'
      + '<td>Mechanical / system issue</td><td>Unknown</td><td>Closed</td>'
      + '<td><a href="https://example.test/r?a=1&amp;b=2">https://example.test/r?a=1&amp;b=2</a></td></tr>'
    );
  });
});

describe('buildCharts', () => {
  it('plots dated reports oldest first on the timeline', () => {
    const reports = [
      makeReport({ report_no: 'AO-2024-003', occurrence_date: new Date(2024, 5, 1), title: 'Newest' }),
      makeReport({ report_no: 'AO-2024-002', occurrence_date: null, title: 'Undated' }),
      makeReport({ report_no: 'AO-2024-001', occurrence_date: new Date(2024, 0, 1), title: 'Oldest' })
    ];

    const charts = buildCharts(summarize(reports), reports);

    expect(charts.map(c => c.title)).toEqual(['Cause categories', 'Operation type', 'Severity', 'Timeline']);
    expect(charts[3].data[0]).toMatchObject({
      type: 'scatter',
      mode: 'markers+lines',
      x: ['2024-01-01', '2024-06-01'],
      y: ['AO-2024-001', 'AO-2024-003'],
      text: ['Oldest', 'Newest']
    });
    expect(charts[2].data[0]).toMatchObject({ type: 'pie', labels: ['Unknown'], values: [3] });
  });
});

describe('renderDashboard', () => {
  it('loads the chart library and keeps report text out of the script context', () => {
    const reports = [makeReport({ title: 'Bad </script><script>alert(1)</script>' })];

    const html = renderDashboard(summarize(reports), reports);

    expect(html).toContain(`<script src="${PLOTLY_CDN_URL}"></script>`);
    expect(html).toContain('<h1>ATSB Aviation - Latest 1 Investigation Reports</h1>');
    expect(html.split('</script>').length - 1).toBe(2);
    expect(html).toContain('\\u003c/script>');
  });
});
